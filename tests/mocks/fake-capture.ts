/**
 * Scriptable in-process capture backend for tests
 */
import {
  DeviceClosedError,
  ReadTimeoutError,
  type CaptureSettings,
  type Frame,
} from '@tankview/shared';
import type {
  CaptureBackend,
  CaptureDevice,
  CaptureReadOptions,
  CaptureRequest,
} from '@tankview/capture';

export const solidFrame = (
  width: number,
  height: number,
  rgb: readonly [number, number, number] = [255, 255, 255]
): Frame => {
  const data = Buffer.alloc(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    data.set([rgb[0], rgb[1], rgb[2], 255], i * 4);
  }
  return { data, width, height, capturedAt: new Date() };
};

export interface FakeBackendScript {
  /** Reject open() with this message */
  openError?: string;
  /** Report isSupported() = false */
  unsupported?: boolean;
  /** Number of initial reads that time out */
  failReads?: number;
  /** Reject every read after this many successful ones */
  stopAfter?: number;
  /** Frame for the n-th read (1-based) */
  frame?: (read: number, request: CaptureRequest) => Frame;
  /** Settings the device claims to have accepted */
  settings?: Partial<CaptureSettings>;
}

export class FakeCaptureDevice implements CaptureDevice {
  readonly settings: CaptureSettings;
  reads = 0;
  closeCount = 0;
  private successes = 0;

  constructor(
    private readonly request: CaptureRequest,
    private readonly script: FakeBackendScript,
    backend: string
  ) {
    this.settings = {
      backend,
      width: request.width,
      height: request.height,
      fps: request.frameRate,
      ...script.settings,
    };
  }

  async read(options: CaptureReadOptions = {}): Promise<Frame> {
    this.reads++;
    if (this.closeCount > 0) {
      throw new DeviceClosedError(this.request.cameraIndex);
    }
    if (options.signal?.aborted) {
      throw new Error('aborted');
    }
    if (this.reads <= (this.script.failReads ?? 0)) {
      throw new ReadTimeoutError(this.request.cameraIndex, options.timeoutMs ?? 0);
    }
    if (this.script.stopAfter !== undefined && this.successes >= this.script.stopAfter) {
      throw new ReadTimeoutError(this.request.cameraIndex, options.timeoutMs ?? 0);
    }
    this.successes++;
    const make =
      this.script.frame ?? (() => solidFrame(this.settings.width, this.settings.height));
    return make(this.reads, this.request);
  }

  async close(): Promise<void> {
    this.closeCount++;
  }
}

export class FakeCaptureBackend implements CaptureBackend {
  readonly devices: FakeCaptureDevice[] = [];
  opens = 0;

  constructor(
    readonly name: string,
    private readonly script: FakeBackendScript = {}
  ) {}

  isSupported(): boolean {
    return !this.script.unsupported;
  }

  async open(request: CaptureRequest): Promise<CaptureDevice> {
    this.opens++;
    if (this.script.openError) {
      throw new Error(this.script.openError);
    }
    const device = new FakeCaptureDevice(request, this.script, this.name);
    this.devices.push(device);
    return device;
  }

  get lastDevice(): FakeCaptureDevice | undefined {
    return this.devices[this.devices.length - 1];
  }
}
