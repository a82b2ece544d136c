/**
 * Synthetic capture backend
 * Generates a test pattern in-process; no hardware or ffmpeg needed
 */

import { RGBA_CHANNELS, createChildLogger, type CaptureSettings } from '@tankview/shared';
import { SlotCaptureDevice } from './slot-device.js';
import type { CaptureBackend, CaptureDevice, CaptureRequest } from '../types.js';

/**
 * Produces the RGBA pixels of frame number `frameNumber`
 */
export type SyntheticPattern = (width: number, height: number, frameNumber: number) => Buffer;

type RGB = readonly [number, number, number];

const RED: RGB = [255, 0, 0];
const GREEN: RGB = [0, 255, 0];
const BLUE: RGB = [0, 0, 255];
const WHITE: RGB = [255, 255, 255];

/**
 * Four solid quadrants: red top-left, green top-right,
 * blue bottom-left, white bottom-right
 */
export function quadrantPattern(width: number, height: number): Buffer {
  const data = Buffer.alloc(width * height * RGBA_CHANNELS);
  const midX = Math.floor(width / 2);
  const midY = Math.floor(height / 2);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const [r, g, b] = y < midY ? (x < midX ? RED : GREEN) : x < midX ? BLUE : WHITE;
      const offset = (y * width + x) * RGBA_CHANNELS;
      data[offset] = r;
      data[offset + 1] = g;
      data[offset + 2] = b;
      data[offset + 3] = 255;
    }
  }
  return data;
}

export interface SyntheticBackendConfig {
  pattern: SyntheticPattern;
}

const DEFAULT_CONFIG: SyntheticBackendConfig = {
  pattern: quadrantPattern,
};

/**
 * Timer-driven device; always accepts the requested settings
 */
export class SyntheticCaptureDevice extends SlotCaptureDevice {
  readonly settings: CaptureSettings;
  private timer: NodeJS.Timeout;
  private frameNumber = 0;

  constructor(request: CaptureRequest, pattern: SyntheticPattern) {
    super(request.cameraIndex);
    this.settings = {
      backend: 'synthetic',
      width: request.width,
      height: request.height,
      fps: request.frameRate,
    };

    const intervalMs = Math.max(1, Math.round(1000 / request.frameRate));
    this.timer = setInterval(() => {
      this.publish({
        data: pattern(request.width, request.height, this.frameNumber++),
        width: request.width,
        height: request.height,
        capturedAt: new Date(),
      });
    }, intervalMs);
    this.timer.unref();
  }

  get framesProduced(): number {
    return this.frameNumber;
  }

  protected async release(): Promise<void> {
    clearInterval(this.timer);
  }
}

export class SyntheticCaptureBackend implements CaptureBackend {
  readonly name = 'synthetic';
  private config: SyntheticBackendConfig;
  private logger = createChildLogger({ component: 'SyntheticCaptureBackend' });

  constructor(config: Partial<SyntheticBackendConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  isSupported(): boolean {
    return true;
  }

  async open(request: CaptureRequest): Promise<CaptureDevice> {
    this.logger.debug(
      { camera: request.cameraIndex, width: request.width, height: request.height, fps: request.frameRate },
      'Opening synthetic device'
    );
    return new SyntheticCaptureDevice(request, this.config.pattern);
  }
}
