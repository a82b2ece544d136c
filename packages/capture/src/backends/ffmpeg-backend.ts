/**
 * FFmpeg capture backend
 * Reads a camera through an ffmpeg child process emitting raw RGBA frames
 */

import ffmpeg from 'fluent-ffmpeg';
import { PassThrough } from 'node:stream';
import { z } from 'zod';
import {
  HardwareUnavailableError,
  RGBA_CHANNELS,
  createChildLogger,
  errorMessage,
  type CaptureSettings,
  type Logger,
} from '@tankview/shared';
import { SlotCaptureDevice } from './slot-device.js';
import type { CaptureBackend, CaptureDevice, CaptureRequest } from '../types.js';

/**
 * Capture APIs ffmpeg can be asked to use
 */
export type FfmpegInputKind = 'v4l2' | 'avfoundation' | 'dshow' | 'default';

export interface FfmpegBackendConfig {
  kind: FfmpegInputKind;
  ffmpegPath?: string;
  /** Time allowed for ffmpeg to report the stream after spawning */
  openTimeoutMs: number;
  platform: NodeJS.Platform;
}

const DEFAULT_CONFIG: Omit<FfmpegBackendConfig, 'kind'> = {
  openTimeoutMs: 5000,
  platform: process.platform,
};

/**
 * Input arguments for one device
 */
export interface FfmpegInput {
  source: string;
  format?: string;
  options: string[];
}

// fluent-ffmpeg hands codecData over untyped
const codecDataSchema = z.object({
  video: z.string().default(''),
  video_details: z.array(z.string()).default([]),
});

/**
 * Pull the accepted size and rate out of ffmpeg's stream description,
 * e.g. ['rawvideo (YUY2 / 0x32595559)', 'yuyv422', '1280x720', '10 fps']
 */
export function parseCodecData(
  data: unknown
): { width: number; height: number; fps: number | null } | null {
  const parsed = codecDataSchema.safeParse(data);
  if (!parsed.success) return null;

  const details = parsed.data.video_details.length > 0
    ? parsed.data.video_details.map((d) => d.trim())
    : parsed.data.video.split(',').map((d) => d.trim());

  let size: { width: number; height: number } | null = null;
  let fps: number | null = null;

  for (const detail of details) {
    const sizeMatch = /^(\d+)x(\d+)/.exec(detail);
    if (!size && sizeMatch) {
      size = { width: Number(sizeMatch[1]), height: Number(sizeMatch[2]) };
    }
    const fpsMatch = /^([\d.]+) fps/.exec(detail);
    if (fps === null && fpsMatch) {
      fps = Number(fpsMatch[1]);
    }
  }

  if (!size || size.width <= 0 || size.height <= 0) return null;
  return { ...size, fps };
}

/**
 * Build the ffmpeg input for a request on the given capture API
 */
export function describeInput(
  kind: FfmpegInputKind,
  request: CaptureRequest,
  platform: NodeJS.Platform = process.platform
): FfmpegInput {
  const sizing = [
    '-video_size',
    `${request.width}x${request.height}`,
    '-framerate',
    String(request.frameRate),
  ];

  switch (kind) {
    case 'v4l2':
      return {
        source: request.device ?? `/dev/video${request.cameraIndex}`,
        format: 'v4l2',
        options: sizing,
      };
    case 'avfoundation':
      return {
        source: `${request.device ?? request.cameraIndex}:none`,
        format: 'avfoundation',
        options: sizing,
      };
    case 'dshow':
      return {
        source: `video=${request.device ?? ''}`,
        format: 'dshow',
        options: sizing,
      };
    case 'default':
      // Let ffmpeg probe the input and keep whatever mode the device is in
      return {
        source:
          request.device ??
          (platform === 'linux' ? `/dev/video${request.cameraIndex}` : String(request.cameraIndex)),
        options: [],
      };
  }
}

/**
 * A running ffmpeg process for one camera
 */
export class FfmpegCaptureDevice extends SlotCaptureDevice {
  settings: CaptureSettings;
  private command: ffmpeg.FfmpegCommand;
  private output = new PassThrough();
  private pending: Buffer = Buffer.alloc(0);
  private frameBytes = 0;
  private started = false;
  private closing = false;
  private logger: Logger;

  constructor(request: CaptureRequest, kind: FfmpegInputKind, input: FfmpegInput, ffmpegPath?: string) {
    super(request.cameraIndex);
    this.settings = { backend: kind, width: request.width, height: request.height, fps: null };
    this.logger = createChildLogger({ component: 'FfmpegCaptureDevice', camera: request.cameraIndex });

    this.command = ffmpeg(input.source);
    if (ffmpegPath) {
      this.command.setFfmpegPath(ffmpegPath);
    }
    if (input.format) {
      this.command.inputFormat(input.format);
    }
    if (input.options.length > 0) {
      this.command.inputOptions(input.options);
    }
    this.command.noAudio().outputOptions(['-pix_fmt', 'rgba']).format('rawvideo');
  }

  /**
   * Spawn ffmpeg and wait until it reports the stream it is delivering
   */
  start(openTimeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const timer = setTimeout(() => {
        settle(new Error(`ffmpeg did not report a video stream within ${openTimeoutMs}ms`));
      }, openTimeoutMs);

      this.command
        .on('start', (commandLine: string) => {
          this.logger.debug({ commandLine }, 'FFmpeg command');
        })
        .on('codecData', (data: unknown) => {
          const accepted = parseCodecData(data);
          if (!accepted) {
            settle(new Error('ffmpeg reported no usable video size'));
            return;
          }
          this.settings = { backend: this.settings.backend, ...accepted };
          this.frameBytes = accepted.width * accepted.height * RGBA_CHANNELS;
          this.started = true;
          this.drainPending();
          settle();
        })
        .on('error', (err: Error) => {
          if (!this.started) {
            settle(err);
            return;
          }
          this.onExit(`exited: ${err.message}`);
        })
        .on('end', () => {
          if (!this.started) {
            settle(new Error('ffmpeg ended before producing a stream'));
            return;
          }
          this.onExit('ended');
        });

      this.output.on('data', (chunk: Buffer) => this.onData(chunk));
      this.output.on('error', (err) => {
        this.logger.warn({ error: err.message }, 'Capture pipe error');
      });

      this.command.pipe(this.output, { end: true });
    });
  }

  private onData(chunk: Buffer): void {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    if (this.started) {
      this.drainPending();
    }
  }

  /**
   * Slice complete frames off the pipe buffer
   */
  private drainPending(): void {
    while (this.frameBytes > 0 && this.pending.length >= this.frameBytes) {
      const data = Buffer.from(this.pending.subarray(0, this.frameBytes));
      this.pending = this.pending.subarray(this.frameBytes);
      this.publish({
        data,
        width: this.settings.width,
        height: this.settings.height,
        capturedAt: new Date(),
      });
    }
  }

  private onExit(reason: string): void {
    if (this.closing) return;
    this.closing = true;
    this.logger.warn({ reason }, 'FFmpeg capture stopped');
    this.fail(reason);
  }

  protected async release(): Promise<void> {
    this.closing = true;
    this.command.kill('SIGKILL');
    this.output.destroy();
    this.pending = Buffer.alloc(0);
  }
}

/**
 * Opens devices through one ffmpeg capture API
 */
export class FfmpegCaptureBackend implements CaptureBackend {
  readonly name: string;
  private config: FfmpegBackendConfig;
  private logger = createChildLogger({ component: 'FfmpegCaptureBackend' });

  constructor(config: Partial<FfmpegBackendConfig> & Pick<FfmpegBackendConfig, 'kind'>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.name = config.kind;
  }

  isSupported(request: CaptureRequest): boolean {
    // DirectShow addresses devices by name only
    if (this.config.kind === 'dshow') {
      return request.device !== undefined;
    }
    return true;
  }

  async open(request: CaptureRequest): Promise<CaptureDevice> {
    if (!this.isSupported(request)) {
      throw new HardwareUnavailableError(request.cameraIndex, [`${this.name}: unsupported request`]);
    }

    const input = describeInput(this.config.kind, request, this.config.platform);
    this.logger.debug({ camera: request.cameraIndex, input }, 'Opening capture device');

    const device = new FfmpegCaptureDevice(request, this.config.kind, input, this.config.ffmpegPath);
    try {
      await device.start(this.config.openTimeoutMs);
    } catch (error) {
      await device.close();
      throw new HardwareUnavailableError(request.cameraIndex, [`${this.name}: ${errorMessage(error)}`]);
    }
    return device;
  }
}
