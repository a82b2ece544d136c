/**
 * Frame Source - opens a camera on the first working backend
 *
 * Backends are tried in order. A backend is accepted once it opens and
 * yields a frame of the size it reports within `probeAttempts` reads.
 * Requested resolution and rate are best-effort; what the device accepted
 * is logged and mismatches are warnings.
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  HardwareUnavailableError,
  RGBA_CHANNELS,
  createChildLogger,
  errorMessage,
  logCameraSettings,
  type CaptureSettings,
  type Frame,
  type Logger,
} from '@tankview/shared';
import type { CaptureDevice, CaptureRequest, FrameSourceOptions } from './types.js';

/**
 * An opened, probed and warmed-up camera
 */
export class FrameSource {
  readonly cameraIndex: number;
  readonly backend: string;
  private device: CaptureDevice;
  private readTimeoutMs: number;
  private closed = false;

  constructor(cameraIndex: number, backend: string, device: CaptureDevice, readTimeoutMs: number) {
    this.cameraIndex = cameraIndex;
    this.backend = backend;
    this.device = device;
    this.readTimeoutMs = readTimeoutMs;
  }

  get settings(): CaptureSettings {
    return this.device.settings;
  }

  /**
   * Next frame, or ReadTimeoutError if the device is silent for readTimeoutMs
   */
  read(signal?: AbortSignal): Promise<Frame> {
    return this.device.read({ signal, timeoutMs: this.readTimeoutMs });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.device.close();
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

/**
 * A frame is usable when its buffer matches its reported size
 */
export function isValidFrame(frame: Frame): boolean {
  return (
    frame.width > 0 &&
    frame.height > 0 &&
    frame.data.length === frame.width * frame.height * RGBA_CHANNELS
  );
}

async function probe(device: CaptureDevice, attempts: number, timeoutMs: number): Promise<string | null> {
  let lastError = 'no frame';
  for (let i = 0; i < attempts; i++) {
    try {
      const frame = await device.read({ timeoutMs });
      if (isValidFrame(frame)) return null;
      lastError = `invalid ${frame.width}x${frame.height} frame`;
    } catch (error) {
      lastError = errorMessage(error);
    }
  }
  return `no valid frame after ${attempts} reads (${lastError})`;
}

/**
 * Open, probe and warm up a camera, or reject with HardwareUnavailableError
 */
export async function openFrameSource(
  request: CaptureRequest,
  options: FrameSourceOptions
): Promise<FrameSource> {
  const logger = createChildLogger({ component: 'FrameSource', camera: request.cameraIndex });
  const attempts: string[] = [];

  for (const backend of options.backends) {
    if (!backend.isSupported(request)) {
      attempts.push(`${backend.name}: unsupported`);
      continue;
    }

    logger.info({ backend: backend.name }, `Trying camera ${request.cameraIndex} with ${backend.name}`);

    let device: CaptureDevice;
    try {
      device = await backend.open(request);
    } catch (error) {
      const message = errorMessage(error);
      attempts.push(`${backend.name}: ${message}`);
      logger.warn({ backend: backend.name, error: message }, 'Backend failed to open camera');
      continue;
    }

    const probeFailure = await probe(device, options.probeAttempts, options.readTimeoutMs);
    if (probeFailure) {
      attempts.push(`${backend.name}: ${probeFailure}`);
      logger.warn({ backend: backend.name, reason: probeFailure }, 'Camera opened but produced no frames');
      await device.close();
      continue;
    }

    const actual = device.settings;
    logCameraSettings(
      request.cameraIndex,
      { width: request.width, height: request.height, fps: request.frameRate },
      { width: actual.width, height: actual.height, fps: actual.fps }
    );
    if (actual.width !== request.width || actual.height !== request.height) {
      logger.warn(
        { requested: `${request.width}x${request.height}`, actual: `${actual.width}x${actual.height}` },
        'Camera resolution differs from requested'
      );
    }
    if (actual.fps !== null && actual.fps !== request.frameRate) {
      logger.warn({ requested: request.frameRate, actual: actual.fps }, 'Camera frame rate differs from requested');
    }

    await warmUp(device, options, logger);

    logger.info({ backend: backend.name }, `Camera ${request.cameraIndex} initialized`);
    return new FrameSource(request.cameraIndex, backend.name, device, options.readTimeoutMs);
  }

  throw new HardwareUnavailableError(request.cameraIndex, attempts);
}

/**
 * Discard the first frames while exposure settles
 */
async function warmUp(
  device: CaptureDevice,
  options: FrameSourceOptions,
  logger: Logger
): Promise<void> {
  for (let i = 0; i < options.warmupFrames; i++) {
    try {
      await device.read({ timeoutMs: options.readTimeoutMs });
    } catch (error) {
      logger.warn({ frame: i + 1, error: errorMessage(error) }, 'Warm-up read failed');
    }
    if (options.warmupDelayMs > 0) {
      await delay(options.warmupDelayMs);
    }
  }
  logger.debug({ frames: options.warmupFrames }, 'Warm-up complete');
}
