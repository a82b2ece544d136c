/**
 * Capture Types
 */

import type { CaptureSettings, Frame } from '@tankview/shared';

/**
 * What the caller asks a device for. Values are best-effort; the device
 * reports what it actually accepted in `CaptureDevice.settings`.
 */
export interface CaptureRequest {
  cameraIndex: number;
  /** Explicit device path or name */
  device?: string;
  width: number;
  height: number;
  frameRate: number;
}

export interface CaptureReadOptions {
  signal?: AbortSignal;
  /** Reject with ReadTimeoutError after this many milliseconds */
  timeoutMs?: number;
}

/**
 * An open capture handle
 */
export interface CaptureDevice {
  readonly settings: CaptureSettings;
  /** Next frame produced after the previous read */
  read(options?: CaptureReadOptions): Promise<Frame>;
  /** Release the handle. Safe to call more than once. */
  close(): Promise<void>;
}

/**
 * A way of opening devices (a capture API or a test source)
 */
export interface CaptureBackend {
  readonly name: string;
  isSupported(request: CaptureRequest): boolean;
  open(request: CaptureRequest): Promise<CaptureDevice>;
}

/**
 * Capture modes
 */
export const CAPTURE_MODES = {
  FFMPEG: 'ffmpeg',
  SYNTHETIC: 'synthetic',
} as const;

export type CaptureMode = (typeof CAPTURE_MODES)[keyof typeof CAPTURE_MODES];

/**
 * Probe and warm-up tuning for openFrameSource
 */
export interface FrameSourceOptions {
  backends: CaptureBackend[];
  probeAttempts: number;
  warmupFrames: number;
  warmupDelayMs: number;
  readTimeoutMs: number;
}

/**
 * One row of a discovery scan
 */
export interface DiscoveredCamera {
  index: number;
  working: boolean;
  backend?: string;
  width?: number;
  height?: number;
  fps?: number | null;
  error?: string;
}
