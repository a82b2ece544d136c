/**
 * Broadcaster types
 */

import type { CaptureRequest, FrameSource } from '@tankview/capture';
import type { CaptureSettings, EncodedFrame } from '@tankview/shared';

export const BROADCASTER_STATES = {
  IDLE: 'idle',
  STARTING: 'starting',
  RUNNING: 'running',
  STOPPING: 'stopping',
  STOPPED: 'stopped',
  FAILED: 'failed',
} as const;

export type BroadcasterState = (typeof BROADCASTER_STATES)[keyof typeof BROADCASTER_STATES];

/**
 * Opens the frame source for a camera; rejects with HardwareUnavailableError
 */
export type FrameSourceOpener = (request: CaptureRequest) => Promise<FrameSource>;

export interface FrameBroadcasterEvents {
  started: (settings: CaptureSettings) => void;
  frame: (frame: EncodedFrame) => void;
  overlayShown: (at: Date) => void;
  overlayHidden: (at: Date) => void;
  readFailure: (error: Error) => void;
  encodeFailure: (error: Error) => void;
  stopped: () => void;
}

export interface BroadcasterStatus {
  index: number;
  description: string;
  state: BroadcasterState;
  streamPath: string;
  framesPublished: number;
  readFailures: number;
  encodeFailures: number;
  lastFrameAt: string | null;
  settings: CaptureSettings | null;
  waitingClients: number;
}
