/**
 * Vision Types - Shared types for the TankView frame pipeline
 */

import type { EncodedFrame } from '@tankview/shared';
import type { SlotWaitOptions } from './stream/frame-slot.js';

/**
 * Options for waiting on the next frame
 */
export type FrameWaitOptions = SlotWaitOptions;

/**
 * Anything a stream endpoint can pull frames from
 */
export interface FrameFeed {
  readonly cameraIndex: number;
  /** Resolves with the next frame published after the call */
  getFrame(options?: FrameWaitOptions): Promise<EncodedFrame>;
}

/**
 * Overlay visibility edge
 */
export type OverlayEdge = 'shown' | 'hidden';

/**
 * Mutable overlay cycle timer, owned by the producer
 */
export interface OverlayState {
  /** Start of the current cycle (ms since epoch) */
  cycleStart: number;
  /** Whether the label was drawn on the previous frame */
  shown: boolean;
}

/**
 * Stream client information
 */
export interface StreamClient {
  id: string;
  cameraIndex: number;
  connectedAt: Date;
  remoteAddress?: string;
}

/**
 * Why a stream session ended
 */
export type StreamEndReason = 'client_disconnected' | 'broadcaster_stopped' | 'frame_timeout' | 'server_closed' | 'error';

/**
 * Summary of a finished stream session
 */
export interface StreamSessionResult {
  clientId: string;
  cameraIndex: number;
  framesSent: number;
  reason: StreamEndReason;
}
