/**
 * TankView Vision Package
 *
 * Frame processing and MJPEG delivery: rotation, label overlay,
 * JPEG encoding, the latest-frame slot and per-client streaming.
 */

// Types
export * from './types.js';

// Frame composition
export { rotateFrame } from './compositor/rotate.js';
export {
  OverlayCompositor,
  type OverlayCompositorEvents,
  type OverlayCompositorOptions,
  type OverlayTick,
} from './compositor/overlay-compositor.js';

// Encoding
export { FrameEncoder, type FrameEncoderConfig } from './encoder/frame-encoder.js';

// Streaming
export {
  MJPEGStreamer,
  partHeader,
  streamHeaders,
  type MJPEGStreamerConfig,
  type MJPEGStreamerEvents,
  type ServeOptions,
  type StreamResponse,
} from './stream/mjpeg-streamer.js';
export { FrameSlot, type FrameSlotConfig, type SlotWaitOptions } from './stream/frame-slot.js';
export { ConnectionCounter } from './stream/connection-counter.js';
