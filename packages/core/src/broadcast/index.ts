export { FrameBroadcaster, type FrameBroadcasterOptions } from './frame-broadcaster.js';
export {
  BroadcasterManager,
  createBroadcasterManagerFromConfig,
  type BroadcasterManagerOptions,
  type StartSummary,
} from './broadcaster-manager.js';
export { isValidTransition, assertTransition } from './transitions.js';
export * from './types.js';
