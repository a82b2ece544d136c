/**
 * @tankview/core
 * Camera registry and per-camera frame broadcasting
 */

// Registry
export {
  CameraRegistry,
  streamPath,
  snapshotPath,
  type CameraRegistryDefaults,
} from './registry/camera-registry.js';

// Broadcasting
export * from './broadcast/index.js';
