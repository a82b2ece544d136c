/**
 * TankView Capture Package
 *
 * Camera access: capture backends, probing, warm-up and discovery.
 */

export * from './types.js';
export * from './backends/index.js';
export { FrameSource, openFrameSource, isValidFrame } from './frame-source.js';
export { discoverCameras, indexRange, type DiscoveryOptions } from './discovery.js';
