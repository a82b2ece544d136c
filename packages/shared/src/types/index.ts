/**
 * Core types for TankView
 */

export * from './camera.js';
export * from './sensors.js';
