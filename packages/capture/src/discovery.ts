/**
 * Camera discovery - which device indexes yield frames
 */

import { createChildLogger, errorMessage } from '@tankview/shared';
import { openFrameSource } from './frame-source.js';
import type { CaptureBackend, DiscoveredCamera } from './types.js';

const logger = createChildLogger({ component: 'CameraDiscovery' });

export interface DiscoveryOptions {
  /** Size and rate to request while probing */
  width: number;
  height: number;
  frameRate: number;
  probeAttempts: number;
  readTimeoutMs: number;
}

const DEFAULT_OPTIONS: DiscoveryOptions = {
  width: 800,
  height: 600,
  frameRate: 20,
  probeAttempts: 3,
  readTimeoutMs: 2000,
};

/**
 * Probe each index in turn; devices are closed again before returning
 */
export async function discoverCameras(
  indexes: number[],
  backends: CaptureBackend[],
  options: Partial<DiscoveryOptions> = {}
): Promise<DiscoveredCamera[]> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const results: DiscoveredCamera[] = [];

  for (const index of indexes) {
    logger.info({ camera: index }, `Testing camera ${index}`);
    try {
      const source = await openFrameSource(
        { cameraIndex: index, width: opts.width, height: opts.height, frameRate: opts.frameRate },
        {
          backends,
          probeAttempts: opts.probeAttempts,
          readTimeoutMs: opts.readTimeoutMs,
          warmupFrames: 0,
          warmupDelayMs: 0,
        }
      );
      const { width, height, fps } = source.settings;
      results.push({ index, working: true, backend: source.backend, width, height, fps });
      await source.close();
      logger.info({ camera: index, backend: source.backend }, `Working camera index ${index}`);
    } catch (error) {
      results.push({ index, working: false, error: errorMessage(error) });
      logger.debug({ camera: index, error: errorMessage(error) }, `Camera ${index} unavailable`);
    }
  }

  return results;
}

/**
 * Range helper for scans: 0..maxIndex inclusive
 */
export function indexRange(maxIndex: number): number[] {
  return Array.from({ length: Math.max(0, maxIndex + 1) }, (_, i) => i);
}
