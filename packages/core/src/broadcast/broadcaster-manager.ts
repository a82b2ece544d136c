/**
 * Broadcaster Manager
 * One FrameBroadcaster per registered camera, started and stopped together
 */

import {
  createCaptureBackends,
  openFrameSource,
  type CaptureBackend,
} from '@tankview/capture';
import { createChildLogger, errorMessage, type Config } from '@tankview/shared';
import { CameraRegistry, streamPath } from '../registry/camera-registry.js';
import { FrameBroadcaster } from './frame-broadcaster.js';
import type { BroadcasterStatus, FrameSourceOpener } from './types.js';

const logger = createChildLogger({ component: 'BroadcasterManager' });

export interface BroadcasterManagerOptions {
  registry: CameraRegistry;
  openSource: FrameSourceOpener;
  readRetryDelayMs: number;
  clock?: () => number;
}

export interface StartSummary {
  started: number[];
  failed: { index: number; error: string }[];
}

export class BroadcasterManager {
  readonly registry: CameraRegistry;
  private broadcasters: Map<number, FrameBroadcaster> = new Map();

  constructor(options: BroadcasterManagerOptions) {
    this.registry = options.registry;
    for (const camera of options.registry.list()) {
      this.broadcasters.set(
        camera.index,
        new FrameBroadcaster({
          camera,
          openSource: options.openSource,
          readRetryDelayMs: options.readRetryDelayMs,
          clock: options.clock,
        })
      );
    }
  }

  /**
   * Start every camera independently; one failure does not affect the rest
   */
  async startAll(): Promise<StartSummary> {
    const broadcasters = this.list();
    const results = await Promise.allSettled(broadcasters.map((b) => b.start()));

    const summary: StartSummary = { started: [], failed: [] };
    results.forEach((result, i) => {
      const broadcaster = broadcasters[i];
      if (!broadcaster) return;
      if (result.status === 'fulfilled') {
        summary.started.push(broadcaster.cameraIndex);
      } else {
        summary.failed.push({ index: broadcaster.cameraIndex, error: errorMessage(result.reason) });
      }
    });

    logger.info(
      { started: summary.started, failed: summary.failed.map((f) => f.index) },
      `Started ${summary.started.length} of ${broadcasters.length} camera(s)`
    );
    return summary;
  }

  get(index: number): FrameBroadcaster | undefined {
    return this.broadcasters.get(index);
  }

  /**
   * Broadcasters in camera index order
   */
  list(): FrameBroadcaster[] {
    return Array.from(this.broadcasters.values()).sort((a, b) => a.cameraIndex - b.cameraIndex);
  }

  /**
   * Stream path to broadcaster, as served over HTTP
   */
  streamRoutes(): Map<string, FrameBroadcaster> {
    return new Map(this.list().map((b) => [streamPath(b.cameraIndex), b]));
  }

  available(): FrameBroadcaster[] {
    return this.list().filter((b) => b.isAvailable());
  }

  getStatus(): BroadcasterStatus[] {
    return this.list().map((b) => b.getStatus());
  }

  async stopAll(): Promise<void> {
    await Promise.all(this.list().map((b) => b.stop()));
    logger.info('All cameras released');
  }
}

/**
 * Wire registry, capture backends and broadcasters from application config
 */
export function createBroadcasterManagerFromConfig(
  config: Config,
  options: { registry?: CameraRegistry; backends?: CaptureBackend[] } = {}
): BroadcasterManager {
  const registry = options.registry ?? CameraRegistry.fromConfig(config);
  const backends =
    options.backends ??
    createCaptureBackends({ mode: config.capture.mode, ffmpegPath: config.capture.ffmpegPath });

  const openSource: FrameSourceOpener = (request) =>
    openFrameSource(request, {
      backends,
      probeAttempts: config.capture.probeAttempts,
      warmupFrames: config.capture.warmupFrames,
      warmupDelayMs: config.capture.warmupDelayMs,
      readTimeoutMs: config.capture.readTimeoutMs,
    });

  return new BroadcasterManager({
    registry,
    openSource,
    readRetryDelayMs: config.capture.readRetryDelayMs,
  });
}
