/**
 * Health and status routes
 */

import { errorMessage, type SensorSuite } from '@tankview/shared';
import type { MJPEGStreamer } from '@tankview/vision';
import type { CameraFeed, RouteHandler } from './types.js';

export function createHealthRoute(): RouteHandler {
  return {
    method: 'GET',
    path: '/health',
    async handle() {
      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      };
    },
  };
}

/**
 * Read every configured sensor; a failed read reports null
 */
async function readSensors(sensors: SensorSuite): Promise<Record<string, unknown>> {
  const entries = Object.entries(sensors).filter(
    (entry): entry is [string, NonNullable<SensorSuite[keyof SensorSuite]>] => entry[1] !== undefined
  );
  const results = await Promise.allSettled(entries.map(([, reader]) => reader.read()));

  const readings: Record<string, unknown> = {};
  results.forEach((result, i) => {
    const name = entries[i]?.[0];
    if (!name) return;
    readings[name] =
      result.status === 'fulfilled' ? result.value : { error: errorMessage(result.reason) };
  });
  return readings;
}

export function createStatusRoute(
  feeds: CameraFeed[],
  streamer: MJPEGStreamer,
  sensors?: SensorSuite
): RouteHandler {
  return {
    method: 'GET',
    path: '/status',
    async handle() {
      const cameras = feeds.map((feed) => ({
        ...feed.getStatus(),
        clients: streamer.getCameraClients(feed.cameraIndex).length,
      }));

      return {
        status: cameras.some((c) => c.state === 'running') ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        cameras,
        streams: {
          active: streamer.getClientCount(),
          peak: streamer.getPeakClientCount(),
        },
        ...(sensors ? { sensors: await readSensors(sensors) } : {}),
      };
    },
  };
}
