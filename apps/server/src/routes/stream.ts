/**
 * MJPEG stream and snapshot routes
 */

import { createChildLogger } from '@tankview/shared';
import type { MJPEGStreamer } from '@tankview/vision';
import type { CameraFeed, RouteHandler } from './types.js';

const logger = createChildLogger({ component: 'StreamRoutes' });

/**
 * GET /stream<N>.mjpg
 * Endless multipart JPEG response; 503 while the camera is not broadcasting
 */
export function createStreamRoute(path: string, feed: CameraFeed, streamer: MJPEGStreamer): RouteHandler {
  return {
    method: 'GET',
    path,
    async handle(request, reply) {
      if (!feed.isAvailable()) {
        return reply
          .status(503)
          .type('text/plain')
          .send(`Camera ${feed.cameraIndex} not available`);
      }

      // The streamer owns the raw response from here on
      reply.hijack();
      const result = await streamer.serve(reply.raw, feed, { remoteAddress: request.ip });
      logger.debug({ ...result, path }, 'Stream closed');
      return undefined;
    },
  };
}

/**
 * GET /frame<N>.jpg
 * The most recent frame as a single JPEG
 */
export function createSnapshotRoute(path: string, feed: CameraFeed): RouteHandler {
  return {
    method: 'GET',
    path,
    async handle(_request, reply) {
      const frame = feed.isAvailable() ? feed.latest() : undefined;
      if (!frame) {
        return reply
          .status(503)
          .type('text/plain')
          .send(`Camera ${feed.cameraIndex} not available`);
      }

      return reply
        .header('Content-Type', 'image/jpeg')
        .header('Cache-Control', 'no-cache, private')
        .header('X-Frame-Sequence', String(frame.sequence))
        .send(frame.jpeg);
    },
  };
}
