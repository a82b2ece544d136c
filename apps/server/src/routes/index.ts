/**
 * Route registration
 */

import type { FastifyInstance } from 'fastify';
import { snapshotPath } from '@tankview/core';
import { createHealthRoute, createStatusRoute } from './health.js';
import { createIndexPageRoutes } from './index-page.js';
import { createSnapshotRoute, createStreamRoute } from './stream.js';
import type { RouteHandler, ServerDependencies } from './types.js';

export type { CameraFeed, RouteHandler, ServerDependencies } from './types.js';

/**
 * Every route the server answers, built once at startup
 */
export function createRouteTable(deps: ServerDependencies): RouteHandler[] {
  const feeds = Array.from(deps.feeds.values()).sort((a, b) => a.cameraIndex - b.cameraIndex);

  const routes: RouteHandler[] = [
    ...createIndexPageRoutes(feeds, deps.pageTitle),
    createHealthRoute(),
    createStatusRoute(feeds, deps.streamer, deps.sensors),
  ];

  for (const [path, feed] of deps.feeds) {
    routes.push(createStreamRoute(path, feed, deps.streamer));
    routes.push(createSnapshotRoute(snapshotPath(feed.cameraIndex), feed));
  }

  return routes;
}

export async function registerRoutes(app: FastifyInstance, routes: RouteHandler[]): Promise<void> {
  for (const route of routes) {
    app.route({
      method: route.method,
      url: route.path,
      handler: (request, reply) => route.handle(request, reply),
    });
  }
}
