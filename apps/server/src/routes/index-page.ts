import { renderIndexPage } from '../pages/index-page.js';
import type { CameraFeed, RouteHandler } from './types.js';

/**
 * GET / and /index.html, listing cameras that are broadcasting right now
 */
export function createIndexPageRoutes(feeds: CameraFeed[], pageTitle: string): RouteHandler[] {
  const handle: RouteHandler['handle'] = async (_request, reply) => {
    const cameras = feeds
      .filter((feed) => feed.isAvailable())
      .map((feed) => ({
        index: feed.cameraIndex,
        description: feed.camera.description,
        streamPath: feed.getStatus().streamPath,
      }));

    return reply
      .header('Content-Type', 'text/html; charset=utf-8')
      .header('Cache-Control', 'no-cache')
      .send(renderIndexPage(pageTitle, cameras));
  };

  return ['/', '/index.html'].map((path): RouteHandler => ({ method: 'GET', path, handle }));
}
