/**
 * TankView HTTP Server
 */

import { createBroadcasterManagerFromConfig } from '@tankview/core';
import { createChildLogger, errorMessage, getConfig } from '@tankview/shared';
import { MJPEGStreamer } from '@tankview/vision';
import { buildServer } from './server.js';

const logger = createChildLogger({ component: 'Server' });

async function main() {
  const config = getConfig();

  const manager = createBroadcasterManagerFromConfig(config);
  const summary = await manager.startAll();
  for (const failure of summary.failed) {
    logger.error({ camera: failure.index, error: failure.error }, `Camera ${failure.index} not started`);
  }
  if (summary.started.length === 0) {
    logger.error('No cameras could be initialized, exiting');
    await manager.stopAll();
    process.exit(1);
  }

  const streamer = new MJPEGStreamer({ frameTimeoutMs: config.stream.frameTimeoutMs });
  const app = await buildServer({
    feeds: manager.streamRoutes(),
    streamer,
    pageTitle: config.server.pageTitle,
    corsOrigin: config.server.corsOrigin,
  });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);
    streamer.close();
    await app.close();
    await manager.stopAll();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error({ error: errorMessage(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'Failed to start server');
    await manager.stopAll();
    process.exit(1);
  }

  logger.info(`Server started on ${config.server.host}:${config.server.port}`);
  for (const broadcaster of manager.available()) {
    const { streamPath, description } = broadcaster.getStatus();
    logger.info(
      { camera: broadcaster.cameraIndex },
      `Camera ${broadcaster.cameraIndex} (${description}): http://${config.server.host}:${config.server.port}${streamPath}`
    );
  }
}

main().catch((err) => {
  logger.error({ error: errorMessage(err) }, 'Unhandled error');
  process.exit(1);
});
