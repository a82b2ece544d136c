/**
 * HTTP server assembly
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { createRouteTable, registerRoutes, type ServerDependencies } from './routes/index.js';

export async function buildServer(deps: ServerDependencies): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own logger
  });

  await app.register(cors, {
    origin: deps.corsOrigin === '*' ? true : deps.corsOrigin.split(','),
  });

  await registerRoutes(app, createRouteTable(deps));

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({ error: 'Not found', path: request.url });
  });

  return app;
}
