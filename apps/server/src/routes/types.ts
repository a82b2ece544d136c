/**
 * Route table types
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { BroadcasterStatus } from '@tankview/core';
import type { CameraConfig, EncodedFrame, SensorSuite } from '@tankview/shared';
import type { FrameFeed, MJPEGStreamer } from '@tankview/vision';

/**
 * One route: a method, an exact path and its handler
 */
export interface RouteHandler {
  method: 'GET';
  path: string;
  handle(request: FastifyRequest, reply: FastifyReply): Promise<unknown>;
}

/**
 * What the routes need from a camera's broadcaster
 */
export interface CameraFeed extends FrameFeed {
  readonly camera: CameraConfig;
  isAvailable(): boolean;
  latest(): EncodedFrame | undefined;
  getStatus(): BroadcasterStatus;
}

/**
 * Everything the server is built from; no globals
 */
export interface ServerDependencies {
  /** Stream path (/stream<N>.mjpg) to camera feed */
  feeds: Map<string, CameraFeed>;
  streamer: MJPEGStreamer;
  pageTitle: string;
  corsOrigin: string;
  sensors?: SensorSuite;
}
