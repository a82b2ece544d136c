/**
 * MJPEG Streamer - Multipart JPEG streaming for browser video display
 *
 * Each connection runs its own pull loop against a FrameFeed, so a slow
 * client only ever delays itself.
 */

import { EventEmitter } from 'eventemitter3';
import { once } from 'node:events';
import {
  BroadcasterStoppedError,
  ClientDisconnectError,
  FrameTimeoutError,
  createChildLogger,
  errorMessage,
  logClientConnection,
} from '@tankview/shared';
import { ConnectionCounter } from './connection-counter.js';
import type { FrameFeed, StreamClient, StreamEndReason, StreamSessionResult } from '../types.js';

const logger = createChildLogger({ component: 'MJPEGStreamer' });

/**
 * Events emitted by the MJPEG streamer
 */
export interface MJPEGStreamerEvents {
  /** Client connected */
  clientConnected: (client: StreamClient) => void;
  /** Client disconnected */
  clientDisconnected: (result: StreamSessionResult) => void;
}

/**
 * MJPEG Streamer configuration
 */
export interface MJPEGStreamerConfig {
  /** Frame boundary string */
  boundary: string;
  /** Per-frame wait limit; 0 waits indefinitely */
  frameTimeoutMs: number;
}

const DEFAULT_CONFIG: MJPEGStreamerConfig = {
  boundary: 'FRAME',
  frameTimeoutMs: 0,
};

export interface ServeOptions {
  remoteAddress?: string;
}

/**
 * The slice of http.ServerResponse a stream writes to
 */
export interface StreamResponse extends NodeJS.EventEmitter {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  write(chunk: string | Buffer): boolean;
  end(): unknown;
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
}

/**
 * Internal client connection
 */
interface ClientConnection extends StreamClient {
  controller: AbortController;
  serverClosing: boolean;
}

/**
 * Headers sent once at the start of every stream
 */
export function streamHeaders(boundary: string): Record<string, string> {
  return {
    'Content-Type': `multipart/x-mixed-replace; boundary=${boundary}`,
    'Age': '0',
    'Cache-Control': 'no-cache, private',
    'Pragma': 'no-cache',
    'Access-Control-Allow-Origin': '*',
  };
}

/**
 * Part header preceding each JPEG in the multipart body
 */
export function partHeader(boundary: string, length: number): string {
  return [`--${boundary}`, 'Content-Type: image/jpeg', `Content-Length: ${length}`, '', ''].join(
    '\r\n'
  );
}

/**
 * MJPEG Streamer - Streams frames to connected clients
 */
export class MJPEGStreamer extends EventEmitter<MJPEGStreamerEvents> {
  private config: MJPEGStreamerConfig;
  private clients: Map<string, ClientConnection> = new Map();
  private counter = new ConnectionCounter();
  private clientIdCounter: number = 0;

  constructor(config: Partial<MJPEGStreamerConfig> = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Stream frames from `feed` into `response` until the client leaves,
   * the feed stops, or the streamer is closed
   */
  async serve(
    response: StreamResponse,
    feed: FrameFeed,
    options: ServeOptions = {}
  ): Promise<StreamSessionResult> {
    const clientId = `client_${++this.clientIdCounter}_${Date.now()}`;
    const client: ClientConnection = {
      id: clientId,
      cameraIndex: feed.cameraIndex,
      connectedAt: new Date(),
      remoteAddress: options.remoteAddress,
      controller: new AbortController(),
      serverClosing: false,
    };
    this.clients.set(clientId, client);

    const active = this.counter.increment();
    logClientConnection(feed.cameraIndex, options.remoteAddress, 'connected', active);
    this.emit('clientConnected', {
      id: clientId,
      cameraIndex: client.cameraIndex,
      connectedAt: client.connectedAt,
      remoteAddress: client.remoteAddress,
    });

    const onClose = () =>
      client.controller.abort(new ClientDisconnectError(feed.cameraIndex, 'connection closed'));
    const onError = (err: Error) =>
      client.controller.abort(new ClientDisconnectError(feed.cameraIndex, err.message));
    response.on('close', onClose);
    response.on('error', onError);

    let framesSent = 0;
    let reason: StreamEndReason = 'client_disconnected';

    try {
      response.writeHead(200, streamHeaders(this.config.boundary));

      const { signal } = client.controller;
      while (!signal.aborted) {
        const frame = await feed.getFrame({ signal, timeoutMs: this.config.frameTimeoutMs });

        const flushed = [
          response.write(partHeader(this.config.boundary, frame.jpeg.length)),
          response.write(frame.jpeg),
          response.write('\r\n'),
        ].every(Boolean);
        framesSent++;

        if (!flushed) {
          await once(response, 'drain', { signal });
        }
      }
      reason = client.serverClosing ? 'server_closed' : 'client_disconnected';
    } catch (error) {
      reason = this.classify(client, error);
      if (reason === 'error') {
        logger.warn({ clientId, camera: feed.cameraIndex, error: errorMessage(error) }, 'Stream ended with error');
      } else if (reason === 'client_disconnected') {
        logger.debug({ clientId, cause: errorMessage(client.controller.signal.reason) }, 'Client went away');
      }
    } finally {
      response.off('close', onClose);
      response.off('error', onError);
      this.clients.delete(clientId);

      if (!response.writableEnded && !response.destroyed) {
        response.end();
      }

      const remaining = this.counter.decrement();
      logClientConnection(feed.cameraIndex, options.remoteAddress, 'disconnected', remaining);
    }

    const result: StreamSessionResult = {
      clientId,
      cameraIndex: feed.cameraIndex,
      framesSent,
      reason,
    };
    logger.debug({ ...result }, 'Stream session finished');
    this.emit('clientDisconnected', result);
    return result;
  }

  private classify(client: ClientConnection, error: unknown): StreamEndReason {
    if (client.serverClosing) return 'server_closed';
    if (client.controller.signal.aborted) return 'client_disconnected';
    if (error instanceof BroadcasterStoppedError) return 'broadcaster_stopped';
    if (error instanceof FrameTimeoutError) return 'frame_timeout';
    return 'error';
  }

  /**
   * Number of streams currently being served
   */
  getClientCount(): number {
    return this.counter.value;
  }

  /**
   * Highest concurrent stream count seen
   */
  getPeakClientCount(): number {
    return this.counter.peakValue;
  }

  /**
   * Get clients for a specific camera
   */
  getCameraClients(cameraIndex: number): StreamClient[] {
    return Array.from(this.clients.values())
      .filter((c) => c.cameraIndex === cameraIndex)
      .map(({ id, cameraIndex: camera, connectedAt, remoteAddress }) => ({
        id,
        cameraIndex: camera,
        connectedAt,
        remoteAddress,
      }));
  }

  /**
   * End every active stream
   */
  close(): void {
    for (const client of this.clients.values()) {
      client.serverClosing = true;
      client.controller.abort();
    }
  }
}
