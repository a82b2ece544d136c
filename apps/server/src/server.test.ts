/**
 * HTTP Server Tests
 * Route behavior through Fastify inject with in-memory camera feeds
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { BroadcasterStatus } from '@tankview/core';
import {
  BroadcasterStoppedError,
  DEFAULT_CAMERA_CONFIG,
  type CameraConfig,
  type EncodedFrame,
} from '@tankview/shared';
import { MJPEGStreamer, type FrameWaitOptions } from '@tankview/vision';
import { buildServer } from './server.js';
import type { CameraFeed } from './routes/index.js';

const encoded = (cameraIndex: number, sequence: number, jpeg: string): EncodedFrame => ({
  cameraIndex,
  sequence,
  jpeg: Buffer.from(jpeg, 'latin1'),
  width: 4,
  height: 4,
  publishedAt: new Date('2026-01-01T00:00:00.000Z'),
});

/**
 * Feed that hands out `jpegs` in order, then ends like a stopped broadcaster
 */
class FakeFeed implements CameraFeed {
  readonly camera: CameraConfig;
  available = true;
  current: EncodedFrame | undefined;
  private remaining: string[];

  constructor(index: number, description: string, jpegs: string[] = []) {
    this.camera = { ...DEFAULT_CAMERA_CONFIG, index, description };
    this.remaining = [...jpegs];
  }

  get cameraIndex(): number {
    return this.camera.index;
  }

  getFrame = vi.fn(async (_options?: FrameWaitOptions): Promise<EncodedFrame> => {
    const jpeg = this.remaining.shift();
    if (jpeg === undefined) throw new BroadcasterStoppedError(this.cameraIndex);
    return encoded(this.cameraIndex, 1, jpeg);
  });

  isAvailable(): boolean {
    return this.available;
  }

  latest(): EncodedFrame | undefined {
    return this.current;
  }

  getStatus(): BroadcasterStatus {
    return {
      index: this.cameraIndex,
      description: this.camera.description,
      state: this.available ? 'running' : 'failed',
      streamPath: `/stream${this.cameraIndex}.mjpg`,
      framesPublished: 0,
      readFailures: 0,
      encodeFailures: 0,
      lastFrameAt: null,
      settings: null,
      waitingClients: 0,
    };
  }
}

describe('TankView server', () => {
  let app: FastifyInstance;
  let front: FakeFeed;
  let side: FakeFeed;
  let streamer: MJPEGStreamer;

  beforeEach(async () => {
    front = new FakeFeed(0, 'Front <Tank>', ['AAAA', 'BB']);
    side = new FakeFeed(2, 'Side View');
    streamer = new MJPEGStreamer();
    app = await buildServer({
      feeds: new Map<string, CameraFeed>([
        ['/stream0.mjpg', front],
        ['/stream2.mjpg', side],
      ]),
      streamer,
      pageTitle: 'Test Tank',
      corsOrigin: '*',
    });
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /stream<N>.mjpg', () => {
    it('should stream frames as multipart JPEG parts', async () => {
      const response = await app.inject({ method: 'GET', url: '/stream0.mjpg' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('multipart/x-mixed-replace; boundary=FRAME');
      expect(response.headers['cache-control']).toBe('no-cache, private');
      expect(response.headers['pragma']).toBe('no-cache');
      expect(response.headers['age']).toBe('0');
      expect(response.rawPayload.toString('latin1')).toBe(
        '--FRAME\r\nContent-Type: image/jpeg\r\nContent-Length: 4\r\n\r\nAAAA\r\n' +
          '--FRAME\r\nContent-Type: image/jpeg\r\nContent-Length: 2\r\n\r\nBB\r\n'
      );
    });

    it('should release the client once the stream ends', async () => {
      await app.inject({ method: 'GET', url: '/stream0.mjpg' });

      expect(streamer.getClientCount()).toBe(0);
      expect(streamer.getPeakClientCount()).toBe(1);
    });

    it('should return 503 when the camera is not broadcasting', async () => {
      front.available = false;

      const response = await app.inject({ method: 'GET', url: '/stream0.mjpg' });

      expect(response.statusCode).toBe(503);
      expect(response.body).toBe('Camera 0 not available');
      expect(front.getFrame).not.toHaveBeenCalled();
    });

    it('should ignore the query string', async () => {
      const response = await app.inject({ method: 'GET', url: '/stream0.mjpg?t=123' });

      expect(response.statusCode).toBe(200);
    });
  });

  describe('GET /frame<N>.jpg', () => {
    it('should return the latest frame', async () => {
      side.current = encoded(2, 7, 'JPEGDATA');

      const response = await app.inject({ method: 'GET', url: '/frame2.jpg' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('image/jpeg');
      expect(response.headers['x-frame-sequence']).toBe('7');
      expect(response.rawPayload.toString('latin1')).toBe('JPEGDATA');
    });

    it('should return 503 before the first frame', async () => {
      const response = await app.inject({ method: 'GET', url: '/frame2.jpg' });

      expect(response.statusCode).toBe(503);
      expect(response.body).toBe('Camera 2 not available');
    });
  });

  describe('GET /', () => {
    it('should render a tile per broadcasting camera', async () => {
      const response = await app.inject({ method: 'GET', url: '/' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(response.body).toContain('<title>Test Tank</title>');
      expect(response.body).toContain('<h2 class="camera-title">Camera 0 - Front &lt;Tank&gt;</h2>');
      expect(response.body).toContain('<img src="/stream2.mjpg" class="camera-stream" alt="Camera 2 - Side View">');
      expect(response.body).toContain(
        'Direct stream URLs: <a href="/stream0.mjpg">Camera 0</a> | <a href="/stream2.mjpg">Camera 2</a>'
      );
    });

    it('should leave out cameras that are not broadcasting', async () => {
      side.available = false;

      const response = await app.inject({ method: 'GET', url: '/index.html' });

      expect(response.statusCode).toBe(200);
      expect(response.body).not.toContain('/stream2.mjpg');
      expect(response.body).toContain('Direct stream URLs: <a href="/stream0.mjpg">Camera 0</a></p>');
    });
  });

  describe('GET /health', () => {
    it('should report ok', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.status).toBe('ok');
      expect(typeof body.timestamp).toBe('string');
      expect(typeof body.uptime).toBe('number');
    });
  });

  describe('GET /status', () => {
    it('should list every camera with its state', async () => {
      side.available = false;

      const response = await app.inject({ method: 'GET', url: '/status' });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.status).toBe('ok');
      expect(body.cameras.map((c: { index: number; state: string }) => [c.index, c.state])).toEqual([
        [0, 'running'],
        [2, 'failed'],
      ]);
      expect(body.streams).toEqual({ active: 0, peak: 0 });
      expect(body.sensors).toBeUndefined();
    });

    it('should be degraded when no camera is running', async () => {
      front.available = false;
      side.available = false;

      const response = await app.inject({ method: 'GET', url: '/status' });

      expect(response.json().status).toBe('degraded');
    });
  });

  describe('sensors', () => {
    it('should include sensor readings and report failed reads', async () => {
      await app.close();
      app = await buildServer({
        feeds: new Map<string, CameraFeed>([['/stream0.mjpg', front]]),
        streamer,
        pageTitle: 'Test Tank',
        corsOrigin: '*',
        sensors: {
          waterTemperature: { name: 'ds18b20', read: vi.fn().mockResolvedValue(24.5) },
          waterLevel: { name: 'float-switch', read: vi.fn().mockResolvedValue(null) },
          ph: { name: 'ph-probe', read: vi.fn().mockRejectedValue(new Error('i2c timeout')) },
        },
      });

      const response = await app.inject({ method: 'GET', url: '/status' });

      expect(response.json().sensors).toEqual({
        waterTemperature: 24.5,
        waterLevel: null,
        ph: { error: 'i2c timeout' },
      });
    });
  });

  describe('unknown paths', () => {
    it('should return 404', async () => {
      const response = await app.inject({ method: 'GET', url: '/stream9.mjpg' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: 'Not found', path: '/stream9.mjpg' });
    });
  });

  describe('CORS', () => {
    it('should allow any origin when configured with *', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { origin: 'http://viewer.test' },
      });

      expect(response.headers['access-control-allow-origin']).toBe('http://viewer.test');
    });
  });
});
