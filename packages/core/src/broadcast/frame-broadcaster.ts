/**
 * Frame Broadcaster
 *
 * One producer loop per camera: read, rotate, overlay, encode, publish.
 * Consumers wait on a latest-wins slot; a slow consumer skips frames and
 * never holds up the producer.
 */

import { EventEmitter } from 'eventemitter3';
import { setTimeout as delay } from 'node:timers/promises';
import type { FrameSource } from '@tankview/capture';
import {
  BroadcasterStoppedError,
  DeviceClosedError,
  EncodeFailureError,
  FrameTimeoutError,
  createChildLogger,
  errorMessage,
  type CameraConfig,
  type EncodedFrame,
  type Frame,
  type Logger,
} from '@tankview/shared';
import {
  FrameEncoder,
  FrameSlot,
  OverlayCompositor,
  rotateFrame,
  type FrameFeed,
  type FrameWaitOptions,
} from '@tankview/vision';
import { streamPath } from '../registry/camera-registry.js';
import { assertTransition } from './transitions.js';
import {
  BROADCASTER_STATES,
  type BroadcasterState,
  type BroadcasterStatus,
  type FrameBroadcasterEvents,
  type FrameSourceOpener,
} from './types.js';

export interface FrameBroadcasterOptions {
  camera: CameraConfig;
  openSource: FrameSourceOpener;
  /** Pause after a failed read before trying again */
  readRetryDelayMs: number;
  /** Milliseconds since epoch; drives rate limiting and the overlay cycle */
  clock?: () => number;
}

export class FrameBroadcaster extends EventEmitter<FrameBroadcasterEvents> implements FrameFeed {
  readonly camera: CameraConfig;
  private openSource: FrameSourceOpener;
  private readRetryDelayMs: number;
  private clock: () => number;
  private slot: FrameSlot<EncodedFrame>;
  private overlay: OverlayCompositor;
  private encoder: FrameEncoder;
  private state: BroadcasterState = BROADCASTER_STATES.IDLE;
  private source: FrameSource | null = null;
  private controller = new AbortController();
  private startPromise: Promise<void> | null = null;
  private stopPromise: Promise<void> | null = null;
  private loop: Promise<void> | null = null;
  private sequence = 0;
  private readFailures = 0;
  private encodeFailures = 0;
  private lastFrameAt: Date | null = null;
  private logger: Logger;

  constructor(options: FrameBroadcasterOptions) {
    super();
    this.camera = options.camera;
    this.openSource = options.openSource;
    this.readRetryDelayMs = options.readRetryDelayMs;
    this.clock = options.clock ?? Date.now;
    this.logger = createChildLogger({ component: 'FrameBroadcaster', camera: options.camera.index });

    const index = options.camera.index;
    this.slot = new FrameSlot<EncodedFrame>({
      onTimeout: (timeoutMs) => new FrameTimeoutError(index, timeoutMs),
    });
    this.overlay = new OverlayCompositor({
      cameraIndex: index,
      overlay: options.camera.overlay,
      cycleStart: this.clock(),
    });
    this.overlay.on('shown', (at) => this.emit('overlayShown', at));
    this.overlay.on('hidden', (at) => this.emit('overlayHidden', at));
    this.encoder = new FrameEncoder({ cameraIndex: index, quality: options.camera.jpegQuality });
  }

  get cameraIndex(): number {
    return this.camera.index;
  }

  /**
   * Open the camera and begin publishing. Allowed once.
   */
  async start(): Promise<void> {
    this.transition(BROADCASTER_STATES.STARTING);
    this.startPromise = this.open();
    return this.startPromise;
  }

  private async open(): Promise<void> {
    const { index, device, width, height, frameRate } = this.camera;

    let source: FrameSource;
    try {
      source = await this.openSource({ cameraIndex: index, device, width, height, frameRate });
    } catch (error) {
      if (this.state === BROADCASTER_STATES.STARTING) {
        this.transition(BROADCASTER_STATES.FAILED);
      }
      this.logger.error({ error: errorMessage(error) }, `Could not open camera ${index}`);
      throw error;
    }

    this.source = source;
    if (this.state !== BROADCASTER_STATES.STARTING) {
      // stop() arrived while opening; it releases the source
      throw new BroadcasterStoppedError(index);
    }

    this.transition(BROADCASTER_STATES.RUNNING);
    this.loop = this.run(source, this.controller.signal);
    this.logger.info(
      { settings: source.settings, maxStreamFps: this.camera.maxStreamFps, rotation: this.camera.rotation },
      `Camera ${index} broadcasting`
    );
    this.emit('started', source.settings);
  }

  /**
   * Producer loop; exits on stop or when the device closes
   */
  private async run(source: FrameSource, signal: AbortSignal): Promise<void> {
    const minIntervalMs = 1000 / this.camera.maxStreamFps;

    try {
      while (!signal.aborted) {
        let frame: Frame;
        try {
          frame = await source.read(signal);
        } catch (error) {
          if (signal.aborted) break;
          if (error instanceof DeviceClosedError) {
            this.logger.error({ error: error.message }, `Camera ${this.camera.index} stopped producing frames`);
            this.markFailed();
            break;
          }
          this.readFailures++;
          this.logger.warn({ error: errorMessage(error), readFailures: this.readFailures }, 'Frame read failed');
          this.emit('readFailure', error instanceof Error ? error : new Error(errorMessage(error)));
          await delay(this.readRetryDelayMs, undefined, { signal });
          continue;
        }

        const startedAt = this.clock();
        await this.process(frame, startedAt);

        // Hold the loop until the next delivery slot; frames captured
        // meanwhile are replaced inside the device
        const waitMs = startedAt + minIntervalMs - this.clock();
        if (waitMs > 0) {
          await delay(waitMs, undefined, { signal });
        }
      }
    } catch (error) {
      if (!signal.aborted) {
        this.logger.error({ error: errorMessage(error) }, 'Capture loop crashed');
        this.markFailed();
      }
    }
  }

  private async process(frame: Frame, now: number): Promise<void> {
    try {
      const rotated = await rotateFrame(frame, this.camera.rotation);
      const composited = this.overlay.apply(rotated, now);
      const jpeg = await this.encoder.encode(composited);
      this.publish(jpeg, composited.width, composited.height);
    } catch (error) {
      const failure =
        error instanceof EncodeFailureError
          ? error
          : new EncodeFailureError(this.camera.index, errorMessage(error));
      this.encodeFailures++;
      this.logger.warn({ error: failure.message, encodeFailures: this.encodeFailures }, 'Dropped frame');
      this.emit('encodeFailure', failure);
    }
  }

  private publish(jpeg: Buffer, width: number, height: number): void {
    const encoded: EncodedFrame = {
      cameraIndex: this.camera.index,
      sequence: ++this.sequence,
      jpeg,
      width,
      height,
      publishedAt: new Date(this.clock()),
    };
    this.lastFrameAt = encoded.publishedAt;
    this.slot.publish(encoded);
    this.emit('frame', encoded);
  }

  /**
   * Wait for the next frame published after this call
   */
  getFrame(options: FrameWaitOptions = {}): Promise<EncodedFrame> {
    return this.slot.next(options);
  }

  /**
   * Current frame without waiting
   */
  latest(): EncodedFrame | undefined {
    return this.slot.latest();
  }

  /**
   * Stop the loop, release the camera and wake every waiter with
   * BroadcasterStoppedError. Terminal; repeated calls share one stop.
   */
  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown();
    }
    return this.stopPromise;
  }

  private async shutdown(): Promise<void> {
    this.transition(BROADCASTER_STATES.STOPPING);

    if (this.startPromise) {
      await Promise.allSettled([this.startPromise]);
    }

    this.controller.abort();
    if (this.loop) {
      await this.loop;
    }
    if (this.source) {
      await this.source.close();
    }

    this.slot.close(new BroadcasterStoppedError(this.camera.index));
    this.transition(BROADCASTER_STATES.STOPPED);
    this.logger.info({ framesPublished: this.sequence }, `Camera ${this.camera.index} released`);
    this.emit('stopped');
  }

  /**
   * Whether new clients can be served
   */
  isAvailable(): boolean {
    return this.state === BROADCASTER_STATES.RUNNING;
  }

  getState(): BroadcasterState {
    return this.state;
  }

  getStatus(): BroadcasterStatus {
    return {
      index: this.camera.index,
      description: this.camera.description,
      state: this.state,
      streamPath: streamPath(this.camera.index),
      framesPublished: this.sequence,
      readFailures: this.readFailures,
      encodeFailures: this.encodeFailures,
      lastFrameAt: this.lastFrameAt?.toISOString() ?? null,
      settings: this.source?.settings ?? null,
      waitingClients: this.slot.waiterCount(),
    };
  }

  /**
   * Camera died mid-stream. Waiters are left waiting; a frame timeout or
   * stop() releases them.
   */
  private markFailed(): void {
    if (this.state === BROADCASTER_STATES.RUNNING) {
      this.transition(BROADCASTER_STATES.FAILED);
    }
  }

  private transition(to: BroadcasterState): void {
    this.state = assertTransition(this.camera.index, this.state, to);
  }
}
