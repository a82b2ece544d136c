/**
 * Overlay Compositor - draws the periodic camera label onto frames
 */

import { EventEmitter } from 'eventemitter3';
import { createCanvas, type SKRSContext2D } from '@napi-rs/canvas';
import { createChildLogger, type Frame, type Logger, type OverlayConfig } from '@tankview/shared';
import type { OverlayEdge, OverlayState } from '../types.js';

/** Label offset from the left and bottom edges */
const LABEL_MARGIN = 20;
/** Padding between the text and its background box */
const LABEL_PADDING = 5;
/** Font size in pixels at fontScale 1.0 */
const BASE_FONT_PX = 30;

/**
 * Events emitted on visibility edges
 */
export interface OverlayCompositorEvents {
  shown: (at: Date) => void;
  hidden: (at: Date) => void;
}

export interface OverlayCompositorOptions {
  cameraIndex: number;
  overlay: OverlayConfig;
  /** Start of the first cycle (ms since epoch), defaults to construction time */
  cycleStart?: number;
}

/**
 * Result of advancing the cycle timer for one frame
 */
export interface OverlayTick {
  visible: boolean;
  edge: OverlayEdge | null;
  elapsedMs: number;
}

/**
 * Time-gated label compositor. State is owned by the producer loop.
 */
export class OverlayCompositor extends EventEmitter<OverlayCompositorEvents> {
  private readonly cameraIndex: number;
  private readonly overlay: OverlayConfig;
  private readonly cycleMs: number;
  private readonly durationMs: number;
  private readonly label: string;
  private state: OverlayState;
  private logger: Logger;

  constructor(options: OverlayCompositorOptions) {
    super();
    this.cameraIndex = options.cameraIndex;
    this.overlay = options.overlay;
    this.cycleMs = options.overlay.cycleMinutes * 60_000;
    this.durationMs = Math.min(options.overlay.durationSeconds * 1000, this.cycleMs);
    this.label = `Camera ${options.cameraIndex}: ${options.overlay.text}`;
    this.state = {
      cycleStart: options.cycleStart ?? Date.now(),
      shown: false,
    };
    this.logger = createChildLogger({ component: 'OverlayCompositor', camera: options.cameraIndex });
  }

  /**
   * Whether the label is visible at `now`, without touching state
   */
  isVisibleAt(now: number): boolean {
    if (!this.overlay.enabled || this.cycleMs <= 0) return false;
    return this.elapsedInCycle(now) < this.durationMs;
  }

  /**
   * Advance the cycle timer and report visibility edges
   */
  tick(now: number): OverlayTick {
    if (!this.overlay.enabled || this.cycleMs <= 0) {
      return { visible: false, edge: null, elapsedMs: 0 };
    }

    // Reset the cycle start once a full cycle has elapsed
    if (now - this.state.cycleStart >= this.cycleMs) {
      const completed = Math.floor((now - this.state.cycleStart) / this.cycleMs);
      this.state.cycleStart += completed * this.cycleMs;
    }

    const elapsedMs = this.elapsedInCycle(now);
    const visible = elapsedMs < this.durationMs;
    let edge: OverlayEdge | null = null;

    if (visible && !this.state.shown) {
      edge = 'shown';
      this.state.shown = true;
      this.logger.info(
        { label: this.overlay.text, durationSeconds: this.overlay.durationSeconds },
        `Label displayed for ${this.overlay.durationSeconds}s`
      );
      this.emit('shown', new Date(now));
    } else if (!visible && this.state.shown) {
      edge = 'hidden';
      this.state.shown = false;
      this.logger.info(
        { label: this.overlay.text, cycleMinutes: this.overlay.cycleMinutes },
        `Label hidden - next display in ${this.overlay.cycleMinutes} minutes`
      );
      this.emit('hidden', new Date(now));
    }

    return { visible, edge, elapsedMs };
  }

  /**
   * Composite the label onto a frame if the cycle says so.
   * Returns the input frame untouched while the label is hidden.
   */
  apply(frame: Frame, now: number = Date.now()): Frame {
    const { visible } = this.tick(now);
    if (!visible) {
      return frame;
    }
    return this.render(frame);
  }

  /**
   * Draw the label unconditionally
   */
  render(frame: Frame): Frame {
    const canvas = createCanvas(frame.width, frame.height);
    const ctx = canvas.getContext('2d');

    const image = ctx.createImageData(frame.width, frame.height);
    image.data.set(frame.data);
    ctx.putImageData(image, 0, 0);

    this.drawLabel(ctx, frame.height);

    const out = ctx.getImageData(0, 0, frame.width, frame.height);
    return {
      data: Buffer.from(out.data.buffer, out.data.byteOffset, out.data.byteLength),
      width: frame.width,
      height: frame.height,
      capturedAt: frame.capturedAt,
    };
  }

  /**
   * Background box then text, each blended at its own opacity
   */
  private drawLabel(ctx: SKRSContext2D, frameHeight: number): void {
    const fontPx = Math.max(8, Math.round(BASE_FONT_PX * this.overlay.fontScale));
    ctx.font = `bold ${fontPx}px sans-serif`;
    ctx.textAlign = 'left';
    ctx.textBaseline = 'alphabetic';

    const metrics = ctx.measureText(this.label);
    const ascent = metrics.actualBoundingBoxAscent || fontPx * 0.8;
    const descent = metrics.actualBoundingBoxDescent || fontPx * 0.2;

    const x = LABEL_MARGIN;
    const y = frameHeight - LABEL_MARGIN;

    ctx.globalAlpha = this.overlay.backgroundOpacity;
    ctx.fillStyle = '#000000';
    ctx.fillRect(
      x - LABEL_PADDING,
      y - ascent - LABEL_PADDING,
      metrics.width + LABEL_PADDING * 2,
      ascent + descent + LABEL_PADDING * 2
    );

    const [r, g, b] = this.overlay.textColor;
    ctx.globalAlpha = this.overlay.textOpacity;
    ctx.fillStyle = `rgb(${r}, ${g}, ${b})`;
    ctx.fillText(this.label, x, y);

    ctx.globalAlpha = 1;
  }

  /**
   * Snapshot of the cycle timer
   */
  getState(): OverlayState {
    return { ...this.state };
  }

  getLabel(): string {
    return this.label;
  }

  getCameraIndex(): number {
    return this.cameraIndex;
  }

  private elapsedInCycle(now: number): number {
    const elapsed = (now - this.state.cycleStart) % this.cycleMs;
    return elapsed < 0 ? elapsed + this.cycleMs : elapsed;
  }
}
