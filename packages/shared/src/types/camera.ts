/**
 * Camera and frame types shared by the capture, vision and core packages
 */

export const ROTATIONS = [0, 90, 180, 270] as const;

/** Clockwise rotation in degrees, fixed per camera */
export type Rotation = (typeof ROTATIONS)[number];

/** Red, green, blue channel values 0-255 */
export type RGBColor = readonly [number, number, number];

/**
 * Periodic label overlay parameters
 */
export interface OverlayConfig {
  enabled: boolean;
  /** Label text; rendered as "Camera <index>: <text>" */
  text: string;
  /** Length of one show/hide cycle */
  cycleMinutes: number;
  /** Time the label stays visible at the start of each cycle */
  durationSeconds: number;
  /** Relative text size, 1.0 = 30px */
  fontScale: number;
  /** Opacity of the black box behind the text (0-1) */
  backgroundOpacity: number;
  /** Opacity of the text itself (0-1) */
  textOpacity: number;
  textColor: RGBColor;
}

/**
 * Static per-camera configuration. Immutable once built by the registry.
 */
export interface CameraConfig {
  /** Camera identity; also the device index (/dev/video<index>) */
  index: number;
  description: string;
  /** Explicit capture device, overriding the one derived from the index */
  device?: string;
  width: number;
  height: number;
  /** Requested hardware capture rate */
  frameRate: number;
  /** Maximum rate frames are delivered to clients */
  maxStreamFps: number;
  rotation: Rotation;
  /** JPEG quality 1-100 */
  jpegQuality: number;
  overlay: OverlayConfig;
}

/**
 * Raw captured frame, tightly packed RGBA pixels
 */
export interface Frame {
  data: Buffer;
  width: number;
  height: number;
  capturedAt: Date;
}

/**
 * Encoded frame as held in a broadcaster's slot
 */
export interface EncodedFrame {
  cameraIndex: number;
  /** Monotonic per-camera publish counter, starting at 1 */
  sequence: number;
  jpeg: Buffer;
  width: number;
  height: number;
  publishedAt: Date;
}

/**
 * Settings a capture device actually accepted after open
 */
export interface CaptureSettings {
  backend: string;
  width: number;
  height: number;
  /** Null when the device does not report its rate */
  fps: number | null;
}

export const RGBA_CHANNELS = 4;
