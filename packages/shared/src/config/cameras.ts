/**
 * Camera registry configuration: schema, built-in defaults and file loading
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { ROTATIONS, type CameraConfig, type OverlayConfig, type Rotation } from '../types/camera.js';

const channel = z.number().int().min(0).max(255);
const opacity = z.number().min(0).max(1);

const rotationSchema = z
  .number()
  .refine((value): value is Rotation => (ROTATIONS as readonly number[]).includes(value), {
    message: `rotation must be one of ${ROTATIONS.join(', ')}`,
  });

const overlaySchema = z.object({
  enabled: z.boolean(),
  text: z.string(),
  cycleMinutes: z.number().min(0),
  durationSeconds: z.number().min(0),
  fontScale: z.number().positive(),
  backgroundOpacity: opacity,
  textOpacity: opacity,
  textColor: z.tuple([channel, channel, channel]),
});

/**
 * One entry of a cameras file. Everything but the index falls back to
 * DEFAULT_CAMERA_CONFIG.
 */
export const cameraEntrySchema = z.object({
  index: z.number().int().min(0),
  description: z.string().optional(),
  device: z.string().min(1).optional(),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  frameRate: z.number().positive().optional(),
  maxStreamFps: z.number().positive().optional(),
  rotation: rotationSchema.optional(),
  jpegQuality: z.number().int().min(1).max(100).optional(),
  overlay: overlaySchema.partial().optional(),
});

export type CameraEntry = z.infer<typeof cameraEntrySchema>;

export const camerasFileSchema = z.object({
  cameras: z.array(cameraEntrySchema).min(1, 'at least one camera is required'),
});

/**
 * Settings for a camera that has no specific entry
 */
export const DEFAULT_CAMERA_CONFIG: Omit<CameraConfig, 'index'> = {
  description: 'Additional Camera',
  width: 1280,
  height: 720,
  frameRate: 10,
  maxStreamFps: 10,
  rotation: 0,
  jpegQuality: 85,
  overlay: {
    enabled: false,
    text: 'Camera Feed',
    cycleMinutes: 15,
    durationSeconds: 60,
    fontScale: 0.7,
    backgroundOpacity: 0.6,
    textOpacity: 0.9,
    textColor: [0, 255, 255],
  },
};

/**
 * Cameras served when no cameras file is configured
 */
export const DEFAULT_CAMERA_ENTRIES: CameraEntry[] = [
  {
    index: 0,
    description: 'Main Camera (Fish Tank)',
    width: 1280,
    height: 720,
    frameRate: 10,
    maxStreamFps: 10,
    overlay: {
      enabled: true,
      text: 'Aquaponics Club meets Thursday at 4 PM',
      cycleMinutes: 10,
      durationSeconds: 30,
      fontScale: 0.8,
      backgroundOpacity: 0.7,
      textOpacity: 0.9,
      textColor: [204, 85, 0],
    },
  },
  {
    index: 2,
    description: 'Secondary Camera (Plant Beds)',
    width: 640,
    height: 480,
    frameRate: 5,
    maxStreamFps: 5,
    overlay: {
      enabled: false,
      textColor: [255, 255, 255],
    },
  },
];

/**
 * Merge an entry over the defaults and check cross-field constraints
 */
export function resolveCameraEntry(entry: CameraEntry): CameraConfig {
  const parsed = cameraEntrySchema.parse(entry);
  const overlay: OverlayConfig = { ...DEFAULT_CAMERA_CONFIG.overlay, ...parsed.overlay };

  if (overlay.enabled) {
    if (overlay.cycleMinutes <= 0) {
      throw new ConfigurationError(
        `Camera ${parsed.index}: overlay.cycleMinutes must be positive when the overlay is enabled`,
        { camera: parsed.index }
      );
    }
    if (overlay.durationSeconds > overlay.cycleMinutes * 60) {
      throw new ConfigurationError(
        `Camera ${parsed.index}: overlay.durationSeconds (${overlay.durationSeconds}) exceeds the ${overlay.cycleMinutes} minute cycle`,
        { camera: parsed.index }
      );
    }
  }

  return {
    ...DEFAULT_CAMERA_CONFIG,
    ...parsed,
    overlay,
  };
}

/**
 * Parse the contents of a cameras file
 */
export function parseCamerasFile(raw: unknown): CameraEntry[] {
  const result = camerasFileSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid cameras file: ${errors.join('; ')}`);
  }
  return result.data.cameras;
}

/**
 * Read and validate a cameras JSON file
 */
export function loadCamerasFile(path: string): CameraEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read cameras file ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseCamerasFile(raw);
}
