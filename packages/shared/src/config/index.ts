/**
 * Configuration management for TankView
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'path';

// Load environment variables from the working directory
dotenvConfig({ path: resolve(process.cwd(), '.env') });

export * from './cameras.js';

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Server
  server: z.object({
    port: z.coerce.number().int().min(0).max(65535).default(8000),
    host: z.string().default('0.0.0.0'),
    corsOrigin: z.string().default('*'),
    pageTitle: z.string().default('Aquaponics - Multi-Camera Monitor'),
  }),

  // Capture
  capture: z.object({
    /** 'ffmpeg' reads real devices, 'synthetic' renders a test pattern */
    mode: z.enum(['ffmpeg', 'synthetic']).default('ffmpeg'),
    ffmpegPath: z.string().optional(),
    camerasFile: z.string().optional(),
    warmupFrames: z.coerce.number().int().min(0).default(5),
    warmupDelayMs: z.coerce.number().int().min(0).default(100),
    probeAttempts: z.coerce.number().int().min(1).default(3),
    readTimeoutMs: z.coerce.number().int().min(1).default(2000),
    readRetryDelayMs: z.coerce.number().int().min(0).default(10),
  }),

  // Streaming
  stream: z.object({
    /** Global ceiling applied on top of each camera's maxStreamFps */
    maxFps: z.coerce.number().positive().default(15),
    jpegQuality: z.coerce.number().int().min(1).max(100).default(85),
    /** 0 keeps stream clients waiting indefinitely for the next frame */
    frameTimeoutMs: z.coerce.number().int().min(0).default(0),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    server: {
      port: process.env.PORT,
      host: process.env.HOST,
      corsOrigin: process.env.CORS_ORIGIN,
      pageTitle: process.env.PAGE_TITLE,
    },

    capture: {
      mode: process.env.CAPTURE_MODE,
      ffmpegPath: process.env.FFMPEG_PATH,
      camerasFile: process.env.CAMERAS_FILE,
      warmupFrames: process.env.WARMUP_FRAMES,
      warmupDelayMs: process.env.WARMUP_DELAY_MS,
      probeAttempts: process.env.PROBE_ATTEMPTS,
      readTimeoutMs: process.env.READ_TIMEOUT_MS,
      readRetryDelayMs: process.env.READ_RETRY_DELAY_MS,
    },

    stream: {
      maxFps: process.env.STREAM_MAX_FPS,
      jpegQuality: process.env.JPEG_QUALITY,
      frameTimeoutMs: process.env.FRAME_TIMEOUT_MS,
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      };
    }
    throw error;
  }
}
