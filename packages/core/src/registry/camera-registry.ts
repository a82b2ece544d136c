/**
 * Camera Registry
 * Static map of camera index to its capture and delivery settings
 */

import {
  ConfigurationError,
  DEFAULT_CAMERA_ENTRIES,
  createChildLogger,
  loadCamerasFile,
  resolveCameraEntry,
  type CameraConfig,
  type CameraEntry,
  type Config,
} from '@tankview/shared';

const logger = createChildLogger({ component: 'CameraRegistry' });

export interface CameraRegistryDefaults {
  /** Ceiling on every camera's delivery rate */
  maxStreamFps: number;
  /** Quality for cameras that do not set their own */
  jpegQuality: number;
}

const DEFAULT_DEFAULTS: CameraRegistryDefaults = {
  maxStreamFps: 15,
  jpegQuality: 85,
};

export function streamPath(index: number): string {
  return `/stream${index}.mjpg`;
}

export function snapshotPath(index: number): string {
  return `/frame${index}.jpg`;
}

function freezeCamera(camera: CameraConfig): CameraConfig {
  Object.freeze(camera.overlay.textColor);
  Object.freeze(camera.overlay);
  return Object.freeze(camera);
}

export class CameraRegistry {
  private cameras: Map<number, CameraConfig> = new Map();

  constructor(entries: CameraEntry[], defaults: Partial<CameraRegistryDefaults> = {}) {
    const limits = { ...DEFAULT_DEFAULTS, ...defaults };

    for (const entry of entries) {
      if (this.cameras.has(entry.index)) {
        throw new ConfigurationError(`Camera ${entry.index} is configured more than once`, {
          camera: entry.index,
        });
      }

      const resolved = resolveCameraEntry(entry);
      const camera = freezeCamera({
        ...resolved,
        maxStreamFps: Math.min(resolved.maxStreamFps, limits.maxStreamFps),
        jpegQuality: entry.jpegQuality ?? limits.jpegQuality,
      });
      this.cameras.set(camera.index, camera);
    }
  }

  /**
   * Build from the cameras file if one is configured, else the built-in set
   */
  static fromConfig(config: Config): CameraRegistry {
    const { camerasFile } = config.capture;
    const entries = camerasFile ? loadCamerasFile(camerasFile) : DEFAULT_CAMERA_ENTRIES;

    const registry = new CameraRegistry(entries, {
      maxStreamFps: config.stream.maxFps,
      jpegQuality: config.stream.jpegQuality,
    });
    logger.info(
      { source: camerasFile ?? 'built-in', cameras: registry.list().map((c) => c.index) },
      `Loaded ${registry.size} camera configuration(s)`
    );
    return registry;
  }

  get(index: number): CameraConfig | undefined {
    return this.cameras.get(index);
  }

  has(index: number): boolean {
    return this.cameras.has(index);
  }

  /**
   * All cameras in index order
   */
  list(): CameraConfig[] {
    return Array.from(this.cameras.values()).sort((a, b) => a.index - b.index);
  }

  get size(): number {
    return this.cameras.size;
  }
}
