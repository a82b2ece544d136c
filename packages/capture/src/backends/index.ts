/**
 * Capture backend selection
 */

import { createChildLogger } from '@tankview/shared';
import { CAPTURE_MODES, type CaptureBackend, type CaptureMode } from '../types.js';
import { FfmpegCaptureBackend, type FfmpegInputKind } from './ffmpeg-backend.js';
import { SyntheticCaptureBackend } from './synthetic-backend.js';

const logger = createChildLogger({ component: 'CaptureBackends' });

export interface CaptureBackendOptions {
  mode: CaptureMode;
  ffmpegPath?: string;
  platform?: NodeJS.Platform;
}

/**
 * Capture APIs to try on a platform, most specific first
 */
export function platformInputKinds(platform: NodeJS.Platform): FfmpegInputKind[] {
  switch (platform) {
    case 'linux':
      return ['v4l2', 'default'];
    case 'darwin':
      return ['avfoundation', 'default'];
    case 'win32':
      return ['dshow', 'default'];
    default:
      return ['default'];
  }
}

/**
 * Ordered backend candidates for the configured capture mode
 */
export function createCaptureBackends(options: CaptureBackendOptions): CaptureBackend[] {
  if (options.mode === CAPTURE_MODES.SYNTHETIC) {
    logger.info('Using synthetic capture backend');
    return [new SyntheticCaptureBackend()];
  }

  const platform = options.platform ?? process.platform;
  const kinds = platformInputKinds(platform);
  logger.info({ platform, backends: kinds }, 'Using ffmpeg capture backends');

  return kinds.map(
    (kind) => new FfmpegCaptureBackend({ kind, platform, ffmpegPath: options.ffmpegPath })
  );
}

export {
  FfmpegCaptureBackend,
  FfmpegCaptureDevice,
  describeInput,
  parseCodecData,
  type FfmpegBackendConfig,
  type FfmpegInput,
  type FfmpegInputKind,
} from './ffmpeg-backend.js';
export {
  SyntheticCaptureBackend,
  SyntheticCaptureDevice,
  quadrantPattern,
  type SyntheticBackendConfig,
  type SyntheticPattern,
} from './synthetic-backend.js';
export { SlotCaptureDevice } from './slot-device.js';
