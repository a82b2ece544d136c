/**
 * Frame Encoder - raw RGBA frames to JPEG
 */

import sharp from 'sharp';
import { EncodeFailureError, RGBA_CHANNELS, errorMessage, type Frame } from '@tankview/shared';

export interface FrameEncoderConfig {
  cameraIndex: number;
  /** JPEG quality (1-100) */
  quality: number;
}

export class FrameEncoder {
  private config: FrameEncoderConfig;

  constructor(config: FrameEncoderConfig) {
    this.config = config;
  }

  /**
   * Compress a frame. Failures surface as EncodeFailureError.
   */
  async encode(frame: Frame): Promise<Buffer> {
    const expected = frame.width * frame.height * RGBA_CHANNELS;
    if (frame.width <= 0 || frame.height <= 0 || frame.data.length !== expected) {
      throw new EncodeFailureError(
        this.config.cameraIndex,
        `frame is ${frame.data.length} bytes, expected ${expected} for ${frame.width}x${frame.height}`
      );
    }

    try {
      return await sharp(frame.data, {
        raw: { width: frame.width, height: frame.height, channels: RGBA_CHANNELS },
      })
        .removeAlpha()
        .jpeg({ quality: this.config.quality })
        .toBuffer();
    } catch (error) {
      throw new EncodeFailureError(this.config.cameraIndex, errorMessage(error));
    }
  }

  get quality(): number {
    return this.config.quality;
  }
}
