/**
 * Fixed per-camera frame rotation
 */

import sharp from 'sharp';
import { RGBA_CHANNELS, type Frame, type Rotation } from '@tankview/shared';

/**
 * Rotate a raw RGBA frame clockwise by a multiple of 90 degrees
 */
export async function rotateFrame(frame: Frame, rotation: Rotation): Promise<Frame> {
  if (rotation === 0) {
    return frame;
  }

  const { data, info } = await sharp(frame.data, {
    raw: { width: frame.width, height: frame.height, channels: RGBA_CHANNELS },
  })
    .rotate(rotation)
    .raw()
    .toBuffer({ resolveWithObject: true });

  return {
    data,
    width: info.width,
    height: info.height,
    capturedAt: frame.capturedAt,
  };
}
