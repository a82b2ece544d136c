/**
 * SyntheticCaptureBackend Tests
 */
import { describe, it, expect, afterEach } from 'vitest';
import { DeviceClosedError } from '@tankview/shared';
import { SyntheticCaptureBackend, quadrantPattern } from './synthetic-backend.js';
import type { CaptureDevice } from '../types.js';

const pixelAt = (data: Buffer, width: number, x: number, y: number): number[] => {
  const offset = (y * width + x) * 4;
  return Array.from(data.subarray(offset, offset + 4));
};

describe('quadrantPattern()', () => {
  it('should paint red, green, blue and white quadrants', () => {
    const data = quadrantPattern(4, 4);

    expect(data.length).toBe(64);
    expect(pixelAt(data, 4, 0, 0)).toEqual([255, 0, 0, 255]);
    expect(pixelAt(data, 4, 3, 0)).toEqual([0, 255, 0, 255]);
    expect(pixelAt(data, 4, 0, 3)).toEqual([0, 0, 255, 255]);
    expect(pixelAt(data, 4, 3, 3)).toEqual([255, 255, 255, 255]);
  });
});

describe('SyntheticCaptureBackend', () => {
  let device: CaptureDevice | undefined;

  afterEach(async () => {
    await device?.close();
    device = undefined;
  });

  it('should accept the requested settings', async () => {
    const backend = new SyntheticCaptureBackend();
    device = await backend.open({ cameraIndex: 1, width: 16, height: 8, frameRate: 50 });

    expect(backend.isSupported()).toBe(true);
    expect(device.settings).toEqual({ backend: 'synthetic', width: 16, height: 8, fps: 50 });
  });

  it('should produce frames from the pattern', async () => {
    const backend = new SyntheticCaptureBackend({
      pattern: (width, height, n) => Buffer.alloc(width * height * 4, n % 256),
    });
    device = await backend.open({ cameraIndex: 0, width: 2, height: 2, frameRate: 100 });

    const first = await device.read({ timeoutMs: 1000 });
    const second = await device.read({ timeoutMs: 1000 });

    expect(first.width).toBe(2);
    expect(first.height).toBe(2);
    expect(second.data[0]).toBeGreaterThan(first.data[0] ?? 0);
  });

  it('should reject reads after close', async () => {
    const backend = new SyntheticCaptureBackend();
    const opened = await backend.open({ cameraIndex: 3, width: 2, height: 2, frameRate: 100 });

    await opened.close();

    await expect(opened.read()).rejects.toBeInstanceOf(DeviceClosedError);
  });
});
