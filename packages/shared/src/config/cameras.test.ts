import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '../errors/index.js';
import {
  DEFAULT_CAMERA_CONFIG,
  DEFAULT_CAMERA_ENTRIES,
  loadCamerasFile,
  parseCamerasFile,
  resolveCameraEntry,
} from './cameras.js';

describe('resolveCameraEntry', () => {
  it('should fill an index-only entry from the defaults', () => {
    const camera = resolveCameraEntry({ index: 4 });

    expect(camera).toEqual({ ...DEFAULT_CAMERA_CONFIG, index: 4 });
    expect(camera.description).toBe('Additional Camera');
  });

  it('should merge a partial overlay over the default overlay', () => {
    const camera = resolveCameraEntry({ index: 1, overlay: { enabled: true, text: 'Feeding at noon' } });

    expect(camera.overlay).toEqual({
      ...DEFAULT_CAMERA_CONFIG.overlay,
      enabled: true,
      text: 'Feeding at noon',
    });
  });

  it('should reject a rotation that is not a right angle', () => {
    expect(() => parseCamerasFile({ cameras: [{ index: 0, rotation: 45 }] })).toThrow(
      /cameras\.0\.rotation: rotation must be one of 0, 90, 180, 270/
    );
  });

  it('should reject an overlay longer than its cycle', () => {
    expect(() =>
      resolveCameraEntry({ index: 3, overlay: { enabled: true, cycleMinutes: 1, durationSeconds: 90 } })
    ).toThrow(ConfigurationError);
  });

  it('should allow any timing on a disabled overlay', () => {
    const camera = resolveCameraEntry({ index: 3, overlay: { enabled: false, cycleMinutes: 0 } });

    expect(camera.overlay.cycleMinutes).toBe(0);
  });

  it('should resolve the built-in entries', () => {
    const cameras = DEFAULT_CAMERA_ENTRIES.map(resolveCameraEntry);

    expect(cameras.map((c) => c.index)).toEqual([0, 2]);
    expect(cameras[1]?.overlay.textColor).toEqual([255, 255, 255]);
    expect(cameras[1]?.overlay.enabled).toBe(false);
  });
});

describe('parseCamerasFile', () => {
  it('should return the camera entries', () => {
    expect(parseCamerasFile({ cameras: [{ index: 5, width: 320, height: 240 }] })).toEqual([
      { index: 5, width: 320, height: 240 },
    ]);
  });

  it('should reject an empty camera list', () => {
    expect(() => parseCamerasFile({ cameras: [] })).toThrow(
      'Invalid cameras file: cameras: at least one camera is required'
    );
  });

  it('should name the offending field', () => {
    expect(() => parseCamerasFile({ cameras: [{ index: 0, jpegQuality: 0 }] })).toThrow(
      /cameras\.0\.jpegQuality/
    );
  });
});

describe('loadCamerasFile', () => {
  const dir = mkdtempSync(join(tmpdir(), 'tankview-cameras-'));

  it('should read a JSON file', () => {
    const path = join(dir, 'cameras.json');
    writeFileSync(path, JSON.stringify({ cameras: [{ index: 1, description: 'Sump' }] }));

    expect(loadCamerasFile(path)).toEqual([{ index: 1, description: 'Sump' }]);
  });

  it('should raise a ConfigurationError for malformed JSON', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ cameras: ');

    expect(() => loadCamerasFile(path)).toThrow(ConfigurationError);
    expect(() => loadCamerasFile(path)).toThrow(`Cannot read cameras file ${path}`);
  });
});
