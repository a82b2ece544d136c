/**
 * FFmpeg backend Tests
 * Covers argument building and stream parsing; no ffmpeg process is spawned.
 */
import { describe, it, expect } from 'vitest';
import { FfmpegCaptureBackend, describeInput, parseCodecData } from './ffmpeg-backend.js';
import { createCaptureBackends, platformInputKinds } from './index.js';
import type { CaptureRequest } from '../types.js';

const request: CaptureRequest = { cameraIndex: 2, width: 640, height: 480, frameRate: 5 };

describe('parseCodecData()', () => {
  it('should read size and rate from video details', () => {
    const parsed = parseCodecData({
      format: 'video4linux2,v4l2',
      video: 'rawvideo (YUY2 / 0x32595559)',
      video_details: ['rawvideo (YUY2 / 0x32595559)', 'yuyv422', '1280x720', '147456 kb/s', '10 fps', '10 tbr'],
    });

    expect(parsed).toEqual({ width: 1280, height: 720, fps: 10 });
  });

  it('should handle size entries with aspect ratio suffixes', () => {
    const parsed = parseCodecData({
      video_details: ['mjpeg (Baseline)', 'yuvj422p(pc, bt470bg/unknown/unknown)', '640x480 [SAR 1:1 DAR 4:3]', '29.97 fps'],
    });

    expect(parsed).toEqual({ width: 640, height: 480, fps: 29.97 });
  });

  it('should report an unknown rate as null', () => {
    expect(parseCodecData({ video_details: ['rawvideo', '320x240'] })).toEqual({
      width: 320,
      height: 240,
      fps: null,
    });
  });

  it('should return null without a usable size', () => {
    expect(parseCodecData({ video_details: ['rawvideo', 'yuyv422'] })).toBeNull();
    expect(parseCodecData('not codec data')).toBeNull();
  });
});

describe('describeInput()', () => {
  it('should open /dev/video<index> through v4l2 with the requested mode', () => {
    expect(describeInput('v4l2', request)).toEqual({
      source: '/dev/video2',
      format: 'v4l2',
      options: ['-video_size', '640x480', '-framerate', '5'],
    });
  });

  it('should prefer an explicit device path', () => {
    expect(describeInput('v4l2', { ...request, device: '/dev/fishcam' }).source).toBe('/dev/fishcam');
  });

  it('should address avfoundation devices by index without audio', () => {
    expect(describeInput('avfoundation', request)).toMatchObject({ source: '2:none', format: 'avfoundation' });
  });

  it('should address dshow devices by name', () => {
    expect(describeInput('dshow', { ...request, device: 'USB Camera' })).toMatchObject({
      source: 'video=USB Camera',
      format: 'dshow',
    });
  });

  it('should leave format and mode to ffmpeg for the default backend', () => {
    expect(describeInput('default', request, 'linux')).toEqual({ source: '/dev/video2', options: [] });
    expect(describeInput('default', request, 'freebsd')).toEqual({ source: '2', options: [] });
  });
});

describe('FfmpegCaptureBackend', () => {
  it('should only support dshow when a device name is configured', () => {
    const backend = new FfmpegCaptureBackend({ kind: 'dshow' });

    expect(backend.isSupported(request)).toBe(false);
    expect(backend.isSupported({ ...request, device: 'USB Camera' })).toBe(true);
  });

  it('should take its name from the capture API', () => {
    expect(new FfmpegCaptureBackend({ kind: 'v4l2' }).name).toBe('v4l2');
  });
});

describe('backend selection', () => {
  it('should try the platform API before the generic one', () => {
    expect(platformInputKinds('linux')).toEqual(['v4l2', 'default']);
    expect(platformInputKinds('darwin')).toEqual(['avfoundation', 'default']);
    expect(platformInputKinds('win32')).toEqual(['dshow', 'default']);
    expect(platformInputKinds('aix')).toEqual(['default']);
  });

  it('should build one backend per candidate', () => {
    const backends = createCaptureBackends({ mode: 'ffmpeg', platform: 'linux' });

    expect(backends.map((b) => b.name)).toEqual(['v4l2', 'default']);
  });

  it('should use only the synthetic backend in synthetic mode', () => {
    const backends = createCaptureBackends({ mode: 'synthetic' });

    expect(backends.map((b) => b.name)).toEqual(['synthetic']);
  });
});
