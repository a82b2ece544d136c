import { describe, it, expect } from 'vitest';
import {
  BroadcasterStoppedError,
  FrameTimeoutError,
  HardwareUnavailableError,
  ReadTimeoutError,
  StreamError,
  TankViewError,
  errorMessage,
  isRetryableError,
  wrapError,
} from './index.js';

describe('TankViewError hierarchy', () => {
  it('should list every backend attempt in the message', () => {
    const error = new HardwareUnavailableError(2, ['v4l2: busy', 'default: no frames']);

    expect(error.message).toBe('Could not open camera 2 (tried: v4l2: busy; default: no frames)');
    expect(error.code).toBe('E2001');
    expect(error.context.camera).toBe(2);
    expect(error.context.category).toBe('HARDWARE');
  });

  it('should keep subclass identity', () => {
    const error = new BroadcasterStoppedError(0);

    expect(error).toBeInstanceOf(StreamError);
    expect(error).toBeInstanceOf(TankViewError);
    expect(error.name).toBe('BroadcasterStoppedError');
  });

  it('should serialize to JSON', () => {
    const json = new FrameTimeoutError(1, 500).toJSON();

    expect(json.code).toBe('E4003');
    expect(json.message).toBe('No frame from camera 1 within 500ms');
    expect(json.context.severity).toBe('MEDIUM');
  });
});

describe('isRetryableError', () => {
  it('should treat read timeouts as retryable', () => {
    expect(isRetryableError(new ReadTimeoutError(0, 100))).toBe(true);
    expect(isRetryableError(new HardwareUnavailableError(0))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });
});

describe('wrapError', () => {
  it('should pass TankView errors through', () => {
    const error = new ReadTimeoutError(0, 100);
    expect(wrapError(error)).toBe(error);
  });

  it('should wrap plain errors and values', () => {
    expect(wrapError(new TypeError('bad')).context.originalError).toBe('TypeError');
    expect(wrapError('oops').message).toBe('oops');
    expect(wrapError('oops').code).toBe('E9999');
  });
});

describe('errorMessage', () => {
  it('should read messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
