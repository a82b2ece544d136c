/**
 * Custom error hierarchy for TankView
 */

export type ErrorCategory =
  | 'HARDWARE'
  | 'CAPTURE'
  | 'ENCODING'
  | 'STREAM'
  | 'STATE'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  camera?: number;
  [key: string]: unknown;
}

/**
 * Base error class for TankView
 */
export class TankViewError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'TankViewError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
      ...context,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Camera could not be opened by any backend
 */
export class HardwareUnavailableError extends TankViewError {
  public readonly attempts: string[];

  constructor(camera: number, attempts: string[] = [], context: Partial<ErrorContext> = {}) {
    const detail = attempts.length > 0 ? ` (tried: ${attempts.join('; ')})` : '';
    super(`Could not open camera ${camera}${detail}`, 'E2001', {
      category: 'HARDWARE',
      severity: 'HIGH',
      retryable: false,
      camera,
      ...context,
    });
    this.name = 'HardwareUnavailableError';
    this.attempts = attempts;
  }
}

/**
 * A single frame read did not complete in time
 */
export class ReadTimeoutError extends TankViewError {
  constructor(camera: number, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    super(`Camera ${camera} produced no frame within ${timeoutMs}ms`, 'E2002', {
      category: 'CAPTURE',
      severity: 'LOW',
      retryable: true,
      camera,
      ...context,
    });
    this.name = 'ReadTimeoutError';
  }
}

/**
 * Capture device was closed or its process exited
 */
export class DeviceClosedError extends TankViewError {
  constructor(camera: number, reason: string = 'closed', context: Partial<ErrorContext> = {}) {
    super(`Camera ${camera} device ${reason}`, 'E2003', {
      category: 'CAPTURE',
      severity: 'MEDIUM',
      retryable: false,
      camera,
      ...context,
    });
    this.name = 'DeviceClosedError';
  }
}

/**
 * JPEG compression of a frame failed
 */
export class EncodeFailureError extends TankViewError {
  constructor(camera: number, cause: string, context: Partial<ErrorContext> = {}) {
    super(`Failed to encode frame for camera ${camera}: ${cause}`, 'E3001', {
      category: 'ENCODING',
      severity: 'LOW',
      retryable: true,
      camera,
      ...context,
    });
    this.name = 'EncodeFailureError';
  }
}

/**
 * Stream errors
 */
export class StreamError extends TankViewError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'STREAM',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'StreamError';
  }
}

export class ClientDisconnectError extends StreamError {
  constructor(camera: number, reason: string, context: Partial<ErrorContext> = {}) {
    super(`Camera ${camera} client disconnected: ${reason}`, 'E4001', { camera, ...context });
    this.name = 'ClientDisconnectError';
  }
}

export class BroadcasterStoppedError extends StreamError {
  constructor(camera: number, context: Partial<ErrorContext> = {}) {
    super(`Camera ${camera} broadcaster stopped`, 'E4002', { camera, ...context });
    this.name = 'BroadcasterStoppedError';
  }
}

export class FrameTimeoutError extends StreamError {
  public readonly timeoutMs: number;

  constructor(camera: number, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    super(`No frame from camera ${camera} within ${timeoutMs}ms`, 'E4003', {
      severity: 'MEDIUM',
      camera,
      ...context,
    });
    this.name = 'FrameTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Lifecycle misuse (e.g. starting a broadcaster twice)
 */
export class InvalidStateError extends TankViewError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E5001', {
      category: 'STATE',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'InvalidStateError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends TankViewError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TankViewError) {
    return error.context.retryable;
  }
  return false;
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): TankViewError {
  if (error instanceof TankViewError) {
    return error;
  }

  if (error instanceof Error) {
    return new TankViewError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new TankViewError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
