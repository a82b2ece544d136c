/**
 * Structured logging for TankView
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  component?: string;
  camera?: number;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

// Create base logger
function createBaseLogger(level: LogLevel = 'info') {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'tankview',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const envLevel = process.env.LOG_LEVEL;
    loggerInstance = createBaseLogger(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

// Structured event logging for the capture pipeline
export function logCameraSettings(
  camera: number,
  requested: { width: number; height: number; fps: number },
  actual: { width: number; height: number; fps: number | null }
): void {
  getLogger().info(
    {
      event: 'camera_settings',
      camera,
      requested,
      actual,
    },
    `Camera ${camera} settings: ${actual.width}x${actual.height} @ ${actual.fps ?? 'unknown'} FPS`
  );
}

export function logClientConnection(
  camera: number,
  remoteAddress: string | undefined,
  change: 'connected' | 'disconnected',
  activeConnections: number
): void {
  getLogger().info(
    {
      event: `client_${change}`,
      camera,
      remoteAddress,
      activeConnections,
    },
    `Camera ${camera} client ${change}. Active: ${activeConnections}`
  );
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
