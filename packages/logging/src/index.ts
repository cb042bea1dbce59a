/**
 * @hostkit/logging
 *
 * Structured JSON logging shared by the hostkit packages.
 */

import { pino, stdSerializers, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

/**
 * Paths censored in every log line. Basic credentials travel in the
 * Authorization header, so it is always redacted.
 */
export const REDACT_PATHS = [
  'authorization',
  'headers.authorization',
  'headers.Authorization',
  'req.headers.authorization',
  'password',
  '*.password',
  '*.secret',
];

const SERVICE_NAME = 'hostkit';

/**
 * Resolve the log level from the environment.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  return env.LOG_LEVEL || 'info';
}

/**
 * Build the pino options used by {@link createLogger}.
 */
export function loggerOptions(name: string, level = resolveLogLevel()): LoggerOptions {
  return {
    name: `${SERVICE_NAME}:${name}`,
    level,

    formatters: {
      bindings: (bindings) => ({
        pid: bindings.pid,
        hostname: bindings.hostname,
        service: SERVICE_NAME,
        environment: process.env.NODE_ENV || 'development',
      }),

      level: (label) => ({ level: label }),
    },

    serializers: {
      err: stdSerializers.err,
    },

    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  };
}

/**
 * Create a component logger.
 *
 * @param name - Component name, appended to the service name
 * @param destination - Optional write target (tests pass an in-memory stream)
 */
export function createLogger(name: string, destination?: DestinationStream): Logger {
  const options = loggerOptions(name);
  return destination ? pino(options, destination) : pino(options);
}
