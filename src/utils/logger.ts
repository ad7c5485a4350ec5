/**
 * Logging
 *
 * Two layers:
 * - `Logger`: the small interface library code accepts via dependency
 *   injection (CLI contexts, pino adapters and test spies all satisfy it).
 * - pino: structured JSON logging for the server and runtime wiring, with
 *   component child loggers and redaction of credential-like fields.
 */

import pino from 'pino';

/**
 * Generic logger interface for library code
 *
 * Compatible with the CLI's CommandContext so a context can be passed directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
  /** Log an informational message */
  info?: (message: string) => void;
  /** Log an error message */
  error?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
  info: (message: string) => console.log(message),
  error: (message: string) => console.error(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
  info: () => {},
  error: () => {},
};

// Keep test output clean
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const pinoOptions: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL ?? 'info',
  enabled: !isTest,
  base: { service: 'helpdesk' },
  redact: {
    paths: [
      'apiKey',
      'api_key',
      'OPENAI_API_KEY',
      'GEMINI_API_KEY',
      'ANTHROPIC_API_KEY',
      'authorization',
      '*.apiKey',
      '*.api_key',
      'req.headers.authorization',
    ],
    censor: '***REDACTED***',
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
};

/**
 * Root logger. Writes to stderr so `--json` CLI output on stdout stays parseable.
 */
export const logger = pino(pinoOptions, pino.destination(2));

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'server', 'chatbot', 'indexer')
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}

/**
 * Change the root log level after config is loaded.
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}

/**
 * Adapt a pino logger to the library `Logger` interface.
 */
export function toLogger(log: pino.Logger): Logger {
  return {
    warn: (message) => log.warn(message),
    debug: (message) => log.debug(message),
    info: (message) => log.info(message),
    error: (message) => log.error(message),
  };
}
