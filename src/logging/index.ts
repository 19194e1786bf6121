/**
 * Structured logging API.
 *
 * All messages go through a single pino root logger. Outside production and
 * test runs the pino-pretty transport is attached for readable output.
 * Level and environment come from {@link loadSettings}.
 */

import { type Logger, type LoggerOptions, pino } from 'pino';
import { loadSettings } from '../config/index.js';

/**
 * Structured logging fields.
 *
 * All fields are optional. Common fields include:
 * - component: Component identifier (e.g., "node-registry", "chain-resolver")
 * - operation: Operation being performed (e.g., "find_version")
 * - hierarchy: Logical hierarchy name
 * - tag: Tag being registered or queried
 * - error_message: Error message for error logs
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

let rootLogger: Logger | null = null;

function buildRootLogger(): Logger {
  const settings = loadSettings();
  const options: LoggerOptions = {
    name: 'variant-resolver',
    level: settings.logLevel,
  };

  if (settings.environment === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(options);
}

/**
 * Get the root pino logger, creating it on first use.
 */
export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = buildRootLogger();
  }
  return rootLogger;
}

/**
 * Drop the cached root logger so the next call re-reads settings.
 *
 * @internal
 */
export function resetLogger(): void {
  rootLogger = null;
}

function definedFields(fields?: LogFields): Record<string, string | number | boolean | null> {
  const result: Record<string, string | number | boolean | null> = {};
  if (!fields) {
    return result;
  }
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Log an ERROR level message with structured fields.
 *
 * @example
 * logError('Hierarchy declaration failed', {
 *   component: 'node-registry',
 *   hierarchy: 'acuity',
 *   error_message: 'Duplicate root',
 * });
 */
export function logError(message: string, fields?: LogFields): void {
  getLogger().error(definedFields(fields), message);
}

/**
 * Log a WARN level message with structured fields.
 *
 * Use this for degraded resolution, such as falling back to a base node.
 */
export function logWarn(message: string, fields?: LogFields): void {
  getLogger().warn(definedFields(fields), message);
}

/**
 * Log an INFO level message with structured fields.
 */
export function logInfo(message: string, fields?: LogFields): void {
  getLogger().info(definedFields(fields), message);
}

/**
 * Log a DEBUG level message with structured fields.
 */
export function logDebug(message: string, fields?: LogFields): void {
  getLogger().debug(definedFields(fields), message);
}

/**
 * Log a TRACE level message with structured fields.
 *
 * Typically disabled outside local debugging.
 */
export function logTrace(message: string, fields?: LogFields): void {
  getLogger().trace(definedFields(fields), message);
}

/**
 * Component logger returned by {@link createLogger}.
 */
export interface ComponentLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

/**
 * Create a logger with preset fields.
 *
 * @param defaultFields - Fields to include in every log message
 *
 * @example
 * const log = createLogger({ component: 'tree-resolver' });
 * log.debug('Model resolved', { tag: 'iPhone7' });
 * // Logs: { component: 'tree-resolver', tag: 'iPhone7' }
 */
export function createLogger(defaultFields: LogFields): ComponentLogger {
  const mergeFields = (fields?: LogFields): LogFields => ({
    ...defaultFields,
    ...fields,
  });

  return {
    error: (message, fields) => logError(message, mergeFields(fields)),
    warn: (message, fields) => logWarn(message, mergeFields(fields)),
    info: (message, fields) => logInfo(message, mergeFields(fields)),
    debug: (message, fields) => logDebug(message, mergeFields(fields)),
    trace: (message, fields) => logTrace(message, mergeFields(fields)),
  };
}
