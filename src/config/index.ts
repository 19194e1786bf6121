/**
 * Runtime settings for the resolver.
 *
 * Settings come from environment variables so that the same hierarchy
 * declarations behave identically across development, test and production.
 *
 * | Variable                   | Values                                  | Default       |
 * |----------------------------|-----------------------------------------|---------------|
 * | `VARIANT_ENV`              | development, test, production           | `development` |
 * | `VARIANT_LOG_LEVEL`        | trace, debug, info, warn, error, silent | `info`        |
 * | `VARIANT_CHAIN_VALIDATION` | eager, deferred                         | `eager`       |
 */

import { ConfigurationError } from '../registry/errors.js';

export type Environment = 'development' | 'test' | 'production';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * When a chain node acquiring a second child is reported.
 *
 * - `eager`: registration fails with NonLinearChainError
 * - `deferred`: registration succeeds, lookups walking through the node fail
 *   with AmbiguousChainError
 */
export type ChainValidation = 'eager' | 'deferred';

export interface ResolverSettings {
  environment: Environment;
  logLevel: LogLevel;
  chainValidation: ChainValidation;
}

const ENVIRONMENTS: readonly Environment[] = ['development', 'test', 'production'];
const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];
const CHAIN_VALIDATIONS: readonly ChainValidation[] = ['eager', 'deferred'];

export const DEFAULT_SETTINGS: Readonly<ResolverSettings> = Object.freeze({
  environment: 'development',
  logLevel: 'info',
  chainValidation: 'eager',
});

function pick<T extends string>(
  variable: string,
  raw: string | undefined,
  allowed: readonly T[],
  fallback: T
): T {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = raw.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigurationError(variable, raw, allowed);
  }
  return match;
}

/**
 * Read settings from an environment map.
 *
 * @param env - Environment variables (default: process.env)
 * @throws ConfigurationError if a variable holds an unsupported value
 *
 * @example
 * ```typescript
 * const settings = loadSettings({ VARIANT_CHAIN_VALIDATION: 'deferred' });
 * settings.chainValidation; // 'deferred'
 * ```
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): ResolverSettings {
  return {
    environment: pick('VARIANT_ENV', env.VARIANT_ENV, ENVIRONMENTS, DEFAULT_SETTINGS.environment),
    logLevel: pick('VARIANT_LOG_LEVEL', env.VARIANT_LOG_LEVEL, LOG_LEVELS, DEFAULT_SETTINGS.logLevel),
    chainValidation: pick(
      'VARIANT_CHAIN_VALIDATION',
      env.VARIANT_CHAIN_VALIDATION,
      CHAIN_VALIDATIONS,
      DEFAULT_SETTINGS.chainValidation
    ),
  };
}
