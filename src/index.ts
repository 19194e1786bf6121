/**
 * variant-resolver
 *
 * Resolves which declared specialization of an entity handles a version
 * string or a model identifier, over a process-wide registry of chains
 * and trees.
 *
 * @packageDocumentation
 */

// =============================================================================
// Registry module - node store, handles, ordering, errors
// =============================================================================
export * from './registry/index.js';

// =============================================================================
// Resolver module - chain and tree lookups
// =============================================================================
export * from './resolver/index.js';

// =============================================================================
// Family module - class-based declaration and instantiation
// =============================================================================
export * from './family/index.js';

// =============================================================================
// Events module
// =============================================================================
export * from './events/index.js';

// =============================================================================
// Configuration
// =============================================================================
export {
  type ChainValidation,
  DEFAULT_SETTINGS,
  type Environment,
  type LogLevel,
  loadSettings,
  type ResolverSettings,
} from './config/index.js';

// =============================================================================
// Logging module
// =============================================================================
export {
  type ComponentLogger,
  createLogger,
  getLogger,
  type LogFields,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
} from './logging/index.js';
