/**
 * Node registry: the process-wide store of declared specializations.
 *
 * - `NodeRegistry`: append-only arena with a seal step
 * - `NodeRef` / `TypeNode`: handles and read-only node views
 * - `compareTags`: default ordering for chain tags
 * - Error classes for every registration and lookup failure
 */

export {
  AmbiguousChainError,
  ChainOrderError,
  ConfigurationError,
  DuplicateRootError,
  InvalidTagError,
  ModelNotFoundError,
  NonLinearChainError,
  NoPreviousVersionError,
  RegistrationError,
  RegistrySealedError,
  ResolutionError,
  TopologyMismatchError,
  UnknownNodeError,
  VersionNotFoundError,
} from './errors.js';
export {
  NodeRegistry,
  type NodeRegistryOptions,
  type RegisterOptions,
} from './node-registry.js';
export { compareTags, invalidTagReason, type TagComparator } from './tag-ordering.js';
export { matchesTag, NodeRef, type Tag, type Topology, type TypeNode } from './type-node.js';
