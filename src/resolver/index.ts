/**
 * Resolvers over registered hierarchies.
 *
 * - `ChainResolver`: version lookups over linear chains
 * - `TreeResolver`: model lookups over branching trees
 */

export {
  ChainResolver,
  type ChainResolverOptions,
  type FindVersionOptions,
} from './chain-resolver.js';
export { type FindModelOptions, TreeResolver, type TreeResolverOptions } from './tree-resolver.js';
