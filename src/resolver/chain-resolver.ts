/**
 * Version lookups over linear chains.
 *
 * A chain is a hierarchy in which every node has at most one child and each
 * child is newer than its parent, e.g. `1.0 → 1.1 → 2.0`. Lookups pick the
 * most specific known version that is not newer than the requested one.
 *
 * @example
 * ```typescript
 * const registry = new NodeRegistry();
 * const v10 = registry.register('1.0', undefined, { hierarchy: 'firmware', topology: 'chain' });
 * const v11 = registry.register('1.1', v10);
 * registry.register('2.0', v11);
 *
 * const chain = new ChainResolver(registry);
 * registry.tagOf(chain.findVersion(v10, '1.5')); // '1.1'
 * registry.tagOf(chain.findVersion(v10, '9.0')); // '2.0'
 * ```
 */

import type { ResolutionEventEmitter, ResolutionOperation } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import {
  AmbiguousChainError,
  InvalidTagError,
  NoPreviousVersionError,
  ResolutionError,
  TopologyMismatchError,
  VersionNotFoundError,
} from '../registry/errors.js';
import type { NodeRegistry } from '../registry/node-registry.js';
import { invalidTagReason } from '../registry/tag-ordering.js';
import type { NodeRef, Tag, TypeNode } from '../registry/type-node.js';

const log = createLogger({ component: 'chain-resolver' });

/**
 * Options for {@link ChainResolver.findVersion}.
 */
export interface FindVersionOptions {
  /**
   * Return the starting node instead of failing when it is already newer
   * than the requested version.
   */
  fallbackToBase?: boolean;
}

export interface ChainResolverOptions {
  /** Receives resolution events (default: the registry's emitter) */
  emitter?: ResolutionEventEmitter;
}

/**
 * Resolver for version chains.
 */
export class ChainResolver<TPayload = unknown> {
  private readonly emitter: ResolutionEventEmitter | undefined;

  constructor(
    private readonly registry: NodeRegistry<TPayload>,
    options: ChainResolverOptions = {}
  ) {
    this.emitter = options.emitter ?? registry.emitter;
  }

  /**
   * Find the newest version not newer than `version`.
   *
   * Walks down from `root` while the next node's tag is ≤ `version` and
   * returns the last node visited. A version newer than every known one
   * resolves to the newest node.
   *
   * @param root - Node to start from, usually the chain root
   * @param version - Requested version
   * @throws InvalidTagError if `version` is empty or not a finite number
   * @throws VersionNotFoundError if `root` is already newer than `version`
   * @throws AmbiguousChainError if the walk meets a node with several children
   * @throws TopologyMismatchError if `root` is not a chain node
   */
  findVersion(root: NodeRef, version: Tag, options: FindVersionOptions = {}): NodeRef {
    const start = this.registry.node(root);

    return this.track('find_version', start.hierarchy, version, () => {
      this.assertQuery(version);
      this.assertChain(start);

      if (this.registry.comparator(start.tag, version) > 0) {
        if (options.fallbackToBase) {
          log.warn('Version not found, defaulting to base', {
            operation: 'find_version',
            hierarchy: start.hierarchy,
            version: String(version),
            base: String(start.tag),
          });
          this.emitter?.emitResolutionCompleted(
            'find_version',
            start.hierarchy,
            version,
            start.ref,
            start.tag,
            true
          );
          return start.ref;
        }
        throw new VersionNotFoundError(
          start.hierarchy,
          version,
          `oldest version from '${start.tag}' is newer`
        );
      }

      let current = start;
      for (let next = this.soleChild(current); next; next = this.soleChild(current)) {
        if (this.registry.comparator(next.tag, version) > 0) {
          break;
        }
        current = next;
      }
      return this.resolved('find_version', current, version);
    });
  }

  /**
   * Get the version a node directly specializes.
   *
   * @throws NoPreviousVersionError if `node` is the chain root
   * @throws TopologyMismatchError if `node` is not a chain node
   */
  findPreviousVersion(node: NodeRef): NodeRef {
    const current = this.registry.node(node);

    return this.track('find_previous_version', current.hierarchy, current.tag, () => {
      this.assertChain(current);
      if (!current.parent) {
        throw new NoPreviousVersionError(current.hierarchy, current.tag);
      }
      return this.resolved('find_previous_version', this.registry.node(current.parent), current.tag);
    });
  }

  /**
   * Climb from a node's parent toward the root and return the first
   * ancestor whose tag orders equal to `version`.
   *
   * Used to step back to a specific older interface, e.g. after a device
   * rolled back its firmware.
   *
   * @throws InvalidTagError if `version` is empty or not a finite number
   * @throws VersionNotFoundError if no ancestor carries `version`
   * @throws TopologyMismatchError if `node` is not a chain node
   */
  findAncestorVersion(node: NodeRef, version: Tag): NodeRef {
    const current = this.registry.node(node);

    return this.track('find_ancestor_version', current.hierarchy, version, () => {
      this.assertQuery(version);
      this.assertChain(current);
      for (let ref = current.parent; ref; ref = this.registry.node(ref).parent) {
        const ancestor = this.registry.node(ref);
        if (this.registry.comparator(ancestor.tag, version) === 0) {
          return this.resolved('find_ancestor_version', ancestor, version);
        }
      }
      throw new VersionNotFoundError(
        current.hierarchy,
        version,
        `no ancestor of '${current.tag}' carries it`
      );
    });
  }

  /**
   * Get the newest version reachable from `root`.
   *
   * @throws AmbiguousChainError if the walk meets a node with several children
   * @throws TopologyMismatchError if `root` is not a chain node
   */
  latestVersion(root: NodeRef): NodeRef {
    const start = this.registry.node(root);

    return this.track('latest_version', start.hierarchy, null, () => {
      this.assertChain(start);
      let current = start;
      for (let next = this.soleChild(current); next; next = this.soleChild(current)) {
        current = next;
      }
      return this.resolved('latest_version', current, null);
    });
  }

  private assertQuery(version: Tag): void {
    const reason = invalidTagReason(version);
    if (reason !== null) {
      throw new InvalidTagError(version, reason);
    }
  }

  private assertChain(node: TypeNode<TPayload>): void {
    if (node.topology !== 'chain') {
      throw new TopologyMismatchError(node.hierarchy, 'chain');
    }
  }

  /**
   * The next node of the chain, or null at the end.
   */
  private soleChild(node: TypeNode<TPayload>): TypeNode<TPayload> | null {
    if (node.children.length > 1) {
      throw new AmbiguousChainError(node.hierarchy, node.tag, node.children.length);
    }
    const [child] = node.children;
    return child ? this.registry.node(child) : null;
  }

  private resolved(
    operation: ResolutionOperation,
    node: TypeNode<TPayload>,
    query: Tag | null
  ): NodeRef {
    log.debug('Version resolved', {
      operation,
      hierarchy: node.hierarchy,
      query: query === null ? null : String(query),
      resolved: String(node.tag),
    });
    this.emitter?.emitResolutionCompleted(operation, node.hierarchy, query, node.ref, node.tag);
    return node.ref;
  }

  /**
   * Run a lookup, reporting typed failures before rethrowing them.
   */
  private track(
    operation: ResolutionOperation,
    hierarchy: string,
    query: Tag | null,
    lookup: () => NodeRef
  ): NodeRef {
    try {
      return lookup();
    } catch (error) {
      if (error instanceof ResolutionError) {
        log.debug('Version lookup failed', {
          operation,
          hierarchy,
          query: query === null ? null : String(query),
          error_message: error.message,
        });
        this.emitter?.emitResolutionFailed(operation, hierarchy, query, error);
      }
      throw error;
    }
  }
}
