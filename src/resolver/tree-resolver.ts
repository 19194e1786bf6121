/**
 * Model lookups over specialization trees.
 *
 * Search is depth-first and pre-order: a node is checked before its children
 * and children are visited in declaration order. When several nodes share a
 * tag, the first one met in that order wins, so keep model tags unique unless
 * that tie-break is what you want.
 *
 * @example
 * ```typescript
 * const phone = registry.register('Phone', undefined, { hierarchy: 'devices' });
 * const iphone = registry.register('iPhone', phone);
 * registry.register('iPhone7', iphone);
 * registry.register('Pixel', phone);
 *
 * const tree = new TreeResolver(registry);
 * registry.tagOf(tree.findModel(phone, 'iPhone7')); // 'iPhone7'
 * ```
 */

import type { ResolutionEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import { ModelNotFoundError } from '../registry/errors.js';
import type { NodeRegistry } from '../registry/node-registry.js';
import { matchesTag, type NodeRef, type Tag, type TypeNode } from '../registry/type-node.js';

const log = createLogger({ component: 'tree-resolver' });

/**
 * Options for {@link TreeResolver.findModel}.
 */
export interface FindModelOptions {
  /** Return the starting node instead of failing when nothing matches. */
  fallbackToBase?: boolean;
}

export interface TreeResolverOptions {
  /** Receives resolution events (default: the registry's emitter) */
  emitter?: ResolutionEventEmitter;
}

/**
 * Resolver for model trees.
 *
 * Works on any hierarchy; a chain is a tree without branches.
 */
export class TreeResolver<TPayload = unknown> {
  private readonly emitter: ResolutionEventEmitter | undefined;

  constructor(
    private readonly registry: NodeRegistry<TPayload>,
    options: TreeResolverOptions = {}
  ) {
    this.emitter = options.emitter ?? registry.emitter;
  }

  /**
   * Find the first node in the subtree of `root` whose tag or one of whose
   * aliases equals `model`.
   *
   * @param root - Node to start from; checked before any descendant
   * @param model - Requested model identifier
   * @throws ModelNotFoundError if no node in the subtree matches
   */
  findModel(root: NodeRef, model: Tag, options: FindModelOptions = {}): NodeRef {
    const start = this.registry.node(root);

    for (const node of this.preOrder(start)) {
      if (matchesTag(node, model)) {
        log.debug('Model resolved', {
          operation: 'find_model',
          hierarchy: node.hierarchy,
          query: String(model),
          resolved: String(node.tag),
          depth: node.depth,
        });
        this.emitter?.emitResolutionCompleted('find_model', node.hierarchy, model, node.ref, node.tag);
        return node.ref;
      }
    }

    if (options.fallbackToBase) {
      log.warn('Model not found, defaulting to base', {
        operation: 'find_model',
        hierarchy: start.hierarchy,
        query: String(model),
        base: String(start.tag),
      });
      this.emitter?.emitResolutionCompleted(
        'find_model',
        start.hierarchy,
        model,
        start.ref,
        start.tag,
        true
      );
      return start.ref;
    }

    const error = new ModelNotFoundError(start.hierarchy, model, start.tag);
    log.debug('Model lookup failed', {
      operation: 'find_model',
      hierarchy: start.hierarchy,
      query: String(model),
      error_message: error.message,
    });
    this.emitter?.emitResolutionFailed('find_model', start.hierarchy, model, error);
    throw error;
  }

  /**
   * List the subtree of `root` in search order.
   */
  listModels(root: NodeRef): NodeRef[] {
    return Array.from(this.preOrder(this.registry.node(root)), (node) => node.ref);
  }

  /**
   * Pre-order traversal with an explicit stack. Children are pushed in
   * reverse so the first declared child is visited first.
   */
  private *preOrder(start: TypeNode<TPayload>): Generator<TypeNode<TPayload>> {
    const stack: TypeNode<TPayload>[] = [start];
    let node = stack.pop();
    while (node) {
      yield node;
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(this.registry.node(node.children[i]));
      }
      node = stack.pop();
    }
  }
}
