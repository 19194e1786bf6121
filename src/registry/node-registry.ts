import { type ChainValidation, loadSettings } from '../config/index.js';
import type { ResolutionEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import {
  ChainOrderError,
  DuplicateRootError,
  NonLinearChainError,
  RegistrationError,
  RegistrySealedError,
  UnknownNodeError,
} from './errors.js';
import { compareTags, invalidTagReason, type TagComparator } from './tag-ordering.js';
import { NodeRef, type Tag, type Topology, type TypeNode } from './type-node.js';

const log = createLogger({ component: 'node-registry' });

let nextRegistryId = 1;

/**
 * Options for {@link NodeRegistry.register}.
 */
export interface RegisterOptions<TPayload> {
  /** Opaque handle stored on the node (handler class, factory, ...) */
  payload?: TPayload;

  /** Logical hierarchy name for a root (default: the root's tag) */
  hierarchy?: string;

  /** Shape of the hierarchy for a root (default: 'tree') */
  topology?: Topology;

  /** Extra tags matched by model lookups (tree nodes only) */
  aliases?: readonly Tag[];
}

/**
 * Options for constructing a registry.
 */
export interface NodeRegistryOptions {
  /** When a second chain child is reported (default: from settings) */
  chainValidation?: ChainValidation;

  /** Ordering used for chain tags (default: compareTags) */
  comparator?: TagComparator;

  /** Receives node.registered and registry.sealed events */
  emitter?: ResolutionEventEmitter;
}

/**
 * Append-only store of declared specialization nodes.
 *
 * Nodes live in one arena; parent and child links are {@link NodeRef}
 * handles into it. The registry has two phases: nodes are registered while
 * hierarchies are declared, then {@link seal} makes it read-only. Resolvers
 * only read, so lookups after sealing need no coordination.
 *
 * @example
 * ```typescript
 * const registry = NodeRegistry.instance();
 *
 * const v1 = registry.register('1.0', undefined, { hierarchy: 'acuity', topology: 'chain' });
 * const v2 = registry.register('2.0', v1);
 *
 * registry.seal();
 * registry.tagOf(v2); // '2.0'
 * ```
 */
export class NodeRegistry<TPayload = unknown> {
  private static _instance: NodeRegistry | null = null;

  readonly id: number;
  readonly chainValidation: ChainValidation;
  readonly comparator: TagComparator;
  readonly emitter: ResolutionEventEmitter | undefined;

  private readonly _nodes: TypeNode<TPayload>[] = [];
  private readonly _roots: Map<string, NodeRef> = new Map();
  private _sealed = false;

  constructor(options: NodeRegistryOptions = {}) {
    this.id = nextRegistryId++;
    this.chainValidation = options.chainValidation ?? loadSettings().chainValidation;
    this.comparator = options.comparator ?? compareTags;
    this.emitter = options.emitter;
  }

  /**
   * Get the process-wide registry instance.
   */
  static instance(): NodeRegistry {
    if (!NodeRegistry._instance) {
      NodeRegistry._instance = new NodeRegistry();
    }
    return NodeRegistry._instance;
  }

  /**
   * Reset the process-wide instance.
   *
   * Primarily for testing to ensure a clean state between tests.
   */
  static resetInstance(): void {
    NodeRegistry._instance = null;
  }

  /**
   * Register a node.
   *
   * Without a parent the node becomes the root of a new hierarchy. With a
   * parent it is appended to the parent's children and inherits the
   * parent's hierarchy and topology.
   *
   * @param tag - Version or model identifier
   * @param parent - Node this one specializes
   * @param options - Payload, and hierarchy settings for a root
   * @returns Stable reference to the new node
   * @throws RegistrySealedError after {@link seal}
   * @throws DuplicateRootError if the hierarchy already has a root
   * @throws NonLinearChainError if a chain node already has a child (eager validation)
   * @throws ChainOrderError if a chain child is not newer than its parent
   * @throws RegistrationError for malformed tags or options
   */
  register(tag: Tag, parent?: NodeRef, options: RegisterOptions<TPayload> = {}): NodeRef {
    if (this._sealed) {
      throw new RegistrySealedError(tag);
    }
    this.validateTag(tag);

    const record = parent
      ? this.buildChild(tag, this.record(parent), options)
      : this.buildRoot(tag, options);

    this._nodes.push(record);
    if (record.parent) {
      const parentRecord = this.record(record.parent);
      this._nodes[parentRecord.ref.index] = Object.freeze({
        ...parentRecord,
        children: Object.freeze([...parentRecord.children, record.ref]),
      });
    } else {
      this._roots.set(record.hierarchy, record.ref);
    }

    const parentTag = record.parent ? this.record(record.parent).tag : null;
    log.debug('Registered node', {
      operation: 'register',
      hierarchy: record.hierarchy,
      topology: record.topology,
      tag: String(tag),
      parent_tag: parentTag === null ? null : String(parentTag),
      depth: record.depth,
    });
    this.emitter?.emitNodeRegistered(record.ref, tag, parentTag, record.hierarchy, record.topology);

    return record.ref;
  }

  /**
   * End the registration phase. Idempotent.
   */
  seal(): void {
    if (this._sealed) {
      return;
    }
    this._sealed = true;
    log.info('Registry sealed', {
      operation: 'seal',
      node_count: this._nodes.length,
      hierarchy_count: this._roots.size,
    });
    this.emitter?.emitRegistrySealed(this._nodes.length, this.hierarchies());
  }

  isSealed(): boolean {
    return this._sealed;
  }

  /**
   * Get the node behind a reference.
   *
   * Views are frozen. Registering a child replaces the parent's view, so a
   * view fetched before that keeps its old children.
   *
   * @throws UnknownNodeError if the reference was not issued by this registry
   */
  node(ref: NodeRef): TypeNode<TPayload> {
    return this.record(ref);
  }

  tagOf(ref: NodeRef): Tag {
    return this.record(ref).tag;
  }

  payloadOf(ref: NodeRef): TPayload | undefined {
    return this.record(ref).payload;
  }

  /**
   * Get the root of a hierarchy by name.
   */
  rootOf(hierarchy: string): NodeRef | undefined {
    return this._roots.get(hierarchy);
  }

  /**
   * List hierarchy names in declaration order.
   */
  hierarchies(): string[] {
    return Array.from(this._roots.keys());
  }

  /**
   * Number of registered nodes.
   */
  size(): number {
    return this._nodes.length;
  }

  /**
   * Get debug information about the registry.
   */
  debugInfo(): Record<string, unknown> {
    const hierarchies: Record<string, { topology: Topology; nodes: number }> = {};
    for (const node of this._nodes) {
      const entry = hierarchies[node.hierarchy] ?? { topology: node.topology, nodes: 0 };
      entry.nodes += 1;
      hierarchies[node.hierarchy] = entry;
    }

    return {
      id: this.id,
      sealed: this._sealed,
      chainValidation: this.chainValidation,
      nodeCount: this._nodes.length,
      hierarchies,
    };
  }

  private record(ref: NodeRef): TypeNode<TPayload> {
    const record = ref.registryId === this.id ? this._nodes[ref.index] : undefined;
    if (!record) {
      throw new UnknownNodeError(ref.index);
    }
    return record;
  }

  private validateTag(tag: Tag): void {
    const reason = invalidTagReason(tag);
    if (reason !== null) {
      throw new RegistrationError(reason);
    }
  }

  private buildRoot(tag: Tag, options: RegisterOptions<TPayload>): TypeNode<TPayload> {
    const hierarchy = options.hierarchy ?? String(tag);
    const topology = options.topology ?? 'tree';

    if (this._roots.has(hierarchy)) {
      throw new DuplicateRootError(hierarchy);
    }

    return this.createRecord(tag, null, hierarchy, topology, 0, options);
  }

  private buildChild(
    tag: Tag,
    parent: TypeNode<TPayload>,
    options: RegisterOptions<TPayload>
  ): TypeNode<TPayload> {
    if (options.hierarchy !== undefined && options.hierarchy !== parent.hierarchy) {
      throw new RegistrationError(
        `Node '${tag}' cannot join hierarchy '${options.hierarchy}' under a parent in '${parent.hierarchy}'`
      );
    }
    if (options.topology !== undefined && options.topology !== parent.topology) {
      throw new RegistrationError(
        `Node '${tag}' cannot be a ${options.topology} node under the ${parent.topology} '${parent.hierarchy}'`
      );
    }

    if (parent.topology === 'chain') {
      const existing = parent.children[0];
      if (existing && this.chainValidation === 'eager') {
        throw new NonLinearChainError(parent.hierarchy, parent.tag, this.tagOf(existing), tag);
      }
      if (this.comparator(tag, parent.tag) <= 0) {
        throw new ChainOrderError(parent.hierarchy, parent.tag, tag);
      }
    }

    return this.createRecord(
      tag,
      parent.ref,
      parent.hierarchy,
      parent.topology,
      parent.depth + 1,
      options
    );
  }

  private createRecord(
    tag: Tag,
    parent: NodeRef | null,
    hierarchy: string,
    topology: Topology,
    depth: number,
    options: RegisterOptions<TPayload>
  ): TypeNode<TPayload> {
    const aliases = options.aliases ?? [];
    if (topology === 'chain' && aliases.length > 0) {
      throw new RegistrationError(`Chain node '${tag}' cannot declare aliases`);
    }

    return Object.freeze({
      ref: new NodeRef(this.id, this._nodes.length),
      tag,
      aliases: Object.freeze([...aliases]),
      parent,
      children: Object.freeze([]),
      payload: options.payload,
      hierarchy,
      topology,
      depth,
    });
  }
}
