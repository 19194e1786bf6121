/**
 * Node types shared by the registry and both resolvers.
 */

/**
 * Identifier carried by a node.
 *
 * Chain nodes need a total order over their tags (see compareTags);
 * tree nodes only compare tags for equality.
 */
export type Tag = string | number;

/**
 * Shape of a hierarchy.
 *
 * - `chain`: each node has at most one child (versions)
 * - `tree`: unrestricted branching (models, variants)
 */
export type Topology = 'chain' | 'tree';

/**
 * Opaque, stable handle to a registered node.
 *
 * A ref is only meaningful for the registry that issued it. The registry
 * hands out the same frozen instance for a node on every lookup, so refs
 * can be compared with `===`.
 */
export class NodeRef {
  constructor(
    readonly registryId: number,
    readonly index: number
  ) {
    Object.freeze(this);
  }

  toString(): string {
    return `NodeRef(${this.registryId}:${this.index})`;
  }
}

/**
 * Read-only view of one declared specialization.
 */
export interface TypeNode<TPayload = unknown> {
  readonly ref: NodeRef;
  readonly tag: Tag;
  /** Extra tags matched by model lookups. Always empty for chain nodes. */
  readonly aliases: readonly Tag[];
  /** Node this one specializes, null for a root. */
  readonly parent: NodeRef | null;
  /** Specializations of this node, in declaration order. */
  readonly children: readonly NodeRef[];
  readonly payload: TPayload | undefined;
  readonly hierarchy: string;
  readonly topology: Topology;
  /** Distance from the root (root = 0). */
  readonly depth: number;
}

/**
 * Check whether a node answers to a tag, either directly or via an alias.
 */
export function matchesTag(node: TypeNode<unknown>, tag: Tag): boolean {
  return node.tag === tag || node.aliases.includes(tag);
}
