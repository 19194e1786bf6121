/**
 * Declaration facade for versioned handler classes.
 *
 * A family declares its handlers as a chain in a {@link NodeRegistry} and
 * answers "which class handles version X" without a hand-maintained switch.
 *
 * @example
 * ```typescript
 * class ScannerV1 { constructor(readonly host: string) {} }
 * class ScannerV2 extends ScannerV1 {}
 * class ScannerV3 extends ScannerV2 {}
 *
 * const scanners = new VersionFamily('scanner', '1.0', ScannerV1)
 *   .extend('2.0', ScannerV2)
 *   .extend('3.0', ScannerV3);
 *
 * scanners.resolve('2.4');                  // ScannerV2
 * scanners.create('4.1', 'scanner.local'); // ScannerV3 instance
 * ```
 */

import { ResolutionError } from '../registry/errors.js';
import { NodeRegistry } from '../registry/node-registry.js';
import type { NodeRef, Tag } from '../registry/type-node.js';
import { ChainResolver } from '../resolver/chain-resolver.js';
import type { FamilyOptions, HandlerClass } from './types.js';

export class VersionFamily<T, A extends unknown[] = []> {
  readonly name: string;

  private readonly registry: NodeRegistry;
  private readonly resolver: ChainResolver;
  private readonly fallbackToBase: boolean;
  private readonly root: NodeRef;
  private readonly chain: NodeRef[] = [];
  private readonly entries: Map<NodeRef, HandlerClass<T, A>> = new Map();

  /**
   * Declare a family with its oldest supported version.
   *
   * @param name - Hierarchy name, unique within the registry
   * @param baseVersion - Version handled by `base`
   * @param base - Handler for `baseVersion` and, with fallbackToBase, anything older
   * @throws DuplicateRootError if the registry already has a hierarchy called `name`
   */
  constructor(name: string, baseVersion: Tag, base: HandlerClass<T, A>, options: FamilyOptions = {}) {
    this.name = name;
    this.registry = options.registry ?? NodeRegistry.instance();
    this.resolver = new ChainResolver(this.registry);
    this.fallbackToBase = options.fallbackToBase ?? false;
    this.root = this.declare(baseVersion, undefined, base);
  }

  /**
   * Append a newer version to the end of the chain.
   *
   * @throws ChainOrderError if `version` is not newer than the current newest
   */
  extend(version: Tag, entry: HandlerClass<T, A>): this {
    this.declare(version, this.chain[this.chain.length - 1], entry);
    return this;
  }

  /**
   * Get the handler class for the newest version not newer than `version`.
   *
   * @throws VersionNotFoundError if `version` predates the base (unless fallbackToBase)
   */
  resolve(version: Tag): HandlerClass<T, A> {
    const ref = this.resolver.findVersion(this.root, version, {
      fallbackToBase: this.fallbackToBase,
    });
    return this.entryOf(ref);
  }

  /**
   * Instantiate the handler for `version`.
   */
  create(version: Tag, ...args: A): T {
    const Handler = this.resolve(version);
    return new Handler(...args);
  }

  /**
   * Get the handler class preceding the one that serves `version`.
   *
   * @throws NoPreviousVersionError if `version` resolves to the base
   */
  previous(version: Tag): HandlerClass<T, A> {
    const current = this.resolver.findVersion(this.root, version, {
      fallbackToBase: this.fallbackToBase,
    });
    return this.entryOf(this.resolver.findPreviousVersion(current));
  }

  /**
   * List declared versions, oldest first.
   */
  versions(): Tag[] {
    return this.chain.map((ref) => this.registry.tagOf(ref));
  }

  private declare(version: Tag, parent: NodeRef | undefined, entry: HandlerClass<T, A>): NodeRef {
    const ref = parent
      ? this.registry.register(version, parent, { payload: entry })
      : this.registry.register(version, undefined, {
          hierarchy: this.name,
          topology: 'chain',
          payload: entry,
        });
    this.chain.push(ref);
    this.entries.set(ref, entry);
    return ref;
  }

  private entryOf(ref: NodeRef): HandlerClass<T, A> {
    const entry = this.entries.get(ref);
    if (!entry) {
      throw new ResolutionError(
        `Version '${this.registry.tagOf(ref)}' of '${this.name}' was not declared through this family`
      );
    }
    return entry;
  }
}
