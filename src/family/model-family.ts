/**
 * Declaration facade for model-specific handler classes.
 *
 * @example
 * ```typescript
 * const phones = new ModelFamily('phones', 'Phone', GenericPhone)
 *   .add('iPhone', IPhone)
 *   .add('iPhone7', IPhone7, { parent: 'iPhone', aliases: ['A1660'] })
 *   .add('Pixel', Pixel);
 *
 * phones.resolve('A1660'); // IPhone7
 * ```
 */

import { ResolutionError } from '../registry/errors.js';
import { NodeRegistry } from '../registry/node-registry.js';
import type { NodeRef, Tag } from '../registry/type-node.js';
import { TreeResolver } from '../resolver/tree-resolver.js';
import type { FamilyOptions, HandlerClass } from './types.js';

/**
 * Options for {@link ModelFamily.add}.
 */
export interface AddModelOptions {
  /** Model to specialize (default: the base model) */
  parent?: Tag;

  /** Extra identifiers that resolve to this model */
  aliases?: readonly Tag[];
}

export class ModelFamily<T, A extends unknown[] = []> {
  readonly name: string;

  private readonly registry: NodeRegistry;
  private readonly resolver: TreeResolver;
  private readonly fallbackToBase: boolean;
  private readonly root: NodeRef;
  private readonly entries: Map<NodeRef, HandlerClass<T, A>> = new Map();

  /**
   * Declare a family with its generic base model.
   *
   * @throws DuplicateRootError if the registry already has a hierarchy called `name`
   */
  constructor(name: string, baseModel: Tag, base: HandlerClass<T, A>, options: FamilyOptions = {}) {
    this.name = name;
    this.registry = options.registry ?? NodeRegistry.instance();
    this.resolver = new TreeResolver(this.registry);
    this.fallbackToBase = options.fallbackToBase ?? false;
    this.root = this.registry.register(baseModel, undefined, {
      hierarchy: name,
      topology: 'tree',
      payload: base,
    });
    this.entries.set(this.root, base);
  }

  /**
   * Declare a model under its parent model.
   *
   * @throws ModelNotFoundError if `options.parent` is not declared
   */
  add(model: Tag, entry: HandlerClass<T, A>, options: AddModelOptions = {}): this {
    const parent =
      options.parent === undefined ? this.root : this.resolver.findModel(this.root, options.parent);
    const ref = this.registry.register(model, parent, {
      payload: entry,
      aliases: options.aliases,
    });
    this.entries.set(ref, entry);
    return this;
  }

  /**
   * Get the handler class for `model`.
   *
   * @throws ModelNotFoundError if no declared model matches (unless fallbackToBase)
   */
  resolve(model: Tag): HandlerClass<T, A> {
    const ref = this.resolver.findModel(this.root, model, {
      fallbackToBase: this.fallbackToBase,
    });
    const entry = this.entries.get(ref);
    if (!entry) {
      throw new ResolutionError(
        `Model '${this.registry.tagOf(ref)}' of '${this.name}' was not declared through this family`
      );
    }
    return entry;
  }

  /**
   * Instantiate the handler for `model`.
   */
  create(model: Tag, ...args: A): T {
    const Handler = this.resolve(model);
    return new Handler(...args);
  }

  /**
   * List declared models in search order.
   */
  models(): Tag[] {
    return this.resolver.listModels(this.root).map((ref) => this.registry.tagOf(ref));
  }
}
