import type { NodeRegistry } from '../registry/node-registry.js';

/**
 * Constructor of a concrete handler in a family.
 *
 * @example
 * ```typescript
 * class AcuityV1 { constructor(readonly host: string) {} }
 * const entry: HandlerClass<AcuityV1, [string]> = AcuityV1;
 * ```
 */
export type HandlerClass<T, A extends unknown[] = []> = new (...args: A) => T;

/**
 * Options shared by families.
 */
export interface FamilyOptions {
  /** Registry to declare into (default: NodeRegistry.instance()) */
  registry?: NodeRegistry;

  /** Resolve to the base handler instead of failing on an unknown tag */
  fallbackToBase?: boolean;
}
