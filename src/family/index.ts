/**
 * Handler families: declare specializations as classes, resolve them by tag.
 */

export { type AddModelOptions, ModelFamily } from './model-family.js';
export type { FamilyOptions, HandlerClass } from './types.js';
export { VersionFamily } from './version-family.js';
