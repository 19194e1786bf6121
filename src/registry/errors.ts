/**
 * Error types for node registration and resolution.
 *
 * Every failure is a distinct subclass of {@link ResolutionError} so callers
 * can branch on the cause, e.g. fall back to a default handler only on
 * VersionNotFoundError and never on a structural error.
 */

import type { Tag } from './type-node.js';

/**
 * Base error class for registration and resolution errors.
 */
export class ResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResolutionError';
  }
}

/**
 * Error thrown for a malformed registration request.
 */
export class RegistrationError extends ResolutionError {
  constructor(message: string) {
    super(message);
    this.name = 'RegistrationError';
  }
}

/**
 * Error thrown when a second root is registered for a hierarchy.
 */
export class DuplicateRootError extends RegistrationError {
  readonly hierarchy: string;

  constructor(hierarchy: string) {
    super(`Hierarchy '${hierarchy}' already has a root node`);
    this.name = 'DuplicateRootError';
    this.hierarchy = hierarchy;
  }
}

/**
 * Error thrown when a chain node would acquire a second child.
 */
export class NonLinearChainError extends RegistrationError {
  readonly hierarchy: string;
  readonly parentTag: Tag;
  readonly existingChildTag: Tag;
  readonly rejectedTag: Tag;

  constructor(hierarchy: string, parentTag: Tag, existingChildTag: Tag, rejectedTag: Tag) {
    super(
      `Chain '${hierarchy}' node '${parentTag}' already continues with '${existingChildTag}'; ` +
        `cannot add '${rejectedTag}'`
    );
    this.name = 'NonLinearChainError';
    this.hierarchy = hierarchy;
    this.parentTag = parentTag;
    this.existingChildTag = existingChildTag;
    this.rejectedTag = rejectedTag;
  }
}

/**
 * Error thrown when a chain child is not newer than its parent.
 */
export class ChainOrderError extends RegistrationError {
  readonly hierarchy: string;
  readonly parentTag: Tag;
  readonly rejectedTag: Tag;

  constructor(hierarchy: string, parentTag: Tag, rejectedTag: Tag) {
    super(
      `Chain '${hierarchy}' version '${rejectedTag}' must be newer than its parent '${parentTag}'`
    );
    this.name = 'ChainOrderError';
    this.hierarchy = hierarchy;
    this.parentTag = parentTag;
    this.rejectedTag = rejectedTag;
  }
}

/**
 * Error thrown when registering after the registry was sealed.
 */
export class RegistrySealedError extends RegistrationError {
  readonly tag: Tag;

  constructor(tag: Tag) {
    super(`Registry is sealed; cannot register '${tag}'`);
    this.name = 'RegistrySealedError';
    this.tag = tag;
  }
}

/**
 * Error thrown when a lookup is asked for an empty or non-finite tag.
 */
export class InvalidTagError extends ResolutionError {
  readonly tag: Tag;

  constructor(tag: Tag, reason: string) {
    super(`Invalid tag '${tag}': ${reason}`);
    this.name = 'InvalidTagError';
    this.tag = tag;
  }
}

/**
 * Error thrown when a node reference does not belong to the registry.
 */
export class UnknownNodeError extends ResolutionError {
  readonly index: number;

  constructor(index: number) {
    super(`Node reference #${index} is not registered in this registry`);
    this.name = 'UnknownNodeError';
    this.index = index;
  }
}

/**
 * Error thrown when a chain operation is applied to a tree node.
 */
export class TopologyMismatchError extends ResolutionError {
  readonly hierarchy: string;
  readonly expected: string;

  constructor(hierarchy: string, expected: string) {
    super(`Hierarchy '${hierarchy}' is not a ${expected}`);
    this.name = 'TopologyMismatchError';
    this.hierarchy = hierarchy;
    this.expected = expected;
  }
}

/**
 * Error thrown when a lookup walks through a chain node with several
 * children (deferred chain validation only).
 */
export class AmbiguousChainError extends ResolutionError {
  readonly hierarchy: string;
  readonly tag: Tag;
  readonly childCount: number;

  constructor(hierarchy: string, tag: Tag, childCount: number) {
    super(
      `Chain '${hierarchy}' node '${tag}' has ${childCount} children; version lookup is ambiguous`
    );
    this.name = 'AmbiguousChainError';
    this.hierarchy = hierarchy;
    this.tag = tag;
    this.childCount = childCount;
  }
}

/**
 * Error thrown when no chain node qualifies for a version query.
 */
export class VersionNotFoundError extends ResolutionError {
  readonly hierarchy: string;
  readonly version: Tag;

  constructor(hierarchy: string, version: Tag, detail: string) {
    super(`Version '${version}' not found in chain '${hierarchy}': ${detail}`);
    this.name = 'VersionNotFoundError';
    this.hierarchy = hierarchy;
    this.version = version;
  }
}

/**
 * Error thrown when asking for the predecessor of a chain root.
 */
export class NoPreviousVersionError extends ResolutionError {
  readonly hierarchy: string;
  readonly version: Tag;

  constructor(hierarchy: string, version: Tag) {
    super(`Version '${version}' is the root of chain '${hierarchy}' and has no predecessor`);
    this.name = 'NoPreviousVersionError';
    this.hierarchy = hierarchy;
    this.version = version;
  }
}

/**
 * Error thrown when no node in a subtree matches a model tag.
 */
export class ModelNotFoundError extends ResolutionError {
  readonly hierarchy: string;
  readonly model: Tag;
  readonly searchedFrom: Tag;

  constructor(hierarchy: string, model: Tag, searchedFrom: Tag) {
    super(`Model '${model}' not found under '${searchedFrom}' in hierarchy '${hierarchy}'`);
    this.name = 'ModelNotFoundError';
    this.hierarchy = hierarchy;
    this.model = model;
    this.searchedFrom = searchedFrom;
  }
}

/**
 * Error thrown when an environment variable holds an unsupported value.
 */
export class ConfigurationError extends ResolutionError {
  readonly variable: string;
  readonly value: string;

  constructor(variable: string, value: string, allowed: readonly string[]) {
    super(`Invalid ${variable}='${value}'. Expected one of: ${allowed.join(', ')}`);
    this.name = 'ConfigurationError';
    this.variable = variable;
    this.value = value;
  }
}
