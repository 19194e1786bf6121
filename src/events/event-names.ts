/**
 * Standard event names emitted by the registry and resolvers.
 */

/**
 * Event names for registry lifecycle
 */
export const RegistryEventNames = {
  /** Emitted after a node is appended to the registry */
  NODE_REGISTERED: 'node.registered',

  /** Emitted once when the registry leaves its registration phase */
  REGISTRY_SEALED: 'registry.sealed',
} as const;

/**
 * Event names for lookups
 */
export const ResolutionEventNames = {
  /** Emitted when a lookup returns a node (fallbacks included) */
  RESOLUTION_COMPLETED: 'resolution.completed',

  /** Emitted when a lookup fails with a typed error */
  RESOLUTION_FAILED: 'resolution.failed',
} as const;

/**
 * All event names combined
 */
export const EventNames = {
  ...RegistryEventNames,
  ...ResolutionEventNames,
} as const;

export type EventName = (typeof EventNames)[keyof typeof EventNames];

export type RegistryEventName = (typeof RegistryEventNames)[keyof typeof RegistryEventNames];

export type ResolutionEventName = (typeof ResolutionEventNames)[keyof typeof ResolutionEventNames];
