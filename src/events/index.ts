/**
 * Events module.
 *
 * Provides event names and the typed emitter shared by the registry and
 * resolvers.
 */

// Event emitter
export {
  type NodeRegisteredPayload,
  type RegistrySealedPayload,
  type ResolutionCompletedPayload,
  ResolutionEventEmitter,
  type ResolutionEventMap,
  type ResolutionFailedPayload,
  type ResolutionOperation,
} from './event-emitter.js';
// Event names
export {
  type EventName,
  EventNames,
  type RegistryEventName,
  RegistryEventNames,
  type ResolutionEventName,
  ResolutionEventNames,
} from './event-names.js';
