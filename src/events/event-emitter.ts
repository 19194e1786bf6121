/**
 * Typed event emitter for registry and resolution events.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type { NodeRef, Tag, Topology } from '../registry/type-node.js';
import { RegistryEventNames, ResolutionEventNames } from './event-names.js';

/**
 * Lookup operations reported in resolution events.
 */
export type ResolutionOperation =
  | 'find_version'
  | 'find_previous_version'
  | 'find_ancestor_version'
  | 'latest_version'
  | 'find_model';

/**
 * Event payload types
 */
export interface NodeRegisteredPayload {
  ref: NodeRef;
  tag: Tag;
  parentTag: Tag | null;
  hierarchy: string;
  topology: Topology;
  registeredAt: Date;
}

export interface RegistrySealedPayload {
  nodeCount: number;
  hierarchies: string[];
  sealedAt: Date;
}

export interface ResolutionCompletedPayload {
  operation: ResolutionOperation;
  hierarchy: string;
  query: Tag | null;
  ref: NodeRef;
  resolvedTag: Tag;
  /** True when the result is the base node returned in place of a failure */
  fallback: boolean;
  timestamp: Date;
}

export interface ResolutionFailedPayload {
  operation: ResolutionOperation;
  hierarchy: string;
  query: Tag | null;
  error: Error;
  timestamp: Date;
}

/**
 * Event map for type-safe event handling
 */
export interface ResolutionEventMap {
  'node.registered': [NodeRegisteredPayload];
  'registry.sealed': [RegistrySealedPayload];
  'resolution.completed': [ResolutionCompletedPayload];
  'resolution.failed': [ResolutionFailedPayload];
}

/**
 * Type-safe event emitter for registry and resolution events
 */
export class ResolutionEventEmitter extends EventEmitter<ResolutionEventMap> {
  private readonly instanceId: string;

  constructor() {
    super();
    this.instanceId = randomUUID();
  }

  /**
   * Get the unique instance ID for this emitter
   */
  getInstanceId(): string {
    return this.instanceId;
  }

  /**
   * Emit a node registered event
   */
  emitNodeRegistered(
    ref: NodeRef,
    tag: Tag,
    parentTag: Tag | null,
    hierarchy: string,
    topology: Topology
  ): void {
    this.emit(RegistryEventNames.NODE_REGISTERED, {
      ref,
      tag,
      parentTag,
      hierarchy,
      topology,
      registeredAt: new Date(),
    });
  }

  /**
   * Emit a registry sealed event
   */
  emitRegistrySealed(nodeCount: number, hierarchies: string[]): void {
    this.emit(RegistryEventNames.REGISTRY_SEALED, {
      nodeCount,
      hierarchies,
      sealedAt: new Date(),
    });
  }

  /**
   * Emit a resolution completed event
   */
  emitResolutionCompleted(
    operation: ResolutionOperation,
    hierarchy: string,
    query: Tag | null,
    ref: NodeRef,
    resolvedTag: Tag,
    fallback = false
  ): void {
    this.emit(ResolutionEventNames.RESOLUTION_COMPLETED, {
      operation,
      hierarchy,
      query,
      ref,
      resolvedTag,
      fallback,
      timestamp: new Date(),
    });
  }

  /**
   * Emit a resolution failed event
   */
  emitResolutionFailed(
    operation: ResolutionOperation,
    hierarchy: string,
    query: Tag | null,
    error: Error
  ): void {
    this.emit(ResolutionEventNames.RESOLUTION_FAILED, {
      operation,
      hierarchy,
      query,
      error,
      timestamp: new Date(),
    });
  }
}
