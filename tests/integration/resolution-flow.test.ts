/**
 * Integration tests for the complete declaration and resolution flow.
 *
 * Declares a chain and a tree in one registry with a shared emitter, seals
 * it, and resolves through both resolvers and families.
 */

import { beforeEach, describe, expect, test } from 'vitest';
import {
  type ResolutionCompletedPayload,
  ResolutionEventEmitter,
} from '../../src/events/event-emitter.js';
import { ModelFamily } from '../../src/family/model-family.js';
import { VersionFamily } from '../../src/family/version-family.js';
import {
  ModelNotFoundError,
  NonLinearChainError,
  VersionNotFoundError,
} from '../../src/registry/errors.js';
import { NodeRegistry } from '../../src/registry/node-registry.js';
import { ChainResolver } from '../../src/resolver/chain-resolver.js';
import { TreeResolver } from '../../src/resolver/tree-resolver.js';

// Test handlers
class Driver {
  constructor(readonly address: string) {}

  describe(): string {
    return `generic@${this.address}`;
  }
}

class DriverV11 extends Driver {
  describe(): string {
    return `v1.1@${this.address}`;
  }
}

class DriverV20 extends DriverV11 {
  describe(): string {
    return `v2.0@${this.address}`;
  }
}

class PhoneDriver extends Driver {}
class IPhoneDriver extends PhoneDriver {}
class IPhone7Driver extends IPhoneDriver {}

describe('Resolution flow', () => {
  let emitter: ResolutionEventEmitter;
  let registry: NodeRegistry;
  let completed: ResolutionCompletedPayload[];

  beforeEach(() => {
    emitter = new ResolutionEventEmitter();
    registry = new NodeRegistry({ emitter, chainValidation: 'eager' });
    completed = [];
    emitter.on('resolution.completed', (payload) => {
      completed.push(payload);
    });
  });

  test('resolves versions and models declared side by side', () => {
    const drivers = new VersionFamily('driver', '1.0', Driver, { registry })
      .extend('1.1', DriverV11)
      .extend('2.0', DriverV20);
    const phones = new ModelFamily('phones', 'Phone', PhoneDriver, { registry })
      .add('iPhone', IPhoneDriver)
      .add('iPhone7', IPhone7Driver, { parent: 'iPhone' });
    registry.seal();

    expect(drivers.create('1.5', 'usb0').describe()).toBe('v1.1@usb0');
    expect(drivers.create('9.0', 'usb1').describe()).toBe('v2.0@usb1');
    expect(phones.create('iPhone7', 'usb2')).toBeInstanceOf(IPhone7Driver);

    // The first entry is the parent lookup made while declaring iPhone7
    expect(completed.map((payload) => [payload.hierarchy, payload.resolvedTag])).toEqual([
      ['phones', 'iPhone'],
      ['driver', '1.1'],
      ['driver', '2.0'],
      ['phones', 'iPhone7'],
    ]);
  });

  test('lets callers branch on the failure type', () => {
    const drivers = new VersionFamily('driver', '1.0', Driver, { registry }).extend(
      '2.0',
      DriverV20
    );
    registry.seal();

    const pick = (version: string): Driver => {
      try {
        return drivers.create(version, 'usb0');
      } catch (error) {
        if (error instanceof VersionNotFoundError) {
          return new Driver('usb0');
        }
        throw error;
      }
    };

    expect(pick('0.1').describe()).toBe('generic@usb0');
    expect(pick('2.1').describe()).toBe('v2.0@usb0');
  });

  test('keeps the registry free of rejected declarations', () => {
    const root = registry.register('1.0', undefined, { hierarchy: 'fw', topology: 'chain' });
    const v11 = registry.register('1.1', root);
    registry.register('2.0', v11);

    expect(() => registry.register('2.0-alt', v11)).toThrow(NonLinearChainError);
    registry.seal();

    const chain = new ChainResolver(registry);
    expect(registry.tagOf(chain.findVersion(root, '2.0'))).toBe('2.0');
    expect(registry.tagOf(chain.findPreviousVersion(chain.findVersion(root, '2.0')))).toBe('1.1');
  });

  test('searches models across registries independently', () => {
    const other = new NodeRegistry();
    const otherRoot = other.register('Phone');
    other.register('Galaxy', otherRoot);

    const root = registry.register('Phone');
    registry.register('Pixel', root);

    expect(() => new TreeResolver(registry).findModel(root, 'Galaxy')).toThrow(
      ModelNotFoundError
    );
    expect(other.tagOf(new TreeResolver(other).findModel(otherRoot, 'Galaxy'))).toBe('Galaxy');
  });
});
