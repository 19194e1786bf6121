/**
 * VersionFamily tests.
 */

import { afterEach, describe, expect, it } from 'vitest';
import { VersionFamily } from '../../../src/family/version-family.js';
import {
  ChainOrderError,
  DuplicateRootError,
  NoPreviousVersionError,
  RegistrySealedError,
  VersionNotFoundError,
} from '../../../src/registry/errors.js';
import { NodeRegistry } from '../../../src/registry/node-registry.js';

// Test handlers
class ScannerV1 {
  constructor(readonly host: string) {}

  get protocol(): string {
    return 'v1';
  }
}

class ScannerV2 extends ScannerV1 {
  get protocol(): string {
    return 'v2';
  }
}

class ScannerV3 extends ScannerV2 {
  get protocol(): string {
    return 'v3';
  }
}

function scanners(registry: NodeRegistry, fallbackToBase = false) {
  return new VersionFamily('scanner', '1.0', ScannerV1, { registry, fallbackToBase })
    .extend('2.0', ScannerV2)
    .extend('3.0', ScannerV3);
}

describe('VersionFamily', () => {
  afterEach(() => {
    NodeRegistry.resetInstance();
  });

  describe('resolve', () => {
    it('returns the base for its own version', () => {
      expect(scanners(new NodeRegistry()).resolve('1.0')).toBe(ScannerV1);
    });

    it('returns a middle version', () => {
      expect(scanners(new NodeRegistry()).resolve('2.0')).toBe(ScannerV2);
    });

    it('returns the newest version for an unseen newer one', () => {
      expect(scanners(new NodeRegistry()).resolve('4.0')).toBe(ScannerV3);
    });

    it('returns the closest older version between releases', () => {
      expect(scanners(new NodeRegistry()).resolve('2.7.1')).toBe(ScannerV2);
    });

    it('throws VersionNotFoundError before the base', () => {
      expect(() => scanners(new NodeRegistry()).resolve('0.9')).toThrow(VersionNotFoundError);
    });

    it('returns the base before the base with fallbackToBase', () => {
      expect(scanners(new NodeRegistry(), true).resolve('0.9')).toBe(ScannerV1);
    });
  });

  describe('create', () => {
    it('instantiates the resolved class with arguments', () => {
      const scanner = scanners(new NodeRegistry()).create('2.5', 'scanner.local');

      expect(scanner).toBeInstanceOf(ScannerV2);
      expect(scanner.host).toBe('scanner.local');
      expect(scanner.protocol).toBe('v2');
    });
  });

  describe('previous', () => {
    it('returns the class before the one serving a version', () => {
      expect(scanners(new NodeRegistry()).previous('3.0')).toBe(ScannerV2);
      expect(scanners(new NodeRegistry()).previous('2.2')).toBe(ScannerV1);
    });

    it('throws NoPreviousVersionError for the base', () => {
      expect(() => scanners(new NodeRegistry()).previous('1.0')).toThrow(NoPreviousVersionError);
    });
  });

  describe('declaration', () => {
    it('lists versions oldest first', () => {
      expect(scanners(new NodeRegistry()).versions()).toEqual(['1.0', '2.0', '3.0']);
    });

    it('registers a chain hierarchy named after the family', () => {
      const registry = new NodeRegistry();
      scanners(registry);
      const root = registry.rootOf('scanner');

      expect(root).toBeDefined();
      if (root) {
        expect(registry.node(root).topology).toBe('chain');
        expect(registry.payloadOf(root)).toBe(ScannerV1);
      }
    });

    it('rejects an out-of-order extension', () => {
      const family = scanners(new NodeRegistry());

      expect(() => family.extend('2.5', ScannerV2)).toThrow(ChainOrderError);
    });

    it('rejects a second family with the same name', () => {
      const registry = new NodeRegistry();
      scanners(registry);

      expect(() => new VersionFamily('scanner', '5.0', ScannerV3, { registry })).toThrow(
        DuplicateRootError
      );
    });

    it('rejects extension after the registry is sealed', () => {
      const registry = new NodeRegistry();
      const family = scanners(registry);
      registry.seal();

      expect(() => family.extend('4.0', ScannerV3)).toThrow(RegistrySealedError);
      expect(family.resolve('4.0')).toBe(ScannerV3);
    });

    it('declares into the process-wide registry by default', () => {
      new VersionFamily('printer', 1, ScannerV1);

      expect(NodeRegistry.instance().rootOf('printer')).toBeDefined();
    });
  });
});
