/**
 * Error hierarchy tests.
 */

import { describe, expect, it } from 'vitest';
import {
  AmbiguousChainError,
  ChainOrderError,
  DuplicateRootError,
  InvalidTagError,
  ModelNotFoundError,
  NonLinearChainError,
  NoPreviousVersionError,
  RegistrationError,
  RegistrySealedError,
  ResolutionError,
  VersionNotFoundError,
} from '../../../src/registry/errors.js';

describe('errors', () => {
  it('registration errors share a base', () => {
    const errors = [
      new DuplicateRootError('firmware'),
      new NonLinearChainError('firmware', '1.1', '2.0', '2.0-alt'),
      new ChainOrderError('firmware', '2.0', '1.0'),
      new RegistrySealedError('3.0'),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(RegistrationError);
      expect(error).toBeInstanceOf(ResolutionError);
    }
  });

  it('lookup errors are not registration errors', () => {
    const errors = [
      new VersionNotFoundError('firmware', '0.5', 'too old'),
      new NoPreviousVersionError('firmware', '1.0'),
      new ModelNotFoundError('devices', 'Galaxy', 'Phone'),
      new AmbiguousChainError('firmware', '2.0', 2),
      new InvalidTagError(Number.NaN, 'Tag must be a finite number, got NaN'),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(ResolutionError);
      expect(error).not.toBeInstanceOf(RegistrationError);
    }
  });

  it('sets the error name', () => {
    expect(new VersionNotFoundError('firmware', '0.5', 'too old').name).toBe(
      'VersionNotFoundError'
    );
    expect(new DuplicateRootError('firmware').name).toBe('DuplicateRootError');
  });

  it('formats NonLinearChainError', () => {
    expect(new NonLinearChainError('firmware', '1.1', '2.0', '2.0-alt').message).toBe(
      "Chain 'firmware' node '1.1' already continues with '2.0'; cannot add '2.0-alt'"
    );
  });

  it('keeps query fields on lookup errors', () => {
    const error = new ModelNotFoundError('devices', 'Galaxy', 'Phone');

    expect(error.hierarchy).toBe('devices');
    expect(error.model).toBe('Galaxy');
    expect(error.searchedFrom).toBe('Phone');
  });
});
