import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import {
  DecryptionFailureError,
  errnoCode,
  KeyNotFoundError,
  SealringError,
  toFailure
} from '../../src/lib/errors.js';

describe('Errors', () => {
  it('should carry a code and structured details', () => {
    const error = new KeyNotFoundError('ABCD', true);

    expect(error).toBeInstanceOf(SealringError);
    expect(error.code).toBe('KeyNotFound');
    expect(error.name).toBe('KeyNotFound');
    expect(error.message).toBe('Private key not found: ABCD');
    expect(error.details).toEqual({ fingerprint: 'ABCD', secret: true });
  });

  describe('toFailure', () => {
    it('should convert engine errors', () => {
      expect(toFailure(new DecryptionFailureError('nope', { attempted: 2 }))).toEqual({
        success: false,
        code: 'DecryptionFailure',
        error: 'nope',
        details: { attempted: 2 }
      });
    });

    it('should omit details when there are none', () => {
      expect(toFailure(new DecryptionFailureError('nope'))).toEqual({
        success: false,
        code: 'DecryptionFailure',
        error: 'nope'
      });
    });

    it('should convert validation errors', () => {
      const result = z.object({ name: z.string() }).safeParse({ name: 1 });
      if (result.success) {
        throw new Error('expected validation to fail');
      }

      expect(toFailure(result.error)).toEqual({
        success: false,
        code: 'InvalidArgument',
        error: 'name: Expected string, received number'
      });
    });

    it('should treat anything else as an internal error', () => {
      expect(toFailure(new Error('unexpected'))).toEqual({
        success: false,
        code: 'InternalError',
        error: 'unexpected'
      });
      expect(toFailure('plain string')).toEqual({
        success: false,
        code: 'InternalError',
        error: 'plain string'
      });
    });
  });

  describe('errnoCode', () => {
    it('should read the code of system errors', () => {
      const error = Object.assign(new Error('missing'), { code: 'ENOENT' });
      expect(errnoCode(error)).toBe('ENOENT');
    });

    it('should return undefined for other values', () => {
      expect(errnoCode(new Error('plain'))).toBeUndefined();
      expect(errnoCode('ENOENT')).toBeUndefined();
    });
  });
});
