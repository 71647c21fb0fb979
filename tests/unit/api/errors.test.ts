import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  RouterEnvError,
  createInvalidActionError,
  createNotInitializedError,
  isRouterEnvError,
  zodErrorToRouterEnvError,
} from '@/api/errors.js';

describe('RouterEnvError', () => {
  it('should carry code, message and details', () => {
    const error = new RouterEnvError('UnknownEnvironment', 'No such id', { id: 'x' });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RouterEnvError');
    expect(error.toObject()).toEqual({
      code: 'UnknownEnvironment',
      message: 'No such id',
      details: { id: 'x' },
    });
  });

  it('should match codes in isRouterEnvError', () => {
    const error = createNotInitializedError();
    expect(isRouterEnvError(error)).toBe(true);
    expect(isRouterEnvError(error, 'NotInitialized')).toBe(true);
    expect(isRouterEnvError(error, 'InvalidAction')).toBe(false);
    expect(isRouterEnvError(new Error('plain'))).toBe(false);
    expect(isRouterEnvError('NotInitialized')).toBe(false);
  });

  it('should describe invalid actions', () => {
    const error = createInvalidActionError(7, 5);
    expect(error.code).toBe('InvalidAction');
    expect(error.message).toBe('Invalid action: 7 (expected an integer in [0, 5))');
    expect(error.details).toEqual({ action: 7, tierCount: 5 });
  });

  describe('zodErrorToRouterEnvError', () => {
    const schema = z.object({ budget: z.number().positive('Must be positive'), name: z.string() });

    it('should report the first failing field', () => {
      const result = schema.safeParse({ budget: -1, name: 3 });
      if (result.success) {
        throw new Error('expected a validation failure');
      }

      const error = zodErrorToRouterEnvError(result.error);
      expect(error.code).toBe('InvalidConfig');
      expect(error.message).toBe("Validation error on field 'budget': Must be positive");
      expect(error.details?.field).toBe('budget');
      expect(error.details?.issues).toHaveLength(2);
    });

    it('should use root for top-level failures and accept another code', () => {
      const result = z.number().safeParse('x');
      if (result.success) {
        throw new Error('expected a validation failure');
      }

      const error = zodErrorToRouterEnvError(result.error, 'InvalidArgument');
      expect(error.code).toBe('InvalidArgument');
      expect(error.message).toBe("Validation error on field 'root': Expected number, received string");
    });
  });
});
