import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  AqmError,
  ConfigurationError,
  InvariantViolationError,
  UnassignedFlowError,
  UnknownPriorityClassError,
  assertNonNegative,
  fromZodError,
} from '../../../src/api/errors.js';

describe('AQM errors', () => {
  it('carries a code and details on every subclass', () => {
    const errors = [
      new ConfigurationError('bad'),
      new UnknownPriorityClassError(9, 'flow-a'),
      new UnassignedFlowError(42),
      new InvariantViolationError('average queue size', -1, 'non-negative'),
    ];

    expect(errors.map((error) => error.code)).toEqual([
      'ConfigurationError',
      'UnknownPriorityClass',
      'UnassignedFlow',
      'InvariantViolation',
    ]);
    for (const error of errors) {
      expect(error).toBeInstanceOf(AqmError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it('serializes to a plain shape', () => {
    expect(new UnassignedFlowError(42).toObject()).toEqual({
      code: 'UnassignedFlow',
      message: 'Flow 42 has no priority assignment',
      details: { flowId: 42 },
    });
  });

  it('names the priority class and flow', () => {
    const error = new UnknownPriorityClassError(9, 'flow-a');

    expect(error.message).toBe('Unknown priority class 9 (assigned to flow flow-a)');
    expect(error.priorityClass).toBe(9);
    expect(new UnknownPriorityClassError(3).message).toBe('Unknown priority class 3');
  });

  it('formats zod issues one per line', () => {
    const schema = z.object({ a: z.number().positive('must be positive'), b: z.string() });
    const result = schema.safeParse({ a: -1, b: 2 });
    if (result.success) {
      throw new Error('expected a validation failure');
    }

    const error = fromZodError(result.error, 'Invalid options');

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.message).toBe('Invalid options:\na must be positive\nb Expected string, received number');
  });

  it('asserts finite non-negative values', () => {
    expect(() => assertNonNegative('x', 0)).not.toThrow();
    expect(() => assertNonNegative('x', Number.POSITIVE_INFINITY)).toThrow(InvariantViolationError);
    expect(() => assertNonNegative('x', -0.5)).toThrow('x must be a finite non-negative number, got -0.5');
  });
});
