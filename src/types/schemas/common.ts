/**
 * Common Zod schema primitives for wred-aqm
 */

import { z } from 'zod';

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative');

/**
 * Positive finite number validator
 */
export const PositiveNumber = z.number().finite('Must be finite').positive('Must be positive');

/**
 * Threshold percentage of the queue limit (0-100)
 */
export const ThresholdPercent = z
  .number()
  .min(0, 'Threshold must be at least 0')
  .max(100, 'Threshold cannot exceed 100');

/**
 * Maximum drop probability, (0, 1]
 */
export const DropProbability = z
  .number()
  .gt(0, 'Max probability must be greater than 0')
  .max(1, 'Max probability cannot exceed 1');

/**
 * Queue unit enum
 */
export const QueueUnitSchema = z.enum(['packets', 'bytes'], {
  errorMap: () => ({ message: 'Unit must be either packets or bytes' }),
});

/**
 * Log level enum (pino levels plus silent)
 */
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
