/**
 * AQM error utilities.
 *
 * Provides a consistent error type for configuration and runtime faults of
 * the RED/WRED engine. Drop verdicts are never errors; everything here means
 * the surrounding simulation is misconfigured or a numeric invariant broke.
 */

import type { ZodError } from 'zod';
import type { FlowId, PriorityClass } from '../types/index.js';

/**
 * Error codes surfaced to callers.
 */
export type AqmErrorCode =
  | 'ConfigurationError'
  | 'UnknownPriorityClass'
  | 'UnassignedFlow'
  | 'InvariantViolation';

/**
 * Plain error shape for JSON output and structured logs.
 */
export interface AqmErrorShape {
  code: AqmErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base error raised by the AQM core.
 */
export class AqmError extends Error implements AqmErrorShape {
  public readonly code: AqmErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: AqmErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AqmError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON responses/telemetry).
   */
  public toObject(): AqmErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Invalid thresholds, probabilities, weights or priority assignments.
 */
export class ConfigurationError extends AqmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ConfigurationError', message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A priority class that the policy table does not contain.
 */
export class UnknownPriorityClassError extends AqmError {
  public readonly priorityClass: PriorityClass;

  constructor(priorityClass: PriorityClass, flowId?: FlowId) {
    const subject = flowId === undefined ? '' : ` (assigned to flow ${String(flowId)})`;
    super('UnknownPriorityClass', `Unknown priority class ${priorityClass}${subject}`, {
      priorityClass,
      flowId,
    });
    this.name = 'UnknownPriorityClassError';
    this.priorityClass = priorityClass;
  }
}

/**
 * A packet arrived for a flow with no priority assignment.
 */
export class UnassignedFlowError extends AqmError {
  public readonly flowId: FlowId;

  constructor(flowId: FlowId) {
    super('UnassignedFlow', `Flow ${String(flowId)} has no priority assignment`, { flowId });
    this.name = 'UnassignedFlowError';
    this.flowId = flowId;
  }
}

/**
 * A numeric invariant of the estimator or drop decision was broken.
 *
 * Signals a clock or integration bug; never corrected silently.
 */
export class InvariantViolationError extends AqmError {
  constructor(quantity: string, value: number, expectation: string) {
    super('InvariantViolation', `${quantity} must be ${expectation}, got ${value}`, {
      quantity,
      value,
    });
    this.name = 'InvariantViolationError';
  }
}

/**
 * Convert zod issues into a single ConfigurationError.
 *
 * Each issue becomes one `path message` line.
 */
export function fromZodError(error: ZodError, context = 'Configuration validation failed'): ConfigurationError {
  const issues = error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${field} ${issue.message}`;
  });

  return new ConfigurationError(`${context}:\n${issues.join('\n')}`, { issues });
}

/**
 * Fail with InvariantViolationError unless `value` is a finite number >= 0.
 */
export function assertNonNegative(quantity: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvariantViolationError(quantity, value, 'a finite non-negative number');
  }
}
