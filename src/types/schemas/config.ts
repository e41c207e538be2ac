/**
 * Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml and the options handed directly
 * to the WRED constructors. Both paths share the same primitives so they
 * reject the same inputs.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import {
  DropProbability,
  LogLevelSchema,
  NonNegativeInteger,
  PositiveInteger,
  PositiveNumber,
  QueueUnitSchema,
  ThresholdPercent,
} from './common.js';

/**
 * WRED Policy Configuration
 */
export const WredConfigSchema = z.object({
  num_priorities: PositiveInteger,
  max_threshold: ThresholdPercent.int('Max threshold must be an integer percentage'),
  max_probability: DropProbability,
  weight_factor: PositiveInteger.optional(),
});

/**
 * Output Port Configuration
 */
export const PortConfigSchema = z.object({
  unit: QueueUnitSchema,
  queue_limit: PositiveInteger,
  small_packet_time: PositiveNumber,
});

/**
 * Priority assignment: flow id -> priority class
 */
export const PrioritiesSchema = z.record(z.string(), NonNegativeInteger, {
  invalid_type_error: 'Priorities must be a mapping of flow id to priority class',
});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

/**
 * Complete Runtime Configuration
 */
export const RuntimeConfigSchema = z.object({
  wred: WredConfigSchema,
  port: PortConfigSchema,
  priorities: PrioritiesSchema,
  random_seed: z.number().int().optional(),
  logging: LoggingConfigSchema,
});

/**
 * Options accepted by WredLayer/WredPort constructors (camelCase)
 */
export const WredOptionsSchema = z.object({
  numPriorities: PositiveInteger,
  maxThreshold: ThresholdPercent.int('Max threshold must be an integer percentage'),
  maxProbability: DropProbability,
  weightFactor: PositiveInteger,
  smallPacketTime: PositiveNumber,
});

export type RuntimeConfigInput = z.input<typeof RuntimeConfigSchema>;
export type WredOptionsInput = z.input<typeof WredOptionsSchema>;
