/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import type { Logger } from 'pino';
import type { z } from 'zod';
import { ConfigurationError, UnknownPriorityClassError, fromZodError } from '../api/errors.js';
import { RuntimeConfigSchema } from '../types/schemas/config.js';
import type { Clock, FlowId, RandomSource } from '../types/index.js';
import { createLogger } from '../utils/logger-helpers.js';
import { createRandomSource } from '../utils/random.js';
import { defaultWeightFactor } from './defaults.js';

/**
 * Validated configuration (matches runtime.yaml structure, minus `environments`)
 */
export type Config = z.output<typeof RuntimeConfigSchema>;

export type Environment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  // Walk up until we find package.json or reach root
  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Read a YAML file and apply the overrides of one environment.
 *
 * Returns the raw merged document; `validateConfig` types it.
 */
export function readConfigFile(configPath?: string, environment?: Environment): PlainObject {
  const finalPath = configPath ?? join(findPackageRoot(), 'config', 'runtime.yaml');

  let document: unknown;
  try {
    document = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${finalPath}`, { path: finalPath });
    }
    throw new ConfigurationError(`Failed to load configuration: ${String(error)}`, { path: finalPath });
  }

  if (!isPlainObject(document)) {
    throw new ConfigurationError(`Configuration file must contain a mapping: ${finalPath}`, { path: finalPath });
  }

  const env = environment ?? process.env.NODE_ENV ?? 'development';
  const { environments, ...base } = document;

  let merged: PlainObject = base;
  if (isPlainObject(environments)) {
    const overrides = environments[env === 'production' || env === 'test' ? env : 'development'];
    if (isPlainObject(overrides)) {
      merged = deepMerge(base, overrides);
    }
  }

  return merged;
}

/**
 * Validate configuration values.
 *
 * Shape errors surface as ConfigurationError; an assignment naming a class
 * beyond `num_priorities` surfaces as UnknownPriorityClassError, the same
 * error a WredLayer raises for it.
 */
export function validateConfig(config: unknown): Config {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    throw fromZodError(parseResult.error);
  }

  const { wred, priorities } = parseResult.data;
  for (const [flowId, priorityClass] of Object.entries(priorities)) {
    if (priorityClass >= wred.num_priorities) {
      throw new UnknownPriorityClassError(priorityClass, parseFlowId(flowId));
    }
  }

  return parseResult.data;
}

/**
 * Load and validate configuration from YAML
 */
export function loadConfig(configPath?: string, environment?: Environment): Config {
  return validateConfig(readConfigFile(configPath, environment));
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): Config {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): Config {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Runtime collaborators that configuration files cannot express.
 */
export interface PortDependencies {
  now: Clock;
  /** Defaults to a pino logger at `logging.level` */
  logger?: Logger;
  /** Overrides `random_seed` */
  random?: RandomSource;
}

/**
 * Options for a WRED port, derived from YAML config (snake_case) plus
 * runtime dependencies.
 */
export interface WredPortOptions {
  unit: Config['port']['unit'];
  queueLimit: number;
  smallPacketTime: number;
  numPriorities: number;
  maxThreshold: number;
  maxProbability: number;
  weightFactor: number;
  priorities: Map<FlowId, number>;
  now: Clock;
  random?: RandomSource;
  logger?: Logger;
}

/**
 * Flow ids written as integers in YAML keys become numbers again.
 */
export function parseFlowId(key: string): FlowId {
  return /^(0|[1-9]\d*)$/.test(key) ? Number(key) : key;
}

/**
 * Convert YAML config (snake_case) to WredPort options (camelCase)
 */
export function toWredPortOptions(config: Config, dependencies: PortDependencies): WredPortOptions {
  const priorities = new Map<FlowId, number>();
  for (const [flowId, priorityClass] of Object.entries(config.priorities)) {
    priorities.set(parseFlowId(flowId), priorityClass);
  }

  return {
    unit: config.port.unit,
    queueLimit: config.port.queue_limit,
    smallPacketTime: config.port.small_packet_time,
    numPriorities: config.wred.num_priorities,
    maxThreshold: config.wred.max_threshold,
    maxProbability: config.wred.max_probability,
    weightFactor: config.wred.weight_factor ?? defaultWeightFactor(config.port.unit),
    priorities,
    now: dependencies.now,
    random:
      dependencies.random ??
      (config.random_seed === undefined ? undefined : createRandomSource(config.random_seed)),
    logger: dependencies.logger ?? createLogger({ level: config.logging.level, component: 'wred-port' }),
  };
}
