/**
 * Zod schema exports for wred-aqm configuration validation
 *
 * @example
 * ```typescript
 * import { RuntimeConfigSchema } from 'wred-aqm';
 *
 * const result = RuntimeConfigSchema.safeParse(yaml.load(text));
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Config schemas
export * from './config.js';
