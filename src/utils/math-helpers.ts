/**
 * Math Helper Utilities
 *
 * Numeric helpers used by the RED probability computation.
 */

/**
 * Clamp a value into [min, max]
 *
 * @example
 * ```typescript
 * clamp(1.4, 0, 1)    // => 1
 * clamp(-0.2, 0, 1)   // => 0
 * clamp(0.3, 0, 1)    // => 0.3
 * ```
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Fraction of the old average kept by one EWMA step: 1 - 2^-n
 */
export function retentionFactor(weightFactor: number): number {
  return 1 - Math.pow(2, -weightFactor);
}
