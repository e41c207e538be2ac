/**
 * Logger Helpers
 *
 * Per-packet logging sits on the hottest path of the simulator, so context
 * objects are only built when the level is enabled.
 */

import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

export interface CreateLoggerOptions {
  level?: LevelWithSilent;
  /** Bound as `component` on every line */
  component?: string;
}

/**
 * Create a pino logger bound to a component name.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino({
    name: 'wred-aqm',
    level: options.level ?? 'info',
    base: { component: options.component ?? 'wred' },
  });
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param level - Log level (trace, debug, info, warn, error, fatal)
 * @param contextBuilder - Function that builds the context object (only called if logging)
 * @param message - Log message string
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ flowId, average }), 'Packet dropped');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
