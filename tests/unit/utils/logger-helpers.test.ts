import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { createLogger, lazyLog } from '../../../src/utils/logger-helpers.js';

describe('Logger Helpers', () => {
  it('creates a logger at the requested level', () => {
    expect(createLogger({ level: 'silent' }).level).toBe('silent');
    expect(createLogger().level).toBe('info');
  });

  it('does not build context when the level is disabled', () => {
    const builder = vi.fn(() => ({ flowId: 'a' }));

    lazyLog(createLogger({ level: 'info' }), 'debug', builder, 'skipped');
    lazyLog(undefined, 'error', builder, 'skipped');

    expect(builder).not.toHaveBeenCalled();
  });

  it('writes the built context when the level is enabled', () => {
    const lines: string[] = [];
    const logger = pino({ level: 'debug', base: null, timestamp: false }, { write: (line: string) => lines.push(line) });

    lazyLog(logger, 'debug', () => ({ flowId: 'a', verdict: 'forced_drop' }), 'Packet dropped');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toEqual({
      level: 20,
      flowId: 'a',
      verdict: 'forced_drop',
      msg: 'Packet dropped',
    });
  });
});
