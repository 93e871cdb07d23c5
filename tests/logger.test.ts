import { afterEach, describe, expect, it, vi } from 'vitest';
import Logger from '../src/logger.js';
import type { LogContext, LogLevel } from '../src/types/teleinfo-types.js';

interface Captured {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

function capture(logger: Logger): Captured[] {
  const seen: Captured[] = [];
  logger.watch(entry => seen.push(entry));
  return seen;
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('tags category loggers with their name and splits the context argument', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const root = new Logger();
    const seen = capture(root);
    const log = root.createLogger('TeleinfoProtocol');

    log.info('frame decoded', { tag: 'PAPP', frameLength: 100 });

    expect(seen).toEqual([
      {
        level: 'info',
        args: ['frame decoded'],
        context: { tag: 'PAPP', frameLength: 100, logger: 'TeleinfoProtocol' },
      },
    ]);
  });

  it('filters below the global level', () => {
    const root = new Logger();
    const seen = capture(root);
    root.setLevel('warn');
    root.createLogger('A').info('hidden');
    expect(seen).toHaveLength(0);
    expect(root.getLevel()).toBe('warn');
  });

  it('lets a category override the global level', () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    const root = new Logger();
    root.setLevel('error');
    const seen = capture(root);
    const log = root.createLogger('Reader');

    log.setLevel('debug');
    log.debug('visible');
    root.createLogger('Other').debug('hidden');

    expect(seen.map(entry => entry.args[0])).toEqual(['visible']);
  });

  it('pauses and resumes a category', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const root = new Logger();
    const seen = capture(root);
    const log = root.createLogger('Serial');

    log.pause();
    log.warn('dropped');
    log.resume();
    log.warn('kept');

    expect(seen.map(entry => entry.args[0])).toEqual(['kept']);
  });

  it('writes the configured header without colours', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const root = new Logger();
    root.disableColors();
    root.setLogFormat(['level', 'logger', 'tag']);

    root.createLogger('A').warn('hello', { tag: 'ADCO' });

    expect(warn).toHaveBeenCalledWith('[WARN][A][T:ADCO]', 'hello', '');
  });

  it('appends unknown context keys as JSON', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const root = new Logger();
    root.disableColors();
    root.setLogFormat(['level']);

    root.error('failed', { attempt: 2 });

    expect(error).toHaveBeenCalledWith('[ERROR]', 'failed', '{"attempt":2}', '');
  });

  it('uses custom formatters for header fields', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const root = new Logger();
    root.disableColors();
    root.setLogFormat(['mode']);
    root.setCustomFormatter('mode', value => `<${String(value)}>`);

    root.warn('x', { mode: 'legacy' });

    expect(warn).toHaveBeenCalledWith('<legacy>', 'x', '');
  });

  it('counts emitted messages per level', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const root = new Logger();
    root.warn('a');
    root.warn('b');
    root.error('c');
    expect(root.getCounts()).toEqual({ trace: 0, debug: 0, info: 0, warn: 2, error: 1 });
  });

  it('stays silent when disabled', () => {
    const root = new Logger();
    const seen = capture(root);
    root.disable();
    root.error('nothing');
    expect(seen).toHaveLength(0);
    expect(root.isEnabled()).toBe(false);
  });

  it('validates its settings', () => {
    const root = new Logger();
    expect(() => root.setRateLimit(-1)).toThrow('Rate limit must be a non-negative number');
    expect(() => root.setCustomFormatter('timestamp', String)).toThrow(
      'Invalid formatter field: timestamp'
    );
    expect(() => root.createLogger('')).toThrow('Logger name required');
  });
});
