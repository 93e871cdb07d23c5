// src/logger.ts

import type {
  LogContext,
  LogFormatField,
  LoggerInstance,
  LogLevel,
} from './types/teleinfo-types.js';

type WatchCallback = (data: { level: LogLevel; args: unknown[]; context: LogContext }) => void;

const FORMAT_FIELDS: readonly LogFormatField[] = [
  'timestamp',
  'level',
  'logger',
  'mode',
  'tag',
  'frameLength',
  'bytes',
  'responseTime',
];

const CONTEXT_FIELDS: readonly string[] = ['logger', 'mode', 'tag', 'frameLength', 'bytes', 'responseTime'];

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogFormatField[] = ['timestamp', 'level', 'logger', 'mode', 'tag'];
  private customFormatters: Partial<Record<LogFormatField, (value: unknown) => string>> = {};
  private watchCallback: WatchCallback | null = null;
  private logRateLimit: number = 100;
  private lastLogTime: number = 0;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  private formatField(field: LogFormatField, value: unknown, fallback: (v: unknown) => string): string {
    const formatter = this.customFormatters[field] ?? fallback;
    return formatter(value);
  }

  /**
   * Formats a log message according to the specified level and context.
   * @returns header, arguments and colour reset, ready for `console[level]`
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && merged.logger) {
      headerParts.push(this.formatField('logger', merged.logger, v => `[${String(v)}]`));
    }
    if (this.logFormat.includes('mode') && merged.mode) {
      headerParts.push(this.formatField('mode', merged.mode, v => `[M:${String(v)}]`));
    }
    if (this.logFormat.includes('tag') && merged.tag) {
      headerParts.push(this.formatField('tag', merged.tag, v => `[T:${String(v)}]`));
    }
    if (this.logFormat.includes('frameLength') && merged.frameLength != null) {
      headerParts.push(this.formatField('frameLength', merged.frameLength, v => `[L:${String(v)}]`));
    }
    if (this.logFormat.includes('bytes') && merged.bytes != null) {
      headerParts.push(this.formatField('bytes', merged.bytes, v => `[B:${String(v)}]`));
    }
    if (this.logFormat.includes('responseTime') && merged.responseTime != null) {
      headerParts.push(
        this.formatField('responseTime', merged.responseTime, v => `[RT:${String(v)}ms]`)
      );
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(context)) {
      if (!CONTEXT_FIELDS.includes(key)) extra[key] = value;
    }
    if (Object.keys(extra).length > 0) {
      formattedArgs.push(JSON.stringify(extra));
    }

    return [`${color}${headerParts.join('')}`, ...formattedArgs, reset];
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    const category = context.logger;
    if (category !== undefined && category in this.categoryLevels) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none' || categoryLevel === undefined) return false;
      return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext, immediate: boolean = false): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const now: number = Date.now();
    if (
      !immediate &&
      now - this.lastLogTime < this.logRateLimit &&
      level !== 'error' &&
      level !== 'warn'
    )
      return;
    this.lastLogTime = now;

    console[level](...this.format(level, args, context));
  }

  /**
   * Splits the arguments into the message parts and a trailing context object.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (typeof lastArg === 'object' && lastArg !== null && !(lastArg instanceof Error)) {
        return { args: args.slice(0, -1), context: { ...lastArg } };
      }
    }
    return { args, context: {} };
  }

  trace(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('trace', split.args, split.context);
  }

  debug(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('debug', split.args, split.context);
  }

  info(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('info', split.args, split.context);
  }

  warn(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('warn', split.args, split.context, true);
  }

  error(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('error', split.args, split.context, true);
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setTransportType(type: string): void {
    this.globalContext.transport = type;
  }

  setRateLimit(ms: number): void {
    if (ms < 0) throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  setLogFormat(fields: LogFormatField[]): void {
    if (!fields.every(f => FORMAT_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${FORMAT_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  setCustomFormatter(field: LogFormatField, formatter: (value: unknown) => string): void {
    if (field === 'timestamp' || field === 'level') {
      throw new Error(`Invalid formatter field: ${field}`);
    }
    this.customFormatters[field] = formatter;
  }

  watch(callback: WatchCallback): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger bound to a category name.
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    const emit = (level: LogLevel, args: unknown[], immediate: boolean): void => {
      const split = this.splitArgsAndContext(args);
      this.output(level, split.args, { ...split.context, logger: name }, immediate);
    };
    return {
      trace: (...args: unknown[]) => emit('trace', args, false),
      debug: (...args: unknown[]) => emit('debug', args, false),
      info: (...args: unknown[]) => emit('info', args, false),
      warn: (...args: unknown[]) => emit('warn', args, true),
      error: (...args: unknown[]) => emit('error', args, true),
      setLevel: (lvl: LogLevel | 'none') => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

/** Logger shared by every module of the library */
export const rootLogger = new Logger();
rootLogger.setLevel('warn');

export default Logger;
