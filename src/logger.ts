// src/logger.ts

import type {
  LogContext,
  LogField,
  LoggerInstance,
  LogLevel,
  LogRecord,
} from './types/gauge-types.js';

const LOG_FIELDS: LogField[] = ['timestamp', 'level', 'logger', 'deviceId', 'verb', 'responseTime'];

function isLogContext(value: unknown): value is LogContext {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Error) &&
    !(value instanceof Uint8Array)
  );
}

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
  private logFormat: LogField[] = [...LOG_FIELDS];
  private customFormatters: Partial<Record<LogField, (value: unknown) => string>> = {};
  private filters: { deviceId: Set<number>; verb: Set<string> } = {
    deviceId: new Set(),
    verb: new Set(),
  };
  private watchCallback: ((record: LogRecord) => void) | null = null;
  private logRateLimit: number = 100;
  private lastLogTime: number = 0;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  private formatField(field: LogField, value: unknown, fallback: (v: unknown) => string): string {
    const formatter = this.customFormatters[field] ?? fallback;
    return formatter(value);
  }

  /**
   * Formats a log message according to the level, the configured header fields
   * and the merged context.
   * @param level - Log level
   * @param args - Arguments to be logged
   * @param context - Record context merged over the global context
   * @returns Console arguments
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    for (const field of this.logFormat) {
      switch (field) {
        case 'timestamp':
          headerParts.push(this.formatField(field, this.getTimestamp(), v => `[${String(v)}]`));
          break;
        case 'level':
          headerParts.push(this.formatField(field, level.toUpperCase(), v => `[${String(v)}]`));
          break;
        case 'logger':
          if (merged.logger) {
            headerParts.push(this.formatField(field, merged.logger, v => `[${String(v)}]`));
          }
          break;
        case 'deviceId':
          if (merged.deviceId != null) {
            const id = String(merged.deviceId).padStart(3, '0');
            headerParts.push(this.formatField(field, id, v => `[D:${String(v)}]`));
          }
          break;
        case 'verb':
          if (merged.verb) {
            headerParts.push(this.formatField(field, merged.verb, v => `[V:${String(v)}]`));
          }
          break;
        case 'responseTime':
          if (merged.responseTime != null) {
            headerParts.push(
              this.formatField(field, merged.responseTime, v => `[RT:${String(v)}ms]`)
            );
          }
          break;
      }
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    // Header fields are not repeated in the trailing JSON
    const contextToPrint: LogContext = { ...merged };
    for (const field of LOG_FIELDS) {
      if (this.logFormat.includes(field)) delete contextToPrint[field];
    }
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  private shouldLog(level: LogLevel, context: LogContext): boolean {
    if (!this.enabled) return false;
    const deviceId = context.deviceId ?? this.globalContext.deviceId;
    if (deviceId != null && this.filters.deviceId.has(deviceId)) return false;
    const verb = context.verb ?? this.globalContext.verb;
    if (verb != null && this.filters.verb.has(verb)) return false;

    const categoryLevel = context.logger ? this.categoryLevels[context.logger] : undefined;
    if (categoryLevel === 'none') return false;
    const threshold = categoryLevel ?? this.currentLevel;
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context: { ...this.globalContext, ...context } });
    }

    const now: number = Date.now();
    if (now - this.lastLogTime < this.logRateLimit && level !== 'error' && level !== 'warn') {
      return;
    }
    this.lastLogTime = now;

    console[level](...this.format(level, args, context));
  }

  /**
   * Splits the arguments into the message parts and a trailing context object.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra });
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${String(level)}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${String(level)}`);
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

  setRateLimit(ms: number): void {
    if (!Number.isFinite(ms) || ms < 0) throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => LOG_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${LOG_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  setCustomFormatter(field: LogField, formatter: (value: unknown) => string): void {
    if (!LOG_FIELDS.includes(field)) {
      throw new Error(`Invalid formatter field: ${String(field)}`);
    }
    this.customFormatters[field] = formatter;
  }

  mute({ deviceId, verb }: Partial<LogContext> = {}): void {
    if (deviceId != null) this.filters.deviceId.add(deviceId);
    if (verb != null) this.filters.verb.add(verb);
  }

  unmute({ deviceId, verb }: Partial<LogContext> = {}): void {
    if (deviceId != null) this.filters.deviceId.delete(deviceId);
    if (verb != null) this.filters.verb.delete(verb);
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  /**
   * Creates a logger instance bound to a category.
   * @param name - Category name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

export default Logger;
