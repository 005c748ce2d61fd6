import { type LogLevel, normalizeLogLevel } from './utils.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// Looked up per call so console spies installed later still see the output
function sinkFor(level: LogLevel): (...args: unknown[]) => void {
  switch (level) {
    case 'warn':
      return console.warn;
    case 'error':
      return console.error;
    default:
      return console.log;
  }
}

/**
 * Console logger tagged with a component name, e.g. `[Bridge]` or
 * `[Controller:left]`.
 *
 * The threshold is read from VSHIFT_LOG_LEVEL when the logger is created.
 * `--verbose` sets an override that applies to every logger, including the
 * ones already created.
 */
export class Logger {
  private static levelOverride: LogLevel | null = null;

  private readonly threshold: LogLevel;
  private readonly timestamps: boolean;

  constructor(private readonly prefix: string) {
    this.threshold = normalizeLogLevel(process.env.VSHIFT_LOG_LEVEL);
    this.timestamps = process.env.VSHIFT_LOG_TIMESTAMPS !== 'false';
  }

  static setLevelOverride(level: LogLevel | null): void {
    Logger.levelOverride = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[Logger.levelOverride ?? this.threshold];
  }

  debug(...args: unknown[]): void {
    this.write('debug', args);
  }

  info(...args: unknown[]): void {
    this.write('info', args);
  }

  warn(...args: unknown[]): void {
    this.write('warn', args);
  }

  error(...args: unknown[]): void {
    this.write('error', args);
  }

  private write(level: LogLevel, args: unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }
    sinkFor(level)(this.tag(), ...args);
  }

  private tag(): string {
    if (!this.timestamps) {
      return `[${this.prefix}]`;
    }
    const time = new Date().toISOString().substring(11, 23); // HH:MM:SS.mmm
    return `[${time}] [${this.prefix}]`;
  }
}
