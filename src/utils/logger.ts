/**
 * Structured logger.
 *
 * Thin wrapper over pino that keeps the `logger.info(message, context)`
 * call shape used throughout the codebase. Output goes to stderr so that
 * command output on stdout stays machine-readable.
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const LOG_LEVEL_NAMES: ReadonlySet<string> = new Set(LOG_LEVELS);

export type LogContext = Record<string, unknown>;

export interface LoggerConfig {
  level?: LogLevel;
  /** Destination stream; defaults to stderr */
  destination?: pino.DestinationStream;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVEL_NAMES.has(value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.MIC_BRIDGE_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

export class Logger {
  constructor(private readonly target: pino.Logger) {}

  get level(): string {
    return this.target.level;
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.write('fatal', message, context);
  }

  /**
   * Derive a logger for a sub-component. The component name is appended to
   * the parent's, e.g. `device.connection`.
   */
  child(component: string, bindings: LogContext = {}): Logger {
    const parent = this.target.bindings().component;
    const name = typeof parent === 'string' ? `${parent}.${component}` : component;
    return new Logger(this.target.child({ ...bindings, component: name }));
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (context) {
      this.target[level](context, message);
    } else {
      this.target[level](message);
    }
  }
}

export function createLogger(component: string, config: LoggerConfig = {}): Logger {
  const target = pino(
    {
      level: config.level ?? defaultLevel(),
      base: { component },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    config.destination ?? pino.destination(2)
  );
  return new Logger(target);
}
