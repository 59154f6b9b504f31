// Système de logs structurés avec niveaux et contexte
import type { LogFormat, LogLevelName } from '../config/env';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4
}

export type LogValue = string | number | boolean | null | undefined | LogValue[] | { [key: string]: LogValue };

export interface LogContext {
  component?: string;
  operation?: string;
  runId?: string;
  listingId?: string;
  [key: string]: LogValue;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context: LogContext;
  error?: Error;
  performance?: {
    durationMs: number;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  colors?: boolean;
  baseContext?: LogContext;
  // 'stderr': tout sur stderr (stdout réservé aux données)
  output?: 'console' | 'stderr';
}

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  fatal: LogLevel.FATAL
};

export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVEL_BY_NAME[name];
}

export class StructuredLogger {
  private logLevel: LogLevel;
  private readonly format: LogFormat;
  private readonly colors: boolean;
  private readonly baseContext: LogContext;
  private readonly output: 'console' | 'stderr';
  private readonly timers: Map<string, number>;

  constructor(options: LoggerOptions = {}, timers: Map<string, number> = new Map()) {
    this.logLevel = options.level ?? LogLevel.INFO;
    this.format = options.format ?? 'pretty';
    this.colors = options.colors ?? this.format === 'pretty';
    this.baseContext = options.baseContext ?? {};
    this.output = options.output ?? 'console';
    this.timers = timers;
  }

  /**
   * Logger enfant partageant niveau, format et chronomètres, avec un contexte fixe
   */
  child(context: LogContext): StructuredLogger {
    return new StructuredLogger(
      {
        level: this.logLevel,
        format: this.format,
        colors: this.colors,
        output: this.output,
        baseContext: { ...this.baseContext, ...context }
      },
      this.timers
    );
  }

  debug(message: string, context: LogContext = {}): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context: LogContext = {}): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  fatal(message: string, error?: Error, context: LogContext = {}): void {
    this.log(LogLevel.FATAL, message, context, error);
  }

  /**
   * Démarrer le chronométrage d'une opération
   */
  startTimer(operation: string): void {
    this.timers.set(operation, Date.now());
  }

  /**
   * Arrêter le chronométrage et log avec la durée; retourne la durée en ms
   */
  endTimer(operation: string, message: string, context: LogContext = {}): number | null {
    const startTime = this.timers.get(operation);
    if (startTime === undefined) {
      return null;
    }

    const durationMs = Date.now() - startTime;
    this.timers.delete(operation);
    this.log(LogLevel.INFO, message, { ...context, operation }, undefined, { durationMs });
    return durationMs;
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.logLevel;
  }

  private log(
    level: LogLevel,
    message: string,
    context: LogContext,
    error?: Error,
    performance?: LogEntry['performance']
  ): void {
    if (level < this.logLevel) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      context: { ...this.baseContext, ...context }
    };

    if (error) {
      entry.error = error;
    }

    if (performance) {
      entry.performance = performance;
    }

    const formatted = this.format === 'json' ? this.formatJson(entry) : this.formatPretty(entry);
    this.writeToConsole(level, formatted);
  }

  private formatPretty(entry: LogEntry): string {
    const { timestamp, level, message, context, error, performance } = entry;

    let formatted = `[${timestamp}] ${level}: ${message}`;

    if (Object.keys(context).length > 0) {
      formatted += ` | Context: ${JSON.stringify(context)}`;
    }

    if (error) {
      formatted += ` | Error: ${error.message}`;
      if (this.logLevel === LogLevel.DEBUG && error.stack) {
        formatted += ` | Stack: ${error.stack}`;
      }
    }

    if (performance) {
      formatted += ` | Duration: ${performance.durationMs}ms`;
    }

    return formatted;
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      context: entry.context,
      error: entry.error ? { name: entry.error.name, message: entry.error.message } : undefined,
      durationMs: entry.performance?.durationMs
    });
  }

  /**
   * Écrire dans la console avec couleurs
   */
  private writeToConsole(level: LogLevel, message: string): void {
    const stream = this.output === 'stderr' || level >= LogLevel.ERROR ? console.error : console.log;

    if (!this.colors) {
      stream(message);
      return;
    }

    const colors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: '\x1b[36m', // Cyan
      [LogLevel.INFO]: '\x1b[32m',  // Green
      [LogLevel.WARN]: '\x1b[33m',  // Yellow
      [LogLevel.ERROR]: '\x1b[31m', // Red
      [LogLevel.FATAL]: '\x1b[35m'  // Magenta
    };

    stream(`${colors[level]}${message}\x1b[0m`);
  }
}

export function createLogger(
  config: { LOG_LEVEL: LogLevelName; LOG_FORMAT: LogFormat },
  output: LoggerOptions['output'] = 'console'
): StructuredLogger {
  const stream = output === 'stderr' ? process.stderr : process.stdout;
  return new StructuredLogger({
    level: parseLogLevel(config.LOG_LEVEL),
    format: config.LOG_FORMAT,
    colors: config.LOG_FORMAT === 'pretty' && Boolean(stream.isTTY),
    output
  });
}
