import { appendFileSync } from 'fs';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
  correlationId?: string;
  component?: string;
  operation?: string;
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile?: boolean;
  filePath?: string;
  enableStructuredLogging?: boolean;
  serviceName?: string;
  environment?: string;
}

export interface LogOptions {
  component?: string;
  operation?: string;
  duration?: number;
  error?: Error;
}

/** Amounts and felts are bigints; JSON carries them as decimal strings. */
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

/** Configuration and buffer shared by a root logger and all of its children. */
interface SharedState {
  config: LoggerConfig;
  logBuffer: LogEntry[];
}

export class Logger {
  private static instance: Logger | undefined;

  private constructor(
    private readonly shared: SharedState,
    private readonly component?: string,
    private readonly correlationId?: string
  ) {}

  private get config(): LoggerConfig {
    return this.shared.config;
  }

  private get logBuffer(): LogEntry[] {
    return this.shared.logBuffer;
  }

  public static getInstance(config?: LoggerConfig): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger({
        config: {
          enableStructuredLogging: true,
          serviceName: 'inheritance-vault-sdk',
          environment: process.env.NODE_ENV || 'development',
          ...(config || { level: LogLevel.INFO, enableConsole: true })
        },
        logBuffer: []
      });
    }
    return Logger.instance;
  }

  public static resetInstance(): void {
    Logger.instance = undefined;
  }

  public static parseLevel(value: string): LogLevel | undefined {
    const upper = value.toUpperCase();
    return Object.values(LogLevel).find(level => level === upper);
  }

  /** Applies to this logger's root and every child derived from it. */
  public setConfig(config: Partial<LoggerConfig>): void {
    this.shared.config = { ...this.shared.config, ...config };
  }

  public getConfig(): LoggerConfig {
    return { ...this.config };
  }

  private formatLogEntry(entry: LogEntry): string {
    if (this.config.enableStructuredLogging) {
      return JSON.stringify({
        timestamp: entry.timestamp,
        level: entry.level,
        message: entry.message,
        correlationId: entry.correlationId,
        component: entry.component,
        operation: entry.operation,
        duration: entry.duration,
        service: this.config.serviceName,
        environment: this.config.environment,
        data: entry.data,
        error: entry.error
      }, jsonReplacer);
    }

    return `[${entry.timestamp}] ${entry.level}: ${entry.message}${
      entry.data ? `\nData: ${JSON.stringify(entry.data, jsonReplacer, 2)}` : ''
    }`;
  }

  private writeToFile(entry: LogEntry): void {
    if (!this.config.enableFile || !this.config.filePath) {
      return;
    }

    try {
      appendFileSync(this.config.filePath, this.formatLogEntry(entry) + '\n', 'utf8');
    } catch (error) {
      console.error('Failed to write log to file:', error);
    }
  }

  public log(level: LogLevel, message: string, data?: unknown, options?: LogOptions): void {
    if (LEVEL_VALUES[level] < LEVEL_VALUES[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      data,
      correlationId: this.correlationId,
      component: options?.component ?? this.component,
      operation: options?.operation,
      duration: options?.duration,
      error: options?.error ? {
        name: options.error.name,
        message: options.error.message,
        stack: options.error.stack,
        code: 'code' in options.error && typeof options.error.code === 'string'
          ? options.error.code
          : undefined
      } : undefined
    };

    this.logBuffer.push(entry);

    if (this.config.enableConsole) {
      const formattedMessage = this.formatLogEntry(entry);
      switch (level) {
        case LogLevel.DEBUG:
          console.debug(formattedMessage);
          break;
        case LogLevel.INFO:
          console.info(formattedMessage);
          break;
        case LogLevel.WARN:
          console.warn(formattedMessage);
          break;
        case LogLevel.ERROR:
          console.error(formattedMessage);
          break;
      }
    }

    this.writeToFile(entry);
  }

  public debug(message: string, data?: unknown, options?: LogOptions): void {
    this.log(LogLevel.DEBUG, message, data, options);
  }

  public info(message: string, data?: unknown, options?: LogOptions): void {
    this.log(LogLevel.INFO, message, data, options);
  }

  public warn(message: string, data?: unknown, options?: LogOptions): void {
    this.log(LogLevel.WARN, message, data, options);
  }

  public error(message: string, data?: unknown, options?: LogOptions): void {
    this.log(LogLevel.ERROR, message, data, options);
  }

  // Performance logging
  public time(operation: string, component?: string): () => number {
    const startTime = Date.now();
    return () => {
      const duration = Date.now() - startTime;
      this.info(`Operation completed: ${operation}`, { duration }, { component, operation, duration });
      return duration;
    };
  }

  public getLogs(): LogEntry[] {
    return [...this.logBuffer];
  }

  public clearLogs(): void {
    this.logBuffer.length = 0;
  }

  /**
   * Creates a logger that stamps every entry with `component`. The child shares
   * its parent's configuration and log buffer.
   */
  public child(options: { component?: string; correlationId?: string }): Logger {
    return new Logger(
      this.shared,
      options.component ?? this.component,
      options.correlationId ?? this.correlationId
    );
  }
}
