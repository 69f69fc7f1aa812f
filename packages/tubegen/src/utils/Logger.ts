/**
 * Logging
 *
 * Levelled console logging with per-system counters and a bounded buffer of
 * recent entries. Geometry builders report recoverable input problems
 * (clamped options, material fallbacks) here instead of throwing.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SYSTEM = 4,
}

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  system?: string;
  error?: Error;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  enableConsole: boolean;
  /** Entries kept for getRecentLogs(); the oldest are dropped first */
  maxLogEntries: number;
}

export interface SystemStats {
  errors: number;
  warnings: number;
  messages: number;
}

class LoggerImpl {
  private config: LoggerConfig;
  private logs: LogEntry[] = [];
  private systemStats = new Map<string, SystemStats>();

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      minLevel: LogLevel.INFO,
      enableConsole: true,
      maxLogEntries: 1000,
      ...config,
    };
  }

  public configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  public error(
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  public system(
    systemName: string,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    this.bumpStats(systemName, "messages");
    this.log(
      LogLevel.SYSTEM,
      `[${systemName}] ${message}`,
      context,
      undefined,
      systemName,
    );
  }

  public systemDebug(
    systemName: string,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    this.bumpStats(systemName, "messages");
    this.log(
      LogLevel.DEBUG,
      `[${systemName}] ${message}`,
      context,
      undefined,
      systemName,
    );
  }

  public systemWarn(
    systemName: string,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    this.bumpStats(systemName, "warnings");
    this.log(
      LogLevel.WARN,
      `[${systemName}] ${message}`,
      context,
      undefined,
      systemName,
    );
  }

  public systemError(
    systemName: string,
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): void {
    this.bumpStats(systemName, "errors");
    this.log(
      LogLevel.ERROR,
      `[${systemName}] ${message}`,
      context,
      error,
      systemName,
    );
  }

  private bumpStats(systemName: string, key: keyof SystemStats): void {
    const stats = this.systemStats.get(systemName) ?? {
      errors: 0,
      warnings: 0,
      messages: 0,
    };
    stats[key]++;
    this.systemStats.set(systemName, stats);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
    system?: string,
  ): void {
    if (level < this.config.minLevel) return;

    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      message,
      context,
      error,
      system,
    };

    this.logs.push(entry);
    if (this.logs.length > this.config.maxLogEntries) {
      this.logs.splice(0, this.logs.length - this.config.maxLogEntries);
    }

    if (this.config.enableConsole) {
      this.outputToConsole(entry);
    }
  }

  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    const logMessage = `[${timestamp}] ${entry.message}${contextStr}`;

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      case LogLevel.INFO:
      case LogLevel.SYSTEM:
        console.info(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
        if (entry.error) {
          console.error(logMessage, entry.error);
        } else {
          console.error(logMessage);
        }
        break;
    }
  }

  public getSystemStats(): Map<string, SystemStats> {
    return new Map(this.systemStats);
  }

  public getRecentLogs(count: number = 100): LogEntry[] {
    return this.logs.slice(-count);
  }

  public getSystemLogs(systemName: string, count: number = 100): LogEntry[] {
    return this.logs.filter((log) => log.system === systemName).slice(-count);
  }

  public clearLogs(): void {
    this.logs = [];
    this.systemStats.clear();
  }

  public setLogLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return level >= this.config.minLevel;
  }
}

export const Logger = new LoggerImpl();

export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  system(systemName: string, message: string, context?: Record<string, unknown>): void;
  systemDebug(systemName: string, message: string, context?: Record<string, unknown>): void;
  systemWarn(systemName: string, message: string, context?: Record<string, unknown>): void;
  systemError(
    systemName: string,
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): void;
}
