import { config } from "../config";

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export type LogMeta = Record<string, unknown>;

export type DecisionPrimitive = "pattern" | "condition";

export class Logger {
  private level: LogLevel;
  private jsonFormat: boolean;

  constructor(level: string, jsonFormat: boolean) {
    this.level = this.parseLogLevel(level);
    this.jsonFormat = jsonFormat;
  }

  private parseLogLevel(level: string): LogLevel {
    switch (level.toLowerCase()) {
      case "error":
        return LogLevel.ERROR;
      case "warn":
        return LogLevel.WARN;
      case "info":
        return LogLevel.INFO;
      case "debug":
        return LogLevel.DEBUG;
      default:
        return LogLevel.INFO;
    }
  }

  setLevel(level: string): void {
    this.level = this.parseLogLevel(level);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level <= this.level;
  }

  private formatMessage(level: string, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString();
    if (this.jsonFormat) {
      return JSON.stringify({ timestamp, level, message, ...meta });
    }
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${timestamp}] ${level}: ${message}${metaStr}`;
  }

  error(message: string, meta?: LogMeta): void {
    if (this.isLevelEnabled(LogLevel.ERROR)) {
      console.error(this.formatMessage("ERROR", message, meta));
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.isLevelEnabled(LogLevel.WARN)) {
      console.warn(this.formatMessage("WARN", message, meta));
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.isLevelEnabled(LogLevel.INFO)) {
      console.info(this.formatMessage("INFO", message, meta));
    }
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.debug(this.formatMessage("DEBUG", message, meta));
    }
  }

  // Outcomes go out at debug only
  logDecision(
    primitive: DecisionPrimitive,
    outcome: boolean,
    details?: LogMeta,
  ): void {
    this.debug("Decision primitive evaluated", {
      primitive,
      outcome,
      ...details,
    });
  }
}

export const logger = new Logger(config.logLevel, config.jsonLogFormat);
