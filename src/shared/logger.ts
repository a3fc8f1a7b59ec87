/**
 * Structured Logger
 * =================
 * Consistent logging across the application
 */

import { getLogLevel, type LogLevel } from "./config.js";

type Level = Exclude<LogLevel, "silent">;

export type LogContext = Record<string, unknown>;

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export class Logger {
  constructor(private readonly fixedLevel?: LogLevel) {}

  private enabled(level: Level): boolean {
    const threshold = this.fixedLevel ?? getLogLevel();
    return RANK[level] >= RANK[threshold];
  }

  private formatMessage(level: Level, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : "";
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  info(message: string, context?: LogContext) {
    if (!this.enabled("info")) {return;}
    console.log(this.formatMessage("info", message, context));
  }

  warn(message: string, context?: LogContext) {
    if (!this.enabled("warn")) {return;}
    console.warn(this.formatMessage("warn", message, context));
  }

  error(message: string, error?: Error | LogContext) {
    if (!this.enabled("error")) {return;}
    if (error instanceof Error) {
      console.error(
        this.formatMessage("error", message, {
          error: error.message,
          stack: error.stack,
        })
      );
    } else {
      console.error(this.formatMessage("error", message, error));
    }
  }

  debug(message: string, context?: LogContext) {
    if (!this.enabled("debug")) {return;}
    console.log(this.formatMessage("debug", message, context));
  }
}

export const logger = new Logger();
