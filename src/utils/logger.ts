/**
 * Structured logging: colored lines on the console, JSON lines in a file
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import chalk, { type ChalkInstance } from 'chalk';
import { dirname } from 'path';
import type { LogLevel } from '../types';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  critical: 4,
};

const LOG_COLORS: Record<LogLevel, ChalkInstance> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  critical: chalk.magenta.bold,
};

export interface LogContext {
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  file?: string;
  console: boolean;
}

class Logger {
  private config: LoggerConfig;
  private minLevel: number;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.minLevel = LOG_LEVELS[config.level];

    // Ensure log directory exists
    if (config.file) {
      const dir = dirname(config.file);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this.minLevel;
  }

  private formatConsole(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(8);

    let output = `${LOG_COLORS[level](`${timestamp} [${levelStr}]`)} ${message}`;

    if (context && Object.keys(context).length > 0) {
      const contextStr = Object.entries(context)
        .filter(([, v]) => v !== undefined)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(' ');
      output += ` ${chalk.gray(contextStr)}`;
    }

    return output;
  }

  private formatJson(level: LogLevel, message: string, context?: LogContext): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    });
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    // warn and above go to stderr
    if (this.config.console) {
      const line = this.formatConsole(level, message, context);
      if (LOG_LEVELS[level] >= LOG_LEVELS.warn) {
        console.error(line);
      } else {
        console.log(line);
      }
    }

    // File output (JSON lines)
    if (this.config.file) {
      const jsonLine = this.formatJson(level, message, context) + '\n';
      appendFileSync(this.config.file, jsonLine);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  critical(message: string, context?: LogContext): void {
    this.log('critical', message, context);
  }

  /**
   * Log a node lifecycle event
   */
  taskEvent(
    event: 'started' | 'completed' | 'failed' | 'skipped',
    nodeId: string,
    context?: LogContext
  ): void {
    const level = event === 'failed' ? 'error' : event === 'skipped' ? 'warn' : 'debug';
    this.log(level, `task_${event}`, { nodeId, ...context });
  }

  /**
   * Log a graph run event
   */
  runEvent(event: 'started' | 'succeeded' | 'failed', context?: LogContext): void {
    const level = event === 'failed' ? 'error' : 'info';
    this.log(level, `run_${event}`, context);
  }

  /**
   * Log a handled HTTP request
   */
  request(method: string, path: string, status: number, durationMs: number): void {
    const level = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';
    this.log(level, 'http_request', { method, path, status, durationMs });
  }
}

let globalLogger: Logger | null = null;

/**
 * Initialize the global logger
 */
export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

/**
 * Get the global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    // Create a default logger if none exists
    globalLogger = new Logger({
      level: 'info',
      console: true,
    });
  }
  return globalLogger;
}

export { Logger };
