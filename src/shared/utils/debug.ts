/**
 * Debug logging for stepgraph.
 *
 * Trace lines go to a log file when debug is enabled in config, and to
 * stderr when verbose console output is on. Graph engines take a scoped
 * logger from createLogger() as their default trace sink.
 */

import { existsSync, appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { DebugConfig, LogLevel } from '../../core/models/index.js';

const LEVEL_PRIORITIES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Logger scoped to one component */
export interface ScopedLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Debug logger singleton.
 */
export class DebugLogger {
  private static instance: DebugLogger | null = null;

  private debugEnabled = false;
  private debugLogFile: string | null = null;
  private initialized = false;
  private verboseConsoleEnabled = false;
  private minLevel: LogLevel = 'debug';

  private constructor() {}

  static getInstance(): DebugLogger {
    if (!DebugLogger.instance) {
      DebugLogger.instance = new DebugLogger();
    }
    return DebugLogger.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    DebugLogger.instance = null;
  }

  private static getDefaultLogFile(projectDir: string): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    return join(projectDir, '.stepgraph', 'logs', `debug-${timestamp}.log`);
  }

  /** Initialize from config. Later calls are ignored until reset(). */
  init(config?: DebugConfig, projectDir?: string): void {
    if (this.initialized) {
      return;
    }

    this.debugEnabled = config?.enabled ?? false;

    if (this.debugEnabled) {
      if (config?.logFile) {
        this.debugLogFile = config.logFile;
      } else if (projectDir) {
        this.debugLogFile = DebugLogger.getDefaultLogFile(projectDir);
      }

      if (this.debugLogFile) {
        const logDir = dirname(this.debugLogFile);
        if (!existsSync(logDir)) {
          mkdirSync(logDir, { recursive: true });
        }

        const header = [
          '='.repeat(60),
          'stepgraph debug log',
          `Started: ${new Date().toISOString()}`,
          `Project: ${projectDir || 'N/A'}`,
          '='.repeat(60),
          '',
        ].join('\n');

        writeFileSync(this.debugLogFile, header, 'utf-8');
      }
    }

    this.initialized = true;
  }

  /** Reset state (for testing) */
  reset(): void {
    this.debugEnabled = false;
    this.debugLogFile = null;
    this.initialized = false;
    this.verboseConsoleEnabled = false;
    this.minLevel = 'debug';
  }

  setVerboseConsole(enabled: boolean): void {
    this.verboseConsoleEnabled = enabled;
  }

  isVerboseConsole(): boolean {
    return this.verboseConsoleEnabled;
  }

  /** Drop entries below this level */
  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  isEnabled(): boolean {
    return this.debugEnabled;
  }

  getLogFile(): string | null {
    return this.debugLogFile;
  }

  private static formatLogMessage(level: LogLevel, component: string, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    let logLine = `[${timestamp}] [${level.toUpperCase()}] [${component}] ${message}`;

    if (data !== undefined) {
      logLine += `\n${DebugLogger.serialize(data)}`;
    }
    return logLine;
  }

  private static serialize(data: unknown): string {
    if (typeof data === 'string') {
      return data;
    }
    try {
      return JSON.stringify(data, null, 2);
    } catch {
      return '[Unable to serialize data]';
    }
  }

  private static formatConsoleMessage(level: LogLevel, component: string, message: string): string {
    const timestamp = new Date().toISOString().slice(11, 23);
    return `[${timestamp}] [${level.toUpperCase()}] [${component}] ${message}`;
  }

  /** Write an entry to the verbose console (stderr) and/or the log file */
  writeLog(level: LogLevel, component: string, message: string, data?: unknown): void {
    if (LEVEL_PRIORITIES[level] < LEVEL_PRIORITIES[this.minLevel]) {
      return;
    }

    if (this.verboseConsoleEnabled) {
      process.stderr.write(DebugLogger.formatConsoleMessage(level, component, message) + '\n');
    }

    if (!this.debugEnabled || !this.debugLogFile) {
      return;
    }

    try {
      appendFileSync(this.debugLogFile, DebugLogger.formatLogMessage(level, component, message, data) + '\n', 'utf-8');
    } catch (err) {
      // Stop writing to a file that cannot be appended to; keep the run going
      const file = this.debugLogFile;
      this.debugLogFile = null;
      process.stderr.write(`Debug log disabled, cannot write ${file}: ${String(err)}\n`);
    }
  }

  createLogger(component: string): ScopedLogger {
    return {
      debug: (message, data) => this.writeLog('debug', component, message, data),
      info: (message, data) => this.writeLog('info', component, message, data),
      error: (message, data) => this.writeLog('error', component, message, data),
    };
  }
}

export function initDebugLogger(config?: DebugConfig, projectDir?: string): void {
  DebugLogger.getInstance().init(config, projectDir);
}

export function resetDebugLogger(): void {
  DebugLogger.getInstance().reset();
}

export function setVerboseConsole(enabled: boolean): void {
  DebugLogger.getInstance().setVerboseConsole(enabled);
}

export function setDebugLogLevel(level: LogLevel): void {
  DebugLogger.getInstance().setMinLevel(level);
}

export function isDebugEnabled(): boolean {
  return DebugLogger.getInstance().isEnabled();
}

export function getDebugLogFile(): string | null {
  return DebugLogger.getInstance().getLogFile();
}

export function createLogger(component: string): ScopedLogger {
  return DebugLogger.getInstance().createLogger(component);
}
