import chalk from 'chalk';
import { promises as fs } from 'fs';
import { join } from 'path';
import { randomUUID } from 'crypto';
import { getSchemaLedgerHome } from './paths.js';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

function isDebugFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

export class Logger {
  private debugEnabled: boolean;
  private debugLogFile: string | null = null;
  private pendingInit: Promise<void> | null = null;
  private readonly sessionId: string;

  constructor() {
    this.sessionId = randomUUID();
    this.debugEnabled = isDebugFlag(process.env.SCHEMA_LEDGER_DEBUG);
    if (this.debugEnabled) {
      this.pendingInit = this.initializeDebugLogging();
    }
  }

  /**
   * Enable debug mode and initialize debug logging
   * @returns The debug session directory path
   */
  async enableDebugMode(): Promise<string | null> {
    if (!this.debugEnabled) {
      this.debugEnabled = true;
      process.env.SCHEMA_LEDGER_DEBUG = '1';
    }

    if (!this.pendingInit) {
      this.pendingInit = this.initializeDebugLogging();
    }
    await this.pendingInit;

    return this.getDebugSessionDir();
  }

  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  private async initializeDebugLogging(): Promise<void> {
    const baseDir = join(getSchemaLedgerHome(), 'debug');
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const sessionDir = join(baseDir, `session-${timestamp}-${this.sessionId}`);

    try {
      await fs.mkdir(sessionDir, { recursive: true });
      this.debugLogFile = join(sessionDir, 'application.log');
    } catch (error) {
      // File logging is optional; console output continues.
      console.warn(chalk.yellow(`⚠ Debug log directory unavailable: ${String(error)}`));
      this.debugLogFile = null;
    }
  }

  /**
   * Get the current debug session directory
   * @returns Session directory path or null if debug is not enabled
   */
  getDebugSessionDir(): string | null {
    if (!this.debugLogFile) return null;
    return join(this.debugLogFile, '..');
  }

  getSessionId(): string {
    return this.sessionId;
  }

  private writeToFile(level: LogLevel, message: string, ...args: unknown[]): void {
    const file = this.debugLogFile;
    if (!file) return;

    const timestamp = new Date().toISOString();
    const suffix = args.length > 0
      ? ' ' + args.map(a => typeof a === 'object' ? JSON.stringify(a) : String(a)).join(' ')
      : '';
    const logLine = `[${timestamp}] [${level.toUpperCase()}] ${message}${suffix}\n`;

    fs.appendFile(file, logLine, 'utf-8').catch(() => {
      this.debugLogFile = null;
    });
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.DEBUG, message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    console.log(chalk.blueBright(message), ...args);
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.INFO, message, ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(`✓ ${message}`), ...args);
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.INFO, `✓ ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`⚠ ${message}`), ...args);
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.WARN, `⚠ ${message}`, ...args);
    }
  }

  error(message: string, error?: unknown): void {
    console.error(chalk.red(`✗ ${message}`));
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.ERROR, `✗ ${message}`);
    }

    if (error === undefined) return;

    if (error instanceof Error) {
      console.error(chalk.red(error.message));
      if (this.debugEnabled) {
        this.writeToFile(LogLevel.ERROR, error.message);
        if (error.stack) {
          console.error(chalk.white(error.stack));
          this.writeToFile(LogLevel.ERROR, error.stack);
        }
      }
    } else {
      console.error(chalk.red(String(error)));
      if (this.debugEnabled) {
        this.writeToFile(LogLevel.ERROR, String(error));
      }
    }
  }
}

export const logger = new Logger();
