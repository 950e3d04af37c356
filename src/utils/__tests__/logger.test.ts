import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'fs';
import { basename, join } from 'path';
import { Logger } from '../logger.js';
import { TempWorkspace } from '../../../tests/helpers/temp-workspace.js';

describe('Logger', () => {
  let workspace: TempWorkspace;
  const originalHome = process.env.SCHEMA_LEDGER_HOME;
  const originalDebug = process.env.SCHEMA_LEDGER_DEBUG;

  beforeEach(() => {
    workspace = new TempWorkspace();
    process.env.SCHEMA_LEDGER_HOME = workspace.path;
    delete process.env.SCHEMA_LEDGER_DEBUG;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    workspace.cleanup();
    for (const [key, value] of [['SCHEMA_LEDGER_HOME', originalHome], ['SCHEMA_LEDGER_DEBUG', originalDebug]] as const) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('should stay out of debug mode by default', () => {
    const logger = new Logger();

    logger.debug('hidden');

    expect(logger.isDebugEnabled()).toBe(false);
    expect(logger.getDebugSessionDir()).toBeNull();
  });

  it('should write to the console for info, warn and error', () => {
    const logger = new Logger();

    logger.info('Applying');
    logger.warn('Migration 001_a is not applied');
    logger.error('Migration failed:', new Error('boom'));

    expect(console.log).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('⚠ Migration 001_a is not applied'));
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('✗ Migration failed:'));
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('boom'));
  });

  it('should write a session log file once debug mode is enabled', async () => {
    const logger = new Logger();

    const sessionDir = await logger.enableDebugMode();

    expect(sessionDir).not.toBeNull();
    expect(sessionDir?.startsWith(join(workspace.path, 'debug'))).toBe(true);
    expect(basename(sessionDir ?? '')).toMatch(new RegExp(`^session-.+-${logger.getSessionId()}$`));
    expect(process.env.SCHEMA_LEDGER_DEBUG).toBe('1');

    logger.debug('[MigrationLedger] Migration 001_a recorded');

    const logFile = join(sessionDir ?? '', 'application.log');
    await vi.waitFor(() => {
      expect(readFileSync(logFile, 'utf-8')).toContain('[DEBUG] [MigrationLedger] Migration 001_a recorded');
    });
  });
});
