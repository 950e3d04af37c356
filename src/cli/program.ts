import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { createUpCommand } from './commands/up.js';
import { createDownCommand } from './commands/down.js';
import { createStatusCommand } from './commands/status.js';
import { createListCommand } from './commands/list.js';
import { createCreateCommand } from './commands/create.js';
import { connectPostgres } from './context.js';
import type { ExecutorFactory } from './context.js';
import { getDirname } from '../utils/paths.js';

function readVersion(): string {
  const here = getDirname(import.meta.url);
  // Source runs two levels below package.json, the build three
  for (const candidate of ['../../package.json', '../../../package.json']) {
    try {
      const packageJson: unknown = JSON.parse(readFileSync(join(here, candidate), 'utf-8'));
      if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
        && typeof packageJson.version === 'string') {
        return packageJson.version;
      }
    } catch {
      continue;
    }
  }
  return '0.0.0';
}

export function createProgram(connect: ExecutorFactory = connectPostgres): Command {
  const program = new Command();

  program
    .name('schema-ledger')
    .description('Apply and roll back PostgreSQL schema migrations')
    .version(readVersion())
    .option('-d, --dir <path>', 'Load migrations from this directory instead of the built-in set')
    .option('--database-url <url>', 'PostgreSQL connection string (default: DATABASE_URL)')
    .option('--debug', 'Write debug logs to the schema-ledger home directory');

  program.addCommand(createUpCommand(connect));
  program.addCommand(createDownCommand(connect));
  program.addCommand(createStatusCommand(connect));
  program.addCommand(createListCommand());
  program.addCommand(createCreateCommand());

  return program;
}
