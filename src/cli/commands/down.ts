import { Command } from 'commander';
import chalk from 'chalk';
import { connectPostgres, runAction, withManager } from '../context.js';
import type { ExecutorFactory } from '../context.js';
import { validateMigrationName } from '../../migrations/naming.js';
import { InvalidMigrationNameError } from '../../utils/errors.js';

export function createDownCommand(connect: ExecutorFactory = connectPostgres): Command {
  const command = new Command('down');

  command
    .description('Roll back one applied migration')
    .argument('<version>', 'Migration name, e.g. 002_create_tasks_table')
    .action(async (version: string, _options: Record<string, unknown>, cmd: Command) => {
      await runAction('Rollback failed:', async () => {
        if (!validateMigrationName(version)) {
          throw new InvalidMigrationNameError(version);
        }

        const rolledBack = await withManager(cmd, connect, manager => manager.rollbackMigration(version));
        if (!rolledBack) {
          console.log(chalk.dim('Nothing to roll back'));
        }
      });
    });

  return command;
}
