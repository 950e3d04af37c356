import { Command } from 'commander';
import chalk from 'chalk';
import { connectPostgres, runAction, withManager } from '../context.js';
import type { ExecutorFactory } from '../context.js';

export function createUpCommand(connect: ExecutorFactory = connectPostgres): Command {
  const command = new Command('up');

  command
    .description('Apply all pending migrations in version order')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      await runAction('Migration failed:', async () => {
        const applied = await withManager(cmd, connect, manager => manager.applyAllMigrations());

        if (applied.length === 0) {
          console.log(chalk.dim('No pending migrations'));
          return;
        }
        console.log(chalk.dim(`→ ${applied.length} migration(s) applied`));
      });
    });

  return command;
}
