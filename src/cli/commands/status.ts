import { Command } from 'commander';
import chalk from 'chalk';
import { connectPostgres, runAction, withManager } from '../context.js';
import type { ExecutorFactory } from '../context.js';

export function createStatusCommand(connect: ExecutorFactory = connectPostgres): Command {
  const command = new Command('status');

  command
    .description('Show applied and pending migrations')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      await runAction('Failed to read migration status:', async () => {
        const status = await withManager(cmd, connect, manager => manager.getStatus());

        console.log(chalk.bold('\nApplied:'));
        if (status.applied.length === 0) {
          console.log(chalk.dim('  (none)'));
        }
        for (const record of status.applied) {
          console.log(`  ${chalk.green('✓')} ${record.version} ${chalk.dim(record.appliedAt.toISOString())}`);
        }

        console.log(chalk.bold('\nPending:'));
        if (status.pending.length === 0) {
          console.log(chalk.dim('  (none)'));
        }
        for (const name of status.pending) {
          console.log(`  ${chalk.yellow('○')} ${name}`);
        }
        console.log();
      });
    });

  return command;
}
