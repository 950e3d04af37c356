import { Command } from 'commander';
import chalk from 'chalk';
import { openRegistry, runAction } from '../context.js';

export function createListCommand(): Command {
  const command = new Command('list');

  command
    .description('List available migrations without connecting to the database')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      await runAction('Failed to list migrations:', async () => {
        const { registry } = await openRegistry(cmd);
        const locations = await registry.discover();

        console.log(chalk.bold(`\nMigrations (${registry.origin}):`));
        if (locations.length === 0) {
          console.log(chalk.dim('  (none)'));
        }
        for (const location of locations) {
          console.log(`  ${registry.nameOf(location)}`);
        }
        console.log();
      });
    });

  return command;
}
