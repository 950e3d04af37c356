import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import { openRegistry, runAction } from '../context.js';
import { generateMigrationFilename } from '../../migrations/naming.js';
import { ConfigurationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/** ES module skeleton; Node imports it as is, types come from JSDoc */
export const MIGRATION_TEMPLATE = `/** @typedef {import('schema-ledger').DatabaseExecutor} DatabaseExecutor */

/** @param {DatabaseExecutor} db */
export async function up(db) {
  await db.execute('SELECT 1');
}

/** @param {DatabaseExecutor} db */
export async function down(db) {
  await db.execute('SELECT 1');
}
`;

export function createCreateCommand(): Command {
  const command = new Command('create');

  command
    .description('Write a new migration skeleton into the migrations directory')
    .argument('<description>', 'Letters and underscores, e.g. add_users_table')
    .action(async (description: string, _options: Record<string, unknown>, cmd: Command) => {
      await runAction('Failed to create migration:', async () => {
        const { registry, config } = await openRegistry(cmd);
        if (!config.migrationsDir) {
          throw new ConfigurationError('A migrations directory is required (use --dir or SCHEMA_LEDGER_MIGRATIONS_DIR)');
        }

        const existing = await registry.discover();
        const filename = generateMigrationFilename(
          description,
          existing.map(location => path.basename(location))
        );

        await fs.mkdir(config.migrationsDir, { recursive: true });
        const target = path.join(config.migrationsDir, filename);
        await fs.writeFile(target, MIGRATION_TEMPLATE, { encoding: 'utf-8', flag: 'wx' });

        logger.success(`Created ${target}`);
      });
    });

  return command;
}
