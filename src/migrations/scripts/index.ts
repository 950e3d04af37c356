/**
 * Built-in migrations
 *
 * To add a migration:
 * 1. Create `NNN_description.ts` in this directory exporting `up` and `down`
 *    (`schema-ledger create <description>` writes the skeleton)
 * 2. Add it to the manifest below
 */

import type { MigrationManifest } from '../sources.js';
import * as createAgentMemory from './001_create_agent_memory.js';
import * as createTasksTable from './002_create_tasks_table.js';

export const builtinManifest: MigrationManifest = {
  '001_create_agent_memory.ts': createAgentMemory,
  '002_create_tasks_table.ts': createTasksTable
};
