/**
 * Basic Usage Example
 *
 * Demonstrates writing, reading and deleting values through a file-backed table.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { FileTableBackend, openTable } from '@tablemat/sdk';
import { rm } from 'node:fs/promises';
import { z } from 'zod';

const TaskSchema = z.object({
  id: z.string(),
  title: z.string(),
  status: z.enum(['open', 'done']),
  priority: z.number(),
});

type Task = z.infer<typeof TaskSchema>;

async function main() {
  const dataDir = './examples-data/basic';
  await rm(dataDir, { recursive: true, force: true });

  const tasks = openTable<Task>({
    backend: new FileTableBackend({ root: dataDir }),
    typeName: 'Task',
    decoder: TaskSchema,
    getId: (task) => task.id,
  });

  console.log(`📂 Table ${tasks.name} at ${dataDir}\n`);

  // Write
  const report = await tasks.insertOrReplace([
    { id: 'task-1', title: 'Write the release notes', status: 'open', priority: 5 },
    { id: 'task-2', title: 'Fix the login bug', status: 'open', priority: 9 },
  ]);
  console.log(`✅ Wrote ${report.succeeded.length} record(s)`);

  // Read by id
  const task = await tasks.getById('task-2');
  console.log('🔍 task-2:', task);

  // Update
  await tasks.insertOrReplace({ id: 'task-2', title: 'Fix the login bug', status: 'done', priority: 9 });
  console.log('✏️  task-2 is now', (await tasks.getById('task-2'))?.status);

  // List everything in the default index
  console.log('\n📋 All tasks:');
  for await (const value of tasks.getAll().values()) {
    console.log(`  - ${value.id}: ${value.title} [${value.status}]`);
  }

  // Delete
  const deleted = await tasks.delete({ id: 'task-1', title: 'Write the release notes', status: 'open', priority: 5 });
  console.log(`\n🗑️  Deleted ${deleted.succeeded.length} record(s)`);
  console.log('   task-1 now reads as', await tasks.getById('task-1'));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
