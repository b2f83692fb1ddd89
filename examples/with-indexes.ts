/**
 * Secondary Indexes Example
 *
 * Demonstrates filtered indexes, computed partition keys and stale-record pruning.
 * Run with: npx tsx examples/with-indexes.ts
 */

import { MemoryTableBackend, openTable } from '@tablemat/sdk';
import { z } from 'zod';

const UserSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  team: z.string(),
  status: z.enum(['Active', 'Inactive']),
});

type User = z.infer<typeof UserSchema>;

async function main() {
  const users = openTable<User>({
    backend: new MemoryTableBackend(),
    typeName: 'User',
    decoder: UserSchema,
    getId: (user) => user.id,
  });

  // Only active users, looked up by email
  users.addIndex(
    users
      .createIndex('ActiveUsers')
      .defineCriteria((user) => user.status === 'Active')
      .setIndexedValue((user) => user.email)
  );

  // One partition per team
  users.addIndex({ name: 'ByTeam', partitionKey: (user) => `team-${user.team}` });

  await users.insertOrReplace([
    { id: 'u1', name: 'Alice', email: 'alice@example.com', team: 'core', status: 'Active' },
    { id: 'u2', name: 'Bob', email: 'bob@example.com', team: 'edge', status: 'Active' },
    { id: 'u3', name: 'Carol', email: 'carol@example.com', team: 'core', status: 'Inactive' },
  ]);

  console.log('👥 Active users:');
  for await (const user of users.scan('ActiveUsers').values()) {
    console.log(`  - ${user.name}`);
  }

  const byEmail = await users.findByIndexedValue('ActiveUsers', 'bob@example.com').first();
  console.log('\n📧 bob@example.com ->', byEmail?.value.name);

  console.log('\n🏷️  Team core:');
  for await (const user of users.scan('team-core').values()) {
    console.log(`  - ${user.name}`);
  }

  // Alice goes inactive and moves team; her old ActiveUsers and team-core records are pruned
  const report = await users.insertOrReplace({
    id: 'u1',
    name: 'Alice',
    email: 'alice@example.com',
    team: 'edge',
    status: 'Inactive',
  });
  console.log(`\n♻️  Rewrote Alice: ${report.succeeded.length} written, ${report.pruned.length} pruned`);
  console.log('   Active users now:', (await users.scan('ActiveUsers').toArray()).map((r) => r.value.name));

  console.log('\n🗂️  Known partitions:', await users.knownPartitionKeys());
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
