/**
 * Advanced Queries Example
 *
 * Demonstrates chronological sort keys, key ranges, property filters and
 * adding an index to a table that already holds data.
 * Run with: npx tsx examples/advanced-queries.ts
 */

import { MemoryTableBackend, Table, edm, openTable } from '@tablemat/sdk';
import { z } from 'zod';

const EventSchema = z.object({
  id: z.string(),
  kind: z.string(),
  severity: z.number(),
});

type Event = z.infer<typeof EventSchema>;

async function main() {
  const events = openTable<Event>({
    backend: new MemoryTableBackend(),
    typeName: 'Event',
    decoder: EventSchema,
    getId: (event) => event.id,
    pageSize: 2,
  });

  // Newest first: every write adds a record under a fresh reverse-chronological key
  events.addIndex(
    events
      .createIndex('Recent')
      .setSortKey(() => Table.reverseChronologicalKey(), { versioned: true })
  );

  for (let i = 1; i <= 6; i++) {
    await events.insert({ id: `e${i}`, kind: i % 2 === 0 ? 'deploy' : 'alert', severity: i });
  }

  console.log('🕒 Most recent three:');
  for await (const event of events.scan('Recent', { limit: 3 }).values()) {
    console.log(`  - ${event.id} (${event.kind})`);
  }

  console.log('\n🔎 Ids e2..e4 in the default index:');
  const ranged = await events.scanRange('Default', 'e2', 'e4').toArray();
  console.log('  ', ranged.map((record) => record.sortKey));

  console.log('\n🏷️  Records whose DomainObjectType is Event:');
  const typed = await events.scanWhere('Default', 'DomainObjectType', edm.string('Event')).toArray();
  console.log(`   ${typed.length} record(s)`);

  // An index added later is filled from the default index
  events.addIndex({ name: 'Alerts', where: (event) => event.kind === 'alert' });
  const rebuilt = await events.reindex(['Alerts']);
  console.log(`\n🔁 Reindexed ${rebuilt.succeeded.length} alert(s)`);
  console.log('   Alerts:', (await events.scan('Alerts').toArray()).map((record) => record.value.id));

  // Paging: two records per backend segment
  let pages = 0;
  for await (const page of events.getAll().pages()) {
    pages++;
    console.log(`   page ${pages}: ${page.map((record) => record.sortKey).join(', ')}`);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
