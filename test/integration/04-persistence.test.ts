/**
 * Persistence Integration Test
 *
 * Validates:
 * 1. A node's store (drafts, remote copies, tombstones) survives a restart
 * 2. The local id counter resumes after the highest persisted id
 * 3. Unreadable or partly invalid files load what they can
 * 4. Flushes only write when something changed, and retry after a failure
 * 5. A peer that crashed before flushing gets its own reviews back from the
 *    network and does not reuse their ids
 */

import assert from 'node:assert/strict';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { InMemoryNetwork } from '../../src/network/in-memory-transport.js';
import { JsonFileReviewPersistence } from '../../src/store/file-store.js';
import { MemoryReviewPersistence } from '../../src/store/memory-store.js';
import { ReviewNode } from '../../src/review-node.js';
import type { Review } from '../../src/review-types.js';
import { createNode, fields, review, settle, TestClock } from '../fixtures.js';

class FlakyPersistence extends MemoryReviewPersistence {
  failNext = true;

  async saveAll(reviews: ReadonlyMap<string, Review>): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('disk full');
    }
    return super.saveAll(reviews);
  }
}

async function testRestartFromFile(dir: string): Promise<void> {
  const path = join(dir, 'nested', 'reviews.json');
  const clock = new TestClock();

  const network = new InMemoryNetwork();
  const alice = createNode(network, 'alice', clock, { persistence: new JsonFileReviewPersistence(path) });
  const bob = createNode(network, 'bob', clock);
  network.linkAll();
  await alice.start();
  await bob.start();

  await alice.createReview(fields({ title: 'Draft' }));
  await alice.publishReview((await alice.createReview(fields({ title: 'Published' }))).id);
  await alice.publishReview((await alice.createReview(fields({ title: 'Removed' }))).id);
  await alice.deleteReview('alice-3');
  await bob.publishReview((await bob.createReview(fields({ title: 'From Bob' }))).id);
  await settle(network, [alice, bob]);

  await alice.flush();
  assert.ok(!existsSync(`${path}.tmp`));

  const onDisk: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  assert.ok(onDisk !== null && typeof onDisk === 'object');
  assert.equal(Reflect.get(onDisk, 'version'), '1.0');
  const records: unknown = Reflect.get(onDisk, 'reviews');
  assert.ok(records !== null && typeof records === 'object');
  assert.deepEqual(Object.keys(records).sort(), ['alice-1', 'alice-2', 'alice-3', 'bob-1']);

  await alice.stop();
  await bob.stop();

  // Restart on a fresh, empty network
  const restarted = createNode(new InMemoryNetwork(), 'alice', clock, { persistence: new JsonFileReviewPersistence(path) });
  await restarted.start();

  assert.deepEqual((await restarted.listReviews()).map(r => r.title), ['Draft', 'Published', 'From Bob']);
  const tombstone = await restarted.getReview('alice-3');
  assert.equal(tombstone?.deleted, true);
  assert.equal(tombstone?.version, 2);
  assert.equal((await restarted.getReview('bob-1'))?.version, 1);

  assert.equal((await restarted.createReview(fields())).id, 'alice-4');
  await restarted.stop();

  // The final snapshot was written on stop
  const reloaded = await new JsonFileReviewPersistence(path).loadAll();
  assert.equal(reloaded.size, 5);
  assert.equal(reloaded.get('alice-4')?.published, false);
}

async function testDamagedFiles(dir: string): Promise<void> {
  const path = join(dir, 'damaged.json');
  const persistence = new JsonFileReviewPersistence(path);

  assert.equal((await persistence.loadAll()).size, 0);

  writeFileSync(path, '{"version": "1.0", "reviews": {');
  assert.equal((await persistence.loadAll()).size, 0);

  writeFileSync(path, JSON.stringify({ version: '1.0' }));
  assert.equal((await persistence.loadAll()).size, 0);

  writeFileSync(path, JSON.stringify({
    version: '1.0',
    reviews: {
      'bob-1': review('bob', 1),
      'bob-2': { id: 'bob-2', title: 'Half a record' },
      'bob-3': review('bob', 3, { rating: 11 })
    }
  }));
  const loaded = await persistence.loadAll();
  assert.deepEqual(Array.from(loaded.keys()), ['bob-1']);
  assert.deepEqual(loaded.get('bob-1'), review('bob', 1));
}

async function testFlushBookkeeping(): Promise<void> {
  const memory = new MemoryReviewPersistence([review('alice', 7, { published: false, version: 0 })]);
  const node = createNode(new InMemoryNetwork(), 'alice', new TestClock(), { persistence: memory });
  await node.start();

  assert.equal((await node.createReview(fields())).id, 'alice-8');
  await node.flush();
  assert.equal(memory.saveCount, 1);

  // Nothing changed since
  await node.flush();
  assert.equal(memory.saveCount, 1);
  await node.stop();
  assert.equal(memory.saveCount, 1);
  assert.equal((await memory.loadAll()).size, 2);

  const flaky = new FlakyPersistence();
  const second = createNode(new InMemoryNetwork(), 'bob', new TestClock(), { persistence: flaky });
  await second.start();
  await second.createReview(fields());

  await assert.rejects(second.flush(), /disk full/);
  assert.equal(flaky.saveCount, 0);

  // The failed snapshot is retried on the next flush
  await second.flush();
  assert.equal(flaky.saveCount, 1);
  assert.deepEqual(Array.from((await flaky.loadAll()).keys()), ['bob-1']);
  await second.stop();
}

async function testRecoveryAfterCrash(): Promise<void> {
  const clock = new TestClock();
  const network = new InMemoryNetwork();
  const disk = new MemoryReviewPersistence();
  const aliceTransport = network.createTransport('alice');
  const aliceNode = () => new ReviewNode({
    peerId: 'alice',
    transport: aliceTransport,
    persistence: disk,
    announceIntervalMs: 0,
    antiEntropyIntervalMs: 0,
    silenceCheckIntervalMs: 0,
    persistIntervalMs: 0,
    clock: clock.read
  });

  const alice = aliceNode();
  const bob = createNode(network, 'bob', clock);
  network.linkAll();
  await alice.start();
  await bob.start();
  await settle(network, [alice, bob]);

  await alice.publishReview((await alice.createReview(fields({ title: 'First' }))).id);
  await settle(network, [alice, bob]);
  assert.equal((await bob.getReview('alice-1'))?.title, 'First');
  assert.equal(disk.saveCount, 0);

  // Alice dies without stopping or flushing; a new process takes over her link
  const restarted = aliceNode();
  await restarted.start();
  await settle(network, [restarted, bob]);

  const recovered = await restarted.getReview('alice-1');
  assert.equal(recovered?.title, 'First');
  assert.equal(recovered?.version, 1);
  assert.equal(recovered?.published, true);

  const second = await restarted.createReview(fields({ title: 'Second' }));
  assert.equal(second.id, 'alice-2');
  await restarted.publishReview(second.id);
  await settle(network, [restarted, bob]);

  assert.deepEqual((await bob.listReviewsByPeer('alice')).map(r => r.title), ['First', 'Second']);
  assert.deepEqual((await restarted.listReviewsByPeer('alice')).map(r => r.title), ['First', 'Second']);

  await restarted.stop();
  await bob.stop();
  assert.deepEqual(Array.from((await disk.loadAll()).keys()).sort(), ['alice-1', 'alice-2']);
}

async function main(): Promise<void> {
  console.log('\n========================================');
  console.log('Persistence Integration Test');
  console.log('========================================');

  const dir = mkdtempSync(join(tmpdir(), 'bookgossip-store-'));
  try {
    await testRestartFromFile(dir);
    console.log('✅ restart restores drafts, copies and tombstones');

    await testDamagedFiles(dir);
    console.log('✅ damaged files load what they can');

    await testFlushBookkeeping();
    console.log('✅ flush writes only changes and retries failures');

    await testRecoveryAfterCrash();
    console.log('✅ crashed peer recovers its reviews from the network');
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }

  console.log('\n✅ ALL PERSISTENCE TESTS PASSED\n');
}

main().catch((error) => {
  console.error('❌ Persistence test failed:', error);
  process.exit(1);
});
