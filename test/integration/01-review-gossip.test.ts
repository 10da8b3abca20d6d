/**
 * Review Gossip Integration Test
 *
 * Runs several ReviewNodes over an InMemoryNetwork with every timer
 * disabled; announces, sweeps and silence checks are triggered by hand and
 * frames move only when the network is flushed.
 *
 * Validates:
 * 1. Publish reaches every peer; drafts never leave the author
 * 2. A stale publish arriving after a delete does not resurrect the review
 * 3. An announce from an unknown peer registers it and hands it our reviews
 * 4. Anti-entropy repairs dropped updates, in batches that stay within
 *    the receiver's rate limit
 * 5. A peer back from silence catches up
 * 6. Duplicated delivery converges to the same state everywhere
 * 7. Malformed, relayed and spoofed frames are dropped
 * 8. Signed networks reject unsigned peers
 */

import assert from 'node:assert/strict';
import { Crypto } from '../../src/crypto.js';
import { createReviewUpdate, encodeFrame } from '../../src/gossip/codec.js';
import { InMemoryNetwork } from '../../src/network/in-memory-transport.js';
import { PeerState } from '../../src/network-types.js';
import type { ReviewNode } from '../../src/review-node.js';
import { createNode, fields, review, settle, startNetwork, TestClock } from '../fixtures.js';

async function stopAll(nodes: ReviewNode[]): Promise<void> {
  for (const node of nodes) {
    await node.stop();
  }
}

async function testPublishReachesEveryone(): Promise<void> {
  const { network, nodes } = await startNetwork(['alice', 'bob', 'carol']);
  const [alice, bob, carol] = nodes;

  for (const node of nodes) {
    const peers = await node.listPeers();
    assert.equal(peers.length, 2);
    assert.ok(peers.every(peer => peer.state === PeerState.ACTIVE), `${node.peerId} sees every peer as active`);
  }

  const draft = await alice.createReview({ title: 'Dune', genre: 'SciFi', authorName: 'Herbert', rating: 5, body: 'Sand.' });
  assert.equal(draft.id, 'alice-1');
  assert.equal(draft.published, false);
  assert.equal(draft.version, 0);

  await settle(network, nodes);
  assert.equal(await bob.getReview('alice-1'), undefined);

  const published = await alice.publishReview('alice-1');
  assert.equal(published.version, 1);
  await settle(network, nodes);

  for (const node of [bob, carol]) {
    const copy = await node.getReview('alice-1');
    assert.ok(copy);
    assert.equal(copy.published, true);
    assert.equal(copy.version, 1);
    assert.equal(copy.title, 'Dune');
    assert.deepEqual((await node.listReviewsByPeer('alice')).map(r => r.id), ['alice-1']);
  }

  // Deleting a draft sends nothing
  const second = await alice.createReview(fields());
  await alice.deleteReview(second.id);
  await alice.idle();
  assert.equal(network.pendingCount, 0);
  assert.equal(await bob.getReview(second.id), undefined);

  await stopAll(nodes);
}

async function testStalePublishAfterDelete(): Promise<void> {
  const { network, nodes } = await startNetwork(['alice', 'bob', 'carol']);
  const [alice, bob, carol] = nodes;

  // Bob's copy of the publish is delayed
  network.setInterceptor(frame =>
    frame.to === 'bob' && frame.frame.includes('"type":"review-update"') ? 'hold' : 'deliver'
  );

  const draft = await alice.createReview({ title: 'Dune', genre: 'SciFi', authorName: 'Herbert', rating: 5, body: 'Sand.' });
  await alice.publishReview(draft.id);
  await settle(network, nodes);
  assert.equal(network.heldFrames().length, 1);
  assert.equal((await carol.getReview(draft.id))?.version, 1);

  network.setInterceptor(undefined);
  const tombstone = await alice.deleteReview(draft.id);
  assert.equal(tombstone.version, 2);
  assert.equal(tombstone.deleted, true);
  await settle(network, nodes);

  assert.equal(await network.release(), 1);
  await settle(network, nodes);

  for (const node of [bob, carol]) {
    const copy = await node.getReview(draft.id);
    assert.ok(copy);
    assert.equal(copy.version, 2);
    assert.equal(copy.deleted, true);
    assert.deepEqual(await node.listReviews(), []);
  }

  await stopAll(nodes);
}

async function testAnnounceFromUnknownPeer(): Promise<void> {
  const clock = new TestClock();
  const { network, nodes } = await startNetwork(['alice', 'bob'], clock);
  const [, bob] = nodes;

  await bob.publishReview((await bob.createReview(fields({ title: 'Before Carol' }))).id);
  await settle(network, nodes);

  // Carol runs but has no link to anyone yet
  const carol = createNode(network, 'carol', clock);
  await carol.start();
  const all = [...nodes, carol];
  await settle(network, all);
  assert.deepEqual((await bob.listPeers()).map(peer => peer.peerId), ['alice']);

  network.link('bob', 'carol');
  await carol.announce();
  await settle(network, all);

  const atBob = await bob.listPeers();
  assert.deepEqual(atBob.map(peer => [peer.peerId, peer.state]), [['alice', 'active'], ['carol', 'active']]);
  assert.equal(atBob[1].address, 'memory://carol');

  // Bob answered with an announce followed by everything he has published
  const atCarol = await carol.listPeers();
  assert.deepEqual(atCarol.map(peer => [peer.peerId, peer.state]), [['bob', 'active']]);
  assert.equal(atCarol[0].messagesReceived, 2);
  assert.equal((await carol.getReview('bob-1'))?.title, 'Before Carol');

  await stopAll(all);
}

async function testAntiEntropyRepairsLoss(): Promise<void> {
  const { network, nodes } = await startNetwork(['alice', 'bob']);
  const [alice, bob] = nodes;

  network.setInterceptor(frame => frame.frame.includes('"type":"review-update"') ? 'drop' : 'deliver');
  const kept = await alice.createReview(fields({ title: 'Kept' }));
  const gone = await alice.createReview(fields({ title: 'Gone' }));
  await alice.publishReview(kept.id);
  await alice.publishReview(gone.id);
  await alice.deleteReview(gone.id);
  await settle(network, nodes);

  assert.equal(network.dropped, 3);
  assert.equal(await bob.getReview(kept.id), undefined);

  network.setInterceptor(undefined);
  await alice.antiEntropySweep();
  await settle(network, nodes);

  assert.equal((await bob.getReview(kept.id))?.version, 1);
  assert.equal((await bob.getReview(gone.id))?.deleted, true);
  assert.deepEqual((await bob.listReviews()).map(r => r.title), ['Kept']);

  const status = await alice.status();
  assert.equal(status.gossip.antiEntropySweeps, 1);

  await stopAll(nodes);
}

async function testLargeCatalogueWithinRateLimit(): Promise<void> {
  const clock = new TestClock();
  const rateLimit = { maxMessagesPerWindow: 20, windowMs: 60_000, banDurationMs: 60_000 };
  const network = new InMemoryNetwork();
  const alice = createNode(network, 'alice', clock, { rateLimit });
  const bob = createNode(network, 'bob', clock, { rateLimit });
  const nodes = [alice, bob];
  network.linkAll();
  for (const node of nodes) {
    await node.start();
  }
  await settle(network, nodes);

  // Every publish is lost; only anti-entropy can carry the catalogue
  network.setInterceptor(frame => frame.frame.includes('"type":"review-update"') ? 'drop' : 'deliver');
  for (let i = 1; i <= 250; i++) {
    await alice.publishReview((await alice.createReview(fields({ title: `Volume ${i}` }))).id);
  }
  await settle(network, nodes);
  assert.equal(network.dropped, 250);
  assert.equal(await bob.getReview('alice-1'), undefined);

  let sweepFrames = 0;
  network.setInterceptor(frame => {
    if (frame.from === 'alice') {
      sweepFrames++;
    }
    return 'deliver';
  });
  await alice.antiEntropySweep();
  await settle(network, nodes);

  assert.equal(sweepFrames, 3);
  const atBob = await bob.listReviewsByPeer('alice');
  assert.equal(atBob.length, 250);
  assert.equal(atBob[249].title, 'Volume 250');
  assert.equal((await bob.status()).gossip.rejectedDropped, 0);
  assert.equal((await bob.listPeers())[0].state, PeerState.ACTIVE);

  // A newcomer gets the whole catalogue on discovery, also in batches
  network.setInterceptor(undefined);
  const carol = createNode(network, 'carol', clock, { rateLimit });
  await carol.start();
  network.link('alice', 'carol');
  await carol.announce();
  const all = [...nodes, carol];
  await settle(network, all);

  assert.equal((await carol.listReviewsByPeer('alice')).length, 250);
  assert.equal((await carol.status()).gossip.rejectedDropped, 0);
  // Alice's announce plus three batches
  assert.equal((await carol.listPeers())[0].messagesReceived, 4);

  await stopAll(all);
}

async function testSilentPeerCatchesUp(): Promise<void> {
  const clock = new TestClock();
  const { network, nodes } = await startNetwork(['alice', 'bob'], clock);
  const [alice, bob] = nodes;

  network.unlink('alice', 'bob');
  clock.advance(30_001);
  assert.deepEqual((await alice.checkSilence()).map(peer => peer.peerId), ['bob']);
  assert.deepEqual((await bob.checkSilence()).map(peer => peer.peerId), ['alice']);
  assert.equal((await bob.listPeers())[0].state, 'silent');
  assert.equal((await bob.status()).reachablePeers, 0);

  // Nobody to send to while partitioned
  const written = await alice.publishReview((await alice.createReview(fields())).id);
  await settle(network, nodes);
  assert.equal(await bob.getReview(written.id), undefined);

  network.link('alice', 'bob');
  await alice.announce();
  await settle(network, nodes);

  assert.equal((await bob.listPeers())[0].state, 'active');
  assert.equal((await alice.listPeers())[0].state, 'active');
  assert.equal((await bob.getReview(written.id))?.version, 1);

  await stopAll(nodes);
}

async function testConvergenceUnderDuplication(): Promise<void> {
  const { network, nodes } = await startNetwork(['alice', 'bob', 'carol']);
  network.setInterceptor(() => 'duplicate');

  for (const node of nodes) {
    const first = await node.createReview(fields({ title: `${node.peerId} one` }));
    const second = await node.createReview(fields({ title: `${node.peerId} two` }));
    await node.publishReview(first.id);
    await node.publishReview(second.id);
    await node.deleteReview(first.id);
  }
  await settle(network, nodes);

  for (const node of nodes) {
    await node.antiEntropySweep();
  }
  await settle(network, nodes);

  const expected = ['alice-2', 'bob-2', 'carol-2'];
  for (const node of nodes) {
    assert.deepEqual((await node.listReviews()).map(r => r.id), expected);
    const status = await node.status();
    assert.equal(status.storedReviews, 6);
    assert.equal(status.visibleReviews, 3);
    assert.equal(status.conflictsDetected, 0);
  }

  await stopAll(nodes);
}

async function testHostileFrames(): Promise<void> {
  const clock = new TestClock();
  const { network, nodes } = await startNetwork(['alice', 'bob'], clock);
  const [alice, bob] = nodes;

  await alice.publishReview((await alice.createReview(fields())).id);
  await settle(network, nodes);

  const mallory = network.createTransport('mallory');
  await mallory.start(async () => {});
  network.link('mallory', 'bob');

  await mallory.send('bob', '{"protocol":');
  // Relayed copy of someone else's review
  await mallory.send('bob', encodeFrame(createReviewUpdate('mallory', review('alice', 1, { version: 9, deleted: true }), clock.now)));
  // Claims to be Alice on Mallory's link
  await mallory.send('bob', encodeFrame(createReviewUpdate('alice', review('alice', 1, { version: 9, deleted: true }), clock.now)));
  await settle(network, nodes);

  const copy = await bob.getReview('alice-1');
  assert.equal(copy?.version, 1);
  assert.equal(copy?.deleted, false);

  const stats = (await bob.status()).gossip;
  assert.equal(stats.malformedDropped, 1);
  assert.equal(stats.rejectedDropped, 2);
  assert.deepEqual((await bob.listPeers()).map(peer => peer.peerId), ['alice']);

  await stopAll(nodes);
}

async function testSignedNetwork(): Promise<void> {
  const clock = new TestClock();
  const network = new InMemoryNetwork();
  const aliceKeys = Crypto.generateKeyPair();
  const bobKeys = Crypto.generateKeyPair();
  const aliceId = Crypto.toHex(aliceKeys.publicKey);
  const bobId = Crypto.toHex(bobKeys.publicKey);

  const alice = createNode(network, aliceId, clock, { identity: aliceKeys, requireSignatures: true });
  const bob = createNode(network, bobId, clock, { identity: bobKeys, requireSignatures: true });
  const plain = createNode(network, 'plain', clock);
  const nodes = [alice, bob, plain];
  assert.equal(alice.peerId, aliceId);

  network.linkAll();
  for (const node of nodes) {
    await node.start();
  }
  await settle(network, nodes);

  assert.deepEqual((await alice.listPeers()).map(peer => peer.peerId), [bobId]);
  assert.deepEqual((await bob.listPeers()).map(peer => peer.peerId), [aliceId]);

  const draft = await alice.createReview(fields());
  await alice.publishReview(draft.id);
  await settle(network, nodes);

  assert.equal(draft.id, `${aliceId}-1`);
  assert.equal((await bob.getReview(draft.id))?.version, 1);
  assert.ok((await bob.status()).gossip.rejectedDropped > 0);

  await stopAll(nodes);
}

async function main(): Promise<void> {
  console.log('\n========================================');
  console.log('Review Gossip Integration Test');
  console.log('========================================');

  await testPublishReachesEveryone();
  console.log('✅ publish reaches every peer, drafts stay local');

  await testStalePublishAfterDelete();
  console.log('✅ stale publish after delete is discarded');

  await testAnnounceFromUnknownPeer();
  console.log('✅ announce from unknown peer registers it');

  await testAntiEntropyRepairsLoss();
  console.log('✅ anti-entropy repairs dropped updates');

  await testLargeCatalogueWithinRateLimit();
  console.log('✅ large catalogue replicates within the rate limit');

  await testSilentPeerCatchesUp();
  console.log('✅ silent peer catches up on return');

  await testConvergenceUnderDuplication();
  console.log('✅ convergence under duplicated delivery');

  await testHostileFrames();
  console.log('✅ malformed, relayed and spoofed frames dropped');

  await testSignedNetwork();
  console.log('✅ signed network rejects unsigned peers');

  console.log('\n✅ ALL REVIEW GOSSIP TESTS PASSED\n');
}

main().catch((error) => {
  console.error('❌ Review gossip test failed:', error);
  process.exit(1);
});
