/**
 * Web API Integration Test
 *
 * Two peers on an in-memory network, each with its own HTTP API on a
 * free local port.
 *
 * Validates:
 * 1. Review lifecycle over HTTP with the documented status codes
 * 2. Remote copies are readable but not writable
 * 3. Malformed JSON, unknown endpoints and write rate limiting
 * 4. Security and CORS headers
 */

import assert from 'node:assert/strict';
import { CommandAdapter } from '../../src/cli/command-adapter.js';
import { ReviewWebServer } from '../../src/web/server.js';
import { fields, settle, startNetwork } from '../fixtures.js';

interface ApiResponse {
  readonly status: number;
  readonly body: unknown;
  readonly headers: Headers;
}

async function request(base: string, method: string, path: string, body?: unknown, origin?: string): Promise<ApiResponse> {
  const headers: Record<string, string> = {};
  if (body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }
  if (origin) {
    headers.Origin = origin;
  }

  const response = await fetch(`${base}${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body)
  });
  return { status: response.status, body: await response.json(), headers: response.headers };
}

function member(value: unknown, key: string): unknown {
  return value !== null && typeof value === 'object' ? Reflect.get(value, key) : undefined;
}

async function testReviewApi(): Promise<void> {
  const { network, nodes } = await startNetwork(['alice', 'bob']);
  const [alice, bob] = nodes;
  const aliceApi = new ReviewWebServer({ adapter: new CommandAdapter(alice), port: 0 });
  const bobApi = new ReviewWebServer({ adapter: new CommandAdapter(bob), port: 0 });
  const atAlice = `http://127.0.0.1:${await aliceApi.start()}/api`;
  const atBob = `http://127.0.0.1:${await bobApi.start()}/api`;

  try {
    assert.deepEqual((await request(atAlice, 'GET', '/health')).body, { success: true, data: { status: 'ok' } });

    const draft = {
      ...fields(),
      id: 'alice-1',
      authorPeerId: 'alice',
      published: false,
      deleted: false,
      version: 0
    };

    const created = await request(atAlice, 'POST', '/reviews', { ...fields(), ignored: 'yes' });
    assert.equal(created.status, 201);
    assert.deepEqual(created.body, { success: true, data: draft });

    const invalid = await request(atAlice, 'POST', '/reviews', { title: 'Only a title' });
    assert.equal(invalid.status, 400);
    assert.deepEqual(invalid.body, { success: false, error: 'genre is required', code: 'VALIDATION_ERROR', field: 'genre' });

    const published = await request(atAlice, 'POST', '/reviews/alice-1/publish');
    assert.equal(published.status, 200);
    assert.deepEqual(published.body, { success: true, data: { ...draft, published: true, version: 1 } });
    await settle(network, nodes);

    const listed = await request(atBob, 'GET', '/reviews');
    assert.deepEqual(listed.body, { success: true, data: { count: 1, reviews: [{ ...draft, published: true, version: 1 }] } });
    assert.deepEqual((await request(atBob, 'GET', '/reviews?peer=carol')).body, { success: true, data: { count: 0, reviews: [] } });
    assert.equal(member(member((await request(atBob, 'GET', '/reviews?peer=alice')).body, 'data'), 'count'), 1);

    const forbidden = await request(atBob, 'POST', '/reviews/alice-1/publish');
    assert.equal(forbidden.status, 403);
    assert.deepEqual(forbidden.body, {
      success: false,
      error: 'Review alice-1 belongs to peer alice; only its author may change it',
      code: 'NOT_AUTHORIZED'
    });

    const missing = await request(atAlice, 'GET', '/reviews/nope-1');
    assert.equal(missing.status, 404);
    assert.deepEqual(missing.body, { success: false, error: 'Review nope-1 not found', code: 'NOT_FOUND' });

    const peers = await request(atBob, 'GET', '/peers');
    assert.deepEqual(peers.body, {
      success: true,
      data: {
        count: 1,
        peers: [{
          peerId: 'alice',
          state: 'active',
          reachable: true,
          firstSeen: 1_000_000,
          lastSeen: 1_000_000,
          address: 'memory://alice',
          messagesReceived: 2
        }]
      }
    });

    const deleted = await request(atAlice, 'DELETE', '/reviews/alice-1');
    assert.equal(deleted.status, 200);
    assert.deepEqual(deleted.body, { success: true, data: { ...draft, published: true, deleted: true, version: 2 } });
    await settle(network, nodes);

    assert.equal((await request(atBob, 'GET', '/reviews/alice-1')).status, 404);

    const status = await request(atBob, 'GET', '/status');
    assert.equal(status.status, 200);
    const data = member(status.body, 'data');
    assert.equal(member(data, 'peerId'), 'bob');
    assert.equal(member(data, 'storedReviews'), 1);
    assert.equal(member(data, 'visibleReviews'), 0);
  } finally {
    await aliceApi.stop();
    await bobApi.stop();
    for (const node of nodes) {
      await node.stop();
    }
  }
}

async function testHardening(): Promise<void> {
  const { nodes } = await startNetwork(['alice']);
  const api = new ReviewWebServer({ adapter: new CommandAdapter(nodes[0]), port: 0, writeLimitPerMinute: 2 });
  const base = `http://127.0.0.1:${await api.start()}/api`;

  try {
    const badJson = await request(base, 'POST', '/reviews', '{"title":');
    assert.equal(badJson.status, 400);
    assert.deepEqual(badJson.body, { success: false, error: 'Request body is not valid JSON' });

    const unknown = await request(base, 'GET', '/nothing-here');
    assert.equal(unknown.status, 404);
    assert.deepEqual(unknown.body, { success: false, error: 'Unknown endpoint' });

    const withOrigin = await request(base, 'GET', '/reviews', undefined, 'http://reviews.test');
    assert.equal(withOrigin.headers.get('access-control-allow-origin'), 'http://reviews.test');
    assert.equal(withOrigin.headers.get('x-content-type-options'), 'nosniff');
    assert.equal(withOrigin.headers.get('x-frame-options'), 'DENY');

    // The malformed POST above already counted against the write limit
    assert.equal((await request(base, 'POST', '/reviews', fields())).status, 201);
    const limited = await request(base, 'POST', '/reviews', fields());
    assert.equal(limited.status, 429);
    assert.deepEqual(limited.body, { success: false, error: 'Too many changes, please slow down' });

    // Reads are not write-limited
    assert.equal((await request(base, 'GET', '/reviews')).status, 200);
  } finally {
    await api.stop();
    await nodes[0].stop();
  }
}

async function main(): Promise<void> {
  console.log('\n========================================');
  console.log('Web API Integration Test');
  console.log('========================================');

  await testReviewApi();
  console.log('✅ review lifecycle over HTTP');

  await testHardening();
  console.log('✅ malformed JSON, unknown endpoints, rate limits, headers');

  console.log('\n✅ ALL WEB API TESTS PASSED\n');
}

main().catch((error) => {
  console.error('❌ Web API test failed:', error);
  process.exit(1);
});
