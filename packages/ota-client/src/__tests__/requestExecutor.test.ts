import assert from 'node:assert/strict';
import { after, afterEach, before, test } from 'node:test';
import {
  ConnectionExhaustedError,
  InvalidResponseError,
  RequestFailedError,
  isRetryableUpdateError
} from '../errors';
import { RequestExecutor } from '../requestExecutor';
import { dropConnection, sendJson, startTestServer } from './testServer';
import type { TestServer } from './testServer';

let server: TestServer;
let sleeps: number[] = [];

function createExecutor(attempts?: number): RequestExecutor {
  return new RequestExecutor({
    attempts,
    delayMs: 25,
    sleep: async (ms) => {
      sleeps.push(ms);
    }
  });
}

before(async () => {
  server = await startTestServer();
});

after(async () => {
  await server.close();
});

afterEach(() => {
  server.reset();
  sleeps = [];
});

test('defaults to three attempts five seconds apart', () => {
  const executor = new RequestExecutor();
  assert.equal(executor.attempts, 3);
  assert.equal(executor.delayMs, 5000);
});

test('rejects a non-positive attempt count', () => {
  assert.throws(() => new RequestExecutor({ attempts: 0 }), /at least one attempt/);
});

test('first-attempt success performs no retries', async () => {
  server.route('GET', '/status', (_req, res) => sendJson(res, 200, { ok: true }));
  const executor = createExecutor();

  const payload = await executor.getJson(`${server.baseUrl}/status`);

  assert.deepEqual(payload, { ok: true });
  assert.equal(server.requests.length, 1);
  assert.deepEqual(sleeps, []);
});

test('retries dropped connections with the same request until one succeeds', async () => {
  let calls = 0;
  server.route('POST', '/telemetry', (_req, res) => {
    calls += 1;
    if (calls < 3) {
      dropConnection(res);
      return;
    }
    sendJson(res, 200, {});
  });
  const executor = createExecutor();

  await executor.postJson(`${server.baseUrl}/telemetry`, { fw_state: 'DOWNLOADING' });

  assert.equal(server.requests.length, 3);
  for (const request of server.requests) {
    assert.equal(request.method, 'POST');
    assert.equal(request.url, '/telemetry');
    assert.equal(request.body, '{"fw_state":"DOWNLOADING"}');
    assert.equal(request.headers['content-type'], 'application/json');
  }
  assert.deepEqual(sleeps, [25, 25]);
});

test('raises connection-exhausted after three failed attempts', async () => {
  server.route('GET', '/flaky', (_req, res) => dropConnection(res));
  const executor = createExecutor();
  const url = `${server.baseUrl}/flaky`;

  await assert.rejects(executor.getJson(url), (err: unknown) => {
    assert.ok(err instanceof ConnectionExhaustedError);
    assert.equal(err.attempts, 3);
    assert.equal(err.url, url);
    assert.equal(err.message, `Failed to establish connection to ${url} after 3 attempts.`);
    assert.equal(isRetryableUpdateError(err), true);
    return true;
  });
  assert.equal(server.requests.length, 3);
  assert.deepEqual(sleeps, [25, 25]);
});

test('honours a custom attempt count', async () => {
  server.route('GET', '/flaky', (_req, res) => dropConnection(res));
  const executor = createExecutor(1);

  await assert.rejects(executor.getBytes(`${server.baseUrl}/flaky`), ConnectionExhaustedError);
  assert.equal(server.requests.length, 1);
  assert.deepEqual(sleeps, []);
});

test('server errors are retried as transient failures', async () => {
  let calls = 0;
  server.route('GET', '/busy', (_req, res) => {
    calls += 1;
    if (calls === 1) {
      sendJson(res, 503, { message: 'unavailable' });
      return;
    }
    sendJson(res, 200, { value: 7 });
  });
  const executor = createExecutor();

  assert.deepEqual(await executor.getJson(`${server.baseUrl}/busy`), { value: 7 });
  assert.equal(server.requests.length, 2);
  assert.deepEqual(sleeps, [25]);
});

test('client errors are raised without retrying', async () => {
  server.route('GET', '/forbidden', (_req, res) => sendJson(res, 403, { message: 'Forbidden' }));
  const executor = createExecutor();

  await assert.rejects(executor.getJson(`${server.baseUrl}/forbidden`), (err: unknown) => {
    assert.ok(err instanceof RequestFailedError);
    assert.equal(err.statusCode, 403);
    assert.equal(err.details, '{"message":"Forbidden"}');
    assert.equal(isRetryableUpdateError(err), false);
    return true;
  });
  assert.equal(server.requests.length, 1);
  assert.deepEqual(sleeps, []);
});

test('malformed JSON is reported as an invalid response', async () => {
  server.route('GET', '/broken', (_req, res) => {
    res.statusCode = 200;
    res.end('{not json');
  });
  const executor = createExecutor();

  await assert.rejects(executor.getJson(`${server.baseUrl}/broken`), InvalidResponseError);
  assert.equal(server.requests.length, 1);
});

test('getBytes returns the raw body and forwards custom headers', async () => {
  server.route('GET', '/file', (_req, res) => {
    res.statusCode = 200;
    res.end(Buffer.from([0, 1, 2, 255]));
  });
  const executor = new RequestExecutor({ userAgent: 'ota-test/1.0' });

  const bytes = await executor.getBytes(`${server.baseUrl}/file`, { Authorization: 'Bearer test-token' });

  assert.deepEqual([...bytes], [0, 1, 2, 255]);
  assert.equal(server.requests[0].headers.authorization, 'Bearer test-token');
  assert.equal(server.requests[0].headers['user-agent'], 'ota-test/1.0');
});
