import assert from 'node:assert/strict';
import { after, afterEach, before, describe, test } from 'node:test';
import { EmptyRepositoryError, InvalidRepositoryUrlError } from '../errors';
import { computeBlobDigest } from '../hash';
import { RepositorySource, buildAuthHeaders, parseRepositoryUrl } from '../repository';
import { RequestExecutor } from '../requestExecutor';
import type { DownloadedFile } from '../types';
import { sendBytes, sendJson, startTestServer } from './testServer';
import type { TestServer } from './testServer';

const TREE_PATH = '/repos/owner/repo/git/trees/main?recursive=1';
const APP_SOURCE = 'print("v2")\n';
const README = 'firmware v2\n';

let server: TestServer;

function createSource(): RepositorySource {
  const executor = new RequestExecutor({ delayMs: 0, sleep: async () => undefined });
  return new RepositorySource(executor, {
    apiBaseUrl: server.baseUrl,
    rawBaseUrl: `${server.baseUrl}/raw/`
  });
}

function serveRepository(): void {
  server.route('GET', TREE_PATH, (_req, res) =>
    sendJson(res, 200, {
      sha: 'ignored',
      tree: [
        { path: 'code', type: 'tree', sha: 'a'.repeat(40) },
        { path: 'code/app.py', type: 'blob', sha: computeBlobDigest(Buffer.from(APP_SOURCE)) },
        { path: 'README.md', type: 'blob', sha: computeBlobDigest(Buffer.from(README)).toUpperCase() }
      ]
    })
  );
  server.route('GET', '/raw/owner/repo/main/code/app.py', (_req, res) => sendBytes(res, APP_SOURCE));
  server.route('GET', '/raw/owner/repo/main/README.md', (_req, res) => sendBytes(res, README));
}

async function collect(files: AsyncIterable<DownloadedFile>): Promise<DownloadedFile[]> {
  const result: DownloadedFile[] = [];
  for await (const file of files) {
    result.push(file);
  }
  return result;
}

before(async () => {
  server = await startTestServer();
});

after(async () => {
  await server.close();
});

afterEach(() => {
  server.reset();
});

describe('parseRepositoryUrl', () => {
  test('extracts owner and repository without a token', () => {
    assert.deepEqual(parseRepositoryUrl('https://github.com/owner/repo'), {
      owner: 'owner',
      repo: 'repo',
      accessToken: null
    });
  });

  test('treats a third path segment as the access token', () => {
    assert.deepEqual(parseRepositoryUrl('https://github.com/owner/repo/test-token/'), {
      owner: 'owner',
      repo: 'repo',
      accessToken: 'test-token'
    });
  });

  for (const url of ['https://github.com/owner', 'ftp://github.com/owner/repo', 'https://host/a/b/c/d', 'owner/repo']) {
    test(`rejects ${url}`, () => {
      assert.throws(() => parseRepositoryUrl(url), InvalidRepositoryUrlError);
    });
  }
});

test('buildAuthHeaders adds a bearer header only when a token is present', () => {
  assert.deepEqual(buildAuthHeaders(parseRepositoryUrl('https://host/owner/repo')), {});
  assert.deepEqual(buildAuthHeaders(parseRepositoryUrl('https://host/owner/repo/test-token')), {
    Authorization: 'Bearer test-token'
  });
});

describe('listFiles', () => {
  test('keeps blob entries in listing order with lower-case digests', async () => {
    serveRepository();

    const files = await createSource().listFiles(parseRepositoryUrl('https://host/owner/repo'));

    assert.deepEqual(files, [
      { path: 'code/app.py', contentDigest: computeBlobDigest(Buffer.from(APP_SOURCE)) },
      { path: 'README.md', contentDigest: computeBlobDigest(Buffer.from(README)) }
    ]);
    assert.equal(server.requests[0].url, TREE_PATH);
  });

  test('raises empty-repository when the tree has no files', async () => {
    server.route('GET', TREE_PATH, (_req, res) => sendJson(res, 200, { tree: [{ path: 'docs', type: 'tree', sha: 'b'.repeat(40) }] }));
    await assert.rejects(createSource().listFiles(parseRepositoryUrl('https://host/owner/repo')), EmptyRepositoryError);
  });

  test('raises empty-repository when the tree is missing', async () => {
    server.route('GET', TREE_PATH, (_req, res) => sendJson(res, 200, { message: 'Git Repository is empty.' }));
    await assert.rejects(createSource().listFiles(parseRepositoryUrl('https://host/owner/repo')), EmptyRepositoryError);
  });

  test('raises empty-repository when the branch does not exist', async () => {
    await assert.rejects(
      createSource().listFiles(parseRepositoryUrl('https://host/owner/repo')),
      (err: unknown) => {
        assert.ok(err instanceof EmptyRepositoryError);
        assert.equal(err.message, "Repository is empty. Does the 'main' branch exist?");
        return true;
      }
    );
    assert.equal(server.requests.length, 1);
  });
});

describe('openFirmware', () => {
  test('lists eagerly and downloads lazily, one file at a time', async () => {
    serveRepository();

    const files = await createSource().openFirmware('https://host/owner/repo');
    assert.equal(server.requests.length, 1);

    const iterator = files[Symbol.asyncIterator]();
    const first = await iterator.next();
    assert.equal(first.done, false);
    assert.equal(server.requests.length, 2);
    assert.equal(server.requests[1].url, '/raw/owner/repo/main/code/app.py');

    const rest: DownloadedFile[] = [];
    for (let next = await iterator.next(); !next.done; next = await iterator.next()) {
      rest.push(next.value);
    }
    assert.equal(rest.length, 1);
    assert.equal(rest[0].path, 'README.md');
    assert.equal(rest[0].bytes.toString('utf8'), README);
    assert.equal(server.requests.length, 3);
  });

  test('sends no authorization header when the URL carries no token', async () => {
    serveRepository();

    await collect(await createSource().openFirmware('https://host/owner/repo'));

    assert.equal(server.requests.length, 3);
    for (const request of server.requests) {
      assert.equal(request.headers.authorization, undefined);
    }
  });

  test('sends the token verbatim as a bearer credential on every request', async () => {
    serveRepository();

    const downloaded = await collect(await createSource().openFirmware('https://host/owner/repo/test-token'));

    assert.deepEqual(
      downloaded.map((file) => file.path),
      ['code/app.py', 'README.md']
    );
    assert.equal(server.requests.length, 3);
    for (const request of server.requests) {
      assert.equal(request.headers.authorization, 'Bearer test-token');
    }
  });

  test('fails on a malformed URL before any request is made', async () => {
    await assert.rejects(createSource().openFirmware('https://host/only-owner'), InvalidRepositoryUrlError);
    assert.equal(server.requests.length, 0);
  });

  test('fails on an empty repository before any download', async () => {
    server.route('GET', TREE_PATH, (_req, res) => sendJson(res, 200, { tree: [] }));
    await assert.rejects(createSource().openFirmware('https://host/owner/repo'), EmptyRepositoryError);
    assert.equal(server.requests.length, 1);
  });
});
