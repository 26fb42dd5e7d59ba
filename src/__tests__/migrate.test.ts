import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { migrateEntries } from '../migrate.js';
import { hashComponents } from '../fingerprint.js';
import { TodoStore } from '../store.js';

describe('migrateEntries', () => {
  let tempDir: string;
  let todoPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'n1-todo-migrate-test-'));
    todoPath = path.join(tempDir, '.n1_todo.yaml');
  });

  afterEach(async () => {
    if (tempDir) await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('re-keys flat-location entries under the current composition', async () => {
    await fs.writeFile(todoPath, [
      '- fingerprint: 0123456789abcdef',
      '  query: SELECT * FROM users WHERE id = 5',
      '  location: app/models/user.ts:10 -> app/routes/users.ts:5',
      '  created_at: "2025-06-01T00:00:00.000Z"',
      '',
    ].join('\n'));
    const store = new TodoStore(todoPath);

    const result = await migrateEntries(store);

    assert.deepStrictEqual(result, { rewritten: 1, entries: 1 });
    assert.deepStrictEqual(await store.all(), [{
      fingerprint: hashComponents('SELECT * FROM users WHERE id = ?', 'app/models/user.ts:10 -> app/routes/users.ts:5', null),
      query: 'SELECT * FROM users WHERE id = ?',
      locations: [{ location: 'app/models/user.ts:10 -> app/routes/users.ts:5', testLocation: null }],
      createdAt: '2025-06-01T00:00:00.000Z',
    }]);
  });

  it('splits an entry whose locations now hash apart', async () => {
    await fs.writeFile(todoPath, [
      '- fingerprint: aaaaaaaaaaaaaaaa',
      '  query: SELECT * FROM posts WHERE id = ?',
      '  locations:',
      '    - location: a.ts:1',
      '      test_location: test/a.test.ts:3',
      '    - location: b.ts:2',
      '      test_location: null',
      '  created_at: "2026-01-01T00:00:00.000Z"',
      '',
    ].join('\n'));
    const store = new TodoStore(todoPath);

    const result = await migrateEntries(store);

    assert.deepStrictEqual(result, { rewritten: 2, entries: 2 });
    assert.deepStrictEqual(await store.fingerprints(), [
      hashComponents('SELECT * FROM posts WHERE id = ?', 'a.ts:1', 'test/a.test.ts'),
      hashComponents('SELECT * FROM posts WHERE id = ?', 'b.ts:2', null),
    ]);
    assert.deepStrictEqual((await store.all())[0].locations, [{ location: 'a.ts:1', testLocation: 'test/a.test.ts' }]);
  });

  it('merges entries that now share a fingerprint, keeping the earliest date', async () => {
    await fs.writeFile(todoPath, [
      '- fingerprint: 1111111111111111',
      '  query: SELECT * FROM users WHERE id = 1',
      '  location: a.ts:1',
      '  created_at: "2026-02-01T00:00:00.000Z"',
      '- fingerprint: 2222222222222222',
      '  query: SELECT * FROM users WHERE id = 2',
      '  location: a.ts:1',
      '  created_at: "2025-12-01T00:00:00.000Z"',
      '',
    ].join('\n'));
    const store = new TodoStore(todoPath);

    const result = await migrateEntries(store);

    assert.deepStrictEqual(result, { rewritten: 2, entries: 1 });
    const [entry] = await store.all();
    assert.strictEqual(entry.createdAt, '2025-12-01T00:00:00.000Z');
    assert.deepStrictEqual(entry.locations, [{ location: 'a.ts:1', testLocation: null }]);
  });

  it('leaves current entries untouched and is idempotent', async () => {
    const fingerprint = hashComponents('SELECT ?', 'a.ts:1', 'test/a.test.ts');
    const store = new TodoStore(todoPath);
    store.replaceAll([{
      fingerprint,
      query: 'SELECT ?',
      locations: [{ location: 'a.ts:1', testLocation: 'test/a.test.ts' }],
      createdAt: '2026-01-01T00:00:00.000Z',
    }]);

    assert.deepStrictEqual(await migrateEntries(store), { rewritten: 0, entries: 1 });
    assert.deepStrictEqual(await migrateEntries(store), { rewritten: 0, entries: 1 });
    assert.deepStrictEqual(await store.fingerprints(), [fingerprint]);
  });

  it('keys an entry without locations on its query alone', async () => {
    const store = new TodoStore(todoPath);
    store.replaceAll([{ fingerprint: 'old', query: 'SELECT 1', locations: [], createdAt: '2026-01-01T00:00:00.000Z' }]);

    assert.deepStrictEqual(await migrateEntries(store), { rewritten: 1, entries: 1 });
    assert.deepStrictEqual(await store.all(), [{
      fingerprint: hashComponents('SELECT ?', '', null),
      query: 'SELECT ?',
      locations: [],
      createdAt: '2026-01-01T00:00:00.000Z',
    }]);
  });

  it('does not write the file itself', async () => {
    const store = new TodoStore(todoPath);
    store.replaceAll([{ fingerprint: 'old', query: 'SELECT 1', locations: [], createdAt: '2026-01-01T00:00:00.000Z' }]);
    await migrateEntries(store);
    await assert.rejects(() => fs.stat(todoPath), { code: 'ENOENT' });
  });
});
