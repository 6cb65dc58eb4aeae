import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CancelledError, PersistenceError } from '../src/errors.js';
import type { Reading } from '../src/model.js';
import { createNoOpLogger } from '../src/shared/logger/index.js';
import { LocalObjectStore } from '../src/storage/local-object-store.js';
import { contentTypeFor, type ObjectStore } from '../src/storage/object-store.js';
import { readingKey, resultKeys, ResultStore } from '../src/storage/result-store.js';
import { MemoryObjectStore } from './helpers/fakes.js';

function reading(iteration: number): Reading {
  return {
    runId: 'd20261019',
    date: '2026-10-19',
    iteration,
    takenAt: '2026-10-19T10:00:00.000Z',
    measurements: {
      alpha: {
        timestamp: '2026-10-19T10:00:00.000Z',
        iteration,
        ttfbMs: 812.4,
        totalMs: 812.4,
        statusCode: 200
      }
    },
    errors: {}
  };
}

describe('key layout', () => {
  it('partitions reports by UTC date', () => {
    expect(resultKeys('20261019-ab12', new Date('2026-10-19T23:30:00-05:00'))).toEqual({
      json: '2026/10/20/20261019-ab12/results.json',
      markdown: '2026/10/20/20261019-ab12/results.md'
    });
  });

  it('pads reading iterations to three digits', () => {
    expect(readingKey('2026-10-19', 3)).toBe('runs/2026-10-19/reading-003.json');
    expect(readingKey('2026-10-19', 120)).toBe('runs/2026-10-19/reading-120.json');
  });

  it('maps extensions to content types', () => {
    expect(contentTypeFor('a/results.json')).toBe('application/json');
    expect(contentTypeFor('a/results.md')).toBe('text/markdown; charset=utf-8');
    expect(contentTypeFor('a/results.bin')).toBe('application/octet-stream');
  });
});

describe('ResultStore', () => {
  let store: MemoryObjectStore;
  let results: ResultStore;

  beforeEach(() => {
    store = new MemoryObjectStore();
    results = new ResultStore(store, createNoOpLogger());
  });

  it('saves readings as JSON', async () => {
    const key = await results.saveReading('2026-10-19', 1, reading(1));

    expect(key).toBe('runs/2026-10-19/reading-001.json');
    expect(store.objects.get(key)?.contentType).toBe('application/json');
  });

  it('loads every valid reading in iteration order and skips the rest', async () => {
    await results.saveReading('2026-10-19', 2, reading(2));
    await results.saveReading('2026-10-19', 0, reading(0));
    await store.put('runs/2026-10-19/reading-001.json', '{"not":"a reading"}', 'application/json');
    await store.put('runs/2026-10-19/reading-003.json', '{truncated', 'application/json');
    await results.saveReading('2026-10-20', 0, reading(0));

    const loaded = await results.loadAllReadings('2026-10-19');
    expect(loaded.map((r) => r.iteration)).toEqual([0, 2]);
  });

  it('removes only the readings of the given date', async () => {
    await results.saveReading('2026-10-19', 0, reading(0));
    await results.saveReading('2026-10-19', 1, reading(1));
    await results.saveReading('2026-10-20', 0, reading(0));

    await expect(results.cleanupRun('2026-10-19')).resolves.toBe(2);
    expect([...store.objects.keys()]).toEqual(['runs/2026-10-20/reading-000.json']);
  });

  it('wraps storage failures in PersistenceError', async () => {
    const failing: ObjectStore = {
      description: 'failing',
      put: async () => {
        throw new Error('access denied');
      },
      get: async () => null,
      list: async () => [],
      delete: async () => {}
    };
    const failingResults = new ResultStore(failing, createNoOpLogger());

    await expect(failingResults.saveReading('2026-10-19', 0, reading(0))).rejects.toThrow(
      new PersistenceError('runs/2026-10-19/reading-000.json', 'access denied')
    );
  });

  it('passes cancellation through unwrapped', async () => {
    const controller = new AbortController();
    controller.abort();
    const local = new ResultStore(new LocalObjectStore(tmpdir()), createNoOpLogger());

    await expect(
      local.saveReading('2026-10-19', 0, reading(0), controller.signal)
    ).rejects.toBeInstanceOf(CancelledError);
    await expect(local.loadAllReadings('2026-10-19', controller.signal)).rejects.toBeInstanceOf(
      CancelledError
    );
  });
});

describe('LocalObjectStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'coldstart-bench-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes, lists and deletes objects by key', async () => {
    const store = new LocalObjectStore(root);
    await store.put('2026/10/19/r1/results.json', '{"ok":true}');
    await store.put('2026/10/19/r1/results.md', '# Results');
    await store.put('runs/2026-10-19/reading-000.json', '{}');

    await expect(store.get('2026/10/19/r1/results.json')).resolves.toBe('{"ok":true}');
    await expect(store.get('missing.json')).resolves.toBeNull();
    await expect(store.list('2026/')).resolves.toEqual([
      '2026/10/19/r1/results.json',
      '2026/10/19/r1/results.md'
    ]);

    await store.delete('2026/10/19/r1/results.md');
    await expect(store.list('2026/')).resolves.toEqual(['2026/10/19/r1/results.json']);
  });

  it('replaces objects without leaving temp files behind', async () => {
    const store = new LocalObjectStore(root);
    await store.put('r1/results.json', 'first');
    await store.put('r1/results.json', 'second');

    await expect(store.get('r1/results.json')).resolves.toBe('second');
    expect(await readdir(join(root, 'r1'))).toEqual(['results.json']);
  });

  it('rejects keys outside the root', async () => {
    const store = new LocalObjectStore(root);
    await expect(store.put('../escape.json', '{}')).rejects.toThrow(
      'Key escapes the store root: ../escape.json'
    );
  });

  it('lists nothing for a root that does not exist yet', async () => {
    const store = new LocalObjectStore(join(root, 'not-created'));
    await expect(store.list('')).resolves.toEqual([]);
  });
});
