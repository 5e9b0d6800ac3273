import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DuplicateSuggestionError,
  JsonFileStore,
  STORE_FORMAT_VERSION,
  StoreError,
  deserializeStore,
  serializeStore,
} from './index.js';

const FIXED_NOW = new Date('2026-03-01T10:00:00.000Z');

describe('JsonFileStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'design-mentor-store-'));
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should read a missing file as an empty store', async () => {
    const store = new JsonFileStore({ path: join(dir, 'store.json') });
    expect(await store.getProject('p1')).toBeNull();
    expect(await store.listSuggestions('p1')).toEqual([]);
  });

  it('should create nested directories and persist across instances', async () => {
    const path = join(dir, 'nested', 'deeper', 'store.json');
    const store = new JsonFileStore({ path, now: () => FIXED_NOW });
    await store.putProjectContent('p1', 'REST API', 'Checkout');
    await store.insertSuggestion({
      projectId: 'p1',
      title: 'Add Caching Layer',
      description: 'Consider a cache.',
      category: 'CACHING',
      severity: 'WARNING',
      designVersion: 1,
      triggerKeywords: ['cache'],
      createdAt: '2026-03-01T10:00:00.000Z',
    });

    const reopened = new JsonFileStore({ path });
    expect((await reopened.getProject('p1'))?.title).toBe('Checkout');
    expect((await reopened.listSuggestions('p1')).map((s) => s.title)).toEqual([
      'Add Caching Layer',
    ]);

    const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
    expect(raw).toMatchObject({ version: STORE_FORMAT_VERSION, nextSuggestionId: 2 });
  });

  it('should leave no temp files behind', async () => {
    const store = new JsonFileStore({ path: join(dir, 'store.json') });
    await store.putProjectContent('p1', 'REST API');
    await store.putProjectContent('p2', 'gRPC service');

    expect(await readdir(dir)).toEqual(['store.json']);
  });

  it('should serialize concurrent writes from one instance', async () => {
    const store = new JsonFileStore({ path: join(dir, 'store.json') });
    const base = {
      projectId: 'p1',
      description: 'd',
      category: 'GENERAL' as const,
      severity: 'INFO' as const,
      designVersion: 1,
      triggerKeywords: [],
      createdAt: '2026-03-01T10:00:00.000Z',
    };

    await Promise.all([
      store.insertSuggestion({ ...base, title: 'A' }),
      store.insertSuggestion({ ...base, title: 'B' }),
      store.insertSuggestion({ ...base, title: 'C' }),
    ]);

    const ids = (await store.listSuggestions('p1')).map((s) => s.id).sort();
    expect(ids).toEqual([1, 2, 3]);
  });

  it('should keep running after a failed operation', async () => {
    const store = new JsonFileStore({ path: join(dir, 'store.json') });
    const suggestion = {
      projectId: 'p1',
      title: 'A',
      description: 'd',
      category: 'GENERAL' as const,
      severity: 'INFO' as const,
      designVersion: 1,
      triggerKeywords: [],
      createdAt: '2026-03-01T10:00:00.000Z',
    };
    await store.insertSuggestion(suggestion);

    await expect(store.insertSuggestion(suggestion)).rejects.toBeInstanceOf(
      DuplicateSuggestionError
    );
    expect(await store.listSuggestions('p1')).toHaveLength(1);
  });

  it('should report an empty file as a parse error', async () => {
    const path = join(dir, 'store.json');
    await writeFile(path, '   \n');
    const store = new JsonFileStore({ path });

    await expect(store.getProject('p1')).rejects.toMatchObject({
      name: 'StoreError',
      errorType: 'parse_error',
      message: `Error loading store from "${path}": Store file is empty`,
    });
  });

  it('should report invalid JSON as a parse error', async () => {
    const path = join(dir, 'store.json');
    await writeFile(path, '{ not json');
    const store = new JsonFileStore({ path });

    await expect(store.load()).rejects.toMatchObject({ errorType: 'parse_error' });
  });

  it('should report a bad status as a schema error', async () => {
    const path = join(dir, 'store.json');
    const data = JSON.parse(
      serializeStore({
        projects: [],
        suggestions: [
          {
            id: 1,
            projectId: 'p1',
            title: 'A',
            description: 'd',
            category: 'GENERAL',
            severity: 'INFO',
            designVersion: 1,
            status: 'OPEN',
            addressedAt: null,
            addressedInVersion: null,
            triggerKeywords: [],
            createdAt: '2026-03-01T10:00:00.000Z',
          },
        ],
        versions: [],
        nextSuggestionId: 2,
        nextVersionId: 1,
      })
    ) as { suggestions: { status: string }[] };
    data.suggestions[0] = { ...data.suggestions[0], status: 'DONE' };
    await writeFile(path, JSON.stringify(data));

    const error: unknown = await new JsonFileStore({ path }).load().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(StoreError);
    expect((error as StoreError).errorType).toBe('schema_error');
    expect((error as StoreError).message).toContain('/suggestions/0/status');
  });
});

describe('deserializeStore', () => {
  it('should reject an unknown format version', () => {
    const json = JSON.stringify({
      version: 99,
      projects: [],
      suggestions: [],
      versions: [],
      nextSuggestionId: 1,
      nextVersionId: 1,
    });

    expect(() => deserializeStore(json)).toThrow(StoreError);
  });

  it('should accept what serializeStore writes', () => {
    const data = {
      projects: [],
      suggestions: [],
      versions: [],
      nextSuggestionId: 1,
      nextVersionId: 1,
    };
    expect(deserializeStore(serializeStore(data))).toEqual(data);
  });
});
