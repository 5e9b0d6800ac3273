import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { DuplicateSuggestionError, MemoryStore, ProjectNotFoundError } from './index.js';
import type { NewSuggestion } from './index.js';

const FIXED_NOW = new Date('2026-03-01T10:00:00.000Z');

function newSuggestion(overrides: Partial<NewSuggestion> = {}): NewSuggestion {
  return {
    projectId: 'p1',
    title: 'Add Caching Layer',
    description: 'Consider a cache.',
    category: 'CACHING',
    severity: 'WARNING',
    designVersion: 1,
    triggerKeywords: ['cache', 'redis'],
    createdAt: '2026-03-01T10:00:00.000Z',
    ...overrides,
  };
}

describe('MemoryStore', () => {
  describe('projects', () => {
    it('should create a DRAFT project at version 0', async () => {
      const store = new MemoryStore({ now: () => FIXED_NOW });
      const project = await store.putProjectContent('p1', 'REST API');

      expect(project).toEqual({
        id: 'p1',
        title: 'p1',
        content: 'REST API',
        currentVersion: 0,
        maturityScore: 0,
        maturityReason: null,
        status: 'DRAFT',
        updatedAt: '2026-03-01T10:00:00.000Z',
      });
      expect(await store.getProjectContent('p1')).toBe('REST API');
    });

    it('should return null for unknown projects', async () => {
      const store = new MemoryStore();
      expect(await store.getProject('missing')).toBeNull();
      expect(await store.getProjectContent('missing')).toBe('');
    });

    it('should move an analysed project back to IN_PROGRESS when its text changes', async () => {
      const store = new MemoryStore({ now: () => FIXED_NOW });
      await store.putProjectContent('p1', 'REST API', 'Checkout');
      await store.updateProjectAnalysis('p1', {
        status: 'ANALYZED',
        maturityScore: 1,
        maturityReason: 'Basic design (1/5): ✓ API layer defined',
        currentVersion: 1,
        updatedAt: '2026-03-01T10:00:00.000Z',
      });

      const unchanged = await store.putProjectContent('p1', 'REST API');
      expect(unchanged.status).toBe('ANALYZED');
      expect(unchanged.title).toBe('Checkout');

      const changed = await store.putProjectContent('p1', 'REST API with Redis');
      expect(changed.status).toBe('IN_PROGRESS');
      expect(changed.currentVersion).toBe(1);
    });

    it('should reject analysis updates for unknown projects', async () => {
      const store = new MemoryStore();
      await expect(
        store.updateProjectAnalysis('missing', {
          status: 'ANALYZED',
          maturityScore: 0,
          maturityReason: 'x',
          currentVersion: 1,
          updatedAt: '2026-03-01T10:00:00.000Z',
        })
      ).rejects.toBeInstanceOf(ProjectNotFoundError);
    });
  });

  describe('suggestions', () => {
    it('should insert OPEN suggestions with increasing ids', async () => {
      const store = new MemoryStore();
      const first = await store.insertSuggestion(newSuggestion());
      const second = await store.insertSuggestion(newSuggestion({ title: 'Add Authentication' }));

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(first.status).toBe('OPEN');
      expect(first.addressedAt).toBeNull();
      expect(first.addressedInVersion).toBeNull();
    });

    it('should reject a second suggestion with the same project and title', async () => {
      const store = new MemoryStore();
      await store.insertSuggestion(newSuggestion());

      await expect(store.insertSuggestion(newSuggestion())).rejects.toBeInstanceOf(
        DuplicateSuggestionError
      );
      expect(await store.insertSuggestion(newSuggestion({ projectId: 'p2' }))).toMatchObject({
        id: 2,
        projectId: 'p2',
      });
    });

    it('should list newest first and break createdAt ties by id', async () => {
      const store = new MemoryStore();
      await store.insertSuggestion(newSuggestion({ title: 'A', createdAt: '2026-03-01T10:00:00.000Z' }));
      await store.insertSuggestion(newSuggestion({ title: 'B', createdAt: '2026-03-02T10:00:00.000Z' }));
      await store.insertSuggestion(newSuggestion({ title: 'C', createdAt: '2026-03-01T10:00:00.000Z' }));

      const titles = (await store.listSuggestions('p1')).map((s) => s.title);
      expect(titles).toEqual(['B', 'C', 'A']);
    });

    it('should filter by status', async () => {
      const store = new MemoryStore();
      const a = await store.insertSuggestion(newSuggestion({ title: 'A' }));
      await store.insertSuggestion(newSuggestion({ title: 'B' }));
      await store.updateSuggestionStatus(a.id, {
        status: 'IGNORED',
        addressedAt: null,
        addressedInVersion: null,
      });

      expect((await store.listSuggestions('p1', 'OPEN')).map((s) => s.title)).toEqual(['B']);
      expect((await store.listSuggestions('p1', 'IGNORED')).map((s) => s.title)).toEqual(['A']);
    });

    it('should return null when updating an unknown suggestion', async () => {
      const store = new MemoryStore();
      expect(
        await store.updateSuggestionStatus(42, {
          status: 'OPEN',
          addressedAt: null,
          addressedInVersion: null,
        })
      ).toBeNull();
      expect(await store.getSuggestion(42)).toBeNull();
    });

    it('should hand out copies', async () => {
      const store = new MemoryStore();
      const inserted = await store.insertSuggestion(newSuggestion());
      const keywords = inserted.triggerKeywords as string[];
      keywords.push('mutated');

      const reloaded = await store.getSuggestion(inserted.id);
      expect(reloaded?.triggerKeywords).toEqual(['cache', 'redis']);
    });

    it('should keep at most one suggestion per title under any insert order', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.array(fc.constantFrom('A', 'B', 'C', 'D'), { maxLength: 20 }),
          async (titles) => {
            const store = new MemoryStore();
            for (const title of titles) {
              await store.insertSuggestion(newSuggestion({ title })).catch((error: unknown) => {
                expect(error).toBeInstanceOf(DuplicateSuggestionError);
              });
            }
            const stored = (await store.listSuggestions('p1')).map((s) => s.title);
            expect(stored.length).toBe(new Set(titles).size);
            expect(new Set(stored).size).toBe(stored.length);
          }
        )
      );
    });
  });

  describe('versions', () => {
    const snapshot = {
      projectId: 'p1',
      versionNumber: 1,
      content: 'REST API',
      maturityScore: 1,
      suggestionsCount: 15,
      createdAt: '2026-03-01T10:00:00.000Z',
    };

    it('should insert then update a snapshot in place', async () => {
      const store = new MemoryStore();
      const inserted = await store.upsertVersion(snapshot);
      const updated = await store.upsertVersion({
        ...snapshot,
        suggestionsCount: 14,
        createdAt: '2026-03-05T10:00:00.000Z',
      });

      expect(updated).toEqual({ ...inserted, suggestionsCount: 14 });
      expect(await store.listVersions('p1')).toHaveLength(1);
    });

    it('should list versions ascending and find the latest', async () => {
      const store = new MemoryStore();
      await store.upsertVersion({ ...snapshot, versionNumber: 2 });
      await store.upsertVersion(snapshot);
      await store.upsertVersion({ ...snapshot, projectId: 'p2', versionNumber: 7 });

      expect((await store.listVersions('p1')).map((v) => v.versionNumber)).toEqual([1, 2]);
      expect((await store.getLatestVersion('p1'))?.versionNumber).toBe(2);
      expect(await store.getLatestVersion('p3')).toBeNull();
      expect((await store.getVersion('p2', 7))?.id).toBe(3);
    });
  });

  describe('toData / fromData', () => {
    it('should restore the same contents and continue id sequences', async () => {
      const store = new MemoryStore({ now: () => FIXED_NOW });
      await store.putProjectContent('p1', 'REST API');
      await store.insertSuggestion(newSuggestion());
      await store.upsertVersion({
        projectId: 'p1',
        versionNumber: 1,
        content: 'REST API',
        maturityScore: 1,
        suggestionsCount: 1,
        createdAt: '2026-03-01T10:00:00.000Z',
      });

      const restored = MemoryStore.fromData(store.toData());
      expect(restored.toData()).toEqual(store.toData());

      const next = await restored.insertSuggestion(newSuggestion({ title: 'Other' }));
      expect(next.id).toBe(2);
    });

    it('should reject data with duplicate titles', () => {
      const duplicate = {
        id: 1,
        projectId: 'p1',
        title: 'A',
        description: 'd',
        category: 'GENERAL' as const,
        severity: 'INFO' as const,
        designVersion: 1,
        status: 'OPEN' as const,
        addressedAt: null,
        addressedInVersion: null,
        triggerKeywords: [],
        createdAt: '2026-03-01T10:00:00.000Z',
      };

      expect(() =>
        MemoryStore.fromData({
          projects: [],
          suggestions: [duplicate, { ...duplicate, id: 2 }],
          versions: [],
          nextSuggestionId: 3,
          nextVersionId: 1,
        })
      ).toThrow(DuplicateSuggestionError);
    });
  });
});
