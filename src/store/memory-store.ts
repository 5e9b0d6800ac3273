/**
 * In-process store with the same uniqueness rules as a relational backend.
 *
 * @packageDocumentation
 */

import type { SuggestionStatus } from '../concepts/types.js';
import { DuplicateSuggestionError, ProjectNotFoundError } from './errors.js';
import type {
  AnalysisStore,
  DesignVersion,
  NewSuggestion,
  ProjectAnalysisUpdate,
  ProjectRecord,
  StoreData,
  Suggestion,
  SuggestionStatusUpdate,
  VersionSnapshot,
} from './types.js';

/**
 * Options for creating a MemoryStore.
 */
export interface MemoryStoreOptions {
  /** Initial contents. */
  data?: StoreData | undefined;
  /** Optional function to get current time (for testing). */
  now?: (() => Date) | undefined;
}

/**
 * Compares suggestions newest first: createdAt, then id, both descending.
 */
export function compareNewestFirst(a: Suggestion, b: Suggestion): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? 1 : -1;
  }
  return b.id - a.id;
}

function titleKey(projectId: string, title: string): string {
  return JSON.stringify([projectId, title]);
}

function versionKey(projectId: string, versionNumber: number): string {
  return JSON.stringify([projectId, versionNumber]);
}

function copySuggestion(suggestion: Suggestion): Suggestion {
  return { ...suggestion, triggerKeywords: [...suggestion.triggerKeywords] };
}

/**
 * Store held in memory.
 *
 * Enforces one suggestion per (projectId, title) and one version per
 * (projectId, versionNumber). Records handed out are copies.
 *
 * @example
 * ```typescript
 * const store = new MemoryStore();
 * await store.putProjectContent('p1', 'REST API with Postgres');
 * ```
 */
export class MemoryStore implements AnalysisStore {
  private readonly projects = new Map<string, ProjectRecord>();
  private readonly suggestions = new Map<number, Suggestion>();
  private readonly suggestionTitles = new Map<string, number>();
  private readonly versions = new Map<string, DesignVersion>();
  private nextSuggestionId = 1;
  private nextVersionId = 1;
  private readonly now: () => Date;

  /**
   * Creates a new MemoryStore.
   *
   * @param options - Initial data and clock.
   */
  constructor(options?: MemoryStoreOptions) {
    this.now = options?.now ?? ((): Date => new Date());
    if (options?.data !== undefined) {
      this.load(options.data);
    }
  }

  /**
   * Builds a store from serialized data.
   *
   * @param data - Store contents.
   * @param now - Optional clock.
   * @throws DuplicateSuggestionError if the data breaks title uniqueness.
   */
  static fromData(data: StoreData, now?: () => Date): MemoryStore {
    return new MemoryStore({ data, now });
  }

  /**
   * Serializes the store contents.
   */
  toData(): StoreData {
    const projects = [...this.projects.values()].sort((a, b) => a.id.localeCompare(b.id));
    const suggestions = [...this.suggestions.values()]
      .sort((a, b) => a.id - b.id)
      .map(copySuggestion);
    const versions = [...this.versions.values()].sort((a, b) => a.id - b.id);
    return {
      projects: projects.map((project) => ({ ...project })),
      suggestions,
      versions: versions.map((version) => ({ ...version })),
      nextSuggestionId: this.nextSuggestionId,
      nextVersionId: this.nextVersionId,
    };
  }

  /**
   * Creates a project or replaces its design text.
   *
   * A new project starts as DRAFT at version 0. Changing the text of an
   * analysed project moves it back to IN_PROGRESS.
   *
   * @param projectId - Project id.
   * @param content - Design text.
   * @param title - Title for a new project (defaults to the id), or a new title.
   * @returns The stored project.
   */
  putProjectContent(projectId: string, content: string, title?: string): Promise<ProjectRecord> {
    const updatedAt = this.now().toISOString();
    const existing = this.projects.get(projectId);

    let project: ProjectRecord;
    if (existing === undefined) {
      project = {
        id: projectId,
        title: title ?? projectId,
        content,
        currentVersion: 0,
        maturityScore: 0,
        maturityReason: null,
        status: 'DRAFT',
        updatedAt,
      };
    } else {
      const changed = existing.content !== content;
      project = {
        ...existing,
        title: title ?? existing.title,
        content,
        status: changed && existing.status === 'ANALYZED' ? 'IN_PROGRESS' : existing.status,
        updatedAt: changed ? updatedAt : existing.updatedAt,
      };
    }

    this.projects.set(projectId, project);
    return Promise.resolve({ ...project });
  }

  getProject(projectId: string): Promise<ProjectRecord | null> {
    const project = this.projects.get(projectId);
    return Promise.resolve(project === undefined ? null : { ...project });
  }

  getProjectContent(projectId: string): Promise<string> {
    return Promise.resolve(this.projects.get(projectId)?.content ?? '');
  }

  updateProjectAnalysis(projectId: string, update: ProjectAnalysisUpdate): Promise<void> {
    const existing = this.projects.get(projectId);
    if (existing === undefined) {
      return Promise.reject(new ProjectNotFoundError(projectId));
    }
    this.projects.set(projectId, {
      ...existing,
      status: update.status,
      maturityScore: update.maturityScore,
      maturityReason: update.maturityReason,
      currentVersion: update.currentVersion,
      updatedAt: update.updatedAt,
    });
    return Promise.resolve();
  }

  listSuggestions(projectId: string, status?: SuggestionStatus): Promise<Suggestion[]> {
    const matching = [...this.suggestions.values()].filter(
      (suggestion) =>
        suggestion.projectId === projectId && (status === undefined || suggestion.status === status)
    );
    return Promise.resolve(matching.sort(compareNewestFirst).map(copySuggestion));
  }

  getSuggestion(id: number): Promise<Suggestion | null> {
    const suggestion = this.suggestions.get(id);
    return Promise.resolve(suggestion === undefined ? null : copySuggestion(suggestion));
  }

  insertSuggestion(suggestion: NewSuggestion): Promise<Suggestion> {
    const key = titleKey(suggestion.projectId, suggestion.title);
    if (this.suggestionTitles.has(key)) {
      return Promise.reject(new DuplicateSuggestionError(suggestion.projectId, suggestion.title));
    }

    const stored: Suggestion = {
      id: this.nextSuggestionId,
      projectId: suggestion.projectId,
      title: suggestion.title,
      description: suggestion.description,
      category: suggestion.category,
      severity: suggestion.severity,
      designVersion: suggestion.designVersion,
      status: 'OPEN',
      addressedAt: null,
      addressedInVersion: null,
      triggerKeywords: [...suggestion.triggerKeywords],
      createdAt: suggestion.createdAt,
    };
    this.nextSuggestionId += 1;
    this.suggestions.set(stored.id, stored);
    this.suggestionTitles.set(key, stored.id);
    return Promise.resolve(copySuggestion(stored));
  }

  updateSuggestionStatus(id: number, update: SuggestionStatusUpdate): Promise<Suggestion | null> {
    const existing = this.suggestions.get(id);
    if (existing === undefined) {
      return Promise.resolve(null);
    }
    const updated: Suggestion = {
      ...existing,
      status: update.status,
      addressedAt: update.addressedAt,
      addressedInVersion: update.addressedInVersion,
    };
    this.suggestions.set(id, updated);
    return Promise.resolve(copySuggestion(updated));
  }

  getLatestVersion(projectId: string): Promise<DesignVersion | null> {
    let latest: DesignVersion | null = null;
    for (const version of this.versions.values()) {
      if (
        version.projectId === projectId &&
        (latest === null || version.versionNumber > latest.versionNumber)
      ) {
        latest = version;
      }
    }
    return Promise.resolve(latest === null ? null : { ...latest });
  }

  getVersion(projectId: string, versionNumber: number): Promise<DesignVersion | null> {
    const version = this.versions.get(versionKey(projectId, versionNumber));
    return Promise.resolve(version === undefined ? null : { ...version });
  }

  listVersions(projectId: string): Promise<DesignVersion[]> {
    const versions = [...this.versions.values()]
      .filter((version) => version.projectId === projectId)
      .sort((a, b) => a.versionNumber - b.versionNumber);
    return Promise.resolve(versions.map((version) => ({ ...version })));
  }

  upsertVersion(snapshot: VersionSnapshot): Promise<DesignVersion> {
    const key = versionKey(snapshot.projectId, snapshot.versionNumber);
    const existing = this.versions.get(key);

    const stored: DesignVersion =
      existing === undefined
        ? {
            id: this.nextVersionId,
            projectId: snapshot.projectId,
            versionNumber: snapshot.versionNumber,
            content: snapshot.content,
            maturityScore: snapshot.maturityScore,
            suggestionsCount: snapshot.suggestionsCount,
            createdAt: snapshot.createdAt,
          }
        : {
            ...existing,
            content: snapshot.content,
            maturityScore: snapshot.maturityScore,
            suggestionsCount: snapshot.suggestionsCount,
          };

    if (existing === undefined) {
      this.nextVersionId += 1;
    }
    this.versions.set(key, stored);
    return Promise.resolve({ ...stored });
  }

  private load(data: StoreData): void {
    for (const project of data.projects) {
      this.projects.set(project.id, { ...project });
    }
    for (const suggestion of data.suggestions) {
      const key = titleKey(suggestion.projectId, suggestion.title);
      if (this.suggestionTitles.has(key)) {
        throw new DuplicateSuggestionError(suggestion.projectId, suggestion.title);
      }
      this.suggestions.set(suggestion.id, copySuggestion(suggestion));
      this.suggestionTitles.set(key, suggestion.id);
    }
    for (const version of data.versions) {
      this.versions.set(versionKey(version.projectId, version.versionNumber), { ...version });
    }

    const maxSuggestionId = Math.max(0, ...data.suggestions.map((s) => s.id));
    const maxVersionId = Math.max(0, ...data.versions.map((v) => v.id));
    this.nextSuggestionId = Math.max(data.nextSuggestionId, maxSuggestionId + 1);
    this.nextVersionId = Math.max(data.nextVersionId, maxVersionId + 1);
  }
}
