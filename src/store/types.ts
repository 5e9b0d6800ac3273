/**
 * Persisted records and the storage capabilities the engine depends on.
 *
 * The engine never talks to a database directly. It is given an
 * {@link AnalysisStore}; the package ships an in-memory adapter and a
 * JSON-file adapter.
 *
 * @packageDocumentation
 */

import type {
  Category,
  ProjectStatus,
  Severity,
  SuggestionStatus,
} from '../concepts/types.js';

/**
 * A persisted, user-visible recommendation. At most one exists per
 * (projectId, title).
 */
export interface Suggestion {
  readonly id: number;
  readonly projectId: string;
  readonly title: string;
  readonly description: string;
  readonly category: Category;
  readonly severity: Severity;
  /** Version of the design the suggestion was created at. */
  readonly designVersion: number;
  readonly status: SuggestionStatus;
  /** ISO-8601 time the suggestion was last marked ADDRESSED. */
  readonly addressedAt: string | null;
  readonly addressedInVersion: number | null;
  /** Keywords whose appearance resolves the suggestion. Empty for legacy records. */
  readonly triggerKeywords: readonly string[];
  readonly createdAt: string;
}

/**
 * Fields supplied when a suggestion is created. New suggestions start OPEN.
 */
export interface NewSuggestion {
  readonly projectId: string;
  readonly title: string;
  readonly description: string;
  readonly category: Category;
  readonly severity: Severity;
  readonly designVersion: number;
  readonly triggerKeywords: readonly string[];
  readonly createdAt: string;
}

/**
 * A status change applied to a suggestion.
 */
export interface SuggestionStatusUpdate {
  readonly status: SuggestionStatus;
  readonly addressedAt: string | null;
  readonly addressedInVersion: number | null;
}

/**
 * Snapshot of a design at a version number.
 */
export interface DesignVersion {
  readonly id: number;
  readonly projectId: string;
  /** 1-based, unique per project. */
  readonly versionNumber: number;
  readonly content: string;
  /** Maturity score 0..5 at snapshot time. */
  readonly maturityScore: number;
  /** OPEN suggestions at snapshot time. */
  readonly suggestionsCount: number;
  readonly createdAt: string;
}

/**
 * Fields written by a version snapshot. `createdAt` is only used when the
 * snapshot is inserted.
 */
export interface VersionSnapshot {
  readonly projectId: string;
  readonly versionNumber: number;
  readonly content: string;
  readonly maturityScore: number;
  readonly suggestionsCount: number;
  readonly createdAt: string;
}

/**
 * The project aggregate owned by the surrounding application.
 */
export interface ProjectRecord {
  readonly id: string;
  readonly title: string;
  /** Current design document text. */
  readonly content: string;
  /** Latest analysed version; 0 before the first analysis. */
  readonly currentVersion: number;
  readonly maturityScore: number;
  readonly maturityReason: string | null;
  readonly status: ProjectStatus;
  readonly updatedAt: string;
}

/**
 * Aggregate fields written back after an analysis.
 */
export interface ProjectAnalysisUpdate {
  readonly status: ProjectStatus;
  readonly maturityScore: number;
  readonly maturityReason: string;
  readonly currentVersion: number;
  readonly updatedAt: string;
}

/**
 * Read and write access to project aggregates.
 */
export interface ContentStore {
  /** Returns the project, or null if it does not exist. */
  getProject(projectId: string): Promise<ProjectRecord | null>;
  /** Returns the project's design text, or an empty string when there is none. */
  getProjectContent(projectId: string): Promise<string>;
  /** Writes analysis results onto an existing project. */
  updateProjectAnalysis(projectId: string, update: ProjectAnalysisUpdate): Promise<void>;
}

/**
 * Suggestion persistence with a (projectId, title) uniqueness constraint.
 */
export interface SuggestionStore {
  /** Lists a project's suggestions, newest first (createdAt, then id, descending). */
  listSuggestions(projectId: string, status?: SuggestionStatus): Promise<Suggestion[]>;
  getSuggestion(id: number): Promise<Suggestion | null>;
  /**
   * Inserts a suggestion with status OPEN.
   *
   * @throws DuplicateSuggestionError if the project already has the title.
   */
  insertSuggestion(suggestion: NewSuggestion): Promise<Suggestion>;
  /** Applies a status change; returns null for an unknown id. */
  updateSuggestionStatus(id: number, update: SuggestionStatusUpdate): Promise<Suggestion | null>;
}

/**
 * Version snapshot persistence with a (projectId, versionNumber) uniqueness
 * constraint.
 */
export interface VersionStore {
  getLatestVersion(projectId: string): Promise<DesignVersion | null>;
  getVersion(projectId: string, versionNumber: number): Promise<DesignVersion | null>;
  /** Lists a project's versions in ascending version order. */
  listVersions(projectId: string): Promise<DesignVersion[]>;
  /** Updates the snapshot in place when it exists, inserts it otherwise. */
  upsertVersion(snapshot: VersionSnapshot): Promise<DesignVersion>;
}

/**
 * Everything the engine needs from persistence.
 */
export type AnalysisStore = ContentStore & SuggestionStore & VersionStore;

/**
 * Serializable contents of a store.
 */
export interface StoreData {
  readonly projects: readonly ProjectRecord[];
  readonly suggestions: readonly Suggestion[];
  readonly versions: readonly DesignVersion[];
  readonly nextSuggestionId: number;
  readonly nextVersionId: number;
}
