/**
 * Store kept in a single JSON file.
 *
 * Every operation reads the file, applies the change to a {@link MemoryStore}
 * and, for writes, saves the whole store back with an atomic
 * temp-file-then-rename. Operations on one instance run one at a time.
 *
 * @packageDocumentation
 */

import { join, dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import { Ajv, type ErrorObject } from 'ajv';
import {
  CATEGORIES,
  MAX_MATURITY_SCORE,
  PROJECT_STATUSES,
  SEVERITIES,
  SUGGESTION_STATUSES,
  type SuggestionStatus,
} from '../concepts/types.js';
import { Logger, toError } from '../utils/logger.js';
import {
  isNotFoundError,
  safeMkdir,
  safeReadFile,
  safeRename,
  safeUnlink,
  safeWriteFile,
} from '../utils/safe-fs.js';
import { DuplicateSuggestionError, StoreError } from './errors.js';
import { MemoryStore } from './memory-store.js';
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

/** Version written into every store file. */
export const STORE_FORMAT_VERSION = 1;

interface StoreFile {
  version: number;
  projects: ProjectRecord[];
  suggestions: Suggestion[];
  versions: DesignVersion[];
  nextSuggestionId: number;
  nextVersionId: number;
}

const timestamp = { type: 'string', minLength: 1 };
const nonNegativeInteger = { type: 'integer', minimum: 0 };
const positiveInteger = { type: 'integer', minimum: 1 };

const STORE_FILE_SCHEMA = {
  type: 'object',
  required: [
    'version',
    'projects',
    'suggestions',
    'versions',
    'nextSuggestionId',
    'nextVersionId',
  ],
  additionalProperties: false,
  properties: {
    version: { type: 'integer', const: STORE_FORMAT_VERSION },
    projects: {
      type: 'array',
      items: {
        type: 'object',
        required: [
          'id',
          'title',
          'content',
          'currentVersion',
          'maturityScore',
          'maturityReason',
          'status',
          'updatedAt',
        ],
        additionalProperties: false,
        properties: {
          id: { type: 'string', minLength: 1 },
          title: { type: 'string' },
          content: { type: 'string' },
          currentVersion: nonNegativeInteger,
          maturityScore: { type: 'integer', minimum: 0, maximum: MAX_MATURITY_SCORE },
          maturityReason: { type: ['string', 'null'] },
          status: { type: 'string', enum: [...PROJECT_STATUSES] },
          updatedAt: timestamp,
        },
      },
    },
    suggestions: {
      type: 'array',
      items: {
        type: 'object',
        required: [
          'id',
          'projectId',
          'title',
          'description',
          'category',
          'severity',
          'designVersion',
          'status',
          'addressedAt',
          'addressedInVersion',
          'triggerKeywords',
          'createdAt',
        ],
        additionalProperties: false,
        properties: {
          id: positiveInteger,
          projectId: { type: 'string', minLength: 1 },
          title: { type: 'string', minLength: 1 },
          description: { type: 'string' },
          category: { type: 'string', enum: [...CATEGORIES] },
          severity: { type: 'string', enum: [...SEVERITIES] },
          designVersion: nonNegativeInteger,
          status: { type: 'string', enum: [...SUGGESTION_STATUSES] },
          addressedAt: { type: ['string', 'null'] },
          addressedInVersion: { type: ['integer', 'null'] },
          triggerKeywords: { type: 'array', items: { type: 'string' } },
          createdAt: timestamp,
        },
      },
    },
    versions: {
      type: 'array',
      items: {
        type: 'object',
        required: [
          'id',
          'projectId',
          'versionNumber',
          'content',
          'maturityScore',
          'suggestionsCount',
          'createdAt',
        ],
        additionalProperties: false,
        properties: {
          id: positiveInteger,
          projectId: { type: 'string', minLength: 1 },
          versionNumber: positiveInteger,
          content: { type: 'string' },
          maturityScore: { type: 'integer', minimum: 0, maximum: MAX_MATURITY_SCORE },
          suggestionsCount: nonNegativeInteger,
          createdAt: timestamp,
        },
      },
    },
    nextSuggestionId: positiveInteger,
    nextVersionId: positiveInteger,
  },
};

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateStoreFile = ajv.compile<StoreFile>(STORE_FILE_SCHEMA);

function formatSchemaError(error: ErrorObject): string {
  const path = error.instancePath === '' ? '/' : error.instancePath;
  return `${path}: ${error.message ?? 'is invalid'}`;
}

/**
 * Serializes store data to the file format.
 *
 * @param data - Store contents.
 * @returns Pretty-printed JSON with a trailing newline.
 */
export function serializeStore(data: StoreData): string {
  const file = { version: STORE_FORMAT_VERSION, ...data };
  return `${JSON.stringify(file, null, 2)}\n`;
}

/**
 * Parses and validates the file format.
 *
 * @param json - File contents.
 * @returns Store contents.
 * @throws StoreError with errorType parse_error or schema_error.
 */
export function deserializeStore(json: string): StoreData {
  if (json.trim() === '') {
    throw new StoreError('Store file is empty', 'parse_error', {
      details: 'The file exists but contains no data',
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    const cause = toError(error);
    throw new StoreError(`Invalid JSON: ${cause.message}`, 'parse_error', { cause });
  }

  if (!validateStoreFile(parsed)) {
    const violations = (validateStoreFile.errors ?? []).map(formatSchemaError);
    throw new StoreError(`Schema validation failed: ${violations.join('; ')}`, 'schema_error', {
      details: violations.join('\n'),
    });
  }

  return {
    projects: parsed.projects,
    suggestions: parsed.suggestions,
    versions: parsed.versions,
    nextSuggestionId: parsed.nextSuggestionId,
    nextVersionId: parsed.nextVersionId,
  };
}

/**
 * Options for creating a JsonFileStore.
 */
export interface JsonFileStoreOptions {
  /** Path of the store file. Created on the first write. */
  path: string;
  /** Optional function to get current time (for testing). */
  now?: (() => Date) | undefined;
  logger?: Logger | undefined;
}

/**
 * {@link AnalysisStore} backed by a JSON file.
 *
 * A missing file reads as an empty store.
 */
export class JsonFileStore implements AnalysisStore {
  /** Path of the store file. */
  readonly path: string;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private queue: Promise<void> = Promise.resolve();

  /**
   * Creates a new JsonFileStore.
   *
   * @param options - File path, clock and logger.
   */
  constructor(options: JsonFileStoreOptions) {
    this.path = options.path;
    this.now = options.now ?? ((): Date => new Date());
    this.logger = options.logger ?? new Logger({ component: 'JsonFileStore' });
  }

  /**
   * Creates a project or replaces its design text.
   *
   * @see MemoryStore.putProjectContent
   */
  putProjectContent(projectId: string, content: string, title?: string): Promise<ProjectRecord> {
    return this.write((store) => store.putProjectContent(projectId, content, title));
  }

  getProject(projectId: string): Promise<ProjectRecord | null> {
    return this.read((store) => store.getProject(projectId));
  }

  getProjectContent(projectId: string): Promise<string> {
    return this.read((store) => store.getProjectContent(projectId));
  }

  updateProjectAnalysis(projectId: string, update: ProjectAnalysisUpdate): Promise<void> {
    return this.write((store) => store.updateProjectAnalysis(projectId, update));
  }

  listSuggestions(projectId: string, status?: SuggestionStatus): Promise<Suggestion[]> {
    return this.read((store) => store.listSuggestions(projectId, status));
  }

  getSuggestion(id: number): Promise<Suggestion | null> {
    return this.read((store) => store.getSuggestion(id));
  }

  insertSuggestion(suggestion: NewSuggestion): Promise<Suggestion> {
    return this.write((store) => store.insertSuggestion(suggestion));
  }

  updateSuggestionStatus(id: number, update: SuggestionStatusUpdate): Promise<Suggestion | null> {
    return this.write((store) => store.updateSuggestionStatus(id, update));
  }

  getLatestVersion(projectId: string): Promise<DesignVersion | null> {
    return this.read((store) => store.getLatestVersion(projectId));
  }

  getVersion(projectId: string, versionNumber: number): Promise<DesignVersion | null> {
    return this.read((store) => store.getVersion(projectId, versionNumber));
  }

  listVersions(projectId: string): Promise<DesignVersion[]> {
    return this.read((store) => store.listVersions(projectId));
  }

  upsertVersion(snapshot: VersionSnapshot): Promise<DesignVersion> {
    return this.write((store) => store.upsertVersion(snapshot));
  }

  /**
   * Loads the whole store into memory.
   *
   * @throws StoreError if the file cannot be read or is invalid.
   */
  load(): Promise<MemoryStore> {
    return this.enqueue(() => this.loadFile());
  }

  private read<T>(operation: (store: MemoryStore) => Promise<T>): Promise<T> {
    return this.enqueue(async () => operation(await this.loadFile()));
  }

  private write<T>(operation: (store: MemoryStore) => Promise<T>): Promise<T> {
    return this.enqueue(async () => {
      const store = await this.loadFile();
      const result = await operation(store);
      await this.saveFile(store);
      return result;
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller observes failures through `run`; the queue only orders tasks.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async loadFile(): Promise<MemoryStore> {
    let content: string;
    try {
      content = await safeReadFile(this.path);
    } catch (error) {
      if (isNotFoundError(error)) {
        return new MemoryStore({ now: this.now });
      }
      const cause = toError(error);
      throw new StoreError(
        `Failed to read store file "${this.path}": ${cause.message}`,
        'file_error',
        { cause }
      );
    }

    try {
      return MemoryStore.fromData(deserializeStore(content), this.now);
    } catch (error) {
      if (error instanceof StoreError) {
        throw new StoreError(
          `Error loading store from "${this.path}": ${error.message}`,
          error.errorType,
          { cause: error.cause, details: error.details }
        );
      }
      if (error instanceof DuplicateSuggestionError) {
        throw new StoreError(
          `Error loading store from "${this.path}": ${error.message}`,
          'schema_error',
          { cause: error }
        );
      }
      throw error;
    }
  }

  private async saveFile(store: MemoryStore): Promise<void> {
    const json = serializeStore(store.toData());
    const directory = dirname(this.path);
    const tempPath = join(directory, `.store-${randomUUID()}.tmp`);

    try {
      await safeMkdir(directory);
      await safeWriteFile(tempPath, json);
      await safeRename(tempPath, this.path);
    } catch (error) {
      await safeUnlink(tempPath).catch((cleanupError: unknown) => {
        if (!isNotFoundError(cleanupError)) {
          this.logger.warn('temp_file_cleanup_failed', {
            path: tempPath,
            message: toError(cleanupError).message,
          });
        }
      });

      const cause = toError(error);
      throw new StoreError(
        `Failed to save store to "${this.path}": ${cause.message}`,
        'file_error',
        { cause, details: 'Check that the directory exists and is writable' }
      );
    }
  }
}
