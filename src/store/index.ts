/**
 * Persistence capabilities and reference adapters.
 *
 * @packageDocumentation
 */

export {
  StoreError,
  DuplicateSuggestionError,
  SuggestionNotFoundError,
  ProjectNotFoundError,
} from './errors.js';
export type { StoreErrorType } from './errors.js';
export { MemoryStore, compareNewestFirst } from './memory-store.js';
export type { MemoryStoreOptions } from './memory-store.js';
export {
  JsonFileStore,
  STORE_FORMAT_VERSION,
  serializeStore,
  deserializeStore,
} from './json-store.js';
export type { JsonFileStoreOptions } from './json-store.js';
export type {
  AnalysisStore,
  ContentStore,
  DesignVersion,
  NewSuggestion,
  ProjectAnalysisUpdate,
  ProjectRecord,
  StoreData,
  Suggestion,
  SuggestionStatusUpdate,
  SuggestionStore,
  VersionSnapshot,
  VersionStore,
} from './types.js';
