/**
 * Store error types.
 *
 * @packageDocumentation
 */

/**
 * Kind of store file problem.
 */
export type StoreErrorType = 'parse_error' | 'schema_error' | 'file_error';

/**
 * Error thrown when a store file cannot be read, parsed or written.
 */
export class StoreError extends Error {
  /** The type of store error. */
  public readonly errorType: StoreErrorType;
  /** Additional details about the error. */
  public readonly details: string | undefined;
  /** The underlying cause of the error if available. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new StoreError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The type of store error.
   * @param options - Additional error options.
   */
  constructor(
    message: string,
    errorType: StoreErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'StoreError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/**
 * Error thrown when a project already has a suggestion with the same title.
 */
export class DuplicateSuggestionError extends Error {
  public readonly projectId: string;
  public readonly title: string;

  /**
   * Creates a new DuplicateSuggestionError.
   *
   * @param projectId - Project the insert targeted.
   * @param title - Conflicting title.
   */
  constructor(projectId: string, title: string) {
    super(`Project '${projectId}' already has a suggestion titled '${title}'`);
    this.name = 'DuplicateSuggestionError';
    this.projectId = projectId;
    this.title = title;
  }
}

/**
 * Error thrown when a suggestion id does not exist.
 */
export class SuggestionNotFoundError extends Error {
  public readonly suggestionId: number;

  /**
   * Creates a new SuggestionNotFoundError.
   *
   * @param suggestionId - The id that was looked up.
   */
  constructor(suggestionId: number) {
    super(`Suggestion ${String(suggestionId)} not found`);
    this.name = 'SuggestionNotFoundError';
    this.suggestionId = suggestionId;
  }
}

/**
 * Error thrown when a write targets a project that does not exist.
 */
export class ProjectNotFoundError extends Error {
  public readonly projectId: string;

  /**
   * Creates a new ProjectNotFoundError.
   *
   * @param projectId - The id that was looked up.
   */
  constructor(projectId: string) {
    super(`Project '${projectId}' not found`);
    this.name = 'ProjectNotFoundError';
    this.projectId = projectId;
  }
}
