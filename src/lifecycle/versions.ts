/**
 * Version numbering and snapshots.
 *
 * @packageDocumentation
 */

import type { DesignVersion, VersionStore } from '../store/types.js';
import { Logger } from '../utils/logger.js';

/**
 * Options for creating a VersionReconciler.
 */
export interface VersionReconcilerOptions {
  readonly store: VersionStore;
  /** Optional function to get current time (for testing). */
  readonly now?: (() => Date) | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Decides which version an analysis belongs to and records snapshots.
 *
 * Version numbers start at 1 and only grow; a new number is issued only
 * when the text differs from the latest snapshot.
 */
export class VersionReconciler {
  private readonly store: VersionStore;
  private readonly now: () => Date;
  private readonly logger: Logger;

  /**
   * Creates a new VersionReconciler.
   *
   * @param options - Store, clock and logger.
   */
  constructor(options: VersionReconcilerOptions) {
    this.store = options.store;
    this.now = options.now ?? ((): Date => new Date());
    this.logger = options.logger ?? new Logger({ component: 'VersionReconciler' });
  }

  /**
   * Returns the version number for the given text.
   *
   * @param projectId - Project being analysed.
   * @param content - Current design text.
   * @returns 1 with no history, latest + 1 when the text changed, latest otherwise.
   */
  async reconcile(projectId: string, content: string): Promise<number> {
    const latest = await this.store.getLatestVersion(projectId);
    if (latest === null) {
      this.logger.debug('version_first', { projectId });
      return 1;
    }
    if (latest.content !== content) {
      const next = latest.versionNumber + 1;
      this.logger.debug('version_incremented', { projectId, version: next });
      return next;
    }
    this.logger.debug('version_unchanged', { projectId, version: latest.versionNumber });
    return latest.versionNumber;
  }

  /**
   * Records a snapshot, updating the existing one for the same version.
   *
   * @param projectId - Project id.
   * @param content - Design text.
   * @param versionNumber - Version to record.
   * @param maturityScore - Score at snapshot time.
   * @param openCount - OPEN suggestions at snapshot time.
   */
  snapshot(
    projectId: string,
    content: string,
    versionNumber: number,
    maturityScore: number,
    openCount: number
  ): Promise<DesignVersion> {
    return this.store.upsertVersion({
      projectId,
      versionNumber,
      content,
      maturityScore,
      suggestionsCount: openCount,
      createdAt: this.now().toISOString(),
    });
  }
}
