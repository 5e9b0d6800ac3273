/**
 * Design evolution report.
 *
 * @packageDocumentation
 */

import type { DesignVersion, ProjectRecord } from '../store/types.js';

/** Summary for a project that has never been analysed. */
export const NO_HISTORY_SUMMARY = 'No analysis history yet. Run your first analysis!';

/**
 * Version history of a project with a one-line progress summary.
 */
export interface DesignEvolution {
  readonly projectId: string;
  readonly currentVersion: number;
  readonly currentMaturityScore: number;
  /** Ascending by version number. */
  readonly versions: readonly DesignVersion[];
  readonly progressSummary: string;
}

/**
 * Summarizes progress between the first and last snapshot.
 *
 * @param versions - Snapshots in ascending order.
 */
export function summarizeProgress(versions: readonly DesignVersion[]): string {
  const first = versions[0];
  const last = versions[versions.length - 1];
  if (first === undefined || last === undefined) {
    return NO_HISTORY_SUMMARY;
  }
  if (versions.length === 1) {
    return `Version 1: ${String(first.suggestionsCount)} suggestions, maturity ${String(first.maturityScore)}/5`;
  }

  const addressed = first.suggestionsCount - last.suggestionsCount;
  const improvement = last.maturityScore - first.maturityScore;
  const parts: string[] = [];
  if (addressed > 0) {
    parts.push(`Addressed ${String(addressed)} suggestions`);
  }
  if (improvement > 0) {
    parts.push(`Improved maturity by ${String(improvement)} points`);
  }

  const count = String(versions.length);
  return parts.length > 0
    ? `Great progress! ${parts.join(' and ')} over ${count} versions.`
    : `Tracked ${count} versions. Keep improving your design!`;
}

/**
 * Builds the evolution report for a project.
 *
 * @param project - Project aggregate.
 * @param versions - Snapshots in ascending order.
 */
export function buildEvolution(
  project: ProjectRecord,
  versions: readonly DesignVersion[]
): DesignEvolution {
  return {
    projectId: project.id,
    currentVersion: project.currentVersion,
    currentMaturityScore: project.maturityScore,
    versions,
    progressSummary: summarizeProgress(versions),
  };
}
