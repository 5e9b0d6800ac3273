import { describe, expect, it } from 'vitest';
import type { DesignVersion, ProjectRecord } from '../store/index.js';
import { NO_HISTORY_SUMMARY, buildEvolution, summarizeProgress } from './evolution.js';

function version(versionNumber: number, suggestionsCount: number, maturityScore: number): DesignVersion {
  return {
    id: versionNumber,
    projectId: 'p1',
    versionNumber,
    content: `v${String(versionNumber)}`,
    maturityScore,
    suggestionsCount,
    createdAt: '2026-05-01T08:00:00.000Z',
  };
}

describe('summarizeProgress', () => {
  it('should invite a first analysis when there is no history', () => {
    expect(summarizeProgress([])).toBe(NO_HISTORY_SUMMARY);
  });

  it('should describe a single version', () => {
    expect(summarizeProgress([version(1, 15, 1)])).toBe('Version 1: 15 suggestions, maturity 1/5');
  });

  it('should report addressed suggestions and maturity gains', () => {
    expect(summarizeProgress([version(1, 15, 1), version(2, 14, 2), version(3, 10, 3)])).toBe(
      'Great progress! Addressed 5 suggestions and Improved maturity by 2 points over 3 versions.'
    );
  });

  it('should report a single kind of progress', () => {
    expect(summarizeProgress([version(1, 15, 1), version(2, 15, 3)])).toBe(
      'Great progress! Improved maturity by 2 points over 2 versions.'
    );
  });

  it('should fall back when nothing improved', () => {
    expect(summarizeProgress([version(1, 10, 2), version(2, 12, 2)])).toBe(
      'Tracked 2 versions. Keep improving your design!'
    );
  });
});

describe('buildEvolution', () => {
  it('should combine the project aggregate and its versions', () => {
    const project: ProjectRecord = {
      id: 'p1',
      title: 'Checkout',
      content: 'v2',
      currentVersion: 2,
      maturityScore: 2,
      maturityReason: 'Basic design (2/5): ✓ API layer defined, ✓ Caching layer added',
      status: 'ANALYZED',
      updatedAt: '2026-05-01T08:00:00.000Z',
    };
    const versions = [version(1, 15, 1), version(2, 14, 2)];

    expect(buildEvolution(project, versions)).toEqual({
      projectId: 'p1',
      currentVersion: 2,
      currentMaturityScore: 2,
      versions,
      progressSummary:
        'Great progress! Addressed 1 suggestions and Improved maturity by 1 points over 2 versions.',
    });
  });
});
