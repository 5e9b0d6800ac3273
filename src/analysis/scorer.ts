/**
 * Maturity scoring.
 *
 * @packageDocumentation
 */

import { matches } from '../concepts/matcher.js';
import type { ConceptDictionary } from '../concepts/types.js';
import type { MaturityResult } from './types.js';

/** Reason given when no maturity group is present. */
export const EMPTY_DESIGN_REASON =
  'No key architectural concepts detected. Start by adding API and database layers.';

function describeLevel(score: number, total: number): string {
  if (score < 3) {
    return `Basic design (${String(score)}/${String(total)})`;
  }
  if (score < total) {
    return `Good design (${String(score)}/${String(total)})`;
  }
  return `Comprehensive design (${String(score)}/${String(total)})`;
}

/**
 * Scores a design by counting the maturity groups it mentions.
 *
 * @param content - Design text.
 * @param dictionary - Concept dictionary.
 * @returns One point per present group, with a reason listing them.
 *
 * @example
 * ```typescript
 * score('REST API on Postgres', dictionary);
 * // { score: 2, reason: 'Basic design (2/5): ✓ API/Communication layer defined, ✓ Storage strategy present' }
 * ```
 */
export function score(content: string, dictionary: ConceptDictionary): MaturityResult {
  const present = dictionary.maturityGroups.filter((group) => matches(content, group.keywords));

  if (present.length === 0) {
    return { score: 0, reason: EMPTY_DESIGN_REASON };
  }

  const items = present.map((group) => `✓ ${group.description}`).join(', ');
  return {
    score: present.length,
    reason: `${describeLevel(present.length, dictionary.maturityGroups.length)}: ${items}`,
  };
}
