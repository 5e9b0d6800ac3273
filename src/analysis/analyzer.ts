/**
 * Rule-based gap analysis.
 *
 * @packageDocumentation
 */

import { matches } from '../concepts/matcher.js';
import type { ConceptDictionary } from '../concepts/types.js';
import type { Finding } from './types.js';

/**
 * Produces a finding for every concept the design does not mention.
 *
 * Fixed rules are evaluated first, in dictionary order, then the
 * domain-conditional rules. A domain rule and the fixed rule for the same
 * concept can both fire; their titles differ.
 *
 * @param content - Design text.
 * @param dictionary - Concept dictionary.
 * @returns Findings in rule order.
 */
export function analyze(content: string, dictionary: ConceptDictionary): Finding[] {
  const findings: Finding[] = [];

  for (const rule of dictionary.rules) {
    if (!matches(content, rule.keywords)) {
      findings.push({
        title: rule.title,
        description: rule.description,
        category: rule.category,
        severity: rule.severity,
        triggerKeywords: rule.keywords,
      });
    }
  }

  for (const rule of dictionary.domainRules) {
    if (matches(content, rule.hintKeywords) && !matches(content, rule.requiredKeywords)) {
      findings.push({
        title: rule.title,
        description: rule.description,
        category: rule.category,
        severity: rule.severity,
        triggerKeywords: rule.requiredKeywords,
      });
    }
  }

  return findings;
}

/**
 * Names the domain-hint sets present in the design (chat, media, ...).
 *
 * @param content - Design text.
 * @param dictionary - Concept dictionary.
 * @returns Domain names in dictionary order.
 */
export function detectDomains(content: string, dictionary: ConceptDictionary): string[] {
  return Object.entries(dictionary.domainHints)
    .filter(([, hints]) => matches(content, hints))
    .map(([domain]) => domain);
}
