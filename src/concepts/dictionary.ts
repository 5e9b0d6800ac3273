/**
 * Concept dictionary loading and validation.
 *
 * The dictionary lives in `data/concept-dictionary.json`. Rules and maturity
 * groups reference keyword buckets by name; this module resolves those
 * references, checks the cross-references the JSON schema cannot express and
 * returns a deep-frozen {@link ConceptDictionary}.
 *
 * @packageDocumentation
 */

import { Ajv, type ErrorObject } from 'ajv';
import { fileURLToPath } from 'node:url';
import { safeReadFile } from '../utils/safe-fs.js';
import { toError } from '../utils/logger.js';
import {
  CATEGORIES,
  MAX_MATURITY_SCORE,
  SEVERITIES,
  type Category,
  type ConceptDictionary,
  type ConceptRule,
  type DomainRule,
  type MaturityGroup,
  type Severity,
} from './types.js';

/**
 * Error thrown when a dictionary file is unreadable or inconsistent.
 */
export class ConceptDictionaryError extends Error {
  /** Every problem found, one message per violation. */
  public readonly violations: readonly string[];

  /**
   * Creates a new ConceptDictionaryError.
   *
   * @param message - Summary error message.
   * @param violations - Individual problems.
   */
  constructor(message: string, violations: readonly string[] = []) {
    super(message);
    this.name = 'ConceptDictionaryError';
    this.violations = violations;
  }
}

interface RawRule {
  bucket: string;
  title: string;
  description: string;
  category: Category;
  severity: Severity;
}

interface RawDomainRule {
  hint: string;
  requires: string;
  title: string;
  description: string;
  category: Category;
  severity: Severity;
}

interface RawMaturityGroup {
  name: string;
  buckets: string[];
  description: string;
}

interface RawConceptDictionary {
  buckets: Record<string, string[]>;
  domainHints: Record<string, string[]>;
  rules: RawRule[];
  domainRules: RawDomainRule[];
  maturityGroups: RawMaturityGroup[];
}

const keywordList = {
  type: 'array',
  minItems: 1,
  items: { type: 'string', minLength: 1 },
};

const suggestionFields = {
  title: { type: 'string', minLength: 1 },
  description: { type: 'string', minLength: 1 },
  category: { type: 'string', enum: [...CATEGORIES] },
  severity: { type: 'string', enum: [...SEVERITIES] },
};

const DICTIONARY_SCHEMA = {
  type: 'object',
  required: ['buckets', 'domainHints', 'rules', 'domainRules', 'maturityGroups'],
  additionalProperties: false,
  properties: {
    buckets: { type: 'object', additionalProperties: keywordList },
    domainHints: { type: 'object', additionalProperties: keywordList },
    rules: {
      type: 'array',
      items: {
        type: 'object',
        required: ['bucket', 'title', 'description', 'category', 'severity'],
        additionalProperties: false,
        properties: { bucket: { type: 'string' }, ...suggestionFields },
      },
    },
    domainRules: {
      type: 'array',
      items: {
        type: 'object',
        required: ['hint', 'requires', 'title', 'description', 'category', 'severity'],
        additionalProperties: false,
        properties: {
          hint: { type: 'string' },
          requires: { type: 'string' },
          ...suggestionFields,
        },
      },
    },
    maturityGroups: {
      type: 'array',
      maxItems: MAX_MATURITY_SCORE,
      items: {
        type: 'object',
        required: ['name', 'buckets', 'description'],
        additionalProperties: false,
        properties: {
          name: { type: 'string', minLength: 1 },
          buckets: { type: 'array', minItems: 1, items: { type: 'string' } },
          description: { type: 'string', minLength: 1 },
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateRawDictionary = ajv.compile<RawConceptDictionary>(DICTIONARY_SCHEMA);

function formatSchemaError(error: ErrorObject): string {
  const path = error.instancePath === '' ? '/' : error.instancePath;
  return `${path}: ${error.message ?? 'invalid value'}`;
}

/**
 * Collects problems the schema cannot see: dangling bucket references and
 * titles shared between rules.
 */
function crossCheck(raw: RawConceptDictionary): string[] {
  const violations: string[] = [];
  const bucketNames = new Set(Object.keys(raw.buckets));
  const hintNames = new Set(Object.keys(raw.domainHints));

  raw.rules.forEach((rule, index) => {
    if (!bucketNames.has(rule.bucket)) {
      violations.push(`/rules/${String(index)}: unknown bucket '${rule.bucket}'`);
    }
  });

  raw.domainRules.forEach((rule, index) => {
    if (!hintNames.has(rule.hint)) {
      violations.push(`/domainRules/${String(index)}: unknown domain hint '${rule.hint}'`);
    }
    if (!bucketNames.has(rule.requires)) {
      violations.push(`/domainRules/${String(index)}: unknown bucket '${rule.requires}'`);
    }
  });

  raw.maturityGroups.forEach((group, index) => {
    for (const bucket of group.buckets) {
      if (!bucketNames.has(bucket)) {
        violations.push(`/maturityGroups/${String(index)}: unknown bucket '${bucket}'`);
      }
    }
  });

  const seenTitles = new Set<string>();
  for (const { title } of [...raw.rules, ...raw.domainRules]) {
    if (seenTitles.has(title)) {
      violations.push(`duplicate rule title '${title}'`);
    }
    seenTitles.add(title);
  }

  return violations;
}

function frozenList(values: readonly string[]): readonly string[] {
  return Object.freeze([...values]);
}

function lookup(table: Readonly<Record<string, readonly string[]>>, name: string): readonly string[] {
  return Object.hasOwn(table, name) ? (table[name] ?? []) : [];
}

/**
 * Builds a dictionary from parsed JSON.
 *
 * @param raw - Parsed dictionary document.
 * @returns The deep-frozen dictionary.
 * @throws ConceptDictionaryError listing every schema and cross-reference violation.
 */
export function createConceptDictionary(raw: unknown): ConceptDictionary {
  if (!validateRawDictionary(raw)) {
    const violations = (validateRawDictionary.errors ?? []).map(formatSchemaError);
    throw new ConceptDictionaryError(
      `Invalid concept dictionary: ${String(violations.length)} schema violation(s)`,
      violations
    );
  }

  const violations = crossCheck(raw);
  if (violations.length > 0) {
    throw new ConceptDictionaryError(
      `Invalid concept dictionary: ${violations.join('; ')}`,
      violations
    );
  }

  const buckets: Record<string, readonly string[]> = {};
  for (const [name, keywords] of Object.entries(raw.buckets)) {
    buckets[name] = frozenList(keywords);
  }
  const domainHints: Record<string, readonly string[]> = {};
  for (const [name, keywords] of Object.entries(raw.domainHints)) {
    domainHints[name] = frozenList(keywords);
  }

  const rules: ConceptRule[] = raw.rules.map((rule) =>
    Object.freeze({
      keywords: lookup(buckets, rule.bucket),
      title: rule.title,
      description: rule.description,
      category: rule.category,
      severity: rule.severity,
    })
  );

  const domainRules: DomainRule[] = raw.domainRules.map((rule) =>
    Object.freeze({
      domain: rule.hint,
      hintKeywords: lookup(domainHints, rule.hint),
      requiredKeywords: lookup(buckets, rule.requires),
      title: rule.title,
      description: rule.description,
      category: rule.category,
      severity: rule.severity,
    })
  );

  const maturityGroups: MaturityGroup[] = raw.maturityGroups.map((group) =>
    Object.freeze({
      name: group.name,
      keywords: frozenList(group.buckets.flatMap((bucket) => lookup(buckets, bucket))),
      description: group.description,
    })
  );

  return Object.freeze({
    buckets: Object.freeze(buckets),
    domainHints: Object.freeze(domainHints),
    rules: Object.freeze(rules),
    domainRules: Object.freeze(domainRules),
    maturityGroups: Object.freeze(maturityGroups),
  });
}

/**
 * Path of the dictionary bundled with the package.
 */
export function getDefaultDictionaryPath(): string {
  return fileURLToPath(new URL('../../data/concept-dictionary.json', import.meta.url));
}

/**
 * Reads and validates a dictionary file.
 *
 * @param filePath - Dictionary JSON file; defaults to the bundled dictionary.
 * @returns The deep-frozen dictionary.
 * @throws ConceptDictionaryError when the file cannot be read, parsed or validated.
 */
export async function loadConceptDictionary(
  filePath: string = getDefaultDictionaryPath()
): Promise<ConceptDictionary> {
  let content: string;
  try {
    content = await safeReadFile(filePath);
  } catch (error) {
    throw new ConceptDictionaryError(
      `Failed to read concept dictionary "${filePath}": ${toError(error).message}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConceptDictionaryError(
      `Invalid JSON in concept dictionary "${filePath}": ${toError(error).message}`
    );
  }

  return createConceptDictionary(parsed);
}

/**
 * Finds the fixed rule with the given title. Domain-conditional rules are
 * not searched.
 *
 * @param dictionary - The dictionary to search.
 * @param title - Exact rule title.
 * @returns The rule, or undefined.
 */
export function findRuleByTitle(
  dictionary: ConceptDictionary,
  title: string
): ConceptRule | undefined {
  return dictionary.rules.find((rule) => rule.title === title);
}
