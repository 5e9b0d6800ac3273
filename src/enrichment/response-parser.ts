/**
 * Parsing and validation of generator output.
 *
 * The generator must answer with
 * `{ "explanations": [ { category, why_it_matters, interview_angle, production_angle } ] }`.
 * Categories are upper-cased before they are checked; every text field must
 * hold 10 to 500 characters. A single bad entry rejects the whole response.
 *
 * @packageDocumentation
 */

import { Ajv, type ErrorObject } from 'ajv';
import { isCategory, type Category } from '../concepts/types.js';
import { toError } from '../utils/logger.js';
import { createGeneratorError, type Explanation, type GeneratorError } from './types.js';

/** Minimum length of each explanation text field. */
export const MIN_FIELD_LENGTH = 10;

/** Maximum length of each explanation text field. */
export const MAX_FIELD_LENGTH = 500;

interface RawExplanation {
  category: string;
  why_it_matters: string;
  interview_angle: string;
  production_angle: string;
}

interface RawExplanationResponse {
  explanations?: RawExplanation[];
}

const textField = { type: 'string', minLength: MIN_FIELD_LENGTH, maxLength: MAX_FIELD_LENGTH };

const RESPONSE_SCHEMA = {
  type: 'object',
  properties: {
    explanations: {
      type: 'array',
      items: {
        type: 'object',
        required: ['category', 'why_it_matters', 'interview_angle', 'production_angle'],
        properties: {
          category: { type: 'string' },
          why_it_matters: textField,
          interview_angle: textField,
          production_angle: textField,
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateResponse = ajv.compile<RawExplanationResponse>(RESPONSE_SCHEMA);

function formatSchemaError(error: ErrorObject): string {
  const path = error.instancePath === '' ? '/' : error.instancePath;
  return `${path}: ${error.message ?? 'invalid value'}`;
}

/**
 * Result of parsing generator output.
 */
export type ParseExplanationsResult =
  | { readonly success: true; readonly explanations: readonly Explanation[] }
  | { readonly success: false; readonly error: GeneratorError };

/**
 * Parses raw generator output into explanations.
 *
 * A missing `explanations` key is read as an empty list. Surrounding
 * whitespace is ignored; code fences are not.
 *
 * @param content - Raw generator output.
 * @returns The explanations in output order, or a MalformedOutputError /
 * SchemaViolationError.
 */
export function parseExplanations(content: string): ParseExplanationsResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.trim());
  } catch (error) {
    const cause = toError(error);
    return {
      success: false,
      error: createGeneratorError('MalformedOutputError', `Invalid JSON from generator: ${cause.message}`, {
        cause,
      }),
    };
  }

  if (!validateResponse(parsed)) {
    const details = (validateResponse.errors ?? []).map(formatSchemaError).join('; ');
    return {
      success: false,
      error: createGeneratorError('SchemaViolationError', `Schema validation failed: ${details}`),
    };
  }

  const explanations: Explanation[] = [];
  const rawExplanations = parsed.explanations ?? [];
  for (const [index, raw] of rawExplanations.entries()) {
    const category: string = raw.category.toUpperCase();
    if (!isCategory(category)) {
      return {
        success: false,
        error: createGeneratorError(
          'SchemaViolationError',
          `Schema validation failed: /explanations/${String(index)}/category: invalid category '${raw.category}'`
        ),
      };
    }
    explanations.push({
      category,
      whyItMatters: raw.why_it_matters,
      interviewAngle: raw.interview_angle,
      productionAngle: raw.production_angle,
    });
  }

  return { success: true, explanations };
}

/**
 * Keys explanations by category. Later entries overwrite earlier ones.
 *
 * @param explanations - Explanations in output order.
 * @returns Map from category to explanation.
 */
export function toExplanationMap(explanations: readonly Explanation[]): Map<Category, Explanation> {
  const map = new Map<Category, Explanation>();
  for (const explanation of explanations) {
    map.set(explanation.category, explanation);
  }
  return map;
}
