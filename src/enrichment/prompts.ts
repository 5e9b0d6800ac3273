/**
 * Prompts for the explanation generator.
 *
 * @packageDocumentation
 */

import type { Category } from '../concepts/types.js';

/** Default cap on the design excerpt included in a prompt. */
export const DEFAULT_EXCERPT_LIMIT = 2000;

/** Marker appended to a cut design excerpt. */
export const TRUNCATION_MARKER = '... [truncated]';

/**
 * System prompt: the generator only explains gaps it is given and answers in
 * JSON.
 */
export const SYSTEM_PROMPT = `You are a system design expert and mentor. Your role is to explain WHY certain components matter in system design, helping students understand the reasoning behind best practices.

CRITICAL RULES:
1. You ONLY explain components that are already identified as missing (provided to you).
2. You NEVER invent or suggest additional missing components.
3. You ALWAYS respond with valid JSON only - no markdown, no extra text.
4. Your explanations should be educational, not generic.
5. Focus on interview preparation and production realities.

OUTPUT FORMAT (strict JSON):
{
  "explanations": [
    {
      "category": "CACHING",
      "why_it_matters": "Clear explanation of importance...",
      "interview_angle": "How this comes up in interviews...",
      "production_angle": "Real-world implications..."
    }
  ]
}

VALID CATEGORIES: CACHING, SCALABILITY, SECURITY, RELIABILITY, PERFORMANCE, DATABASE, API_DESIGN, GENERAL

If you cannot provide explanations, return: {"explanations": []}
`;

/**
 * A gap to be explained.
 */
export interface PromptComponent {
  readonly category: Category;
  readonly title: string;
}

/**
 * Cuts a design to the excerpt limit.
 *
 * @param content - Full design text.
 * @param limit - Maximum number of code points kept.
 * @returns The content, or its first `limit` code points followed by the truncation marker.
 */
export function buildExcerpt(content: string, limit: number = DEFAULT_EXCERPT_LIMIT): string {
  const codePoints = Array.from(content);
  return codePoints.length > limit
    ? codePoints.slice(0, limit).join('') + TRUNCATION_MARKER
    : content;
}

/**
 * Builds the prompt asking for explanations of every missing component.
 *
 * @param content - Design text.
 * @param components - Gaps found by rule analysis.
 * @param excerptLimit - Cap on the design excerpt.
 * @returns The prompt text.
 */
export function buildExplanationPrompt(
  content: string,
  components: readonly PromptComponent[],
  excerptLimit: number = DEFAULT_EXCERPT_LIMIT
): string {
  const componentsText = components
    .map((component) => `- ${component.category}: ${component.title}`)
    .join('\n');

  return `Analyze the following system design and explain why the identified missing components are important.

## User's System Design:
${buildExcerpt(content, excerptLimit)}

## Missing Components (identified by rule-based analysis):
${componentsText}

## Your Task:
For EACH missing component listed above, provide:
1. why_it_matters: Why is this component important? (educational explanation)
2. interview_angle: How might an interviewer ask about this?
3. production_angle: What happens in production without this?

RESPOND WITH VALID JSON ONLY. No markdown, no explanations outside JSON.

Example output format:
{
  "explanations": [
    {
      "category": "CACHING",
      "why_it_matters": "Caching reduces database load and improves response times by storing frequently accessed data in memory...",
      "interview_angle": "Interviewers often ask: 'Where would you add caching?' or 'How do you handle cache invalidation?'...",
      "production_angle": "Without caching, your database becomes a bottleneck. At scale, every request hitting the DB causes..."
    }
  ]
}
`;
}
