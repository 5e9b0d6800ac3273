/**
 * Case-insensitive keyword matching against design text.
 *
 * Matching is plain substring containment: no tokenising, stemming or
 * regular expressions. "cache" therefore matches "cached" and "api" matches
 * "rapid".
 *
 * @packageDocumentation
 */

/**
 * Returns the first keyword (as written) contained in the text, ignoring case.
 *
 * @param text - Design text to search.
 * @param keywords - Keywords in evaluation order.
 * @returns The first matching keyword, or undefined if none matches.
 */
export function findMatchingKeyword(
  text: string,
  keywords: readonly string[]
): string | undefined {
  const haystack = text.toLowerCase();
  return keywords.find((keyword) => haystack.includes(keyword.toLowerCase()));
}

/**
 * Checks whether any keyword occurs in the text, ignoring case.
 *
 * @param text - Design text to search.
 * @param keywords - Keywords to look for.
 * @returns True if at least one keyword is a substring of the text.
 *
 * @example
 * ```typescript
 * matches('We put Redis in front of Postgres', ['cache', 'redis']); // true
 * matches('We use Postgres', []); // false
 * ```
 */
export function matches(text: string, keywords: readonly string[]): boolean {
  return findMatchingKeyword(text, keywords) !== undefined;
}
