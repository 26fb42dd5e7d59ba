// Canonicalization of the noisy inputs that make up a fingerprint.
// Pure functions — no side effects, no state.

import { QUERY_PLACEHOLDER } from './defaults.js';

/** Single-quoted SQL string literal, with '' as the escaped quote */
const STRING_LITERAL = /'(?:[^']|'')*'/g;

/** Standalone integer or decimal. Not preceded by a word character or `$`
 *  (identifiers like users123, positional params like $1), not followed by one. */
const NUMERIC_LITERAL = /(?<![\w$.])\d+(?:\.\d+)?(?![\w.])/g;

/** Trailing `:line` or `:line:column` on a test file path */
const LINE_SUFFIX = /:\d+(?::\d+)?$/;

/**
 * Replace literal values in SQL with a placeholder so that structurally identical
 * queries collapse to one identity.
 *
 * String literals go first, so digits inside them never reach the numeric pass.
 */
export function normalizeQuery(query: string): string {
  if (!query) return query;
  return query
    .replace(STRING_LITERAL, QUERY_PLACEHOLDER)
    .replace(NUMERIC_LITERAL, QUERY_PLACEHOLDER);
}

/** Reduce a test location to its file identity: `test/a.test.ts:12:5` → `test/a.test.ts`.
 *  Empty or absent input yields null. */
export function normalizeTestLocation(testLocation: string | null | undefined): string | null {
  if (!testLocation) return null;
  const trimmed = testLocation.trim().replace(LINE_SUFFIX, '');
  return trimmed.length > 0 ? trimmed : null;
}
