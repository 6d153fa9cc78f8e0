/**
 * Regex helpers for package-name patterns, with ReDoS protection, and
 * fuzzy name suggestions.
 */

import { logger as log } from './logger.js';

/** Maximum time in milliseconds for regex execution before a warning. */
const REGEX_TIMEOUT_MS = 100;

/** Maximum pattern length to prevent catastrophic backtracking. */
const MAX_PATTERN_LENGTH = 5000;

/** Patterns known to cause catastrophic backtracking. */
const DANGEROUS_PATTERNS = [
  /\(\.\*\)\+/,      // (.*)+
  /\(\.\+\)\+/,      // (.+)+
  /\([^)]*\+\)\+/,   // (a+)+
  /\([^)]*\*\)\*/,   // (a*)*
];

const compiled = new Map<string, RegExp>();

/**
 * Validate a pattern for syntax errors and potential ReDoS.
 * Returns an error message if the pattern is unusable.
 */
export function validatePattern(pattern: string): string | null {
  if (pattern.length > MAX_PATTERN_LENGTH) {
    return `Pattern exceeds maximum length of ${MAX_PATTERN_LENGTH} characters`;
  }

  for (const dangerous of DANGEROUS_PATTERNS) {
    if (dangerous.test(pattern)) {
      return `Pattern contains potentially dangerous construct that could cause ReDoS`;
    }
  }

  try {
    new RegExp(pattern);
  } catch (error) {
    return error instanceof Error ? error.message : 'Invalid regular expression';
  }

  return null;
}

/**
 * Unanchored regex test of `pattern` against `subject`.
 * Patterns are validated when manifests load; an invalid one never matches.
 */
export function patternMatches(pattern: string, subject: string): boolean {
  let regex = compiled.get(pattern);
  if (!regex) {
    if (validatePattern(pattern) !== null) {
      return false;
    }
    regex = new RegExp(pattern);
    compiled.set(pattern, regex);
  }

  const start = performance.now();
  const result = regex.test(subject);
  const elapsed = performance.now() - start;

  if (elapsed > REGEX_TIMEOUT_MS) {
    log.warn(`Slow regex detected (${elapsed.toFixed(0)}ms): ${regex.source.substring(0, 50)}...`);
  }

  return result;
}

/**
 * Compute Levenshtein distance between two strings.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  const matrix: number[][] = Array(a.length + 1)
    .fill(null)
    .map(() => Array(b.length + 1).fill(0));

  for (let i = 0; i <= a.length; i++) {
    matrix[i][0] = i;
  }

  for (let j = 0; j <= b.length; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      matrix[i][j] = Math.min(
        matrix[i - 1][j] + 1,      // deletion
        matrix[i][j - 1] + 1,      // insertion
        matrix[i - 1][j - 1] + cost // substitution
      );
    }
  }

  return matrix[a.length][b.length];
}

/**
 * Closest candidate within `maxDistance` edits, or null.
 */
export function suggestName(
  name: string,
  candidates: Iterable<string>,
  maxDistance = 3
): string | null {
  let best: string | null = null;
  let bestDistance = maxDistance + 1;
  for (const candidate of candidates) {
    const distance = levenshteinDistance(name, candidate);
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}
