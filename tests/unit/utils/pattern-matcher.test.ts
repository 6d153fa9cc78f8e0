/**
 * Tests for package-name pattern matching and name suggestions.
 */
import { describe, it, expect } from 'vitest';
import {
  levenshteinDistance,
  patternMatches,
  suggestName,
  validatePattern,
} from '../../../src/utils/pattern-matcher.js';

describe('validatePattern', () => {
  it('should accept ordinary patterns', () => {
    expect(validatePattern('^@local/libs/.*')).toBeNull();
  });

  it('should reject invalid syntax', () => {
    expect(validatePattern('libs/(os')).not.toBeNull();
  });

  it('should reject nested quantifiers', () => {
    expect(validatePattern('(a+)+')).toContain('ReDoS');
  });
});

describe('patternMatches', () => {
  it('should match anywhere in the subject', () => {
    expect(patternMatches('libs', '@local/libs/os')).toBe(true);
    expect(patternMatches('^libs', '@local/libs/os')).toBe(false);
  });

  it('should match the empty subject only with patterns that allow it', () => {
    expect(patternMatches('.*', '')).toBe(true);
    expect(patternMatches('os', '')).toBe(false);
  });

  it('should never match with an invalid pattern', () => {
    expect(patternMatches('libs/(os', 'libs/(os')).toBe(false);
  });
});

describe('suggestName', () => {
  it('should compute edit distance', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(levenshteinDistance('', 'abc')).toBe(3);
  });

  it('should return the closest candidate', () => {
    expect(suggestName('libs/oss', ['libs/os', 'libs/console'])).toBe('libs/os');
  });

  it('should return null when nothing is close', () => {
    expect(suggestName('hw/bsp/native', ['libs/os'])).toBeNull();
  });
});
