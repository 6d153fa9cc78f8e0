/**
 * Tests for YAML parsing helpers.
 */
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema } from '../../../src/utils/yaml.js';
import { ConfigurationError, ErrorCodes } from '../../../src/utils/errors.js';

describe('parseYaml', () => {
  it('should return an empty object for an empty document', () => {
    expect(parseYaml('')).toEqual({});
  });

  it('should parse flat dotted keys', () => {
    expect(parseYaml('pkg.name: libs/os\npkg.deps:\n  - libs/util\n')).toEqual({
      'pkg.name': 'libs/os',
      'pkg.deps': ['libs/util'],
    });
  });

  it('should wrap parser errors', () => {
    let caught: unknown;
    try {
      parseYaml('key: [unclosed');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ code: ErrorCodes.MANIFEST_INVALID });
  });
});

describe('parseYamlWithSchema', () => {
  const schema = z.object({ name: z.string() });

  it('should return validated data', () => {
    expect(parseYamlWithSchema('name: blinky', schema)).toEqual({ name: 'blinky' });
  });

  it('should report the failing path', () => {
    expect(() => parseYamlWithSchema('name: 3', schema)).toThrow(/YAML validation failed: name:/);
  });
});
