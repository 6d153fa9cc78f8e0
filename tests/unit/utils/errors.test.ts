/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  KilnError,
  ConfigurationError,
  UnsatisfiedApiError,
  FilesystemError,
  CompileError,
  LinkError,
  TestFailure,
  ErrorCodes,
  isBuildFailure,
  type BuildFailure,
} from '../../../src/utils/errors.js';

describe('KilnError', () => {
  it('should create error with code and message', () => {
    const error = new KilnError('E001', 'Test error message');

    expect(error.code).toBe('E001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('KilnError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should keep the cause', () => {
    const cause = new Error('inner');
    const error = new KilnError('E001', 'outer', undefined, cause);

    expect(error.cause).toBe(cause);
  });

  it('should serialize error to JSON', () => {
    const error = new KilnError('E001', 'Test error', { key: 'value' });

    expect(error.toJSON()).toEqual({
      name: 'KilnError',
      code: 'E001',
      message: 'Test error',
      details: { key: 'value' },
    });
  });
});

describe('UnsatisfiedApiError', () => {
  it('should list every unsatisfied pair', () => {
    const error = new UnsatisfiedApiError([
      { package: '@local/a', api: 'net' },
      { package: '@local/b', api: 'console' },
    ]);

    expect(error.code).toBe(ErrorCodes.UNSATISFIED_API);
    expect(error.kind).toBe('unsatisfied-api');
    expect(error.message).toBe(
      'Unsatisfied APIs detected:\n' +
        '    * @local/a requires api net\n' +
        '    * @local/b requires api console'
    );
    expect(error.unsatisfied).toHaveLength(2);
  });
});

describe('FilesystemError', () => {
  it('should include the path and the cause message', () => {
    const error = new FilesystemError('Failed to remove file', '/tmp/x', new Error('EACCES'));

    expect(error.message).toBe('Failed to remove file: /tmp/x (EACCES)');
    expect(error.details).toEqual({ path: '/tmp/x' });
    expect(error.code).toBe(ErrorCodes.FS_ERROR);
  });
});

describe('TestFailure', () => {
  it('should carry the package name and output', () => {
    const error = new TestFailure('libs/os', 'assert failed');

    expect(error.message).toBe('Test failure (libs/os):\nassert failed');
    expect(error.packageName).toBe('libs/os');
    expect(error.output).toBe('assert failed');
  });
});

describe('build failure union', () => {
  function describeFailure(failure: BuildFailure): string {
    switch (failure.kind) {
      case 'configuration':
        return `config ${failure.code}`;
      case 'unsatisfied-api':
        return `apis ${failure.unsatisfied.length}`;
      case 'filesystem':
        return 'fs';
      case 'compile':
        return 'compile';
      case 'link':
        return 'link';
      case 'test':
        return `test ${failure.packageName}`;
    }
  }

  it('should narrow on kind', () => {
    expect(describeFailure(new ConfigurationError(ErrorCodes.BSP_NOT_FOUND, 'x'))).toBe(
      'config BSP_NOT_FOUND'
    );
    expect(describeFailure(new UnsatisfiedApiError([{ package: 'p', api: 'a' }]))).toBe('apis 1');
    expect(describeFailure(new CompileError('x'))).toBe('compile');
    expect(describeFailure(new LinkError('x'))).toBe('link');
    expect(describeFailure(new TestFailure('p', ''))).toBe('test p');
  });

  it('should recognize build failures', () => {
    expect(isBuildFailure(new LinkError('x'))).toBe(true);
    expect(isBuildFailure(new KilnError('E', 'x'))).toBe(false);
    expect(isBuildFailure(new Error('x'))).toBe(false);
  });
});

describe('ErrorCodes', () => {
  it('should map every code to itself', () => {
    for (const [key, value] of Object.entries(ErrorCodes)) {
      expect(value).toBe(key);
    }
  });
});
