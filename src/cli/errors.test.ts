/**
 * Error suggestion system tests.
 */

import { describe, it, expect } from 'vitest';
import { ConfigParseError } from '../config/index.js';
import { GenerationError, ParseError, UsageError, ValidationError } from '../errors.js';
import { describeError, formatError, formatErrorWithSuggestions } from './errors.js';

/**
 * Strips ANSI escape sequences from a string.
 */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

describe('Error suggestion system', () => {
  describe('describeError', () => {
    it('should route package root failures by code', () => {
      const error = new ParseError('No package root for vendor.acme.nfc@1.0', 'NO_PACKAGE_ROOT');
      expect(describeError(error).context.errorType).toBe('package_root');
    });

    it('should classify other parse failures as source errors with file details', () => {
      const error = new ParseError('Syntax error', 'SYNTAX_ERROR', '/src/INfc.idl', 'line 3');
      const { message, context } = describeError(error);

      expect(message).toBe('Syntax error');
      expect(context).toEqual({
        errorType: 'source',
        details: { filePath: '/src/INfc.idl', note: 'line 3' },
      });
    });

    it('should classify hash, java and output codes', () => {
      expect(describeError(new ParseError('m', 'HASH_MISMATCH')).context.errorType).toBe('hash');
      expect(describeError(new GenerationError('m', 'NOT_JAVA_COMPATIBLE')).context.errorType).toBe(
        'java'
      );
      expect(describeError(new GenerationError('m', 'OUTPUT_OPEN_FAILED')).context.errorType).toBe(
        'output'
      );
    });

    it('should classify by kind when the code has no category', () => {
      expect(describeError(new UsageError('m', 'MISSING_BACKEND')).context.errorType).toBe('usage');
      expect(
        describeError(new ValidationError('m', 'EXPECTED_PACKAGE_ONLY')).context.errorType
      ).toBe('validation');
      expect(describeError(new GenerationError('m', 'INTERNAL')).context.errorType).toBe('unknown');
    });

    it('should classify configuration errors', () => {
      expect(describeError(new ConfigParseError('bad toml')).context).toEqual({
        errorType: 'config',
      });
    });

    it('should describe non-Error values', () => {
      expect(describeError('boom')).toEqual({ message: 'boom', context: { errorType: 'unknown' } });
    });
  });

  describe('formatErrorWithSuggestions', () => {
    it('should print the message, details and numbered suggestions', () => {
      const result = formatErrorWithSuggestions('Could not open /out/x.h for writing', {
        errorType: 'output',
        details: { note: 'EACCES' },
      });

      expect(result).toBe(
        [
          'Error: Could not open /out/x.h for writing',
          '  Note: EACCES',
          '',
          'Suggestions:',
          '  1. Check that the output path is writable',
        ].join('\n')
      );
    });

    it('should put actions on their own indented line', () => {
      const result = formatErrorWithSuggestions('No -L option provided', { errorType: 'usage' });

      expect(result.split('\n')).toEqual([
        'Error: No -L option provided',
        '',
        'Suggestions:',
        '  1. Check the command line against the usage text',
        '    ifgen -h',
        '  2. Pass exactly one backend with -L and at least one name',
      ]);
    });

    it('should add color codes only when enabled', () => {
      const colored = formatErrorWithSuggestions('m', { errorType: 'unknown' }, { colors: true });
      const plain = formatErrorWithSuggestions('m', { errorType: 'unknown' });

      expect(colored).toContain('\x1b[31mError:\x1b[0m');
      expect(stripAnsi(colored)).toBe(plain);
    });
  });

  describe('formatError', () => {
    it('should include the file of a parse error', () => {
      const text = formatError(new ParseError('Undefined type Foo', 'UNDEFINED_TYPE', '/src/INfc.idl'));

      expect(text.split('\n').slice(0, 2)).toEqual([
        'Error: Undefined type Foo',
        '  File: /src/INfc.idl',
      ]);
    });
  });
});
