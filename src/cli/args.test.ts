import { describe, expect, it } from 'vitest';
import { findBackend } from '../backends/index.js';
import { UsageError } from '../errors.js';
import { parseArgs, parseName, resolveOutputPath, selectBackend, type RawArgs } from './args.js';

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof UsageError ? error.code : undefined;
  }
  return undefined;
}

function rawArgs(overrides: Partial<RawArgs>): RawArgs {
  return { help: false, roots: [], testMode: false, verbose: false, names: [], ...overrides };
}

describe('parseArgs', () => {
  it('should read separated and attached option values', () => {
    const args = parseArgs([
      '-o',
      'out',
      '-Lc++',
      '-rvendor.acme:vendor/acme/interfaces',
      '-r',
      'ifgen:runtime/interfaces',
      'vendor.acme.nfc@1.0',
    ]);

    expect(args).toEqual({
      help: false,
      outputPath: 'out',
      backend: 'c++',
      roots: ['vendor.acme:vendor/acme/interfaces', 'ifgen:runtime/interfaces'],
      testMode: false,
      verbose: false,
      names: ['vendor.acme.nfc@1.0'],
    });
  });

  it('should read grouped flags followed by a value option', () => {
    const args = parseArgs(['-tvLandroidbp', 'a@1.0']);

    expect(args.testMode).toBe(true);
    expect(args.verbose).toBe(true);
    expect(args.backend).toBe('androidbp');
  });

  it('should accept names between options and after --', () => {
    const args = parseArgs(['a@1.0', '-Lcheck', 'b@1.0', '--', '-c@1.0']);

    expect(args.names).toEqual(['a@1.0', 'b@1.0', '-c@1.0']);
  });

  it('should set help for -h', () => {
    expect(parseArgs(['-h']).help).toBe(true);
  });

  it('should reject unknown options and missing values', () => {
    expect(codeOf(() => parseArgs(['-x']))).toBe('UNKNOWN_OPTION');
    expect(codeOf(() => parseArgs(['-o']))).toBe('MISSING_ARGUMENT');
  });

  it('should reject a second -L', () => {
    expect(codeOf(() => parseArgs(['-Lc++', '-Ljava', 'a@1.0']))).toBe('DUPLICATE_BACKEND');
  });
});

describe('selectBackend', () => {
  it('should require -L', () => {
    expect(codeOf(() => selectBackend(rawArgs({ names: ['a@1.0'] })))).toBe('MISSING_BACKEND');
  });

  it('should reject unknown keys', () => {
    expect(codeOf(() => selectBackend(rawArgs({ backend: 'rust', names: ['a@1.0'] })))).toBe(
      'UNKNOWN_BACKEND'
    );
  });

  it('should allow -t only with androidbp', () => {
    expect(
      codeOf(() => selectBackend(rawArgs({ backend: 'c++', testMode: true, names: ['a@1.0'] })))
    ).toBe('TEST_MODE_UNSUPPORTED');
    expect(
      selectBackend(rawArgs({ backend: 'androidbp', testMode: true, names: ['a@1.0'] })).key
    ).toBe('androidbp');
  });

  it('should require at least one name', () => {
    expect(codeOf(() => selectBackend(rawArgs({ backend: 'check' })))).toBe('MISSING_NAMES');
  });
});

describe('resolveOutputPath', () => {
  it('should append a slash for directory backends', () => {
    expect(resolveOutputPath(findBackend('c++'), '/out', '/src')).toBe('/out/');
    expect(resolveOutputPath(findBackend('c++'), '/out/', '/src')).toBe('/out/');
  });

  it('should keep a file path as given', () => {
    expect(resolveOutputPath(findBackend('export-header'), '/out/types.h', '/src')).toBe(
      '/out/types.h'
    );
  });

  it('should require -o for directory and file backends', () => {
    expect(codeOf(() => resolveOutputPath(findBackend('java'), undefined, '/src'))).toBe(
      'MISSING_OUTPUT'
    );
    expect(codeOf(() => resolveOutputPath(findBackend('export-header'), '', '/src'))).toBe(
      'MISSING_OUTPUT'
    );
  });

  it('should default source tree backends to the root path', () => {
    expect(resolveOutputPath(findBackend('androidbp'), undefined, '/src')).toBe('/src/');
  });

  it('should ignore -o for backends that write nothing', () => {
    expect(resolveOutputPath(findBackend('hash'), '/out', '/src')).toBe('');
  });
});

describe('parseName', () => {
  it('should parse a unit name', () => {
    expect(parseName('vendor.acme.nfc@1.0::INfc').string()).toBe('vendor.acme.nfc@1.0::INfc');
  });

  it('should reject malformed names', () => {
    expect(codeOf(() => parseName('vendor.acme.nfc'))).toBe('INVALID_NAME');
  });
});
