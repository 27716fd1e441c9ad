import { describe, expect, it } from 'vitest';
import {
  ConfigValidationError,
  assertConfigValid,
  getDefaultConfig,
  isPackagePrefix,
  parseConfig,
  validateConfig,
  type PathChecker,
} from './index.js';

describe('Config Validator', () => {
  it('should accept the default configuration', () => {
    expect(validateConfig(getDefaultConfig())).toEqual({ valid: true, issues: [] });
  });

  it('should reject transport entries that are not package names', () => {
    const config = parseConfig('[packages]\ntransport = ["ifgen.base@1.0", "ifgen.base@1.0::IBase", "base"]\n');
    const result = validateConfig(config);

    expect(result.valid).toBe(false);
    expect(result.issues.map((issue) => issue.field)).toEqual([
      'packages.transport[1]',
      'packages.transport[2]',
    ]);
  });

  it('should reject malformed prefixes', () => {
    const config = parseConfig('[roots]\n"vendor..acme" = "idl"\n[packages]\nsystem_prefixes = ["9lives"]\n');

    expect(validateConfig(config).issues.map((issue) => issue.field)).toEqual([
      'roots.vendor..acme',
      'packages.system_prefixes[0]',
    ]);
  });

  it('should reject a ledger that is a path', () => {
    const config = parseConfig('[hash]\nledger = "sub/current.txt"\n');

    expect(validateConfig(config).issues).toEqual([
      { field: 'hash.ledger', value: 'sub/current.txt', message: 'Ledger must be a plain file name' },
    ]);
  });

  it('should check the root path only when a checker is given', () => {
    const config = parseConfig('root_path = "/nowhere"\n');
    const missing: PathChecker = () => ({ exists: false });
    const file: PathChecker = () => ({ exists: true, isDirectory: false });

    expect(validateConfig(config).valid).toBe(true);
    expect(validateConfig(config, { pathChecker: missing }).issues[0]?.message).toBe(
      'Root path does not exist'
    );
    expect(validateConfig(config, { pathChecker: file }).issues[0]?.message).toBe(
      'Root path is not a directory'
    );
  });

  it('should throw with every issue listed', () => {
    const config = parseConfig('[build]\nmodule_defaults = ""\n[hash]\nledger = ""\n');

    try {
      assertConfigValid(config);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues).toHaveLength(2);
        expect(error.message).toBe(
          'Configuration validation failed with 2 error(s):\n' +
            '  - hash.ledger: Ledger must be a plain file name\n' +
            '  - build.module_defaults: Defaults module name must not be empty'
        );
      }
    }
  });

  it('should recognize package prefixes', () => {
    expect(isPackagePrefix('vendor.acme')).toBe(true);
    expect(isPackagePrefix('vendor.')).toBe(false);
    expect(isPackagePrefix('')).toBe(false);
  });
});
