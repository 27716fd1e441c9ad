import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigParseError, DEFAULT_CONFIG, getDefaultConfig, loadConfig, parseConfig } from './index.js';

function parseError(toml: string): ConfigParseError {
  try {
    parseConfig(toml);
  } catch (error) {
    if (error instanceof ConfigParseError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected parseConfig to throw');
}

describe('Config Parser', () => {
  describe('parseConfig', () => {
    describe('valid TOML parsing', () => {
      it('should parse empty TOML to default config', () => {
        expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
      });

      it('should parse complete valid configuration', () => {
        const config = parseConfig(`
root_path = "/work/top"

[roots]
"vendor.acme" = "vendor/acme/interfaces"
"ifgen" = "runtime/idl"

[packages]
transport = ["ifgen.base@1.0"]
system_prefixes = ["ifgen"]
system_process = ["ifgen.graphics@2.0"]

[build]
module_defaults = "acme-defaults"

[hash]
ledger = "hashes.txt"

[log]
debug = true
`);

        expect(config).toEqual({
          root_path: '/work/top',
          roots: [
            { prefix: 'vendor.acme', path: 'vendor/acme/interfaces' },
            { prefix: 'ifgen', path: 'runtime/idl' },
          ],
          packages: {
            transport: ['ifgen.base@1.0'],
            system_prefixes: ['ifgen'],
            system_process: ['ifgen.graphics@2.0'],
          },
          build: { module_defaults: 'acme-defaults' },
          hash: { ledger: 'hashes.txt' },
          log: { debug: true },
        });
      });

      it('should keep defaults for fields missing from a section', () => {
        const config = parseConfig(`
[packages]
transport = []
`);

        expect(config.packages.transport).toEqual([]);
        expect(config.packages.system_prefixes).toEqual(['ifgen', 'platform']);
        expect(config.hash.ledger).toBe('current.txt');
        expect(config.root_path).toBeUndefined();
      });

      it('should replace the default roots when a [roots] table is present', () => {
        const config = parseConfig(`
[roots]
"vendor.acme" = "idl"
`);

        expect(config.roots).toEqual([{ prefix: 'vendor.acme', path: 'idl' }]);
      });
    });

    describe('invalid TOML syntax', () => {
      it('should return descriptive error for malformed TOML', () => {
        const error = parseError('[hash\nledger = "x"\n');

        expect(error.message).toContain('Invalid TOML syntax');
        expect(error.cause).toBeInstanceOf(Error);
      });

      it('should reject an unclosed string', () => {
        expect(() => parseConfig('[hash]\nledger = "unclosed\n')).toThrow(ConfigParseError);
      });
    });

    describe('type validation errors', () => {
      it('should error when string field receives number', () => {
        expect(parseError('[hash]\nledger = 123\n').message).toBe(
          "Invalid type for 'hash.ledger': expected string, got number"
        );
      });

      it('should error when boolean field receives string', () => {
        expect(parseError('[log]\ndebug = "yes"\n').message).toBe(
          "Invalid type for 'log.debug': expected boolean, got string"
        );
      });

      it('should name the offending array element', () => {
        expect(parseError('[packages]\ntransport = ["ifgen.base@1.0", 7]\n').message).toBe(
          "Invalid type for 'packages.transport[1]': expected string, got number"
        );
      });

      it('should error when a list field receives a string', () => {
        expect(parseError('[packages]\nsystem_prefixes = "ifgen"\n').message).toBe(
          "Invalid type for 'packages.system_prefixes': expected array of strings, got string"
        );
      });

      it('should error when a section is not a table', () => {
        expect(parseError('hash = "current.txt"\n').message).toBe(
          "Invalid type for 'hash': expected table, got string"
        );
      });

      it('should explain unquoted dotted root prefixes', () => {
        expect(parseError('[roots]\nvendor.acme = "idl"\n').message).toContain(
          'quote dotted prefixes'
        );
      });
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(tmpdir(), 'ifgen-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should return defaults when the file does not exist', () => {
      expect(loadConfig(path.join(dir, 'ifgen.toml'))).toEqual(DEFAULT_CONFIG);
    });

    it('should prefix errors with the file path', () => {
      const file = path.join(dir, 'ifgen.toml');
      writeFileSync(file, '[log]\ndebug = 1\n');

      expect(() => loadConfig(file)).toThrow(
        `${file}: Invalid type for 'log.debug': expected boolean, got number`
      );
    });

    it('should read a file from disk', () => {
      const file = path.join(dir, 'ifgen.toml');
      writeFileSync(file, '[hash]\nledger = "ledger.txt"\n');

      expect(loadConfig(file).hash.ledger).toBe('ledger.txt');
    });
  });

  describe('getDefaultConfig', () => {
    it('should return a copy whose roots can be changed safely', () => {
      const config = getDefaultConfig();
      config.roots.push({ prefix: 'vendor.acme', path: 'idl' });

      expect(DEFAULT_CONFIG.roots).toHaveLength(2);
    });
  });
});
