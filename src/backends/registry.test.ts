import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { hashSource } from '../coordinator/index.js';
import { FQName } from '../fqname/index.js';
import { createSourceTree, type SourceTree } from '../../tests/helpers/source-tree.js';
import {
  FIXTURE_SOURCES,
  NFC_INTERFACE,
  NFC_TYPES,
  createTestSession,
} from '../../tests/helpers/session.js';
import { GenerationContext } from './output.js';
import { findBackend } from './registry.js';

function name(text: string): FQName {
  const parsed = FQName.parse(text);
  if (parsed === undefined) {
    throw new Error(`bad test name ${text}`);
  }
  return parsed;
}

describe('backend registry', () => {
  let tree: SourceTree;

  beforeEach(() => {
    tree = createSourceTree(FIXTURE_SOURCES);
  });

  afterEach(() => {
    tree.cleanup();
  });

  describe('validate', () => {
    it('should reject a unit for a package-only backend', () => {
      const outcome = findBackend('c++-adapter-main').validate(name('vendor.acme.nfc@1.0::INfc'));

      expect(outcome.valid).toBe(false);
      expect(outcome.valid ? undefined : outcome.error.code).toBe('EXPECTED_PACKAGE_ONLY');
    });

    it('should reject nested names except types members for java', () => {
      const nested = name('vendor.acme.nfc@1.0::types.Info');

      const cpp = findBackend('c++').validate(nested);
      expect(cpp.valid ? undefined : cpp.error.code).toBe('NESTED_NAME_NOT_ALLOWED');
      expect(findBackend('java').validate(nested).valid).toBe(true);
      expect(findBackend('java').validate(name('vendor.acme.nfc@1.0::INfc.Info')).valid).toBe(false);
    });

    it('should accept packages and units for source backends', () => {
      expect(findBackend('vts').validate(name('vendor.acme.nfc@1.0')).valid).toBe(true);
      expect(findBackend('vts').validate(name('vendor.acme.nfc@1.0::INfc')).valid).toBe(true);
    });
  });

  describe('generate', () => {
    it('should print ledger lines for every member in member order', () => {
      const { session, stdout } = createTestSession(tree.rootPath, 'hash');
      const result = findBackend('hash').generate(
        name('vendor.acme.nfc@1.0'),
        new GenerationContext(session)
      );

      expect(result).toEqual({ success: true, files: [] });
      expect(stdout).toEqual([
        `${hashSource(NFC_INTERFACE)} vendor.acme.nfc@1.0::INfc\n`,
        `${hashSource(NFC_TYPES)} vendor.acme.nfc@1.0::types\n`,
      ]);
    });

    it('should print hashes even when the ledger disagrees', () => {
      tree.write('interfaces/current.txt', `${'0'.repeat(64)} vendor.acme.nfc@1.0::types\n`);
      const { session, stdout } = createTestSession(tree.rootPath, 'hash');

      const result = findBackend('hash').generate(
        name('vendor.acme.nfc@1.0::types'),
        new GenerationContext(session)
      );

      expect(result.success).toBe(true);
      expect(stdout).toEqual([`${hashSource(NFC_TYPES)} vendor.acme.nfc@1.0::types\n`]);
    });

    it('should fail other backends on a ledger mismatch', () => {
      tree.write('interfaces/current.txt', `${'0'.repeat(64)} vendor.acme.nfc@1.0::types\n`);
      const { session } = createTestSession(tree.rootPath, 'check');

      const result = findBackend('check').generate(
        name('vendor.acme.nfc@1.0::types'),
        new GenerationContext(session)
      );

      expect(result.success ? undefined : result.error.code).toBe('HASH_MISMATCH');
    });

    it('should write headers and sources for every member with c++', () => {
      const { session } = createTestSession(tree.rootPath, 'c++');
      const result = findBackend('c++').generate(
        name('vendor.acme.nfc@1.0'),
        new GenerationContext(session)
      );

      const dir = join(tree.rootPath, 'out', 'vendor/acme/nfc/1.0');
      expect(result.success ? [...result.files].sort() : []).toEqual(
        [
          'BnHwNfc.h',
          'BpHwNfc.h',
          'BsNfc.h',
          'IHwNfc.h',
          'INfc.h',
          'NfcAll.cpp',
          'hwtypes.h',
          'types.cpp',
          'types.h',
        ].map((file) => `${dir}/${file}`)
      );
    });

    it('should stop at the first failing member of a package and keep earlier output', () => {
      tree.write('interfaces/seq/1.0/IA.idl', 'package vendor.acme.seq@1.0;\ninterface IA { ping(); };\n');
      tree.write(
        'interfaces/seq/1.0/IB.idl',
        'package vendor.acme.seq@1.0;\ninterface IB { share(handle fd); };\n'
      );
      tree.write('interfaces/seq/1.0/IC.idl', 'package vendor.acme.seq@1.0;\ninterface IC { ping(); };\n');
      const { session } = createTestSession(tree.rootPath, 'java');

      const result = findBackend('java').generate(
        name('vendor.acme.seq@1.0'),
        new GenerationContext(session)
      );

      const dir = join(tree.rootPath, 'out', 'vendor/acme/seq/V1_0');
      expect(result.success ? undefined : result.error.code).toBe('NOT_JAVA_COMPATIBLE');
      expect(existsSync(join(dir, 'IA.java'))).toBe(true);
      expect(existsSync(join(dir, 'IB.java'))).toBe(false);
      expect(existsSync(join(dir, 'IC.java'))).toBe(false);
    });

    it('should report an output file that cannot be opened', () => {
      writeFileSync(join(tree.rootPath, 'blocker'), 'not a directory');
      const { session } = createTestSession(tree.rootPath, 'vts', {
        outputPath: join(tree.rootPath, 'blocker') + '/',
      });

      const result = findBackend('vts').generate(
        name('vendor.acme.base@1.0::types'),
        new GenerationContext(session)
      );

      expect(result.success ? undefined : result.error.code).toBe('OUTPUT_OPEN_FAILED');
    });

    it('should number transaction codes in declaration order', () => {
      const { session } = createTestSession(tree.rootPath, 'c++-headers');
      findBackend('c++-headers').generate(
        name('vendor.acme.nfc@1.0::INfc'),
        new GenerationContext(session)
      );

      const text = readFileSync(join(tree.rootPath, 'out/vendor/acme/nfc/1.0/IHwNfc.h'), 'utf-8');
      expect(text).toContain(
        [
          'enum class NfcTransaction : uint32_t {',
          '    open = ::ifgen::FIRST_CALL_TRANSACTION + 0,',
          '    close = ::ifgen::FIRST_CALL_TRANSACTION + 1,',
          '    read = ::ifgen::FIRST_CALL_TRANSACTION + 2,',
          '    stamp = ::ifgen::FIRST_CALL_TRANSACTION + 3,',
          '};',
        ].join('\n')
      );
    });
  });
});
