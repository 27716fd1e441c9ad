import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GenerationContext } from '../backends/output.js';
import { findBackend } from '../backends/registry.js';
import { FQName } from '../fqname/index.js';
import { createSourceTree, type SourceTree } from '../../tests/helpers/source-tree.js';
import { FIXTURE_SOURCES, createTestSession } from '../../tests/helpers/session.js';

function name(text: string): FQName {
  const parsed = FQName.parse(text);
  if (parsed === undefined) {
    throw new Error(`bad test name ${text}`);
  }
  return parsed;
}

describe('java backend', () => {
  let tree: SourceTree;

  beforeEach(() => {
    tree = createSourceTree({
      ...FIXTURE_SOURCES,
      'interfaces/flags/1.0/types.idl':
        'package vendor.acme.flags@1.0;\nenum Mask : uint32_t { LOW = 1, HIGH = 0x80000000 };\nenum Wide : uint64_t { TOP = 0xffffffffffffffff };\n',
    });
  });

  afterEach(() => {
    tree.cleanup();
  });

  function generate(target: string): ReturnType<ReturnType<typeof findBackend>['generate']> {
    const { session } = createTestSession(tree.rootPath, 'java');
    return findBackend('java').generate(name(target), new GenerationContext(session));
  }

  function output(relative: string): string {
    return readFileSync(join(tree.rootPath, 'out', relative), 'utf-8');
  }

  it('should write only the requested member of types', () => {
    const result = generate('vendor.acme.nfc@1.0::types.Status');

    expect(result.success ? result.files : []).toEqual([
      join(tree.rootPath, 'out', 'vendor/acme/nfc/V1_0/Status.java'),
    ]);
    expect(output('vendor/acme/nfc/V1_0/Status.java')).toBe(
      [
        'package vendor.acme.nfc.V1_0;',
        '',
        'public final class Status {',
        '    public static final int OK = 0;',
        '    public static final int FAILED = 1;',
        '    public static final int BUSY = 5;',
        '',
        '    public static final String toString(int o) {',
        '        if (o == OK) {',
        '            return "OK";',
        '        }',
        '        if (o == FAILED) {',
        '            return "FAILED";',
        '        }',
        '        if (o == BUSY) {',
        '            return "BUSY";',
        '        }',
        '        return "0x" + Integer.toHexString(o);',
        '    }',
        '};',
        '',
        '',
      ].join('\n')
    );
  });

  it('should write one class per declaration of types, skipping typedefs', () => {
    generate('vendor.acme.nfc@1.0::types');

    expect(existsSync(join(tree.rootPath, 'out/vendor/acme/nfc/V1_0/Info.java'))).toBe(true);
    expect(existsSync(join(tree.rootPath, 'out/vendor/acme/nfc/V1_0/InfoList.java'))).toBe(false);
    expect(output('vendor/acme/nfc/V1_0/Info.java').split('\n')).toEqual([
      'package vendor.acme.nfc.V1_0;',
      '',
      'public final class Info {',
      '    public int id;',
      '    public java.util.ArrayList<Byte> data = new java.util.ArrayList<Byte>();',
      '};',
      '',
      '',
    ]);
  });

  it('should reject an unknown member of types', () => {
    const result = generate('vendor.acme.nfc@1.0::types.Missing');

    expect(result.success ? undefined : result.error.code).toBe('UNDEFINED_TYPE');
  });

  it('should reject units using types without a Java form', () => {
    const result = generate('vendor.acme.legacy@1.0::types');

    expect(result.success ? undefined : result.error.code).toBe('NOT_JAVA_COMPATIBLE');
  });

  it('should wrap unsigned values into signed literals', () => {
    generate('vendor.acme.flags@1.0::types');

    const mask = output('vendor/acme/flags/V1_0/Mask.java').split('\n');
    expect(mask).toContain('    public static final int HIGH = -2147483648 /* 2147483648 */;');
    const wide = output('vendor/acme/flags/V1_0/Wide.java').split('\n');
    expect(wide).toContain('    public static final long TOP = -1L /* 18446744073709551615 */;');
    expect(wide).toContain('        return "0x" + Long.toHexString(o);');
  });

  it('should declare interface methods with callbacks for several results', () => {
    generate('vendor.acme.nfc@1.0::INfc');

    const lines = output('vendor/acme/nfc/V1_0/INfc.java').split('\n');
    expect(lines).toContain('public interface INfc extends ifgen.os.IHwInterface {');
    expect(lines).toContain('    public static final String kInterfaceName = "vendor.acme.nfc@1.0::INfc";');
    expect(lines).toContain('    int open(int mode)');
    expect(lines).toContain('            throws ifgen.os.RemoteException;');
    expect(lines).toContain('    @java.lang.FunctionalInterface');
    expect(lines).toContain('    public interface readCallback {');
    expect(lines).toContain(
      '        public void onValues(int count, java.util.ArrayList<Byte> data);'
    );
    expect(lines).toContain('    void read(readCallback _ifgen_cb)');
    expect(lines).toContain('    void stamp(vendor.acme.base.V1_0.Header header)');
  });
});
