import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GenerationContext } from '../backends/output.js';
import { FQName } from '../fqname/index.js';
import { createSourceTree, type SourceTree } from '../../tests/helpers/source-tree.js';
import { FIXTURE_SOURCES, createTestSession } from '../../tests/helpers/session.js';
import { generateMakefile } from './makefile.js';

function pkg(text: string): FQName {
  const parsed = FQName.parse(text);
  if (parsed === undefined) {
    throw new Error(`bad test name ${text}`);
  }
  return parsed;
}

describe('generateMakefile', () => {
  let tree: SourceTree;

  beforeEach(() => {
    tree = createSourceTree({
      ...FIXTURE_SOURCES,
      'interfaces/aliases/1.0/types.idl': 'package vendor.acme.aliases@1.0;\ntypedef uint32_t Id;\n',
    });
  });

  afterEach(() => {
    tree.cleanup();
  });

  function run(target: string): { logs: string[]; buildFile: string } {
    const { session, logs } = createTestSession(tree.rootPath, 'makefile', {
      outputPath: tree.rootPath + '/',
    });
    const name = pkg(target);
    generateMakefile(name, new GenerationContext(session));
    const dir = name.package.split('.').slice(2).join('/');
    return { logs, buildFile: join(tree.rootPath, 'interfaces', dir, '1.0', 'Build.mk') };
  }

  it('should warn and write nothing for a package without a Java form or constants', () => {
    const { logs, buildFile } = run('vendor.acme.legacy@1.0');

    expect(existsSync(buildFile)).toBe(false);
    expect(logs.some((line) => line.includes('"event":"makefile_skipped"'))).toBe(true);
  });

  it('should write nothing for a package of typedefs', () => {
    const { logs, buildFile } = run('vendor.acme.aliases@1.0');

    expect(existsSync(buildFile)).toBe(false);
    expect(logs.some((line) => line.includes('"event":"makefile_skipped"'))).toBe(false);
  });

  it('should build the Java library and the constants library', () => {
    const { buildFile } = run('vendor.acme.nfc@1.0');
    const lines = readFileSync(buildFile, 'utf-8').split('\n');

    expect(lines[0]).toBe('# This file is autogenerated by ifgen. Do not edit manually.');
    expect(lines).toContain('LOCAL_MODULE := vendor.acme.nfc-V1.0-java');
    expect(lines).toContain('LOCAL_MODULE := vendor.acme.nfc-V1.0-java-constants');
    expect(lines).toContain('    vendor.acme.base-V1.0-java \\');
    expect(lines).toContain('# Build INfc.idl');
    expect(lines).toContain('# Build types.idl (Info)');
    expect(lines).toContain('# Build types.idl (Status)');
    expect(lines).toContain('GEN := $(intermediates)/vendor/acme/nfc/V1_0/Constants.java');
    expect(lines[lines.length - 2]).toBe('include $(call all-makefiles-under,$(LOCAL_PATH))');
  });
});
