import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GenerationContext } from '../backends/output.js';
import { FQName } from '../fqname/index.js';
import { createSourceTree, type SourceTree } from '../../tests/helpers/source-tree.js';
import { FIXTURE_SOURCES, createTestSession } from '../../tests/helpers/session.js';
import { generateAdapterMain, generateCppAdapterHeaders, generateCppAdapterSources } from './cpp-adapter.js';

function name(text: string): FQName {
  const parsed = FQName.parse(text);
  if (parsed === undefined) {
    throw new Error(`bad test name ${text}`);
  }
  return parsed;
}

const SECOND_INTERFACE = `package vendor.acme.nfc@1.0;

interface ITag {
    scan() generates (bool found);
};
`;

describe('c++ adapters', () => {
  let tree: SourceTree;

  beforeEach(() => {
    tree = createSourceTree({ ...FIXTURE_SOURCES, 'interfaces/nfc/1.0/ITag.idl': SECOND_INTERFACE });
  });

  afterEach(() => {
    tree.cleanup();
  });

  it('should instantiate the adapter main over every interface of the package', () => {
    const { session } = createTestSession(tree.rootPath, 'c++-adapter-main');

    generateAdapterMain(name('vendor.acme.nfc@1.0'), new GenerationContext(session));

    expect(readFileSync(join(tree.rootPath, 'out/main.cpp'), 'utf-8')).toBe(
      [
        '#include <ifgen/adapter.h>',
        '#include <vendor/acme/nfc/1.0/ANfc.h>',
        '#include <vendor/acme/nfc/1.0/ATag.h>',
        '',
        'int main(int argc, char** argv) {',
        '    return ::ifgen::adapterMain<',
        '        ::vendor::acme::nfc::V1_0::ANfc,',
        '        ::vendor::acme::nfc::V1_0::ATag>("vendor.acme.nfc@1.0", argc, argv);',
        '}',
        '',
      ].join('\n')
    );
  });

  it('should write an adapter header and source per interface and nothing for types', () => {
    const { session } = createTestSession(tree.rootPath, 'c++-adapter');
    const context = new GenerationContext(session);
    const { cache } = session;

    for (const member of cache.listPackageMembers(name('vendor.acme.nfc@1.0'))) {
      const unit = cache.resolve(member);
      generateCppAdapterHeaders(unit, context, member);
      generateCppAdapterSources(unit, context, member);
    }

    const dir = join(tree.rootPath, 'out/vendor/acme/nfc/1.0');
    expect([...context.files].sort()).toEqual(
      ['ANfc.cpp', 'ANfc.h', 'ATag.cpp', 'ATag.h'].map((file) => `${dir}/${file}`)
    );
    expect(existsSync(`${dir}/Atypes.h`)).toBe(false);
  });
});
