import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FQName, PackageRootTable } from '../fqname/index.js';
import { createSourceTree, type SourceTree } from '../../tests/helpers/source-tree.js';
import { DependencyGraphAnalyzer } from './dependency-graph.js';
import { ParseCache } from './parse-cache.js';

function name(text: string): FQName {
  const parsed = FQName.parse(text);
  if (parsed === undefined) {
    throw new Error(`bad test name ${text}`);
  }
  return parsed;
}

function unit(pkg: string, iface: string, imports: string[] = [], body = ''): string {
  const importLines = imports.map((target) => `import ${target};\n`).join('');
  return `package ${pkg};\n${importLines}interface ${iface} {${body}};\n`;
}

describe('DependencyGraphAnalyzer', () => {
  let tree: SourceTree;
  let cache: ParseCache;
  let analyzer: DependencyGraphAnalyzer;

  beforeEach(() => {
    tree = createSourceTree();
    const roots = new PackageRootTable();
    roots.addPackagePath('cyc', 'cyc');
    roots.addPackagePath('vendor.acme', 'interfaces');
    cache = new ParseCache({ rootPath: tree.rootPath, roots });
    analyzer = new DependencyGraphAnalyzer(cache);
  });

  afterEach(() => {
    tree.cleanup();
  });

  describe('importedPackageClosure', () => {
    beforeEach(() => {
      tree.write('cyc/a/1.0/IA.idl', unit('cyc.a@1.0', 'IA', ['cyc.b@1.0::IB']));
      tree.write('cyc/a/1.0/types.idl', 'package cyc.a@1.0;\ntypedef int32_t Id;\n');
      tree.write('cyc/b/1.0/IB.idl', unit('cyc.b@1.0', 'IB', ['cyc.c@1.0::IC']));
      tree.write('cyc/c/1.0/IC.idl', unit('cyc.c@1.0', 'IC', ['cyc.a@1.0::types']));
    });

    it('should terminate on a package-level cycle with exactly the cycle members', () => {
      const closure = analyzer.importedPackageClosure(cache.resolve(name('cyc.a@1.0::IA')));

      expect(closure.map(String)).toEqual(['cyc.a@1.0', 'cyc.b@1.0', 'cyc.c@1.0']);
    });

    it('should follow unit edges rather than whole packages', () => {
      const closure = analyzer.importedPackageClosure(cache.resolve(name('cyc.c@1.0::IC')));

      expect(closure.map(String)).toEqual(['cyc.a@1.0', 'cyc.c@1.0']);
    });

    it('should contain only the own package for a unit without imports', () => {
      const closure = analyzer.importedPackageClosure(cache.resolve(name('cyc.a@1.0::types')));

      expect(closure.map(String)).toEqual(['cyc.a@1.0']);
    });

    it('should list direct imports without the own package', () => {
      const direct = analyzer.directImportedPackages(cache.resolve(name('cyc.a@1.0::IA')));

      expect(direct.map(String)).toEqual(['cyc.b@1.0']);
    });

    it('should compute package dependencies without the package itself', () => {
      expect(analyzer.packageDependencies(name('cyc.a@1.0')).map(String)).toEqual([
        'cyc.b@1.0',
        'cyc.c@1.0',
      ]);
      expect(analyzer.directPackageDependencies(name('cyc.a@1.0')).map(String)).toEqual([
        'cyc.b@1.0',
      ]);
    });
  });

  describe('isPackageLanguageCompatible', () => {
    beforeEach(() => {
      tree.write(
        'interfaces/gfx/1.0/types.idl',
        'package vendor.acme.gfx@1.0;\nstruct Buffer { handle native; };\n'
      );
      tree.write('interfaces/gfx/1.0/IGfx.idl', unit('vendor.acme.gfx@1.0', 'IGfx'));
      tree.write(
        'interfaces/cam/1.0/ICam.idl',
        unit('vendor.acme.cam@1.0', 'ICam', ['vendor.acme.gfx@1.0::IGfx'])
      );
      tree.write(
        'interfaces/ui/1.0/IUi.idl',
        unit('vendor.acme.ui@1.0', 'IUi', ['vendor.acme.cam@1.0::ICam'])
      );
      tree.write('interfaces/log/1.0/ILog.idl', unit('vendor.acme.log@1.0', 'ILog', [], ' write(string line); '));
      tree.write(
        'interfaces/app/1.0/IApp.idl',
        unit('vendor.acme.app@1.0', 'IApp', ['vendor.acme.log@1.0::ILog'])
      );
    });

    it('should be false for a package with an incompatible unit', () => {
      expect(analyzer.isPackageLanguageCompatible(name('vendor.acme.gfx@1.0'))).toBe(false);
    });

    it('should be false one hop away, through any member of the imported package', () => {
      expect(analyzer.isPackageLanguageCompatible(name('vendor.acme.cam@1.0'))).toBe(false);
    });

    it('should be false two hops away', () => {
      expect(analyzer.isPackageLanguageCompatible(name('vendor.acme.ui@1.0'))).toBe(false);
    });

    it('should be true when nothing reachable is incompatible', () => {
      expect(analyzer.isPackageLanguageCompatible(name('vendor.acme.app@1.0'))).toBe(true);
      expect(analyzer.isPackageLanguageCompatible(name('vendor.acme.log@1.0'))).toBe(true);
    });
  });

  describe('package shape', () => {
    const types = name('vendor.acme.shape@1.0::types');
    const iface = name('vendor.acme.shape@1.0::IShape');

    it('should not need code for a lone types unit of typedefs', () => {
      tree.write(
        'interfaces/shape/1.0/types.idl',
        'package vendor.acme.shape@1.0;\ntypedef int32_t Id;\ntypedef vec<Id> Ids;\n'
      );

      expect(analyzer.packageNeedsGeneratedCode([types], cache.resolve(types))).toBe(false);
    });

    it('should need code once types declares a concrete type', () => {
      tree.write(
        'interfaces/shape/1.0/types.idl',
        'package vendor.acme.shape@1.0;\ntypedef int32_t Id;\nstruct Point { Id x; };\n'
      );

      expect(analyzer.packageNeedsGeneratedCode([types], cache.resolve(types))).toBe(true);
    });

    it('should need code when a second member exists', () => {
      tree.write(
        'interfaces/shape/1.0/types.idl',
        'package vendor.acme.shape@1.0;\ntypedef int32_t Id;\n'
      );

      expect(analyzer.packageNeedsGeneratedCode([iface, types], cache.resolve(types))).toBe(true);
    });

    it('should tell types-only packages apart', () => {
      expect(analyzer.isTypesOnlyPackage([types])).toBe(true);
      expect(analyzer.isTypesOnlyPackage([iface, types])).toBe(false);
    });
  });
});
