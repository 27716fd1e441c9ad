/**
 * Transitive queries over the import graph.
 *
 * @packageDocumentation
 */

import { sortedUnique, type FQName } from '../fqname/index.js';
import type { ParseCache } from './parse-cache.js';
import type { ParsedUnit } from './types.js';

/**
 * Import and dependency closures built on top of a {@link ParseCache}.
 *
 * Every traversal uses an explicit worklist and a visited set, so cyclic
 * package graphs terminate and each unit is visited once.
 */
export class DependencyGraphAnalyzer {
  constructor(private readonly cache: ParseCache) {}

  /**
   * Packages of every unit reachable from `unit` through import edges,
   * including the unit's own package.
   */
  importedPackageClosure(unit: ParsedUnit): FQName[] {
    const packages: FQName[] = [];
    const visited = new Set<string>([unit.fqName.string()]);
    const worklist: ParsedUnit[] = [unit];

    for (let current = worklist.pop(); current !== undefined; current = worklist.pop()) {
      packages.push(current.fqName.packageAndVersion());
      for (const imported of current.importedNames) {
        const key = imported.string();
        if (visited.has(key)) {
          continue;
        }
        visited.add(key);
        worklist.push(this.cache.resolve(imported));
      }
    }
    return sortedUnique(packages);
  }

  /** Packages of the unit's direct imports, without its own package. */
  directImportedPackages(unit: ParsedUnit): FQName[] {
    const own = unit.fqName.packageAndVersion();
    return sortedUnique(
      unit.importedNames.map((name) => name.packageAndVersion()).filter((pkg) => !pkg.equals(own))
    );
  }

  /**
   * Union of the import closures of a package's members, without the package
   * itself.
   */
  packageDependencies(pkg: FQName): FQName[] {
    const own = pkg.packageAndVersion();
    const packages: FQName[] = [];
    for (const member of this.cache.listPackageMembers(own)) {
      packages.push(...this.importedPackageClosure(this.cache.resolve(member)));
    }
    return sortedUnique(packages.filter((name) => !name.equals(own)));
  }

  /**
   * Union of the direct imports of a package's members, without the package
   * itself.
   */
  directPackageDependencies(pkg: FQName): FQName[] {
    const own = pkg.packageAndVersion();
    const packages: FQName[] = [];
    for (const member of this.cache.listPackageMembers(own)) {
      packages.push(...this.directImportedPackages(this.cache.resolve(member)));
    }
    return sortedUnique(packages);
  }

  /**
   * True when the package and everything it transitively imports can be
   * expressed in Java. A package that is imported contributes all of its
   * members, not only the imported ones.
   */
  isPackageLanguageCompatible(pkg: FQName): boolean {
    const worklist = [...this.cache.listPackageMembers(pkg)];
    const seen = new Set(worklist.map((name) => name.string()));
    const seenPackages = new Set<string>([pkg.packageAndVersion().string()]);

    for (let name = worklist.pop(); name !== undefined; name = worklist.pop()) {
      const unit = this.cache.resolve(name);
      if (!unit.isJavaCompatible) {
        return false;
      }
      for (const imported of this.directImportedPackages(unit)) {
        if (seenPackages.has(imported.string())) {
          continue;
        }
        seenPackages.add(imported.string());
        for (const member of this.cache.listPackageMembers(imported)) {
          if (!seen.has(member.string())) {
            seen.add(member.string());
            worklist.push(member);
          }
        }
      }
    }
    return true;
  }

  /**
   * False only for a package whose sole member is a `types` unit holding
   * nothing but typedefs.
   */
  packageNeedsGeneratedCode(members: readonly FQName[], typesUnit: ParsedUnit | undefined): boolean {
    const [first] = members;
    if (members.length !== 1 || first === undefined || !first.isTypes()) {
      return true;
    }
    return typesUnit === undefined || !typesUnit.containsOnlyTypedefs;
  }

  /** True when no member is an interface unit. */
  isTypesOnlyPackage(members: readonly FQName[]): boolean {
    return members.every((member) => member.isTypes());
  }
}
