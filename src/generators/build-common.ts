/**
 * Package facts the build-descriptor generators share.
 *
 * @packageDocumentation
 */

import type { GenerationContext } from '../backends/output.js';
import type { ParsedUnit } from '../coordinator/index.js';
import type { FQName } from '../fqname/index.js';

/**
 * A package with every member resolved.
 */
export interface PackageSummary {
  readonly pkg: FQName;
  readonly members: readonly FQName[];
  readonly units: readonly ParsedUnit[];
  readonly typesUnit: ParsedUnit | undefined;
  /** Every package reachable through imports, sorted, without `pkg`. */
  readonly dependencies: readonly FQName[];
}

export function summarizePackage(context: GenerationContext, pkg: FQName): PackageSummary {
  const { cache, analyzer } = context.session;
  const packageName = pkg.packageAndVersion();
  const members = cache.listPackageMembers(packageName);
  const units = members.map((member) => cache.resolve(member));
  return {
    pkg: packageName,
    members,
    units,
    typesUnit: units.find((unit) => unit.fqName.isTypes()),
    dependencies: analyzer.packageDependencies(packageName),
  };
}

/**
 * Sorted, de-duplicated `-r` arguments covering a package and the packages
 * it depends on.
 */
export function packageRootOptions(
  context: GenerationContext,
  pkg: FQName,
  dependencies: readonly FQName[]
): string[] {
  const { cache } = context.session;
  const options = new Set([...dependencies, pkg].map((name) => cache.packageRootOption(name)));
  return [...options].sort();
}

/** Library name of a package in the declarative dialect: `pkg@1.0`. */
export function libraryName(pkg: FQName): string {
  return pkg.packageAndVersion().string();
}

/** Library name of a package in the makefile dialect: `pkg-V1.0`. */
export function javaLibraryName(pkg: FQName): string {
  return `${pkg.package}-V${pkg.version()}`;
}

/** Directory of generated Java files below the intermediates directory. */
export function sanitizedPackagePath(context: GenerationContext, pkg: FQName): string {
  const { cache } = context.session;
  return cache.packageRootPath(pkg) + cache.packagePath(pkg, { relative: true, sanitized: true });
}
