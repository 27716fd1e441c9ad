/**
 * Package root table: maps package-name prefixes to source directories.
 *
 * @packageDocumentation
 */

import { GenerationError, UsageError } from '../errors.js';
import type { FQName } from './fqname.js';

/**
 * One registered `(packagePrefix, directory)` pair.
 */
export interface PackageRoot {
  /** Dot-separated package prefix, e.g. `vendor.acme`. */
  readonly prefix: string;
  /** Directory holding the prefix's packages, relative to the root path or absolute. */
  readonly directory: string;
}

/**
 * Options for {@link PackageRootTable.packagePath}.
 */
export interface PackagePathOptions {
  /** Leave out the root directory. */
  readonly relative?: boolean;
  /** Use `V1_0` instead of `1.0` as the version component. */
  readonly sanitized?: boolean;
}

/**
 * Ordered table of package roots.
 *
 * Lookup picks the longest prefix matching whole package components; among
 * equally long prefixes the first registered one wins. The table must be
 * complete before the first unit is parsed and is frozen from then on.
 */
export class PackageRootTable {
  private readonly roots: PackageRoot[] = [];
  private frozen = false;

  /**
   * Registers a package root.
   *
   * @throws UsageError if the prefix is already registered with another directory.
   * @throws GenerationError if the table is already frozen.
   */
  addPackagePath(prefix: string, directory: string): void {
    this.assertMutable();
    const normalized = normalizeDirectory(directory);
    const existing = this.roots.find((root) => root.prefix === prefix);
    if (existing !== undefined) {
      if (existing.directory === normalized) {
        return;
      }
      throw new UsageError(
        `Package root '${prefix}' is already registered with path '${existing.directory}'`,
        'BAD_ROOT_OPTION',
        `rejected path '${normalized}'`
      );
    }
    this.roots.push({ prefix, directory: normalized });
  }

  /**
   * Registers a root unless the prefix is already registered.
   */
  addDefaultPackagePath(prefix: string, directory: string): void {
    this.assertMutable();
    if (this.roots.some((root) => root.prefix === prefix)) {
      return;
    }
    this.roots.push({ prefix, directory: normalizeDirectory(directory) });
  }

  /** Prevents further registration. Called by the cache before its first parse. */
  freeze(): void {
    this.frozen = true;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  entries(): readonly PackageRoot[] {
    return this.roots;
  }

  /**
   * Finds the root for a package by longest whole-component prefix match.
   */
  findRoot(name: FQName): PackageRoot | undefined {
    let best: PackageRoot | undefined;
    for (const root of this.roots) {
      if (!name.inPackage(root.prefix)) {
        continue;
      }
      if (best === undefined || root.prefix.length > best.prefix.length) {
        best = root;
      }
    }
    return best;
  }

  /** `prefix:directory`, as passed back to the tool in generated build rules. */
  rootOption(name: FQName): string | undefined {
    const root = this.findRoot(name);
    return root === undefined ? undefined : `${root.prefix}:${root.directory}`;
  }

  /** The root prefix as a path: `vendor.acme` → `vendor/acme/`. */
  rootPrefixPath(name: FQName): string | undefined {
    const root = this.findRoot(name);
    return root === undefined ? undefined : root.prefix.split('.').join('/') + '/';
  }

  /**
   * Path of a package's directory: the components after the root prefix and
   * the version, each followed by `/`. Unless `relative`, the root directory
   * comes first.
   */
  packagePath(name: FQName, options: PackagePathOptions = {}): string | undefined {
    const root = this.findRoot(name);
    if (root === undefined) {
      return undefined;
    }
    const prefixLength = root.prefix.split('.').length;
    const components = name.packageComponents().slice(prefixLength);
    components.push(options.sanitized === true ? name.sanitizedVersion() : name.version());

    const relativePath = components.join('/') + '/';
    return options.relative === true ? relativePath : `${root.directory}/${relativePath}`;
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new GenerationError(
        'Package roots cannot change after the first unit has been parsed',
        'INTERNAL'
      );
    }
  }
}

function normalizeDirectory(directory: string): string {
  let normalized = directory;
  while (normalized.length > 1 && normalized.endsWith('/')) {
    normalized = normalized.slice(0, -1);
  }
  return normalized;
}

/**
 * Parses a `-r package:path` option value.
 *
 * @returns The prefix and directory.
 * @throws UsageError if the value has no `:` or either side is empty.
 */
export function parseRootOption(value: string): PackageRoot {
  const index = value.indexOf(':');
  if (index === -1) {
    throw new UsageError(`-r option must contain ':': ${value}`, 'BAD_ROOT_OPTION');
  }
  const prefix = value.slice(0, index);
  const directory = value.slice(index + 1);
  if (prefix === '' || directory === '') {
    throw new UsageError(`-r option needs both a package and a path: ${value}`, 'BAD_ROOT_OPTION');
  }
  return { prefix, directory };
}
