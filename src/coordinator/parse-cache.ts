/**
 * Memoizing resolver from names to parsed units.
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { GenerationError, ParseError } from '../errors.js';
import {
  TYPES_UNIT,
  type FQName,
  type PackagePathOptions,
  type PackageRoot,
  type PackageRootTable,
} from '../fqname/index.js';
import { IdlSyntaxError, parseUnit, type UnitParser, type UnitSyntax } from '../parser/index.js';
import { Logger } from '../utils/logger.js';
import {
  safeExistsSync,
  safeIsDirectorySync,
  safeReadBytesSync,
  safeReaddirSync,
} from '../utils/safe-fs.js';
import { HashLedger, hashSource } from './hash-ledger.js';
import type { ParsedUnit, ResolveOptions } from './types.js';
import { UnitResolver, buildUnitScope, type UnitScope, type UnitEnvironment } from './unit-resolver.js';

/** Source file extension of interface-definition units. */
export const SOURCE_EXTENSION = '.idl';

/** Default ledger file name under each package root. */
export const DEFAULT_LEDGER_FILE = 'current.txt';

/**
 * Options for {@link ParseCache}.
 */
export interface ParseCacheOptions {
  /** Directory that relative package roots are resolved against. */
  readonly rootPath: string;
  readonly roots: PackageRootTable;
  /**
   * Turns source text into syntax.
   * @defaultValue {@link parseUnit}
   */
  readonly parser?: UnitParser;
  /**
   * Ledger file name under each package root.
   * @defaultValue `current.txt`
   */
  readonly ledgerFile?: string;
  readonly logger?: Logger;
}

/**
 * Resolves names to {@link ParsedUnit}s, parsing each source file at most
 * once per cache.
 *
 * Resolving a unit resolves everything it imports first. A unit that is
 * reached again through its own imports fails with `IMPORT_CYCLE`; type
 * references back into a unit that is still being resolved are fine.
 *
 * @example
 * ```typescript
 * const cache = new ParseCache({ rootPath: '/src', roots });
 * const unit = cache.resolve(new FQName('vendor.acme.nfc', 1, 0, 'INfc'));
 * ```
 */
export class ParseCache {
  readonly rootPath: string;
  private readonly roots: PackageRootTable;
  private readonly parser: UnitParser;
  private readonly ledgerFile: string;
  private readonly logger: Logger;

  private readonly units = new Map<string, ParsedUnit>();
  private readonly scopes = new Map<string, UnitScope>();
  private readonly inProgress = new Map<string, UnitScope>();
  private readonly members = new Map<string, FQName[]>();
  private readonly ledgers = new Map<string, HashLedger>();

  constructor(options: ParseCacheOptions) {
    this.rootPath = options.rootPath;
    this.roots = options.roots;
    this.parser = options.parser ?? parseUnit;
    this.ledgerFile = options.ledgerFile ?? DEFAULT_LEDGER_FILE;
    this.logger = options.logger ?? new Logger({ component: 'ParseCache' });
  }

  /**
   * Returns the parsed unit a name belongs to (`types.Point` → `types`).
   *
   * @throws ParseError if the unit or anything it imports cannot be resolved.
   */
  resolve(name: FQName, options: ResolveOptions = {}): ParsedUnit {
    const enforceHash = options.enforceHash ?? true;
    const unitName = name.unit();
    if (unitName.isPackage()) {
      throw new ParseError(`'${name.string()}' does not name a unit`, 'SOURCE_NOT_FOUND');
    }
    const unit = this.units.get(unitName.string()) ?? this.load(unitName, enforceHash);
    if (enforceHash) {
      this.verifyHash(unit);
    }
    return unit;
  }

  /** The already-resolved unit for a name, if any. */
  lookup(name: FQName): ParsedUnit | undefined {
    return this.units.get(name.unit().string());
  }

  /** Number of resolved units. */
  size(): number {
    return this.units.size;
  }

  /**
   * Every unit of a package, sorted by unit name.
   *
   * @throws ParseError if the package has no root or no source directory.
   */
  listPackageMembers(pkg: FQName): FQName[] {
    const packageName = pkg.packageAndVersion();
    const key = packageName.string();
    const cached = this.members.get(key);
    if (cached !== undefined) {
      return cached;
    }

    this.roots.freeze();
    const directory = path.resolve(this.rootPath, this.packagePath(packageName));
    if (!safeIsDirectorySync(directory)) {
      throw new ParseError(
        `Package '${key}' has no source directory at ${directory}`,
        'SOURCE_NOT_FOUND',
        directory
      );
    }

    const names = safeReaddirSync(directory)
      .filter((entry) => entry.endsWith(SOURCE_EXTENSION))
      .map((entry) => entry.slice(0, -SOURCE_EXTENSION.length))
      .sort()
      .map((stem) => packageName.withName(stem));
    this.members.set(key, names);
    return names;
  }

  /**
   * Absolute path of a unit's source file.
   *
   * @throws ParseError (`NO_PACKAGE_ROOT`) if no root covers the package.
   */
  sourcePath(name: FQName): string {
    return path.resolve(this.rootPath, this.packagePath(name), name.unitName() + SOURCE_EXTENSION);
  }

  /** `prefix:directory` of the root covering a package. */
  packageRootOption(name: FQName): string {
    return `${this.rootFor(name).prefix}:${this.rootFor(name).directory}`;
  }

  /** Root prefix as a path, e.g. `vendor/acme/`. */
  packageRootPath(name: FQName): string {
    return this.rootFor(name).prefix.split('.').join('/') + '/';
  }

  /** Package directory, see {@link PackageRootTable.packagePath}. */
  packagePath(name: FQName, options: PackagePathOptions = {}): string {
    const packagePath = this.roots.packagePath(name, options);
    if (packagePath === undefined) {
      throw this.noRoot(name);
    }
    return packagePath;
  }

  private rootFor(name: FQName): PackageRoot {
    const root = this.roots.findRoot(name);
    if (root === undefined) {
      throw this.noRoot(name);
    }
    return root;
  }

  private noRoot(name: FQName): ParseError {
    return new ParseError(
      `No package root is registered for '${name.package}'`,
      'NO_PACKAGE_ROOT',
      undefined,
      'register one with -r <package>:<path>'
    );
  }

  private load(name: FQName, enforceHash: boolean): ParsedUnit {
    const key = name.string();
    if (this.inProgress.has(key)) {
      throw new ParseError(
        `Import cycle: '${key}' is imported while it is being resolved`,
        'IMPORT_CYCLE',
        this.sourcePath(name),
        `units being resolved: ${[...this.inProgress.keys()].join(', ')}`
      );
    }

    this.roots.freeze();
    const filePath = this.sourcePath(name);
    if (!safeExistsSync(filePath)) {
      throw new ParseError(`Could not find ${filePath}`, 'SOURCE_NOT_FOUND', filePath);
    }
    const bytes = safeReadBytesSync(filePath);
    const syntax = this.parseSource(bytes.toString('utf-8'), filePath);
    this.checkSyntax(name, syntax, filePath);

    const scope = buildUnitScope(name, syntax, filePath);
    this.inProgress.set(key, scope);
    try {
      const unit = new UnitResolver(
        name,
        syntax,
        filePath,
        hashSource(bytes),
        this.environment(enforceHash)
      ).resolve();
      this.units.set(key, unit);
      this.scopes.set(key, scope);
      this.logger.debug('unit_parsed', { name: key, path: filePath });
      return unit;
    } finally {
      this.inProgress.delete(key);
    }
  }

  private parseSource(source: string, filePath: string): UnitSyntax {
    try {
      return this.parser(source, filePath);
    } catch (error) {
      if (error instanceof IdlSyntaxError) {
        throw new ParseError(`${filePath}:${error.message}`, 'SYNTAX_ERROR', filePath);
      }
      throw error;
    }
  }

  private checkSyntax(name: FQName, syntax: UnitSyntax, filePath: string): void {
    const expectedPackage = name.packageAndVersion().string();
    if (syntax.package !== expectedPackage) {
      throw new ParseError(
        `${filePath}: declares package '${syntax.package}', expected '${expectedPackage}'`,
        'PACKAGE_MISMATCH',
        filePath
      );
    }

    if (name.name === TYPES_UNIT) {
      if (syntax.interface !== undefined) {
        throw new ParseError(
          `${filePath}: '${TYPES_UNIT}' cannot declare interface '${syntax.interface.name}'`,
          'NAME_MISMATCH',
          filePath
        );
      }
      return;
    }

    if (syntax.interface === undefined || syntax.interface.name !== name.name) {
      throw new ParseError(
        `${filePath}: must declare interface '${name.name}'`,
        'NAME_MISMATCH',
        filePath,
        syntax.interface === undefined ? undefined : `found '${syntax.interface.name}'`
      );
    }
    if (syntax.declarations.length > 0) {
      throw new ParseError(
        `${filePath}: declarations of an interface unit belong inside the interface`,
        'SYNTAX_ERROR',
        filePath
      );
    }
  }

  private environment(enforceHash: boolean): UnitEnvironment {
    return {
      scopeOf: (unit) => {
        const key = unit.string();
        const scope = this.inProgress.get(key) ?? this.scopes.get(key);
        if (scope !== undefined) {
          return scope;
        }
        this.resolve(unit, { enforceHash });
        return this.scopeAfterResolve(key);
      },
      resolvedUnit: (unit) => {
        const key = unit.string();
        if (this.inProgress.has(key)) {
          return undefined;
        }
        return this.units.get(key) ?? this.resolve(unit, { enforceHash });
      },
      membersOf: (pkg) => this.listPackageMembers(pkg),
      importUnit: (unit) => {
        this.resolve(unit, { enforceHash });
      },
    };
  }

  private scopeAfterResolve(key: string): UnitScope {
    const scope = this.scopes.get(key);
    if (scope === undefined) {
      throw new GenerationError(`'${key}' was resolved without a scope`, 'INTERNAL');
    }
    return scope;
  }

  private verifyHash(unit: ParsedUnit): void {
    const root = this.rootFor(unit.fqName);
    const ledgerPath = path.resolve(this.rootPath, root.directory, this.ledgerFile);
    let ledger = this.ledgers.get(ledgerPath);
    if (ledger === undefined) {
      ledger = HashLedger.load(ledgerPath);
      this.ledgers.set(ledgerPath, ledger);
    }

    const name = unit.fqName.string();
    if (!ledger.accepts(name, unit.sourceHash)) {
      throw new ParseError(
        `${unit.filePath}: hash ${unit.sourceHash} does not match the recorded hash in ${ledgerPath}`,
        'HASH_MISMATCH',
        unit.filePath,
        `recorded: ${ledger.hashesFor(name).join(', ')}`
      );
    }
  }
}
