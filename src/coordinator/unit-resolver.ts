/**
 * Semantic pass over one unit's syntax tree: import edges, type lookup,
 * enum values and derived flags.
 *
 * @packageDocumentation
 */

import { ParseError } from '../errors.js';
import { FQName, TYPES_UNIT, sortedUnique } from '../fqname/index.js';
import type {
  AnnotationSyntax,
  DeclarationSyntax,
  FieldSyntax,
  InterfaceSyntax,
  MethodSyntax,
  TypeSyntax,
  UnitSyntax,
} from '../parser/index.js';
import type {
  Declaration,
  DeclarationKind,
  EnumDeclaration,
  ExportSettings,
  Field,
  InterfaceDeclaration,
  Method,
  NamedTypeRef,
  ParsedUnit,
  ResolvedType,
} from './types.js';

/** Scalars with no Java mapping. */
const JAVA_INCOMPATIBLE_SCALARS = new Set(['handle', 'memory', 'pointer']);

/**
 * Names declared by a unit, keyed by local path (see
 * {@link NamedTypeRef.localName}).
 */
export interface UnitScope {
  readonly unit: FQName;
  readonly names: ReadonlyMap<string, DeclarationKind | 'interface'>;
}

/**
 * What the resolver needs from the cache.
 */
export interface UnitEnvironment {
  /** Declared names of another unit, resolving it first if needed. */
  scopeOf(unit: FQName): UnitScope;
  /** Another unit, resolving it first; `undefined` while it is itself being resolved. */
  resolvedUnit(unit: FQName): ParsedUnit | undefined;
  /** Sorted members of a package. */
  membersOf(pkg: FQName): readonly FQName[];
  /** Resolves an explicitly imported unit. */
  importUnit(unit: FQName): void;
}

/**
 * Collects the names a unit declares.
 *
 * @throws ParseError (`SYNTAX_ERROR`) on a name declared twice.
 */
export function buildUnitScope(unit: FQName, syntax: UnitSyntax, filePath: string): UnitScope {
  const names = new Map<string, DeclarationKind | 'interface'>();

  const add = (localName: string, kind: DeclarationKind | 'interface'): void => {
    if (names.has(localName)) {
      throw new ParseError(
        `${filePath}: '${localName}' is declared more than once`,
        'SYNTAX_ERROR',
        filePath
      );
    }
    names.set(localName, kind);
  };

  const addAll = (prefix: string, declarations: readonly DeclarationSyntax[]): void => {
    for (const declaration of declarations) {
      const localName = prefix + declaration.name;
      add(localName, declaration.kind);
      if (declaration.kind === 'struct' || declaration.kind === 'union') {
        addAll(localName + '.', declaration.nested);
      }
    }
  };

  addAll('', syntax.declarations);
  if (syntax.interface !== undefined) {
    add(syntax.interface.name, 'interface');
    addAll(syntax.interface.name + '.', syntax.interface.declarations);
  }
  return { unit, names };
}

/** Declaration at a dotted local path of a resolved unit. */
function findInUnit(
  unit: ParsedUnit,
  localName: string
): Declaration | InterfaceDeclaration | undefined {
  const parts = localName.split('.');
  let scope: readonly Declaration[] = unit.declarations;
  if (unit.interface !== undefined && parts[0] === unit.interface.name) {
    if (parts.length === 1) {
      return unit.interface;
    }
    parts.shift();
    scope = unit.interface.declarations;
  }
  let found: Declaration | undefined;
  for (const part of parts) {
    found = scope.find((declaration) => declaration.name === part);
    if (found === undefined) {
      return undefined;
    }
    scope = found.kind === 'struct' || found.kind === 'union' ? found.nested : [];
  }
  return found;
}

function hasMember(members: readonly FQName[], unitName: string): boolean {
  return members.some((member) => member.name === unitName);
}

function exportSettings(
  name: string,
  annotations: readonly AnnotationSyntax[]
): ExportSettings | undefined {
  const annotation = annotations.find((candidate) => candidate.name === 'export');
  if (annotation === undefined) {
    return undefined;
  }
  return {
    name: annotation.params['name'] ?? name,
    valuePrefix: annotation.params['value_prefix'] ?? '',
    valueSuffix: annotation.params['value_suffix'] ?? '',
  };
}

/**
 * Turns one unit's syntax into a {@link ParsedUnit}.
 *
 * Type references are looked up in this order: the unit's own scopes from the
 * innermost outwards; a fully qualified name; an interface of the own
 * package; the own package's `types`; an explicitly imported unit; a member
 * or the `types` of an explicitly imported package.
 */
export class UnitResolver {
  private readonly imported: FQName[] = [];
  private readonly importedUnits: FQName[] = [];
  private readonly importedPackages: FQName[] = [];
  private readonly exportedEnums: EnumDeclaration[] = [];
  private javaCompatible = true;
  private readonly ownPackage: FQName;
  /** Converted declarations of this unit by local name. */
  private readonly local = new Map<string, Declaration | InterfaceDeclaration>();
  private readonly namedRefs: NamedTypeRef[] = [];

  constructor(
    private readonly self: FQName,
    private readonly syntax: UnitSyntax,
    private readonly filePath: string,
    private readonly sourceHash: string,
    private readonly env: UnitEnvironment
  ) {
    this.ownPackage = self.packageAndVersion();
  }

  resolve(): ParsedUnit {
    this.resolveImports();

    const declarations = this.convertDeclarations('', this.syntax.declarations, []);
    const iface =
      this.syntax.interface === undefined ? undefined : this.convertInterface(this.syntax.interface);
    if (this.javaCompatible) {
      const visited = new Set<string>();
      this.javaCompatible = this.namedRefs.every((ref) => this.refJavaCompatible(ref, visited));
    }

    const unit = {
      fqName: this.self,
      filePath: this.filePath,
      sourceHash: this.sourceHash,
      declarations,
      importedNames: sortedUnique(this.imported.filter((name) => !name.equals(this.self))),
      isJavaCompatible: this.javaCompatible,
      containsOnlyTypedefs:
        iface === undefined && declarations.every((declaration) => declaration.kind === 'typedef'),
      exportedEnums: this.exportedEnums,
    };
    return iface === undefined ? unit : { ...unit, interface: iface };
  }

  private resolveImports(): void {
    for (const entry of this.syntax.imports) {
      const target = FQName.parse(entry.target);
      if (target === undefined) {
        throw this.error(entry.line, `Malformed import '${entry.target}'`, 'SYNTAX_ERROR');
      }
      if (target.isPackage()) {
        this.importedPackages.push(target);
        for (const member of this.env.membersOf(target)) {
          this.importOne(member);
        }
      } else {
        const unit = target.unit();
        this.importedUnits.push(unit);
        this.importOne(unit);
      }
    }
  }

  private importOne(unit: FQName): void {
    if (unit.equals(this.self)) {
      return;
    }
    this.env.importUnit(unit);
    this.imported.push(unit);
  }

  private convertInterface(syntax: InterfaceSyntax): InterfaceDeclaration {
    const scope = [syntax.name];
    const declarations = this.convertDeclarations(syntax.name + '.', syntax.declarations, scope);
    const methods = syntax.methods.map((method) => this.convertMethod(method, scope));

    const result = { name: syntax.name, declarations, methods };
    this.local.set(syntax.name, result);
    if (syntax.extends === undefined) {
      return result;
    }
    const base = this.lookup(syntax.extends, scope, syntax.line);
    if (base.declKind !== 'interface') {
      throw this.error(
        syntax.line,
        `'${syntax.extends}' is not an interface and cannot be extended`,
        'UNDEFINED_TYPE'
      );
    }
    return { ...result, base };
  }

  private convertMethod(method: MethodSyntax, scope: readonly string[]): Method {
    return {
      name: method.name,
      oneway: method.oneway,
      params: this.convertFields(method.params, scope, method.line),
      results: this.convertFields(method.results, scope, method.line),
    };
  }

  private convertFields(
    fields: readonly FieldSyntax[],
    scope: readonly string[],
    line: number
  ): Field[] {
    return fields.map((field) => ({
      name: field.name,
      type: this.resolveType(field.type, scope, line),
    }));
  }

  private convertDeclarations(
    prefix: string,
    declarations: readonly DeclarationSyntax[],
    scope: readonly string[]
  ): Declaration[] {
    return declarations.map((syntax) => {
      const declaration = this.convertDeclaration(prefix, syntax, scope);
      this.local.set(declaration.localName, declaration);
      return declaration;
    });
  }

  private convertDeclaration(
    prefix: string,
    syntax: DeclarationSyntax,
    scope: readonly string[]
  ): Declaration {
    const localName = prefix + syntax.name;
    switch (syntax.kind) {
      case 'enum': {
        const storage = this.resolveType(syntax.storage, scope, syntax.line);
        let previous = this.lastInheritedValue(storage, syntax.line) ?? -1n;
        const values = syntax.values.map((value) => {
          previous = value.value ?? previous + 1n;
          return { name: value.name, value: previous };
        });
        const base = {
          kind: 'enum' as const,
          name: syntax.name,
          localName,
          storage,
          values,
        };
        const exported = exportSettings(syntax.name, syntax.annotations);
        const declaration: EnumDeclaration =
          exported === undefined ? base : { ...base, exported };
        if (exported !== undefined) {
          this.exportedEnums.push(declaration);
        }
        return declaration;
      }
      case 'typedef':
        return {
          kind: 'typedef',
          name: syntax.name,
          localName,
          target: this.resolveType(syntax.target, scope, syntax.line),
        };
      case 'struct':
      case 'union': {
        const inner = [...scope, syntax.name];
        const nested = this.convertDeclarations(localName + '.', syntax.nested, inner);
        return {
          kind: syntax.kind,
          name: syntax.name,
          localName,
          fields: this.convertFields(syntax.fields, inner, syntax.line),
          nested,
        };
      }
    }
  }

  private resolveType(type: TypeSyntax, scope: readonly string[], line: number): ResolvedType {
    switch (type.kind) {
      case 'scalar':
        if (JAVA_INCOMPATIBLE_SCALARS.has(type.name)) {
          this.javaCompatible = false;
        }
        return type;
      case 'vec':
        return { kind: 'vec', element: this.resolveType(type.element, scope, line) };
      case 'named': {
        const ref = this.lookup(type.name, scope, type.line);
        this.namedRefs.push(ref);
        return ref;
      }
    }
  }

  /**
   * Last value of the enum chain a storage type extends, through typedefs.
   * `undefined` when the storage is a scalar.
   */
  private lastInheritedValue(storage: ResolvedType, line: number): bigint | undefined {
    const seen = new Set<string>();
    let current = storage;
    while (current.kind === 'named') {
      const key = `${current.unit.string()}:${current.localName}`;
      if (seen.has(key)) {
        throw this.error(line, `'${current.localName}' extends itself`, 'UNDEFINED_TYPE');
      }
      seen.add(key);
      const declaration = this.declarationOf(current);
      if (declaration === undefined) {
        throw this.error(
          line,
          `'${current.localName}' must be declared before it is extended`,
          'UNDEFINED_TYPE'
        );
      }
      if ('kind' in declaration && declaration.kind === 'typedef') {
        current = declaration.target;
        continue;
      }
      if (!('kind' in declaration) || declaration.kind !== 'enum') {
        throw this.error(line, `'${current.localName}' is not an enum storage type`, 'UNDEFINED_TYPE');
      }
      const last = declaration.values.at(-1);
      if (last !== undefined) {
        return last.value;
      }
      current = declaration.storage;
    }
    return undefined;
  }

  /** The declaration a reference names, or `undefined` when it is not available yet. */
  private declarationOf(ref: NamedTypeRef): Declaration | InterfaceDeclaration | undefined {
    if (ref.unit.equals(this.self)) {
      return this.local.get(ref.localName);
    }
    const unit = this.env.resolvedUnit(ref.unit);
    return unit === undefined ? undefined : findInUnit(unit, ref.localName);
  }

  private refJavaCompatible(ref: NamedTypeRef, visited: Set<string>): boolean {
    const key = `${ref.unit.string()}:${ref.localName}`;
    if (visited.has(key)) {
      return true;
    }
    visited.add(key);
    const declaration = this.declarationOf(ref);
    if (declaration === undefined || !('kind' in declaration)) {
      return true;
    }
    switch (declaration.kind) {
      case 'enum':
        return true;
      case 'typedef':
        return this.typeJavaCompatible(declaration.target, visited);
      case 'struct':
      case 'union':
        return declaration.fields.every((field) => this.typeJavaCompatible(field.type, visited));
    }
  }

  private typeJavaCompatible(type: ResolvedType, visited: Set<string>): boolean {
    switch (type.kind) {
      case 'scalar':
        return !JAVA_INCOMPATIBLE_SCALARS.has(type.name);
      case 'vec':
        return this.typeJavaCompatible(type.element, visited);
      case 'named':
        return this.refJavaCompatible(type, visited);
    }
  }

  private lookup(name: string, scope: readonly string[], line: number): NamedTypeRef {
    const found = name.includes('@')
      ? this.lookupQualified(name)
      : this.lookupLocal(name, scope) ?? this.lookupElsewhere(name);
    if (found === undefined) {
      throw this.error(line, `Undefined type '${name}'`, 'UNDEFINED_TYPE');
    }
    if (!found.unit.equals(this.self)) {
      this.imported.push(found.unit);
    }
    return found;
  }

  private lookupQualified(text: string): NamedTypeRef | undefined {
    const name = FQName.parse(text);
    if (name === undefined || name.isPackage()) {
      return undefined;
    }
    const pkg = name.packageAndVersion();
    return this.lookupInPackage(pkg, name.name);
  }

  /** `Unit[.Path]` or `Path` (in `types`) within a package. */
  private lookupInPackage(pkg: FQName, dotted: string): NamedTypeRef | undefined {
    const first = dotted.split('.')[0] ?? dotted;
    const members = this.env.membersOf(pkg);
    if (first !== TYPES_UNIT && hasMember(members, first)) {
      return this.refIn(pkg.withName(first), dotted);
    }
    if (hasMember(members, TYPES_UNIT)) {
      return this.refIn(pkg.typesForPackage(), dotted);
    }
    return undefined;
  }

  private lookupLocal(name: string, scope: readonly string[]): NamedTypeRef | undefined {
    for (let depth = scope.length; depth >= 0; depth--) {
      const candidate = [...scope.slice(0, depth), name].join('.');
      const found = this.refIn(this.self, candidate);
      if (found !== undefined) {
        return found;
      }
    }
    return undefined;
  }

  private lookupElsewhere(name: string): NamedTypeRef | undefined {
    const first = name.split('.')[0] ?? name;
    const ownMembers = this.env.membersOf(this.ownPackage);

    if (first !== TYPES_UNIT && first !== this.self.name && hasMember(ownMembers, first)) {
      const found = this.refIn(this.ownPackage.withName(first), name);
      if (found !== undefined) {
        return found;
      }
    }
    if (!this.self.isTypes() && hasMember(ownMembers, TYPES_UNIT)) {
      const found = this.refIn(this.ownPackage.typesForPackage(), name);
      if (found !== undefined) {
        return found;
      }
    }
    for (const unit of this.importedUnits) {
      if (unit.name === first || unit.isTypes()) {
        const found = this.refIn(unit, name);
        if (found !== undefined) {
          return found;
        }
      }
    }
    for (const pkg of this.importedPackages) {
      const found = this.lookupInPackage(pkg, name);
      if (found !== undefined) {
        return found;
      }
    }
    return undefined;
  }

  private refIn(unit: FQName, dotted: string): NamedTypeRef | undefined {
    const localName =
      unit.isTypes() && dotted.startsWith(TYPES_UNIT + '.')
        ? dotted.slice(TYPES_UNIT.length + 1)
        : dotted;
    const scope = this.env.scopeOf(unit);
    const declKind = scope.names.get(localName);
    return declKind === undefined ? undefined : { kind: 'named', declKind, unit, localName };
  }

  private error(
    line: number,
    message: string,
    code: 'SYNTAX_ERROR' | 'UNDEFINED_TYPE'
  ): ParseError {
    return new ParseError(`${this.filePath}:${String(line)}: ${message}`, code, this.filePath);
  }
}
