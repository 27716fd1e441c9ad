/**
 * Lookups shared by the generators.
 *
 * @packageDocumentation
 */

import type { ParseCache } from '../coordinator/index.js';
import type {
  Declaration,
  InterfaceDeclaration,
  Method,
  NamedTypeRef,
  ParsedUnit,
  ResolvedType,
} from '../coordinator/types.js';
import { GenerationError } from '../errors.js';
import type { FQName } from '../fqname/index.js';

/** First line of every generated file. */
export const AUTOGENERATED_NOTICE = 'This file is autogenerated by ifgen. Do not edit manually.';

/**
 * Methods an interface declares, grouped by the interface that declares
 * them, from the root of the `extends` chain down to `unit` itself.
 */
export interface MethodGroup {
  readonly owner: FQName;
  readonly methods: readonly Method[];
}

/**
 * Finds the declaration a reference points at.
 *
 * @throws GenerationError (`INTERNAL`) if the reference does not resolve.
 */
export function findDeclaration(
  cache: ParseCache,
  ref: NamedTypeRef
): Declaration | InterfaceDeclaration {
  const unit = cache.lookup(ref.unit) ?? cache.resolve(ref.unit);
  const parts = ref.localName.split('.');
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
      break;
    }
    scope = found.kind === 'struct' || found.kind === 'union' ? found.nested : [];
  }
  if (found === undefined) {
    throw new GenerationError(
      `'${ref.unit.string()}' has no declaration '${ref.localName}'`,
      'INTERNAL'
    );
  }
  return found;
}

/**
 * Follows typedefs until the type is not an alias.
 */
export function resolveAliases(cache: ParseCache, type: ResolvedType): ResolvedType {
  const seen = new Set<string>();
  let current = type;
  while (current.kind === 'named' && current.declKind === 'typedef') {
    const key = refName(current);
    const declaration = findDeclaration(cache, current);
    if (seen.has(key) || !('kind' in declaration) || declaration.kind !== 'typedef') {
      throw new GenerationError(`Typedef '${key}' does not name a type`, 'INTERNAL');
    }
    seen.add(key);
    current = declaration.target;
  }
  return current;
}

/**
 * The scalar an enum is stored as, following enums that extend other enums.
 */
export function enumStorageScalar(cache: ParseCache, storage: ResolvedType): ResolvedType {
  const seen = new Set<string>();
  let current = resolveAliases(cache, storage);
  while (current.kind === 'named' && current.declKind === 'enum') {
    const key = refName(current);
    const declaration = findDeclaration(cache, current);
    if (seen.has(key) || !('kind' in declaration) || declaration.kind !== 'enum') {
      throw new GenerationError(`Enum '${key}' has no scalar storage type`, 'INTERNAL');
    }
    seen.add(key);
    current = resolveAliases(cache, declaration.storage);
  }
  return current;
}

/**
 * Every declaration, depth first, nested ones after their parent.
 */
export function flattenDeclarations(declarations: readonly Declaration[]): Declaration[] {
  const result: Declaration[] = [];
  const worklist = [...declarations].reverse();
  for (let next = worklist.pop(); next !== undefined; next = worklist.pop()) {
    result.push(next);
    if (next.kind === 'struct' || next.kind === 'union') {
      worklist.push(...[...next.nested].reverse());
    }
  }
  return result;
}

/**
 * Method groups of an interface unit and all the interfaces it extends.
 *
 * @throws GenerationError if `unit` declares no interface.
 */
export function methodGroups(cache: ParseCache, unit: ParsedUnit): MethodGroup[] {
  const groups: MethodGroup[] = [];
  const seen = new Set<string>();
  let current: ParsedUnit | undefined = unit;
  while (current !== undefined && !seen.has(current.fqName.string())) {
    seen.add(current.fqName.string());
    const iface: InterfaceDeclaration = interfaceOf(current);
    groups.unshift({ owner: current.fqName, methods: iface.methods });
    current = iface.base === undefined ? undefined : cache.resolve(iface.base.unit);
  }
  return groups;
}

/**
 * The interface a unit declares.
 *
 * @throws GenerationError (`INTERNAL`) for a `types` unit.
 */
export function interfaceOf(unit: ParsedUnit): InterfaceDeclaration {
  if (unit.interface === undefined) {
    throw new GenerationError(`'${unit.fqName.string()}' declares no interface`, 'INTERNAL');
  }
  return unit.interface;
}

/**
 * `vendor/acme/nfc/1.0/<file>`: where a generated file lands below the
 * output directory, and how other generated files include it.
 */
export function generatedPath(cache: ParseCache, name: FQName, fileName: string): string {
  return cache.packageRootPath(name) + cache.packagePath(name, { relative: true }) + fileName;
}

/** Non-`types` members of a package. */
export function interfaceMembers(members: readonly FQName[]): FQName[] {
  return members.filter((member) => !member.isTypes());
}

/**
 * Fully qualified textual name of a reference: `pkg@M.m::Local.Path`.
 */
export function refName(ref: NamedTypeRef): string {
  return `${ref.unit.packageAndVersion().string()}::${ref.localName}`;
}
