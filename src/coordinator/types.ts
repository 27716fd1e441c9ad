/**
 * Resolved unit model produced by the parse cache.
 *
 * @packageDocumentation
 */

import type { FQName } from '../fqname/index.js';
import type { ScalarName } from '../parser/index.js';

export type DeclarationKind = 'struct' | 'union' | 'enum' | 'typedef';

/**
 * A reference to a declared type, after name lookup.
 */
export interface NamedTypeRef {
  readonly kind: 'named';
  readonly declKind: DeclarationKind | 'interface';
  /** Unit declaring the type. */
  readonly unit: FQName;
  /**
   * Dotted path below the package namespace: `Point` for a `types`
   * declaration, `INfc.Info` for an interface member, `INfc` for the
   * interface itself.
   */
  readonly localName: string;
}

export type ResolvedType =
  | { readonly kind: 'scalar'; readonly name: ScalarName }
  | { readonly kind: 'vec'; readonly element: ResolvedType }
  | NamedTypeRef;

export interface Field {
  readonly name: string;
  readonly type: ResolvedType;
}

/**
 * Settings of an `@export` annotation.
 */
export interface ExportSettings {
  /** Name used for the exported C type or Java class. */
  readonly name: string;
  readonly valuePrefix: string;
  readonly valueSuffix: string;
}

export interface EnumValue {
  readonly name: string;
  readonly value: bigint;
}

interface DeclarationBase {
  readonly name: string;
  /** See {@link NamedTypeRef.localName}. */
  readonly localName: string;
}

export interface EnumDeclaration extends DeclarationBase {
  readonly kind: 'enum';
  readonly storage: ResolvedType;
  readonly values: readonly EnumValue[];
  readonly exported?: ExportSettings;
}

export interface CompoundDeclaration extends DeclarationBase {
  readonly kind: 'struct' | 'union';
  readonly fields: readonly Field[];
  readonly nested: readonly Declaration[];
}

export interface TypedefDeclaration extends DeclarationBase {
  readonly kind: 'typedef';
  readonly target: ResolvedType;
}

export type Declaration = EnumDeclaration | CompoundDeclaration | TypedefDeclaration;

export interface Method {
  readonly name: string;
  readonly oneway: boolean;
  readonly params: readonly Field[];
  readonly results: readonly Field[];
}

export interface InterfaceDeclaration {
  readonly name: string;
  readonly base?: NamedTypeRef;
  readonly declarations: readonly Declaration[];
  readonly methods: readonly Method[];
}

/**
 * One resolved source unit. Instances are owned by the cache and shared by
 * every caller that resolves the same name.
 */
export interface ParsedUnit {
  readonly fqName: FQName;
  readonly filePath: string;
  /** Hex SHA-256 of the source bytes. */
  readonly sourceHash: string;
  /** Root-scope declarations; empty for interface units. */
  readonly declarations: readonly Declaration[];
  readonly interface?: InterfaceDeclaration;
  /** Units this unit imports or references, sorted, never itself. */
  readonly importedNames: readonly FQName[];
  readonly isJavaCompatible: boolean;
  /** True when every root-scope declaration is a typedef. */
  readonly containsOnlyTypedefs: boolean;
  /** `@export` enums at any depth, in declaration order. */
  readonly exportedEnums: readonly EnumDeclaration[];
}

/**
 * Options for {@link ParseCache.resolve}.
 */
export interface ResolveOptions {
  /**
   * Check the unit against the package root's hash ledger.
   * @defaultValue true
   */
  readonly enforceHash?: boolean;
}
