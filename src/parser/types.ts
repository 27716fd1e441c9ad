/**
 * Syntax tree for interface-definition (`.idl`) units.
 *
 * The tree records names exactly as written; resolving them against other
 * units is the parse cache's job.
 *
 * @packageDocumentation
 */

/**
 * Builtin scalar and opaque types.
 */
export type ScalarName =
  | 'bool'
  | 'int8_t'
  | 'int16_t'
  | 'int32_t'
  | 'int64_t'
  | 'uint8_t'
  | 'uint16_t'
  | 'uint32_t'
  | 'uint64_t'
  | 'float'
  | 'double'
  | 'string'
  | 'handle'
  | 'memory'
  | 'pointer';

export const SCALAR_NAMES: readonly ScalarName[] = [
  'bool',
  'int8_t',
  'int16_t',
  'int32_t',
  'int64_t',
  'uint8_t',
  'uint16_t',
  'uint32_t',
  'uint64_t',
  'float',
  'double',
  'string',
  'handle',
  'memory',
  'pointer',
];

/**
 * A type as written in a field, parameter, typedef or enum storage clause.
 */
export type TypeSyntax =
  | { readonly kind: 'scalar'; readonly name: ScalarName }
  | { readonly kind: 'vec'; readonly element: TypeSyntax }
  | { readonly kind: 'named'; readonly name: string; readonly line: number };

/**
 * `@name(key="value", ...)`
 */
export interface AnnotationSyntax {
  readonly name: string;
  readonly params: Readonly<Record<string, string>>;
}

export interface FieldSyntax {
  readonly name: string;
  readonly type: TypeSyntax;
}

export interface EnumValueSyntax {
  readonly name: string;
  /** Explicit value; omitted values continue from the previous one. */
  readonly value?: bigint;
}

export interface CompoundSyntax {
  readonly kind: 'struct' | 'union';
  readonly name: string;
  readonly fields: readonly FieldSyntax[];
  readonly nested: readonly DeclarationSyntax[];
  readonly annotations: readonly AnnotationSyntax[];
  readonly line: number;
}

export interface EnumSyntax {
  readonly kind: 'enum';
  readonly name: string;
  readonly storage: TypeSyntax;
  readonly values: readonly EnumValueSyntax[];
  readonly annotations: readonly AnnotationSyntax[];
  readonly line: number;
}

export interface TypedefSyntax {
  readonly kind: 'typedef';
  readonly name: string;
  readonly target: TypeSyntax;
  readonly annotations: readonly AnnotationSyntax[];
  readonly line: number;
}

export type DeclarationSyntax = CompoundSyntax | EnumSyntax | TypedefSyntax;

export interface MethodSyntax {
  readonly name: string;
  readonly oneway: boolean;
  readonly params: readonly FieldSyntax[];
  readonly results: readonly FieldSyntax[];
  readonly line: number;
}

export interface InterfaceSyntax {
  readonly name: string;
  /** Name of the extended interface, as written. */
  readonly extends?: string;
  readonly declarations: readonly DeclarationSyntax[];
  readonly methods: readonly MethodSyntax[];
  readonly annotations: readonly AnnotationSyntax[];
  readonly line: number;
}

export interface ImportSyntax {
  /** `pkg@M.m` or `pkg@M.m::Unit`. */
  readonly target: string;
  readonly line: number;
}

/**
 * One parsed source file.
 */
export interface UnitSyntax {
  /** `pkg@M.m` from the package statement. */
  readonly package: string;
  readonly imports: readonly ImportSyntax[];
  readonly declarations: readonly DeclarationSyntax[];
  readonly interface?: InterfaceSyntax;
}

/**
 * Turns source text into a syntax tree.
 *
 * @throws IdlSyntaxError on malformed input.
 */
export type UnitParser = (source: string, filename: string) => UnitSyntax;

/**
 * Error thrown for malformed source text.
 */
export class IdlSyntaxError extends Error {
  public readonly line: number;
  public readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`${String(line)}:${String(column)}: ${message}`);
    this.name = 'IdlSyntaxError';
    this.line = line;
    this.column = column;
  }
}
