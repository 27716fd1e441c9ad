/**
 * Unit resolution, caching and import-graph analysis.
 *
 * @packageDocumentation
 */

export { ParseCache, DEFAULT_LEDGER_FILE, SOURCE_EXTENSION } from './parse-cache.js';
export type { ParseCacheOptions } from './parse-cache.js';
export { DependencyGraphAnalyzer } from './dependency-graph.js';
export { HashLedger, hashSource } from './hash-ledger.js';
export type {
  CompoundDeclaration,
  Declaration,
  DeclarationKind,
  EnumDeclaration,
  EnumValue,
  ExportSettings,
  Field,
  InterfaceDeclaration,
  Method,
  NamedTypeRef,
  ParsedUnit,
  ResolvedType,
  ResolveOptions,
  TypedefDeclaration,
} from './types.js';
