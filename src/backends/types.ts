/**
 * Backend descriptor types.
 *
 * @packageDocumentation
 */

import type { IfgenError, ValidationError } from '../errors.js';
import type { FQName } from '../fqname/index.js';
import type { GenerationContext } from './output.js';

/**
 * Every backend key, in registry order.
 */
export const BACKEND_KEYS = [
  'check',
  'c++',
  'c++-headers',
  'c++-sources',
  'export-header',
  'c++-impl',
  'c++-impl-headers',
  'c++-impl-sources',
  'c++-adapter',
  'c++-adapter-headers',
  'c++-adapter-sources',
  'c++-adapter-main',
  'java',
  'java-constants',
  'vts',
  'makefile',
  'androidbp',
  'androidbp-impl',
  'hash',
] as const;

/**
 * Closed set of backends.
 */
export type BackendKey = (typeof BACKEND_KEYS)[number];

/**
 * What the backend does with `-o`.
 *
 * - `directory`: required, normalized to end with `/`
 * - `file`: required, used as the path of the single output file
 * - `sourceTree`: defaults to the root path, normalized to end with `/`
 * - `none`: ignored
 */
export type OutputShape = 'directory' | 'file' | 'sourceTree' | 'none';

/**
 * Names a backend accepts: `source` takes a package or a fully-qualified
 * unit, `package` only a bare package.
 */
export type NameShape = 'source' | 'package';

/**
 * Outcome of checking a name against a backend.
 */
export type ValidationOutcome = { valid: true } | { valid: false; error: ValidationError };

/**
 * Outcome of running a backend for one requested name.
 */
export type GenerateResult =
  | { success: true; files: readonly string[] }
  | { success: false; error: IfgenError };

/**
 * One entry of the backend registry.
 */
export interface BackendDescriptor {
  readonly key: BackendKey;
  /** One-line description for the usage text. */
  readonly description: string;
  readonly outputShape: OutputShape;
  readonly nameShape: NameShape;
  validate(name: FQName): ValidationOutcome;
  generate(name: FQName, context: GenerationContext): GenerateResult;
}

/**
 * Body of a backend: writes through the context and throws an
 * {@link IfgenError} on failure.
 */
export type Generator = (name: FQName, context: GenerationContext) => void;
