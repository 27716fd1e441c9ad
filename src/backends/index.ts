/**
 * Backend table, name validation and dispatch.
 *
 * @packageDocumentation
 */

export { BACKENDS, findBackend, isBackendKey } from './registry.js';
export { BACKEND_KEYS } from './types.js';
export type {
  BackendDescriptor,
  BackendKey,
  GenerateResult,
  Generator,
  NameShape,
  OutputShape,
  ValidationOutcome,
} from './types.js';
export { forFileOrPackage, runGenerator } from './dispatch.js';
export type { UnitGenerator } from './dispatch.js';
export { GenerationContext } from './output.js';
export type { OutputLocation } from './output.js';
export { validateForSource, validateIsPackage } from './validation.js';
