/**
 * ifgen
 *
 * Generates C++ and Java stubs, adapters, build descriptors and hash reports
 * from versioned interface-definition sources.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export { run } from './cli/driver.js';
export type { DriverIO } from './cli/driver.js';
export { Session, TOOL_ID } from './session.js';
export type { SessionOptions } from './session.js';

export {
  GenerationError,
  IfgenError,
  ParseError,
  UsageError,
  ValidationError,
  isIfgenError,
} from './errors.js';
export type {
  GenerationErrorCode,
  IfgenErrorKind,
  ParseErrorCode,
  UsageErrorCode,
  ValidationErrorCode,
} from './errors.js';

export { FQName, PackageRootTable, compareFQNames, parseRootOption, sortedUnique } from './fqname/index.js';
export type { PackageRoot } from './fqname/index.js';

export {
  DependencyGraphAnalyzer,
  HashLedger,
  ParseCache,
  SOURCE_EXTENSION,
  hashSource,
} from './coordinator/index.js';

export { BACKENDS, BACKEND_KEYS, GenerationContext, findBackend, isBackendKey } from './backends/index.js';
export type { BackendDescriptor, BackendKey, GenerateResult, OutputLocation } from './backends/index.js';

export { Emitter, MemorySink } from './emitter/emitter.js';

export {
  CONFIG_FILE_NAME,
  applyEnvOverrides,
  getDefaultConfig,
  loadConfig,
  parseConfig,
  validateConfig,
} from './config/index.js';
export type { Config } from './config/index.js';
