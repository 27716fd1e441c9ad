/**
 * Configuration module for ifgen.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export {
  CONFIG_FILE_NAME,
  ConfigParseError,
  getDefaultConfig,
  loadConfig,
  parseConfig,
} from './parser.js';
export type {
  BuildConfig,
  Config,
  HashConfig,
  LogConfig,
  PackagesConfig,
  RootConfig,
} from './types.js';
export {
  DEFAULT_BUILD,
  DEFAULT_CONFIG,
  DEFAULT_HASH,
  DEFAULT_LOG,
  DEFAULT_PACKAGES,
  DEFAULT_ROOTS,
} from './defaults.js';
export {
  ConfigValidationError,
  assertConfigValid,
  isPackagePrefix,
  validateConfig,
} from './validator.js';
export type {
  ConfigIssue,
  ConfigValidationResult,
  PathCheckResult,
  PathChecker,
  ValidateConfigOptions,
} from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
