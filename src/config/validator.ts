/**
 * Semantic validation for configuration values.
 *
 * Checks what the TOML types cannot express: package names that parse,
 * prefixes made of whole identifiers, plain ledger file names, and
 * optionally that the root path exists.
 *
 * @packageDocumentation
 */

import { FQName } from '../fqname/index.js';
import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * Individual validation failure.
 */
export interface ConfigIssue {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ConfigValidationResult {
  valid: boolean;
  issues: ConfigIssue[];
}

/**
 * Result of a path check operation.
 */
export interface PathCheckResult {
  exists: boolean;
  isDirectory?: boolean;
}

/**
 * Function type for checking path existence.
 */
export type PathChecker = (path: string) => PathCheckResult;

/**
 * Options for semantic validation.
 */
export interface ValidateConfigOptions {
  /**
   * Function to check if the root path exists.
   * If not provided, path validation is skipped.
   */
  pathChecker?: PathChecker;
}

const PREFIX_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

/**
 * Checks that a string is a dot-separated package prefix.
 */
export function isPackagePrefix(value: string): boolean {
  return PREFIX_PATTERN.test(value);
}

function validatePackageList(values: readonly string[], field: string, issues: ConfigIssue[]): void {
  values.forEach((value, index) => {
    const name = FQName.parse(value);
    if (name === undefined || !name.isPackage()) {
      issues.push({
        field: `${field}[${String(index)}]`,
        value,
        message: `'${value}' is not a package name of the form pkg@M.m`,
      });
    }
  });
}

function validateRoots(config: Config, issues: ConfigIssue[]): void {
  const seen = new Map<string, string>();
  for (const root of config.roots) {
    const field = `roots.${root.prefix}`;
    if (!isPackagePrefix(root.prefix)) {
      issues.push({ field, value: root.prefix, message: `'${root.prefix}' is not a package prefix` });
    }
    if (root.path === '') {
      issues.push({ field, value: root.path, message: 'Root path must not be empty' });
    }
    const previous = seen.get(root.prefix);
    if (previous !== undefined && previous !== root.path) {
      issues.push({
        field,
        value: root.path,
        message: `Prefix is already mapped to '${previous}'`,
      });
    }
    seen.set(root.prefix, root.path);
  }
}

/**
 * Validates semantic constraints of a configuration.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const issue of result.issues) {
 *     console.error(`${issue.field}: ${issue.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(
  config: Config,
  options: ValidateConfigOptions = {}
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];

  validateRoots(config, issues);
  validatePackageList(config.packages.transport, 'packages.transport', issues);
  validatePackageList(config.packages.system_process, 'packages.system_process', issues);
  config.packages.system_prefixes.forEach((prefix, index) => {
    if (!isPackagePrefix(prefix)) {
      issues.push({
        field: `packages.system_prefixes[${String(index)}]`,
        value: prefix,
        message: `'${prefix}' is not a package prefix`,
      });
    }
  });

  const ledger = config.hash.ledger;
  if (ledger === '' || ledger.includes('/')) {
    issues.push({
      field: 'hash.ledger',
      value: ledger,
      message: 'Ledger must be a plain file name',
    });
  }
  if (config.build.module_defaults === '') {
    issues.push({
      field: 'build.module_defaults',
      value: '',
      message: 'Defaults module name must not be empty',
    });
  }

  if (options.pathChecker !== undefined && config.root_path !== undefined) {
    const check = options.pathChecker(config.root_path);
    if (!check.exists || check.isDirectory === false) {
      issues.push({
        field: 'root_path',
        value: config.root_path,
        message: check.exists ? 'Root path is not a directory' : 'Root path does not exist',
      });
    }
  }

  return { valid: issues.length === 0, issues };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config, options: ValidateConfigOptions = {}): void {
  const result = validateConfig(config, options);

  if (!result.valid) {
    const lines = result.issues.map((issue) => `  - ${issue.field}: ${issue.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.issues.length)} error(s):\n${lines}`,
      result.issues
    );
  }
}
