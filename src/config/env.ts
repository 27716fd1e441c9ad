/**
 * Environment variable overrides for configuration.
 *
 * Provides support for IFGEN_* environment variables to override
 * configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvMapping =
  | { type: 'string'; description: string; apply: (config: Config, value: string) => Config }
  | { type: 'boolean'; description: string; apply: (config: Config, value: boolean) => Config }
  | { type: 'list'; description: string; apply: (config: Config, value: string[]) => Config };

/**
 * Mapping from environment variable names to the settings they replace.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  IFGEN_BUILD_TOP: {
    type: 'string',
    description: 'Root path that relative package roots are resolved against (-p default)',
    apply: (config, value) => ({ ...config, root_path: value }),
  },
  IFGEN_HASH_LEDGER: {
    type: 'string',
    description: 'Ledger file name under each package root',
    apply: (config, value) => ({ ...config, hash: { ...config.hash, ledger: value } }),
  },
  IFGEN_MODULE_DEFAULTS: {
    type: 'string',
    description: 'Defaults module of generated C++ libraries',
    apply: (config, value) => ({ ...config, build: { ...config.build, module_defaults: value } }),
  },
  IFGEN_TRANSPORT_PACKAGES: {
    type: 'list',
    description: 'Comma-separated transport packages (pkg@M.m)',
    apply: (config, value) => ({ ...config, packages: { ...config.packages, transport: value } }),
  },
  IFGEN_SYSTEM_PREFIXES: {
    type: 'list',
    description: 'Comma-separated system package prefixes',
    apply: (config, value) => ({
      ...config,
      packages: { ...config.packages, system_prefixes: value },
    }),
  },
  IFGEN_DEBUG: {
    type: 'boolean',
    description: 'Enable debug logging (true/false)',
    apply: (config, value) => ({ ...config, log: { ...config.log, debug: value } }),
  },
};

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/** Splits a comma-separated list, dropping blank entries. */
function coerceToList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function applyMapping(config: Config, mapping: EnvMapping, value: string, envVar: string): Config {
  switch (mapping.type) {
    case 'string':
      return mapping.apply(config, value);
    case 'boolean':
      return mapping.apply(config, coerceToBoolean(value, envVar));
    case 'list':
      return mapping.apply(config, coerceToList(value));
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Configuration with every coercible override applied. */
  config: Config;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Applies IFGEN_* environment variables to a configuration and reports
 * which ones were used.
 *
 * @param config - The base configuration.
 * @param env - The environment object to read from.
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides(config, { IFGEN_BUILD_TOP: '/src/top' });
 * console.log(result.config.root_path); // '/src/top'
 * console.log(result.appliedVars); // ['IFGEN_BUILD_TOP']
 * ```
 */
export function readEnvOverrides(
  config: Config,
  env: EnvRecord,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  let result = config;
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      result = applyMapping(result, mapping, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { config: result, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord): Config {
  return readEnvOverrides(config, env).config;
}

/**
 * Gets documentation for all supported environment variables, for usage text.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
