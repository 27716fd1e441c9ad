/**
 * Default configuration values for ifgen.toml.
 *
 * @packageDocumentation
 */

import type { BuildConfig, Config, HashConfig, LogConfig, PackagesConfig, RootConfig } from './types.js';

/**
 * Roots registered when neither `-r` nor the config file covers the prefix.
 */
export const DEFAULT_ROOTS: readonly RootConfig[] = [
  { prefix: 'ifgen', path: 'runtime/interfaces' },
  { prefix: 'platform', path: 'platform/interfaces' },
];

/**
 * Default package classification.
 */
export const DEFAULT_PACKAGES: PackagesConfig = {
  transport: ['ifgen.base@1.0', 'ifgen.manager@1.0'],
  system_prefixes: ['ifgen', 'platform'],
  system_process: [],
};

export const DEFAULT_BUILD: BuildConfig = {
  module_defaults: 'ifgen-module-defaults',
};

export const DEFAULT_HASH: HashConfig = {
  ledger: 'current.txt',
};

export const DEFAULT_LOG: LogConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  roots: [...DEFAULT_ROOTS],
  packages: DEFAULT_PACKAGES,
  build: DEFAULT_BUILD,
  hash: DEFAULT_HASH,
  log: DEFAULT_LOG,
};
