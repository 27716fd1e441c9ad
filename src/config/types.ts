/**
 * Configuration types for ifgen.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * One default package root from the `[roots]` table.
 */
export interface RootConfig {
  /** Dot-separated package prefix, e.g. `vendor.acme`. */
  prefix: string;
  /** Directory relative to the root path, or absolute. */
  path: string;
}

/**
 * Package classification used by build descriptors.
 */
export interface PackagesConfig {
  /** Packages (`pkg@M.m`) whose code ships with the runtime and get no generated library. */
  transport: string[];
  /** Package prefixes treated as system packages; others get an extra `_vendor` library. */
  system_prefixes: string[];
  /** Packages (`pkg@M.m`) whose VNDK library is also loaded by system processes. */
  system_process: string[];
}

/**
 * Build descriptor settings.
 */
export interface BuildConfig {
  /** Defaults module every generated C++ library inherits from. */
  module_defaults: string;
}

/**
 * Hash ledger settings.
 */
export interface HashConfig {
  /** Ledger file name under each package root directory. */
  ledger: string;
}

/**
 * Logging settings.
 */
export interface LogConfig {
  /** Emit debug events, as with `-v`. */
  debug: boolean;
}

/**
 * Complete validated configuration.
 */
export interface Config {
  /** Root path that relative package roots are resolved against. */
  root_path?: string;
  /** Default package roots, registered after the `-r` options. */
  roots: RootConfig[];
  packages: PackagesConfig;
  build: BuildConfig;
  hash: HashConfig;
  log: LogConfig;
}
