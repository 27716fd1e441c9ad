/**
 * Per-invocation state shared by the driver and every backend.
 *
 * @packageDocumentation
 */

import type { BackendKey } from './backends/types.js';
import { getDefaultConfig, type Config } from './config/index.js';
import { DependencyGraphAnalyzer, ParseCache } from './coordinator/index.js';
import type { FQName, PackageRootTable } from './fqname/index.js';
import type { UnitParser } from './parser/index.js';
import { Logger } from './utils/logger.js';

/** Name the tool writes into generated build rules. */
export const TOOL_ID = 'ifgen';

/**
 * Inputs for {@link Session}.
 */
export interface SessionOptions {
  readonly rootPath: string;
  /** Output prefix; ends with `/` for directory backends, empty when unused. */
  readonly outputPath: string;
  readonly backend: BackendKey;
  /** Build descriptors for tests (`-t`). */
  readonly testMode?: boolean;
  readonly verbose?: boolean;
  /** Registered package roots; frozen once the first unit is parsed. */
  readonly roots: PackageRootTable;
  readonly config?: Config;
  readonly logger?: Logger;
  /** Receives text the backends print, e.g. hash lines. */
  readonly stdout?: (text: string) => void;
  readonly parser?: UnitParser;
}

/**
 * Everything one invocation needs, built once by the driver.
 *
 * The session owns the parse cache: parsed units live as long as the session
 * and are shared by reference with every consumer.
 */
export class Session {
  readonly toolId = TOOL_ID;
  readonly rootPath: string;
  readonly outputPath: string;
  readonly backend: BackendKey;
  readonly testMode: boolean;
  readonly verbose: boolean;
  readonly roots: PackageRootTable;
  readonly config: Config;
  readonly logger: Logger;
  readonly cache: ParseCache;
  readonly analyzer: DependencyGraphAnalyzer;
  readonly stdout: (text: string) => void;

  private readonly transport: ReadonlySet<string>;
  private readonly systemProcess: ReadonlySet<string>;

  constructor(options: SessionOptions) {
    this.rootPath = options.rootPath;
    this.outputPath = options.outputPath;
    this.backend = options.backend;
    this.testMode = options.testMode ?? false;
    this.config = options.config ?? getDefaultConfig();
    this.verbose = options.verbose ?? this.config.log.debug;
    this.roots = options.roots;
    this.logger =
      options.logger ?? new Logger({ component: 'ifgen', debugMode: this.verbose });
    this.stdout =
      options.stdout ??
      ((text: string) => {
        process.stdout.write(text);
      });

    this.cache = new ParseCache({
      rootPath: this.rootPath,
      roots: this.roots,
      ledgerFile: this.config.hash.ledger,
      logger: this.logger.child('ParseCache'),
      ...(options.parser !== undefined ? { parser: options.parser } : {}),
    });
    this.analyzer = new DependencyGraphAnalyzer(this.cache);

    this.transport = new Set(this.config.packages.transport);
    this.systemProcess = new Set(this.config.packages.system_process);
  }

  /** True for packages whose code ships with the runtime. */
  isTransportPackage(pkg: FQName): boolean {
    return this.transport.has(pkg.packageAndVersion().string());
  }

  /** True for packages under one of the configured system prefixes. */
  isSystemPackage(pkg: FQName): boolean {
    return this.config.packages.system_prefixes.some((prefix) => pkg.inPackage(prefix));
  }

  /** True for packages whose shared library is also loaded by system processes. */
  isSystemProcessSupported(pkg: FQName): boolean {
    return this.systemProcess.has(pkg.packageAndVersion().string());
  }

  get moduleDefaults(): string {
    return this.config.build.module_defaults;
  }
}
