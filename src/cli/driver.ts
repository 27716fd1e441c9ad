/**
 * One invocation of the tool, from argv to exit code.
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { GenerationContext } from '../backends/index.js';
import {
  CONFIG_FILE_NAME,
  applyEnvOverrides,
  assertConfigValid,
  loadConfig,
  type Config,
  type EnvRecord,
} from '../config/index.js';
import { PackageRootTable, parseRootOption } from '../fqname/index.js';
import { Session } from '../session.js';
import { Logger, type LogWriter } from '../utils/logger.js';
import { safeExistsSync, safeIsDirectorySync } from '../utils/safe-fs.js';
import { parseArgs, parseName, resolveOutputPath, selectBackend } from './args.js';
import { formatError, type DisplayOptions } from './errors.js';
import { usageText } from './usage.js';

/**
 * The process surface the driver runs against; tests pass their own.
 */
export interface DriverIO {
  readonly env: EnvRecord;
  readonly cwd: string;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly colors?: boolean;
}

function loadEffectiveConfig(io: DriverIO): Config {
  const config = applyEnvOverrides(loadConfig(path.join(io.cwd, CONFIG_FILE_NAME)), io.env);
  assertConfigValid(config, {
    pathChecker: (candidate) => {
      const resolved = path.resolve(io.cwd, candidate);
      return { exists: safeExistsSync(resolved), isDirectory: safeIsDirectorySync(resolved) };
    },
  });
  return config;
}

/**
 * Runs the tool and returns the process exit code.
 *
 * Names are handled one after another: each is checked against the backend
 * and then generated. The first failure is reported on stderr and ends the
 * run; files written before it stay in place.
 */
export function run(argv: readonly string[], io: DriverIO): number {
  const display: DisplayOptions = { colors: io.colors ?? false };
  if (argv.length === 0) {
    io.stderr(usageText());
    return 1;
  }

  try {
    const args = parseArgs(argv);
    if (args.help) {
      io.stdout(usageText());
      return 0;
    }

    const config = loadEffectiveConfig(io);
    const rootPath = path.resolve(io.cwd, args.rootPath ?? config.root_path ?? '.');

    const roots = new PackageRootTable();
    for (const option of args.roots) {
      const root = parseRootOption(option);
      roots.addPackagePath(root.prefix, root.directory);
    }
    for (const root of config.roots) {
      roots.addDefaultPackagePath(root.prefix, root.path);
    }

    const backend = selectBackend(args);
    const requestedOutput =
      args.outputPath === undefined || args.outputPath === ''
        ? args.outputPath
        : path.resolve(io.cwd, args.outputPath);
    const outputPath = resolveOutputPath(backend, requestedOutput, rootPath);

    const writer: LogWriter = io.stderr;
    const verbose = args.verbose || config.log.debug;
    const session = new Session({
      rootPath,
      outputPath,
      backend: backend.key,
      testMode: args.testMode,
      verbose,
      roots,
      config,
      logger: new Logger({ component: 'ifgen', debugMode: verbose, writer }),
      stdout: io.stdout,
    });

    for (const text of args.names) {
      const name = parseName(text);
      const validation = backend.validate(name);
      if (!validation.valid) {
        io.stderr(formatError(validation.error, display) + '\n');
        return 1;
      }

      const result = backend.generate(name, new GenerationContext(session));
      if (!result.success) {
        io.stderr(formatError(result.error, display) + '\n');
        return 1;
      }
      session.logger.debug('name_done', { name: name.string(), files: result.files.length });
    }
    return 0;
  } catch (error) {
    io.stderr(formatError(error, display) + '\n');
    return 1;
  }
}
