/**
 * Command-line parsing for `ifgen`.
 *
 * Options follow getopt conventions for the option string `hp:o:r:L:tv`:
 * flags may be grouped (`-tv`), values may be attached (`-Lc++`) or follow
 * as the next argument, and `--` ends option parsing. Options and names may
 * be interleaved.
 *
 * @packageDocumentation
 */

import { isBackendKey, type BackendDescriptor, findBackend } from '../backends/index.js';
import { UsageError } from '../errors.js';
import { FQName } from '../fqname/index.js';

const FLAGS = new Set(['h', 't', 'v']);
const WITH_VALUE = new Set(['p', 'o', 'r', 'L']);

/**
 * Options as they appear on the command line, before any defaults apply.
 */
export interface RawArgs {
  help: boolean;
  rootPath?: string;
  outputPath?: string;
  roots: string[];
  backend?: string;
  testMode: boolean;
  verbose: boolean;
  names: string[];
}

/**
 * Splits argv into options and names.
 *
 * @throws UsageError on an unknown option, a missing value, or a second `-L`.
 */
export function parseArgs(argv: readonly string[]): RawArgs {
  const result: RawArgs = { help: false, roots: [], testMode: false, verbose: false, names: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--') {
      result.names.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith('-') || arg === '-') {
      result.names.push(arg);
      continue;
    }

    for (let pos = 1; pos < arg.length; pos++) {
      const option = arg.charAt(pos);
      if (FLAGS.has(option)) {
        applyFlag(result, option);
        continue;
      }
      if (!WITH_VALUE.has(option)) {
        throw new UsageError(`Unknown option -${option}`, 'UNKNOWN_OPTION');
      }

      let value = arg.slice(pos + 1);
      if (value === '') {
        const next = argv[i + 1];
        if (next === undefined) {
          throw new UsageError(`Option -${option} requires an argument`, 'MISSING_ARGUMENT');
        }
        value = next;
        i++;
      }
      applyValue(result, option, value);
      break;
    }
  }
  return result;
}

function applyFlag(result: RawArgs, option: string): void {
  switch (option) {
    case 'h':
      result.help = true;
      return;
    case 't':
      result.testMode = true;
      return;
    case 'v':
      result.verbose = true;
      return;
  }
}

function applyValue(result: RawArgs, option: string, value: string): void {
  switch (option) {
    case 'p':
      result.rootPath = value;
      return;
    case 'o':
      result.outputPath = value;
      return;
    case 'r':
      result.roots.push(value);
      return;
    case 'L':
      if (result.backend !== undefined) {
        throw new UsageError(
          `Only one -L option allowed; "${result.backend}" already specified`,
          'DUPLICATE_BACKEND'
        );
      }
      result.backend = value;
      return;
  }
}

/**
 * Selects the backend named by `-L`.
 *
 * @throws UsageError if `-L` is missing or names no backend, or if `-t` is
 * given with a backend other than `androidbp`.
 */
export function selectBackend(args: RawArgs): BackendDescriptor {
  if (args.backend === undefined) {
    throw new UsageError('No -L option provided', 'MISSING_BACKEND');
  }
  if (!isBackendKey(args.backend)) {
    throw new UsageError(`Unrecognized -L option: "${args.backend}"`, 'UNKNOWN_BACKEND');
  }
  const backend = findBackend(args.backend);
  if (args.testMode && backend.key !== 'androidbp') {
    throw new UsageError('The -t option is for -Landroidbp only', 'TEST_MODE_UNSUPPORTED');
  }
  if (args.names.length === 0) {
    throw new UsageError('No fully-qualified name specified', 'MISSING_NAMES');
  }
  return backend;
}

/**
 * Applies the backend's output shape to `-o`.
 *
 * @throws UsageError (`MISSING_OUTPUT`) if the backend needs `-o` and it is absent.
 */
export function resolveOutputPath(
  backend: BackendDescriptor,
  outputPath: string | undefined,
  rootPath: string
): string {
  const withSlash = (value: string): string => (value.endsWith('/') ? value : value + '/');
  switch (backend.outputShape) {
    case 'directory':
    case 'file':
      if (outputPath === undefined || outputPath === '') {
        throw new UsageError(`-L${backend.key} requires -o <output path>`, 'MISSING_OUTPUT');
      }
      return backend.outputShape === 'directory' ? withSlash(outputPath) : outputPath;
    case 'sourceTree':
      return withSlash(outputPath === undefined || outputPath === '' ? rootPath : outputPath);
    case 'none':
      return '';
  }
}

/**
 * Parses a name given on the command line.
 *
 * @throws UsageError (`INVALID_NAME`) if it is not `pkg@M.m[::Name]`.
 */
export function parseName(text: string): FQName {
  const name = FQName.parse(text);
  if (name === undefined) {
    throw new UsageError(
      `Invalid fully-qualified name '${text}'`,
      'INVALID_NAME',
      'expected <package>@<major>.<minor>[::<Name>]'
    );
  }
  return name;
}
