/**
 * The closed table of backends selectable with `-L`.
 *
 * @packageDocumentation
 */

import type { FQName } from '../fqname/index.js';
import {
  generateAdapterMain,
  generateCppAdapterHeaders,
  generateCppAdapterSources,
} from '../generators/cpp-adapter.js';
import { generateCppHeaders } from '../generators/cpp-headers.js';
import { generateCppImplHeaders, generateCppImplSources } from '../generators/cpp-impl.js';
import { generateCppSources } from '../generators/cpp-sources.js';
import { generateBlueprint, generateBlueprintImpl } from '../generators/blueprint.js';
import { generateExportedConstants } from '../generators/export-header.js';
import { checkUnit, printUnitHash } from '../generators/hash.js';
import { generateJava } from '../generators/java.js';
import { generateMakefile } from '../generators/makefile.js';
import { generateVts } from '../generators/vts.js';
import { forFileOrPackage, runGenerator, type UnitGenerator } from './dispatch.js';
import type { GenerationContext } from './output.js';
import { validateForSource, validateIsPackage } from './validation.js';
import type {
  BackendDescriptor,
  BackendKey,
  Generator,
  NameShape,
  OutputShape,
} from './types.js';
import { BACKEND_KEYS } from './types.js';

function both(first: UnitGenerator, second: UnitGenerator): UnitGenerator {
  return (unit, context, requested) => {
    first(unit, context, requested);
    second(unit, context, requested);
  };
}

function backend(
  key: BackendKey,
  description: string,
  outputShape: OutputShape,
  nameShape: NameShape,
  generator: Generator
): BackendDescriptor {
  return {
    key,
    description,
    outputShape,
    nameShape,
    validate: (name: FQName) =>
      nameShape === 'package' ? validateIsPackage(name, key) : validateForSource(name, key),
    generate: (name: FQName, context: GenerationContext) => runGenerator(generator, name, context),
  };
}

/**
 * Every backend, in the order the usage text lists them.
 */
export const BACKENDS: readonly BackendDescriptor[] = Object.freeze([
  backend(
    'check',
    'Parses the units to see if they are valid; writes nothing.',
    'none',
    'source',
    forFileOrPackage(checkUnit)
  ),
  backend(
    'c++',
    'C++ headers and sources for talking to interfaces.',
    'directory',
    'source',
    forFileOrPackage(both(generateCppHeaders, generateCppSources))
  ),
  backend('c++-headers', 'c++ but headers only.', 'directory', 'source', forFileOrPackage(generateCppHeaders)),
  backend('c++-sources', 'c++ but sources only.', 'directory', 'source', forFileOrPackage(generateCppSources)),
  backend(
    'export-header',
    'C header of the @export enums of a package, for legacy code.',
    'file',
    'package',
    (name, context) => {
      generateExportedConstants(name, context, 'c');
    }
  ),
  backend(
    'c++-impl',
    'Skeleton C++ implementation of an interface.',
    'directory',
    'source',
    forFileOrPackage(both(generateCppImplHeaders, generateCppImplSources))
  ),
  backend('c++-impl-headers', 'c++-impl but headers only.', 'directory', 'source', forFileOrPackage(generateCppImplHeaders)),
  backend('c++-impl-sources', 'c++-impl but sources only.', 'directory', 'source', forFileOrPackage(generateCppImplSources)),
  backend(
    'c++-adapter',
    'Adapters that serve an x.(y+n) implementation as x.y.',
    'directory',
    'source',
    forFileOrPackage(both(generateCppAdapterHeaders, generateCppAdapterSources))
  ),
  backend(
    'c++-adapter-headers',
    'c++-adapter but headers only.',
    'directory',
    'source',
    forFileOrPackage(generateCppAdapterHeaders)
  ),
  backend(
    'c++-adapter-sources',
    'c++-adapter but sources only.',
    'directory',
    'source',
    forFileOrPackage(generateCppAdapterSources)
  ),
  backend('c++-adapter-main', 'main.cpp of the adapter test binary.', 'directory', 'package', generateAdapterMain),
  backend('java', 'Java library for talking to interfaces.', 'directory', 'source', forFileOrPackage(generateJava)),
  backend(
    'java-constants',
    'Like export-header but for Java.',
    'directory',
    'package',
    (name, context) => {
      generateExportedConstants(name, context, 'java');
    }
  ),
  backend('vts', 'Test-suite descriptors.', 'directory', 'source', forFileOrPackage(generateVts)),
  backend('makefile', 'Build.mk for the java and java-constants backends.', 'sourceTree', 'package', generateMakefile),
  backend('androidbp', 'Build.bp for the C++ backends.', 'sourceTree', 'package', generateBlueprint),
  backend(
    'androidbp-impl',
    'Build.bp for an implementation written with c++-impl.',
    'directory',
    'package',
    generateBlueprintImpl
  ),
  backend(
    'hash',
    'Prints the hashes of units in ledger format to standard output.',
    'none',
    'source',
    forFileOrPackage(printUnitHash, { enforceHash: false })
  ),
]);

export function isBackendKey(value: string): value is BackendKey {
  return BACKEND_KEYS.some((key) => key === value);
}

/**
 * @throws Error if the table lacks a key; every {@link BackendKey} has an entry.
 */
export function findBackend(key: BackendKey): BackendDescriptor {
  const descriptor = BACKENDS.find((candidate) => candidate.key === key);
  if (descriptor === undefined) {
    throw new Error(`No backend registered for '${key}'`);
  }
  return descriptor;
}
