/**
 * `Build.mk`: make fragments that build the Java library of a package and
 * its exported constants.
 *
 * @packageDocumentation
 */

import type { GenerationContext } from '../backends/output.js';
import type { ParsedUnit } from '../coordinator/index.js';
import type { Emitter } from '../emitter/emitter.js';
import type { FQName } from '../fqname/index.js';
import { SOURCE_EXTENSION } from '../coordinator/index.js';
import { AUTOGENERATED_NOTICE } from './common.js';
import {
  javaLibraryName,
  packageRootOptions,
  sanitizedPackagePath,
  summarizePackage,
  type PackageSummary,
} from './build-common.js';
import { exportedEnums } from './export-header.js';

const SEPARATOR = '#'.repeat(80);

/**
 * Writes the tool invocation of a rule: output directory, backend, root
 * options and the name, one per continued line.
 */
function emitToolCommand(out: Emitter, backend: string, rootOptions: readonly string[], target: string): void {
  out.indented(() => {
    out.write('\n$(PRIVATE_IFGEN) -o $(PRIVATE_OUTPUT_DIR) \\');
    out.write(`\n-L${backend} \\\n`);
    for (const option of rootOptions) {
      out.write(`-r${option} \\\n`);
    }
    out.write(`${target}\n`);
  }, 2);
}

function emitTypeSection(
  out: Emitter,
  context: GenerationContext,
  summary: PackageSummary,
  unit: ParsedUnit,
  typeName: string | undefined
): void {
  const unitName = unit.fqName.name;
  const source = `${unitName}${SOURCE_EXTENSION}`;
  const output = typeName ?? unitName;

  out.write(`\n\n#\n# Build ${source}`);
  if (typeName !== undefined) {
    out.write(` (${typeName})`);
  }
  out.write(`\n#\nGEN := $(intermediates)/${sanitizedPackagePath(context, summary.pkg)}${output}.java`);
  out.write('\n$(GEN): $(IFGEN)');
  out.write('\n$(GEN): PRIVATE_IFGEN := $(IFGEN)');
  out.write(`\n$(GEN): PRIVATE_DEPS := $(LOCAL_PATH)/${source}`);
  for (const imported of unit.importedNames) {
    if (imported.samePackage(summary.pkg)) {
      out.write(`\n$(GEN): PRIVATE_DEPS += $(LOCAL_PATH)/${imported.name}${SOURCE_EXTENSION}`);
      out.write(`\n$(GEN): $(LOCAL_PATH)/${imported.name}${SOURCE_EXTENSION}`);
    }
  }
  out.write('\n$(GEN): PRIVATE_OUTPUT_DIR := $(intermediates)');
  out.write('\n$(GEN): PRIVATE_CUSTOM_TOOL = \\');

  const target = `${summary.pkg.string()}::${unitName}${typeName === undefined ? '' : `.${typeName}`}`;
  emitToolCommand(out, 'java', packageRootOptions(context, summary.pkg, summary.dependencies), target);

  out.write(`\n$(GEN): $(LOCAL_PATH)/${source}`);
  out.write('\n\t$(transform-generated-source)');
  out.write('\nLOCAL_GENERATED_SOURCES += $(GEN)');
}

function emitJavaLibrary(out: Emitter, context: GenerationContext, summary: PackageSummary): void {
  const toolId = context.session.toolId;
  out.write(`\n${SEPARATOR}\n\n`);
  out.write('include $(CLEAR_VARS)\n');
  out.write(`LOCAL_MODULE := ${javaLibraryName(summary.pkg)}-java`);
  out.write('\nLOCAL_MODULE_CLASS := JAVA_LIBRARIES\n\n');
  out.write('intermediates := $(call local-generated-sources-dir, COMMON)\n\n');
  out.write(`IFGEN := $(HOST_OUT_EXECUTABLES)/${toolId}$(HOST_EXECUTABLE_SUFFIX)`);

  if (summary.dependencies.length > 0) {
    out.write('\n\nLOCAL_JAVA_LIBRARIES := \\');
    out.indented(() => {
      for (const dependency of summary.dependencies) {
        out.write(`\n${javaLibraryName(dependency)}-java \\`);
      }
      out.write('\n');
    });
  }
  out.write('\nLOCAL_NO_STANDARD_LIBRARIES := true');
  out.write('\nLOCAL_JAVA_LIBRARIES += core-oj ifbinder');

  for (const unit of summary.units) {
    if (!unit.fqName.isTypes()) {
      emitTypeSection(out, context, summary, unit, undefined);
      continue;
    }
    const declarations = unit.declarations
      .filter((declaration) => declaration.kind !== 'typedef')
      .map((declaration) => declaration.name)
      .sort();
    for (const typeName of declarations) {
      emitTypeSection(out, context, summary, unit, typeName);
    }
  }

  out.write('\ninclude $(BUILD_JAVA_LIBRARY)\n\n');
}

function emitConstantsLibrary(out: Emitter, context: GenerationContext, summary: PackageSummary): void {
  const toolId = context.session.toolId;
  out.write(`\n${SEPARATOR}\n\n`);
  out.write('include $(CLEAR_VARS)\n');
  out.write(`LOCAL_MODULE := ${javaLibraryName(summary.pkg)}-java-constants`);
  out.write('\nLOCAL_MODULE_CLASS := JAVA_LIBRARIES\n\n');
  out.write('intermediates := $(call local-generated-sources-dir, COMMON)\n\n');
  out.write(`IFGEN := $(HOST_OUT_EXECUTABLES)/${toolId}$(HOST_EXECUTABLE_SUFFIX)`);

  out.write(`\n#\nGEN := $(intermediates)/${sanitizedPackagePath(context, summary.pkg)}Constants.java`);
  out.write('\n$(GEN): $(IFGEN)\n');
  for (const member of summary.members) {
    out.write(`$(GEN): $(LOCAL_PATH)/${member.name}${SOURCE_EXTENSION}\n`);
  }
  out.write('\n$(GEN): PRIVATE_IFGEN := $(IFGEN)');
  out.write('\n$(GEN): PRIVATE_OUTPUT_DIR := $(intermediates)');
  out.write('\n$(GEN): PRIVATE_CUSTOM_TOOL = \\');
  emitToolCommand(
    out,
    'java-constants',
    packageRootOptions(context, summary.pkg, summary.dependencies),
    summary.pkg.string()
  );
  out.write('\n$(GEN):');
  out.write('\n\t$(transform-generated-source)');
  out.write('\nLOCAL_GENERATED_SOURCES += $(GEN)');

  out.write('\n# Avoid dependency cycle of framework.jar -> this-library -> framework.jar\n');
  out.write('LOCAL_NO_STANDARD_LIBRARIES := true\n');
  out.write('LOCAL_JAVA_LIBRARIES := core-oj\n\n');
  out.write('include $(BUILD_STATIC_JAVA_LIBRARY)\n\n');
}

/**
 * Writes `Build.mk` into the package's source directory.
 *
 * A package that is neither Java compatible nor exports constants is skipped
 * with a warning; a package of nothing but typedefs is skipped silently.
 */
export function generateMakefile(pkg: FQName, context: GenerationContext): void {
  const { analyzer, logger, cache } = context.session;
  const summary = summarizePackage(context, pkg);
  const javaCompatible = analyzer.isPackageLanguageCompatible(summary.pkg);
  const haveConstants = exportedEnums(cache, summary.pkg).length > 0;

  if (!javaCompatible && !haveConstants) {
    logger.warn('makefile_skipped', {
      package: summary.pkg.string(),
      reason: 'not Java compatible and no exported constants',
    });
    return;
  }
  if (!analyzer.packageNeedsGeneratedCode(summary.members, summary.typesUnit)) {
    return;
  }

  context.emit(summary.pkg, 'packageRoot', 'Build.mk', (out) => {
    out.write(`# ${AUTOGENERATED_NOTICE}\n\n`);
    out.write('LOCAL_PATH := $(call my-dir)\n');
    if (javaCompatible) {
      emitJavaLibrary(out, context, summary);
    }
    if (haveConstants) {
      emitConstantsLibrary(out, context, summary);
    }
    out.write('\n\ninclude $(call all-makefiles-under,$(LOCAL_PATH))\n');
  });
}
