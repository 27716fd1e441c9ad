/**
 * Skeleton implementation classes a vendor fills in: `<B>.h` and `<B>.cpp`
 * written straight into the output directory.
 *
 * @packageDocumentation
 */

import type { UnitGenerator } from '../backends/dispatch.js';
import type { GenerationContext } from '../backends/output.js';
import type { ParsedUnit } from '../coordinator/index.js';
import { methodGroups } from './common.js';
import {
  RUNTIME,
  cppMethodParams,
  cppReturnType,
  cppType,
  emitGuardEnd,
  emitGuardStart,
  emitPackageInclude,
  enterNamespace,
  includeGuard,
  leaveNamespace,
  usesCallback,
} from './cpp-common.js';
import { emitMethodOverrides } from './cpp-headers.js';

const IMPL_NAMESPACE = ['implementation'];

function generateImplHeader(unit: ParsedUnit, context: GenerationContext): void {
  const name = unit.fqName;
  const base = name.interfaceBaseName();

  context.emit(name, 'direct', `${base}.h`, (out) => {
    const guard = includeGuard(name, `${base}_IMPL`);
    emitGuardStart(out, guard);
    emitPackageInclude(out, context.session.cache, name, name.name);
    out.write('#include <ifgen/runtime.h>\n\n');

    enterNamespace(out, name, IMPL_NAMESPACE);
    out.setNamespace(`${name.cppNamespace()}::`);
    out.write(`struct ${base} : public ${name.name} `);
    out.block(() => {
      emitMethodOverrides(out, context, unit);
    });
    out.write(';\n\n');
    out.setNamespace('');
    leaveNamespace(out, name, IMPL_NAMESPACE);
    emitGuardEnd(out, guard);
  });
}

function generateImplSource(unit: ParsedUnit, context: GenerationContext): void {
  const name = unit.fqName;
  const base = name.interfaceBaseName();

  context.emit(name, 'direct', `${base}.cpp`, (out) => {
    out.write(`#include "${base}.h"\n\n`);
    enterNamespace(out, name, IMPL_NAMESPACE);
    out.setNamespace(`${name.cppNamespace()}::`);

    for (const group of methodGroups(context.session.cache, unit)) {
      out.write(`// Methods from ${group.owner.cppName()} follow.\n`);
      for (const method of group.methods) {
        out.write(
          `${cppReturnType(method)} ${base}::${method.name}(${cppMethodParams(method, group.owner.cppName())}) `
        );
        out.block(() => {
          out.write('// Fill in the implementation.\n');
          const [only] = method.results;
          if (only === undefined || usesCallback(method)) {
            out.write(`return ${RUNTIME}::Void();\n`);
          } else {
            out.write(`return ${cppType(only.type)} {};\n`);
          }
        });
        out.write('\n\n');
      }
    }

    out.setNamespace('');
    leaveNamespace(out, name, IMPL_NAMESPACE);
  });
}

/** `<B>.h`; nothing for a types unit. */
export const generateCppImplHeaders: UnitGenerator = (unit, context) => {
  if (!unit.fqName.isTypes()) {
    generateImplHeader(unit, context);
  }
};

/** `<B>.cpp`; nothing for a types unit. */
export const generateCppImplSources: UnitGenerator = (unit, context) => {
  if (!unit.fqName.isTypes()) {
    generateImplSource(unit, context);
  }
};
