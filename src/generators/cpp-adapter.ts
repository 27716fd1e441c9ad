/**
 * Adapter classes that wrap an implementation of an older minor version
 * and forward every call to it, plus the `main.cpp` that serves them.
 *
 * @packageDocumentation
 */

import type { UnitGenerator } from '../backends/dispatch.js';
import type { GenerationContext } from '../backends/output.js';
import type { ParsedUnit } from '../coordinator/index.js';
import type { FQName } from '../fqname/index.js';
import { interfaceMembers, methodGroups } from './common.js';
import {
  RUNTIME,
  cppForwardArgs,
  cppMethodParams,
  cppReturnType,
  emitPackageInclude,
  enterNamespace,
  leaveNamespace,
} from './cpp-common.js';
import { emitHeader, emitMethodOverrides } from './cpp-headers.js';

function generateAdapterHeader(unit: ParsedUnit, context: GenerationContext): void {
  const name = unit.fqName;
  const adapter = name.interfaceAdapterName();

  emitHeader(
    context,
    unit,
    adapter,
    (out) => {
      emitPackageInclude(out, context.session.cache, name, name.name);
      out.write('#include <ifgen/adapter.h>\n');
    },
    (out) => {
      out.write(`struct ${adapter} : public ${name.name} `);
      out.block(() => {
        out.write(`explicit ${adapter}(const ${RUNTIME}::sp<${name.name}>& impl);\n\n`);
        emitMethodOverrides(out, context, unit);
        out.unindent();
        out.write('private:\n');
        out.indent();
        out.write(`const ${RUNTIME}::sp<${name.name}> mImpl;\n`);
      });
      out.write(';\n\n');
    }
  );
}

function generateAdapterSource(unit: ParsedUnit, context: GenerationContext): void {
  const name = unit.fqName;
  const adapter = name.interfaceAdapterName();

  context.emit(name, 'genOutput', `${adapter}.cpp`, (out) => {
    emitPackageInclude(out, context.session.cache, name, adapter);
    out.endl();
    enterNamespace(out, name);
    out.setNamespace(`${name.cppNamespace()}::`);
    out.write(`${adapter}::${adapter}(const ${RUNTIME}::sp<${name.name}>& impl)\n`);
    out.write(`        : mImpl(impl) {}\n\n`);

    for (const group of methodGroups(context.session.cache, unit)) {
      for (const method of group.methods) {
        out.write(
          `${cppReturnType(method)} ${adapter}::${method.name}(${cppMethodParams(method, group.owner.cppName())}) `
        );
        out.block(() => {
          out.write(`return mImpl->${method.name}(${cppForwardArgs(method)});\n`);
        });
        out.write('\n\n');
      }
    }
    out.setNamespace('');
    leaveNamespace(out, name);
  });
}

/** `A<B>.h`; nothing for a types unit. */
export const generateCppAdapterHeaders: UnitGenerator = (unit, context) => {
  if (!unit.fqName.isTypes()) {
    generateAdapterHeader(unit, context);
  }
};

/** `A<B>.cpp`; nothing for a types unit. */
export const generateCppAdapterSources: UnitGenerator = (unit, context) => {
  if (!unit.fqName.isTypes()) {
    generateAdapterSource(unit, context);
  }
};

/**
 * `main.cpp` of the adapter test binary: includes every adapter of the
 * package and hands them to the runtime's adapter entry point.
 */
export function generateAdapterMain(pkg: FQName, context: GenerationContext): void {
  const { cache } = context.session;
  const interfaces = interfaceMembers(cache.listPackageMembers(pkg));

  context.emit(pkg, 'direct', 'main.cpp', (out) => {
    out.write('#include <ifgen/adapter.h>\n');
    for (const iface of interfaces) {
      emitPackageInclude(out, cache, iface, iface.interfaceAdapterName());
    }
    out.endl();
    out.write('int main(int argc, char** argv) ');
    out.block(() => {
      out.write(`return ${RUNTIME}::adapterMain<\n`);
      out.indented(() => {
        out.write(interfaces.map((iface) => iface.interfaceAdapterFqName().cppName()).join(',\n'));
        out.write(`>("${pkg.packageAndVersion().string()}", argc, argv);\n`);
      });
    });
    out.endl();
  });
}
