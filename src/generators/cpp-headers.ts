/**
 * C++ headers: the type and interface declarations plus the transport
 * stub, proxy and passthrough classes.
 *
 * @packageDocumentation
 */

import type { UnitGenerator } from '../backends/dispatch.js';
import type { GenerationContext } from '../backends/output.js';
import type { ParsedUnit } from '../coordinator/index.js';
import type { Emitter } from '../emitter/emitter.js';
import { interfaceOf, methodGroups } from './common.js';
import {
  RUNTIME,
  compoundsOf,
  cppMethodParams,
  cppReturnType,
  emitCallbackTypedef,
  emitEmbeddedDeclarations,
  emitGuardEnd,
  emitGuardStart,
  emitPackageInclude,
  emitTypeDeclarations,
  enterNamespace,
  includeGuard,
  leaveNamespace,
  usesCallback,
} from './cpp-common.js';

/**
 * Writes a header for a unit: include guard, namespace and own-namespace
 * elision around `body`.
 */
export function emitHeader(
  context: GenerationContext,
  unit: ParsedUnit,
  stem: string,
  includes: (out: Emitter) => void,
  body: (out: Emitter) => void
): void {
  const name = unit.fqName;
  context.emit(name, 'genOutput', `${stem}.h`, (out) => {
    const guard = includeGuard(name, stem);
    emitGuardStart(out, guard);
    includes(out);
    out.endl();
    enterNamespace(out, name);
    out.setNamespace(`${name.cppNamespace()}::`);
    body(out);
    out.setNamespace('');
    leaveNamespace(out, name);
    emitGuardEnd(out, guard);
  });
}

/** Name of the transaction-code enum of an interface: `NfcTransaction`. */
export function transactionEnumName(unit: ParsedUnit): string {
  return `${unit.fqName.interfaceBaseName()}Transaction`;
}

function emitImportIncludes(context: GenerationContext, unit: ParsedUnit, out: Emitter): void {
  out.write(`#include <ifgen/runtime.h>\n`);
  for (const imported of unit.importedNames) {
    emitPackageInclude(out, context.session.cache, imported, imported.name);
  }
}

function generateTypesHeaders(unit: ParsedUnit, context: GenerationContext): void {
  const { cache } = context.session;
  emitHeader(
    context,
    unit,
    unit.fqName.name,
    (out) => {
      emitImportIncludes(context, unit, out);
    },
    (out) => {
      emitTypeDeclarations(out, cache, unit.declarations);
    }
  );

  emitHeader(
    context,
    unit,
    'hwtypes',
    (out) => {
      emitPackageInclude(out, cache, unit.fqName, unit.fqName.name);
      out.write('#include <ifgen/transport.h>\n');
    },
    (out) => {
      emitEmbeddedDeclarations(out, compoundsOf(unit.declarations));
    }
  );
}

function generateInterfaceHeader(unit: ParsedUnit, context: GenerationContext): void {
  const { cache } = context.session;
  const iface = interfaceOf(unit);
  const name = unit.fqName;
  const parent =
    iface.base === undefined ? `${RUNTIME}::IBase` : iface.base.unit.cppName();

  emitHeader(
    context,
    unit,
    name.name,
    (out) => {
      emitImportIncludes(context, unit, out);
    },
    (out) => {
      out.write(`struct ${name.name} : public ${parent} `);
      out.block(() => {
        out.write('static const char* descriptor;\n\n');
        emitTypeDeclarations(out, cache, iface.declarations);

        for (const method of iface.methods) {
          if (usesCallback(method)) {
            emitCallbackTypedef(out, method);
          }
          out.write(
            `virtual ${cppReturnType(method)} ${method.name}(${cppMethodParams(method)}) = 0;\n\n`
          );
        }

        out.write(
          `static ${RUNTIME}::Return<${RUNTIME}::sp<${name.name}>> castFrom(const ${RUNTIME}::sp<${RUNTIME}::IBase>& parent);\n`
        );
        out.write(
          `static ${RUNTIME}::sp<${name.name}> getService(const std::string& serviceName = "default");\n`
        );
        out.write(
          `${RUNTIME}::status_t registerAsService(const std::string& serviceName = "default");\n`
        );
      });
      out.write(';\n\n');
    }
  );
}

function generateHwHeader(unit: ParsedUnit, context: GenerationContext): void {
  const { cache } = context.session;
  const name = unit.fqName;
  const iface = interfaceOf(unit);
  const methods = methodGroups(cache, unit).flatMap((group) => group.methods);

  emitHeader(
    context,
    unit,
    name.interfaceHwName(),
    (out) => {
      emitPackageInclude(out, cache, name, name.name);
      out.write('#include <ifgen/transport.h>\n');
    },
    (out) => {
      out.write(`enum class ${transactionEnumName(unit)} : uint32_t `);
      out.block(() => {
        methods.forEach((method, index) => {
          out.write(`${method.name} = ${RUNTIME}::FIRST_CALL_TRANSACTION + ${String(index)},\n`);
        });
      });
      out.write(';\n\n');
      emitEmbeddedDeclarations(out, compoundsOf(iface.declarations));
    }
  );
}

function emitPrivateMember(out: Emitter, member: string): void {
  out.endl();
  out.unindent();
  out.write('private:\n');
  out.indent();
  out.write(`${member};\n`);
}

function generateStubHeader(unit: ParsedUnit, context: GenerationContext): void {
  const name = unit.fqName;
  const stub = name.interfaceStubName();

  emitHeader(
    context,
    unit,
    stub,
    (out) => {
      emitPackageInclude(out, context.session.cache, name, name.interfaceHwName());
    },
    (out) => {
      out.write(`struct ${stub} : public ${RUNTIME}::BnHwBase `);
      out.block(() => {
        out.write(`explicit ${stub}(const ${RUNTIME}::sp<${name.name}>& impl);\n`);
        out.write(`virtual ~${stub}();\n\n`);
        out.write(
          `${RUNTIME}::status_t onTransact(uint32_t code, const ${RUNTIME}::Parcel& _ifgen_data, ${RUNTIME}::Parcel* _ifgen_reply, uint32_t flags) override;\n\n`
        );
        out.write(`${RUNTIME}::sp<${name.name}> getImpl() { return mImpl; }\n`);
        emitPrivateMember(out, `${RUNTIME}::sp<${name.name}> mImpl`);
      });
      out.write(';\n\n');
    }
  );
}

/**
 * Declares every method of the interface and its ancestors as overrides,
 * one group per declaring interface.
 */
export function emitMethodOverrides(
  out: Emitter,
  context: GenerationContext,
  unit: ParsedUnit
): void {
  for (const group of methodGroups(context.session.cache, unit)) {
    out.write(`// Methods from ${group.owner.cppName()} follow.\n`);
    for (const method of group.methods) {
      out.write(
        `${cppReturnType(method)} ${method.name}(${cppMethodParams(method, group.owner.cppName())}) override;\n`
      );
    }
    out.endl();
  }
}

function generateProxyHeader(unit: ParsedUnit, context: GenerationContext): void {
  const name = unit.fqName;
  const proxy = name.interfaceProxyName();

  emitHeader(
    context,
    unit,
    proxy,
    (out) => {
      emitPackageInclude(out, context.session.cache, name, name.interfaceHwName());
    },
    (out) => {
      out.write(`struct ${proxy} : public ${RUNTIME}::BpInterface<${name.name}> `);
      out.block(() => {
        out.write(`explicit ${proxy}(const ${RUNTIME}::sp<${RUNTIME}::IBinder>& remote);\n\n`);
        emitMethodOverrides(out, context, unit);
      });
      out.write(';\n\n');
    }
  );
}

function generatePassthroughHeader(unit: ParsedUnit, context: GenerationContext): void {
  const name = unit.fqName;
  const passthrough = name.interfacePassthroughName();

  emitHeader(
    context,
    unit,
    passthrough,
    (out) => {
      emitPackageInclude(out, context.session.cache, name, name.name);
    },
    (out) => {
      out.write(`struct ${passthrough} : ${name.name} `);
      out.block(() => {
        out.write(`explicit ${passthrough}(const ${RUNTIME}::sp<${name.name}>& impl);\n\n`);
        emitMethodOverrides(out, context, unit);
        emitPrivateMember(out, `const ${RUNTIME}::sp<${name.name}> mImpl`);
      });
      out.write(';\n\n');
    }
  );
}

/**
 * `types.h` and `hwtypes.h` for a types unit; `I<B>.h`, `IHw<B>.h`,
 * `BnHw<B>.h`, `BpHw<B>.h` and `Bs<B>.h` for an interface.
 */
export const generateCppHeaders: UnitGenerator = (unit, context) => {
  if (unit.fqName.isTypes()) {
    generateTypesHeaders(unit, context);
    return;
  }
  generateInterfaceHeader(unit, context);
  generateHwHeader(unit, context);
  generateStubHeader(unit, context);
  generateProxyHeader(unit, context);
  generatePassthroughHeader(unit, context);
};
