/**
 * C++ sources: parcel helpers of `types`, and the proxy, stub and
 * passthrough bodies of an interface in one `<B>All.cpp`.
 *
 * @packageDocumentation
 */

import type { UnitGenerator } from '../backends/dispatch.js';
import type { GenerationContext } from '../backends/output.js';
import type { Method, ParsedUnit } from '../coordinator/index.js';
import type { Emitter } from '../emitter/emitter.js';
import { interfaceOf, methodGroups } from './common.js';
import {
  RUNTIME,
  compoundsOf,
  cppForwardArgs,
  cppMethodParams,
  cppParams,
  cppReturnType,
  cppType,
  emitEmbeddedDefinitions,
  emitPackageInclude,
  enterNamespace,
  leaveNamespace,
  usesCallback,
} from './cpp-common.js';
import { transactionEnumName } from './cpp-headers.js';

/**
 * Writes a source file for a unit with a `LOG_TAG`, its includes, and
 * own-namespace elision around `body`.
 */
function emitSource(
  context: GenerationContext,
  unit: ParsedUnit,
  fileName: string,
  tag: string,
  includes: readonly string[],
  body: (out: Emitter) => void
): void {
  const name = unit.fqName;
  const { cache } = context.session;
  context.emit(name, 'genOutput', fileName, (out) => {
    out.write(`#define LOG_TAG "${name.packageAndVersion().string()}::${tag}"\n\n`);
    for (const stem of includes) {
      emitPackageInclude(out, cache, name, stem);
    }
    out.endl();
    enterNamespace(out, name);
    out.setNamespace(`${name.cppNamespace()}::`);
    body(out);
    out.setNamespace('');
    leaveNamespace(out, name);
  });
}

function transactionCode(unit: ParsedUnit, method: Method): string {
  return `static_cast<uint32_t>(${transactionEnumName(unit)}::${method.name})`;
}

function emitProxyMethod(out: Emitter, unit: ParsedUnit, owner: string, method: Method): void {
  const proxy = unit.fqName.interfaceProxyName();
  const flags = method.oneway ? `${RUNTIME}::FLAG_ONEWAY` : '0';
  out.write(`${cppReturnType(method)} ${proxy}::${method.name}(${cppMethodParams(method, owner)}) `);
  out.block(() => {
    out.write(`${RUNTIME}::Parcel _ifgen_data;\n`);
    out.write(`${RUNTIME}::Parcel _ifgen_reply;\n`);
    out.write(`_ifgen_data.writeInterfaceToken(${unit.fqName.name}::descriptor);\n`);
    for (const param of method.params) {
      out.write(`_ifgen_data.write(${param.name});\n`);
    }
    out.write(
      `${RUNTIME}::status_t _ifgen_err = remote()->transact(${transactionCode(unit, method)}, _ifgen_data, &_ifgen_reply, ${flags});\n`
    );
    out.write(`if (_ifgen_err != ${RUNTIME}::OK) `);
    out.block(() => {
      out.write(`return ${RUNTIME}::Status::fromStatusT(_ifgen_err);\n`);
    });
    out.endl();

    for (const result of method.results) {
      out.write(`${cppType(result.type)} ${result.name};\n`);
      out.write(`_ifgen_reply.read(&${result.name});\n`);
    }
    const [only] = method.results;
    if (usesCallback(method)) {
      out.write(`_ifgen_cb(${method.results.map((result) => result.name).join(', ')});\n`);
      out.write(`return ${RUNTIME}::Void();\n`);
    } else if (only !== undefined) {
      out.write(`return ${only.name};\n`);
    } else {
      out.write(`return ${RUNTIME}::Void();\n`);
    }
  });
  out.write('\n\n');
}

function emitStubCase(out: Emitter, unit: ParsedUnit, method: Method): void {
  out.write(`case ${transactionCode(unit, method)}: `);
  out.block(() => {
    for (const param of method.params) {
      out.write(`${cppType(param.type)} ${param.name};\n`);
      out.write(`_ifgen_data.read(&${param.name});\n`);
    }
    const args = method.params.map((param) => param.name);
    const [only] = method.results;
    if (usesCallback(method)) {
      args.push(`[&](${cppParams(method.results)}) `);
      out.write(`mImpl->${method.name}(${args.join(', ')}`);
      out.block(() => {
        for (const result of method.results) {
          out.write(`_ifgen_reply->write(${result.name});\n`);
        }
      });
      out.write(');\n');
    } else if (only !== undefined) {
      out.write(`${cppType(only.type)} ${only.name} = mImpl->${method.name}(${args.join(', ')});\n`);
      out.write(`_ifgen_reply->write(${only.name});\n`);
    } else {
      out.write(`mImpl->${method.name}(${args.join(', ')});\n`);
    }
    out.write(`return ${RUNTIME}::OK;\n`);
  });
  out.write('\n\n');
}

function generateTypesSource(unit: ParsedUnit, context: GenerationContext): void {
  emitSource(context, unit, 'types.cpp', 'types', ['hwtypes'], (out) => {
    emitEmbeddedDefinitions(out, context.session.cache, compoundsOf(unit.declarations));
  });
}

function generateInterfaceSource(unit: ParsedUnit, context: GenerationContext): void {
  const { cache } = context.session;
  const name = unit.fqName;
  const iface = interfaceOf(unit);
  const groups = methodGroups(cache, unit);
  const proxy = name.interfaceProxyName();
  const stub = name.interfaceStubName();
  const passthrough = name.interfacePassthroughName();
  const base = name.interfaceBaseName();

  emitSource(
    context,
    unit,
    `${base}All.cpp`,
    base,
    [proxy, stub, passthrough],
    (out) => {
      out.write(`const char* ${name.name}::descriptor("${name.string()}");\n\n`);

      out.write(
        `${RUNTIME}::Return<${RUNTIME}::sp<${name.name}>> ${name.name}::castFrom(const ${RUNTIME}::sp<${RUNTIME}::IBase>& parent) `
      );
      out.block(() => {
        out.write(`return ${RUNTIME}::castInterface<${name.name}>(parent, ${name.name}::descriptor);\n`);
      });
      out.write('\n\n');
      out.write(`${RUNTIME}::sp<${name.name}> ${name.name}::getService(const std::string& serviceName) `);
      out.block(() => {
        out.write(`return ${RUNTIME}::getService<${name.name}, ${proxy}>(serviceName);\n`);
      });
      out.write('\n\n');
      out.write(`${RUNTIME}::status_t ${name.name}::registerAsService(const std::string& serviceName) `);
      out.block(() => {
        out.write(`return ${RUNTIME}::registerAsService(this, serviceName);\n`);
      });
      out.write('\n\n');

      emitEmbeddedDefinitions(out, cache, compoundsOf(iface.declarations));

      out.write(`${proxy}::${proxy}(const ${RUNTIME}::sp<${RUNTIME}::IBinder>& remote)\n`);
      out.write(`        : ${RUNTIME}::BpInterface<${name.name}>(remote) {}\n\n`);
      for (const group of groups) {
        for (const method of group.methods) {
          emitProxyMethod(out, unit, group.owner.cppName(), method);
        }
      }

      out.write(`${stub}::${stub}(const ${RUNTIME}::sp<${name.name}>& impl)\n`);
      out.write(`        : mImpl(impl) {}\n\n`);
      out.write(`${stub}::~${stub}() {}\n\n`);
      out.write(
        `${RUNTIME}::status_t ${stub}::onTransact(uint32_t code, const ${RUNTIME}::Parcel& _ifgen_data, ${RUNTIME}::Parcel* _ifgen_reply, uint32_t flags) `
      );
      out.block(() => {
        out.write('switch (code) ');
        out.block(() => {
          for (const group of groups) {
            for (const method of group.methods) {
              emitStubCase(out, unit, method);
            }
          }
          out.write('default:\n');
          out.indented(() => {
            out.write(
              `return ${RUNTIME}::BnHwBase::onTransact(code, _ifgen_data, _ifgen_reply, flags);\n`
            );
          });
        });
        out.endl();
      });
      out.write('\n\n');

      out.write(`${passthrough}::${passthrough}(const ${RUNTIME}::sp<${name.name}>& impl)\n`);
      out.write(`        : mImpl(impl) {}\n\n`);
      for (const group of groups) {
        for (const method of group.methods) {
          out.write(
            `${cppReturnType(method)} ${passthrough}::${method.name}(${cppMethodParams(method, group.owner.cppName())}) `
          );
          out.block(() => {
            out.write(`return mImpl->${method.name}(${cppForwardArgs(method)});\n`);
          });
          out.write('\n\n');
        }
      }
    }
  );
}

/** `types.cpp` for a types unit, `<B>All.cpp` for an interface. */
export const generateCppSources: UnitGenerator = (unit, context) => {
  if (unit.fqName.isTypes()) {
    generateTypesSource(unit, context);
    return;
  }
  generateInterfaceSource(unit, context);
};
