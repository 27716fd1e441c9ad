/**
 * C++ naming and declaration helpers shared by the C++ generators.
 *
 * @packageDocumentation
 */

import type { ParseCache } from '../coordinator/index.js';
import type {
  CompoundDeclaration,
  Declaration,
  Field,
  Method,
  NamedTypeRef,
  ResolvedType,
} from '../coordinator/types.js';
import type { Emitter } from '../emitter/emitter.js';
import type { FQName } from '../fqname/index.js';
import type { ScalarName } from '../parser/index.js';
import { enumStorageScalar, flattenDeclarations, generatedPath, resolveAliases } from './common.js';

/** Namespace of the C++ runtime library. */
export const RUNTIME = '::ifgen';

const CPP_SCALARS: Readonly<Record<ScalarName, string>> = {
  bool: 'bool',
  int8_t: 'int8_t',
  int16_t: 'int16_t',
  int32_t: 'int32_t',
  int64_t: 'int64_t',
  uint8_t: 'uint8_t',
  uint16_t: 'uint16_t',
  uint32_t: 'uint32_t',
  uint64_t: 'uint64_t',
  float: 'float',
  double: 'double',
  string: `${RUNTIME}::string`,
  handle: `${RUNTIME}::handle`,
  memory: `${RUNTIME}::memory`,
  pointer: `${RUNTIME}::pointer`,
};

/** Scalars passed by const reference. */
const BY_REFERENCE: ReadonlySet<ScalarName> = new Set(['string', 'handle', 'memory']);

/** `::vendor::acme::nfc::V1_0::INfc::Info` */
export function cppScopedName(ref: NamedTypeRef): string {
  return `${ref.unit.cppNamespace()}::${ref.localName.split('.').join('::')}`;
}

export function cppType(type: ResolvedType): string {
  switch (type.kind) {
    case 'scalar':
      return CPP_SCALARS[type.name];
    case 'vec':
      return `${RUNTIME}::vec<${cppType(type.element)}>`;
    case 'named':
      return type.declKind === 'interface'
        ? `${RUNTIME}::sp<${cppScopedName(type)}>`
        : cppScopedName(type);
  }
}

/** Parameter type: small values by value, everything else by const reference. */
export function cppArgType(type: ResolvedType): string {
  const byValue =
    (type.kind === 'scalar' && !BY_REFERENCE.has(type.name)) ||
    (type.kind === 'named' && type.declKind === 'enum');
  return byValue ? cppType(type) : `const ${cppType(type)}&`;
}

export function cppParams(fields: readonly Field[]): string {
  return fields.map((field) => `${cppArgType(field.type)} ${field.name}`).join(', ');
}

/** Name of the result callback of a method with several results. */
export function callbackName(method: Method): string {
  return `${method.name}_cb`;
}

export function usesCallback(method: Method): boolean {
  return method.results.length > 1;
}

export function cppReturnType(method: Method): string {
  const [only] = method.results;
  return only === undefined || usesCallback(method)
    ? `${RUNTIME}::Return<void>`
    : `${RUNTIME}::Return<${cppType(only.type)}>`;
}

/** Parameter list including the result callback, if any. */
export function cppMethodParams(method: Method, owner?: string): string {
  const params = method.params.map((field) => `${cppArgType(field.type)} ${field.name}`);
  if (usesCallback(method)) {
    const prefix = owner === undefined ? '' : `${owner}::`;
    params.push(`${prefix}${callbackName(method)} _ifgen_cb`);
  }
  return params.join(', ');
}

/** Argument list forwarding every parameter, and the callback if any. */
export function cppForwardArgs(method: Method): string {
  const args = method.params.map((field) => field.name);
  if (usesCallback(method)) {
    args.push('_ifgen_cb');
  }
  return args.join(', ');
}

export function emitCallbackTypedef(out: Emitter, method: Method): void {
  out.write(
    `using ${callbackName(method)} = std::function<void(${cppParams(method.results)})>;\n`
  );
}

/** `IFGEN_GENERATED_VENDOR_ACME_NFC_V1_0_INFC_H` */
export function includeGuard(name: FQName, stem: string): string {
  return `IFGEN_GENERATED_${name.tokenName().toUpperCase()}_${stem.toUpperCase()}_H`;
}

export function emitGuardStart(out: Emitter, guard: string): void {
  out.write(`#ifndef ${guard}\n#define ${guard}\n\n`);
}

export function emitGuardEnd(out: Emitter, guard: string): void {
  out.write(`#endif  // ${guard}\n`);
}

/** `#include <vendor/acme/nfc/1.0/INfc.h>` */
export function emitPackageInclude(
  out: Emitter,
  cache: ParseCache,
  name: FQName,
  stem: string
): void {
  out.write(`#include <${generatedPath(cache, name, stem + '.h')}>\n`);
}

/** Opens `namespace vendor { namespace acme { ... namespace V1_0 {`, one per line. */
export function enterNamespace(out: Emitter, name: FQName, extra: readonly string[] = []): void {
  for (const component of [...name.packageComponents(), name.sanitizedVersion(), ...extra]) {
    out.write(`namespace ${component} {\n`);
  }
  out.endl();
}

export function leaveNamespace(out: Emitter, name: FQName, extra: readonly string[] = []): void {
  const components = [...name.packageComponents(), name.sanitizedVersion(), ...extra].reverse();
  for (const component of components) {
    out.write(`}  // namespace ${component}\n`);
  }
  out.endl();
}

/**
 * Emits C++ definitions for declarations, separated by blank lines.
 */
export function emitTypeDeclarations(
  out: Emitter,
  cache: ParseCache,
  declarations: readonly Declaration[]
): void {
  for (const declaration of declarations) {
    emitTypeDeclaration(out, cache, declaration);
    out.endl();
  }
}

function emitTypeDeclaration(out: Emitter, cache: ParseCache, declaration: Declaration): void {
  switch (declaration.kind) {
    case 'enum': {
      const storage = cppType(enumStorageScalar(cache, declaration.storage));
      out.write(`enum class ${declaration.name} : ${storage} `);
      out.block(() => {
        for (const value of declaration.values) {
          out.write(`${value.name} = ${value.value.toString()},\n`);
        }
      });
      out.write(';\n');
      return;
    }
    case 'typedef':
      out.write(`typedef ${cppType(declaration.target)} ${declaration.name};\n`);
      return;
    case 'struct':
    case 'union':
      out.write(`${declaration.kind} ${declaration.name} final `);
      out.block(() => {
        emitTypeDeclarations(out, cache, declaration.nested);
        for (const field of declaration.fields) {
          out.write(`${cppType(field.type)} ${field.name};\n`);
        }
      });
      out.write(';\n');
      return;
  }
}

/** Structs and unions among the declarations, nested ones included. */
export function compoundsOf(declarations: readonly Declaration[]): CompoundDeclaration[] {
  return flattenDeclarations(declarations).filter(
    (declaration): declaration is CompoundDeclaration =>
      declaration.kind === 'struct' || declaration.kind === 'union'
  );
}

/** True for field types that own out-of-line buffers in a parcel. */
function needsEmbedded(cache: ParseCache, type: ResolvedType): boolean {
  const resolved = resolveAliases(cache, type);
  switch (resolved.kind) {
    case 'scalar':
      return BY_REFERENCE.has(resolved.name);
    case 'vec':
      return true;
    case 'named':
      return resolved.declKind === 'struct' || resolved.declKind === 'union';
  }
}

/** `Info::Detail`, relative to the namespace of the declaring unit. */
function localCppName(compound: CompoundDeclaration): string {
  return compound.localName.split('.').join('::');
}

const READ_SIGNATURE = (type: string): string =>
  `${RUNTIME}::status_t readEmbeddedFromParcel(const ${type}& obj, const ${RUNTIME}::Parcel& parcel, size_t parentHandle, size_t parentOffset)`;

const WRITE_SIGNATURE = (type: string): string =>
  `${RUNTIME}::status_t writeEmbeddedToParcel(const ${type}& obj, ${RUNTIME}::Parcel* parcel, size_t parentHandle, size_t parentOffset)`;

/**
 * Declares the parcel helpers of every struct and union.
 */
export function emitEmbeddedDeclarations(
  out: Emitter,
  compounds: readonly CompoundDeclaration[]
): void {
  for (const compound of compounds) {
    const type = localCppName(compound);
    out.write(`${READ_SIGNATURE(type)};\n`);
    out.write(`${WRITE_SIGNATURE(type)};\n\n`);
  }
}

/**
 * Defines the parcel helpers of every struct and union: each field that owns
 * a buffer is read or written at its offset in the parent.
 */
export function emitEmbeddedDefinitions(
  out: Emitter,
  cache: ParseCache,
  compounds: readonly CompoundDeclaration[]
): void {
  for (const compound of compounds) {
    const type = localCppName(compound);
    const fields = compound.fields.filter((field) => needsEmbedded(cache, field.type));
    for (const [signature, call] of [
      [READ_SIGNATURE(type), 'readEmbeddedFromParcel'],
      [WRITE_SIGNATURE(type), 'writeEmbeddedToParcel'],
    ] as const) {
      out.write(`${signature} `);
      out.block(() => {
        out.write(`${RUNTIME}::status_t _ifgen_err = ${RUNTIME}::OK;\n`);
        for (const field of fields) {
          out.write(
            `_ifgen_err = ${call}(obj.${field.name}, parcel, parentHandle, parentOffset + offsetof(${type}, ${field.name}));\n`
          );
          out.write(`if (_ifgen_err != ${RUNTIME}::OK) { return _ifgen_err; }\n`);
        }
        out.write('return _ifgen_err;\n');
      });
      out.write('\n\n');
    }
  }
}
