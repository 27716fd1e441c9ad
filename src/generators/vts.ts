/**
 * Protocol-buffer text descriptors (`<Unit>.vts`) consumed by the vendor
 * test suite.
 *
 * @packageDocumentation
 */

import type { UnitGenerator } from '../backends/dispatch.js';
import type {
  Declaration,
  Field,
  NamedTypeRef,
  ParseCache,
  ParsedUnit,
  ResolvedType,
} from '../coordinator/index.js';
import { GenerationError } from '../errors.js';
import type { Emitter } from '../emitter/emitter.js';
import { enumStorageScalar, flattenDeclarations, resolveAliases } from './common.js';

const NAMED_TYPES = {
  enum: 'TYPE_ENUM',
  struct: 'TYPE_STRUCT',
  union: 'TYPE_UNION',
  interface: 'TYPE_IFGEN_INTERFACE',
} as const;

/** `vendor.acme.nfc@1.0::INfc::Status` */
export function vtsTypeName(ref: NamedTypeRef): string {
  return `${ref.unit.packageAndVersion().string()}::${ref.localName.split('.').join('::')}`;
}

function vtsScalarName(cache: ParseCache, storage: ResolvedType): string {
  const scalar = enumStorageScalar(cache, storage);
  if (scalar.kind !== 'scalar') {
    throw new GenerationError('Enum storage is not a scalar', 'INTERNAL');
  }
  return scalar.name;
}

function section(out: Emitter, key: string, body: () => void): void {
  out.write(`${key}: `);
  out.block(body);
  out.endl();
}

function emitType(out: Emitter, cache: ParseCache, type: ResolvedType): void {
  const resolved = resolveAliases(cache, type);
  switch (resolved.kind) {
    case 'scalar':
      switch (resolved.name) {
        case 'string':
          out.write('type: TYPE_STRING\n');
          return;
        case 'handle':
          out.write('type: TYPE_HANDLE\n');
          return;
        case 'memory':
          out.write('type: TYPE_IFGEN_MEMORY\n');
          return;
        case 'pointer':
          out.write('type: TYPE_POINTER\n');
          return;
        case 'bool':
          out.write('type: TYPE_SCALAR\nscalar_type: "bool_t"\n');
          return;
        default:
          out.write(`type: TYPE_SCALAR\nscalar_type: "${resolved.name}"\n`);
          return;
      }
    case 'vec':
      out.write('type: TYPE_VECTOR\n');
      section(out, 'vector_value', () => {
        emitType(out, cache, resolved.element);
      });
      return;
    case 'named':
      if (resolved.declKind === 'typedef') {
        throw new GenerationError(`Unresolved alias ${vtsTypeName(resolved)}`, 'INTERNAL');
      }
      out.write(`type: ${NAMED_TYPES[resolved.declKind]}\n`);
      out.write(`predefined_type: "${vtsTypeName(resolved)}"\n`);
      return;
  }
}

function emitFields(out: Emitter, cache: ParseCache, key: string, fields: readonly Field[]): void {
  for (const field of fields) {
    section(out, key, () => {
      out.write(`name: "${field.name}"\n`);
      emitType(out, cache, field.type);
    });
  }
}

function emitAttribute(out: Emitter, cache: ParseCache, unit: ParsedUnit, declaration: Declaration): void {
  const ref: NamedTypeRef = {
    kind: 'named',
    declKind: declaration.kind,
    unit: unit.fqName,
    localName: declaration.localName,
  };
  switch (declaration.kind) {
    case 'typedef':
      return;
    case 'enum':
      section(out, 'attribute', () => {
        const scalar = vtsScalarName(cache, declaration.storage);
        out.write(`name: "${vtsTypeName(ref)}"\n`);
        out.write('type: TYPE_ENUM\n');
        section(out, 'enum_value', () => {
          out.write(`scalar_type: "${scalar}"\n\n`);
          for (const value of declaration.values) {
            out.write(`enumerator: "${value.name}"\n`);
            section(out, 'scalar_value', () => {
              out.write(`${scalar}: ${value.value.toString()}\n`);
            });
          }
        });
      });
      return;
    case 'struct':
    case 'union':
      section(out, 'attribute', () => {
        out.write(`name: "${vtsTypeName(ref)}"\n`);
        out.write(`type: ${NAMED_TYPES[declaration.kind]}\n`);
        emitFields(out, cache, `${declaration.kind}_value`, declaration.fields);
      });
      return;
  }
}

/**
 * `<Unit>.vts`: the unit's types as attributes, and for an interface one
 * `api` entry per method.
 */
export const generateVts: UnitGenerator = (unit, context) => {
  const { cache } = context.session;
  const name = unit.fqName;

  context.emit(name, 'genOutput', `${name.name}.vts`, (out) => {
    out.write('component_class: HAL_IFGEN\n');
    out.write(`component_type_version: ${name.version()}\n`);
    out.write(`component_name: "${name.name}"\n\n`);
    out.write(`package: "${name.package}"\n\n`);
    for (const imported of unit.importedNames) {
      out.write(`import: "${imported.string()}"\n`);
    }
    if (unit.importedNames.length > 0) {
      out.endl();
    }

    if (unit.interface === undefined) {
      for (const declaration of flattenDeclarations(unit.declarations)) {
        emitAttribute(out, cache, unit, declaration);
      }
      return;
    }

    const iface = unit.interface;
    section(out, 'interface', () => {
      for (const declaration of flattenDeclarations(iface.declarations)) {
        emitAttribute(out, cache, unit, declaration);
      }
      for (const method of iface.methods) {
        section(out, 'api', () => {
          out.write(`name: "${method.name}"\n`);
          for (const result of method.results) {
            section(out, 'return_type_ifgen', () => {
              emitType(out, cache, result.type);
            });
          }
          for (const param of method.params) {
            section(out, 'arg', () => {
              emitType(out, cache, param.type);
            });
          }
          if (method.oneway) {
            out.write('is_oneway: true\n');
          }
        });
      }
    });
  });
};
