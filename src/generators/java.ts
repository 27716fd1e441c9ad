/**
 * Java bindings: one class per interface, and one class per top-level
 * declaration of `types`.
 *
 * @packageDocumentation
 */

import type { UnitGenerator } from '../backends/dispatch.js';
import type { GenerationContext } from '../backends/output.js';
import type {
  Declaration,
  EnumDeclaration,
  Method,
  NamedTypeRef,
  ParseCache,
  ParsedUnit,
  ResolvedType,
} from '../coordinator/index.js';
import { GenerationError, ParseError } from '../errors.js';
import type { Emitter } from '../emitter/emitter.js';
import type { FQName } from '../fqname/index.js';
import type { ScalarName } from '../parser/index.js';
import { enumStorageScalar, interfaceOf, resolveAliases } from './common.js';

type JavaScalar = Exclude<ScalarName, 'handle' | 'memory' | 'pointer'>;

const JAVA_SCALARS: Readonly<Record<JavaScalar, { type: string; boxed: string; bits?: number }>> = {
  bool: { type: 'boolean', boxed: 'Boolean' },
  int8_t: { type: 'byte', boxed: 'Byte', bits: 8 },
  uint8_t: { type: 'byte', boxed: 'Byte', bits: 8 },
  int16_t: { type: 'short', boxed: 'Short', bits: 16 },
  uint16_t: { type: 'short', boxed: 'Short', bits: 16 },
  int32_t: { type: 'int', boxed: 'Integer', bits: 32 },
  uint32_t: { type: 'int', boxed: 'Integer', bits: 32 },
  int64_t: { type: 'long', boxed: 'Long', bits: 64 },
  uint64_t: { type: 'long', boxed: 'Long', bits: 64 },
  float: { type: 'float', boxed: 'Float' },
  double: { type: 'double', boxed: 'Double' },
  string: { type: 'String', boxed: 'String' },
};

/** Package of the Java runtime classes. */
export const JAVA_RUNTIME = 'ifgen.os';

function javaScalar(name: ScalarName): (typeof JAVA_SCALARS)[JavaScalar] {
  if (name === 'handle' || name === 'memory' || name === 'pointer') {
    throw new GenerationError(`'${name}' has no Java representation`, 'NOT_JAVA_COMPATIBLE');
  }
  return JAVA_SCALARS[name];
}

/** `vendor.acme.nfc.V1_0.INfc.Info` */
export function javaScopedName(ref: NamedTypeRef): string {
  return `${ref.unit.javaPackage()}.${ref.localName}`;
}

function javaTypeOf(cache: ParseCache, type: ResolvedType, boxed: boolean): string {
  const resolved = resolveAliases(cache, type);
  switch (resolved.kind) {
    case 'scalar': {
      const scalar = javaScalar(resolved.name);
      return boxed ? scalar.boxed : scalar.type;
    }
    case 'vec':
      return `java.util.ArrayList<${javaTypeOf(cache, resolved.element, true)}>`;
    case 'named':
      if (resolved.declKind === 'enum') {
        return javaTypeOf(cache, enumStorageScalar(cache, resolved), boxed);
      }
      return javaScopedName(resolved);
  }
}

export function javaType(cache: ParseCache, type: ResolvedType): string {
  return javaTypeOf(cache, type, false);
}

/**
 * Java literal for an enum value stored as `storage`. Unsigned values wrap to
 * the signed type of the same width, with the original value in a comment.
 */
export function javaLiteral(cache: ParseCache, storage: ResolvedType, value: bigint): string {
  const resolved = enumStorageScalar(cache, storage);
  if (resolved.kind !== 'scalar') {
    throw new GenerationError('Enum storage is not a scalar', 'INTERNAL');
  }
  const { bits } = javaScalar(resolved.name);
  const suffix = bits === 64 ? 'L' : '';
  if (bits === undefined) {
    return value.toString();
  }
  const wrapped = BigInt.asIntN(bits, value);
  const text = wrapped.toString() + suffix;
  return wrapped === value ? text : `${text} /* ${value.toString()} */`;
}

/** Initializer of a field whose Java type is a reference type. */
function javaInitializer(cache: ParseCache, type: ResolvedType): string {
  const resolved = resolveAliases(cache, type);
  if (resolved.kind === 'scalar') {
    return resolved.name === 'string' ? ' = new String()' : '';
  }
  if (resolved.kind === 'named' && resolved.declKind !== 'struct' && resolved.declKind !== 'union') {
    return '';
  }
  return ` = new ${javaType(cache, resolved)}()`;
}

function emitEnum(out: Emitter, cache: ParseCache, declaration: EnumDeclaration, modifiers: string): void {
  const type = javaType(cache, declaration.storage);
  out.write(`${modifiers} final class ${declaration.name} `);
  out.block(() => {
    for (const value of declaration.values) {
      out.write(
        `public static final ${type} ${value.name} = ${javaLiteral(cache, declaration.storage, value.value)};\n`
      );
    }
    out.endl();
    out.write(`public static final String toString(${type} o) `);
    out.block(() => {
      for (const value of declaration.values) {
        out.write(`if (o == ${value.name}) `);
        out.block(() => {
          out.write(`return "${value.name}";\n`);
        });
        out.endl();
      }
      out.write(`return "0x" + ${type === 'long' ? 'Long' : 'Integer'}.toHexString(o);\n`);
    });
    out.endl();
  });
  out.write(';\n');
}

/**
 * Writes a declaration as a Java class. Typedefs have no Java form and are
 * skipped.
 */
function emitDeclaration(out: Emitter, cache: ParseCache, declaration: Declaration, nested: boolean): void {
  const modifiers = nested ? 'public static' : 'public';
  switch (declaration.kind) {
    case 'typedef':
      return;
    case 'enum':
      emitEnum(out, cache, declaration, modifiers);
      out.endl();
      return;
    case 'struct':
    case 'union':
      out.write(`${modifiers} final class ${declaration.name} `);
      out.block(() => {
        for (const child of declaration.nested) {
          emitDeclaration(out, cache, child, true);
        }
        for (const field of declaration.fields) {
          out.write(
            `public ${javaType(cache, field.type)} ${field.name}${javaInitializer(cache, field.type)};\n`
          );
        }
      });
      out.write(';\n\n');
      return;
  }
}

function callbackInterfaceName(method: Method): string {
  return `${method.name}Callback`;
}

function javaParams(cache: ParseCache, method: Method): string {
  const params = method.params.map((field) => `${javaType(cache, field.type)} ${field.name}`);
  if (method.results.length > 1) {
    params.push(`${callbackInterfaceName(method)} _ifgen_cb`);
  }
  return params.join(', ');
}

function javaReturnType(cache: ParseCache, method: Method): string {
  const [only] = method.results;
  return only === undefined || method.results.length > 1 ? 'void' : javaType(cache, only.type);
}

function emitJavaFile(
  context: GenerationContext,
  name: FQName,
  className: string,
  body: (out: Emitter) => void
): void {
  context.emit(name, 'genSanitized', `${className}.java`, (out) => {
    out.write(`package ${name.javaPackage()};\n\n`);
    body(out);
  });
}

function generateInterface(unit: ParsedUnit, context: GenerationContext): void {
  const { cache } = context.session;
  const iface = interfaceOf(unit);
  const name = unit.fqName;
  const parent =
    iface.base === undefined ? `${JAVA_RUNTIME}.IHwInterface` : javaScopedName(iface.base);

  emitJavaFile(context, name, name.name, (out) => {
    out.write(`public interface ${name.name} extends ${parent} `);
    out.block(() => {
      out.write(`public static final String kInterfaceName = "${name.string()}";\n\n`);
      for (const declaration of iface.declarations) {
        emitDeclaration(out, cache, declaration, true);
      }
      for (const method of iface.methods) {
        if (method.results.length > 1) {
          out.write('@java.lang.FunctionalInterface\n');
          out.write(`public interface ${callbackInterfaceName(method)} `);
          out.block(() => {
            const values = method.results
              .map((field) => `${javaType(cache, field.type)} ${field.name}`)
              .join(', ');
            out.write(`public void onValues(${values});\n`);
          });
          out.write('\n\n');
        }
        out.write(
          `${javaReturnType(cache, method)} ${method.name}(${javaParams(cache, method)})\n`
        );
        out.indented(() => {
          out.write(`throws ${JAVA_RUNTIME}.RemoteException;\n`);
        }, 2);
        out.endl();
      }
    });
    out.endl();
  });
}

function generateTypes(unit: ParsedUnit, context: GenerationContext, requested: FQName): void {
  const { cache } = context.session;
  const only = requested.nestedName();
  const selected = unit.declarations.filter(
    (declaration) => declaration.kind !== 'typedef' && (only === '' || declaration.name === only)
  );
  if (only !== '' && selected.length === 0) {
    throw new ParseError(
      `'${unit.fqName.string()}' declares no type '${only}'`,
      'UNDEFINED_TYPE',
      unit.filePath
    );
  }
  for (const declaration of selected) {
    emitJavaFile(context, unit.fqName, declaration.name, (out) => {
      emitDeclaration(out, cache, declaration, false);
    });
  }
}

/**
 * `<Unit>.java` for an interface; one file per declaration of `types`, or
 * only the one a `types.X` request names.
 *
 * @throws GenerationError (`NOT_JAVA_COMPATIBLE`) for a unit using types
 * that have no Java form.
 */
export const generateJava: UnitGenerator = (unit, context, requested) => {
  if (!unit.isJavaCompatible) {
    throw new GenerationError(
      `${unit.fqName.string()} is not Java compatible`,
      'NOT_JAVA_COMPATIBLE',
      'handle, memory and pointer have no Java representation'
    );
  }
  if (unit.fqName.isTypes()) {
    generateTypes(unit, context, requested);
    return;
  }
  generateInterface(unit, context);
};
