/**
 * Constants of `@export` enums for code that cannot use the generated
 * bindings: a C header, or a Java `Constants` class.
 *
 * @packageDocumentation
 */

import type { GenerationContext } from '../backends/output.js';
import type { EnumDeclaration, EnumValue, ParseCache, ResolvedType } from '../coordinator/index.js';
import type { Emitter } from '../emitter/emitter.js';
import type { FQName } from '../fqname/index.js';
import { AUTOGENERATED_NOTICE, findDeclaration, resolveAliases } from './common.js';
import { javaLiteral, javaType } from './java.js';

export type ConstantsLanguage = 'c' | 'java';

/**
 * Values of an enum preceded by those of the enums it extends, root first.
 */
export function enumValueChain(cache: ParseCache, declaration: EnumDeclaration): EnumValue[] {
  const chain: EnumValue[][] = [[...declaration.values]];
  const seen = new Set<string>([declaration.localName]);
  let storage: ResolvedType = resolveAliases(cache, declaration.storage);
  while (storage.kind === 'named' && storage.declKind === 'enum') {
    const key = `${storage.unit.string()}::${storage.localName}`;
    const parent = findDeclaration(cache, storage);
    if (seen.has(key) || !('kind' in parent) || parent.kind !== 'enum') {
      break;
    }
    seen.add(key);
    chain.unshift([...parent.values]);
    storage = resolveAliases(cache, parent.storage);
  }
  return chain.flat();
}

/** Every `@export` enum of a package, in member order. */
export function exportedEnums(cache: ParseCache, pkg: FQName): EnumDeclaration[] {
  return cache
    .listPackageMembers(pkg)
    .flatMap((member) => cache.resolve(member).exportedEnums);
}

function exportedName(declaration: EnumDeclaration, value: EnumValue): string {
  const settings = declaration.exported;
  if (settings === undefined) {
    return value.name;
  }
  return settings.valuePrefix + value.name + settings.valueSuffix;
}

function emitCEnum(out: Emitter, cache: ParseCache, declaration: EnumDeclaration): void {
  const typeName = declaration.exported?.name ?? '';
  out.write(typeName === '' ? 'enum {\n' : 'typedef enum {\n');
  out.indented(() => {
    for (const value of enumValueChain(cache, declaration)) {
      out.write(`${exportedName(declaration, value)} = ${value.value.toString()},\n`);
    }
  });
  out.write(typeName === '' ? '};\n\n' : `} ${typeName};\n\n`);
}

function emitJavaEnum(out: Emitter, cache: ParseCache, declaration: EnumDeclaration): void {
  const typeName = declaration.exported?.name ?? '';
  const type = javaType(cache, declaration.storage);
  const constants = (): void => {
    for (const value of enumValueChain(cache, declaration)) {
      out.write(
        `public static final ${type} ${exportedName(declaration, value)} = ${javaLiteral(cache, declaration.storage, value.value)};\n`
      );
    }
  };

  if (typeName === '') {
    constants();
    out.endl();
    return;
  }
  out.write(`public final class ${typeName} {\n`);
  out.indented(constants);
  out.write('};\n\n');
}

/**
 * Writes the constants of every `@export` enum of a package. Nothing is
 * written when the package exports none.
 *
 * The C header goes to the output path itself; the Java class to
 * `Constants.java` below the sanitized package directory.
 */
export function generateExportedConstants(
  pkg: FQName,
  context: GenerationContext,
  language: ConstantsLanguage
): void {
  const { cache } = context.session;
  const enums = exportedEnums(cache, pkg);
  if (enums.length === 0) {
    context.session.logger.debug('no_exported_constants', { package: pkg.string() });
    return;
  }

  const location = language === 'java' ? 'genSanitized' : 'direct';
  const fileName = language === 'java' ? 'Constants.java' : '';

  context.emit(pkg, location, fileName, (out) => {
    out.write(`// ${AUTOGENERATED_NOTICE}\n`);
    out.write(`// Source: ${pkg.string()}\n`);
    out.write(`// Root: ${cache.packageRootOption(pkg)}\n\n`);

    if (language === 'java') {
      out.write(`package ${pkg.javaPackage()};\n\n`);
      out.write('public class Constants {\n');
      out.indented(() => {
        for (const declaration of enums) {
          emitJavaEnum(out, cache, declaration);
        }
      });
      out.write('}\n');
      return;
    }

    const guard = `IFGEN_GENERATED_${pkg.tokenName().toUpperCase()}_EXPORTED_CONSTANTS_H_`;
    out.write(`#ifndef ${guard}\n#define ${guard}\n\n`);
    out.write('#ifdef __cplusplus\nextern "C" {\n#endif\n\n');
    for (const declaration of enums) {
      emitCEnum(out, cache, declaration);
    }
    out.write(`#ifdef __cplusplus\n}\n#endif\n\n#endif  // ${guard}\n`);
  });
}
