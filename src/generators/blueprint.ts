/**
 * `Build.bp`: declarative build modules for the generated C++ of a package,
 * and for its implementation skeletons.
 *
 * @packageDocumentation
 */

import type { GenerationContext } from '../backends/output.js';
import type { Emitter } from '../emitter/emitter.js';
import { sortedUnique, type FQName } from '../fqname/index.js';
import { SOURCE_EXTENSION } from '../coordinator/index.js';
import { AUTOGENERATED_NOTICE } from './common.js';
import {
  libraryName,
  packageRootOptions,
  summarizePackage,
  type PackageSummary,
} from './build-common.js';

/**
 * Where a C++ library may be installed.
 */
export type LibraryLocation = 'vendor' | 'vendorAvailable' | 'vndk';

/** Runtime libraries every generated library links against. */
const RUNTIME_SHARED_LIBS = [
  'libifbase',
  'libiftransport',
  'libifbinder',
  'liblog',
  'libutils',
  'libcutils',
];

const RUNTIME_EXPORTED_LIBS = ['libifbase', 'libiftransport', 'libifbinder', 'libutils'];

function quotedList(out: Emitter, items: readonly string[]): void {
  for (const item of items) {
    out.write(`"${item}",\n`);
  }
}

/**
 * A `genrule` that runs the tool with one backend over the package's
 * sources and lists the files it produces.
 */
function emitGenSection(
  out: Emitter,
  context: GenerationContext,
  summary: PackageSummary,
  packages: readonly FQName[],
  genName: string,
  backend: string,
  outputs: readonly string[]
): void {
  const { toolId } = context.session;
  const rootOptions = packageRootOptions(context, summary.pkg, packages)
    .map((option) => `-r${option} `)
    .join('');

  out.write('genrule ');
  out.block(() => {
    out.write(`name: "${genName}",\n`);
    out.write(`tools: ["${toolId}"],\n`);
    out.write(
      `cmd: "$(location ${toolId}) -o $(genDir) -L${backend} ${rootOptions}${summary.pkg.string()}",\n`
    );
    out.write('srcs: [\n');
    out.indented(() => {
      out.write(`":${libraryName(summary.pkg)}_hal",\n`);
    });
    out.write('],\n');
    out.write('out: [\n');
    out.indented(() => {
      quotedList(out, outputs);
    });
    out.write('],\n');
  });
  out.write('\n\n');
}

/** Library names of dependencies, without transport packages. */
function dependencyList(
  context: GenerationContext,
  packages: readonly FQName[],
  vendor: boolean
): string[] {
  const { session } = context;
  return packages
    .filter((pkg) => !session.isTransportPackage(pkg))
    .map((pkg) =>
      vendor && !session.isSystemPackage(pkg) ? `${libraryName(pkg)}_vendor` : libraryName(pkg)
    );
}

interface LibrarySection {
  readonly name: string;
  readonly genSources: string;
  readonly genHeaders: string;
  readonly location: LibraryLocation;
  readonly dependencies: readonly string[];
}

function emitLibSection(out: Emitter, context: GenerationContext, pkg: FQName, section: LibrarySection): void {
  const { session } = context;
  out.write('cc_library ');
  out.block(() => {
    out.write(`name: "${section.name}",\n`);
    out.write(`defaults: ["${session.moduleDefaults}"],\n`);
    out.write(`generated_sources: ["${section.genSources}"],\n`);
    out.write(`generated_headers: ["${section.genHeaders}"],\n`);
    out.write(`export_generated_headers: ["${section.genHeaders}"],\n`);

    switch (section.location) {
      case 'vendor':
        out.write('vendor: true,\n');
        break;
      case 'vendorAvailable':
        out.write('vendor_available: true,\n');
        break;
      case 'vndk':
        out.write('vendor_available: true,\n');
        out.write('vndk: ');
        out.block(() => {
          out.write('enabled: true,\n');
          if (session.isSystemProcessSupported(pkg)) {
            out.write('support_system_process: true,\n');
          }
        });
        out.write(',\n');
        break;
    }

    out.write('shared_libs: [\n');
    out.indented(() => {
      quotedList(out, RUNTIME_SHARED_LIBS);
      quotedList(out, section.dependencies);
    });
    out.write('],\n');
    out.write('export_shared_lib_headers: [\n');
    out.indented(() => {
      quotedList(out, RUNTIME_EXPORTED_LIBS);
      quotedList(out, section.dependencies);
    });
    out.write('],\n');
  });
  out.write('\n');
}

function emitAdapterSections(
  out: Emitter,
  context: GenerationContext,
  summary: PackageSummary,
  pathPrefix: string
): void {
  const { session } = context;
  const { cache, analyzer } = session;
  const library = libraryName(summary.pkg);
  const adapterName = `${library}-adapter`;
  const genAdapterName = `${adapterName}_genc++`;
  const helperName = `${adapterName}-helper`;
  const genHelperSources = `${helperName}_genc++`;
  const genHelperHeaders = `${helperName}_genc++_headers`;
  const adapterPackages = sortedUnique([...summary.dependencies, summary.pkg]);
  const interfaces = summary.members.filter((member) => !member.isTypes());

  out.endl();
  emitGenSection(
    out,
    context,
    summary,
    adapterPackages,
    genHelperSources,
    'c++-adapter-sources',
    interfaces.map((iface) => `${pathPrefix}${iface.interfaceAdapterName()}.cpp`)
  );
  emitGenSection(
    out,
    context,
    summary,
    adapterPackages,
    genHelperHeaders,
    'c++-adapter-headers',
    interfaces.map((iface) => `${pathPrefix}${iface.interfaceAdapterName()}.h`)
  );
  out.endl();

  const importedHelpers = summary.dependencies
    .filter((dependency) => !analyzer.isTypesOnlyPackage(cache.listPackageMembers(dependency)))
    .map((dependency) => `${libraryName(dependency)}-adapter-helper`);
  emitLibSection(out, context, summary.pkg, {
    name: helperName,
    genSources: genHelperSources,
    genHeaders: genHelperHeaders,
    location: 'vendorAvailable',
    dependencies: ['libifadapter', ...dependencyList(context, adapterPackages, false), ...importedHelpers],
  });
  out.endl();

  const rootOptions = packageRootOptions(context, summary.pkg, adapterPackages)
    .map((option) => `-r${option} `)
    .join('');
  out.write('genrule ');
  out.block(() => {
    out.write(`name: "${genAdapterName}",\n`);
    out.write(`tools: ["${session.toolId}"],\n`);
    out.write(
      `cmd: "$(location ${session.toolId}) -o $(genDir) -Lc++-adapter-main ${rootOptions}${summary.pkg.string()}",\n`
    );
    out.write('out: ["main.cpp"],\n');
  });
  out.write('\n\n');

  out.write('cc_test ');
  out.block(() => {
    out.write(`name: "${adapterName}",\n`);
    out.write('shared_libs: [\n');
    out.indented(() => {
      quotedList(out, ['libifadapter', 'libifbase', 'libiftransport', 'libutils']);
      quotedList(out, dependencyList(context, adapterPackages, false));
      quotedList(out, [helperName]);
    });
    out.write('],\n');
    out.write(`generated_sources: ["${genAdapterName}"],\n`);
  });
  out.write('\n');
}

/**
 * Writes `Build.bp` into the package's source directory: the source
 * filegroup, the header and source genrules, the C++ libraries and, for
 * packages with interfaces, the adapter modules.
 */
export function generateBlueprint(pkg: FQName, context: GenerationContext): void {
  const { session } = context;
  const { cache, analyzer } = session;
  const summary = summarizePackage(context, pkg);
  const library = libraryName(summary.pkg);
  const genSources = `${library}_genc++`;
  const genHeaders = `${library}_genc++_headers`;
  const pathPrefix = cache.packageRootPath(summary.pkg) + cache.packagePath(summary.pkg, { relative: true });

  context.emit(summary.pkg, 'packageRoot', 'Build.bp', (out) => {
    out.write(`// ${AUTOGENERATED_NOTICE}\n\n`);

    out.write('filegroup ');
    out.block(() => {
      out.write(`name: "${library}_hal",\n`);
      out.write('srcs: [\n');
      out.indented(() => {
        quotedList(out, summary.members.map((member) => `${member.name}${SOURCE_EXTENSION}`));
      });
      out.write('],\n');
    });
    out.write('\n\n');

    emitGenSection(
      out,
      context,
      summary,
      summary.dependencies,
      genSources,
      'c++-sources',
      summary.members.map((member) =>
        member.isTypes()
          ? `${pathPrefix}types.cpp`
          : `${pathPrefix}${member.interfaceBaseName()}All.cpp`
      )
    );
    emitGenSection(
      out,
      context,
      summary,
      summary.dependencies,
      genHeaders,
      'c++-headers',
      summary.members.flatMap((member) =>
        member.isTypes()
          ? [`${pathPrefix}types.h`, `${pathPrefix}hwtypes.h`]
          : [
              `${pathPrefix}${member.name}.h`,
              `${pathPrefix}${member.interfaceHwName()}.h`,
              `${pathPrefix}${member.interfaceStubName()}.h`,
              `${pathPrefix}${member.interfaceProxyName()}.h`,
              `${pathPrefix}${member.interfacePassthroughName()}.h`,
            ]
      )
    );

    if (session.isTransportPackage(summary.pkg)) {
      out.write(`// ${summary.pkg.string()} is exported from libiftransport\n`);
    } else {
      emitLibSection(out, context, summary.pkg, {
        name: library,
        genSources,
        genHeaders,
        location: session.testMode ? 'vendorAvailable' : 'vndk',
        dependencies: dependencyList(context, summary.dependencies, false),
      });

      if (!session.isSystemPackage(summary.pkg)) {
        out.endl();
        emitLibSection(out, context, summary.pkg, {
          name: `${library}_vendor`,
          genSources,
          genHeaders,
          location: 'vendor',
          dependencies: dependencyList(context, summary.dependencies, true),
        });
      }
    }

    if (analyzer.isTypesOnlyPackage(summary.members)) {
      return;
    }
    emitAdapterSections(out, context, summary, pathPrefix);
  });
}

/**
 * Writes `Build.bp` for the implementation skeletons of a package into the
 * output directory.
 */
export function generateBlueprintImpl(pkg: FQName, context: GenerationContext): void {
  const { session } = context;
  const summary = summarizePackage(context, pkg);
  const library = libraryName(summary.pkg);
  const direct = session.analyzer
    .directPackageDependencies(summary.pkg)
    .filter((dependency) => !session.isTransportPackage(dependency))
    .map(libraryName);

  context.emit(summary.pkg, 'direct', 'Build.bp', (out) => {
    out.write('cc_library_shared ');
    out.block(() => {
      out.write(`name: "${library}-impl",\n`);
      out.write('relative_install_path: "hw",\n');
      out.write('proprietary: true,\n');
      out.write('srcs: [\n');
      out.indented(() => {
        quotedList(
          out,
          summary.members
            .filter((member) => !member.isTypes())
            .map((member) => `${member.interfaceBaseName()}.cpp`)
        );
      });
      out.write('],\n');
      out.write('shared_libs: [\n');
      out.indented(() => {
        quotedList(out, ['libifbase', 'libiftransport', 'libutils', library, ...direct]);
      });
      out.write('],\n');
    });
    out.write('\n');
  });
}
