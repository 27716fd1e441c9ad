/**
 * Name resolution: fully-qualified names and the package root table.
 *
 * @packageDocumentation
 */

export { FQName, TYPES_UNIT, compareFQNames, sortedUnique } from './fqname.js';
export { PackageRootTable, parseRootOption } from './package-roots.js';
export type { PackagePathOptions, PackageRoot } from './package-roots.js';
