/**
 * Backends that only resolve units: ledger lines and the plain check.
 *
 * @packageDocumentation
 */

import type { UnitGenerator } from '../backends/dispatch.js';

/**
 * Prints `<sha256> <name>`, the ledger line of a unit, to standard output.
 * Resolution for this backend skips ledger enforcement.
 */
export const printUnitHash: UnitGenerator = (unit, context) => {
  context.session.stdout(`${unit.sourceHash} ${unit.fqName.string()}\n`);
};

/** Resolving the unit is the whole check. */
export const checkUnit: UnitGenerator = (unit, context) => {
  context.session.logger.debug('unit_checked', { name: unit.fqName.string(), file: unit.filePath });
};
