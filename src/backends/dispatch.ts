/**
 * Fan-out of one request to the units it names, and the boundary that turns
 * thrown failures into results.
 *
 * @packageDocumentation
 */

import { isIfgenError } from '../errors.js';
import type { FQName } from '../fqname/index.js';
import type { ParsedUnit, ResolveOptions } from '../coordinator/index.js';
import type { GenerationContext } from './output.js';
import type { GenerateResult, Generator } from './types.js';

/**
 * Per-unit body. `requested` is the name the unit was reached through, which
 * carries the nested part of a `types.Point` request.
 */
export type UnitGenerator = (
  unit: ParsedUnit,
  context: GenerationContext,
  requested: FQName
) => void;

/**
 * Runs `generator` for a fully-qualified name's unit, or for every member of
 * a bare package in member order. The first failure stops the loop; files
 * written before it stay in place.
 */
export function forFileOrPackage(
  generator: UnitGenerator,
  options: ResolveOptions = {}
): Generator {
  return (name, context) => {
    const { cache, logger } = context.session;
    const targets = name.isPackage() ? cache.listPackageMembers(name) : [name];
    for (const target of targets) {
      generator(cache.resolve(target, options), context, target);
      logger.debug('unit_generated', { name: target.string(), backend: context.session.backend });
    }
  };
}

/**
 * Runs a generator, converting a thrown {@link IfgenError} into a failed
 * {@link GenerateResult}. Anything else is a bug and propagates.
 */
export function runGenerator(
  generator: Generator,
  name: FQName,
  context: GenerationContext
): GenerateResult {
  try {
    generator(name, context);
    return { success: true, files: context.files };
  } catch (error) {
    if (isIfgenError(error)) {
      return { success: false, error };
    }
    throw error;
  }
}
