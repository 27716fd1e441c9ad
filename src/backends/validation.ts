/**
 * Name-shape checks run before any unit is resolved.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../errors.js';
import { TYPES_UNIT, type FQName } from '../fqname/index.js';
import type { BackendKey, ValidationOutcome } from './types.js';

const VALID: ValidationOutcome = { valid: true };

function invalid(error: ValidationError): ValidationOutcome {
  return { valid: false, error };
}

/**
 * Accepts a package or a fully-qualified unit. A nested name is accepted only
 * by `java`, and only inside `types` (`types.Point`).
 */
export function validateForSource(name: FQName, backend: BackendKey): ValidationOutcome {
  if (name.isPackage() || !name.name.includes('.')) {
    return VALID;
  }
  if (backend === 'java' && name.unitName() === TYPES_UNIT) {
    return VALID;
  }
  return invalid(
    new ValidationError(
      `-L${backend} does not take nested names such as '${name.string()}'`,
      'NESTED_NAME_NOT_ALLOWED',
      backend === 'java'
        ? `only types of the '${TYPES_UNIT}' unit can be generated one at a time`
        : `pass the unit '${name.unit().string()}' instead`
    )
  );
}

/**
 * Accepts only a bare `pkg@M.m`.
 */
export function validateIsPackage(name: FQName, backend: BackendKey): ValidationOutcome {
  if (name.isPackage()) {
    return VALID;
  }
  return invalid(
    new ValidationError(
      `-L${backend} expects a package name, got '${name.string()}'`,
      'EXPECTED_PACKAGE_ONLY',
      `pass '${name.packageAndVersion().string()}' instead`
    )
  );
}
