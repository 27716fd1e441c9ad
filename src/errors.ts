/**
 * Error taxonomy for ifgen.
 *
 * Every failure surfaced to the driver is an {@link IfgenError}. The `kind`
 * selects the category shown to the user and the `code` identifies the exact
 * condition for programmatic handling.
 *
 * @packageDocumentation
 */

/**
 * Category of an ifgen failure.
 */
export type IfgenErrorKind = 'usage' | 'validation' | 'parse' | 'generation';

/**
 * Error codes for malformed command-line invocations.
 */
export type UsageErrorCode =
  | 'MISSING_BACKEND'
  | 'UNKNOWN_BACKEND'
  | 'DUPLICATE_BACKEND'
  | 'MISSING_OUTPUT'
  | 'MISSING_NAMES'
  | 'BAD_ROOT_OPTION'
  | 'TEST_MODE_UNSUPPORTED'
  | 'UNKNOWN_OPTION'
  | 'MISSING_ARGUMENT'
  | 'INVALID_NAME';

/**
 * Error codes for names whose shape does not fit the selected backend.
 */
export type ValidationErrorCode = 'EXPECTED_PACKAGE_ONLY' | 'NESTED_NAME_NOT_ALLOWED';

/**
 * Error codes for failures while locating, reading or checking a unit.
 */
export type ParseErrorCode =
  | 'NO_PACKAGE_ROOT'
  | 'SOURCE_NOT_FOUND'
  | 'SYNTAX_ERROR'
  | 'PACKAGE_MISMATCH'
  | 'NAME_MISMATCH'
  | 'UNDEFINED_TYPE'
  | 'IMPORT_CYCLE'
  | 'HASH_MISMATCH';

/**
 * Error codes for failures while writing artifacts.
 */
export type GenerationErrorCode =
  | 'OUTPUT_OPEN_FAILED'
  | 'UNBALANCED_INDENT'
  | 'NOT_JAVA_COMPATIBLE'
  | 'INTERNAL';

/**
 * Base class for all ifgen failures.
 */
export abstract class IfgenError extends Error {
  /** Category of the failure. */
  public abstract readonly kind: IfgenErrorKind;
  /** Exact condition, unique within the kind. */
  public abstract readonly code: string;
  /** Additional details about the error. */
  public readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    if (details !== undefined) {
      this.details = details;
    }
  }
}

/**
 * Malformed command line. Raised before any name is resolved.
 */
export class UsageError extends IfgenError {
  public override readonly kind = 'usage';
  public override readonly code: UsageErrorCode;

  constructor(message: string, code: UsageErrorCode, details?: string) {
    super(message, details);
    this.name = 'UsageError';
    this.code = code;
  }
}

/**
 * A requested name does not have the shape the backend accepts.
 */
export class ValidationError extends IfgenError {
  public override readonly kind = 'validation';
  public override readonly code: ValidationErrorCode;

  constructor(message: string, code: ValidationErrorCode, details?: string) {
    super(message, details);
    this.name = 'ValidationError';
    this.code = code;
  }
}

/**
 * A unit could not be located, parsed or verified.
 */
export class ParseError extends IfgenError {
  public override readonly kind = 'parse';
  public override readonly code: ParseErrorCode;
  /** Source file involved, when known. */
  public readonly filePath?: string;

  constructor(message: string, code: ParseErrorCode, filePath?: string, details?: string) {
    super(message, details);
    this.name = 'ParseError';
    this.code = code;
    if (filePath !== undefined) {
      this.filePath = filePath;
    }
  }
}

/**
 * An artifact could not be produced.
 */
export class GenerationError extends IfgenError {
  public override readonly kind = 'generation';
  public override readonly code: GenerationErrorCode;

  constructor(message: string, code: GenerationErrorCode, details?: string) {
    super(message, details);
    this.name = 'GenerationError';
    this.code = code;
  }
}

/**
 * Type guard for ifgen failures.
 *
 * @param error - Any caught value.
 * @returns True if the value is an {@link IfgenError}.
 */
export function isIfgenError(error: unknown): error is IfgenError {
  return error instanceof IfgenError;
}
