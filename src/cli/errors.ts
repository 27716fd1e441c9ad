/**
 * Error reporting for the ifgen CLI.
 *
 * Every failure is printed once, with contextual suggestions chosen by its
 * kind and code.
 *
 * @packageDocumentation
 */

import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import { ParseError, isIfgenError } from '../errors.js';

/**
 * Terminal capabilities used when formatting.
 */
export interface DisplayOptions {
  colors: boolean;
}

/**
 * Error categories that select suggestions.
 */
export type ErrorType =
  | 'usage'
  | 'validation'
  | 'package_root'
  | 'source'
  | 'hash'
  | 'java'
  | 'output'
  | 'config'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  text: string;
  /** Command or action to take. */
  action?: string;
}

/**
 * Error context with details needed for generating suggestions.
 */
export interface ErrorContext {
  errorType: ErrorType;
  details?: {
    /** Source or output file involved. */
    filePath?: string;
    /** Extra explanation carried by the error. */
    note?: string;
  };
}

const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  usage: [
    {
      text: 'Check the command line against the usage text',
      action: 'ifgen -h',
    },
    {
      text: 'Pass exactly one backend with -L and at least one name',
    },
  ],

  validation: [
    {
      text: 'Check whether the backend takes packages or units',
      action: 'ifgen -h',
    },
  ],

  package_root: [
    {
      text: 'Register the package root with -r <package>:<path>',
    },
    {
      text: 'Or add it under [roots] in ifgen.toml',
    },
  ],

  source: [
    {
      text: 'Review the file and line number in the error message',
    },
    {
      text: 'Check that -p or IFGEN_BUILD_TOP points at the source tree',
    },
  ],

  hash: [
    {
      text: 'Released interfaces must not change; revert the edit or bump the minor version',
    },
    {
      text: 'Print the current hashes to compare against the ledger',
      action: 'ifgen -Lhash -r <package>:<path> <package>@<M.m>',
    },
  ],

  java: [
    {
      text: 'handle, memory and pointer have no Java form; use another backend for this package',
    },
  ],

  output: [
    {
      text: 'Check that the output path is writable',
    },
  ],

  config: [
    {
      text: 'Fix the reported field in ifgen.toml',
    },
    {
      text: 'Check IFGEN_* environment variables, which override the file',
    },
  ],

  unknown: [
    {
      text: 'Run again with -v for debug output',
    },
  ],
};

function errorTypeForCode(kind: string, code: string): ErrorType {
  switch (code) {
    case 'NO_PACKAGE_ROOT':
    case 'BAD_ROOT_OPTION':
      return 'package_root';
    case 'HASH_MISMATCH':
      return 'hash';
    case 'NOT_JAVA_COMPATIBLE':
      return 'java';
    case 'OUTPUT_OPEN_FAILED':
      return 'output';
  }
  switch (kind) {
    case 'usage':
      return 'usage';
    case 'validation':
      return 'validation';
    case 'parse':
      return 'source';
    default:
      return 'unknown';
  }
}

/**
 * Classifies a caught value and collects the details worth printing.
 */
export function describeError(error: unknown): { message: string; context: ErrorContext } {
  if (isIfgenError(error)) {
    const details: NonNullable<ErrorContext['details']> = {};
    if (error instanceof ParseError && error.filePath !== undefined) {
      details.filePath = error.filePath;
    }
    if (error.details !== undefined) {
      details.note = error.details;
    }
    return {
      message: error.message,
      context: { errorType: errorTypeForCode(error.kind, error.code), details },
    };
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return { message: error.message, context: { errorType: 'config' } };
  }
  return {
    message: error instanceof Error ? error.message : String(error),
    context: { errorType: 'unknown' },
  };
}

function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText =
    suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats an error message with contextual suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: ErrorContext,
  options: DisplayOptions = { colors: false }
): string {
  const suggestions = ERROR_SUGGESTIONS[context.errorType];

  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';
  const yellowCode = options.colors ? '\x1b[33m' : '';

  let result = `${redCode}Error:${resetCode} ${errorMessage}`;

  if (context.details?.filePath !== undefined) {
    result += `\n  ${yellowCode}File:${resetCode} ${context.details.filePath}`;
  }
  if (context.details?.note !== undefined) {
    result += `\n  ${yellowCode}Note:${resetCode} ${context.details.note}`;
  }

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  suggestions.forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}

/**
 * Formats any caught value for stderr.
 */
export function formatError(error: unknown, options: DisplayOptions = { colors: false }): string {
  const { message, context } = describeError(error);
  return formatErrorWithSuggestions(message, context, options);
}
