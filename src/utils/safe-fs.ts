/**
 * Synchronous file system helpers with path validation.
 *
 * Every generator and the parse cache go through these wrappers. Paths are
 * resolved to absolute form and rejected when empty or when they contain null
 * bytes, before any file system call is made.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Checks if a file or directory exists.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeExistsSync(filePath: string): boolean {
  return fs.existsSync(validatePath(filePath));
}

/**
 * Checks if a path exists and is a directory.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeIsDirectorySync(filePath: string): boolean {
  const stats = fs.statSync(validatePath(filePath), { throwIfNoEntry: false });
  return stats?.isDirectory() ?? false;
}

/**
 * Reads a UTF-8 text file.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read.
 */
export function safeReadTextSync(filePath: string): string {
  return fs.readFileSync(validatePath(filePath), 'utf-8');
}

/**
 * Reads a file as raw bytes.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read.
 */
export function safeReadBytesSync(filePath: string): Buffer {
  return fs.readFileSync(validatePath(filePath));
}

/**
 * Lists the entry names of a directory.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the directory cannot be read.
 */
export function safeReaddirSync(filePath: string): string[] {
  return fs.readdirSync(validatePath(filePath));
}

/**
 * Creates a directory and any missing parents.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the directory cannot be created.
 */
export function safeMkdirpSync(filePath: string): void {
  fs.mkdirSync(validatePath(filePath), { recursive: true });
}

/**
 * Creates or truncates a file for writing, creating missing parent directories.
 *
 * @returns The open file descriptor.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be opened.
 */
export function safeOpenForWriteSync(filePath: string): number {
  const validatedPath = validatePath(filePath);
  fs.mkdirSync(path.dirname(validatedPath), { recursive: true });
  return fs.openSync(validatedPath, 'w');
}
