/**
 * Output locations and the per-request generation context.
 *
 * @packageDocumentation
 */

import { GenerationError } from '../errors.js';
import { CallbackSink, Emitter, withEmitter } from '../emitter/emitter.js';
import type { FQName } from '../fqname/index.js';
import type { Session } from '../session.js';

/**
 * Where a file goes, relative to the output path:
 *
 * - `direct`: `<out><file>`
 * - `packageRoot`: `<out><rootDir>/<pkg path>/<M.m>/<file>`, the package's source directory
 * - `genOutput`: `<out><prefix as path>/<pkg path>/<M.m>/<file>`
 * - `genSanitized`: like `genOutput` with a `VM_m` version directory
 */
export type OutputLocation = 'direct' | 'packageRoot' | 'genOutput' | 'genSanitized';

/**
 * What a backend sees while it runs for one requested name: the session and
 * the list of files written so far.
 */
export class GenerationContext {
  private readonly written: string[] = [];

  constructor(readonly session: Session) {}

  /** Files written through this context, in order. */
  get files(): readonly string[] {
    return this.written;
  }

  /**
   * Computes the path of an output file. The output path is used as a plain
   * prefix; directory backends get one ending in `/`.
   */
  filePath(name: FQName, location: OutputLocation, fileName: string): string {
    const { cache, outputPath } = this.session;
    switch (location) {
      case 'direct':
        return outputPath + fileName;
      case 'packageRoot':
        return outputPath + cache.packagePath(name) + fileName;
      case 'genOutput':
        return (
          outputPath +
          cache.packageRootPath(name) +
          cache.packagePath(name, { relative: true }) +
          fileName
        );
      case 'genSanitized':
        return (
          outputPath +
          cache.packageRootPath(name) +
          cache.packagePath(name, { relative: true, sanitized: true }) +
          fileName
        );
    }
  }

  /**
   * Opens an emitter on an output file, creating missing directories.
   *
   * @throws GenerationError (`OUTPUT_OPEN_FAILED`) if the file cannot be opened.
   */
  open(name: FQName, location: OutputLocation, fileName: string): Emitter {
    const filePath = this.filePath(name, location, fileName);
    const emitter = Emitter.toFile(filePath);
    if (!emitter.isValid()) {
      throw new GenerationError(
        `Could not open ${filePath} for writing`,
        'OUTPUT_OPEN_FAILED',
        emitter.failure()?.message
      );
    }
    this.written.push(filePath);
    this.session.logger.debug('file_written', { path: filePath });
    return emitter;
  }

  /**
   * Writes one output file with `body` and closes it.
   *
   * @returns The path written.
   */
  emit(
    name: FQName,
    location: OutputLocation,
    fileName: string,
    body: (out: Emitter) => void
  ): string {
    const emitter = this.open(name, location, fileName);
    withEmitter(emitter, body);
    return this.filePath(name, location, fileName);
  }

  /** Emitter on the session's standard output. */
  stdout(): Emitter {
    return new Emitter(new CallbackSink(this.session.stdout));
  }
}
