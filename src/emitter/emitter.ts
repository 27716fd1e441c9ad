/**
 * Indentation-aware text emitter shared by every generator.
 *
 * @packageDocumentation
 */

import { closeSync, writeSync } from 'node:fs';
import { GenerationError } from '../errors.js';
import { safeOpenForWriteSync } from '../utils/safe-fs.js';

/** Spaces per indentation level. */
export const INDENT_WIDTH = 4;

/**
 * Destination for emitted text.
 */
export interface EmitterSink {
  write(text: string): void;
  close(): void;
}

/**
 * Sink writing straight to an open file descriptor.
 */
export class FileSink implements EmitterSink {
  private fd: number | undefined;

  /**
   * Creates (or truncates) the file, creating missing parent directories.
   *
   * @throws {Error} If the file cannot be opened.
   */
  constructor(readonly filePath: string) {
    this.fd = safeOpenForWriteSync(filePath);
  }

  write(text: string): void {
    if (this.fd !== undefined) {
      writeSync(this.fd, text);
    }
  }

  close(): void {
    if (this.fd !== undefined) {
      closeSync(this.fd);
      this.fd = undefined;
    }
  }
}

/**
 * Sink collecting text in memory.
 */
export class MemorySink implements EmitterSink {
  private readonly chunks: string[] = [];
  private closed = false;

  write(text: string): void {
    this.chunks.push(text);
  }

  close(): void {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  contents(): string {
    return this.chunks.join('');
  }
}

/**
 * Sink forwarding text to a callback, e.g. standard output.
 */
export class CallbackSink implements EmitterSink {
  constructor(private readonly callback: (text: string) => void) {}

  write(text: string): void {
    this.callback(text);
  }

  close(): void {}
}

/**
 * Line-oriented writer.
 *
 * Each output line starts with the line prefix and `4 × depth` spaces, added
 * lazily when the first character of the line is written. Empty lines get
 * neither. While a namespace token is set, every exact occurrence of it is
 * removed from the written text.
 *
 * An emitter whose destination could not be opened is invalid: it reports so
 * through {@link Emitter.isValid} and ignores writes.
 */
export class Emitter {
  private sink: EmitterSink | undefined;
  private depth = 0;
  private atStartOfLine = true;
  private linePrefix = '';
  private space = '';
  private readonly openError: Error | undefined;

  constructor(sink: EmitterSink | undefined, openError?: Error) {
    this.sink = sink;
    this.openError = openError;
  }

  /**
   * Opens an emitter writing to a file. Never throws: on failure the
   * returned emitter is invalid and carries the cause.
   */
  static toFile(filePath: string): Emitter {
    try {
      return new Emitter(new FileSink(filePath));
    } catch (error) {
      return new Emitter(undefined, error instanceof Error ? error : new Error(String(error)));
    }
  }

  isValid(): boolean {
    return this.sink !== undefined;
  }

  /** Why the destination could not be opened, if it could not. */
  failure(): Error | undefined {
    return this.openError;
  }

  indentDepth(): number {
    return this.depth;
  }

  /**
   * Appends text, splitting it on newlines so every line gets its prefix.
   */
  write(text: string): this {
    const length = text.length;
    let start = 0;
    while (start < length) {
      const pos = text.indexOf('\n', start);

      if (pos === -1) {
        this.beginLine();
        this.output(text.slice(start));
        break;
      }

      if (pos === start) {
        this.emit('\n');
      } else {
        this.beginLine();
        this.output(text.slice(start, pos + 1));
      }
      this.atStartOfLine = true;
      start = pos + 1;
    }
    return this;
  }

  endl(): this {
    return this.write('\n');
  }

  indent(level = 1): this {
    this.depth += level;
    return this;
  }

  /**
   * @throws GenerationError if the depth would drop below zero.
   */
  unindent(level = 1): this {
    if (level > this.depth) {
      throw new GenerationError(
        `Cannot unindent by ${String(level)} at depth ${String(this.depth)}`,
        'UNBALANCED_INDENT'
      );
    }
    this.depth -= level;
    return this;
  }

  /**
   * Runs `body` one level (or `level` levels) deeper, restoring the depth on
   * every exit path.
   */
  indented(body: () => void, level = 1): this {
    this.indent(level);
    try {
      body();
    } finally {
      this.unindent(level);
    }
    return this;
  }

  /**
   * Writes `{`, the indented body, and `}` without a trailing newline.
   */
  block(body: () => void): this {
    this.write('{\n');
    this.indented(body);
    return this.write('}');
  }

  setLinePrefix(prefix: string): void {
    this.linePrefix = prefix;
  }

  unsetLinePrefix(): void {
    this.linePrefix = '';
  }

  /** Sets the token deleted from all following output; empty disables elision. */
  setNamespace(token: string): void {
    this.space = token;
  }

  /** Closes the destination. Further writes are ignored. */
  close(): void {
    if (this.sink !== undefined) {
      this.sink.close();
      this.sink = undefined;
    }
  }

  private beginLine(): void {
    if (this.atStartOfLine) {
      this.emit(this.linePrefix + ' '.repeat(INDENT_WIDTH * this.depth));
      this.atStartOfLine = false;
    }
  }

  private output(text: string): void {
    this.emit(this.space === '' ? text : text.split(this.space).join(''));
  }

  private emit(text: string): void {
    if (text !== '' && this.sink !== undefined) {
      this.sink.write(text);
    }
  }
}

/**
 * Runs `body` against an emitter and closes it afterwards, whether or not the
 * body throws.
 */
export function withEmitter<T>(emitter: Emitter, body: (out: Emitter) => T): T {
  try {
    return body(emitter);
  } finally {
    emitter.close();
  }
}
