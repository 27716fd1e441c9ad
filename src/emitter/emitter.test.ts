import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CallbackSink, Emitter, MemorySink, withEmitter } from './emitter.js';
import { GenerationError } from '../errors.js';

function memoryEmitter(): { out: Emitter; sink: MemorySink } {
  const sink = new MemorySink();
  return { out: new Emitter(sink), sink };
}

describe('Emitter', () => {
  describe('write', () => {
    it('should indent every line of multi-line text', () => {
      const { out, sink } = memoryEmitter();
      out.indent(2);

      out.write('line1\nline2');

      expect(sink.contents()).toBe('        line1\n        line2');
    });

    it('should not add an empty line after a trailing newline', () => {
      const { out, sink } = memoryEmitter();
      out.indent();

      out.write('a\n');
      out.unindent();

      expect(sink.contents()).toBe('    a\n');
    });

    it('should keep a partial line pending until the next write', () => {
      const { out, sink } = memoryEmitter();
      out.indent();

      out.write('int x');
      out.write(' = 1;');
      out.write('\n');
      out.unindent();

      expect(sink.contents()).toBe('    int x = 1;\n');
    });

    it('should not duplicate the prefix for zero-length writes', () => {
      const { out, sink } = memoryEmitter();
      out.indent();

      out.write('').write('').write('x').write('').write('\n');
      out.unindent();

      expect(sink.contents()).toBe('    x\n');
    });

    it('should leave blank lines unindented', () => {
      const { out, sink } = memoryEmitter();
      out.indent();

      out.write('a\n\nb\n');
      out.unindent();

      expect(sink.contents()).toBe('    a\n\n    b\n');
    });

    it('should put the line prefix before the indentation', () => {
      const { out, sink } = memoryEmitter();
      out.setLinePrefix('// ');
      out.indent();

      out.write('one\ntwo\n');
      out.unsetLinePrefix();
      out.write('three\n');
      out.unindent();

      expect(sink.contents()).toBe('//     one\n//     two\n    three\n');
    });

    it('should apply indentation changes made in the middle of a line to the next line', () => {
      const { out, sink } = memoryEmitter();

      out.write('{');
      out.indent();
      out.write('\nbody\n');
      out.unindent();
      out.write('}\n');

      expect(sink.contents()).toBe('{\n    body\n}\n');
    });
  });

  describe('setNamespace', () => {
    it('should elide every occurrence of the token', () => {
      const { out, sink } = memoryEmitter();
      out.setNamespace('foo::');

      out.write('foo::Bar foo::Baz');

      expect(sink.contents()).toBe('Bar Baz');
    });

    it('should elide regardless of surrounding punctuation', () => {
      const { out, sink } = memoryEmitter();
      out.setNamespace('::a::V1_0::');

      out.write('sp<::a::V1_0::IFoo>(::a::V1_0::Info&)\n');
      out.setNamespace('');
      out.write('::a::V1_0::IFoo\n');

      expect(sink.contents()).toBe('sp<IFoo>(Info&)\n::a::V1_0::IFoo\n');
    });
  });

  describe('scopes', () => {
    it('should restore depth after nested scoped blocks', () => {
      const { out, sink } = memoryEmitter();
      out.indent();

      out.indented(() => {
        out.write('outer\n');
        out.indented(() => {
          out.write('inner\n');
        }, 2);
      });

      expect(out.indentDepth()).toBe(1);
      expect(sink.contents()).toBe('        outer\n                inner\n');
    });

    it('should unindent when the body throws', () => {
      const { out } = memoryEmitter();

      expect(() =>
        out.indented(() => {
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(out.indentDepth()).toBe(0);
    });

    it('should write braces around a block', () => {
      const { out, sink } = memoryEmitter();

      out.write('struct A ');
      out
        .block(() => {
          out.write('int x;\n');
          out.write('struct B ');
          out
            .block(() => {
              out.write('int y;\n');
            })
            .write(';\n');
        })
        .write(';\n');

      expect(sink.contents()).toBe(
        'struct A {\n    int x;\n    struct B {\n        int y;\n    };\n};\n'
      );
    });

    it('should report unindenting below zero', () => {
      const { out } = memoryEmitter();
      out.indent();

      expect(() => out.unindent(2)).toThrow(GenerationError);
      expect(out.indentDepth()).toBe(1);
    });
  });

  describe('destinations', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'emitter-test-'));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('should create and truncate files', () => {
      const file = join(tempDir, 'nested', 'out.h');
      withEmitter(Emitter.toFile(file), (out) => out.write('old contents that are long\n'));

      withEmitter(Emitter.toFile(file), (out) => {
        expect(out.isValid()).toBe(true);
        out.write('new\n');
      });

      expect(readFileSync(file, 'utf-8')).toBe('new\n');
    });

    it('should flush a pending partial line on close', () => {
      const file = join(tempDir, 'partial.txt');
      const out = Emitter.toFile(file);

      out.write('no newline');
      out.close();

      expect(readFileSync(file, 'utf-8')).toBe('no newline');
    });

    it('should be invalid when the destination cannot be opened', () => {
      const blocker = join(tempDir, 'blocker');
      writeFileSync(blocker, 'a file, not a directory');

      const out = Emitter.toFile(join(blocker, 'child.txt'));

      expect(out.isValid()).toBe(false);
      expect(out.failure()).toBeInstanceOf(Error);
      expect(() => out.write('ignored\n').indent().unindent()).not.toThrow();
      out.close();
    });

    it('should ignore writes after close', () => {
      const { out, sink } = memoryEmitter();
      out.write('a');
      out.close();

      out.write('b');

      expect(sink.contents()).toBe('a');
      expect(sink.isClosed()).toBe(true);
      expect(out.isValid()).toBe(false);
    });

    it('should forward to a callback sink', () => {
      const chunks: string[] = [];
      const out = new Emitter(new CallbackSink((text) => chunks.push(text)));

      out.write('abc 123\n');

      expect(chunks.join('')).toBe('abc 123\n');
    });
  });
});
