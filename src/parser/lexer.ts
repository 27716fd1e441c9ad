/**
 * Tokenizer for `.idl` source text.
 *
 * @packageDocumentation
 */

import { IdlSyntaxError } from './types.js';

export type TokenKind = 'ident' | 'number' | 'string' | 'punct' | 'eof';

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly line: number;
  readonly column: number;
}

const PUNCTUATION = new Set(['{', '}', '(', ')', '<', '>', ';', ',', '=', ':', '@', '.', '-']);

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Splits source text into tokens, dropping whitespace and comments.
 *
 * `::` is a single punctuation token; numbers are unsigned decimal or `0x`
 * hexadecimal integers.
 *
 * @throws IdlSyntaxError on an unexpected character, a `0x` prefix without
 * digits, an unterminated string or an unterminated block comment.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;
  let lineStart = 0;

  const at = (offset = 0): string => source.charAt(pos + offset);

  while (pos < source.length) {
    const ch = at();
    const column = pos - lineStart + 1;

    if (ch === '\n') {
      pos++;
      line++;
      lineStart = pos;
      continue;
    }
    if (ch === ' ' || ch === '\t' || ch === '\r') {
      pos++;
      continue;
    }

    if (ch === '/' && at(1) === '/') {
      while (pos < source.length && at() !== '\n') {
        pos++;
      }
      continue;
    }

    if (ch === '/' && at(1) === '*') {
      const end = source.indexOf('*/', pos + 2);
      if (end === -1) {
        throw new IdlSyntaxError('Unterminated comment', line, column);
      }
      for (let i = pos; i < end; i++) {
        if (source.charAt(i) === '\n') {
          line++;
          lineStart = i + 1;
        }
      }
      pos = end + 2;
      continue;
    }

    if (isIdentStart(ch)) {
      const start = pos;
      while (pos < source.length && isIdentPart(at())) {
        pos++;
      }
      tokens.push({ kind: 'ident', text: source.slice(start, pos), line, column });
      continue;
    }

    if (isDigit(ch)) {
      const start = pos;
      if (ch === '0' && (at(1) === 'x' || at(1) === 'X')) {
        pos += 2;
        while (pos < source.length && /[0-9A-Fa-f]/.test(at())) {
          pos++;
        }
        if (pos === start + 2) {
          throw new IdlSyntaxError('Hexadecimal literal has no digits', line, column);
        }
      } else {
        while (pos < source.length && isDigit(at())) {
          pos++;
        }
      }
      tokens.push({ kind: 'number', text: source.slice(start, pos), line, column });
      continue;
    }

    if (ch === '"') {
      const end = source.indexOf('"', pos + 1);
      const newline = source.indexOf('\n', pos + 1);
      if (end === -1 || (newline !== -1 && newline < end)) {
        throw new IdlSyntaxError('Unterminated string literal', line, column);
      }
      tokens.push({ kind: 'string', text: source.slice(pos + 1, end), line, column });
      pos = end + 1;
      continue;
    }

    if (ch === ':' && at(1) === ':') {
      tokens.push({ kind: 'punct', text: '::', line, column });
      pos += 2;
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      tokens.push({ kind: 'punct', text: ch, line, column });
      pos++;
      continue;
    }

    throw new IdlSyntaxError(`Unexpected character '${ch}'`, line, column);
  }

  tokens.push({ kind: 'eof', text: '', line, column: pos - lineStart + 1 });
  return tokens;
}
