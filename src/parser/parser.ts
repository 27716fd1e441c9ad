/**
 * Recursive-descent parser for `.idl` units.
 *
 * ```
 * unit        := 'package' pkgVersion ';' import* (annotated decl | interface)*
 * import      := 'import' qualified ';'
 * decl        := struct | union | enum | typedef
 * interface   := 'interface' IDENT ('extends' qualified)? '{' (annotated decl | method)* '}' ';'
 * method      := 'oneway'? IDENT '(' params ')' ('generates' '(' params ')')? ';'
 * type        := SCALAR | 'vec' '<' type '>' | qualified
 * ```
 *
 * @packageDocumentation
 */

import { tokenize, type Token } from './lexer.js';
import {
  IdlSyntaxError,
  SCALAR_NAMES,
  type AnnotationSyntax,
  type CompoundSyntax,
  type DeclarationSyntax,
  type EnumSyntax,
  type EnumValueSyntax,
  type FieldSyntax,
  type ImportSyntax,
  type InterfaceSyntax,
  type MethodSyntax,
  type ScalarName,
  type TypeSyntax,
  type TypedefSyntax,
  type UnitSyntax,
} from './types.js';

const DECLARATION_KEYWORDS = new Set(['struct', 'union', 'enum', 'typedef']);

function describe(token: Token): string {
  return token.kind === 'eof' ? 'end of file' : token.text;
}

function isScalarName(text: string): text is ScalarName {
  return SCALAR_NAMES.some((name) => name === text);
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  parseUnit(): UnitSyntax {
    this.expectKeyword('package');
    const pkg = this.parseQualifiedName();
    if (!pkg.includes('@') || pkg.includes('::')) {
      this.fail(`Expected 'package@major.minor', got '${pkg}'`);
    }
    this.expect(';');

    const imports: ImportSyntax[] = [];
    while (this.peekKeyword('import')) {
      const line = this.next().line;
      const target = this.parseQualifiedName();
      if (!target.includes('@')) {
        this.fail(`Import '${target}' must name a package version`);
      }
      this.expect(';');
      imports.push({ target, line });
    }

    const declarations: DeclarationSyntax[] = [];
    let iface: InterfaceSyntax | undefined;
    while (this.peek().kind !== 'eof') {
      const annotations = this.parseAnnotations();
      if (this.peekKeyword('interface')) {
        if (iface !== undefined) {
          this.fail('A unit can declare only one interface');
        }
        iface = this.parseInterface(annotations);
      } else if (this.peekKeyword('import')) {
        this.fail('Imports must come before declarations');
      } else {
        declarations.push(this.parseDeclaration(annotations));
      }
    }

    return iface === undefined
      ? { package: pkg, imports, declarations }
      : { package: pkg, imports, declarations, interface: iface };
  }

  private parseInterface(annotations: AnnotationSyntax[]): InterfaceSyntax {
    const line = this.expectKeyword('interface').line;
    const name = this.expectIdent();
    let base: string | undefined;
    if (this.peekKeyword('extends')) {
      this.next();
      base = this.parseQualifiedName();
    }
    this.expect('{');

    const declarations: DeclarationSyntax[] = [];
    const methods: MethodSyntax[] = [];
    while (!this.peekPunct('}')) {
      const memberAnnotations = this.parseAnnotations();
      if (DECLARATION_KEYWORDS.has(this.peek().text) && this.peek().kind === 'ident') {
        declarations.push(this.parseDeclaration(memberAnnotations));
      } else {
        methods.push(this.parseMethod());
      }
    }
    this.expect('}');
    this.expect(';');

    const result = { name, declarations, methods, annotations, line };
    return base === undefined ? result : { ...result, extends: base };
  }

  private parseMethod(): MethodSyntax {
    const line = this.peek().line;
    let oneway = false;
    if (this.peekKeyword('oneway')) {
      this.next();
      oneway = true;
    }
    const name = this.expectIdent();
    this.expect('(');
    const params = this.parseParams();
    this.expect(')');

    let results: FieldSyntax[] = [];
    if (this.peekKeyword('generates')) {
      if (oneway) {
        this.fail(`Oneway method '${name}' cannot generate results`);
      }
      this.next();
      this.expect('(');
      results = this.parseParams();
      this.expect(')');
    }
    this.expect(';');
    return { name, oneway, params, results, line };
  }

  private parseParams(): FieldSyntax[] {
    const params: FieldSyntax[] = [];
    if (this.peekPunct(')')) {
      return params;
    }
    do {
      const type = this.parseType();
      params.push({ name: this.expectIdent(), type });
    } while (this.accept(','));
    return params;
  }

  private parseDeclaration(annotations: AnnotationSyntax[]): DeclarationSyntax {
    const token = this.peek();
    switch (token.kind === 'ident' ? token.text : '') {
      case 'struct':
      case 'union':
        return this.parseCompound(annotations);
      case 'enum':
        return this.parseEnum(annotations);
      case 'typedef':
        return this.parseTypedef(annotations);
      default:
        return this.fail(`Expected a declaration, got '${describe(token)}'`);
    }
  }

  private parseCompound(annotations: AnnotationSyntax[]): CompoundSyntax {
    const keyword = this.next();
    const kind = keyword.text === 'union' ? 'union' : 'struct';
    const name = this.expectIdent();
    this.expect('{');

    const fields: FieldSyntax[] = [];
    const nested: DeclarationSyntax[] = [];
    while (!this.peekPunct('}')) {
      const fieldAnnotations = this.parseAnnotations();
      if (this.peek().kind === 'ident' && DECLARATION_KEYWORDS.has(this.peek().text)) {
        nested.push(this.parseDeclaration(fieldAnnotations));
        continue;
      }
      const type = this.parseType();
      fields.push({ name: this.expectIdent(), type });
      this.expect(';');
    }
    this.expect('}');
    this.expect(';');
    return { kind, name, fields, nested, annotations, line: keyword.line };
  }

  private parseEnum(annotations: AnnotationSyntax[]): EnumSyntax {
    const line = this.next().line;
    const name = this.expectIdent();
    this.expect(':');
    const storage = this.parseType();
    this.expect('{');

    const values: EnumValueSyntax[] = [];
    while (!this.peekPunct('}')) {
      const valueName = this.expectIdent();
      if (this.accept('=')) {
        values.push({ name: valueName, value: this.parseInteger() });
      } else {
        values.push({ name: valueName });
      }
      if (!this.accept(',')) {
        break;
      }
    }
    this.expect('}');
    this.expect(';');
    return { kind: 'enum', name, storage, values, annotations, line };
  }

  private parseTypedef(annotations: AnnotationSyntax[]): TypedefSyntax {
    const line = this.next().line;
    const target = this.parseType();
    const name = this.expectIdent();
    this.expect(';');
    return { kind: 'typedef', name, target, annotations, line };
  }

  private parseType(): TypeSyntax {
    const token = this.peek();
    if (token.kind !== 'ident') {
      return this.fail(`Expected a type, got '${describe(token)}'`);
    }
    if (isScalarName(token.text)) {
      this.next();
      return { kind: 'scalar', name: token.text };
    }
    if (token.text === 'vec') {
      this.next();
      this.expect('<');
      const element = this.parseType();
      this.expect('>');
      return { kind: 'vec', element };
    }
    return { kind: 'named', name: this.parseQualifiedName(), line: token.line };
  }

  private parseInteger(): bigint {
    const negative = this.accept('-');
    const token = this.peek();
    if (token.kind !== 'number') {
      return this.fail(`Expected an integer, got '${describe(token)}'`);
    }
    this.next();
    const value = BigInt(token.text);
    return negative ? -value : value;
  }

  private parseAnnotations(): AnnotationSyntax[] {
    const annotations: AnnotationSyntax[] = [];
    while (this.peekPunct('@')) {
      this.next();
      const name = this.expectIdent();
      const params = new Map<string, string>();
      if (this.accept('(')) {
        if (!this.peekPunct(')')) {
          do {
            const key = this.expectIdent();
            this.expect('=');
            const value = this.peek();
            if (value.kind === 'eof' || value.kind === 'punct') {
              this.fail(`Expected a value for annotation parameter '${key}'`);
            }
            this.next();
            params.set(key, value.text);
          } while (this.accept(','));
        }
        this.expect(')');
      }
      annotations.push({ name, params: Object.fromEntries(params) });
    }
    return annotations;
  }

  /**
   * `a.b.c`, `a.b@1.0`, `a.b@1.0::Name.Nested`.
   */
  private parseQualifiedName(): string {
    let text = this.expectIdent();
    while (this.peekPunct('.')) {
      this.next();
      text += '.' + this.expectIdent();
    }
    if (!this.peekPunct('@')) {
      return text;
    }
    this.next();
    const major = this.expectNumber();
    this.expect('.');
    const minor = this.expectNumber();
    text += `@${major}.${minor}`;
    if (this.accept('::')) {
      text += '::' + this.expectIdent();
      while (this.peekPunct('.')) {
        this.next();
        text += '.' + this.expectIdent();
      }
    }
    return text;
  }

  private peek(): Token {
    const token = this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1];
    if (token === undefined) {
      throw new IdlSyntaxError('Empty token stream', 1, 1);
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') {
      this.pos++;
    }
    return token;
  }

  private peekPunct(text: string): boolean {
    const token = this.peek();
    return token.kind === 'punct' && token.text === text;
  }

  private peekKeyword(text: string): boolean {
    const token = this.peek();
    return token.kind === 'ident' && token.text === text;
  }

  private accept(text: string): boolean {
    if (this.peekPunct(text)) {
      this.next();
      return true;
    }
    return false;
  }

  private expect(text: string): Token {
    const token = this.peek();
    if (token.kind !== 'punct' || token.text !== text) {
      this.fail(`Expected '${text}', got '${describe(token)}'`);
    }
    return this.next();
  }

  private expectKeyword(text: string): Token {
    if (!this.peekKeyword(text)) {
      this.fail(`Expected '${text}', got '${describe(this.peek())}'`);
    }
    return this.next();
  }

  private expectIdent(): string {
    const token = this.peek();
    if (token.kind !== 'ident') {
      this.fail(`Expected an identifier, got '${describe(token)}'`);
    }
    return this.next().text;
  }

  private expectNumber(): string {
    const token = this.peek();
    if (token.kind !== 'number') {
      this.fail(`Expected a version number, got '${describe(token)}'`);
    }
    return this.next().text;
  }

  private fail(message: string): never {
    const token = this.peek();
    throw new IdlSyntaxError(message, token.line, token.column);
  }
}

/**
 * Parses one `.idl` source file.
 *
 * @param source - The file contents.
 * @returns The unit's syntax tree.
 * @throws IdlSyntaxError on malformed input.
 */
export function parseUnit(source: string): UnitSyntax {
  return new Parser(tokenize(source)).parseUnit();
}
