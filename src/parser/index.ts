/**
 * Reader for `.idl` interface-definition units.
 *
 * @packageDocumentation
 */

export { tokenize } from './lexer.js';
export type { Token, TokenKind } from './lexer.js';
export { parseUnit } from './parser.js';
export { IdlSyntaxError, SCALAR_NAMES } from './types.js';
export type {
  AnnotationSyntax,
  CompoundSyntax,
  DeclarationSyntax,
  EnumSyntax,
  EnumValueSyntax,
  FieldSyntax,
  ImportSyntax,
  InterfaceSyntax,
  MethodSyntax,
  ScalarName,
  TypeSyntax,
  TypedefSyntax,
  UnitParser,
  UnitSyntax,
} from './types.js';
