// Error records produced by the scanner and the parser, and their one-line
// message form. The scanner collects ScanErrors; the parser stops at the first
// ParseError.

import { Token, TokenKind, tokenKindName } from './lexer/token'

export type ScanErrorKind =
  | 'UNTERMINATED_STRING'
  | 'UNTERMINATED_BLOCK_COMMENT'
  | 'UNEXPECTED_CHARACTER'
  | 'INVALID_NUMBER'

export interface ScanError {
  kind: ScanErrorKind
  message: string
  line: number
  column: number
  // Offending character or lexeme.
  lexeme: string
}

export interface UnexpectedTokenError {
  kind: 'UNEXPECTED_TOKEN'
  expected: TokenKind
  found: Token
  message: string
  line: number
  column: number
}

export interface ExpectedExpressionError {
  kind: 'EXPECTED_EXPRESSION'
  found: Token
  message: string
  line: number
  column: number
}

export interface NestingTooDeepError {
  kind: 'NESTING_TOO_DEEP'
  found: Token
  limit: number
  message: string
  line: number
  column: number
}

export type ParseError = UnexpectedTokenError | ExpectedExpressionError | NestingTooDeepError

/**
 * Thrown inside the parser to unwind the precedence cascade.
 * Parser.parse() catches it and returns the carried ParseError.
 */
export class ParseFailure extends Error {
  readonly error: ParseError

  constructor(error: ParseError) {
    super(error.message)
    this.name = 'ParseFailure'
    this.error = error
  }
}

const PUNCTUATION: Partial<Record<TokenKind, string>> = {
  [TokenKind.LeftParen]: '(',
  [TokenKind.RightParen]: ')',
  [TokenKind.LeftBrace]: '{',
  [TokenKind.RightBrace]: '}',
  [TokenKind.Comma]: ',',
  [TokenKind.Dot]: '.',
  [TokenKind.Minus]: '-',
  [TokenKind.Plus]: '+',
  [TokenKind.Semicolon]: ';',
  [TokenKind.Star]: '*',
  [TokenKind.Slash]: '/',
  [TokenKind.Question]: '?',
  [TokenKind.Colon]: ':',
}

// "')'" for punctuation, "end of input" for EOF, otherwise the kind name.
function describeKind(kind: TokenKind): string {
  if (kind === TokenKind.Eof) return 'end of input'
  const text = PUNCTUATION[kind]
  return text === undefined ? tokenKindName(kind) : `'${text}'`
}

function describeToken(token: Token): string {
  return token.kind === TokenKind.Eof ? 'end of input' : `'${token.lexeme}'`
}

export function unexpectedToken(expected: TokenKind, found: Token): UnexpectedTokenError {
  return {
    kind: 'UNEXPECTED_TOKEN',
    expected,
    found,
    message: `expected ${describeKind(expected)} but found ${describeToken(found)}`,
    line: found.line,
    column: found.column,
  }
}

export function expectedExpression(found: Token): ExpectedExpressionError {
  return {
    kind: 'EXPECTED_EXPRESSION',
    found,
    message: `expected expression but found ${describeToken(found)}`,
    line: found.line,
    column: found.column,
  }
}

export function nestingTooDeep(found: Token, limit: number): NestingTooDeepError {
  return {
    kind: 'NESTING_TOO_DEEP',
    found,
    limit,
    message: `expression nested too deeply (limit ${limit})`,
    line: found.line,
    column: found.column,
  }
}

export function formatScanError(error: ScanError): string {
  return `[line ${error.line}:${error.column}] Error: ${error.message}`
}

export function formatParseError(error: ParseError): string {
  const where = error.found.kind === TokenKind.Eof ? 'at end' : `at '${error.found.lexeme}'`
  return `[line ${error.line}:${error.column}] Error ${where}: ${error.message}`
}
