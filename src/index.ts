// Public API for the Kestrel expression front end.
// Usage: import { parseExpression, render } from 'kestrel-parser';

import { Scanner, ScanResult } from './lexer/scanner'
import { Token } from './lexer/token'
import { Parser } from './parser/parser'
import * as AST from './ast/nodes'
import type { ParseError, ScanError } from './diagnostics'
import type { Result } from './result'

// Import parser extensions to register prototype methods
import './parser/expressions'

export interface ParseOptions {
  // Compute loc { line, column } for each node. Default: false.
  loc?: boolean
}

export interface SourceParseResult {
  tokens: Token[]
  scanErrors: ScanError[]
  // Undefined when scanning reported errors; the parser does not run then.
  result?: Result<AST.Expr, ParseError>
}

export function scan(source: string): ScanResult {
  return new Scanner(source).scan()
}

export function parse(tokens: readonly Token[]): Result<AST.Expr, ParseError> {
  return new Parser(tokens).parse()
}

/**
 * Scan and parse one source text. One independent cycle: nothing is shared
 * with earlier calls.
 */
export function parseExpression(source: string, options?: ParseOptions): SourceParseResult {
  const includeLoc = options?.loc ?? false
  const { tokens, errors } = scan(source)
  if (errors.length > 0) {
    return { tokens, scanErrors: errors }
  }
  const parser = new Parser(tokens, includeLoc ? { source } : undefined)
  return { tokens, scanErrors: errors, result: parser.parse() }
}

// Re-export types for consumers
export { AST }
export { tokenKindName, formatToken } from './lexer/token'
export type { TokenKind, Token, LiteralValue } from './lexer/token'
export { Scanner } from './lexer/scanner'
export type { ScanResult } from './lexer/scanner'
export { Parser, MAX_NESTING_DEPTH } from './parser/parser'
export { render } from './printer/printer'
export { formatScanError, formatParseError, ParseFailure } from './diagnostics'
export type {
  ScanError,
  ScanErrorKind,
  ParseError,
  UnexpectedTokenError,
  ExpectedExpressionError,
  NestingTooDeepError,
} from './diagnostics'
export type { Result, Ok, Err } from './result'
