// Core Parser class with token helpers, error unwinding and recovery.
// Grammar methods are added to the prototype by expressions.ts.

import { Token, TokenKind } from '../lexer/token'
import { NodeBuilder } from '../ast/builders'
import * as AST from '../ast/nodes'
import {
  ParseError,
  ParseFailure,
  expectedExpression,
  nestingTooDeep,
  unexpectedToken,
} from '../diagnostics'
import { Result, ok, err } from '../result'

export interface ParseOptions {
  // Source the tokens were scanned from. When given, every node gets a
  // `loc` with { line, column } positions.
  source?: string
}

// Nested groupings and ternary branches each open one level. Past this the
// parse fails instead of exhausting the call stack.
export const MAX_NESTING_DEPTH = 256

export class Parser {
  tokens: Token[]
  pos: number
  depth: number
  nodes: NodeBuilder

  constructor(tokens: readonly Token[], options?: ParseOptions) {
    // Comments carry no grammar.
    this.tokens = tokens.filter((t) => t.kind !== TokenKind.Comment)
    this.pos = 0
    this.depth = 0
    this.nodes = new NodeBuilder(options?.source)
  }

  /**
   * Parse one expression spanning the whole token sequence. Stops at the
   * first error; no partial tree is returned.
   */
  parse(): Result<AST.Expr, ParseError> {
    try {
      const expr = this.parseExpression()
      this.expect(TokenKind.Eof)
      return ok(expr)
    } catch (e) {
      if (e instanceof ParseFailure) {
        return err(e.error)
      }
      throw e
    }
  }

  // --- Token access helpers ---
  atEof(): boolean {
    return this.peek() === TokenKind.Eof
  }

  peek(): TokenKind {
    return this.peekToken().kind
  }

  // Past the end this is the trailing Eof, or a synthetic one if the
  // sequence has none.
  peekToken(): Token {
    if (this.pos < this.tokens.length) {
      return this.tokens[this.pos]
    }
    return this.eofToken()
  }

  // Undefined before the first advance.
  previous(): Token | undefined {
    return this.pos > 0 ? this.tokens[this.pos - 1] : undefined
  }

  advance(): Token {
    const tok = this.peekToken()
    if (tok.kind !== TokenKind.Eof) {
      this.pos++
    }
    return tok
  }

  check(kind: TokenKind): boolean {
    return this.peek() === kind
  }

  // Consume the next token if its kind is one of `kinds`.
  match(...kinds: TokenKind[]): Token | null {
    for (const kind of kinds) {
      if (this.check(kind)) {
        return this.advance()
      }
    }
    return null
  }

  expect(expected: TokenKind): Token {
    if (this.check(expected)) {
      return this.advance()
    }
    throw this.fail(unexpectedToken(expected, this.peekToken()))
  }

  expectExpression(): never {
    throw this.fail(expectedExpression(this.peekToken()))
  }

  // Run `parse` one nesting level deeper.
  nested<T>(parse: () => T): T {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw this.fail(nestingTooDeep(this.peekToken(), MAX_NESTING_DEPTH))
    }
    this.depth++
    try {
      return parse()
    } finally {
      this.depth--
    }
  }

  fail(error: ParseError): ParseFailure {
    return new ParseFailure(error)
  }

  /**
   * Discard tokens up to a likely unit boundary after an error: just past a
   * `;`, or before a keyword that starts a statement, or at Eof.
   * Always consumes the erroring token first.
   */
  synchronize(): void {
    this.advance()

    while (!this.atEof()) {
      if (this.previous()?.kind === TokenKind.Semicolon) return

      switch (this.peek()) {
        case TokenKind.Class:
        case TokenKind.For:
        case TokenKind.Fn:
        case TokenKind.If:
        case TokenKind.Print:
        case TokenKind.Return:
        case TokenKind.Var:
        case TokenKind.While:
          return
      }

      this.advance()
    }
  }

  private eofToken(): Token {
    const last = this.tokens[this.tokens.length - 1]
    if (last === undefined) {
      return { kind: TokenKind.Eof, lexeme: '', line: 1, column: 1, start: 0, end: 0 }
    }
    // Just past the last character, which may sit on a later line when the
    // lexeme spans lines.
    const newlines = last.lexeme.split('\n').length - 1
    const lastBreak = last.lexeme.lastIndexOf('\n')
    return {
      kind: TokenKind.Eof,
      lexeme: '',
      line: last.line + newlines,
      column: lastBreak < 0 ? last.column + last.lexeme.length : last.lexeme.length - lastBreak,
      start: last.end,
      end: last.end,
    }
  }
}
