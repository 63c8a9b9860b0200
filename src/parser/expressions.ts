// Expression parsing: one method per precedence level, loosest first.
//
// Call hierarchy (loosest to tightest binding):
//   parseExpression -> parseComma -> parseTernary -> parseBinaryExpr(Equality)
//   -> ... -> parseBinaryExpr(Factor) -> parseUnary -> parsePrimary

import { Parser } from './parser'
import { Token, TokenKind } from '../lexer/token'
import * as AST from '../ast/nodes'

// Left-associative binary levels (loosest to tightest binding).
const enum PrecedenceLevel {
  Equality,
  Comparison,
  Term,
  Factor,
}

// Extend Parser prototype
declare module './parser' {
  interface Parser {
    parseExpression(): AST.Expr
    parseComma(): AST.Expr
    parseTernary(): AST.Expr
    parseUnary(): AST.Expr
    parsePrimary(): AST.Expr
  }
}

// Operator token kinds accepted at each binary level.
function operatorsAt(level: PrecedenceLevel): TokenKind[] {
  switch (level) {
    case PrecedenceLevel.Equality:
      return [TokenKind.EqualEqual, TokenKind.BangEqual]
    case PrecedenceLevel.Comparison:
      return [TokenKind.Greater, TokenKind.GreaterEqual, TokenKind.Less, TokenKind.LessEqual]
    case PrecedenceLevel.Term:
      return [TokenKind.Plus, TokenKind.Minus]
    case PrecedenceLevel.Factor:
      return [TokenKind.Star, TokenKind.Slash]
  }
}

// === parseExpression ===
Parser.prototype.parseExpression = function (this: Parser): AST.Expr {
  return this.parseComma()
}

// === parseComma ===
// Comma expression (lowest precedence), left-associative.
Parser.prototype.parseComma = function (this: Parser): AST.Expr {
  let lhs = this.parseTernary()
  let op: Token | null
  while ((op = this.match(TokenKind.Comma)) !== null) {
    const rhs = this.parseTernary()
    lhs = this.nodes.binary(lhs, op, rhs)
  }
  return lhs
}

// === parseTernary ===
// cond ? expression : ternary
// The then-branch is a full expression (commas and nested ternaries allowed);
// the else-branch recurses here, which makes the operator right-associative.
// Every recursive path of the grammar passes through here, so this is where
// nesting is counted.
Parser.prototype.parseTernary = function (this: Parser): AST.Expr {
  return this.nested(() => {
    const cond = parseBinaryExpr.call(this, PrecedenceLevel.Equality)
    if (this.match(TokenKind.Question) === null) {
      return cond
    }
    const thenExpr = this.parseExpression()
    this.expect(TokenKind.Colon)
    const elseExpr = this.parseTernary()
    return this.nodes.condition(cond, thenExpr, elseExpr)
  })
}

// === parseBinaryExpr (module-private) ===
// Left-associative binary expression at the given precedence level.
function parseBinaryExpr(this: Parser, level: PrecedenceLevel): AST.Expr {
  const kinds = operatorsAt(level)
  let lhs = parseNextTighter.call(this, level)
  let op: Token | null
  while ((op = this.match(...kinds)) !== null) {
    const rhs = parseNextTighter.call(this, level)
    lhs = this.nodes.binary(lhs, op, rhs)
  }
  return lhs
}

// === parseNextTighter (module-private) ===
function parseNextTighter(this: Parser, level: PrecedenceLevel): AST.Expr {
  switch (level) {
    case PrecedenceLevel.Equality:
      return parseBinaryExpr.call(this, PrecedenceLevel.Comparison)
    case PrecedenceLevel.Comparison:
      return parseBinaryExpr.call(this, PrecedenceLevel.Term)
    case PrecedenceLevel.Term:
      return parseBinaryExpr.call(this, PrecedenceLevel.Factor)
    case PrecedenceLevel.Factor:
      return this.parseUnary()
  }
}

// === parseUnary ===
// Prefix operators are collected, then folded from the innermost out, so
// `!!x` is `!(!x)` however long the run is.
Parser.prototype.parseUnary = function (this: Parser): AST.Expr {
  const ops: Token[] = []
  let op: Token | null
  while ((op = this.match(TokenKind.Minus, TokenKind.Bang)) !== null) {
    ops.push(op)
  }
  let expr = this.parsePrimary()
  for (let i = ops.length - 1; i >= 0; i--) {
    expr = this.nodes.unary(ops[i], expr)
  }
  return expr
}

// === parsePrimary ===
Parser.prototype.parsePrimary = function (this: Parser): AST.Expr {
  switch (this.peek()) {
    case TokenKind.Number:
    case TokenKind.String:
    case TokenKind.True:
    case TokenKind.False:
    case TokenKind.Nil: {
      const tok = this.advance()
      return this.nodes.literal(tok, tok.literal ?? null)
    }
    case TokenKind.LeftParen: {
      const open = this.advance()
      const inner = this.parseExpression()
      const close = this.expect(TokenKind.RightParen)
      return this.nodes.grouping(open, inner, close)
    }
    default:
      return this.expectExpression()
  }
}
