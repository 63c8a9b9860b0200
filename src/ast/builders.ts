// ---------------------------------------------------------------------------
// NodeBuilder -- factory for creating AST nodes with source locations
// ---------------------------------------------------------------------------
//
// One builder is created per parse call and dropped with it, so every node of
// a failed parse goes away together with the builder.

import type { LiteralValue, Token } from '../lexer/token'
import type {
  SourceLocation,
  SourcePosition,
  Expr,
  Literal,
  Grouping,
  Unary,
  Binary,
  Condition,
} from './nodes'

export class NodeBuilder {
  // Present only when locations were requested.
  private lineOffsets: number[] | null

  constructor(source?: string) {
    if (source === undefined) {
      this.lineOffsets = null
      return
    }
    this.lineOffsets = [0]
    for (let i = 0; i < source.length; i++) {
      if (source.charCodeAt(i) === 10) {
        // '\n'
        this.lineOffsets.push(i + 1)
      }
    }
  }

  loc(start: number, end: number): SourceLocation | undefined {
    if (this.lineOffsets === null) return undefined
    const startPos = this.positionFor(this.lineOffsets, start)
    const endPos = this.positionFor(this.lineOffsets, end)
    return { start: startPos, end: endPos }
  }

  private positionFor(lineOffsets: number[], offset: number): SourcePosition {
    // Binary search for the line containing this offset
    let lo = 0
    let hi = lineOffsets.length - 1
    while (lo < hi) {
      const mid = (lo + hi + 1) >>> 1
      if (lineOffsets[mid] <= offset) {
        lo = mid
      } else {
        hi = mid - 1
      }
    }
    return { line: lo + 1, column: offset - lineOffsets[lo] }
  }

  private withLoc<T extends Expr>(node: T): T {
    const loc = this.loc(node.start, node.end)
    if (loc !== undefined) node.loc = loc
    return node
  }

  // ---- Expressions ----
  literal(token: Token, value: LiteralValue): Literal {
    return this.withLoc({ type: 'Literal', start: token.start, end: token.end, value })
  }

  // `open` and `close` are the parenthesis tokens.
  grouping(open: Token, expression: Expr, close: Token): Grouping {
    return this.withLoc({ type: 'Grouping', start: open.start, end: close.end, expression })
  }

  unary(operator: Token, expression: Expr): Unary {
    return this.withLoc({
      type: 'Unary',
      start: operator.start,
      end: expression.end,
      operator,
      expression,
    })
  }

  binary(left: Expr, operator: Token, right: Expr): Binary {
    return this.withLoc({
      type: 'Binary',
      start: left.start,
      end: right.end,
      left,
      operator,
      right,
    })
  }

  condition(expression: Expr, thenExpression: Expr, elseExpression: Expr): Condition {
    return this.withLoc({
      type: 'Condition',
      start: expression.start,
      end: elseExpression.end,
      expression,
      thenExpression,
      elseExpression,
    })
  }
}
