// ---------------------------------------------------------------------------
// Kestrel AST Node Types
// ---------------------------------------------------------------------------

import type { LiteralValue, Token } from '../lexer/token'

// ---- Source Location ----
export interface SourcePosition {
  line: number // 1-based
  column: number // 0-based
}

export interface SourceLocation {
  start: SourcePosition
  end: SourcePosition
}

export interface BaseNode {
  type: string
  start: number
  end: number
  loc?: SourceLocation
}

// ---- Expressions ----
export type Expr = Literal | Grouping | Unary | Binary | Condition

export interface Literal extends BaseNode {
  type: 'Literal'
  value: LiteralValue
}

// Kept as its own node so `(a)` and `a` stay distinguishable.
export interface Grouping extends BaseNode {
  type: 'Grouping'
  expression: Expr
}

// operator: `-` or `!`
export interface Unary extends BaseNode {
  type: 'Unary'
  operator: Token
  expression: Expr
}

// operator: arithmetic, comparison, equality or `,`
export interface Binary extends BaseNode {
  type: 'Binary'
  left: Expr
  operator: Token
  right: Expr
}

// cond ? then : else
export interface Condition extends BaseNode {
  type: 'Condition'
  expression: Expr
  thenExpression: Expr
  elseExpression: Expr
}
