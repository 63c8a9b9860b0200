// Debug rendering of an expression tree. Groupings appear where the source had
// parentheses; no others are inserted, so the output need not re-parse to the
// same tree.

import type { LiteralValue } from '../lexer/token'
import type * as AST from '../ast/nodes'

export function renderLiteral(value: LiteralValue): string {
  if (value === null) return 'nil'
  return String(value)
}

export function render(expr: AST.Expr): string {
  switch (expr.type) {
    case 'Literal':
      return renderLiteral(expr.value)
    case 'Grouping':
      return `( ${render(expr.expression)} )`
    case 'Unary':
      return `${expr.operator.lexeme}${render(expr.expression)}`
    case 'Binary':
      return `${render(expr.left)} ${expr.operator.lexeme} ${render(expr.right)}`
    case 'Condition': {
      const cond = render(expr.expression)
      return `${cond} ? ${render(expr.thenExpression)} : ${render(expr.elseExpression)}`
    }
  }
}
