import { NodeBuilder } from '../src/ast/builders'
import { render, renderLiteral } from '../src/printer/printer'
import { Token, TokenKind } from '../src/lexer/token'

function token(kind: TokenKind, lexeme: string, start: number): Token {
  return { kind, lexeme, line: 1, column: start + 1, start, end: start + lexeme.length }
}

describe('render', () => {
  const nodes = new NodeBuilder()

  it('renders each literal kind', () => {
    expect(renderLiteral(3)).toBe('3')
    expect(renderLiteral(0.5)).toBe('0.5')
    expect(renderLiteral('nil')).toBe('nil')
    expect(renderLiteral(null)).toBe('nil')
    expect(renderLiteral(true)).toBe('true')
  })

  it('renders a hand-built tree', () => {
    const one = nodes.literal(token(TokenKind.Number, '1', 0), 1)
    const two = nodes.literal(token(TokenKind.Number, '2', 4), 2)
    const sum = nodes.binary(one, token(TokenKind.Plus, '+', 2), two)
    const group = nodes.grouping(
      token(TokenKind.LeftParen, '(', 0),
      sum,
      token(TokenKind.RightParen, ')', 6),
    )
    const neg = nodes.unary(token(TokenKind.Minus, '-', 0), group)
    const cond = nodes.condition(
      neg,
      nodes.literal(token(TokenKind.String, '"a"', 0), 'a'),
      nodes.literal(token(TokenKind.Nil, 'nil', 0), null),
    )
    expect(render(cond)).toBe('-( 1 + 2 ) ? a : nil')
  })

  it('spans a binary node from its left to its right operand', () => {
    const left = nodes.literal(token(TokenKind.Number, '10', 3), 10)
    const right = nodes.literal(token(TokenKind.Number, '4', 8), 4)
    const diff = nodes.binary(left, token(TokenKind.Minus, '-', 6), right)
    expect([diff.start, diff.end]).toEqual([3, 9])
    expect(diff.loc).toBeUndefined()
  })
})
