/**
 * Token kinds recognized by the Kestrel lexer.
 * Uses a numeric const enum for fast comparison (inlined at compile time).
 */
export const enum TokenKind {
  // Single-character punctuation
  LeftParen = 0,
  RightParen = 1,
  LeftBrace = 2,
  RightBrace = 3,
  Comma = 4,
  Dot = 5,
  Minus = 6,
  Plus = 7,
  Semicolon = 8,
  Star = 9,
  Slash = 10,
  Question = 11,
  Colon = 12,

  // One or two character operators
  Bang = 13,
  BangEqual = 14,
  Equal = 15,
  EqualEqual = 16,
  Less = 17,
  LessEqual = 18,
  Greater = 19,
  GreaterEqual = 20,

  // Literals
  Ident = 21,
  String = 22,
  Number = 23,

  // Keywords
  And = 24,
  Class = 25,
  Else = 26,
  False = 27,
  For = 28,
  Fn = 29,
  If = 30,
  Nil = 31,
  Or = 32,
  Print = 33,
  Return = 34,
  Super = 35,
  This = 36,
  True = 37,
  Var = 38,
  While = 39,

  // Special
  Comment = 40,
  Eof = 41,
}

/**
 * A literal carried by a token. `null` is the nil marker; a token with no
 * literal leaves the field undefined.
 */
export type LiteralValue = number | string | boolean | null

/**
 * A token with its kind and source location.
 * `lexeme` is always `source.slice(start, end)`.
 */
export interface Token {
  readonly kind: TokenKind
  readonly lexeme: string
  readonly literal?: LiteralValue
  readonly line: number // 1-based
  readonly column: number // 1-based
  readonly start: number
  readonly end: number
}

/**
 * Convert an identifier to its keyword kind, if it is one.
 *
 * Uses a two-stage filter to quickly reject non-keywords:
 * Stage 1: reject by length (keywords are 2-6 chars).
 * Stage 2: switch on the first character, then compare the whole text.
 */
export function keywordFromString(s: string): TokenKind | undefined {
  const len = s.length
  if (len < 2 || len > 6) {
    return undefined
  }

  switch (s.charCodeAt(0)) {
    case 0x61: // a
      return s === 'and' ? TokenKind.And : undefined
    case 0x63: // c
      return s === 'class' ? TokenKind.Class : undefined
    case 0x65: // e
      return s === 'else' ? TokenKind.Else : undefined
    case 0x66: // f
      if (s === 'false') return TokenKind.False
      if (s === 'for') return TokenKind.For
      if (s === 'fn') return TokenKind.Fn
      return undefined
    case 0x69: // i
      return s === 'if' ? TokenKind.If : undefined
    case 0x6e: // n
      return s === 'nil' ? TokenKind.Nil : undefined
    case 0x6f: // o
      return s === 'or' ? TokenKind.Or : undefined
    case 0x70: // p
      return s === 'print' ? TokenKind.Print : undefined
    case 0x72: // r
      return s === 'return' ? TokenKind.Return : undefined
    case 0x73: // s
      return s === 'super' ? TokenKind.Super : undefined
    case 0x74: // t
      if (s === 'this') return TokenKind.This
      if (s === 'true') return TokenKind.True
      return undefined
    case 0x76: // v
      return s === 'var' ? TokenKind.Var : undefined
    case 0x77: // w
      return s === 'while' ? TokenKind.While : undefined
    default:
      return undefined
  }
}

/**
 * The literal a keyword token carries. Only `true`, `false` and `nil` have one.
 */
export function keywordLiteral(kind: TokenKind): LiteralValue | undefined {
  switch (kind) {
    case TokenKind.True:
      return true
    case TokenKind.False:
      return false
    case TokenKind.Nil:
      return null
    default:
      return undefined
  }
}

// Upper-snake names, used by the token dump and diagnostics.
export function tokenKindName(kind: TokenKind): string {
  switch (kind) {
    case TokenKind.LeftParen:
      return 'LEFT_PAREN'
    case TokenKind.RightParen:
      return 'RIGHT_PAREN'
    case TokenKind.LeftBrace:
      return 'LEFT_BRACE'
    case TokenKind.RightBrace:
      return 'RIGHT_BRACE'
    case TokenKind.Comma:
      return 'COMMA'
    case TokenKind.Dot:
      return 'DOT'
    case TokenKind.Minus:
      return 'MINUS'
    case TokenKind.Plus:
      return 'PLUS'
    case TokenKind.Semicolon:
      return 'SEMICOLON'
    case TokenKind.Star:
      return 'STAR'
    case TokenKind.Slash:
      return 'SLASH'
    case TokenKind.Question:
      return 'QUESTION'
    case TokenKind.Colon:
      return 'COLON'
    case TokenKind.Bang:
      return 'BANG'
    case TokenKind.BangEqual:
      return 'BANG_EQUAL'
    case TokenKind.Equal:
      return 'EQUAL'
    case TokenKind.EqualEqual:
      return 'EQUAL_EQUAL'
    case TokenKind.Less:
      return 'LESS'
    case TokenKind.LessEqual:
      return 'LESS_EQUAL'
    case TokenKind.Greater:
      return 'GREATER'
    case TokenKind.GreaterEqual:
      return 'GREATER_EQUAL'
    case TokenKind.Ident:
      return 'IDENT'
    case TokenKind.String:
      return 'STRING'
    case TokenKind.Number:
      return 'NUMBER'
    case TokenKind.And:
      return 'AND'
    case TokenKind.Class:
      return 'CLASS'
    case TokenKind.Else:
      return 'ELSE'
    case TokenKind.False:
      return 'FALSE'
    case TokenKind.For:
      return 'FOR'
    case TokenKind.Fn:
      return 'FN'
    case TokenKind.If:
      return 'IF'
    case TokenKind.Nil:
      return 'NIL'
    case TokenKind.Or:
      return 'OR'
    case TokenKind.Print:
      return 'PRINT'
    case TokenKind.Return:
      return 'RETURN'
    case TokenKind.Super:
      return 'SUPER'
    case TokenKind.This:
      return 'THIS'
    case TokenKind.True:
      return 'TRUE'
    case TokenKind.Var:
      return 'VAR'
    case TokenKind.While:
      return 'WHILE'
    case TokenKind.Comment:
      return 'COMMENT'
    case TokenKind.Eof:
      return 'EOF'
  }
}

/**
 * Render a token on one line for the `--tokens` dump: kind, lexeme and literal.
 */
export function formatToken(token: Token): string {
  const literal = token.literal === undefined ? '' : ` ${JSON.stringify(token.literal)}`
  const lexeme = JSON.stringify(token.lexeme)
  return `${token.line}:${token.column} ${tokenKindName(token.kind)} ${lexeme}${literal}`
}
