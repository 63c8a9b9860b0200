import { TokenKind, Token, LiteralValue, keywordFromString, keywordLiteral } from './token'
import type { ScanError, ScanErrorKind } from '../diagnostics'

// Character code constants
const CH_0 = 0x30 // '0'
const CH_9 = 0x39 // '9'
const CH_A = 0x41 // 'A'
const CH_Z = 0x5a // 'Z'
const CH_a = 0x61 // 'a'
const CH_z = 0x7a // 'z'
const CH_DQUOTE = 0x22 // '"'
const CH_UNDERSCORE = 0x5f // '_'
const CH_DOT = 0x2e // '.'
const CH_SLASH = 0x2f // '/'
const CH_STAR = 0x2a // '*'
const CH_NEWLINE = 0x0a // '\n'
const CH_CR = 0x0d // '\r'
const CH_TAB = 0x09 // '\t'
const CH_SPACE = 0x20 // ' '
const CH_PLUS = 0x2b
const CH_MINUS = 0x2d
const CH_LPAREN = 0x28
const CH_RPAREN = 0x29
const CH_LBRACE = 0x7b
const CH_RBRACE = 0x7d
const CH_SEMICOLON = 0x3b
const CH_COMMA = 0x2c
const CH_QUESTION = 0x3f
const CH_COLON = 0x3a
const CH_BANG = 0x21
const CH_EQUAL = 0x3d
const CH_LESS = 0x3c
const CH_GREATER = 0x3e

function isDigit(c: number): boolean {
  return c >= CH_0 && c <= CH_9
}

function isAlpha(c: number): boolean {
  return (c >= CH_a && c <= CH_z) || (c >= CH_A && c <= CH_Z)
}

function isIdentStart(c: number): boolean {
  return c === CH_UNDERSCORE || isAlpha(c)
}

function isIdentContinue(c: number): boolean {
  return isIdentStart(c) || isDigit(c)
}

export interface ScanResult {
  tokens: Token[]
  errors: ScanError[]
}

/**
 * Kestrel lexer. One left-to-right pass over the source producing tokens with
 * line/column positions. Lexical errors are collected and scanning continues,
 * so a single run reports every problem in the input.
 * Operates on the source string via charCodeAt() for performance.
 */
export class Scanner {
  private src: string
  private len: number
  private start: number
  private pos: number
  private line: number
  private column: number
  // Position of the token being scanned.
  private startLine: number
  private startColumn: number
  private tokens: Token[]
  private errors: ScanError[]

  constructor(source: string) {
    this.src = source
    this.len = source.length
    this.start = 0
    this.pos = 0
    this.line = 1
    this.column = 1
    this.startLine = 1
    this.startColumn = 1
    this.tokens = []
    this.errors = []
  }

  /**
   * Eagerly scan the entire source. The token list always ends with Eof.
   */
  scan(): ScanResult {
    while (this.pos < this.len) {
      this.start = this.pos
      this.startLine = this.line
      this.startColumn = this.column
      this.scanToken()
    }

    this.tokens.push({
      kind: TokenKind.Eof,
      lexeme: '',
      line: this.line,
      column: this.column,
      start: this.pos,
      end: this.pos,
    })
    return { tokens: this.tokens, errors: this.errors }
  }

  private ch(): number {
    return this.src.charCodeAt(this.pos)
  }

  // NaN past the end, which matches no character class.
  private chAt(i: number): number {
    return this.src.charCodeAt(i)
  }

  // Consume one UTF-16 unit, keeping line and column in step.
  private bump(): number {
    const c = this.src.charCodeAt(this.pos)
    this.pos++
    if (c === CH_NEWLINE) {
      this.line++
      this.column = 1
    } else {
      this.column++
    }
    return c
  }

  private consumeIf(c: number): boolean {
    if (this.pos < this.len && this.ch() === c) {
      this.bump()
      return true
    }
    return false
  }

  private scanToken(): void {
    const c = this.bump()

    switch (c) {
      case CH_LPAREN:
        return this.addToken(TokenKind.LeftParen)
      case CH_RPAREN:
        return this.addToken(TokenKind.RightParen)
      case CH_LBRACE:
        return this.addToken(TokenKind.LeftBrace)
      case CH_RBRACE:
        return this.addToken(TokenKind.RightBrace)
      case CH_COMMA:
        return this.addToken(TokenKind.Comma)
      case CH_DOT:
        return this.addToken(TokenKind.Dot)
      case CH_MINUS:
        return this.addToken(TokenKind.Minus)
      case CH_PLUS:
        return this.addToken(TokenKind.Plus)
      case CH_SEMICOLON:
        return this.addToken(TokenKind.Semicolon)
      case CH_STAR:
        return this.addToken(TokenKind.Star)
      case CH_QUESTION:
        return this.addToken(TokenKind.Question)
      case CH_COLON:
        return this.addToken(TokenKind.Colon)
      case CH_BANG:
        return this.addToken(this.consumeIf(CH_EQUAL) ? TokenKind.BangEqual : TokenKind.Bang)
      case CH_EQUAL:
        return this.addToken(this.consumeIf(CH_EQUAL) ? TokenKind.EqualEqual : TokenKind.Equal)
      case CH_LESS:
        return this.addToken(this.consumeIf(CH_EQUAL) ? TokenKind.LessEqual : TokenKind.Less)
      case CH_GREATER:
        return this.addToken(
          this.consumeIf(CH_EQUAL) ? TokenKind.GreaterEqual : TokenKind.Greater,
        )
      case CH_SLASH:
        if (this.consumeIf(CH_SLASH)) return this.lexLineComment()
        if (this.consumeIf(CH_STAR)) return this.lexBlockComment()
        return this.addToken(TokenKind.Slash)
      case CH_DQUOTE:
        return this.lexString()
      case CH_SPACE:
      case CH_TAB:
      case CH_CR:
      case CH_NEWLINE:
        return
    }

    if (isDigit(c)) return this.lexNumber()
    if (isIdentStart(c)) return this.lexIdentifier()
    this.lexUnexpected(c)
  }

  private addToken(kind: TokenKind, literal?: LiteralValue): void {
    const token: Token = {
      kind,
      lexeme: this.src.substring(this.start, this.pos),
      line: this.startLine,
      column: this.startColumn,
      start: this.start,
      end: this.pos,
    }
    this.tokens.push(literal === undefined ? token : { ...token, literal })
  }

  private addError(kind: ScanErrorKind, message: string, lexeme: string): void {
    this.errors.push({
      kind,
      message,
      line: this.startLine,
      column: this.startColumn,
      lexeme,
    })
  }

  // --- Comments ---
  // The newline that ends a line comment is left for the main loop.
  private lexLineComment(): void {
    while (this.pos < this.len && this.ch() !== CH_NEWLINE) {
      this.bump()
    }
    const text = this.src.substring(this.start + 2, this.pos).trimStart()
    this.addToken(TokenKind.Comment, text)
  }

  // Block comments nest: the comment ends when every `/*` has its `*/`.
  private lexBlockComment(): void {
    let depth = 1
    while (this.pos < this.len) {
      const c = this.ch()
      if (c === CH_SLASH && this.chAt(this.pos + 1) === CH_STAR) {
        this.bump()
        this.bump()
        depth++
      } else if (c === CH_STAR && this.chAt(this.pos + 1) === CH_SLASH) {
        this.bump()
        this.bump()
        depth--
        if (depth === 0) {
          const text = this.src.substring(this.start + 2, this.pos - 2).trim()
          this.addToken(TokenKind.Comment, text)
          return
        }
      } else {
        this.bump()
      }
    }
    this.addError('UNTERMINATED_BLOCK_COMMENT', 'Unterminated block comment.', '/*')
  }

  // --- String lexing ---
  // No escape sequences; the string runs to the next quote and may span lines.
  private lexString(): void {
    while (this.pos < this.len && this.ch() !== CH_DQUOTE) {
      this.bump()
    }

    if (this.pos >= this.len) {
      this.addError(
        'UNTERMINATED_STRING',
        'Unterminated string.',
        this.src.substring(this.start, this.pos),
      )
      return
    }

    this.bump() // closing quote
    this.addToken(TokenKind.String, this.src.substring(this.start + 1, this.pos - 1))
  }

  // --- Number lexing ---
  // A trailing `.` belongs to the number only when a digit follows it.
  private lexNumber(): void {
    while (this.pos < this.len && isDigit(this.ch())) {
      this.bump()
    }

    if (this.ch() === CH_DOT && isDigit(this.chAt(this.pos + 1))) {
      this.bump()
      while (this.pos < this.len && isDigit(this.ch())) {
        this.bump()
      }
    }

    const text = this.src.substring(this.start, this.pos)
    const value = Number.parseFloat(text)
    if (!Number.isFinite(value)) {
      this.addError('INVALID_NUMBER', `Invalid number '${text}'.`, text)
      return
    }
    this.addToken(TokenKind.Number, value)
  }

  // --- Identifiers and keywords ---
  private lexIdentifier(): void {
    while (this.pos < this.len && isIdentContinue(this.ch())) {
      this.bump()
    }

    const text = this.src.substring(this.start, this.pos)
    const keyword = keywordFromString(text)
    if (keyword === undefined) {
      this.addToken(TokenKind.Ident)
      return
    }
    this.addToken(keyword, keywordLiteral(keyword))
  }

  // One error per code point: a surrogate pair is consumed whole.
  private lexUnexpected(c: number): void {
    if (c >= 0xd800 && c <= 0xdbff) {
      const low = this.ch()
      if (low >= 0xdc00 && low <= 0xdfff) {
        this.bump()
      }
    }
    const text = this.src.substring(this.start, this.pos)
    this.addError('UNEXPECTED_CHARACTER', `Unexpected character '${text}'.`, text)
  }
}
