import { TokenKind, Token } from './token'
import { LexicalError } from '../errors'

// Character code constants
const CH_0 = 0x30 // '0'
const CH_9 = 0x39 // '9'
const CH_SPACE = 0x20 // ' '
const CH_TAB = 0x09
const CH_NEWLINE = 0x0a // '\n'
const CH_VTAB = 0x0b
const CH_FORMFEED = 0x0c
const CH_RETURN = 0x0d
const CH_PLUS = 0x2b
const CH_MINUS = 0x2d
const CH_STAR = 0x2a // '*'
const CH_SLASH = 0x2f // '/'
const CH_LPAREN = 0x28
const CH_RPAREN = 0x29

const MAX_SAFE = Number.MAX_SAFE_INTEGER

function isDigit(c: number): boolean {
  return c >= CH_0 && c <= CH_9
}

function isWhitespace(c: number): boolean {
  return (
    c === CH_SPACE ||
    c === CH_TAB ||
    c === CH_NEWLINE ||
    c === CH_RETURN ||
    c === CH_FORMFEED ||
    c === CH_VTAB
  )
}

function punctuatorKind(c: number): TokenKind | undefined {
  switch (c) {
    case CH_PLUS:
      return TokenKind.Plus
    case CH_MINUS:
      return TokenKind.Minus
    case CH_STAR:
      return TokenKind.Star
    case CH_SLASH:
      return TokenKind.Slash
    case CH_LPAREN:
      return TokenKind.LParen
    case CH_RPAREN:
      return TokenKind.RParen
    default:
      return undefined
  }
}

/**
 * Pull-based lexer for arithmetic expressions.
 * Each call to nextToken() returns the next token and advances the cursor;
 * once the source is exhausted it keeps returning Eof.
 * Operates on the source string via charCodeAt() for performance.
 */
export class Scanner {
  private src: string
  private len: number
  private pos: number

  constructor(source: string) {
    this.src = source
    this.len = source.length
    this.pos = 0
  }

  /**
   * Eagerly scan the remaining source and return all tokens (including Eof).
   */
  scan(): Token[] {
    const tokens: Token[] = []
    for (;;) {
      const tok = this.nextToken()
      tokens.push(tok)
      if (tok.kind === TokenKind.Eof) {
        break
      }
    }
    return tokens
  }

  nextToken(): Token {
    this.skipWhitespace()

    if (this.pos >= this.len) {
      return { kind: TokenKind.Eof, start: this.len, end: this.len }
    }

    const start = this.pos
    const c = this.ch()

    if (isDigit(c)) {
      return this.lexNumber(start)
    }

    const kind = punctuatorKind(c)
    if (kind !== undefined) {
      this.pos++
      return { kind, start, end: this.pos }
    }

    // Report the whole code point so astral characters are not split.
    const bad = String.fromCodePoint(this.src.codePointAt(start) ?? c)
    throw new LexicalError(`unexpected character '${bad}'`, {
      start,
      end: start + bad.length,
    })
  }

  private ch(): number {
    return this.src.charCodeAt(this.pos)
  }

  private skipWhitespace(): void {
    while (this.pos < this.len && isWhitespace(this.ch())) {
      this.pos++
    }
  }

  // Greedy run of decimal digits. No sign, no fraction, leading zeros kept as-is.
  private lexNumber(start: number): Token {
    while (this.pos < this.len && isDigit(this.ch())) {
      this.pos++
    }
    const text = this.src.slice(start, this.pos)
    const value = Number(text)
    if (value > MAX_SAFE) {
      throw new LexicalError(`integer literal '${text}' is too large`, { start, end: this.pos })
    }
    return { kind: TokenKind.Number, start, end: this.pos, value }
  }
}
