// Core Parser class with the lookahead buffer and token helpers.
// Grammar methods are added to the prototype by expressions.ts.

import { Token, TokenKind, Span, tokenKindText, tokenText } from '../lexer/token'
import { Scanner } from '../lexer/scanner'
import { ParsingError } from '../errors'

// Deepest parenthesis nesting accepted. Recursion in the parser and in the
// right-operand walks of the evaluator and printer is bounded by it.
export const DEFAULT_MAX_DEPTH = 1000

export interface ParserOptions {
  maxDepth?: number
}

export class Parser {
  private scanner: Scanner
  // One token of lookahead; the only token the parser ever holds.
  current: Token
  // Open parentheses enclosing the current position.
  depth: number
  maxDepth: number

  constructor(scanner: Scanner, options?: ParserOptions) {
    this.scanner = scanner
    this.depth = 0
    this.maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH
    this.current = scanner.nextToken()
  }

  // --- Token access helpers ---
  atEof(): boolean {
    return this.current.kind === TokenKind.Eof
  }

  peek(): TokenKind {
    return this.current.kind
  }

  peekSpan(): Span {
    return { start: this.current.start, end: this.current.end }
  }

  /**
   * Consume the lookahead if it is of the expected kind and pull the next
   * token from the scanner. This is the only place tokens are consumed.
   */
  eat(expected: TokenKind): Token {
    const tok = this.current
    if (tok.kind !== expected) {
      this.error(`expected '${tokenKindText(expected)}' before '${tokenText(tok)}'`)
    }
    this.current = this.scanner.nextToken()
    return tok
  }

  error(message: string): never {
    throw new ParsingError(message, this.peekSpan())
  }
}
