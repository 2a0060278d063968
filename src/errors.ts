import type { Span } from './lexer/token'

/**
 * Base class for every failure raised while scanning, parsing or evaluating.
 * `start`/`end` are offsets into the source; evaluation errors use the span
 * of the node being evaluated.
 */
export class ExpressionError extends Error {
  readonly start: number
  readonly end: number

  constructor(message: string, span: Span) {
    super(message)
    this.name = 'ExpressionError'
    this.start = span.start
    this.end = span.end
  }
}

// Unsupported character, or an integer literal too large to represent.
export class LexicalError extends ExpressionError {
  constructor(message: string, span: Span) {
    super(message, span)
    this.name = 'LexicalError'
  }
}

// Token stream does not match the grammar.
export class ParsingError extends ExpressionError {
  constructor(message: string, span: Span) {
    super(message, span)
    this.name = 'ParsingError'
  }
}

export class EvaluationError extends ExpressionError {
  constructor(message: string, span: Span) {
    super(message, span)
    this.name = 'EvaluationError'
  }
}
