/**
 * Token kinds recognized by the expression scanner.
 * Uses a numeric const enum for fast comparison (inlined at compile time).
 */
export const enum TokenKind {
  // Literals
  Number = 0,

  // Operators
  Plus = 1,
  Minus = 2,
  Star = 3,
  Slash = 4,

  // Punctuation
  LParen = 5,
  RParen = 6,

  // Special
  Eof = 7,
}

/**
 * Source span (offsets into the source string).
 */
export interface Span {
  start: number
  end: number
}

export function dummySpan(): Span {
  return { start: 0, end: 0 }
}

/**
 * A token with its kind and source location.
 * Only Number tokens carry a value.
 */
export interface Token {
  readonly kind: TokenKind
  readonly start: number
  readonly end: number
  readonly value?: number
}

const KIND_NAMES: Record<TokenKind, string> = {
  [TokenKind.Number]: 'Number',
  [TokenKind.Plus]: 'Plus',
  [TokenKind.Minus]: 'Minus',
  [TokenKind.Star]: 'Star',
  [TokenKind.Slash]: 'Slash',
  [TokenKind.LParen]: 'LParen',
  [TokenKind.RParen]: 'RParen',
  [TokenKind.Eof]: 'Eof',
}

export function tokenKindName(kind: TokenKind): string {
  return KIND_NAMES[kind]
}

/**
 * How a token kind is spelled in diagnostics: the punctuator itself,
 * or a word for kinds that have no fixed spelling.
 */
export function tokenKindText(kind: TokenKind): string {
  switch (kind) {
    case TokenKind.Number:
      return 'number'
    case TokenKind.Plus:
      return '+'
    case TokenKind.Minus:
      return '-'
    case TokenKind.Star:
      return '*'
    case TokenKind.Slash:
      return '/'
    case TokenKind.LParen:
      return '('
    case TokenKind.RParen:
      return ')'
    case TokenKind.Eof:
      return 'end of input'
  }
}

// Like tokenKindText, but shows the literal for numbers.
export function tokenText(token: Token): string {
  if (token.kind === TokenKind.Number && token.value !== undefined) {
    return String(token.value)
  }
  return tokenKindText(token.kind)
}

// Debug form, e.g. `Token(Number, 42)` or `Token(Plus, '+')`.
export function formatToken(token: Token): string {
  const name = tokenKindName(token.kind)
  if (token.kind === TokenKind.Number) {
    return `Token(${name}, ${token.value ?? 'undefined'})`
  }
  if (token.kind === TokenKind.Eof) {
    return `Token(${name})`
  }
  return `Token(${name}, '${tokenKindText(token.kind)}')`
}
