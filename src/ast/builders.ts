// ---------------------------------------------------------------------------
// Node builders -- factories for AST nodes with source spans
// ---------------------------------------------------------------------------

import type { Span } from '../lexer/token'
import type { BinOp, BinaryExpression, Expression, IntLiteral } from './nodes'

export function intLiteral(value: number, span: Span): IntLiteral {
  return { type: 'IntLiteral', value, start: span.start, end: span.end }
}

// A binary node spans from the start of its left operand to the end of its right one.
export function binaryExpression(
  operator: BinOp,
  left: Expression,
  right: Expression,
): BinaryExpression {
  return { type: 'BinaryExpression', operator, left, right, start: left.start, end: right.end }
}

// Re-span a node, used when a parenthesized expression should cover its parens.
export function withSpan<T extends Expression>(node: T, span: Span): T {
  return { ...node, start: span.start, end: span.end }
}
