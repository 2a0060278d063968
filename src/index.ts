// Public API for the expression evaluator.
// Usage: import { calculate } from 'calc-expr'

import { Scanner } from './lexer/scanner'
import { Parser } from './parser/parser'
import * as AST from './ast/nodes'
import { normalizeAstLocations } from './ast/locations'
import { evaluate, type EvaluateOptions } from './eval/evaluator'

// Import the grammar to register prototype methods
import './parser/expressions'

export interface ParseOptions {
  // Compute loc { line, column } for each node. Default: false.
  loc?: boolean
  // Stop after the first complete expression instead of requiring end of input. Default: false.
  allowTrailingTokens?: boolean
  // Deepest parenthesis nesting accepted. Default: DEFAULT_MAX_DEPTH (1000).
  maxDepth?: number
}

export type CalculateOptions = ParseOptions & EvaluateOptions

export function parse(source: string, options?: ParseOptions): AST.Expression {
  const includeLoc = options?.loc ?? false
  const allowTrailing = options?.allowTrailingTokens ?? false
  const parser = new Parser(new Scanner(source), { maxDepth: options?.maxDepth })
  const ast = allowTrailing ? parser.parseExpression() : parser.parseProgram()
  normalizeAstLocations(ast, source, includeLoc)
  return ast
}

export function calculate(source: string, options?: CalculateOptions): number {
  return evaluate(parse(source, options), options)
}

// Re-export types for consumers
export { AST }
export type { TokenKind, Token, Span } from './lexer/token'
export { formatToken } from './lexer/token'
export type { EvaluateOptions, DivisionByZero } from './eval/evaluator'
export { evaluate }
export { Scanner } from './lexer/scanner'
export { Parser, DEFAULT_MAX_DEPTH } from './parser/parser'
export type { ParserOptions } from './parser/parser'
export { printAst, renderExpression } from './ast/printer'
export { locate } from './ast/locations'
export { ExpressionError, LexicalError, ParsingError, EvaluationError } from './errors'
