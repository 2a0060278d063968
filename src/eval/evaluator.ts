// Tree-walking evaluator over the expression AST.

import * as AST from '../ast/nodes'
import { EvaluationError } from '../errors'
import { dummySpan } from '../lexer/token'

export type DivisionByZero = 'ieee' | 'throw'

export interface EvaluateOptions {
  // 'ieee' returns Infinity/-Infinity/NaN; 'throw' raises EvaluationError. Default: 'ieee'.
  divisionByZero?: DivisionByZero
}

export function evaluate(node: AST.Expression, options?: EvaluateOptions): number {
  const divisionByZero = options?.divisionByZero ?? 'ieee'
  return evalNode(node, divisionByZero)
}

// Left-deep chains such as `1 + 2 + 3 + ...` are as deep as they are long, so
// the left spine is walked with a loop. Only right operands recurse, and those
// are bounded by parenthesis nesting.
function evalNode(root: AST.Expression, divisionByZero: DivisionByZero): number {
  const spine: AST.BinaryExpression[] = []
  let node: AST.Expression = root
  while (node.type === 'BinaryExpression') {
    spine.push(node)
    node = node.left
  }

  let acc = evalLeaf(node, divisionByZero)
  for (let i = spine.length - 1; i >= 0; i--) {
    const bin = spine[i]
    const rhs = evalNode(bin.right, divisionByZero)
    acc = applyBinOp(bin, acc, rhs, divisionByZero)
  }
  return acc
}

function evalLeaf(node: AST.Expression, divisionByZero: DivisionByZero): number {
  switch (node.type) {
    case 'IntLiteral':
      return node.value
    case 'BinaryExpression':
      return evalNode(node, divisionByZero)
    default:
      return unsupportedNode(node)
  }
}

function applyBinOp(
  node: AST.BinaryExpression,
  lhs: number,
  rhs: number,
  divisionByZero: DivisionByZero,
): number {
  switch (node.operator) {
    case 'Add':
      return lhs + rhs
    case 'Sub':
      return lhs - rhs
    case 'Mul':
      return lhs * rhs
    case 'Div':
      if (rhs === 0 && divisionByZero === 'throw') {
        throw new EvaluationError('division by zero', node.right)
      }
      return lhs / rhs
    default:
      return unsupportedOperator(node.operator, node)
  }
}

// Reachable only from untyped callers handing in foreign objects.
function unsupportedNode(node: never): never {
  const value: unknown = node
  let type = 'unknown'
  let span = dummySpan()
  if (typeof value === 'object' && value !== null) {
    if ('type' in value) type = String(value.type)
    if (
      'start' in value &&
      'end' in value &&
      typeof value.start === 'number' &&
      typeof value.end === 'number'
    ) {
      span = { start: value.start, end: value.end }
    }
  }
  throw new EvaluationError(`unsupported node type '${type}'`, span)
}

function unsupportedOperator(op: never, node: AST.BinaryExpression): never {
  throw new EvaluationError(`unsupported operator '${String(op)}'`, node)
}
