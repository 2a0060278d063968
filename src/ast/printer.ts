// Text renderings of an expression tree.

import { BINOP_SYMBOLS, binOpPrecedence } from './nodes'
import type { BinaryExpression, Expression } from './nodes'

/**
 * Indented dump of the tree, one node per line:
 *
 *   BinaryExpression Add [0, 5]
 *     IntLiteral 1 [0, 1]
 *     IntLiteral 2 [4, 5]
 */
export function printAst(node: Expression): string {
  const lines: string[] = []
  // Explicit stack: a left-deep chain is as deep as it is long.
  const stack: [Expression, number][] = [[node, 0]]
  for (let item = stack.pop(); item !== undefined; item = stack.pop()) {
    const [current, depth] = item
    const indent = '  '.repeat(depth)
    const range = `[${current.start}, ${current.end}]`
    switch (current.type) {
      case 'IntLiteral':
        lines.push(`${indent}IntLiteral ${current.value} ${range}`)
        break
      case 'BinaryExpression':
        lines.push(`${indent}BinaryExpression ${current.operator} ${range}`)
        stack.push([current.right, depth + 1], [current.left, depth + 1])
        break
    }
  }
  return lines.join('\n')
}

/**
 * Canonical source text: tokens separated by single spaces, parentheses
 * only where the tree cannot be expressed without them.
 */
export function renderExpression(node: Expression): string {
  // Walk the left spine with a loop; only right operands recurse.
  const spine: BinaryExpression[] = []
  let leaf: Expression = node
  while (leaf.type === 'BinaryExpression') {
    spine.push(leaf)
    leaf = leaf.left
  }

  let text = String(leaf.value)
  for (let i = spine.length - 1; i >= 0; i--) {
    const bin = spine[i]
    const prec = binOpPrecedence(bin.operator)
    if (bin.left.type === 'BinaryExpression' && binOpPrecedence(bin.left.operator) < prec) {
      text = `( ${text} )`
    }
    const right = renderOperand(bin.right, prec)
    text = `${text} ${BINOP_SYMBOLS[bin.operator]} ${right}`
  }
  return text
}

// Operators are left-associative, so a right operand of equal precedence needs parens.
function renderOperand(node: Expression, parentPrec: number): string {
  const text = renderExpression(node)
  if (node.type === 'BinaryExpression' && binOpPrecedence(node.operator) <= parentPrec) {
    return `( ${text} )`
  }
  return text
}
