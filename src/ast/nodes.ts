// ---------------------------------------------------------------------------
// Expression AST node types
// ---------------------------------------------------------------------------

// ---- Source Location ----
export interface SourcePosition {
  line: number // 1-based
  column: number // 0-based
}

export interface SourceLocation {
  start: SourcePosition
  end: SourcePosition
}

export interface BaseNode {
  readonly type: string
  readonly start: number
  readonly end: number
  // Only present when parsed with { loc: true }.
  loc?: SourceLocation
}

// ---- Operators ----
export type BinOp = 'Add' | 'Sub' | 'Mul' | 'Div'

// ---- Expressions ----
export type Expression = IntLiteral | BinaryExpression

export interface IntLiteral extends BaseNode {
  readonly type: 'IntLiteral'
  readonly value: number
}

export interface BinaryExpression extends BaseNode {
  readonly type: 'BinaryExpression'
  readonly operator: BinOp
  readonly left: Expression
  readonly right: Expression
}

export const BINOP_SYMBOLS: Readonly<Record<BinOp, string>> = {
  Add: '+',
  Sub: '-',
  Mul: '*',
  Div: '/',
}

// Additive operators bind looser than multiplicative ones.
export function binOpPrecedence(op: BinOp): number {
  switch (op) {
    case 'Add':
    case 'Sub':
      return 1
    case 'Mul':
    case 'Div':
      return 2
  }
}
