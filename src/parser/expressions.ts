// Expression parsing: one function per precedence layer.
//
// Call hierarchy (loosest to tightest binding):
//   parseExpression -> parseTerm -> parseFactor
//
//   expression := term (('+' | '-') term)*
//   term       := factor (('*' | '/') factor)*
//   factor     := NUMBER | '(' expression ')'

import { Parser } from './parser'
import { TokenKind, tokenText } from '../lexer/token'
import { binaryExpression, intLiteral, withSpan } from '../ast/builders'
import * as AST from '../ast/nodes'

// Extend Parser prototype
declare module './parser' {
  interface Parser {
    parseExpression(): AST.Expression
    parseTerm(): AST.Expression
    parseFactor(): AST.Expression
    parseProgram(): AST.Expression
  }
}

// === operator tables (module-private) ===
function additiveOp(token: TokenKind): AST.BinOp | null {
  if (token === TokenKind.Plus) return 'Add'
  if (token === TokenKind.Minus) return 'Sub'
  return null
}

function multiplicativeOp(token: TokenKind): AST.BinOp | null {
  if (token === TokenKind.Star) return 'Mul'
  if (token === TokenKind.Slash) return 'Div'
  return null
}

// === parseExpression ===
// Does not require the input to end here; see parseProgram.
Parser.prototype.parseExpression = function (this: Parser): AST.Expression {
  let lhs = this.parseTerm()
  let op: AST.BinOp | null
  while ((op = additiveOp(this.peek())) !== null) {
    this.eat(this.peek())
    const rhs = this.parseTerm()
    lhs = binaryExpression(op, lhs, rhs)
  }
  return lhs
}

// === parseTerm ===
Parser.prototype.parseTerm = function (this: Parser): AST.Expression {
  let lhs = this.parseFactor()
  let op: AST.BinOp | null
  while ((op = multiplicativeOp(this.peek())) !== null) {
    this.eat(this.peek())
    const rhs = this.parseFactor()
    lhs = binaryExpression(op, lhs, rhs)
  }
  return lhs
}

// === parseFactor ===
Parser.prototype.parseFactor = function (this: Parser): AST.Expression {
  switch (this.peek()) {
    case TokenKind.Number: {
      const tok = this.eat(TokenKind.Number)
      return intLiteral(tok.value ?? 0, tok)
    }
    case TokenKind.LParen: {
      if (this.depth >= this.maxDepth) {
        return this.error('expression nested too deeply')
      }
      const open = this.eat(TokenKind.LParen)
      this.depth++
      const inner = this.parseExpression()
      const close = this.eat(TokenKind.RParen)
      this.depth--
      return withSpan(inner, { start: open.start, end: close.end })
    }
    default:
      return this.error(`expected expression before '${tokenText(this.current)}'`)
  }
}

// === parseProgram ===
// A whole input: one expression followed by end of input.
Parser.prototype.parseProgram = function (this: Parser): AST.Expression {
  const expr = this.parseExpression()
  this.eat(TokenKind.Eof)
  return expr
}
