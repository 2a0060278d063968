import { Scanner } from '../src/lexer/scanner'
import { TokenKind, formatToken } from '../src/lexer/token'
import { LexicalError } from '../src/errors'

function tokenize(source: string) {
  const scanner = new Scanner(source)
  return scanner.scan()
}

function tokenKinds(source: string) {
  return tokenize(source)
    .filter((t) => t.kind !== TokenKind.Eof)
    .map((t) => t.kind)
}

describe('Scanner', () => {
  describe('operators and punctuation', () => {
    it('tokenizes every single-character token', () => {
      expect(tokenKinds('+ - * / ( )')).toEqual([
        TokenKind.Plus,
        TokenKind.Minus,
        TokenKind.Star,
        TokenKind.Slash,
        TokenKind.LParen,
        TokenKind.RParen,
      ])
    })

    it('does not need whitespace between tokens', () => {
      expect(tokenKinds('(1+2)*3')).toEqual([
        TokenKind.LParen,
        TokenKind.Number,
        TokenKind.Plus,
        TokenKind.Number,
        TokenKind.RParen,
        TokenKind.Star,
        TokenKind.Number,
      ])
    })
  })

  describe('numbers', () => {
    it('reads a greedy run of digits as one literal', () => {
      const tokens = tokenize('12345')
      expect(tokens[0]).toEqual({ kind: TokenKind.Number, start: 0, end: 5, value: 12345 })
    })

    it('keeps leading zeros in the literal', () => {
      const tokens = tokenize('007')
      expect(tokens[0].value).toBe(7)
      expect(tokens[0].end).toBe(3)
    })

    it('reads zero', () => {
      expect(tokenize('0')[0].value).toBe(0)
    })

    it('accepts the largest safe integer', () => {
      expect(tokenize('9007199254740991')[0].value).toBe(Number.MAX_SAFE_INTEGER)
    })

    it('rejects literals above the largest safe integer', () => {
      expect(() => tokenize('9007199254740992')).toThrow(LexicalError)
      expect(() => tokenize('9007199254740992')).toThrow(
        "integer literal '9007199254740992' is too large",
      )
    })

    it('splits a minus sign from the number that follows', () => {
      expect(tokenKinds('-5')).toEqual([TokenKind.Minus, TokenKind.Number])
    })
  })

  describe('whitespace', () => {
    it('skips spaces, tabs and newlines', () => {
      expect(tokenKinds(' \t1\n+\r\n2 ')).toEqual([TokenKind.Number, TokenKind.Plus, TokenKind.Number])
    })

    it('yields the same kinds and values with or without spacing', () => {
      const strip = (source: string) => tokenize(source).map((t) => [t.kind, t.value])
      expect(strip(' 1 + 2 ')).toEqual(strip('1+2'))
    })

    it('records offsets into the source text', () => {
      const tokens = tokenize('  10 *  3')
      expect(tokens.map((t) => [t.start, t.end])).toEqual([
        [2, 4],
        [5, 6],
        [8, 9],
        [9, 9],
      ])
    })
  })

  describe('end of input', () => {
    it('returns Eof for empty input', () => {
      expect(tokenize('')).toEqual([{ kind: TokenKind.Eof, start: 0, end: 0 }])
    })

    it('returns Eof for whitespace-only input', () => {
      expect(tokenize('   ')).toEqual([{ kind: TokenKind.Eof, start: 3, end: 3 }])
    })

    it('keeps returning Eof after the input is exhausted', () => {
      const scanner = new Scanner('7')
      expect(scanner.nextToken().kind).toBe(TokenKind.Number)
      for (let i = 0; i < 5; i++) {
        expect(scanner.nextToken()).toEqual({ kind: TokenKind.Eof, start: 1, end: 1 })
      }
    })
  })

  describe('errors', () => {
    it('rejects letters', () => {
      expect(() => tokenize('1 + a')).toThrow(LexicalError)
    })

    it('reports the offending character and its offset', () => {
      let caught: unknown
      try {
        tokenize('1 + a')
      } catch (err) {
        caught = err
      }
      expect(caught).toBeInstanceOf(LexicalError)
      if (caught instanceof LexicalError) {
        expect(caught.message).toBe("unexpected character 'a'")
        expect(caught.name).toBe('LexicalError')
        expect(caught.start).toBe(4)
        expect(caught.end).toBe(5)
      }
    })

    it('rejects a decimal point', () => {
      expect(() => tokenize('1.5')).toThrow("unexpected character '.'")
    })

    it('reports astral characters whole', () => {
      expect(() => tokenize('2 😀')).toThrow("unexpected character '😀'")
    })

    it('produces tokens lazily, failing only when the bad character is reached', () => {
      const scanner = new Scanner('1 + %')
      expect(scanner.nextToken().kind).toBe(TokenKind.Number)
      expect(scanner.nextToken().kind).toBe(TokenKind.Plus)
      expect(() => scanner.nextToken()).toThrow(LexicalError)
    })
  })

  describe('formatToken', () => {
    it('formats tokens for debugging', () => {
      const [num, plus, eof] = tokenize('42+')
      expect(formatToken(num)).toBe('Token(Number, 42)')
      expect(formatToken(plus)).toBe("Token(Plus, '+')")
      expect(formatToken(eof)).toBe('Token(Eof)')
    })
  })
})
