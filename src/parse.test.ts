import { expect } from 'chai';
import { ParseError } from './errors';
import { LadderOperatorUnit } from './ladder';
import {
  Lexer,
  TokenKind,
  parseLadderExpression,
  parseLadderProduct,
  parseLadderSum,
  parseLadderUnit,
  renderLadderProduct,
  renderLadderSum,
} from './parse';

function kinds(input: string): TokenKind[] {
  const lexer = new Lexer(input);
  const out: TokenKind[] = [];
  for (let t = lexer.nextToken(); ; t = lexer.nextToken()) {
    out.push(t.kind);
    if (t.kind === TokenKind.EOF) return out;
  }
}

describe('parse.ts', () => {
  describe('Lexer', () => {
    it('should tokenize a product with positions', () => {
      const lexer = new Lexer('0.5 [(u, 0)]');
      expect(lexer.nextToken()).to.deep.equal({ kind: TokenKind.NUMBER, value: '0.5', pos: 0 });
      expect(lexer.nextToken()).to.deep.equal({ kind: TokenKind.LBRACKET, value: '[', pos: 4 });
      expect(lexer.nextToken()).to.deep.equal({ kind: TokenKind.LPAREN, value: '(', pos: 5 });
      expect(lexer.nextToken()).to.deep.equal({ kind: TokenKind.IDENTIFIER, value: 'u', pos: 6 });
      expect(lexer.nextToken()).to.deep.equal({ kind: TokenKind.COMMA, value: ',', pos: 7 });
      expect(lexer.nextToken()).to.deep.equal({ kind: TokenKind.NUMBER, value: '0', pos: 9 });
      expect(lexer.nextToken()).to.deep.equal({ kind: TokenKind.RPAREN, value: ')', pos: 10 });
      expect(lexer.nextToken()).to.deep.equal({ kind: TokenKind.RBRACKET, value: ']', pos: 11 });
      expect(lexer.nextToken()).to.deep.equal({ kind: TokenKind.EOF, value: '', pos: 12 });
    });

    it('should tokenize punctuation', () => {
      expect(kinds('{ ; | }')).to.deep.equal([
        TokenKind.LBRACE,
        TokenKind.SEMI,
        TokenKind.PIPE,
        TokenKind.RBRACE,
        TokenKind.EOF,
      ]);
    });

    it('should read signed, exponent and imaginary numbers', () => {
      const lexer = new Lexer('-1.5e-3 +2i 1-2i');
      expect(lexer.nextToken().value).to.equal('-1.5e-3');
      expect(lexer.nextToken().value).to.equal('+2i');
      expect(lexer.nextToken().value).to.equal('1');
      expect(lexer.nextToken().value).to.equal('-2i');
      expect(lexer.nextToken().kind).to.equal(TokenKind.EOF);
    });

    it('should reject unknown characters', () => {
      const lexer = new Lexer('  #');
      expect(() => lexer.nextToken()).to.throw(ParseError, "Unexpected character '#' at 2");
    });

    it('should reject a bare sign', () => {
      expect(() => new Lexer('- 1').nextToken()).to.throw(ParseError, "Malformed number '-' at 0");
    });
  });

  describe('Parser', () => {
    it('should parse units', () => {
      expect(parseLadderUnit('(u, 3)')).to.deep.equal({ index: 3, op: LadderOperatorUnit.Raise });
      expect(parseLadderUnit('(d,0)')).to.deep.equal({ index: 0, op: LadderOperatorUnit.Lower });
      expect(parseLadderUnit('(I, 0)')).to.deep.equal({ index: 0, op: LadderOperatorUnit.Identity });
    });

    it('should parse products with and without coefficients', () => {
      const p = parseLadderProduct('[(u, 0) | (d, 1)]');
      expect(p.coeff.re).to.equal(1);
      expect(p.units.map((u) => u.item)).to.deep.equal([
        { index: 0, op: LadderOperatorUnit.Raise },
        { index: 1, op: LadderOperatorUnit.Lower },
      ]);
      expect(parseLadderProduct('0.5 [(u, 0)]').coeff.re).to.equal(0.5);
      const c = parseLadderProduct('1-2i [(d, 2)]').coeff;
      expect([c.re, c.im]).to.deep.equal([1, -2]);
    });

    it('should merge like terms in a sum', () => {
      const s = parseLadderSum('{[(u, 0) | (d, 0)]; 2 [(u, 1) | (d, 1)]; [(u, 0) | (d, 0)]}');
      expect(s.terms.size).to.equal(2);
      expect(renderLadderSum(s)).to.equal('{2 [(u, 0) | (d, 0)]; 2 [(u, 1) | (d, 1)]}');
    });

    it('should parse the empty sum', () => {
      expect(parseLadderSum('{}').terms.size).to.equal(0);
      expect(parseLadderSum('{ }').terms.size).to.equal(0);
    });

    it('should promote units and products to sums', () => {
      expect(renderLadderSum(parseLadderExpression('(d, 4)'))).to.equal('{[(d, 4)]}');
      expect(renderLadderSum(parseLadderExpression('-1 [(u, 0)]'))).to.equal('{-1 [(u, 0)]}');
    });
  });

  describe('Parser - Errors', () => {
    const failsAt = (f: () => unknown, pos: number, message: string) => {
      expect(f).to.throw(ParseError, message);
      try {
        f();
      } catch (e) {
        expect(e).to.be.instanceOf(ParseError);
        if (e instanceof ParseError) expect(e.pos).to.equal(pos);
      }
    };

    it('should reject unknown operators', () => {
      failsAt(() => parseLadderUnit('(x, 0)'), 1, "Unknown ladder operator 'x'");
    });

    it('should reject fractional indices', () => {
      failsAt(() => parseLadderUnit('(u, 1.5)'), 4, "Index must be a non-negative integer, got '1.5'");
    });

    it('should reject unterminated products', () => {
      failsAt(() => parseLadderProduct('[(u, 0)'), 7, 'Expected RBRACKET');
    });

    it('should reject a missing unit', () => {
      failsAt(() => parseLadderProduct('[(u, 0) | ]'), 10, 'Expected LPAREN');
    });

    it('should reject trailing input', () => {
      failsAt(() => parseLadderProduct('[(u, 0)] extra'), 9, "Unexpected 'extra'");
    });
  });

  describe('Rendering', () => {
    it('should omit a unit coefficient', () => {
      expect(renderLadderProduct(parseLadderProduct('[(u, 0) | (d, 1)]'))).to.equal('[(u, 0) | (d, 1)]');
    });

    it('should render complex coefficients', () => {
      expect(renderLadderProduct(parseLadderProduct('1-2i [(d, 2)]'))).to.equal('1-2i [(d, 2)]');
      expect(renderLadderProduct(parseLadderProduct('-0.5i [(u, 1)]'))).to.equal('-0.5i [(u, 1)]');
    });

    it('should round-trip a rendered sum', () => {
      const text = '{0.5 [(u, 0) | (d, 1)]; -1 [(u, 1)]}';
      expect(renderLadderSum(parseLadderSum(text))).to.equal(text);
    });
  });
});
