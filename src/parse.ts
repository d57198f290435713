import { Complex } from './complex';
import { ParseError } from './errors';
import {
  LadderOp,
  LadderOperatorUnit,
  LadderProduct,
  LadderSum,
  ladderProduct,
  ladderSum,
  ladderUnit,
} from './ladder';
import { productTerms } from './terms';

/**
 * Debug grammar for ladder expressions:
 *
 *   unit    := '(' ('I' | 'u' | 'd') ',' INDEX ')'
 *   product := coeff? '[' unit ('|' unit)* ']'
 *   sum     := '{' (product (';' product)*)? '}'
 *   coeff   := NUMBER NUMBER?        e.g. `-0.5`, `0.5i`, `1-2i`
 */
export enum TokenKind {
  // Literals
  IDENTIFIER = 'IDENTIFIER',
  NUMBER = 'NUMBER', // signed, optional `i` suffix

  // Punctuation
  LPAREN = 'LPAREN', // (
  RPAREN = 'RPAREN', // )
  LBRACKET = 'LBRACKET', // [
  RBRACKET = 'RBRACKET', // ]
  LBRACE = 'LBRACE', // {
  RBRACE = 'RBRACE', // }
  COMMA = 'COMMA', // ,
  PIPE = 'PIPE', // |
  SEMI = 'SEMI', // ;

  // Special
  EOF = 'EOF',
}

export interface Token {
  kind: TokenKind;
  value: string;
  pos: number;
}

const PUNCTUATION: Record<string, TokenKind> = {
  '(': TokenKind.LPAREN,
  ')': TokenKind.RPAREN,
  '[': TokenKind.LBRACKET,
  ']': TokenKind.RBRACKET,
  '{': TokenKind.LBRACE,
  '}': TokenKind.RBRACE,
  ',': TokenKind.COMMA,
  '|': TokenKind.PIPE,
  ';': TokenKind.SEMI,
};

export class Lexer {
  private pos = 0;
  private current = '';
  constructor(private readonly input: string) {
    this.advance();
  }

  private advance(): void {
    this.current =
      this.pos < this.input.length ? this.input.charAt(this.pos++) : '';
  }
  private skipWs(): void {
    while (this.current && /\s/.test(this.current)) this.advance();
  }

  private readWhile(re: RegExp): string {
    let out = '';
    while (this.current && re.test(this.current)) {
      out += this.current;
      this.advance();
    }
    return out;
  }

  private readNumber(start: number): string {
    let out = '';
    if (this.current === '+' || this.current === '-') {
      out += this.current;
      this.advance();
    }
    out += this.readWhile(/[0-9.]/);
    if (this.current === 'e' || this.current === 'E') {
      out += this.current;
      this.advance();
      if (this.current === '+' || this.current === '-') {
        out += this.current;
        this.advance();
      }
      out += this.readWhile(/[0-9]/);
    }
    if (this.current === 'i') {
      out += 'i';
      this.advance();
    }
    if (!/[0-9]/.test(out)) throw new ParseError(`Malformed number '${out}'`, start);
    return out;
  }

  public nextToken(): Token {
    this.skipWs();
    if (!this.current) return { kind: TokenKind.EOF, value: '', pos: this.pos };
    const start = this.pos - 1;

    const punct = PUNCTUATION[this.current];
    if (punct !== undefined) {
      const value = this.current;
      this.advance();
      return { kind: punct, value, pos: start };
    }

    if (/[0-9.+-]/.test(this.current)) {
      return { kind: TokenKind.NUMBER, value: this.readNumber(start), pos: start };
    }

    if (/[A-Za-z]/.test(this.current)) {
      return {
        kind: TokenKind.IDENTIFIER,
        value: this.readWhile(/[A-Za-z0-9_]/),
        pos: start,
      };
    }

    throw new ParseError(`Unexpected character '${this.current}'`, start);
  }
}

function numberValue(tok: Token): Complex {
  const imaginary = tok.value.endsWith('i');
  const digits = imaginary ? tok.value.slice(0, -1) : tok.value;
  const x = Number(digits);
  if (Number.isNaN(x)) throw new ParseError(`Malformed number '${tok.value}'`, tok.pos);
  return imaginary ? new Complex(0, x) : Complex.real(x);
}

function operatorFor(tok: Token): LadderOperatorUnit {
  switch (tok.value) {
    case 'I':
      return LadderOperatorUnit.Identity;
    case 'u':
      return LadderOperatorUnit.Raise;
    case 'd':
      return LadderOperatorUnit.Lower;
    default:
      throw new ParseError(`Unknown ladder operator '${tok.value}'`, tok.pos);
  }
}

export class Parser {
  private current = 0;
  private readonly tokens: Token[] = [];

  constructor(lexer: Lexer) {
    let t;
    do {
      t = lexer.nextToken();
      this.tokens.push(t);
    } while (t.kind !== TokenKind.EOF);
  }

  private peek(): Token {
    return (
      this.tokens[this.current] ?? {
        kind: TokenKind.EOF,
        value: '',
        pos: this.tokens.at(-1)?.pos ?? -1,
      }
    );
  }

  private advance(): Token {
    const tok = this.peek();
    if (tok.kind !== TokenKind.EOF) this.current++;
    return tok;
  }

  private match(...k: TokenKind[]): boolean {
    return k.includes(this.peek().kind);
  }

  private expect(kind: TokenKind): Token {
    if (!this.match(kind)) throw new ParseError(`Expected ${kind}`, this.peek().pos);
    return this.advance();
  }

  /** Fails unless the whole input was consumed. */
  public end<T>(value: T): T {
    if (!this.match(TokenKind.EOF))
      throw new ParseError(`Unexpected '${this.peek().value}'`, this.peek().pos);
    return value;
  }

  public parseUnit(): LadderOp {
    this.expect(TokenKind.LPAREN);
    const op = operatorFor(this.expect(TokenKind.IDENTIFIER));
    this.expect(TokenKind.COMMA);
    const idxTok = this.expect(TokenKind.NUMBER);
    if (!/^\d+$/.test(idxTok.value))
      throw new ParseError(`Index must be a non-negative integer, got '${idxTok.value}'`, idxTok.pos);
    this.expect(TokenKind.RPAREN);
    return { index: Number(idxTok.value), op };
  }

  private parseCoefficient(): Complex {
    if (!this.match(TokenKind.NUMBER)) return Complex.ONE;
    let c = numberValue(this.advance());
    if (this.match(TokenKind.NUMBER)) c = c.add(numberValue(this.advance()));
    return c;
  }

  public parseProduct(): LadderProduct {
    const coeff = this.parseCoefficient();
    this.expect(TokenKind.LBRACKET);
    const units = [this.parseUnit()];
    while (this.match(TokenKind.PIPE)) {
      this.advance();
      units.push(this.parseUnit());
    }
    this.expect(TokenKind.RBRACKET);
    return ladderProduct(units, coeff);
  }

  public parseSum(): LadderSum {
    this.expect(TokenKind.LBRACE);
    const products: LadderProduct[] = [];
    if (!this.match(TokenKind.RBRACE)) {
      products.push(this.parseProduct());
      while (this.match(TokenKind.SEMI)) {
        this.advance();
        products.push(this.parseProduct());
      }
    }
    this.expect(TokenKind.RBRACE);
    return ladderSum(products);
  }

  /** A sum, or a single product or unit promoted to one. */
  public parseExpression(): LadderSum {
    if (this.match(TokenKind.LBRACE)) return this.parseSum();
    if (this.match(TokenKind.LPAREN)) return ladderSum([ladderProduct([this.parseUnit()])]);
    return ladderSum([this.parseProduct()]);
  }
}

const parser = (input: string) => new Parser(new Lexer(input));

export function parseLadderUnit(input: string): LadderOp {
  const p = parser(input);
  return p.end(p.parseUnit());
}

export function parseLadderProduct(input: string): LadderProduct {
  const p = parser(input);
  return p.end(p.parseProduct());
}

export function parseLadderSum(input: string): LadderSum {
  const p = parser(input);
  return p.end(p.parseSum());
}

export function parseLadderExpression(input: string): LadderSum {
  const p = parser(input);
  return p.end(p.parseExpression());
}

export function renderLadderUnit(u: LadderOp): string {
  return ladderUnit.render(u);
}

export function renderLadderProduct(p: LadderProduct): string {
  const units = `[${p.units.map((u) => renderLadderUnit(u.item)).join(' | ')}]`;
  return p.coeff.equals(Complex.ONE) ? units : `${p.coeff} ${units}`;
}

export function renderLadderSum(s: LadderSum): string {
  return `{${productTerms(s).map(renderLadderProduct).join('; ')}}`;
}
