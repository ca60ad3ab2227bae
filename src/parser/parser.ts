// Recursive descent parser for rule expressions

import { ExpressionError } from '../errors.js';
import { fromBigInt, normalizeBits, resize } from '../logic/four-state.js';
import { tokenize, type Token, type TokenType } from './lexer.js';
import type { BinaryOp, Expr } from '../types/ast.js';

// Binary precedence levels, loosest first
const BINARY_LEVELS: Array<Partial<Record<TokenType, BinaryOp>>> = [
  { PIPE_PIPE: '||' },
  { AMP_AMP: '&&' },
  { PIPE: '|' },
  { CARET: '^' },
  { AMPERSAND: '&' },
  { EQ_EQ: '==', BANG_EQ: '!=' },
  { LT: '<', GT: '>', LT_EQ: '<=', GT_EQ: '>=' },
  { LT_LT: '<<', GT_GT: '>>' },
  { PLUS: '+', MINUS: '-' },
];

export class Parser {
  private tokens: Token[] = [];
  private pos: number = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): Expr {
    const expr = this.parseExpr();
    if (!this.check('EOF')) {
      throw this.error(`Unexpected token: ${this.current().type}`);
    }
    return expr;
  }

  private parseExpr(): Expr {
    return this.parseTernary();
  }

  private parseTernary(): Expr {
    const condition = this.parseBinary(0);

    if (this.check('QUESTION')) {
      const loc = this.location();
      this.advance();
      const thenExpr = this.parseExpr();
      this.expect('COLON');
      const elseExpr = this.parseExpr();
      return { type: 'TernaryExpr', condition, thenExpr, elseExpr, loc };
    }

    return condition;
  }

  private parseBinary(level: number): Expr {
    if (level >= BINARY_LEVELS.length) {
      return this.parseUnary();
    }

    const ops = BINARY_LEVELS[level];
    let left = this.parseBinary(level + 1);

    while (true) {
      const op = ops[this.current().type];
      if (!op) break;
      const loc = this.location();
      this.advance();
      const right = this.parseBinary(level + 1);
      left = { type: 'BinaryExpr', op, left, right, loc };
    }

    return left;
  }

  private parseUnary(): Expr {
    const loc = this.location();

    if (this.match('TILDE')) {
      return { type: 'UnaryExpr', op: '~', operand: this.parseUnary(), loc };
    }
    if (this.match('BANG')) {
      return { type: 'UnaryExpr', op: '!', operand: this.parseUnary(), loc };
    }
    if (this.match('MINUS')) {
      return { type: 'UnaryExpr', op: '-', operand: this.parseUnary(), loc };
    }

    return this.parsePostfix();
  }

  private parsePostfix(): Expr {
    let expr = this.parsePrimary();

    while (this.check('LBRACKET')) {
      const loc = this.location();
      this.advance();
      const first = this.parseIndex();

      if (this.match('COLON')) {
        const lo = this.parseIndex();
        this.expect('RBRACKET');
        if (lo > first) {
          throw new ExpressionError(`Part select [${first}:${lo}] must be written [hi:lo]`, loc.line, loc.column);
        }
        expr = { type: 'SliceExpr', object: expr, hi: first, lo, loc };
      } else {
        this.expect('RBRACKET');
        expr = { type: 'IndexExpr', object: expr, index: first, loc };
      }
    }

    return expr;
  }

  private parsePrimary(): Expr {
    const loc = this.location();

    if (this.check('NUMBER')) {
      const value = BigInt(this.advance().value);
      return { type: 'LiteralExpr', bits: value.toString(2), sized: false, loc };
    }

    if (this.check('SIZED')) {
      const token = this.advance();
      return { type: 'LiteralExpr', bits: parseSizedLiteral(token), sized: true, loc };
    }

    // Concat: { a, b, c }
    if (this.match('LBRACE')) {
      const parts: Expr[] = [];
      do {
        parts.push(this.parseExpr());
      } while (this.match('COMMA'));
      this.expect('RBRACE');
      return { type: 'ConcatExpr', parts, loc };
    }

    if (this.match('LPAREN')) {
      const expr = this.parseExpr();
      this.expect('RPAREN');
      return expr;
    }

    if (this.check('IDENTIFIER')) {
      return { type: 'IdentifierExpr', name: this.advance().value, loc };
    }

    throw this.error(`Unexpected token in expression: ${this.current().type}`);
  }

  private parseIndex(): number {
    return parseInt(this.expect('NUMBER').value, 10);
  }

  // Helper methods

  private location(): { line: number; column: number; offset: number } {
    const token = this.current();
    return { line: token.line, column: token.column, offset: token.offset };
  }

  private current(): Token {
    return this.tokens[this.pos];
  }

  private isAtEnd(): boolean {
    return this.current().type === 'EOF';
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) return type === 'EOF';
    return this.current().type === type;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.pos++;
    return this.tokens[this.pos - 1];
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(type: TokenType): Token {
    if (this.check(type)) return this.advance();
    throw this.error(`Expected ${type}, got ${this.current().type}`);
  }

  private error(message: string): ExpressionError {
    const token = this.current();
    return new ExpressionError(message, token.line, token.column);
  }
}

/**
 * Convert 4'b10x1, 8'hF0 or 3'd5 into an MSB-first bit string of the declared width
 */
export function parseSizedLiteral(token: Token): string {
  const match = /^(\d+)'([bdhBDH])([0-9a-zA-Z_]+)$/.exec(token.value);
  const fail = (reason: string) =>
    new ExpressionError(`${reason} in literal ${token.value}`, token.line, token.column);
  if (!match) throw fail('Malformed digits');

  const width = parseInt(match[1], 10);
  if (width < 1) throw fail('Zero width');
  const base = match[2].toLowerCase();
  const digits = match[3].replace(/_/g, '').toLowerCase();

  let bits: string;
  if (base === 'b') {
    if (!/^[01xz]+$/.test(digits)) throw fail('Invalid binary digit');
    bits = normalizeBits(digits);
  } else if (base === 'h') {
    if (!/^[0-9a-fxz]+$/.test(digits)) throw fail('Invalid hex digit');
    bits = '';
    for (const digit of digits) {
      bits += digit === 'x' ? 'XXXX' : digit === 'z' ? 'ZZZZ' : resize(parseInt(digit, 16).toString(2), 4);
    }
  } else {
    if (!/^\d+$/.test(digits)) throw fail('Invalid decimal digit');
    const value = BigInt(digits);
    if (value >= 1n << BigInt(width)) throw fail(`Value does not fit in ${width} bits`);
    return fromBigInt(value, width);
  }

  // Leading X/Z extends, anything else zero-extends
  const significant = bits.replace(/^0+(?=.)/, '');
  if (significant.length > width) throw fail(`Value does not fit in ${width} bits`);
  const fill = significant[0] === 'X' || significant[0] === 'Z' ? significant[0] : '0';
  return fill.repeat(width - significant.length) + significant;
}

export function parseExpression(source: string): Expr {
  const tokens = tokenize(source);
  return new Parser(tokens).parse();
}
