// Lexer for rule expressions

import { ExpressionError } from '../errors.js';

export type TokenType =
  | 'IDENTIFIER'
  | 'NUMBER'       // 12
  | 'SIZED'        // 4'b1010, 8'hFF, 3'd5
  | 'LPAREN'       // (
  | 'RPAREN'       // )
  | 'LBRACKET'     // [
  | 'RBRACKET'     // ]
  | 'LBRACE'       // {
  | 'RBRACE'       // }
  | 'COMMA'        // ,
  | 'COLON'        // :
  | 'QUESTION'     // ?
  | 'PLUS'         // +
  | 'MINUS'        // -
  | 'AMPERSAND'    // &
  | 'PIPE'         // |
  | 'CARET'        // ^
  | 'TILDE'        // ~
  | 'BANG'         // !
  | 'AMP_AMP'      // &&
  | 'PIPE_PIPE'    // ||
  | 'LT'           // <
  | 'GT'           // >
  | 'LT_LT'        // <<
  | 'GT_GT'        // >>
  | 'LT_EQ'        // <=
  | 'GT_EQ'        // >=
  | 'EQ_EQ'        // ==
  | 'BANG_EQ'      // !=
  | 'EOF';

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
  offset: number;
}

const TWO_CHAR_TOKENS: Record<string, TokenType> = {
  '&&': 'AMP_AMP',
  '||': 'PIPE_PIPE',
  '<<': 'LT_LT',
  '>>': 'GT_GT',
  '<=': 'LT_EQ',
  '>=': 'GT_EQ',
  '==': 'EQ_EQ',
  '!=': 'BANG_EQ',
};

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
  '(': 'LPAREN',
  ')': 'RPAREN',
  '[': 'LBRACKET',
  ']': 'RBRACKET',
  '{': 'LBRACE',
  '}': 'RBRACE',
  ',': 'COMMA',
  ':': 'COLON',
  '?': 'QUESTION',
  '+': 'PLUS',
  '-': 'MINUS',
  '&': 'AMPERSAND',
  '|': 'PIPE',
  '^': 'CARET',
  '~': 'TILDE',
  '!': 'BANG',
  '<': 'LT',
  '>': 'GT',
};

export class Lexer {
  private source: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private tokens: Token[] = [];

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    while (this.pos < this.source.length) {
      this.skipWhitespaceAndComments();
      if (this.pos >= this.source.length) break;

      const char = this.source[this.pos];

      const pair = char + this.peek(1);
      const twoChar = TWO_CHAR_TOKENS[pair];
      if (twoChar) {
        this.advance(2);
        this.addToken(twoChar, pair);
        continue;
      }

      const single = SINGLE_CHAR_TOKENS[char];
      if (single) {
        this.advance();
        this.addToken(single, char);
        continue;
      }

      if (this.isDigit(char)) {
        this.readNumber();
        continue;
      }

      if (this.isAlpha(char) || char === '_') {
        this.readIdentifier();
        continue;
      }

      throw new ExpressionError(`Unexpected character '${char}'`, this.line, this.column);
    }

    this.addToken('EOF', '');
    return this.tokens;
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.source.length) {
      const char = this.source[this.pos];

      if (char === '\n') {
        this.pos++;
        this.line++;
        this.column = 1;
        continue;
      }

      if (char === ' ' || char === '\t' || char === '\r') {
        this.advance();
        continue;
      }

      // ; and // comments run to end of line
      if (char === ';' || (char === '/' && this.peek(1) === '/')) {
        while (this.pos < this.source.length && this.source[this.pos] !== '\n') {
          this.advance();
        }
        continue;
      }

      break;
    }
  }

  // Decimal number, or a sized literal when followed by '<base>
  private readNumber(): void {
    const start = this.pos;
    while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
      this.advance();
    }

    if (this.source[this.pos] !== "'") {
      this.addToken('NUMBER', this.source.slice(start, this.pos));
      return;
    }

    this.advance(); // '
    const base = this.source[this.pos]?.toLowerCase();
    if (base !== 'b' && base !== 'd' && base !== 'h') {
      throw new ExpressionError(
        `Expected base b, d or h in sized literal`,
        this.line,
        this.column
      );
    }
    this.advance();
    const digitsStart = this.pos;
    while (this.pos < this.source.length && this.isLiteralDigit(this.source[this.pos])) {
      this.advance();
    }
    if (this.pos === digitsStart) {
      throw new ExpressionError(`Sized literal has no digits`, this.line, this.column);
    }
    this.addToken('SIZED', this.source.slice(start, this.pos));
  }

  private readIdentifier(): void {
    const start = this.pos;
    while (
      this.pos < this.source.length &&
      (this.isAlphaNumeric(this.source[this.pos]) || this.source[this.pos] === '_')
    ) {
      this.advance();
    }
    this.addToken('IDENTIFIER', this.source.slice(start, this.pos));
  }

  private addToken(type: TokenType, value: string): void {
    this.tokens.push({
      type,
      value,
      line: this.line,
      column: this.column - value.length,
      offset: this.pos - value.length,
    });
  }

  private advance(count: number = 1): void {
    this.pos += count;
    this.column += count;
  }

  private peek(offset: number = 0): string {
    const pos = this.pos + offset;
    if (pos >= this.source.length) return '\0';
    return this.source[pos];
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isLiteralDigit(char: string): boolean {
    return this.isAlphaNumeric(char) || char === '_';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isAlpha(char) || this.isDigit(char);
  }
}

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
