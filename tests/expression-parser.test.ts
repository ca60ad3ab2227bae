// Tests for the rule expression parser

import { describe, it, expect } from 'vitest';
import { parseExpression, parseSizedLiteral } from '../src/parser/parser.js';
import { tokenize } from '../src/parser/lexer.js';
import { ExpressionError } from '../src/errors.js';

function sized(text: string): string {
  return parseSizedLiteral(tokenize(text)[0]);
}

describe('Rule expression parser', () => {
  it('should parse a concatenation of a slice and an identifier', () => {
    const ast = parseExpression('{q[2:0], data}');
    expect(ast.type).toBe('ConcatExpr');
    if (ast.type === 'ConcatExpr') {
      expect(ast.parts).toHaveLength(2);
      expect(ast.parts[0]).toMatchObject({ type: 'SliceExpr', hi: 2, lo: 0 });
      expect(ast.parts[1]).toMatchObject({ type: 'IdentifierExpr', name: 'data' });
    }
  });

  it('should bind & tighter than ^ and ^ tighter than |', () => {
    const ast = parseExpression('a | b ^ c & d');
    expect(ast).toMatchObject({
      type: 'BinaryExpr',
      op: '|',
      left: { type: 'IdentifierExpr', name: 'a' },
      right: {
        type: 'BinaryExpr',
        op: '^',
        right: { type: 'BinaryExpr', op: '&' },
      },
    });
  });

  it('should parse subtraction left to right', () => {
    const ast = parseExpression('a - b - c');
    expect(ast).toMatchObject({
      type: 'BinaryExpr',
      op: '-',
      left: { type: 'BinaryExpr', op: '-' },
      right: { type: 'IdentifierExpr', name: 'c' },
    });
  });

  it('should parse a ternary with a logical condition', () => {
    const ast = parseExpression('!state && j ? 1 : state');
    expect(ast.type).toBe('TernaryExpr');
    if (ast.type === 'TernaryExpr') {
      expect(ast.condition).toMatchObject({ type: 'BinaryExpr', op: '&&' });
      expect(ast.thenExpr).toMatchObject({ type: 'LiteralExpr', bits: '1', sized: false });
    }
  });

  it('should parse unsized decimals as minimal binary', () => {
    expect(parseExpression('10')).toMatchObject({ type: 'LiteralExpr', bits: '1010', sized: false });
    expect(parseExpression('0')).toMatchObject({ type: 'LiteralExpr', bits: '0' });
  });

  it('should reject a reversed part select', () => {
    expect(() => parseExpression('q[0:3]')).toThrow('must be written [hi:lo]');
  });

  it('should reject trailing tokens', () => {
    expect(() => parseExpression('a b')).toThrow(ExpressionError);
  });

  it('should report the position of a missing operand', () => {
    expect(() => parseExpression('a +')).toThrow(
      'Unexpected token in expression: EOF at line 1, column 4'
    );
  });

  describe('sized literals', () => {
    it('should zero-extend binary and hex values', () => {
      expect(sized("4'b10")).toBe('0010');
      expect(sized("8'hF")).toBe('00001111');
      expect(sized("4'd9")).toBe('1001');
    });

    it('should extend a leading X or Z', () => {
      expect(sized("4'bx")).toBe('XXXX');
      expect(sized("4'bz1")).toBe('ZZZ1');
      expect(sized("8'hx0")).toBe('XXXX0000');
    });

    it('should reject values wider than the declared width', () => {
      expect(() => sized("2'b111")).toThrow('Value does not fit in 2 bits');
      expect(() => sized("3'd8")).toThrow('Value does not fit in 3 bits');
    });

    it('should reject digits outside the base', () => {
      expect(() => sized("4'b12")).toThrow('Invalid binary digit');
    });
  });
});
