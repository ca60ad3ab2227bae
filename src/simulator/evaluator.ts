// Expression evaluator over four-state bit strings
//
// Expressions are parsed once and evaluated by walking the AST against a
// SignalReader, so the same compiled guard can be reused every cycle.

import { parseExpression } from '../parser/parser.js';
import {
  add,
  bitAt,
  bitwiseAnd,
  bitwiseNot,
  bitwiseOr,
  bitwiseXor,
  compare,
  concat,
  equals,
  logicalNot,
  shiftLeft,
  shiftRight,
  subtract,
  truthOf,
  truthToBits,
  unresolved,
  type Truth,
  type UnknownMode,
} from '../logic/four-state.js';
import type { BinaryOp, Expr, UnaryOp } from '../types/ast.js';
import type { SignalReader } from '../types/circuit.js';

export interface CompiledExpression {
  source: string;
  ast: Expr;
  identifiers: ReadonlySet<string>;
  evaluate(env: SignalReader): string;
}

export function compileExpression(
  source: string,
  mode: UnknownMode = 'structural'
): CompiledExpression {
  const ast = parseExpression(source);
  const identifiers = new Set<string>();
  collectIdentifiers(ast, identifiers);
  return {
    source,
    ast,
    identifiers,
    evaluate: (env) => evaluate(ast, env, mode),
  };
}

export function collectIdentifiers(expr: Expr, out: Set<string>): void {
  switch (expr.type) {
    case 'IdentifierExpr':
      out.add(expr.name);
      break;
    case 'LiteralExpr':
      break;
    case 'UnaryExpr':
      collectIdentifiers(expr.operand, out);
      break;
    case 'BinaryExpr':
      collectIdentifiers(expr.left, out);
      collectIdentifiers(expr.right, out);
      break;
    case 'TernaryExpr':
      collectIdentifiers(expr.condition, out);
      collectIdentifiers(expr.thenExpr, out);
      collectIdentifiers(expr.elseExpr, out);
      break;
    case 'IndexExpr':
    case 'SliceExpr':
      collectIdentifiers(expr.object, out);
      break;
    case 'ConcatExpr':
      for (const part of expr.parts) collectIdentifiers(part, out);
      break;
  }
}

export function evaluate(expr: Expr, env: SignalReader, mode: UnknownMode = 'structural'): string {
  switch (expr.type) {
    case 'IdentifierExpr':
      return env.read(expr.name);

    case 'LiteralExpr':
      return expr.bits;

    case 'UnaryExpr':
      return evaluateUnary(expr.op, evaluate(expr.operand, env, mode), mode);

    case 'BinaryExpr':
      return evaluateBinary(
        expr.op,
        evaluate(expr.left, env, mode),
        evaluate(expr.right, env, mode),
        mode
      );

    case 'TernaryExpr': {
      const condition = truthOf(evaluate(expr.condition, env, mode), mode);
      if (condition === 1) return evaluate(expr.thenExpr, env, mode);
      if (condition === 0) return evaluate(expr.elseExpr, env, mode);
      return unresolved(
        evaluate(expr.thenExpr, env, mode),
        evaluate(expr.elseExpr, env, mode),
        mode
      );
    }

    case 'IndexExpr': {
      const value = evaluate(expr.object, env, mode);
      return expr.index < value.length ? bitAt(value, expr.index) : 'X';
    }

    case 'SliceExpr': {
      const value = evaluate(expr.object, env, mode);
      let out = '';
      for (let i = expr.hi; i >= expr.lo; i--) {
        out += i < value.length ? bitAt(value, i) : 'X';
      }
      return out;
    }

    case 'ConcatExpr':
      return concat(expr.parts.map((part) => evaluate(part, env, mode)));
  }
}

function evaluateUnary(op: UnaryOp, operand: string, mode: UnknownMode): string {
  switch (op) {
    case '~': return bitwiseNot(operand);
    case '!': return logicalNot(operand, mode);
    case '-': return subtract('0'.repeat(operand.length), operand);
  }
}

function logicalAnd(a: Truth, b: Truth, mode: UnknownMode): Truth {
  if (mode === 'structural' && (a === 'X' || b === 'X')) return 'X';
  if (a === 0 || b === 0) return 0;
  if (a === 1 && b === 1) return 1;
  return 'X';
}

function logicalOr(a: Truth, b: Truth, mode: UnknownMode): Truth {
  if (mode === 'structural' && (a === 'X' || b === 'X')) return 'X';
  if (a === 1 || b === 1) return 1;
  if (a === 0 && b === 0) return 0;
  return 'X';
}

function evaluateBinary(op: BinaryOp, left: string, right: string, mode: UnknownMode): string {
  switch (op) {
    case '+': return add(left, right);
    case '-': return subtract(left, right);
    case '&': return bitwiseAnd(left, right, mode);
    case '|': return bitwiseOr(left, right, mode);
    case '^': return bitwiseXor(left, right);
    case '&&': return truthToBits(logicalAnd(truthOf(left, mode), truthOf(right, mode), mode));
    case '||': return truthToBits(logicalOr(truthOf(left, mode), truthOf(right, mode), mode));
    case '<<': return shiftLeft(left, right);
    case '>>': return shiftRight(left, right);
    case '==': return truthToBits(equals(left, right, mode));
    case '!=': return logicalNot(truthToBits(equals(left, right, mode)));
    case '<': return relation(left, right, (order) => order < 0);
    case '>': return relation(left, right, (order) => order > 0);
    case '<=': return relation(left, right, (order) => order <= 0);
    case '>=': return relation(left, right, (order) => order >= 0);
  }
}

// Unsigned comparison, X when either side has an unknown bit
function relation(left: string, right: string, holds: (order: number) => boolean): string {
  const order = compare(left, right);
  if (order === null) return 'X';
  return holds(order) ? '1' : '0';
}
