// AST node types for rule expressions (guards, next values, output drives)

export interface SourceLocation {
  line: number;
  column: number;
  offset: number;
}

export interface ASTNode {
  loc?: SourceLocation;
}

export type Expr =
  | IdentifierExpr
  | LiteralExpr
  | UnaryExpr
  | BinaryExpr
  | TernaryExpr
  | IndexExpr
  | SliceExpr
  | ConcatExpr;

export interface IdentifierExpr extends ASTNode {
  type: 'IdentifierExpr';
  name: string;
}

// Literal value as an MSB-first bit string
// 4'b10x1 keeps its declared width; unsized decimals take the fewest bits
export interface LiteralExpr extends ASTNode {
  type: 'LiteralExpr';
  bits: string;
  sized: boolean;
}

// Unary operators: ~ (bitwise), ! (logical), - (negate)
export type UnaryOp = '~' | '!' | '-';

export interface UnaryExpr extends ASTNode {
  type: 'UnaryExpr';
  op: UnaryOp;
  operand: Expr;
}

export type BinaryOp =
  | '+' | '-'
  | '&' | '|' | '^'
  | '&&' | '||'
  | '<<' | '>>'
  | '==' | '!=' | '<' | '>' | '<=' | '>=';

export interface BinaryExpr extends ASTNode {
  type: 'BinaryExpr';
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

// Ternary: cond ? thenExpr : elseExpr
export interface TernaryExpr extends ASTNode {
  type: 'TernaryExpr';
  condition: Expr;
  thenExpr: Expr;
  elseExpr: Expr;
}

// Bit select: expr[n]
export interface IndexExpr extends ASTNode {
  type: 'IndexExpr';
  object: Expr;
  index: number;
}

// Part select: expr[hi:lo], both inclusive
export interface SliceExpr extends ASTNode {
  type: 'SliceExpr';
  object: Expr;
  hi: number;
  lo: number;
}

// Concatenation: {a, b, c}, first part in the most-significant position
export interface ConcatExpr extends ASTNode {
  type: 'ConcatExpr';
  parts: Expr[];
}
