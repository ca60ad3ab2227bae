// Four-state logic on bit strings
// Every value is an ASCII string over 0, 1, X, Z written MSB first:
// character 0 is the most-significant bit, character width-1 is bit 0.

export type LogicBit = '0' | '1' | 'X' | 'Z';

// Truth value of a guard or condition
export type Truth = 0 | 1 | 'X';

// How unknown bits travel through logic.
// exact: four-state dominance (0 & X = 0, 1 | X = 1); an unknown select
//   keeps the bits both candidates agree on.
// structural: every bit computed from an unknown bit is X, whatever the
//   other operand; an unknown select makes the whole result X.
export type UnknownMode = 'exact' | 'structural';

const BIT_STRING = /^[01XZ]+$/;

/**
 * Upper-case x/z so traces written either way compare equal
 */
export function normalizeBits(value: string): string {
  return value.toUpperCase();
}

export function isBitString(value: string, width?: number): boolean {
  if (!BIT_STRING.test(value)) return false;
  return width === undefined || value.length === width;
}

export function hasUnknown(bits: string): boolean {
  return bits.includes('X') || bits.includes('Z');
}

export function allX(width: number): string {
  return 'X'.repeat(width);
}

/**
 * Truncate high bits or zero-extend to the given width
 */
export function resize(bits: string, width: number): string {
  if (bits.length === width) return bits;
  if (bits.length > width) return bits.slice(bits.length - width);
  return '0'.repeat(width - bits.length) + bits;
}

export function fromBigInt(value: bigint, width: number): string {
  const modulus = 1n << BigInt(width);
  const wrapped = ((value % modulus) + modulus) % modulus;
  return resize(wrapped.toString(2), width);
}

export function fromNumber(value: number, width: number): string {
  return fromBigInt(BigInt(value), width);
}

/**
 * Unsigned value of a fully known bit string, or null when any bit is X/Z
 */
export function toBigInt(bits: string): bigint | null {
  if (hasUnknown(bits)) return null;
  return BigInt('0b' + bits);
}

// Bit at position i (bit 0 is the last character)
export function bitAt(bits: string, index: number): LogicBit {
  const char = bits[bits.length - 1 - index];
  return char === '1' || char === '0' || char === 'Z' ? char : 'X';
}

export function slice(bits: string, hi: number, lo: number): string {
  return bits.slice(bits.length - 1 - hi, bits.length - lo);
}

export function concat(parts: readonly string[]): string {
  return parts.join('');
}

// Bitwise operators. Z reads as X once it passes through logic.

function widen(a: string, b: string): [string, string] {
  const width = Math.max(a.length, b.length);
  return [resize(a, width), resize(b, width)];
}

function zip(a: string, b: string, op: (x: string, y: string) => string): string {
  const [left, right] = widen(a, b);
  let out = '';
  for (let i = 0; i < left.length; i++) {
    out += op(left[i], right[i]);
  }
  return out;
}

export function bitwiseNot(a: string): string {
  let out = '';
  for (const char of a) {
    out += char === '0' ? '1' : char === '1' ? '0' : 'X';
  }
  return out;
}

function isKnown(bit: string): boolean {
  return bit === '0' || bit === '1';
}

export function bitwiseAnd(a: string, b: string, mode: UnknownMode = 'exact'): string {
  return zip(a, b, (x, y) => {
    if (mode === 'structural' && (!isKnown(x) || !isKnown(y))) return 'X';
    if (x === '0' || y === '0') return '0';
    if (x === '1' && y === '1') return '1';
    return 'X';
  });
}

export function bitwiseOr(a: string, b: string, mode: UnknownMode = 'exact'): string {
  return zip(a, b, (x, y) => {
    if (mode === 'structural' && (!isKnown(x) || !isKnown(y))) return 'X';
    if (x === '1' || y === '1') return '1';
    if (x === '0' && y === '0') return '0';
    return 'X';
  });
}

export function bitwiseXor(a: string, b: string): string {
  return zip(a, b, (x, y) => {
    if (!isKnown(x) || !isKnown(y)) return 'X';
    return x === y ? '0' : '1';
  });
}

// Arithmetic: modulo 2^width of the wider operand, all-X on any unknown bit

export function add(a: string, b: string): string {
  const width = Math.max(a.length, b.length);
  const x = toBigInt(a);
  const y = toBigInt(b);
  if (x === null || y === null) return allX(width);
  return fromBigInt(x + y, width);
}

export function subtract(a: string, b: string): string {
  const width = Math.max(a.length, b.length);
  const x = toBigInt(a);
  const y = toBigInt(b);
  if (x === null || y === null) return allX(width);
  return fromBigInt(x - y, width);
}

export function shiftLeft(a: string, amount: string): string {
  const n = toBigInt(amount);
  if (n === null) return allX(a.length);
  const shift = Number(n < BigInt(a.length) ? n : BigInt(a.length));
  return resize(a.slice(shift) + '0'.repeat(shift), a.length);
}

export function shiftRight(a: string, amount: string): string {
  const n = toBigInt(amount);
  if (n === null) return allX(a.length);
  const shift = Number(n < BigInt(a.length) ? n : BigInt(a.length));
  return '0'.repeat(shift) + a.slice(0, a.length - shift);
}

// Conditions

/**
 * A value is true when any bit is 1, false when every bit is 0.
 * Under structural propagation any unknown bit makes it X.
 */
export function truthOf(bits: string, mode: UnknownMode = 'exact'): Truth {
  if (mode === 'structural' && hasUnknown(bits)) return 'X';
  if (bits.includes('1')) return 1;
  if (/^0+$/.test(bits)) return 0;
  return 'X';
}

export function truthToBits(truth: Truth): string {
  return truth === 'X' ? 'X' : String(truth);
}

export function logicalNot(a: string, mode: UnknownMode = 'exact'): string {
  const truth = truthOf(a, mode);
  return truth === 'X' ? 'X' : truth === 1 ? '0' : '1';
}

export function equals(a: string, b: string, mode: UnknownMode = 'exact'): Truth {
  if (mode === 'structural' && (hasUnknown(a) || hasUnknown(b))) return 'X';
  const [left, right] = widen(a, b);
  let unknown = false;
  for (let i = 0; i < left.length; i++) {
    const x = left[i];
    const y = right[i];
    if (x === 'X' || x === 'Z' || y === 'X' || y === 'Z') {
      unknown = true;
    } else if (x !== y) {
      return 0;
    }
  }
  return unknown ? 'X' : 1;
}

export function compare(a: string, b: string): -1 | 0 | 1 | null {
  const x = toBigInt(a);
  const y = toBigInt(b);
  if (x === null || y === null) return null;
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Keep bits on which both candidates agree, X elsewhere
 */
export function merge(a: string, b: string): string {
  return zip(a, b, (x, y) => (x === y ? x : 'X'));
}

/**
 * Result when an unknown condition selects between two candidates
 */
export function unresolved(a: string, b: string, mode: UnknownMode): string {
  return mode === 'exact' ? merge(a, b) : allX(Math.max(a.length, b.length));
}

/**
 * Registers cannot hold high impedance: a stored Z reads back as X
 */
export function settle(bits: string): string {
  return bits.replace(/Z/g, 'X');
}
