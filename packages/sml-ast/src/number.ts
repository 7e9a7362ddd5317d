import type { Complex, NumberNode, Pos } from './index';

const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;
const UINT64_MAX = (1n << 64n) - 1n;

const FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER = /^([+-]?)(0[xX][0-9a-fA-F]+|0[0-7]*|[1-9]\d*)$/;
const UNSIGNED_FLOAT = '(?:\\d+\\.?\\d*|\\.\\d+)(?:[eE][+-]?\\d+)?';
const COMPLEX = new RegExp(`^([+-]?${UNSIGNED_FLOAT})([+-]${UNSIGNED_FLOAT})i$`);

/**
 * Integer literal: decimal, `0x` hex, or leading-zero octal.
 * Returns null when the text is not an integer literal.
 */
export function parseIntegerLiteral(text: string): bigint | null {
  const m = INTEGER.exec(text);
  if (!m) return null;
  const [, sign, digits] = m;
  let magnitude: bigint;
  if (digits.length > 1 && (digits[1] === 'x' || digits[1] === 'X')) {
    magnitude = BigInt(`0x${digits.slice(2)}`);
  } else if (digits.length > 1) {
    magnitude = BigInt(`0o${digits.slice(1)}`);
  } else {
    magnitude = BigInt(digits);
  }
  return sign === '-' ? -magnitude : magnitude;
}

/** Decimal floating-point literal; null when malformed or out of float64 range. */
export function parseFloatLiteral(text: string): number | null {
  if (!FLOAT.test(text)) return null;
  const f = Number(text);
  return Number.isFinite(f) ? f : null;
}

/** `<real>+<imag>i` or `<real>-<imag>i`. */
export function parseComplexLiteral(text: string): Complex | null {
  const m = COMPLEX.exec(text);
  if (!m) return null;
  const re = Number(m[1]);
  const im = Number(m[2]);
  if (!Number.isFinite(re) || !Number.isFinite(im)) return null;
  return { re, im };
}

function setIntegral(n: NumberNode, f: number): void {
  if (!Number.isInteger(f)) return;
  const v = BigInt(f);
  if (v >= INT64_MIN && v <= INT64_MAX) {
    n.isInt = true;
    n.int64 = v;
  }
  if (v >= 0n && v <= UINT64_MAX) {
    n.isUint = true;
    n.uint64 = v;
  }
}

// A complex value with zero imaginary part also counts as float, and as int/uint when integral.
function simplifyComplex(n: NumberNode): void {
  n.isFloat = n.complex128.im === 0;
  if (n.isFloat) {
    n.float64 = n.complex128.re;
    setIntegral(n, n.float64);
  }
}

/**
 * Classify a numeric literal under every representation that holds it exactly.
 * `complex` marks a literal scanned as `<real>±<imag>i`.
 * Returns null when the literal fits none of int64, uint64, float64, complex128.
 */
export function createNumber(pos: Pos, text: string, complex = false): NumberNode | null {
  const n: NumberNode = {
    type: 'Number',
    pos,
    text,
    isInt: false,
    isUint: false,
    isFloat: false,
    isComplex: false,
    int64: 0n,
    uint64: 0n,
    float64: 0,
    complex128: { re: 0, im: 0 },
  };

  if (complex) {
    const value = parseComplexLiteral(text);
    if (!value) return null;
    n.isComplex = true;
    n.complex128 = value;
    simplifyComplex(n);
    return n;
  }

  // Imaginary literals are complex unless their value is zero.
  if (text.endsWith('i')) {
    const f = parseFloatLiteral(text.slice(0, -1));
    if (f !== null) {
      n.isComplex = true;
      n.complex128 = { re: 0, im: f };
      simplifyComplex(n);
      return n;
    }
  }

  // Integer first so hex and octal forms are recognised.
  const i = parseIntegerLiteral(text);
  if (i !== null) {
    if (i >= INT64_MIN && i <= INT64_MAX) {
      n.isInt = true;
      n.int64 = i;
    }
    if (i >= 0n && i <= UINT64_MAX) {
      n.isUint = true;
      n.uint64 = i;
    }
  }

  if (n.isInt) {
    n.isFloat = true;
    n.float64 = Number(n.int64);
  } else if (n.isUint) {
    n.isFloat = true;
    n.float64 = Number(n.uint64);
  } else {
    const f = parseFloatLiteral(text);
    if (f !== null) {
      n.isFloat = true;
      n.float64 = f;
      setIntegral(n, f);
    }
  }

  if (!n.isInt && !n.isUint && !n.isFloat) return null;
  return n;
}
