/**
 * Fixed-width numeric helpers.
 *
 * Integers are carried as bigint, which doubles as the widened 128-bit
 * intermediate: every signed and unsigned value (u128 included) fits
 * without loss.
 * Narrowing back to a declared width is either checked (arithmetic) or
 * wrapping (`as` casts).
 */

// ============================================================================
// Type Names
// ============================================================================

export const INT_TYPE_NAMES = [
  "i8",
  "i16",
  "i32",
  "i64",
  "i128",
  "isize",
  "u8",
  "u16",
  "u32",
  "u64",
  "u128",
  "usize",
] as const;

export const FLOAT_TYPE_NAMES = ["f32", "f64"] as const;

export type IntTypeName = (typeof INT_TYPE_NAMES)[number];
export type FloatTypeName = (typeof FLOAT_TYPE_NAMES)[number];

/** Width of isize/usize. Targets are assumed to be 64-bit. */
export const POINTER_BITS = 64;

export interface IntKind {
  bits: number;
  signed: boolean;
}

const INT_KINDS: Record<IntTypeName, IntKind> = {
  i8: { bits: 8, signed: true },
  i16: { bits: 16, signed: true },
  i32: { bits: 32, signed: true },
  i64: { bits: 64, signed: true },
  i128: { bits: 128, signed: true },
  isize: { bits: POINTER_BITS, signed: true },
  u8: { bits: 8, signed: false },
  u16: { bits: 16, signed: false },
  u32: { bits: 32, signed: false },
  u64: { bits: 64, signed: false },
  u128: { bits: 128, signed: false },
  usize: { bits: POINTER_BITS, signed: false },
};

export function isIntTypeName(name: string): name is IntTypeName {
  return (INT_TYPE_NAMES as readonly string[]).includes(name);
}

export function isFloatTypeName(name: string): name is FloatTypeName {
  return (FLOAT_TYPE_NAMES as readonly string[]).includes(name);
}

export function intKind(name: IntTypeName): IntKind {
  return INT_KINDS[name];
}

// ============================================================================
// Integer Ranges
// ============================================================================

export function intMin(name: IntTypeName): bigint {
  const { bits, signed } = INT_KINDS[name];
  return signed ? -(1n << BigInt(bits - 1)) : 0n;
}

export function intMax(name: IntTypeName): bigint {
  const { bits, signed } = INT_KINDS[name];
  return signed ? (1n << BigInt(bits - 1)) - 1n : (1n << BigInt(bits)) - 1n;
}

export function fitsIn(value: bigint, name: IntTypeName): boolean {
  return value >= intMin(name) && value <= intMax(name);
}

/**
 * Two's-complement wrap into the given width: the high bits are dropped
 * and the remainder is reinterpreted with the target signedness.
 */
export function wrapTo(value: bigint, name: IntTypeName): bigint {
  const { bits, signed } = INT_KINDS[name];
  return signed ? BigInt.asIntN(bits, value) : BigInt.asUintN(bits, value);
}

/**
 * Narrowest of i32, i64, i128 able to hold an unsuffixed integer literal,
 * or undefined when even i128 cannot.
 */
export function literalIntType(value: bigint): IntTypeName | undefined {
  for (const name of ["i32", "i64", "i128"] as const) {
    if (fitsIn(value, name)) return name;
  }
  return undefined;
}

// ============================================================================
// Floats
// ============================================================================

/** Round a double to the precision of the given float type. */
export function roundToFloat(value: number, name: FloatTypeName): number {
  return name === "f32" ? Math.fround(value) : value;
}

const F32_SIGNIFICAND_BITS = 24;

/**
 * Integer-to-float conversion rounding once, to nearest with ties to even.
 * `Number(value)` alone would round to f64 first, and rounding that again
 * to f32 can land on the wrong neighbour.
 *
 * @example
 * bigintToFloat(2n ** 60n + 2n ** 36n + 1n, "f32") // 2 ** 60 + 2 ** 37
 */
export function bigintToFloat(value: bigint, name: FloatTypeName): number {
  if (name === "f64") return Number(value);

  const magnitude = value < 0n ? -value : value;
  const excess = magnitude.toString(2).length - F32_SIGNIFICAND_BITS;
  if (excess <= 0) return Number(value);

  const shift = BigInt(excess);
  const half = 1n << (shift - 1n);
  const dropped = magnitude & ((1n << shift) - 1n);
  let kept = magnitude >> shift;
  if (dropped > half || (dropped === half && (kept & 1n) === 1n)) {
    kept += 1n;
  }
  // Exact in a double; fround only maps values past f32::MAX to infinity
  const rounded = Math.fround(Number(kept << shift));
  return value < 0n ? -rounded : rounded;
}

/**
 * Float-to-integer conversion with `as` semantics: truncate toward zero,
 * saturate at the bounds of the target, NaN becomes 0.
 */
export function floatToInt(value: number, name: IntTypeName): bigint {
  if (Number.isNaN(value)) return 0n;
  if (value === Infinity) return intMax(name);
  if (value === -Infinity) return intMin(name);

  const truncated = BigInt(Math.trunc(value));
  if (truncated < intMin(name)) return intMin(name);
  if (truncated > intMax(name)) return intMax(name);
  return truncated;
}

/**
 * Format a float the way Display does: shortest digits that round-trip at
 * the value's own precision, never in exponent notation, no trailing ".0".
 */
export function formatFloat(value: number, name: FloatTypeName): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "inf";
  if (value === -Infinity) return "-inf";
  if (Object.is(value, -0)) return "-0";

  const digits = name === "f32" ? shortestSingle(value) : String(value);
  return expandExponent(digits);
}

function shortestSingle(value: number): string {
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) {
      return String(candidate);
    }
  }
  return String(value);
}

/**
 * Rewrite "1.5e+21" / "1e-7" as plain decimal text.
 */
function expandExponent(text: string): string {
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, sign, whole, fraction = "", exp] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exp);

  if (point <= 0) {
    return `${sign}0.${"0".repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${"0".repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}
