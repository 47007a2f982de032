/**
 * Runtime values for the evaluator.
 *
 * A closed union: each primitive width is its own tag, so two values have
 * the same type exactly when their tags match.
 */

import {
  IntTypeName,
  FloatTypeName,
  isIntTypeName,
  isFloatTypeName,
  intKind,
  fitsIn,
  roundToFloat,
  formatFloat,
} from "./numeric";
import { internalError } from "./errors";

// ============================================================================
// Value Types
// ============================================================================

export type Value =
  | IntValue
  | FloatValue
  | BoolValue
  | CharValue
  | StringValue
  | UnitValue
  | RefValue;

/** Fixed-width integer. `value` always lies within the range of `tag`. */
export interface IntValue {
  tag: IntTypeName;
  value: bigint;
}

/** IEEE float. An f32 payload is already rounded to single precision. */
export interface FloatValue {
  tag: FloatTypeName;
  value: number;
}

export interface BoolValue {
  tag: "bool";
  value: boolean;
}

/** A single Unicode scalar value. */
export interface CharValue {
  tag: "char";
  value: string;
}

export interface StringValue {
  tag: "String";
  value: string;
}

export interface UnitValue {
  tag: "unit";
}

/**
 * A value the evaluator cannot interpret itself, kept only for display.
 */
export interface RefValue {
  tag: "ref";
  address: bigint;
  typeName: string;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Build an integer value. Throws an internal error when `value` does not
 * fit the declared width.
 */
export function intVal(tag: IntTypeName, value: bigint | number): IntValue {
  const wide = typeof value === "bigint" ? value : BigInt(value);
  if (!fitsIn(wide, tag)) {
    throw internalError(`${wide} does not fit in ${tag}`);
  }
  return { tag, value: wide };
}

export const floatVal = (tag: FloatTypeName, value: number): FloatValue => ({
  tag,
  value: roundToFloat(value, tag),
});

export const boolVal = (value: boolean): BoolValue => ({ tag: "bool", value });

export function charVal(value: string): CharValue {
  if ([...value].length !== 1) {
    throw internalError(`char must hold exactly one code point, got ${JSON.stringify(value)}`);
  }
  return { tag: "char", value };
}

export const stringVal = (value: string): StringValue => ({ tag: "String", value });

export const unitVal: UnitValue = { tag: "unit" };

export const refVal = (address: bigint, typeName: string): RefValue => ({
  tag: "ref",
  address,
  typeName,
});

// ============================================================================
// Introspection
// ============================================================================

/**
 * The type name used in diagnostics and for the same-type operand rule.
 */
export function typeName(value: Value): string {
  switch (value.tag) {
    case "i8":
    case "i16":
    case "i32":
    case "i64":
    case "i128":
    case "isize":
    case "u8":
    case "u16":
    case "u32":
    case "u64":
    case "u128":
    case "usize":
    case "f32":
    case "f64":
    case "bool":
    case "char":
    case "String":
      return value.tag;
    case "unit":
      return "()";
    case "ref":
      return "ref";
  }
}

export function isIntValue(value: Value): value is IntValue {
  return isIntTypeName(value.tag);
}

export function isFloatValue(value: Value): value is FloatValue {
  return isFloatTypeName(value.tag);
}

export function isNumeric(value: Value): boolean {
  return isIntValue(value) || isFloatValue(value);
}

export function isInteger(value: Value): boolean {
  return isIntValue(value);
}

export function isSigned(value: Value): boolean {
  return isIntValue(value) && intKind(value.tag).signed;
}

/** The widened integer, for integer values only. */
export function toWideInt(value: Value): bigint | undefined {
  return isIntValue(value) ? value.value : undefined;
}

/** The float payload as a double. Integers are not converted. */
export function toFloat64(value: Value): number | undefined {
  return isFloatValue(value) ? value.value : undefined;
}

export function toBool(value: Value): boolean | undefined {
  return value.tag === "bool" ? value.value : undefined;
}

// ============================================================================
// Equality and Display
// ============================================================================

/**
 * Structural equality: same type and same payload. Floats compare by
 * IEEE equality, so NaN is not equal to itself.
 */
export function valueEquals(a: Value, b: Value): boolean {
  switch (a.tag) {
    case "unit":
      return b.tag === "unit";
    case "ref":
      return b.tag === "ref" && a.address === b.address && a.typeName === b.typeName;
    default:
      return a.tag === b.tag && "value" in b && a.value === b.value;
  }
}

/**
 * Display rendering of a value.
 */
export function valueToString(value: Value): string {
  switch (value.tag) {
    case "i8":
    case "i16":
    case "i32":
    case "i64":
    case "i128":
    case "isize":
    case "u8":
    case "u16":
    case "u32":
    case "u64":
    case "u128":
    case "usize":
      return value.value.toString();

    case "f32":
    case "f64":
      return formatFloat(value.value, value.tag);

    case "bool":
      return String(value.value);

    case "char":
      return `'${value.value}'`;

    case "String":
      return `"${value.value}"`;

    case "unit":
      return "()";

    case "ref":
      return `&${value.typeName} @ 0x${value.address.toString(16)}`;
  }
}
