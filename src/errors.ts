/**
 * Evaluation errors.
 *
 * Every failure in parsing, conversion or evaluation is an EvalError whose
 * `detail` is one of a closed set of kinds. Errors are thrown and abort the
 * whole request; the caller decides what to do with them.
 */

// ============================================================================
// Error Details
// ============================================================================

export type EvalErrorDetail =
  | ParseErrorDetail
  | UnsupportedDetail
  | UnknownVariableDetail
  | TypeMismatchDetail
  | InvalidOperationDetail
  | DivisionByZeroDetail
  | IndexOutOfBoundsDetail
  | NullPointerDetail
  | FieldNotFoundDetail
  | InternalDetail;

export interface ParseErrorDetail {
  kind: "parse";
  message: string;
}

/** A construct that is recognized but deliberately not evaluated. */
export interface UnsupportedDetail {
  kind: "unsupported";
  construct: string;
}

export interface UnknownVariableDetail {
  kind: "unknownVariable";
  name: string;
}

export interface TypeMismatchDetail {
  kind: "typeMismatch";
  expected: string;
  found: string;
}

/**
 * Operand types that the operator does not accept.
 * Unary operators leave `rightType` empty.
 */
export interface InvalidOperationDetail {
  kind: "invalidOperation";
  op: string;
  leftType: string;
  rightType: string;
}

export interface DivisionByZeroDetail {
  kind: "divisionByZero";
}

export interface IndexOutOfBoundsDetail {
  kind: "indexOutOfBounds";
  index: number;
  length: number;
}

export interface NullPointerDetail {
  kind: "nullPointer";
}

export interface FieldNotFoundDetail {
  kind: "fieldNotFound";
  field: string;
  typeName: string;
}

/** Checked-arithmetic overflow and broken invariants. */
export interface InternalDetail {
  kind: "internal";
  message: string;
}

export type EvalErrorKind = EvalErrorDetail["kind"];

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render an error detail as a single line of text.
 */
export function formatEvalError(detail: EvalErrorDetail): string {
  switch (detail.kind) {
    case "parse":
      return `Parse error: ${detail.message}`;

    case "unsupported":
      return `Unsupported expression: ${detail.construct}. This feature is not yet implemented.`;

    case "unknownVariable":
      return `Unknown variable: '${detail.name}'`;

    case "typeMismatch":
      return `Type mismatch: expected ${detail.expected}, found ${detail.found}`;

    case "invalidOperation":
      return detail.rightType === ""
        ? `Cannot apply operator '${detail.op}' to type ${detail.leftType}`
        : `Cannot apply operator '${detail.op}' to types ${detail.leftType} and ${detail.rightType}`;

    case "divisionByZero":
      return "Division by zero";

    case "indexOutOfBounds":
      return `Index out of bounds: index ${detail.index}, length ${detail.length}`;

    case "nullPointer":
      return "Null pointer dereference";

    case "fieldNotFound":
      return `Field '${detail.field}' not found on type ${detail.typeName}`;

    case "internal":
      return `Internal error: ${detail.message}`;
  }
}

// ============================================================================
// Error Class
// ============================================================================

export class EvalError extends Error {
  constructor(public readonly detail: EvalErrorDetail) {
    super(formatEvalError(detail));
    this.name = "EvalError";
  }

  get kind(): EvalErrorKind {
    return this.detail.kind;
  }
}

// ============================================================================
// Constructors
// ============================================================================

export const parseError = (message: string): EvalError =>
  new EvalError({ kind: "parse", message });

export const unsupported = (construct: string): EvalError =>
  new EvalError({ kind: "unsupported", construct });

export const unknownVariable = (name: string): EvalError =>
  new EvalError({ kind: "unknownVariable", name });

export const typeMismatch = (expected: string, found: string): EvalError =>
  new EvalError({ kind: "typeMismatch", expected, found });

export const invalidOperation = (op: string, leftType: string, rightType = ""): EvalError =>
  new EvalError({ kind: "invalidOperation", op, leftType, rightType });

export const divisionByZero = (): EvalError => new EvalError({ kind: "divisionByZero" });

export const indexOutOfBounds = (index: number, length: number): EvalError =>
  new EvalError({ kind: "indexOutOfBounds", index, length });

export const nullPointer = (): EvalError => new EvalError({ kind: "nullPointer" });

export const fieldNotFound = (field: string, typeName: string): EvalError =>
  new EvalError({ kind: "fieldNotFound", field, typeName });

export const internalError = (message: string): EvalError =>
  new EvalError({ kind: "internal", message });
