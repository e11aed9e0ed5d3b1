export type HexErrorCode =
  | "InvalidCoordinate"
  | "UnsupportedOperand"
  | "DivisionByZero"
  | "InvalidDirection"
  | "InvalidRadius"
  | "InvalidArgument"
  | "KeyNotFound"
  | "InvalidLayout"
  | "LayoutNotSet";

/**
 * Base class for everything the library throws.
 * Switch on `code` rather than on the class when crossing module boundaries.
 */
export abstract class HexError extends Error {
  abstract readonly code: HexErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidCoordinateError extends HexError {
  readonly code = "InvalidCoordinate";
}

export class UnsupportedOperandError extends HexError {
  readonly code = "UnsupportedOperand";
}

export class DivisionByZeroError extends HexError {
  readonly code = "DivisionByZero";
}

export class InvalidDirectionError extends HexError {
  readonly code = "InvalidDirection";
}

export class InvalidRadiusError extends HexError {
  readonly code = "InvalidRadius";
}

export class InvalidArgumentError extends HexError {
  readonly code = "InvalidArgument";
}

export class KeyNotFoundError extends HexError {
  readonly code = "KeyNotFound";
}

export class InvalidLayoutError extends HexError {
  readonly code = "InvalidLayout";
}

export class LayoutNotSetError extends HexError {
  readonly code = "LayoutNotSet";

  constructor() {
    super("No default layout has been set; call setDefaultLayout() or pass a layout explicitly");
  }
}

/** Human readable description of an arbitrary operand, for error messages. */
export const describeOperand = (value: unknown): string => {
  if (value === null) return "null";
  if (Array.isArray(value)) return `array [${value.join(", ")}]`;
  if (typeof value === "object") return String(value);
  return `${typeof value} ${String(value)}`;
};
