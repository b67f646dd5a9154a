import { assert, InvalidArgument } from "./error.js";

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * One typed scalar entry of an axis.
 *
 * A closed union discriminated by `kind`. 64-bit integer payloads are stored as
 * `bigint` so the full signed and unsigned ranges survive. Cells are frozen on
 * creation and compared structurally (see {@link cellEquals}).
 *
 * @example
 * ```typescript
 * const backend: CellValue = Cell.tag("Uring");
 * const size: CellValue = Cell.unsigned(512);
 * ```
 */
export type CellValue =
  | { readonly kind: "Tag"; readonly value: string }
  | { readonly kind: "String"; readonly value: string }
  | { readonly kind: "Int"; readonly value: bigint }
  | { readonly kind: "Unsigned"; readonly value: bigint }
  | { readonly kind: "Bool"; readonly value: boolean };

export type CellKind = CellValue["kind"];

/**
 * Payload type carried by the variant `K`.
 */
export type CellPayload<K extends CellKind> = Extract<CellValue, { kind: K }>["value"];

/**
 * Ordered list of candidate values for one configuration dimension.
 */
export type Axis = readonly CellValue[];

// ============================================================================
// Range Limits
// ============================================================================

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

function freeze(cell: CellValue): CellValue {
  return Object.freeze(cell);
}

function toBigInt(value: number | bigint, expected: string): bigint {
  if (typeof value === "bigint") {
    return value;
  }
  assert(Number.isSafeInteger(value), InvalidArgument, { expected, actual: String(value) });
  return BigInt(value);
}

// ============================================================================
// Cell Factories
// ============================================================================

/**
 * Cell factory namespace.
 *
 * Integer factories accept `number` or `bigint` and reject non-integers and
 * payloads outside the 64-bit range with {@link InvalidArgument}.
 *
 * @example
 * ```typescript
 * const axes = [
 *   [Cell.tag("Sort"), Cell.tag("Process")],
 *   [Cell.unsigned(100), Cell.unsigned(500)],
 *   [Cell.string("Low"), Cell.string("Medium")],
 * ];
 * ```
 */
export const Cell = {
  /** Semantic tag or identifier, rendered raw in ids. */
  tag: (value: string): CellValue => freeze({ kind: "Tag", value }),

  /** Free-form text, sanitized in ids and quoted in display form. */
  string: (value: string): CellValue => freeze({ kind: "String", value }),

  /** 64-bit signed integer. */
  int: (value: number | bigint): CellValue => {
    const expected = "64-bit signed integer";
    const big = toBigInt(value, expected);
    assert(big >= INT64_MIN && big <= INT64_MAX, InvalidArgument, { expected, actual: String(value) });
    return freeze({ kind: "Int", value: big });
  },

  /** 64-bit unsigned integer. */
  unsigned: (value: number | bigint): CellValue => {
    const expected = "64-bit unsigned integer";
    const big = toBigInt(value, expected);
    assert(big >= 0n && big <= UINT64_MAX, InvalidArgument, { expected, actual: String(value) });
    return freeze({ kind: "Unsigned", value: big });
  },

  bool: (value: boolean): CellValue => freeze({ kind: "Bool", value }),
};

/**
 * Convert a primitive into a cell: strings become tags, integers (`number` or
 * `bigint`) become signed ints, booleans become bools. Use {@link Cell} directly
 * for `String` and `Unsigned` cells.
 */
export function toCell(value: string | number | bigint | boolean): CellValue {
  switch (typeof value) {
    case "string":
      return Cell.tag(value);
    case "boolean":
      return Cell.bool(value);
    default:
      return Cell.int(value);
  }
}

/**
 * Build an axis from primitives via {@link toCell}. Existing cells pass through.
 *
 * @example
 * ```typescript
 * const backends = axis("Epoll", "Uring"); // [Tag(Epoll), Tag(Uring)]
 * const sizes = axis(Cell.unsigned(64), Cell.unsigned(512));
 * ```
 */
export function axis(...values: (string | number | bigint | boolean | CellValue)[]): Axis {
  return values.map((value) => (typeof value === "object" ? value : toCell(value)));
}

// ============================================================================
// Comparison
// ============================================================================

export function cellEquals(a: CellValue, b: CellValue): boolean {
  return a.kind === b.kind && a.value === b.value;
}

/**
 * Stable string key for hashing (Map/Set keys). Equal cells share a key.
 */
export function cellKey(cell: CellValue): string {
  return `${cell.kind}:${cell.value}`;
}

// ============================================================================
// Rendering
// ============================================================================

const NON_ALPHANUMERIC = /[^\p{Alphabetic}\p{N}]/gu;

function sanitize(text: string): string {
  return text.replace(NON_ALPHANUMERIC, "_");
}

/**
 * Display form: tags raw, strings quoted, numbers and booleans canonical.
 */
export function formatCell(cell: CellValue): string {
  if (cell.kind === "String") {
    return `"${cell.value}"`;
  }
  return String(cell.value);
}

/**
 * Debug form naming the variant, e.g. `Int(1024)` or `String("Low")`.
 */
export function inspectCell(cell: CellValue): string {
  if (cell.kind === "String") {
    return `String("${cell.value}")`;
  }
  return `${cell.kind}(${cell.value})`;
}

/**
 * Identifier fragment used by unnamed id suffixes.
 *
 * @example
 * ```typescript
 * cellFragment(Cell.tag("Epoll")); // "Epoll"
 * cellFragment(Cell.string("My Param")); // "My_Param"
 * cellFragment(Cell.int(1024)); // "Int1024"
 * cellFragment(Cell.unsigned(7)); // "Uint7"
 * cellFragment(Cell.bool(true)); // "Booltrue"
 * ```
 */
export function cellFragment(cell: CellValue): string {
  switch (cell.kind) {
    case "Tag":
      return cell.value;
    case "String":
      return sanitize(cell.value);
    case "Int":
      return `Int${cell.value}`;
    case "Unsigned":
      return `Uint${cell.value}`;
    case "Bool":
      return `Bool${cell.value}`;
  }
}

/**
 * Identifier value used after `<Name>-` in named id suffixes. Unlike
 * {@link cellFragment}, numbers and booleans carry no variant prefix.
 */
export function cellValueFragment(cell: CellValue): string {
  if (cell.kind === "String") {
    return sanitize(cell.value);
  }
  return String(cell.value);
}
