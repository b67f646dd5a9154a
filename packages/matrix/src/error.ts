import type { CellKind, CellValue } from "./cell.js";
import { inspectCell } from "./cell.js";

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all bench-matrix errors.
 *
 * Provides structured error categories with typed parameters for
 * programmatic error handling via `instanceof` checks.
 *
 * @example
 * ```typescript
 * try {
 *   combination.getTag(0);
 * } catch (error) {
 *   if (error instanceof CellKindMismatch) {
 *     console.log(error.index, error.actual);
 *   }
 * }
 * ```
 */
export class MatrixError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================================================
// Error Categories
// ============================================================================

/**
 * Thrown when a function argument fails validation.
 *
 * @example
 * ```typescript
 * // Thrown when an unsigned cell is given a negative payload
 * Cell.unsigned(-1);
 * ```
 */
export class InvalidArgument extends MatrixError {
  readonly expected: string;
  readonly actual?: string;

  constructor(params: { expected: string; actual?: string }) {
    const act = params.actual !== undefined ? `, got ${params.actual}` : "";
    super(`Invalid argument: expected ${params.expected}${act}`);
    this.expected = params.expected;
    this.actual = params.actual;
  }
}

/**
 * Thrown by the typed accessors when a combination has no cell at the index.
 *
 * @example
 * ```typescript
 * // Two-axis combination, third position requested
 * combination.getBool(2);
 * ```
 */
export class CellNotFound extends MatrixError {
  readonly index: number;
  readonly length: number;

  constructor(params: { index: number; length: number }) {
    super(`No cell at index ${params.index} (combination has ${params.length} cells)`);
    this.index = params.index;
    this.length = params.length;
  }
}

/**
 * Thrown by the typed accessors when the cell exists but holds another variant.
 *
 * @example
 * ```typescript
 * // Cell 1 is Int(1024)
 * combination.getTag(1); // Expected Tag at index 1, found Int(1024)
 * ```
 */
export class CellKindMismatch extends MatrixError {
  readonly index: number;
  readonly expected: CellKind;
  readonly actual: CellValue;

  constructor(params: { index: number; expected: CellKind; actual: CellValue }) {
    super(`Expected ${params.expected} at index ${params.index}, found ${inspectCell(params.actual)}`);
    this.index = params.index;
    this.expected = params.expected;
    this.actual = params.actual;
  }
}

/**
 * Thrown from inside a sample when the per-sample setup callback fails.
 *
 * This is not a skip: the failure happens inside the harness's measured region,
 * so it aborts the benchmark case and the suite run rejects with it.
 */
export class SampleSetupFailed extends MatrixError {
  readonly suite: string;
  readonly id: string;
  readonly config: string;

  constructor(params: { suite: string; id: string; config: string; cause: unknown }) {
    super(`Suite '${params.suite}', case '${params.id}': sample setup failed for config ${params.config}`, {
      cause: params.cause,
    });
    this.suite = params.suite;
    this.id = params.id;
    this.config = params.config;
  }
}

// ============================================================================
// Assert Utility
// ============================================================================

/**
 * Assert a condition, throwing a typed error if false.
 *
 * Error is only constructed when the condition fails (lazy construction).
 * TypeScript `asserts condition` narrows the type at call sites.
 *
 * @param condition - Value to check for truthiness
 * @param ErrorClass - Error class to instantiate on failure
 * @param params - Constructor parameters for the error class
 *
 * @example
 * ```typescript
 * assert(value >= 0n, InvalidArgument, { expected: "non-negative integer", actual: String(value) });
 * ```
 */
export function assert<P>(
  condition: unknown,
  ErrorClass: new (params: P) => MatrixError,
  params: P
): asserts condition {
  if (!condition) {
    throw new ErrorClass(params);
  }
}

/**
 * Render an unknown thrown value for a diagnostic line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
