import {
  type CellKind,
  type CellPayload,
  type CellValue,
  cellEquals,
  cellFragment,
  cellValueFragment,
  inspectCell,
} from "./cell.js";
import { CellKindMismatch, CellNotFound } from "./error.js";
import { consoleLogger, type Logger } from "./log.js";

// ============================================================================
// Combination
// ============================================================================

/**
 * One row of the parameter matrix: exactly one cell per axis, positionally
 * aligned with the axis list it was generated from.
 *
 * The typed accessors are how extractors turn a row into a concrete
 * configuration. Each returns the payload or throws {@link CellNotFound} /
 * {@link CellKindMismatch}; values are never coerced between variants.
 *
 * @example
 * ```typescript
 * function extract(combo: Combination): SortConfig {
 *   return {
 *     algorithm: combo.getTag(0),
 *     elements: Number(combo.getUnsigned(1)),
 *     intensity: combo.getString(2),
 *   };
 * }
 * ```
 */
export class Combination {
  readonly cells: readonly CellValue[];

  constructor(cells: readonly CellValue[]) {
    this.cells = Object.freeze([...cells]);
  }

  get length(): number {
    return this.cells.length;
  }

  getTag(index: number): string {
    return this.getCell(index, "Tag");
  }

  getString(index: number): string {
    return this.getCell(index, "String");
  }

  getInt(index: number): bigint {
    return this.getCell(index, "Int");
  }

  getUnsigned(index: number): bigint {
    return this.getCell(index, "Unsigned");
  }

  getBool(index: number): boolean {
    return this.getCell(index, "Bool");
  }

  /**
   * Id suffix built from every cell's fragment in axis order, each prefixed
   * with `_`. An empty combination yields `"_"`.
   *
   * @example
   * ```typescript
   * new Combination([Cell.tag("Epoll"), Cell.int(1024), Cell.bool(true)]).idSuffix();
   * // "_Epoll_Int1024_Booltrue"
   * ```
   */
  idSuffix(): string {
    return `_${this.cells.map(cellFragment).join("_")}`;
  }

  /**
   * Id suffix of `<Name>-<value>` parts, one per axis.
   *
   * A name list whose length differs from the combination is a caller
   * configuration error: a warning goes to `logger` and the unnamed
   * {@link idSuffix} is returned instead.
   *
   * @example
   * ```typescript
   * new Combination([Cell.tag("Uring"), Cell.unsigned(512)]).idSuffixWithNames(["Backend", "BlockSize"]);
   * // "_Backend-Uring_BlockSize-512"
   * ```
   */
  idSuffixWithNames(names: readonly string[], logger: Logger = consoleLogger): string {
    if (names.length !== this.cells.length) {
      logger.warn(
        `Parameter name count (${names.length}) does not match combination length (${this.cells.length}); using unnamed id suffix`
      );
      return this.idSuffix();
    }
    const parts = this.cells.map((cell, i) => `${names[i]}-${cellValueFragment(cell)}`);
    return `_${parts.join("_")}`;
  }

  equals(other: Combination): boolean {
    if (other.cells.length !== this.cells.length) {
      return false;
    }
    return this.cells.every((cell, i) => {
      const otherCell = other.cells[i];
      return otherCell !== undefined && cellEquals(cell, otherCell);
    });
  }

  toString(): string {
    return `[${this.cells.map(inspectCell).join(", ")}]`;
  }

  private getCell<K extends CellKind>(index: number, kind: K): CellPayload<K> {
    const cell = this.cells[index];
    if (cell === undefined) {
      throw new CellNotFound({ index, length: this.cells.length });
    }
    if (!isKind(cell, kind)) {
      throw new CellKindMismatch({ index, expected: kind, actual: cell });
    }
    return cell.value;
  }
}

function isKind<K extends CellKind>(cell: CellValue, kind: K): cell is Extract<CellValue, { kind: K }> {
  return cell.kind === kind;
}
