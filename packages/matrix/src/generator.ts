import type { Axis, CellValue } from "./cell.js";
import { Combination } from "./combination.js";
import { assert, InvalidArgument } from "./error.js";

// ============================================================================
// Combination Set
// ============================================================================

/**
 * Lazy Cartesian product of a list of axes.
 *
 * Iteration yields combinations one at a time in lexicographic order: the first
 * axis is the outermost loop and the last axis changes fastest. Only the current
 * index vector is held while iterating, never the full product.
 *
 * `size` is the total number of combinations (the product of axis lengths). It is
 * fixed at construction and does not count down as iteration proceeds.
 *
 * @throws {InvalidArgument} When the product exceeds `Number.MAX_SAFE_INTEGER`,
 * past which `size` and `at()` would no longer be exact
 */
export class CombinationSet implements Iterable<Combination> {
  readonly size: number;
  private readonly axes: readonly Axis[];

  constructor(axes: readonly Axis[]) {
    // Snapshot so later caller mutation cannot change the sequence.
    this.axes = axes.map((values) => [...values]);
    const size = this.axes.length === 0 ? 0 : this.axes.reduce((product, values) => product * values.length, 1);
    assert(Number.isSafeInteger(size), InvalidArgument, {
      expected: "at most Number.MAX_SAFE_INTEGER combinations",
      actual: `${this.axes.map((values) => values.length).join(" x ")} = ${size}`,
    });
    this.size = size;
  }

  get axisCount(): number {
    return this.axes.length;
  }

  *[Symbol.iterator](): Iterator<Combination> {
    if (this.size === 0) {
      return;
    }

    const indices = new Array<number>(this.axes.length).fill(0);

    while (true) {
      yield this.combinationAt(indices);

      // Odometer increment, rightmost axis first
      let axisIdx = this.axes.length - 1;
      while (axisIdx >= 0) {
        const next = indices[axisIdx]! + 1;
        if (next < this.axes[axisIdx]!.length) {
          indices[axisIdx] = next;
          break;
        }
        indices[axisIdx] = 0;
        axisIdx--;
      }
      if (axisIdx < 0) {
        return;
      }
    }
  }

  /**
   * Random access by position in iteration order.
   *
   * @throws {InvalidArgument} When `index` is not an integer in `[0, size)`
   */
  at(index: number): Combination {
    assert(Number.isInteger(index) && index >= 0 && index < this.size, InvalidArgument, {
      expected: `combination index in [0, ${this.size})`,
      actual: String(index),
    });

    // Mixed-radix decode, last axis is the least significant digit
    const indices = new Array<number>(this.axes.length);
    let remaining = index;
    for (let i = this.axes.length - 1; i >= 0; i--) {
      const radix = this.axes[i]!.length;
      indices[i] = remaining % radix;
      remaining = Math.floor(remaining / radix);
    }
    return this.combinationAt(indices);
  }

  private combinationAt(indices: readonly number[]): Combination {
    const cells: CellValue[] = [];
    for (let i = 0; i < this.axes.length; i++) {
      cells.push(this.axes[i]![indices[i]!]!);
    }
    return new Combination(cells);
  }
}

// ============================================================================
// Generation
// ============================================================================

/**
 * Generate every combination that picks one value from each axis.
 *
 * An empty axis list, or any empty axis, produces an empty set. That is zero
 * combinations, not a single empty row.
 *
 * @example
 * ```typescript
 * const combos = generateCombinations([
 *   [Cell.tag("A"), Cell.tag("B")],
 *   [Cell.int(1), Cell.int(2)],
 * ]);
 * combos.size; // 4
 * [...combos].map((c) => c.idSuffix()); // ["_A_Int1", "_A_Int2", "_B_Int1", "_B_Int2"]
 * ```
 */
export function generateCombinations(axes: readonly Axis[]): CombinationSet {
  return new CombinationSet(axes);
}
