import { assert, InvalidArgument } from "./error.js";

// ============================================================================
// Harness Boundary
// ============================================================================

/**
 * Summary-plot axis scale for a group.
 */
export type AxisScale = "linear" | "logarithmic";

/**
 * Per-case throughput annotation: how much work one logic iteration does.
 */
export type Throughput = { kind: "elements"; count: number } | { kind: "bytes"; count: number };

/**
 * Runs one sample of a benchmark case. Receives the harness's iterations hint
 * and returns the summed duration of those iterations in milliseconds.
 */
export type SampleRoutine = (iterations: number) => number | Promise<number>;

export type BenchOptions = {
  throughput?: Throughput;
};

/**
 * Group-level settings. All times are in milliseconds.
 */
export type GroupSettings = {
  /** Minimum number of samples per case. */
  sampleSize: number;
  /** Time budget per case; sampling continues until both this and `sampleSize` are met. */
  measurementTime: number;
  warmupTime: number;
  warmupIterations: number;
  /** Iterations hint handed to each sample routine. */
  iterationsPerSample: number;
  plotScale: AxisScale;
};

export const DEFAULT_GROUP_SETTINGS: Readonly<GroupSettings> = {
  sampleSize: 100,
  measurementTime: 0,
  warmupTime: 0,
  warmupIterations: 4,
  iterationsPerSample: 1,
  plotScale: "linear",
};

/**
 * A named collection of benchmark cases sharing display and sampling settings.
 *
 * Setters chain. `bench()` runs the case to completion before its promise
 * resolves, so callers can sequence per-configuration work around it.
 */
export interface BenchmarkGroup {
  readonly name: string;
  readonly settings: Readonly<GroupSettings>;
  sampleSize(n: number): this;
  measurementTime(ms: number): this;
  warmupTime(ms: number): this;
  warmupIterations(n: number): this;
  iterationsPerSample(n: number): this;
  plotScale(scale: AxisScale): this;
  /**
   * Register and run one case. Rejects with the routine's error if a sample fails.
   */
  bench(id: string, routine: SampleRoutine, options?: BenchOptions): Promise<void>;
  /** Flush the group's results (report output). */
  finish(): void;
}

/**
 * External benchmarking harness: owns sampling, statistics and reporting.
 */
export interface Harness {
  group(name: string): BenchmarkGroup;
}

// ============================================================================
// Shared Group Base
// ============================================================================

/**
 * Settings storage and validated chained setters shared by harness groups.
 */
export abstract class BaseBenchmarkGroup implements BenchmarkGroup {
  readonly name: string;
  protected readonly current: GroupSettings;

  constructor(name: string, defaults: Readonly<GroupSettings> = DEFAULT_GROUP_SETTINGS) {
    this.name = name;
    this.current = { ...defaults };
  }

  get settings(): Readonly<GroupSettings> {
    return this.current;
  }

  sampleSize(n: number): this {
    this.current.sampleSize = positiveInteger("sampleSize", n);
    return this;
  }

  measurementTime(ms: number): this {
    this.current.measurementTime = nonNegative("measurementTime", ms);
    return this;
  }

  warmupTime(ms: number): this {
    this.current.warmupTime = nonNegative("warmupTime", ms);
    return this;
  }

  warmupIterations(n: number): this {
    this.current.warmupIterations = nonNegative("warmupIterations", Math.floor(n));
    return this;
  }

  iterationsPerSample(n: number): this {
    this.current.iterationsPerSample = positiveInteger("iterationsPerSample", n);
    return this;
  }

  plotScale(scale: AxisScale): this {
    this.current.plotScale = scale;
    return this;
  }

  abstract bench(id: string, routine: SampleRoutine, options?: BenchOptions): Promise<void>;
  abstract finish(): void;
}

function positiveInteger(setting: string, n: number): number {
  assert(Number.isInteger(n) && n > 0, InvalidArgument, {
    expected: `${setting} to be a positive integer`,
    actual: String(n),
  });
  return n;
}

function nonNegative(setting: string, n: number): number {
  assert(Number.isFinite(n) && n >= 0, InvalidArgument, {
    expected: `${setting} to be non-negative`,
    actual: String(n),
  });
  return n;
}
