import { inspect } from "node:util";
import type { Axis } from "./cell.js";
import type { Combination } from "./combination.js";
import { describeError, SampleSetupFailed } from "./error.js";
import { generateCombinations } from "./generator.js";
import type { BenchmarkGroup, Harness, SampleRoutine, Throughput } from "./harness.js";
import { consoleLogger, createScopedLogger, type Logger } from "./log.js";

// ============================================================================
// Callback Types
// ============================================================================

/**
 * Resolve a combination into a concrete configuration. Throwing skips only
 * this combination.
 */
export type Extractor<Cfg> = (combination: Combination) => Cfg;

/**
 * Once-per-configuration hook run around all of its samples. Throwing (or
 * rejecting) from global setup skips the configuration; from global teardown
 * it only logs a warning.
 */
export type GlobalHook<Cfg> = (config: Cfg) => void | Promise<void>;

export type GroupConfigurator = (group: BenchmarkGroup) => void;

export type ThroughputFn<Cfg> = (config: Cfg) => Throughput;

/**
 * Per-sample values created by setup and threaded through every iteration.
 * `context` is typically small bookkeeping, `state` the heavier resources.
 */
export type SampleResources<Ctx, State> = {
  context: Ctx;
  state: State;
};

/**
 * Outcome of one measured logic iteration. `duration` is in milliseconds.
 */
export type IterationResult<Ctx, State> = SampleResources<Ctx, State> & {
  duration: number;
};

/**
 * Shallow per-sample copy: own enumerable properties on an object with the
 * same prototype, so class methods and function fields survive. Arrays get
 * a new array and primitives are returned as they are. Nested objects are
 * shared with the original; pass a `cloneConfig` for deeper copies or for
 * configurations with internal slots such as `Map` or `Date`.
 */
export function copyConfig<Cfg>(config: Cfg): Cfg {
  if (typeof config !== "object" || config === null) {
    return config;
  }
  if (Array.isArray(config)) {
    return Object.assign([], config);
  }
  return Object.assign(Object.create(Object.getPrototypeOf(config)), config);
}

// ============================================================================
// Options & Summary
// ============================================================================

/**
 * Options shared by both suite variants. Optional hooks can also be attached
 * afterwards through the suite's chained setters.
 */
export type SuiteOptions<Cfg> = {
  harness: Harness;
  /** Suite name, used as the harness group name and in every diagnostic line. */
  name: string;
  axes: readonly Axis[];
  extract: Extractor<Cfg>;
  /** One display name per axis, used for named case labels. */
  parameterNames?: readonly string[];
  globalSetup?: GlobalHook<Cfg>;
  globalTeardown?: GlobalHook<Cfg>;
  /** Overrides the default group settings (sample size 10, logarithmic scale). */
  configureGroup?: GroupConfigurator;
  throughput?: ThroughputFn<Cfg>;
  /**
   * Copies the configuration for each sample. Defaults to {@link copyConfig},
   * a shallow copy that keeps the prototype.
   */
  cloneConfig?: (config: Cfg) => Cfg;
  logger?: Logger;
};

/**
 * Per-run counters. Observational only.
 */
export type RunSummary = {
  suite: string;
  /** Total number of generated combinations. */
  attempted: number;
  completed: number;
  skippedExtraction: number;
  skippedGlobalSetup: number;
};

// ============================================================================
// Suite Base
// ============================================================================

/**
 * Orchestration shared by the blocking and asynchronous suites.
 *
 * Combinations are processed one at a time in generator order. For each one:
 * extract the configuration, run global setup, register the case with the
 * harness (which runs its samples), then run global teardown, before the next
 * combination starts. Extraction and global-setup failures are skipped and
 * counted; a failing sample setup aborts the run.
 *
 * Subclasses supply the sample routine, which is where the blocking and
 * asynchronous variants differ.
 */
export abstract class BenchmarkSuite<Cfg> {
  readonly name: string;
  protected readonly harness: Harness;
  protected readonly axes: readonly Axis[];
  protected readonly extract: Extractor<Cfg>;
  protected readonly log: Logger;
  protected clone: (config: Cfg) => Cfg;
  private names: readonly string[] | undefined;
  private setupHook: GlobalHook<Cfg> | undefined;
  private teardownHook: GlobalHook<Cfg> | undefined;
  private configurator: GroupConfigurator | undefined;
  private throughputFn: ThroughputFn<Cfg> | undefined;

  protected constructor(options: SuiteOptions<Cfg>, scope: string) {
    this.name = options.name;
    this.harness = options.harness;
    this.axes = options.axes;
    this.extract = options.extract;
    this.log = createScopedLogger(options.logger ?? consoleLogger, scope);
    this.clone = options.cloneConfig ?? copyConfig;
    this.setupHook = options.globalSetup;
    this.teardownHook = options.globalTeardown;
    this.configurator = options.configureGroup;
    this.throughputFn = options.throughput;
    if (options.parameterNames) {
      this.parameterNames(options.parameterNames);
    }
  }

  // --------------------------------------------------------------------------
  // Chained setters
  // --------------------------------------------------------------------------

  /**
   * Name the axes for case labels. A count that differs from the number of axes
   * is logged as a warning and the names are ignored.
   */
  parameterNames(names: readonly string[]): this {
    if (names.length !== this.axes.length) {
      this.log.warn(
        `Suite '${this.name}': ${names.length} parameter names for ${this.axes.length} axes. Parameter names will be ignored for case labels.`
      );
      this.names = undefined;
    } else {
      this.names = [...names];
    }
    return this;
  }

  globalSetup(fn: GlobalHook<Cfg>): this {
    this.setupHook = fn;
    return this;
  }

  globalTeardown(fn: GlobalHook<Cfg>): this {
    this.teardownHook = fn;
    return this;
  }

  configureGroup(fn: GroupConfigurator): this {
    this.configurator = fn;
    return this;
  }

  throughput(fn: ThroughputFn<Cfg>): this {
    this.throughputFn = fn;
    return this;
  }

  cloneConfig(fn: (config: Cfg) => Cfg): this {
    this.clone = fn;
    return this;
  }

  // --------------------------------------------------------------------------
  // Run
  // --------------------------------------------------------------------------

  /**
   * Benchmark every combination. Resolves with the run's counters; rejects
   * with {@link SampleSetupFailed} (or a logic error) if a sample fails. An
   * aborted run still finishes the group and logs its partial summary.
   */
  async run(): Promise<RunSummary> {
    const combinations = generateCombinations(this.axes);
    const summary: RunSummary = {
      suite: this.name,
      attempted: combinations.size,
      completed: 0,
      skippedExtraction: 0,
      skippedGlobalSetup: 0,
    };

    if (combinations.size === 0) {
      const reason =
        this.axes.length === 0 ? "no parameter axes defined" : "no combinations generated (an axis is empty)";
      this.log.warn(`Suite '${this.name}': ${reason}. Nothing to run.`);
      return summary;
    }

    const group = this.harness.group(this.name);
    if (this.configurator) {
      this.configurator(group);
    } else {
      group.plotScale("logarithmic").sampleSize(10);
    }

    let aborted = false;
    try {
      for (const combination of combinations) {
        const id = combination.idSuffix();

        let config: Cfg;
        try {
          config = this.extract(combination);
        } catch (error) {
          this.log.error(
            `Suite '${this.name}', combination '${id}': failed to extract configuration: ${describeError(error)}. Skipping this combination.`
          );
          summary.skippedExtraction++;
          continue;
        }

        if (this.setupHook) {
          try {
            await this.setupHook(config);
          } catch (error) {
            this.log.error(
              `Suite '${this.name}', combination '${id}', config ${this.describeConfig(config)}: global setup failed: ${describeError(error)}. Skipping benchmarks for this configuration.`
            );
            summary.skippedGlobalSetup++;
            await this.runGlobalTeardown(config, id, true);
            continue;
          }
        }

        const label = this.caseLabel(combination);
        try {
          await group.bench(label, this.createRoutine(config, label), { throughput: this.throughputFn?.(config) });
          summary.completed++;
        } catch (error) {
          this.log.error(
            `Suite '${this.name}', case '${label}', config ${this.describeConfig(config)}: benchmark aborted: ${describeError(error)}`
          );
          aborted = true;
          throw error;
        } finally {
          await this.runGlobalTeardown(config, id, false);
        }
      }
    } finally {
      group.finish();
      this.logSummary(summary, aborted);
    }
    return summary;
  }

  // --------------------------------------------------------------------------
  // Variant hooks
  // --------------------------------------------------------------------------

  /**
   * Build the harness routine for one configuration: per sample, setup, then
   * `iterations` logic calls, then teardown. Returns the summed logic duration.
   */
  protected abstract createRoutine(config: Cfg, label: string): SampleRoutine;

  protected sampleSetupFailed(label: string, config: Cfg, cause: unknown): SampleSetupFailed {
    return new SampleSetupFailed({ suite: this.name, id: label, config: this.describeConfig(config), cause });
  }

  protected reportSampleTeardownFailure(label: string, error: unknown): void {
    this.log.warn(`Suite '${this.name}', case '${label}': sample teardown failed: ${describeError(error)}`);
  }

  protected describeConfig(config: Cfg): string {
    return inspect(config, { depth: 4, breakLength: Infinity });
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private caseLabel(combination: Combination): string {
    const suffix = this.names ? combination.idSuffixWithNames(this.names, this.log) : combination.idSuffix();
    return suffix.startsWith("_") ? suffix.slice(1) : suffix;
  }

  private async runGlobalTeardown(config: Cfg, id: string, afterSetupFailure: boolean): Promise<void> {
    if (!this.teardownHook) {
      return;
    }
    try {
      await this.teardownHook(config);
    } catch (error) {
      this.log.warn(
        `Suite '${this.name}', combination '${id}', config ${this.describeConfig(config)}: global teardown${afterSetupFailure ? " after global setup failure" : ""} failed: ${describeError(error)}`
      );
    }
  }

  private logSummary(summary: RunSummary, aborted: boolean): void {
    const { attempted, completed, skippedExtraction, skippedGlobalSetup } = summary;
    if (aborted) {
      this.log.error(
        `Suite '${this.name}' aborted: ${attempted} combinations attempted, ${completed} run, ${skippedExtraction} skipped (extraction), ${skippedGlobalSetup} skipped (global setup).`
      );
    } else if (skippedExtraction > 0 || skippedGlobalSetup > 0) {
      this.log.warn(
        `Suite '${this.name}' summary: ${attempted} combinations attempted, ${completed} run, ${skippedExtraction} skipped (extraction), ${skippedGlobalSetup} skipped (global setup).`
      );
    } else {
      this.log.info(`Suite '${this.name}': all ${completed} combinations benchmarked.`);
    }
  }
}
