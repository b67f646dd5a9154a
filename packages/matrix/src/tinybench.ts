import { Bench } from "tinybench";
import {
  BaseBenchmarkGroup,
  type BenchOptions,
  DEFAULT_GROUP_SETTINGS,
  type GroupSettings,
  type Harness,
  type SampleRoutine,
} from "./harness.js";
import { consoleLogger, type Logger } from "./log.js";
import { type CaseRecord, formatGroupReport } from "./report.js";

// ============================================================================
// Harness
// ============================================================================

export type TinybenchHarnessOptions = {
  /** Receives the rendered group reports. */
  logger?: Logger;
  /** Settings every new group starts from. */
  defaults?: Partial<GroupSettings>;
};

/**
 * {@link Harness} backed by tinybench.
 *
 * Each case gets its own `Bench` so it runs to completion inside `bench()`.
 * Tinybench's time-based mode is driven by `measurementTime`; with the default
 * of 0 exactly `sampleSize` samples are taken. The duration a sample routine
 * reports is handed back to tinybench as `overriddenDuration`, so setup and
 * teardown time stay out of the measurement.
 *
 * Warmup samples run before the `Bench` starts and are discarded.
 *
 * @example
 * ```typescript
 * const harness = new TinybenchHarness({ defaults: { sampleSize: 20 } });
 * await new SyncBenchmarkSuite({ harness, name: "Sort", axes, extract, setup, logic, teardown }).run();
 * ```
 */
export class TinybenchHarness implements Harness {
  readonly groups: TinybenchGroup[] = [];
  private readonly logger: Logger;
  private readonly defaults: GroupSettings;

  constructor(options: TinybenchHarnessOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
    this.defaults = { ...DEFAULT_GROUP_SETTINGS, ...options.defaults };
  }

  group(name: string): TinybenchGroup {
    const group = new TinybenchGroup(name, this.defaults, this.logger);
    this.groups.push(group);
    return group;
  }
}

// ============================================================================
// Group
// ============================================================================

export class TinybenchGroup extends BaseBenchmarkGroup {
  readonly records: CaseRecord[] = [];
  private readonly logger: Logger;

  constructor(name: string, defaults: Readonly<GroupSettings>, logger: Logger) {
    super(name, defaults);
    this.logger = logger;
  }

  async bench(id: string, routine: SampleRoutine, options: BenchOptions = {}): Promise<void> {
    const { sampleSize, measurementTime, warmupTime, warmupIterations, iterationsPerSample } = this.current;
    const record: CaseRecord = { name: id, samples: [], iterationsPerSample, throughput: options.throughput };
    this.records.push(record);

    // Warmup is handled here, so tinybench's own is disabled
    const bench = new Bench({ time: measurementTime, iterations: sampleSize, warmupTime: 0, warmupIterations: 0 });
    let failure: { error: unknown } | undefined;

    bench.add(id, async () => {
      try {
        const duration = await routine(iterationsPerSample);
        record.samples.push(duration);
        return { overriddenDuration: duration };
      } catch (error) {
        failure ??= { error };
        throw error;
      }
    });

    try {
      await warmup(routine, iterationsPerSample, warmupIterations, warmupTime);
      await bench.run();
    } catch (error) {
      failure ??= { error };
    }

    if (failure) {
      record.error = failure.error;
      throw failure.error;
    }
  }

  finish(): void {
    this.logger.info(formatGroupReport(this.name, this.records, this.current.plotScale));
  }
}

async function warmup(routine: SampleRoutine, iterations: number, minRuns: number, minTime: number): Promise<void> {
  const start = performance.now();
  let runs = 0;
  while (runs < minRuns || performance.now() - start < minTime) {
    await routine(iterations);
    runs++;
  }
}
