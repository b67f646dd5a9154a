import type { SampleRoutine } from "./harness.js";
import { BenchmarkSuite, type IterationResult, type SampleResources, type SuiteOptions } from "./suite.js";

// ============================================================================
// Callback Types
// ============================================================================

/** Create the per-sample context and state. Throwing aborts the run. */
export type SyncSetupFn<Cfg, Ctx, State> = (config: Cfg) => SampleResources<Ctx, State>;

/** One measured iteration. Returns the updated pair and the elapsed milliseconds. */
export type SyncLogicFn<Cfg, Ctx, State> = (context: Ctx, state: State, config: Cfg) => IterationResult<Ctx, State>;

/** Release what setup created. Failures are logged, never propagated. */
export type SyncTeardownFn<Cfg, Ctx, State> = (context: Ctx, state: State, config: Cfg) => void;

export type SyncSuiteOptions<Cfg, Ctx, State> = SuiteOptions<Cfg> & {
  setup: SyncSetupFn<Cfg, Ctx, State>;
  logic: SyncLogicFn<Cfg, Ctx, State>;
  teardown: SyncTeardownFn<Cfg, Ctx, State>;
};

// ============================================================================
// Sync Suite
// ============================================================================

/**
 * Benchmark suite whose per-sample callbacks are plain blocking calls.
 *
 * @example
 * ```typescript
 * const summary = await new SyncBenchmarkSuite({
 *   harness: new TinybenchHarness(),
 *   name: "Sort",
 *   axes: [axis("Sort", "Process"), [Cell.unsigned(100), Cell.unsigned(500)]],
 *   extract: (combo) => ({ algorithm: combo.getTag(0), elements: Number(combo.getUnsigned(1)) }),
 *   setup: (cfg) => ({ context: { processed: 0 }, state: makeDataset(cfg.elements) }),
 *   logic: (context, state, cfg) => {
 *     const start = performance.now();
 *     work(state, cfg);
 *     return { context, state, duration: performance.now() - start };
 *   },
 *   teardown: () => {},
 * })
 *   .parameterNames(["Algo", "Elements"])
 *   .throughput((cfg) => ({ kind: "elements", count: cfg.elements }))
 *   .run();
 * ```
 */
export class SyncBenchmarkSuite<Cfg, Ctx, State> extends BenchmarkSuite<Cfg> {
  private readonly setup: SyncSetupFn<Cfg, Ctx, State>;
  private readonly logic: SyncLogicFn<Cfg, Ctx, State>;
  private readonly teardown: SyncTeardownFn<Cfg, Ctx, State>;

  constructor(options: SyncSuiteOptions<Cfg, Ctx, State>) {
    super(options, "sync");
    this.setup = options.setup;
    this.logic = options.logic;
    this.teardown = options.teardown;
  }

  protected createRoutine(config: Cfg, label: string): SampleRoutine {
    return (iterations) => {
      let sampleConfig: Cfg;
      let resources: SampleResources<Ctx, State>;
      try {
        sampleConfig = this.clone(config);
        resources = this.setup(sampleConfig);
      } catch (cause) {
        throw this.sampleSetupFailed(label, config, cause);
      }

      let { context, state } = resources;
      let total = 0;
      try {
        for (let i = 0; i < iterations; i++) {
          const result = this.logic(context, state, sampleConfig);
          context = result.context;
          state = result.state;
          total += result.duration;
        }
      } finally {
        try {
          this.teardown(context, state, sampleConfig);
        } catch (error) {
          this.reportSampleTeardownFailure(label, error);
        }
      }
      return total;
    };
  }
}
