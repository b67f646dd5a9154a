import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { SampleRoutine } from "./harness.js";
import { BenchmarkSuite, type IterationResult, type SampleResources, type SuiteOptions } from "./suite.js";

// ============================================================================
// Runtime
// ============================================================================

/**
 * Cooperative scheduler the async suite delegates each callback to.
 *
 * The suite awaits every delegated call before taking the next lifecycle step,
 * so at most one call per suite is ever in flight.
 */
export interface AsyncRuntime {
  run<T>(task: () => Promise<T>): Promise<T>;
}

/**
 * Runtime that yields to the event loop (`setImmediate`) before each call, so
 * pending I/O callbacks and timers get a turn between lifecycle steps.
 */
export const immediateRuntime: AsyncRuntime = {
  async run<T>(task: () => Promise<T>): Promise<T> {
    await yieldToEventLoop();
    return task();
  },
};

// ============================================================================
// Callback Types
// ============================================================================

/** Create the per-sample context and state. Rejecting aborts the run. */
export type AsyncSetupFn<Cfg, Ctx, State, Rt extends AsyncRuntime> = (
  runtime: Rt,
  config: Cfg
) => Promise<SampleResources<Ctx, State>>;

/** One measured iteration. Resolves with the updated pair and the elapsed milliseconds. */
export type AsyncLogicFn<Cfg, Ctx, State, Rt extends AsyncRuntime> = (
  context: Ctx,
  state: State,
  runtime: Rt,
  config: Cfg
) => Promise<IterationResult<Ctx, State>>;

/** Release what setup created. Rejections are logged, never propagated. */
export type AsyncTeardownFn<Cfg, Ctx, State, Rt extends AsyncRuntime> = (
  context: Ctx,
  state: State,
  runtime: Rt,
  config: Cfg
) => Promise<void>;

export type AsyncSuiteOptions<Cfg, Ctx, State, Rt extends AsyncRuntime> = SuiteOptions<Cfg> & {
  runtime: Rt;
  setup: AsyncSetupFn<Cfg, Ctx, State, Rt>;
  logic: AsyncLogicFn<Cfg, Ctx, State, Rt>;
  teardown: AsyncTeardownFn<Cfg, Ctx, State, Rt>;
};

// ============================================================================
// Async Suite
// ============================================================================

/**
 * Benchmark suite whose per-sample callbacks are suspension points.
 *
 * The runtime is threaded into every setup, logic and teardown call, and each
 * call is executed through `runtime.run`. Control flow stays sequential: the
 * suite never has two calls pending at once and never overlaps combinations.
 *
 * @example
 * ```typescript
 * await new AsyncBenchmarkSuite({
 *   harness,
 *   runtime: immediateRuntime,
 *   name: "Io",
 *   axes,
 *   extract,
 *   setup: async (rt, cfg) => ({ context: { ops: 0 }, state: await openConnections(cfg) }),
 *   logic: async (context, state, rt, cfg) => {
 *     const start = performance.now();
 *     await state.send(cfg.packetSize);
 *     return { context, state, duration: performance.now() - start };
 *   },
 *   teardown: async (context, state) => state.close(),
 * }).run();
 * ```
 */
export class AsyncBenchmarkSuite<Cfg, Ctx, State, Rt extends AsyncRuntime = AsyncRuntime> extends BenchmarkSuite<Cfg> {
  readonly runtime: Rt;
  private readonly setup: AsyncSetupFn<Cfg, Ctx, State, Rt>;
  private readonly logic: AsyncLogicFn<Cfg, Ctx, State, Rt>;
  private readonly teardown: AsyncTeardownFn<Cfg, Ctx, State, Rt>;

  constructor(options: AsyncSuiteOptions<Cfg, Ctx, State, Rt>) {
    super(options, "async");
    this.runtime = options.runtime;
    this.setup = options.setup;
    this.logic = options.logic;
    this.teardown = options.teardown;
  }

  protected createRoutine(config: Cfg, label: string): SampleRoutine {
    const runtime = this.runtime;

    return async (iterations) => {
      let sampleConfig: Cfg;
      let resources: SampleResources<Ctx, State>;
      try {
        sampleConfig = this.clone(config);
        resources = await runtime.run(() => this.setup(runtime, sampleConfig));
      } catch (cause) {
        throw this.sampleSetupFailed(label, config, cause);
      }

      let { context, state } = resources;
      let total = 0;
      try {
        for (let i = 0; i < iterations; i++) {
          const result = await runtime.run(() => this.logic(context, state, runtime, sampleConfig));
          context = result.context;
          state = result.state;
          total += result.duration;
        }
      } finally {
        try {
          await runtime.run(() => this.teardown(context, state, runtime, sampleConfig));
        } catch (error) {
          this.reportSampleTeardownFailure(label, error);
        }
      }
      return total;
    };
  }
}
