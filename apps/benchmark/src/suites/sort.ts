import {
  axis,
  Cell,
  type Combination,
  createScopedLogger,
  consoleLogger,
  type Harness,
  InvalidArgument,
  type IterationResult,
  type RunSummary,
  type SampleResources,
  SyncBenchmarkSuite,
} from "bench-matrix";
import { randomIntegers } from "../rng.js";
import type { DemoSuite, HookCounters, RunOptions } from "../types.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type SortAlgorithm = "sort" | "process";

export type SortConfig = {
  algorithm: SortAlgorithm;
  elements: number;
  intensity: string;
};

export type SortContext = {
  itemsProcessed: number;
};

export type SortState = {
  dataset: number[];
  /** Sorted copy or running checksum, written by each iteration. */
  output: number[];
};

const ALGORITHMS: Record<string, SortAlgorithm> = {
  Sort: "sort",
  Process: "process",
};

/** Passes over the dataset per iteration; unknown intensities count as one. */
const INTENSITY_PASSES: Record<string, number> = {
  Low: 1,
  Medium: 3,
  High: 10,
};

const DATASET_SEED = 42;
const MAX_VALUE = 100_000;

export const sortAxes = [
  axis("Sort", "Process"),
  [Cell.unsigned(100), Cell.unsigned(500)],
  [Cell.string("Low"), Cell.string("Medium")],
];
export const sortParameterNames = ["Algo", "Elements", "Intensity"];

// ---------------------------------------------------------------------------
// Callbacks
// ---------------------------------------------------------------------------

export function extractSortConfig(combo: Combination): SortConfig {
  const tag = combo.getTag(0);
  const algorithm = ALGORITHMS[tag];
  if (!algorithm) {
    throw new InvalidArgument({ expected: "algorithm Sort or Process", actual: tag });
  }
  return {
    algorithm,
    elements: Number(combo.getUnsigned(1)),
    intensity: combo.getString(2),
  };
}

export function setupSortSample(config: SortConfig): SampleResources<SortContext, SortState> {
  return {
    context: { itemsProcessed: 0 },
    state: {
      dataset: randomIntegers(config.elements, MAX_VALUE, DATASET_SEED),
      output: new Array<number>(config.elements).fill(0),
    },
  };
}

export function runSortIteration(
  context: SortContext,
  state: SortState,
  config: SortConfig
): IterationResult<SortContext, SortState> {
  const passes = INTENSITY_PASSES[config.intensity] ?? 1;
  const start = performance.now();

  if (config.algorithm === "sort") {
    const sorted = state.dataset.slice();
    for (let p = 0; p < passes; p++) {
      sorted.sort((a, b) => a - b);
    }
    state.output = sorted;
  } else {
    let sum = 0;
    for (let i = 0; i < state.dataset.length; i++) {
      const value = state.dataset[i]!;
      for (let p = 0; p < passes; p++) {
        sum = (sum + value * 3 - (value >>> 1)) >>> 0;
      }
    }
    if (state.output.length > 0) {
      state.output[0] = sum;
    }
  }

  const duration = performance.now() - start;
  return {
    context: { itemsProcessed: context.itemsProcessed + state.dataset.length },
    state,
    duration,
  };
}

// ---------------------------------------------------------------------------
// Suite
// ---------------------------------------------------------------------------

async function run(harness: Harness, options: RunOptions): Promise<RunSummary> {
  const log = createScopedLogger(options.logger ?? consoleLogger, "demo");
  const counters: HookCounters = { globalSetups: 0, globalTeardowns: 0 };

  const summary = await new SyncBenchmarkSuite<SortConfig, SortContext, SortState>({
    harness,
    name: "SortSuite",
    axes: sortAxes,
    extract: extractSortConfig,
    setup: setupSortSample,
    logic: runSortIteration,
    teardown: (_context, state) => {
      state.output = [];
    },
    logger: options.logger,
  })
    .parameterNames(sortParameterNames)
    .globalSetup((config) => {
      counters.globalSetups++;
      log.info(
        `Global setup #${counters.globalSetups}: ${config.algorithm}, ${config.elements} elements, ${config.intensity}`
      );
    })
    .globalTeardown(() => {
      counters.globalTeardowns++;
    })
    .configureGroup((group) => {
      group.plotScale("linear");
      if (options.quick) {
        group.sampleSize(3).warmupIterations(1).iterationsPerSample(5);
      } else {
        group.sampleSize(15).warmupIterations(5).iterationsPerSample(50);
      }
    })
    .throughput((config) => ({ kind: "elements", count: config.elements }))
    .run();

  log.info(`SortSuite: ${counters.globalSetups} global setups, ${counters.globalTeardowns} global teardowns`);
  return summary;
}

export const sortSuite: DemoSuite = {
  name: "sort",
  description: "Blocking sort and checksum passes over seeded integer datasets",
  run,
};
