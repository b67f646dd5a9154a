import type { Harness, Logger, RunSummary } from "bench-matrix";

export type RunOptions = {
  /** Fewer, shorter samples for a fast smoke run. */
  quick: boolean;
  logger?: Logger;
};

export type DemoSuite = {
  name: string;
  description: string;
  run: (harness: Harness, options: RunOptions) => Promise<RunSummary>;
};

/**
 * Global-hook bookkeeping for one run. Owned by the suite's `run` call and
 * captured by its hooks.
 */
export type HookCounters = {
  globalSetups: number;
  globalTeardowns: number;
};
