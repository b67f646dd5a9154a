// ============================================================================
// Errors
// ============================================================================

export {
  assert,
  CellKindMismatch,
  CellNotFound,
  describeError,
  InvalidArgument,
  MatrixError,
  SampleSetupFailed,
} from "./error.js";

// ============================================================================
// Cells & Combinations
// ============================================================================

export type { Axis, CellKind, CellPayload, CellValue } from "./cell.js";
export {
  axis,
  Cell,
  cellEquals,
  cellFragment,
  cellKey,
  cellValueFragment,
  formatCell,
  inspectCell,
  toCell,
} from "./cell.js";
export { Combination } from "./combination.js";

// ============================================================================
// Generation
// ============================================================================

export { CombinationSet, generateCombinations } from "./generator.js";

// ============================================================================
// Harness
// ============================================================================

export type {
  AxisScale,
  BenchmarkGroup,
  BenchOptions,
  GroupSettings,
  Harness,
  SampleRoutine,
  Throughput,
} from "./harness.js";
export { BaseBenchmarkGroup, DEFAULT_GROUP_SETTINGS } from "./harness.js";
export type { CaseRecord, CaseSummary } from "./report.js";
export { formatGroupReport, summarizeCase } from "./report.js";
export type { TinybenchHarnessOptions } from "./tinybench.js";
export { TinybenchGroup, TinybenchHarness } from "./tinybench.js";

// ============================================================================
// Suites
// ============================================================================

export type {
  Extractor,
  GlobalHook,
  GroupConfigurator,
  IterationResult,
  RunSummary,
  SampleResources,
  SuiteOptions,
  ThroughputFn,
} from "./suite.js";
export { BenchmarkSuite, copyConfig } from "./suite.js";
export type { SyncLogicFn, SyncSetupFn, SyncSuiteOptions, SyncTeardownFn } from "./sync-suite.js";
export { SyncBenchmarkSuite } from "./sync-suite.js";
export type {
  AsyncLogicFn,
  AsyncRuntime,
  AsyncSetupFn,
  AsyncSuiteOptions,
  AsyncTeardownFn,
} from "./async-suite.js";
export { AsyncBenchmarkSuite, immediateRuntime } from "./async-suite.js";

// ============================================================================
// Logging
// ============================================================================

export type { Logger } from "./log.js";
export { consoleLogger, createScopedLogger } from "./log.js";
