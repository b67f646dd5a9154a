import { BaseBenchmarkGroup, type BenchOptions, type Harness, type SampleRoutine, type Throughput } from "./harness.js";
import type { Logger } from "./log.js";

// ============================================================================
// Recording Harness
// ============================================================================

/**
 * In-process harness for tests. Runs exactly `sampleSize` samples per case with
 * the group's `iterationsPerSample` hint, and records what it was asked to do.
 */
export class RecordingHarness implements Harness {
  readonly groups: RecordingGroup[] = [];
  /** Shared, ordered log of harness and callback events. */
  readonly events: string[];

  constructor(events: string[] = []) {
    this.events = events;
  }

  group(name: string): RecordingGroup {
    const group = new RecordingGroup(name, this.events);
    this.groups.push(group);
    return group;
  }
}

export type RecordedCase = {
  id: string;
  throughput?: Throughput;
  durations: number[];
};

export class RecordingGroup extends BaseBenchmarkGroup {
  readonly cases: RecordedCase[] = [];
  finished = false;
  private readonly events: string[];

  constructor(name: string, events: string[]) {
    super(name);
    this.events = events;
  }

  async bench(id: string, routine: SampleRoutine, options: BenchOptions = {}): Promise<void> {
    this.events.push(`bench:${id}`);
    const record: RecordedCase = { id, throughput: options.throughput, durations: [] };
    this.cases.push(record);
    for (let i = 0; i < this.current.sampleSize; i++) {
      record.durations.push(await routine(this.current.iterationsPerSample));
    }
  }

  finish(): void {
    this.finished = true;
    this.events.push(`finish:${this.name}`);
  }
}

// ============================================================================
// Recording Logger
// ============================================================================

export type RecordingLogger = Logger & {
  lines: { level: "info" | "warn" | "error"; message: string }[];
};

export function createRecordingLogger(): RecordingLogger {
  const lines: RecordingLogger["lines"] = [];
  return {
    lines,
    info: (message) => lines.push({ level: "info", message }),
    warn: (message) => lines.push({ level: "warn", message }),
    error: (message) => lines.push({ level: "error", message }),
  };
}
