import assert from "node:assert";
import { describe, it } from "node:test";
import { axis, Cell } from "./cell.js";
import type { Combination } from "./combination.js";
import { SampleSetupFailed } from "./error.js";
import type { SyncSuiteOptions } from "./sync-suite.js";
import { copyConfig } from "./suite.js";
import { SyncBenchmarkSuite } from "./sync-suite.js";
import { createRecordingLogger, RecordingHarness } from "./testing.js";

type Config = { kind: string };
type Context = { n: number };

function extractKind(combo: Combination): Config {
  return { kind: combo.getTag(0) };
}

class Workload {
  readonly kind: string;
  readonly factor: number;

  constructor(kind: string, factor: number) {
    this.kind = kind;
    this.factor = factor;
  }

  weight(): number {
    return this.kind.length * this.factor;
  }
}

/**
 * Suite over a single tag axis that records every callback into `events`.
 * Two samples of three iterations per case unless overridden.
 */
function recordingSuite(
  kinds: string[],
  overrides: Partial<SyncSuiteOptions<Config, Context, string>> = {}
): {
  suite: SyncBenchmarkSuite<Config, Context, string>;
  harness: RecordingHarness;
  events: string[];
  logger: ReturnType<typeof createRecordingLogger>;
} {
  const events: string[] = [];
  const harness = new RecordingHarness(events);
  const logger = createRecordingLogger();
  const suite = new SyncBenchmarkSuite<Config, Context, string>({
    harness,
    name: "Suite",
    axes: [axis(...kinds)],
    extract: (combo) => {
      const config = extractKind(combo);
      events.push(`extract:${config.kind}`);
      return config;
    },
    setup: (cfg) => {
      events.push(`setup:${cfg.kind}`);
      return { context: { n: 0 }, state: `state-${cfg.kind}` };
    },
    logic: (context, state) => {
      events.push("logic");
      return { context: { n: context.n + 1 }, state, duration: 2 };
    },
    teardown: (context, state) => {
      events.push(`teardown:${state}:${context.n}`);
    },
    configureGroup: (group) => {
      group.sampleSize(2).iterationsPerSample(3);
    },
    logger,
    ...overrides,
  });
  return { suite, harness, events, logger };
}

describe("SyncBenchmarkSuite", () => {
  describe("Lifecycle", () => {
    it("runs global setup, samples and global teardown in order", async () => {
      const { suite, harness, events } = recordingSuite(["A"]);
      suite
        .globalSetup((cfg) => {
          events.push(`globalSetup:${cfg.kind}`);
        })
        .globalTeardown((cfg) => {
          events.push(`globalTeardown:${cfg.kind}`);
        });

      await suite.run();

      assert.deepStrictEqual(events, [
        "extract:A",
        "globalSetup:A",
        "bench:A",
        "setup:A",
        "logic",
        "logic",
        "logic",
        "teardown:state-A:3",
        "setup:A",
        "logic",
        "logic",
        "logic",
        "teardown:state-A:3",
        "globalTeardown:A",
        "finish:Suite",
      ]);
      assert.deepStrictEqual(harness.groups[0]!.cases[0]!.durations, [6, 6]);
    });

    it("finishes one combination before extracting the next", async () => {
      const { suite, events } = recordingSuite(["A", "B"]);
      suite.configureGroup((group) => {
        group.sampleSize(1).iterationsPerSample(1);
      });
      suite.globalTeardown((cfg) => {
        events.push(`globalTeardown:${cfg.kind}`);
      });

      await suite.run();

      assert.deepStrictEqual(events, [
        "extract:A",
        "bench:A",
        "setup:A",
        "logic",
        "teardown:state-A:1",
        "globalTeardown:A",
        "extract:B",
        "bench:B",
        "setup:B",
        "logic",
        "teardown:state-B:1",
        "globalTeardown:B",
        "finish:Suite",
      ]);
    });

    it("calls logic as many times per sample as the iterations hint", async () => {
      const { suite, events } = recordingSuite(["A"], {
        configureGroup: (group) => {
          group.sampleSize(3).iterationsPerSample(5);
        },
      });

      await suite.run();

      assert.strictEqual(events.filter((e) => e === "logic").length, 15);
      assert.strictEqual(events.filter((e) => e.startsWith("setup:")).length, 3);
      assert.deepStrictEqual(
        events.filter((e) => e.startsWith("teardown:")),
        ["teardown:state-A:5", "teardown:state-A:5", "teardown:state-A:5"]
      );
    });

    it("hands each sample a fresh copy of the configuration", async () => {
      const seen: Config[] = [];
      let extracted: Config | undefined;
      const { suite } = recordingSuite(["A"], {
        extract: (combo) => {
          extracted = extractKind(combo);
          return extracted;
        },
        setup: (cfg) => {
          seen.push(cfg);
          return { context: { n: 0 }, state: "s" };
        },
      });

      await suite.run();

      assert.strictEqual(seen.length, 2);
      assert.notStrictEqual(seen[0], extracted);
      assert.notStrictEqual(seen[0], seen[1]);
      assert.deepStrictEqual(seen[0], { kind: "A" });
    });

    it("uses a custom clone function when given", async () => {
      const seen: Config[] = [];
      const { suite } = recordingSuite(["A"], {
        setup: (cfg) => {
          seen.push(cfg);
          return { context: { n: 0 }, state: "s" };
        },
      });
      suite.cloneConfig((cfg) => ({ kind: `${cfg.kind}-copy` }));

      await suite.run();

      assert.deepStrictEqual(seen, [{ kind: "A-copy" }, { kind: "A-copy" }]);
    });

    it("keeps class-instance configurations usable in every sample", async () => {
      const harness = new RecordingHarness();
      const original = new Workload("Disk", 3);
      const seen: Workload[] = [];
      const suite = new SyncBenchmarkSuite<Workload, Context, number>({
        harness,
        name: "Classes",
        axes: [axis("Disk")],
        extract: () => original,
        setup: (cfg) => {
          seen.push(cfg);
          return { context: { n: 0 }, state: 0 };
        },
        logic: (context, state, cfg) => ({ context, state: state + 1, duration: cfg.weight() }),
        teardown: () => {},
        configureGroup: (group) => {
          group.sampleSize(2).iterationsPerSample(2);
        },
        logger: createRecordingLogger(),
      });

      const summary = await suite.run();

      assert.strictEqual(summary.completed, 1);
      assert.deepStrictEqual(harness.groups[0]!.cases[0]!.durations, [24, 24]);
      assert.strictEqual(seen.length, 2);
      assert.ok(seen[0] instanceof Workload);
      assert.notStrictEqual(seen[0], original);
      assert.notStrictEqual(seen[0], seen[1]);
    });

    it("keeps function fields of the configuration", async () => {
      const harness = new RecordingHarness();
      const suite = new SyncBenchmarkSuite<{ kind: string; cost: () => number }, Context, null>({
        harness,
        name: "Functions",
        axes: [axis("A")],
        extract: (combo) => ({ kind: combo.getTag(0), cost: () => 1.5 }),
        setup: () => ({ context: { n: 0 }, state: null }),
        logic: (context, state, cfg) => ({ context, state, duration: cfg.cost() }),
        teardown: () => {},
        configureGroup: (group) => {
          group.sampleSize(2).iterationsPerSample(2);
        },
        logger: createRecordingLogger(),
      });

      const summary = await suite.run();

      assert.strictEqual(summary.completed, 1);
      assert.deepStrictEqual(harness.groups[0]!.cases[0]!.durations, [3, 3]);
    });
  });

  describe("Group configuration", () => {
    it("defaults to ten samples on a logarithmic scale", async () => {
      const { suite, harness } = recordingSuite(["A"], { configureGroup: undefined });

      await suite.run();

      const group = harness.groups[0]!;
      assert.strictEqual(group.name, "Suite");
      assert.strictEqual(group.settings.sampleSize, 10);
      assert.strictEqual(group.settings.plotScale, "logarithmic");
      assert.strictEqual(group.cases[0]!.durations.length, 10);
    });

    it("passes the throughput hint computed from the configuration", async () => {
      const { suite, harness } = recordingSuite(["A", "BB"]);
      suite.throughput((cfg) => ({ kind: "bytes", count: cfg.kind.length * 100 }));

      await suite.run();

      assert.deepStrictEqual(
        harness.groups[0]!.cases.map((c) => c.throughput),
        [
          { kind: "bytes", count: 100 },
          { kind: "bytes", count: 200 },
        ]
      );
    });
  });

  describe("Labels", () => {
    it("uses the unnamed suffix without its leading separator", async () => {
      const harness = new RecordingHarness();
      const suite = new SyncBenchmarkSuite<Config, Context, string>({
        harness,
        name: "Labels",
        axes: [axis("A"), [Cell.unsigned(64)], [Cell.string("Very Low")]],
        extract: extractKind,
        setup: () => ({ context: { n: 0 }, state: "" }),
        logic: (context, state) => ({ context, state, duration: 0 }),
        teardown: () => {},
        configureGroup: (group) => {
          group.sampleSize(1);
        },
        logger: createRecordingLogger(),
      });

      await suite.run();

      assert.deepStrictEqual(
        harness.groups[0]!.cases.map((c) => c.id),
        ["A_Uint64_Very_Low"]
      );
    });

    it("uses named labels when the name count matches the axes", async () => {
      const harness = new RecordingHarness();
      const logger = createRecordingLogger();
      const suite = new SyncBenchmarkSuite<Config, Context, string>({
        harness,
        name: "Named",
        axes: [axis("Uring", "Epoll"), [Cell.unsigned(512)]],
        parameterNames: ["Backend", "BlockSize"],
        extract: extractKind,
        setup: () => ({ context: { n: 0 }, state: "" }),
        logic: (context, state) => ({ context, state, duration: 0 }),
        teardown: () => {},
        configureGroup: (group) => {
          group.sampleSize(1);
        },
        logger,
      });

      await suite.run();

      assert.deepStrictEqual(
        harness.groups[0]!.cases.map((c) => c.id),
        ["Backend-Uring_BlockSize-512", "Backend-Epoll_BlockSize-512"]
      );
      assert.deepStrictEqual(
        logger.lines.filter((l) => l.level === "warn"),
        []
      );
    });

    it("warns and falls back to unnamed labels on a name count mismatch", async () => {
      const harness = new RecordingHarness();
      const logger = createRecordingLogger();
      const suite = new SyncBenchmarkSuite<Config, Context, string>({
        harness,
        name: "Mismatch",
        axes: [axis("Uring"), [Cell.unsigned(512)]],
        extract: extractKind,
        setup: () => ({ context: { n: 0 }, state: "" }),
        logic: (context, state) => ({ context, state, duration: 0 }),
        teardown: () => {},
        configureGroup: (group) => {
          group.sampleSize(1);
        },
        logger,
      }).parameterNames(["Backend"]);

      await suite.run();

      assert.deepStrictEqual(
        harness.groups[0]!.cases.map((c) => c.id),
        ["Uring_Uint512"]
      );
      assert.deepStrictEqual(logger.lines[0], {
        level: "warn",
        message:
          "[bench-matrix:sync] [WARN] Suite 'Mismatch': 1 parameter names for 2 axes. Parameter names will be ignored for case labels.",
      });
    });
  });

  describe("Skips", () => {
    it("skips a combination whose extraction fails and runs its neighbours", async () => {
      const { suite, harness, logger } = recordingSuite(["A", "Bad", "C"], {
        extract: (combo) => {
          const config = extractKind(combo);
          if (config.kind === "Bad") {
            throw new Error("unknown kind Bad");
          }
          return config;
        },
      });

      const summary = await suite.run();

      assert.deepStrictEqual(
        harness.groups[0]!.cases.map((c) => c.id),
        ["A", "C"]
      );
      assert.deepStrictEqual(summary, {
        suite: "Suite",
        attempted: 3,
        completed: 2,
        skippedExtraction: 1,
        skippedGlobalSetup: 0,
      });
      assert.deepStrictEqual(logger.lines, [
        {
          level: "error",
          message:
            "[bench-matrix:sync] [ERROR] Suite 'Suite', combination '_Bad': failed to extract configuration: unknown kind Bad. Skipping this combination.",
        },
        {
          level: "warn",
          message:
            "[bench-matrix:sync] [WARN] Suite 'Suite' summary: 3 combinations attempted, 2 run, 1 skipped (extraction), 0 skipped (global setup).",
        },
      ]);
    });

    it("treats a typed accessor mismatch as an extraction failure", async () => {
      const harness = new RecordingHarness();
      const logger = createRecordingLogger();
      const suite = new SyncBenchmarkSuite<Config, Context, string>({
        harness,
        name: "Typed",
        axes: [[Cell.tag("A"), Cell.int(5)]],
        extract: extractKind,
        setup: () => ({ context: { n: 0 }, state: "" }),
        logic: (context, state) => ({ context, state, duration: 0 }),
        teardown: () => {},
        configureGroup: (group) => {
          group.sampleSize(1);
        },
        logger,
      });

      const summary = await suite.run();

      assert.strictEqual(summary.completed, 1);
      assert.strictEqual(summary.skippedExtraction, 1);
      assert.strictEqual(
        logger.lines[0]?.message,
        "[bench-matrix:sync] [ERROR] Suite 'Typed', combination '_Int5': failed to extract configuration: Expected Tag at index 0, found Int(5). Skipping this combination."
      );
    });

    it("skips a configuration whose global setup fails and compensates with global teardown", async () => {
      const { suite, harness, events, logger } = recordingSuite(["A", "B", "C"], {
        configureGroup: (group) => {
          group.sampleSize(1).iterationsPerSample(1);
        },
      });
      suite
        .globalSetup((cfg) => {
          events.push(`globalSetup:${cfg.kind}`);
          if (cfg.kind === "B") {
            throw new Error("no backend");
          }
        })
        .globalTeardown((cfg) => {
          events.push(`globalTeardown:${cfg.kind}`);
        });

      const summary = await suite.run();

      assert.deepStrictEqual(events.slice(7, 11), ["extract:B", "globalSetup:B", "globalTeardown:B", "extract:C"]);
      assert.deepStrictEqual(
        harness.groups[0]!.cases.map((c) => c.id),
        ["A", "C"]
      );
      assert.strictEqual(summary.completed, 2);
      assert.strictEqual(summary.skippedGlobalSetup, 1);
      assert.strictEqual(
        logger.lines[0]?.message,
        "[bench-matrix:sync] [ERROR] Suite 'Suite', combination '_B', config { kind: 'B' }: global setup failed: no backend. Skipping benchmarks for this configuration."
      );
    });

    it("treats a rejected global setup as a failure", async () => {
      const { suite } = recordingSuite(["A"], {
        globalSetup: async () => {
          throw new Error("late failure");
        },
      });

      const summary = await suite.run();

      assert.strictEqual(summary.completed, 0);
      assert.strictEqual(summary.skippedGlobalSetup, 1);
    });

    it("logs a failing compensation teardown as a warning", async () => {
      const { suite, logger } = recordingSuite(["A"], {
        globalSetup: () => {
          throw new Error("setup down");
        },
        globalTeardown: () => {
          throw new Error("teardown down");
        },
      });

      const summary = await suite.run();

      assert.strictEqual(summary.skippedGlobalSetup, 1);
      assert.deepStrictEqual(logger.lines[1], {
        level: "warn",
        message:
          "[bench-matrix:sync] [WARN] Suite 'Suite', combination '_A', config { kind: 'A' }: global teardown after global setup failure failed: teardown down",
      });
    });
  });

  describe("Teardown failures", () => {
    it("logs a failing global teardown and keeps going", async () => {
      const { suite, harness, logger } = recordingSuite(["A", "B"], {
        globalTeardown: (cfg) => {
          if (cfg.kind === "A") {
            throw new Error("leaked handle");
          }
        },
      });

      const summary = await suite.run();

      assert.strictEqual(summary.completed, 2);
      assert.strictEqual(harness.groups[0]!.cases.length, 2);
      assert.deepStrictEqual(logger.lines[0], {
        level: "warn",
        message:
          "[bench-matrix:sync] [WARN] Suite 'Suite', combination '_A', config { kind: 'A' }: global teardown failed: leaked handle",
      });
      assert.deepStrictEqual(logger.lines[1], {
        level: "info",
        message: "[bench-matrix:sync] Suite 'Suite': all 2 combinations benchmarked.",
      });
    });

    it("logs a failing sample teardown without failing the sample", async () => {
      const { suite, harness, logger } = recordingSuite(["A"], {
        teardown: () => {
          throw new Error("close failed");
        },
      });

      const summary = await suite.run();

      assert.strictEqual(summary.completed, 1);
      assert.deepStrictEqual(harness.groups[0]!.cases[0]!.durations, [6, 6]);
      assert.deepStrictEqual(
        logger.lines.filter((l) => l.level === "warn").map((l) => l.message),
        [
          "[bench-matrix:sync] [WARN] Suite 'Suite', case 'A': sample teardown failed: close failed",
          "[bench-matrix:sync] [WARN] Suite 'Suite', case 'A': sample teardown failed: close failed",
        ]
      );
    });
  });

  describe("Fatal failures", () => {
    it("aborts the run when sample setup fails", async () => {
      const cause = new Error("cannot allocate");
      const { suite, events } = recordingSuite(["A", "B", "C"], {
        setup: (cfg) => {
          if (cfg.kind === "B") {
            throw cause;
          }
          return { context: { n: 0 }, state: "s" };
        },
      });
      suite.globalTeardown((cfg) => {
        events.push(`globalTeardown:${cfg.kind}`);
      });

      await assert.rejects(suite.run(), (error) => {
        assert.ok(error instanceof SampleSetupFailed);
        assert.strictEqual(error.cause, cause);
        assert.strictEqual(error.suite, "Suite");
        assert.strictEqual(error.id, "B");
        assert.strictEqual(error.config, "{ kind: 'B' }");
        return true;
      });

      assert.strictEqual(events.includes("extract:C"), false);
      assert.deepStrictEqual(events.slice(-2), ["globalTeardown:B", "finish:Suite"]);
    });

    it("finishes the group and logs a partial summary before rejecting", async () => {
      const { suite, harness, logger } = recordingSuite(["A", "B", "C"], {
        setup: (cfg) => {
          if (cfg.kind === "B") {
            throw new Error("cannot allocate");
          }
          return { context: { n: 0 }, state: "s" };
        },
      });

      await assert.rejects(suite.run(), SampleSetupFailed);

      const group = harness.groups[0]!;
      assert.strictEqual(group.finished, true);
      assert.deepStrictEqual(
        group.cases.map((c) => c.id),
        ["A", "B"]
      );
      assert.deepStrictEqual(group.cases[0]!.durations, [6, 6]);
      assert.deepStrictEqual(logger.lines.at(-1), {
        level: "error",
        message:
          "[bench-matrix:sync] [ERROR] Suite 'Suite' aborted: 3 combinations attempted, 1 run, 0 skipped (extraction), 0 skipped (global setup).",
      });
    });

    it("reports a failing configuration copy as a sample setup failure", async () => {
      const cause = new Error("not copyable");
      const { suite, events } = recordingSuite(["A"]);
      suite.cloneConfig(() => {
        throw cause;
      });

      await assert.rejects(suite.run(), (error) => {
        assert.ok(error instanceof SampleSetupFailed);
        assert.strictEqual(error.cause, cause);
        assert.strictEqual(error.config, "{ kind: 'A' }");
        return true;
      });
      assert.deepStrictEqual(events, ["extract:A", "bench:A", "finish:Suite"]);
    });

    it("still tears the sample down when logic throws", async () => {
      const { suite, events } = recordingSuite(["A"], {
        logic: (context, state) => {
          if (context.n === 1) {
            throw new Error("logic exploded");
          }
          return { context: { n: context.n + 1 }, state, duration: 1 };
        },
      });

      await assert.rejects(suite.run(), /logic exploded/);

      assert.deepStrictEqual(events, ["extract:A", "bench:A", "setup:A", "teardown:state-A:1", "finish:Suite"]);
    });
  });

  describe("Empty matrix", () => {
    it("warns and opens no group without axes", async () => {
      const harness = new RecordingHarness();
      const logger = createRecordingLogger();
      const suite = new SyncBenchmarkSuite<Config, Context, string>({
        harness,
        name: "Empty",
        axes: [],
        extract: extractKind,
        setup: () => ({ context: { n: 0 }, state: "" }),
        logic: (context, state) => ({ context, state, duration: 0 }),
        teardown: () => {},
        logger,
      });

      const summary = await suite.run();

      assert.deepStrictEqual(summary, {
        suite: "Empty",
        attempted: 0,
        completed: 0,
        skippedExtraction: 0,
        skippedGlobalSetup: 0,
      });
      assert.strictEqual(harness.groups.length, 0);
      assert.deepStrictEqual(logger.lines, [
        { level: "warn", message: "[bench-matrix:sync] [WARN] Suite 'Empty': no parameter axes defined. Nothing to run." },
      ]);
    });

    it("warns when an axis has no values", async () => {
      const { suite, harness, events, logger } = recordingSuite([]);

      const summary = await suite.run();

      assert.strictEqual(summary.attempted, 0);
      assert.strictEqual(harness.groups.length, 0);
      assert.deepStrictEqual(events, []);
      assert.strictEqual(
        logger.lines[0]?.message,
        "[bench-matrix:sync] [WARN] Suite 'Suite': no combinations generated (an axis is empty). Nothing to run."
      );
    });
  });

  describe("copyConfig", () => {
    it("returns primitives and null unchanged", () => {
      assert.strictEqual(copyConfig(5), 5);
      assert.strictEqual(copyConfig("Low"), "Low");
      assert.strictEqual(copyConfig(null), null);
    });

    it("copies arrays as arrays", () => {
      const source = [1, 2];
      const copy = copyConfig(source);

      assert.ok(Array.isArray(copy));
      assert.notStrictEqual(copy, source);
      assert.deepStrictEqual(copy, [1, 2]);
    });

    it("keeps the prototype and shares nested values", () => {
      const tags = ["a"];
      const source = { workload: new Workload("Net", 2), tags };
      const copy = copyConfig(source);
      const instance = copyConfig(source.workload);

      assert.notStrictEqual(copy, source);
      assert.strictEqual(copy.tags, tags);
      assert.ok(instance instanceof Workload);
      assert.strictEqual(instance.weight(), 6);
    });
  });
});
