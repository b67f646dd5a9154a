import { type GroupSettings, type RunSummary, TinybenchHarness } from "bench-matrix";

import { suites as allSuites } from "./suites/index.js";
import type { DemoSuite } from "./types.js";

// ---------------------------------------------------------------------------
// Benchmark runtime settings
// ---------------------------------------------------------------------------

/**
 * measurementTime stays 0 so tinybench takes exactly `sampleSize` samples per
 * case instead of sampling until a wall-clock budget is met. Suites override
 * sample counts in their group configurators.
 */
const HARNESS_DEFAULTS: Partial<GroupSettings> = {
  measurementTime: 0,
  warmupTime: 0,
};

// ---------------------------------------------------------------------------
// CLI argument parsing
// ---------------------------------------------------------------------------

const args = process.argv.slice(2);
const quick = args.includes("--quick");
const listOnly = args.includes("--list");
const suiteFilter = args.find((a) => !a.startsWith("--"));

function selectSuites(all: DemoSuite[], filter: string | undefined): DemoSuite[] {
  if (!filter) return all;
  return all.filter((s) => s.name.toLowerCase() === filter.toLowerCase());
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

function printSummary(summaries: RunSummary[]): void {
  console.log("\nRun summary");
  for (let i = 0; i < summaries.length; i++) {
    const s = summaries[i]!;
    const skipped = s.skippedExtraction + s.skippedGlobalSetup;
    console.log(`  ${s.suite}: ${s.completed}/${s.attempted} combinations benchmarked, ${skipped} skipped`);
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  if (listOnly) {
    for (let i = 0; i < allSuites.length; i++) {
      const suite = allSuites[i]!;
      console.log(`${suite.name.padEnd(8)} ${suite.description}`);
    }
    return;
  }

  const suites = selectSuites(allSuites, suiteFilter);
  if (suites.length === 0) {
    const names = allSuites.map((s) => s.name).join(", ");
    console.error(`No suite found matching "${suiteFilter}". Available: ${names}`);
    process.exitCode = 1;
    return;
  }

  console.log(`Running ${suites.map((s) => s.name).join(", ")}${quick ? " (quick)" : ""}\n`);

  const harness = new TinybenchHarness({ defaults: HARNESS_DEFAULTS });
  const summaries: RunSummary[] = [];
  for (let i = 0; i < suites.length; i++) {
    summaries.push(await suites[i]!.run(harness, { quick }));
  }
  printSummary(summaries);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
