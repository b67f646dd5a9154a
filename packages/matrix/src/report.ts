import type { AxisScale, Throughput } from "./harness.js";

// ============================================================================
// Case Records
// ============================================================================

/**
 * Raw measurements collected for one benchmark case.
 */
export type CaseRecord = {
  name: string;
  /** Summed duration of each sample, in milliseconds. */
  samples: number[];
  iterationsPerSample: number;
  throughput?: Throughput;
  /** Set when a sample failed and the case was aborted. */
  error?: unknown;
};

/**
 * Formatted cells of one report row.
 */
export type CaseSummary = {
  name: string;
  samples: string;
  avg: string;
  p75: string;
  p99: string;
  throughput: string;
  /** Mean time per iteration in nanoseconds, 0 when unavailable. */
  meanNs: number;
};

// ============================================================================
// Formatting helpers
// ============================================================================

function padRight(str: string, len: number): string {
  return str + " ".repeat(Math.max(0, len - str.length));
}

function padLeft(str: string, len: number): string {
  return " ".repeat(Math.max(0, len - str.length)) + str;
}

function formatNumber(n: number): string {
  return n.toLocaleString("en-US", { maximumFractionDigits: 0 });
}

export function formatTime(ns: number): string {
  if (ns < 1_000) return `${formatNumber(Math.round(ns))} ns`;
  if (ns < 1_000_000) return `${(ns / 1_000).toFixed(2)} µs`;
  return `${(ns / 1_000_000).toFixed(2)} ms`;
}

export function formatLargeNumber(n: number): string {
  if (n >= 1_000_000_000) return `${(n / 1_000_000_000).toFixed(1)} B`;
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(1)} M`;
  if (n >= 1_000) return `${(n / 1_000).toFixed(1)} K`;
  return formatNumber(Math.round(n));
}

/** Formats a byte rate with auto-scaled binary units. */
export function formatByteRate(bytesPerSec: number): string {
  if (bytesPerSec < 1024) return `${formatNumber(Math.round(bytesPerSec))} B/s`;
  if (bytesPerSec < 1024 * 1024) return `${(bytesPerSec / 1024).toFixed(1)} KiB/s`;
  if (bytesPerSec < 1024 * 1024 * 1024) return `${(bytesPerSec / (1024 * 1024)).toFixed(1)} MiB/s`;
  return `${(bytesPerSec / (1024 * 1024 * 1024)).toFixed(1)} GiB/s`;
}

function nsFromMs(ms: number): number {
  return ms * 1_000_000;
}

function percentile(sorted: number[], p: number): number {
  const idx = Math.min(Math.ceil(sorted.length * p) - 1, sorted.length - 1);
  return sorted[Math.max(0, idx)]!;
}

// ============================================================================
// Case summary
// ============================================================================

/**
 * Reduce a case's samples to per-iteration timings and a throughput figure.
 * Failed or empty cases render as dashes.
 */
export function summarizeCase(record: CaseRecord): CaseSummary {
  const { name, samples, iterationsPerSample, throughput } = record;
  if (record.error !== undefined || samples.length === 0) {
    return {
      name,
      samples: record.error !== undefined ? "failed" : "0",
      avg: "—",
      p75: "—",
      p99: "—",
      throughput: "—",
      meanNs: 0,
    };
  }

  const perIteration = samples.map((ms) => nsFromMs(ms) / iterationsPerSample).sort((a, b) => a - b);
  let sum = 0;
  for (let i = 0; i < perIteration.length; i++) {
    sum += perIteration[i]!;
  }
  const meanNs = sum / perIteration.length;

  let rate = "—";
  if (throughput && meanNs > 0) {
    const perSec = (throughput.count * 1_000_000_000) / meanNs;
    rate = throughput.kind === "bytes" ? formatByteRate(perSec) : `${formatLargeNumber(perSec)} elem/s`;
  }

  return {
    name,
    samples: formatNumber(samples.length),
    avg: formatTime(meanNs),
    p75: formatTime(percentile(perIteration, 0.75)),
    p99: formatTime(percentile(perIteration, 0.99)),
    throughput: rate,
    meanNs,
  };
}

// ============================================================================
// Relative bar
// ============================================================================

const BAR_BLOCKS = " ▏▎▍▌▋▊▉█";
const BAR_WIDTH = 20;

/**
 * Horizontal bar of `value` relative to `max`, in eighth-block resolution.
 * Logarithmic scale compresses wide ranges so fast cases stay visible.
 */
export function renderBar(value: number, max: number, scale: AxisScale): string {
  if (value <= 0 || max <= 0) return "";

  const ratio = scale === "logarithmic" ? Math.log1p(value) / Math.log1p(max) : value / max;
  const eighths = Math.round(Math.min(ratio, 1) * BAR_WIDTH * 8);
  const full = Math.floor(eighths / 8);
  const rest = eighths % 8;

  return BAR_BLOCKS[8]!.repeat(full) + (rest > 0 ? BAR_BLOCKS[rest]! : "");
}

// ============================================================================
// Box-drawing table
// ============================================================================

export function drawTable(headers: string[], rows: string[][], leftAlignCols?: Set<number>): string {
  const colWidths = headers.map((h, i) => {
    let max = h.length;
    for (let r = 0; r < rows.length; r++) {
      max = Math.max(max, rows[r]![i]!.length);
    }
    return max;
  });

  const top = `┌${colWidths.map((w) => "─".repeat(w + 2)).join("┬")}┐`;
  const mid = `├${colWidths.map((w) => "─".repeat(w + 2)).join("┼")}┤`;
  const bot = `└${colWidths.map((w) => "─".repeat(w + 2)).join("┴")}┘`;

  const headerRow = `│${headers.map((h, i) => ` ${padRight(h, colWidths[i]!)} `).join("│")}│`;

  const dataRows = rows.map(
    (row) =>
      "│" +
      row
        .map((cell, i) => {
          // Left-align first column and any explicitly marked columns
          const left = i === 0 || leftAlignCols?.has(i);
          return left ? ` ${padRight(cell, colWidths[i]!)} ` : ` ${padLeft(cell, colWidths[i]!)} `;
        })
        .join("│") +
      "│"
  );

  return [top, headerRow, mid, ...dataRows, bot].join("\n");
}

// ============================================================================
// Group report
// ============================================================================

/**
 * Render a group's cases as a titled table. The `relative` column compares each
 * case's mean iteration time with the slowest case, on the group's plot scale.
 */
export function formatGroupReport(groupName: string, records: CaseRecord[], scale: AxisScale): string {
  const headers = ["Benchmark", "samples", "avg", "P75", "P99", "throughput", "relative"];
  const summaries = records.map(summarizeCase);

  let maxMean = 0;
  for (let i = 0; i < summaries.length; i++) {
    maxMean = Math.max(maxMean, summaries[i]!.meanNs);
  }

  const rows = summaries.map((s) => [
    s.name,
    s.samples,
    s.avg,
    s.p75,
    s.p99,
    s.throughput,
    renderBar(s.meanNs, maxMean, scale),
  ]);

  return `\n${groupName} (${scale} scale)\n${drawTable(headers, rows, new Set([headers.indexOf("relative")]))}`;
}
