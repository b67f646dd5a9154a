import { setTimeout as sleep } from "node:timers/promises";
import {
  AsyncBenchmarkSuite,
  type AsyncRuntime,
  axis,
  Cell,
  type Combination,
  consoleLogger,
  createScopedLogger,
  type Harness,
  immediateRuntime,
  InvalidArgument,
  type IterationResult,
  type RunSummary,
  type SampleResources,
} from "bench-matrix";
import { splitmix32 } from "../rng.js";
import type { DemoSuite, HookCounters, RunOptions } from "../types.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type Workload = "network" | "disk";

export type IoConfig = {
  workload: Workload;
  packetSize: number;
  concurrency: number;
};

export type IoContext = {
  ops: number;
};

export type IoState = {
  packet: Uint8Array;
  connections: string[];
};

const WORKLOADS: Record<string, Workload> = {
  Network: "network",
  Disk: "disk",
};

const PACKET_SEED = 7;

export const ioAxes = [
  axis("Network", "Disk"),
  [Cell.unsigned(64), Cell.unsigned(512)],
  [Cell.unsigned(1), Cell.unsigned(4)],
];
export const ioParameterNames = ["Workload", "PktSize", "Concurrency"];

// ---------------------------------------------------------------------------
// Simulation
// ---------------------------------------------------------------------------

/**
 * Simulated latency of one operation in microseconds. Disk is slower per op
 * and scales faster with the packet size.
 */
export function operationLatency(workload: Workload, packetSize: number): number {
  return workload === "network" ? 10 + Math.floor(packetSize / 200) : 20 + Math.floor(packetSize / 100);
}

export function checksum(packet: Uint8Array): number {
  let sum = 0;
  for (let i = 0; i < packet.length; i++) {
    sum = (sum + packet[i]!) & 0xff;
  }
  return sum;
}

// ---------------------------------------------------------------------------
// Callbacks
// ---------------------------------------------------------------------------

export function extractIoConfig(combo: Combination): IoConfig {
  const tag = combo.getTag(0);
  const workload = WORKLOADS[tag];
  if (!workload) {
    throw new InvalidArgument({ expected: "workload Network or Disk", actual: tag });
  }
  const concurrency = Number(combo.getUnsigned(2));
  if (concurrency === 0) {
    throw new InvalidArgument({ expected: "at least one concurrent operation", actual: "0" });
  }
  return {
    workload,
    packetSize: Number(combo.getUnsigned(1)),
    concurrency,
  };
}

export async function setupIoSample(
  _runtime: AsyncRuntime,
  config: IoConfig
): Promise<SampleResources<IoContext, IoState>> {
  const rng = splitmix32(PACKET_SEED);
  const packet = new Uint8Array(config.packetSize);
  for (let i = 0; i < packet.length; i++) {
    packet[i] = Math.floor(rng() * 256);
  }

  const connections: string[] = [];
  for (let i = 0; i < config.concurrency; i++) {
    connections.push(`conn-${i}-${config.workload}-${config.packetSize}`);
  }

  return { context: { ops: 0 }, state: { packet, connections } };
}

/**
 * One round of operations, one per simulated connection, all in flight at once.
 */
export async function runIoIteration(
  context: IoContext,
  state: IoState,
  _runtime: AsyncRuntime,
  config: IoConfig
): Promise<IterationResult<IoContext, IoState>> {
  const delayMs = operationLatency(config.workload, config.packetSize) / 1000;
  const start = performance.now();

  await Promise.all(state.connections.map(() => sleep(delayMs)));
  checksum(state.packet);

  const duration = performance.now() - start;
  return { context: { ops: context.ops + state.connections.length }, state, duration };
}

export async function teardownIoSample(_context: IoContext, state: IoState): Promise<void> {
  state.connections.length = 0;
}

// ---------------------------------------------------------------------------
// Suite
// ---------------------------------------------------------------------------

async function run(harness: Harness, options: RunOptions): Promise<RunSummary> {
  const log = createScopedLogger(options.logger ?? consoleLogger, "demo");
  const counters: HookCounters = { globalSetups: 0, globalTeardowns: 0 };

  const summary = await new AsyncBenchmarkSuite<IoConfig, IoContext, IoState>({
    harness,
    runtime: immediateRuntime,
    name: "IoSuite",
    axes: ioAxes,
    parameterNames: ioParameterNames,
    extract: extractIoConfig,
    setup: setupIoSample,
    logic: runIoIteration,
    teardown: teardownIoSample,
    logger: options.logger,
  })
    .globalSetup(async (config) => {
      counters.globalSetups++;
      log.info(
        `Global setup #${counters.globalSetups}: ${config.workload}, ${config.packetSize} B x ${config.concurrency}`
      );
    })
    .globalTeardown(async () => {
      counters.globalTeardowns++;
    })
    .configureGroup((group) => {
      group.plotScale("logarithmic");
      if (options.quick) {
        group.sampleSize(3).warmupIterations(1);
      } else {
        group.sampleSize(10).warmupIterations(3).iterationsPerSample(5);
      }
    })
    .throughput((config) => ({ kind: "bytes", count: config.packetSize * config.concurrency }))
    .run();

  log.info(`IoSuite: ${counters.globalSetups} global setups, ${counters.globalTeardowns} global teardowns`);
  return summary;
}

export const ioSuite: DemoSuite = {
  name: "io",
  description: "Simulated network and disk operations awaited on the event loop",
  run,
};
