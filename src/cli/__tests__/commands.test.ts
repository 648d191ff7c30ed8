/**
 * Tests for CLI helpers
 */

import { describe, it, expect } from "vitest";
import { formatTickSummary, runOnce } from "../commands/start.js";
import { fetchRemoteStatus, statusUrl } from "../commands/status.js";
import { onShutdown, runShutdownHooks } from "../shutdown.js";
import { CompletionServer } from "../../core/completion/impl/CompletionServer.js";
import { WatchPipeline } from "../../core/pipeline/watch-pipeline.js";
import { StateTracker } from "../../core/state/impl/StateTracker.js";
import { emptyTickSummary } from "../../core/scanner/models/scan-models.js";
import { parseConfig } from "../../core/config/config-loader.js";
import {
  MemoryEventLog,
  MemoryFileSource,
  RecordingDispatchClient,
  makeConfig,
} from "../../core/__tests__/fixtures.js";

// =============================================================================
// Output
// =============================================================================

describe("formatTickSummary", () => {
  it("should list every counter", () => {
    const summary = { ...emptyTickSummary(), scanned: 4, newFiles: 1, stable: 2, dispatched: 2, durationMs: 15 };
    expect(formatTickSummary(summary)).toBe(
      "scanned 4, new 1, modified 0, stable 2, dispatched 2, failed 0, ignored 0, errors 0 (15ms)"
    );
  });
});

describe("runOnce", () => {
  it("should dispatch files that are already settled", async () => {
    const source = new MemoryFileSource();
    source.write("/watch/customer_data/jan.csv", 100, 1000);
    source.write("/watch/misc/notes.csv", 100, 1000);
    const client = new RecordingDispatchClient();
    const pipeline = new WatchPipeline({
      config: makeConfig(),
      source,
      tracker: new StateTracker(),
      client,
      eventLog: new MemoryEventLog(),
      sleep: async () => {},
    });

    const summary = await runOnce(pipeline);
    await pipeline.stop();

    expect(summary).toMatchObject({
      scanned: 2,
      newFiles: 1,
      modified: 0,
      stable: 1,
      dispatched: 1,
      failed: 0,
      ignored: 1,
      errors: 0,
    });
    expect(client.calls.map((call) => call.path)).toEqual(["/watch/customer_data/jan.csv"]);
    expect(pipeline.status().ticks).toBe(2);
  });
});

// =============================================================================
// Status
// =============================================================================

describe("statusUrl", () => {
  function configWithHost(host: string) {
    return parseConfig(
      {
        watcher: { watch_paths: ["/watch"] },
        patterns: [{ pattern: "sales_data", destination: "fact_sales" }],
        completion: { host, port: 5050 },
      },
      { baseDir: "/" }
    );
  }

  it("should use loopback for wildcard binds", () => {
    expect(statusUrl(configWithHost("0.0.0.0"))).toBe("http://127.0.0.1:5050/status");
    expect(statusUrl(configWithHost("::"))).toBe("http://127.0.0.1:5050/status");
  });

  it("should keep explicit hosts", () => {
    expect(statusUrl(configWithHost("10.0.0.5"))).toBe("http://10.0.0.5:5050/status");
  });
});

describe("fetchRemoteStatus", () => {
  it("should read the status of a running instance", async () => {
    const source = new MemoryFileSource();
    const eventLog = new MemoryEventLog();
    const pipeline = new WatchPipeline({
      config: makeConfig(),
      source,
      tracker: new StateTracker(),
      client: new RecordingDispatchClient(),
      eventLog,
      sleep: async () => {},
    });
    source.write("/watch/sales_data/feb.csv", 10, 1000);
    await pipeline.tick();
    await pipeline.tick();

    const server = new CompletionServer(pipeline.completions, pipeline, eventLog);
    await server.start({ port: 0 });
    const url = `http://127.0.0.1:${server.port}/status`;

    try {
      const status = await fetchRemoteStatus(url);
      expect(status?.ticks).toBe(2);
      expect(status?.state.queued).toBe(1);
      expect(status?.recentDispatches.map((record) => record.destination)).toEqual(["fact_sales"]);
    } finally {
      await server.stop();
      await pipeline.stop();
    }

    expect(await fetchRemoteStatus(url, 500)).toBeNull();
  });
});

// =============================================================================
// Shutdown
// =============================================================================

describe("runShutdownHooks", () => {
  it("should run hooks newest first and collect failures", async () => {
    const order: string[] = [];
    onShutdown(async () => {
      order.push("server");
    });
    onShutdown(async () => {
      order.push("pipeline");
      throw new Error("client close failed");
    });
    const remove = onShutdown(async () => {
      order.push("removed");
    });
    remove();

    const failures = await runShutdownHooks();

    expect(order).toEqual(["pipeline", "server"]);
    expect(failures).toHaveLength(1);
    expect(await runShutdownHooks()).toEqual([]);
  });
});
