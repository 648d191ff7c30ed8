/**
 * Tests for the completion HTTP server
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CompletionServer } from "../impl/CompletionServer.js";
import { WatchPipeline } from "../../pipeline/watch-pipeline.js";
import { StateTracker } from "../../state/impl/StateTracker.js";
import { ErrorCode } from "../../errors.js";
import {
  MemoryEventLog,
  MemoryFileSource,
  RecordingDispatchClient,
  makeConfig,
} from "../../__tests__/fixtures.js";

const JAN = "/watch/customer_data/jan.csv";

describe("CompletionServer", () => {
  let source: MemoryFileSource;
  let tracker: StateTracker;
  let eventLog: MemoryEventLog;
  let pipeline: WatchPipeline;
  let server: CompletionServer;
  let baseUrl: string;

  beforeEach(async () => {
    source = new MemoryFileSource();
    tracker = new StateTracker();
    eventLog = new MemoryEventLog();
    pipeline = new WatchPipeline({
      config: makeConfig(),
      source,
      tracker,
      client: new RecordingDispatchClient(),
      eventLog,
      sleep: async () => {},
    });
    server = new CompletionServer(pipeline.completions, pipeline, eventLog);
    await server.start({ port: 0 });
    baseUrl = `http://127.0.0.1:${server.port}`;
  });

  afterEach(async () => {
    await server.stop();
    await pipeline.stop();
  });

  async function dispatchJan(): Promise<void> {
    source.write(JAN, 100, 1000);
    await pipeline.tick();
    await pipeline.tick();
  }

  function postCompletion(body: string): Promise<Response> {
    return fetch(`${baseUrl}/processing_complete`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
    });
  }

  // ===========================================================================
  // POST /processing_complete
  // ===========================================================================

  it("should record a completion for a dispatched file", async () => {
    await dispatchJan();

    const response = await postCompletion(
      JSON.stringify({ filename: "jan.csv", status: "success", worker_id: "worker-1" })
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      message: "Processing completion recorded",
      filename: "jan.csv",
      status: "success",
      matched: true,
    });
    expect(tracker.get(JAN)?.status).toBe("completed");
  });

  it("should accept completions for unknown files", async () => {
    const response = await postCompletion(JSON.stringify({ filename: "ghost.csv", status: "failure" }));

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ filename: "ghost.csv", matched: false });
  });

  it("should reject a body that is not JSON", async () => {
    const response = await postCompletion("{filename:");

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Body is not valid JSON", issues: [] });
  });

  it("should reject a payload without a status", async () => {
    const response = await postCompletion(JSON.stringify({ filename: "jan.csv" }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Malformed completion payload", issues: ["status: Required"] });
    expect(eventLog.events).toEqual([]);
  });

  // ===========================================================================
  // Read endpoints
  // ===========================================================================

  it("should serve the pipeline status", async () => {
    await dispatchJan();

    const response = await fetch(`${baseUrl}/status`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({
      running: false,
      ticks: 2,
      state: { queued: 1, processed: 0, total: 1 },
      config: { strategy: "raw-envelope", patternCount: 7 },
    });
  });

  it("should answer health checks", async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body: unknown = await response.json();

    expect(body).toMatchObject({ status: "ok" });
  });

  it("should serve the most recent processing events", async () => {
    await dispatchJan();
    await postCompletion(JSON.stringify({ filename: "jan.csv", status: "success" }));

    const response = await fetch(`${baseUrl}/processing_history?limit=1`);
    const body: unknown = await response.json();

    expect(body).toEqual({
      count: 1,
      events: [
        {
          timestamp: "1970-01-01T00:00:00.000Z",
          filepath: JAN,
          filename: "jan.csv",
          status: "completed_success",
          details: "Worker: unknown, Details: ",
        },
      ],
    });
  });

  it("should answer 404 for unknown paths and 405 for wrong methods", async () => {
    const missing = await fetch(`${baseUrl}/nope`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "Not Found" });

    const wrongMethod = await fetch(`${baseUrl}/processing_complete`);
    expect(wrongMethod.status).toBe(405);
    expect(wrongMethod.headers.get("allow")).toBe("POST");
  });

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  it("should fail to start on a port that is taken", async () => {
    const second = new CompletionServer(pipeline.completions, pipeline, eventLog);

    await expect(second.start({ port: server.port ?? 0 })).rejects.toMatchObject({
      name: "CompletionError",
      code: ErrorCode.COMPLETION_SERVER_START_FAILED,
    });
    expect(second.port).toBeNull();
  });
});
