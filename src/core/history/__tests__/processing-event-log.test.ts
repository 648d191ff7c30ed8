/**
 * Tests for ProcessingEventLog
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ProcessingEventLog, PROCESSING_EVENTS_FILE } from "../processing-event-log.js";

describe("ProcessingEventLog", () => {
  let logDir: string;
  const now = () => new Date("2024-01-15T09:05:03.000Z");

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), "ingest-watch-events-"));
  });

  afterEach(() => {
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it("should append one JSON line per event", async () => {
    const log = new ProcessingEventLog({ logDir: path.join(logDir, "nested"), now });
    await log.record("/watch/customer_data/jan.csv", "triggered", "Task ID: jan.csv_1");

    const content = fs.readFileSync(path.join(logDir, "nested", PROCESSING_EVENTS_FILE), "utf-8");
    expect(content).toBe(
      '{"timestamp":"2024-01-15T09:05:03.000Z","filepath":"/watch/customer_data/jan.csv",' +
        '"filename":"jan.csv","status":"triggered","details":"Task ID: jan.csv_1"}\n'
    );
  });

  it("should read back the most recent events in order", async () => {
    const log = new ProcessingEventLog({ logDir, now });
    void log.record("/watch/a.csv", "triggered");
    void log.record("/watch/b.csv", "error", "broker down");
    void log.record("/watch/a.csv", "completed_success", "Worker: w1, Details: ");

    const events = await log.recent(2);
    expect(events.map((event) => `${event.filename}:${event.status}`)).toEqual([
      "b.csv:error",
      "a.csv:completed_success",
    ]);
    expect((await log.recent()).length).toBe(3);
  });

  it("should read a missing file as empty", async () => {
    const log = new ProcessingEventLog({ logDir });
    expect(await log.recent()).toEqual([]);
  });

  it("should skip malformed lines", async () => {
    const log = new ProcessingEventLog({ logDir, now });
    fs.writeFileSync(path.join(logDir, PROCESSING_EVENTS_FILE), 'not json\n{"status":"unknown"}\n');
    await log.record("/watch/a.csv", "triggered");

    const events = await log.recent();
    expect(events).toHaveLength(1);
    expect(events[0]?.filepath).toBe("/watch/a.csv");
  });

  it("should not reject when the file cannot be written", async () => {
    const blocker = path.join(logDir, "blocker");
    fs.writeFileSync(blocker, "");
    const log = new ProcessingEventLog({ logDir: blocker, now });

    await expect(log.record("/watch/a.csv", "triggered")).resolves.toBeUndefined();
  });
});
