/**
 * Tests for task requests, repr formatting and the task message envelope
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { buildTaskRequest, createCorrelationId, formatBatchTimestamp } from "../models/task-request.js";
import { pyRepr, reprString } from "../py-repr.js";
import { buildEnvelope, encodeBody, encodeEnvelope, type TaskEnvelope } from "../envelope.js";

const AT = new Date(2024, 0, 15, 9, 5, 3).getTime();
const settings = { taskName: "etl_processor.enhanced_tasks.process_excel_file", sourceTag: "ingest-watch" };
const destination = { name: "dim_customers", schema: "public" };

const WireMessageSchema = z.object({
  body: z.string(),
  "content-type": z.string(),
  "content-encoding": z.string(),
  properties: z.object({ body_encoding: z.string() }),
});

/**
 * Reads a serialized message the way a worker does: the body encoding, the
 * content encoding and the content type each pick a decoder.
 */
function decodeMessage(raw: string): unknown {
  const message = WireMessageSchema.parse(JSON.parse(raw));

  let bytes: Buffer;
  switch (message.properties.body_encoding) {
    case "base64":
      bytes = Buffer.from(message.body, "base64");
      break;
    default:
      throw new Error(`Unknown body encoding: ${message.properties.body_encoding}`);
  }

  if (message["content-encoding"] !== "utf-8") {
    throw new Error(`Unknown content encoding: ${message["content-encoding"]}`);
  }
  const text = bytes.toString("utf-8");

  if (message["content-type"] !== "application/json") {
    throw new Error(`No decoder for content type: ${message["content-type"]}`);
  }
  return JSON.parse(text);
}

// =============================================================================
// Task Request
// =============================================================================

describe("buildTaskRequest", () => {
  it("should carry the file name as the only argument", () => {
    const request = buildTaskRequest("/watch/customer_data/jan.csv", destination, settings, AT);

    expect(request.taskName).toBe(settings.taskName);
    expect(request.args).toEqual(["jan.csv"]);
    expect(request.kwargs).toEqual({
      auto_triggered: true,
      filepath: "/watch/customer_data/jan.csv",
      table_name: "dim_customers",
      source_name: "jan_20240115_090503",
      source: "ingest-watch",
      schema: "public",
    });
    expect(request.createdAt).toBe(AT);
  });

  it("should omit schema when the destination has none", () => {
    const request = buildTaskRequest("/watch/reports/q1.xlsx", { name: "staging_reports" }, settings, AT);
    expect(request.kwargs).not.toHaveProperty("schema");
    expect(request.kwargs.source_name).toBe("q1_20240115_090503");
  });

  it("should build unique correlation ids", () => {
    const first = createCorrelationId("jan.csv", AT);
    const second = createCorrelationId("jan.csv", AT);

    expect(first).toMatch(new RegExp(`^jan\\.csv_${AT}_[0-9a-f]{8}$`));
    expect(second).not.toBe(first);
  });

  it("should pad batch timestamps", () => {
    expect(formatBatchTimestamp(new Date(2025, 10, 3, 14, 0, 59))).toBe("20251103_140059");
  });
});

// =============================================================================
// Repr
// =============================================================================

describe("pyRepr", () => {
  it("should render scalars", () => {
    expect(pyRepr(null)).toBe("None");
    expect(pyRepr(true)).toBe("True");
    expect(pyRepr(false)).toBe("False");
    expect(pyRepr(42)).toBe("42");
    expect(pyRepr(1.5)).toBe("1.5");
  });

  it("should render lists and dicts", () => {
    expect(pyRepr(["jan.csv"])).toBe("['jan.csv']");
    expect(pyRepr({ auto_triggered: true, table_name: "dim_customers", nested: [1, null] })).toBe(
      "{'auto_triggered': True, 'table_name': 'dim_customers', 'nested': [1, None]}"
    );
    expect(pyRepr([])).toBe("[]");
    expect(pyRepr({})).toBe("{}");
  });

  it("should switch quotes for strings holding a single quote", () => {
    expect(reprString("it's")).toBe(`"it's"`);
    expect(reprString(`it's "x"`)).toBe(`'it\\'s "x"'`);
  });

  it("should escape backslashes and control characters", () => {
    expect(reprString("C:\\drop")).toBe("'C:\\\\drop'");
    expect(reprString("a\tb\nc")).toBe("'a\\tb\\nc'");
    expect(reprString("\u0001")).toBe("'\\x01'");
  });
});

// =============================================================================
// Envelope
// =============================================================================

describe("buildEnvelope", () => {
  const request = buildTaskRequest("/watch/customer_data/jan.csv", destination, settings, AT);
  let counter = 0;
  const envelope = buildEnvelope(request, {
    queue: "celery",
    origin: "gen1234@test-host",
    newId: () => `id-${++counter}`,
  });

  it("should encode args, kwargs and an empty embed as the body", () => {
    expect(decodeMessage(encodeEnvelope(envelope))).toEqual([
      ["jan.csv"],
      request.kwargs,
      { callbacks: null, errbacks: null, chain: null, chord: null },
    ]);
    expect(envelope["content-type"]).toBe("application/json");
    expect(envelope["content-encoding"]).toBe("utf-8");
  });

  it("should fill the task headers", () => {
    expect(envelope.headers).toEqual({
      lang: "py",
      task: settings.taskName,
      id: request.correlationId,
      shadow: null,
      eta: null,
      expires: null,
      group: null,
      group_index: null,
      retries: 0,
      timelimit: [null, null],
      root_id: request.correlationId,
      parent_id: null,
      argsrepr: "['jan.csv']",
      kwargsrepr:
        "{'auto_triggered': True, 'filepath': '/watch/customer_data/jan.csv', 'table_name': 'dim_customers', " +
        "'source_name': 'jan_20240115_090503', 'source': 'ingest-watch', 'schema': 'public'}",
      origin: "gen1234@test-host",
    });
  });

  it("should route to the queue with persistent delivery", () => {
    expect(envelope.properties).toEqual({
      correlation_id: request.correlationId,
      reply_to: "id-1",
      delivery_mode: 2,
      delivery_info: { exchange: "", routing_key: "celery" },
      priority: 0,
      body_encoding: "base64",
      delivery_tag: "id-2",
    });
  });

  it("should serialize to plain JSON", () => {
    const decoded: TaskEnvelope = JSON.parse(encodeEnvelope(envelope));
    expect(decoded).toEqual(envelope);
  });

  it("should not decode without the fields that select a decoder", () => {
    expect(() => decodeMessage(JSON.stringify({ ...envelope, "content-type": undefined }))).toThrow();
    expect(() => decodeMessage(JSON.stringify({ ...envelope, "content-encoding": undefined }))).toThrow();
    expect(() =>
      decodeMessage(JSON.stringify({ ...envelope, properties: { ...envelope.properties, body_encoding: undefined } }))
    ).toThrow();
    expect(() => decodeMessage(JSON.stringify({ ...envelope, "content-type": "application/x-python-serialize" }))).toThrow(
      "No decoder for content type: application/x-python-serialize"
    );
  });

  it("should default the origin to this process", () => {
    const other = buildEnvelope(request, { queue: "celery" });
    expect(other.headers.origin).toMatch(new RegExp(`^gen${process.pid}@`));
    expect(other.properties.reply_to).not.toBe(other.properties.delivery_tag);
  });

  it("should keep non-ASCII text intact in the body", () => {
    const body = encodeBody(["résumé.csv"], { filepath: "/watch/ü/résumé.csv" });
    expect(decodeMessage(JSON.stringify({ ...envelope, body }))).toEqual([
      ["résumé.csv"],
      { filepath: "/watch/ü/résumé.csv" },
      { callbacks: null, errbacks: null, chain: null, chord: null },
    ]);
  });
});
