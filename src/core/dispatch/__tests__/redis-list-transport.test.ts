/**
 * Tests for the Redis list transport against an in-process RESP server
 */

import * as net from "node:net";
import { describe, it, expect, afterEach } from "vitest";
import { RedisListTransport } from "../impl/RedisListTransport.js";
import { toDispatchError } from "../impl/dispatch-errors.js";
import { buildTaskRequest } from "../models/task-request.js";
import { ErrorCode } from "../../errors.js";
import { sleep } from "../../../utils/async.js";
import { makeConfig } from "../../__tests__/fixtures.js";

// =============================================================================
// Fake broker
// =============================================================================

interface FakeRedis {
  readonly pushed: string[][];
  close(): Promise<void>;
}

function readCommand(data: string, start: number): { args: string[]; next: number } | undefined {
  let lineEnd = data.indexOf("\r\n", start);
  if (data[start] !== "*" || lineEnd < 0) return undefined;
  const count = Number(data.slice(start + 1, lineEnd));
  let cursor = lineEnd + 2;
  const args: string[] = [];
  for (let i = 0; i < count; i++) {
    lineEnd = data.indexOf("\r\n", cursor);
    if (lineEnd < 0) return undefined;
    const length = Number(data.slice(cursor + 1, lineEnd));
    const valueStart = lineEnd + 2;
    if (data.length < valueStart + length + 2) return undefined;
    args.push(data.slice(valueStart, valueStart + length));
    cursor = valueStart + length + 2;
  }
  return { args, next: cursor };
}

async function startFakeRedis(port: number): Promise<FakeRedis> {
  const pushed: string[][] = [];
  const sockets = new Set<net.Socket>();
  const info = "# Server\r\nredis_version:7.2.0\r\nloading:0\r\n";

  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    let buffered = "";
    socket.on("data", (chunk: Buffer) => {
      buffered += chunk.toString("utf-8");
      let command = readCommand(buffered, 0);
      while (command) {
        buffered = buffered.slice(command.next);
        const [name = "", ...args] = command.args;
        switch (name.toUpperCase()) {
          case "INFO":
            socket.write(`$${info.length}\r\n${info}\r\n`);
            break;
          case "LPUSH":
            pushed.push(args);
            socket.write(`:${pushed.length}\r\n`);
            break;
          case "QUIT":
            socket.end("+OK\r\n");
            break;
          default:
            socket.write("+OK\r\n");
        }
        command = readCommand(buffered, 0);
      }
    });
  });
  await new Promise<void>((resolve) => server.listen(port, "127.0.0.1", resolve));

  return {
    pushed,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      }),
  };
}

async function unusedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

// =============================================================================
// Tests
// =============================================================================

describe("RedisListTransport", () => {
  let transport: RedisListTransport | undefined;
  let broker: FakeRedis | undefined;

  afterEach(async () => {
    await transport?.close();
    await broker?.close();
    transport = undefined;
    broker = undefined;
  });

  it("should push onto the list once the broker is up", async () => {
    const port = await unusedPort();
    broker = await startFakeRedis(port);
    transport = new RedisListTransport(`redis://127.0.0.1:${port}`);

    expect(await transport.push("celery", "first")).toBe(1);
    expect(await transport.push("celery", "second")).toBe(2);
    expect(broker.pushed).toEqual([
      ["celery", "first"],
      ["celery", "second"],
    ]);
  });

  it("should deliver again after the broker comes back", async () => {
    const port = await unusedPort();
    transport = new RedisListTransport(`redis://127.0.0.1:${port}`);

    const failure = await transport.push("celery", "lost").catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(Error);

    // outage long enough to use up a bounded reconnect budget
    await sleep(1500);
    broker = await startFakeRedis(port);

    let depth: number | undefined;
    for (let attempt = 0; attempt < 30 && depth === undefined; attempt++) {
      depth = await transport.push("celery", "retried").catch(() => undefined);
      if (depth === undefined) await sleep(100);
    }
    expect(depth).toBe(1);
    expect(broker.pushed).toEqual([["celery", "retried"]]);
  }, 15_000);

  it("should report a down broker as unreachable", async () => {
    const port = await unusedPort();
    transport = new RedisListTransport(`redis://127.0.0.1:${port}`);
    const settings = makeConfig().dispatch;
    const request = buildTaskRequest(
      "/watch/customer_data/jan.csv",
      { name: "dim_customers", schema: "public" },
      settings,
      0
    );

    const failure = await transport.push("celery", "lost").catch((error: unknown) => error);
    expect(toDispatchError(failure, request, 'list "celery"').code).toBe(ErrorCode.DISPATCH_BROKER_UNREACHABLE);
  });
});
