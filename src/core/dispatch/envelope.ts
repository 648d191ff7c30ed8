/**
 * Task Message Envelope
 *
 * Builds the protocol v2 task message consumed by Celery workers through the
 * kombu Redis transport: a base64 JSON body of `[args, kwargs, embed]`, task
 * headers, and delivery properties.
 *
 * @module
 */

import { randomUUID } from "node:crypto";
import * as os from "node:os";
import type { TaskArgs, TaskKwargs, TaskRequest } from "./models/task-request.js";
import { pyRepr } from "./py-repr.js";

// =============================================================================
// Types
// =============================================================================

export interface EnvelopeEmbed {
  callbacks: null;
  errbacks: null;
  chain: null;
  chord: null;
}

export interface EnvelopeHeaders {
  lang: "py";
  task: string;
  id: string;
  shadow: null;
  eta: null;
  expires: null;
  group: null;
  group_index: null;
  retries: number;
  timelimit: [null, null];
  root_id: string;
  parent_id: null;
  argsrepr: string;
  kwargsrepr: string;
  origin: string;
}

export interface EnvelopeProperties {
  correlation_id: string;
  reply_to: string;
  delivery_mode: 2;
  delivery_info: { exchange: string; routing_key: string };
  priority: number;
  body_encoding: "base64";
  delivery_tag: string;
}

export interface TaskEnvelope {
  body: string;
  "content-encoding": "utf-8";
  "content-type": "application/json";
  headers: EnvelopeHeaders;
  properties: EnvelopeProperties;
}

export interface EnvelopeOptions {
  /** Broker list / routing key */
  queue: string;
  /** Defaults to `gen<pid>@<hostname>` */
  origin?: string;
  /** Generator for reply_to and delivery_tag */
  newId?: () => string;
}

// =============================================================================
// Build
// =============================================================================

const EMPTY_EMBED: EnvelopeEmbed = { callbacks: null, errbacks: null, chain: null, chord: null };

export function defaultOrigin(): string {
  return `gen${process.pid}@${os.hostname()}`;
}

export function encodeBody(args: TaskArgs, kwargs: TaskKwargs): string {
  return Buffer.from(JSON.stringify([args, kwargs, EMPTY_EMBED]), "utf-8").toString("base64");
}

export function buildEnvelope(request: TaskRequest, options: EnvelopeOptions): TaskEnvelope {
  const newId = options.newId ?? randomUUID;
  const id = request.correlationId;

  return {
    body: encodeBody(request.args, request.kwargs),
    "content-encoding": "utf-8",
    "content-type": "application/json",
    headers: {
      lang: "py",
      task: request.taskName,
      id,
      shadow: null,
      eta: null,
      expires: null,
      group: null,
      group_index: null,
      retries: 0,
      timelimit: [null, null],
      root_id: id,
      parent_id: null,
      argsrepr: pyRepr(request.args),
      kwargsrepr: pyRepr(request.kwargs),
      origin: options.origin ?? defaultOrigin(),
    },
    properties: {
      correlation_id: id,
      reply_to: newId(),
      delivery_mode: 2,
      delivery_info: { exchange: "", routing_key: options.queue },
      priority: 0,
      body_encoding: "base64",
      delivery_tag: newId(),
    },
  };
}

export function encodeEnvelope(envelope: TaskEnvelope): string {
  return JSON.stringify(envelope);
}
