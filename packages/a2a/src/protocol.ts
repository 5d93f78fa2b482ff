/**
 * JSON-RPC 2.0 codec for the task protocol.
 *
 * Requests are classified by payload shape, not by method name: anything that
 * carries a message is a task send, `tasks/get` with a task id is a query, and
 * everything else is rejected with a ProtocolError that echoes the request id
 * when it could be read.
 */

import {
  type JsonRpcId,
  type ProtocolError,
  ProtocolInvalidRequestError,
  ProtocolParseError,
  ProtocolUnsupportedError,
  TaskFormatError,
  toJsonRpcError,
} from "@switchboard/errors";
import type {
  JsonRpcResponse,
  Message,
  Task,
  TaskSendParams,
  TaskState,
  TextPart,
  TypedRequest,
} from "./types.js";
import { METHOD_GET_TASK } from "./types.js";
import {
  formatIssues,
  JsonRpcResponseSchema,
  type RawMessage,
  RawMessageSchema,
  RawTaskSchema,
} from "./validation.js";

export type DecodedRequest =
  | { readonly ok: true; readonly request: TypedRequest }
  | { readonly ok: false; readonly error: ProtocolError };

export type DecodedResponse =
  | { readonly ok: true; readonly response: JsonRpcResponse }
  | { readonly ok: false; readonly reason: string };

export type ResponseOutcome = { readonly result: unknown } | { readonly error: unknown };

const decoder = new TextDecoder();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readId(value: unknown): JsonRpcId {
  return typeof value === "string" || typeof value === "number" ? value : null;
}

function toText(bytes: string | Uint8Array): string {
  return typeof bytes === "string" ? bytes : decoder.decode(bytes);
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

/**
 * Parse and classify an incoming request body.
 * Never throws; failures come back as `{ ok: false, error }`.
 */
export function decodeRequest(bytes: string | Uint8Array): DecodedRequest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(toText(bytes));
  } catch (error) {
    return {
      ok: false,
      error: new ProtocolParseError(error instanceof Error ? error.message : String(error)),
    };
  }

  if (!isRecord(parsed)) {
    return {
      ok: false,
      error: new ProtocolInvalidRequestError(
        Array.isArray(parsed) ? "batch requests are not supported" : "expected a JSON object",
      ),
    };
  }

  const id = readId(parsed.id);
  if (parsed.jsonrpc !== "2.0") {
    return {
      ok: false,
      error: new ProtocolInvalidRequestError('"jsonrpc" must be "2.0"', id),
    };
  }
  if (parsed.method !== undefined && typeof parsed.method !== "string") {
    return {
      ok: false,
      error: new ProtocolInvalidRequestError('"method" must be a string', id),
    };
  }
  const method = parsed.method;
  const params = parsed.params;

  if (isRecord(params) && isRecord(params.message)) {
    return { ok: true, request: { kind: "send", id, method, params } };
  }
  // Params-less shorthand: the message sits on the envelope itself
  if (params === undefined && isRecord(parsed.message)) {
    return {
      ok: true,
      request: {
        kind: "send",
        id,
        method,
        params: { message: parsed.message, sessionId: parsed.sessionId },
      },
    };
  }
  if (method === METHOD_GET_TASK && isRecord(params) && typeof params.id === "string") {
    return { ok: true, request: { kind: "get", id, method, params: { id: params.id } } };
  }

  return { ok: false, error: new ProtocolUnsupportedError(method, id) };
}

/**
 * Serialize an outgoing request. A fresh correlation id is generated unless
 * one is given.
 */
export function encodeRequest(
  method: string,
  params: unknown,
  id: JsonRpcId = crypto.randomUUID(),
): string {
  return JSON.stringify({ jsonrpc: "2.0", id, method, params });
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

/**
 * Serialize a result or an error into a response envelope.
 * A result that cannot be serialized is replaced by an internal-error envelope.
 */
export function encodeResponse(outcome: ResponseOutcome, id: JsonRpcId): string {
  if ("error" in outcome) {
    return JSON.stringify({ jsonrpc: "2.0", id, error: toJsonRpcError(outcome.error) });
  }
  try {
    return JSON.stringify({ jsonrpc: "2.0", id, result: outcome.result });
  } catch (error) {
    return JSON.stringify({ jsonrpc: "2.0", id, error: toJsonRpcError(error) });
  }
}

/** Parse a response envelope received from a remote agent */
export function decodeResponse(bytes: string | Uint8Array): DecodedResponse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(toText(bytes));
  } catch {
    return { ok: false, reason: "Invalid JSON in response" };
  }
  const result = JsonRpcResponseSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, reason: `Not a JSON-RPC response: ${formatIssues(result.error)}` };
  }
  const envelope = result.data;
  if ("error" in envelope) {
    return {
      ok: true,
      response: { jsonrpc: "2.0", id: envelope.id, error: envelope.error },
    };
  }
  if (!("result" in envelope)) {
    return { ok: false, reason: "Response carries neither result nor error" };
  }
  return { ok: true, response: { jsonrpc: "2.0", id: envelope.id, result: envelope.result } };
}

// ---------------------------------------------------------------------------
// Messages and tasks
// ---------------------------------------------------------------------------

/** Build a single-part text message */
export function textMessage(role: Message["role"], text: string): Message {
  const part: TextPart = Object.freeze({ type: "text", text });
  return Object.freeze({ role, parts: Object.freeze([part]) });
}

/** Concatenated text of all text parts */
export function messageText(message: Message): string {
  return message.parts.map((p) => p.text).join("");
}

function normalizeMessage(raw: RawMessage): Message {
  const parts: TextPart[] = [];
  for (const part of raw.parts) {
    if (typeof part.text === "string" && (part.type == null || part.type === "text")) {
      const textPart: TextPart = { type: "text", text: part.text };
      parts.push(Object.freeze(textPart));
    }
  }
  return Object.freeze({ role: raw.role, parts: Object.freeze(parts) });
}

/**
 * Validate the params of a task send. Raises TaskFormatError when the
 * message has no usable text.
 */
export function parseTaskSendParams(
  params: Readonly<Record<string, unknown>>,
  requestId: JsonRpcId = null,
): TaskSendParams {
  const parsed = RawMessageSchema.safeParse(params.message);
  if (!parsed.success) {
    throw new TaskFormatError(`message: ${formatIssues(parsed.error)}`, requestId);
  }
  const message = normalizeMessage(parsed.data);
  if (messageText(message).trim() === "") {
    throw new TaskFormatError("message has no text content", requestId);
  }

  const id = typeof params.id === "string" && params.id !== "" ? params.id : crypto.randomUUID();
  const sessionId =
    typeof params.sessionId === "string" && params.sessionId !== "" ? params.sessionId : id;
  const metadata = isRecord(params.metadata) ? params.metadata : undefined;

  return { id, sessionId, message, metadata };
}

const STATE_ALIASES: Readonly<Record<string, TaskState>> = {
  pending: "pending",
  submitted: "pending",
  working: "working",
  input_required: "input_required",
  completed: "completed",
  error: "error",
  failed: "error",
  canceled: "error",
  cancelled: "error",
  rejected: "error",
};

/** Map a peer's task state onto the local state set; unknown states read as working */
export function toTaskState(raw: string): TaskState {
  const key = raw.toLowerCase().replaceAll("-", "_");
  return STATE_ALIASES[key] ?? "working";
}

export type ParsedTask =
  | { readonly ok: true; readonly task: Task }
  | { readonly ok: false; readonly reason: string };

/** Normalize a task object received as a JSON-RPC result */
export function parseTask(value: unknown): ParsedTask {
  const result = RawTaskSchema.safeParse(value);
  if (!result.success) {
    return { ok: false, reason: `Result is not a task: ${formatIssues(result.error)}` };
  }
  const raw = result.data;
  const statusMessage = raw.status.message ? normalizeMessage(raw.status.message) : undefined;
  return {
    ok: true,
    task: Object.freeze({
      id: raw.id,
      sessionId: raw.sessionId ?? raw.id,
      status: Object.freeze({
        state: toTaskState(raw.status.state),
        message: statusMessage,
        timestamp: raw.status.timestamp ?? new Date().toISOString(),
      }),
      history: Object.freeze((raw.history ?? []).map(normalizeMessage)),
    }),
  };
}
