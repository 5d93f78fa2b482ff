/**
 * Test helpers for @switchboard/a2a
 */

import { createServer } from "node:http";
import type { AddressInfo } from "node:net";
import { toCapabilityDescriptor } from "../descriptor.js";
import type { CapabilityDescriptor } from "../types.js";
import { RawAgentCardSchema } from "../validation.js";

// ---------------------------------------------------------------------------
// Agent Cards
// ---------------------------------------------------------------------------

export function createRawAgentCard(overrides?: Record<string, unknown>): Record<string, unknown> {
  return {
    name: "TellTimeAgent",
    description: "Tells the current time",
    url: "http://localhost:10002/",
    version: "1.0.0",
    defaultInputModes: ["text"],
    defaultOutputModes: ["text"],
    capabilities: { streaming: false, pushNotifications: false },
    skills: [
      {
        id: "tell_time",
        name: "Tell Time",
        description: "Replies with the current system time",
        tags: ["time", "clock"],
        examples: ["What time is it?"],
      },
    ],
    ...overrides,
  };
}

export function createDescriptor(overrides?: Record<string, unknown>): CapabilityDescriptor {
  const raw = createRawAgentCard(overrides);
  const card = RawAgentCardSchema.parse(raw);
  const source = typeof raw.url === "string" ? raw.url.replace(/\/+$/, "") : "http://localhost";
  return toCapabilityDescriptor(card, source);
}

// ---------------------------------------------------------------------------
// JSON-RPC
// ---------------------------------------------------------------------------

export function createJsonRpcSuccess(result: unknown, id: string | number = "req-1"): unknown {
  return { jsonrpc: "2.0", id, result };
}

export function createJsonRpcError(
  code: number,
  message: string,
  id: string | number = "req-1",
): unknown {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

/** Raw task as a peer would return it */
export function createRawTask(
  replyText: string,
  state = "completed",
  overrides?: Record<string, unknown>,
): Record<string, unknown> {
  return {
    id: "task-123",
    sessionId: "s1",
    status: {
      state,
      message: { role: "agent", parts: [{ type: "text", text: replyText }] },
      timestamp: "2026-01-01T00:00:00.000Z",
    },
    history: [
      { role: "user", parts: [{ type: "text", text: "What time is it?" }] },
      { role: "agent", parts: [{ type: "text", text: replyText }] },
    ],
    ...overrides,
  };
}

export function sendTaskBody(text: string, overrides?: Record<string, unknown>): string {
  return JSON.stringify({
    jsonrpc: "2.0",
    id: "req-1",
    method: "tasks/send",
    params: {
      id: "task-1",
      sessionId: "s1",
      message: { role: "user", parts: [{ type: "text", text }] },
    },
    ...overrides,
  });
}

// ---------------------------------------------------------------------------
// Mock fetch
// ---------------------------------------------------------------------------

export function mockFetchResponse(body: unknown, status = 200): Response {
  return new Response(typeof body === "string" ? body : JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

/** fetch stand-in that never answers and rejects once its signal aborts */
export function hangingFetch(_url: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const onAbort = (): void => reject(new DOMException("The operation was aborted.", "AbortError"));
    if (init?.signal?.aborted) {
      onAbort();
      return;
    }
    init?.signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parsed JSON body of the n-th call to a mocked fetch */
export function requestBodyOf(calls: readonly unknown[][], n = 0): Record<string, unknown> {
  const init = calls[n]?.[1];
  if (!isRecord(init) || typeof init.body !== "string") {
    throw new Error(`fetch call ${n} has no string body`);
  }
  const parsed: unknown = JSON.parse(init.body);
  if (!isRecord(parsed)) {
    throw new Error(`fetch call ${n} body is not an object`);
  }
  return parsed;
}

/** Plain-object headers of the n-th call to a mocked fetch */
export function requestHeadersOf(calls: readonly unknown[][], n = 0): Record<string, unknown> {
  const init = calls[n]?.[1];
  if (!isRecord(init) || !isRecord(init.headers)) {
    throw new Error(`fetch call ${n} has no header object`);
  }
  return init.headers;
}

// ---------------------------------------------------------------------------
// Loopback peers
// ---------------------------------------------------------------------------

export interface StallingServer {
  readonly url: string;
  close(): Promise<void>;
}

/**
 * Loopback HTTP server that sends 200 headers and the start of a JSON body
 * on every request, then never finishes the response.
 */
export async function startStallingServer(): Promise<StallingServer> {
  const server = createServer((_req, res) => {
    res.writeHead(200, { "content-type": "application/json" });
    res.write("{");
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("stalling server has no port");
  }
  const { port }: AddressInfo = address;

  return {
    url: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
