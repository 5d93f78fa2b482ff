/**
 * Test helpers: a fetch stand-in serving a fleet of fake agents, and
 * in-process MCP servers.
 */

import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpServerConfig, TransportFactory } from "@switchboard/mcp";
import { vi } from "vitest";
import { z } from "zod";
import type { Planner, PlannerDecision, PlannerInput } from "../types.js";

export interface FakeAgent {
  readonly name: string;
  readonly description?: string;
  reply(text: string): string;
}

export interface SentTask {
  readonly url: string;
  readonly taskId: string;
  readonly sessionId: string;
  readonly text: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function textOf(message: unknown): string {
  if (!isRecord(message) || !Array.isArray(message.parts)) return "";
  return message.parts
    .map((part: unknown) => (isRecord(part) && typeof part.text === "string" ? part.text : ""))
    .join("");
}

/**
 * fetch stand-in for agents keyed by base URL. Each agent serves its card
 * and answers tasks/send with a completed task whose last history entry is
 * its reply. Every task sent is recorded in `sent`.
 */
export function fakeAgentFleet(agents: Readonly<Record<string, FakeAgent>>): {
  readonly fetch: typeof fetch;
  readonly sent: SentTask[];
} {
  const sent: SentTask[] = [];

  const fetchStub = vi.fn<typeof fetch>().mockImplementation(async (input, init) => {
    const url = String(input);
    for (const [base, agent] of Object.entries(agents)) {
      if (url === `${base}/.well-known/agent.json`) {
        return jsonResponse({
          name: agent.name,
          description: agent.description ?? `${agent.name} test agent`,
          url: `${base}/`,
          version: "1.0.0",
          skills: [],
        });
      }
      if ((url === base || url === `${base}/`) && init?.method === "POST") {
        const request: unknown = JSON.parse(typeof init.body === "string" ? init.body : "null");
        const params = isRecord(request) && isRecord(request.params) ? request.params : {};
        const taskId = typeof params.id === "string" ? params.id : "";
        const sessionId = typeof params.sessionId === "string" ? params.sessionId : taskId;
        const text = textOf(params.message);
        sent.push({ url: base, taskId, sessionId, text });

        const reply = { role: "agent", parts: [{ type: "text", text: agent.reply(text) }] };
        return jsonResponse({
          jsonrpc: "2.0",
          id: isRecord(request) ? request.id : null,
          result: {
            id: taskId,
            sessionId,
            status: { state: "completed", message: reply },
            history: [params.message, reply],
          },
        });
      }
    }
    return jsonResponse({ error: "not found" }, 404);
  });

  return { fetch: fetchStub, sent };
}

// ---------------------------------------------------------------------------
// Tool servers
// ---------------------------------------------------------------------------

/** A server with `get_time` (text), `fail` (isError) and `chart` (image) */
function buildToolServer(): McpServer {
  const server = new McpServer({ name: "tools", version: "1.0.0" });

  server.tool("get_time", "Current time in a timezone", { timezone: z.string() }, async ({ timezone }) => ({
    content: [
      { type: "text", text: "12:00" },
      { type: "text", text: timezone },
    ],
  }));

  server.tool("fail", "Always fails", async () => ({
    content: [{ type: "text", text: "tool exploded" }],
    isError: true,
  }));

  server.tool("chart", "Renders a chart", async () => ({
    content: [{ type: "image", data: "aGVsbG8=", mimeType: "image/png" }],
  }));

  return server;
}

export const toolServers: ReadonlyMap<string, McpServerConfig> = new Map<
  string,
  McpServerConfig
>([
  ["tools", { transport: "stdio", command: "tools-server" }],
]);

export const inProcessTransport: TransportFactory = async () => {
  const server = buildToolServer();
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  return clientTransport;
};

// ---------------------------------------------------------------------------
// Planner
// ---------------------------------------------------------------------------

/** Planner that plays back fixed decisions and records what it was shown */
export function scriptedPlanner(decisions: readonly PlannerDecision[]): Planner & {
  readonly inputs: PlannerInput[];
} {
  const inputs: PlannerInput[] = [];
  let next = 0;
  return {
    inputs,
    async plan(input) {
      inputs.push(input);
      const decision = decisions[next] ?? decisions[decisions.length - 1];
      next += 1;
      if (!decision) {
        throw new Error("scripted planner has no decisions");
      }
      return decision;
    },
  };
}
