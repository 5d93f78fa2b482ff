/**
 * McpBridge: one client channel to one tool server.
 *
 * Wraps the MCP SDK Client with typed, frozen return values. The gateway
 * opens a bridge per operation and disconnects it when done.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  type CallToolResult,
  CallToolResultSchema,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { getErrorMessage, ToolCallFailedError, ToolServerConnectionError } from "@switchboard/errors";
import { createTransport } from "../transport/create-transport.js";
import type { McpServerConfig, TransportFactory } from "../transport/types.js";
import type { McpContent, McpServerInfo, McpTool, McpToolResult } from "./types.js";

const CLIENT_INFO = { name: "switchboard-gateway", version: "0.1.0" } as const;

type RawContent = CallToolResult["content"][number];

function asError(err: unknown): Error | undefined {
  return err instanceof Error ? err : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function freezeContent(raw: RawContent): McpContent {
  const content: { -readonly [K in keyof McpContent]: McpContent[K] } = { type: raw.type };
  if ("text" in raw && typeof raw.text === "string") content.text = raw.text;
  if ("data" in raw && typeof raw.data === "string") content.data = raw.data;
  if ("mimeType" in raw && typeof raw.mimeType === "string") content.mimeType = raw.mimeType;
  if ("uri" in raw && typeof raw.uri === "string") content.uri = raw.uri;
  if ("resource" in raw && isRecord(raw.resource) && typeof raw.resource.uri === "string") {
    content.uri = raw.resource.uri;
  }
  return Object.freeze(content);
}

function freezeTool(serverName: string, raw: Tool): McpTool {
  return Object.freeze({
    name: raw.name,
    description: raw.description ?? "",
    inputSchema: Object.freeze({ ...raw.inputSchema }),
    serverName,
  });
}

export class McpBridge {
  readonly serverName: string;
  private readonly config: McpServerConfig;
  private readonly createTransport: TransportFactory;
  private client: Client | undefined;

  constructor(
    serverName: string,
    config: McpServerConfig,
    transportFactory: TransportFactory = createTransport,
  ) {
    this.serverName = serverName;
    this.config = config;
    this.createTransport = transportFactory;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async connect(): Promise<McpServerInfo> {
    if (this.client) {
      return this.getServerInfo(this.client);
    }

    let transport: Transport;
    try {
      transport = await this.createTransport(this.serverName, this.config);
    } catch (err) {
      throw new ToolServerConnectionError(this.serverName, getErrorMessage(err), asError(err));
    }

    const client = new Client(CLIENT_INFO);
    try {
      await client.connect(transport);
    } catch (err) {
      await transport.close().catch((closeErr: unknown) => {
        console.warn(`[McpBridge] Closing "${this.serverName}" failed: ${getErrorMessage(closeErr)}`);
      });
      throw new ToolServerConnectionError(this.serverName, getErrorMessage(err), asError(err));
    }

    this.client = client;
    return this.getServerInfo(client);
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }
    this.client = undefined;

    try {
      await client.close();
    } catch (err) {
      console.warn(`[McpBridge] Closing "${this.serverName}" failed: ${getErrorMessage(err)}`);
    }
  }

  // ---------------------------------------------------------------------------
  // Tools
  // ---------------------------------------------------------------------------

  async listTools(): Promise<readonly McpTool[]> {
    const client = this.requireConnected();
    try {
      const result = await client.listTools();
      return Object.freeze(result.tools.map((tool) => freezeTool(this.serverName, tool)));
    } catch (err) {
      throw new ToolServerConnectionError(
        this.serverName,
        `Failed to list tools: ${getErrorMessage(err)}`,
        asError(err),
      );
    }
  }

  /**
   * Call a tool. A result flagged `isError` is returned as is; only a
   * protocol or transport failure throws.
   */
  async callTool(
    name: string,
    args: Readonly<Record<string, unknown>> = {},
    signal?: AbortSignal,
  ): Promise<McpToolResult> {
    const client = this.requireConnected();

    let raw: unknown;
    try {
      raw = await client.callTool(
        { name, arguments: { ...args } },
        undefined,
        signal ? { signal } : undefined,
      );
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new ToolCallFailedError(name, getErrorMessage(err), asError(err));
    }

    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ToolCallFailedError(name, "Server returned a malformed tool result");
    }

    const structured: unknown = parsed.data.structuredContent;
    return Object.freeze({
      content: Object.freeze(parsed.data.content.map(freezeContent)),
      isError: parsed.data.isError === true,
      ...(isRecord(structured) ? { structuredContent: Object.freeze({ ...structured }) } : {}),
    });
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private requireConnected(): Client {
    if (!this.client) {
      throw new ToolServerConnectionError(this.serverName, "Not connected");
    }
    return this.client;
  }

  private getServerInfo(client: Client): McpServerInfo {
    const info = client.getServerVersion();
    return Object.freeze({
      name: info?.name ?? "unknown",
      version: info?.version ?? "unknown",
    });
  }
}
