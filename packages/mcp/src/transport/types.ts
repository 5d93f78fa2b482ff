/**
 * Tool server connection settings.
 * Discriminated union on the `transport` field.
 */

import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";

export interface McpStdioConfig {
  readonly transport: "stdio";
  readonly command: string;
  readonly args?: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
  readonly cwd?: string;
}

export interface McpHttpConfig {
  readonly transport: "http";
  readonly url: string;
  readonly headers?: Readonly<Record<string, string>>;
}

export type McpServerConfig = McpStdioConfig | McpHttpConfig;

/**
 * Opens the client side of a channel to one configured server.
 * Swapped out in tests for an in-process server.
 */
export type TransportFactory = (serverName: string, config: McpServerConfig) => Promise<Transport>;
