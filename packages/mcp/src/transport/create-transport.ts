/**
 * Default transport factory: spawns a stdio server or points a streamable
 * HTTP client at a URL.
 */

import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { McpServerConfig } from "./types.js";

/**
 * Creates an MCP SDK Transport instance from the given config.
 * Uses lazy imports to avoid pulling in unused transport modules.
 */
export async function createTransport(
  _serverName: string,
  config: McpServerConfig,
): Promise<Transport> {
  switch (config.transport) {
    case "stdio": {
      const { StdioClientTransport } = await import("@modelcontextprotocol/sdk/client/stdio.js");
      return new StdioClientTransport({
        command: config.command,
        ...(config.args ? { args: [...config.args] } : {}),
        ...(config.env ? { env: { ...config.env } } : {}),
        ...(config.cwd ? { cwd: config.cwd } : {}),
      });
    }
    case "http": {
      const { StreamableHTTPClientTransport } = await import(
        "@modelcontextprotocol/sdk/client/streamableHttp.js"
      );
      return new StreamableHTTPClientTransport(
        new URL(config.url),
        config.headers ? { requestInit: { headers: { ...config.headers } } } : undefined,
      );
    }
  }
}
