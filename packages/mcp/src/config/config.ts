/**
 * Tool server configuration.
 *
 * The file format maps server names to either a stdio launch command or an
 * HTTP endpoint:
 *
 *   { "mcpServers": { "time": { "command": "uvx", "args": ["mcp-server-time"] } } }
 */

import { readFile } from "node:fs/promises";
import { getErrorMessage } from "@switchboard/errors";
import { z } from "zod";
import type { McpHttpConfig, McpServerConfig, McpStdioConfig } from "../transport/types.js";

const McpStdioConfigSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).optional(),
    env: z.record(z.string()).optional(),
    cwd: z.string().optional(),
  })
  .transform((entry): McpStdioConfig => ({ transport: "stdio", ...entry }));

const McpHttpConfigSchema = z
  .object({
    url: z.string().url(),
    headers: z.record(z.string()).optional(),
  })
  .transform((entry): McpHttpConfig => ({ transport: "http", ...entry }));

export const McpServerConfigSchema = z.union([McpStdioConfigSchema, McpHttpConfigSchema]);

const McpConfigFileSchema = z.object({
  mcpServers: z.record(z.unknown()).default({}),
});

function formatZodIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}

/**
 * Parse a raw config document into named server configs, in file order.
 * Entries that fail validation are skipped with a warning.
 */
export function parseMcpConfig(raw: unknown): ReadonlyMap<string, McpServerConfig> {
  const file = McpConfigFileSchema.safeParse(raw);
  if (!file.success) {
    console.warn(`[McpConfig] Invalid tool server config: ${formatZodIssues(file.error)}`);
    return new Map();
  }

  const servers = new Map<string, McpServerConfig>();
  for (const [name, entry] of Object.entries(file.data.mcpServers)) {
    const result = McpServerConfigSchema.safeParse(entry);
    if (!result.success) {
      console.warn(`[McpConfig] Skipping server "${name}": ${formatZodIssues(result.error)}`);
      continue;
    }
    servers.set(name, Object.freeze(result.data));
  }
  return servers;
}

/**
 * Read and parse a tool server config file. A missing or malformed file
 * yields no servers.
 */
export async function loadMcpConfigFile(path: string): Promise<ReadonlyMap<string, McpServerConfig>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    console.warn(`[McpConfig] Config file ${path} not readable: ${getErrorMessage(error)}`);
    return new Map();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    console.error(`[McpConfig] Config file ${path} is not valid JSON: ${getErrorMessage(error)}`);
    return new Map();
  }
  return parseMcpConfig(parsed);
}

export type { McpHttpConfig, McpServerConfig, McpStdioConfig };
