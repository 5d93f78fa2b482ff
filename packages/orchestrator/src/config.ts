/**
 * Node configuration: validated once at startup.
 */

import { readFile } from "node:fs/promises";
import {
  DEFAULT_DISCOVERY_TIMEOUT_MS,
  DEFAULT_TASK_TIMEOUT_MS,
} from "@switchboard/a2a";
import { getErrorMessage, InvalidArgumentsError } from "@switchboard/errors";
import { z } from "zod";
import { DEFAULT_MAX_PLANNER_STEPS } from "./types.js";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 10_000;

export const NodeConfigSchema = z.object({
  name: z.string().min(1).default("OrchestratorAgent"),
  description: z
    .string()
    .default("Routes requests to remote agents and external tools"),
  host: z.string().min(1).default(DEFAULT_HOST),
  port: z.number().int().min(0).max(65_535).default(DEFAULT_PORT),
  /** Base URL advertised in the agent card, when it differs from host:port */
  publicUrl: z.string().url().optional(),
  /** JSON file listing agent base URLs */
  agentRegistryFile: z.string().min(1).optional(),
  /** Agent base URLs, in addition to those in agentRegistryFile */
  agents: z.array(z.string()).optional(),
  /** JSON file with an `mcpServers` map */
  mcpConfigFile: z.string().min(1).optional(),
  discoveryTimeoutMs: z.number().int().min(100).max(60_000).default(DEFAULT_DISCOVERY_TIMEOUT_MS),
  taskTimeoutMs: z.number().int().min(100).max(600_000).default(DEFAULT_TASK_TIMEOUT_MS),
  maxPlannerSteps: z.number().int().min(1).max(64).default(DEFAULT_MAX_PLANNER_STEPS),
});

export type NodeConfig = z.infer<typeof NodeConfigSchema>;
export type NodeConfigInput = z.input<typeof NodeConfigSchema>;

export function loadNodeConfig(raw: unknown): NodeConfig {
  const result = NodeConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      field: i.path.join("."),
      message: i.message,
    }));
    throw new InvalidArgumentsError(
      `Invalid node config: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
      issues,
    );
  }
  return result.data;
}

export async function loadNodeConfigFile(path: string): Promise<NodeConfig> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (error) {
    throw new InvalidArgumentsError(`Cannot load node config ${path}: ${getErrorMessage(error)}`);
  }
  return loadNodeConfig(parsed);
}
