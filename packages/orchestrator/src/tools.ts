/**
 * Tool definitions for the planner.
 *
 *   - list_agents     → names of the remote agents
 *   - delegate_task   → send a message to one agent and return its reply
 *   - one definition per external tool, with the tool's own input schema
 */

import type { Orchestrator } from "./orchestrator.js";
import type { ToolDefinition } from "./types.js";

export const LIST_AGENTS_TOOL = "list_agents";
export const DELEGATE_TASK_TOOL = "delegate_task";

const BUILTIN_TOOLS: readonly ToolDefinition[] = [
  {
    name: LIST_AGENTS_TOOL,
    description:
      "List the names of the remote agents you can delegate to. " +
      "Call this when you are unsure which agent handles a request.",
    parameters: { type: "object", properties: {} },
  },
  {
    name: DELEGATE_TASK_TOOL,
    description:
      "Send a message to a remote agent and wait for its reply. " +
      "Follow-up messages in the same conversation continue the same session.",
    parameters: {
      type: "object",
      properties: {
        agent_name: {
          type: "string",
          description: "Name of the agent, as returned by list_agents",
        },
        message: {
          type: "string",
          description: "The message to send to the agent",
        },
      },
      required: ["agent_name", "message"],
    },
  },
];

export function buildOrchestratorTools(orchestrator: Orchestrator): readonly ToolDefinition[] {
  const tools = [...BUILTIN_TOOLS];
  for (const tool of orchestrator.listTools()) {
    if (tool.name === LIST_AGENTS_TOOL || tool.name === DELEGATE_TASK_TOOL) {
      console.warn(`[OrchestratorTools] Tool "${tool.name}" from "${tool.serverName}" hidden by a built-in tool`);
      continue;
    }
    tools.push({ name: tool.name, description: tool.description, parameters: tool.inputSchema });
  }
  return Object.freeze(tools);
}
