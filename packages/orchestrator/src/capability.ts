/**
 * Capability handlers: one per remote agent, one per external tool.
 */

import {
  type AgentConnector,
  type CapabilityDescriptor,
  messageText,
  type Task,
  validateMessage,
} from "@switchboard/a2a";
import { InvalidArgumentsError } from "@switchboard/errors";
import type { McpTool, McpToolResult, ToolGateway } from "@switchboard/mcp";
import type { CapabilityHandler, DispatchResult } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Text of the last history entry, or "" for an empty history */
export function finalReply(task: Task): string {
  const last = task.history.at(-1);
  return last ? messageText(last) : "";
}

/** Joined text when every content item is text, otherwise the result itself */
export function toolResultValue(result: McpToolResult): DispatchResult {
  const texts: string[] = [];
  for (const item of result.content) {
    if (item.type !== "text" || item.text === undefined) {
      return result;
    }
    texts.push(item.text);
  }
  return texts.join("\n");
}

export class AgentCapability implements CapabilityHandler {
  readonly kind = "agent" as const;
  readonly name: string;
  readonly description: string;
  private readonly connector: AgentConnector;

  constructor(descriptor: CapabilityDescriptor, connector: AgentConnector) {
    this.name = descriptor.name;
    this.description = descriptor.description;
    this.connector = connector;
  }

  /** Accepts the message as a string or as `{ message }` */
  async invoke(payload: unknown, sessionId: string, signal?: AbortSignal): Promise<string> {
    const raw = isRecord(payload) ? payload.message : payload;
    const message = validateMessage(raw);
    if (message === "") {
      throw new InvalidArgumentsError(`Agent "${this.name}" needs a non-empty text message`, [
        { field: "message", message: "Expected a non-empty string" },
      ]);
    }
    const task = await this.connector.sendTask(message, sessionId, signal);
    return finalReply(task);
  }
}

export class ToolCapability implements CapabilityHandler {
  readonly kind = "tool" as const;
  readonly name: string;
  readonly description: string;
  private readonly gateway: ToolGateway;

  constructor(tool: McpTool, gateway: ToolGateway) {
    this.name = tool.name;
    this.description = tool.description;
    this.gateway = gateway;
  }

  /** Accepts the tool arguments as an object; the session is not used */
  async invoke(payload: unknown, _sessionId: string, signal?: AbortSignal): Promise<DispatchResult> {
    if (!isRecord(payload)) {
      throw new InvalidArgumentsError(`Tool "${this.name}" takes an object of arguments`, [
        { field: "arguments", message: "Expected an object" },
      ]);
    }
    const result = await this.gateway.invoke(this.name, payload, signal);
    return toolResultValue(result);
  }
}
