/**
 * ToolRouter: executes the planner's tool calls against the orchestrator.
 */

import { InvalidArgumentsError } from "@switchboard/errors";
import { z } from "zod";
import type { Orchestrator } from "./orchestrator.js";
import { DELEGATE_TASK_TOOL, LIST_AGENTS_TOOL } from "./tools.js";
import type { ToolCall, ToolOutput } from "./types.js";

const DelegateTaskInputSchema = z.object({
  agent_name: z.string().min(1),
  message: z.string().min(1),
});

export class ToolRouter {
  private readonly orchestrator: Orchestrator;

  constructor(orchestrator: Orchestrator) {
    this.orchestrator = orchestrator;
  }

  async handle(call: ToolCall, signal?: AbortSignal): Promise<ToolOutput> {
    const { toolName, input, sessionId } = call;

    if (toolName === LIST_AGENTS_TOOL) {
      return this.orchestrator.listAgents();
    }

    if (toolName === DELEGATE_TASK_TOOL) {
      const parsed = DelegateTaskInputSchema.safeParse(input);
      if (!parsed.success) {
        throw new InvalidArgumentsError(
          `Invalid ${DELEGATE_TASK_TOOL} arguments`,
          parsed.error.issues.map((i) => ({ field: i.path.join("."), message: i.message })),
        );
      }
      return this.orchestrator.delegate(
        parsed.data.agent_name,
        parsed.data.message,
        sessionId,
        signal,
      );
    }

    return this.orchestrator.dispatch(toolName, input ?? {}, sessionId, signal);
  }
}
