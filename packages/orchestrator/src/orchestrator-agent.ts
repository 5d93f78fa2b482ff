/**
 * OrchestratorAgent: serves tasks by letting a planner call tools.
 *
 * Each turn runs a bounded plan/act loop: the planner either calls a tool
 * (list_agents, delegate_task or an external tool) or replies. A failing
 * tool call becomes an observation the planner sees on its next step.
 */

import { type AgentHandler, type AgentInput, type AgentReply, messageText } from "@switchboard/a2a";
import { getErrorMessage } from "@switchboard/errors";
import type { Orchestrator } from "./orchestrator.js";
import { SessionScope } from "./session-scope.js";
import { ToolRouter } from "./tool-router.js";
import { buildOrchestratorTools } from "./tools.js";
import type { Planner, PlannerInput, PlannerObservation, ToolOutput } from "./types.js";
import { DEFAULT_MAX_PLANNER_STEPS } from "./types.js";

export interface OrchestratorAgentOptions {
  readonly orchestrator: Orchestrator;
  readonly planner: Planner;
  readonly maxSteps?: number | undefined;
  readonly sessions?: SessionScope | undefined;
}

function renderOutput(output: ToolOutput): string {
  return typeof output === "string" ? output : JSON.stringify(output);
}

export class OrchestratorAgent {
  private readonly orchestrator: Orchestrator;
  private readonly planner: Planner;
  private readonly router: ToolRouter;
  private readonly sessions: SessionScope;
  private readonly maxSteps: number;

  constructor(options: OrchestratorAgentOptions) {
    this.orchestrator = options.orchestrator;
    this.planner = options.planner;
    this.router = new ToolRouter(options.orchestrator);
    this.sessions = options.sessions ?? new SessionScope();
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_PLANNER_STEPS;

    if (!Number.isInteger(this.maxSteps) || this.maxSteps < 1) {
      throw new RangeError(`maxSteps must be an integer >= 1, got ${this.maxSteps}`);
    }
  }

  /** Bound handler to pass to a TaskManager or TaskRequestHandler */
  readonly handle: AgentHandler = (input, signal) => this.run(input, signal);

  async run(input: AgentInput, signal?: AbortSignal): Promise<AgentReply> {
    const sessionId = this.sessions.sessionFor(input.sessionId);
    const tools = buildOrchestratorTools(this.orchestrator);
    const history = input.history.map((m) => ({ role: m.role, text: messageText(m) }));
    const observations: PlannerObservation[] = [];

    for (let step = 1; step <= this.maxSteps; step++) {
      const plannerInput: PlannerInput = {
        text: input.text,
        history,
        tools,
        observations: [...observations],
      };
      const decision = await this.planner.plan(plannerInput, signal);

      if (decision.kind === "reply") {
        return { text: decision.text, state: decision.state ?? "completed" };
      }

      observations.push(await this.observe(decision.toolName, decision.input, sessionId, signal));
    }

    console.warn(
      `[OrchestratorAgent] Step limit ${this.maxSteps} reached for session ${input.sessionId}`,
    );
    return { text: observations.at(-1)?.output ?? "" };
  }

  private async observe(
    toolName: string,
    toolInput: unknown,
    sessionId: string,
    signal?: AbortSignal,
  ): Promise<PlannerObservation> {
    try {
      const output = await this.router.handle({ toolName, input: toolInput, sessionId }, signal);
      return { toolName, input: toolInput, output: renderOutput(output), isError: false };
    } catch (error) {
      if (signal?.aborted) throw error;
      console.warn(`[OrchestratorAgent] Tool "${toolName}" failed: ${getErrorMessage(error)}`);
      return {
        toolName,
        input: toolInput,
        output: `Error: ${getErrorMessage(error)}`,
        isError: true,
      };
    }
  }
}
