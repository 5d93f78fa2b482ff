/**
 * Shared types for capability routing and the planner loop.
 */

import type { McpToolResult } from "@switchboard/mcp";

export type CapabilityKind = "agent" | "tool";

/** Text, or the structured result of a tool whose content is not all text */
export type DispatchResult = string | McpToolResult;

/**
 * A callable capability: a remote agent or an external tool, invoked by
 * name through the orchestrator.
 */
export interface CapabilityHandler {
  readonly name: string;
  readonly kind: CapabilityKind;
  readonly description: string;
  invoke(payload: unknown, sessionId: string, signal?: AbortSignal): Promise<DispatchResult>;
}

export interface CapabilitySummary {
  readonly name: string;
  readonly kind: CapabilityKind;
  readonly description: string;
}

/** Function definition offered to a planner */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  /** JSON Schema of the call arguments */
  readonly parameters: Readonly<Record<string, unknown>>;
}

export interface ToolCall {
  readonly toolName: string;
  readonly input: unknown;
  readonly sessionId: string;
}

/** list_agents answers with names; everything else with a dispatch result */
export type ToolOutput = DispatchResult | readonly string[];

// ============================================================================
// PLANNER
// ============================================================================

export interface PlannerObservation {
  readonly toolName: string;
  readonly input: unknown;
  /** Tool output rendered as text, or the error message */
  readonly output: string;
  readonly isError: boolean;
}

export interface PlannerInput {
  readonly text: string;
  readonly history: readonly { readonly role: "user" | "agent"; readonly text: string }[];
  readonly tools: readonly ToolDefinition[];
  readonly observations: readonly PlannerObservation[];
}

export type PlannerDecision =
  | { readonly kind: "call"; readonly toolName: string; readonly input: unknown }
  | { readonly kind: "reply"; readonly text: string; readonly state?: "completed" | "input_required" };

/**
 * The language model behind the orchestrator agent. Given the request, the
 * available tools and what earlier calls returned, it picks the next step.
 */
export interface Planner {
  plan(input: PlannerInput, signal?: AbortSignal): Promise<PlannerDecision>;
}

export const DEFAULT_MAX_PLANNER_STEPS = 8;
