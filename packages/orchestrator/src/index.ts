/**
 * @switchboard/orchestrator
 *
 * Capability routing over remote agents and external tools, the planner
 * loop that drives it, and the node that serves it.
 */

// ============================================================================
// ROUTING
// ============================================================================

export { AgentCapability, finalReply, ToolCapability, toolResultValue } from "./capability.js";
export { CapabilityRegistry, normalizeCapabilityName } from "./capability-registry.js";
export { Orchestrator, type OrchestratorOptions } from "./orchestrator.js";
export {
  DEFAULT_MAX_SESSIONS,
  SessionScope,
  type SessionScopeOptions,
} from "./session-scope.js";

// ============================================================================
// PLANNER SURFACE
// ============================================================================

export { OrchestratorAgent, type OrchestratorAgentOptions } from "./orchestrator-agent.js";
export { ToolRouter } from "./tool-router.js";
export { buildOrchestratorTools, DELEGATE_TASK_TOOL, LIST_AGENTS_TOOL } from "./tools.js";

// ============================================================================
// NODE
// ============================================================================

export {
  DEFAULT_HOST,
  DEFAULT_PORT,
  loadNodeConfig,
  loadNodeConfigFile,
  type NodeConfig,
  type NodeConfigInput,
  NodeConfigSchema,
} from "./config.js";
export { OrchestratorNode, type OrchestratorNodeDeps } from "./node.js";

// ============================================================================
// TYPES
// ============================================================================

export type {
  CapabilityHandler,
  CapabilityKind,
  CapabilitySummary,
  DispatchResult,
  Planner,
  PlannerDecision,
  PlannerInput,
  PlannerObservation,
  ToolCall,
  ToolDefinition,
  ToolOutput,
} from "./types.js";
export { DEFAULT_MAX_PLANNER_STEPS } from "./types.js";
