/**
 * Core types for the agent-to-agent task protocol.
 *
 * Wire shapes are validated in validation.ts; everything here is the
 * normalized, read-only form handed between components.
 */

import type { JsonRpcErrorObject, JsonRpcId } from "@switchboard/errors";

// ---------------------------------------------------------------------------
// Capability Descriptor (Agent Card)
// ---------------------------------------------------------------------------

/**
 * Identity, content types and skills of one remote agent.
 * Immutable once fetched; refreshed only by re-querying the source URL.
 */
export interface CapabilityDescriptor {
  readonly name: string;
  readonly description: string;
  /** Base URL the agent accepts task-send requests on */
  readonly baseUrl: string;
  /** URL the descriptor was discovered from */
  readonly sourceUrl: string;
  readonly version: string;
  readonly supportedInputModes: readonly string[];
  readonly supportedOutputModes: readonly string[];
  readonly capabilities: AgentCapabilities;
  readonly skills: readonly Skill[];
}

/** What an agent serving tasks says about itself; the server fills in its URL */
export type AgentIdentity = Omit<CapabilityDescriptor, "baseUrl" | "sourceUrl">;

export interface AgentCapabilities {
  readonly streaming: boolean;
  readonly pushNotifications: boolean;
}

/** Descriptive skill metadata; `id` is unique within one descriptor */
export interface Skill {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly tags: readonly string[];
  readonly examples: readonly string[];
}

// ---------------------------------------------------------------------------
// Messages and tasks
// ---------------------------------------------------------------------------

export type MessageRole = "user" | "agent";

export interface TextPart {
  readonly type: "text";
  readonly text: string;
}

export interface Message {
  readonly role: MessageRole;
  readonly parts: readonly TextPart[];
}

export type TaskState = "pending" | "working" | "input_required" | "completed" | "error";

export interface TaskStatus {
  readonly state: TaskState;
  readonly message?: Message | undefined;
  /** ISO-8601 time of the last transition */
  readonly timestamp: string;
}

export interface Task {
  readonly id: string;
  readonly sessionId: string;
  readonly status: TaskStatus;
  readonly history: readonly Message[];
}

// ---------------------------------------------------------------------------
// JSON-RPC
// ---------------------------------------------------------------------------

export interface TaskSendParams {
  readonly id: string;
  readonly sessionId: string;
  readonly message: Message;
  readonly metadata?: Readonly<Record<string, unknown>> | undefined;
}

export interface TaskQueryParams {
  readonly id: string;
}

/** Send params are validated by the task manager, which owns TaskFormatError */
export interface SendTaskRequest {
  readonly kind: "send";
  readonly id: JsonRpcId;
  readonly method: string | undefined;
  readonly params: Readonly<Record<string, unknown>>;
}

export interface GetTaskRequest {
  readonly kind: "get";
  readonly id: JsonRpcId;
  readonly method: string | undefined;
  readonly params: TaskQueryParams;
}

/** A request the codec could classify */
export type TypedRequest = SendTaskRequest | GetTaskRequest;

export type JsonRpcResponse =
  | { readonly jsonrpc: "2.0"; readonly id: JsonRpcId; readonly result: unknown }
  | { readonly jsonrpc: "2.0"; readonly id: JsonRpcId; readonly error: JsonRpcErrorObject };

// ---------------------------------------------------------------------------
// Agent runtime seam
// ---------------------------------------------------------------------------

export interface AgentInput {
  readonly text: string;
  readonly sessionId: string;
  readonly taskId: string;
  readonly history: readonly Message[];
}

export interface AgentReply {
  readonly text: string;
  /** Defaults to "completed" */
  readonly state?: "completed" | "input_required" | undefined;
}

/**
 * Produces the content of an agent reply. The language-model runtime behind it
 * is not part of this package.
 */
export type AgentHandler = (input: AgentInput, signal: AbortSignal) => Promise<AgentReply>;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Authentication configuration for a remote agent.
 */
export interface AgentAuthConfig {
  readonly type: "apiKey" | "bearer";
  readonly credentials: string;
  readonly headerName?: string | undefined;
}

export interface ConnectorOptions {
  /** Per-call timeout in milliseconds (default: 30_000) */
  readonly timeoutMs?: number | undefined;
  readonly auth?: AgentAuthConfig | undefined;
}

export interface DiscoveryOptions {
  /** Per-source timeout in milliseconds (default: 5_000) */
  readonly timeoutMs?: number | undefined;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Well-known descriptor path */
export const AGENT_CARD_PATH = "/.well-known/agent.json";

/** Default per-source discovery timeout */
export const DEFAULT_DISCOVERY_TIMEOUT_MS = 5_000;

/** Default timeout for one delegated task call */
export const DEFAULT_TASK_TIMEOUT_MS = 30_000;

/** Largest request body the server accepts */
export const MAX_REQUEST_BYTES = 1_048_576;

export const METHOD_SEND_TASK = "tasks/send";
export const METHOD_GET_TASK = "tasks/get";

