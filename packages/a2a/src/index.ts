/**
 * @switchboard/a2a: agent-to-agent task protocol
 *
 * Discover remote agents, send them tasks, and serve tasks to them.
 *
 * Public API surface.
 */

// Connector
export { AgentConnector } from "./connector.js";
export { ConnectorCache, type ConnectorCacheConfig } from "./connector-cache.js";
// Descriptor
export { toAgentCard, toCapabilityDescriptor } from "./descriptor.js";
// Discovery
export {
  AgentRegistry,
  DiscoveryClient,
  loadAgentRegistryFile,
  loadSources,
} from "./discovery.js";
// Concurrency
export { KeyedMutex } from "./keyed-mutex.js";
// Codec
export {
  type DecodedRequest,
  type DecodedResponse,
  decodeRequest,
  decodeResponse,
  encodeRequest,
  encodeResponse,
  messageText,
  type ParsedTask,
  parseTask,
  parseTaskSendParams,
  type ResponseOutcome,
  textMessage,
  toTaskState,
} from "./protocol.js";
// Server
export { TaskRequestHandler, type TaskRequestHandlerOptions } from "./request-handler.js";
export { A2AServer, type A2AServerOptions } from "./server.js";
// Tasks
export {
  canTransition,
  DEFAULT_MAX_TASKS,
  TaskManager,
  type TaskManagerOptions,
  type UpsertOptions,
} from "./task-manager.js";
// Tracing
export { extractTraceContext, injectTraceHeaders, withSpan } from "./tracing.js";
// Types
export type {
  AgentAuthConfig,
  AgentCapabilities,
  AgentHandler,
  AgentIdentity,
  AgentInput,
  AgentReply,
  CapabilityDescriptor,
  ConnectorOptions,
  DiscoveryOptions,
  GetTaskRequest,
  JsonRpcResponse,
  Message,
  MessageRole,
  SendTaskRequest,
  Skill,
  Task,
  TaskQueryParams,
  TaskSendParams,
  TaskState,
  TaskStatus,
  TextPart,
  TypedRequest,
} from "./types.js";
export {
  AGENT_CARD_PATH,
  DEFAULT_DISCOVERY_TIMEOUT_MS,
  DEFAULT_TASK_TIMEOUT_MS,
  MAX_REQUEST_BYTES,
  METHOD_GET_TASK,
  METHOD_SEND_TASK,
} from "./types.js";
// Validation schemas
export {
  AgentAuthConfigSchema,
  ConnectorOptionsSchema,
  DiscoveryOptionsSchema,
  formatIssues,
  normalizeAgentUrl,
  type RawAgentCard,
  RawAgentCardSchema,
  validateMessage,
  validateOptions,
} from "./validation.js";
