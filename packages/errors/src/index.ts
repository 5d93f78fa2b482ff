/**
 * @switchboard/errors
 *
 * Shared error taxonomy for the agent task-orchestration packages.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition and a `.jsonRpcCode` used on the wire. Use
 * `error.code === "XXX"` for fine-grained matching, or `instanceof` for
 * category matching (e.g. `instanceof ConnectorError`).
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isSwitchboardError, SwitchboardError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
  JSON_RPC_CODES,
  type JsonRpcErrorCode,
} from "./catalog.js";

export type { JsonRpcErrorObject, JsonRpcId, ValidationIssue } from "./types.js";

export { getErrorMessage, hasCode, wrapError } from "./utils.js";

export { toJsonRpcError } from "./serialization.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export { InvalidArgumentsError, UnknownCapabilityError } from "./capability.js";
export {
  ConnectorDecodeError,
  ConnectorError,
  ConnectorRemoteError,
  type ConnectorTransportDetails,
  ConnectorTransportError,
} from "./connector.js";
export { InternalError } from "./internal.js";
export {
  ProtocolError,
  ProtocolInvalidRequestError,
  ProtocolParseError,
  ProtocolUnsupportedError,
} from "./protocol.js";
export { TaskFormatError, TaskNotFoundError, TaskTransitionError } from "./task.js";
export { ToolCallFailedError, ToolServerConnectionError } from "./tools.js";
