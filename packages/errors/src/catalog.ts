/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the Switchboard packages. Each code maps to a
 * JSON-RPC error code (the wire format of the task protocol), an HTTP status
 * and one of the behavioral base types.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: protocol, task, capability, connector, tool, internal
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "ConflictError"
  | "ExternalError"
  | "InternalError";

/** JSON-RPC 2.0 reserved codes plus the server range used by the task protocol */
export const JSON_RPC_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  TASK_NOT_FOUND: -32001,
  UNKNOWN_CAPABILITY: -32004,
  DOWNSTREAM_FAILED: -32010,
} as const;

export const ERROR_CATALOG = {
  // ============================================================================
  // PROTOCOL ERRORS - malformed or unclassifiable wire input
  // ============================================================================
  PROTOCOL_PARSE_ERROR: {
    domain: "protocol",
    httpStatus: 400,
    jsonRpcCode: JSON_RPC_CODES.PARSE_ERROR,
    baseType: "ValidationError",
    isExpected: true,
    title: "Parse error",
    description: "The request body is not valid JSON",
  },
  PROTOCOL_INVALID_REQUEST: {
    domain: "protocol",
    httpStatus: 400,
    jsonRpcCode: JSON_RPC_CODES.INVALID_REQUEST,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid request",
    description: "The payload is not a JSON-RPC 2.0 request object",
  },
  PROTOCOL_UNSUPPORTED: {
    domain: "protocol",
    httpStatus: 400,
    jsonRpcCode: JSON_RPC_CODES.METHOD_NOT_FOUND,
    baseType: "ValidationError",
    isExpected: true,
    title: "Unsupported request",
    description: "The request could not be classified as a supported operation",
  },

  // ============================================================================
  // TASK ERRORS - task lifecycle
  // ============================================================================
  TASK_FORMAT_INVALID: {
    domain: "task",
    httpStatus: 400,
    jsonRpcCode: JSON_RPC_CODES.INVALID_PARAMS,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid task format",
    description: "The task request is missing required message fields",
  },
  TASK_NOT_FOUND: {
    domain: "task",
    httpStatus: 404,
    jsonRpcCode: JSON_RPC_CODES.TASK_NOT_FOUND,
    baseType: "NotFoundError",
    isExpected: true,
    title: "Task not found",
    description: "No task exists for the given task or session id",
  },
  TASK_INVALID_TRANSITION: {
    domain: "task",
    httpStatus: 409,
    jsonRpcCode: JSON_RPC_CODES.INTERNAL_ERROR,
    baseType: "ConflictError",
    isExpected: false,
    title: "Invalid task transition",
    description: "The requested status change is not an edge of the task state machine",
  },

  // ============================================================================
  // CAPABILITY ERRORS - routing
  // ============================================================================
  CAPABILITY_UNKNOWN: {
    domain: "capability",
    httpStatus: 404,
    jsonRpcCode: JSON_RPC_CODES.UNKNOWN_CAPABILITY,
    baseType: "NotFoundError",
    isExpected: true,
    title: "Unknown capability",
    description: "No agent or tool matches the requested capability name",
  },
  CAPABILITY_INVALID_ARGUMENTS: {
    domain: "capability",
    httpStatus: 400,
    jsonRpcCode: JSON_RPC_CODES.INVALID_PARAMS,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid arguments",
    description: "The payload does not fit the capability or configuration it was given to",
  },

  // ============================================================================
  // CONNECTOR ERRORS - calls to remote agents
  // ============================================================================
  CONNECTOR_TRANSPORT: {
    domain: "connector",
    httpStatus: 502,
    jsonRpcCode: JSON_RPC_CODES.DOWNSTREAM_FAILED,
    baseType: "ExternalError",
    isExpected: false,
    title: "Agent transport failure",
    description: "The remote agent could not be reached or did not answer in time",
  },
  CONNECTOR_DECODE: {
    domain: "connector",
    httpStatus: 502,
    jsonRpcCode: JSON_RPC_CODES.DOWNSTREAM_FAILED,
    baseType: "ExternalError",
    isExpected: false,
    title: "Agent reply not understood",
    description: "The remote agent answered with a malformed or non-task reply",
  },
  CONNECTOR_REMOTE: {
    domain: "connector",
    httpStatus: 502,
    jsonRpcCode: JSON_RPC_CODES.DOWNSTREAM_FAILED,
    baseType: "ExternalError",
    isExpected: true,
    title: "Agent reported an error",
    description: "The remote agent answered with a JSON-RPC error",
  },

  // ============================================================================
  // TOOL ERRORS - external tool servers
  // ============================================================================
  TOOL_SERVER_CONNECTION_FAILED: {
    domain: "tool",
    httpStatus: 502,
    jsonRpcCode: JSON_RPC_CODES.DOWNSTREAM_FAILED,
    baseType: "ExternalError",
    isExpected: false,
    title: "Tool server connection failed",
    description: "Failed to open a channel to the tool server",
  },
  TOOL_CALL_FAILED: {
    domain: "tool",
    httpStatus: 502,
    jsonRpcCode: JSON_RPC_CODES.DOWNSTREAM_FAILED,
    baseType: "ExternalError",
    isExpected: false,
    title: "Tool call failed",
    description: "The tool server failed to execute the tool",
  },

  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    jsonRpcCode: JSON_RPC_CODES.INTERNAL_ERROR,
    baseType: "InternalError",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * JSON-RPC error codes used in the catalog
 */
export type JsonRpcErrorCode = ErrorCatalogEntry["jsonRpcCode"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
