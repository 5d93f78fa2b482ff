/**
 * Tool errors: external tool servers reached through the gateway
 *
 *   - ToolServerConnectionError  (TOOL_SERVER_CONNECTION_FAILED)
 *   - ToolCallFailedError        (TOOL_CALL_FAILED)
 */

import { SwitchboardError } from "./base.js";
import { ERROR_CATALOG } from "./catalog.js";

export class ToolServerConnectionError extends SwitchboardError {
  readonly _tag = "ExternalError" as const;
  readonly code = "TOOL_SERVER_CONNECTION_FAILED" as const;
  readonly httpStatus = ERROR_CATALOG.TOOL_SERVER_CONNECTION_FAILED.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.TOOL_SERVER_CONNECTION_FAILED.jsonRpcCode;
  readonly domain = ERROR_CATALOG.TOOL_SERVER_CONNECTION_FAILED.domain;
  readonly isExpected = ERROR_CATALOG.TOOL_SERVER_CONNECTION_FAILED.isExpected;
  readonly serverName: string;

  constructor(serverName: string, message: string, cause?: Error) {
    super(
      `Failed to connect to tool server "${serverName}": ${message}`,
      { serverName },
      cause ? { cause } : undefined,
    );
    this.serverName = serverName;
  }
}

export class ToolCallFailedError extends SwitchboardError {
  readonly _tag = "ExternalError" as const;
  readonly code = "TOOL_CALL_FAILED" as const;
  readonly httpStatus = ERROR_CATALOG.TOOL_CALL_FAILED.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.TOOL_CALL_FAILED.jsonRpcCode;
  readonly domain = ERROR_CATALOG.TOOL_CALL_FAILED.domain;
  readonly isExpected = ERROR_CATALOG.TOOL_CALL_FAILED.isExpected;
  readonly toolName: string;

  constructor(toolName: string, message: string, cause?: Error) {
    super(`Tool "${toolName}" failed: ${message}`, { toolName }, cause ? { cause } : undefined);
    this.toolName = toolName;
  }
}
