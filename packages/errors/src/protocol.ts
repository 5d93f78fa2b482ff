/**
 * Protocol errors: malformed or unclassifiable JSON-RPC input
 *
 * Abstract base: ProtocolError
 * Concrete:
 *   - ProtocolParseError           (PROTOCOL_PARSE_ERROR)
 *   - ProtocolInvalidRequestError  (PROTOCOL_INVALID_REQUEST)
 *   - ProtocolUnsupportedError     (PROTOCOL_UNSUPPORTED)
 *
 * Each carries the id of the offending request when it could be read, so the
 * boundary can echo it in the error envelope.
 */

import { SwitchboardError } from "./base.js";
import { ERROR_CATALOG } from "./catalog.js";
import type { JsonRpcId } from "./types.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class ProtocolError extends SwitchboardError {
  readonly requestId: JsonRpcId;

  constructor(message: string, requestId: JsonRpcId = null) {
    super(message);
    this.requestId = requestId;
  }
}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

export class ProtocolParseError extends ProtocolError {
  readonly _tag = "ValidationError" as const;
  readonly code = "PROTOCOL_PARSE_ERROR" as const;
  readonly httpStatus = ERROR_CATALOG.PROTOCOL_PARSE_ERROR.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.PROTOCOL_PARSE_ERROR.jsonRpcCode;
  readonly domain = ERROR_CATALOG.PROTOCOL_PARSE_ERROR.domain;
  readonly isExpected = ERROR_CATALOG.PROTOCOL_PARSE_ERROR.isExpected;

  constructor(detail: string) {
    super(`Parse error: ${detail}`);
  }
}

export class ProtocolInvalidRequestError extends ProtocolError {
  readonly _tag = "ValidationError" as const;
  readonly code = "PROTOCOL_INVALID_REQUEST" as const;
  readonly httpStatus = ERROR_CATALOG.PROTOCOL_INVALID_REQUEST.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.PROTOCOL_INVALID_REQUEST.jsonRpcCode;
  readonly domain = ERROR_CATALOG.PROTOCOL_INVALID_REQUEST.domain;
  readonly isExpected = ERROR_CATALOG.PROTOCOL_INVALID_REQUEST.isExpected;

  constructor(detail: string, requestId?: JsonRpcId) {
    super(`Invalid request: ${detail}`, requestId);
  }
}

export class ProtocolUnsupportedError extends ProtocolError {
  readonly _tag = "ValidationError" as const;
  readonly code = "PROTOCOL_UNSUPPORTED" as const;
  readonly httpStatus = ERROR_CATALOG.PROTOCOL_UNSUPPORTED.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.PROTOCOL_UNSUPPORTED.jsonRpcCode;
  readonly domain = ERROR_CATALOG.PROTOCOL_UNSUPPORTED.domain;
  readonly isExpected = ERROR_CATALOG.PROTOCOL_UNSUPPORTED.isExpected;
  readonly method: string | undefined;

  constructor(method: string | undefined, requestId?: JsonRpcId) {
    super(
      method
        ? `Unsupported request type for method "${method}"`
        : "Unsupported request: no method and no task payload",
      requestId,
    );
    this.method = method;
  }
}
