/**
 * Connector errors: delegated calls to remote agents
 *
 * Abstract base: ConnectorError
 * Concrete:
 *   - ConnectorTransportError  (CONNECTOR_TRANSPORT)
 *   - ConnectorDecodeError     (CONNECTOR_DECODE)
 *   - ConnectorRemoteError     (CONNECTOR_REMOTE)
 *
 * None of these are retried by the connector; retry policy belongs to callers.
 */

import { SwitchboardError } from "./base.js";
import { ERROR_CATALOG } from "./catalog.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class ConnectorError extends SwitchboardError {
  readonly agentName: string;
  readonly agentUrl: string;

  constructor(agentName: string, agentUrl: string, message: string, cause?: Error) {
    super(message, { agentName, agentUrl }, cause ? { cause } : undefined);
    this.agentName = agentName;
    this.agentUrl = agentUrl;
  }
}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

export interface ConnectorTransportDetails {
  /** True when the bounded timeout expired */
  readonly timedOut?: boolean | undefined;
  /** HTTP status when the peer answered with a non-2xx response */
  readonly status?: number | undefined;
  readonly cause?: Error | undefined;
}

export class ConnectorTransportError extends ConnectorError {
  readonly _tag = "ExternalError" as const;
  readonly code = "CONNECTOR_TRANSPORT" as const;
  readonly httpStatus = ERROR_CATALOG.CONNECTOR_TRANSPORT.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.CONNECTOR_TRANSPORT.jsonRpcCode;
  readonly domain = ERROR_CATALOG.CONNECTOR_TRANSPORT.domain;
  readonly isExpected = ERROR_CATALOG.CONNECTOR_TRANSPORT.isExpected;
  readonly timedOut: boolean;
  readonly status: number | undefined;

  constructor(
    agentName: string,
    agentUrl: string,
    message: string,
    details?: ConnectorTransportDetails,
  ) {
    super(
      agentName,
      agentUrl,
      `Transport failure calling agent "${agentName}" at ${agentUrl}: ${message}`,
      details?.cause,
    );
    this.timedOut = details?.timedOut === true;
    this.status = details?.status;
  }
}

export class ConnectorDecodeError extends ConnectorError {
  readonly _tag = "ExternalError" as const;
  readonly code = "CONNECTOR_DECODE" as const;
  readonly httpStatus = ERROR_CATALOG.CONNECTOR_DECODE.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.CONNECTOR_DECODE.jsonRpcCode;
  readonly domain = ERROR_CATALOG.CONNECTOR_DECODE.domain;
  readonly isExpected = ERROR_CATALOG.CONNECTOR_DECODE.isExpected;

  constructor(agentName: string, agentUrl: string, message: string, cause?: Error) {
    super(
      agentName,
      agentUrl,
      `Could not decode reply from agent "${agentName}" at ${agentUrl}: ${message}`,
      cause,
    );
  }
}

export class ConnectorRemoteError extends ConnectorError {
  readonly _tag = "ExternalError" as const;
  readonly code = "CONNECTOR_REMOTE" as const;
  readonly httpStatus = ERROR_CATALOG.CONNECTOR_REMOTE.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.CONNECTOR_REMOTE.jsonRpcCode;
  readonly domain = ERROR_CATALOG.CONNECTOR_REMOTE.domain;
  readonly isExpected = ERROR_CATALOG.CONNECTOR_REMOTE.isExpected;
  readonly remoteCode: number;
  readonly remoteMessage: string;

  constructor(agentName: string, agentUrl: string, remoteCode: number, remoteMessage: string) {
    super(
      agentName,
      agentUrl,
      `Agent "${agentName}" returned JSON-RPC error ${remoteCode}: ${remoteMessage}`,
    );
    this.remoteCode = remoteCode;
    this.remoteMessage = remoteMessage;
  }
}
