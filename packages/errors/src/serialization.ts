/**
 * JSON-RPC error serialization
 *
 * Converts domain errors into the `error` member of a JSON-RPC response.
 * Only the message and the catalog code travel on the wire; stacks, causes
 * and error objects never do.
 */

import { SwitchboardError } from "./base.js";
import { ERROR_CATALOG } from "./catalog.js";
import type { JsonRpcErrorObject } from "./types.js";
import { getErrorMessage } from "./utils.js";

/**
 * Map any thrown value to a JSON-RPC error object.
 *
 * - SwitchboardError: its catalog JSON-RPC code, its message, `data` = catalog code
 * - anything else: -32603 "Internal error", `data` = diagnostic text
 */
export function toJsonRpcError(error: unknown): JsonRpcErrorObject {
  if (error instanceof SwitchboardError) {
    return {
      code: error.jsonRpcCode,
      message: error.message,
      data: error.code,
    };
  }

  return {
    code: ERROR_CATALOG.INTERNAL_ERROR.jsonRpcCode,
    message: ERROR_CATALOG.INTERNAL_ERROR.title,
    data: getErrorMessage(error),
  };
}
