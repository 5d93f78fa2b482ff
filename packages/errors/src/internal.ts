import { SwitchboardError } from "./base.js";
import { ERROR_CATALOG } from "./catalog.js";

/**
 * Fallback for failures that have no more specific code.
 */
export class InternalError extends SwitchboardError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;
  readonly httpStatus = ERROR_CATALOG.INTERNAL_ERROR.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.INTERNAL_ERROR.jsonRpcCode;
  readonly domain = ERROR_CATALOG.INTERNAL_ERROR.domain;
  readonly isExpected = ERROR_CATALOG.INTERNAL_ERROR.isExpected;
}
