/**
 * Capability errors: name resolution and dispatch
 *
 *   - UnknownCapabilityError  (CAPABILITY_UNKNOWN)
 *   - InvalidArgumentsError   (CAPABILITY_INVALID_ARGUMENTS)
 */

import { SwitchboardError } from "./base.js";
import { ERROR_CATALOG } from "./catalog.js";
import type { ValidationIssue } from "./types.js";

export class UnknownCapabilityError extends SwitchboardError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "CAPABILITY_UNKNOWN" as const;
  readonly httpStatus = ERROR_CATALOG.CAPABILITY_UNKNOWN.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.CAPABILITY_UNKNOWN.jsonRpcCode;
  readonly domain = ERROR_CATALOG.CAPABILITY_UNKNOWN.domain;
  readonly isExpected = ERROR_CATALOG.CAPABILITY_UNKNOWN.isExpected;
  readonly capability: string;
  readonly available: readonly string[];

  constructor(capability: string, available: readonly string[] = []) {
    super(
      available.length > 0
        ? `Unknown capability "${capability}" (available: ${available.join(", ")})`
        : `Unknown capability "${capability}"`,
      { capability },
    );
    this.capability = capability;
    this.available = Object.freeze([...available]);
  }
}

export class InvalidArgumentsError extends SwitchboardError {
  readonly _tag = "ValidationError" as const;
  readonly code = "CAPABILITY_INVALID_ARGUMENTS" as const;
  readonly httpStatus = ERROR_CATALOG.CAPABILITY_INVALID_ARGUMENTS.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.CAPABILITY_INVALID_ARGUMENTS.jsonRpcCode;
  readonly domain = ERROR_CATALOG.CAPABILITY_INVALID_ARGUMENTS.domain;
  readonly isExpected = ERROR_CATALOG.CAPABILITY_INVALID_ARGUMENTS.isExpected;
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(message);
    this.issues = Object.freeze([...issues]);
  }
}
