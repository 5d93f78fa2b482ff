import { SwitchboardError } from "./base.js";
import type { ErrorCode } from "./catalog.js";
import { InternalError } from "./internal.js";

/**
 * Check whether an error carries a specific catalog code
 */
export function hasCode<C extends ErrorCode>(
  error: unknown,
  code: C,
): error is SwitchboardError & { readonly code: C } {
  return error instanceof SwitchboardError && error.code === code;
}

/**
 * Wrap an unknown error into a SwitchboardError.
 * If the error is already a SwitchboardError, return it as-is.
 * Otherwise, wrap it in an InternalError.
 */
export function wrapError(error: unknown): SwitchboardError {
  if (error instanceof SwitchboardError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { originalName: error.name }, { cause: error });
  }

  return new InternalError(getErrorMessage(error));
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}
