/**
 * Shared type infrastructure for the error system.
 */

/**
 * JSON-RPC 2.0 correlation id. `null` is used when the id of the failing
 * request could not be read.
 */
export type JsonRpcId = string | number | null;

/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  readonly field: string;
  readonly message: string;
}

/**
 * JSON-RPC 2.0 error object as it travels on the wire.
 */
export interface JsonRpcErrorObject {
  readonly code: number;
  readonly message: string;
  readonly data?: unknown;
}
