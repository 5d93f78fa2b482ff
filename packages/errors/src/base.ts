/**
 * SwitchboardError: abstract root of every error raised by the packages.
 *
 * Subclasses pin `_tag`, `code` and the catalog-derived fields; consumers match
 * on `error.code` for fine-grained handling or `instanceof` for categories.
 */

import type {
  BaseErrorType,
  ErrorCode,
  ErrorDomain,
  HttpStatusCode,
  JsonRpcErrorCode,
} from "./catalog.js";

export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly code: ErrorCode;
  readonly message: string;
  readonly httpStatus: HttpStatusCode;
  readonly jsonRpcCode: JsonRpcErrorCode;
  readonly domain: ErrorDomain;
  readonly timestamp: string;
  readonly metadata?: Readonly<Record<string, string>> | undefined;
}

export abstract class SwitchboardError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly jsonRpcCode: JsonRpcErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Readonly<Record<string, string>> | undefined;
  readonly timestamp: Date;

  constructor(message: string, metadata?: Record<string, string>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata ? Object.freeze({ ...metadata }) : undefined;
    this.timestamp = new Date();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      jsonRpcCode: this.jsonRpcCode,
      domain: this.domain,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
    };
  }
}

/**
 * Check if a value is a SwitchboardError
 */
export function isSwitchboardError(error: unknown): error is SwitchboardError {
  return error instanceof SwitchboardError;
}
