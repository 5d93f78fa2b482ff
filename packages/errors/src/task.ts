/**
 * Task errors: lifecycle of tasks owned by the task manager
 *
 *   - TaskFormatError      (TASK_FORMAT_INVALID)
 *   - TaskNotFoundError    (TASK_NOT_FOUND)
 *   - TaskTransitionError  (TASK_INVALID_TRANSITION)
 */

import { SwitchboardError } from "./base.js";
import { ERROR_CATALOG } from "./catalog.js";
import type { JsonRpcId } from "./types.js";

export class TaskFormatError extends SwitchboardError {
  readonly _tag = "ValidationError" as const;
  readonly code = "TASK_FORMAT_INVALID" as const;
  readonly httpStatus = ERROR_CATALOG.TASK_FORMAT_INVALID.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.TASK_FORMAT_INVALID.jsonRpcCode;
  readonly domain = ERROR_CATALOG.TASK_FORMAT_INVALID.domain;
  readonly isExpected = ERROR_CATALOG.TASK_FORMAT_INVALID.isExpected;
  readonly requestId: JsonRpcId;

  constructor(detail: string, requestId: JsonRpcId = null) {
    super(`Invalid task format: ${detail}`);
    this.requestId = requestId;
  }
}

export class TaskNotFoundError extends SwitchboardError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "TASK_NOT_FOUND" as const;
  readonly httpStatus = ERROR_CATALOG.TASK_NOT_FOUND.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.TASK_NOT_FOUND.jsonRpcCode;
  readonly domain = ERROR_CATALOG.TASK_NOT_FOUND.domain;
  readonly isExpected = ERROR_CATALOG.TASK_NOT_FOUND.isExpected;
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task not found: ${taskId}`, { taskId });
    this.taskId = taskId;
  }
}

export class TaskTransitionError extends SwitchboardError {
  readonly _tag = "ConflictError" as const;
  readonly code = "TASK_INVALID_TRANSITION" as const;
  readonly httpStatus = ERROR_CATALOG.TASK_INVALID_TRANSITION.httpStatus;
  readonly jsonRpcCode = ERROR_CATALOG.TASK_INVALID_TRANSITION.jsonRpcCode;
  readonly domain = ERROR_CATALOG.TASK_INVALID_TRANSITION.domain;
  readonly isExpected = ERROR_CATALOG.TASK_INVALID_TRANSITION.isExpected;
  readonly sessionId: string;
  readonly from: string;
  readonly to: string;

  constructor(sessionId: string, from: string, to: string) {
    super(`Task for session "${sessionId}" cannot move from ${from} to ${to}`, {
      sessionId,
      from,
      to,
    });
    this.sessionId = sessionId;
    this.from = from;
    this.to = to;
  }
}
