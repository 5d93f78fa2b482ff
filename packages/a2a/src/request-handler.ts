/**
 * TaskRequestHandler: bytes in, bytes out.
 *
 * Decodes a JSON-RPC request, routes it to the task manager and encodes the
 * outcome. Every failure becomes an error envelope that echoes the request id
 * when it could be read; nothing is thrown to the transport.
 */

import {
  isSwitchboardError,
  type JsonRpcId,
  ProtocolError,
  TaskFormatError,
  TaskNotFoundError,
} from "@switchboard/errors";
import { decodeRequest, encodeResponse } from "./protocol.js";
import type { TaskManager } from "./task-manager.js";
import type { AgentHandler, Task, TypedRequest } from "./types.js";

export interface TaskRequestHandlerOptions {
  readonly taskManager: TaskManager;
  readonly agent: AgentHandler;
}

export class TaskRequestHandler {
  private readonly taskManager: TaskManager;
  private readonly agent: AgentHandler;

  constructor(options: TaskRequestHandlerOptions) {
    this.taskManager = options.taskManager;
    this.agent = options.agent;
  }

  async handle(body: string | Uint8Array, signal?: AbortSignal): Promise<string> {
    const decoded = decodeRequest(body);
    if (!decoded.ok) {
      return encodeResponse({ error: decoded.error }, decoded.error.requestId);
    }

    const { request } = decoded;
    try {
      const task = await this.route(request, signal);
      return encodeResponse({ result: task }, request.id);
    } catch (error) {
      return encodeResponse({ error }, this.responseId(request.id, error));
    }
  }

  private async route(request: TypedRequest, signal?: AbortSignal): Promise<Task> {
    switch (request.kind) {
      case "send":
        return this.taskManager.onSendTask(request, this.agent, signal);
      case "get": {
        const task = this.taskManager.getTask(request.params.id);
        if (!task) {
          throw new TaskNotFoundError(request.params.id);
        }
        return task;
      }
    }
  }

  private responseId(requestId: JsonRpcId, error: unknown): JsonRpcId {
    if (error instanceof ProtocolError || error instanceof TaskFormatError) {
      return error.requestId ?? requestId;
    }
    if (!isSwitchboardError(error) || !error.isExpected) {
      console.error("[TaskRequestHandler] Request failed:", error);
    }
    return requestId;
  }
}
