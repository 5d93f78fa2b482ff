/**
 * AgentConnector: sends tasks to one remote agent over JSON-RPC/HTTP.
 *
 * Every call gets a fresh request id and task id, is bounded by a timeout,
 * runs in an OTel span and propagates the trace context. No retries.
 */

import {
  ConnectorDecodeError,
  ConnectorRemoteError,
  ConnectorTransportError,
} from "@switchboard/errors";
import { type FetchedText, fetchTextWithTimeout, isAbortError, isTimeoutError } from "./fetch.js";
import { decodeResponse, encodeRequest, parseTask, textMessage } from "./protocol.js";
import { injectTraceHeaders, withSpan } from "./tracing.js";
import type {
  AgentAuthConfig,
  CapabilityDescriptor,
  ConnectorOptions,
  Task,
  TaskSendParams,
} from "./types.js";
import { DEFAULT_TASK_TIMEOUT_MS, METHOD_GET_TASK, METHOD_SEND_TASK } from "./types.js";
import { ConnectorOptionsSchema, validateOptions } from "./validation.js";

export class AgentConnector {
  readonly descriptor: CapabilityDescriptor;
  private readonly timeoutMs: number;
  private readonly auth: AgentAuthConfig | undefined;

  constructor(descriptor: CapabilityDescriptor, options?: ConnectorOptions) {
    validateOptions(ConnectorOptionsSchema, options, "connector");
    this.descriptor = descriptor;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TASK_TIMEOUT_MS;
    this.auth = options?.auth;
  }

  get name(): string {
    return this.descriptor.name;
  }

  get url(): string {
    return this.descriptor.baseUrl;
  }

  /**
   * Send one user message within `sessionId` and return the agent's task.
   */
  async sendTask(message: string, sessionId: string, signal?: AbortSignal): Promise<Task> {
    const params: TaskSendParams = {
      id: crypto.randomUUID(),
      sessionId,
      message: textMessage("user", message),
    };
    return withSpan(
      "a2a.send_task",
      { "a2a.agent.name": this.name, "a2a.agent.url": this.url, "a2a.session_id": sessionId },
      () => this.call(METHOD_SEND_TASK, params, signal),
    );
  }

  /** Fetch the current state of a task the agent holds */
  async getTask(taskId: string, signal?: AbortSignal): Promise<Task> {
    return withSpan(
      "a2a.get_task",
      { "a2a.agent.name": this.name, "a2a.agent.url": this.url, "a2a.task_id": taskId },
      () => this.call(METHOD_GET_TASK, { id: taskId }, signal),
    );
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private async call(method: string, params: unknown, signal?: AbortSignal): Promise<Task> {
    const body = encodeRequest(method, params);

    let response: FetchedText;
    try {
      response = await fetchTextWithTimeout(
        this.url,
        { method: "POST", headers: this.buildHeaders(), body },
        this.timeoutMs,
        signal,
      );
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new ConnectorTransportError(
          this.name,
          this.url,
          `Request timed out after ${this.timeoutMs}ms`,
          { timedOut: true },
        );
      }
      if (isAbortError(error) && signal?.aborted) throw error;
      throw new ConnectorTransportError(
        this.name,
        this.url,
        error instanceof Error ? error.message : String(error),
        { cause: error instanceof Error ? error : undefined },
      );
    }

    if (!response.ok) {
      throw new ConnectorTransportError(
        this.name,
        this.url,
        response.body ? `HTTP ${response.status}: ${response.body}` : `HTTP ${response.status}`,
        { status: response.status },
      );
    }

    const decoded = decodeResponse(response.body);
    if (!decoded.ok) {
      throw new ConnectorDecodeError(this.name, this.url, decoded.reason);
    }
    const envelope = decoded.response;
    if ("error" in envelope) {
      throw new ConnectorRemoteError(
        this.name,
        this.url,
        envelope.error.code,
        envelope.error.message,
      );
    }

    const parsed = parseTask(envelope.result);
    if (!parsed.ok) {
      throw new ConnectorDecodeError(this.name, this.url, parsed.reason);
    }
    return parsed.task;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json",
    };
    if (this.auth) {
      switch (this.auth.type) {
        case "bearer":
          headers.Authorization = `Bearer ${this.auth.credentials}`;
          break;
        case "apiKey":
          headers[this.auth.headerName ?? "X-API-Key"] = this.auth.credentials;
          break;
      }
    }
    return injectTraceHeaders(headers);
  }
}
