/**
 * TaskManager: server-side task lifecycle.
 *
 * One task per session. Every mutation runs under that session's lock and
 * either applies completely or not at all; callers only ever see frozen
 * snapshots. The agent handler runs outside that lock so a slow reply never
 * blocks reads or other sessions. Sends for one session queue behind each
 * other as whole turns: input, agent run, reply.
 *
 * At most `maxTasks` tasks are kept. Past that, the least recently updated
 * task that is not `working` is dropped.
 */

import { getErrorMessage, TaskNotFoundError, TaskTransitionError } from "@switchboard/errors";
import { KeyedMutex } from "./keyed-mutex.js";
import { messageText, parseTaskSendParams, textMessage } from "./protocol.js";
import type {
  AgentHandler,
  AgentReply,
  Message,
  SendTaskRequest,
  Task,
  TaskState,
  TextPart,
} from "./types.js";

const TRANSITIONS: Readonly<Record<TaskState, ReadonlySet<TaskState>>> = {
  pending: new Set<TaskState>(["working", "completed", "input_required", "error"]),
  working: new Set<TaskState>(["input_required", "completed", "error"]),
  input_required: new Set<TaskState>(["working", "error"]),
  // A follow-up turn re-opens a finished session
  completed: new Set<TaskState>(["working"]),
  error: new Set<TaskState>(["working"]),
};

/** Whether `from -> to` is an edge of the task state machine */
export function canTransition(from: TaskState, to: TaskState): boolean {
  return TRANSITIONS[from].has(to);
}

interface TaskRecord {
  readonly id: string;
  readonly sessionId: string;
  state: TaskState;
  statusMessage: Message | undefined;
  timestamp: string;
  readonly history: Message[];
}

export interface UpsertOptions {
  /** Id for a newly created task; ignored when the session already has one */
  readonly taskId?: string | undefined;
}

export interface TaskManagerOptions {
  readonly now?: (() => Date) | undefined;
  readonly maxTasks?: number | undefined;
}

export const DEFAULT_MAX_TASKS = 10_000;

function freezeMessage(message: Message): Message {
  const parts = message.parts.map((p): TextPart => Object.freeze({ type: "text", text: p.text }));
  return Object.freeze({ role: message.role, parts: Object.freeze(parts) });
}

function snapshot(record: TaskRecord): Task {
  return Object.freeze({
    id: record.id,
    sessionId: record.sessionId,
    status: Object.freeze({
      state: record.state,
      message: record.statusMessage,
      timestamp: record.timestamp,
    }),
    history: Object.freeze([...record.history]),
  });
}

export class TaskManager {
  private readonly tasks: Map<string, TaskRecord> = new Map();
  private readonly sessionByTaskId: Map<string, string> = new Map();
  private readonly locks = new KeyedMutex();
  private readonly turns = new KeyedMutex();
  private readonly now: () => Date;
  private readonly maxTasks: number;

  constructor(options?: TaskManagerOptions) {
    this.now = options?.now ?? (() => new Date());
    this.maxTasks = options?.maxTasks ?? DEFAULT_MAX_TASKS;
    if (!Number.isInteger(this.maxTasks) || this.maxTasks < 1) {
      throw new RangeError(`maxTasks must be an integer >= 1, got ${this.maxTasks}`);
    }
  }

  /**
   * Create the session's task in `pending`, or return the existing one.
   * Concurrent calls for one session yield the same task.
   */
  async upsertTask(sessionId: string, options?: UpsertOptions): Promise<Task> {
    return this.locks.withLock(sessionId, () => snapshot(this.ensure(sessionId, options?.taskId)));
  }

  /**
   * Append a user turn and move the task to `working`.
   */
  async recordInput(sessionId: string, message: Message): Promise<Task> {
    return this.locks.withLock(sessionId, () => {
      const record = this.require(sessionId);
      this.apply(record, freezeMessage(message), "working");
      return snapshot(record);
    });
  }

  /**
   * Append an agent reply and transition in one step.
   * An illegal transition leaves the task untouched.
   */
  async appendReply(sessionId: string, message: Message, newState: TaskState): Promise<Task> {
    return this.locks.withLock(sessionId, () => {
      const record = this.require(sessionId);
      this.apply(record, freezeMessage(message), newState);
      return snapshot(record);
    });
  }

  /** Look a task up by task id or by session id */
  getTask(idOrSessionId: string): Task | undefined {
    const sessionId = this.sessionByTaskId.get(idOrSessionId) ?? idOrSessionId;
    const record = this.tasks.get(sessionId);
    return record ? snapshot(record) : undefined;
  }

  listTasks(): readonly Task[] {
    return Object.freeze([...this.tasks.values()].map(snapshot));
  }

  /**
   * Handle a task send end to end: validate, record the user turn, run the
   * agent, record its reply.
   *
   * A send that arrives while the session's previous turn is still running
   * waits for that turn to finish. A malformed request fails with
   * TaskFormatError before anything is stored. When the handler fails, the error is recorded on the task as an
   * agent message in state `error` and then rethrown.
   */
  async onSendTask(
    request: SendTaskRequest,
    handler: AgentHandler,
    signal?: AbortSignal,
  ): Promise<Task> {
    const params = parseTaskSendParams(request.params, request.id);
    const { sessionId } = params;

    return this.turns.withLock(sessionId, async () => {
      const started = await this.locks.withLock(sessionId, () => {
        const record = this.ensure(sessionId, params.id);
        this.apply(record, params.message, "working");
        return snapshot(record);
      });

      let reply: AgentReply;
      try {
        reply = await handler(
          {
            text: messageText(params.message),
            sessionId,
            taskId: started.id,
            history: started.history,
          },
          signal ?? new AbortController().signal,
        );
      } catch (error) {
        const detail = getErrorMessage(error);
        console.warn(`[TaskManager] Agent failed for session ${sessionId}: ${detail}`);
        await this.appendReply(sessionId, textMessage("agent", `Error: ${detail}`), "error");
        throw error;
      }

      return this.appendReply(
        sessionId,
        textMessage("agent", reply.text),
        reply.state ?? "completed",
      );
    });
  }

  // -------------------------------------------------------------------------
  // Private helpers (callers hold the session lock)
  // -------------------------------------------------------------------------

  private ensure(sessionId: string, taskId: string | undefined): TaskRecord {
    const existing = this.tasks.get(sessionId);
    if (existing) return existing;

    const record: TaskRecord = {
      id: taskId ?? crypto.randomUUID(),
      sessionId,
      state: "pending",
      statusMessage: undefined,
      timestamp: this.now().toISOString(),
      history: [],
    };
    this.tasks.set(sessionId, record);
    this.sessionByTaskId.set(record.id, sessionId);
    this.evict(record);
    return record;
  }

  private evict(keep: TaskRecord): void {
    for (const record of this.tasks.values()) {
      if (this.tasks.size <= this.maxTasks) return;
      if (record === keep || record.state === "working") continue;
      this.tasks.delete(record.sessionId);
      this.sessionByTaskId.delete(record.id);
    }
  }

  private require(sessionId: string): TaskRecord {
    const record = this.tasks.get(sessionId);
    if (!record) {
      throw new TaskNotFoundError(sessionId);
    }
    return record;
  }

  private apply(record: TaskRecord, message: Message, to: TaskState): void {
    if (!canTransition(record.state, to)) {
      throw new TaskTransitionError(record.sessionId, record.state, to);
    }
    record.history.push(message);
    record.state = to;
    record.statusMessage = message;
    record.timestamp = this.now().toISOString();
    // Most recently updated last
    this.tasks.delete(record.sessionId);
    this.tasks.set(record.sessionId, record);
  }
}
