import { TaskFormatError, TaskNotFoundError, TaskTransitionError } from "@switchboard/errors";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { messageText, textMessage } from "../protocol.js";
import { canTransition, TaskManager } from "../task-manager.js";
import type { AgentHandler, SendTaskRequest } from "../types.js";

const NOW = new Date("2026-01-01T00:00:00.000Z");

function sendRequest(text: string, sessionId = "s1", taskId = "task-1"): SendTaskRequest {
  return {
    kind: "send",
    id: "req-1",
    method: "tasks/send",
    params: {
      id: taskId,
      sessionId,
      message: { role: "user", parts: [{ type: "text", text }] },
    },
  };
}

describe("canTransition", () => {
  it.each([
    ["pending", "working", true],
    ["pending", "completed", true],
    ["pending", "input_required", true],
    ["working", "completed", true],
    ["input_required", "working", true],
    ["completed", "working", true],
    ["error", "working", true],
    ["completed", "completed", false],
    ["working", "pending", false],
    ["input_required", "completed", false],
  ] as const)("%s -> %s is %s", (from, to, allowed) => {
    expect(canTransition(from, to)).toBe(allowed);
  });
});

describe("TaskManager", () => {
  let manager: TaskManager;

  beforeEach(() => {
    manager = new TaskManager({ now: () => NOW });
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("upsertTask", () => {
    it("creates a pending task with an empty history", async () => {
      const task = await manager.upsertTask("s1", { taskId: "t1" });

      expect(task).toEqual({
        id: "t1",
        sessionId: "s1",
        status: { state: "pending", message: undefined, timestamp: NOW.toISOString() },
        history: [],
      });
    });

    it("returns the existing task on repeat calls", async () => {
      const first = await manager.upsertTask("s1", { taskId: "t1" });
      const second = await manager.upsertTask("s1", { taskId: "t2" });

      expect(second.id).toBe(first.id);
    });

    it("yields one task for concurrent upserts of one session", async () => {
      const tasks = await Promise.all(
        Array.from({ length: 10 }, () => manager.upsertTask("s1")),
      );

      expect(new Set(tasks.map((t) => t.id)).size).toBe(1);
      expect(manager.listTasks()).toHaveLength(1);
    });
  });

  describe("recordInput / appendReply", () => {
    it("grows history by exactly one entry per call", async () => {
      await manager.upsertTask("s1");

      const afterInput = await manager.recordInput("s1", textMessage("user", "hi"));
      expect(afterInput.status.state).toBe("working");
      expect(afterInput.history).toHaveLength(1);

      const afterReply = await manager.appendReply(
        "s1",
        textMessage("agent", "hello"),
        "completed",
      );
      expect(afterReply.status.state).toBe("completed");
      expect(afterReply.history).toHaveLength(2);
      expect(afterReply.status.message).toEqual(textMessage("agent", "hello"));
    });

    it("re-opens a completed session on a follow-up turn", async () => {
      await manager.upsertTask("s1");
      await manager.recordInput("s1", textMessage("user", "one"));
      await manager.appendReply("s1", textMessage("agent", "1"), "completed");

      await manager.recordInput("s1", textMessage("user", "two"));
      const task = await manager.appendReply("s1", textMessage("agent", "2"), "completed");

      expect(task.history.map(messageText)).toEqual(["one", "1", "two", "2"]);
    });

    it("rejects an illegal transition without touching the task", async () => {
      await manager.upsertTask("s1");
      await manager.recordInput("s1", textMessage("user", "hi"));
      await manager.appendReply("s1", textMessage("agent", "done"), "completed");

      await expect(
        manager.appendReply("s1", textMessage("agent", "again"), "completed"),
      ).rejects.toThrow(TaskTransitionError);

      const task = manager.getTask("s1");
      expect(task?.history).toHaveLength(2);
      expect(task?.status.state).toBe("completed");
    });

    it("raises TaskNotFoundError for an unknown session", async () => {
      await expect(
        manager.appendReply("nope", textMessage("agent", "x"), "completed"),
      ).rejects.toThrow(TaskNotFoundError);
    });

    it("hands out snapshots that later mutations do not change", async () => {
      await manager.upsertTask("s1");
      const before = await manager.recordInput("s1", textMessage("user", "hi"));
      await manager.appendReply("s1", textMessage("agent", "hello"), "completed");

      expect(before.history).toHaveLength(1);
      expect(before.status.state).toBe("working");
      expect(Object.isFrozen(before)).toBe(true);
      expect(Object.isFrozen(before.history)).toBe(true);
    });
  });

  describe("getTask", () => {
    it("finds a task by task id or session id", async () => {
      await manager.upsertTask("s1", { taskId: "t1" });

      expect(manager.getTask("t1")?.sessionId).toBe("s1");
      expect(manager.getTask("s1")?.id).toBe("t1");
      expect(manager.getTask("missing")).toBeUndefined();
    });
  });

  describe("onSendTask", () => {
    it("records the user turn, runs the agent and records its reply", async () => {
      const handler = vi.fn<AgentHandler>().mockResolvedValue({ text: "It is noon" });

      const task = await manager.onSendTask(sendRequest("What time is it?"), handler);

      expect(handler).toHaveBeenCalledTimes(1);
      const input = handler.mock.calls[0]?.[0];
      expect(input?.text).toBe("What time is it?");
      expect(input?.sessionId).toBe("s1");
      expect(input?.taskId).toBe("task-1");
      expect(input?.history).toHaveLength(1);

      expect(task.id).toBe("task-1");
      expect(task.status.state).toBe("completed");
      expect(task.history.map(messageText)).toEqual(["What time is it?", "It is noon"]);
    });

    it("keeps the task open when the agent asks for more input", async () => {
      const handler: AgentHandler = async () => ({ text: "Which city?", state: "input_required" });

      const task = await manager.onSendTask(sendRequest("Weather?"), handler);

      expect(task.status.state).toBe("input_required");
    });

    it("continues the same task for the same session", async () => {
      const handler: AgentHandler = async (input) => ({ text: `echo ${input.text}` });

      const first = await manager.onSendTask(sendRequest("a", "s1", "task-1"), handler);
      const second = await manager.onSendTask(sendRequest("b", "s1", "task-2"), handler);

      expect(second.id).toBe(first.id);
      expect(second.history).toHaveLength(4);
    });

    it("records a failing agent as an error and rethrows", async () => {
      const boom = new Error("model unavailable");
      const handler: AgentHandler = async () => {
        throw boom;
      };

      await expect(manager.onSendTask(sendRequest("hi"), handler)).rejects.toBe(boom);

      const task = manager.getTask("s1");
      expect(task?.status.state).toBe("error");
      expect(task?.history.map(messageText)).toEqual(["hi", "Error: model unavailable"]);
    });

    it("rejects a malformed request before storing anything", async () => {
      const handler = vi.fn<AgentHandler>();
      const request: SendTaskRequest = {
        kind: "send",
        id: "req-1",
        method: "tasks/send",
        params: { id: "t1", message: { role: "user", parts: [{ type: "text", text: "  " }] } },
      };

      await expect(manager.onSendTask(request, handler)).rejects.toThrow(TaskFormatError);
      expect(handler).not.toHaveBeenCalled();
      expect(manager.listTasks()).toEqual([]);
    });

    it("queues a second send for a session until the first turn finishes", async () => {
      let release = (): void => {};
      const gate = new Promise<void>((r) => {
        release = r;
      });
      const calls: string[] = [];
      const handler: AgentHandler = async (input) => {
        calls.push(input.text);
        if (input.text === "first") await gate;
        return { text: `re: ${input.text}` };
      };

      const first = manager.onSendTask(sendRequest("first"), handler);
      const second = manager.onSendTask(sendRequest("second"), handler);
      await new Promise((r) => setTimeout(r, 0));
      expect(calls).toEqual(["first"]);

      release();
      await first;
      const task = await second;

      expect(calls).toEqual(["first", "second"]);
      expect(task.history.map(messageText)).toEqual(["first", "re: first", "second", "re: second"]);
    });

    it("runs the agent without holding the session lock", async () => {
      let release = (): void => {};
      const gate = new Promise<void>((r) => {
        release = r;
      });
      const handler: AgentHandler = async () => {
        await gate;
        return { text: "done" };
      };

      const pending = manager.onSendTask(sendRequest("slow"), handler);
      await new Promise((r) => setTimeout(r, 0));

      const during = await manager.upsertTask("s1");
      expect(during.status.state).toBe("working");

      release();
      const task = await pending;
      expect(task.status.state).toBe("completed");
    });
  });

  describe("task limit", () => {
    it("drops the least recently updated idle task", async () => {
      const small = new TaskManager({ now: () => NOW, maxTasks: 2 });
      const echo: AgentHandler = async (input) => ({ text: input.text });

      await small.onSendTask(sendRequest("a", "s1", "t1"), echo);
      await small.onSendTask(sendRequest("b", "s2", "t2"), echo);
      await small.onSendTask(sendRequest("a again", "s1", "t1"), echo);
      await small.onSendTask(sendRequest("c", "s3", "t3"), echo);

      expect(small.listTasks().map((t) => t.sessionId)).toEqual(["s1", "s3"]);
      expect(small.getTask("t2")).toBeUndefined();
      expect(small.getTask("t1")?.history).toHaveLength(4);
    });

    it("never drops a task whose turn is running", async () => {
      const small = new TaskManager({ now: () => NOW, maxTasks: 1 });
      let release = (): void => {};
      const gate = new Promise<void>((r) => {
        release = r;
      });
      const slow: AgentHandler = async (input) => {
        await gate;
        return { text: input.text };
      };

      const pending = small.onSendTask(sendRequest("slow", "s1", "t1"), slow);
      await new Promise((r) => setTimeout(r, 0));
      await small.upsertTask("s2", { taskId: "t2" });

      expect(small.getTask("s1")?.status.state).toBe("working");
      expect(small.listTasks()).toHaveLength(2);

      release();
      await pending;
    });

    it("rejects a limit below one", () => {
      expect(() => new TaskManager({ maxTasks: 0 })).toThrow(RangeError);
    });
  });
});
