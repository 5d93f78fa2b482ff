import { describe, expect, it } from "vitest";
import {
  ConnectorDecodeError,
  ConnectorError,
  ConnectorRemoteError,
  ConnectorTransportError,
  InternalError,
  InvalidArgumentsError,
  ProtocolError,
  ProtocolInvalidRequestError,
  ProtocolParseError,
  ProtocolUnsupportedError,
  SwitchboardError,
  TaskFormatError,
  TaskNotFoundError,
  TaskTransitionError,
  ToolCallFailedError,
  ToolServerConnectionError,
  UnknownCapabilityError,
  hasCode,
  wrapError,
} from "../../index.js";

describe("Switchboard error hierarchy", () => {
  // -----------------------------------------------------------------------
  // Protocol errors
  // -----------------------------------------------------------------------

  describe("ProtocolParseError", () => {
    it("carries catalog values and a null request id", () => {
      const error = new ProtocolParseError("Unexpected token");
      expect(error._tag).toBe("ValidationError");
      expect(error.code).toBe("PROTOCOL_PARSE_ERROR");
      expect(error.jsonRpcCode).toBe(-32700);
      expect(error.httpStatus).toBe(400);
      expect(error.domain).toBe("protocol");
      expect(error.requestId).toBeNull();
      expect(error.message).toBe("Parse error: Unexpected token");
    });
  });

  describe("ProtocolUnsupportedError", () => {
    it("keeps the method and the request id", () => {
      const error = new ProtocolUnsupportedError("tasks/sendSubscribe", "req-7");
      expect(error.code).toBe("PROTOCOL_UNSUPPORTED");
      expect(error.jsonRpcCode).toBe(-32601);
      expect(error.method).toBe("tasks/sendSubscribe");
      expect(error.requestId).toBe("req-7");
      expect(error.message).toBe('Unsupported request type for method "tasks/sendSubscribe"');
    });

    it("instanceof chain", () => {
      const error = new ProtocolInvalidRequestError("missing jsonrpc", 3);
      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toBeInstanceOf(SwitchboardError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe("ProtocolInvalidRequestError");
    });
  });

  // -----------------------------------------------------------------------
  // Connector errors
  // -----------------------------------------------------------------------

  describe("ConnectorTransportError", () => {
    it("records timeout and agent identity", () => {
      const error = new ConnectorTransportError("TimeAgent", "http://a", "timed out", {
        timedOut: true,
      });
      expect(error.code).toBe("CONNECTOR_TRANSPORT");
      expect(error.jsonRpcCode).toBe(-32010);
      expect(error.timedOut).toBe(true);
      expect(error.status).toBeUndefined();
      expect(error.agentName).toBe("TimeAgent");
      expect(error.metadata).toEqual({ agentName: "TimeAgent", agentUrl: "http://a" });
      expect(error).toBeInstanceOf(ConnectorError);
    });

    it("keeps the cause", () => {
      const cause = new TypeError("fetch failed");
      const error = new ConnectorTransportError("A", "http://a", "fetch failed", { cause });
      expect(error.cause).toBe(cause);
      expect(error.timedOut).toBe(false);
    });
  });

  it("ConnectorDecodeError and ConnectorRemoteError are distinguishable", () => {
    const decode = new ConnectorDecodeError("A", "http://a", "not JSON");
    const remote = new ConnectorRemoteError("A", "http://a", -32603, "boom");
    expect(decode.code).toBe("CONNECTOR_DECODE");
    expect(remote.code).toBe("CONNECTOR_REMOTE");
    expect(remote.remoteCode).toBe(-32603);
    expect(remote.message).toBe('Agent "A" returned JSON-RPC error -32603: boom');
  });

  // -----------------------------------------------------------------------
  // Task, capability and tool errors
  // -----------------------------------------------------------------------

  it("TaskFormatError maps to invalid params", () => {
    const error = new TaskFormatError("message text is required", "req-1");
    expect(error.jsonRpcCode).toBe(-32602);
    expect(error.requestId).toBe("req-1");
  });

  it("TaskNotFoundError and TaskTransitionError carry their context", () => {
    expect(new TaskNotFoundError("t-1").jsonRpcCode).toBe(-32001);
    const transition = new TaskTransitionError("s1", "completed", "input_required");
    expect(transition._tag).toBe("ConflictError");
    expect(transition.message).toBe('Task for session "s1" cannot move from completed to input_required');
  });

  it("UnknownCapabilityError lists what is available", () => {
    const error = new UnknownCapabilityError("Weather", ["TellTimeAgent", "Translator"]);
    expect(error.code).toBe("CAPABILITY_UNKNOWN");
    expect(error.jsonRpcCode).toBe(-32004);
    expect(error.message).toBe(
      'Unknown capability "Weather" (available: TellTimeAgent, Translator)',
    );
    expect(Object.isFrozen(error.available)).toBe(true);
  });

  it("InvalidArgumentsError keeps validation issues", () => {
    const error = new InvalidArgumentsError("bad config", [{ field: "port", message: "too big" }]);
    expect(error.issues).toEqual([{ field: "port", message: "too big" }]);
  });

  it("tool errors name the server or tool", () => {
    expect(new ToolServerConnectionError("fs", "spawn ENOENT").serverName).toBe("fs");
    expect(new ToolCallFailedError("read_file", "crashed").message).toBe(
      'Tool "read_file" failed: crashed',
    );
  });

  // -----------------------------------------------------------------------
  // Utilities
  // -----------------------------------------------------------------------

  describe("wrapError", () => {
    it("returns Switchboard errors unchanged", () => {
      const error = new TaskNotFoundError("t-1");
      expect(wrapError(error)).toBe(error);
    });

    it("wraps plain errors in InternalError", () => {
      const wrapped = wrapError(new RangeError("out of range"));
      expect(wrapped).toBeInstanceOf(InternalError);
      expect(wrapped.message).toBe("out of range");
      expect(wrapped.metadata).toEqual({ originalName: "RangeError" });
    });

    it("wraps non-errors", () => {
      expect(wrapError(42).message).toBe("An unknown error occurred");
    });
  });

  it("hasCode narrows on the catalog code", () => {
    const error: unknown = new UnknownCapabilityError("x");
    expect(hasCode(error, "CAPABILITY_UNKNOWN")).toBe(true);
    expect(hasCode(error, "TASK_NOT_FOUND")).toBe(false);
    expect(hasCode(new Error("plain"), "INTERNAL_ERROR")).toBe(false);
  });

  it("toJSON exposes only wire-safe fields", () => {
    const json = new TaskNotFoundError("t-9").toJSON();
    expect(json).toMatchObject({
      _tag: "NotFoundError",
      code: "TASK_NOT_FOUND",
      message: "Task not found: t-9",
      httpStatus: 404,
      jsonRpcCode: -32001,
      domain: "task",
      metadata: { taskId: "t-9" },
    });
    expect(typeof json.timestamp).toBe("string");
  });
});
