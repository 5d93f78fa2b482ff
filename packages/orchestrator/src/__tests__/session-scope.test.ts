import { describe, expect, it } from "vitest";
import { SessionScope } from "../session-scope.js";

function counterIds(): () => string {
  let next = 0;
  return () => `session-${++next}`;
}

describe("SessionScope", () => {
  it("creates a session once per conversation and reuses it", () => {
    const scope = new SessionScope({ createId: counterIds() });

    expect(scope.sessionFor("conv-a")).toBe("session-1");
    expect(scope.sessionFor("conv-b")).toBe("session-2");
    expect(scope.sessionFor("conv-a")).toBe("session-1");
    expect(scope.size).toBe(2);
  });

  it("starts a new session after forgetting a conversation", () => {
    const scope = new SessionScope({ createId: counterIds() });
    scope.sessionFor("conv-a");

    expect(scope.forget("conv-a")).toBe(true);
    expect(scope.forget("conv-a")).toBe(false);
    expect(scope.sessionFor("conv-a")).toBe("session-2");
  });

  it("drops the least recently used conversation past the limit", () => {
    const scope = new SessionScope({ createId: counterIds(), maxSessions: 2 });
    scope.sessionFor("conv-a");
    scope.sessionFor("conv-b");
    scope.sessionFor("conv-a");

    scope.sessionFor("conv-c");

    expect(scope.size).toBe(2);
    expect(scope.sessionFor("conv-a")).toBe("session-1");
    expect(scope.sessionFor("conv-b")).toBe("session-4");
  });

  it("rejects a limit below one", () => {
    expect(() => new SessionScope({ maxSessions: 0 })).toThrow(RangeError);
  });

  it("uses random UUIDs by default", () => {
    const scope = new SessionScope();

    expect(scope.sessionFor("conv-a")).toMatch(/^[0-9a-f-]{36}$/);
  });
});
