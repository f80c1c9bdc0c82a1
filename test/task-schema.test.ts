import { describe, expect, it } from "vitest";

import { InvalidTaskError } from "@/commands/errors";
import { type TaskContext, parseTask } from "@/commands/task-schema";

const ctx: TaskContext = { droneId: "D1", ts: 12.3, bounds: { width: 100, height: 100 } };

function rejection(payload: unknown, context: TaskContext = ctx): string {
  try {
    parseTask(payload, context);
  } catch (err) {
    expect(err).toBeInstanceOf(InvalidTaskError);
    return err instanceof Error ? err.message : String(err);
  }
  throw new Error("expected the task to be rejected");
}

describe("parseTask", () => {
  it("normalizes a GOTO with defaults and a time-derived id", () => {
    expect(parseTask({ type: "goto", target: { x: 10, y: 20 } }, ctx)).toEqual({
      type: "GOTO",
      id: "goto_123",
      target: { x: 10, y: 20 },
      arriveEps: 2,
    });
  });

  it("keeps an explicit id and arrive_eps", () => {
    expect(parseTask({ type: "GOTO", id: "scout-north", target: { x: 1, y: 2 }, arrive_eps: 0.5 }, ctx)).toEqual({
      type: "GOTO",
      id: "scout-north",
      target: { x: 1, y: 2 },
      arriveEps: 0.5,
    });
  });

  it("normalizes a PATH with loop defaulting to true and a fresh cursor", () => {
    const task = parseTask({ type: "PATH", waypoints: [{ x: 1, y: 1 }, { x: 2, y: 2 }] }, { ...ctx, ts: 0 });
    expect(task).toEqual({
      type: "PATH",
      id: "path_0",
      waypoints: [{ x: 1, y: 1 }, { x: 2, y: 2 }],
      loop: true,
      cursor: 0,
    });
  });

  it("accepts a HOLD naming the same drone", () => {
    expect(parseTask({ type: "HOLD", drone_id: "D1" }, ctx)).toEqual({ type: "HOLD", id: "hold_123" });
  });

  it("names the violated rule", () => {
    expect(rejection({ type: "GOTO" })).toBe("Invalid GOTO task: target is required");
    expect(rejection({ type: "GOTO", target: { x: 1, y: 1 }, arrive_eps: 0 })).toBe(
      "Invalid GOTO task: arrive_eps must be > 0",
    );
    expect(rejection({ type: "GOTO", target: { x: 1, y: 1 }, arrive_eps: -3 })).toBe(
      "Invalid GOTO task: arrive_eps must be > 0",
    );
    expect(rejection({ type: "PATH", waypoints: [] })).toBe(
      "Invalid PATH task: waypoints must contain at least one point",
    );
    expect(rejection({ type: "PATH" })).toBe("Invalid PATH task: waypoints is required");
    expect(rejection({ type: "PATH", waypoints: [{ x: 1, y: 1 }, { x: "a", y: 2 }] })).toBe(
      "Invalid PATH task: waypoints[1].x must be a number",
    );
    expect(rejection({ type: "PATH", waypoints: [{ x: 1, y: 1 }], loop: "yes" })).toBe(
      "Invalid PATH task: loop must be a boolean",
    );
    expect(rejection({ type: "HOLD" })).toBe("Invalid HOLD task: drone_id is required");
  });

  it("rejects a HOLD whose drone_id differs from the target drone", () => {
    expect(rejection({ type: "HOLD", drone_id: "D2" })).toBe(
      "Invalid HOLD task: drone_id=D2 does not match target drone_id=D1",
    );
  });

  it("rejects targets outside the world", () => {
    expect(rejection({ type: "GOTO", target: { x: 150, y: 20 } })).toBe(
      "Invalid GOTO task: target (150, 20) is outside the world bounds 100x100",
    );
    expect(rejection({ type: "PATH", waypoints: [{ x: 10, y: 10 }, { x: 10, y: -1 }] })).toBe(
      "Invalid PATH task: waypoints[1] (10, -1) is outside the world bounds 100x100",
    );
  });

  it("rejects unknown or missing types", () => {
    expect(rejection({ type: "fly", target: { x: 1, y: 1 } })).toBe("Unsupported task type: FLY");
    expect(rejection({ type: "RETURN_HOME" })).toBe("Unsupported task type: RETURN_HOME");
    expect(rejection({ target: { x: 1, y: 1 } })).toBe("Task type is required");
    expect(rejection(null)).toBe("Task must be an object");
    expect(rejection([{ type: "GOTO" }])).toBe("Task must be an object");
  });
});
