import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createHandlers } from "@/server/routes";
import { fireRuntime } from "./helpers";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

function setup() {
  const runtime = fireRuntime();
  return { runtime, handlers: createHandlers(runtime) };
}

describe("state and health", () => {
  it("answers health checks", () => {
    expect(setup().handlers.health()).toEqual({ status: 200, body: { ok: true } });
  });

  it("serves the world snapshot in wire form", async () => {
    const { handlers } = setup();
    const result = await handlers.state();

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({
      ts: 0,
      tick: 0,
      zones: [{ id: "z_fire", name: "FireZone-Central", type: "FIRE_RISK", rect: { xmin: 42, xmax: 58, ymin: 42, ymax: 58 } }],
      recent_events: [],
    });
    expect(result.body).toHaveProperty("drones.0", { id: "D1", pos: { x: 5, y: 5 }, status: "IDLE", battery: 100, task: null });
  });

  it("maps unexpected failures to 500", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const { runtime, handlers } = setup();
    vi.spyOn(runtime.surface, "readSnapshot").mockRejectedValue(new Error("snapshot exploded"));

    expect(await handlers.state()).toEqual({ status: 500, body: { ok: false, error: "Internal error" } });
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});

describe("POST /cmd/assign_task", () => {
  it("returns the normalized task", async () => {
    const { handlers } = setup();
    const result = await handlers.assignTask({ drone_id: "D1", task: { type: "goto", target: { x: 10, y: 20 } } });

    expect(result).toEqual({
      status: 200,
      body: {
        ok: true,
        drone_id: "D1",
        assigned: { type: "GOTO", id: "goto_0", target: { x: 10, y: 20 }, arrive_eps: 2 },
      },
    });
  });

  it("returns 404 for an unknown drone", async () => {
    const { handlers } = setup();
    expect(await handlers.assignTask({ drone_id: "D9", task: { type: "HOLD", drone_id: "D9" } })).toEqual({
      status: 404,
      body: { ok: false, error: "Unknown drone_id=D9", code: "NOT_FOUND" },
    });
    expect(console.warn).toHaveBeenCalledWith("Request rejected (NOT_FOUND): Unknown drone_id=D9");
  });

  it("returns 404 for a GOTO to an unknown drone, even with an out-of-bounds target", async () => {
    const { handlers } = setup();
    const notFound = { status: 404, body: { ok: false, error: "Unknown drone_id=D9", code: "NOT_FOUND" } };

    expect(await handlers.assignTask({ drone_id: "D9", task: { type: "GOTO", target: { x: 10, y: 20 } } })).toEqual(
      notFound,
    );
    expect(await handlers.assignTask({ drone_id: "D9", task: { type: "GOTO", target: { x: 150, y: 20 } } })).toEqual(
      notFound,
    );
  });

  it("returns 400 naming the violated task rule", async () => {
    const { handlers } = setup();
    expect(await handlers.assignTask({ drone_id: "D1", task: { type: "GOTO" } })).toEqual({
      status: 400,
      body: { ok: false, error: "Invalid GOTO task: target is required", code: "INVALID_TASK" },
    });
  });

  it("returns 400 for a malformed envelope", async () => {
    const { handlers } = setup();
    expect(await handlers.assignTask({ task: { type: "HOLD" } })).toEqual({
      status: 400,
      body: { ok: false, error: "Invalid request: drone_id is required", code: "BAD_REQUEST" },
    });
    expect(await handlers.assignTask(undefined)).toEqual({
      status: 400,
      body: { ok: false, error: "Invalid request: drone_id is required", code: "BAD_REQUEST" },
    });
  });

  it("returns 499 when the client went away before the task was applied", async () => {
    const { handlers } = setup();
    const controller = new AbortController();
    controller.abort();

    const result = await handlers.assignTask({ drone_id: "D1", task: { type: "HOLD", drone_id: "D1" } }, controller.signal);
    expect(result).toEqual({
      status: 499,
      body: { ok: false, error: "Request aborted before it was applied", code: "REQUEST_ABORTED" },
    });
  });
});

describe("POST /cmd/batch", () => {
  it("reports per-item results inside an ok envelope", async () => {
    const { handlers } = setup();
    const result = await handlers.batch({
      commands: [
        { drone_id: "FD1", task: { type: "PATH", waypoints: [{ x: 44, y: 20 }], loop: false } },
        { drone_id: "FD2", task: { type: "PATH", waypoints: [] } },
      ],
    });

    expect(result).toEqual({
      status: 200,
      body: {
        ok: true,
        results: [
          {
            ok: true,
            drone_id: "FD1",
            assigned: { type: "PATH", id: "path_0", waypoints: [{ x: 44, y: 20 }], loop: false, cursor: 0 },
          },
          { ok: false, drone_id: "FD2", error: "Invalid PATH task: waypoints must contain at least one point" },
        ],
      },
    });
  });

  it("rejects a batch whose commands are not a list", async () => {
    const { handlers } = setup();
    expect(await handlers.batch({ commands: "D1" })).toEqual({
      status: 400,
      body: { ok: false, error: "Invalid request: commands must be a list", code: "BAD_REQUEST" },
    });
  });

  it("rejects the whole batch when one envelope lacks a drone_id", async () => {
    const { runtime, handlers } = setup();
    const result = await handlers.batch({
      commands: [{ drone_id: "D1", task: { type: "HOLD", drone_id: "D1" } }, { task: { type: "HOLD" } }],
    });

    expect(result).toEqual({
      status: 400,
      body: { ok: false, error: "Invalid request: commands[1].drone_id is required", code: "BAD_REQUEST" },
    });
    expect(runtime.world.drones.get("D1")?.task).toBeNull();
  });
});

describe("simulation control", () => {
  it("reports and toggles the paused flag", async () => {
    const { handlers } = setup();
    expect(await handlers.simStatus()).toEqual({
      status: 200,
      body: { paused: false, running: false, ts: 0, tick: 0 },
    });

    expect(handlers.pause()).toEqual({ status: 200, body: { paused: true } });
    expect(await handlers.simStatus()).toMatchObject({ body: { paused: true } });
    expect(handlers.resume()).toEqual({ status: 200, body: { paused: false } });
  });

  it("steps the clock by hand", async () => {
    const { handlers } = setup();
    expect(await handlers.step({ count: 5 })).toEqual({ status: 200, body: { ok: true, ts: 1, tick: 5 } });
    expect(await handlers.step({})).toEqual({ status: 200, body: { ok: true, ts: 1.2, tick: 6 } });
  });

  it("rejects a bad step count", async () => {
    const { handlers } = setup();
    expect(await handlers.step({ count: "many" })).toEqual({
      status: 400,
      body: { ok: false, error: "Invalid request: count must be a number", code: "BAD_REQUEST" },
    });
    expect(await handlers.step({ count: 0 })).toEqual({
      status: 400,
      body: { ok: false, error: "Step count must be an integer in 1..1000", code: "BAD_REQUEST" },
    });
  });
});
