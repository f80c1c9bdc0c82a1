import { z } from "zod";
import type { Task, Vec2, WorldBounds } from "@/drones/types";
import { DEFAULT_ARRIVE_EPS, taskIdFor } from "@/drones/tasks";
import { inBounds } from "@/world/map";
import { InvalidTaskError } from "./errors";

const coordinate = z
  .number({ required_error: "is required", invalid_type_error: "must be a number" })
  .finite("must be a finite number");

const Vec2Schema = z.object(
  { x: coordinate, y: coordinate },
  { required_error: "is required", invalid_type_error: "must be an object {x, y}" },
);

const TaskIdSchema = z.string({ invalid_type_error: "must be a string" }).min(1, "must not be empty");

const GotoTaskSchema = z.object({
  id: TaskIdSchema.optional(),
  target: Vec2Schema,
  arrive_eps: z
    .number({ invalid_type_error: "must be a number" })
    .finite("must be a finite number")
    .positive("must be > 0")
    .default(DEFAULT_ARRIVE_EPS),
});

const PathTaskSchema = z.object({
  id: TaskIdSchema.optional(),
  waypoints: z
    .array(Vec2Schema, { required_error: "is required", invalid_type_error: "must be a list of {x, y}" })
    .min(1, "must contain at least one point"),
  loop: z.boolean({ invalid_type_error: "must be a boolean" }).default(true),
});

const HoldTaskSchema = z.object({
  id: TaskIdSchema.optional(),
  drone_id: z.string({ required_error: "is required", invalid_type_error: "must be a string" }),
});

export interface TaskContext {
  droneId: string; // drone the task is being assigned to
  ts: number; // world time at assignment, used for generated ids
  bounds: WorldBounds;
}

export function formatPath(path: (string | number)[]): string {
  return path.reduce<string>((out, part) => {
    if (typeof part === "number") return `${out}[${part}]`;
    return out ? `${out}.${part}` : part;
  }, "");
}

function parseWith<S extends z.ZodTypeAny>(schema: S, type: string, payload: unknown): z.output<S> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = formatPath(issue.path);
    throw new InvalidTaskError(`Invalid ${type} task: ${where ? `${where} ` : ""}${issue.message}`);
  }
  return parsed.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function outsideBounds(type: string, label: string, p: Vec2, bounds: WorldBounds): InvalidTaskError {
  return new InvalidTaskError(
    `Invalid ${type} task: ${label} (${p.x}, ${p.y}) is outside the world bounds ${bounds.width}x${bounds.height}`,
  );
}

/**
 * Validates a wire task payload and normalizes it: defaults applied, ids
 * generated from the world time, a fresh cursor for PATH.
 */
export function parseTask(payload: unknown, ctx: TaskContext): Task {
  if (!isRecord(payload)) {
    throw new InvalidTaskError("Task must be an object");
  }
  const rawType = payload.type;
  if (typeof rawType !== "string" || rawType.trim() === "") {
    throw new InvalidTaskError("Task type is required");
  }
  const type = rawType.trim().toUpperCase();

  switch (type) {
    case "GOTO": {
      const p = parseWith(GotoTaskSchema, type, payload);
      if (!inBounds(p.target, ctx.bounds)) throw outsideBounds(type, "target", p.target, ctx.bounds);
      return {
        type: "GOTO",
        id: p.id ?? taskIdFor("goto", ctx.ts),
        target: { x: p.target.x, y: p.target.y },
        arriveEps: p.arrive_eps,
      };
    }
    case "PATH": {
      const p = parseWith(PathTaskSchema, type, payload);
      p.waypoints.forEach((wp, i) => {
        if (!inBounds(wp, ctx.bounds)) throw outsideBounds(type, `waypoints[${i}]`, wp, ctx.bounds);
      });
      return {
        type: "PATH",
        id: p.id ?? taskIdFor("path", ctx.ts),
        waypoints: p.waypoints.map((wp) => ({ x: wp.x, y: wp.y })),
        loop: p.loop,
        cursor: 0,
      };
    }
    case "HOLD": {
      const p = parseWith(HoldTaskSchema, type, payload);
      if (p.drone_id !== ctx.droneId) {
        throw new InvalidTaskError(
          `Invalid HOLD task: drone_id=${p.drone_id} does not match target drone_id=${ctx.droneId}`,
        );
      }
      return { type: "HOLD", id: p.id ?? taskIdFor("hold", ctx.ts) };
    }
    default:
      throw new InvalidTaskError(`Unsupported task type: ${type}`);
  }
}
