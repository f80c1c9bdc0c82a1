import express, { type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import type { Runtime } from "@/runtime";
import { BadRequestError, CommandError } from "@/commands/errors";
import { formatPath } from "@/commands/task-schema";
import { assignResultToWire, snapshotToWire, taskToWire } from "./wire";

export interface HandlerResult {
  status: number;
  body: unknown;
}

const DroneIdSchema = z
  .string({ required_error: "is required", invalid_type_error: "must be a string" })
  .min(1, "must not be empty");

const AssignTaskRequestSchema = z.object({
  drone_id: DroneIdSchema,
  task: z.unknown(), // validated by the command surface so the error names the violated task rule
});

const BatchRequestSchema = z.object({
  commands: z.array(AssignTaskRequestSchema, { required_error: "is required", invalid_type_error: "must be a list" }),
});

const StepRequestSchema = z.object({
  count: z.number({ invalid_type_error: "must be a number" }).default(1),
});

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = formatPath(issue.path);
    throw new BadRequestError(`Invalid request: ${where ? `${where} ` : ""}${issue.message}`);
  }
  return parsed.data;
}

async function handle(fn: () => Promise<HandlerResult> | HandlerResult): Promise<HandlerResult> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof CommandError) {
      console.warn(`Request rejected (${err.code}): ${err.message}`);
      return { status: err.httpStatus, body: { ok: false, error: err.message, code: err.code } };
    }
    console.error("Unhandled request error:", err);
    return { status: 500, body: { ok: false, error: "Internal error" } };
  }
}

export function createHandlers(runtime: Runtime) {
  const { surface, simulation } = runtime;

  return {
    health: (): HandlerResult => ({ status: 200, body: { ok: true } }),

    state: (signal?: AbortSignal) =>
      handle(async () => ({ status: 200, body: snapshotToWire(await surface.readSnapshot(signal)) })),

    assignTask: (body: unknown, signal?: AbortSignal) =>
      handle(async () => {
        const req = parseBody(AssignTaskRequestSchema, body);
        const assigned = await surface.assignTask(req.drone_id, req.task, signal);
        return { status: 200, body: { ok: true, drone_id: req.drone_id, assigned: taskToWire(assigned) } };
      }),

    // Per-item failures are reported inside `results`; the envelope stays ok:true.
    batch: (body: unknown, signal?: AbortSignal) =>
      handle(async () => {
        const req = parseBody(BatchRequestSchema, body);
        const results = await surface.assignBatch(
          req.commands.map((c) => ({ droneId: c.drone_id, task: c.task })),
          signal,
        );
        return { status: 200, body: { ok: true, results: results.map(assignResultToWire) } };
      }),

    simStatus: (signal?: AbortSignal) =>
      handle(async () => {
        const snapshot = await surface.readSnapshot(signal);
        return {
          status: 200,
          body: { paused: simulation.isPaused(), running: simulation.isRunning(), ts: snapshot.ts, tick: snapshot.tick },
        };
      }),

    pause: (): HandlerResult => {
      simulation.pause();
      return { status: 200, body: { paused: true } };
    },

    resume: (): HandlerResult => {
      simulation.resume();
      return { status: 200, body: { paused: false } };
    },

    step: (body: unknown) =>
      handle(async () => {
        const { count } = parseBody(StepRequestSchema, body);
        await simulation.manualStep(count);
        const snapshot = await surface.readSnapshot();
        return { status: 200, body: { ok: true, ts: snapshot.ts, tick: snapshot.tick } };
      }),
  };
}

export type Handlers = ReturnType<typeof createHandlers>;

// Aborts once the client hangs up before we answered, so queued work is skipped.
function abortSignalFor(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

function send(res: Response, next: NextFunction, result: Promise<HandlerResult> | HandlerResult) {
  Promise.resolve(result)
    .then((r) => {
      if (res.destroyed) return;
      res.status(r.status).json(r.body);
    })
    .catch(next);
}

export function registerRoutes(app: express.Express, handlers: Handlers) {
  app.get("/health", (_req, res, next) => send(res, next, handlers.health()));
  app.get("/state", (_req, res, next) => send(res, next, handlers.state(abortSignalFor(res))));

  app.post("/cmd/assign_task", (req: Request, res, next) =>
    send(res, next, handlers.assignTask(req.body, abortSignalFor(res))),
  );
  app.post("/cmd/batch", (req: Request, res, next) => send(res, next, handlers.batch(req.body, abortSignalFor(res))));

  app.get("/sim/status", (_req, res, next) => send(res, next, handlers.simStatus(abortSignalFor(res))));
  app.post("/sim/pause", (_req, res, next) => send(res, next, handlers.pause()));
  app.post("/sim/resume", (_req, res, next) => send(res, next, handlers.resume()));
  app.post("/sim/step", (req: Request, res, next) => send(res, next, handlers.step(req.body)));
}
