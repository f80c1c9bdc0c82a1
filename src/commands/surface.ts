import type { DroneStatus, Task, Vec2, WorldEvent, Zone } from "@/drones/types";
import { applyTask, cloneTask } from "@/drones/tasks";
import { WorldLock } from "@/world/lock";
import type { WorldState } from "@/world/world";
import { NotFoundError, RequestAbortedError, errorMessage } from "./errors";
import { parseTask } from "./task-schema";

export interface AssignCommand {
  droneId: string;
  task: unknown; // wire payload, validated per item
}

export type AssignResult =
  | { ok: true; droneId: string; assigned: Task }
  | { ok: false; droneId: string; error: string };

export interface DroneSnapshot {
  id: string;
  position: Vec2;
  status: DroneStatus;
  battery: number;
  task: Task | null;
}

export interface WorldSnapshot {
  ts: number;
  tick: number;
  drones: DroneSnapshot[];
  zones: Zone[];
  events: WorldEvent[];
}

/**
 * Entry point for external callers. Every operation runs inside the world lock,
 * so no tick ever sees a half-replaced task and no snapshot mixes two ticks.
 */
export class CommandSurface {
  constructor(
    private readonly world: WorldState,
    private readonly lock: WorldLock,
    private readonly recentEventsLimit: number,
  ) {}

  assignTask(droneId: string, payload: unknown, signal?: AbortSignal): Promise<Task> {
    return this.lock.runExclusive(() => this.applyAssignment(droneId, payload), signal);
  }

  // Each item is atomic on its own; one failure never touches its siblings.
  async assignBatch(commands: AssignCommand[], signal?: AbortSignal): Promise<AssignResult[]> {
    const results: AssignResult[] = [];
    for (const { droneId, task } of commands) {
      try {
        const assigned = await this.assignTask(droneId, task, signal);
        results.push({ ok: true, droneId, assigned });
      } catch (err) {
        if (err instanceof RequestAbortedError) throw err;
        results.push({ ok: false, droneId, error: errorMessage(err) });
      }
    }
    return results;
  }

  readSnapshot(signal?: AbortSignal): Promise<WorldSnapshot> {
    return this.lock.runExclusive(() => this.buildSnapshot(), signal);
  }

  private applyAssignment(droneId: string, payload: unknown): Task {
    const drone = this.world.drones.get(droneId);
    if (!drone) throw new NotFoundError(droneId);

    const task = parseTask(payload, { droneId, ts: this.world.currentTime, bounds: this.world.bounds });
    applyTask(drone, task);
    console.log(`Assigned ${task.type} ${task.id} to ${droneId}`);
    return cloneTask(task);
  }

  private buildSnapshot(): WorldSnapshot {
    const { world } = this;
    return {
      ts: world.currentTime,
      tick: world.tickCount,
      drones: Array.from(world.drones.values(), (d) => ({
        id: d.id,
        position: { ...d.position },
        status: d.status,
        battery: d.battery,
        task: d.task ? cloneTask(d.task) : null,
      })),
      zones: world.zones.map((z) => ({ ...z, rect: { ...z.rect }, policy: { ...z.policy } })),
      events: world.events.recent(this.recentEventsLimit).map((e) => ({
        ...e,
        position: e.position ? { ...e.position } : null,
        payload: { ...e.payload },
      })),
    };
  }
}
