import type { DroneState, SimulationEvent, WorldEvent, WorldEventDraft } from "@/drones/types";
import { applyTask, stepDrone, taskIdFor } from "@/drones/tasks";
import { BadRequestError, StateConflictError, errorMessage } from "@/commands/errors";
import { ZoneDetector } from "./detector";
import { WorldLock } from "./lock";
import { BATTERY_MAX, type WorldState } from "./world";

export type EventListener = (event: SimulationEvent) => void;

export interface ClockOptions {
  dt: number; // simulated seconds per tick
  speed: number; // metres per simulated second
  batteryDrainPerS: number;
  batteryLowThreshold: number;
}

export const MAX_MANUAL_STEPS = 1000;

function roundTime(t: number): number {
  return Number(t.toFixed(6));
}

export class Simulation {
  private listeners: EventListener[] = [];
  private tickInterval: ReturnType<typeof setInterval> | null = null;
  private paused = false;

  constructor(
    readonly world: WorldState,
    private readonly lock: WorldLock,
    private readonly detector: ZoneDetector,
    private readonly options: ClockOptions,
  ) {}

  onEvent(listener: EventListener) {
    this.listeners.push(listener);
  }

  private emit(event: SimulationEvent) {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error(`Event listener failed on ${event.type}:`, err);
      }
    }
  }

  /** Runs `count` ticks, each as its own critical section. Listeners hear about a tick after it commits. */
  async step(count = 1): Promise<void> {
    for (let i = 0; i < count; i++) {
      const events = await this.lock.runExclusive(() => this.tick());
      for (const event of events) this.emit(event);
    }
  }

  async manualStep(count: number): Promise<void> {
    if (this.isRunning() && !this.paused) {
      throw new StateConflictError("Simulation is running; pause it before stepping manually");
    }
    if (!Number.isInteger(count) || count < 1 || count > MAX_MANUAL_STEPS) {
      throw new BadRequestError(`Step count must be an integer in 1..${MAX_MANUAL_STEPS}`);
    }
    await this.step(count);
  }

  // One tick: move every drone, drain batteries, detect zone events, then advance time.
  private tick(): SimulationEvent[] {
    const { world, options } = this;
    const tickCount = world.tickCount + 1;
    const ts = roundTime(tickCount * options.dt);
    const out: SimulationEvent[] = [];

    const drones = Array.from(world.drones.values());
    const motion = { step: options.speed * options.dt, bounds: world.bounds };

    for (const drone of drones) {
      try {
        const { completed } = stepDrone(drone, motion);
        if (completed) {
          console.log(`${drone.id} completed ${completed.type} ${completed.id}`);
          out.push({
            type: "task_completed",
            data: { droneId: drone.id, taskId: completed.id, taskType: completed.type },
            timestamp: ts,
          });
        }
      } catch (err) {
        out.push(this.degradeToHold(drone, err, ts));
      }
    }

    for (const drone of drones) {
      const event = this.drainBattery(drone, ts);
      if (event) out.push({ type: "world_event", data: event, timestamp: ts });
    }

    const positions = new Map(drones.map((d) => [d.id, d.position]));
    for (const draft of this.detector.detect(positions, world.zones, ts)) {
      const event = this.record(draft);
      console.log(`[t=${ts.toFixed(1)}] ${event.type} ${event.droneId}: ${event.message}`);
      out.push({ type: "world_event", data: event, timestamp: ts });
    }

    world.tickCount = tickCount;
    world.currentTime = ts;
    out.push({ type: "tick", data: { tick: tickCount }, timestamp: ts });
    return out;
  }

  private degradeToHold(drone: DroneState, err: unknown, ts: number): SimulationEvent {
    const message = errorMessage(err);
    const faultedTaskId = drone.task?.id ?? null;
    console.error(`Task fault on ${drone.id}, holding position: ${message}`);

    applyTask(drone, { type: "HOLD", id: taskIdFor("hold_fault", ts) });
    const event = this.record({
      ts,
      type: "TASK_FAULT",
      droneId: drone.id,
      zoneId: null,
      position: { ...drone.position },
      message,
      payload: { task_id: faultedTaskId },
      severity: 0.5,
      confidence: 1,
    });
    return { type: "task_fault", data: event, timestamp: ts };
  }

  private drainBattery(drone: DroneState, ts: number): WorldEvent | null {
    if (drone.status === "IDLE") return null;
    const { batteryDrainPerS, batteryLowThreshold, dt } = this.options;
    drone.battery = Math.max(0, Math.min(BATTERY_MAX, drone.battery - batteryDrainPerS * dt));

    if (drone.lowBatteryReported || drone.status === "RETURNING" || drone.battery > batteryLowThreshold) {
      return null;
    }

    drone.lowBatteryReported = true;
    const returnTask = { type: "RETURN_HOME" as const, id: taskIdFor("return", ts), home: { ...drone.home } };
    applyTask(drone, returnTask);
    console.warn(`${drone.id} battery low (${drone.battery.toFixed(1)}%), returning home`);

    return this.record({
      ts,
      type: "BATTERY_LOW",
      droneId: drone.id,
      zoneId: null,
      position: { ...drone.position },
      message: `Battery low: ${drone.battery.toFixed(1)}%`,
      payload: { battery: drone.battery, return_task_id: returnTask.id },
      severity: 0.6,
      confidence: 1,
    });
  }

  private record(draft: WorldEventDraft): WorldEvent {
    return this.world.events.append(draft);
  }

  start(intervalMs: number) {
    if (this.tickInterval) return;
    console.log(`Simulation started. t=${this.world.currentTime}s, dt=${this.options.dt}s, every ${intervalMs}ms`);
    this.tickInterval = setInterval(() => {
      if (this.paused) return;
      this.step().catch((err) => console.error("Tick failed:", err));
    }, intervalMs);
  }

  stop() {
    if (this.tickInterval) {
      clearInterval(this.tickInterval);
      this.tickInterval = null;
    }
    console.log("Simulation stopped.");
  }

  pause() { this.paused = true; }
  resume() { this.paused = false; }
  isPaused() { return this.paused; }
  isRunning() { return this.tickInterval !== null; }
}
