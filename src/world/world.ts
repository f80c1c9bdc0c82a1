import type { DroneState, Vec2, WorldBounds, Zone } from "@/drones/types";
import { EventLog } from "./event-log";

export interface WorldState {
  currentTime: number; // simulation seconds, derived from tickCount
  tickCount: number;
  bounds: WorldBounds;
  drones: Map<string, DroneState>;
  zones: readonly Zone[];
  events: EventLog;
}

export interface DroneInit {
  id: string;
  position: Vec2;
  battery?: number;
}

export interface WorldInit {
  bounds: WorldBounds;
  drones: DroneInit[];
  zones: Zone[];
  eventLogCapacity: number;
}

export const BATTERY_MAX = 100;

export function createWorld(init: WorldInit): WorldState {
  const drones = new Map<string, DroneState>();
  for (const seed of init.drones) {
    if (drones.has(seed.id)) {
      throw new Error(`Duplicate drone id: ${seed.id}`);
    }
    drones.set(seed.id, {
      id: seed.id,
      position: { ...seed.position },
      home: { ...seed.position },
      status: "IDLE",
      battery: Math.max(0, Math.min(BATTERY_MAX, seed.battery ?? BATTERY_MAX)),
      task: null,
      lowBatteryReported: false,
    });
  }

  return {
    currentTime: 0,
    tickCount: 0,
    bounds: { ...init.bounds },
    drones,
    zones: Object.freeze(init.zones.map((z) => ({ ...z, rect: { ...z.rect }, policy: { ...z.policy } }))),
    events: new EventLog(init.eventLogCapacity),
  };
}
