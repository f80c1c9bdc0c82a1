import type { SimConfig } from "@/config";
import type { DroneState, Task, Vec2, Zone } from "@/drones/types";
import { type Runtime, createRuntime } from "@/runtime";

export function testConfig(overrides: Partial<SimConfig> = {}): SimConfig {
  return {
    port: 0,
    host: "127.0.0.1",
    dt: 0.2,
    tickIntervalMs: 200,
    world: { width: 100, height: 100 },
    droneSpeed: 1.6,
    batteryDrainPerS: 0.02,
    batteryLowThreshold: 20,
    eventLogCapacity: 200,
    recentEventsLimit: 50,
    fireZoneCooldownS: 5,
    snapshotBroadcastEvery: 5,
    zoneSeed: 42,
    zonesFile: null,
    ...overrides,
  };
}

export const FIRE_ZONE: Zone = {
  id: "z_fire",
  name: "FireZone-Central",
  type: "FIRE_RISK",
  rect: { xmin: 42, xmax: 58, ymin: 42, ymax: 58 },
  policy: { triggerMode: "ON_ENTER", cooldownS: 5, probability: 1, severity: 0.9, confidence: 0.8 },
};

export function fireRuntime(overrides: Partial<SimConfig> = {}): Runtime {
  return createRuntime(testConfig(overrides), { zones: [FIRE_ZONE] });
}

export function drone(id: string, position: Vec2, task: Task | null = null): DroneState {
  return {
    id,
    position: { ...position },
    home: { ...position },
    status: "IDLE",
    battery: 100,
    task,
    lowBatteryReported: false,
  };
}

export function getDrone(runtime: Runtime, id: string): DroneState {
  const found = runtime.world.drones.get(id);
  if (!found) throw new Error(`test drone ${id} missing`);
  return found;
}
