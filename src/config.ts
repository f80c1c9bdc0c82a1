import { z } from "zod";

const positive = z.coerce.number().positive();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8001),
  HOST: z.string().min(1).default("127.0.0.1"),
  SIM_DT_S: positive.default(0.2),
  TICK_INTERVAL_MS: z.coerce.number().int().min(10).default(200),
  WORLD_WIDTH: positive.default(100),
  WORLD_HEIGHT: positive.default(100),
  DRONE_SPEED_MPS: positive.default(1.6),
  BATTERY_DRAIN_PER_S: z.coerce.number().min(0).default(0.02),
  BATTERY_LOW_THRESHOLD: z.coerce.number().min(0).max(100).default(20),
  EVENT_LOG_CAPACITY: z.coerce.number().int().min(1).default(200),
  RECENT_EVENTS_LIMIT: z.coerce.number().int().min(1).default(50),
  FIRE_ZONE_COOLDOWN_S: z.coerce.number().min(0).default(5),
  SNAPSHOT_BROADCAST_EVERY: z.coerce.number().int().min(1).default(5),
  ZONE_SEED: z.coerce.number().int().optional(),
  ZONES_FILE: z.string().min(1).optional(),
});

export interface SimConfig {
  port: number;
  host: string;
  dt: number;
  tickIntervalMs: number;
  world: { width: number; height: number };
  droneSpeed: number;
  batteryDrainPerS: number;
  batteryLowThreshold: number;
  eventLogCapacity: number;
  recentEventsLimit: number;
  fireZoneCooldownS: number;
  snapshotBroadcastEvery: number;
  zoneSeed: number | null;
  zonesFile: string | null;
}

/** Reads settings from the environment. Unset and empty variables take the defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SimConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration ${issue.path.join(".")}: ${issue.message}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    dt: e.SIM_DT_S,
    tickIntervalMs: e.TICK_INTERVAL_MS,
    world: { width: e.WORLD_WIDTH, height: e.WORLD_HEIGHT },
    droneSpeed: e.DRONE_SPEED_MPS,
    batteryDrainPerS: e.BATTERY_DRAIN_PER_S,
    batteryLowThreshold: e.BATTERY_LOW_THRESHOLD,
    eventLogCapacity: e.EVENT_LOG_CAPACITY,
    recentEventsLimit: e.RECENT_EVENTS_LIMIT,
    fireZoneCooldownS: e.FIRE_ZONE_COOLDOWN_S,
    snapshotBroadcastEvery: e.SNAPSHOT_BROADCAST_EVERY,
    zoneSeed: e.ZONE_SEED ?? null,
    zonesFile: e.ZONES_FILE ?? null,
  };
}
