import fs from "node:fs";
import { z } from "zod";
import type { Vec2, WorldBounds, WorldEventDraft, WorldEventType, Zone, ZoneEventPolicy, ZoneType } from "@/drones/types";
import { distance, rectCenter } from "./map";
import { DeterministicRNG } from "./random";

const ZONE_TYPES = ["FIRE_RISK", "NO_FLY", "SIGNAL_LOSS", "INFO"] as const;

export function defaultPolicy(type: ZoneType, fireCooldownS: number): ZoneEventPolicy {
  switch (type) {
    case "FIRE_RISK":
      return { triggerMode: "ON_ENTER", cooldownS: fireCooldownS, probability: 1, severity: 0.85, confidence: 0.85 };
    case "NO_FLY":
      return { triggerMode: "ON_ENTER", cooldownS: 0, probability: 1, severity: 0.7, confidence: 0.9 };
    case "SIGNAL_LOSS":
      return { triggerMode: "ON_STAY", cooldownS: 10, probability: 0.3, severity: 0.4, confidence: 0.6 };
    case "INFO":
      return { triggerMode: "ON_ENTER", cooldownS: 0, probability: 1, severity: 0.1, confidence: 0.5 };
  }
}

const FIRE_COUNT_MIN = 2;
const FIRE_COUNT_MAX = 3;
const FIRE_SIZE_MIN = 6;
const FIRE_SIZE_MAX = 12;
const FIRE_BORDER = 8; // keep fires off the map edge

export function generateFireZones(rng: DeterministicRNG, bounds: WorldBounds, cooldownS: number): Zone[] {
  const count = rng.int(FIRE_COUNT_MIN, FIRE_COUNT_MAX);
  const zones: Zone[] = [];
  for (let i = 0; i < count; i++) {
    const w = rng.uniform(FIRE_SIZE_MIN, FIRE_SIZE_MAX);
    const h = rng.uniform(FIRE_SIZE_MIN, FIRE_SIZE_MAX);
    const xmin = rng.uniform(FIRE_BORDER, bounds.width - FIRE_BORDER - w);
    const ymin = rng.uniform(FIRE_BORDER, bounds.height - FIRE_BORDER - h);
    zones.push({
      id: `z_fire_${i + 1}`,
      name: `FireZone-${i + 1}`,
      type: "FIRE_RISK",
      rect: { xmin, xmax: xmin + w, ymin, ymax: ymin + h },
      policy: {
        triggerMode: "ON_ENTER",
        cooldownS,
        probability: 1,
        severity: rng.uniform(0.75, 0.95),
        confidence: rng.uniform(0.75, 0.95),
      },
    });
  }
  return zones;
}

const unit = z.number().min(0).max(1);

const RectSchema = z
  .object({
    xmin: z.number(),
    xmax: z.number(),
    ymin: z.number(),
    ymax: z.number(),
  })
  .refine((r) => r.xmin <= r.xmax && r.ymin <= r.ymax, { message: "rect requires xmin <= xmax and ymin <= ymax" });

const ZoneEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  type: z.enum(ZONE_TYPES),
  rect: RectSchema,
  policy: z
    .object({
      triggerMode: z.enum(["ON_ENTER", "ON_STAY"]).optional(),
      cooldownS: z.number().min(0).optional(),
      probability: unit.optional(),
      severity: unit.optional(),
      confidence: unit.optional(),
    })
    .optional(),
});

export const ZoneFileSchema = z
  .array(ZoneEntrySchema)
  .refine((zones) => new Set(zones.map((zone) => zone.id)).size === zones.length, { message: "zone ids must be unique" });

export type ZoneFileEntry = z.infer<typeof ZoneEntrySchema>;

export function buildZones(entries: ZoneFileEntry[], fireCooldownS: number): Zone[] {
  return entries.map((entry) => {
    const policy = { ...defaultPolicy(entry.type, fireCooldownS), ...entry.policy };
    if (policy.triggerMode === "ON_STAY" && policy.cooldownS <= 0) {
      throw new Error(`Zone ${entry.id}: ON_STAY requires cooldownS > 0`);
    }
    return { id: entry.id, name: entry.name, type: entry.type, rect: { ...entry.rect }, policy };
  });
}

export function loadZonesFile(filePath: string, fireCooldownS: number): Zone[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const parsed = ZoneFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid zones file ${filePath}: ${issue.path.join(".") || "(root)"} ${issue.message}`);
  }
  return buildZones(parsed.data, fireCooldownS);
}

function round3(v: number): number {
  return Math.round(v * 1000) / 1000;
}

/**
 * 1 at the zone center, falling linearly to 0 at the corners.
 * A degenerate (zero-size) rectangle counts as the center everywhere.
 */
export function proximityToCenter(zone: Zone, pos: Vec2): number {
  const { rect } = zone;
  const halfDiagonal = Math.hypot(rect.xmax - rect.xmin, rect.ymax - rect.ymin) / 2;
  if (halfDiagonal === 0) return 1;
  return 1 - Math.min(1, distance(pos, rectCenter(rect)) / halfDiagonal);
}

function eventTypeFor(zone: Zone, entering: boolean): { type: WorldEventType; message: string } {
  switch (zone.type) {
    case "FIRE_RISK":
      return { type: "FIRE_DETECTED", message: `Fire suspected in zone ${zone.name}` };
    case "NO_FLY":
      return { type: "NO_FLY_VIOLATION", message: `No-fly zone violation: ${zone.name}` };
    case "SIGNAL_LOSS":
      return { type: "SIGNAL_LOSS", message: `Signal loss triggered in zone ${zone.name}` };
    case "INFO":
      return { type: entering ? "ENTER_ZONE" : "STAY_IN_ZONE", message: `Zone trigger: ${zone.name}` };
  }
}

export function zoneEvent(zone: Zone, droneId: string, pos: Vec2, ts: number, entering: boolean): WorldEventDraft {
  const { type, message } = eventTypeFor(zone, entering);
  const scale = 0.5 + 0.5 * proximityToCenter(zone, pos);
  return {
    ts,
    type,
    droneId,
    zoneId: zone.id,
    position: { ...pos },
    message,
    payload: { zone_id: zone.id, zone_name: zone.name, zone_type: zone.type, entering },
    severity: round3(zone.policy.severity * scale),
    confidence: round3(zone.policy.confidence * scale),
  };
}
