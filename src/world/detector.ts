import type { Vec2, WorldEventDraft, Zone } from "@/drones/types";
import { rectContains } from "./map";
import { DeterministicRNG } from "./random";
import { zoneEvent } from "./zones";

function pairKey(droneId: string, zoneId: string): string {
  return `${droneId}|${zoneId}`;
}

/**
 * Point-in-zone checks with per (drone, zone) debounce.
 *
 * An ON_ENTER zone fires on the outside -> inside transition only; a drone
 * that starts the session inside a zone counts as entering on the first pass,
 * and every new dwell fires. An ON_STAY zone fires at most once per cool-down
 * while the drone stays inside.
 */
export class ZoneDetector {
  private inside = new Map<string, Set<string>>();
  private lastFired = new Map<string, number>();

  constructor(private readonly rng: DeterministicRNG) {}

  detect(positions: Map<string, Vec2>, zones: readonly Zone[], ts: number): WorldEventDraft[] {
    const events: WorldEventDraft[] = [];

    for (const [droneId, pos] of positions) {
      const previous = this.inside.get(droneId) ?? new Set<string>();
      const insideNow = new Set<string>();

      for (const zone of zones) {
        if (!rectContains(zone.rect, pos)) continue;
        insideNow.add(zone.id);

        const entering = !previous.has(zone.id);
        if (!this.shouldFire(zone, droneId, ts, entering)) continue;

        events.push(zoneEvent(zone, droneId, pos, ts, entering));
        this.lastFired.set(pairKey(droneId, zone.id), ts);
      }

      this.inside.set(droneId, insideNow);
    }

    return events;
  }

  isInside(droneId: string, zoneId: string): boolean {
    return this.inside.get(droneId)?.has(zoneId) ?? false;
  }

  private shouldFire(zone: Zone, droneId: string, ts: number, entering: boolean): boolean {
    const { policy } = zone;
    if (policy.triggerMode === "ON_ENTER") {
      if (!entering) return false;
    } else {
      const last = this.lastFired.get(pairKey(droneId, zone.id));
      if (last !== undefined && ts - last < policy.cooldownS) return false;
    }

    // A failed draw does not arm the cool-down.
    if (policy.probability < 1 && this.rng.next() >= policy.probability) return false;
    return true;
  }
}
