import type { SimConfig } from "@/config";
import { defaultFleet } from "@/drones/fleet-seeds";
import type { Zone } from "@/drones/types";
import { CommandSurface } from "@/commands/surface";
import { ZoneDetector } from "@/world/detector";
import { WorldLock } from "@/world/lock";
import { DeterministicRNG } from "@/world/random";
import { Simulation } from "@/world/simulation";
import { type WorldState, createWorld } from "@/world/world";
import { generateFireZones, loadZonesFile } from "@/world/zones";

export interface Runtime {
  config: SimConfig;
  world: WorldState;
  simulation: Simulation;
  surface: CommandSurface;
  seed: number;
}

export interface RuntimeOverrides {
  zones?: Zone[]; // skips ZONES_FILE and random generation
}

/** One world, one lock, shared by the clock and the command surface. */
export function createRuntime(config: SimConfig, overrides: RuntimeOverrides = {}): Runtime {
  const seed = config.zoneSeed ?? Math.floor(Math.random() * 0x100000000);
  const rng = new DeterministicRNG(seed);

  const zones =
    overrides.zones ??
    (config.zonesFile
      ? loadZonesFile(config.zonesFile, config.fireZoneCooldownS)
      : generateFireZones(rng, config.world, config.fireZoneCooldownS));

  const world = createWorld({
    bounds: config.world,
    drones: defaultFleet(config.world),
    zones,
    eventLogCapacity: config.eventLogCapacity,
  });

  const lock = new WorldLock();
  const simulation = new Simulation(world, lock, new ZoneDetector(rng), {
    dt: config.dt,
    speed: config.droneSpeed,
    batteryDrainPerS: config.batteryDrainPerS,
    batteryLowThreshold: config.batteryLowThreshold,
  });
  const surface = new CommandSurface(world, lock, config.recentEventsLimit);

  return { config, world, simulation, surface, seed };
}
