import type { Rect, Task, Vec2, WorldEvent, Zone } from "@/drones/types";
import type { AssignResult, DroneSnapshot, WorldSnapshot } from "@/commands/surface";

// JSON shapes served over HTTP and the WebSocket stream (snake_case on the wire).

export type TaskWire =
  | { type: "GOTO"; id: string; target: Vec2; arrive_eps: number }
  | { type: "PATH"; id: string; waypoints: Vec2[]; loop: boolean; cursor: number }
  | { type: "HOLD"; id: string }
  | { type: "RETURN_HOME"; id: string; home: Vec2 };

export interface DroneWire {
  id: string;
  pos: Vec2;
  status: string;
  battery: number;
  task: TaskWire | null;
}

export interface ZoneWire {
  id: string;
  name: string;
  type: string;
  rect: Rect;
}

export interface EventWire {
  seq: number;
  ts: number;
  type: string;
  drone_id: string | null;
  zone_id: string | null;
  pos: Vec2 | null;
  message: string;
  payload: Record<string, unknown>;
  severity: number;
  confidence: number;
}

export interface StateResponse {
  ts: number;
  tick: number;
  drones: DroneWire[];
  zones: ZoneWire[];
  recent_events: EventWire[];
}

export type AssignResultWire =
  | { ok: true; drone_id: string; assigned: TaskWire }
  | { ok: false; drone_id: string; error: string };

export function taskToWire(task: Task): TaskWire {
  switch (task.type) {
    case "GOTO":
      return { type: "GOTO", id: task.id, target: { ...task.target }, arrive_eps: task.arriveEps };
    case "PATH":
      return {
        type: "PATH",
        id: task.id,
        waypoints: task.waypoints.map((wp) => ({ x: wp.x, y: wp.y })),
        loop: task.loop,
        cursor: task.cursor,
      };
    case "HOLD":
      return { type: "HOLD", id: task.id };
    case "RETURN_HOME":
      return { type: "RETURN_HOME", id: task.id, home: { ...task.home } };
  }
}

function droneToWire(d: DroneSnapshot): DroneWire {
  return {
    id: d.id,
    pos: { x: d.position.x, y: d.position.y },
    status: d.status,
    battery: d.battery,
    task: d.task ? taskToWire(d.task) : null,
  };
}

function zoneToWire(z: Zone): ZoneWire {
  return { id: z.id, name: z.name, type: z.type, rect: { ...z.rect } };
}

export function eventToWire(e: WorldEvent): EventWire {
  return {
    seq: e.seq,
    ts: e.ts,
    type: e.type,
    drone_id: e.droneId,
    zone_id: e.zoneId,
    pos: e.position ? { ...e.position } : null,
    message: e.message,
    payload: e.payload,
    severity: e.severity,
    confidence: e.confidence,
  };
}

export function snapshotToWire(s: WorldSnapshot): StateResponse {
  return {
    ts: s.ts,
    tick: s.tick,
    drones: s.drones.map(droneToWire),
    zones: s.zones.map(zoneToWire),
    recent_events: s.events.map(eventToWire),
  };
}

export function assignResultToWire(r: AssignResult): AssignResultWire {
  return r.ok
    ? { ok: true, drone_id: r.droneId, assigned: taskToWire(r.assigned) }
    : { ok: false, drone_id: r.droneId, error: r.error };
}
