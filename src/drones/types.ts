export interface Vec2 {
  x: number;
  y: number;
}

export type DroneStatus = "IDLE" | "NAVIGATING" | "HOLDING" | "RETURNING";

export interface GotoTask {
  type: "GOTO";
  id: string;
  target: Vec2;
  arriveEps: number;
}

export interface PathTask {
  type: "PATH";
  id: string;
  waypoints: Vec2[];
  loop: boolean;
  cursor: number; // index of the waypoint currently being flown to
}

export interface HoldTask {
  type: "HOLD";
  id: string;
}

// Issued by the engine on low battery; never accepted over the wire.
export interface ReturnHomeTask {
  type: "RETURN_HOME";
  id: string;
  home: Vec2;
}

export type Task = GotoTask | PathTask | HoldTask | ReturnHomeTask;
export type TaskType = Task["type"];

export interface DroneState {
  id: string;
  position: Vec2;
  home: Vec2;
  status: DroneStatus;
  battery: number; // 0-100
  task: Task | null;
  lowBatteryReported: boolean;
}

export interface Rect {
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
}

export type ZoneType = "FIRE_RISK" | "NO_FLY" | "SIGNAL_LOSS" | "INFO";

export type TriggerMode = "ON_ENTER" | "ON_STAY";

export interface ZoneEventPolicy {
  triggerMode: TriggerMode;
  cooldownS: number;
  probability: number; // 0-1
  severity: number; // base value, scaled by proximity to the zone center
  confidence: number;
}

export interface Zone {
  id: string;
  name: string;
  type: ZoneType;
  rect: Rect;
  policy: ZoneEventPolicy;
}

export type WorldEventType =
  | "FIRE_DETECTED"
  | "NO_FLY_VIOLATION"
  | "SIGNAL_LOSS"
  | "ENTER_ZONE"
  | "STAY_IN_ZONE"
  | "BATTERY_LOW"
  | "TASK_FAULT";

export interface WorldEvent {
  seq: number;
  ts: number;
  type: WorldEventType;
  droneId: string | null;
  zoneId: string | null;
  position: Vec2 | null;
  message: string;
  payload: Record<string, unknown>;
  severity: number;
  confidence: number;
}

export type WorldEventDraft = Omit<WorldEvent, "seq">;

export interface WorldBounds {
  width: number;
  height: number;
}

// Published to listeners after a tick commits.
export type SimulationEvent =
  | { type: "world_event" | "task_fault"; data: WorldEvent; timestamp: number }
  | { type: "task_completed"; data: { droneId: string; taskId: string; taskType: TaskType }; timestamp: number }
  | { type: "tick"; data: { tick: number }; timestamp: number };
