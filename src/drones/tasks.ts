import type { DroneState, DroneStatus, PathTask, Task, Vec2, WorldBounds } from "./types";
import { clampToBounds, distance, isFiniteVec, moveToward } from "@/world/map";

export const DEFAULT_ARRIVE_EPS = 2.0;
// Waypoint tolerance for PATH tasks. Fixed; GOTO's arrive_eps does not apply here.
export const PATH_ARRIVE_EPS = 0.5;
export const RETURN_ARRIVE_EPS = 0.8;

export interface MotionParams {
  step: number; // distance covered in one tick
  bounds: WorldBounds;
}

export interface TaskStepResult {
  completed: Task | null;
}

/** Raised when a task cannot be evaluated; the clock degrades the drone to HOLD. */
export class TaskFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TaskFault";
  }
}

// `goto_123` for ts=12.3. The epsilon absorbs float error in ts * 10 before truncation.
export function taskIdFor(prefix: string, ts: number): string {
  return `${prefix}_${Math.trunc(ts * 10 + 1e-9)}`;
}

export function statusForTask(task: Task): DroneStatus {
  switch (task.type) {
    case "GOTO":
    case "PATH":
      return "NAVIGATING";
    case "HOLD":
      return "HOLDING";
    case "RETURN_HOME":
      return "RETURNING";
  }
}

// Replaces whatever the drone was doing; cursor and partial progress of the old task are dropped.
export function applyTask(drone: DroneState, task: Task) {
  drone.task = task;
  drone.status = statusForTask(task);
}

export function stepDrone(drone: DroneState, params: MotionParams): TaskStepResult {
  const task = drone.task;
  if (!task) {
    drone.status = "IDLE";
    return { completed: null };
  }

  switch (task.type) {
    case "GOTO":
      return flyTo(drone, task, task.target, task.arriveEps, "NAVIGATING", params);
    case "RETURN_HOME":
      return flyTo(drone, task, task.home, RETURN_ARRIVE_EPS, "RETURNING", params);
    case "PATH":
      return followPath(drone, task, params);
    case "HOLD":
      drone.status = "HOLDING";
      return { completed: null };
    default: {
      const unknown: never = task;
      throw new TaskFault(`Unknown task: ${JSON.stringify(unknown)}`);
    }
  }
}

function flyTo(
  drone: DroneState,
  task: Task,
  target: Vec2,
  arriveEps: number,
  movingStatus: DroneStatus,
  params: MotionParams,
): TaskStepResult {
  if (!isFiniteVec(target)) {
    throw new TaskFault(`${task.type} ${task.id} has a non-finite target`);
  }
  if (!(arriveEps > 0)) {
    throw new TaskFault(`${task.type} ${task.id} has arrive_eps=${arriveEps}`);
  }

  if (distance(drone.position, target) <= arriveEps) {
    drone.position = clampToBounds(target, params.bounds);
    return complete(drone, task);
  }

  drone.position = clampToBounds(moveToward(drone.position, target, params.step), params.bounds);
  drone.status = movingStatus;
  return { completed: null };
}

function followPath(
  drone: DroneState,
  task: PathTask,
  params: MotionParams,
): TaskStepResult {
  const { waypoints, cursor } = task;
  if (waypoints.length === 0) {
    throw new TaskFault(`PATH ${task.id} has no waypoints`);
  }
  if (!Number.isInteger(cursor) || cursor < 0 || cursor >= waypoints.length) {
    throw new TaskFault(`PATH ${task.id} cursor ${cursor} is outside 0..${waypoints.length - 1}`);
  }

  const wp = waypoints[cursor];
  if (!isFiniteVec(wp)) {
    throw new TaskFault(`PATH ${task.id} waypoint ${cursor} is not finite`);
  }

  const dist = distance(drone.position, wp);
  const arrived = dist <= PATH_ARRIVE_EPS || dist <= params.step;
  drone.position = clampToBounds(arrived ? wp : moveToward(drone.position, wp, params.step), params.bounds);
  drone.status = "NAVIGATING";

  if (!arrived) return { completed: null };

  const next = cursor + 1;
  if (next < waypoints.length) {
    task.cursor = next;
  } else if (task.loop) {
    task.cursor = 0;
  } else {
    return complete(drone, task);
  }
  return { completed: null };
}

function complete(drone: DroneState, task: Task): TaskStepResult {
  drone.task = null;
  drone.status = "IDLE";
  return { completed: task };
}

export function cloneTask(task: Task): Task {
  switch (task.type) {
    case "GOTO":
      return { ...task, target: { ...task.target } };
    case "PATH":
      return { ...task, waypoints: task.waypoints.map((wp) => ({ ...wp })) };
    case "HOLD":
      return { ...task };
    case "RETURN_HOME":
      return { ...task, home: { ...task.home } };
  }
}
