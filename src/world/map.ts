import type { Rect, Vec2, WorldBounds } from "@/drones/types";

export function distance(a: Vec2, b: Vec2): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return Math.sqrt(dx * dx + dy * dy);
}

// Straight-line motion: lands exactly on the target once it is closer than one step.
export function moveToward(current: Vec2, target: Vec2, step: number): Vec2 {
  const dx = target.x - current.x;
  const dy = target.y - current.y;
  const dist = Math.sqrt(dx * dx + dy * dy);

  if (dist < step) {
    return { ...target };
  }

  return {
    x: current.x + (dx / dist) * step,
    y: current.y + (dy / dist) * step,
  };
}

export function rectContains(rect: Rect, p: Vec2): boolean {
  return p.x >= rect.xmin && p.x <= rect.xmax && p.y >= rect.ymin && p.y <= rect.ymax;
}

export function rectCenter(rect: Rect): Vec2 {
  return {
    x: (rect.xmin + rect.xmax) / 2,
    y: (rect.ymin + rect.ymax) / 2,
  };
}

export function clampToBounds(p: Vec2, bounds: WorldBounds): Vec2 {
  return {
    x: Math.max(0, Math.min(bounds.width, p.x)),
    y: Math.max(0, Math.min(bounds.height, p.y)),
  };
}

export function inBounds(p: Vec2, bounds: WorldBounds): boolean {
  return p.x >= 0 && p.x <= bounds.width && p.y >= 0 && p.y <= bounds.height;
}

export function isFiniteVec(p: Vec2): boolean {
  return Number.isFinite(p.x) && Number.isFinite(p.y);
}
