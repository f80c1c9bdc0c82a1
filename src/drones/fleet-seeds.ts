import type { Vec2, WorldBounds } from "./types";

export interface DroneSeed {
  id: string;
  position: Vec2;
}

const CORNER_MARGIN = 5;
const DOCK_SPACING = 4;

// Scouts start in the four corners, firefighters on a dock row along the bottom edge.
export function defaultFleet(bounds: WorldBounds): DroneSeed[] {
  const { width, height } = bounds;
  const scouts: DroneSeed[] = [
    { id: "D1", position: { x: CORNER_MARGIN, y: CORNER_MARGIN } },
    { id: "D2", position: { x: width - CORNER_MARGIN, y: CORNER_MARGIN } },
    { id: "D3", position: { x: CORNER_MARGIN, y: height - CORNER_MARGIN } },
    { id: "D4", position: { x: width - CORNER_MARGIN, y: height - CORNER_MARGIN } },
  ];

  const dockX0 = width * 0.5 - 6;
  const firefighters: DroneSeed[] = [0, 1, 2, 3].map((i) => ({
    id: `FD${i + 1}`,
    position: { x: dockX0 + i * DOCK_SPACING, y: CORNER_MARGIN },
  }));

  return [...scouts, ...firefighters];
}
