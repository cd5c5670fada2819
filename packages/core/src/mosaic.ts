/**
 * Array mosaic optimizer.
 *
 * A capacitor DAC array is a dense grid of unit-cell placements. Instead of
 * one placement per cell, the array is covered by rectangular regions, each
 * drawn as a single repeated placement.
 */

import { isOnGrid, snap, snapPoint, type MosaicPrimitive, type Point } from "@capforge/ir";
import { GeometryError } from "./errors.js";

/** Occupancy of an array. Row 0 is the bottom row; rows grow in +y. */
export interface ArrayGrid {
  occupancy: boolean[][];
  /** Column pitch in `x`, row pitch in `y` (µm). */
  pitch: Point;
  /** Lower-left corner of cell (0, 0). */
  origin: Point;
  /** Master per cell, e.g. unit vs. dummy capacitor. Missing entries use the default master. */
  masters?: (string | null)[][];
}

/** Inclusive block of cells repeating one master. */
export interface MosaicRegion {
  rowStart: number;
  rowEnd: number;
  colStart: number;
  colEnd: number;
  master: string;
}

/** Master placed where the grid names none. */
export const DEFAULT_MASTER = "unit";

function masterAt(grid: ArrayGrid, row: number, col: number, fallback: string): string {
  return grid.masters?.[row]?.[col] ?? fallback;
}

/**
 * Cover the occupied cells with disjoint rectangles.
 *
 * Horizontal runs of same-master cells are found first, then runs with the
 * same column span and master in consecutive rows are stacked. Regions come
 * back ordered by `(rowStart, colStart)`.
 */
export function mergeMosaic(grid: ArrayGrid, defaultMaster: string = DEFAULT_MASTER): MosaicRegion[] {
  const regions: MosaicRegion[] = [];
  let open = new Map<string, MosaicRegion>();

  grid.occupancy.forEach((cells, row) => {
    const next = new Map<string, MosaicRegion>();
    let col = 0;
    while (col < cells.length) {
      if (!cells[col]) {
        col++;
        continue;
      }
      const master = masterAt(grid, row, col, defaultMaster);
      const start = col;
      while (col + 1 < cells.length && cells[col + 1] && masterAt(grid, row, col + 1, defaultMaster) === master) {
        col++;
      }

      const key = `${start}:${col}:${master}`;
      const above = open.get(key);
      if (above) {
        above.rowEnd = row;
        next.set(key, above);
      } else {
        const region = { rowStart: row, rowEnd: row, colStart: start, colEnd: col, master };
        regions.push(region);
        next.set(key, region);
      }
      col++;
    }
    open = next;
  });

  return regions.sort((a, b) => a.rowStart - b.rowStart || a.colStart - b.colStart);
}

/**
 * One `Mosaic` primitive per region.
 *
 * @throws GeometryError when the pitch is not positive or the pitch or origin is off grid.
 */
export function toMosaicPlacements(regions: readonly MosaicRegion[], grid: ArrayGrid): MosaicPrimitive[] {
  if (!(grid.pitch.x > 0 && grid.pitch.y > 0)) {
    throw new GeometryError(
      `must be > 0 in both directions, got (${grid.pitch.x}, ${grid.pitch.y})`,
      "non-positive-span",
      "pitch",
    );
  }
  for (const [field, point] of [["pitch", grid.pitch], ["origin", grid.origin]] as const) {
    if (!isOnGrid(point.x) || !isOnGrid(point.y)) {
      throw new GeometryError(`(${point.x}, ${point.y}) is off grid`, "off-grid", field);
    }
  }
  const pitch = snapPoint(grid.pitch);
  return regions.map((r): MosaicPrimitive => ({
    kind: "Mosaic",
    master: r.master,
    origin: {
      x: snap(grid.origin.x + r.colStart * pitch.x),
      y: snap(grid.origin.y + r.rowStart * pitch.y),
    },
    rows: r.rowEnd - r.rowStart + 1,
    columns: r.colEnd - r.colStart + 1,
    pitch,
  }));
}

export interface AssembledArray {
  regions: MosaicRegion[];
  primitives: MosaicPrimitive[];
}

/** Merge a grid and place its regions. */
export function assembleArray(grid: ArrayGrid, defaultMaster?: string): AssembledArray {
  const regions = mergeMosaic(grid, defaultMaster);
  return { regions, primitives: toMosaicPlacements(regions, grid) };
}
