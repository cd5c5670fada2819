import { describe, it, expect } from "vitest";
import { GeometryError } from "../errors.js";
import { seededRng } from "../shapes/index.js";
import { assembleArray, mergeMosaic, toMosaicPlacements, type ArrayGrid, type MosaicRegion } from "../mosaic.js";

function fullGrid(rows: number, cols: number): ArrayGrid {
  return {
    occupancy: Array.from({ length: rows }, () => Array.from({ length: cols }, () => true)),
    pitch: { x: 2.5, y: 3 },
    origin: { x: 1, y: 0.5 },
  };
}

function coveredCells(regions: MosaicRegion[]): string[] {
  const cells: string[] = [];
  for (const r of regions) {
    for (let row = r.rowStart; row <= r.rowEnd; row++) {
      for (let col = r.colStart; col <= r.colEnd; col++) {
        cells.push(`${row},${col}`);
      }
    }
  }
  return cells;
}

function occupiedCells(grid: ArrayGrid): string[] {
  const cells: string[] = [];
  grid.occupancy.forEach((row, r) =>
    row.forEach((occupied, c) => {
      if (occupied) cells.push(`${r},${c}`);
    }),
  );
  return cells;
}

describe("mergeMosaic", () => {
  it("covers a full grid with one region", () => {
    expect(mergeMosaic(fullGrid(6, 12))).toEqual([
      { rowStart: 0, rowEnd: 5, colStart: 0, colEnd: 11, master: "unit" },
    ]);
  });

  it("splits around a single interior hole into four regions", () => {
    const grid = fullGrid(6, 12);
    grid.occupancy[2][5] = false;
    expect(mergeMosaic(grid)).toEqual([
      { rowStart: 0, rowEnd: 1, colStart: 0, colEnd: 11, master: "unit" },
      { rowStart: 2, rowEnd: 2, colStart: 0, colEnd: 4, master: "unit" },
      { rowStart: 2, rowEnd: 2, colStart: 6, colEnd: 11, master: "unit" },
      { rowStart: 3, rowEnd: 5, colStart: 0, colEnd: 11, master: "unit" },
    ]);
  });

  it("covers exactly the occupied cells, once each", () => {
    const grid: ArrayGrid = {
      occupancy: [
        [true, true, false, true],
        [true, true, false, true],
        [false, true, true, true],
        [true, false, true, false],
      ],
      pitch: { x: 1, y: 1 },
      origin: { x: 0, y: 0 },
    };
    const covered = coveredCells(mergeMosaic(grid));
    expect(new Set(covered).size).toBe(covered.length);
    expect([...covered].sort()).toEqual(occupiedCells(grid).sort());
  });

  it("covers random grids exactly, with no overlap", () => {
    for (let seed = 1; seed <= 60; seed++) {
      const rng = seededRng(seed);
      const rows = 1 + Math.floor(rng() * 8);
      const cols = 1 + Math.floor(rng() * 10);
      const choices = [null, "unit", "dummy"];
      const grid: ArrayGrid = {
        occupancy: Array.from({ length: rows }, () => Array.from({ length: cols }, () => rng() < 0.7)),
        pitch: { x: 1, y: 1 },
        origin: { x: 0, y: 0 },
        masters:
          seed % 2 === 0
            ? Array.from({ length: rows }, () => Array.from({ length: cols }, () => choices[Math.floor(rng() * 3)]))
            : undefined,
      };
      const masterOf = (r: number, c: number): string => grid.masters?.[r]?.[c] ?? "unit";

      const regions = mergeMosaic(grid);
      const covered = coveredCells(regions);
      const occupied = occupiedCells(grid);
      expect(new Set(covered).size, `seed ${seed}`).toBe(covered.length);
      expect([...covered].sort(), `seed ${seed}`).toEqual([...occupied].sort());
      for (const r of regions) {
        for (let row = r.rowStart; row <= r.rowEnd; row++) {
          for (let col = r.colStart; col <= r.colEnd; col++) {
            expect(masterOf(row, col), `seed ${seed}`).toBe(r.master);
          }
        }
      }

      const mergeable = grid.occupancy.some((cells, r) =>
        cells.some((cell, c) => cell && cells[c + 1] === true && masterOf(r, c) === masterOf(r, c + 1)),
      );
      if (mergeable) expect(regions.length, `seed ${seed}`).toBeLessThan(occupied.length);
    }
  });

  it("never merges cells with different masters", () => {
    const grid: ArrayGrid = {
      ...fullGrid(2, 4),
      masters: [
        ["dummy", "unit", "unit", "dummy"],
        ["dummy", "unit", "unit", "dummy"],
      ],
    };
    expect(mergeMosaic(grid)).toEqual([
      { rowStart: 0, rowEnd: 1, colStart: 0, colEnd: 0, master: "dummy" },
      { rowStart: 0, rowEnd: 1, colStart: 1, colEnd: 2, master: "unit" },
      { rowStart: 0, rowEnd: 1, colStart: 3, colEnd: 3, master: "dummy" },
    ]);
  });

  it("uses the default master where the grid names none", () => {
    const grid: ArrayGrid = { ...fullGrid(1, 2), masters: [[null, "cap"]] };
    expect(mergeMosaic(grid, "unit_cap").map((r) => r.master)).toEqual(["unit_cap", "cap"]);
  });

  it("does not stack runs with different spans", () => {
    const grid: ArrayGrid = {
      occupancy: [
        [true, true, true],
        [true, true, false],
      ],
      pitch: { x: 1, y: 1 },
      origin: { x: 0, y: 0 },
    };
    expect(mergeMosaic(grid)).toHaveLength(2);
  });

  it("returns nothing for an empty grid", () => {
    expect(mergeMosaic({ occupancy: [[false, false]], pitch: { x: 1, y: 1 }, origin: { x: 0, y: 0 } })).toEqual([]);
  });
});

describe("toMosaicPlacements", () => {
  it("places each region from the grid origin and pitch", () => {
    const grid = fullGrid(6, 12);
    const placements = toMosaicPlacements(
      [{ rowStart: 2, rowEnd: 2, colStart: 6, colEnd: 11, master: "unit" }],
      grid,
    );
    expect(placements).toEqual([
      {
        kind: "Mosaic",
        master: "unit",
        origin: { x: 16, y: 6.5 },
        rows: 1,
        columns: 6,
        pitch: { x: 2.5, y: 3 },
      },
    ]);
  });

  it("rejects a non-positive pitch", () => {
    const grid = { ...fullGrid(1, 1), pitch: { x: 0, y: 1 } };
    expect(() => toMosaicPlacements(mergeMosaic(grid), grid)).toThrow(GeometryError);
  });

  it("rejects an off-grid pitch or origin instead of rounding it", () => {
    const offPitch = { ...fullGrid(1, 1), pitch: { x: 0.0125, y: 1 } };
    expect(() => toMosaicPlacements(mergeMosaic(offPitch), offPitch)).toThrow(
      "pitch: (0.0125, 1) is off grid",
    );
    const tinyPitch = { ...fullGrid(1, 1), pitch: { x: 1, y: 0.001 } };
    expect(() => toMosaicPlacements(mergeMosaic(tinyPitch), tinyPitch)).toThrow(
      "pitch: (1, 0.001) is off grid",
    );
    const offOrigin = { ...fullGrid(1, 1), origin: { x: 0.002, y: 0 } };
    expect(() => toMosaicPlacements(mergeMosaic(offOrigin), offOrigin)).toThrow(
      "origin: (0.002, 0) is off grid",
    );
  });
});

describe("assembleArray", () => {
  it("returns one placement per region", () => {
    const grid = fullGrid(6, 12);
    grid.occupancy[0][0] = false;
    const { regions, primitives } = assembleArray(grid);
    expect(primitives).toHaveLength(regions.length);
    expect(primitives.reduce((n, p) => n + p.rows * p.columns, 0)).toBe(71);
  });
});
