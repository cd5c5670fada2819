import type { Point } from "@capforge/ir";
import { ParameterError } from "./errors.js";
import type { ArrayGrid } from "./mosaic.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readPoint(value: unknown, field: string): Point {
  if (!isRecord(value) || typeof value.x !== "number" || typeof value.y !== "number") {
    throw new ParameterError("must be an object with numeric x and y", field);
  }
  return { x: value.x, y: value.y };
}

function readMatrix<T>(
  value: unknown,
  field: string,
  isCell: (cell: unknown) => cell is T,
  expected: string,
): T[][] {
  if (!Array.isArray(value)) throw new ParameterError("must be an array of rows", field);
  return value.map((row: unknown, r) => {
    if (!Array.isArray(row) || !row.every(isCell)) {
      throw new ParameterError(`row ${r} must be an array of ${expected}`, field);
    }
    return [...row];
  });
}

const isBoolean = (cell: unknown): cell is boolean => typeof cell === "boolean";
const isMaster = (cell: unknown): cell is string | null => cell === null || typeof cell === "string";

/**
 * Narrow untyped input to an {@link ArrayGrid}. Occupancy rows may also be
 * strings of `#` (occupied) and `.` (empty).
 *
 * @throws ParameterError naming the first bad field.
 */
export function parseArrayGrid(raw: unknown): ArrayGrid {
  if (!isRecord(raw)) throw new ParameterError("grid must be an object", "<root>");

  const rows = raw.occupancy;
  const occupancy =
    Array.isArray(rows) && rows.every((row): row is string => typeof row === "string")
      ? rows.map((row) => [...row].map((c) => c === "#"))
      : readMatrix(rows, "occupancy", isBoolean, "booleans");

  return {
    occupancy,
    pitch: readPoint(raw.pitch, "pitch"),
    origin: raw.origin === undefined ? { x: 0, y: 0 } : readPoint(raw.origin, "origin"),
    masters:
      raw.masters === undefined
        ? undefined
        : readMatrix(raw.masters, "masters", isMaster, "master names or null"),
  };
}
