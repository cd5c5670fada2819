import { describe, it, expect } from "vitest";
import { ParameterError } from "../errors.js";
import { parseArrayGrid } from "../grid.js";
import { parseShapeParameters } from "../params.js";
import { hExample } from "./fixtures.js";

function errorField(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ParameterError) return err.field;
    throw err;
  }
  return undefined;
}

describe("parseShapeParameters", () => {
  it("accepts a plain parameter object", () => {
    const parsed = parseShapeParameters(JSON.parse(JSON.stringify({ ...hExample, shield: false })));
    expect(parsed).toEqual({
      ...hExample,
      shield: false,
      maxHeight: undefined,
      lowParasitic: undefined,
      labelHeight: undefined,
    });
  });

  it("names the first bad field", () => {
    expect(errorField(() => parseShapeParameters({ ...hExample, shape: "x" }))).toBe("shape");
    expect(errorField(() => parseShapeParameters({ ...hExample, spacing: "0.07" }))).toBe("spacing");
    expect(errorField(() => parseShapeParameters({ ...hExample, layers: "M7" }))).toBe("layers");
    expect(errorField(() => parseShapeParameters({ ...hExample, shield: "yes" }))).toBe("shield");
    expect(errorField(() => parseShapeParameters([]))).toBe("<root>");
  });

  it("reports a missing field as required", () => {
    const { spacing: _spacing, ...rest } = hExample;
    expect(() => parseShapeParameters(rest)).toThrow("spacing: is required");
  });
});

describe("parseArrayGrid", () => {
  it("reads boolean rows", () => {
    const grid = parseArrayGrid({ occupancy: [[true, false]], pitch: { x: 1, y: 2 } });
    expect(grid).toEqual({
      occupancy: [[true, false]],
      pitch: { x: 1, y: 2 },
      origin: { x: 0, y: 0 },
      masters: undefined,
    });
  });

  it("reads rows drawn as strings", () => {
    const grid = parseArrayGrid({ occupancy: ["##.#", "...."], pitch: { x: 1, y: 1 } });
    expect(grid.occupancy).toEqual([
      [true, true, false, true],
      [false, false, false, false],
    ]);
  });

  it("reads masters", () => {
    const grid = parseArrayGrid({ occupancy: ["##"], pitch: { x: 1, y: 1 }, masters: [["dummy", null]] });
    expect(grid.masters).toEqual([["dummy", null]]);
  });

  it("names the bad field", () => {
    expect(errorField(() => parseArrayGrid({ occupancy: ["#"] }))).toBe("pitch");
    expect(errorField(() => parseArrayGrid({ occupancy: [[1]], pitch: { x: 1, y: 1 } }))).toBe("occupancy");
    expect(
      errorField(() => parseArrayGrid({ occupancy: ["#"], pitch: { x: 1, y: 1 }, masters: [[3]] })),
    ).toBe("masters");
  });
});
