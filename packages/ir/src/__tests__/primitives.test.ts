import { describe, expect, it } from "vitest";
import {
  snap,
  isOnGrid,
  formatLiteral,
  formatCount,
  numericFields,
  viaDefName,
  toCompact,
  fromCompact,
  toHostScript,
  toJson,
  RenderError,
  CompactParseError,
  type DrawPrimitive,
} from "../index.js";

const samples: DrawPrimitive[] = [
  {
    kind: "Path",
    layer: "M3",
    points: [{ x: 0, y: 0.19 }, { x: 1.2, y: 0.19 }],
    width: 0.38,
    end: "truncate",
  },
  { kind: "Via", viaDef: "M4_M3", origin: { x: 0.5, y: 0.19 }, rows: 1, columns: 2 },
  {
    kind: "Label",
    layer: "M4",
    origin: { x: 0.6, y: 0.19 },
    text: "TOP",
    justify: "centerCenter",
    orientation: "R0",
    height: 0.1,
  },
  { kind: "Rect", layer: "M5", lowerLeft: { x: 0, y: 0 }, upperRight: { x: 1.43, y: 1.92 } },
  {
    kind: "Mosaic",
    master: "C_MAIN",
    origin: { x: 0, y: 3.84 },
    rows: 2,
    columns: 6,
    pitch: { x: 1.43, y: 1.92 },
  },
];

describe("grid", () => {
  it("snaps to the nearest grid multiple", () => {
    expect(snap(0.0026)).toBe(0.005);
    expect(snap(0.0024)).toBe(0);
    expect(snap(1.4199999)).toBe(1.42);
  });

  it("recognises on-grid values", () => {
    expect(isOnGrid(0.9)).toBe(true);
    expect(isOnGrid(0.0025)).toBe(false);
    expect(isOnGrid(Number.NaN)).toBe(false);
  });

  it("formats literals with three decimals", () => {
    expect(formatLiteral(0.9)).toBe("0.900");
    expect(formatLiteral(-1.2)).toBe("-1.200");
    expect(formatLiteral(0)).toBe("0.000");
  });

  it("refuses off-grid literals", () => {
    expect(() => formatLiteral(0.0025)).toThrow(RenderError);
    expect(() => formatLiteral(Number.POSITIVE_INFINITY)).toThrow(RenderError);
  });

  it("refuses non-positive counts", () => {
    expect(formatCount(3)).toBe("3");
    expect(() => formatCount(0)).toThrow(RenderError);
    expect(() => formatCount(1.5)).toThrow(RenderError);
  });

  it("lists every numeric field", () => {
    expect(numericFields(samples[0])).toEqual([0.38, 0, 0.19, 1.2, 0.19]);
    expect(numericFields(samples[4])).toEqual([0, 3.84, 1.43, 1.92]);
  });

  it("names vias upper layer first", () => {
    expect(viaDefName("M3", "M4")).toBe("M4_M3");
  });
});

describe("compact format", () => {
  it("writes one line per primitive", () => {
    const lines = toCompact(samples).trimEnd().split("\n");
    expect(lines).toEqual([
      "# capforge 0.1",
      "P M3 0.380 truncate 0.000 0.190 1.200 0.190",
      "V M4_M3 0.500 0.190 1 2",
      'L M4 0.600 0.190 0.100 centerCenter R0 "TOP"',
      "R M5 0.000 0.000 1.430 1.920",
      "MOS C_MAIN 0.000 3.840 2 6 1.430 1.920",
    ]);
  });

  it("roundtrips through compact text", () => {
    expect(fromCompact(toCompact(samples))).toEqual(samples);
  });

  it("keeps quoted label text together", () => {
    const [label] = fromCompact('L M4 0.000 0.000 0.100 centerLeft R90 "BOT PLATE"');
    expect(label).toEqual({
      kind: "Label",
      layer: "M4",
      origin: { x: 0, y: 0 },
      height: 0.1,
      justify: "centerLeft",
      orientation: "R90",
      text: "BOT PLATE",
    });
  });

  it("roundtrips label text with backslashes and quotes", () => {
    const texts = ["a\\", 'say "hi" \\', '\\"', "two  spaces\\\\"];
    const labels: DrawPrimitive[] = texts.map((text) => ({
      kind: "Label",
      layer: "M4",
      origin: { x: 0, y: 0 },
      text,
      justify: "centerCenter",
      orientation: "R0",
      height: 0.1,
    }));
    const compact = toCompact(labels);
    expect(compact.split("\n")[1]).toBe('L M4 0.000 0.000 0.100 centerCenter R0 "a\\\\"');
    expect(fromCompact(compact)).toEqual(labels);
  });

  it("reports the failing line", () => {
    expect(() => fromCompact("# capforge 0.1\nQ 1 2")).toThrow(CompactParseError);
    expect(() => fromCompact("# capforge 0.1\nQ 1 2")).toThrow("line 2: Unknown opcode: Q");
  });

  it("rejects a path with a dangling coordinate", () => {
    expect(() => fromCompact("P M3 0.100 truncate 0 0 1 0 2")).toThrow(CompactParseError);
  });

  it("rejects unknown path ends", () => {
    expect(() => fromCompact("P M3 0.100 round 0 0 1 0")).toThrow("Unknown path end: round");
  });

  it("refuses to write an off-grid primitive", () => {
    const bad: DrawPrimitive = {
      kind: "Rect",
      layer: "M5",
      lowerLeft: { x: 0.0025, y: 0 },
      upperRight: { x: 1, y: 1 },
    };
    expect(() => toCompact([bad])).toThrow(RenderError);
  });
});

describe("toJson", () => {
  it("serializes the primitive list", () => {
    expect(JSON.parse(toJson(samples))).toEqual(samples);
  });
});

describe("toHostScript", () => {
  it("emits straight-line create calls between open and close", () => {
    const script = toHostScript(samples, { library: "CAPS", cell: "C_UNIT" });
    expect(script.trimEnd().split("\n")).toEqual([
      'cv = dbOpenCellViewByType("CAPS" "C_UNIT" "layout" "maskLayout" "w")',
      'dbCreatePath(cv list("M3" "drawing") list(list(0.000 0.190) list(1.200 0.190)) 0.380 "truncate")',
      'dbCreateVia(cv techFindViaDefByName(techGetTechFile(cv) "M4_M3") list(0.500 0.190) "R0" list(list("cutRows" 1) list("cutColumns" 2)))',
      'dbCreateLabel(cv list("M4" "pin") list(0.600 0.190) "TOP" "centerCenter" "R0" "roman" 0.100)',
      'dbCreateRect(cv list("M5" "drawing") list(list(0.000 0.000) list(1.430 1.920)))',
      'dbCreateSimpleMosaic(cv dbOpenCellViewByType("CAPS" "C_MAIN" "layout") nil list(0.000 3.840) "R0" 2 6 1.920 1.430)',
      "dbSave(cv)",
      "dbClose(cv)",
    ]);
  });

  it("opens mosaic masters from their own library", () => {
    const script = toHostScript([samples[4]], {
      library: "ARRAYS",
      cell: "C_CDAC",
      masterLibrary: "UNITS",
    });
    expect(script).toContain('dbOpenCellViewByType("UNITS" "C_MAIN" "layout")');
  });

  it("never emits control flow", () => {
    const script = toHostScript(samples, { library: "CAPS", cell: "C_UNIT" });
    expect(script).not.toMatch(/\b(for|foreach|if|when|procedure|let)\(/);
  });
});
