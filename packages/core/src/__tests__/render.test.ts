import { describe, it, expect } from "vitest";
import { isOnGrid, numericFields, type DrawPrimitive } from "@capforge/ir";
import { render } from "../render.js";
import { computeGeometry } from "../shapes/index.js";
import { hExample, iExample, sandwichExample, t28 } from "./fixtures.js";

const hGeometry = computeGeometry(hExample, t28);

function kinds(primitives: DrawPrimitive[]): string[] {
  return primitives.map((p) => (p.kind === "Path" || p.kind === "Rect" || p.kind === "Label" ? `${p.kind}:${p.layer}` : p.kind));
}

describe("render", () => {
  it("draws 13 paths per layer, 12 vias and 2 labels with the shield", () => {
    const prims = render(hGeometry, hExample, true);
    expect(prims).toHaveLength(79);
    expect(prims.filter((p) => p.kind === "Path")).toHaveLength(65);
    expect(prims.filter((p) => p.kind === "Via")).toHaveLength(12);
    expect(prims.filter((p) => p.kind === "Label")).toHaveLength(2);
  });

  it("draws 59 primitives without the shield", () => {
    expect(render(hGeometry, hExample, false)).toHaveLength(59);
  });

  it("walks layers bottom to top with vias after each layer's metal", () => {
    const prims = render(hGeometry, hExample, false);
    expect(prims[0]).toEqual({
      kind: "Path",
      layer: "M3",
      points: [
        { x: 0.18, y: 1.49 },
        { x: 0.71, y: 1.49 },
      ],
      width: 0.38,
      end: "truncate",
    });
    expect(kinds(prims.slice(8, 12))).toEqual(["Path:M3", "Via", "Via", "Via"]);
    expect(prims[9]).toEqual({
      kind: "Via",
      viaDef: "M4_M3",
      origin: { x: 0.445, y: 1.49 },
      rows: 1,
      columns: 1,
    });
    expect(kinds(prims.slice(-3))).toEqual(["Path:M7", "Label:M7", "Label:M7"]);
  });

  it("labels both pins", () => {
    const prims = render(hGeometry, { ...hExample, labelHeight: 0.2 }, true);
    expect(prims.slice(-2)).toEqual([
      {
        kind: "Label",
        layer: "M7",
        origin: { x: 0.445, y: 1.49 },
        text: "TOP",
        justify: "centerCenter",
        orientation: "R0",
        height: 0.2,
      },
      {
        kind: "Label",
        layer: "M7",
        origin: { x: 0.445, y: 0.93 },
        text: "BOT",
        justify: "centerCenter",
        orientation: "R0",
        height: 0.2,
      },
    ]);
  });

  it("drops only the shield frame when the shield is off", () => {
    const shielded = render(hGeometry, hExample, true);
    const bare = render(hGeometry, hExample, false);
    const frameWidth = hGeometry.frameWidth;
    expect(shielded.filter((p) => !(p.kind === "Path" && p.width === frameWidth))).toEqual(bare);
  });

  it("draws two bars and four fingers per I-shape layer", () => {
    const prims = render(computeGeometry(iExample, t28), iExample, false);
    expect(prims).toHaveLength(16);
  });

  it("renders the sandwich plates as rectangles", () => {
    const prims = render(computeGeometry(sandwichExample, t28), sandwichExample, false);
    expect(prims).toHaveLength(18);
    expect(kinds(prims.slice(0, 3))).toEqual(["Rect:M5", "Via", "Via"]);
    expect(kinds(prims.slice(-3))).toEqual(["Rect:M7", "Label:M7", "Label:M6"]);
  });

  it("emits only grid values", () => {
    for (const p of render(hGeometry, hExample, true)) {
      for (const v of numericFields(p)) {
        expect(isOnGrid(v)).toBe(true);
      }
    }
  });

  it("is deterministic", () => {
    expect(render(hGeometry, hExample, true)).toEqual(render(computeGeometry(hExample, t28), hExample, true));
  });
});
