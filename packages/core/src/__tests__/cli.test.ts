import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { buildProgram, main } from "../cli.js";
import { hExample } from "./fixtures.js";

async function run(...args: string[]): Promise<void> {
  await buildProgram().exitOverride().parseAsync(["node", "capforge", ...args]);
}

describe("capforge cli", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "capforge-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  function writeJson(name: string, value: unknown): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, JSON.stringify(value));
    return file;
  }

  it("lists the built-in technologies", async () => {
    await run("techs");
    expect(vi.mocked(console.log)).toHaveBeenCalledTimes(2);
    expect(vi.mocked(console.log)).toHaveBeenNthCalledWith(
      1,
      "t28: layers M1,M2,M3,M4,M5,M6,M7,M8,M9, min spacing 0.05, min width 0.05, widths 0.38 + n × 0.52",
    );
  });

  it("prints a reproducible sample", async () => {
    await run("sample", "--shape", "i", "--seed", "3");
    await run("sample", "--shape", "i", "--seed", "3");
    const [first, second] = vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
    expect(JSON.parse(first).shape).toBe("i");
    expect(first).toBe(second);
  });

  it("compiles a parameter file to compact text", async () => {
    const params = writeJson("h.json", hExample);
    const out = path.join(dir, "out", "h.txt");
    await run("compile", params, "--format", "compact", "--output", out);

    const lines = fs.readFileSync(out, "utf-8").trim().split("\n");
    expect(lines[0]).toBe("# capforge 0.1");
    expect(lines).toHaveLength(80);
    expect(process.exitCode).toBeUndefined();
  });

  it("leaves the shield out with --no-shield", async () => {
    const params = writeJson("h.json", hExample);
    const out = path.join(dir, "h.json.out");
    await run("compile", params, "--no-shield", "-o", out);
    expect(JSON.parse(fs.readFileSync(out, "utf-8"))).toHaveLength(59);
  });

  it("writes a host script", async () => {
    const params = writeJson("h.json", hExample);
    const out = path.join(dir, "h.il");
    await run("compile", params, "-f", "script", "--library", "lib", "--cell", "mom", "-o", out);
    const lines = fs.readFileSync(out, "utf-8").trim().split("\n");
    expect(lines[0]).toBe('cv = dbOpenCellViewByType("lib" "mom" "layout" "maskLayout" "w")');
    expect(lines.slice(-2)).toEqual(["dbSave(cv)", "dbClose(cv)"]);
  });

  it("reports violations and sets the exit code", async () => {
    const params = writeJson("h.json", { ...hExample, maxHeight: 1 });
    await run("validate", params);
    expect(vi.mocked(console.log)).toHaveBeenLastCalledWith("Rejected with 1 violation(s)");
    expect(process.exitCode).toBe(1);
  });

  it("merges an array grid", async () => {
    const grid = writeJson("grid.json", { occupancy: ["####", "##.#"], pitch: { x: 2, y: 2 } });
    const out = path.join(dir, "grid.out");
    await run("mosaic", grid, "-o", out);
    expect(vi.mocked(console.error)).toHaveBeenCalledWith("7 cells in 3 region(s)");
    expect(JSON.parse(fs.readFileSync(out, "utf-8"))).toHaveLength(3);
  });

  it("prints thrown errors and exits with 1", async () => {
    await main(["node", "capforge", "compile", path.join(dir, "missing.json")]);
    expect(vi.mocked(console.error)).toHaveBeenCalledTimes(1);
    expect(String(vi.mocked(console.error).mock.calls[0][0])).toMatch(/^Error: ENOENT/);
    expect(process.exitCode).toBe(1);
  });
});
