/**
 * `capforge` command line: compile capacitors and arrays from JSON requests.
 */

import { Command, InvalidArgumentError } from "commander";
import * as fs from "node:fs";
import * as path from "node:path";
import { toCompact, toHostScript, toJson, type DrawPrimitive } from "@capforge/ir";
import { compileCapacitor } from "./compile.js";
import { parseArrayGrid } from "./grid.js";
import { assembleArray } from "./mosaic.js";
import { parseShapeParameters } from "./params.js";
import { computeGeometry, isShapeKind, seededRng, shapeBuilders, SHAPE_KINDS } from "./shapes/index.js";
import { BUILTIN_TECHNOLOGIES, loadTechnology } from "./technology.js";
import { validate } from "./validate.js";

export type OutputFormat = "json" | "compact" | "script";

interface OutputOptions {
  format: OutputFormat;
  output?: string;
  library: string;
  cell: string;
}

function parseFormat(value: string): OutputFormat {
  if (value === "json" || value === "compact" || value === "script") return value;
  throw new InvalidArgumentError("expected json, compact or script");
}

function parseInteger(value: string): number {
  const n = parseInt(value, 10);
  if (Number.isNaN(n)) throw new InvalidArgumentError("expected an integer");
  return n;
}

function readJsonFile(file: string): unknown {
  return JSON.parse(fs.readFileSync(path.resolve(file), "utf-8"));
}

/** Serialize primitives in the requested format. */
export function formatPrimitives(primitives: readonly DrawPrimitive[], options: OutputOptions): string {
  switch (options.format) {
    case "json":
      return toJson(primitives) + "\n";
    case "compact":
      return toCompact(primitives);
    case "script":
      return toHostScript(primitives, { library: options.library, cell: options.cell });
  }
}

function emit(text: string, output: string | undefined): void {
  if (output) {
    const outputPath = path.resolve(output);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, text);
    console.log(`Wrote ${outputPath}`);
  } else {
    process.stdout.write(text);
  }
}

function withOutputOptions(command: Command): Command {
  return command
    .option("-f, --format <format>", "json, compact or script", parseFormat, "json")
    .option("-o, --output <path>", "Write to a file instead of stdout")
    .option("--library <name>", "Target library for script output", "capforge")
    .option("--cell <name>", "Target cell for script output", "cap");
}

/** Build the command tree. Exposed for tests. */
export function buildProgram(): Command {
  const program = new Command();

  program
    .name("capforge")
    .description("Parametric MOM capacitor and array layout compiler")
    .version("0.1.0");

  program
    .command("techs")
    .description("List built-in technology profiles")
    .action(() => {
      for (const name of BUILTIN_TECHNOLOGIES) {
        const tech = loadTechnology(name);
        console.log(
          `${name}: layers ${tech.allowedLayers.join(",")}, min spacing ${tech.minSpacing}, ` +
            `min width ${tech.minWidth}, widths ${tech.widthQuantBase} + n × ${tech.widthQuantStep}`,
        );
      }
    });

  program
    .command("sample")
    .description("Print a random well-formed parameter set")
    .requiredOption("-s, --shape <shape>", `Shape: ${SHAPE_KINDS.join(", ")}`)
    .option("-t, --tech <tech>", "Technology name or profile path", "t28")
    .option("--seed <seed>", "Random seed", parseInteger)
    .action((options: { shape: string; tech: string; seed?: number }) => {
      if (!isShapeKind(options.shape)) {
        throw new InvalidArgumentError(`unknown shape ${options.shape}`);
      }
      const tech = loadTechnology(options.tech);
      const rng = options.seed === undefined ? Math.random : seededRng(options.seed);
      const params = shapeBuilders[options.shape].randomParams(tech, rng);
      console.log(JSON.stringify(params, null, 2));
    });

  withOutputOptions(
    program
      .command("compile")
      .description("Compile a capacitor parameter file to primitives")
      .argument("<params>", "JSON parameter file")
      .option("-t, --tech <tech>", "Technology name or profile path", "t28")
      .option("--no-shield", "Leave out the shield frame"),
  ).action((file: string, options: OutputOptions & { tech: string; shield: boolean }) => {
    const tech = loadTechnology(options.tech);
    const params = parseShapeParameters(readJsonFile(file));
    // commander sets `shield` to true unless --no-shield was given.
    const includeShield = options.shield ? undefined : false;
    const result = compileCapacitor(params, tech, { includeShield });

    if (result.status === "rejected") {
      for (const v of result.violations) {
        console.error(`  ${v.code}: ${v.message}`);
      }
      console.error(`Rejected with ${result.violations.length} violation(s)`);
      process.exitCode = 1;
      return;
    }
    emit(formatPrimitives(result.primitives, options), options.output);
  });

  program
    .command("validate")
    .description("Check a capacitor parameter file without drawing it")
    .argument("<params>", "JSON parameter file")
    .option("-t, --tech <tech>", "Technology name or profile path", "t28")
    .action((file: string, options: { tech: string }) => {
      const tech = loadTechnology(options.tech);
      const params = parseShapeParameters(readJsonFile(file));
      const geometry = computeGeometry(params, tech);
      const outcome = validate(geometry, params, tech);

      console.log(`${params.shape} capacitor ${geometry.width} × ${geometry.totalHeight} µm`);
      if (outcome.status === "accepted") {
        console.log("Accepted");
        return;
      }
      for (const v of outcome.violations) {
        console.log(`  ${v.code} [${v.subject}]: ${v.message}`);
      }
      console.log(`Rejected with ${outcome.violations.length} violation(s)`);
      process.exitCode = 1;
    });

  withOutputOptions(
    program
      .command("mosaic")
      .description("Merge an array occupancy grid into mosaic placements")
      .argument("<grid>", "JSON grid file")
      .option("--master <name>", "Master for cells the grid leaves unnamed", "unit"),
  ).action((file: string, options: OutputOptions & { master: string }) => {
    const grid = parseArrayGrid(readJsonFile(file));
    const { regions, primitives } = assembleArray(grid, options.master);
    const cells = regions.reduce(
      (sum, r) => sum + (r.rowEnd - r.rowStart + 1) * (r.colEnd - r.colStart + 1),
      0,
    );
    console.error(`${cells} cells in ${regions.length} region(s)`);
    emit(formatPrimitives(primitives, options), options.output);
  });

  return program;
}

/** Parse `argv` and report failures the way the shell expects. */
export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
}
