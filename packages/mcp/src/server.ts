/**
 * MCP server exposing the capacitor compiler as tools.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { compileCapacitor, compileCapacitorSchema } from "./tools/compile.js";
import { mergeArray, mergeArraySchema } from "./tools/merge.js";
import { listTechnologies, listTechnologiesSchema } from "./tools/technologies.js";
import type { ToolResult } from "./tools/types.js";
import { validateCapacitor, validateCapacitorSchema } from "./tools/validate.js";

/** Dispatch one tool call. Thrown errors become `isError` results. */
export function callTool(name: string, args: unknown): ToolResult {
  try {
    switch (name) {
      case "list_technologies":
        return listTechnologies(args);

      case "compile_capacitor":
        return compileCapacitor(args);

      case "validate_capacitor":
        return validateCapacitor(args);

      case "merge_array":
        return mergeArray(args);

      default:
        return {
          content: [{ type: "text", text: `Unknown tool: ${name}` }],
          isError: true,
        };
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    const kind = err instanceof Error ? err.name : "Error";
    return {
      content: [{ type: "text", text: `${kind}: ${message}` }],
      isError: true,
    };
  }
}

export function createServer(): Server {
  const server = new Server(
    {
      name: "capforge",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: "list_technologies",
        description:
          "List the built-in technology profiles and capacitor shapes. " +
          "Given one technology, also returns the parameter ranges each shape accepts there.",
        inputSchema: listTechnologiesSchema,
      },
      {
        name: "compile_capacitor",
        description:
          "Compile MOM capacitor parameters into grid-exact drawing primitives. " +
          "Returns status 'accepted' with the primitives, or 'rejected' with every design-rule violation " +
          "(code, subject, actual and required values) so the parameters can be adjusted and resubmitted. " +
          "Structurally impossible parameters (wrong finger parity, off-grid widths, too short a height) fail with an error.",
        inputSchema: compileCapacitorSchema,
      },
      {
        name: "validate_capacitor",
        description:
          "Check MOM capacitor parameters against a technology without drawing. " +
          "Returns the outline dimensions and any violations.",
        inputSchema: validateCapacitorSchema,
      },
      {
        name: "merge_array",
        description:
          "Merge a capacitor array occupancy grid (e.g. a CDAC with unit and dummy cells) into " +
          "rectangular repeated placements, one per region.",
        inputSchema: mergeArraySchema,
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const result = callTool(name, args);
    if (result.isError) {
      console.error(`[capforge-mcp] ${name} failed: ${result.content[0].text}`);
    }
    return result;
  });

  return server;
}
