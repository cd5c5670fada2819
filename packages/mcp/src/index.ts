#!/usr/bin/env node
/**
 * @capforge/mcp: MCP server for the capacitor compiler.
 *
 * Speaks the Model Context Protocol on stdio, so an agent can compile,
 * check and array capacitors as tool calls.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";

async function main() {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("capforge MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
