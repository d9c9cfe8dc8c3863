#!/usr/bin/env node

/**
 * iNaturalist MCP Server (Stdio Transport)
 *
 * Exposes the biodiversity query tools over stdio for local MCP clients.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { initializeINaturalistServer, SERVER_NAME, SERVER_VERSION } from "./inaturalist-server-core";
import { logger } from "@/utils/logger";

// Create MCP server
const server = new Server(
  {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

/**
 * START SERVER
 */
async function main() {
  // Reads and validates configuration; a bad override fails startup here.
  initializeINaturalistServer(server);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("iNaturalist MCP Server running on stdio");
}

main().catch((error) => {
  logger.error("Server error:", error);
  process.exit(1);
});
