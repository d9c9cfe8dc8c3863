#!/usr/bin/env node

/**
 * iNaturalist MCP Server (Streamable HTTP Transport)
 *
 * Serves the tools over HTTP when mcp.enabled is set in config.json.
 */

import { startMcpHttpServer, stopMcpHttpServer } from "./http-server";
import { logger } from "@/utils/logger";

function shutdown(signal: string) {
  logger.info(`Received ${signal}, shutting down MCP HTTP server`);
  stopMcpHttpServer()
    .then(() => process.exit(0))
    .catch((error) => {
      logger.error("Error during shutdown:", error);
      process.exit(1);
    });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

startMcpHttpServer().catch((error) => {
  logger.error("Server error:", error);
  process.exit(1);
});
