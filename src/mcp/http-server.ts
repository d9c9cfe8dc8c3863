/**
 * MCP HTTP Server with Streamable HTTP Transport
 *
 * Exposes the iNaturalist tools over HTTP using Streamable HTTP transport.
 * Each MCP session gets its own transport and server instance; all of them
 * share the process-wide iNaturalist client and its rate governor.
 */

import express from "express";
import type { Request, Response } from "express";
import { randomUUID } from "crypto";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { initializeINaturalistServer, SERVER_NAME, SERVER_VERSION } from "./inaturalist-server-core";
import { logger } from "@/utils/logger";
import { getConfig, type McpConfig } from "@/config";

let serverInstance: ReturnType<typeof express.application.listen> | null = null;

// Store transports by session ID
const transports: Record<string, StreamableHTTPServerTransport> = {};

/**
 * Create an iNaturalist MCP server instance
 */
function createINaturalistServer(): Server {
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

  initializeINaturalistServer(server);
  return server;
}

/**
 * Create the MCP request handler shared by POST, GET and DELETE
 */
function createMcpHandler(createServer: () => Server) {
  return async (req: Request, res: Response) => {
    const sessionId = req.header("mcp-session-id");

    try {
      const existing = sessionId ? transports[sessionId] : undefined;

      if (existing) {
        // Reuse existing transport for this session
        await existing.handleRequest(req, res, req.body);
      } else if (!sessionId && req.method === "POST" && isInitializeRequest(req.body)) {
        // New initialization request - create new transport and session
        logger.info("MCP client initializing new session");

        const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid) => {
            logger.info(`Session initialized: ${sid}`);
            transports[sid] = transport;
          },
        });

        transport.onclose = () => {
          const sid = transport.sessionId;
          if (sid && transports[sid]) {
            logger.info(`Session closed: ${sid}`);
            delete transports[sid];
          }
        };

        const server = createServer();
        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } else {
        res.status(400).json({
          jsonrpc: "2.0",
          error: {
            code: -32000,
            message: "Bad Request: No valid session ID provided",
          },
          id: null,
        });
      }
    } catch (error) {
      logger.error("Error in MCP endpoint:", error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: {
            code: -32603,
            message: "Internal server error",
          },
          id: null,
        });
      }
    }
  };
}

/**
 * Build the Express app without binding a port
 */
export function createMcpApp(createServer: () => Server = createINaturalistServer) {
  const app = express();

  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", server: SERVER_NAME });
  });

  const mcpHandler = createMcpHandler(createServer);
  app.post("/mcp", mcpHandler);
  app.get("/mcp", mcpHandler); // SSE stream for an existing session
  app.delete("/mcp", mcpHandler); // Session termination

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  return app;
}

/**
 * Start the MCP HTTP server if enabled in config
 */
export async function startMcpHttpServer(mcpConfig: McpConfig = getConfig().mcp): Promise<void> {
  if (!mcpConfig.enabled) {
    logger.info("MCP HTTP server disabled in config");
    return;
  }

  const { port, host } = mcpConfig;
  const app = createMcpApp();

  return new Promise<void>((resolve, reject) => {
    try {
      serverInstance = app.listen(port, host, () => {
        logger.info(`MCP HTTP server listening on http://${host}:${port}/mcp`);
        resolve();
      });

      serverInstance.on("error", (error: Error) => {
        logger.error("MCP HTTP server error:", error);
        reject(error);
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("Failed to start MCP HTTP server:", err);
      reject(err);
    }
  });
}

/**
 * Stop the MCP HTTP server
 */
export async function stopMcpHttpServer(): Promise<void> {
  // Close all active transports
  for (const sessionId in transports) {
    try {
      await transports[sessionId].close();
      delete transports[sessionId];
    } catch (error) {
      logger.error(`Error closing transport ${sessionId}:`, error);
    }
  }

  // Close HTTP server
  const instance = serverInstance;
  serverInstance = null;
  if (instance) {
    return new Promise((resolve, reject) => {
      instance.close((err) => {
        if (err) {
          logger.error("Error stopping MCP HTTP server:", err);
          reject(err);
        } else {
          logger.info("MCP HTTP server stopped");
          resolve();
        }
      });
    });
  }
}
