/**
 * iNaturalist MCP Server - Core Logic
 *
 * Provides reusable server initialization for both stdio and HTTP transports.
 * Registers the tool catalog and routes tool calls through the dispatch table.
 */

import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { logger } from "@/utils/logger";
import { isToolError } from "@/utils/errors";
import { EntityResolver } from "@/integrations/entity-resolver";
import { getINaturalistClient, type INaturalistClient } from "@/integrations/inaturalist";
import { isToolName, toolDefinitions } from "./tool-definitions";
import { toolHandlers } from "./tool-handlers";

export const SERVER_NAME = "inaturalist";
export const SERVER_VERSION = "1.0.0";

function textResult(payload: object, isError = false) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(payload, null, 2),
      },
    ],
    ...(isError ? { isError: true } : {}),
  };
}

function errorResult(toolName: string, error: unknown) {
  if (isToolError(error)) {
    logger.warn(`Tool ${toolName} failed with ${error.code}: ${error.message}`);
    return textResult(
      {
        success: false,
        error: error.message,
        error_code: error.code,
        context: error.context,
      },
      true
    );
  }

  logger.error(`Tool ${toolName} failed unexpectedly`, error);
  return textResult(
    {
      success: false,
      error: error instanceof Error ? error.message : "Unknown error",
      error_code: "TOOL_EXECUTION_ERROR",
    },
    true
  );
}

/**
 * Register tool handlers on an MCP server.
 *
 * All servers created in one process share the client passed here, and with
 * it the client's rate governor.
 */
export function initializeINaturalistServer(
  server: Server,
  client: INaturalistClient = getINaturalistClient()
) {
  const resolver = new EntityResolver(client);

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: toolDefinitions };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    try {
      if (!isToolName(name)) {
        throw new Error(`Unknown tool: ${name}`);
      }
      const data = await toolHandlers[name](args, { client, resolver, signal: extra?.signal });
      return textResult({ success: true, ...data });
    } catch (error) {
      return errorResult(name, error);
    }
  });
}
