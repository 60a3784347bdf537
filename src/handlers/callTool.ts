import { CallToolRequestSchema, type CallToolRequestParams } from "../mcp/types";
import { executeTool } from "../registry";
import type { RequestHandler } from "../server/methodRegistry";
import type { McpToolResult } from "../types/mcp";

/**
 * Handles the 'tools/call' MCP method.
 * Tool failures are reported inside the result (`isError: true`), never as a
 * JSON-RPC error.
 */
export const callToolHandler: RequestHandler<
  CallToolRequestParams,
  McpToolResult
> = {
  params: "required",
  schema: CallToolRequestSchema,
  handle(params, { tools, logger }) {
    logger.info(`Handling tools/call request for tool: ${params.name}`);
    return executeTool(tools, params.name, params.arguments, logger);
  },
};
