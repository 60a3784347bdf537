import { z } from "zod";
import type {
  McpToolResult,
  McpToolResultContent,
  ToolRegistry,
} from "../types/mcp";
import { formatZodIssues } from "../utils/jsonrpc_helpers";
import type { Logger } from "../utils/logger";

export { InMemoryToolRegistry } from "./toolRegistry";

/**
 * Represents an error that occurred during the execution of a tool's logic,
 * distinct from protocol errors. These are reported within the result.
 */
export class ToolExecutionError extends Error {
  public readonly content: McpToolResultContent[];

  constructor(
    message: string,
    content?: McpToolResultContent[],
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ToolExecutionError";
    this.content = content ?? [{ type: "text", text: message }];
    Object.setPrototypeOf(this, ToolExecutionError.prototype);
  }
}

export function textResult(text: string, isError?: boolean): McpToolResult {
  return {
    content: [{ type: "text", text }],
    ...(isError !== undefined && { isError }),
  };
}

/**
 * Execute a registered tool.
 *
 * Unknown tools, {@link ToolExecutionError}s and argument validation failures
 * come back as a result with `isError: true`. Anything else is rethrown and
 * becomes a protocol-level internal error.
 */
export async function executeTool(
  registry: ToolRegistry,
  name: string,
  args: unknown,
  logger: Logger
): Promise<McpToolResult> {
  const toolLogger = logger.child({ tool: name });
  const handler = registry.getToolHandler(name);
  if (!handler) {
    toolLogger.warn(`Received call for unknown tool: ${name}`);
    return textResult(
      `Error: Tool '${name}' not implemented by this server.`,
      true
    );
  }

  toolLogger.debug("Executing tool", { arguments: args });
  try {
    return await handler(args);
  } catch (error) {
    if (error instanceof ToolExecutionError) {
      toolLogger.warn(`Tool '${name}' execution failed`, {
        error: error.message,
      });
      return { content: error.content, isError: true };
    }
    if (error instanceof z.ZodError) {
      toolLogger.warn(`Tool '${name}' validation failed`, {
        errors: error.errors,
      });
      return textResult(
        `Validation failed for tool '${name}': ${formatZodIssues(error)}`,
        true
      );
    }
    toolLogger.error(`Tool '${name}' failed unexpectedly`, error);
    throw error;
  }
}
