import { textResult } from "../registry";
import type {
  McpToolResult,
  ToolRegistrationOptions,
  ToolRegistry,
} from "../types/mcp";

export const DUMMY_TOOL_NAME = "dummy_tool_from_rust";

/**
 * Echoes its arguments back as compact JSON.
 */
export function dummyToolHandler(args: unknown): McpToolResult {
  return textResult(
    `${DUMMY_TOOL_NAME} executed successfully! Received args: ${JSON.stringify(
      args ?? null
    )}`
  );
}

export const dummyTool: ToolRegistrationOptions = {
  name: DUMMY_TOOL_NAME,
  description: "A simple test tool.",
  inputSchema: {
    type: "object",
    properties: {},
  },
  handler: dummyToolHandler,
};

/**
 * Registers the tools this server ships with. Names listed in `disabled` are
 * registered but hidden.
 */
export function registerBuiltinTools(
  registry: ToolRegistry,
  disabled: readonly string[] = []
): void {
  for (const tool of [dummyTool]) {
    registry.register({ ...tool, enabled: !disabled.includes(tool.name) });
  }
}
