import type {
  McpTool,
  ToolHandler,
  ToolRegistrationOptions,
  ToolRegistry,
} from "../types/mcp";

/**
 * In-memory implementation of the ToolRegistry interface
 * Holds the tools served by `tools/list` and `tools/call`
 */
export class InMemoryToolRegistry implements ToolRegistry {
  private tools: Map<string, ToolRegistrationOptions & { enabled: boolean }> =
    new Map();

  /**
   * Register a new tool with the registry
   * @param options The tool configuration and handler
   */
  register(options: ToolRegistrationOptions): void {
    if (this.tools.has(options.name)) {
      throw new Error(`Tool with name '${options.name}' is already registered`);
    }

    this.tools.set(options.name, {
      ...options,
      enabled: options.enabled !== false,
    });
  }

  /**
   * Unregister a tool from the registry
   * @returns true if the tool was unregistered, false if it wasn't found
   */
  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  /**
   * Get the handler function for an enabled tool
   */
  getToolHandler(name: string): ToolHandler | undefined {
    const tool = this.tools.get(name);
    return tool?.enabled ? tool.handler : undefined;
  }

  /**
   * Get the wire definition of an enabled tool
   */
  getToolDefinition(name: string): McpTool | undefined {
    const tool = this.tools.get(name);
    if (!tool || !tool.enabled) {
      return undefined;
    }
    return toDefinition(tool);
  }

  /**
   * Get all registered and enabled tools, in registration order
   */
  getAllTools(): McpTool[] {
    const result: McpTool[] = [];

    for (const tool of this.tools.values()) {
      if (tool.enabled) {
        result.push(toDefinition(tool));
      }
    }

    return result;
  }

  isToolRegistered(name: string): boolean {
    const tool = this.tools.get(name);
    return !!tool && tool.enabled;
  }

  /**
   * Enable a tool
   * @returns true if the tool was enabled, false if it wasn't found
   */
  enableTool(name: string): boolean {
    const tool = this.tools.get(name);
    if (!tool) {
      return false;
    }

    tool.enabled = true;
    return true;
  }

  /**
   * Disable a tool
   * @returns true if the tool was disabled, false if it wasn't found
   */
  disableTool(name: string): boolean {
    const tool = this.tools.get(name);
    if (!tool) {
      return false;
    }

    tool.enabled = false;
    return true;
  }
}

function toDefinition(tool: ToolRegistrationOptions): McpTool {
  return {
    name: tool.name,
    ...(tool.description !== undefined && { description: tool.description }),
    inputSchema: tool.inputSchema,
  };
}
