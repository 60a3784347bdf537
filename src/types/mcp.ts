/**
 * MCP - Protocol Revision: 2024-11-05
 * https://spec.modelcontextprotocol.io/specification/2024-11-05/
 */

/**
 * Name/version pair used for both `serverInfo` and `clientInfo`.
 */
export interface Implementation {
  name: string;
  version: string;
}

/**
 * Capabilities advertised by the server during `initialize`.
 * Presence of a key indicates support; the value may carry options.
 */
export interface ServerCapabilities {
  tools?: Record<string, unknown>;
  resources?: Record<string, unknown>;
  prompts?: Record<string, unknown>;
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: ServerCapabilities;
  serverInfo: Implementation;
  instructions?: string;
}

/**
 * JSON schema describing a tool's arguments.
 */
export interface ToolInputSchema {
  type: "object";
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
}

export interface McpTool {
  // The name of the tool, used when calling it
  name: string;
  // A description of what the tool does, shown to models
  description?: string;
  inputSchema: ToolInputSchema;
}

export interface McpResource {
  uri: string; // Unique identifier for the resource (e.g., mcp://dummy/resource/1)
  name: string; // Human-readable name
  description?: string;
}

export interface McpPromptArgument {
  name: string;
  description?: string;
  required: boolean;
}

export interface McpPrompt {
  name: string;
  description?: string;
  arguments?: McpPromptArgument[];
}

export interface ListToolsResult {
  tools: McpTool[];
}

export interface ListResourcesResult {
  resources: McpResource[];
}

export interface ListPromptsResult {
  prompts: McpPrompt[];
}

//TODO: Add image and embedded resource parts once a tool produces them
export interface McpToolResultContent {
  type: "text";
  text?: string;
}

export interface McpToolResult {
  content: McpToolResultContent[];
  isError?: boolean;
}

/**
 * Tool Handler Function
 * Receives the raw `arguments` value of a `tools/call` request.
 */
export type ToolHandler = (
  args: unknown
) => McpToolResult | Promise<McpToolResult>;

/**
 * Tool Registration Options
 * Configuration options when registering a new tool
 */
export interface ToolRegistrationOptions {
  name: string;
  description?: string;
  inputSchema: ToolInputSchema;
  handler: ToolHandler;
  enabled?: boolean;
}

/**
 * Tool Registry
 * Interface for a registry that manages tool registrations
 */
export interface ToolRegistry {
  register(options: ToolRegistrationOptions): void;
  unregister(name: string): boolean;
  getToolHandler(name: string): ToolHandler | undefined;
  getToolDefinition(name: string): McpTool | undefined;
  getAllTools(): McpTool[];
  isToolRegistered(name: string): boolean;
}
