import { z } from "zod";
import type { RequestHandler } from "../server/methodRegistry";
import type {
  ListPromptsResult,
  ListResourcesResult,
  ListToolsResult,
  McpPrompt,
  McpResource,
} from "../types/mcp";

//TODO: Replace with resources backed by real content once resources/read exists
const staticResources: McpResource[] = [
  {
    uri: "mcp://dummy/resource/1",
    name: "Dummy Resource",
    description: "A test resource",
  },
];

const staticPrompts: McpPrompt[] = [
  {
    name: "dummy_prompt",
    description: "A test prompt",
  },
];

// List methods take no params; whatever the client sends is ignored
const NoParamsSchema = z.unknown();

/**
 * Handles the 'tools/list' MCP method from the tool registry.
 */
export const listToolsHandler: RequestHandler<unknown, ListToolsResult> = {
  params: "ignored",
  schema: NoParamsSchema,
  handle(_params, { tools, logger }) {
    logger.info("Handling tools/list request");
    return { tools: tools.getAllTools() };
  },
};

export const listResourcesHandler: RequestHandler<
  unknown,
  ListResourcesResult
> = {
  params: "ignored",
  schema: NoParamsSchema,
  handle(_params, { logger }) {
    logger.info("Handling resources/list request");
    return { resources: staticResources.map((r) => ({ ...r })) };
  },
};

export const listPromptsHandler: RequestHandler<unknown, ListPromptsResult> = {
  params: "ignored",
  schema: NoParamsSchema,
  handle(_params, { logger }) {
    logger.info("Handling prompts/list request");
    return { prompts: staticPrompts.map((p) => ({ ...p })) };
  },
};

/**
 * Handles 'ping': an empty result proves the server is responsive.
 */
export const pingHandler: RequestHandler<unknown, Record<string, never>> = {
  params: "ignored",
  schema: NoParamsSchema,
  handle() {
    return {};
  },
};
