import { SUPPORTED_PROTOCOL_VERSION } from "../mcp/types";
import type { Implementation, ServerCapabilities } from "../types/mcp";
import type { Config } from "../utils/config";

/**
 * Identity and capabilities of the running server. Built once at startup and
 * shared read-only with every handler.
 */
export interface ServerContext {
  readonly serverInfo: Readonly<Implementation>;
  readonly capabilities: Readonly<ServerCapabilities>;
  readonly protocolVersion: string;
  readonly instructions?: string;
}

export function createServerContext(
  config: Pick<Config, "server">
): ServerContext {
  return Object.freeze({
    serverInfo: Object.freeze({
      name: config.server.name,
      version: config.server.version,
    }),
    capabilities: Object.freeze({
      tools: {},
      resources: {},
      prompts: {},
    }),
    protocolVersion: SUPPORTED_PROTOCOL_VERSION,
    ...(config.server.instructions !== undefined && {
      instructions: config.server.instructions,
    }),
  });
}
