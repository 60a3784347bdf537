import type { Readable, Writable } from "stream";
import { createMethodRegistry } from "./handlers";
import { InMemoryToolRegistry } from "./registry";
import { createServerContext } from "./server/context";
import { McpStdioServer } from "./server/server";
import { registerBuiltinTools } from "./tools/dummyTool";
import type { Config } from "./utils/config";
import type { Logger } from "./utils/logger";

export { classifyMessage } from "./server/classifier";
export type { ClassifiedMessage, MalformedReason } from "./server/classifier";
export { createServerContext } from "./server/context";
export type { ServerContext } from "./server/context";
export { Dispatcher } from "./server/dispatcher";
export { MethodRegistry } from "./server/methodRegistry";
export type {
  HandlerContext,
  NotificationHandler,
  RequestHandler,
} from "./server/methodRegistry";
export { McpStdioServer } from "./server/server";
export type { ServerState, ShutdownReport } from "./server/server";
export { readLines } from "./transport/lineReader";
export { ResponseWriter } from "./transport/responseWriter";
export { InMemoryToolRegistry, ToolExecutionError } from "./registry";
export { ErrorCode, McpError, TransportError } from "./utils/errors";
export { RawJsonNumber } from "./utils/jsonNumber";
export { createConfig } from "./utils/config";
export type { Config } from "./utils/config";
export { Logger, createLogger } from "./utils/logger";

export interface CreateServerOptions {
  config: Config;
  logger: Logger;
  input?: Readable;
  output?: Writable;
}

/**
 * Wires the server context, method table and built-in tools into a server
 * bound to the given streams (stdin/stdout by default).
 */
export function createServer({
  config,
  logger,
  input = process.stdin,
  output = process.stdout,
}: CreateServerOptions): McpStdioServer {
  const tools = new InMemoryToolRegistry();
  registerBuiltinTools(tools, config.tools.disabled);

  return new McpStdioServer({
    input,
    output,
    context: createServerContext(config),
    methods: createMethodRegistry(),
    tools,
    logger,
  });
}
