import type { Readable, Writable } from "stream";
import type { ToolRegistry } from "../types/mcp";
import { readLines } from "../transport/lineReader";
import { ResponseWriter } from "../transport/responseWriter";
import { TransportError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import { classifyMessage } from "./classifier";
import { Dispatcher } from "./dispatcher";
import type { ServerContext } from "./context";
import type { MethodRegistry } from "./methodRegistry";

export type ServerState =
  | "idle"
  | "reading"
  | "classifying"
  | "dispatching"
  | "writing"
  | "shutdown_clean"
  | "shutdown_fault";

export interface ShutdownReport {
  state: Extract<ServerState, "shutdown_clean" | "shutdown_fault">;
  /** Non-blank lines taken from the input */
  processed: number;
  error?: TransportError;
}

export interface McpStdioServerOptions {
  input: Readable;
  output: Writable;
  context: ServerContext;
  methods: MethodRegistry;
  tools: ToolRegistry;
  logger: Logger;
}

/**
 * Reads one JSON-RPC message per line and answers requests one at a time.
 * Only a failure of the input or output stream stops the loop.
 */
export class McpStdioServer {
  private currentState: ServerState = "idle";
  private readonly logger: Logger;
  private readonly dispatcher: Dispatcher;
  private readonly writer: ResponseWriter;

  constructor(private readonly options: McpStdioServerOptions) {
    this.logger = options.logger.child({ component: "stdio-server" });
    this.dispatcher = new Dispatcher(
      options.methods,
      { server: options.context, tools: options.tools },
      options.logger
    );
    this.writer = new ResponseWriter(options.output, options.logger);
  }

  get state(): ServerState {
    return this.currentState;
  }

  async run(): Promise<ShutdownReport> {
    if (this.currentState !== "idle") {
      throw new Error(`Server cannot run from state '${this.currentState}'`);
    }

    const { serverInfo, capabilities, protocolVersion } = this.options.context;
    this.logger.info("Stdio server starting", {
      serverInfo,
      capabilities,
      protocolVersion,
    });

    let processed = 0;
    try {
      this.currentState = "reading";
      for await (const line of readLines(this.options.input, this.logger)) {
        processed++;
        await this.processLine(line);
        this.currentState = "reading";
      }
    } catch (error) {
      this.currentState = "shutdown_fault";
      if (!(error instanceof TransportError)) {
        throw error;
      }
      this.logger.error("Stdio server stopped on transport failure", error, {
        operation: error.operation,
        processed,
      });
      return { state: "shutdown_fault", processed, error };
    }

    this.currentState = "shutdown_clean";
    this.logger.info("Stdio server shutting down", { processed });
    return { state: "shutdown_clean", processed };
  }

  private async processLine(line: string): Promise<void> {
    this.logger.debug("Received raw line", { line });

    this.currentState = "classifying";
    const message = classifyMessage(line);

    this.currentState = "dispatching";
    const response = await this.dispatcher.dispatch(message);
    if (response === undefined) {
      return;
    }

    this.currentState = "writing";
    await this.writer.send(response);
    this.logger.debug("Sent response", {
      id: response.id,
      isError: "error" in response,
    });
  }
}
