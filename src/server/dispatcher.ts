import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type {
  JsonRpcId,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
} from "../types/json-rpc";
import { McpError, errorMessage } from "../utils/errors";
import {
  createJsonRpcErrorResponse,
  createJsonRpcResponse,
  formatZodIssues,
  internalError,
  invalidParams,
  methodNotFound,
  parseError,
} from "../utils/jsonrpc_helpers";
import type { Logger } from "../utils/logger";
import type { ClassifiedMessage } from "./classifier";
import type {
  HandlerContext,
  MethodRegistry,
  ParamsPolicy,
} from "./methodRegistry";

export const INITIALIZE_METHOD = "initialize";
export const INITIALIZED_NOTIFICATIONS: readonly string[] = [
  "initialized",
  "notifications/initialized",
];

/**
 * Progress of the `initialize` / `initialized` handshake. It is only used for
 * logging: requests are served in every state.
 */
export type HandshakeState =
  | "awaiting_initialize"
  | "awaiting_initialized"
  | "ready";

const MISSING_PARAMS = Symbol("missing-params");

/**
 * Routes classified messages to their handlers and turns the outcome of a
 * request into exactly one correlated response.
 */
export class Dispatcher {
  private readonly logger: Logger;
  private handshakeState: HandshakeState = "awaiting_initialize";

  constructor(
    private readonly methods: MethodRegistry,
    private readonly context: Omit<HandlerContext, "logger">,
    logger: Logger
  ) {
    this.logger = logger.child({ component: "dispatcher" });
  }

  get handshake(): HandshakeState {
    return this.handshakeState;
  }

  /**
   * @returns the response to write, or `undefined` when nothing must be sent
   */
  async dispatch(
    message: ClassifiedMessage
  ): Promise<JsonRpcResponse | undefined> {
    switch (message.kind) {
      case "request":
        return this.handleRequest(message.request);
      case "notification":
        await this.handleNotification(message.notification);
        return undefined;
      case "malformed":
        return this.handleMalformed(message);
    }
  }

  async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const { id, method } = request;
    const logger = this.logger.child({
      method,
      jsonRpcId: id,
      internalRequestId: uuidv4(),
    });
    logger.info("Received request");

    const handler = this.methods.getRequestHandler(method);
    if (!handler) {
      logger.warn(`Received unhandled request method: ${method}`);
      return methodNotFound(id, method);
    }

    if (
      method !== INITIALIZE_METHOD &&
      this.handshakeState === "awaiting_initialize"
    ) {
      logger.debug("Request received before initialize");
    }

    const params = paramsFor(handler.params, request.params);
    if (params === MISSING_PARAMS) {
      logger.warn("Request is missing required params");
      return invalidParams(id, method, "missing params field");
    }

    const prepared = handler.prepare(params);
    if (!prepared.ok) {
      const detail = formatZodIssues(prepared.error);
      logger.warn("Request params failed validation", { detail });
      return invalidParams(id, method, detail);
    }

    try {
      const result = await prepared.run({ ...this.context, logger });
      if (method === INITIALIZE_METHOD) {
        this.handshakeState = "awaiting_initialized";
      }
      logger.info("Request handled");
      // `undefined` would drop the `result` key from the serialized response
      return createJsonRpcResponse(id, result === undefined ? null : result);
    } catch (error) {
      return this.toErrorResponse(id, method, error, logger);
    }
  }

  async handleNotification(notification: JsonRpcNotification): Promise<void> {
    const { method } = notification;
    const logger = this.logger.child({ method, notification: true });
    logger.info("Received notification");

    const handler = this.methods.getNotificationHandler(method);
    if (!handler) {
      logger.warn(`Received unhandled notification method: ${method}`);
      return;
    }

    let params = paramsFor(handler.params, notification.params);
    if (params === MISSING_PARAMS) {
      logger.warn("Notification received without params, using defaults");
      params = {};
    }

    const prepared = handler.prepare(params);
    if (!prepared.ok) {
      logger.error("Failed to parse notification params", undefined, {
        detail: formatZodIssues(prepared.error),
      });
      return;
    }

    try {
      await prepared.run({ ...this.context, logger });
      if (INITIALIZED_NOTIFICATIONS.includes(method)) {
        this.handshakeState = "ready";
      }
    } catch (error) {
      logger.error("Error handling notification", error);
    }
  }

  handleMalformed(
    message: Extract<ClassifiedMessage, { kind: "malformed" }>
  ): JsonRpcResponse | undefined {
    const { reason, detail } = message;
    switch (reason) {
      case "parse_error":
        this.logger.error("Failed to parse incoming line as JSON", undefined, {
          detail,
        });
        return parseError("Invalid JSON received");
      case "invalid_request":
        this.logger.error("Failed to parse request", undefined, {
          jsonRpcId: message.id,
          detail,
        });
        return invalidParams(message.id, message.method ?? "request", detail);
      case "invalid_notification":
        this.logger.error("Failed to parse notification", undefined, {
          method: message.method,
          detail,
        });
        return undefined;
      case "not_jsonrpc":
        this.logger.error("Received invalid JSON-RPC message", undefined, {
          detail,
        });
        return undefined;
    }
  }

  private toErrorResponse(
    id: JsonRpcId,
    method: string,
    error: unknown,
    logger: Logger
  ): JsonRpcResponse {
    if (error instanceof McpError) {
      logger.warn("Handler rejected request", {
        code: error.code,
        error: error.message,
      });
      return createJsonRpcErrorResponse(id, error.code, error.message);
    }
    if (error instanceof z.ZodError) {
      logger.warn("Handler reported invalid params", {
        detail: formatZodIssues(error),
      });
      return invalidParams(id, method, formatZodIssues(error));
    }
    logger.error(`Error handling ${method}`, error);
    return internalError(id, method, errorMessage(error));
  }
}

function paramsFor(
  policy: ParamsPolicy,
  params: unknown
): unknown | typeof MISSING_PARAMS {
  switch (policy) {
    case "required":
      return params === undefined ? MISSING_PARAMS : params;
    case "optional":
      return params === undefined ? {} : params;
    case "ignored":
      return undefined;
  }
}
