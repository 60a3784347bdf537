import {
  InitializeRequestSchema,
  InitializedNotificationSchema,
  type InitializeRequestParams,
  type InitializedNotificationParams,
} from "../mcp/types";
import type {
  NotificationHandler,
  RequestHandler,
} from "../server/methodRegistry";
import type { InitializeResult } from "../types/mcp";

/**
 * Handles the 'initialize' MCP method.
 * The server always answers with its own protocol version; a client asking
 * for another one is only warned about.
 */
export const initializeHandler: RequestHandler<
  InitializeRequestParams,
  InitializeResult
> = {
  params: "required",
  schema: InitializeRequestSchema,
  handle(params, { server, logger }) {
    logger.info("Handling initialize request", {
      clientInfo: params.clientInfo,
      protocolVersion: params.protocolVersion,
    });

    if (params.protocolVersion !== server.protocolVersion) {
      logger.warn(
        `Client requested protocol version ${params.protocolVersion}, but server uses ${server.protocolVersion}`
      );
    }

    //TODO: keep params.capabilities once a handler needs to know what the client supports
    return {
      protocolVersion: server.protocolVersion,
      capabilities: server.capabilities,
      serverInfo: server.serverInfo,
      ...(server.instructions !== undefined && {
        instructions: server.instructions,
      }),
    };
  },
};

export const initializedHandler: NotificationHandler<InitializedNotificationParams> =
  {
    params: "optional",
    schema: InitializedNotificationSchema,
    handle(_params, { logger }) {
      logger.info(
        "Received 'initialized' notification from client, connection ready"
      );
    },
  };
