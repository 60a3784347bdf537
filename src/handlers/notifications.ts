import {
  CancelRequestNotificationSchema,
  type CancelRequestNotificationParams,
} from "../mcp/types";
import type { NotificationHandler } from "../server/methodRegistry";

/**
 * Accepts cancellation notifications without acting on them: requests are
 * handled one at a time and run to completion.
 */
export const cancelRequestHandler: NotificationHandler<CancelRequestNotificationParams> =
  {
    params: "optional",
    schema: CancelRequestNotificationSchema,
    handle(params, { logger }) {
      logger.warn(
        "Received cancellation notification, but cancellation is not implemented",
        { requestId: params.requestId ?? params.id, reason: params.reason }
      );
    },
  };
