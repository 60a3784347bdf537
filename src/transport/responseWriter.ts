import type { Writable } from "stream";
import type { JsonRpcResponse } from "../types/json-rpc";
import { ErrorCode, TransportError, errorMessage } from "../utils/errors";
import {
  createJsonRpcErrorResponse,
  serializeResponse,
} from "../utils/jsonrpc_helpers";
import type { Logger } from "../utils/logger";

/**
 * Writes JSON-RPC responses as newline-delimited JSON.
 */
export class ResponseWriter {
  private readonly logger: Logger;
  private failure: Error | undefined;

  constructor(private readonly output: Writable, logger: Logger) {
    this.logger = logger.child({ component: "response-writer" });
    // Without a listener a failed write would crash the process instead of
    // reaching the write callback.
    this.output.on("error", (err: Error) => {
      this.failure ??= err;
      this.logger.error("Output stream error", err);
    });
  }

  /**
   * Serializes `message` onto a single line and resolves once the stream has
   * accepted it. Rejects with a {@link TransportError} if it cannot be written.
   */
  async send(message: JsonRpcResponse): Promise<void> {
    if (this.failure) {
      throw new TransportError("write", this.failure);
    }
    if (this.output.destroyed || this.output.writableEnded) {
      throw new TransportError("write", new Error("output stream is closed"));
    }

    const payload = this.serialize(message);
    this.logger.debug("Sending raw json", { payload });

    await new Promise<void>((resolve, reject) => {
      this.output.write(`${payload}\n`, (err) => {
        if (err) {
          reject(new TransportError("write", err));
        } else {
          resolve();
        }
      });
    });
  }

  private serialize(message: JsonRpcResponse): string {
    try {
      return serializeResponse(message);
    } catch (err) {
      // The id is always serializable, so the peer still gets its one answer
      this.logger.error("Failed to serialize response", err, {
        id: message.id,
      });
      return serializeResponse(
        createJsonRpcErrorResponse(
          message.id,
          ErrorCode.InternalError,
          `Internal error: response could not be serialized: ${errorMessage(
            err
          )}`
        )
      );
    }
  }
}
