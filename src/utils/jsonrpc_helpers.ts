import type { ZodError } from "zod";
import type {
  JsonRpcErrorObject,
  JsonRpcErrorResponse,
  JsonRpcResponse,
  JsonRpcSuccessResponse,
  ResponseId,
} from "../types/json-rpc";
import { ErrorCode } from "./errors";
import { RawJsonNumber } from "./jsonNumber";

/**
 * Creates a successful JSON-RPC response object.
 *
 * @param id The request ID.
 * @param result The result payload.
 */
export function createJsonRpcResponse<Result = unknown>(
  id: ResponseId,
  result: Result
): JsonRpcSuccessResponse<Result> {
  return {
    jsonrpc: "2.0",
    id,
    result,
  };
}

/**
 * Creates an error JSON-RPC response object.
 *
 * @param id The request ID (null if parsing failed before ID was read).
 * @param code The JSON-RPC error code.
 * @param message The error message.
 * @param data Optional error data.
 */
export function createJsonRpcErrorResponse<ErrorData = unknown>(
  id: ResponseId,
  code: number,
  message: string,
  data?: ErrorData
): JsonRpcErrorResponse<ErrorData> {
  const error: JsonRpcErrorObject<ErrorData> = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return {
    jsonrpc: "2.0",
    id,
    error,
  };
}

export function parseError(detail: string): JsonRpcErrorResponse {
  return createJsonRpcErrorResponse(
    null,
    ErrorCode.ParseError,
    `Parse error: ${detail}`
  );
}

export function methodNotFound(
  id: ResponseId,
  method: string
): JsonRpcErrorResponse {
  return createJsonRpcErrorResponse(
    id,
    ErrorCode.MethodNotFound,
    `Method not found: ${method}`
  );
}

export function invalidParams(
  id: ResponseId,
  method: string,
  detail: string
): JsonRpcErrorResponse {
  return createJsonRpcErrorResponse(
    id,
    ErrorCode.InvalidParams,
    `Invalid params for ${method}: ${detail}`
  );
}

export function internalError(
  id: ResponseId,
  method: string,
  detail: string
): JsonRpcErrorResponse {
  return createJsonRpcErrorResponse(
    id,
    ErrorCode.InternalError,
    `Internal error during ${method}: ${detail}`
  );
}

/**
 * Flattens zod issues into `path - message` pairs.
 */
export function formatZodIssues(error: ZodError): string {
  return error.errors
    .map((e) =>
      e.path.length > 0 ? `${e.path.join(".")} - ${e.message}` : e.message
    )
    .join(", ");
}

/**
 * Serializes a response onto one line. The id is written as it was received,
 * including numbers kept as source text.
 */
export function serializeResponse(response: JsonRpcResponse): string {
  const id =
    response.id instanceof RawJsonNumber
      ? response.id.source
      : JSON.stringify(response.id);
  const outcome =
    "error" in response
      ? `"error":${JSON.stringify(response.error)}`
      : `"result":${JSON.stringify(response.result) ?? "null"}`;
  return `{"jsonrpc":"2.0","id":${id},${outcome}}`;
}
