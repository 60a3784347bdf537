import {
  JsonRpcNotificationSchema,
  JsonRpcRequestSchema,
} from "../mcp/types";
import type {
  JsonRpcNotification,
  JsonRpcRequest,
  JsonValue,
  ResponseId,
} from "../types/json-rpc";
import { exactNumberMember } from "../utils/jsonNumber";
import { formatZodIssues } from "../utils/jsonrpc_helpers";

/**
 * Why a line could not be turned into a request or notification.
 *
 * - `parse_error`: not JSON at all; answered with id `null`.
 * - `invalid_request`: has an `id` but is not a well-formed request; answered
 *   with that `id` as received, even when it is not a valid request id.
 * - `invalid_notification`: has `method` but no `id` and is not well-formed;
 *   never answered.
 * - `not_jsonrpc`: neither `id` nor `method`; never answered.
 */
export type MalformedReason =
  | "parse_error"
  | "invalid_request"
  | "invalid_notification"
  | "not_jsonrpc";

export type ClassifiedMessage =
  | { kind: "request"; request: JsonRpcRequest }
  | { kind: "notification"; notification: JsonRpcNotification }
  | {
      kind: "malformed";
      reason: MalformedReason;
      id: ResponseId;
      method?: string;
      detail: string;
    };

function isPlainObject(
  value: JsonValue
): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(line: string): JsonValue {
  return JSON.parse(line);
}

/**
 * Parses one line and decides what kind of JSON-RPC message it carries.
 * A message with both `id` and `method` is a request.
 */
export function classifyMessage(line: string): ClassifiedMessage {
  let value: JsonValue;
  try {
    value = parseJson(line);
  } catch (err) {
    return {
      kind: "malformed",
      reason: "parse_error",
      id: null,
      detail: err instanceof Error ? err.message : String(err),
    };
  }

  if (!isPlainObject(value)) {
    return {
      kind: "malformed",
      reason: "not_jsonrpc",
      id: null,
      detail: `expected a JSON object, received ${
        Array.isArray(value) ? "an array" : typeof value
      }`,
    };
  }

  // `params: null` means the same as no params at all
  const { params, ...withoutParams } = value;
  const message = params === null ? withoutParams : value;
  const method = typeof value.method === "string" ? value.method : undefined;

  if ("id" in value) {
    const rawId = value.id;
    const id =
      typeof rawId === "number"
        ? exactNumberMember(line, "id", rawId)
        : rawId;
    const parsed = JsonRpcRequestSchema.safeParse({ ...message, id });
    if (!parsed.success) {
      return {
        kind: "malformed",
        reason: "invalid_request",
        id,
        method,
        detail: formatZodIssues(parsed.error),
      };
    }
    return { kind: "request", request: parsed.data };
  }

  if ("method" in value) {
    const parsed = JsonRpcNotificationSchema.safeParse(message);
    if (!parsed.success) {
      return {
        kind: "malformed",
        reason: "invalid_notification",
        id: null,
        method,
        detail: formatZodIssues(parsed.error),
      };
    }
    return {
      kind: "notification",
      notification: parsed.data,
    };
  }

  return {
    kind: "malformed",
    reason: "not_jsonrpc",
    id: null,
    detail: "message has neither 'id' nor 'method'",
  };
}
