/**
 * Core JSON-RPC 2.0 Type Definitions
 * Based on: https://www.jsonrpc.org/specification
 */

import type { RawJsonNumber } from "../utils/jsonNumber";

/**
 * Represents a JSON-RPC request identifier. Numbers that a JS `number` cannot
 * hold exactly are carried as their source text.
 */
export type JsonRpcId = string | number | RawJsonNumber | null;

/**
 * Any value that survives a JSON round trip.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * The `id` of a response. Usually the request's {@link JsonRpcId}, but an
 * invalid request is answered with whatever `id` it carried, and a message
 * whose id could not be read at all with `null`.
 */
export type ResponseId = JsonValue | RawJsonNumber;

/**
 * Represents a JSON-RPC Request object. `id` is present (possibly null).
 */
export interface JsonRpcRequest<Params = unknown> {
  jsonrpc: "2.0";
  method: string;
  params?: Params;
  id: JsonRpcId;
}

/**
 * Represents a JSON-RPC Notification object.
 */
export interface JsonRpcNotification<Params = unknown> {
  jsonrpc: "2.0";
  method: string;
  params?: Params;
  // No 'id' field
}

/**
 * Represents the `error` object within a JSON-RPC error response.
 */
export interface JsonRpcErrorObject<Data = unknown> {
  code: number; // Integer
  message: string;
  data?: Data;
}

/**
 * Represents a successful JSON-RPC Response object.
 */
export interface JsonRpcSuccessResponse<Result = unknown> {
  jsonrpc: "2.0";
  id: ResponseId; // Must match the request ID
  result: Result;
}

/**
 * Represents an error JSON-RPC Response object.
 */
export interface JsonRpcErrorResponse<ErrorData = unknown> {
  jsonrpc: "2.0";
  id: ResponseId; // Must match the request ID, or null if error occurred before ID was parsed
  error: JsonRpcErrorObject<ErrorData>;
}

/**
 * Represents any valid JSON-RPC Response (success or error).
 */
export type JsonRpcResponse<Result = unknown, ErrorData = unknown> =
  | JsonRpcSuccessResponse<Result>
  | JsonRpcErrorResponse<ErrorData>;
