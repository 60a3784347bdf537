import { z } from "zod";
import type { JsonRpcId } from "../types/json-rpc";
import { RawJsonNumber } from "../utils/jsonNumber";

/**
 * Protocol revision this server speaks. Clients asking for another revision
 * still get this one back from `initialize`.
 */
export const SUPPORTED_PROTOCOL_VERSION = "2024-11-05";

// --- JSON-RPC envelopes ---

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    value instanceof RawJsonNumber
  );
}

export const JsonRpcIdSchema = z.custom<JsonRpcId>(isJsonRpcId, {
  message: "Invalid input",
});

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: JsonRpcIdSchema,
  method: z.string().min(1, "Method is required"),
  params: z.unknown().optional(),
});

export const JsonRpcNotificationSchema = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.string().min(1, "Method is required"),
  params: z.unknown().optional(),
});

// --- Lifecycle ---

export const ImplementationSchema = z.object({
  name: z.string(),
  version: z.string(),
});

// Client capabilities are accepted but not interpreted
export const ClientCapabilitiesSchema = z.record(z.unknown());

export const InitializeRequestSchema = z.object({
  protocolVersion: z.string(),
  capabilities: ClientCapabilitiesSchema,
  clientInfo: ImplementationSchema,
});
export type InitializeRequestParams = z.infer<typeof InitializeRequestSchema>;

// `initialized` currently carries no fields; unknown keys are ignored
export const InitializedNotificationSchema = z.object({});
export type InitializedNotificationParams = z.infer<
  typeof InitializedNotificationSchema
>;

export const CancelRequestNotificationSchema = z.object({
  id: JsonRpcIdSchema.optional(),
  requestId: JsonRpcIdSchema.optional(),
  reason: z.string().optional(),
});
export type CancelRequestNotificationParams = z.infer<
  typeof CancelRequestNotificationSchema
>;

// --- Tools ---

export const CallToolRequestSchema = z.object({
  name: z.string().min(1, "Tool name is required"),
  // Any JSON value, `null` included, but the member itself must be present
  arguments: z
    .unknown()
    .refine((value) => value !== undefined, { message: "Required" }),
});
export type CallToolRequestParams = z.infer<typeof CallToolRequestSchema>;
