/**
 * Standard JSON-RPC 2.0 error codes (reserved range).
 */
export const ErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * An error a method handler throws to answer with a specific JSON-RPC error
 * instead of the generic internal error.
 */
export class McpError extends Error {
  public readonly code: number;

  constructor(code: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "McpError";
    this.code = code;
    Object.setPrototypeOf(this, McpError.prototype);
  }
}

export type TransportOperation = "read" | "write";

/**
 * Failure of the underlying stream. Always fatal to the server loop.
 */
export class TransportError extends Error {
  public readonly operation: TransportOperation;

  constructor(operation: TransportOperation, cause: unknown) {
    super(
      `Transport ${operation} failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
    this.name = "TransportError";
    this.operation = operation;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
