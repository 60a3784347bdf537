import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { ToolRegistry } from "../types/mcp";
import type { Logger } from "../utils/logger";
import type { ServerContext } from "./context";

/**
 * What a handler sees besides its params.
 */
export interface HandlerContext {
  server: ServerContext;
  tools: ToolRegistry;
  logger: Logger;
}

/**
 * How the dispatcher treats `params` before calling a handler.
 *
 * - `required`: absent params are an invalid-params error.
 * - `optional`: absent params are validated as `{}`.
 * - `ignored`: the schema always sees `undefined`.
 */
export type ParamsPolicy = "required" | "optional" | "ignored";

export type ParamsSchema<Params> = ZodType<Params, ZodTypeDef, unknown>;

export interface RequestHandler<Params, Result> {
  params: ParamsPolicy;
  schema: ParamsSchema<Params>;
  handle(params: Params, context: HandlerContext): Result | Promise<Result>;
}

export interface NotificationHandler<Params> {
  params: ParamsPolicy;
  schema: ParamsSchema<Params>;
  handle(params: Params, context: HandlerContext): void | Promise<void>;
}

export type PreparedCall<Result> =
  | { ok: true; run(context: HandlerContext): Promise<Result> }
  | { ok: false; error: ZodError };

/**
 * A handler with its params type erased: `prepare` validates raw params and
 * hands back a call bound to the parsed value.
 */
export interface RegisteredMethod<Result> {
  params: ParamsPolicy;
  prepare(params: unknown): PreparedCall<Result>;
}

function bind<Params, Result>(handler: {
  params: ParamsPolicy;
  schema: ParamsSchema<Params>;
  handle(params: Params, context: HandlerContext): Result | Promise<Result>;
}): RegisteredMethod<Result> {
  return {
    params: handler.params,
    prepare(raw) {
      const parsed = handler.schema.safeParse(raw);
      if (!parsed.success) {
        return { ok: false, error: parsed.error };
      }
      const params = parsed.data;
      return {
        ok: true,
        run: (context) =>
          Promise.resolve().then(() => handler.handle(params, context)),
      };
    },
  };
}

/**
 * Maps method names to handlers. Requests and notifications live in separate
 * tables since a notification never gets an answer.
 */
export class MethodRegistry {
  private requests = new Map<string, RegisteredMethod<unknown>>();
  private notifications = new Map<string, RegisteredMethod<void>>();

  /**
   * Register a request handler
   * @throws if the method already has a request handler
   */
  onRequest<Params, Result>(
    method: string,
    handler: RequestHandler<Params, Result>
  ): this {
    if (this.requests.has(method)) {
      throw new Error(`Request method '${method}' is already registered`);
    }
    this.requests.set(method, bind(handler));
    return this;
  }

  /**
   * Register a notification handler
   * @throws if the method already has a notification handler
   */
  onNotification<Params>(
    method: string,
    handler: NotificationHandler<Params>
  ): this {
    if (this.notifications.has(method)) {
      throw new Error(`Notification method '${method}' is already registered`);
    }
    this.notifications.set(method, bind(handler));
    return this;
  }

  getRequestHandler(method: string): RegisteredMethod<unknown> | undefined {
    return this.requests.get(method);
  }

  getNotificationHandler(method: string): RegisteredMethod<void> | undefined {
    return this.notifications.get(method);
  }

  requestMethods(): string[] {
    return [...this.requests.keys()];
  }

  notificationMethods(): string[] {
    return [...this.notifications.keys()];
  }
}
