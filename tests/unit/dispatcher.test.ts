import { beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { createMethodRegistry } from "../../src/handlers";
import { InMemoryToolRegistry, ToolExecutionError } from "../../src/registry";
import { classifyMessage } from "../../src/server/classifier";
import { createServerContext } from "../../src/server/context";
import { Dispatcher } from "../../src/server/dispatcher";
import { MethodRegistry } from "../../src/server/methodRegistry";
import { registerBuiltinTools } from "../../src/tools/dummyTool";
import { createConfig } from "../../src/utils/config";
import { McpError } from "../../src/utils/errors";
import { createTestLogger } from "../helpers/testLogger";

const serverContext = createServerContext(
  createConfig({ MCP_SERVER_NAME: "test-server", MCP_SERVER_VERSION: "9.9.9" })
);

function setup(methods: MethodRegistry = createMethodRegistry()) {
  const { logger, entries } = createTestLogger();
  const tools = new InMemoryToolRegistry();
  registerBuiltinTools(tools);
  const dispatcher = new Dispatcher(
    methods,
    { server: serverContext, tools },
    logger
  );
  const send = (line: string) => dispatcher.dispatch(classifyMessage(line));
  return { dispatcher, tools, entries, send };
}

const initializeParams = {
  protocolVersion: "2024-11-05",
  capabilities: {},
  clientInfo: { name: "test-client", version: "1.0.0" },
};

describe("Dispatcher", () => {
  describe("requests", () => {
    it("answers an unknown method with -32601", async () => {
      const { send } = setup();
      expect(
        await send('{"jsonrpc":"2.0","id":5,"method":"frobnicate"}')
      ).toEqual({
        jsonrpc: "2.0",
        id: 5,
        error: { code: -32601, message: "Method not found: frobnicate" },
      });
    });

    it("answers initialize without params with -32602", async () => {
      const { send } = setup();
      expect(
        await send('{"jsonrpc":"2.0","id":1,"method":"initialize"}')
      ).toEqual({
        jsonrpc: "2.0",
        id: 1,
        error: {
          code: -32602,
          message: "Invalid params for initialize: missing params field",
        },
      });
    });

    it("answers tools/call without params with -32602", async () => {
      const { send } = setup();
      const response = await send(
        '{"jsonrpc":"2.0","id":"c1","method":"tools/call","params":null}'
      );
      expect(response).toEqual({
        jsonrpc: "2.0",
        id: "c1",
        error: {
          code: -32602,
          message: "Invalid params for tools/call: missing params field",
        },
      });
    });

    it("reports the validation failure detail for ill-typed params", async () => {
      const { send } = setup();
      const response = await send(
        JSON.stringify({
          jsonrpc: "2.0",
          id: 2,
          method: "initialize",
          params: { ...initializeParams, protocolVersion: 1 },
        })
      );
      expect(response).toEqual({
        jsonrpc: "2.0",
        id: 2,
        error: {
          code: -32602,
          message:
            "Invalid params for initialize: protocolVersion - Expected string, received number",
        },
      });
    });

    it("answers a tools/call without a tool name with -32602", async () => {
      const { send } = setup();
      const response = await send(
        '{"jsonrpc":"2.0","id":4,"method":"tools/call","params":{}}'
      );
      expect(response).toEqual({
        jsonrpc: "2.0",
        id: 4,
        error: {
          code: -32602,
          message: "Invalid params for tools/call: name - Required",
        },
      });
    });

    it("returns the server identity from initialize", async () => {
      const { send, dispatcher } = setup();
      expect(dispatcher.handshake).toBe("awaiting_initialize");

      const response = await send(
        JSON.stringify({
          jsonrpc: "2.0",
          id: 1,
          method: "initialize",
          params: initializeParams,
        })
      );

      expect(response).toEqual({
        jsonrpc: "2.0",
        id: 1,
        result: {
          protocolVersion: "2024-11-05",
          capabilities: { tools: {}, resources: {}, prompts: {} },
          serverInfo: { name: "test-server", version: "9.9.9" },
        },
      });
      expect(dispatcher.handshake).toBe("awaiting_initialized");
    });

    it("advertises instructions when the server has them", async () => {
      const { logger } = createTestLogger();
      const tools = new InMemoryToolRegistry();
      const dispatcher = new Dispatcher(
        createMethodRegistry(),
        {
          server: createServerContext(
            createConfig({ MCP_SERVER_INSTRUCTIONS: "Use tools/list first." })
          ),
          tools,
        },
        logger
      );

      const response = await dispatcher.dispatch(
        classifyMessage(
          JSON.stringify({
            jsonrpc: "2.0",
            id: 1,
            method: "initialize",
            params: initializeParams,
          })
        )
      );

      expect(response).toMatchObject({
        result: { instructions: "Use tools/list first." },
      });
    });

    it("answers a protocol version mismatch with the server's version and logs it", async () => {
      const { send, entries } = setup();
      const response = await send(
        JSON.stringify({
          jsonrpc: "2.0",
          id: 1,
          method: "initialize",
          params: { ...initializeParams, protocolVersion: "1999-01-01" },
        })
      );

      expect(response).toMatchObject({
        id: 1,
        result: { protocolVersion: "2024-11-05" },
      });
      expect(
        entries().some(
          (e) =>
            e.level === "warn" &&
            e.message ===
              "Client requested protocol version 1999-01-01, but server uses 2024-11-05"
        )
      ).toBe(true);
    });

    it("serves requests sent before initialize", async () => {
      const { send, dispatcher } = setup();
      const response = await send('{"jsonrpc":"2.0","id":1,"method":"ping"}');
      expect(response).toEqual({ jsonrpc: "2.0", id: 1, result: {} });
      expect(dispatcher.handshake).toBe("awaiting_initialize");
    });

    it("lists the built-in catalogue", async () => {
      const { send } = setup();
      expect(
        await send('{"jsonrpc":"2.0","id":1,"method":"resources/list"}')
      ).toEqual({
        jsonrpc: "2.0",
        id: 1,
        result: {
          resources: [
            {
              uri: "mcp://dummy/resource/1",
              name: "Dummy Resource",
              description: "A test resource",
            },
          ],
        },
      });
      expect(
        await send('{"jsonrpc":"2.0","id":2,"method":"prompts/list","params":{"cursor":"x"}}')
      ).toEqual({
        jsonrpc: "2.0",
        id: 2,
        result: {
          prompts: [{ name: "dummy_prompt", description: "A test prompt" }],
        },
      });
    });

    it("maps a handler failure to -32603", async () => {
      const methods = new MethodRegistry().onRequest("explode", {
        params: "ignored",
        schema: z.unknown(),
        handle() {
          throw new Error("kaput");
        },
      });
      const { send } = setup(methods);

      expect(await send('{"jsonrpc":"2.0","id":9,"method":"explode"}')).toEqual({
        jsonrpc: "2.0",
        id: 9,
        error: { code: -32603, message: "Internal error during explode: kaput" },
      });
    });

    it("uses the code of an McpError thrown by a handler", async () => {
      const methods = new MethodRegistry().onRequest("guarded", {
        params: "ignored",
        schema: z.unknown(),
        handle: async () => {
          throw new McpError(-32000, "Not allowed");
        },
      });
      const { send } = setup(methods);

      expect(await send('{"jsonrpc":"2.0","id":"g","method":"guarded"}')).toEqual({
        jsonrpc: "2.0",
        id: "g",
        error: { code: -32000, message: "Not allowed" },
      });
    });

    it("turns an undefined result into null", async () => {
      const methods = new MethodRegistry().onRequest("noop", {
        params: "ignored",
        schema: z.unknown(),
        handle: () => undefined,
      });
      const { send } = setup(methods);

      expect(await send('{"jsonrpc":"2.0","id":1,"method":"noop"}')).toEqual({
        jsonrpc: "2.0",
        id: 1,
        result: null,
      });
    });

    it("validates optional params against an empty object when absent", async () => {
      const handle = vi.fn((params: { limit: number }) => params.limit);
      const methods = new MethodRegistry().onRequest("count", {
        params: "optional",
        schema: z.object({ limit: z.number().default(10) }),
        handle,
      });
      const { send } = setup(methods);

      expect(await send('{"jsonrpc":"2.0","id":1,"method":"count"}')).toEqual({
        jsonrpc: "2.0",
        id: 1,
        result: 10,
      });
      expect(handle).toHaveBeenCalledTimes(1);
    });
  });

  describe("tools/call", () => {
    it("runs the dummy tool", async () => {
      const { send } = setup();
      const response = await send(
        '{"jsonrpc":"2.0","id":3,"method":"tools/call","params":{"name":"dummy_tool_from_rust","arguments":{"a":1}}}'
      );
      expect(response).toEqual({
        jsonrpc: "2.0",
        id: 3,
        result: {
          content: [
            {
              type: "text",
              text: 'dummy_tool_from_rust executed successfully! Received args: {"a":1}',
            },
          ],
        },
      });
    });

    it("reports an unknown tool inside a successful result", async () => {
      const { send } = setup();
      const response = await send(
        '{"jsonrpc":"2.0","id":2,"method":"tools/call","params":{"name":"unknown_tool","arguments":{}}}'
      );
      expect(response).toEqual({
        jsonrpc: "2.0",
        id: 2,
        result: {
          content: [
            {
              type: "text",
              text: "Error: Tool 'unknown_tool' not implemented by this server.",
            },
          ],
          isError: true,
        },
      });
    });

    it("reports a ToolExecutionError inside a successful result", async () => {
      const { send, tools } = setup();
      tools.register({
        name: "flaky",
        inputSchema: { type: "object", properties: {} },
        handler: () => {
          throw new ToolExecutionError("upstream unavailable");
        },
      });

      expect(
        await send(
          '{"jsonrpc":"2.0","id":6,"method":"tools/call","params":{"name":"flaky","arguments":{}}}'
        )
      ).toEqual({
        jsonrpc: "2.0",
        id: 6,
        result: {
          content: [{ type: "text", text: "upstream unavailable" }],
          isError: true,
        },
      });
    });

    it("maps an unexpected tool failure to -32603", async () => {
      const { send, tools } = setup();
      tools.register({
        name: "broken",
        inputSchema: { type: "object", properties: {} },
        handler: async () => {
          throw new Error("disk on fire");
        },
      });

      expect(
        await send(
          '{"jsonrpc":"2.0","id":7,"method":"tools/call","params":{"name":"broken","arguments":{}}}'
        )
      ).toEqual({
        jsonrpc: "2.0",
        id: 7,
        error: {
          code: -32603,
          message: "Internal error during tools/call: disk on fire",
        },
      });
    });
  });

  describe("notifications", () => {
    let initialized: ReturnType<typeof vi.fn>;
    let methods: MethodRegistry;

    beforeEach(() => {
      initialized = vi.fn();
      methods = new MethodRegistry()
        .onNotification("initialized", {
          params: "optional",
          schema: z.object({}),
          handle: initialized,
        })
        .onNotification("fails", {
          params: "ignored",
          schema: z.unknown(),
          handle() {
            throw new Error("nobody listens");
          },
        })
        .onNotification("strict", {
          params: "required",
          schema: z.object({ value: z.number() }),
          handle: vi.fn(),
        });
    });

    it("never answers a notification", async () => {
      const { send, dispatcher } = setup(methods);
      expect(await send('{"jsonrpc":"2.0","method":"initialized"}')).toBeUndefined();
      expect(initialized).toHaveBeenCalledTimes(1);
      expect(dispatcher.handshake).toBe("ready");
    });

    it("ignores unknown notification methods", async () => {
      const { send, entries } = setup(methods);
      expect(await send('{"jsonrpc":"2.0","method":"unheard/of"}')).toBeUndefined();
      expect(
        entries().some(
          (e) => e.message === "Received unhandled notification method: unheard/of"
        )
      ).toBe(true);
    });

    it("logs a failing notification handler instead of answering", async () => {
      const { send, entries } = setup(methods);
      expect(await send('{"jsonrpc":"2.0","method":"fails"}')).toBeUndefined();
      const failure = entries().find(
        (e) => e.message === "Error handling notification"
      );
      expect(failure?.level).toBe("error");
      expect(failure?.data?.error).toBe("nobody listens");
    });

    it("logs invalid notification params instead of answering", async () => {
      const { send, entries } = setup(methods);
      expect(
        await send('{"jsonrpc":"2.0","method":"strict","params":{"value":"x"}}')
      ).toBeUndefined();
      expect(
        entries().some((e) => e.message === "Failed to parse notification params")
      ).toBe(true);
    });

    it("accepts the cancellation notification as a no-op", async () => {
      const { send, entries } = setup();
      expect(
        await send('{"jsonrpc":"2.0","method":"$/cancelRequest","params":{"id":1}}')
      ).toBeUndefined();
      expect(
        entries().some(
          (e) =>
            e.level === "warn" &&
            e.message ===
              "Received cancellation notification, but cancellation is not implemented"
        )
      ).toBe(true);
    });
  });

  describe("malformed messages", () => {
    it("answers unparseable JSON with -32700 and a null id", async () => {
      const { send } = setup();
      expect(await send("not json at all")).toEqual({
        jsonrpc: "2.0",
        id: null,
        error: { code: -32700, message: "Parse error: Invalid JSON received" },
      });
    });

    it("answers an undecodable request against its id", async () => {
      const { send } = setup();
      expect(await send('{"jsonrpc":"2.0","id":7}')).toEqual({
        jsonrpc: "2.0",
        id: 7,
        error: {
          code: -32602,
          message: "Invalid params for request: method - Required",
        },
      });
    });

    it("stays silent for messages without id or method", async () => {
      const { send } = setup();
      expect(await send('{"jsonrpc":"2.0","result":1}')).toBeUndefined();
      expect(await send('{"jsonrpc":"2.0","method":false}')).toBeUndefined();
    });
  });
});
