import { describe, expect, it } from "vitest";
import { InMemoryToolRegistry } from "../../src/registry";
import {
  DUMMY_TOOL_NAME,
  dummyToolHandler,
  registerBuiltinTools,
} from "../../src/tools/dummyTool";

describe("Tool: dummy_tool_from_rust", () => {
  it("echoes its arguments as compact JSON", () => {
    expect(dummyToolHandler({ city: "Lisbon", days: [1, 2] })).toEqual({
      content: [
        {
          type: "text",
          text: 'dummy_tool_from_rust executed successfully! Received args: {"city":"Lisbon","days":[1,2]}',
        },
      ],
    });
  });

  it("reports missing arguments as null", () => {
    expect(dummyToolHandler(undefined).content[0].text).toBe(
      "dummy_tool_from_rust executed successfully! Received args: null"
    );
  });

  it("is registered enabled unless configured otherwise", () => {
    const enabled = new InMemoryToolRegistry();
    registerBuiltinTools(enabled);
    expect(enabled.isToolRegistered(DUMMY_TOOL_NAME)).toBe(true);

    const disabled = new InMemoryToolRegistry();
    registerBuiltinTools(disabled, [DUMMY_TOOL_NAME]);
    expect(disabled.isToolRegistered(DUMMY_TOOL_NAME)).toBe(false);
    expect(disabled.getAllTools()).toEqual([]);
  });
});
