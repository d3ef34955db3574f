import { beforeEach, describe, expect, it } from "vitest";
import { ToolRegistry } from "./registry.js";
import { createTool } from "./tool.js";

const makeTool = (name: string) =>
  createTool({ name, description: `${name} tool`, execute: () => `${name} ran` });

describe("ToolRegistry", () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
  });

  describe("register", () => {
    it("registers a tool under its name", () => {
      const tool = makeTool("Tavily_Search");
      registry.register(tool);

      expect(registry.get("Tavily_Search")).toBe(tool);
    });

    it("throws error when registering duplicate name", () => {
      registry.register(makeTool("Duplicate"));

      expect(() => registry.register(makeTool("Duplicate"))).toThrowError(
        "Tool 'Duplicate' is already registered",
      );
    });

    it("rejects names an action directive cannot express", () => {
      expect(() => registry.register(makeTool("web search"))).toThrowError(
        "Tool name 'web search' must contain only letters, digits and underscores",
      );
    });
  });

  describe("lookup", () => {
    it("is case-sensitive", () => {
      registry.register(makeTool("Tavily_Search"));

      expect(registry.get("tavily_search")).toBeUndefined();
      expect(registry.get("TAVILY_SEARCH")).toBeUndefined();
    });

    it("lists names in registration order", () => {
      const from = ToolRegistry.from([makeTool("B"), makeTool("A")]);

      expect(from.getNames()).toEqual(["B", "A"]);
      expect(from.getAll().map((tool) => tool.name)).toEqual(["B", "A"]);
    });
  });
});
