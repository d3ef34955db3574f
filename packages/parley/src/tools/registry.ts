import type { Tool } from "./tool.js";

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  /**
   * Creates a registry from a list of tools.
   *
   * @example
   * ```typescript
   * const registry = ToolRegistry.from([new TavilySearchTool(options), trendsTool]);
   * ```
   */
  static from(tools: readonly Tool[]): ToolRegistry {
    const registry = new ToolRegistry();
    for (const tool of tools) {
      registry.register(tool);
    }
    return registry;
  }

  // Names are case-sensitive: "Tavily_Search" and "tavily_search" are different tools
  register(tool: Tool): this {
    if (!/^\w+$/.test(tool.name)) {
      throw new Error(`Tool name '${tool.name}' must contain only letters, digits and underscores`);
    }
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool '${tool.name}' is already registered`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  getNames(): string[] {
    return Array.from(this.tools.keys());
  }

  getAll(): Tool[] {
    return Array.from(this.tools.values());
  }
}
