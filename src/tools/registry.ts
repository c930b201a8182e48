import type { Tool, ToolBackend, ToolDefinition, ToolHandler } from "../types.js";

/**
 * Tool registry for in-process tools.
 *
 * The set of tools is fixed at construction: a table keyed by a closed union
 * of names. Lookups narrow an arbitrary string to that union before
 * dispatching, so an unknown name can only ever produce an error result.
 *
 * Doubles as the local ToolBackend: there is nothing to connect or close.
 */
export class ToolRegistry<Name extends string = string> implements ToolBackend {
  readonly kind = "local" as const;
  private tools = new Map<string, Tool>();

  constructor(table: Record<Name, Tool>) {
    for (const [name, tool] of Object.entries<Tool>(table)) {
      if (tool.definition.name !== name) {
        throw new Error(
          `Tool "${tool.definition.name}" is registered under "${name}"`,
        );
      }
      this.tools.set(name, tool);
    }
  }

  has(name: string): name is Name {
    return this.tools.has(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /** Execute a tool by name; unknown tools and handler failures become error JSON */
  async execute(name: string, input: Record<string, unknown>): Promise<string> {
    const tool = this.get(name);
    if (!tool) {
      return JSON.stringify({ error: `Unknown tool: ${name}` });
    }
    try {
      return await tool.handler(input);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return JSON.stringify({ error: message });
    }
  }

  /** Return definitions for all registered tools */
  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((t) => t.definition);
  }

  /** Number of registered tools */
  get size(): number {
    return this.tools.size;
  }

  /** All registered tool names */
  names(): string[] {
    return [...this.tools.keys()];
  }

  async connect(): Promise<void> {}

  async close(): Promise<void> {}
}

// ---------------------------------------------------------------------------
// Helper to build a Tool from parts
// ---------------------------------------------------------------------------

export function defineTool(
  definition: ToolDefinition,
  handler: ToolHandler,
): Tool {
  return { definition, handler };
}
