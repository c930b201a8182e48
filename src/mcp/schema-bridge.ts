import type { RemoteToolDescriptor } from "./client.js";
import type { ToolDefinition } from "../types.js";

/**
 * Convert an MCP tool catalog to the Messages API tool format.
 *
 * MCP:       { name, description, inputSchema }
 * Anthropic: { name, description, input_schema }
 *
 * Only the field name changes; the schema object is passed through as is.
 * Apply once per catalog fetch.
 */
export function toAnthropicSchema(tools: RemoteToolDescriptor[]): ToolDefinition[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: tool.inputSchema,
  }));
}
