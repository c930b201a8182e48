/**
 * MCP walkthrough: discover the server's tools, bridge their schemas to the
 * LLM tool format, then call a couple of them directly. No LLM involved.
 *
 *   MCP_SERVER_URL=http://localhost:8080/mcp npm run example:mcp
 */

import "dotenv/config";
import { DEFAULT_MCP_SERVER_URL, MCPClient, toAnthropicSchema } from "../src/index.js";

function section(title: string) {
  console.log(`\n${"=".repeat(60)}\n${title}\n${"=".repeat(60)}`);
}

async function main() {
  const url = process.env.MCP_SERVER_URL || DEFAULT_MCP_SERVER_URL;
  const client = new MCPClient({ url, authToken: process.env.MCP_AUTH_TOKEN });

  console.log(`Connecting to ${url}`);
  await client.connect();
  try {
    section("Tool discovery (MCP inputSchema)");
    const tools = await client.listTools();
    for (const tool of tools) {
      console.log(`- ${tool.name}: ${tool.description}`);
      console.log(`  inputSchema: ${JSON.stringify(tool.inputSchema)}`);
    }

    section("Bridged for the LLM (input_schema)");
    console.log(JSON.stringify(toAnthropicSchema(tools), null, 2));

    section("Tool calls");
    const names = new Set(tools.map((t) => t.name));
    if (names.has("get_unread_articles")) {
      console.log("get_unread_articles({ limit: 3 }) ->");
      console.log(await client.callTool("get_unread_articles", { limit: 3 }));
    }
    // Unknown names come back as error content, not as an exception
    console.log("no_such_tool({}) ->");
    console.log(await client.callTool("no_such_tool"));
  } finally {
    await client.close();
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? `Error: ${error.message}` : error);
  process.exitCode = 1;
});
