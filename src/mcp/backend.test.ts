import { describe, it, expect, vi } from "vitest";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { MCPToolBackend, withToolBackend } from "./backend.js";
import { MCPClient, type RemoteToolClient, type RemoteToolDescriptor } from "./client.js";
import { Agent } from "../agent.js";
import { MockLLMProvider, textResponse } from "../llm/mock-provider.js";
import { ConnectionError } from "../errors.js";

const CATALOG: RemoteToolDescriptor[] = [
  {
    name: "get_unread_articles",
    description: "List unread articles",
    inputSchema: { type: "object", properties: { limit: { type: "integer" } } },
  },
  {
    name: "mark_articles_read",
    description: "Mark articles read",
    inputSchema: { type: "object", required: ["article_ids"] },
  },
];

function fakeClient(results: Record<string, string[]> = {}) {
  const queues = new Map(Object.entries(results));
  return {
    connect: vi.fn(async () => {}),
    listTools: vi.fn(async () => CATALOG),
    callTool: vi.fn(async (name: string) => queues.get(name)?.shift() ?? "{}"),
    close: vi.fn(async () => {}),
  } satisfies RemoteToolClient;
}

const TWO_ARTICLES = JSON.stringify({
  count: 2,
  articles: [
    { id: "1", title: "A" },
    { id: "2", title: "B" },
  ],
});
const ONE_ARTICLE = JSON.stringify({ count: 1, articles: [{ id: "3", title: "C" }] });

describe("MCPToolBackend", () => {
  it("fetches and bridges the catalog once on connect", async () => {
    const client = fakeClient();
    const backend = new MCPToolBackend(client);

    expect(backend.definitions()).toEqual([]);
    await backend.connect();

    expect(client.listTools).toHaveBeenCalledTimes(1);
    expect(backend.definitions()).toEqual([
      {
        name: "get_unread_articles",
        description: "List unread articles",
        input_schema: { type: "object", properties: { limit: { type: "integer" } } },
      },
      {
        name: "mark_articles_read",
        description: "Mark articles read",
        input_schema: { type: "object", required: ["article_ids"] },
      },
    ]);
    backend.definitions();
    expect(client.listTools).toHaveBeenCalledTimes(1);
  });

  it("passes calls straight through", async () => {
    const client = fakeClient({ mark_articles_read: ['{"success":true}'] });
    const backend = new MCPToolBackend(client);
    await backend.connect();

    const result = await backend.execute("mark_articles_read", { article_ids: ["1"] });

    expect(result).toBe('{"success":true}');
    expect(client.callTool).toHaveBeenCalledWith("mark_articles_read", { article_ids: ["1"] });
  });

  it("caches the articles of get_unread_articles results", async () => {
    const backend = new MCPToolBackend(
      fakeClient({ get_unread_articles: [TWO_ARTICLES] }),
    );
    await backend.connect();

    await backend.execute("get_unread_articles", {});

    expect(backend.articles.get()).toEqual([
      { id: "1", title: "A" },
      { id: "2", title: "B" },
    ]);
  });

  it("keeps the cache through unrelated calls and replaces it on refetch", async () => {
    const backend = new MCPToolBackend(
      fakeClient({
        get_unread_articles: [TWO_ARTICLES, ONE_ARTICLE],
        mark_articles_read: [JSON.stringify({ articles: [{ id: "x" }] })],
      }),
    );
    await backend.connect();

    await backend.execute("get_unread_articles", {});
    await backend.execute("mark_articles_read", { article_ids: ["1"] });
    expect(backend.articles.get().map((a) => a.id)).toEqual(["1", "2"]);

    await backend.execute("get_unread_articles", {});
    expect(backend.articles.get()).toEqual([{ id: "3", title: "C" }]);
  });

  it("leaves the cache alone when the result is not an article list", async () => {
    const backend = new MCPToolBackend(
      fakeClient({ get_unread_articles: [TWO_ARTICLES, "FreshRSS login failed"] }),
    );
    await backend.connect();

    await backend.execute("get_unread_articles", {});
    const result = await backend.execute("get_unread_articles", {});

    expect(result).toBe("FreshRSS login failed");
    expect(backend.articles.size).toBe(2);
  });

  it("lets transport errors through", async () => {
    const client = fakeClient();
    client.callTool.mockRejectedValueOnce(new Error("stream closed"));
    const backend = new MCPToolBackend(client);
    await backend.connect();

    await expect(backend.execute("get_unread_articles", {})).rejects.toThrow("stream closed");
  });
});

describe("withToolBackend", () => {
  it("connects, runs and closes", async () => {
    const client = fakeClient();
    const backend = new MCPToolBackend(client);

    const count = await withToolBackend(backend, async (b) => b.definitions().length);

    expect(count).toBe(2);
    expect(client.connect).toHaveBeenCalledTimes(1);
    expect(client.close).toHaveBeenCalledTimes(1);
  });

  it("closes when the body throws", async () => {
    const client = fakeClient();
    const backend = new MCPToolBackend(client);

    await expect(
      withToolBackend(backend, async () => {
        throw new Error("conversation failed");
      }),
    ).rejects.toThrow("conversation failed");
    expect(client.close).toHaveBeenCalledTimes(1);
  });

  it("keeps the session error first when close fails too", async () => {
    const client = fakeClient();
    client.close.mockRejectedValueOnce(new Error("close failed"));
    const sessionError = new Error("conversation failed");

    const err = await withToolBackend(new MCPToolBackend(client), async () => {
      throw sessionError;
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AggregateError);
    expect(err).toMatchObject({ message: "conversation failed" });
    expect(err instanceof AggregateError ? err.errors : []).toEqual([
      sessionError,
      new Error("close failed"),
    ]);
  });

  it("reports a failing close after a successful session", async () => {
    const client = fakeClient();
    client.close.mockRejectedValueOnce(new Error("close failed"));

    await expect(
      withToolBackend(new MCPToolBackend(client), async () => "ok"),
    ).rejects.toThrow("close failed");
  });

  it("closes when connect itself fails", async () => {
    const client = fakeClient();
    client.connect.mockRejectedValueOnce(new ConnectionError("unreachable"));
    const body = vi.fn(async () => "unused");

    await expect(withToolBackend(new MCPToolBackend(client), body)).rejects.toThrow(
      ConnectionError,
    );
    expect(body).not.toHaveBeenCalled();
    expect(client.close).toHaveBeenCalledTimes(1);
  });
});

describe("Agent over MCP", () => {
  async function feedServer(): Promise<MCPClient> {
    const server = new Server(
      { name: "test-feed-server", version: "1.0.0" },
      { capabilities: { tools: {} } },
    );
    server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: [
        {
          name: "get_unread_articles",
          description: "List unread articles",
          inputSchema: { type: "object", properties: { limit: { type: "integer" } } },
        },
      ],
    }));
    server.setRequestHandler(CallToolRequestSchema, async (request) => {
      if (request.params.name !== "get_unread_articles") {
        throw new McpError(ErrorCode.InvalidParams, `Tool ${request.params.name} not found`);
      }
      return { content: [{ type: "text", text: TWO_ARTICLES }] };
    });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    return new MCPClient({ url: "http://localhost:8080/mcp", transport: () => clientTransport });
  }

  it("offers the bridged catalog and runs remote tools", async () => {
    const llm = new MockLLMProvider([
      {
        content: [
          { type: "tool_use", id: "toolu_1", name: "get_unread_articles", input: { limit: 2 } },
          { type: "tool_use", id: "toolu_2", name: "nope", input: {} },
        ],
        stopReason: "tool_use",
      },
      textResponse("Two unread: A and B."),
    ]);
    const backend = new MCPToolBackend(await feedServer());

    const answer = await withToolBackend(backend, (connected) =>
      new Agent({ config: { name: "test", model: "mock" }, llm, backend: connected }).chat(
        "show me unread articles",
      ),
    );

    expect(answer).toBe("Two unread: A and B.");
    expect(llm.calls[0].tools).toEqual([
      {
        name: "get_unread_articles",
        description: "List unread articles",
        input_schema: { type: "object", properties: { limit: { type: "integer" } } },
      },
    ]);
    expect(llm.calls[1].messages[2]).toEqual({
      role: "user",
      content: [
        { type: "tool_result", tool_use_id: "toolu_1", content: TWO_ARTICLES },
        {
          type: "tool_result",
          tool_use_id: "toolu_2",
          content: JSON.stringify({ error: "MCP error -32602: MCP error -32602: Tool nope not found" }),
        },
      ],
    });
    expect(backend.articles.size).toBe(2);
  });
});
