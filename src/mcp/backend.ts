import type { RemoteToolClient } from "./client.js";
import { toAnthropicSchema } from "./schema-bridge.js";
import { ArticleCache } from "../tools/article-cache.js";
import { UNREAD_ARTICLES_TOOL } from "../tools/feed-tools.js";
import { isRecord, tryParseJson } from "../utils/json.js";
import type { ToolBackend, ToolDefinition } from "../types.js";

/** An article as the MCP server serialized it; the shape is the server's */
export type CachedArticle = Record<string, unknown>;

/**
 * Remote ToolBackend: every call is forwarded to an MCP server.
 *
 * The catalog is fetched once, on connect. The only state kept besides the
 * session is the article cache, refreshed from get_unread_articles results.
 */
export class MCPToolBackend implements ToolBackend {
  readonly kind = "remote" as const;
  readonly articles = new ArticleCache<CachedArticle>();
  private client: RemoteToolClient;
  private catalog: ToolDefinition[] = [];

  constructor(client: RemoteToolClient) {
    this.client = client;
  }

  /** Connect and discover the server's tools */
  async connect(): Promise<void> {
    await this.client.connect();
    this.catalog = toAnthropicSchema(await this.client.listTools());
  }

  definitions(): ToolDefinition[] {
    return [...this.catalog];
  }

  async execute(name: string, input: Record<string, unknown>): Promise<string> {
    const result = await this.client.callTool(name, input);
    if (name === UNREAD_ARTICLES_TOOL) {
      this.cacheArticles(result);
    }
    return result;
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  /** Replace the cache only when the result really is an article list */
  private cacheArticles(result: string): void {
    const data = tryParseJson(result);
    if (!isRecord(data) || !Array.isArray(data.articles)) return;
    const list: unknown[] = data.articles;
    this.articles.replace(list.filter(isRecord));
  }
}

/**
 * Run `fn` with a connected backend and always close it afterwards,
 * whether connect, fn or neither throws.
 *
 * When both the session and close() fail, the rejection is an
 * AggregateError whose first entry is the session's error.
 */
export async function withToolBackend<B extends ToolBackend, T>(
  backend: B,
  fn: (backend: B) => Promise<T>,
): Promise<T> {
  let result: T;
  try {
    await backend.connect();
    result = await fn(backend);
  } catch (err) {
    try {
      await backend.close();
    } catch (closeErr) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new AggregateError([err, closeErr], reason);
    }
    throw err;
  }
  await backend.close();
  return result;
}
