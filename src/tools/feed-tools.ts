import { defineTool, ToolRegistry } from "./registry.js";
import { ArticleCache } from "./article-cache.js";
import type { Article, FeedReader } from "../freshrss/client.js";
import type { Tool } from "../types.js";

export const FEED_TOOL_NAMES = [
  "get_unread_articles",
  "mark_articles_read",
  "summarize_articles",
] as const;

export type FeedToolName = (typeof FEED_TOOL_NAMES)[number];

/** Tool whose result feeds the article cache, in both backends */
export const UNREAD_ARTICLES_TOOL: FeedToolName = "get_unread_articles";

const SUMMARY_STYLES = ["brief", "detailed", "bullet_points"] as const;
type SummaryStyle = (typeof SUMMARY_STYLES)[number];

const DEFAULT_LIMIT = 20;
const PREVIEW_CHARS = 500;

/**
 * The FreshRSS tools, keyed by name.
 *
 * get_unread_articles refreshes `cache`; summarize_articles reads it back so
 * the model can summarize without another fetch.
 */
export function createFeedTools(
  reader: FeedReader,
  cache: ArticleCache<Article>,
): Record<FeedToolName, Tool> {
  return {
    get_unread_articles: defineTool(
      {
        name: "get_unread_articles",
        description:
          "Get unread articles from FreshRSS. " +
          "Returns article title, source, author, and content preview.",
        input_schema: {
          type: "object",
          properties: {
            limit: {
              type: "integer",
              description: "Maximum number of articles to return, defaults to 20",
              default: DEFAULT_LIMIT,
            },
          },
          required: [],
        },
      },
      async (input) => {
        const limit = readLimit(input.limit);
        const articles = await reader.getUnreadArticles(limit);
        cache.replace(articles);

        const result = articles.map((a) => ({
          id: a.id,
          title: a.title,
          feed: a.feedTitle,
          author: a.author,
          url: a.url,
          content_preview: preview(a.content),
        }));
        return JSON.stringify({ count: result.length, articles: result }, null, 2);
      },
    ),

    mark_articles_read: defineTool(
      {
        name: "mark_articles_read",
        description: "Mark specified articles as read",
        input_schema: {
          type: "object",
          properties: {
            article_ids: {
              type: "array",
              items: { type: "string" },
              description: "List of article IDs to mark as read",
            },
          },
          required: ["article_ids"],
        },
      },
      async (input) => {
        const ids = readIds(input.article_ids);
        if (ids.length === 0) {
          return JSON.stringify({ success: false, error: "No article IDs provided" });
        }
        const success = await reader.markAsRead(ids);
        return JSON.stringify({
          success,
          marked_count: success ? ids.length : 0,
        });
      },
    ),

    summarize_articles: defineTool(
      {
        name: "summarize_articles",
        description:
          "Request article summarization. " +
          "Returns the full content of the last fetched articles so the assistant can summarize them.",
        input_schema: {
          type: "object",
          properties: {
            style: {
              type: "string",
              enum: [...SUMMARY_STYLES],
              description: "Summary style: brief, detailed, or bullet_points",
              default: "brief",
            },
          },
          required: [],
        },
      },
      async (input) => {
        const style = readStyle(input.style);
        if (cache.isEmpty()) {
          return JSON.stringify({
            error: "No articles cached. Please call get_unread_articles first.",
          });
        }
        const articles = cache.get().map((a) => ({
          title: a.title,
          feed: a.feedTitle,
          content: a.content,
        }));
        return JSON.stringify({
          style,
          articles,
          instruction: `Please summarize these ${articles.length} articles in ${style} style.`,
        });
      },
    ),
  };
}

/** Local backend: the feed tools running in-process against a feed reader */
export function createLocalBackend(
  reader: FeedReader,
  cache = new ArticleCache<Article>(),
): ToolRegistry<FeedToolName> {
  return new ToolRegistry(createFeedTools(reader, cache));
}

// ---------------------------------------------------------------------------
// Argument readers. They throw on bad input; the registry turns that into error JSON
// ---------------------------------------------------------------------------

function readLimit(value: unknown): number {
  if (value === undefined) return DEFAULT_LIMIT;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new Error("limit must be a positive integer");
  }
  return value;
}

function readIds(value: unknown): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((id) => typeof id === "string")) {
    throw new Error("article_ids must be an array of strings");
  }
  return value;
}

function readStyle(value: unknown): SummaryStyle {
  if (value === undefined) return "brief";
  const style = SUMMARY_STYLES.find((s) => s === value);
  if (!style) {
    throw new Error(`style must be one of: ${SUMMARY_STYLES.join(", ")}`);
  }
  return style;
}

/** Cut by code point so a surrogate pair is never split */
function preview(content: string): string {
  const chars = Array.from(content);
  return chars.length > PREVIEW_CHARS
    ? chars.slice(0, PREVIEW_CHARS).join("") + "..."
    : content;
}
