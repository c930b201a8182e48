import { describe, it, expect, vi } from "vitest";
import { createFeedTools, createLocalBackend, FEED_TOOL_NAMES } from "./feed-tools.js";
import { ArticleCache } from "./article-cache.js";
import type { Article, FeedReader } from "../freshrss/client.js";

function article(id: string, overrides: Partial<Article> = {}): Article {
  return {
    id,
    title: `Title ${id}`,
    url: `https://blog.example.com/${id}`,
    feedTitle: "Example Blog",
    author: "Jo Writer",
    content: `Body of ${id}`,
    published: 1700000000,
    ...overrides,
  };
}

function makeReader(articles: Article[] = []) {
  return {
    getUnreadArticles: vi.fn<FeedReader["getUnreadArticles"]>(async () => articles),
    markAsRead: vi.fn<FeedReader["markAsRead"]>(async () => true),
  };
}

describe("feed tools", () => {
  it("exposes the three FreshRSS tools", () => {
    const backend = createLocalBackend(makeReader());
    expect(backend.names()).toEqual([...FEED_TOOL_NAMES]);
    expect(backend.definitions().map((d) => d.input_schema.type)).toEqual([
      "object",
      "object",
      "object",
    ]);
  });

  describe("get_unread_articles", () => {
    it("formats articles and defaults the limit to 20", async () => {
      const reader = makeReader([article("1")]);
      const backend = createLocalBackend(reader);

      const result = await backend.execute("get_unread_articles", {});

      expect(reader.getUnreadArticles).toHaveBeenCalledWith(20);
      expect(JSON.parse(result)).toEqual({
        count: 1,
        articles: [
          {
            id: "1",
            title: "Title 1",
            feed: "Example Blog",
            author: "Jo Writer",
            url: "https://blog.example.com/1",
            content_preview: "Body of 1",
          },
        ],
      });
      // pretty-printed with two spaces
      expect(result.startsWith('{\n  "count": 1,')).toBe(true);
    });

    it("cuts previews at 500 characters", async () => {
      const backend = createLocalBackend(
        makeReader([article("long", { content: "x".repeat(600) })]),
      );
      const result = JSON.parse(await backend.execute("get_unread_articles", { limit: 5 }));
      expect(result.articles[0].content_preview).toBe("x".repeat(500) + "...");
    });

    it("counts preview length in code points", async () => {
      const emoji = "\u{1F4F0}";
      const backend = createLocalBackend(
        makeReader([
          article("exact", { content: emoji.repeat(500) }),
          article("over", { content: "a" + emoji.repeat(500) }),
        ]),
      );
      const result = JSON.parse(await backend.execute("get_unread_articles", { limit: 5 }));
      expect(result.articles[0].content_preview).toBe(emoji.repeat(500));
      expect(result.articles[1].content_preview).toBe("a" + emoji.repeat(499) + "...");
    });

    it("rejects a non-integer limit as error content", async () => {
      const reader = makeReader();
      const backend = createLocalBackend(reader);
      const result = await backend.execute("get_unread_articles", { limit: "ten" });
      expect(JSON.parse(result)).toEqual({ error: "limit must be a positive integer" });
      expect(reader.getUnreadArticles).not.toHaveBeenCalled();
    });

    it("reports feed-reader failures as error content", async () => {
      const reader = makeReader();
      reader.getUnreadArticles.mockRejectedValueOnce(new Error("401 Unauthorized"));
      const backend = createLocalBackend(reader);
      const result = await backend.execute("get_unread_articles", {});
      expect(JSON.parse(result)).toEqual({ error: "401 Unauthorized" });
    });
  });

  describe("mark_articles_read", () => {
    it("marks the given ids", async () => {
      const reader = makeReader();
      const backend = createLocalBackend(reader);
      const result = await backend.execute("mark_articles_read", { article_ids: ["1", "2"] });
      expect(reader.markAsRead).toHaveBeenCalledWith(["1", "2"]);
      expect(JSON.parse(result)).toEqual({ success: true, marked_count: 2 });
    });

    it("reports zero marked when the server declines", async () => {
      const reader = makeReader();
      reader.markAsRead.mockResolvedValueOnce(false);
      const backend = createLocalBackend(reader);
      const result = await backend.execute("mark_articles_read", { article_ids: ["1"] });
      expect(JSON.parse(result)).toEqual({ success: false, marked_count: 0 });
    });

    it("refuses an empty id list without calling the server", async () => {
      const reader = makeReader();
      const backend = createLocalBackend(reader);
      const result = await backend.execute("mark_articles_read", { article_ids: [] });
      expect(JSON.parse(result)).toEqual({ success: false, error: "No article IDs provided" });
      expect(reader.markAsRead).not.toHaveBeenCalled();
    });

    it("rejects ids that are not strings", async () => {
      const backend = createLocalBackend(makeReader());
      const result = await backend.execute("mark_articles_read", { article_ids: [1, 2] });
      expect(JSON.parse(result)).toEqual({ error: "article_ids must be an array of strings" });
    });
  });

  describe("summarize_articles", () => {
    it("asks for a fetch first when nothing is cached", async () => {
      const backend = createLocalBackend(makeReader());
      const result = await backend.execute("summarize_articles", {});
      expect(JSON.parse(result)).toEqual({
        error: "No articles cached. Please call get_unread_articles first.",
      });
    });

    it("returns the cached articles with the requested style", async () => {
      const reader = makeReader([article("1"), article("2")]);
      const backend = createLocalBackend(reader);
      await backend.execute("get_unread_articles", {});

      const result = await backend.execute("summarize_articles", { style: "bullet_points" });

      expect(JSON.parse(result)).toEqual({
        style: "bullet_points",
        articles: [
          { title: "Title 1", feed: "Example Blog", content: "Body of 1" },
          { title: "Title 2", feed: "Example Blog", content: "Body of 2" },
        ],
        instruction: "Please summarize these 2 articles in bullet_points style.",
      });
      expect(reader.getUnreadArticles).toHaveBeenCalledTimes(1);
    });

    it("rejects an unknown style", async () => {
      const backend = createLocalBackend(makeReader());
      const result = await backend.execute("summarize_articles", { style: "haiku" });
      expect(JSON.parse(result)).toEqual({
        error: "style must be one of: brief, detailed, bullet_points",
      });
    });
  });

  it("replaces the cache on every fetch", async () => {
    const cache = new ArticleCache<Article>();
    const reader = makeReader();
    reader.getUnreadArticles
      .mockResolvedValueOnce([article("1"), article("2")])
      .mockResolvedValueOnce([article("3")]);
    const tools = createFeedTools(reader, cache);

    await tools.get_unread_articles.handler({});
    expect(cache.get().map((a) => a.id)).toEqual(["1", "2"]);

    await tools.mark_articles_read.handler({ article_ids: ["1"] });
    expect(cache.get().map((a) => a.id)).toEqual(["1", "2"]);

    await tools.get_unread_articles.handler({});
    expect(cache.get().map((a) => a.id)).toEqual(["3"]);
  });
});
