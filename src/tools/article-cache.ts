/**
 * Remembers the last article list a tool fetched, so later tools in the same
 * conversation (summaries) can use it without another round trip.
 *
 * Every fetch replaces the whole list. Nothing is evicted or persisted.
 */
export class ArticleCache<T> {
  private articles: readonly T[] = [];

  replace(articles: readonly T[]): void {
    this.articles = [...articles];
  }

  get(): readonly T[] {
    return this.articles;
  }

  get size(): number {
    return this.articles.length;
  }

  isEmpty(): boolean {
    return this.articles.length === 0;
  }

  clear(): void {
    this.articles = [];
  }
}
