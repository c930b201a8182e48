import { FreshRSSError } from "../errors.js";
import { isRecord } from "../utils/json.js";

/**
 * FreshRSS client speaking the Google Reader compatible API
 * (`/api/greader.php`).
 *
 * Covers the three calls the agent needs: ClientLogin, the unread
 * reading-list stream and edit-tag to mark items read.
 */

export interface Article {
  id: string;
  title: string;
  url: string;
  feedTitle: string;
  author: string;
  content: string;
  /** Unix timestamp (seconds) */
  published: number;
}

/** What the feed tools need from a feed reader */
export interface FeedReader {
  getUnreadArticles(limit?: number): Promise<Article[]>;
  markAsRead(articleIds: string[]): Promise<boolean>;
}

export interface FreshRSSClientOptions {
  /** e.g. https://rss.example.com/api/greader.php */
  apiUrl: string;
  username: string;
  /** API password set in the FreshRSS profile, not the login password */
  password: string;
  /** Swappable for tests */
  fetch?: typeof fetch;
  /** Per-request timeout, default 30 s */
  timeoutMs?: number;
}

const READING_LIST = "user/-/state/com.google/reading-list";
const READ_STATE = "user/-/state/com.google/read";
const DEFAULT_LIMIT = 20;
const DEFAULT_TIMEOUT_MS = 30_000;

export class FreshRSSClient implements FeedReader {
  private apiUrl: string;
  private username: string;
  private password: string;
  private fetchImpl: typeof fetch;
  private timeoutMs: number;
  private authToken: string | null = null;

  constructor(options: FreshRSSClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, "");
    this.username = options.username;
    this.password = options.password;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Authenticate and keep the token for later calls */
  async login(): Promise<string> {
    const body = await this.request("/accounts/ClientLogin", {
      method: "POST",
      body: new URLSearchParams({
        Email: this.username,
        Passwd: this.password,
      }),
    });

    // Body is "SID=...\nLSID=...\nAuth=..."
    for (const line of body.trim().split("\n")) {
      if (line.startsWith("Auth=")) {
        this.authToken = line.slice("Auth=".length);
        return this.authToken;
      }
    }
    throw new FreshRSSError("Failed to get auth token from response");
  }

  async getUnreadArticles(limit = DEFAULT_LIMIT): Promise<Article[]> {
    const params = new URLSearchParams({
      xt: READ_STATE,
      n: String(limit),
      output: "json",
    });
    const body = await this.request(
      `/reader/api/0/stream/contents/${READING_LIST}?${params}`,
      { headers: await this.authHeaders() },
    );

    const data: unknown = JSON.parse(body);
    const items = isRecord(data) && Array.isArray(data.items) ? data.items : [];
    return items.filter(isRecord).map(toArticle);
  }

  async markAsRead(articleIds: string[]): Promise<boolean> {
    if (articleIds.length === 0) return true;

    const headers = await this.authHeaders();
    // edit-tag needs a short-lived write token
    const editToken = (
      await this.request("/reader/api/0/token", { headers })
    ).trim();

    const form = new URLSearchParams();
    for (const id of articleIds) form.append("i", id);
    form.append("a", READ_STATE);
    form.append("T", editToken);

    const body = await this.request("/reader/api/0/edit-tag", {
      method: "POST",
      headers,
      body: form,
    });
    return body.trim() === "OK";
  }

  private async authHeaders(): Promise<Record<string, string>> {
    const token = this.authToken ?? (await this.login());
    return { Authorization: `GoogleLogin auth=${token}` };
  }

  private async request(path: string, init: RequestInit): Promise<string> {
    const response = await this.fetchImpl(`${this.apiUrl}${path}`, {
      ...init,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new FreshRSSError(
        `FreshRSS request ${path.split("?")[0]} failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }
    return response.text();
  }
}

// ---------------------------------------------------------------------------
// Response parsing
// ---------------------------------------------------------------------------

function str(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function firstHref(links: unknown): string {
  if (!Array.isArray(links) || links.length === 0) return "";
  const first: unknown = links[0];
  return isRecord(first) ? str(first.href) : "";
}

function toArticle(item: Record<string, unknown>): Article {
  const origin: Record<string, unknown> = isRecord(item.origin) ? item.origin : {};
  const summary: Record<string, unknown> = isRecord(item.summary) ? item.summary : {};
  return {
    id: str(item.id),
    title: str(item.title),
    url: firstHref(item.canonical) || firstHref(item.alternate),
    feedTitle: str(origin.title),
    author: str(item.author),
    content: str(summary.content),
    published: typeof item.published === "number" ? item.published : 0,
  };
}
