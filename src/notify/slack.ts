const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Slack Incoming Webhook client for sending digests.
 */
export class SlackNotifier {
  private webhookUrl: string;
  private fetchImpl: typeof fetch;
  private timeoutMs: number;

  constructor(
    webhookUrl: string,
    options: { fetch?: typeof fetch; timeoutMs?: number } = {},
  ) {
    this.webhookUrl = webhookUrl;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Post a message. Resolves false when Slack answers with a non-2xx status
   * or the request never completes (network error, timeout).
   */
  async send(text: string): Promise<boolean> {
    try {
      const response = await this.fetchImpl(this.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ text, mrkdwn: true }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return response.ok;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`Slack webhook request failed: ${reason}`);
      return false;
    }
  }
}

/**
 * Convert standard Markdown to Slack mrkdwn.
 *
 *   [text](url) -> <url|text>
 *   **bold**    -> *bold*
 *   ## Heading  -> *Heading*
 */
export function formatForSlack(markdown: string): string {
  return markdown
    .replace(/\[([^\]]+)\]\(([^)]+)\)/g, "<$2|$1>")
    .replace(/\*\*([^*]+)\*\*/g, "*$1*")
    .replace(/^#{1,6}\s+(.+)$/gm, "*$1*");
}
