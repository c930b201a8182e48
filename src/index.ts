export { Agent, extractText, type AgentOptions, type OnStepCallback } from "./agent.js";
export { AGENT_NAME, createAgent, createBackend, createProvider } from "./app.js";
export {
  DEFAULT_MCP_SERVER_URL,
  loadSettings,
  requireFreshRSS,
  type Settings,
  type FreshRSSSettings,
  type LLMProviderName,
} from "./config.js";
export * from "./errors.js";
export {
  FreshRSSClient,
  type Article,
  type FeedReader,
  type FreshRSSClientOptions,
} from "./freshrss/client.js";
export { ToolRegistry, defineTool } from "./tools/registry.js";
export {
  createFeedTools,
  createLocalBackend,
  FEED_TOOL_NAMES,
  UNREAD_ARTICLES_TOOL,
  type FeedToolName,
} from "./tools/feed-tools.js";
export { ArticleCache } from "./tools/article-cache.js";
export {
  MCPClient,
  type MCPClientOptions,
  type RemoteToolClient,
  type RemoteToolDescriptor,
} from "./mcp/client.js";
export { toAnthropicSchema } from "./mcp/schema-bridge.js";
export { MCPToolBackend, withToolBackend, type CachedArticle } from "./mcp/backend.js";
export {
  buildSystemPrompt,
  buildDigestPrompt,
  type PromptSection,
  type DigestFormat,
} from "./prompt/system-prompt.js";
export { SlackNotifier, formatForSlack } from "./notify/slack.js";
export { AnthropicProvider } from "./llm/anthropic-provider.js";
export { OpenAIProvider } from "./llm/openai-provider.js";
export { MockLLMProvider, textResponse } from "./llm/mock-provider.js";
export type * from "./types.js";
