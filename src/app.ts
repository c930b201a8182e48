import { Agent, type OnStepCallback } from "./agent.js";
import { requireFreshRSS, type Settings } from "./config.js";
import { FreshRSSClient } from "./freshrss/client.js";
import { AnthropicProvider } from "./llm/anthropic-provider.js";
import { OpenAIProvider } from "./llm/openai-provider.js";
import { MCPToolBackend } from "./mcp/backend.js";
import { MCPClient } from "./mcp/client.js";
import { buildSystemPrompt } from "./prompt/system-prompt.js";
import { createLocalBackend } from "./tools/feed-tools.js";
import type { BackendKind, LLMProvider, ToolBackend } from "./types.js";

/**
 * Wiring from Settings to a ready-to-use agent. Kept apart from the CLI so
 * other entry points (scripts, tests) can build the same thing.
 */

export const AGENT_NAME = "FreshRSS Agent";

export function createProvider(settings: Settings): LLMProvider {
  const options = {
    apiKey: settings.apiKey,
    model: settings.model,
    maxTokens: settings.maxTokens,
  };
  return settings.provider === "openai"
    ? new OpenAIProvider({ ...options, baseURL: settings.baseURL })
    : new AnthropicProvider(options);
}

/** Local: FreshRSS API in-process. Remote: tools served by the MCP server. */
export function createBackend(settings: Settings, mode: BackendKind): ToolBackend {
  if (mode === "remote") {
    return new MCPToolBackend(
      new MCPClient({
        url: settings.mcpServerUrl,
        authToken: settings.mcpAuthToken,
      }),
    );
  }
  return createLocalBackend(new FreshRSSClient(requireFreshRSS(settings)));
}

/** The backend must already be connected (see withToolBackend) */
export function createAgent(options: {
  settings: Settings;
  llm: LLMProvider;
  backend: ToolBackend;
  onStep?: OnStepCallback;
}): Agent {
  const config = {
    name: AGENT_NAME,
    model: options.settings.model,
    maxTurns: options.settings.maxTurns,
  };
  return new Agent({
    config,
    llm: options.llm,
    backend: options.backend,
    systemPrompt: buildSystemPrompt({ config, mode: options.backend.kind }),
    onStep: options.onStep,
  });
}
