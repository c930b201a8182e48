import { ConfigError } from "./errors.js";

/**
 * Settings read from the environment (`.env` is loaded by the CLI through
 * dotenv before this runs).
 */

export type LLMProviderName = "anthropic" | "openai";

export interface FreshRSSSettings {
  apiUrl: string;
  username: string;
  password: string;
}

export interface Settings {
  provider: LLMProviderName;
  /** Key for the selected provider */
  apiKey: string;
  /** OpenAI-compatible endpoint override */
  baseURL?: string;
  model: string;
  maxTokens: number;
  /** Unset means no bound on LLM calls per exchange */
  maxTurns?: number;
  /** Only needed by the local backend; see requireFreshRSS() */
  freshrss?: FreshRSSSettings;
  useMcp: boolean;
  mcpServerUrl: string;
  mcpAuthToken?: string;
  slackWebhookUrl?: string;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_MODELS: Record<LLMProviderName, string> = {
  anthropic: "claude-sonnet-4-20250514",
  openai: "gpt-4o-mini",
};
export const DEFAULT_MCP_SERVER_URL = "http://localhost:8080/mcp";
const DEFAULT_MAX_TOKENS = 4096;

export function loadSettings(env: Env = process.env): Settings {
  const provider = readProvider(env.LLM_PROVIDER);
  const apiKey = optional(
    provider === "anthropic" ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY,
  );
  if (!apiKey) {
    const name = provider === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY";
    throw new ConfigError(`${name} is not set`);
  }

  return {
    provider,
    apiKey,
    baseURL: provider === "openai" ? optional(env.OPENAI_BASE_URL) : undefined,
    model: optional(env.LLM_MODEL) ?? DEFAULT_MODELS[provider],
    maxTokens: readPositiveInt("MAX_TOKENS", env.MAX_TOKENS) ?? DEFAULT_MAX_TOKENS,
    maxTurns: readPositiveInt("AGENT_MAX_TURNS", env.AGENT_MAX_TURNS),
    freshrss: readFreshRSS(env),
    useMcp: readBool("USE_MCP", env.USE_MCP),
    mcpServerUrl: optional(env.MCP_SERVER_URL) ?? DEFAULT_MCP_SERVER_URL,
    mcpAuthToken: optional(env.MCP_AUTH_TOKEN),
    slackWebhookUrl: optional(env.SLACK_WEBHOOK_URL),
  };
}

/** FreshRSS credentials, or a ConfigError naming what is missing */
export function requireFreshRSS(settings: Settings): FreshRSSSettings {
  if (!settings.freshrss) {
    throw new ConfigError(
      "FRESHRSS_API_URL, FRESHRSS_USERNAME and FRESHRSS_API_PASSWORD must be set " +
        "to use the FreshRSS API directly (or enable MCP mode)",
    );
  }
  return settings.freshrss;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function readProvider(value: string | undefined): LLMProviderName {
  const v = optional(value)?.toLowerCase() ?? "anthropic";
  if (v !== "anthropic" && v !== "openai") {
    throw new ConfigError(`LLM_PROVIDER must be "anthropic" or "openai", got "${v}"`);
  }
  return v;
}

function readPositiveInt(name: string, value: string | undefined): number | undefined {
  const v = optional(value);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${v}"`);
  }
  return n;
}

function readBool(name: string, value: string | undefined): boolean {
  const v = optional(value)?.toLowerCase();
  if (v === undefined) return false;
  if (["true", "1", "yes", "on"].includes(v)) return true;
  if (["false", "0", "no", "off"].includes(v)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${value}"`);
}

function readFreshRSS(env: Env): FreshRSSSettings | undefined {
  const apiUrl = optional(env.FRESHRSS_API_URL);
  const username = optional(env.FRESHRSS_USERNAME);
  const password = optional(env.FRESHRSS_API_PASSWORD);
  if (!apiUrl || !username || !password) return undefined;
  return { apiUrl, username, password };
}
