import type { AgentConfig, BackendKind } from "../types.js";

/**
 * System prompt builder.
 *
 * Assembles the prompt from: base instructions + runtime info + extra sections.
 * Tool descriptions are not repeated here; they travel in the API's `tools`
 * field.
 */

export interface SystemPromptParts {
  config: AgentConfig;
  mode: BackendKind;
  /** Override the default RSS assistant instructions */
  baseInstructions?: string;
  /** Extra context sections appended after the runtime section */
  extraSections?: PromptSection[];
  /** Injectable clock for stable output in tests */
  now?: Date;
}

export interface PromptSection {
  heading: string;
  content: string;
}

export const DEFAULT_INSTRUCTIONS = [
  "You are an RSS reading assistant that helps users manage and read articles from FreshRSS.",
  "",
  "You can:",
  "1. Get unread articles list",
  "2. Summarize article content",
  "3. Mark articles as read",
  "",
  "When users ask about articles, first fetch the article list, " +
    "then process according to user needs.",
].join("\n");

export function buildSystemPrompt(parts: SystemPromptParts): string {
  const sections: string[] = [];

  sections.push(parts.baseInstructions ?? DEFAULT_INSTRUCTIONS);
  sections.push(buildRuntimeSection(parts));

  if (parts.extraSections) {
    for (const sec of parts.extraSections) {
      sections.push(`## ${sec.heading}\n\n${sec.content}`);
    }
  }

  return sections.join("\n\n---\n\n");
}

function buildRuntimeSection(parts: SystemPromptParts): string {
  const now = parts.now ?? new Date();
  return [
    "## Runtime Information",
    "",
    `- Agent: ${parts.config.name}`,
    `- Model: ${parts.config.model}`,
    `- Tools: ${parts.mode === "remote" ? "MCP server" : "FreshRSS API"}`,
    `- Time: ${now.toISOString()}`,
  ].join("\n");
}

export type DigestFormat = "text" | "markdown";

/** The request behind `freshrss-agent digest` */
export function buildDigestPrompt(format: DigestFormat = "text"): string {
  const lines = [
    "Please generate today's RSS reading digest:",
    "1. First get all unread articles",
    "2. Categorize by source, provide a brief summary for each article",
    "3. Finally recommend the top 3 most worth reading articles for today",
  ];
  if (format === "markdown") {
    lines.push("", "Please output in Markdown format.");
  }
  return lines.join("\n");
}
