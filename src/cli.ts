#!/usr/bin/env node
/**
 * freshrss-agent CLI: interactive chat or a one-shot daily digest.
 *
 *   freshrss-agent                    interactive chat (FreshRSS API)
 *   freshrss-agent --mcp              interactive chat (tools via MCP server)
 *   freshrss-agent digest             daily digest
 *   freshrss-agent digest --markdown  daily digest in Markdown
 *   freshrss-agent digest --slack     ...and post it to SLACK_WEBHOOK_URL
 */

import "dotenv/config";
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { parseArgs } from "node:util";
import type { Agent, OnStepCallback } from "./agent.js";
import { createAgent, createBackend, createProvider } from "./app.js";
import { loadSettings, type Settings } from "./config.js";
import { ConfigError } from "./errors.js";
import { withToolBackend } from "./mcp/backend.js";
import { formatForSlack, SlackNotifier } from "./notify/slack.js";
import { buildDigestPrompt } from "./prompt/system-prompt.js";

const USAGE = `Usage: freshrss-agent [chat|digest] [options]

Options:
  --mcp             Call tools through the MCP server instead of the FreshRSS API
  -m, --markdown    digest: output Markdown
  --slack           digest: also post the digest to SLACK_WEBHOOK_URL
  -h, --help        Show this help

Environment: see .env.example (USE_MCP=true enables MCP mode by default)`;

const logStep: OnStepCallback = ({ iteration, toolCalls, toolResults, thinking }) => {
  console.log(`  [Step ${iteration}]`);
  if (thinking) {
    console.log(`    Thinking: ${truncate(thinking, 120)}`);
  }
  for (const tc of toolCalls) {
    console.log(`    -> ${tc.name}(${truncate(JSON.stringify(tc.input), 80)})`);
  }
  for (const tr of toolResults) {
    console.log(`    <- ${tr.name}: ${truncate(tr.result, 100)}`);
  }
};

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      mcp: { type: "boolean", default: false },
      markdown: { type: "boolean", short: "m", default: false },
      slack: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const command = positionals[0] ?? "chat";
  if (command !== "chat" && command !== "digest") {
    console.error(`Unknown command: ${command}\n\n${USAGE}`);
    process.exitCode = 1;
    return;
  }

  let settings: Settings;
  try {
    settings = loadSettings();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      console.error("Please create a .env file with the required variables (see .env.example)");
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const mode = values.mcp || settings.useMcp ? "remote" : "local";
  const llm = createProvider(settings);
  const backend = createBackend(settings, mode);

  if (mode === "remote") {
    console.log(`Connecting to MCP server: ${settings.mcpServerUrl}`);
  }

  await withToolBackend(backend, async (connected) => {
    if (mode === "remote") {
      console.log(`Found ${connected.definitions().length} tool(s)`);
    }
    const agent = createAgent({ settings, llm, backend: connected, onStep: logStep });

    if (command === "digest") {
      await runDigest(agent, settings, {
        markdown: values.markdown ?? false,
        slack: values.slack ?? false,
      });
    } else {
      await runInteractive(agent, settings);
    }
  });
}

async function runInteractive(agent: Agent, settings: Settings) {
  const label = agent.mode === "remote" ? "MCP Mode" : "Direct API Mode";
  console.log(`FreshRSS Agent Interactive Mode (${label})`);
  console.log(`Using LLM: ${settings.model} (${settings.provider})`);
  console.log("Commands: quit, exit, q, reset\n");

  const rl = readline.createInterface({ input, output });
  try {
    while (true) {
      const query = (await rl.question("You> ")).trim();
      if (!query) continue;

      const lowered = query.toLowerCase();
      if (lowered === "quit" || lowered === "exit" || lowered === "q") {
        console.log("Goodbye!");
        break;
      }

      if (lowered === "reset") {
        agent.reset();
        console.log("[Conversation history reset]\n");
        continue;
      }

      try {
        const response = await agent.chat(query);
        console.log(`\nAssistant: ${response}\n`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`\n[Error: ${message}]\n`);
      }
    }
  } finally {
    rl.close();
  }
}

async function runDigest(
  agent: Agent,
  settings: Settings,
  options: { markdown: boolean; slack: boolean },
) {
  console.log("Generating daily digest...\n");
  const format = options.markdown || options.slack ? "markdown" : "text";
  const digest = await agent.chat(buildDigestPrompt(format));
  console.log(digest);

  if (options.slack) {
    if (!settings.slackWebhookUrl) {
      throw new ConfigError("SLACK_WEBHOOK_URL is not set");
    }
    const sent = await new SlackNotifier(settings.slackWebhookUrl).send(
      formatForSlack(digest),
    );
    console.log(sent ? "\nDigest posted to Slack." : "\nFailed to post digest to Slack.");
    if (!sent) process.exitCode = 1;
  }
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + "..." : text;
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? `Error: ${error.message}` : error);
  process.exitCode = 1;
});
