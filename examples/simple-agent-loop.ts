/**
 * Agent loop demo with simulated tools. No FreshRSS or MCP server needed,
 * only an LLM key (see .env.example).
 *
 *   npm run example:loop -- "Find notes on tool use and create a task to review them"
 */

import "dotenv/config";
import {
  Agent,
  ConfigError,
  ToolRegistry,
  createProvider,
  defineTool,
  loadSettings,
  type OnStepCallback,
} from "../src/index.js";

const tools = new ToolRegistry({
  search_knowledge: defineTool(
    {
      name: "search_knowledge",
      description: "Search the knowledge base for information",
      input_schema: {
        type: "object",
        properties: { query: { type: "string", description: "Search query" } },
        required: ["query"],
      },
    },
    async ({ query }) =>
      [
        `Found 3 notes about "${String(query)}":`,
        "1. An agent loop calls the model until it stops asking for tools",
        "2. Tool results go back to the model as tool_result blocks",
        "3. MCP lets one agent reuse tools served by another process",
      ].join("\n"),
  ),
  send_email: defineTool(
    {
      name: "send_email",
      description: "Send an email",
      input_schema: {
        type: "object",
        properties: {
          to: { type: "string", description: "Recipient" },
          subject: { type: "string", description: "Subject" },
          body: { type: "string", description: "Body" },
        },
        required: ["to", "subject", "body"],
      },
    },
    async ({ to, subject }) => `Email sent to ${String(to)}, subject: ${String(subject)}`,
  ),
  create_task: defineTool(
    {
      name: "create_task",
      description: "Create a todo task",
      input_schema: {
        type: "object",
        properties: {
          title: { type: "string", description: "Task title" },
          due_date: { type: "string", description: "Due date" },
        },
        required: ["title"],
      },
    },
    async ({ title }) => `Task created: ${String(title)}`,
  ),
});

const logStep: OnStepCallback = ({ iteration, toolCalls, toolResults }) => {
  console.log(`\n--- Iteration ${iteration} ---`);
  toolCalls.forEach((tc, i) => {
    console.log(`  ${tc.name}(${JSON.stringify(tc.input)})`);
    console.log(`    -> ${toolResults[i]?.result ?? ""}`);
  });
};

async function main() {
  const request =
    process.argv.slice(2).join(" ") ||
    "Search for information about AI agents, then create a task to study them tomorrow.";

  const settings = loadSettings();
  const agent = new Agent({
    config: { name: "Demo Agent", model: settings.model, maxTurns: 10 },
    llm: createProvider(settings),
    backend: tools,
    systemPrompt: [
      "You are an assistant that helps users complete tasks.",
      "You can search a knowledge base, send emails and create tasks.",
      "Work step by step and use several tools when needed.",
    ].join("\n"),
    onStep: logStep,
  });

  console.log(`User: ${request}`);
  const answer = await agent.chat(request);
  console.log(`\nAgent: ${answer}`);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
