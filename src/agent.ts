import type {
  AgentConfig,
  ContentBlock,
  LLMProvider,
  Message,
  ToolBackend,
  ToolResultBlock,
  ToolUseBlock,
} from "./types.js";
import { MaxTurnsExceededError, UnexpectedStopReasonError } from "./errors.js";

/**
 * Agent: the tool-use loop.
 *
 * Each turn:
 *   1. Send the full transcript and the backend's tool catalog to the LLM
 *   2. Record the assistant message verbatim
 *   3. end_turn: return its text
 *   4. tool_use: run every requested tool in order, feed the results back
 *      as one user message, loop
 *   5. Any other stop reason aborts the exchange
 */

/** Callback fired after each tool round, useful for logging/debugging */
export type OnStepCallback = (step: {
  iteration: number;
  toolCalls: ToolUseBlock[];
  toolResults: Array<{ name: string; result: string }>;
  thinking: string | null;
}) => void;

export interface AgentOptions {
  config: AgentConfig;
  llm: LLMProvider;
  backend: ToolBackend;
  /** System prompt sent with every LLM call */
  systemPrompt?: string;
  /** Optional step callback for debugging */
  onStep?: OnStepCallback;
}

export class Agent {
  private config: AgentConfig;
  private llm: LLMProvider;
  private backend: ToolBackend;
  private systemPrompt?: string;
  private transcript: Message[] = [];
  private onStep?: OnStepCallback;

  constructor(options: AgentOptions) {
    this.config = options.config;
    this.llm = options.llm;
    this.backend = options.backend;
    this.systemPrompt = options.systemPrompt;
    this.onStep = options.onStep;
  }

  /**
   * Run one user turn to completion and return the model's final text.
   *
   * If the exchange fails, the transcript is rolled back to where it was
   * before the call, so the next exchange never starts with an unanswered
   * tool_use block.
   */
  async chat(userMessage: string): Promise<string> {
    const checkpoint = this.transcript.length;
    try {
      return await this.runLoop(userMessage);
    } catch (err) {
      this.transcript.length = checkpoint;
      throw err;
    }
  }

  private async runLoop(userMessage: string): Promise<string> {
    this.transcript.push({
      role: "user",
      content: [{ type: "text", text: userMessage }],
    });

    const maxTurns = this.config.maxTurns;
    let iterations = 0;

    while (true) {
      if (maxTurns !== undefined && iterations >= maxTurns) {
        throw new MaxTurnsExceededError(maxTurns);
      }
      iterations++;

      const response = await this.llm.chat({
        system: this.systemPrompt,
        messages: [...this.transcript],
        tools: this.backend.definitions(),
      });

      this.transcript.push({ role: "assistant", content: response.content });

      switch (response.stopReason) {
        case "end_turn":
          return extractText(response.content);

        case "tool_use": {
          const toolCalls = response.content.filter(isToolUse);
          const results = await this.runTools(toolCalls);

          // All results of one assistant turn go back as a single message
          this.transcript.push({ role: "user", content: results });

          this.onStep?.({
            iteration: iterations,
            toolCalls,
            toolResults: toolCalls.map((tc, i) => ({
              name: tc.name,
              result: results[i].content,
            })),
            thinking: extractText(response.content) || null,
          });
          break;
        }

        default:
          throw new UnexpectedStopReasonError(response.stopReason);
      }
    }
  }

  /** Sequential on purpose: results must line up with their tool_use ids */
  private async runTools(toolCalls: ToolUseBlock[]): Promise<ToolResultBlock[]> {
    const results: ToolResultBlock[] = [];
    for (const tc of toolCalls) {
      const content = await this.backend.execute(tc.name, tc.input);
      results.push({ type: "tool_result", tool_use_id: tc.id, content });
    }
    return results;
  }

  /** Reset conversation history (start a new session) */
  reset(): void {
    this.transcript = [];
  }

  /** Get current conversation history (read-only copy) */
  getHistory(): Message[] {
    return [...this.transcript];
  }

  get mode(): ToolBackend["kind"] {
    return this.backend.kind;
  }
}

function isToolUse(block: ContentBlock): block is ToolUseBlock {
  return block.type === "tool_use";
}

/** Text blocks of an assistant message, newline-joined in block order */
export function extractText(content: ContentBlock[]): string {
  const texts: string[] = [];
  for (const block of content) {
    if (block.type === "text") texts.push(block.text);
  }
  return texts.join("\n");
}
