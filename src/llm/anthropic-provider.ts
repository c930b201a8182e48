import Anthropic from "@anthropic-ai/sdk";
import type {
  ContentBlock,
  LLMProvider,
  LLMRequest,
  LLMResponse,
  Message,
  StopReason,
} from "../types.js";
import { isRecord } from "../utils/json.js";

/**
 * Anthropic Messages API provider.
 *
 * The transcript already uses the Messages API block shapes, so requests map
 * one to one. Response blocks other than text and tool_use (thinking, server
 * tools) are not part of the transcript model and are dropped.
 */

/** The part of the Anthropic client this provider calls */
export interface MessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
    ): Promise<Pick<Anthropic.Message, "content" | "stop_reason">>;
  };
}

export class AnthropicProvider implements LLMProvider {
  private client: MessagesClient;
  private model: string;
  private maxTokens: number;

  constructor(options: {
    apiKey?: string;
    baseURL?: string;
    model: string;
    maxTokens?: number;
    client?: MessagesClient;
  }) {
    this.client =
      options.client ??
      new Anthropic({
        apiKey: options.apiKey ?? process.env.ANTHROPIC_API_KEY,
        baseURL: options.baseURL,
      });
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 4096;
  }

  async chat(request: LLMRequest): Promise<LLMResponse> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      system: request.system,
      messages: request.messages.map(toMessageParam),
      tools: request.tools.length > 0 ? request.tools : undefined,
    });

    const content: ContentBlock[] = [];
    for (const block of response.content) {
      if (block.type === "text") {
        content.push({ type: "text", text: block.text });
      } else if (block.type === "tool_use") {
        content.push({
          type: "tool_use",
          id: block.id,
          name: block.name,
          input: isRecord(block.input) ? block.input : {},
        });
      }
    }

    return { content, stopReason: toStopReason(response.stop_reason) };
  }
}

export function toMessageParam(message: Message): Anthropic.MessageParam {
  return {
    role: message.role,
    content: message.content.map((block): Anthropic.ContentBlockParam => {
      switch (block.type) {
        case "text":
          return { type: "text", text: block.text };
        case "tool_use":
          return { type: "tool_use", id: block.id, name: block.name, input: block.input };
        case "tool_result":
          return {
            type: "tool_result",
            tool_use_id: block.tool_use_id,
            content: block.content,
            is_error: block.is_error,
          };
      }
    }),
  };
}

const STOP_REASONS: readonly StopReason[] = [
  "end_turn",
  "tool_use",
  "max_tokens",
  "stop_sequence",
  "refusal",
  "pause_turn",
];

export function toStopReason(reason: string | null): StopReason {
  return STOP_REASONS.find((r) => r === reason) ?? "unknown";
}
