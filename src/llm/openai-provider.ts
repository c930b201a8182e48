import OpenAI from "openai";
import type {
  ContentBlock,
  LLMProvider,
  LLMRequest,
  LLMResponse,
  Message,
  StopReason,
} from "../types.js";
import { isRecord, tryParseJson } from "../utils/json.js";

/**
 * OpenAI-compatible LLM provider.
 * Works with OpenAI, DeepSeek, Kimi (Moonshot), and any compatible endpoint.
 *
 * The transcript is kept in content-block form; this class translates it to
 * chat-completions messages on the way out and back on the way in:
 *   tool_use blocks    <-> assistant tool_calls
 *   tool_result blocks <-> one "tool" message each
 *   finish_reason      ->  stop reason ("tool_calls" -> tool_use, "stop" -> end_turn)
 *
 * A reply that carries tool_calls is a tool_use turn whatever its
 * finish_reason says; some compatible endpoints report "stop" there.
 */

/** The part of the OpenAI client this provider calls */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.ChatCompletionCreateParamsNonStreaming,
      ): Promise<Pick<OpenAI.ChatCompletion, "choices">>;
    };
  };
}

export class OpenAIProvider implements LLMProvider {
  private client: ChatCompletionsClient;
  private model: string;
  private maxTokens: number;

  constructor(options: {
    apiKey?: string;
    baseURL?: string;
    model: string;
    maxTokens?: number;
    client?: ChatCompletionsClient;
  }) {
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey ?? process.env.OPENAI_API_KEY,
        baseURL: options.baseURL ?? process.env.OPENAI_BASE_URL,
      });
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 4096;
  }

  async chat(request: LLMRequest): Promise<LLMResponse> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: "system", content: request.system });
    }
    for (const m of request.messages) {
      messages.push(...toChatMessages(m));
    }

    const tools: OpenAI.ChatCompletionTool[] = request.tools.map((t) => ({
      type: "function",
      function: {
        name: t.name,
        description: t.description,
        parameters: t.input_schema,
      },
    }));

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages,
      tools: tools.length > 0 ? tools : undefined,
      max_tokens: this.maxTokens,
    });

    const choice = response.choices.at(0);
    if (!choice) {
      throw new Error("OpenAI response contained no choices");
    }

    const content: ContentBlock[] = [];
    if (choice.message.content) {
      content.push({ type: "text", text: choice.message.content });
    }
    for (const tc of choice.message.tool_calls ?? []) {
      content.push({
        type: "tool_use",
        id: tc.id,
        name: tc.function.name,
        input: parseArguments(tc.function.arguments),
      });
    }

    const stopReason = content.some((b) => b.type === "tool_use")
      ? "tool_use"
      : toStopReason(choice.finish_reason);
    return { content, stopReason };
  }
}

/** One transcript message may expand to several chat messages */
export function toChatMessages(message: Message): OpenAI.ChatCompletionMessageParam[] {
  const text = message.content
    .flatMap((b) => (b.type === "text" ? [b.text] : []))
    .join("\n");

  if (message.role === "assistant") {
    const toolCalls = message.content.flatMap((b) =>
      b.type === "tool_use"
        ? [{
            id: b.id,
            type: "function" as const,
            function: { name: b.name, arguments: JSON.stringify(b.input) },
          }]
        : [],
    );
    return [{
      role: "assistant",
      content: text || null,
      tool_calls: toolCalls.length > 0 ? toolCalls : undefined,
    }];
  }

  const out: OpenAI.ChatCompletionMessageParam[] = message.content.flatMap((b) =>
    b.type === "tool_result"
      ? [{ role: "tool" as const, tool_call_id: b.tool_use_id, content: b.content }]
      : [],
  );
  if (text) {
    out.push({ role: "user", content: text });
  }
  return out;
}

/** Arguments arrive as a JSON string; anything but an object becomes {} */
function parseArguments(json: string): Record<string, unknown> {
  const parsed = tryParseJson(json);
  return isRecord(parsed) ? parsed : {};
}

function toStopReason(finishReason: string): StopReason {
  switch (finishReason) {
    case "tool_calls":
    case "function_call":
      return "tool_use";
    case "stop":
      return "end_turn";
    case "length":
      return "max_tokens";
    case "content_filter":
      return "refusal";
    default:
      return "unknown";
  }
}
