import type {
  LLMProvider,
  LLMRequest,
  LLMResponse,
  Message,
  ToolDefinition,
} from "../types.js";

/**
 * Mock LLM provider for testing.
 * Returns pre-configured responses in sequence.
 */
export class MockLLMProvider implements LLMProvider {
  private responses: LLMResponse[];
  private callIndex = 0;
  /** Records all calls for assertion */
  public calls: Array<{ system?: string; messages: Message[]; tools: ToolDefinition[] }> = [];

  constructor(responses: LLMResponse[]) {
    this.responses = responses;
  }

  async chat(request: LLMRequest): Promise<LLMResponse> {
    this.calls.push({
      system: request.system,
      messages: structuredClone(request.messages),
      tools: [...request.tools],
    });
    if (this.callIndex >= this.responses.length) {
      return {
        content: [{ type: "text", text: "No more mock responses configured." }],
        stopReason: "end_turn",
      };
    }
    return this.responses[this.callIndex++];
  }

  /** Reset call counter (reuse same responses) */
  reset(): void {
    this.callIndex = 0;
    this.calls = [];
  }
}

/** Shorthand for a final text answer */
export function textResponse(...texts: string[]): LLMResponse {
  return {
    content: texts.map((text) => ({ type: "text" as const, text })),
    stopReason: "end_turn",
  };
}
