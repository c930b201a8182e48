/**
 * Core type definitions for the feed agent.
 *
 * The transcript follows the content-block shape of the Messages API:
 * Message → ContentBlock → Tool → Backend → Agent.
 */

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export type Role = "user" | "assistant";

export interface TextBlock {
  type: "text";
  text: string;
}

export interface ToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: "tool_result";
  /** Links back to the originating tool_use block */
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

export interface Message {
  /** "user" also carries tool_result blocks back to the model */
  role: Role;
  content: ContentBlock[];
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

/** JSON-Schema object describing a tool's input */
export interface ToolInputSchema {
  type: "object";
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

/** Tool definition in the shape the LLM API expects */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
}

export type ToolHandler = (input: Record<string, unknown>) => Promise<string>;

export interface Tool {
  definition: ToolDefinition;
  handler: ToolHandler;
}

// ---------------------------------------------------------------------------
// Tool backends
// ---------------------------------------------------------------------------

export type BackendKind = "local" | "remote";

/**
 * Where tool calls go. The agent only sees this interface, so it never knows
 * whether a tool runs in-process or on an MCP server.
 */
export interface ToolBackend {
  readonly kind: BackendKind;
  /** The catalog offered to the LLM */
  definitions(): ToolDefinition[];
  /** Run a tool. Tool-level failures come back as content, not exceptions. */
  execute(name: string, input: Record<string, unknown>): Promise<string>;
  /** Acquire whatever the backend needs (remote sessions); no-op locally */
  connect(): Promise<void>;
  /** Release it again. Must be idempotent. */
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Agent configuration
// ---------------------------------------------------------------------------

export interface AgentConfig {
  /** Display name */
  name: string;
  /** Model identifier, e.g. "claude-sonnet-4-20250514" */
  model: string;
  /** Upper bound on LLM calls per chat(); unbounded when omitted */
  maxTurns?: number;
}

// ---------------------------------------------------------------------------
// LLM abstraction (thin wrapper so we can swap providers or mock in tests)
// ---------------------------------------------------------------------------

export type StopReason =
  | "end_turn"
  | "tool_use"
  | "max_tokens"
  | "stop_sequence"
  | "refusal"
  | "pause_turn"
  | "unknown";

export interface LLMRequest {
  system?: string;
  messages: Message[];
  tools: ToolDefinition[];
}

export interface LLMResponse {
  content: ContentBlock[];
  stopReason: StopReason;
}

export interface LLMProvider {
  chat(request: LLMRequest): Promise<LLMResponse>;
}
