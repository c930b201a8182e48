import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { ConnectionError, SessionStateError } from "../errors.js";
import { isRecord } from "../utils/json.js";
import type { ToolInputSchema } from "../types.js";

/** A tool as an MCP server describes it (note the camelCase schema field) */
export interface RemoteToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

/** The slice of an MCP session the remote backend depends on */
export interface RemoteToolClient {
  connect(): Promise<void>;
  listTools(): Promise<RemoteToolDescriptor[]>;
  callTool(name: string, args?: Record<string, unknown>): Promise<string>;
  close(): Promise<void>;
}

export interface MCPClientOptions {
  /** e.g. http://localhost:8080/mcp */
  url: string;
  /** Sent as `Authorization: Bearer <token>` on every request */
  authToken?: string;
  /** Override the transport (tests use an in-memory pair) */
  transport?: () => Transport;
}

type SessionState = "idle" | "connected" | "failed" | "closed";

/** Error codes the SDK raises locally when the session itself is broken */
const TRANSPORT_ERRORS: ReadonlySet<number> = new Set([
  ErrorCode.ConnectionClosed,
  ErrorCode.RequestTimeout,
]);

const CLIENT_INFO = { name: "freshrss-agent", version: "0.1.0" };

/**
 * MCP client session over Streamable HTTP.
 *
 * Lifecycle: connect() once, then listTools()/callTool(), then close().
 * close() is idempotent and also cleans up after a failed connect().
 */
export class MCPClient implements RemoteToolClient {
  private url: string;
  private authToken?: string;
  private createTransport: () => Transport;
  private client: Client | null = null;
  private state: SessionState = "idle";

  constructor(options: MCPClientOptions) {
    this.url = options.url;
    this.authToken = options.authToken;
    this.createTransport = options.transport ?? (() => this.httpTransport());
  }

  get connected(): boolean {
    return this.state === "connected";
  }

  /** Open the transport and run the initialize handshake */
  async connect(): Promise<void> {
    if (this.state !== "idle") {
      throw new SessionStateError(`Cannot connect: session is ${this.state}`);
    }

    const client = new Client(CLIENT_INFO, { capabilities: {} });
    this.client = client;
    try {
      await client.connect(this.createTransport());
    } catch (err) {
      this.state = "failed";
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConnectionError(
        `Failed to connect to MCP server at ${this.url}: ${reason}`,
        { cause: err },
      );
    }
    this.state = "connected";
  }

  async listTools(): Promise<RemoteToolDescriptor[]> {
    const client = this.requireSession("listTools");
    const { tools } = await client.listTools();
    return tools.map((tool): RemoteToolDescriptor => ({
      name: tool.name,
      description: tool.description ?? "",
      inputSchema: { ...tool.inputSchema, type: "object" },
    }));
  }

  /**
   * Invoke a tool and flatten its text parts into one string.
   *
   * A result flagged `isError` is still returned as text so the model can
   * see it, and so is a protocol error the server answers with (unknown
   * tool, invalid params). Transport failures reject.
   */
  async callTool(name: string, args: Record<string, unknown> = {}): Promise<string> {
    const client = this.requireSession("callTool");
    let result: Awaited<ReturnType<Client["callTool"]>>;
    try {
      result = await client.callTool({ name, arguments: args });
    } catch (err) {
      if (err instanceof McpError && !TRANSPORT_ERRORS.has(err.code)) {
        return JSON.stringify({ error: err.message });
      }
      throw err;
    }

    const content: unknown = "content" in result ? result.content : undefined;
    const parts: unknown[] = Array.isArray(content) ? content : [];
    if (parts.length === 0) {
      return JSON.stringify({ result: "no content" });
    }

    const texts: string[] = [];
    for (const part of parts) {
      if (isRecord(part) && part.type === "text" && typeof part.text === "string") {
        texts.push(part.text);
      }
    }
    return texts.length > 0 ? texts.join("\n") : JSON.stringify({ result: "success" });
  }

  async close(): Promise<void> {
    if (this.state === "closed") return;
    const client = this.client;
    this.client = null;
    this.state = "closed";
    if (client) {
      await client.close();
    }
  }

  private requireSession(operation: string): Client {
    if (this.state !== "connected" || !this.client) {
      throw new SessionStateError(
        `Cannot ${operation}: session is ${this.state}`,
      );
    }
    return this.client;
  }

  private httpTransport(): Transport {
    const headers: Record<string, string> = {};
    if (this.authToken) {
      headers.Authorization = `Bearer ${this.authToken}`;
    }
    return new StreamableHTTPClientTransport(new URL(this.url), {
      requestInit: { headers },
    });
  }
}
