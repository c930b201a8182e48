import type { StopReason } from "./types.js";

/** Missing or malformed settings */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** The MCP endpoint was unreachable or rejected the initialize handshake */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

/** A session operation was issued outside the connected state */
export class SessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionStateError";
  }
}

/** The model stopped for a reason the loop cannot continue from */
export class UnexpectedStopReasonError extends Error {
  readonly stopReason: StopReason;

  constructor(stopReason: StopReason) {
    super(`Agent stopped: ${stopReason}`);
    this.name = "UnexpectedStopReasonError";
    this.stopReason = stopReason;
  }
}

export class MaxTurnsExceededError extends Error {
  readonly maxTurns: number;

  constructor(maxTurns: number) {
    super(`No final answer after ${maxTurns} LLM call(s)`);
    this.name = "MaxTurnsExceededError";
    this.maxTurns = maxTurns;
  }
}

/** FreshRSS API failure; `status` is set for non-2xx responses */
export class FreshRSSError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "FreshRSSError";
    this.status = status;
  }
}
