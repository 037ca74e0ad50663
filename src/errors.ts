export type AgentErrorCode =
  | "construction_type"
  | "empty_query"
  | "unknown_tool"
  | "round_limit"
  | "engine_response"
  | "config";

export class AgentError extends Error {
  constructor(readonly code: AgentErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid engine or tool handed to an agent. Thrown from constructors, never converted to a result. */
export class ConstructionTypeError extends AgentError {
  constructor(message: string) {
    super("construction_type", message);
  }
}

export class EmptyQueryError extends AgentError {
  constructor() {
    super("empty_query", "Empty query provided");
  }
}

export class UnknownToolError extends AgentError {
  constructor(readonly toolName: string) {
    super("unknown_tool", `Unknown tool requested: ${toolName}`);
  }
}

export class RoundLimitError extends AgentError {
  constructor(readonly maxRounds: number) {
    super("round_limit", `No final answer after ${maxRounds} rounds`);
  }
}

export class EngineResponseError extends AgentError {
  constructor(message: string) {
    super("engine_response", message);
  }
}

export class ConfigError extends AgentError {
  constructor(readonly issues: string[]) {
    super("config", `Invalid configuration: ${issues.join("; ")}`);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
