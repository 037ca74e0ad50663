import type { ConversationTurn } from "./llm.js";
import type { ToolCall, ToolRegistry, ToolResult } from "./tools.js";

export interface AgentSpec {
  readonly systemPrompt: string;
  readonly tools: ToolRegistry;
}

export interface ScratchPadEntry {
  call: ToolCall;
  result: ToolResult;
  reused: boolean;
}

export type ExecutionResult =
  | { ok: true; answer: string }
  | { ok: false; error: string };

export interface Agent {
  execute(query: string, history?: readonly ConversationTurn[]): Promise<ExecutionResult>;
}
