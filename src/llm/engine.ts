import { z } from "zod";
import type { CompletionOut, Message, ToolCallOut, ToolDefForLLM } from "../types/llm.js";
import type { ToolCall } from "../types/tools.js";
import type { LLMProvider } from "./provider.js";
import { EngineResponseError } from "../errors.js";
import { silentLogger, type Logger } from "../log.js";

export interface DecisionRequest {
  systemPrompt: string;
  transcript: readonly Message[];
  tools: readonly ToolDefForLLM[];
}

/**
 * What the reasoning engine wants next: either the final answer, or exactly one
 * tool invocation. `content` on a tool call is whatever text accompanied it.
 */
export type Decision =
  | { type: "final"; content: string }
  | { type: "tool_call"; call: ToolCall; content: string };

export interface ReasoningEngine {
  decide(req: DecisionRequest): Promise<Decision>;
}

export function isReasoningEngine(value: unknown): value is ReasoningEngine {
  return typeof value === "object" && value !== null && "decide" in value && typeof value.decide === "function";
}

const argsSchema = z.record(z.string(), z.unknown());

export function parseToolArguments(tc: ToolCallOut): Record<string, unknown> {
  if (!tc.arguments.trim()) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(tc.arguments);
  } catch {
    throw new EngineResponseError(`Malformed arguments for tool ${tc.name}: ${tc.arguments}`);
  }
  const parsed = argsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EngineResponseError(`Arguments for tool ${tc.name} must be a JSON object`);
  }
  return parsed.data;
}

export interface CompletionEngineOptions {
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

/** Adapts a chat-completions provider to the single-decision engine boundary. */
export class CompletionEngine implements ReasoningEngine {
  private readonly log: Logger;

  constructor(
    private readonly provider: LLMProvider,
    private readonly model: string,
    private readonly opts: CompletionEngineOptions = {}
  ) {
    this.log = opts.logger ?? silentLogger;
  }

  async decide(req: DecisionRequest): Promise<Decision> {
    const messages: Message[] = [{ role: "system", content: req.systemPrompt }, ...req.transcript];
    const out: CompletionOut = await this.provider.complete({
      model: this.model,
      messages,
      tools: req.tools.length ? [...req.tools] : undefined,
      tool_choice: req.tools.length ? "auto" : undefined,
      temperature: this.opts.temperature ?? 0,
      max_tokens: this.opts.maxTokens ?? 800,
    });

    const calls = out.tool_calls ?? [];
    if (calls.length === 0) {
      return { type: "final", content: out.content };
    }
    if (calls.length > 1) {
      this.log.warn(`engine requested ${calls.length} tools at once; only ${calls[0].name} will run this round`);
    }
    const first = calls[0];
    return {
      type: "tool_call",
      content: out.content,
      call: { id: first.id, name: first.name, arguments: parseToolArguments(first) },
    };
  }
}
