import type { AgentSpec, ScratchPadEntry } from "../types/agent.js";
import type { ConversationTurn, Message, ToolDefForLLM } from "../types/llm.js";
import type { ToolResult } from "../types/tools.js";
import type { ReasoningEngine } from "../llm/engine.js";
import { toolDefsFromRegistry } from "../tools/registry.js";
import { historyToMessages, renderToolResult } from "../prompt/renderer.js";
import { RoundLimitError, UnknownToolError } from "../errors.js";
import { fmtMs, silentLogger, type Logger } from "../log.js";
import { DEFAULT_MAX_ROUNDS } from "../config.js";

/** JSON with object keys sorted, so argument order does not change a call's signature. */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

export interface LoopOptions {
  maxRounds?: number;
  logger?: Logger;
}

export interface LoopOutcome {
  answer: string;
  scratchpad: ScratchPadEntry[];
  rounds: number;
}

/**
 * Drives one conversation turn: ask the engine, run the single tool it asks for,
 * feed the result back, repeat until it answers or `maxRounds` decisions pass.
 *
 * Holds no per-call state, so one loop may serve concurrent `run` calls.
 * Unknown tools, engine faults and the round cap surface as thrown errors;
 * the agent's `execute` turns them into results.
 */
export class AgentLoop {
  readonly maxRounds: number;
  private readonly toolDefs: readonly ToolDefForLLM[];
  private readonly log: Logger;

  constructor(
    private readonly engine: ReasoningEngine,
    readonly spec: AgentSpec,
    opts: LoopOptions = {}
  ) {
    this.maxRounds = opts.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.toolDefs = Object.freeze(toolDefsFromRegistry(spec.tools));
    this.log = opts.logger ?? silentLogger;
  }

  async run(query: string, history: readonly ConversationTurn[]): Promise<LoopOutcome> {
    const transcript: Message[] = [...historyToMessages(history), { role: "user", content: query }];
    const scratchpad: ScratchPadEntry[] = [];
    const seenCalls = new Map<string, ToolResult>();

    for (let round = 1; round <= this.maxRounds; round++) {
      const t0 = Date.now();
      const decision = await this.engine.decide({
        systemPrompt: this.spec.systemPrompt,
        transcript: [...transcript],
        tools: this.toolDefs,
      });

      if (decision.type === "final") {
        this.log.info(`round ${round} — final answer (${fmtMs(Date.now() - t0)})`);
        return { answer: decision.content, scratchpad, rounds: round };
      }

      const { call } = decision;
      const tool = this.spec.tools.get(call.name);
      if (!tool) throw new UnknownToolError(call.name);

      const sig = `${call.name}::${stableStringify(call.arguments)}`;
      const cached = seenCalls.get(sig);
      let result: ToolResult;
      if (cached) {
        result = cached;
        this.log.debug(`↳ tool ${call.name} [cache]`);
      } else {
        result = await tool.invoke(call.arguments);
        seenCalls.set(sig, result);
      }
      const reused = cached !== undefined;
      scratchpad.push({ call, result, reused });

      // The tool reply must directly follow the assistant message that requested it.
      transcript.push(
        {
          role: "assistant",
          content: decision.content,
          tool_calls: [{ id: call.id, name: call.name, arguments: JSON.stringify(call.arguments) }],
        },
        { role: "tool", name: call.name, tool_call_id: call.id, content: renderToolResult(result, reused) }
      );

      const status = result.ok ? "ok" : `failed: ${result.error.category}`;
      this.log.info(`round ${round} — tool_call → ${call.name} (${status}${reused ? ", reused" : ""}; ${fmtMs(Date.now() - t0)})`);
    }

    throw new RoundLimitError(this.maxRounds);
  }
}
