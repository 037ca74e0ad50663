import type { Agent, AgentSpec, ExecutionResult } from "../types/agent.js";
import type { ConversationTurn } from "../types/llm.js";
import type { ToolRegistry, ToolSpec } from "../types/tools.js";
import { isReasoningEngine, type ReasoningEngine } from "../llm/engine.js";
import { isToolSpec } from "../tools/define.js";
import { buildToolRegistry } from "../tools/registry.js";
import { normalizeHistory } from "../prompt/renderer.js";
import { AgentLoop } from "../orchestrator/loop.js";
import { ConstructionTypeError, EmptyQueryError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../log.js";

export interface AgentOptions {
  maxRounds?: number;
  logger?: Logger;
}

/**
 * Shared agent plumbing. Subclasses supply the system prompt; the loop, input
 * checks and failure handling live here.
 *
 * The engine and tools are checked in the constructor and a bad one throws
 * {@link ConstructionTypeError}. Everything after that is reported through the
 * {@link ExecutionResult} returned by `execute`, which never rejects.
 */
export abstract class BaseAgent implements Agent {
  protected readonly engine: ReasoningEngine;
  protected readonly tools: ToolRegistry;
  protected readonly log: Logger;
  private loop: AgentLoop | undefined;

  constructor(engine: ReasoningEngine, tools: readonly ToolSpec[], protected readonly options: AgentOptions = {}) {
    if (!isReasoningEngine(engine)) {
      throw new ConstructionTypeError("engine must implement decide(request)");
    }
    const list: unknown = tools;
    if (!Array.isArray(list) || !list.every(isToolSpec)) {
      throw new ConstructionTypeError("tools must be a list of tool specs with name, description, input_schema and invoke");
    }
    this.engine = engine;
    this.tools = buildToolRegistry(tools);
    this.log = options.logger ?? silentLogger;
    this.log.debug(`${new.target.name} initialized with ${this.tools.size} tools`);
  }

  get toolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /** System-level instructions for the reasoning engine. */
  protected abstract buildPrompt(): string;

  /** Wires prompt and tools into the loop. Runs once, before the first `execute`. */
  protected bindLoop(): AgentLoop {
    const spec: AgentSpec = Object.freeze({ systemPrompt: this.buildPrompt(), tools: this.tools });
    return new AgentLoop(this.engine, spec, { maxRounds: this.options.maxRounds, logger: this.log });
  }

  private boundLoop(): AgentLoop {
    if (!this.loop) this.loop = this.bindLoop();
    return this.loop;
  }

  async execute(query: string, history: readonly ConversationTurn[] = []): Promise<ExecutionResult> {
    try {
      const turns = normalizeHistory(history, this.log);
      const formatted = typeof query === "string" ? query.trim() : "";
      this.log.info(`Executing query: ${formatted}`);
      if (!formatted) throw new EmptyQueryError();

      const { answer } = await this.boundLoop().run(formatted, turns);
      return { ok: true, answer };
    } catch (e) {
      if (e instanceof EmptyQueryError) return { ok: false, error: e.message };
      this.log.error(`Failed to execute query '${query}': ${errorMessage(e)}`);
      return { ok: false, error: `Unable to process the query: ${errorMessage(e)}` };
    }
  }
}
