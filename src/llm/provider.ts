import type { CompletionArgs, CompletionOut } from "../types/llm.js";

/** A chat-completions backend. Rejects on transport or protocol failure. */
export interface LLMProvider {
  complete(args: CompletionArgs): Promise<CompletionOut>;
}
