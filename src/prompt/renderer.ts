import { z } from "zod";
import type { ConversationTurn, Message } from "../types/llm.js";
import type { ToolResult } from "../types/tools.js";
import { silentLogger, type Logger } from "../log.js";

const historySchema = z.array(
  z.object({
    role: z.enum(["user", "assistant", "tool"]),
    content: z.string(),
  })
);

/**
 * Accepts caller history as-is when it is a list of `{role, content}` turns.
 * Anything else is logged and replaced by an empty history.
 */
export function normalizeHistory(history: unknown, log: Logger = silentLogger): ConversationTurn[] {
  if (history === undefined || history === null) return [];
  const parsed = historySchema.safeParse(history);
  if (!parsed.success) {
    log.warn("chat history must be a list of {role, content} turns; continuing with an empty history");
    return [];
  }
  return parsed.data;
}

/**
 * Caller history carries no tool-call ids, so earlier tool output is replayed
 * as assistant text rather than as a tool reply.
 */
export function historyToMessages(history: readonly ConversationTurn[]): Message[] {
  return history.map((t): Message =>
    t.role === "tool" ? { role: "assistant", content: `Tool result: ${t.content}` } : { role: t.role, content: t.content }
  );
}

export function renderToolResult(result: ToolResult, reused = false): string {
  const text = result.ok
    ? result.output
    : `Tool ${result.name} could not complete (${result.error.category}): ${result.error.message}`;
  return reused ? `${text}\n(reused result of an identical earlier call)` : text;
}
