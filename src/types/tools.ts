import type { z } from "zod";

export type ToolFailureCategory = "invalid_input" | "transport" | "parse" | "unexpected";

export interface ToolFailure {
  category: ToolFailureCategory;
  message: string;
}

export type ToolOutcome =
  | { ok: true; output: string }
  | { ok: false; error: ToolFailure };

export type ToolResult = { name: string } & ToolOutcome;

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * A named capability the reasoning engine may request.
 * `invoke` never rejects: every failure comes back as a `ToolResult` with `ok: false`.
 */
export interface ToolSpec {
  readonly name: string;
  readonly description: string;
  readonly input_schema: z.ZodType;
  invoke(args: unknown): Promise<ToolResult>;
}

export type ToolRegistry = ReadonlyMap<string, ToolSpec>;
