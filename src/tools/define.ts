import type { z } from "zod";
import type { ToolOutcome, ToolResult, ToolSpec } from "../types/tools.js";
import { errorMessage } from "../errors.js";

export interface ToolDefinition<S extends z.ZodType> {
  name: string;
  description: string;
  input_schema: S;
  run(input: z.infer<S>): Promise<ToolOutcome>;
}

/**
 * Wraps a tool body so that it satisfies the `ToolSpec` contract: arguments are
 * validated against `input_schema` and anything the body throws becomes an
 * `unexpected` failure instead of escaping.
 */
export function defineTool<S extends z.ZodType>(def: ToolDefinition<S>): ToolSpec {
  const { name } = def;
  return Object.freeze({
    name,
    description: def.description,
    input_schema: def.input_schema,
    async invoke(args: unknown): Promise<ToolResult> {
      const parsed = def.input_schema.safeParse(args);
      if (!parsed.success) {
        const message = parsed.error.issues
          .map(i => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
          .join("; ");
        return { name, ok: false, error: { category: "invalid_input", message } };
      }
      try {
        const outcome = await def.run(parsed.data);
        return { name, ...outcome };
      } catch (e) {
        return { name, ok: false, error: { category: "unexpected", message: errorMessage(e) } };
      }
    },
  });
}

export function isToolSpec(value: unknown): value is ToolSpec {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    value.name.length > 0 &&
    "description" in value &&
    typeof value.description === "string" &&
    "invoke" in value &&
    typeof value.invoke === "function" &&
    "input_schema" in value &&
    typeof value.input_schema === "object" &&
    value.input_schema !== null &&
    "safeParse" in value.input_schema &&
    typeof value.input_schema.safeParse === "function"
  );
}
