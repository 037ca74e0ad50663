import { z } from "zod";
import type { ToolDefForLLM } from "../types/llm.js";
import type { ToolRegistry, ToolSpec } from "../types/tools.js";
import { ConstructionTypeError } from "../errors.js";

export function buildToolRegistry(tools: readonly ToolSpec[]): ToolRegistry {
  const reg = new Map<string, ToolSpec>();
  for (const tool of tools) {
    if (reg.has(tool.name)) {
      throw new ConstructionTypeError(`Duplicate tool name: ${tool.name}`);
    }
    reg.set(tool.name, tool);
  }
  return reg;
}

export function toolDefsFromRegistry(reg: ToolRegistry): ToolDefForLLM[] {
  return Array.from(reg.values(), t => {
    const { $schema: _dialect, ...parameters } = z.toJSONSchema(t.input_schema);
    return { name: t.name, description: t.description, parameters };
  });
}
