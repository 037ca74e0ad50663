import { z } from "zod";
import type { CompletionArgs, CompletionOut, Message } from "../types/llm.js";
import type { LLMProvider } from "./provider.js";
import { EngineResponseError } from "../errors.js";

export interface AzureDeployment {
  endpoint: string;
  deployment: string;
  apiVersion: string;
}

export interface OpenAIChatOptions {
  apiKey?: string;
  baseUrl?: string;
  /** When set, requests go to this Azure OpenAI deployment instead of `baseUrl`. */
  azure?: AzureDeployment;
  fetch?: typeof fetch;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string().nullish() }),
              })
            )
            .nullish(),
        }),
        finish_reason: z.enum(["stop", "length", "tool_calls", "content_filter"]).nullish().catch(null),
      })
    )
    .min(1),
  usage: z
    .object({ prompt_tokens: z.number(), completion_tokens: z.number(), total_tokens: z.number() })
    .nullish(),
});

// Internal messages → OpenAI schema, forwarding assistant.tool_calls and tool replies
function toWire(m: Message): Record<string, unknown> {
  if (m.role === "assistant" && m.tool_calls?.length) {
    return {
      role: "assistant",
      content: m.content,
      tool_calls: m.tool_calls.map(tc => ({
        id: tc.id,
        type: "function",
        function: { name: tc.name, arguments: tc.arguments || "{}" },
      })),
    };
  }
  if (m.role === "tool") {
    return { role: "tool", content: m.content, tool_call_id: m.tool_call_id, name: m.name };
  }
  return { role: m.role, content: m.content };
}

export class OpenAIChatCompletions implements LLMProvider {
  private readonly doFetch: typeof fetch;

  constructor(private readonly opts: OpenAIChatOptions = {}) {
    this.doFetch = opts.fetch ?? fetch;
  }

  endpoint(): string {
    const az = this.opts.azure;
    if (az) {
      const base = az.endpoint.replace(/\/+$/, "");
      return `${base}/openai/deployments/${encodeURIComponent(az.deployment)}/chat/completions?api-version=${encodeURIComponent(az.apiVersion)}`;
    }
    return `${(this.opts.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "")}/chat/completions`;
  }

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const tools = (args.tools ?? []).map(t => ({
      type: "function",
      function: {
        name: t.name,
        description: t.description || undefined,
        parameters: t.parameters,
      },
    }));

    const body = {
      model: args.model,
      messages: args.messages.map(toWire),
      temperature: args.temperature ?? 0,
      max_tokens: args.max_tokens ?? 800,
      stop: args.stop,
      top_p: args.top_p,
      tools: tools.length ? tools : undefined,
      tool_choice: tools.length ? (args.tool_choice ?? "auto") : undefined,
    };

    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.opts.azure) {
      if (this.opts.apiKey) headers["api-key"] = this.opts.apiKey;
    } else if (this.opts.apiKey) {
      headers["authorization"] = `Bearer ${this.opts.apiKey}`;
    }

    const res = await this.doFetch(this.endpoint(), {
      method: "POST",
      headers,
      body: JSON.stringify(body),
    });
    if (!res.ok) {
      const text = await res.text();
      throw new EngineResponseError(`LLM HTTP ${res.status}: ${text}`);
    }

    const parsed = completionSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new EngineResponseError("LLM response did not contain a chat completion");
    }
    const choice = parsed.data.choices[0];
    const usage = parsed.data.usage;

    // Normalize back to our internal shape
    return {
      content: choice.message.content ?? "",
      tool_calls: (choice.message.tool_calls ?? []).map(tc => ({
        id: tc.id,
        name: tc.function.name,
        arguments: tc.function.arguments ?? "",
      })),
      finish_reason: choice.finish_reason ?? undefined,
      usage: usage ?? undefined,
    };
  }
}
