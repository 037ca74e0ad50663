import type { ReasoningEngine } from "../llm/engine.js";
import type { ToolSpec } from "../types/tools.js";
import { BaseAgent, type AgentOptions } from "./base.js";
import { createWeatherAlertsTool, WEATHER_TOOL_NAME, type WeatherApiOptions } from "../tools/weather/alerts.js";

export interface WeatherAgentOptions extends AgentOptions {
  /** Replaces the default weather alerts tool. */
  tools?: ToolSpec[];
  weather?: Omit<WeatherApiOptions, "logger">;
}

/** Answers questions about active weather alerts for US states. */
export class WeatherAgent extends BaseAgent {
  constructor(engine: ReasoningEngine, opts: WeatherAgentOptions = {}) {
    const { tools, weather, ...agentOpts } = opts;
    super(engine, tools ?? [createWeatherAlertsTool({ ...weather, logger: agentOpts.logger })], agentOpts);
  }

  protected buildPrompt(): string {
    return [
      `You are a weather assistant that provides weather alerts for specific US states using the ${WEATHER_TOOL_NAME} tool.`,
      "",
      "For every user query:",
      "1. Identify any US state name or 2-letter state code anywhere in the input.",
      "2. If a state name is given (e.g. California), convert it to its UPPERCASE 2-letter code (e.g. CA).",
      `3. Call ${WEATHER_TOOL_NAME} with that code.`,
      "4. Return the tool's output. If no state can be identified, say so and ask which US state the user means.",
      "   If the tool could not complete, tell the user the alerts could not be retrieved right now.",
      "",
      "Example:",
      'User: "What is the weather alert for California?"',
      `Assistant: Let me check the weather alerts for CA. [calls ${WEATHER_TOOL_NAME} with {"code": "CA"}]`,
      "",
      `Available tools: ${this.toolNames.join(", ")}`,
    ].join("\n");
  }
}
