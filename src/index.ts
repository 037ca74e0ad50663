import 'dotenv/config';
import readline from 'node:readline';
import { loadConfig, describeConfig, type AppConfig } from './config.js';
import { createLogger, type Logger } from './log.js';
import { OpenAIChatCompletions } from './llm/openai.js';
import { CompletionEngine } from './llm/engine.js';
import { WeatherAgent } from './agents/weather.js';
import { getWeatherAlertsByCode } from './tools/weather/alerts.js';
import type { ConversationTurn } from './types/llm.js';

const DEFAULT_QUERY = "What is the weather alert for California?";

function arg(name: string, fallback?: string): string | undefined {
  const ix = process.argv.findIndex(a => a === name || a.startsWith(name + '='));
  if (ix === -1) return fallback;
  const val = process.argv[ix];
  if (val.includes('=')) return val.slice(val.indexOf('=') + 1);
  return process.argv[ix + 1] ?? fallback;
}

function buildAgent(config: AppConfig, log: Logger): WeatherAgent {
  const eng = config.engine;
  if (!eng.apiKey) {
    log.warn("No API key configured for the reasoning engine; requests will likely be rejected.");
  }
  const provider = eng.kind === 'azure'
    ? new OpenAIChatCompletions({
        apiKey: eng.apiKey,
        azure: { endpoint: eng.endpoint, deployment: eng.deployment, apiVersion: eng.apiVersion }
      })
    : new OpenAIChatCompletions({ apiKey: eng.apiKey, baseUrl: eng.baseUrl });
  const model = eng.kind === 'azure' ? eng.deployment : eng.model;
  const engine = new CompletionEngine(provider, model, { logger: log });
  return new WeatherAgent(engine, { weather: config.weather, maxRounds: config.maxRounds, logger: log });
}

async function chat(agent: WeatherAgent): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const history: ConversationTurn[] = [];
  let closed = false;
  rl.on('close', () => { closed = true; });
  try {
    for (;;) {
      const line = await new Promise<string | null>(res => {
        if (closed) return res(null);
        const onClose = () => res(null);
        rl.once('close', onClose);
        rl.question('you> ', answer => {
          rl.off('close', onClose);
          res(answer);
        });
      });
      if (line === null || line.trim() === '/exit') break;
      if (!line.trim()) continue;
      const result = await agent.execute(line, history);
      if (result.ok) {
        console.log(`agent> ${result.answer}`);
        history.push({ role: 'user', content: line }, { role: 'assistant', content: result.answer });
      } else {
        console.log(`agent> [error] ${result.error}`);
      }
    }
  } finally {
    rl.close();
  }
}

async function main(): Promise<number> {
  const config = loadConfig();
  const log = createLogger({ level: config.logLevel, color: config.color });
  for (const line of describeConfig(config)) log.debug(line);

  const code = arg('--alerts');
  if (code) {
    const text = await getWeatherAlertsByCode(code, { ...config.weather, logger: log });
    if (text === null) {
      console.error(`Could not retrieve alerts for ${code}.`);
      return 1;
    }
    console.log(text);
    return 0;
  }

  const agent = buildAgent(config, log);
  if (process.argv.includes('--chat')) {
    await chat(agent);
    return 0;
  }

  const result = await agent.execute(arg('--query', DEFAULT_QUERY) ?? DEFAULT_QUERY, []);
  if (!result.ok) {
    console.error("Error:", result.error);
    return 1;
  }
  console.log("Response:", result.answer);
  return 0;
}

main().then(code => { process.exitCode = code; }).catch(err => {
  console.error("[fatal]", err);
  process.exit(1);
});
