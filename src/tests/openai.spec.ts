import { describe, it, expect, vi } from 'vitest';
import { OpenAIChatCompletions } from '../llm/openai.js';
import { EngineResponseError } from '../errors.js';
import type { CompletionArgs } from '../types/llm.js';

function respond(body: unknown, status = 200) {
  return vi.fn<typeof fetch>(async () => new Response(JSON.stringify(body), { status }));
}

function bodyOf(fetchImpl: ReturnType<typeof respond>): Record<string, unknown> {
  const init = fetchImpl.mock.calls[0][1];
  return JSON.parse(String(init?.body));
}

const ARGS: CompletionArgs = {
  model: 'gpt-test',
  messages: [
    { role: 'system', content: 'sys' },
    { role: 'user', content: 'Alerts for CA?' },
    { role: 'assistant', content: '', tool_calls: [{ id: 'call_1', name: 'get_weather_alert_by_code', arguments: '{"code":"CA"}' }] },
    { role: 'tool', name: 'get_weather_alert_by_code', tool_call_id: 'call_1', content: 'No alerts found for the given state.' },
  ],
  tools: [{ name: 'get_weather_alert_by_code', description: 'alerts', parameters: { type: 'object' } }],
};

describe('OpenAIChatCompletions', () => {
  it('posts chat completions with a bearer key and forwards tool turns', async () => {
    const fetchImpl = respond({ choices: [{ message: { content: 'None active.' }, finish_reason: 'stop' }] });
    const provider = new OpenAIChatCompletions({ apiKey: 'test-key', baseUrl: 'https://llm.test/v1/', fetch: fetchImpl });

    const out = await provider.complete(ARGS);

    expect(out).toEqual({ content: 'None active.', tool_calls: [], finish_reason: 'stop', usage: undefined });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init?.headers).toEqual({ 'content-type': 'application/json', 'authorization': 'Bearer test-key' });
    const body = bodyOf(fetchImpl);
    expect(body.messages).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'Alerts for CA?' },
      {
        role: 'assistant',
        content: '',
        tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'get_weather_alert_by_code', arguments: '{"code":"CA"}' } }],
      },
      { role: 'tool', content: 'No alerts found for the given state.', tool_call_id: 'call_1', name: 'get_weather_alert_by_code' },
    ]);
    expect(body.tools).toEqual([
      { type: 'function', function: { name: 'get_weather_alert_by_code', description: 'alerts', parameters: { type: 'object' } } },
    ]);
    expect(body.tool_choice).toBe('auto');
  });

  it('targets an Azure deployment with an api-key header', async () => {
    const fetchImpl = respond({ choices: [{ message: { content: 'ok' } }] });
    const provider = new OpenAIChatCompletions({
      apiKey: 'test-key',
      azure: { endpoint: 'https://example.openai.azure.com/', deployment: 'gpt4o', apiVersion: '2024-06-01' },
      fetch: fetchImpl,
    });

    await provider.complete({ model: 'gpt4o', messages: [{ role: 'user', content: 'hi' }] });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://example.openai.azure.com/openai/deployments/gpt4o/chat/completions?api-version=2024-06-01');
    expect(init?.headers).toEqual({ 'content-type': 'application/json', 'api-key': 'test-key' });
    expect(bodyOf(fetchImpl).tools).toBeUndefined();
  });

  it('normalizes returned tool calls', async () => {
    const fetchImpl = respond({
      choices: [{
        message: {
          content: null,
          tool_calls: [{ id: 'call_7', type: 'function', function: { name: 'get_weather_alert_by_code', arguments: '{"code":"NY"}' } }],
        },
        finish_reason: 'tool_calls',
      }],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    });
    const provider = new OpenAIChatCompletions({ fetch: fetchImpl });

    const out = await provider.complete({ model: 'm', messages: [] });

    expect(out).toEqual({
      content: '',
      tool_calls: [{ id: 'call_7', name: 'get_weather_alert_by_code', arguments: '{"code":"NY"}' }],
      finish_reason: 'tool_calls',
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    });
  });

  it('raises on HTTP errors and on bodies without choices', async () => {
    const denied = new OpenAIChatCompletions({ fetch: vi.fn<typeof fetch>(async () => new Response('nope', { status: 401 })) });
    await expect(denied.complete({ model: 'm', messages: [] })).rejects.toThrow('LLM HTTP 401: nope');

    const empty = new OpenAIChatCompletions({ fetch: respond({ choices: [] }) });
    await expect(empty.complete({ model: 'm', messages: [] })).rejects.toBeInstanceOf(EngineResponseError);
  });
});
