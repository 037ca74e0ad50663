import { describe, it, expect, vi } from 'vitest';
import { normalizeHistory, historyToMessages, renderToolResult } from '../prompt/renderer.js';

describe('renderer', () => {
  it('keeps well-formed history', () => {
    const turns = [{ role: 'user', content: 'hi' }, { role: 'assistant', content: 'hello' }];
    expect(normalizeHistory(turns)).toEqual(turns);
    expect(normalizeHistory(undefined)).toEqual([]);
  });

  it('replaces malformed history with an empty one and warns', () => {
    const warn = vi.fn();
    const log = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
    expect(normalizeHistory('not a list', log)).toEqual([]);
    expect(normalizeHistory([{ role: 'system', content: 'x' }], log)).toEqual([]);
    expect(normalizeHistory([{ role: 'user' }], log)).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(3);
  });

  it('replays history tool turns as assistant text', () => {
    expect(historyToMessages([{ role: 'tool', content: 'No alerts found for the given state.' }])).toEqual([
      { role: 'assistant', content: 'Tool result: No alerts found for the given state.' },
    ]);
  });

  it('renders tool results so failures read differently from empty answers', () => {
    expect(renderToolResult({ name: 'get_weather_alert_by_code', ok: true, output: 'No alerts found for the given state.' }))
      .toBe('No alerts found for the given state.');
    expect(renderToolResult({ name: 'get_weather_alert_by_code', ok: false, error: { category: 'transport', message: 'HTTP 404' } }))
      .toBe('Tool get_weather_alert_by_code could not complete (transport): HTTP 404');
  });
});
