import { lexicon } from '@/data/lexicon';
import type { FollowUpContext } from '@/types/core';
import { ScriptedModel, result } from '@/testing/fakes';
import { IntentPlanner, buildWeatherQuery, resolveWeatherLocation } from './intent-planner';

const NOW = new Date('2026-10-18T08:00:00Z');

function planner(reply: string | Error): { planner: IntentPlanner; llm: ScriptedModel } {
  const llm = new ScriptedModel(() => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
  return {
    llm,
    planner: new IntentPlanner(llm, { model: 'planner', followUpDefaultCount: 5, followUpMaxCount: 8, now: () => NOW }),
  };
}

const newsFollowUp: FollowUpContext = {
  tool: 'web_search',
  is_news: true,
  query: '台灣 新聞',
  search_results: [result(1), result(2)],
  fetched_pages: [],
  source_date_hints: { byIndex: {}, allowed: [] },
  cited_indices: [1],
  timestamp: '2026-10-18T07:59:00.000Z',
};

describe('IntentPlanner', () => {
  test('a follow-up over cached news is reused without a model call', async () => {
    const { planner: p, llm } = planner('{"tool":"web_search","query":"x"}');
    const out = await p.plan({ text: '繼續 更多5', profile: {}, followUp: newsFollowUp });

    expect(out).toEqual({ kind: 'reuse', decision: { tool: 'web_search', query: '' }, count: 5, followUp: newsFollowUp });
    expect(llm.calls).toHaveLength(0);
  });

  test('a follow-up without cached news goes to the model', async () => {
    const { planner: p, llm } = planner('{"tool":"none","query":""}');
    const out = await p.plan({ text: 'continue', profile: {}, followUp: null });

    expect(out.kind).toBe('answer');
    expect(llm.calls).toHaveLength(1);
  });

  test('weather without any location asks for one', async () => {
    const { planner: p } = planner('{"tool":"web_search","query":"天氣"}');
    const out = await p.plan({ text: '天氣如何？', profile: {}, followUp: null });

    expect(out).toEqual({
      kind: 'clarify',
      decision: { tool: 'none', query: '' },
      reply: lexicon.replies.weatherClarification,
    });
  });

  test('an unusable plan still searches for forced keywords', async () => {
    const { planner: p } = planner('sure, I will search');
    const out = await p.plan({ text: '今天新聞', profile: {}, followUp: null });

    expect(out).toEqual({
      kind: 'answer',
      decision: { tool: 'web_search', query: '' },
      isWeather: false,
      degraded: true,
    });
  });

  test('a model error degrades to no tool for chit-chat', async () => {
    const { planner: p } = planner(new Error('connection refused'));
    const out = await p.plan({ text: '講個笑話', profile: {}, followUp: null });

    expect(out).toEqual({ kind: 'answer', decision: { tool: 'none', query: '' }, isWeather: false, degraded: true });
  });

  test('an explicit city is put into the weather query', async () => {
    const { planner: p } = planner('```json\n{"tool":"web_search","query":"weather"}\n```');
    const out = await p.plan({ text: '台北天氣', profile: {}, followUp: null });

    expect(out).toEqual({
      kind: 'answer',
      decision: { tool: 'web_search', query: '台北 weather' },
      isWeather: true,
      location: { name: '台北', source: 'explicit' },
      degraded: false,
    });
  });

  test('the stored location gets the canned weather query', async () => {
    const { planner: p } = planner('{"tool":"web_search","query":"天氣如何"}');
    const out = await p.plan({ text: '天氣如何', profile: { default_weather_location: '台中' }, followUp: null });

    expect(out.kind).toBe('answer');
    expect(out.decision).toEqual({ tool: 'web_search', query: buildWeatherQuery('台中') });
  });

  test('the planner request carries the date and profile hints', async () => {
    const { planner: p, llm } = planner('{"tool":"none","query":""}');
    await p.plan({ text: 'hi', profile: { preferred_language: 'en' }, followUp: null });

    const system = llm.calls[0].request.messages[0].content;
    expect(system).toContain('Today is 2026-10-18.');
    expect(system).toContain('Preferred answer language: en.');
    expect(llm.calls[0].request.temperature).toBe(0);
  });
});

test('resolveWeatherLocation prefers the message over the profile', () => {
  expect(resolveWeatherLocation('高雄明天會下雨嗎', { default_weather_location: '台中' })).toEqual({
    name: '高雄',
    source: 'explicit',
  });
  expect(resolveWeatherLocation('weather in Osaka tonight', {})).toEqual({ name: 'Osaka', source: 'pattern' });
  expect(resolveWeatherLocation('下雨嗎', {})).toBeUndefined();
});

test('buildWeatherQuery switches on the script of the location', () => {
  expect(buildWeatherQuery('Paris')).toBe('Paris weather forecast today temperature chance of rain');
  expect(buildWeatherQuery('台中').startsWith('台中 今天 天氣預報')).toBe(true);
});
