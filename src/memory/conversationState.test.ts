import type { RetrievalBundle } from '@/services/retrieval/retrieval-orchestrator';
import { InMemoryStore, ScriptedModel, result, steppingClock } from '@/testing/fakes';
import { FollowUpCache } from './FollowUpCache';
import { ConversationStateManager, cleanSummary, inferPreferences, unsummarizedTurns } from './conversationState';

function setup(summary: string | Error = 'User asked about chips.\nhttps://example.com/x\nPrefers short answers.') {
  const store = new InMemoryStore();
  const followUps = new FollowUpCache(30);
  const llm = new ScriptedModel(() => {
    if (summary instanceof Error) throw summary;
    return summary;
  });
  const manager = new ConversationStateManager(
    { turns: store, profiles: store, followUps, llm, now: steppingClock('2026-10-18T08:00:00Z') },
    { recentTurns: 2, summaryKeepTurns: 2, summaryModel: 'summary' },
  );
  return { store, followUps, llm, manager };
}

function bundle(reused: boolean): RetrievalBundle {
  return {
    query: '台灣 新聞',
    searchResults: [result(1), result(2), result(3), result(4)],
    fetchedPages: [],
    summaries: [],
    dateHints: { byIndex: {}, allowed: [] },
    reused,
    degradations: [],
  };
}

test('inferPreferences reads language and link requests', () => {
  expect(inferPreferences('請用繁體中文回答，不要連結')).toEqual({ preferred_language: 'zh-Hant', prefer_links: false });
  expect(inferPreferences('answer in english with links')).toEqual({ preferred_language: 'en', prefer_links: true });
  expect(inferPreferences('今天天氣如何')).toEqual({});
});

test('unsummarizedTurns skips folded turns in storage order', () => {
  const turn = (content: string, timestamp: string) => ({ role: 'user' as const, content, timestamp });
  const stored = [turn('a', 't1'), turn('b', 't2'), turn('c', 't2'), turn('d', 't2'), turn('e', 't3')];
  expect(unsummarizedTurns(stored, {}).map((t) => t.content)).toEqual(['a', 'b', 'c', 'd', 'e']);
  expect(
    unsummarizedTurns(stored, { summarized_through: 't2', summarized_ties: 2 }).map((t) => t.content),
  ).toEqual(['d', 'e']);
  expect(unsummarizedTurns(stored, { summarized_through: 't2' }).map((t) => t.content)).toEqual(['b', 'c', 'd', 'e']);
});

test('cleanSummary drops URLs and blank lines and keeps eight lines', () => {
  const raw = ['a https://x.example/1', '', ...Array.from({ length: 10 }, (_, i) => `line ${i}`)].join('\n');
  expect(cleanSummary(raw).split('\n')).toEqual(['a', 'line 0', 'line 1', 'line 2', 'line 3', 'line 4', 'line 5', 'line 6']);
});

describe('ConversationStateManager', () => {
  test('the window never exceeds capacity and older turns fold into the summary', async () => {
    const { store, followUps, llm, manager } = setup();
    const sizes: number[] = [];

    for (const n of [1, 2, 3]) {
      const ctx = await manager.beginTurn('42', `u${n}`);
      sizes.push(ctx.window.length);
      await manager.completeTurn('42', { assistantText: `a${n}` });
      sizes.push(manager.window('42').length);
    }

    expect(Math.max(...sizes)).toBeLessThanOrEqual(manager.capacity);
    expect(sizes).toEqual([1, 2, 3, 2, 3, 2]);
    expect(llm.count('compact')).toBe(2);

    const profile = await store.getProfile('42');
    expect(profile.conversation_summary).toBe('User asked about chips.\nPrefers short answers.');
    expect(profile.summarized_through).toBe(store.turns.get('42')?.[3].timestamp);
    expect(manager.window('42').map((t) => t.content)).toEqual(['u3', 'a3']);

    const first = llm.calls[0].request;
    expect(first.temperature).toBe(0.1);
    expect(first.maxTokens).toBe(300);
    expect(first.messages[1].content).toBe('New messages:\nuser: u1\nassistant: a1');
    expect(llm.calls[1].request.messages[1].content).toBe(
      'Current summary:\nUser asked about chips.\nPrefers short answers.\n\nNew messages:\nuser: u2\nassistant: a2',
    );
    followUps.destroy();
  });

  test('the window is rebuilt from storage without summarized turns', async () => {
    const { store, followUps, manager } = setup();
    for (const n of [1, 2]) {
      await manager.beginTurn('42', `u${n}`);
      await manager.completeTurn('42', { assistantText: `a${n}` });
    }

    const fresh = new ConversationStateManager(
      { turns: store, profiles: store, followUps, llm: new ScriptedModel(() => ''), now: steppingClock('2026-10-18T09:00:00Z') },
      { recentTurns: 2, summaryKeepTurns: 2, summaryModel: 'summary' },
    );
    const ctx = await fresh.beginTurn('42', 'u3');

    expect(ctx.window.map((t) => t.content)).toEqual(['u2', 'a2', 'u3']);
    expect(ctx.profile.conversation_summary).toBe('User asked about chips.\nPrefers short answers.');
    followUps.destroy();
  });

  test('retained turns stamped in the same millisecond as the last folded turn stay in the window', async () => {
    const store = new InMemoryStore();
    const followUps = new FollowUpCache(30);
    const frozen = () => new Date('2026-10-18T08:00:00Z');
    const build = () =>
      new ConversationStateManager(
        { turns: store, profiles: store, followUps, llm: new ScriptedModel(() => 'Earlier chat.'), now: frozen },
        { recentTurns: 2, summaryKeepTurns: 2, summaryModel: 'summary' },
      );
    const manager = build();
    for (const n of [1, 2]) {
      await manager.beginTurn('42', `u${n}`);
      await manager.completeTurn('42', { assistantText: `a${n}` });
    }

    expect(await store.getProfile('42')).toEqual({
      conversation_summary: 'Earlier chat.',
      summarized_through: '2026-10-18T08:00:00.000Z',
      summarized_ties: 2,
    });
    const ctx = await build().beginTurn('42', 'u3');
    expect(ctx.window.map((t) => t.content)).toEqual(['u2', 'a2', 'u3']);
    followUps.destroy();
  });

  test('a failed summary call still shortens the window', async () => {
    const { store, followUps, manager } = setup(new Error('model offline'));
    for (const n of [1, 2]) {
      await manager.beginTurn('42', `u${n}`);
      await manager.completeTurn('42', { assistantText: `a${n}` });
    }

    expect(manager.window('42').map((t) => t.content)).toEqual(['u2', 'a2']);
    expect(await store.getProfile('42')).toEqual({});
    followUps.destroy();
  });

  test('preferences from the message are stored before the turn is answered', async () => {
    const { followUps, manager } = setup();
    const ctx = await manager.beginTurn('42', '以後請用繁體中文');
    expect(ctx.profile).toEqual({ preferred_language: 'zh-Hant' });
    followUps.destroy();
  });

  test('follow-up citations accumulate only across reused results', async () => {
    const { followUps, manager } = setup();

    await manager.beginTurn('42', '今天新聞');
    await manager.completeTurn('42', { assistantText: 'a', followUp: { bundle: bundle(false), isNews: true, cited: [1, 2] } });
    expect(followUps.get('42')?.cited_indices).toEqual([1, 2]);

    await manager.beginTurn('42', '更多');
    await manager.completeTurn('42', { assistantText: 'b', followUp: { bundle: bundle(true), isNews: true, cited: [2, 3] } });
    expect(followUps.get('42')?.cited_indices).toEqual([1, 2, 3]);

    await manager.beginTurn('42', '台股新聞');
    await manager.completeTurn('42', { assistantText: 'c', followUp: { bundle: bundle(false), isNews: true, cited: [4] } });
    expect(followUps.get('42')).toMatchObject({ tool: 'web_search', is_news: true, query: '台灣 新聞', cited_indices: [4] });
    followUps.destroy();
  });

  test('reset forgets the profile, window and follow-up', async () => {
    const { store, followUps, manager } = setup();
    await manager.beginTurn('42', 'answer in english');
    await manager.completeTurn('42', { assistantText: 'ok', followUp: { bundle: bundle(false), isNews: true, cited: [] } });

    expect(await manager.reset('42')).toBe(true);
    expect(await store.getProfile('42')).toEqual({});
    expect(manager.window('42')).toEqual([]);
    expect(followUps.get('42')).toBeNull();
    expect(store.turns.get('42')).toHaveLength(2);
    followUps.destroy();
  });
});
