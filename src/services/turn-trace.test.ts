import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { TraceWriter, addSpan, createTrace, finishTrace, redact, tracePath } from './turn-trace';

test('redact masks secret keys at any depth', () => {
  expect(
    redact({ headers: { Authorization: 'Bearer test-secret', accept: 'json' }, items: [{ token: 'test-secret', n: 1 }] }),
  ).toEqual({ headers: { Authorization: '[REDACTED]', accept: 'json' }, items: [{ token: '[REDACTED]', n: 1 }] });
});

test('traces are filed per chat and day', () => {
  const trace = { traceId: 'chat42_abc', chatId: '42', startTime: Date.parse('2026-10-18T08:00:00Z'), spans: [] };
  expect(tracePath('debug', trace)).toBe(path.join('debug', 'chat_42', '2026-10-18', 'chat42_abc.json'));
});

test('an enabled writer dumps the redacted trace', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'traces-'));
  try {
    const trace = createTrace('42');
    addSpan(trace, 'plan', trace.startTime, { input: { apiKey: 'test-secret' }, output: { tool: 'none' } });
    finishTrace(trace);

    await new TraceWriter(true, dir).write(trace);

    const written: unknown = JSON.parse(await fs.readFile(tracePath(dir, trace), 'utf8'));
    expect(written).toMatchObject({
      traceId: trace.traceId,
      chatId: '42',
      spans: [{ name: 'plan', input: { apiKey: '[REDACTED]' }, output: { tool: 'none' } }],
    });
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('a disabled writer writes nothing', async () => {
  const dir = path.join(os.tmpdir(), `traces-off-${process.pid}`);
  await new TraceWriter(false, dir).write(createTrace('42'));
  await expect(fs.stat(dir)).rejects.toMatchObject({ code: 'ENOENT' });
});
