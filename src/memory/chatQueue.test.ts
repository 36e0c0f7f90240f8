import { ChatQueue, ChatQueueFullError } from './chatQueue';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((r) => setImmediate(() => r()));

test('tasks for one chat run one at a time, in order', async () => {
  const queue = new ChatQueue();
  const events: string[] = [];
  const gate = deferred();

  const first = queue.run('1', async () => {
    events.push('start a');
    await gate.promise;
    events.push('end a');
  });
  const second = queue.run('1', async () => {
    events.push('start b');
  });

  await tick();
  expect(events).toEqual(['start a']);
  expect(queue.size('1')).toBe(2);

  gate.resolve();
  await Promise.all([first, second]);
  expect(events).toEqual(['start a', 'end a', 'start b']);
  expect(queue.size('1')).toBe(0);
});

test('different chats do not wait for each other', async () => {
  const queue = new ChatQueue();
  const gate = deferred();
  const events: string[] = [];

  const slow = queue.run('1', async () => {
    await gate.promise;
    events.push('chat 1');
  });
  await queue.run('2', async () => {
    events.push('chat 2');
  });

  expect(events).toEqual(['chat 2']);
  gate.resolve();
  await slow;
});

test('a failing task does not block the next one', async () => {
  const queue = new ChatQueue();
  const failing = queue.run('1', async () => {
    throw new Error('boom');
  });
  const next = queue.run('1', async () => 'ok');

  await expect(failing).rejects.toThrow('boom');
  await expect(next).resolves.toBe('ok');
});

test('a full chat rejects new tasks', async () => {
  const queue = new ChatQueue(1);
  const gate = deferred();
  const running = queue.run('1', () => gate.promise);

  await expect(queue.run('1', async () => undefined)).rejects.toBeInstanceOf(ChatQueueFullError);
  gate.resolve();
  await running;
});
