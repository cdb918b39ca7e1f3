import assert from 'node:assert/strict';
import test from 'node:test';
import { Broadcaster } from './broadcaster.js';

test('every receiver gets every value in send order', async () => {
  const broadcaster = new Broadcaster<number>(8);
  const first = broadcaster.subscribe();
  const second = broadcaster.subscribe();

  assert.equal(broadcaster.send(1), 2);
  broadcaster.send(2);

  assert.deepEqual(await first.next(), { value: 1, done: false });
  assert.deepEqual(await first.next(), { value: 2, done: false });
  assert.deepEqual(await second.next(), { value: 1, done: false });
  assert.deepEqual(await second.next(), { value: 2, done: false });
});

test('a waiting receiver resolves as soon as a value is sent', async () => {
  const broadcaster = new Broadcaster<string>(4);
  const receiver = broadcaster.subscribe();

  const pending = receiver.next();
  broadcaster.send('hello');

  assert.deepEqual(await pending, { value: 'hello', done: false });
  assert.equal(receiver.size, 0);
});

test('a lagging receiver drops its oldest values', async () => {
  const broadcaster = new Broadcaster<number>(2);
  const receiver = broadcaster.subscribe();

  broadcaster.send(1);
  broadcaster.send(2);
  broadcaster.send(3);

  assert.equal(receiver.size, 2);
  assert.equal(receiver.takeDropped(), 1);
  assert.equal(receiver.takeDropped(), 0);
  assert.deepEqual(await receiver.next(), { value: 2, done: false });
  assert.deepEqual(await receiver.next(), { value: 3, done: false });
});

test('closing a receiver detaches it and ends iteration', async () => {
  const broadcaster = new Broadcaster<number>(4);
  const receiver = broadcaster.subscribe();
  const pending = receiver.next();

  receiver.close();

  assert.deepEqual(await pending, { value: undefined, done: true });
  assert.equal(broadcaster.receiverCount, 0);
  assert.equal(broadcaster.send(1), 0);
});

test('closing the broadcaster ends every for-await loop', async () => {
  const broadcaster = new Broadcaster<number>(4);
  const receiver = broadcaster.subscribe();
  broadcaster.send(7);

  const collected: number[] = [];
  const loop = (async () => {
    for await (const value of receiver) {
      collected.push(value);
      if (collected.length === 1) {
        broadcaster.close();
      }
    }
  })();

  await loop;
  assert.deepEqual(collected, [7]);
  assert.equal(broadcaster.receiverCount, 0);
});

test('capacity must be a positive integer', () => {
  assert.throws(() => new Broadcaster(0), /positive integer/);
  assert.throws(() => new Broadcaster(1.5), /positive integer/);
});
