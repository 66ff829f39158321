import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setImmediate as nextTick } from 'node:timers/promises';

import type { StreamConfig } from '../src/config/serviceConfig';
import { KafkaObservationStream, nextOffset } from '../src/ingestion/kafkaStream';
import { FakeKafka } from './utils/fakeKafka';
import { silentLogger } from './utils/logger';

const streamConfig: StreamConfig = {
  brokers: ['kafka-test:9092'],
  clientId: 'stations-test',
  topic: 'station-observations',
  groupId: 'stations-test',
  fromBeginning: true
};

async function startedStream() {
  const kafka = new FakeKafka();
  const stream = new KafkaObservationStream(streamConfig, silentLogger, kafka);
  await stream.start();
  return { consumer: kafka.instance, kafka, stream };
}

function track(delivery: Promise<void>): { settled: () => boolean; done: Promise<void> } {
  let settled = false;
  const done = delivery.then(() => {
    settled = true;
  });
  return { settled: () => settled, done };
}

test('commits point at the offset after the processed message', () => {
  assert.equal(nextOffset('0'), '1');
  assert.equal(nextOffset('41'), '42');
});

test('offsets beyond the safe integer range stay exact', () => {
  assert.equal(nextOffset('9007199254740992'), '9007199254740993');
  assert.equal(nextOffset('9223372036854775806'), '9223372036854775807');
});

test('start subscribes with manual commits and one partition at a time', async () => {
  const { consumer, kafka } = await startedStream();

  assert.deepEqual(kafka.consumerConfigs, [{ groupId: 'stations-test' }]);
  assert.deepEqual(consumer.calls, ['connect', 'subscribe', 'run']);
  assert.deepEqual(consumer.subscriptions, [{ topic: 'station-observations', fromBeginning: true }]);
  assert.equal(consumer.runConfig?.autoCommit, false);
  assert.equal(consumer.runConfig?.partitionsConsumedConcurrently, 1);
});

test('a delivery stays parked until its message is committed', async () => {
  const { consumer, stream } = await startedStream();
  const delivery = track(consumer.deliver(2, '41', '{"station_id":"S1"}'));

  const message = await stream.receive(new AbortController().signal);
  assert.ok(message);
  assert.deepEqual(message, {
    topic: 'station-observations',
    partition: 2,
    offset: '41',
    key: null,
    value: Buffer.from('{"station_id":"S1"}', 'utf8'),
    timestamp: '1700000000000'
  });

  await nextTick();
  assert.equal(delivery.settled(), false);

  await stream.commit(message);
  await delivery.done;
  assert.equal(delivery.settled(), true);
  assert.deepEqual(consumer.commits, [[{ topic: 'station-observations', partition: 2, offset: '42' }]]);
});

test('a rejected commit still releases the delivery', async () => {
  const { consumer, stream } = await startedStream();
  consumer.failNextCommits = 1;
  const delivery = track(consumer.deliver(0, '7', '{}'));

  const message = await stream.receive(new AbortController().signal);
  assert.ok(message);
  await assert.rejects(stream.commit(message), /offset commit refused by broker/);

  await delivery.done;
  assert.equal(delivery.settled(), true);
  assert.deepEqual(consumer.commits, []);
});

test('close releases queued and in-flight deliveries without committing them', async () => {
  const { consumer, stream } = await startedStream();
  const inFlight = track(consumer.deliver(0, '0', '{}'));
  const queued = track(consumer.deliver(0, '1', '{}'));

  const message = await stream.receive(new AbortController().signal);
  assert.equal(message?.offset, '0');

  await stream.close();
  await Promise.all([inFlight.done, queued.done]);

  assert.deepEqual(consumer.commits, []);
  assert.deepEqual(consumer.calls, ['connect', 'subscribe', 'run', 'stop', 'disconnect']);
  assert.equal(await stream.receive(new AbortController().signal), null);

  // Deliveries racing the shutdown are not queued.
  await consumer.deliver(0, '1', '{}');
  assert.equal(await stream.receive(new AbortController().signal), null);

  await stream.close();
  assert.deepEqual(consumer.calls, ['connect', 'subscribe', 'run', 'stop', 'disconnect']);
});

test('a failing stop still disconnects', async () => {
  const { consumer, stream } = await startedStream();
  consumer.stopError = new Error('group coordinator unreachable');

  await stream.close();
  assert.deepEqual(consumer.calls.slice(-2), ['stop', 'disconnect']);
});

test('receive returns null when its signal aborts', async () => {
  const { stream } = await startedStream();
  const controller = new AbortController();
  const pending = stream.receive(controller.signal);

  controller.abort();
  assert.equal(await pending, null);
});

test('a waiting receive wakes on the next delivery', async () => {
  const { consumer, stream } = await startedStream();
  const pending = stream.receive(new AbortController().signal);
  await nextTick();

  const delivery = consumer.deliver(1, '3', '{}');
  const message = await pending;
  assert.equal(message?.partition, 1);
  assert.equal(message?.offset, '3');

  await stream.close();
  await delivery;
});

test('a consumer whose run loop fails ends the stream and is still disconnected on close', async () => {
  const kafka = new FakeKafka();
  kafka.instance.runError = new Error('broker connection lost');
  const stream = new KafkaObservationStream(streamConfig, silentLogger, kafka);
  await stream.start();

  assert.equal(await stream.receive(new AbortController().signal), null);

  await stream.close();
  assert.deepEqual(kafka.instance.calls, ['connect', 'subscribe', 'run', 'stop', 'disconnect']);
});
