import assert from 'node:assert/strict';
import path from 'node:path';
import { test } from 'node:test';

import { loadServiceConfig } from '../src/config/serviceConfig';
import { ConfigurationError } from '../src/errors';

test('defaults to an in-process store with RF=3, W=1, R=3', () => {
  const config = loadServiceConfig({});
  assert.equal(config.host, '0.0.0.0');
  assert.equal(config.port, 5440);
  assert.equal(config.logLevel, 'info');
  assert.deepEqual(config.store.contactPoints, ['inline']);
  assert.equal(config.store.keyspace, 'weather');
  assert.equal(config.store.replicationFactor, 3);
  assert.deepEqual(config.quorum, {
    write: { requiredAcks: 1, timeoutMs: 5_000 },
    read: { requiredAcks: 3, timeoutMs: 5_000 }
  });
  assert.deepEqual(config.stream.brokers, []);
  assert.equal(config.stream.topic, 'station-observations');
  assert.equal(config.stream.fromBeginning, true);
  assert.equal(config.ingestion.maxAttempts, 5);
  assert.deepEqual(config.ingestion.backoff, { baseMs: 100, factor: 2, maxMs: 5_000, jitterRatio: 0.2 });
  assert.equal(config.ingestion.deadLetterPath, null);
});

test('reads store, stream and ingestion settings from the environment', () => {
  const config = loadServiceConfig({
    STATIONS_PORT: '8080',
    STATIONS_LOG_LEVEL: 'DEBUG',
    STATIONS_STORE_CONTACT_POINTS: '10.0.0.1, 10.0.0.2',
    STATIONS_STORE_KEYSPACE: 'Weather_Test',
    STATIONS_STORE_REPLICATION_FACTOR: '5',
    STATIONS_STORE_REQUEST_TIMEOUT_MS: '250',
    STATIONS_STORE_USERNAME: 'stations',
    STATIONS_STORE_PASSWORD: 'test-secret',
    STATIONS_WRITE_REQUIRED_ACKS: '3',
    STATIONS_READ_REQUIRED_ACKS: '3',
    STATIONS_STREAM_BROKER_URL: 'kafka-1:9092,kafka-2:9092',
    STATIONS_STREAM_FROM_BEGINNING: 'false',
    STATIONS_INGEST_MAX_ATTEMPTS: '2',
    STATIONS_INGEST_RETRY_BASE_MS: '50',
    STATIONS_INGEST_RETRY_JITTER_RATIO: '0',
    STATIONS_DEAD_LETTER_PATH: 'var/dead-letters.jsonl'
  });

  assert.equal(config.port, 8080);
  assert.equal(config.logLevel, 'debug');
  assert.deepEqual(config.store.contactPoints, ['10.0.0.1', '10.0.0.2']);
  assert.equal(config.store.keyspace, 'weather_test');
  assert.equal(config.store.password, 'test-secret');
  assert.deepEqual(config.quorum.write, { requiredAcks: 3, timeoutMs: 250 });
  assert.deepEqual(config.quorum.read, { requiredAcks: 3, timeoutMs: 250 });
  assert.deepEqual(config.stream.brokers, ['kafka-1:9092', 'kafka-2:9092']);
  assert.equal(config.stream.fromBeginning, false);
  assert.equal(config.ingestion.maxAttempts, 2);
  assert.equal(config.ingestion.backoff.baseMs, 50);
  assert.equal(config.ingestion.backoff.jitterRatio, 0);
  assert.equal(config.ingestion.deadLetterPath, path.resolve(process.cwd(), 'var/dead-letters.jsonl'));
});

test('read quorum defaults to the replication factor', () => {
  const config = loadServiceConfig({ STATIONS_STORE_REPLICATION_FACTOR: '5', STATIONS_WRITE_REQUIRED_ACKS: '2' });
  assert.equal(config.quorum.read.requiredAcks, 5);
  assert.equal(config.quorum.write.requiredAcks, 2);
});

test('rejects quorums that do not overlap', () => {
  assert.throws(
    () => loadServiceConfig({ STATIONS_WRITE_REQUIRED_ACKS: '1', STATIONS_READ_REQUIRED_ACKS: '2' }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(
        error.message,
        'read quorum (2) + write quorum (1) must exceed the replication factor (3)'
      );
      return true;
    }
  );
});

test('rejects quorums larger than the replica set', () => {
  assert.throws(
    () => loadServiceConfig({ STATIONS_WRITE_REQUIRED_ACKS: '4' }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(error.message, 'write quorum of 4 exceeds the replication factor of 3');
      return true;
    }
  );
});

test('reports malformed variables together', () => {
  assert.throws(
    () => loadServiceConfig({ STATIONS_PORT: 'eighty', STATIONS_STORE_REPLICATION_FACTOR: '0' }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(
        error.message,
        [
          '[stations] Invalid environment configuration',
          '  - STATIONS_PORT: Expected STATIONS_PORT to be an integer',
          '  - STATIONS_STORE_REPLICATION_FACTOR: STATIONS_STORE_REPLICATION_FACTOR must be >= 1'
        ].join('\n')
      );
      return true;
    }
  );
});

test('rejects unknown log levels and unusable keyspaces', () => {
  assert.throws(() => loadServiceConfig({ STATIONS_LOG_LEVEL: 'loud' }), ConfigurationError);
  assert.throws(() => loadServiceConfig({ STATIONS_STORE_KEYSPACE: 'weather-prod' }), ConfigurationError);
});

test('rejects quorums a cluster cannot express as a consistency level', () => {
  const env = {
    STATIONS_STORE_CONTACT_POINTS: '10.0.0.1',
    STATIONS_STORE_REPLICATION_FACTOR: '7',
    STATIONS_WRITE_REQUIRED_ACKS: '5',
    STATIONS_READ_REQUIRED_ACKS: '3'
  };
  assert.throws(
    () => loadServiceConfig(env),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(error.message, 'no consistency level acknowledges exactly 5 of 7 replicas');
      return true;
    }
  );

  // The in-process store takes any acknowledgement count.
  const inline = loadServiceConfig({ ...env, STATIONS_STORE_CONTACT_POINTS: 'inline' });
  assert.deepEqual(
    [inline.quorum.write.requiredAcks, inline.quorum.read.requiredAcks],
    [5, 3]
  );
});
