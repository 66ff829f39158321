import path from 'node:path';
import { z } from 'zod';
import {
  EnvConfigError,
  booleanVar,
  integerVar,
  loadEnvConfig,
  stringListVar,
  stringVar,
  type EnvSource
} from '@stationhub/shared/envConfig';
import { resolveRetryBackoffConfig, type RetryBackoffConfig } from '@stationhub/shared/retries/backoff';
import { ConfigurationError } from '../errors';
import { assertValidKeyspace } from '../schema/stationSchema';
import { consistencyForAcks } from '../store/cassandraStore';
import type { QuorumPolicy } from '../store/types';

type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface StoreConfig {
  /** Store node addresses, or `['inline']` for the in-process replicated store. */
  contactPoints: string[];
  localDataCenter: string;
  keyspace: string;
  replicationFactor: number;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  username: string | null;
  password: string | null;
}

export interface QuorumConfig {
  write: QuorumPolicy;
  read: QuorumPolicy;
}

export interface StreamConfig {
  brokers: string[];
  clientId: string;
  topic: string;
  groupId: string;
  fromBeginning: boolean;
}

export interface IngestionConfig {
  maxAttempts: number;
  backoff: RetryBackoffConfig;
  deadLetterPath: string | null;
}

export interface StationServiceConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  store: StoreConfig;
  quorum: QuorumConfig;
  stream: StreamConfig;
  ingestion: IngestionConfig;
}

const DEFAULTS = {
  host: '0.0.0.0',
  port: 5440,
  logLevel: 'info',
  localDataCenter: 'datacenter1',
  keyspace: 'weather',
  replicationFactor: 3,
  writeRequiredAcks: 1,
  connectTimeoutMs: 30_000,
  requestTimeoutMs: 5_000,
  clientId: 'stations-ingest',
  topic: 'station-observations',
  groupId: 'stations-ingest',
  maxAttempts: 5
} as const;

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const envSchema = z
  .object({
    STATIONS_HOST: stringVar(),
    STATIONS_PORT: integerVar({ min: 0, max: 65535 }),
    STATIONS_LOG_LEVEL: stringVar({ lowercase: true }).pipe(logLevelSchema.optional()),
    STATIONS_STORE_CONTACT_POINTS: stringListVar({ separator: ',' }),
    STATIONS_STORE_LOCAL_DC: stringVar(),
    STATIONS_STORE_KEYSPACE: stringVar({ lowercase: true }),
    STATIONS_STORE_REPLICATION_FACTOR: integerVar({ min: 1 }),
    STATIONS_STORE_USERNAME: stringVar(),
    STATIONS_STORE_PASSWORD: stringVar(),
    STATIONS_STORE_CONNECT_TIMEOUT_MS: integerVar({ min: 1 }),
    STATIONS_STORE_REQUEST_TIMEOUT_MS: integerVar({ min: 1 }),
    STATIONS_WRITE_REQUIRED_ACKS: integerVar({ min: 1 }),
    STATIONS_READ_REQUIRED_ACKS: integerVar({ min: 1 }),
    STATIONS_STREAM_BROKER_URL: stringListVar({ separator: ',' }),
    STATIONS_STREAM_CLIENT_ID: stringVar(),
    STATIONS_STREAM_TOPIC: stringVar(),
    STATIONS_STREAM_GROUP_ID: stringVar(),
    STATIONS_STREAM_FROM_BEGINNING: booleanVar({ defaultValue: true }),
    STATIONS_INGEST_MAX_ATTEMPTS: integerVar({ min: 1, max: 100 }),
    STATIONS_DEAD_LETTER_PATH: stringVar()
  })
  .passthrough();

type StationEnv = z.infer<typeof envSchema>;

export function isInlineStore(contactPoints: string[]): boolean {
  return contactPoints.length === 1 && contactPoints[0]?.toLowerCase() === 'inline';
}

function buildQuorum(
  env: StationEnv,
  replicationFactor: number,
  timeoutMs: number,
  contactPoints: string[]
): QuorumConfig {
  const writeAcks = env.STATIONS_WRITE_REQUIRED_ACKS ?? DEFAULTS.writeRequiredAcks;
  const readAcks = env.STATIONS_READ_REQUIRED_ACKS ?? replicationFactor;

  for (const [label, acks] of [['write', writeAcks], ['read', readAcks]] as const) {
    if (acks > replicationFactor) {
      throw new ConfigurationError(
        `${label} quorum of ${acks} exceeds the replication factor of ${replicationFactor}`
      );
    }
  }
  // Overlapping quorums are what make an acknowledged write visible to every later read.
  if (readAcks + writeAcks <= replicationFactor) {
    throw new ConfigurationError(
      `read quorum (${readAcks}) + write quorum (${writeAcks}) must exceed the replication factor (${replicationFactor})`
    );
  }
  // A cluster only takes named consistency levels; every count must map onto one before the first write.
  if (!isInlineStore(contactPoints)) {
    consistencyForAcks(writeAcks, replicationFactor);
    consistencyForAcks(readAcks, replicationFactor);
  }

  return {
    write: { requiredAcks: writeAcks, timeoutMs },
    read: { requiredAcks: readAcks, timeoutMs }
  };
}

export function loadServiceConfig(env: EnvSource = process.env): StationServiceConfig {
  let parsed: StationEnv;
  try {
    parsed = loadEnvConfig(envSchema, { env, context: 'stations' });
  } catch (error) {
    if (error instanceof EnvConfigError) {
      throw new ConfigurationError(error.message, { cause: error });
    }
    throw error;
  }

  const replicationFactor = parsed.STATIONS_STORE_REPLICATION_FACTOR ?? DEFAULTS.replicationFactor;
  const requestTimeoutMs = parsed.STATIONS_STORE_REQUEST_TIMEOUT_MS ?? DEFAULTS.requestTimeoutMs;
  const contactPoints = parsed.STATIONS_STORE_CONTACT_POINTS.length > 0
    ? parsed.STATIONS_STORE_CONTACT_POINTS
    : ['inline'];
  const deadLetterPath = parsed.STATIONS_DEAD_LETTER_PATH
    ? path.resolve(process.cwd(), parsed.STATIONS_DEAD_LETTER_PATH)
    : null;

  return {
    host: parsed.STATIONS_HOST ?? DEFAULTS.host,
    port: parsed.STATIONS_PORT ?? DEFAULTS.port,
    logLevel: parsed.STATIONS_LOG_LEVEL ?? DEFAULTS.logLevel,
    store: {
      contactPoints,
      localDataCenter: parsed.STATIONS_STORE_LOCAL_DC ?? DEFAULTS.localDataCenter,
      keyspace: assertValidKeyspace(parsed.STATIONS_STORE_KEYSPACE ?? DEFAULTS.keyspace),
      replicationFactor,
      connectTimeoutMs: parsed.STATIONS_STORE_CONNECT_TIMEOUT_MS ?? DEFAULTS.connectTimeoutMs,
      requestTimeoutMs,
      username: parsed.STATIONS_STORE_USERNAME ?? null,
      password: parsed.STATIONS_STORE_PASSWORD ?? null
    },
    quorum: buildQuorum(parsed, replicationFactor, requestTimeoutMs, contactPoints),
    stream: {
      brokers: parsed.STATIONS_STREAM_BROKER_URL,
      clientId: parsed.STATIONS_STREAM_CLIENT_ID ?? DEFAULTS.clientId,
      topic: parsed.STATIONS_STREAM_TOPIC ?? DEFAULTS.topic,
      groupId: parsed.STATIONS_STREAM_GROUP_ID ?? DEFAULTS.groupId,
      fromBeginning: parsed.STATIONS_STREAM_FROM_BEGINNING ?? true
    },
    ingestion: {
      maxAttempts: parsed.STATIONS_INGEST_MAX_ATTEMPTS ?? DEFAULTS.maxAttempts,
      backoff: resolveRetryBackoffConfig(
        'STATIONS_INGEST_RETRY',
        { baseMs: 100, factor: 2, maxMs: 5_000, jitterRatio: 0.2 },
        env
      ),
      deadLetterPath
    }
  };
}
