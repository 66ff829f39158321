import { Client, errors, types, type ClientOptions, type QueryOptions } from 'cassandra-driver';
import type { FastifyBaseLogger } from 'fastify';
import { ConfigurationError, ReadUnavailableError, WriteTransientError } from '../errors';
import { STATION_TABLE, buildSchemaStatements } from '../schema/stationSchema';
import type { Observation, StoredObservation } from '../types';
import { assertQuorumPolicy, type QuorumPolicy, type StationStore } from './types';

export interface CassandraStoreSettings {
  contactPoints: string[];
  localDataCenter: string;
  keyspace: string;
  replicationFactor: number;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  username: string | null;
  password: string | null;
}

export interface CassandraRow {
  get(columnName: string): unknown;
}

/** The part of a cassandra-driver `Client` the store uses. */
export interface CassandraClient {
  connect(): Promise<void>;
  execute(query: string, params?: unknown[], options?: QueryOptions): Promise<{ rows: CassandraRow[] }>;
  shutdown(): Promise<void>;
}

export type CassandraClientFactory = (options: ClientOptions) => CassandraClient;

const createDriverClient: CassandraClientFactory = (options) => new Client(options);

const READ_UNAVAILABLE_CODES = new Set<number>([
  types.responseErrorCodes.unavailableException,
  types.responseErrorCodes.overloaded,
  types.responseErrorCodes.isBootstrapping,
  types.responseErrorCodes.readTimeout,
  types.responseErrorCodes.readFailure
]);

const WRITE_TRANSIENT_CODES = new Set<number>([
  types.responseErrorCodes.unavailableException,
  types.responseErrorCodes.overloaded,
  types.responseErrorCodes.isBootstrapping,
  types.responseErrorCodes.writeTimeout,
  types.responseErrorCodes.writeFailure
]);

/**
 * Maps an acknowledgement count onto the driver's consistency levels. Counts
 * without an exact level (for example 4 of 7) are rejected instead of being
 * rounded to a weaker or stronger level.
 */
export function consistencyForAcks(requiredAcks: number, replicationFactor: number): types.consistencies {
  if (requiredAcks === 1) {
    return types.consistencies.one;
  }
  if (requiredAcks === 2) {
    return types.consistencies.two;
  }
  if (requiredAcks === 3) {
    return types.consistencies.three;
  }
  if (requiredAcks === replicationFactor) {
    return types.consistencies.all;
  }
  if (requiredAcks === Math.floor(replicationFactor / 2) + 1) {
    return types.consistencies.quorum;
  }
  throw new ConfigurationError(
    `no consistency level acknowledges exactly ${requiredAcks} of ${replicationFactor} replicas`
  );
}

function isTransient(error: unknown, codes: Set<number>): boolean {
  if (error instanceof errors.NoHostAvailableError || error instanceof errors.OperationTimedOutError) {
    return true;
  }
  return error instanceof errors.ResponseError && codes.has(error.code);
}

function toNullableNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export class CassandraStationStore implements StationStore {
  readonly kind = 'cassandra' as const;
  readonly replicationFactor: number;
  private readonly table: string;

  private constructor(
    private readonly client: CassandraClient,
    private readonly settings: CassandraStoreSettings,
    private readonly logger: FastifyBaseLogger
  ) {
    this.replicationFactor = settings.replicationFactor;
    this.table = `${settings.keyspace}.${STATION_TABLE.table}`;
  }

  /**
   * Opens the connection pool and makes sure the keyspace and table exist.
   * Any failure here is fatal for the service.
   */
  static async connect(
    settings: CassandraStoreSettings,
    logger: FastifyBaseLogger,
    createClient: CassandraClientFactory = createDriverClient
  ): Promise<CassandraStationStore> {
    const client = createClient({
      contactPoints: settings.contactPoints,
      localDataCenter: settings.localDataCenter,
      socketOptions: {
        connectTimeout: settings.connectTimeoutMs,
        readTimeout: settings.requestTimeoutMs
      },
      ...(settings.username && settings.password
        ? { credentials: { username: settings.username, password: settings.password } }
        : {})
    });

    try {
      await client.connect();
      for (const statement of buildSchemaStatements(settings.keyspace, settings.replicationFactor)) {
        await client.execute(statement);
      }
    } catch (error) {
      await client.shutdown().catch((shutdownError: unknown) => {
        logger.warn({ err: shutdownError }, 'failed to shut down store client after connect error');
      });
      throw new ConfigurationError(
        `unable to initialise store at ${settings.contactPoints.join(', ')}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    logger.info(
      { contactPoints: settings.contactPoints, keyspace: settings.keyspace, replicationFactor: settings.replicationFactor },
      'store client connected'
    );
    return new CassandraStationStore(client, settings, logger);
  }

  async upsertObservation(observation: Observation, policy: QuorumPolicy): Promise<void> {
    const date = types.LocalDate.fromString(observation.date);
    const tmin = observation.tmin ?? null;
    if (observation.name !== undefined) {
      await this.write(
        `INSERT INTO ${this.table} (id, date, name, tmin, tmax) VALUES (?, ?, ?, ?, ?)`,
        [observation.stationId, date, observation.name, tmin, observation.tmax],
        policy
      );
      return;
    }
    await this.write(
      `INSERT INTO ${this.table} (id, date, tmin, tmax) VALUES (?, ?, ?, ?)`,
      [observation.stationId, date, tmin, observation.tmax],
      policy
    );
  }

  async upsertStationName(stationId: string, name: string, policy: QuorumPolicy): Promise<void> {
    await this.write(`INSERT INTO ${this.table} (id, name) VALUES (?, ?)`, [stationId, name], policy);
  }

  async readStationName(stationId: string, policy: QuorumPolicy): Promise<string | null> {
    const result = await this.read(`SELECT name FROM ${this.table} WHERE id = ? LIMIT 1`, [stationId], policy);
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    const name: unknown = row.get('name');
    return typeof name === 'string' ? name : null;
  }

  async readObservations(stationId: string, policy: QuorumPolicy): Promise<StoredObservation[]> {
    const result = await this.read(`SELECT date, tmin, tmax FROM ${this.table} WHERE id = ?`, [stationId], policy);
    const observations: StoredObservation[] = [];
    for (const row of result.rows) {
      const date: unknown = row.get('date');
      // A partition holding only its static column yields one row without a clustering value.
      if (date === null || date === undefined) {
        continue;
      }
      observations.push({
        date: String(date),
        tmin: toNullableNumber(row.get('tmin')),
        tmax: toNullableNumber(row.get('tmax'))
      });
    }
    return observations;
  }

  async close(): Promise<void> {
    await this.client.shutdown();
    this.logger.info({ contactPoints: this.settings.contactPoints }, 'store client closed');
  }

  private async write(query: string, params: unknown[], policy: QuorumPolicy): Promise<void> {
    assertQuorumPolicy(policy, this.replicationFactor);
    try {
      await this.client.execute(query, params, {
        prepare: true,
        consistency: consistencyForAcks(policy.requiredAcks, this.replicationFactor),
        readTimeout: policy.timeoutMs
      });
    } catch (error) {
      if (isTransient(error, WRITE_TRANSIENT_CODES)) {
        throw new WriteTransientError(
          `write quorum of ${policy.requiredAcks} not met: ${error instanceof Error ? error.message : String(error)}`,
          policy.requiredAcks,
          null,
          { cause: error }
        );
      }
      throw error;
    }
  }

  private async read(query: string, params: unknown[], policy: QuorumPolicy): Promise<{ rows: CassandraRow[] }> {
    assertQuorumPolicy(policy, this.replicationFactor);
    try {
      return await this.client.execute(query, params, {
        prepare: true,
        consistency: consistencyForAcks(policy.requiredAcks, this.replicationFactor),
        readTimeout: policy.timeoutMs
      });
    } catch (error) {
      if (isTransient(error, READ_UNAVAILABLE_CODES)) {
        throw new ReadUnavailableError(
          `read quorum of ${policy.requiredAcks} not met: ${error instanceof Error ? error.message : String(error)}`,
          policy.requiredAcks,
          null,
          { cause: error }
        );
      }
      throw error;
    }
  }
}
