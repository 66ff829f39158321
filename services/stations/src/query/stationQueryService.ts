import type { FastifyBaseLogger } from 'fastify';
import { StationNotFoundError } from '../errors';
import { describeStationSchema, type SchemaDescription } from '../schema/stationSchema';
import type { QuorumPolicy, StationStore } from '../store/types';
import type { Observation, StoredObservation } from '../types';

export interface StationQueryServiceOptions {
  store: StationStore;
  keyspace: string;
  readQuorum: QuorumPolicy;
  writeQuorum: QuorumPolicy;
  logger: FastifyBaseLogger;
}

export interface RecordTempsInput {
  stationId: string;
  date: string;
  tmax: number;
  tmin?: number;
}

export function maxTmax(observations: StoredObservation[]): number | null {
  let max: number | null = null;
  for (const observation of observations) {
    if (observation.tmax === null) {
      continue;
    }
    if (max === null || observation.tmax > max) {
      max = observation.tmax;
    }
  }
  return max;
}

/**
 * Stateless query façade. Every read uses the configured read quorum, and a
 * quorum failure is surfaced as-is: there is no fallback to a weaker read.
 */
export class StationQueryService {
  private readonly schema: SchemaDescription;

  constructor(private readonly options: StationQueryServiceOptions) {
    this.schema = describeStationSchema(options.keyspace);
  }

  stationSchema(): SchemaDescription {
    return this.schema;
  }

  async stationName(stationId: string): Promise<string> {
    const name = await this.options.store.readStationName(stationId, this.options.readQuorum);
    if (name === null) {
      throw new StationNotFoundError(stationId, 'name');
    }
    return name;
  }

  async stationMax(stationId: string): Promise<number> {
    const observations = await this.options.store.readObservations(stationId, this.options.readQuorum);
    const max = maxTmax(observations);
    if (max === null) {
      throw new StationNotFoundError(stationId, 'observations');
    }
    this.options.logger.debug({ stationId, rows: observations.length }, 'station max computed');
    return max;
  }

  /** Direct write through the same quorum the stream consumer uses. */
  async recordTemps(input: RecordTempsInput): Promise<void> {
    const observation: Observation = {
      stationId: input.stationId,
      date: input.date,
      tmax: input.tmax,
      ...(input.tmin !== undefined ? { tmin: input.tmin } : {})
    };
    await this.options.store.upsertObservation(observation, this.options.writeQuorum);
  }
}
