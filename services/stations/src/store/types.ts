import { ConfigurationError } from '../errors';
import type { Observation, StoredObservation } from '../types';

/**
 * How many replicas must acknowledge an operation before it completes, and
 * how long the round trip may take. Every store call takes one.
 */
export interface QuorumPolicy {
  requiredAcks: number;
  timeoutMs: number;
}

/**
 * Client for the replicated `stations` table.
 *
 * Conflicting writes to the same cell (including the static `name`) resolve
 * last-write-wins by write timestamp; on equal timestamps the greater value
 * wins. Reads return observations in ascending date order.
 */
export interface StationStore {
  readonly replicationFactor: number;
  readonly kind: 'cassandra' | 'inline';

  /** Full-value overwrite of the `(stationId, date)` row; writes `name` too when present. */
  upsertObservation(observation: Observation, policy: QuorumPolicy): Promise<void>;
  upsertStationName(stationId: string, name: string, policy: QuorumPolicy): Promise<void>;
  readStationName(stationId: string, policy: QuorumPolicy): Promise<string | null>;
  readObservations(stationId: string, policy: QuorumPolicy): Promise<StoredObservation[]>;
  close(): Promise<void>;
}

export function assertQuorumPolicy(policy: QuorumPolicy, replicationFactor: number): void {
  const { requiredAcks, timeoutMs } = policy;
  if (!Number.isInteger(requiredAcks) || requiredAcks < 1 || requiredAcks > replicationFactor) {
    throw new ConfigurationError(
      `requiredAcks must be an integer between 1 and the replication factor (${replicationFactor}); received ${requiredAcks}`
    );
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`quorum timeoutMs must be positive; received ${timeoutMs}`);
  }
}
