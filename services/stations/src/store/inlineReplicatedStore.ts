import { setTimeout as sleep } from 'node:timers/promises';
import { ReadUnavailableError, WriteTransientError } from '../errors';
import type { Observation, StoredObservation } from '../types';
import { assertQuorumPolicy, type QuorumPolicy, type StationStore } from './types';

interface Cell<T> {
  value: T;
  writtenAt: number;
}

interface RowValues {
  tmax: number | null;
  tmin: number | null;
}

interface ReplicaPartition {
  name: Cell<string> | null;
  rows: Map<string, Cell<RowValues>>;
}

interface InlineReplica {
  index: number;
  available: boolean;
  latencyMs: number;
  partitions: Map<string, ReplicaPartition>;
}

export interface ReplicaSnapshot {
  index: number;
  available: boolean;
  stations: Record<string, { name: string | null; observations: StoredObservation[] }>;
}

export interface InlineReplicatedStoreOptions {
  replicationFactor: number;
  /** Source of write timestamps in microseconds. Values are forced to be strictly increasing. */
  clock?: () => number;
}

function compareValues(left: unknown, right: unknown): number {
  const a = JSON.stringify(left);
  const b = JSON.stringify(right);
  return a === b ? 0 : a > b ? 1 : -1;
}

function newerCell<T>(current: Cell<T> | null | undefined, incoming: Cell<T>): Cell<T> {
  if (!current) {
    return incoming;
  }
  if (incoming.writtenAt !== current.writtenAt) {
    return incoming.writtenAt > current.writtenAt ? incoming : current;
  }
  return compareValues(incoming.value, current.value) > 0 ? incoming : current;
}

function toStored(date: string, cell: Cell<RowValues>): StoredObservation {
  return { date, tmax: cell.value.tmax, tmin: cell.value.tmin };
}

function sortedRows(rows: Map<string, Cell<RowValues>>): StoredObservation[] {
  return Array.from(rows.entries())
    .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
    .map(([date, cell]) => toStored(date, cell));
}

/**
 * In-process stand-in for a replicated wide-column store. Each partition is
 * copied to every replica; replicas can be failed, restored or slowed down to
 * exercise quorum behaviour without a cluster.
 *
 * Writes land on every reachable replica and complete once `requiredAcks` of
 * them have acknowledged. Reads contact the `requiredAcks` fastest reachable
 * replicas and merge their cells last-write-wins. There is no hinted handoff
 * or read repair, so a replica that missed a write stays stale.
 */
export class InlineReplicatedStore implements StationStore {
  readonly kind = 'inline' as const;
  readonly replicationFactor: number;
  private readonly replicas: InlineReplica[];
  private readonly clock: () => number;
  private lastTimestamp = 0;
  private closed = false;

  constructor(options: InlineReplicatedStoreOptions) {
    if (!Number.isInteger(options.replicationFactor) || options.replicationFactor < 1) {
      throw new RangeError(`replicationFactor must be a positive integer; received ${options.replicationFactor}`);
    }
    this.replicationFactor = options.replicationFactor;
    this.clock = options.clock ?? (() => Date.now() * 1_000);
    this.replicas = Array.from({ length: options.replicationFactor }, (_, index) => ({
      index,
      available: true,
      latencyMs: 0,
      partitions: new Map<string, ReplicaPartition>()
    }));
  }

  setReplicaAvailable(index: number, available: boolean): void {
    this.replica(index).available = available;
  }

  failReplicas(indexes: number[]): void {
    for (const index of indexes) {
      this.setReplicaAvailable(index, false);
    }
  }

  restoreAllReplicas(): void {
    for (const replica of this.replicas) {
      replica.available = true;
    }
  }

  setReplicaLatency(index: number, latencyMs: number): void {
    this.replica(index).latencyMs = Math.max(0, latencyMs);
  }

  snapshot(): ReplicaSnapshot[] {
    return this.replicas.map((replica) => {
      const stations: ReplicaSnapshot['stations'] = {};
      const ids = Array.from(replica.partitions.keys()).sort();
      for (const stationId of ids) {
        const partition = replica.partitions.get(stationId);
        if (!partition) {
          continue;
        }
        stations[stationId] = {
          name: partition.name?.value ?? null,
          observations: sortedRows(partition.rows)
        };
      }
      return { index: replica.index, available: replica.available, stations };
    });
  }

  async upsertObservation(observation: Observation, policy: QuorumPolicy): Promise<void> {
    await this.write(policy, (partition, writtenAt) => {
      const row: Cell<RowValues> = {
        value: { tmax: observation.tmax, tmin: observation.tmin ?? null },
        writtenAt
      };
      partition.rows.set(observation.date, newerCell(partition.rows.get(observation.date), row));
      if (observation.name !== undefined) {
        partition.name = newerCell(partition.name, { value: observation.name, writtenAt });
      }
    }, observation.stationId);
  }

  async upsertStationName(stationId: string, name: string, policy: QuorumPolicy): Promise<void> {
    await this.write(policy, (partition, writtenAt) => {
      partition.name = newerCell(partition.name, { value: name, writtenAt });
    }, stationId);
  }

  async readStationName(stationId: string, policy: QuorumPolicy): Promise<string | null> {
    const contacted = await this.contactForRead(policy);
    let merged: Cell<string> | null = null;
    for (const replica of contacted) {
      const cell = replica.partitions.get(stationId)?.name;
      if (cell) {
        merged = newerCell(merged, cell);
      }
    }
    return merged?.value ?? null;
  }

  async readObservations(stationId: string, policy: QuorumPolicy): Promise<StoredObservation[]> {
    const contacted = await this.contactForRead(policy);
    const merged = new Map<string, Cell<RowValues>>();
    for (const replica of contacted) {
      const rows = replica.partitions.get(stationId)?.rows;
      if (!rows) {
        continue;
      }
      for (const [date, cell] of rows) {
        merged.set(date, newerCell(merged.get(date), cell));
      }
    }
    return sortedRows(merged);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private replica(index: number): InlineReplica {
    const replica = this.replicas[index];
    if (!replica) {
      throw new RangeError(`replica ${index} does not exist (replication factor ${this.replicationFactor})`);
    }
    return replica;
  }

  private nextTimestamp(): number {
    const now = Math.floor(this.clock());
    this.lastTimestamp = now > this.lastTimestamp ? now : this.lastTimestamp + 1;
    return this.lastTimestamp;
  }

  private reachableByLatency(): InlineReplica[] {
    return this.replicas
      .filter((replica) => replica.available)
      .sort((left, right) => left.latencyMs - right.latencyMs || left.index - right.index);
  }

  private async write(
    policy: QuorumPolicy,
    apply: (partition: ReplicaPartition, writtenAt: number) => void,
    stationId: string
  ): Promise<void> {
    assertQuorumPolicy(policy, this.replicationFactor);
    const { requiredAcks, timeoutMs } = policy;
    if (this.closed) {
      throw new WriteTransientError('store client is closed', requiredAcks, 0);
    }

    const reachable = this.reachableByLatency();
    if (reachable.length < requiredAcks) {
      throw new WriteTransientError(
        `write quorum not met: ${requiredAcks} required, ${reachable.length} available`,
        requiredAcks,
        reachable.length
      );
    }

    const writtenAt = this.nextTimestamp();
    for (const replica of reachable) {
      let partition = replica.partitions.get(stationId);
      if (!partition) {
        partition = { name: null, rows: new Map() };
        replica.partitions.set(stationId, partition);
      }
      apply(partition, writtenAt);
    }

    // Replicas beyond the quorum still apply the write; only the acknowledgement waits.
    const ackLatency = reachable[requiredAcks - 1]?.latencyMs ?? 0;
    if (ackLatency > timeoutMs) {
      await sleep(timeoutMs);
      throw new WriteTransientError(
        `write timed out after ${timeoutMs}ms waiting for ${requiredAcks} acknowledgements`,
        requiredAcks,
        reachable.length
      );
    }
    if (ackLatency > 0) {
      await sleep(ackLatency);
    }
  }

  private async contactForRead(policy: QuorumPolicy): Promise<InlineReplica[]> {
    assertQuorumPolicy(policy, this.replicationFactor);
    const { requiredAcks, timeoutMs } = policy;
    if (this.closed) {
      throw new ReadUnavailableError('store client is closed', requiredAcks, 0);
    }

    const reachable = this.reachableByLatency();
    if (reachable.length < requiredAcks) {
      throw new ReadUnavailableError(
        `read quorum not met: ${requiredAcks} required, ${reachable.length} available`,
        requiredAcks,
        reachable.length
      );
    }

    const contacted = reachable.slice(0, requiredAcks);
    const slowest = contacted[contacted.length - 1]?.latencyMs ?? 0;
    if (slowest > timeoutMs) {
      await sleep(timeoutMs);
      throw new ReadUnavailableError(
        `read timed out after ${timeoutMs}ms waiting for ${requiredAcks} replicas`,
        requiredAcks,
        reachable.length
      );
    }
    if (slowest > 0) {
      await sleep(slowest);
    }
    return contacted;
  }
}
