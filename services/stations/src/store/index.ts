import type { FastifyBaseLogger } from 'fastify';
import { isInlineStore, type StationServiceConfig } from '../config/serviceConfig';
import { CassandraStationStore } from './cassandraStore';
import { InlineReplicatedStore } from './inlineReplicatedStore';
import type { StationStore } from './types';

export async function createStationStore(
  config: StationServiceConfig,
  logger: FastifyBaseLogger
): Promise<StationStore> {
  const { store } = config;
  if (isInlineStore(store.contactPoints)) {
    logger.warn(
      { replicationFactor: store.replicationFactor },
      'using the in-process replicated store; data is not persisted'
    );
    return new InlineReplicatedStore({ replicationFactor: store.replicationFactor });
  }

  return CassandraStationStore.connect(
    {
      contactPoints: store.contactPoints,
      localDataCenter: store.localDataCenter,
      keyspace: store.keyspace,
      replicationFactor: store.replicationFactor,
      connectTimeoutMs: store.connectTimeoutMs,
      requestTimeoutMs: store.requestTimeoutMs,
      username: store.username,
      password: store.password
    },
    logger
  );
}

export { isInlineStore };
export { CassandraStationStore, consistencyForAcks } from './cassandraStore';
export { InlineReplicatedStore } from './inlineReplicatedStore';
export type { QuorumPolicy, StationStore } from './types';
