import { Counter, Gauge, Registry } from 'prom-client';

export type IngestOutcomeLabel = 'applied' | 'decode_error' | 'dead_lettered';
export type QueryOutcomeLabel = 'ok' | 'not_found' | 'unavailable' | 'error';

export interface StationMetrics {
  register: Registry;
  ingestMessages: Counter<'outcome'>;
  ingestWriteRetries: Counter;
  queryRequests: Counter<'operation' | 'outcome'>;
  readinessGauge: Gauge<'component'>;
}

export const createMetrics = (): StationMetrics => {
  const register = new Registry();

  const ingestMessages = new Counter({
    name: 'stations_ingest_messages_total',
    help: 'Stream messages handled by the observation consumer, by outcome',
    registers: [register],
    labelNames: ['outcome'] as const
  });

  const ingestWriteRetries = new Counter({
    name: 'stations_ingest_write_retries_total',
    help: 'Store writes retried after a transient quorum failure',
    registers: [register]
  });

  const queryRequests = new Counter({
    name: 'stations_query_requests_total',
    help: 'Query operations served, by operation and outcome',
    registers: [register],
    labelNames: ['operation', 'outcome'] as const
  });

  const readinessGauge = new Gauge({
    name: 'stations_component_ready',
    help: 'Readiness state per component (1 ready, 0 not ready)',
    registers: [register],
    labelNames: ['component'] as const
  });

  return {
    register,
    ingestMessages,
    ingestWriteRetries,
    queryRequests,
    readinessGauge
  };
};
