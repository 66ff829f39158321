import type { StationServiceConfig } from './config/serviceConfig';
import type { StationMetrics } from './metrics';
import type { ObservationConsumerTask } from './ingestion/consumerTask';
import type { StationQueryService } from './query/stationQueryService';
import type { StationStore } from './store/types';

/** One measurement day for one station, as produced by the codec. */
export interface Observation {
  stationId: string;
  /** ISO calendar date, `YYYY-MM-DD`. */
  date: string;
  tmax: number;
  tmin?: number;
  /** Static station attribute; carried redundantly by some producers. */
  name?: string;
}

export interface StoredObservation {
  date: string;
  tmax: number | null;
  tmin: number | null;
}

export interface ReadinessState {
  store: boolean;
  consumer: boolean;
}

export interface AppContext {
  config: StationServiceConfig;
  store: StationStore;
  queries: StationQueryService;
  metrics: StationMetrics;
  readiness: ReadinessState;
  consumer: ObservationConsumerTask | null;
}
