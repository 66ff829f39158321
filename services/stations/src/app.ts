import fastify, { type FastifyInstance } from 'fastify';

import type { StationServiceConfig } from './config/serviceConfig';
import { mapErrorToResponse } from './errors';
import { ObservationConsumerTask } from './ingestion/consumerTask';
import { JsonLinesDeadLetterSink, LoggingDeadLetterSink, type DeadLetterSink } from './ingestion/deadLetter';
import { KafkaObservationStream } from './ingestion/kafkaStream';
import { ObservationIngestor } from './ingestion/observationIngestor';
import type { ObservationStream } from './ingestion/stream';
import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { StationQueryService } from './query/stationQueryService';
import { registerHealthRoutes } from './routes/health';
import { registerIngestionRoutes } from './routes/ingestion';
import { registerStationRoutes } from './routes/stations';
import { createStationStore } from './store';
import type { StationStore } from './store/types';
import type { AppContext } from './types';

export interface CreateAppOverrides {
  store?: StationStore;
  /** `null` disables ingestion even when brokers are configured. */
  stream?: ObservationStream | null;
  deadLetters?: DeadLetterSink;
  retrySleep?: (delayMs: number, signal: AbortSignal) => Promise<void>;
}

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

export const createApp = async (
  config: StationServiceConfig,
  overrides: CreateAppOverrides = {}
): Promise<CreateAppResult> => {
  const app = fastify({ logger: createLogger(config.logLevel) });
  const metrics = createMetrics();
  metrics.readinessGauge.set({ component: 'store' }, 0);
  metrics.readinessGauge.set({ component: 'consumer' }, 0);

  const store = overrides.store ?? (await createStationStore(config, app.log.child({ component: 'stations.store' })));
  const queries = new StationQueryService({
    store,
    keyspace: config.store.keyspace,
    readQuorum: config.quorum.read,
    writeQuorum: config.quorum.write,
    logger: app.log.child({ component: 'stations.query' })
  });

  const ctx: AppContext = {
    config,
    store,
    queries,
    metrics,
    readiness: { store: true, consumer: false },
    consumer: null
  };
  metrics.readinessGauge.set({ component: 'store' }, 1);

  const ingestionLogger = app.log.child({ component: 'stations.ingestion' });
  let stream: ObservationStream | null;
  if (overrides.stream !== undefined) {
    stream = overrides.stream;
  } else if (config.stream.brokers.length > 0) {
    stream = new KafkaObservationStream(config.stream, ingestionLogger);
  } else {
    ingestionLogger.warn('STATIONS_STREAM_BROKER_URL is not configured; observation consumer disabled');
    stream = null;
  }

  if (stream) {
    const deadLetters = overrides.deadLetters ?? (config.ingestion.deadLetterPath
      ? new JsonLinesDeadLetterSink(config.ingestion.deadLetterPath, ingestionLogger)
      : new LoggingDeadLetterSink(ingestionLogger));
    const ingestor = new ObservationIngestor({
      store,
      writeQuorum: config.quorum.write,
      maxAttempts: config.ingestion.maxAttempts,
      backoff: config.ingestion.backoff,
      deadLetters,
      logger: ingestionLogger,
      metrics,
      sleep: overrides.retrySleep
    });
    ctx.consumer = new ObservationConsumerTask(stream, ingestor, ingestionLogger, (state) => {
      ctx.readiness.consumer = state === 'running';
      metrics.readinessGauge.set({ component: 'consumer' }, ctx.readiness.consumer ? 1 : 0);
    });
  } else {
    ctx.readiness.consumer = true;
    metrics.readinessGauge.set({ component: 'consumer' }, 1);
  }

  registerHealthRoutes(app, ctx);
  registerStationRoutes(app, ctx);
  registerIngestionRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send({ code: mapped.code, message: mapped.message, details: mapped.details });
  });

  app.addHook('onClose', async () => {
    if (ctx.consumer) {
      await ctx.consumer.stop();
    }
    ctx.readiness.store = false;
    await store.close();
  });

  return { app, ctx };
};

/** Connects the observation stream and starts the consumer loop, if ingestion is enabled. */
export const startIngestion = async (app: FastifyInstance, ctx: AppContext): Promise<void> => {
  if (!ctx.consumer) {
    return;
  }
  await ctx.consumer.start();
  app.log.info({ topic: ctx.config.stream.topic }, 'observation ingestion started');
};
