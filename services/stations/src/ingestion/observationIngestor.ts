import { setTimeout as sleepFor } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import { computeExponentialBackoff, type BackoffOptions } from '@stationhub/shared/retries/backoff';
import { decodeObservation } from '../codec/observationCodec';
import { ConfigurationError, WriteTransientError, type DecodeError } from '../errors';
import type { StationMetrics } from '../metrics';
import type { QuorumPolicy, StationStore } from '../store/types';
import type { Observation } from '../types';
import type { DeadLetterSink } from './deadLetter';
import { describeMessage, type StreamMessage } from './stream';

export type IngestionOutcome =
  | { status: 'applied'; observation: Observation; attempts: number }
  | { status: 'decode_error'; error: DecodeError }
  | {
      status: 'dead_lettered';
      reason: 'write-exhausted' | 'write-rejected';
      observation: Observation;
      attempts: number;
      error: Error;
    }
  | { status: 'interrupted'; attempts: number };

export type IngestionStatus = IngestionOutcome['status'];

export interface ObservationIngestorOptions {
  store: StationStore;
  writeQuorum: QuorumPolicy;
  maxAttempts: number;
  backoff: BackoffOptions;
  deadLetters: DeadLetterSink;
  logger: FastifyBaseLogger;
  metrics?: StationMetrics;
  /** Waits between attempts; must reject once `signal` aborts. */
  sleep?: (delayMs: number, signal: AbortSignal) => Promise<void>;
}

const defaultSleep = async (delayMs: number, signal: AbortSignal): Promise<void> => {
  await sleepFor(delayMs, undefined, { signal });
};

function rawText(message: StreamMessage): string {
  return message.value ? message.value.toString('utf8') : '';
}

/**
 * Applies one stream message to the store.
 *
 * decode -> upsert (write quorum) -> [transient failure: backoff, retry]
 * -> applied | dead_lettered. A message is only ever `interrupted` when the
 * signal aborts between attempts; the caller must not commit it. A
 * ConfigurationError from the store is rethrown, never dead-lettered.
 */
export class ObservationIngestor {
  private readonly sleep: (delayMs: number, signal: AbortSignal) => Promise<void>;

  constructor(private readonly options: ObservationIngestorOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer; received ${options.maxAttempts}`);
    }
    this.sleep = options.sleep ?? defaultSleep;
  }

  async process(message: StreamMessage, signal: AbortSignal): Promise<IngestionOutcome> {
    const decoded = decodeObservation(message.value);
    if (!decoded.ok) {
      const { error } = decoded;
      this.options.logger.warn(
        { ...describeMessage(message), field: error.field, reason: error.reason },
        'skipping malformed observation message'
      );
      await this.options.deadLetters.record({
        reason: 'decode-error',
        error: error.message,
        field: error.field,
        ...describeMessage(message),
        raw: error.rawPreview
      });
      this.options.metrics?.ingestMessages.inc({ outcome: 'decode_error' });
      return { status: 'decode_error', error };
    }

    return this.apply(decoded.observation, message, signal);
  }

  private async apply(observation: Observation, message: StreamMessage, signal: AbortSignal): Promise<IngestionOutcome> {
    const { store, writeQuorum, maxAttempts, backoff, logger, metrics } = this.options;
    let attempt = 0;

    while (true) {
      if (signal.aborted) {
        return { status: 'interrupted', attempts: attempt };
      }
      attempt += 1;

      try {
        await store.upsertObservation(observation, writeQuorum);
        metrics?.ingestMessages.inc({ outcome: 'applied' });
        return { status: 'applied', observation, attempts: attempt };
      } catch (error) {
        // A misconfigured store rejects every message alike; stop without committing instead of draining the stream.
        if (error instanceof ConfigurationError) {
          throw error;
        }
        const normalized = error instanceof Error ? error : new Error(String(error));
        if (!(error instanceof WriteTransientError)) {
          return this.deadLetter('write-rejected', observation, message, attempt, normalized);
        }
        if (attempt >= maxAttempts) {
          return this.deadLetter('write-exhausted', observation, message, attempt, normalized);
        }

        const delayMs = computeExponentialBackoff(attempt, backoff);
        metrics?.ingestWriteRetries.inc();
        logger.warn(
          { err: error, stationId: observation.stationId, date: observation.date, attempt, delayMs },
          'observation write failed; retrying'
        );
        try {
          await this.sleep(delayMs, signal);
        } catch (sleepError) {
          if (signal.aborted) {
            return { status: 'interrupted', attempts: attempt };
          }
          throw sleepError;
        }
      }
    }
  }

  private async deadLetter(
    reason: 'write-exhausted' | 'write-rejected',
    observation: Observation,
    message: StreamMessage,
    attempts: number,
    error: Error
  ): Promise<IngestionOutcome> {
    this.options.logger.error(
      { err: error, stationId: observation.stationId, date: observation.date, attempts, reason },
      'observation write abandoned'
    );
    await this.options.deadLetters.record({
      reason,
      error: error.message,
      ...describeMessage(message),
      attempts,
      raw: rawText(message)
    });
    this.options.metrics?.ingestMessages.inc({ outcome: 'dead_lettered' });
    return { status: 'dead_lettered', reason, observation, attempts, error };
  }
}
