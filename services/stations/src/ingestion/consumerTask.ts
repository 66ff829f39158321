import type { FastifyBaseLogger } from 'fastify';
import type { IngestionStatus, ObservationIngestor } from './observationIngestor';
import { describeMessage, type ObservationStream } from './stream';

export type ConsumerTaskState = 'idle' | 'running' | 'stopping' | 'stopped' | 'error';

export interface ConsumerTaskStatus {
  state: ConsumerTaskState;
  processed: number;
  applied: number;
  decodeErrors: number;
  deadLettered: number;
  commitFailures: number;
  lastMessageAtMs: number | null;
  lastError: string | null;
}

/**
 * Long-lived ingestion loop: receive, process, commit, repeat. Owns its
 * AbortController; `stop()` aborts it and waits for the loop to unwind. The
 * stream position is committed only after the store write succeeds or the
 * message is dead-lettered.
 */
export class ObservationConsumerTask {
  private readonly controller = new AbortController();
  private loop: Promise<void> | null = null;
  private readonly status: ConsumerTaskStatus = {
    state: 'idle',
    processed: 0,
    applied: 0,
    decodeErrors: 0,
    deadLettered: 0,
    commitFailures: 0,
    lastMessageAtMs: null,
    lastError: null
  };

  constructor(
    private readonly stream: ObservationStream,
    private readonly ingestor: ObservationIngestor,
    private readonly logger: FastifyBaseLogger,
    private readonly onStateChange: (state: ConsumerTaskState) => void = () => undefined
  ) {}

  /** Connects the stream, then launches the loop in the background. */
  async start(): Promise<void> {
    if (this.loop) {
      return;
    }
    await this.stream.start();
    this.setState('running');
    this.loop = this.run().catch((error: unknown) => {
      this.status.lastError = error instanceof Error ? error.message : String(error);
      this.setState('error');
      this.logger.error({ err: error }, 'observation consumer terminated unexpectedly');
    });
  }

  async stop(): Promise<void> {
    if (this.status.state === 'running') {
      this.setState('stopping');
    }
    this.controller.abort();
    try {
      await this.stream.close();
    } catch (error) {
      this.logger.warn({ err: error }, 'observation stream close failed');
    }
    if (this.loop) {
      await this.loop;
    }
    if (this.status.state !== 'error' && this.status.state !== 'stopped') {
      this.setState('stopped');
    }
  }

  /** Resolves when the loop has exited, whether stopped, drained or failed. */
  async whenIdle(): Promise<void> {
    if (this.loop) {
      await this.loop;
    }
  }

  getStatus(): ConsumerTaskStatus {
    return { ...this.status };
  }

  private setState(state: ConsumerTaskState): void {
    this.status.state = state;
    this.onStateChange(state);
  }

  private record(status: IngestionStatus): void {
    this.status.processed += 1;
    this.status.lastMessageAtMs = Date.now();
    if (status === 'applied') {
      this.status.applied += 1;
    } else if (status === 'decode_error') {
      this.status.decodeErrors += 1;
    } else if (status === 'dead_lettered') {
      this.status.deadLettered += 1;
    }
  }

  private async run(): Promise<void> {
    const { signal } = this.controller;
    this.logger.info('observation consumer started');

    while (!signal.aborted) {
      const message = await this.stream.receive(signal);
      if (!message) {
        break;
      }

      const outcome = await this.ingestor.process(message, signal);
      if (outcome.status === 'interrupted') {
        this.logger.info(describeMessage(message), 'observation consumer interrupted; message left uncommitted');
        break;
      }
      this.record(outcome.status);

      try {
        await this.stream.commit(message);
      } catch (error) {
        // The message will be redelivered; the keyed upsert makes the replay harmless.
        this.status.commitFailures += 1;
        this.status.lastError = error instanceof Error ? error.message : String(error);
        this.logger.warn({ err: error, ...describeMessage(message) }, 'failed to commit stream position');
      }
    }

    this.logger.info({ processed: this.status.processed }, 'observation consumer exited');
    this.setState('stopped');
  }
}
