import type { FastifyBaseLogger } from 'fastify';
import { Kafka, logLevel, type Consumer, type ConsumerConfig, type EachMessagePayload } from 'kafkajs';
import type { StreamConfig } from '../config/serviceConfig';
import type { ObservationStream, StreamMessage } from './stream';

/** The slice of a kafkajs consumer the stream drives. */
export type KafkaConsumerClient = Pick<Consumer, 'connect' | 'subscribe' | 'run' | 'commitOffsets' | 'stop' | 'disconnect'>;

/** Satisfied by a kafkajs `Kafka` client. */
export interface KafkaConsumerFactory {
  consumer(config: ConsumerConfig): KafkaConsumerClient;
}

interface PendingDelivery {
  message: StreamMessage;
  release: () => void;
}

function deliveryKey(message: Pick<StreamMessage, 'topic' | 'partition' | 'offset'>): string {
  return `${message.topic}:${message.partition}:${message.offset}`;
}

export function nextOffset(offset: string): string {
  return (BigInt(offset) + 1n).toString();
}

/**
 * Bridges kafkajs' callback consumer onto the pull-style ObservationStream.
 *
 * Auto-commit is off. Each `eachMessage` callback parks its message in a
 * queue and resolves only after the consumer task commits it (or the stream
 * closes), so kafkajs never runs ahead of the task within a partition.
 */
export class KafkaObservationStream implements ObservationStream {
  private readonly consumer: KafkaConsumerClient;
  private readonly queue: PendingDelivery[] = [];
  private readonly inFlight = new Map<string, PendingDelivery>();
  private wake: (() => void) | null = null;
  private closed = false;
  private shutdown: Promise<void> | null = null;

  constructor(
    private readonly config: StreamConfig,
    private readonly logger: FastifyBaseLogger,
    kafka?: KafkaConsumerFactory
  ) {
    const client: KafkaConsumerFactory = kafka ?? new Kafka({
      clientId: config.clientId,
      brokers: config.brokers,
      logLevel: logLevel.ERROR
    });
    this.consumer = client.consumer({ groupId: config.groupId });
  }

  async start(): Promise<void> {
    await this.consumer.connect();
    await this.consumer.subscribe({ topic: this.config.topic, fromBeginning: this.config.fromBeginning });
    this.consumer
      .run({
        autoCommit: false,
        partitionsConsumedConcurrently: 1,
        eachMessage: (payload) => this.handOff(payload)
      })
      .catch((error: unknown) => {
        this.logger.error({ err: error, topic: this.config.topic }, 'kafka consumer terminated unexpectedly');
        this.closed = true;
        this.notify();
      });
    this.logger.info(
      { topic: this.config.topic, groupId: this.config.groupId, brokers: this.config.brokers },
      'observation stream subscribed'
    );
  }

  async receive(signal: AbortSignal): Promise<StreamMessage | null> {
    while (!this.closed && !signal.aborted) {
      const next = this.queue.shift();
      if (next) {
        this.inFlight.set(deliveryKey(next.message), next);
        return next.message;
      }
      await new Promise<void>((resolve) => {
        const onAbort = () => resolve();
        signal.addEventListener('abort', onAbort, { once: true });
        this.wake = () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        };
      });
      this.wake = null;
    }
    return null;
  }

  async commit(message: StreamMessage): Promise<void> {
    const key = deliveryKey(message);
    try {
      await this.consumer.commitOffsets([
        { topic: message.topic, partition: message.partition, offset: nextOffset(message.offset) }
      ]);
    } finally {
      this.inFlight.get(key)?.release();
      this.inFlight.delete(key);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.notify();
    // Uncommitted deliveries are released without a commit and will be replayed.
    for (const delivery of [...this.queue, ...this.inFlight.values()]) {
      delivery.release();
    }
    this.queue.length = 0;
    this.inFlight.clear();

    // A consumer whose run loop already failed is still connected and must be stopped once.
    if (!this.shutdown) {
      this.shutdown = this.stopConsumer();
    }
    await this.shutdown;
  }

  private async stopConsumer(): Promise<void> {
    try {
      await this.consumer.stop();
    } catch (error) {
      this.logger.warn({ err: error }, 'kafka consumer stop failed');
    }
    try {
      await this.consumer.disconnect();
    } catch (error) {
      this.logger.warn({ err: error }, 'kafka consumer disconnect failed');
    }
  }

  private handOff({ topic, partition, message }: EachMessagePayload): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({
        message: {
          topic,
          partition,
          offset: message.offset,
          key: message.key ? message.key.toString('utf8') : null,
          value: message.value ?? null,
          timestamp: message.timestamp ?? null
        },
        release: resolve
      });
      this.notify();
    });
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
