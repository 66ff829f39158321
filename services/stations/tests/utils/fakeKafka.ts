import type { Consumer, ConsumerConfig, ConsumerRunConfig, EachMessagePayload } from 'kafkajs';
import type { KafkaConsumerClient, KafkaConsumerFactory } from '../../src/ingestion/kafkaStream';

type Subscription = Parameters<Consumer['subscribe']>[0];
type CommittedOffsets = Parameters<Consumer['commitOffsets']>[0];

/**
 * Consumer that records what the stream asks of it. `deliver()` plays the
 * broker: it invokes the registered `eachMessage` handler and returns the
 * handler's promise, which stays pending until the stream releases it.
 */
export class FakeKafkaConsumer implements KafkaConsumerClient {
  readonly calls: string[] = [];
  readonly subscriptions: Subscription[] = [];
  readonly commits: CommittedOffsets[] = [];
  runConfig: ConsumerRunConfig | null = null;
  runError: Error | null = null;
  stopError: Error | null = null;
  failNextCommits = 0;

  async connect(): Promise<void> {
    this.calls.push('connect');
  }

  async subscribe(subscription: Subscription): Promise<void> {
    this.calls.push('subscribe');
    this.subscriptions.push(subscription);
  }

  async run(config?: ConsumerRunConfig): Promise<void> {
    this.calls.push('run');
    this.runConfig = config ?? null;
    if (this.runError) {
      throw this.runError;
    }
  }

  async commitOffsets(offsets: CommittedOffsets): Promise<void> {
    if (this.failNextCommits > 0) {
      this.failNextCommits -= 1;
      throw new Error('offset commit refused by broker');
    }
    this.commits.push(offsets);
  }

  async stop(): Promise<void> {
    this.calls.push('stop');
    if (this.stopError) {
      throw this.stopError;
    }
  }

  async disconnect(): Promise<void> {
    this.calls.push('disconnect');
  }

  deliver(partition: number, offset: string, value: string, topic = 'station-observations'): Promise<void> {
    const handler = this.runConfig?.eachMessage;
    if (!handler) {
      throw new Error('consumer is not running');
    }
    const payload: EachMessagePayload = {
      topic,
      partition,
      message: {
        key: null,
        value: Buffer.from(value, 'utf8'),
        timestamp: '1700000000000',
        attributes: 0,
        offset,
        headers: {}
      },
      heartbeat: async () => undefined,
      pause: () => () => undefined
    };
    return handler(payload);
  }
}

export class FakeKafka implements KafkaConsumerFactory {
  readonly consumerConfigs: ConsumerConfig[] = [];
  readonly instance = new FakeKafkaConsumer();

  consumer(config: ConsumerConfig): FakeKafkaConsumer {
    this.consumerConfigs.push(config);
    return this.instance;
  }
}
