import type { ObservationStream, StreamMessage } from '../../src/ingestion/stream';

export interface CommittedPosition {
  partition: number;
  offset: string;
}

/**
 * Single-topic stream held in memory. Messages are delivered in publish
 * order; after `end()` the stream drains and then reports closed.
 */
export class InMemoryObservationStream implements ObservationStream {
  readonly committed: CommittedPosition[] = [];
  readonly events: string[] = [];
  started = false;
  failNextCommits = 0;
  private readonly queue: StreamMessage[] = [];
  private readonly nextOffsets = new Map<number, number>();
  private wake: (() => void) | null = null;
  private ended = false;
  private closed = false;

  constructor(readonly topic = 'station-observations') {}

  publish(value: string | Buffer | null, partition = 0): StreamMessage {
    const offset = this.nextOffsets.get(partition) ?? 0;
    this.nextOffsets.set(partition, offset + 1);
    const message: StreamMessage = {
      topic: this.topic,
      partition,
      offset: String(offset),
      key: null,
      value: typeof value === 'string' ? Buffer.from(value, 'utf8') : value,
      timestamp: null
    };
    this.queue.push(message);
    this.notify();
    return message;
  }

  publishJson(payload: Record<string, unknown>, partition = 0): StreamMessage {
    return this.publish(JSON.stringify(payload), partition);
  }

  end(): void {
    this.ended = true;
    this.notify();
  }

  async start(): Promise<void> {
    this.started = true;
  }

  async receive(signal: AbortSignal): Promise<StreamMessage | null> {
    while (!this.closed && !signal.aborted) {
      const next = this.queue.shift();
      if (next) {
        this.events.push(`receive:${next.offset}`);
        return next;
      }
      if (this.ended) {
        return null;
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
    if (this.failNextCommits > 0) {
      this.failNextCommits -= 1;
      throw new Error(`commit rejected for offset ${message.offset}`);
    }
    this.events.push(`commit:${message.offset}`);
    this.committed.push({ partition: message.partition, offset: message.offset });
  }

  async close(): Promise<void> {
    this.closed = true;
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
