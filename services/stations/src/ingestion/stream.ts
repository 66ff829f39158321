/** One delivery from the observation stream. */
export interface StreamMessage {
  topic: string;
  partition: number;
  /** Broker offset as a decimal string; offsets may exceed the safe integer range. */
  offset: string;
  key: string | null;
  value: Buffer | null;
  timestamp: string | null;
}

/**
 * Source of observation messages. `receive` resolves with `null` once the
 * stream is closed or `signal` aborts. Read progress only advances through
 * `commit`, so anything received but not committed is delivered again after
 * a restart.
 */
export interface ObservationStream {
  start(): Promise<void>;
  receive(signal: AbortSignal): Promise<StreamMessage | null>;
  commit(message: StreamMessage): Promise<void>;
  close(): Promise<void>;
}

export function describeMessage(message: StreamMessage): { topic: string; partition: number; offset: string } {
  return { topic: message.topic, partition: message.partition, offset: message.offset };
}
