import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { FastifyBaseLogger } from 'fastify';

export type DeadLetterReason = 'decode-error' | 'write-exhausted' | 'write-rejected';

export interface DeadLetterEntry {
  reason: DeadLetterReason;
  error: string;
  field?: string | null;
  topic: string;
  partition: number;
  offset: string;
  attempts?: number;
  raw: string;
}

export interface DeadLetterSink {
  record(entry: DeadLetterEntry): Promise<void>;
}

export class LoggingDeadLetterSink implements DeadLetterSink {
  constructor(private readonly logger: FastifyBaseLogger) {}

  async record(entry: DeadLetterEntry): Promise<void> {
    this.logger.warn({ deadLetter: entry }, 'observation dead-lettered');
  }
}

/**
 * Appends one JSON document per line. A failed append is logged rather than
 * thrown: losing the dead-letter copy must not stall the stream.
 */
export class JsonLinesDeadLetterSink implements DeadLetterSink {
  constructor(
    private readonly filePath: string,
    private readonly logger: FastifyBaseLogger
  ) {}

  async record(entry: DeadLetterEntry): Promise<void> {
    this.logger.warn({ deadLetter: { ...entry, raw: undefined }, path: this.filePath }, 'observation dead-lettered');
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, `${JSON.stringify({ ...entry, timestamp: new Date().toISOString() })}\n`, 'utf8');
    } catch (error) {
      this.logger.error({ err: error, path: this.filePath }, 'failed to write dead-letter entry');
    }
  }
}
