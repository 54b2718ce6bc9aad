import type { EventBus, EventRecord, PublishOptions } from "./types.js";

interface StoredRecord {
  id: string;
  stream: string;
  message: unknown;
  published_at_utc: string;
}

export interface InMemoryEventBusOptions {
  now?: () => Date;
}

/**
 * Process-local stream store. Records are kept per stream in publish order
 * and trimmed from the front when `maxLen` is given.
 */
export class InMemoryEventBus implements EventBus {
  private readonly streams = new Map<string, StoredRecord[]>();
  private readonly publishFailureBudget = new Map<string, number>();
  private readonly now: () => Date;
  private sequence = 0;

  constructor({ now = () => new Date() }: InMemoryEventBusOptions = {}) {
    this.now = now;
  }

  /** Makes the next `count` publishes to `stream` throw. */
  setPublishFailureBudget(stream: string, count: number): void {
    const safeCount = Number.isInteger(count) && count > 0 ? count : 0;
    this.publishFailureBudget.set(stream, safeCount);
  }

  async publish<TMessage>(
    stream: string,
    message: TMessage,
    options?: PublishOptions
  ): Promise<EventRecord<TMessage>> {
    const remainingFailures = this.publishFailureBudget.get(stream) ?? 0;
    if (remainingFailures > 0) {
      this.publishFailureBudget.set(stream, remainingFailures - 1);
      throw new Error(`Simulated publish failure for stream "${stream}"`);
    }

    const publishedAt = this.now();
    this.sequence += 1;
    const record: EventRecord<TMessage> = {
      id: `${publishedAt.getTime()}-${this.sequence}`,
      stream,
      message,
      published_at_utc: publishedAt.toISOString()
    };

    const records = this.streams.get(stream) ?? [];
    records.push(record);

    if (options?.maxLen && options.maxLen > 0 && records.length > options.maxLen) {
      records.splice(0, records.length - options.maxLen);
    }

    this.streams.set(stream, records);
    return record;
  }

  async readRecent<TMessage>(stream: string, limit: number): Promise<EventRecord<TMessage>[]> {
    const safeLimit = Math.max(0, Math.trunc(limit));
    if (safeLimit === 0) {
      return [];
    }
    return this.readStream<TMessage>(stream).slice(-safeLimit);
  }

  readStream<TMessage = unknown>(stream: string): EventRecord<TMessage>[] {
    return [...(this.streams.get(stream) ?? [])] as EventRecord<TMessage>[];
  }

  streamLength(stream: string): number {
    return this.streams.get(stream)?.length ?? 0;
  }
}
