export interface EventRecord<TMessage = unknown> {
  id: string;
  stream: string;
  message: TMessage;
  published_at_utc: string;
}

export interface PublishOptions {
  maxLen?: number;
}

export interface EventPublisher {
  publish<TMessage>(
    stream: string,
    message: TMessage,
    options?: PublishOptions
  ): Promise<EventRecord<TMessage>>;
}

export interface EventStreamReader {
  readRecent<TMessage>(stream: string, limit: number): Promise<EventRecord<TMessage>[]>;
}

export type EventBus = EventPublisher & EventStreamReader;
