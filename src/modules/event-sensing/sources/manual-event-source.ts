import { EventSourceTypes, type EventSourceType } from "../constants.js";
import type { DisruptionEvent, EventSource } from "../types.js";

/** Hands out queued events once, then stays empty until more are enqueued. */
export class ManualEventSource implements EventSource {
  readonly name: string;
  readonly sourceType: EventSourceType;
  private readonly queue: DisruptionEvent[];

  constructor(
    seedEvents: DisruptionEvent[] = [],
    { name = "manual", sourceType = EventSourceTypes.NEWS }: { name?: string; sourceType?: EventSourceType } = {}
  ) {
    this.queue = [...seedEvents];
    this.name = name;
    this.sourceType = sourceType;
  }

  enqueue(event: DisruptionEvent): void {
    this.queue.push(event);
  }

  sense(): DisruptionEvent[] {
    if (this.queue.length === 0) {
      return [];
    }
    const events = [...this.queue];
    this.queue.length = 0;
    return events;
  }
}
