import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import {
  compareSeverity,
  EventSeverities,
  type EventCategory,
  type EventSeverity
} from "./constants.js";
import type { AggregatorStatistics, DisruptionEvent, EventBatch } from "./types.js";

export interface EventAggregatorOptions {
  dedupWindowSeconds?: number;
  maxBufferSize?: number;
  now?: () => Date;
  logger?: Logger;
}

export function eventSignature(event: DisruptionEvent): string {
  const country = event.location.country ?? "";
  const city = event.location.city ?? "";
  return `${event.title.toLowerCase().slice(0, 50)}_${country}_${city}_${event.category}`;
}

function timeOf(isoTimestamp: string): number {
  const parsed = Date.parse(isoTimestamp);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Buffers sensed events across sources. An event whose signature was seen
 * within the dedup window is dropped; when the buffer outgrows
 * `maxBufferSize` only the newest events by timestamp are kept.
 */
export class EventAggregator {
  private readonly dedupWindowMs: number;
  private readonly maxBufferSize: number;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private buffer: DisruptionEvent[] = [];
  private readonly seenSignatures = new Map<string, number>();

  constructor({
    dedupWindowSeconds = 300,
    maxBufferSize = 100,
    now = () => new Date(),
    logger = createNoopLogger()
  }: EventAggregatorOptions = {}) {
    this.dedupWindowMs = dedupWindowSeconds * 1_000;
    this.maxBufferSize = maxBufferSize;
    this.now = now;
    this.logger = logger;
  }

  get size(): number {
    return this.buffer.length;
  }

  addBatch(batch: EventBatch): number {
    let added = 0;
    for (const event of batch.events) {
      if (this.addEvent(event)) {
        added += 1;
      }
    }

    if (added > 0) {
      this.logger.info("events aggregated", {
        source: batch.source_name,
        added,
        buffer_size: this.buffer.length
      });
    }
    return added;
  }

  addEvent(event: DisruptionEvent): boolean {
    const signature = eventSignature(event);
    if (this.isDuplicate(signature)) {
      this.logger.debug("duplicate event filtered", { event_id: event.event_id, signature });
      return false;
    }

    this.buffer.push(event);
    this.seenSignatures.set(signature, timeOf(event.detected_at_utc));

    if (this.buffer.length > this.maxBufferSize) {
      this.pruneOldest();
    }
    return true;
  }

  private isDuplicate(signature: string): boolean {
    const lastSeen = this.seenSignatures.get(signature);
    if (lastSeen === undefined) {
      return false;
    }
    return this.now().getTime() - lastSeen < this.dedupWindowMs;
  }

  private pruneOldest(): void {
    const ordered = [...this.buffer].sort(
      (left, right) => timeOf(right.timestamp_utc) - timeOf(left.timestamp_utc)
    );
    const removed = ordered.length - this.maxBufferSize;
    this.buffer = ordered.slice(0, this.maxBufferSize);
    this.logger.debug("pruned old events from buffer", { removed });
  }

  /** Most severe first, newest first within a severity. */
  getAllEvents(): DisruptionEvent[] {
    return [...this.buffer].sort((left, right) => {
      const bySeverity = compareSeverity(left.severity, right.severity);
      if (bySeverity !== 0) {
        return bySeverity;
      }
      return timeOf(right.timestamp_utc) - timeOf(left.timestamp_utc);
    });
  }

  getEventsBySeverity(severity: EventSeverity): DisruptionEvent[] {
    return this.buffer.filter((event) => event.severity === severity);
  }

  getEventsByCategory(category: EventCategory): DisruptionEvent[] {
    return this.buffer.filter((event) => event.category === category);
  }

  getCriticalEvents(): DisruptionEvent[] {
    return this.buffer.filter(
      (event) =>
        event.severity === EventSeverities.CRITICAL || event.severity === EventSeverities.HIGH
    );
  }

  getRecentEvents(minutes = 60): DisruptionEvent[] {
    const cutoff = this.now().getTime() - minutes * 60_000;
    return this.buffer.filter((event) => timeOf(event.detected_at_utc) >= cutoff);
  }

  clear(): void {
    this.buffer = [];
    this.seenSignatures.clear();
    this.logger.info("event buffer cleared");
  }

  getStatistics(): AggregatorStatistics {
    const eventsBySeverity: Record<EventSeverity, number> = {
      LOW: 0,
      MEDIUM: 0,
      HIGH: 0,
      CRITICAL: 0
    };
    const eventsByCategory: Record<EventCategory, number> = {
      LOGISTICS: 0,
      NATURAL_DISASTER: 0,
      GEOPOLITICAL: 0,
      ECONOMIC: 0,
      LABOR: 0,
      INFRASTRUCTURE: 0,
      OTHER: 0
    };

    for (const event of this.buffer) {
      eventsBySeverity[event.severity] += 1;
      eventsByCategory[event.category] += 1;
    }

    return {
      total_events: this.buffer.length,
      buffer_capacity: this.maxBufferSize,
      events_by_severity: eventsBySeverity,
      events_by_category: eventsByCategory
    };
  }
}
