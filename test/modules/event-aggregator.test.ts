import assert from "node:assert/strict";
import test from "node:test";

import {
  EventAggregator,
  EventCategories,
  EventSeverities,
  EventSourceTypes,
  createDisruptionEvent,
  eventSignature
} from "../../src/modules/event-sensing/index.js";
import type { DisruptionEventInit, EventBatch } from "../../src/modules/event-sensing/types.js";

function createEvent(partial: Partial<DisruptionEventInit> = {}) {
  return createDisruptionEvent({
    title: "Port Strike",
    source_type: EventSourceTypes.NEWS,
    category: EventCategories.LABOR,
    severity: EventSeverities.HIGH,
    location: { country: "India", city: "Mumbai" },
    detected_at_utc: "2026-03-01T10:00:00.000Z",
    timestamp_utc: "2026-03-01T09:50:00.000Z",
    ...partial
  });
}

function batchOf(events: EventBatch["events"]): EventBatch {
  return {
    batch_id: "batch-1",
    source_name: "manual",
    source_type: EventSourceTypes.NEWS,
    created_at_utc: "2026-03-01T10:00:00.000Z",
    events
  };
}

test("signature combines title prefix, location and category", () => {
  assert.equal(eventSignature(createEvent()), "port strike_India_Mumbai_LABOR");
  assert.equal(
    eventSignature(createEvent({ title: "X".repeat(60), location: {} })),
    `${"x".repeat(50)}___LABOR`
  );
});

test("drops repeats inside the dedup window and accepts them after it", () => {
  let current = new Date("2026-03-01T10:00:00.000Z");
  const aggregator = new EventAggregator({ dedupWindowSeconds: 300, now: () => current });

  assert.equal(aggregator.addEvent(createEvent()), true);
  assert.equal(aggregator.addEvent(createEvent()), false);
  assert.equal(aggregator.addEvent(createEvent({ title: "Port Strike 2" })), true);

  current = new Date("2026-03-01T10:06:00.000Z");
  assert.equal(aggregator.addEvent(createEvent()), true);
  assert.equal(aggregator.size, 3);
});

test("addBatch counts added events", () => {
  const aggregator = new EventAggregator({ now: () => new Date("2026-03-01T10:00:00.000Z") });

  const added = aggregator.addBatch(
    batchOf([createEvent(), createEvent(), createEvent({ title: "Flooding" })])
  );

  assert.equal(added, 2);
  assert.equal(aggregator.size, 2);
});

test("keeps only the newest events when the buffer overflows", () => {
  const aggregator = new EventAggregator({
    maxBufferSize: 2,
    now: () => new Date("2026-03-01T10:00:00.000Z")
  });

  aggregator.addEvent(createEvent({ event_id: "old", title: "A", timestamp_utc: "2026-03-01T08:00:00.000Z" }));
  aggregator.addEvent(createEvent({ event_id: "new", title: "B", timestamp_utc: "2026-03-01T09:30:00.000Z" }));
  aggregator.addEvent(createEvent({ event_id: "mid", title: "C", timestamp_utc: "2026-03-01T09:00:00.000Z" }));

  assert.deepEqual(
    aggregator.getAllEvents().map((event) => event.event_id),
    ["new", "mid"]
  );
});

test("orders by severity then recency and filters by severity and category", () => {
  const aggregator = new EventAggregator({ now: () => new Date("2026-03-01T10:00:00.000Z") });
  aggregator.addEvent(createEvent({ event_id: "medium", title: "M", severity: EventSeverities.MEDIUM }));
  aggregator.addEvent(
    createEvent({
      event_id: "high-old",
      title: "H1",
      timestamp_utc: "2026-03-01T07:00:00.000Z"
    })
  );
  aggregator.addEvent(createEvent({ event_id: "high-new", title: "H2" }));
  aggregator.addEvent(
    createEvent({
      event_id: "critical",
      title: "C",
      severity: EventSeverities.CRITICAL,
      category: EventCategories.NATURAL_DISASTER
    })
  );

  assert.deepEqual(
    aggregator.getAllEvents().map((event) => event.event_id),
    ["critical", "high-new", "high-old", "medium"]
  );
  assert.equal(aggregator.getEventsBySeverity(EventSeverities.MEDIUM).length, 1);
  assert.equal(aggregator.getEventsByCategory(EventCategories.NATURAL_DISASTER).length, 1);
  assert.equal(aggregator.getCriticalEvents().length, 3);

  const stats = aggregator.getStatistics();
  assert.equal(stats.total_events, 4);
  assert.equal(stats.buffer_capacity, 100);
  assert.deepEqual(stats.events_by_severity, { LOW: 0, MEDIUM: 1, HIGH: 2, CRITICAL: 1 });
  assert.equal(stats.events_by_category.LABOR, 3);
});

test("recent events are judged by detection time", () => {
  const aggregator = new EventAggregator({ now: () => new Date("2026-03-01T10:00:00.000Z") });
  aggregator.addEvent(createEvent({ event_id: "fresh", title: "A", detected_at_utc: "2026-03-01T09:30:00.000Z" }));
  aggregator.addEvent(createEvent({ event_id: "stale", title: "B", detected_at_utc: "2026-03-01T08:00:00.000Z" }));

  assert.deepEqual(
    aggregator.getRecentEvents(60).map((event) => event.event_id),
    ["fresh"]
  );

  aggregator.clear();
  assert.equal(aggregator.size, 0);
});
