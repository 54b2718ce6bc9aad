import { randomUUID } from "node:crypto";

import { clampUnit } from "../shared/numbers.js";
import { EventCategories, EventSeverities, UNKNOWN_LOCATION } from "./constants.js";
import type { DisruptionEvent, DisruptionEventInit, GeoLocation } from "./types.js";

export function createDisruptionEvent(
  init: DisruptionEventInit,
  now: () => Date = () => new Date()
): DisruptionEvent {
  const detectedAt = init.detected_at_utc ?? now().toISOString();
  return {
    event_id: init.event_id ?? randomUUID(),
    title: init.title,
    description: init.description ?? "",
    source_type: init.source_type,
    category: init.category ?? EventCategories.OTHER,
    severity: init.severity ?? EventSeverities.MEDIUM,
    location: { ...(init.location ?? {}) },
    confidence: clampUnit(init.confidence ?? 1.0),
    keywords: [...(init.keywords ?? [])],
    source_url: init.source_url ?? null,
    raw_data: { ...(init.raw_data ?? {}) },
    timestamp_utc: init.timestamp_utc ?? detectedAt,
    detected_at_utc: detectedAt
  };
}

export function formatGeoLocation(location: GeoLocation): string {
  const parts = [location.city, location.region, location.country].filter(
    (part): part is string => Boolean(part && part.trim())
  );
  return parts.length > 0 ? parts.join(", ") : UNKNOWN_LOCATION;
}
