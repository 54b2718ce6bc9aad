import { randomUUID } from "node:crypto";

import { clampUnit } from "../shared/numbers.js";
import {
  EventCategories,
  EventSeverities,
  EventSourceTypes,
  UNKNOWN_LOCATION,
  VALID_EVENT_CATEGORIES,
  VALID_EVENT_SEVERITIES,
  VALID_EVENT_SOURCE_TYPES,
  severityFromScore,
  type EventCategory,
  type EventSeverity,
  type EventSourceType
} from "./constants.js";
import { calculatePriorityRank } from "./normalizer.js";
import type { Coordinates, EventLocation, NormalizedEvent } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

function finiteNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function pickEnum<T extends string>(value: unknown, valid: ReadonlySet<T>, fallback: T): T {
  if (typeof value !== "string") {
    return fallback;
  }
  const normalized = value.trim().toUpperCase();
  return [...valid].find((candidate) => candidate === normalized) ?? fallback;
}

/** Accepts a severity name or a 0-1 severity score. */
function normalizeSeverity(value: unknown): EventSeverity {
  const score = finiteNumber(value);
  if (score !== undefined) {
    return severityFromScore(clampUnit(score));
  }
  return pickEnum(value, VALID_EVENT_SEVERITIES, EventSeverities.MEDIUM);
}

function normalizeCategory(value: unknown): EventCategory {
  return pickEnum(value, VALID_EVENT_CATEGORIES, EventCategories.OTHER);
}

function normalizeSourceType(value: unknown): EventSourceType {
  return pickEnum(value, VALID_EVENT_SOURCE_TYPES, EventSourceTypes.NEWS);
}

function normalizeCoordinates(value: unknown): Coordinates | null {
  if (!isRecord(value)) {
    return null;
  }
  const lat = finiteNumber(value.lat ?? value.latitude);
  const lon = finiteNumber(value.lon ?? value.longitude);
  if (lat === undefined || lon === undefined) {
    return null;
  }
  return { lat, lon };
}

function normalizeLocation(value: unknown): EventLocation {
  const source = isRecord(value) ? value : {};
  const country = optionalString(source.country);
  const region = optionalString(source.region);
  const city = optionalString(source.city);
  const parts = [city, region, country].filter((part): part is string => part !== null);

  return {
    formatted:
      optionalString(source.formatted) ?? (parts.length > 0 ? parts.join(", ") : UNKNOWN_LOCATION),
    country,
    region,
    city,
    coordinates: normalizeCoordinates(source.coordinates ?? source)
  };
}

function normalizeKeywords(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

function normalizeTimestamp(value: unknown, fallback: string): string {
  if (typeof value === "string" && Number.isFinite(Date.parse(value))) {
    return new Date(value).toISOString();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return new Date(value).toISOString();
  }
  return fallback;
}

/**
 * Converts an externally produced event record into a NormalizedEvent.
 * Never throws: missing or malformed fields fall back to MEDIUM severity,
 * full confidence, a 0.5 impact score, the OTHER category and an unknown
 * location. A numeric severity is read as a 0-1 score.
 */
export function normalizeEventRecord(
  raw: unknown,
  now: () => Date = () => new Date()
): NormalizedEvent {
  const source = isRecord(raw) ? raw : {};
  const severity = normalizeSeverity(source.severity);
  const confidence = clampUnit(finiteNumber(source.confidence) ?? 1.0);
  const impactScore = clampUnit(finiteNumber(source.impact_score) ?? 0.5);
  const rawPriority = finiteNumber(source.priority_rank);
  const detectedAt = normalizeTimestamp(
    source.detected_at_utc ?? source.detected_at,
    now().toISOString()
  );

  return {
    event_id: optionalString(source.event_id) ?? randomUUID(),
    title: optionalString(source.title) ?? "Untitled event",
    description: optionalString(source.description) ?? "",
    source_type: normalizeSourceType(source.source_type),
    category: normalizeCategory(source.category),
    severity,
    confidence,
    impact_score: impactScore,
    priority_rank:
      rawPriority !== undefined && Number.isInteger(rawPriority) && rawPriority >= 1
        ? rawPriority
        : calculatePriorityRank(severity, impactScore),
    location: normalizeLocation(source.location),
    keywords: normalizeKeywords(source.keywords),
    source_url: optionalString(source.source_url),
    timestamp_utc: normalizeTimestamp(source.timestamp_utc ?? source.timestamp, detectedAt),
    detected_at_utc: detectedAt,
    requires_analysis: impactScore >= 0.5,
    requires_immediate_action: severity === EventSeverities.CRITICAL
  };
}
