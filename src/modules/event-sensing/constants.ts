export const EventSeverities = Object.freeze({
  LOW: "LOW",
  MEDIUM: "MEDIUM",
  HIGH: "HIGH",
  CRITICAL: "CRITICAL"
});

export type EventSeverity = (typeof EventSeverities)[keyof typeof EventSeverities];

export const VALID_EVENT_SEVERITIES: ReadonlySet<EventSeverity> = new Set(
  Object.values(EventSeverities) as EventSeverity[]
);

/** Lower rank sorts first: CRITICAL=0 ... LOW=3. */
export const EVENT_SEVERITY_RANK: Readonly<Record<EventSeverity, number>> = Object.freeze({
  CRITICAL: 0,
  HIGH: 1,
  MEDIUM: 2,
  LOW: 3
});

export const EVENT_SEVERITY_WEIGHTS: Readonly<Record<EventSeverity, number>> = Object.freeze({
  CRITICAL: 1.0,
  HIGH: 0.75,
  MEDIUM: 0.5,
  LOW: 0.25
});

export const EVENT_PRIORITY_BASE: Readonly<Record<EventSeverity, number>> = Object.freeze({
  CRITICAL: 1,
  HIGH: 10,
  MEDIUM: 20,
  LOW: 30
});

export const EventCategories = Object.freeze({
  LOGISTICS: "LOGISTICS",
  NATURAL_DISASTER: "NATURAL_DISASTER",
  GEOPOLITICAL: "GEOPOLITICAL",
  ECONOMIC: "ECONOMIC",
  LABOR: "LABOR",
  INFRASTRUCTURE: "INFRASTRUCTURE",
  OTHER: "OTHER"
});

export type EventCategory = (typeof EventCategories)[keyof typeof EventCategories];

export const VALID_EVENT_CATEGORIES: ReadonlySet<EventCategory> = new Set(
  Object.values(EventCategories) as EventCategory[]
);

export const CATEGORY_IMPACT_WEIGHTS: Readonly<Record<EventCategory, number>> = Object.freeze({
  LOGISTICS: 1.0,
  NATURAL_DISASTER: 0.9,
  INFRASTRUCTURE: 0.85,
  LABOR: 0.75,
  GEOPOLITICAL: 0.7,
  ECONOMIC: 0.6,
  OTHER: 0.4
});

export const EventSourceTypes = Object.freeze({
  NEWS: "NEWS",
  WEATHER: "WEATHER",
  ECONOMIC: "ECONOMIC",
  SOCIAL: "SOCIAL"
});

export type EventSourceType = (typeof EventSourceTypes)[keyof typeof EventSourceTypes];

export const VALID_EVENT_SOURCE_TYPES: ReadonlySet<EventSourceType> = new Set(
  Object.values(EventSourceTypes) as EventSourceType[]
);

export const UNKNOWN_LOCATION = "Unknown Location";

export function severityFromScore(score: number): EventSeverity {
  if (score >= 0.8) {
    return EventSeverities.CRITICAL;
  }
  if (score >= 0.6) {
    return EventSeverities.HIGH;
  }
  if (score >= 0.4) {
    return EventSeverities.MEDIUM;
  }
  return EventSeverities.LOW;
}

/** Negative when `left` is more severe than `right`. */
export function compareSeverity(left: EventSeverity, right: EventSeverity): number {
  return EVENT_SEVERITY_RANK[left] - EVENT_SEVERITY_RANK[right];
}
