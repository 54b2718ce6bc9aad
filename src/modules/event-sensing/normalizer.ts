import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import { roundTo } from "../shared/numbers.js";
import {
  CATEGORY_IMPACT_WEIGHTS,
  EVENT_PRIORITY_BASE,
  EVENT_SEVERITY_WEIGHTS,
  EventSeverities,
  type EventSeverity
} from "./constants.js";
import { formatGeoLocation } from "./event.js";
import type {
  Coordinates,
  DisruptionEvent,
  GeoLocation,
  NormalizedEvent,
  NormalizedEventSummary
} from "./types.js";

export interface EventNormalizerOptions {
  confidenceThreshold?: number;
  logger?: Logger;
}

export function calculatePriorityRank(severity: EventSeverity, impactScore: number): number {
  return Math.max(1, EVENT_PRIORITY_BASE[severity] - Math.trunc(impactScore * 5));
}

function toCoordinates(location: GeoLocation): Coordinates | null {
  if (location.latitude === undefined || location.longitude === undefined) {
    return null;
  }
  return { lat: location.latitude, lon: location.longitude };
}

function emptySeverityCounts(): Record<EventSeverity, number> {
  return { LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0 };
}

export class EventNormalizer {
  private readonly confidenceThreshold: number;
  private readonly logger: Logger;

  constructor({ confidenceThreshold = 0.5, logger = createNoopLogger() }: EventNormalizerOptions = {}) {
    this.confidenceThreshold = confidenceThreshold;
    this.logger = logger;
  }

  /** Drops events under the confidence floor and scores the rest, preserving order. */
  normalize(events: readonly DisruptionEvent[]): NormalizedEvent[] {
    const normalized: NormalizedEvent[] = [];
    for (const event of events) {
      if (event.confidence < this.confidenceThreshold) {
        this.logger.debug("event filtered for low confidence", {
          event_id: event.event_id,
          confidence: roundTo(event.confidence, 3)
        });
        continue;
      }
      normalized.push(this.normalizeEvent(event));
    }

    this.logger.info("events normalized", {
      normalized: normalized.length,
      filtered: events.length - normalized.length
    });
    return normalized;
  }

  normalizeEvent(event: DisruptionEvent): NormalizedEvent {
    const impactScore = this.calculateImpactScore(event);
    return {
      event_id: event.event_id,
      title: event.title,
      description: event.description,
      source_type: event.source_type,
      category: event.category,
      severity: event.severity,
      confidence: roundTo(event.confidence, 3),
      impact_score: roundTo(impactScore, 3),
      priority_rank: calculatePriorityRank(event.severity, impactScore),
      location: {
        formatted: formatGeoLocation(event.location),
        country: event.location.country ?? null,
        region: event.location.region ?? null,
        city: event.location.city ?? null,
        coordinates: toCoordinates(event.location)
      },
      keywords: [...event.keywords],
      source_url: event.source_url,
      timestamp_utc: event.timestamp_utc,
      detected_at_utc: event.detected_at_utc,
      requires_analysis: impactScore >= 0.5,
      requires_immediate_action: event.severity === EventSeverities.CRITICAL
    };
  }

  calculateImpactScore(event: DisruptionEvent): number {
    const impact =
      CATEGORY_IMPACT_WEIGHTS[event.category] *
      EVENT_SEVERITY_WEIGHTS[event.severity] *
      event.confidence;
    return Math.min(1, impact);
  }

  createSummary(events: readonly NormalizedEvent[]): NormalizedEventSummary {
    const eventsBySeverity = emptySeverityCounts();
    let totalImpact = 0;
    let criticalEvents = 0;
    let requiresAction = 0;

    for (const event of events) {
      eventsBySeverity[event.severity] += 1;
      totalImpact += event.impact_score;
      if (event.severity === EventSeverities.CRITICAL) {
        criticalEvents += 1;
      }
      if (event.requires_immediate_action) {
        requiresAction += 1;
      }
    }

    return {
      total_events: events.length,
      events_by_severity: eventsBySeverity,
      average_impact: events.length === 0 ? 0 : roundTo(totalImpact / events.length, 3),
      critical_events: criticalEvents,
      requires_action: requiresAction
    };
  }
}
