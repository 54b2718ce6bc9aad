import type { EventCategory, EventSeverity, EventSourceType } from "./constants.js";

export interface GeoLocation {
  country?: string;
  region?: string;
  city?: string;
  latitude?: number;
  longitude?: number;
}

export interface Coordinates {
  lat: number;
  lon: number;
}

/** Event as detected by a source, before impact scoring. */
export interface DisruptionEvent {
  event_id: string;
  title: string;
  description: string;
  source_type: EventSourceType;
  category: EventCategory;
  severity: EventSeverity;
  location: GeoLocation;
  confidence: number;
  keywords: string[];
  source_url: string | null;
  raw_data: Record<string, unknown>;
  timestamp_utc: string;
  detected_at_utc: string;
}

export interface DisruptionEventInit {
  event_id?: string;
  title: string;
  description?: string;
  source_type: EventSourceType;
  category?: EventCategory;
  severity?: EventSeverity;
  location?: GeoLocation;
  confidence?: number;
  keywords?: readonly string[];
  source_url?: string;
  raw_data?: Record<string, unknown>;
  timestamp_utc?: string;
  detected_at_utc?: string;
}

export interface EventLocation {
  formatted: string;
  country: string | null;
  region: string | null;
  city: string | null;
  coordinates: Coordinates | null;
}

/** Scored event record handed to risk analysis. */
export interface NormalizedEvent {
  event_id: string;
  title: string;
  description: string;
  source_type: EventSourceType;
  category: EventCategory;
  severity: EventSeverity;
  confidence: number;
  impact_score: number;
  priority_rank: number;
  location: EventLocation;
  keywords: string[];
  source_url: string | null;
  timestamp_utc: string;
  detected_at_utc: string;
  requires_analysis: boolean;
  requires_immediate_action: boolean;
}

export interface EventBatch {
  batch_id: string;
  source_name: string;
  source_type: EventSourceType;
  created_at_utc: string;
  events: DisruptionEvent[];
}

export interface EventSource {
  readonly name: string;
  readonly sourceType: EventSourceType;
  sense(): DisruptionEvent[];
}

export type RandomSource = () => number;

export interface NormalizedEventSummary {
  total_events: number;
  events_by_severity: Record<EventSeverity, number>;
  average_impact: number;
  critical_events: number;
  requires_action: number;
}

export interface AggregatorStatistics {
  total_events: number;
  buffer_capacity: number;
  events_by_severity: Record<EventSeverity, number>;
  events_by_category: Record<EventCategory, number>;
}

export interface SourceStatus {
  name: string;
  source_type: EventSourceType;
  enabled: boolean;
  last_run_at_utc: string | null;
  total_events_detected: number;
  failed_cycles: number;
}
