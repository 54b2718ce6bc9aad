import { createNoopLogger, type Logger } from "../../../infrastructure/logging/logger.js";
import {
  EVENT_SEVERITY_RANK,
  EventCategories,
  EventSeverities,
  EventSourceTypes,
  type EventSeverity
} from "../constants.js";
import { createDisruptionEvent } from "../event.js";
import type { DisruptionEvent, EventSource, RandomSource } from "../types.js";
import { SIMULATED_WEATHER_EVENTS, type SimulatedWeatherEntry } from "./weather-catalog.js";
import { pickOne, randomInt, uniform } from "./random.js";

/** Probability that a cycle produces a weather event at all. */
const EVENT_PROBABILITY = 0.4;

export interface WeatherSimulationSourceOptions {
  catalog?: readonly SimulatedWeatherEntry[];
  monitoredTypes?: readonly string[];
  severityThreshold?: EventSeverity;
  random?: RandomSource;
  now?: () => Date;
  logger?: Logger;
}

export class WeatherSimulationSource implements EventSource {
  readonly name = "weather-simulation";
  readonly sourceType = EventSourceTypes.WEATHER;
  private readonly catalog: readonly SimulatedWeatherEntry[];
  private readonly monitoredTypes: ReadonlySet<string>;
  private readonly severityThreshold: EventSeverity;
  private readonly random: RandomSource;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor({
    catalog = SIMULATED_WEATHER_EVENTS,
    monitoredTypes = [],
    severityThreshold = EventSeverities.MEDIUM,
    random = Math.random,
    now = () => new Date(),
    logger = createNoopLogger()
  }: WeatherSimulationSourceOptions = {}) {
    this.catalog = catalog;
    this.monitoredTypes = new Set(monitoredTypes.map((type) => type.toLowerCase()));
    this.severityThreshold = severityThreshold;
    this.random = random;
    this.now = now;
    this.logger = logger;
  }

  sense(): DisruptionEvent[] {
    if (this.random() > EVENT_PROBABILITY) {
      return [];
    }

    const candidates =
      this.monitoredTypes.size === 0
        ? this.catalog
        : this.catalog.filter((entry) => this.monitoredTypes.has(entry.weather_type));
    const entry = pickOne(this.random, candidates);
    if (!entry) {
      return [];
    }

    // Rank is descending in severity, so a larger rank means a milder event.
    if (EVENT_SEVERITY_RANK[entry.severity] > EVENT_SEVERITY_RANK[this.severityThreshold]) {
      this.logger.debug("weather event below severity threshold", { title: entry.title });
      return [];
    }

    const detectedAt = this.now();
    const confidence = uniform(this.random, 0.85, 0.98);
    const offsetMinutes = randomInt(this.random, 0, 15);
    const alertId = randomInt(this.random, 1000, 9999);
    const event = createDisruptionEvent({
      title: entry.title,
      description: entry.description,
      source_type: this.sourceType,
      category: EventCategories.NATURAL_DISASTER,
      severity: entry.severity,
      location: { ...entry.location },
      confidence,
      keywords: entry.keywords,
      source_url: `https://weather.example.com/alert/${alertId}`,
      raw_data: { simulated: true, source: this.name, weather_type: entry.weather_type },
      timestamp_utc: new Date(detectedAt.getTime() - offsetMinutes * 60_000).toISOString(),
      detected_at_utc: detectedAt.toISOString()
    });

    this.logger.info("simulated weather event detected", {
      event_id: event.event_id,
      title: event.title,
      weather_type: entry.weather_type
    });
    return [event];
  }
}
