import { createNoopLogger, type Logger } from "../../../infrastructure/logging/logger.js";
import { EventSourceTypes } from "../constants.js";
import { createDisruptionEvent } from "../event.js";
import type { DisruptionEvent, EventSource, RandomSource } from "../types.js";
import { SIMULATED_NEWS_EVENTS, type SimulatedNewsEntry } from "./news-catalog.js";
import { pickOne, randomInt, sample, uniform } from "./random.js";

const EVENTS_PER_CYCLE_CHOICES: readonly number[] = Object.freeze([0, 0, 1, 1, 1, 2]);

export interface NewsSimulationSourceOptions {
  catalog?: readonly SimulatedNewsEntry[];
  random?: RandomSource;
  now?: () => Date;
  logger?: Logger;
}

export class NewsSimulationSource implements EventSource {
  readonly name = "news-simulation";
  readonly sourceType = EventSourceTypes.NEWS;
  private readonly catalog: readonly SimulatedNewsEntry[];
  private readonly random: RandomSource;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor({
    catalog = SIMULATED_NEWS_EVENTS,
    random = Math.random,
    now = () => new Date(),
    logger = createNoopLogger()
  }: NewsSimulationSourceOptions = {}) {
    this.catalog = catalog;
    this.random = random;
    this.now = now;
    this.logger = logger;
  }

  sense(): DisruptionEvent[] {
    const count = pickOne(this.random, EVENTS_PER_CYCLE_CHOICES) ?? 0;
    if (count === 0) {
      this.logger.debug("no news events this cycle");
      return [];
    }

    return sample(this.random, this.catalog, count).map((entry) => {
      const detectedAt = this.now();
      const confidence = uniform(this.random, 0.7, 0.95);
      const offsetMinutes = randomInt(this.random, 0, 30);
      const articleId = randomInt(this.random, 1000, 9999);
      const event = createDisruptionEvent({
        title: entry.title,
        description: entry.description,
        source_type: this.sourceType,
        category: entry.category,
        severity: entry.severity,
        location: { ...entry.location },
        confidence,
        keywords: entry.keywords,
        source_url: `https://news.example.com/article/${articleId}`,
        raw_data: { simulated: true, source: this.name },
        timestamp_utc: new Date(detectedAt.getTime() - offsetMinutes * 60_000).toISOString(),
        detected_at_utc: detectedAt.toISOString()
      });
      this.logger.info("simulated news event detected", {
        event_id: event.event_id,
        title: event.title
      });
      return event;
    });
  }
}
