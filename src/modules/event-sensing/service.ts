import { randomUUID } from "node:crypto";

import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import { errorMessage } from "../shared/errors.js";
import type { DisruptionEvent, EventBatch, EventSource, SourceStatus } from "./types.js";

export interface EventSensingServiceOptions {
  sources: EventSource[];
  disabledSources?: readonly string[];
  now?: () => Date;
  logger?: Logger;
}

interface SourceState {
  source: EventSource;
  enabled: boolean;
  lastRunAtUtc: string | null;
  totalEventsDetected: number;
  failedCycles: number;
}

/**
 * Runs each registered source once per cycle. A source that throws yields
 * an empty batch and the cycle continues with the next source.
 */
export class EventSensingService {
  private readonly states: SourceState[];
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor({
    sources,
    disabledSources = [],
    now = () => new Date(),
    logger = createNoopLogger()
  }: EventSensingServiceOptions) {
    const disabled = new Set(disabledSources);
    this.states = sources.map((source) => ({
      source,
      enabled: !disabled.has(source.name),
      lastRunAtUtc: null,
      totalEventsDetected: 0,
      failedCycles: 0
    }));
    this.now = now;
    this.logger = logger;
  }

  setSourceEnabled(name: string, enabled: boolean): boolean {
    const state = this.states.find((candidate) => candidate.source.name === name);
    if (!state) {
      return false;
    }
    state.enabled = enabled;
    return true;
  }

  runCycle(): EventBatch[] {
    return this.states.map((state) => this.runSource(state));
  }

  private runSource(state: SourceState): EventBatch {
    const { source } = state;
    let events: DisruptionEvent[] = [];

    if (state.enabled) {
      try {
        events = source.sense();
        state.totalEventsDetected += events.length;
      } catch (error) {
        state.failedCycles += 1;
        this.logger.error("event source cycle failed", {
          source: source.name,
          error: errorMessage(error)
        });
      }
      state.lastRunAtUtc = this.now().toISOString();
    }

    return {
      batch_id: randomUUID(),
      source_name: source.name,
      source_type: source.sourceType,
      created_at_utc: this.now().toISOString(),
      events
    };
  }

  getSourceStatus(): SourceStatus[] {
    return this.states.map((state) => ({
      name: state.source.name,
      source_type: state.source.sourceType,
      enabled: state.enabled,
      last_run_at_utc: state.lastRunAtUtc,
      total_events_detected: state.totalEventsDetected,
      failed_cycles: state.failedCycles
    }));
  }
}
