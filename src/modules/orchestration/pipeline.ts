import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import { errorMessage } from "../shared/errors.js";
import { roundTo, sum } from "../shared/numbers.js";

export const PipelineStages = Object.freeze({
  EVENT_SENSING: "event_sensing",
  RISK_ANALYSIS: "risk_analysis",
  RECOVERY_PLANNING: "recovery_planning",
  CONTRACT_DRAFTING: "contract_drafting"
});

export type PipelineStage = (typeof PipelineStages)[keyof typeof PipelineStages];

export interface StageResult {
  stage: PipelineStage;
  success: boolean;
  error: string | null;
  duration_ms: number;
  data_count: number;
  completed_at_utc: string;
}

export type StageOutcome<T> =
  | { ok: true; data: T; result: StageResult }
  | { ok: false; result: StageResult };

export interface PipelineSummary {
  name: string;
  stages_executed: number;
  stages_successful: number;
  total_duration_ms: number;
  results: Partial<Record<PipelineStage, StageResult>>;
}

export interface PipelineOptions {
  name?: string;
  clock?: () => number;
  now?: () => Date;
  logger?: Logger;
}

export function countStageData(data: unknown): number {
  if (Array.isArray(data)) {
    return data.length;
  }
  return data == null ? 0 : 1;
}

/** Times stage handlers and keeps the latest result per stage. */
export class Pipeline {
  readonly name: string;
  private readonly results = new Map<PipelineStage, StageResult>();
  private readonly clock: () => number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor({
    name = "supply-chain-pipeline",
    clock = () => performance.now(),
    now = () => new Date(),
    logger = createNoopLogger()
  }: PipelineOptions = {}) {
    this.name = name;
    this.clock = clock;
    this.now = now;
    this.logger = logger;
  }

  async executeStage<T>(
    stage: PipelineStage,
    handler: () => T | Promise<T>
  ): Promise<StageOutcome<T>> {
    const startedAt = this.clock();

    try {
      const data = await handler();
      const result = this.record({
        stage,
        success: true,
        error: null,
        duration_ms: roundTo(this.clock() - startedAt, 2),
        data_count: countStageData(data),
        completed_at_utc: this.now().toISOString()
      });
      this.logger.info("pipeline stage completed", {
        stage,
        duration_ms: result.duration_ms,
        data_count: result.data_count
      });
      return { ok: true, data, result };
    } catch (error) {
      const result = this.record({
        stage,
        success: false,
        error: errorMessage(error),
        duration_ms: roundTo(this.clock() - startedAt, 2),
        data_count: 0,
        completed_at_utc: this.now().toISOString()
      });
      this.logger.error("pipeline stage failed", { stage, error: result.error });
      return { ok: false, result };
    }
  }

  getResults(): StageResult[] {
    return [...this.results.values()];
  }

  getSummary(): PipelineSummary {
    const results = this.getResults();
    const byStage: Partial<Record<PipelineStage, StageResult>> = {};
    for (const result of results) {
      byStage[result.stage] = result;
    }

    return {
      name: this.name,
      stages_executed: results.length,
      stages_successful: results.filter((result) => result.success).length,
      total_duration_ms: roundTo(sum(results.map((result) => result.duration_ms)), 2),
      results: byStage
    };
  }

  private record(result: StageResult): StageResult {
    this.results.set(result.stage, result);
    return result;
  }
}
