import type { AppConfig } from "../../config/env.js";
import { InMemoryEventBus } from "../../infrastructure/event-bus/in-memory-event-bus.js";
import { EventStreams } from "../../infrastructure/event-bus/streams.js";
import type { EventPublisher } from "../../infrastructure/event-bus/types.js";
import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import { AlertGenerator } from "../alerting/alert-generator.js";
import { AlertService } from "../alerting/service.js";
import { ContractGenerator, DEFAULT_BUYER } from "../contract-drafting/contract-generator.js";
import type { Contract } from "../contract-drafting/types.js";
import { EventAggregator } from "../event-sensing/aggregator.js";
import { EventNormalizer } from "../event-sensing/normalizer.js";
import { EventSensingService } from "../event-sensing/service.js";
import { NewsSimulationSource } from "../event-sensing/sources/news-simulation-source.js";
import { WeatherSimulationSource } from "../event-sensing/sources/weather-simulation-source.js";
import type { EventSource, NormalizedEvent, RandomSource } from "../event-sensing/types.js";
import { GeographicCorrelator } from "../risk-analysis/geo-correlator.js";
import { SupplierImpactAnalyzer } from "../risk-analysis/impact-analyzer.js";
import { toRiskRecord } from "../risk-analysis/risk.js";
import { RiskClassifier } from "../risk-analysis/risk-classifier.js";
import { RiskScorer } from "../risk-analysis/risk-scorer.js";
import { RiskAnalysisService } from "../risk-analysis/service.js";
import type { RiskLevelThresholds } from "../risk-analysis/constants.js";
import type { Risk } from "../risk-analysis/types.js";
import { getBackupSuppliers } from "../recovery-planning/catalog.js";
import { RecoveryPlanner } from "../recovery-planning/recovery-planner.js";
import { SupplierEvaluator } from "../recovery-planning/supplier-evaluator.js";
import type { BackupSupplier, RecoveryPlan } from "../recovery-planning/types.js";
import { errorMessage } from "../shared/errors.js";
import { roundTo } from "../shared/numbers.js";
import { getSimulatedSuppliers } from "../suppliers/catalog.js";
import type { Supplier } from "../suppliers/types.js";
import { Pipeline, PipelineStages, type PipelineStage, type PipelineSummary } from "./pipeline.js";

export interface SupplyChainOrchestratorOptions {
  config: AppConfig;
  sources?: EventSource[];
  suppliers?: readonly Supplier[];
  backupSuppliers?: readonly BackupSupplier[];
  eventBus?: EventPublisher;
  random?: RandomSource;
  now?: () => Date;
  clock?: () => number;
  logger?: Logger;
}

export interface PipelineRunResult {
  success: boolean;
  events_detected: number;
  risks_identified: number;
  alerts_generated: number;
  recovery_plans_generated: number;
  contracts_drafted: number;
  total_duration_ms: number;
  stages_completed: PipelineStage[];
  errors: string[];
}

/**
 * Wires sensing, risk analysis, alerting, recovery planning and contract
 * drafting from one config and runs them as a four-stage pipeline over an
 * event bus.
 * `runFullPipeline` reports failures in its result and never throws.
 */
export class SupplyChainOrchestrator {
  private readonly config: AppConfig;
  private readonly sensing: EventSensingService;
  private readonly normalizer: EventNormalizer;
  private readonly riskAnalysis: RiskAnalysisService;
  private readonly classifier: RiskClassifier;
  private readonly alertService: AlertService | null;
  private readonly planner: RecoveryPlanner;
  private readonly contractGenerator: ContractGenerator;
  private readonly eventBus: EventPublisher;
  private readonly now: () => Date;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private lastPipeline: Pipeline | null = null;

  constructor({
    config,
    sources,
    suppliers = getSimulatedSuppliers(),
    backupSuppliers = getBackupSuppliers(),
    eventBus,
    random = Math.random,
    now = () => new Date(),
    clock = () => performance.now(),
    logger = createNoopLogger()
  }: SupplyChainOrchestratorOptions) {
    this.config = config;
    this.eventBus = eventBus ?? new InMemoryEventBus({ now });
    this.now = now;
    this.clock = clock;
    this.logger = logger;

    const thresholds: RiskLevelThresholds = {
      critical: config.riskCriticalThreshold,
      high: config.riskHighThreshold,
      medium: config.riskMediumThreshold
    };

    const disabledSources: string[] = [];
    if (!config.newsSourceEnabled) {
      disabledSources.push("news-simulation");
    }
    if (!config.weatherSourceEnabled) {
      disabledSources.push("weather-simulation");
    }

    this.sensing = new EventSensingService({
      sources: sources ?? [
        new NewsSimulationSource({ random, now, logger }),
        new WeatherSimulationSource({
          monitoredTypes: config.weatherMonitoredTypes,
          severityThreshold: config.weatherSeverityThreshold,
          random,
          now,
          logger
        })
      ],
      disabledSources,
      now,
      logger
    });
    this.normalizer = new EventNormalizer({
      confidenceThreshold: config.eventConfidenceThreshold,
      logger
    });
    this.riskAnalysis = new RiskAnalysisService({
      impactAnalyzer: new SupplierImpactAnalyzer({ suppliers, logger }),
      geoCorrelator: new GeographicCorrelator({
        suppliers,
        defaultRadiusKm: config.nearbySupplierRadiusKm,
        logger
      }),
      scorer: new RiskScorer({ thresholds, logger }),
      eventPublisher: this.eventBus,
      streamMaxLen: config.eventStreamMaxLen,
      analysisVersion: config.riskAnalysisVersion,
      now,
      logger
    });
    this.classifier = new RiskClassifier({ logger });
    this.alertService = config.alertsEnabled
      ? new AlertService({
          eventPublisher: this.eventBus,
          generator: new AlertGenerator({ thresholds, now, logger }),
          streamMaxLen: config.eventStreamMaxLen,
          logger
        })
      : null;
    this.planner = new RecoveryPlanner({
      evaluator: new SupplierEvaluator({ backupSuppliers, logger }),
      now,
      logger
    });
    this.contractGenerator = new ContractGenerator({
      buyer: { ...DEFAULT_BUYER, name: config.contractBuyerName ?? DEFAULT_BUYER.name },
      durationDays: config.contractDurationDays,
      now,
      logger
    });
  }

  async runFullPipeline(): Promise<PipelineRunResult> {
    const startedAt = this.clock();
    const pipeline = new Pipeline({ clock: this.clock, now: this.now, logger: this.logger });
    this.lastPipeline = pipeline;

    const result: PipelineRunResult = {
      success: true,
      events_detected: 0,
      risks_identified: 0,
      alerts_generated: 0,
      recovery_plans_generated: 0,
      contracts_drafted: 0,
      total_duration_ms: 0,
      stages_completed: [],
      errors: []
    };

    const finish = (): PipelineRunResult => {
      result.total_duration_ms = roundTo(this.clock() - startedAt, 2);
      this.logger.info("pipeline run finished", {
        success: result.success,
        events_detected: result.events_detected,
        risks_identified: result.risks_identified,
        alerts_generated: result.alerts_generated,
        recovery_plans_generated: result.recovery_plans_generated,
        contracts_drafted: result.contracts_drafted,
        total_duration_ms: result.total_duration_ms
      });
      return result;
    };

    const sensing = await pipeline.executeStage(PipelineStages.EVENT_SENSING, () =>
      this.senseEvents()
    );
    if (!sensing.ok) {
      result.success = false;
      result.errors.push(`${sensing.result.stage}: ${sensing.result.error ?? "unknown error"}`);
      return finish();
    }
    result.stages_completed.push(sensing.result.stage);
    result.events_detected = sensing.data.length;

    const analysis = await pipeline.executeStage(PipelineStages.RISK_ANALYSIS, async () => {
      const analyzed = await this.analyzeRisks(sensing.data);
      result.alerts_generated = analyzed.alertsGenerated;
      return analyzed.risks;
    });
    if (!analysis.ok) {
      result.success = false;
      result.errors.push(`${analysis.result.stage}: ${analysis.result.error ?? "unknown error"}`);
      return finish();
    }
    result.stages_completed.push(analysis.result.stage);
    result.risks_identified = analysis.data.length;

    const planning = await pipeline.executeStage(PipelineStages.RECOVERY_PLANNING, () =>
      this.planRecovery(analysis.data)
    );
    if (!planning.ok) {
      result.success = false;
      result.errors.push(`${planning.result.stage}: ${planning.result.error ?? "unknown error"}`);
      return finish();
    }
    result.stages_completed.push(planning.result.stage);
    result.recovery_plans_generated = planning.data.length;

    const drafting = await pipeline.executeStage(PipelineStages.CONTRACT_DRAFTING, () =>
      this.draftContracts(planning.data)
    );
    if (!drafting.ok) {
      result.success = false;
      result.errors.push(`${drafting.result.stage}: ${drafting.result.error ?? "unknown error"}`);
      return finish();
    }
    result.stages_completed.push(drafting.result.stage);
    result.contracts_drafted = drafting.data.length;

    return finish();
  }

  getPipelineSummary(): PipelineSummary | null {
    return this.lastPipeline?.getSummary() ?? null;
  }

  private async senseEvents(): Promise<NormalizedEvent[]> {
    const aggregator = new EventAggregator({
      dedupWindowSeconds: this.config.eventDedupWindowSeconds,
      maxBufferSize: this.config.eventBufferMaxSize,
      now: this.now,
      logger: this.logger
    });
    for (const batch of this.sensing.runCycle()) {
      aggregator.addBatch(batch);
    }

    const prioritized = aggregator.getAllEvents().slice(0, this.config.pipelineMaxEvents);
    const normalized = this.normalizer.normalize(prioritized);
    for (const event of normalized) {
      await this.publishQuietly(EventStreams.NORMALIZED_EVENTS, event, event.event_id);
    }
    return normalized;
  }

  private async analyzeRisks(
    events: readonly NormalizedEvent[]
  ): Promise<{ risks: Risk[]; alertsGenerated: number }> {
    const { assessment } = await this.riskAnalysis.analyzeBatch(events);
    const matrix = this.classifier.createRiskMatrix(assessment);
    this.logger.info("risk matrix built", {
      critical: matrix.CRITICAL.length,
      high: matrix.HIGH.length,
      medium: matrix.MEDIUM.length,
      low: matrix.LOW.length
    });

    let alertsGenerated = 0;
    if (this.alertService) {
      const { summary } = await this.alertService.notifyBatch(assessment.risks);
      alertsGenerated = summary.published;
    }
    return { risks: [...assessment.risks], alertsGenerated };
  }

  private async planRecovery(risks: readonly Risk[]): Promise<RecoveryPlan[]> {
    const records = risks.slice(0, this.config.pipelineMaxRecoveryPlans).map(toRiskRecord);
    const plans = this.planner.generatePlans(records);
    for (const plan of plans) {
      await this.publishQuietly(EventStreams.RECOVERY_PLANS, plan, plan.plan_id);
    }
    return plans;
  }

  private async draftContracts(plans: readonly RecoveryPlan[]): Promise<Contract[]> {
    const contracts = this.contractGenerator.generateContracts(
      plans,
      this.config.pipelineMaxContracts
    );
    for (const contract of contracts) {
      await this.publishQuietly(EventStreams.CONTRACT_DRAFTS, contract, contract.contract_id);
    }
    return contracts;
  }

  private async publishQuietly(stream: string, message: unknown, id: string): Promise<void> {
    try {
      await this.eventBus.publish(stream, message, { maxLen: this.config.eventStreamMaxLen });
    } catch (error) {
      this.logger.error("stage output publish failed", {
        stream,
        id,
        error: errorMessage(error)
      });
    }
  }
}
