import { EventStreams } from "../../infrastructure/event-bus/streams.js";
import type { EventPublisher } from "../../infrastructure/event-bus/types.js";
import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import type { NormalizedEvent } from "../event-sensing/types.js";
import { errorMessage } from "../shared/errors.js";
import type { Supplier } from "../suppliers/types.js";
import { deterministicUuidFromSeed } from "../shared/ids.js";
import { RiskAssessment } from "./assessment.js";
import { GeographicCorrelator } from "./geo-correlator.js";
import { SupplierImpactAnalyzer } from "./impact-analyzer.js";
import { createRisk, toRiskRecord } from "./risk.js";
import { RiskScorer, getRiskType } from "./risk-scorer.js";
import type {
  GeographicRisk,
  NearbySupplier,
  Risk,
  RiskRecord,
  RiskScoreResult
} from "./types.js";

export interface RiskAnalysisServiceOptions {
  impactAnalyzer?: SupplierImpactAnalyzer;
  geoCorrelator?: GeographicCorrelator;
  scorer?: RiskScorer;
  eventPublisher?: EventPublisher;
  outputStream?: string;
  streamMaxLen?: number;
  analysisVersion?: string;
  now?: () => Date;
  logger?: Logger;
}

export interface RiskAnalysisDecision {
  risk: Risk;
  affectedSuppliers: Supplier[];
  geographicRisk: GeographicRisk;
  /** Suppliers with coordinates within the correlator's radius of the event. */
  nearbySuppliers: NearbySupplier[];
  score: RiskScoreResult;
}

export interface RiskAnalysisSummary {
  received: number;
  analyzed: number;
  published: number;
  failed: number;
  publish_failed: number;
}

export interface RiskAnalysisBatchResult {
  assessment: RiskAssessment;
  summary: RiskAnalysisSummary;
}

/**
 * Event -> affected suppliers -> geographic risk -> composite score -> Risk.
 * Batch runs isolate per-event failures and publish each risk record when a
 * publisher is configured.
 */
export class RiskAnalysisService {
  private readonly impactAnalyzer: SupplierImpactAnalyzer;
  private readonly geoCorrelator: GeographicCorrelator;
  private readonly scorer: RiskScorer;
  private readonly eventPublisher: EventPublisher | undefined;
  private readonly outputStream: string;
  private readonly streamMaxLen: number | undefined;
  private readonly analysisVersion: string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor({
    impactAnalyzer,
    geoCorrelator,
    scorer,
    eventPublisher,
    outputStream = EventStreams.SUPPLY_RISKS,
    streamMaxLen,
    analysisVersion = "risk-analysis-v1",
    now = () => new Date(),
    logger = createNoopLogger()
  }: RiskAnalysisServiceOptions = {}) {
    this.impactAnalyzer = impactAnalyzer ?? new SupplierImpactAnalyzer({ logger });
    this.geoCorrelator = geoCorrelator ?? new GeographicCorrelator({ logger });
    this.scorer = scorer ?? new RiskScorer({ logger });
    this.eventPublisher = eventPublisher;
    this.outputStream = outputStream;
    this.streamMaxLen = streamMaxLen;
    this.analysisVersion = analysisVersion;
    this.now = now;
    this.logger = logger;
  }

  analyzeEvent(event: NormalizedEvent): RiskAnalysisDecision {
    const affectedSuppliers = this.impactAnalyzer.findAffectedSuppliers(event);
    const geographicRisk = this.geoCorrelator.calculateGeographicRisk(event);
    const nearbySuppliers = this.geoCorrelator.findNearbySuppliers(event);
    const score = this.scorer.calculateRiskScore(
      event,
      affectedSuppliers,
      geographicRisk.risk_factor
    );

    const risk = createRisk({
      risk_id: deterministicUuidFromSeed(`risk:${event.event_id}:${this.analysisVersion}`),
      source_event_id: event.event_id,
      title: `Supply Chain Risk: ${event.title}`,
      description: event.description,
      risk_score: score.composite_score,
      risk_level: score.risk_level,
      risk_type: getRiskType(event),
      affected_suppliers: affectedSuppliers,
      geographic_scope: geographicRisk.affected_region,
      mitigation_urgency: score.mitigation_urgency,
      estimated_financial_impact: score.estimated_financial_impact,
      estimated_delay_days: score.estimated_delay_days,
      confidence: event.confidence,
      created_at_utc: this.now().toISOString()
    });

    this.logger.debug("risk analyzed", {
      risk_id: risk.risk_id,
      affected_suppliers: affectedSuppliers.length,
      nearby_suppliers: nearbySuppliers.map((entry) => entry.supplier.name)
    });
    return { risk, affectedSuppliers, geographicRisk, nearbySuppliers, score };
  }

  async analyzeBatch(events: readonly NormalizedEvent[]): Promise<RiskAnalysisBatchResult> {
    const assessment = new RiskAssessment([], { createdAtUtc: this.now().toISOString() });
    const summary: RiskAnalysisSummary = {
      received: 0,
      analyzed: 0,
      published: 0,
      failed: 0,
      publish_failed: 0
    };

    for (const event of events) {
      summary.received += 1;
      let risk: Risk;
      try {
        risk = this.analyzeEvent(event).risk;
      } catch (error) {
        summary.failed += 1;
        this.logger.error("risk analysis failed", {
          event_id: event.event_id,
          error: errorMessage(error)
        });
        continue;
      }

      assessment.add(risk);
      summary.analyzed += 1;

      if (!this.eventPublisher) {
        continue;
      }
      try {
        await this.eventPublisher.publish<RiskRecord>(
          this.outputStream,
          toRiskRecord(risk),
          this.streamMaxLen !== undefined ? { maxLen: this.streamMaxLen } : undefined
        );
        summary.published += 1;
      } catch (error) {
        summary.publish_failed += 1;
        this.logger.error("risk publish failed", {
          risk_id: risk.risk_id,
          error: errorMessage(error)
        });
      }
    }

    this.logger.info("risk analysis batch completed", { ...summary });
    return { assessment, summary };
  }
}
