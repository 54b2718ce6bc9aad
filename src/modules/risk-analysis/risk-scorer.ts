import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import {
  EVENT_SEVERITY_WEIGHTS,
  type EventCategory,
  type EventSeverity
} from "../event-sensing/constants.js";
import type { NormalizedEvent } from "../event-sensing/types.js";
import { SUPPLIER_CRITICALITY_VALUES } from "../suppliers/constants.js";
import type { Supplier } from "../suppliers/types.js";
import { roundTo, sum } from "../shared/numbers.js";
import {
  DEFAULT_RISK_LEVEL_THRESHOLDS,
  MitigationUrgencies,
  RiskTypes,
  resolveRiskLevel,
  type MitigationUrgency,
  type RiskLevelThresholds,
  type RiskType
} from "./constants.js";
import type { RiskScoreResult, RiskScoreWeights } from "./types.js";

export const DEFAULT_RISK_SCORE_WEIGHTS: Readonly<RiskScoreWeights> = Object.freeze({
  severity: 0.3,
  criticality: 0.3,
  financial: 0.2,
  geographic: 0.2
});

const SEVERITY_BASE_DELAY_DAYS: Readonly<Record<EventSeverity, number>> = Object.freeze({
  CRITICAL: 14,
  HIGH: 7,
  MEDIUM: 3,
  LOW: 1
});

const CATEGORY_RISK_TYPES: Readonly<Record<EventCategory, RiskType>> = Object.freeze({
  LOGISTICS: RiskTypes.LOGISTICS,
  INFRASTRUCTURE: RiskTypes.LOGISTICS,
  NATURAL_DISASTER: RiskTypes.SUPPLY,
  LABOR: RiskTypes.OPERATIONAL,
  GEOPOLITICAL: RiskTypes.GEOPOLITICAL,
  ECONOMIC: RiskTypes.FINANCIAL,
  OTHER: RiskTypes.OPERATIONAL
});

const WEIGHT_SUM_TOLERANCE = 1e-9;

export type ScorableEvent = Pick<
  NormalizedEvent,
  "severity" | "confidence" | "impact_score" | "category"
>;

export interface RiskScorerOptions {
  weights?: RiskScoreWeights;
  thresholds?: RiskLevelThresholds;
  logger?: Logger;
}

function assertWeights(weights: RiskScoreWeights): void {
  const values = [weights.severity, weights.criticality, weights.financial, weights.geographic];
  if (values.some((value) => !Number.isFinite(value) || value < 0)) {
    throw new Error("Risk score weights must be non-negative numbers");
  }
  if (Math.abs(sum(values) - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new Error("Risk score weights must sum to 1.0");
  }
}

export function severityScore(event: ScorableEvent): number {
  const base = EVENT_SEVERITY_WEIGHTS[event.severity] * 0.5 + event.impact_score * 0.5;
  return Math.min(1, base * event.confidence);
}

export function criticalityScore(suppliers: readonly Supplier[]): number {
  if (suppliers.length === 0) {
    return 0;
  }
  const highest = Math.max(
    ...suppliers.map((supplier) => SUPPLIER_CRITICALITY_VALUES[supplier.criticality])
  );
  return Math.min(1, highest + Math.min(0.2, suppliers.length * 0.05));
}

/** Step function on total affected annual spend; 0.2 is the floor. */
export function financialScore(suppliers: readonly Supplier[]): number {
  const totalSpend = sum(suppliers.map((supplier) => supplier.annual_spend));
  if (totalSpend >= 10_000_000) {
    return 1.0;
  }
  if (totalSpend >= 5_000_000) {
    return 0.7;
  }
  if (totalSpend >= 1_000_000) {
    return 0.4;
  }
  return 0.2;
}

export function getRiskType(event: Pick<NormalizedEvent, "category">): RiskType {
  return CATEGORY_RISK_TYPES[event.category];
}

export class RiskScorer {
  private readonly weights: Readonly<RiskScoreWeights>;
  private readonly thresholds: RiskLevelThresholds;
  private readonly logger: Logger;

  constructor({
    weights = DEFAULT_RISK_SCORE_WEIGHTS,
    thresholds = DEFAULT_RISK_LEVEL_THRESHOLDS,
    logger = createNoopLogger()
  }: RiskScorerOptions = {}) {
    assertWeights(weights);
    this.weights = Object.freeze({ ...weights });
    this.thresholds = thresholds;
    this.logger = logger;
  }

  calculateRiskScore(
    event: ScorableEvent,
    affectedSuppliers: readonly Supplier[],
    geographicRiskFactor = 0.5
  ): RiskScoreResult {
    const severity = severityScore(event);
    const criticality = criticalityScore(affectedSuppliers);
    const financial = financialScore(affectedSuppliers);
    const geographic = geographicRiskFactor;

    const composite =
      severity * this.weights.severity +
      criticality * this.weights.criticality +
      financial * this.weights.financial +
      geographic * this.weights.geographic;
    const compositeScore = roundTo(composite, 3);

    const totalSpend = sum(affectedSuppliers.map((supplier) => supplier.annual_spend));
    const financialImpact =
      affectedSuppliers.length === 0 ? 0 : (totalSpend / 52) * (1 + composite * 3);
    const delayDays = Math.round(SEVERITY_BASE_DELAY_DAYS[event.severity] * (1 + composite));

    const result: RiskScoreResult = {
      composite_score: compositeScore,
      risk_level: resolveRiskLevel(compositeScore, this.thresholds),
      mitigation_urgency: this.resolveUrgency(compositeScore, criticality),
      component_scores: {
        severity: roundTo(severity, 3),
        supplier_criticality: roundTo(criticality, 3),
        financial_exposure: roundTo(financial, 3),
        geographic: roundTo(geographic, 3)
      },
      estimated_financial_impact: roundTo(financialImpact, 2),
      estimated_delay_days: delayDays
    };

    this.logger.debug("risk score calculated", {
      composite_score: result.composite_score,
      risk_level: result.risk_level,
      affected_suppliers: affectedSuppliers.length
    });
    return result;
  }

  /** Tiers on the reported score, with a critical supplier forcing IMMEDIATE. */
  private resolveUrgency(composite: number, criticality: number): MitigationUrgency {
    if (composite >= this.thresholds.critical || criticality >= 0.9) {
      return MitigationUrgencies.IMMEDIATE;
    }
    if (composite >= this.thresholds.high) {
      return MitigationUrgencies.SHORT_TERM;
    }
    if (composite >= this.thresholds.medium) {
      return MitigationUrgencies.MEDIUM_TERM;
    }
    return MitigationUrgencies.LONG_TERM;
  }
}
