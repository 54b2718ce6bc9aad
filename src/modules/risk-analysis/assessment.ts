import { randomUUID } from "node:crypto";

import { MitigationUrgencies, RiskLevels, type RiskLevel, type RiskType } from "./constants.js";
import type { Risk, RiskAssessmentSummary } from "./types.js";

export interface RiskAssessmentOptions {
  assessmentId?: string;
  createdAtUtc?: string;
}

/** Append-only collection of the risks found in one analysis cycle. */
export class RiskAssessment implements Iterable<Risk> {
  readonly assessmentId: string;
  readonly createdAtUtc: string;
  private readonly items: Risk[] = [];

  constructor(risks: readonly Risk[] = [], options: RiskAssessmentOptions = {}) {
    this.assessmentId = options.assessmentId ?? randomUUID();
    this.createdAtUtc = options.createdAtUtc ?? new Date().toISOString();
    this.items.push(...risks);
  }

  add(risk: Risk): void {
    this.items.push(risk);
  }

  get risks(): readonly Risk[] {
    return this.items;
  }

  get totalRisks(): number {
    return this.items.length;
  }

  get criticalRisks(): Risk[] {
    return this.items.filter((risk) => risk.risk_level === RiskLevels.CRITICAL);
  }

  get highRisks(): Risk[] {
    return this.items.filter((risk) => risk.risk_level === RiskLevels.HIGH);
  }

  get immediateActionRequired(): Risk[] {
    return this.items.filter(
      (risk) => risk.mitigation_urgency === MitigationUrgencies.IMMEDIATE
    );
  }

  [Symbol.iterator](): Iterator<Risk> {
    return this.items[Symbol.iterator]();
  }

  getSummary(): RiskAssessmentSummary {
    const risksByLevel: Record<RiskLevel, number> = { LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0 };
    const risksByType: Record<RiskType, number> = {
      SUPPLY: 0,
      LOGISTICS: 0,
      FINANCIAL: 0,
      OPERATIONAL: 0,
      QUALITY: 0,
      GEOPOLITICAL: 0
    };
    let totalEstimatedImpact = 0;
    let maxDelayDays = 0;

    for (const risk of this.items) {
      risksByLevel[risk.risk_level] += 1;
      risksByType[risk.risk_type] += 1;
      totalEstimatedImpact += risk.estimated_financial_impact;
      maxDelayDays = Math.max(maxDelayDays, risk.estimated_delay_days);
    }

    return {
      assessment_id: this.assessmentId,
      total_risks: this.items.length,
      risks_by_level: risksByLevel,
      risks_by_type: risksByType,
      critical_count: this.criticalRisks.length,
      immediate_action_count: this.immediateActionRequired.length,
      total_estimated_impact: totalEstimatedImpact,
      max_delay_days: maxDelayDays,
      created_at_utc: this.createdAtUtc
    };
  }
}
