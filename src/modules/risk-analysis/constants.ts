export const RiskLevels = Object.freeze({
  LOW: "LOW",
  MEDIUM: "MEDIUM",
  HIGH: "HIGH",
  CRITICAL: "CRITICAL"
});

export type RiskLevel = (typeof RiskLevels)[keyof typeof RiskLevels];

export interface RiskLevelThresholds {
  medium: number;
  high: number;
  critical: number;
}

export const DEFAULT_RISK_LEVEL_THRESHOLDS: Readonly<RiskLevelThresholds> = Object.freeze({
  medium: 0.4,
  high: 0.6,
  critical: 0.8
});

/** Boundary values belong to the higher level. */
export function resolveRiskLevel(
  score: number,
  thresholds: RiskLevelThresholds = DEFAULT_RISK_LEVEL_THRESHOLDS
): RiskLevel {
  if (score >= thresholds.critical) {
    return RiskLevels.CRITICAL;
  }
  if (score >= thresholds.high) {
    return RiskLevels.HIGH;
  }
  if (score >= thresholds.medium) {
    return RiskLevels.MEDIUM;
  }
  return RiskLevels.LOW;
}

export const RiskTypes = Object.freeze({
  SUPPLY: "SUPPLY",
  LOGISTICS: "LOGISTICS",
  FINANCIAL: "FINANCIAL",
  OPERATIONAL: "OPERATIONAL",
  QUALITY: "QUALITY",
  GEOPOLITICAL: "GEOPOLITICAL"
});

export type RiskType = (typeof RiskTypes)[keyof typeof RiskTypes];

export const MitigationUrgencies = Object.freeze({
  IMMEDIATE: "IMMEDIATE",
  SHORT_TERM: "SHORT_TERM",
  MEDIUM_TERM: "MEDIUM_TERM",
  LONG_TERM: "LONG_TERM"
});

export type MitigationUrgency = (typeof MitigationUrgencies)[keyof typeof MitigationUrgencies];

