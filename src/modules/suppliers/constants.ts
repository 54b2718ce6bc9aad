export const SupplierCriticalities = Object.freeze({
  LOW: "LOW",
  MEDIUM: "MEDIUM",
  HIGH: "HIGH",
  CRITICAL: "CRITICAL"
});

export type SupplierCriticality =
  (typeof SupplierCriticalities)[keyof typeof SupplierCriticalities];

/** Ascending order: LOW < MEDIUM < HIGH < CRITICAL. */
export const SUPPLIER_CRITICALITY_RANK: Readonly<Record<SupplierCriticality, number>> =
  Object.freeze({
    LOW: 0,
    MEDIUM: 1,
    HIGH: 2,
    CRITICAL: 3
  });

export const SUPPLIER_CRITICALITY_VALUES: Readonly<Record<SupplierCriticality, number>> =
  Object.freeze({
    LOW: 0.25,
    MEDIUM: 0.5,
    HIGH: 0.75,
    CRITICAL: 1.0
  });

export const SupplierTiers = Object.freeze({
  TIER_1: "TIER_1",
  TIER_2: "TIER_2",
  TIER_3: "TIER_3"
});

export type SupplierTier = (typeof SupplierTiers)[keyof typeof SupplierTiers];

export function criticalityFromScore(score: number): SupplierCriticality {
  if (score >= 0.9) {
    return SupplierCriticalities.CRITICAL;
  }
  if (score >= 0.7) {
    return SupplierCriticalities.HIGH;
  }
  if (score >= 0.4) {
    return SupplierCriticalities.MEDIUM;
  }
  return SupplierCriticalities.LOW;
}

export function compareCriticality(
  left: SupplierCriticality,
  right: SupplierCriticality
): number {
  return SUPPLIER_CRITICALITY_RANK[left] - SUPPLIER_CRITICALITY_RANK[right];
}
