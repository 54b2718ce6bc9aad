export const BackupSupplierStatuses = Object.freeze({
  ACTIVE: "ACTIVE",
  STANDBY: "STANDBY",
  QUALIFIED: "QUALIFIED",
  PROSPECTIVE: "PROSPECTIVE"
});

export type BackupSupplierStatus =
  (typeof BackupSupplierStatuses)[keyof typeof BackupSupplierStatuses];

/** Added to the alternative score; prospective suppliers still need onboarding. */
export const BACKUP_STATUS_BONUS: Readonly<Record<BackupSupplierStatus, number>> =
  Object.freeze({
    ACTIVE: 0.1,
    STANDBY: 0.05,
    QUALIFIED: 0,
    PROSPECTIVE: -0.05
  });

export const RecoveryActionTypes = Object.freeze({
  ACTIVATE_BACKUP: "ACTIVATE_BACKUP",
  EXPEDITE_ORDER: "EXPEDITE_ORDER",
  INCREASE_INVENTORY: "INCREASE_INVENTORY",
  DUAL_SOURCE: "DUAL_SOURCE",
  REROUTE_SHIPMENT: "REROUTE_SHIPMENT",
  NEGOTIATE_TERMS: "NEGOTIATE_TERMS",
  SPLIT_ORDER: "SPLIT_ORDER"
});

export type RecoveryActionType =
  (typeof RecoveryActionTypes)[keyof typeof RecoveryActionTypes];

export const ActionPriorities = Object.freeze({
  CRITICAL: "CRITICAL",
  HIGH: "HIGH",
  MEDIUM: "MEDIUM",
  LOW: "LOW"
});

export type ActionPriority = (typeof ActionPriorities)[keyof typeof ActionPriorities];

export const AlternativeRecommendations = Object.freeze({
  HIGHLY_RECOMMENDED: "Highly Recommended - Activate immediately",
  RECOMMENDED: "Recommended - Good alternative",
  ACCEPTABLE: "Acceptable - Consider as backup",
  MARGINAL: "Marginal - Use only if no alternatives"
});

export type AlternativeRecommendation =
  (typeof AlternativeRecommendations)[keyof typeof AlternativeRecommendations];

export const RecoveryPlanStatuses = Object.freeze({
  DRAFT: "DRAFT",
  APPROVED: "APPROVED",
  IN_PROGRESS: "IN_PROGRESS",
  COMPLETED: "COMPLETED"
});

export type RecoveryPlanStatus = (typeof RecoveryPlanStatuses)[keyof typeof RecoveryPlanStatuses];

export const RecoveryActionStatuses = Object.freeze({
  PENDING: "PENDING",
  IN_PROGRESS: "IN_PROGRESS",
  DONE: "DONE"
});

export type RecoveryActionStatus =
  (typeof RecoveryActionStatuses)[keyof typeof RecoveryActionStatuses];
