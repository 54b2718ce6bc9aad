import type { RiskLevel, RiskType } from "../risk-analysis/constants.js";
import type { RiskRecord } from "../risk-analysis/types.js";
import type { SupplierRecord } from "../suppliers/types.js";
import type {
  ActionPriority,
  AlternativeRecommendation,
  BackupSupplierStatus,
  RecoveryActionStatus,
  RecoveryActionType,
  RecoveryPlanStatus
} from "./constants.js";

export interface BackupSupplier {
  readonly supplier_id: string;
  readonly name: string;
  readonly country: string;
  readonly city: string;
  readonly status: BackupSupplierStatus;
  readonly categories: readonly string[];
  readonly capacity_score: number;
  readonly quality_score: number;
  readonly lead_time_days: number;
  readonly cost_premium_percent: number;
  readonly certifications: readonly string[];
}

export type BackupSupplierInit = Omit<BackupSupplier, "supplier_id"> & {
  supplier_id?: string;
};

export interface AlternativeQuery {
  requiredCategories?: readonly string[];
  affectedCountry?: string | null;
  maxLeadTimeDays?: number;
  minQualityScore?: number;
  limit?: number;
}

export interface SupplierAlternative {
  supplier: BackupSupplier;
  score: number;
  category_match: number;
  recommendation: AlternativeRecommendation;
}

/** The slice of a risk record recovery planning reads. */
export type RecoveryPlanInput = Pick<
  RiskRecord,
  "risk_id" | "title" | "risk_level" | "risk_type" | "estimated_delay_days"
> & {
  affected_suppliers: readonly SupplierRecord[];
};

export interface RecoveryAction {
  action_id: string;
  action_type: RecoveryActionType;
  description: string;
  priority: ActionPriority;
  owner: string;
  estimated_days: number;
  /** Plan creation time plus `estimated_days`. */
  deadline_utc: string;
  estimated_cost: number;
  backup_supplier_id: string | null;
  status: RecoveryActionStatus;
}

export interface PrimarySupplierRef {
  name: string;
  country: string;
  categories: string[];
}

export interface AlternativeRecord {
  supplier_id: string;
  name: string;
  country: string;
  city: string;
  status: BackupSupplierStatus;
  score: number;
  category_match: number;
  lead_time_days: number;
  cost_premium_percent: number;
  certifications: string[];
  recommendation: AlternativeRecommendation;
}

export interface RecoveryPlan {
  plan_id: string;
  risk_id: string;
  risk_title: string;
  risk_level: RiskLevel;
  risk_type: RiskType;
  primary_supplier: PrimarySupplierRef | null;
  actions: RecoveryAction[];
  alternative_suppliers: AlternativeRecord[];
  total_estimated_cost: number;
  estimated_recovery_days: number;
  status: RecoveryPlanStatus;
  created_at_utc: string;
}
