import type { Supplier, SupplierRecord } from "../suppliers/types.js";
import type { MitigationUrgency, RiskLevel, RiskType } from "./constants.js";

export interface Risk {
  readonly risk_id: string;
  readonly source_event_id: string;
  readonly title: string;
  readonly description: string;
  readonly risk_score: number;
  readonly risk_level: RiskLevel;
  readonly risk_type: RiskType;
  readonly affected_suppliers: readonly Supplier[];
  readonly geographic_scope: string | null;
  readonly mitigation_urgency: MitigationUrgency;
  readonly estimated_financial_impact: number;
  readonly estimated_delay_days: number;
  readonly confidence: number;
  readonly created_at_utc: string;
}

export interface RiskInit {
  risk_id?: string;
  source_event_id: string;
  title: string;
  description?: string;
  risk_score: number;
  risk_level?: RiskLevel;
  risk_type: RiskType;
  affected_suppliers?: readonly Supplier[];
  geographic_scope?: string | null;
  mitigation_urgency?: MitigationUrgency;
  estimated_financial_impact?: number;
  estimated_delay_days?: number;
  confidence?: number;
  created_at_utc?: string;
}

/** Serialized risk handed to recovery planning and the event bus. */
export interface RiskRecord {
  risk_id: string;
  source_event_id: string;
  title: string;
  description: string;
  risk_score: number;
  risk_level: RiskLevel;
  risk_type: RiskType;
  affected_suppliers: SupplierRecord[];
  affected_supplier_count: number;
  geographic_scope: string | null;
  mitigation_urgency: MitigationUrgency;
  estimated_financial_impact: number;
  estimated_delay_days: number;
  confidence: number;
  has_critical_suppliers: boolean;
  total_affected_spend: number;
  created_at_utc: string;
}

export interface RiskAssessmentSummary {
  assessment_id: string;
  total_risks: number;
  risks_by_level: Record<RiskLevel, number>;
  risks_by_type: Record<RiskType, number>;
  critical_count: number;
  immediate_action_count: number;
  total_estimated_impact: number;
  max_delay_days: number;
  created_at_utc: string;
}

export type ImpactLevel = "high" | "medium" | "low";

export interface SupplierImpactAnalysis {
  supplier_id: string;
  supplier_name: string;
  impact_severity: number;
  impact_level: ImpactLevel;
  estimated_recovery_days: number;
  financial_exposure: number;
  is_critical: boolean;
  recommendations: string[];
}

export type ConcentrationRisk = "high" | "medium" | "low" | "unknown";

export interface GeographicRisk {
  risk_factor: number;
  affected_region: string;
  affected_country: string | null;
  concentration_risk: ConcentrationRisk;
  suppliers_in_region: number;
  spend_at_risk: number;
  supplier_concentration: number;
  spend_concentration: number;
}

export interface NearbySupplier {
  supplier: Supplier;
  distance_km: number;
}

export interface RegionConcentration {
  country: string;
  supplier_count: number;
  total_spend: number;
  supplier_percentage: number;
  spend_percentage: number;
  suppliers: string[];
}

export interface ConcentrationReport {
  total_suppliers: number;
  total_spend: number;
  unique_countries: number;
  regions: RegionConcentration[];
}

export interface RiskScoreWeights {
  severity: number;
  criticality: number;
  financial: number;
  geographic: number;
}

export interface ComponentScores {
  severity: number;
  supplier_criticality: number;
  financial_exposure: number;
  geographic: number;
}

export interface RiskScoreResult {
  composite_score: number;
  risk_level: RiskLevel;
  mitigation_urgency: MitigationUrgency;
  component_scores: ComponentScores;
  estimated_financial_impact: number;
  estimated_delay_days: number;
}

export type PriorityLabel = "IMMEDIATE" | "HIGH" | "MEDIUM" | "LOW";

export interface ActionItem {
  action: string;
  owner: string;
  priority: number;
}

export interface RiskClassification {
  risk_id: string;
  classification: {
    level: RiskLevel;
    type: RiskType;
    urgency: MitigationUrgency;
    priority: number;
    priority_label: PriorityLabel;
  };
  response: {
    deadline: string;
    strategies: string[];
    action_items: ActionItem[];
  };
  escalation: {
    required: boolean;
    level: string;
  };
}

export interface RiskMatrixEntry {
  risk_id: string;
  title: string;
  type: RiskType;
  score: number;
  priority: number;
  affected_suppliers: number;
  deadline: string;
}

export type RiskMatrix = Record<RiskLevel, RiskMatrixEntry[]>;
