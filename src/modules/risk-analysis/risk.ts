import { randomUUID } from "node:crypto";

import { SupplierCriticalities } from "../suppliers/constants.js";
import { toSupplierRecord } from "../suppliers/supplier.js";
import { clampUnit, roundTo, sum } from "../shared/numbers.js";
import { MitigationUrgencies, resolveRiskLevel } from "./constants.js";
import type { Risk, RiskInit, RiskRecord } from "./types.js";

function nonNegative(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) {
    return 0;
  }
  return value;
}

/**
 * Builds an immutable Risk. Score and confidence are clamped to [0, 1];
 * the level is derived from the clamped score unless one is supplied.
 */
export function createRisk(init: RiskInit): Risk {
  const riskScore = clampUnit(init.risk_score);
  return Object.freeze({
    risk_id: init.risk_id ?? randomUUID(),
    source_event_id: init.source_event_id,
    title: init.title,
    description: init.description ?? "",
    risk_score: riskScore,
    risk_level: init.risk_level ?? resolveRiskLevel(riskScore),
    risk_type: init.risk_type,
    affected_suppliers: Object.freeze([...(init.affected_suppliers ?? [])]),
    geographic_scope: init.geographic_scope ?? null,
    mitigation_urgency: init.mitigation_urgency ?? MitigationUrgencies.MEDIUM_TERM,
    estimated_financial_impact: nonNegative(init.estimated_financial_impact),
    estimated_delay_days: Math.round(nonNegative(init.estimated_delay_days)),
    confidence: clampUnit(init.confidence ?? 1.0),
    created_at_utc: init.created_at_utc ?? new Date().toISOString()
  });
}

export function hasCriticalSuppliers(risk: Risk): boolean {
  return risk.affected_suppliers.some(
    (supplier) => supplier.criticality === SupplierCriticalities.CRITICAL
  );
}

export function totalAffectedSpend(risk: Risk): number {
  return sum(risk.affected_suppliers.map((supplier) => supplier.annual_spend));
}

export function affectedSupplierNames(risk: Risk): string[] {
  return risk.affected_suppliers.map((supplier) => supplier.name);
}

export function toRiskRecord(risk: Risk): RiskRecord {
  return {
    risk_id: risk.risk_id,
    source_event_id: risk.source_event_id,
    title: risk.title,
    description: risk.description,
    risk_score: roundTo(risk.risk_score, 3),
    risk_level: risk.risk_level,
    risk_type: risk.risk_type,
    affected_suppliers: risk.affected_suppliers.map(toSupplierRecord),
    affected_supplier_count: risk.affected_suppliers.length,
    geographic_scope: risk.geographic_scope,
    mitigation_urgency: risk.mitigation_urgency,
    estimated_financial_impact: risk.estimated_financial_impact,
    estimated_delay_days: risk.estimated_delay_days,
    confidence: roundTo(risk.confidence, 3),
    has_critical_suppliers: hasCriticalSuppliers(risk),
    total_affected_spend: totalAffectedSpend(risk),
    created_at_utc: risk.created_at_utc
  };
}
