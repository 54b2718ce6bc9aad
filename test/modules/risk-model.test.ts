import assert from "node:assert/strict";
import test from "node:test";

import {
  RiskAssessment,
  RiskLevels,
  RiskTypes,
  MitigationUrgencies,
  affectedSupplierNames,
  createRisk,
  hasCriticalSuppliers,
  resolveRiskLevel,
  toRiskRecord,
  totalAffectedSpend
} from "../../src/modules/risk-analysis/index.js";
import type { RiskInit } from "../../src/modules/risk-analysis/types.js";
import { createSupplier } from "../../src/modules/suppliers/supplier.js";

const criticalSupplier = createSupplier({
  name: "Harbor Metals",
  country: "Chile",
  criticality: "CRITICAL",
  annual_spend: 2_000_000
});
const mediumSupplier = createSupplier({
  name: "Valley Plastics",
  country: "Chile",
  criticality: "MEDIUM",
  annual_spend: 500_000
});

function createTestRisk(partial: Partial<RiskInit> = {}) {
  return createRisk({
    risk_id: "risk-1",
    source_event_id: "event-1",
    title: "Supply Chain Risk: Port strike",
    risk_score: 0.5,
    risk_type: RiskTypes.LOGISTICS,
    created_at_utc: "2026-03-01T10:00:00.000Z",
    ...partial
  });
}

test("resolves risk levels from default and custom thresholds", () => {
  assert.equal(resolveRiskLevel(0.8), "CRITICAL");
  assert.equal(resolveRiskLevel(0.79), "HIGH");
  assert.equal(resolveRiskLevel(0.6), "HIGH");
  assert.equal(resolveRiskLevel(0.4), "MEDIUM");
  assert.equal(resolveRiskLevel(0.39), "LOW");
  assert.equal(resolveRiskLevel(0.75, { medium: 0.3, high: 0.5, critical: 0.7 }), "CRITICAL");
});

test("clamps and derives fields when creating a risk", () => {
  const risk = createTestRisk({
    risk_score: 1.4,
    confidence: -0.2,
    estimated_financial_impact: -100,
    estimated_delay_days: 6.6
  });

  assert.equal(risk.risk_score, 1);
  assert.equal(risk.risk_level, "CRITICAL");
  assert.equal(risk.confidence, 0);
  assert.equal(risk.estimated_financial_impact, 0);
  assert.equal(risk.estimated_delay_days, 7);
  assert.equal(risk.mitigation_urgency, MitigationUrgencies.MEDIUM_TERM);
  assert.equal(risk.geographic_scope, null);
  assert.ok(Object.isFrozen(risk));

  const explicit = createTestRisk({ risk_score: 0.1, risk_level: RiskLevels.HIGH });
  assert.equal(explicit.risk_level, "HIGH");
});

test("supplier helpers and record serialization", () => {
  const risk = createTestRisk({
    risk_score: 0.61234,
    confidence: 0.87654,
    affected_suppliers: [criticalSupplier, mediumSupplier]
  });

  assert.equal(hasCriticalSuppliers(risk), true);
  assert.equal(totalAffectedSpend(risk), 2_500_000);
  assert.deepEqual(affectedSupplierNames(risk), ["Harbor Metals", "Valley Plastics"]);

  const record = toRiskRecord(risk);
  assert.equal(record.risk_score, 0.612);
  assert.equal(record.confidence, 0.877);
  assert.equal(record.affected_supplier_count, 2);
  assert.equal(record.has_critical_suppliers, true);
  assert.equal(record.total_affected_spend, 2_500_000);
  assert.equal(record.affected_suppliers[0]?.location.country, "Chile");
  assert.equal(hasCriticalSuppliers(createTestRisk({ affected_suppliers: [mediumSupplier] })), false);
});

test("assessment groups risks and summarizes them", () => {
  const assessment = new RiskAssessment([], {
    assessmentId: "assessment-1",
    createdAtUtc: "2026-03-01T10:00:00.000Z"
  });
  assessment.add(
    createTestRisk({
      risk_id: "a",
      risk_score: 0.9,
      mitigation_urgency: MitigationUrgencies.IMMEDIATE,
      estimated_financial_impact: 1_000,
      estimated_delay_days: 12
    })
  );
  assessment.add(
    createTestRisk({
      risk_id: "b",
      risk_score: 0.65,
      risk_type: RiskTypes.SUPPLY,
      estimated_financial_impact: 500,
      estimated_delay_days: 20
    })
  );
  assessment.add(createTestRisk({ risk_id: "c", risk_score: 0.2 }));

  assert.equal(assessment.totalRisks, 3);
  assert.deepEqual(
    assessment.criticalRisks.map((risk) => risk.risk_id),
    ["a"]
  );
  assert.deepEqual(
    assessment.highRisks.map((risk) => risk.risk_id),
    ["b"]
  );
  assert.deepEqual(
    [...assessment].map((risk) => risk.risk_id),
    ["a", "b", "c"]
  );

  assert.deepEqual(assessment.getSummary(), {
    assessment_id: "assessment-1",
    total_risks: 3,
    risks_by_level: { LOW: 1, MEDIUM: 0, HIGH: 1, CRITICAL: 1 },
    risks_by_type: {
      SUPPLY: 1,
      LOGISTICS: 2,
      FINANCIAL: 0,
      OPERATIONAL: 0,
      QUALITY: 0,
      GEOPOLITICAL: 0
    },
    critical_count: 1,
    immediate_action_count: 1,
    total_estimated_impact: 1_500,
    max_delay_days: 20,
    created_at_utc: "2026-03-01T10:00:00.000Z"
  });
});
