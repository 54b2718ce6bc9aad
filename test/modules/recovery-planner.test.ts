import assert from "node:assert/strict";
import test from "node:test";

import {
  RecoveryPlanner,
  SupplierEvaluator,
  createBackupSupplier,
  type BackupSupplierInit,
  type RecoveryPlanInput
} from "../../src/modules/recovery-planning/index.js";
import { deterministicUuidFromSeed } from "../../src/modules/shared/ids.js";
import { createSupplier, toSupplierRecord } from "../../src/modules/suppliers/supplier.js";

const fixedNow = () => new Date("2026-03-01T10:00:00.000Z");

function backup(partial: Partial<BackupSupplierInit> & Pick<BackupSupplierInit, "name" | "country">) {
  return createBackupSupplier({
    city: "Test City",
    status: "QUALIFIED",
    categories: ["components"],
    capacity_score: 0.8,
    quality_score: 0.9,
    lead_time_days: 10,
    cost_premium_percent: 0,
    certifications: [],
    ...partial
  });
}

const alpha = backup({
  name: "Alpha Works",
  country: "Mexico",
  status: "ACTIVE",
  capacity_score: 1,
  quality_score: 1
});
const beta = backup({
  name: "Beta Industries",
  country: "Poland",
  capacity_score: 0.5,
  quality_score: 0.8,
  lead_time_days: 20,
  cost_premium_percent: 15
});
const local = backup({ name: "Valparaiso Spares", country: "Chile" });

const harbor = toSupplierRecord(
  createSupplier({ name: "Harbor Freight Co", country: "Chile", categories: ["components"] })
);

function planInput(partial: Partial<RecoveryPlanInput> = {}): RecoveryPlanInput {
  return {
    risk_id: "risk-1",
    title: "Supply Chain Risk: Port strike",
    risk_level: "CRITICAL",
    risk_type: "LOGISTICS",
    estimated_delay_days: 26,
    affected_suppliers: [harbor],
    ...partial
  };
}

function createPlanner(backupSuppliers = [alpha, beta, local]) {
  return new RecoveryPlanner({
    evaluator: new SupplierEvaluator({ backupSuppliers }),
    now: fixedNow
  });
}

test("builds an urgent logistics plan with backup alternatives", () => {
  const plan = createPlanner().generatePlan(planInput());
  const planId = deterministicUuidFromSeed("recovery:risk-1");

  assert.equal(plan.plan_id, planId);
  assert.equal(plan.risk_title, "Supply Chain Risk: Port strike");
  assert.deepEqual(plan.primary_supplier, {
    name: "Harbor Freight Co",
    country: "Chile",
    categories: ["components"]
  });
  assert.deepEqual(
    plan.alternative_suppliers.map((alternative) => [alternative.name, alternative.score]),
    [
      ["Alpha Works", 1],
      ["Beta Industries", 0.725]
    ]
  );

  assert.deepEqual(
    plan.actions.map((action) => [action.action_type, action.priority, action.description]),
    [
      ["ACTIVATE_BACKUP", "CRITICAL", "Activate backup supplier Alpha Works (Mexico)"],
      ["EXPEDITE_ORDER", "CRITICAL", "Expedite open orders with Harbor Freight Co"],
      ["INCREASE_INVENTORY", "HIGH", "Raise safety stock to cover 26 days of delay"],
      ["DUAL_SOURCE", "HIGH", "Establish a second source alongside Harbor Freight Co"],
      ["REROUTE_SHIPMENT", "HIGH", "Reroute in-transit shipments around the disrupted route"],
      ["NEGOTIATE_TERMS", "MEDIUM", "Negotiate force majeure and delivery terms with Harbor Freight Co"],
      ["SPLIT_ORDER", "LOW", "Split future orders across primary and backup suppliers"]
    ]
  );
  assert.equal(plan.actions[0]?.action_id, deterministicUuidFromSeed(`${planId}:ACTIVATE_BACKUP`));
  assert.equal(plan.actions[0]?.backup_supplier_id, alpha.supplier_id);
  assert.equal(plan.actions[1]?.backup_supplier_id, null);
  assert.deepEqual(
    plan.actions.map((action) => [action.estimated_days, action.deadline_utc]),
    [
      [1, "2026-03-02T10:00:00.000Z"],
      [2, "2026-03-03T10:00:00.000Z"],
      [3, "2026-03-04T10:00:00.000Z"],
      [7, "2026-03-08T10:00:00.000Z"],
      [2, "2026-03-03T10:00:00.000Z"],
      [5, "2026-03-06T10:00:00.000Z"],
      [14, "2026-03-15T10:00:00.000Z"]
    ]
  );
  assert.ok(plan.actions.every((action) => action.status === "PENDING"));
  assert.equal(plan.status, "DRAFT");
  assert.deepEqual(plan.alternative_suppliers[0], {
    supplier_id: alpha.supplier_id,
    name: "Alpha Works",
    country: "Mexico",
    city: "Test City",
    status: "ACTIVE",
    score: 1,
    category_match: 1,
    lead_time_days: 10,
    cost_premium_percent: 0,
    certifications: [],
    recommendation: "Highly Recommended - Activate immediately"
  });
  assert.equal(plan.total_estimated_cost, 65_000);
  assert.equal(plan.estimated_recovery_days, 26);
  assert.equal(plan.created_at_utc, "2026-03-01T10:00:00.000Z");
});

test("a moderate risk without suppliers gets the baseline playbook", () => {
  const plan = createPlanner().generatePlan(
    planInput({ risk_level: "MEDIUM", risk_type: "SUPPLY", estimated_delay_days: 5, affected_suppliers: [] })
  );

  assert.equal(plan.primary_supplier, null);
  assert.deepEqual(
    plan.actions.map((action) => [action.action_type, action.priority]),
    [
      ["INCREASE_INVENTORY", "MEDIUM"],
      ["DUAL_SOURCE", "HIGH"],
      ["NEGOTIATE_TERMS", "MEDIUM"],
      ["SPLIT_ORDER", "LOW"]
    ]
  );
  assert.equal(plan.actions[1]?.description, "Establish a second source alongside affected supplier");
  assert.equal(plan.alternative_suppliers.length, 3);
  assert.equal(plan.total_estimated_cost, 37_000);
});

test("asks for an emergency backup when no alternative qualifies", () => {
  const plan = createPlanner([local]).generatePlan(planInput({ risk_level: "HIGH", risk_type: "OPERATIONAL" }));

  assert.deepEqual(plan.alternative_suppliers, []);
  assert.equal(plan.actions[0]?.description, "Identify and qualify an emergency backup supplier");
  assert.equal(plan.actions[0]?.backup_supplier_id, null);
  assert.equal(plan.total_estimated_cost, 57_000);
});

test("orders plans by estimated recovery time", () => {
  const plans = createPlanner().generatePlans([
    planInput({ risk_id: "slow", estimated_delay_days: 26 }),
    planInput({ risk_id: "fast", estimated_delay_days: 3 }),
    planInput({ risk_id: "middle", estimated_delay_days: 10 })
  ]);

  assert.deepEqual(
    plans.map((plan) => plan.risk_id),
    ["fast", "middle", "slow"]
  );
});
