import assert from "node:assert/strict";
import test from "node:test";

import {
  AlertGenerator,
  acknowledgeAlert,
  buildAlertMessage,
  getAlertSummary,
  type Alert
} from "../../src/modules/alerting/index.js";
import { createRisk, type RiskInit } from "../../src/modules/risk-analysis/index.js";
import { deterministicUuidFromSeed } from "../../src/modules/shared/ids.js";
import { createSupplier } from "../../src/modules/suppliers/supplier.js";

const fixedNow = () => new Date("2026-03-01T10:00:00.000Z");

function createTestRisk(partial: Partial<RiskInit> = {}) {
  return createRisk({
    risk_id: "risk-1",
    source_event_id: "event-1",
    title: "Supply Chain Risk: Port strike",
    description: "Dock workers walk out",
    risk_score: 0.5,
    risk_level: "MEDIUM",
    risk_type: "LOGISTICS",
    created_at_utc: "2026-03-01T09:00:00.000Z",
    ...partial
  });
}

function unwrap(alert: Alert | null): Alert {
  assert.ok(alert);
  return alert;
}

test("builds a multi-line alert message", () => {
  const risk = createTestRisk({
    risk_score: 0.843,
    risk_level: "CRITICAL",
    geographic_scope: "Valparaiso, Chile",
    affected_suppliers: ["A", "B", "C", "D"].map((name) => createSupplier({ name, country: "Chile" })),
    estimated_financial_impact: 814_384.62,
    estimated_delay_days: 26
  });

  assert.equal(
    buildAlertMessage(risk),
    [
      "Risk Score: 0.84 (CRITICAL)",
      "Type: Logistics",
      "",
      "Description: Dock workers walk out",
      "",
      "Geographic Scope: Valparaiso, Chile",
      "Affected Suppliers: 4",
      "Suppliers: A, B, C (+1 more)",
      "Est. Financial Impact: $814,385",
      "Est. Delay: 26 days"
    ].join("\n")
  );

  assert.equal(
    buildAlertMessage(createTestRisk()),
    [
      "Risk Score: 0.50 (MEDIUM)",
      "Type: Logistics",
      "",
      "Description: Dock workers walk out",
      "",
      "Geographic Scope: Not specified",
      "Affected Suppliers: 0"
    ].join("\n")
  );
});

test("maps level, score and supplier criticality to a priority", () => {
  const generator = new AlertGenerator();
  const criticalSupplier = createSupplier({ name: "Core", country: "Chile", criticality: "CRITICAL" });

  assert.equal(generator.determinePriority(createTestRisk({ risk_level: "CRITICAL", risk_score: 0.9 })), "P1");
  assert.equal(generator.determinePriority(createTestRisk({ risk_level: "LOW", risk_score: 0.85 })), "P1");
  assert.equal(generator.determinePriority(createTestRisk({ risk_level: "HIGH", risk_score: 0.7 })), "P2");
  assert.equal(
    generator.determinePriority(
      createTestRisk({ risk_level: "HIGH", risk_score: 0.7, affected_suppliers: [criticalSupplier] })
    ),
    "P1"
  );
  assert.equal(generator.determinePriority(createTestRisk({ risk_level: "LOW", risk_score: 0.65 })), "P2");
  assert.equal(generator.determinePriority(createTestRisk()), "P3");
  assert.equal(generator.determinePriority(createTestRisk({ risk_level: "LOW", risk_score: 0.2 })), "P4");
});

test("generates an alert with routing and optional expiry", () => {
  const generator = new AlertGenerator({ ttlHours: 24, now: fixedNow });

  const alert = unwrap(
    generator.generateAlert(
      createTestRisk({ risk_level: "CRITICAL", risk_score: 0.9, mitigation_urgency: "IMMEDIATE" })
    )
  );

  const { message, ...routing } = alert;
  assert.match(message, /^Risk Score: 0\.90 \(CRITICAL\)\n/);
  assert.deepEqual(
    routing,
    {
      alert_id: deterministicUuidFromSeed("alert:risk-1"),
      risk_id: "risk-1",
      priority: "P1",
      title: "CRITICAL | Supply Chain Risk: Port strike",
      channels: ["DASHBOARD", "EMAIL", "SMS"],
      recipients: ["exec-team", "supply-chain-vp", "risk-management"],
      action_required: "Immediate action required within 24 hours",
      created_at_utc: "2026-03-01T10:00:00.000Z",
      expires_at_utc: "2026-03-02T10:00:00.000Z",
      acknowledged: false,
      acknowledged_by: null,
      acknowledged_at_utc: null
    }
  );

  const lowAlert = unwrap(
    new AlertGenerator({ now: fixedNow }).generateAlert(
      createTestRisk({ risk_level: "LOW", risk_score: 0.1, mitigation_urgency: "LONG_TERM" })
    )
  );
  assert.equal(lowAlert.priority, "P4");
  assert.deepEqual(lowAlert.channels, ["DASHBOARD"]);
  assert.equal(lowAlert.action_required, "Add to risk register for monitoring");
  assert.equal(lowAlert.expires_at_utc, null);
});

test("orders batch alerts by priority and summarizes them", () => {
  const generator = new AlertGenerator({ now: fixedNow });

  const alerts = generator.generateAlerts([
    createTestRisk({ risk_id: "low", risk_level: "LOW", risk_score: 0.1 }),
    createTestRisk({ risk_id: "critical", risk_level: "CRITICAL", risk_score: 0.9 }),
    createTestRisk({ risk_id: "medium" }),
    createTestRisk({ risk_id: "high", risk_level: "HIGH", risk_score: 0.65 })
  ]);

  assert.deepEqual(
    alerts.map((alert) => [alert.risk_id, alert.priority]),
    [
      ["critical", "P1"],
      ["high", "P2"],
      ["medium", "P3"],
      ["low", "P4"]
    ]
  );
  assert.deepEqual(getAlertSummary(alerts), {
    total_alerts: 4,
    by_priority: { P1: 1, P2: 1, P3: 1, P4: 1 },
    p1_count: 1,
    p2_count: 1,
    requiring_immediate_action: 2
  });
});

test("acknowledging records the latest actor", () => {
  const alert = unwrap(new AlertGenerator({ now: fixedNow }).generateAlert(createTestRisk()));

  acknowledgeAlert(alert, "analyst-1", new Date("2026-03-01T11:00:00.000Z"));
  acknowledgeAlert(alert, "analyst-2", new Date("2026-03-01T12:00:00.000Z"));

  assert.equal(alert.acknowledged, true);
  assert.equal(alert.acknowledged_by, "analyst-2");
  assert.equal(alert.acknowledged_at_utc, "2026-03-01T12:00:00.000Z");
});
