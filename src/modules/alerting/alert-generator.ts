import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import { RiskLevels, type MitigationUrgency } from "../risk-analysis/constants.js";
import { affectedSupplierNames, hasCriticalSuppliers } from "../risk-analysis/risk.js";
import type { Risk } from "../risk-analysis/types.js";
import { deterministicUuidFromSeed } from "../shared/ids.js";
import {
  ALERT_CHANNELS,
  ALERT_PRIORITY_RANK,
  ALERT_RECIPIENTS,
  ALERT_TITLE_LABELS,
  AlertPriorities,
  type AlertPriority
} from "./constants.js";
import type { Alert, AlertGeneratorOptions, AlertSummary, AlertThresholds } from "./types.js";

export const DEFAULT_ALERT_THRESHOLDS: Readonly<AlertThresholds> = Object.freeze({
  critical: 0.8,
  high: 0.6,
  medium: 0.4
});

const URGENCY_ACTIONS: Readonly<Record<MitigationUrgency, string>> = Object.freeze({
  IMMEDIATE: "Immediate action required within 24 hours",
  SHORT_TERM: "Action required within 1 week",
  MEDIUM_TERM: "Plan mitigation within 1 month",
  LONG_TERM: "Add to risk register for monitoring"
});

const MAX_LISTED_SUPPLIERS = 3;

const currencyFormat = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

function capitalize(value: string): string {
  const lower = value.toLowerCase();
  return lower.charAt(0).toUpperCase() + lower.slice(1);
}

export function buildAlertMessage(risk: Risk): string {
  const lines = [
    `Risk Score: ${risk.risk_score.toFixed(2)} (${risk.risk_level})`,
    `Type: ${capitalize(risk.risk_type)}`,
    "",
    `Description: ${risk.description}`,
    "",
    `Geographic Scope: ${risk.geographic_scope || "Not specified"}`,
    `Affected Suppliers: ${risk.affected_suppliers.length}`
  ];

  const names = affectedSupplierNames(risk);
  if (names.length > 0) {
    const listed = names.slice(0, MAX_LISTED_SUPPLIERS).join(", ");
    const remaining = names.length - MAX_LISTED_SUPPLIERS;
    lines.push(`Suppliers: ${listed}${remaining > 0 ? ` (+${remaining} more)` : ""}`);
  }
  if (risk.estimated_financial_impact > 0) {
    lines.push(`Est. Financial Impact: $${currencyFormat.format(risk.estimated_financial_impact)}`);
  }
  if (risk.estimated_delay_days > 0) {
    lines.push(`Est. Delay: ${risk.estimated_delay_days} days`);
  }
  return lines.join("\n");
}

/** Marks the alert acknowledged; a repeat call records the latest actor and time. */
export function acknowledgeAlert(alert: Alert, actor: string, at: Date = new Date()): Alert {
  alert.acknowledged = true;
  alert.acknowledged_by = actor;
  alert.acknowledged_at_utc = at.toISOString();
  return alert;
}

/** Orders by priority label, P1 first. */
export function compareAlertPriority(left: Alert, right: Alert): number {
  return ALERT_PRIORITY_RANK[left.priority] - ALERT_PRIORITY_RANK[right.priority];
}

export function getAlertSummary(alerts: readonly Alert[]): AlertSummary {
  const byPriority: Record<AlertPriority, number> = { P1: 0, P2: 0, P3: 0, P4: 0 };
  for (const alert of alerts) {
    byPriority[alert.priority] += 1;
  }
  return {
    total_alerts: alerts.length,
    by_priority: byPriority,
    p1_count: byPriority.P1,
    p2_count: byPriority.P2,
    requiring_immediate_action: byPriority.P1 + byPriority.P2
  };
}

export class AlertGenerator {
  private readonly thresholds: AlertThresholds;
  private readonly ttlHours: number | undefined;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor({
    thresholds = DEFAULT_ALERT_THRESHOLDS,
    ttlHours,
    now = () => new Date(),
    logger = createNoopLogger()
  }: AlertGeneratorOptions = {}) {
    this.thresholds = thresholds;
    this.ttlHours = ttlHours;
    this.now = now;
    this.logger = logger;
  }

  /**
   * First match wins: CRITICAL or score >= critical is P1; HIGH or score >=
   * high is P2, raised to P1 when a critical supplier is affected; MEDIUM or
   * score >= medium is P3; LOW is P4. Every level maps to a priority, so
   * `null` is not produced by the current table.
   */
  determinePriority(risk: Risk): AlertPriority | null {
    if (risk.risk_level === RiskLevels.CRITICAL || risk.risk_score >= this.thresholds.critical) {
      return AlertPriorities.P1;
    }
    if (risk.risk_level === RiskLevels.HIGH || risk.risk_score >= this.thresholds.high) {
      return hasCriticalSuppliers(risk) ? AlertPriorities.P1 : AlertPriorities.P2;
    }
    if (risk.risk_level === RiskLevels.MEDIUM || risk.risk_score >= this.thresholds.medium) {
      return AlertPriorities.P3;
    }
    if (risk.risk_level === RiskLevels.LOW) {
      return AlertPriorities.P4;
    }
    return null;
  }

  generateAlert(risk: Risk): Alert | null {
    const priority = this.determinePriority(risk);
    if (priority === null) {
      this.logger.debug("risk below alert threshold", { risk_id: risk.risk_id });
      return null;
    }

    const createdAt = this.now();
    const alert: Alert = {
      alert_id: deterministicUuidFromSeed(`alert:${risk.risk_id}`),
      risk_id: risk.risk_id,
      priority,
      title: `${ALERT_TITLE_LABELS[priority]} | ${risk.title}`,
      message: buildAlertMessage(risk),
      channels: [...ALERT_CHANNELS[priority]],
      recipients: [...ALERT_RECIPIENTS[priority]],
      action_required: URGENCY_ACTIONS[risk.mitigation_urgency],
      created_at_utc: createdAt.toISOString(),
      expires_at_utc:
        this.ttlHours === undefined
          ? null
          : new Date(createdAt.getTime() + this.ttlHours * 3_600_000).toISOString(),
      acknowledged: false,
      acknowledged_by: null,
      acknowledged_at_utc: null
    };

    this.logger.info("alert generated", {
      alert_id: alert.alert_id,
      risk_id: risk.risk_id,
      priority
    });
    return alert;
  }

  /** Alerts for every risk that yields one, ordered P1 first. */
  generateAlerts(risks: Iterable<Risk>): Alert[] {
    const alerts: Alert[] = [];
    let evaluated = 0;
    for (const risk of risks) {
      evaluated += 1;
      const alert = this.generateAlert(risk);
      if (alert) {
        alerts.push(alert);
      }
    }
    alerts.sort(compareAlertPriority);

    this.logger.info("alerts generated", { alerts: alerts.length, risks: evaluated });
    return alerts;
  }
}
