import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import type { RiskAssessment } from "./assessment.js";
import {
  RiskLevels,
  type MitigationUrgency,
  type RiskLevel,
  type RiskType
} from "./constants.js";
import { hasCriticalSuppliers } from "./risk.js";
import type {
  ActionItem,
  PriorityLabel,
  Risk,
  RiskClassification,
  RiskMatrix
} from "./types.js";

export const MITIGATION_STRATEGIES: Readonly<Record<RiskType, readonly string[]>> = Object.freeze({
  SUPPLY: [
    "Activate backup suppliers",
    "Increase safety stock levels",
    "Expedite existing orders",
    "Source from alternative regions"
  ],
  LOGISTICS: [
    "Reroute shipments via alternative routes",
    "Switch transportation modes",
    "Pre-position inventory at alternative hubs",
    "Coordinate with logistics partners"
  ],
  FINANCIAL: [
    "Review hedging positions",
    "Assess cost pass-through options",
    "Negotiate payment terms",
    "Evaluate pricing adjustments"
  ],
  OPERATIONAL: [
    "Implement contingency procedures",
    "Cross-train staff for critical functions",
    "Review BCP documentation",
    "Coordinate with operations teams"
  ],
  QUALITY: [],
  GEOPOLITICAL: [
    "Monitor regulatory developments",
    "Diversify supplier base",
    "Review compliance requirements",
    "Engage government affairs team"
  ]
});

const LEVEL_PRIORITY_BASE: Readonly<Record<RiskLevel, number>> = Object.freeze({
  CRITICAL: 1,
  HIGH: 4,
  MEDIUM: 7,
  LOW: 10
});

const URGENCY_PRIORITY_ADJUSTMENT: Readonly<Record<MitigationUrgency, number>> = Object.freeze({
  IMMEDIATE: -1,
  SHORT_TERM: 0,
  MEDIUM_TERM: 1,
  LONG_TERM: 2
});

const URGENCY_DEADLINES: Readonly<Record<MitigationUrgency, string>> = Object.freeze({
  IMMEDIATE: "Within 24 hours",
  SHORT_TERM: "Within 1 week",
  MEDIUM_TERM: "Within 1 month",
  LONG_TERM: "Within 3 months"
});

const MAX_STRATEGIES = 3;
const MAX_SUPPLIER_CONTACTS = 3;
const HIGH_FINANCIAL_IMPACT = 1_000_000;

/** Lower number is handled first; never below 1. */
export function calculatePriority(risk: Risk): number {
  let adjustment = URGENCY_PRIORITY_ADJUSTMENT[risk.mitigation_urgency];
  if (hasCriticalSuppliers(risk)) {
    adjustment -= 1;
  }
  if (risk.estimated_financial_impact > HIGH_FINANCIAL_IMPACT) {
    adjustment -= 1;
  }
  return Math.max(1, LEVEL_PRIORITY_BASE[risk.risk_level] + adjustment);
}

export function priorityLabel(priority: number): PriorityLabel {
  if (priority <= 3) {
    return "IMMEDIATE";
  }
  if (priority <= 6) {
    return "HIGH";
  }
  if (priority <= 9) {
    return "MEDIUM";
  }
  return "LOW";
}

export function escalationLevel(risk: Risk): string {
  switch (risk.risk_level) {
    case RiskLevels.CRITICAL:
      return "Executive Leadership";
    case RiskLevels.HIGH:
      return hasCriticalSuppliers(risk) ? "VP Supply Chain" : "Director Level";
    case RiskLevels.MEDIUM:
      return "Manager Level";
    default:
      return "Team Lead";
  }
}

function buildActionItems(risk: Risk, strategies: readonly string[]): ActionItem[] {
  const items: ActionItem[] = risk.affected_suppliers
    .slice(0, MAX_SUPPLIER_CONTACTS)
    .map((supplier, index) => ({
      action: `Contact ${supplier.name} for status update`,
      owner: "Procurement",
      priority: index + 1
    }));

  for (const strategy of strategies) {
    items.push({ action: strategy, owner: "Supply Chain", priority: items.length + 1 });
  }
  items.push({
    action: "Monitor situation for updates",
    owner: "Risk Management",
    priority: items.length + 1
  });
  return items;
}

export interface RiskClassifierOptions {
  logger?: Logger;
}

export class RiskClassifier {
  private readonly logger: Logger;

  constructor({ logger = createNoopLogger() }: RiskClassifierOptions = {}) {
    this.logger = logger;
  }

  classifyRisk(risk: Risk): RiskClassification {
    const priority = calculatePriority(risk);
    const strategies = MITIGATION_STRATEGIES[risk.risk_type].slice(0, MAX_STRATEGIES);
    const label = priorityLabel(priority);

    this.logger.debug("risk classified", { risk_id: risk.risk_id, priority, priority_label: label });

    return {
      risk_id: risk.risk_id,
      classification: {
        level: risk.risk_level,
        type: risk.risk_type,
        urgency: risk.mitigation_urgency,
        priority,
        priority_label: label
      },
      response: {
        deadline: URGENCY_DEADLINES[risk.mitigation_urgency],
        strategies,
        action_items: buildActionItems(risk, strategies)
      },
      escalation: {
        required: risk.risk_level === RiskLevels.CRITICAL || risk.risk_level === RiskLevels.HIGH,
        level: escalationLevel(risk)
      }
    };
  }

  /** Risks bucketed by level, each bucket ordered by priority. */
  createRiskMatrix(assessment: RiskAssessment): RiskMatrix {
    const matrix: RiskMatrix = { CRITICAL: [], HIGH: [], MEDIUM: [], LOW: [] };

    for (const risk of assessment) {
      const classification = this.classifyRisk(risk);
      matrix[risk.risk_level].push({
        risk_id: risk.risk_id,
        title: risk.title,
        type: risk.risk_type,
        score: risk.risk_score,
        priority: classification.classification.priority,
        affected_suppliers: risk.affected_suppliers.length,
        deadline: classification.response.deadline
      });
    }

    for (const entries of Object.values(matrix)) {
      entries.sort((left, right) => left.priority - right.priority);
    }
    return matrix;
  }
}
