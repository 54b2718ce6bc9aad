import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import { RiskLevels, RiskTypes } from "../risk-analysis/constants.js";
import { deterministicUuidFromSeed } from "../shared/ids.js";
import { sum } from "../shared/numbers.js";
import {
  ActionPriorities,
  RecoveryActionStatuses,
  RecoveryActionTypes,
  RecoveryPlanStatuses,
  type ActionPriority,
  type RecoveryActionType
} from "./constants.js";
import { SupplierEvaluator } from "./supplier-evaluator.js";
import type {
  AlternativeRecord,
  PrimarySupplierRef,
  RecoveryAction,
  RecoveryPlan,
  RecoveryPlanInput,
  SupplierAlternative
} from "./types.js";

export interface RecoveryPlannerOptions {
  evaluator?: SupplierEvaluator;
  maxAlternatives?: number;
  now?: () => Date;
  logger?: Logger;
}

const DAY_MS = 24 * 60 * 60 * 1000;

interface ActionTemplate {
  type: RecoveryActionType;
  priority: ActionPriority;
  owner: string;
  days: number;
  cost: number;
  description: string;
  backupSupplierId?: string;
}

function toAlternativeRecord(alternative: SupplierAlternative): AlternativeRecord {
  return {
    supplier_id: alternative.supplier.supplier_id,
    name: alternative.supplier.name,
    country: alternative.supplier.country,
    city: alternative.supplier.city,
    status: alternative.supplier.status,
    score: alternative.score,
    category_match: alternative.category_match,
    lead_time_days: alternative.supplier.lead_time_days,
    cost_premium_percent: alternative.supplier.cost_premium_percent,
    certifications: [...alternative.supplier.certifications],
    recommendation: alternative.recommendation
  };
}

function primarySupplierOf(input: RecoveryPlanInput): PrimarySupplierRef | null {
  const first = input.affected_suppliers[0];
  if (!first) {
    return null;
  }
  return {
    name: first.name,
    country: first.location.country,
    categories: [...first.categories]
  };
}

/**
 * Builds a recovery plan per risk: a fixed playbook of actions scaled by risk
 * level, plus the best-scoring backup suppliers outside the affected country.
 */
export class RecoveryPlanner {
  private readonly evaluator: SupplierEvaluator;
  private readonly maxAlternatives: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor({
    evaluator,
    maxAlternatives = 3,
    now = () => new Date(),
    logger = createNoopLogger()
  }: RecoveryPlannerOptions = {}) {
    this.evaluator = evaluator ?? new SupplierEvaluator({ logger });
    this.maxAlternatives = maxAlternatives;
    this.now = now;
    this.logger = logger;
  }

  generatePlan(input: RecoveryPlanInput): RecoveryPlan {
    const planId = deterministicUuidFromSeed(`recovery:${input.risk_id}`);
    const createdAt = this.now();
    const primary = primarySupplierOf(input);
    const alternatives = this.evaluator.findAlternatives({
      requiredCategories: primary?.categories ?? [],
      affectedCountry: primary?.country ?? null,
      limit: this.maxAlternatives
    });

    const actions = this.buildActionTemplates(input, primary, alternatives).map(
      (template): RecoveryAction => ({
        action_id: deterministicUuidFromSeed(`${planId}:${template.type}`),
        action_type: template.type,
        description: template.description,
        priority: template.priority,
        owner: template.owner,
        estimated_days: template.days,
        deadline_utc: new Date(createdAt.getTime() + template.days * DAY_MS).toISOString(),
        estimated_cost: template.cost,
        backup_supplier_id: template.backupSupplierId ?? null,
        status: RecoveryActionStatuses.PENDING
      })
    );

    const plan: RecoveryPlan = {
      plan_id: planId,
      risk_id: input.risk_id,
      risk_title: input.title,
      risk_level: input.risk_level,
      risk_type: input.risk_type,
      primary_supplier: primary,
      actions,
      alternative_suppliers: alternatives.map(toAlternativeRecord),
      total_estimated_cost: sum(actions.map((action) => action.estimated_cost)),
      estimated_recovery_days: input.estimated_delay_days,
      status: RecoveryPlanStatuses.DRAFT,
      created_at_utc: createdAt.toISOString()
    };

    this.logger.info("recovery plan generated", {
      plan_id: plan.plan_id,
      risk_id: plan.risk_id,
      actions: plan.actions.length,
      alternatives: plan.alternative_suppliers.length,
      total_estimated_cost: plan.total_estimated_cost
    });
    return plan;
  }

  /** Plans ordered by estimated recovery time, quickest first. */
  generatePlans(inputs: readonly RecoveryPlanInput[]): RecoveryPlan[] {
    return inputs
      .map((input) => this.generatePlan(input))
      .sort((left, right) => left.estimated_recovery_days - right.estimated_recovery_days);
  }

  private buildActionTemplates(
    input: RecoveryPlanInput,
    primary: PrimarySupplierRef | null,
    alternatives: readonly SupplierAlternative[]
  ): ActionTemplate[] {
    const urgent =
      input.risk_level === RiskLevels.CRITICAL || input.risk_level === RiskLevels.HIGH;
    const supplierName = primary?.name ?? "affected supplier";
    const bestAlternative = alternatives[0];
    const templates: ActionTemplate[] = [];

    if (urgent) {
      templates.push(
        {
          type: RecoveryActionTypes.ACTIVATE_BACKUP,
          priority: ActionPriorities.CRITICAL,
          owner: "Procurement Lead",
          days: 1,
          cost: 5_000,
          description: bestAlternative
            ? `Activate backup supplier ${bestAlternative.supplier.name} (${bestAlternative.supplier.country})`
            : "Identify and qualify an emergency backup supplier",
          ...(bestAlternative ? { backupSupplierId: bestAlternative.supplier.supplier_id } : {})
        },
        {
          type: RecoveryActionTypes.EXPEDITE_ORDER,
          priority: ActionPriorities.CRITICAL,
          owner: "Supply Chain Manager",
          days: 2,
          cost: 15_000,
          description: `Expedite open orders with ${supplierName}`
        }
      );
    }

    templates.push(
      {
        type: RecoveryActionTypes.INCREASE_INVENTORY,
        priority: urgent ? ActionPriorities.HIGH : ActionPriorities.MEDIUM,
        owner: "Inventory Manager",
        days: 3,
        cost: 25_000,
        description: `Raise safety stock to cover ${input.estimated_delay_days} days of delay`
      },
      {
        type: RecoveryActionTypes.DUAL_SOURCE,
        priority: ActionPriorities.HIGH,
        owner: "Category Manager",
        days: 7,
        cost: 10_000,
        description: `Establish a second source alongside ${supplierName}`
      }
    );

    if (input.risk_type === RiskTypes.LOGISTICS) {
      templates.push({
        type: RecoveryActionTypes.REROUTE_SHIPMENT,
        priority: ActionPriorities.HIGH,
        owner: "Logistics Coordinator",
        days: 2,
        cost: 8_000,
        description: "Reroute in-transit shipments around the disrupted route"
      });
    }

    templates.push(
      {
        type: RecoveryActionTypes.NEGOTIATE_TERMS,
        priority: ActionPriorities.MEDIUM,
        owner: "Procurement Specialist",
        days: 5,
        cost: 2_000,
        description: `Negotiate force majeure and delivery terms with ${supplierName}`
      },
      {
        type: RecoveryActionTypes.SPLIT_ORDER,
        priority: ActionPriorities.LOW,
        owner: "Strategic Sourcing",
        days: 14,
        cost: 0,
        description: "Split future orders across primary and backup suppliers"
      }
    );

    return templates;
  }
}
