import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import type { AlternativeRecord, RecoveryPlan } from "../recovery-planning/types.js";
import { deterministicUuidFromSeed } from "../shared/ids.js";
import { roundTo } from "../shared/numbers.js";
import {
  CONTRACT_REVIEW_NOTES,
  CONTRACT_SECTION_ORDER,
  ContractStatuses,
  ContractTypes,
  DEFAULT_CONTRACT_CURRENCY,
  DEFAULT_CONTRACT_DURATION_DAYS,
  type ContractType
} from "./constants.js";
import { formatEffectiveDate, formatMoney } from "./contract.js";
import { ContractTemplateEngine } from "./template-engine.js";
import type {
  BuyerProfile,
  Contract,
  ContractGeneratorOptions,
  ContractSectionContent,
  ContractTerms,
  TemplateContext
} from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_BUYER: Readonly<BuyerProfile> = Object.freeze({
  name: "Buyer Organization",
  address: "100 Industrial Way, Chicago, IL 60601",
  delivery_location: "Main Distribution Center",
  signatory: "Procurement Director"
});

export function contractTypeFor(estimatedRecoveryDays: number): ContractType {
  if (estimatedRecoveryDays <= 7) {
    return ContractTypes.SPOT_BUY;
  }
  if (estimatedRecoveryDays <= 14) {
    return ContractTypes.EXPEDITED_PURCHASE;
  }
  return ContractTypes.TEMPORARY_AGREEMENT;
}

/** Plan cost marked up by the supplier's premium. */
export function contractValue(
  plan: Pick<RecoveryPlan, "total_estimated_cost">,
  supplier: Pick<AlternativeRecord, "cost_premium_percent">
): number {
  return roundTo(plan.total_estimated_cost * (1 + supplier.cost_premium_percent / 100), 2);
}

export function buildContractTerms(supplier: Pick<AlternativeRecord, "lead_time_days">): ContractTerms {
  return {
    payment_terms: "Payment upon delivery verification",
    payment_days: 30,
    shipping_terms: "DDP (Delivered Duty Paid)",
    quality_standard: "ISO 9001",
    lead_time_days: supplier.lead_time_days,
    penalty_clause: "2% of order value per day of late delivery",
    force_majeure: "Standard clause applicable",
    jurisdiction: "New York, USA",
    currency: DEFAULT_CONTRACT_CURRENCY,
    notice_days: 7
  };
}

function sectionHeading(section: string): string {
  return section.toUpperCase();
}

/**
 * Drafts an emergency supply agreement with the top-ranked backup supplier of
 * a recovery plan. Contract ids are derived from plan and supplier, so
 * drafting the same plan twice yields the same id.
 */
export class ContractGenerator {
  private readonly templateEngine: ContractTemplateEngine;
  private readonly buyer: BuyerProfile;
  private readonly durationDays: number;
  private readonly includeReviewNotes: boolean;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor({
    templateEngine = new ContractTemplateEngine(),
    buyer = DEFAULT_BUYER,
    durationDays = DEFAULT_CONTRACT_DURATION_DAYS,
    includeReviewNotes = true,
    now = () => new Date(),
    logger = createNoopLogger()
  }: ContractGeneratorOptions = {}) {
    if (!Number.isInteger(durationDays) || durationDays <= 0) {
      throw new Error("Contract duration must be a positive whole number of days");
    }
    this.templateEngine = templateEngine;
    this.buyer = buyer;
    this.durationDays = durationDays;
    this.includeReviewNotes = includeReviewNotes;
    this.now = now;
    this.logger = logger;
  }

  generateContract(plan: RecoveryPlan, supplier: AlternativeRecord): Contract {
    const createdAt = this.now();
    const contractId = deterministicUuidFromSeed(`contract:${plan.plan_id}:${supplier.supplier_id}`);
    const terms = buildContractTerms(supplier);
    const totalValue = contractValue(plan, supplier);

    const context: TemplateContext = {
      contract_id: contractId,
      effective_date: formatEffectiveDate(createdAt),
      buyer_name: this.buyer.name,
      buyer_address: this.buyer.address,
      buyer_signatory: this.buyer.signatory,
      delivery_location: this.buyer.delivery_location,
      supplier_name: supplier.name,
      supplier_address: `${supplier.city || "Headquarters"}, ${supplier.country}`,
      supplier_country: supplier.country,
      supplier_signatory: "Authorized Representative",
      categories: plan.primary_supplier?.categories.join(", ") || "General",
      recovery_plan_id: plan.plan_id,
      risk_title: plan.risk_title,
      total_value: formatMoney(totalValue),
      payment_terms: terms.payment_terms,
      payment_days: terms.payment_days,
      premium_percent: supplier.cost_premium_percent,
      currency: terms.currency,
      lead_time_days: terms.lead_time_days,
      shipping_terms: terms.shipping_terms,
      penalty_clause: terms.penalty_clause,
      certifications:
        supplier.certifications.length > 0 ? supplier.certifications.join(", ") : terms.quality_standard,
      inspection_terms: "Upon receipt, 24-hour acceptance window",
      defect_tolerance: 1,
      duration_days: this.durationDays,
      notice_days: terms.notice_days,
      force_majeure: terms.force_majeure,
      jurisdiction: terms.jurisdiction
    };

    const sections = CONTRACT_SECTION_ORDER.map((section): ContractSectionContent => {
      const rendered = this.templateEngine.renderSection(section, context);
      const note = this.includeReviewNotes ? CONTRACT_REVIEW_NOTES[section] : undefined;
      return {
        section,
        heading: sectionHeading(section),
        content: note ? `${rendered}\n[Review note: ${note}]` : rendered
      };
    });

    const contract: Contract = {
      contract_id: contractId,
      recovery_plan_id: plan.plan_id,
      risk_id: plan.risk_id,
      supplier_id: supplier.supplier_id,
      supplier_name: supplier.name,
      contract_type: contractTypeFor(plan.estimated_recovery_days),
      title: `Emergency Supply Agreement - ${supplier.name}`,
      total_value: totalValue,
      duration_days: this.durationDays,
      terms,
      status: ContractStatuses.DRAFT,
      sections,
      created_at_utc: createdAt.toISOString(),
      expires_at_utc: new Date(createdAt.getTime() + this.durationDays * DAY_MS).toISOString()
    };

    this.logger.info("contract drafted", {
      contract_id: contract.contract_id,
      recovery_plan_id: contract.recovery_plan_id,
      supplier: contract.supplier_name,
      contract_type: contract.contract_type,
      total_value: contract.total_value
    });
    return contract;
  }

  /** One contract per plan, with its top alternative; plans without one are skipped. */
  generateContracts(plans: readonly RecoveryPlan[], limit = 2): Contract[] {
    const contracts: Contract[] = [];
    for (const plan of plans.slice(0, Math.max(0, limit))) {
      const [supplier] = plan.alternative_suppliers;
      if (!supplier) {
        this.logger.warn("no backup supplier to contract", { recovery_plan_id: plan.plan_id });
        continue;
      }
      contracts.push(this.generateContract(plan, supplier));
    }
    return contracts;
  }
}
