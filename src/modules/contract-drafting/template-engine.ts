import { ContractSections, type ContractSection } from "./constants.js";
import type { TemplateContext } from "./types.js";

const PLACEHOLDER_PATTERN = /\{(\w+)\}/g;

export const DEFAULT_CONTRACT_TEMPLATES: Readonly<Record<ContractSection, string>> = Object.freeze({
  [ContractSections.HEADER]: [
    "EMERGENCY SUPPLY AGREEMENT",
    "Contract Number: {contract_id}",
    "Effective Date: {effective_date}",
    "",
    "This Emergency Supply Agreement is entered into as of the Effective Date",
    "by and between the parties identified below."
  ].join("\n"),
  [ContractSections.PARTIES]: [
    "BUYER: {buyer_name}",
    "Address: {buyer_address}",
    "",
    "SUPPLIER: {supplier_name}",
    "Address: {supplier_address}",
    "Country: {supplier_country}"
  ].join("\n"),
  [ContractSections.SCOPE]: [
    "This Agreement covers the emergency procurement of the following items",
    "and services due to supply chain disruption:",
    "",
    "Categories: {categories}",
    "Recovery Plan Reference: {recovery_plan_id}",
    "Disruption: {risk_title}"
  ].join("\n"),
  [ContractSections.PRICING]: [
    "TOTAL CONTRACT VALUE: {total_value}",
    "",
    "Payment Terms:",
    "- {payment_terms}",
    "- Net {payment_days} days from invoice date",
    "- Emergency orders may be subject to a {premium_percent}% expedite premium",
    "",
    "Currency: {currency}"
  ].join("\n"),
  [ContractSections.DELIVERY]: [
    "Lead Time: {lead_time_days} days from order confirmation",
    "Delivery Location: {delivery_location}",
    "Shipping Terms: {shipping_terms}",
    "Late Delivery: {penalty_clause}",
    "",
    "Time is of the essence for all deliveries under this Agreement."
  ].join("\n"),
  [ContractSections.QUALITY]: [
    "- Items must meet the specifications in Schedule B",
    "- Supplier certifications required: {certifications}",
    "- Quality inspection: {inspection_terms}",
    "- Defect tolerance: {defect_tolerance}%"
  ].join("\n"),
  [ContractSections.TERMINATION]: [
    "This Agreement expires {duration_days} days from the Effective Date unless",
    "extended in writing. Either party may terminate with {notice_days} days",
    "written notice. Force majeure: {force_majeure}. Governing law: {jurisdiction}."
  ].join("\n"),
  [ContractSections.SIGNATURE]: [
    "BUYER: {buyer_signatory}",
    "Signature: ____________________  Date: __________",
    "",
    "SUPPLIER: {supplier_signatory}",
    "Signature: ____________________  Date: __________"
  ].join("\n")
});

export interface ContractTemplateEngineOptions {
  templates?: Readonly<Record<ContractSection, string>>;
}

/** Fills `{name}` placeholders; names missing from the context render as `[name]`. */
export class ContractTemplateEngine {
  private readonly templates: Readonly<Record<ContractSection, string>>;

  constructor({ templates = DEFAULT_CONTRACT_TEMPLATES }: ContractTemplateEngineOptions = {}) {
    this.templates = templates;
  }

  renderSection(section: ContractSection, context: TemplateContext): string {
    return this.templates[section].replace(PLACEHOLDER_PATTERN, (_match, key: string) => {
      const value = context[key];
      return value === undefined ? `[${key}]` : String(value);
    });
  }
}
