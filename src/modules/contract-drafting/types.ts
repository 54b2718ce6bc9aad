import type { Logger } from "../../infrastructure/logging/logger.js";
import type { ContractSection, ContractStatus, ContractType } from "./constants.js";
import type { ContractTemplateEngine } from "./template-engine.js";

export interface BuyerProfile {
  name: string;
  address: string;
  delivery_location: string;
  signatory: string;
}

export interface ContractTerms {
  payment_terms: string;
  payment_days: number;
  shipping_terms: string;
  quality_standard: string;
  lead_time_days: number;
  penalty_clause: string;
  force_majeure: string;
  jurisdiction: string;
  currency: string;
  notice_days: number;
}

export interface ContractSectionContent {
  section: ContractSection;
  heading: string;
  content: string;
}

export interface Contract {
  contract_id: string;
  recovery_plan_id: string;
  risk_id: string;
  supplier_id: string;
  supplier_name: string;
  contract_type: ContractType;
  title: string;
  total_value: number;
  duration_days: number;
  terms: ContractTerms;
  status: ContractStatus;
  sections: ContractSectionContent[];
  created_at_utc: string;
  expires_at_utc: string;
}

export type TemplateContext = Readonly<Record<string, string | number>>;

export interface ContractGeneratorOptions {
  templateEngine?: ContractTemplateEngine;
  buyer?: BuyerProfile;
  durationDays?: number;
  includeReviewNotes?: boolean;
  now?: () => Date;
  logger?: Logger;
}
