export const ContractTypes = Object.freeze({
  SPOT_BUY: "SPOT_BUY",
  EXPEDITED_PURCHASE: "EXPEDITED_PURCHASE",
  TEMPORARY_AGREEMENT: "TEMPORARY_AGREEMENT"
});

export type ContractType = (typeof ContractTypes)[keyof typeof ContractTypes];

export const ContractStatuses = Object.freeze({
  DRAFT: "DRAFT",
  PENDING_REVIEW: "PENDING_REVIEW",
  APPROVED: "APPROVED",
  EXECUTED: "EXECUTED",
  EXPIRED: "EXPIRED"
});

export type ContractStatus = (typeof ContractStatuses)[keyof typeof ContractStatuses];

export const ContractSections = Object.freeze({
  HEADER: "header",
  PARTIES: "parties",
  SCOPE: "scope",
  PRICING: "pricing",
  DELIVERY: "delivery",
  QUALITY: "quality",
  TERMINATION: "termination",
  SIGNATURE: "signature"
});

export type ContractSection = (typeof ContractSections)[keyof typeof ContractSections];

/** Render order of a drafted contract. */
export const CONTRACT_SECTION_ORDER: readonly ContractSection[] = Object.freeze([
  ContractSections.HEADER,
  ContractSections.PARTIES,
  ContractSections.SCOPE,
  ContractSections.PRICING,
  ContractSections.DELIVERY,
  ContractSections.QUALITY,
  ContractSections.TERMINATION,
  ContractSections.SIGNATURE
]);

/** Appended to a section for the reviewing buyer. */
export const CONTRACT_REVIEW_NOTES: Readonly<Partial<Record<ContractSection, string>>> =
  Object.freeze({
    scope: "Add the SKU list and quantities to Schedule A.",
    pricing: "Consider a price escalation clause for volatile markets.",
    quality: "Consider third-party inspection for critical components."
  });

export const DEFAULT_CONTRACT_DURATION_DAYS = 90;
export const DEFAULT_CONTRACT_CURRENCY = "USD";
