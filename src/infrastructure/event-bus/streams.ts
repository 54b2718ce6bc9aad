export const EventStreams = Object.freeze({
  NORMALIZED_EVENTS: "normalized-events",
  SUPPLY_RISKS: "supply-risks",
  RISK_ALERTS: "risk-alerts",
  RECOVERY_PLANS: "recovery-plans",
  CONTRACT_DRAFTS: "contract-drafts"
});

export type EventStream = (typeof EventStreams)[keyof typeof EventStreams];
