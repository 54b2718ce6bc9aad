export const AlertPriorities = Object.freeze({
  P1: "P1",
  P2: "P2",
  P3: "P3",
  P4: "P4"
});

export type AlertPriority = (typeof AlertPriorities)[keyof typeof AlertPriorities];

/** P1 is the most urgent. */
export const ALERT_PRIORITY_RANK: Readonly<Record<AlertPriority, number>> = Object.freeze({
  P1: 1,
  P2: 2,
  P3: 3,
  P4: 4
});

export const AlertChannels = Object.freeze({
  DASHBOARD: "DASHBOARD",
  EMAIL: "EMAIL",
  SMS: "SMS",
  SLACK: "SLACK"
});

export type AlertChannel = (typeof AlertChannels)[keyof typeof AlertChannels];

export const ALERT_RECIPIENTS: Readonly<Record<AlertPriority, readonly string[]>> = Object.freeze({
  P1: ["exec-team", "supply-chain-vp", "risk-management"],
  P2: ["supply-chain-director", "procurement-lead"],
  P3: ["supply-chain-manager", "category-manager"],
  P4: ["supply-chain-analyst"]
});

export const ALERT_CHANNELS: Readonly<Record<AlertPriority, readonly AlertChannel[]>> =
  Object.freeze({
    P1: [AlertChannels.DASHBOARD, AlertChannels.EMAIL, AlertChannels.SMS],
    P2: [AlertChannels.DASHBOARD, AlertChannels.EMAIL],
    P3: [AlertChannels.DASHBOARD, AlertChannels.EMAIL],
    P4: [AlertChannels.DASHBOARD]
  });

export const ALERT_TITLE_LABELS: Readonly<Record<AlertPriority, string>> = Object.freeze({
  P1: "CRITICAL",
  P2: "HIGH",
  P3: "MEDIUM",
  P4: "LOW"
});
