import type { EventPublisher } from "../../infrastructure/event-bus/types.js";
import type { Logger } from "../../infrastructure/logging/logger.js";
import type { AlertChannel, AlertPriority } from "./constants.js";
import type { AlertGenerator } from "./alert-generator.js";

export interface Alert {
  readonly alert_id: string;
  readonly risk_id: string;
  readonly priority: AlertPriority;
  readonly title: string;
  readonly message: string;
  readonly channels: AlertChannel[];
  readonly recipients: string[];
  readonly action_required: string;
  readonly created_at_utc: string;
  readonly expires_at_utc: string | null;
  acknowledged: boolean;
  acknowledged_by: string | null;
  acknowledged_at_utc: string | null;
}

export interface AlertSummary {
  total_alerts: number;
  by_priority: Record<AlertPriority, number>;
  p1_count: number;
  p2_count: number;
  requiring_immediate_action: number;
}

export interface AlertThresholds {
  critical: number;
  high: number;
  medium: number;
}

export interface AlertGeneratorOptions {
  thresholds?: AlertThresholds;
  ttlHours?: number;
  now?: () => Date;
  logger?: Logger;
}

export type AlertDecision =
  | { shouldAlert: false }
  | { shouldAlert: true; alert: Alert };

export interface AlertServiceOptions {
  eventPublisher: EventPublisher;
  generator?: AlertGenerator;
  outputStream?: string;
  streamMaxLen?: number;
  logger?: Logger;
}

export interface AlertDispatchSummary {
  received: number;
  published: number;
  skipped: number;
  failed: number;
}
