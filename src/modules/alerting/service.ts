import { EventStreams } from "../../infrastructure/event-bus/streams.js";
import type { EventPublisher } from "../../infrastructure/event-bus/types.js";
import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import type { Risk } from "../risk-analysis/types.js";
import { errorMessage } from "../shared/errors.js";
import { AlertGenerator, compareAlertPriority } from "./alert-generator.js";
import type {
  Alert,
  AlertDecision,
  AlertDispatchSummary,
  AlertServiceOptions
} from "./types.js";

export class AlertService {
  private readonly eventPublisher: EventPublisher;
  private readonly generator: AlertGenerator;
  private readonly outputStream: string;
  private readonly streamMaxLen: number | undefined;
  private readonly logger: Logger;

  constructor({
    eventPublisher,
    generator,
    outputStream = EventStreams.RISK_ALERTS,
    streamMaxLen,
    logger = createNoopLogger()
  }: AlertServiceOptions) {
    this.eventPublisher = eventPublisher;
    this.generator = generator ?? new AlertGenerator({ logger });
    this.outputStream = outputStream;
    this.streamMaxLen = streamMaxLen;
    this.logger = logger;
  }

  buildDecision(risk: Risk): AlertDecision {
    const alert = this.generator.generateAlert(risk);
    return alert ? { shouldAlert: true, alert } : { shouldAlert: false };
  }

  async notify(risk: Risk): Promise<AlertDecision> {
    const decision = this.buildDecision(risk);
    if (!decision.shouldAlert) {
      return decision;
    }

    await this.eventPublisher.publish<Alert>(
      this.outputStream,
      decision.alert,
      this.streamMaxLen !== undefined ? { maxLen: this.streamMaxLen } : undefined
    );
    return decision;
  }

  /** Publishes alerts in priority order; per-risk failures are counted, not thrown. */
  async notifyBatch(
    risks: readonly Risk[]
  ): Promise<{ alerts: Alert[]; summary: AlertDispatchSummary }> {
    const summary: AlertDispatchSummary = {
      received: 0,
      published: 0,
      skipped: 0,
      failed: 0
    };
    const generated: Alert[] = [];

    for (const risk of risks) {
      summary.received += 1;
      try {
        const decision = this.buildDecision(risk);
        if (decision.shouldAlert) {
          generated.push(decision.alert);
        } else {
          summary.skipped += 1;
        }
      } catch (error) {
        summary.failed += 1;
        this.logger.error("alert generation failed", {
          risk_id: risk.risk_id,
          error: errorMessage(error)
        });
      }
    }

    const alerts: Alert[] = [];
    for (const alert of generated.sort(compareAlertPriority)) {
      try {
        await this.eventPublisher.publish<Alert>(
          this.outputStream,
          alert,
          this.streamMaxLen !== undefined ? { maxLen: this.streamMaxLen } : undefined
        );
        alerts.push(alert);
        summary.published += 1;
      } catch (error) {
        summary.failed += 1;
        this.logger.error("alert publish failed", {
          alert_id: alert.alert_id,
          risk_id: alert.risk_id,
          error: errorMessage(error)
        });
      }
    }

    this.logger.info("alert batch dispatched", { ...summary });
    return { alerts, summary };
  }
}
