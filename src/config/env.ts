import { VALID_LOG_LEVELS, type LogLevel } from "../infrastructure/logging/logger.js";
import {
  EventSeverities,
  VALID_EVENT_SEVERITIES,
  type EventSeverity
} from "../modules/event-sensing/constants.js";

export interface AppConfig {
  logLevel: LogLevel;
  riskCriticalThreshold: number;
  riskHighThreshold: number;
  riskMediumThreshold: number;
  alertsEnabled: boolean;
  eventDedupWindowSeconds: number;
  eventBufferMaxSize: number;
  eventConfidenceThreshold: number;
  newsSourceEnabled: boolean;
  weatherSourceEnabled: boolean;
  weatherSeverityThreshold: EventSeverity;
  weatherMonitoredTypes: string[];
  nearbySupplierRadiusKm: number;
  pipelineMaxEvents: number;
  pipelineMaxRecoveryPlans: number;
  pipelineMaxContracts: number;
  contractDurationDays: number;
  contractBuyerName: string | undefined;
  riskAnalysisVersion: string;
  eventStreamMaxLen: number;
}

type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

export const DEFAULT_WEATHER_MONITORED_TYPES: readonly string[] = Object.freeze([
  "cyclone",
  "flood",
  "earthquake",
  "storm",
  "hurricane"
]);

function parsePositiveInt(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${variableName} must be a positive integer`);
  }
  return parsed;
}

function parseNonNegativeInt(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${variableName} must be a non-negative integer`);
  }
  return parsed;
}

function parseUnitInterval(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new Error(`${variableName} must be a decimal between 0 and 1`);
  }
  return parsed;
}

function parseOptionalString(value: string | undefined): string | undefined {
  if (value == null) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function parseBoolean(
  value: string | undefined,
  fallback: boolean,
  variableName: string
): boolean {
  const normalized = parseOptionalString(value)?.toLowerCase();
  if (normalized === undefined) {
    return fallback;
  }
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`${variableName} must be "true" or "false"`);
}

function parseList(value: string | undefined, fallback: readonly string[]): string[] {
  if (value == null) {
    return [...fallback];
  }
  return value
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item !== "");
}

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = parseOptionalString(value)?.toLowerCase() ?? "info";
  const match = [...VALID_LOG_LEVELS].find((level) => level === normalized);
  if (!match) {
    throw new Error('LOG_LEVEL must be one of "debug", "info", "warn" or "error"');
  }
  return match;
}

function parseSeverity(
  value: string | undefined,
  fallback: EventSeverity,
  variableName: string
): EventSeverity {
  const normalized = parseOptionalString(value)?.toUpperCase();
  if (normalized === undefined) {
    return fallback;
  }
  const match = [...VALID_EVENT_SEVERITIES].find((severity) => severity === normalized);
  if (!match) {
    throw new Error(`${variableName} must be one of LOW, MEDIUM, HIGH or CRITICAL`);
  }
  return match;
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const riskCriticalThreshold = parseUnitInterval(
    env.RISK_CRITICAL_THRESHOLD,
    0.8,
    "RISK_CRITICAL_THRESHOLD"
  );
  const riskHighThreshold = parseUnitInterval(
    env.RISK_HIGH_THRESHOLD,
    0.6,
    "RISK_HIGH_THRESHOLD"
  );
  const riskMediumThreshold = parseUnitInterval(
    env.RISK_MEDIUM_THRESHOLD,
    0.4,
    "RISK_MEDIUM_THRESHOLD"
  );
  if (
    riskMediumThreshold <= 0 ||
    riskMediumThreshold >= riskHighThreshold ||
    riskHighThreshold >= riskCriticalThreshold
  ) {
    throw new Error(
      "Risk thresholds must satisfy 0 < RISK_MEDIUM_THRESHOLD < RISK_HIGH_THRESHOLD < RISK_CRITICAL_THRESHOLD"
    );
  }

  return {
    logLevel: parseLogLevel(env.LOG_LEVEL),
    riskCriticalThreshold,
    riskHighThreshold,
    riskMediumThreshold,
    alertsEnabled: parseBoolean(env.ALERTS_ENABLED, true, "ALERTS_ENABLED"),
    eventDedupWindowSeconds: parseNonNegativeInt(
      env.EVENT_DEDUP_WINDOW_SECONDS,
      300,
      "EVENT_DEDUP_WINDOW_SECONDS"
    ),
    eventBufferMaxSize: parsePositiveInt(
      env.EVENT_BUFFER_MAX_SIZE,
      100,
      "EVENT_BUFFER_MAX_SIZE"
    ),
    eventConfidenceThreshold: parseUnitInterval(
      env.EVENT_CONFIDENCE_THRESHOLD,
      0.5,
      "EVENT_CONFIDENCE_THRESHOLD"
    ),
    newsSourceEnabled: parseBoolean(env.NEWS_SOURCE_ENABLED, true, "NEWS_SOURCE_ENABLED"),
    weatherSourceEnabled: parseBoolean(
      env.WEATHER_SOURCE_ENABLED,
      true,
      "WEATHER_SOURCE_ENABLED"
    ),
    weatherSeverityThreshold: parseSeverity(
      env.WEATHER_SEVERITY_THRESHOLD,
      EventSeverities.MEDIUM,
      "WEATHER_SEVERITY_THRESHOLD"
    ),
    weatherMonitoredTypes: parseList(
      env.WEATHER_MONITORED_TYPES,
      DEFAULT_WEATHER_MONITORED_TYPES
    ),
    nearbySupplierRadiusKm: parsePositiveInt(
      env.NEARBY_SUPPLIER_RADIUS_KM,
      500,
      "NEARBY_SUPPLIER_RADIUS_KM"
    ),
    pipelineMaxEvents: parsePositiveInt(env.PIPELINE_MAX_EVENTS, 5, "PIPELINE_MAX_EVENTS"),
    pipelineMaxRecoveryPlans: parseNonNegativeInt(
      env.PIPELINE_MAX_RECOVERY_PLANS,
      3,
      "PIPELINE_MAX_RECOVERY_PLANS"
    ),
    pipelineMaxContracts: parseNonNegativeInt(
      env.PIPELINE_MAX_CONTRACTS,
      2,
      "PIPELINE_MAX_CONTRACTS"
    ),
    contractDurationDays: parsePositiveInt(
      env.CONTRACT_DURATION_DAYS,
      90,
      "CONTRACT_DURATION_DAYS"
    ),
    contractBuyerName: parseOptionalString(env.CONTRACT_BUYER_NAME),
    riskAnalysisVersion:
      parseOptionalString(env.RISK_ANALYSIS_VERSION) ?? "risk-analysis-v1",
    eventStreamMaxLen: parsePositiveInt(
      env.EVENT_STREAM_MAX_LEN,
      1_000,
      "EVENT_STREAM_MAX_LEN"
    )
  };
}
