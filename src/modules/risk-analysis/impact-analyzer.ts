import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import type { NormalizedEvent } from "../event-sensing/types.js";
import { EVENT_SEVERITY_WEIGHTS } from "../event-sensing/constants.js";
import { getSimulatedSuppliers } from "../suppliers/catalog.js";
import { SupplierCriticalities, type SupplierCriticality } from "../suppliers/constants.js";
import { isSupplierInCity, isSupplierInCountry, isSupplierInRegion } from "../suppliers/supplier.js";
import type { Supplier } from "../suppliers/types.js";
import type { ImpactLevel, SupplierImpactAnalysis } from "./types.js";

/** Event keyword -> supplier categories it implies. */
export const KEYWORD_CATEGORY_SYNONYMS: Readonly<Record<string, readonly string[]>> =
  Object.freeze({
    port: ["logistics", "freight", "shipping", "maritime"],
    shipping: ["logistics", "freight", "maritime"],
    freight: ["logistics", "shipping"],
    manufacturing: ["components", "assembly"],
    semiconductor: ["electronics", "chips"],
    energy: ["petrochemicals", "raw materials"],
    cyclone: ["port services", "logistics", "shipping"],
    flood: ["manufacturing", "logistics"],
    earthquake: ["manufacturing", "components"]
  });

const SYNONYM_LOOKUP: ReadonlyMap<string, readonly string[]> = new Map(
  Object.entries(KEYWORD_CATEGORY_SYNONYMS)
);

const CRITICALITY_IMPACT_MULTIPLIERS: Readonly<Record<SupplierCriticality, number>> =
  Object.freeze({
    CRITICAL: 1.5,
    HIGH: 1.25,
    MEDIUM: 1.0,
    LOW: 0.75
  });

export type GeographicMatch = "city" | "region" | "country";

export interface SupplierImpactAnalyzerOptions {
  suppliers?: readonly Supplier[];
  logger?: Logger;
}

export function matchGeography(
  supplier: Supplier,
  location: Pick<NormalizedEvent["location"], "country" | "region" | "city">
): GeographicMatch | null {
  if (location.city && isSupplierInCity(supplier, location.city)) {
    return "city";
  }
  if (location.region && isSupplierInRegion(supplier, location.region)) {
    return "region";
  }
  if (location.country && isSupplierInCountry(supplier, location.country)) {
    return "country";
  }
  return null;
}

export function matchesCategory(supplier: Supplier, keywords: readonly string[]): boolean {
  const normalizedKeywords = keywords
    .map((keyword) => keyword.trim().toLowerCase())
    .filter((keyword) => keyword !== "");
  if (normalizedKeywords.length === 0 || supplier.categories.length === 0) {
    return false;
  }

  const categories = supplier.categories.map((category) => category.toLowerCase());
  const textOverlap = categories.some((category) =>
    normalizedKeywords.some(
      (keyword) => keyword === category || keyword.includes(category) || category.includes(keyword)
    )
  );
  if (textOverlap) {
    return true;
  }

  return normalizedKeywords.some((keyword) =>
    (SYNONYM_LOOKUP.get(keyword) ?? []).some((mapped) => categories.includes(mapped))
  );
}

function impactLevelFor(impact: number): ImpactLevel {
  if (impact >= 0.7) {
    return "high";
  }
  if (impact >= 0.4) {
    return "medium";
  }
  return "low";
}

function recommendationsFor(supplier: Supplier, impact: number): string[] {
  const recommendations: string[] = [];
  if (impact >= 0.8) {
    recommendations.push("Activate backup supplier immediately", "Expedite existing orders if possible");
  }
  if (supplier.criticality === SupplierCriticalities.CRITICAL) {
    recommendations.push("Escalate to executive leadership", "Review business continuity plan");
  }
  if (impact >= 0.5) {
    recommendations.push("Contact supplier for status update", "Assess inventory buffer levels");
  }
  if (supplier.lead_time_days > 20) {
    recommendations.push("Consider air freight alternatives");
  }
  return recommendations;
}

/**
 * Matches events to catalog suppliers. A supplier is affected when its
 * location matches the event at city, region or country level, or when one
 * of its categories overlaps the event keywords.
 */
export class SupplierImpactAnalyzer {
  private readonly suppliers: readonly Supplier[];
  private readonly logger: Logger;

  constructor({
    suppliers = getSimulatedSuppliers(),
    logger = createNoopLogger()
  }: SupplierImpactAnalyzerOptions = {}) {
    this.suppliers = suppliers;
    this.logger = logger;
  }

  findAffectedSuppliers(event: NormalizedEvent): Supplier[] {
    const affected: Supplier[] = [];

    for (const supplier of this.suppliers) {
      const geographicMatch = matchGeography(supplier, event.location);
      const categoryMatch = matchesCategory(supplier, event.keywords);
      if (!geographicMatch && !categoryMatch) {
        continue;
      }

      affected.push(supplier);
      this.logger.debug("supplier affected by event", {
        event_id: event.event_id,
        supplier_id: supplier.supplier_id,
        supplier_name: supplier.name,
        geographic_match: geographicMatch,
        category_match: categoryMatch
      });
    }

    this.logger.info("affected suppliers resolved", {
      event_id: event.event_id,
      affected: affected.length
    });
    return affected;
  }

  analyzeImpactSeverity(supplier: Supplier, event: Pick<NormalizedEvent, "severity">): SupplierImpactAnalysis {
    const impact = Math.min(
      1,
      EVENT_SEVERITY_WEIGHTS[event.severity] * CRITICALITY_IMPACT_MULTIPLIERS[supplier.criticality]
    );

    return {
      supplier_id: supplier.supplier_id,
      supplier_name: supplier.name,
      impact_severity: impact,
      impact_level: impactLevelFor(impact),
      estimated_recovery_days: Math.trunc(supplier.lead_time_days * (0.5 + impact * 0.5)),
      financial_exposure: supplier.annual_spend,
      is_critical: supplier.criticality === SupplierCriticalities.CRITICAL,
      recommendations: recommendationsFor(supplier, impact)
    };
  }

  getSupplierById(supplierId: string): Supplier | undefined {
    return this.suppliers.find((supplier) => supplier.supplier_id === supplierId);
  }

  getSuppliersByCountry(country: string): Supplier[] {
    return this.suppliers.filter((supplier) => isSupplierInCountry(supplier, country));
  }

  getCriticalSuppliers(): Supplier[] {
    return this.suppliers.filter(
      (supplier) => supplier.criticality === SupplierCriticalities.CRITICAL
    );
  }
}
