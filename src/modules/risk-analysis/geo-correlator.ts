import { createNoopLogger, type Logger } from "../../infrastructure/logging/logger.js";
import type { EventSeverity } from "../event-sensing/constants.js";
import type { Coordinates, NormalizedEvent } from "../event-sensing/types.js";
import { getSimulatedSuppliers } from "../suppliers/catalog.js";
import { hasCoordinates } from "../suppliers/supplier.js";
import type { Supplier } from "../suppliers/types.js";
import { clampUnit, roundTo, sum } from "../shared/numbers.js";
import type {
  ConcentrationReport,
  ConcentrationRisk,
  GeographicRisk,
  NearbySupplier
} from "./types.js";

export const EARTH_RADIUS_KM = 6371;

const SEVERITY_RISK_MULTIPLIERS: Readonly<Record<EventSeverity, number>> = Object.freeze({
  CRITICAL: 1.3,
  HIGH: 1.15,
  MEDIUM: 1.0,
  LOW: 0.8
});

export const UNKNOWN_GEOGRAPHIC_RISK: Readonly<GeographicRisk> = Object.freeze({
  risk_factor: 0.3,
  affected_region: "Unknown",
  affected_country: null,
  concentration_risk: "unknown",
  suppliers_in_region: 0,
  spend_at_risk: 0,
  supplier_concentration: 0,
  spend_concentration: 0
});

interface CountryBucket {
  country: string;
  supplierCount: number;
  totalSpend: number;
  supplierNames: string[];
}

export interface GeographicCorrelatorOptions {
  suppliers?: readonly Supplier[];
  defaultRadiusKm?: number;
  logger?: Logger;
}

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/** Great-circle distance in kilometres. */
export function haversineDistanceKm(from: Coordinates, to: Coordinates): number {
  const deltaLat = toRadians(to.lat - from.lat);
  const deltaLon = toRadians(to.lon - from.lon);
  const a =
    Math.sin(deltaLat / 2) ** 2 +
    Math.cos(toRadians(from.lat)) * Math.cos(toRadians(to.lat)) * Math.sin(deltaLon / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_KM * c;
}

function concentrationLevel(concentration: number): ConcentrationRisk {
  if (concentration >= 0.3) {
    return "high";
  }
  if (concentration >= 0.15) {
    return "medium";
  }
  return "low";
}

function countryKey(country: string): string {
  return country.trim().toLowerCase();
}

export class GeographicCorrelator {
  private readonly suppliers: readonly Supplier[];
  private readonly defaultRadiusKm: number;
  private readonly logger: Logger;
  private readonly distribution = new Map<string, CountryBucket>();
  private readonly totalSpend: number;

  constructor({
    suppliers = getSimulatedSuppliers(),
    defaultRadiusKm = 500,
    logger = createNoopLogger()
  }: GeographicCorrelatorOptions = {}) {
    this.suppliers = suppliers;
    this.defaultRadiusKm = defaultRadiusKm;
    this.logger = logger;
    this.totalSpend = sum(suppliers.map((supplier) => supplier.annual_spend));

    for (const supplier of suppliers) {
      const key = countryKey(supplier.country);
      const bucket = this.distribution.get(key) ?? {
        country: supplier.country,
        supplierCount: 0,
        totalSpend: 0,
        supplierNames: []
      };
      bucket.supplierCount += 1;
      bucket.totalSpend += supplier.annual_spend;
      bucket.supplierNames.push(supplier.name);
      this.distribution.set(key, bucket);
    }
  }

  calculateGeographicRisk(
    event: Pick<NormalizedEvent, "severity" | "location">
  ): GeographicRisk {
    const { country, region, city } = event.location;
    if (!country || country.trim() === "") {
      return { ...UNKNOWN_GEOGRAPHIC_RISK };
    }

    const bucket = this.distribution.get(countryKey(country));
    const suppliersInCountry = bucket?.supplierCount ?? 0;
    const spendInCountry = bucket?.totalSpend ?? 0;
    const concentration =
      this.suppliers.length === 0 ? 0 : suppliersInCountry / this.suppliers.length;
    const spendConcentration = this.totalSpend === 0 ? 0 : spendInCountry / this.totalSpend;

    const riskFactor = clampUnit(
      (concentration * 0.4 + spendConcentration * 0.6) * SEVERITY_RISK_MULTIPLIERS[event.severity]
    );

    this.logger.debug("geographic risk calculated", {
      country,
      risk_factor: roundTo(riskFactor, 3),
      suppliers_in_country: suppliersInCountry
    });

    return {
      risk_factor: roundTo(riskFactor, 3),
      affected_region: [city, region, country]
        .filter((part): part is string => Boolean(part))
        .join(", "),
      affected_country: country,
      concentration_risk: concentrationLevel(concentration),
      suppliers_in_region: suppliersInCountry,
      spend_at_risk: spendInCountry,
      supplier_concentration: roundTo(concentration * 100, 1),
      spend_concentration: roundTo(spendConcentration * 100, 1)
    };
  }

  /** Suppliers with known coordinates within `radiusKm`, nearest first. */
  findNearbySuppliers(
    event: Pick<NormalizedEvent, "location">,
    radiusKm: number = this.defaultRadiusKm
  ): NearbySupplier[] {
    const origin = event.location.coordinates;
    if (!origin) {
      return [];
    }

    const nearby: NearbySupplier[] = [];
    for (const supplier of this.suppliers) {
      if (!hasCoordinates(supplier)) {
        continue;
      }
      const distanceKm = haversineDistanceKm(origin, {
        lat: supplier.latitude,
        lon: supplier.longitude
      });
      if (distanceKm <= radiusKm) {
        nearby.push({ supplier, distance_km: distanceKm });
      }
    }
    return nearby.sort((left, right) => left.distance_km - right.distance_km);
  }

  getConcentrationReport(): ConcentrationReport {
    const totalSuppliers = this.suppliers.length;
    const regions = [...this.distribution.values()].map((bucket) => ({
      country: bucket.country,
      supplier_count: bucket.supplierCount,
      total_spend: bucket.totalSpend,
      supplier_percentage:
        totalSuppliers === 0 ? 0 : roundTo((bucket.supplierCount / totalSuppliers) * 100, 1),
      spend_percentage:
        this.totalSpend === 0 ? 0 : roundTo((bucket.totalSpend / this.totalSpend) * 100, 1),
      suppliers: [...bucket.supplierNames]
    }));
    regions.sort((left, right) => right.spend_percentage - left.spend_percentage);

    return {
      total_suppliers: totalSuppliers,
      total_spend: this.totalSpend,
      unique_countries: this.distribution.size,
      regions
    };
  }
}
