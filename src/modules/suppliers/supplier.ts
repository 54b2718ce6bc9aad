import { deterministicUuidFromSeed } from "../shared/ids.js";
import { SupplierCriticalities, SupplierTiers } from "./constants.js";
import type { Supplier, SupplierInit, SupplierRecord } from "./types.js";

function assertNonEmpty(field: string, value: string): string {
  const trimmed = value.trim();
  if (trimmed === "") {
    throw new Error(`Invalid "${field}" in supplier definition`);
  }
  return trimmed;
}

function optionalString(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function optionalCoordinate(field: string, value: number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid "${field}" in supplier definition`);
  }
  return value;
}

export function createSupplier(init: SupplierInit): Supplier {
  const name = assertNonEmpty("name", init.name);
  const country = assertNonEmpty("country", init.country);
  const leadTimeDays = init.lead_time_days ?? 14;
  const annualSpend = init.annual_spend ?? 0;

  if (!Number.isInteger(leadTimeDays) || leadTimeDays < 0) {
    throw new Error('Invalid "lead_time_days" in supplier definition');
  }
  if (!Number.isFinite(annualSpend) || annualSpend < 0) {
    throw new Error('Invalid "annual_spend" in supplier definition');
  }

  const region = optionalString(init.region);
  const city = optionalString(init.city);
  const latitude = optionalCoordinate("latitude", init.latitude);
  const longitude = optionalCoordinate("longitude", init.longitude);

  return Object.freeze({
    supplier_id: init.supplier_id ?? deterministicUuidFromSeed(`supplier:${name}`),
    name,
    country,
    ...(region !== undefined ? { region } : {}),
    ...(city !== undefined ? { city } : {}),
    ...(latitude !== undefined ? { latitude } : {}),
    ...(longitude !== undefined ? { longitude } : {}),
    criticality: init.criticality ?? SupplierCriticalities.MEDIUM,
    tier: init.tier ?? SupplierTiers.TIER_1,
    categories: Object.freeze([...(init.categories ?? [])]),
    lead_time_days: leadTimeDays,
    annual_spend: annualSpend
  });
}

function sameText(left: string | undefined, right: string | undefined): boolean {
  if (!left || !right) {
    return false;
  }
  return left.trim().toLowerCase() === right.trim().toLowerCase();
}

export function isSupplierInCountry(supplier: Supplier, country: string | undefined): boolean {
  return sameText(supplier.country, country);
}

export function isSupplierInRegion(supplier: Supplier, region: string | undefined): boolean {
  return sameText(supplier.region, region);
}

export function isSupplierInCity(supplier: Supplier, city: string | undefined): boolean {
  return sameText(supplier.city, city);
}

export function hasCoordinates(
  supplier: Supplier
): supplier is Supplier & { latitude: number; longitude: number } {
  return supplier.latitude !== undefined && supplier.longitude !== undefined;
}

export function formatSupplierLocation(supplier: Supplier): string {
  return [supplier.city, supplier.region, supplier.country]
    .filter((part): part is string => Boolean(part))
    .join(", ");
}

export function toSupplierRecord(supplier: Supplier): SupplierRecord {
  return {
    supplier_id: supplier.supplier_id,
    name: supplier.name,
    location: {
      country: supplier.country,
      region: supplier.region ?? null,
      city: supplier.city ?? null,
      latitude: supplier.latitude ?? null,
      longitude: supplier.longitude ?? null
    },
    criticality: supplier.criticality,
    tier: supplier.tier,
    categories: [...supplier.categories],
    lead_time_days: supplier.lead_time_days,
    annual_spend: supplier.annual_spend
  };
}
