import { clampUnit } from "../shared/numbers.js";
import { deterministicUuidFromSeed } from "../shared/ids.js";
import type { BackupSupplier, BackupSupplierInit } from "./types.js";

function invalid(field: string): Error {
  return new Error(`Invalid "${field}" in backup supplier definition`);
}

function assertUnitScore(field: string, value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw invalid(field);
  }
  return value;
}

export function createBackupSupplier(init: BackupSupplierInit): BackupSupplier {
  const name = init.name.trim();
  const country = init.country.trim();
  if (name === "") {
    throw invalid("name");
  }
  if (country === "") {
    throw invalid("country");
  }
  if (!Number.isInteger(init.lead_time_days) || init.lead_time_days < 0) {
    throw invalid("lead_time_days");
  }
  if (!Number.isFinite(init.cost_premium_percent) || init.cost_premium_percent < 0) {
    throw invalid("cost_premium_percent");
  }

  return Object.freeze({
    supplier_id: init.supplier_id ?? deterministicUuidFromSeed(`backup-supplier:${name}`),
    name,
    country,
    city: init.city.trim(),
    status: init.status,
    categories: Object.freeze(init.categories.map((category) => category.trim().toLowerCase())),
    capacity_score: assertUnitScore("capacity_score", init.capacity_score),
    quality_score: assertUnitScore("quality_score", init.quality_score),
    lead_time_days: init.lead_time_days,
    cost_premium_percent: init.cost_premium_percent,
    certifications: Object.freeze([...init.certifications])
  });
}

/** Standalone readiness score, independent of any particular disruption. */
export function overallBackupScore(supplier: BackupSupplier): number {
  const costFactor = Math.max(0, 1 - supplier.cost_premium_percent / 50);
  return clampUnit(
    0.4 * supplier.quality_score + 0.3 * supplier.capacity_score + 0.3 * costFactor
  );
}

export function canSupply(supplier: BackupSupplier, category: string): boolean {
  const needle = category.trim().toLowerCase();
  if (needle === "") {
    return false;
  }
  return supplier.categories.some(
    (offered) => offered.includes(needle) || needle.includes(offered)
  );
}
