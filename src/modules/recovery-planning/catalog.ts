import { BackupSupplierStatuses } from "./constants.js";
import { createBackupSupplier } from "./backup-supplier.js";
import type { BackupSupplier } from "./types.js";

export const SIMULATED_BACKUP_SUPPLIERS: readonly BackupSupplier[] = Object.freeze([
  createBackupSupplier({
    name: "Vietnam Electronics Co",
    country: "Vietnam",
    city: "Ho Chi Minh City",
    status: BackupSupplierStatuses.QUALIFIED,
    categories: ["electronics", "semiconductors", "components"],
    capacity_score: 0.75,
    quality_score: 0.8,
    lead_time_days: 25,
    cost_premium_percent: 8,
    certifications: ["ISO 9001", "ISO 14001"]
  }),
  createBackupSupplier({
    name: "Malaysia Precision Parts",
    country: "Malaysia",
    city: "Penang",
    status: BackupSupplierStatuses.STANDBY,
    categories: ["precision components", "machinery", "electronics"],
    capacity_score: 0.85,
    quality_score: 0.88,
    lead_time_days: 20,
    cost_premium_percent: 12,
    certifications: ["ISO 9001", "AS9100"]
  }),
  createBackupSupplier({
    name: "Indonesia Manufacturing",
    country: "Indonesia",
    city: "Jakarta",
    status: BackupSupplierStatuses.QUALIFIED,
    categories: ["manufacturing", "assembly", "textiles"],
    capacity_score: 0.7,
    quality_score: 0.75,
    lead_time_days: 28,
    cost_premium_percent: 5,
    certifications: ["ISO 9001"]
  }),
  createBackupSupplier({
    name: "Mexico Logistics Partner",
    country: "Mexico",
    city: "Monterrey",
    status: BackupSupplierStatuses.ACTIVE,
    categories: ["logistics", "freight", "warehousing"],
    capacity_score: 0.8,
    quality_score: 0.82,
    lead_time_days: 14,
    cost_premium_percent: 15,
    certifications: ["C-TPAT", "ISO 9001"]
  }),
  createBackupSupplier({
    name: "Poland Distribution Hub",
    country: "Poland",
    city: "Warsaw",
    status: BackupSupplierStatuses.STANDBY,
    categories: ["logistics", "distribution", "freight"],
    capacity_score: 0.78,
    quality_score: 0.85,
    lead_time_days: 12,
    cost_premium_percent: 18,
    certifications: ["AEO", "ISO 9001"]
  }),
  createBackupSupplier({
    name: "South Korea Semiconductors",
    country: "South Korea",
    city: "Seoul",
    status: BackupSupplierStatuses.QUALIFIED,
    categories: ["semiconductors", "chips", "electronics"],
    capacity_score: 0.9,
    quality_score: 0.92,
    lead_time_days: 22,
    cost_premium_percent: 20,
    certifications: ["ISO 9001", "IATF 16949"]
  }),
  createBackupSupplier({
    name: "India Tech Solutions",
    country: "India",
    city: "Bangalore",
    status: BackupSupplierStatuses.QUALIFIED,
    categories: ["components", "electronics", "software"],
    capacity_score: 0.72,
    quality_score: 0.78,
    lead_time_days: 24,
    cost_premium_percent: 6,
    certifications: ["ISO 9001", "ISO 27001"]
  }),
  createBackupSupplier({
    name: "Philippines Assembly Corp",
    country: "Philippines",
    city: "Manila",
    status: BackupSupplierStatuses.PROSPECTIVE,
    categories: ["assembly", "manufacturing", "components"],
    capacity_score: 0.68,
    quality_score: 0.74,
    lead_time_days: 26,
    cost_premium_percent: 4,
    certifications: ["ISO 9001"]
  })
]);

export function getBackupSuppliers(): BackupSupplier[] {
  return [...SIMULATED_BACKUP_SUPPLIERS];
}
