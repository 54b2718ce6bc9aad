import { SupplierCriticalities, SupplierTiers } from "./constants.js";
import { createSupplier } from "./supplier.js";
import type { Supplier } from "./types.js";

export const SIMULATED_SUPPLIERS: readonly Supplier[] = Object.freeze([
  createSupplier({
    name: "TechParts Asia",
    country: "China",
    city: "Shenzhen",
    region: "Guangdong",
    latitude: 22.54,
    longitude: 114.06,
    criticality: SupplierCriticalities.HIGH,
    tier: SupplierTiers.TIER_1,
    categories: ["electronics", "semiconductors", "components"],
    lead_time_days: 21,
    annual_spend: 5_000_000
  }),
  createSupplier({
    name: "Rotterdam Logistics BV",
    country: "Netherlands",
    city: "Rotterdam",
    latitude: 51.92,
    longitude: 4.48,
    criticality: SupplierCriticalities.CRITICAL,
    tier: SupplierTiers.TIER_1,
    categories: ["freight", "logistics", "warehousing"],
    lead_time_days: 7,
    annual_spend: 3_000_000
  }),
  createSupplier({
    name: "Singapore Shipping Corp",
    country: "Singapore",
    city: "Singapore",
    latitude: 1.29,
    longitude: 103.85,
    criticality: SupplierCriticalities.HIGH,
    tier: SupplierTiers.TIER_1,
    categories: ["maritime", "shipping", "freight"],
    lead_time_days: 14,
    annual_spend: 4_000_000
  }),
  createSupplier({
    name: "Mumbai Components Ltd",
    country: "India",
    city: "Mumbai",
    region: "Maharashtra",
    latitude: 18.95,
    longitude: 72.95,
    criticality: SupplierCriticalities.MEDIUM,
    tier: SupplierTiers.TIER_2,
    categories: ["manufacturing", "components", "assembly"],
    lead_time_days: 28,
    annual_spend: 1_500_000
  }),
  createSupplier({
    name: "Texas Energy Solutions",
    country: "USA",
    city: "Houston",
    region: "Texas",
    latitude: 29.76,
    longitude: -95.37,
    criticality: SupplierCriticalities.HIGH,
    tier: SupplierTiers.TIER_1,
    categories: ["energy", "petrochemicals", "raw materials"],
    lead_time_days: 10,
    annual_spend: 6_000_000
  }),
  createSupplier({
    name: "Japan Precision Industries",
    country: "Japan",
    city: "Osaka",
    region: "Kansai",
    latitude: 34.69,
    longitude: 135.5,
    criticality: SupplierCriticalities.CRITICAL,
    tier: SupplierTiers.TIER_1,
    categories: ["precision components", "machinery", "electronics"],
    lead_time_days: 18,
    annual_spend: 8_000_000
  }),
  createSupplier({
    name: "Bangkok Manufacturing",
    country: "Thailand",
    city: "Bangkok",
    latitude: 13.75,
    longitude: 100.52,
    criticality: SupplierCriticalities.MEDIUM,
    tier: SupplierTiers.TIER_2,
    categories: ["manufacturing", "assembly", "textiles"],
    lead_time_days: 25,
    annual_spend: 1_200_000
  }),
  createSupplier({
    name: "Taiwan Semiconductor",
    country: "Taiwan",
    city: "Taipei",
    latitude: 25.03,
    longitude: 121.57,
    criticality: SupplierCriticalities.CRITICAL,
    tier: SupplierTiers.TIER_1,
    categories: ["semiconductors", "chips", "electronics"],
    lead_time_days: 30,
    annual_spend: 12_000_000
  }),
  createSupplier({
    name: "Kolkata Port Services",
    country: "India",
    city: "Kolkata",
    region: "West Bengal",
    latitude: 22.57,
    longitude: 88.36,
    criticality: SupplierCriticalities.MEDIUM,
    tier: SupplierTiers.TIER_2,
    categories: ["port services", "freight", "logistics"],
    lead_time_days: 14,
    annual_spend: 800_000
  }),
  createSupplier({
    name: "Dubai Logistics Hub",
    country: "UAE",
    city: "Dubai",
    latitude: 25.01,
    longitude: 55.07,
    criticality: SupplierCriticalities.HIGH,
    tier: SupplierTiers.TIER_1,
    categories: ["logistics", "freight", "distribution"],
    lead_time_days: 12,
    annual_spend: 2_500_000
  })
]);

export function getSimulatedSuppliers(): Supplier[] {
  return [...SIMULATED_SUPPLIERS];
}
