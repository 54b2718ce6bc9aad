import type { SupplierCriticality, SupplierTier } from "./constants.js";

export interface Supplier {
  readonly supplier_id: string;
  readonly name: string;
  readonly country: string;
  readonly region?: string;
  readonly city?: string;
  readonly latitude?: number;
  readonly longitude?: number;
  readonly criticality: SupplierCriticality;
  readonly tier: SupplierTier;
  readonly categories: readonly string[];
  readonly lead_time_days: number;
  readonly annual_spend: number;
}

export interface SupplierInit {
  supplier_id?: string;
  name: string;
  country: string;
  region?: string;
  city?: string;
  latitude?: number;
  longitude?: number;
  criticality?: SupplierCriticality;
  tier?: SupplierTier;
  categories?: readonly string[];
  lead_time_days?: number;
  annual_spend?: number;
}

export interface SupplierRecord {
  supplier_id: string;
  name: string;
  location: {
    country: string;
    region: string | null;
    city: string | null;
    latitude: number | null;
    longitude: number | null;
  };
  criticality: SupplierCriticality;
  tier: SupplierTier;
  categories: string[];
  lead_time_days: number;
  annual_spend: number;
}
