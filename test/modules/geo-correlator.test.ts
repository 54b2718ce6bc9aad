import assert from "node:assert/strict";
import test from "node:test";

import { normalizeEventRecord } from "../../src/modules/event-sensing/schema.js";
import {
  GeographicCorrelator,
  UNKNOWN_GEOGRAPHIC_RISK,
  haversineDistanceKm
} from "../../src/modules/risk-analysis/index.js";
import { roundTo } from "../../src/modules/shared/numbers.js";
import { createSupplier } from "../../src/modules/suppliers/supplier.js";

const valparaiso = createSupplier({
  name: "Valparaiso Freight",
  country: "Chile",
  latitude: -33.05,
  longitude: -71.62,
  annual_spend: 1_000_000
});
const santiago = createSupplier({ name: "Santiago Metals", country: "Chile", annual_spend: 1_000_000 });
const lima = createSupplier({
  name: "Lima Components",
  country: "Peru",
  latitude: -12.05,
  longitude: -77.04,
  annual_spend: 2_000_000
});

function createEvent(severity: string, location: Record<string, unknown>) {
  return normalizeEventRecord(
    { event_id: "evt-geo", title: "Earthquake", severity, location },
    () => new Date("2026-03-01T10:00:00.000Z")
  );
}

test("haversine distance along the equator", () => {
  assert.equal(roundTo(haversineDistanceKm({ lat: 0, lon: 0 }, { lat: 0, lon: 1 }), 2), 111.19);
  assert.equal(haversineDistanceKm({ lat: 10, lon: 10 }, { lat: 10, lon: 10 }), 0);
  assert.equal(roundTo(haversineDistanceKm({ lat: 0, lon: 0 }, { lat: 0, lon: 90 }), 1), 10007.5);
});

test("weights supplier and spend concentration by event severity", () => {
  const correlator = new GeographicCorrelator({ suppliers: [valparaiso, santiago, lima] });

  assert.deepEqual(
    correlator.calculateGeographicRisk(
      createEvent("CRITICAL", { country: "chile", city: "Valparaiso" })
    ),
    {
      risk_factor: 0.737,
      affected_region: "Valparaiso, chile",
      affected_country: "chile",
      concentration_risk: "high",
      suppliers_in_region: 2,
      spend_at_risk: 2_000_000,
      supplier_concentration: 66.7,
      spend_concentration: 50
    }
  );

  const elsewhere = correlator.calculateGeographicRisk(createEvent("LOW", { country: "Brazil" }));
  assert.equal(elsewhere.risk_factor, 0);
  assert.equal(elsewhere.concentration_risk, "low");
  assert.equal(elsewhere.suppliers_in_region, 0);
});

test("returns the unknown profile when the event has no country", () => {
  const correlator = new GeographicCorrelator({ suppliers: [valparaiso] });

  assert.deepEqual(
    correlator.calculateGeographicRisk(createEvent("HIGH", { city: "Nowhere" })),
    UNKNOWN_GEOGRAPHIC_RISK
  );
});

test("scores the simulated catalog for an event in India", () => {
  const correlator = new GeographicCorrelator();
  const risk = correlator.calculateGeographicRisk(
    createEvent("HIGH", { country: "India", city: "Mumbai" })
  );

  assert.equal(risk.risk_factor, 0.128);
  assert.equal(risk.concentration_risk, "medium");
  assert.equal(risk.suppliers_in_region, 2);
  assert.equal(risk.spend_at_risk, 2_300_000);
  assert.equal(risk.supplier_concentration, 20);
  assert.equal(risk.spend_concentration, 5.2);
  assert.equal(risk.affected_region, "Mumbai, India");
});

test("finds suppliers with coordinates inside the radius, nearest first", () => {
  const correlator = new GeographicCorrelator({
    suppliers: [lima, santiago, valparaiso],
    defaultRadiusKm: 500
  });
  const event = createEvent("HIGH", { country: "Chile", latitude: -33.05, longitude: -71.62 });

  assert.deepEqual(
    correlator.findNearbySuppliers(event).map((entry) => [entry.supplier.name, entry.distance_km]),
    [["Valparaiso Freight", 0]]
  );
  assert.deepEqual(
    correlator.findNearbySuppliers(event, 5_000).map((entry) => entry.supplier.name),
    ["Valparaiso Freight", "Lima Components"]
  );
  assert.deepEqual(correlator.findNearbySuppliers(createEvent("HIGH", { country: "Chile" })), []);
});

test("reports concentration by country", () => {
  const correlator = new GeographicCorrelator({ suppliers: [valparaiso, santiago, lima] });

  assert.deepEqual(correlator.getConcentrationReport(), {
    total_suppliers: 3,
    total_spend: 4_000_000,
    unique_countries: 2,
    regions: [
      {
        country: "Chile",
        supplier_count: 2,
        total_spend: 2_000_000,
        supplier_percentage: 66.7,
        spend_percentage: 50,
        suppliers: ["Valparaiso Freight", "Santiago Metals"]
      },
      {
        country: "Peru",
        supplier_count: 1,
        total_spend: 2_000_000,
        supplier_percentage: 33.3,
        spend_percentage: 50,
        suppliers: ["Lima Components"]
      }
    ]
  });
});
