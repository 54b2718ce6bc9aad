import { EventCategories, EventSeverities, type EventCategory, type EventSeverity } from "../constants.js";
import type { GeoLocation } from "../types.js";

export interface SimulatedNewsEntry {
  title: string;
  description: string;
  category: EventCategory;
  severity: EventSeverity;
  location: GeoLocation;
  keywords: readonly string[];
}

export const SIMULATED_NEWS_EVENTS: readonly SimulatedNewsEntry[] = Object.freeze([
  {
    title: "Major Port Congestion at Singapore",
    description:
      "Container ship backlog at Port of Singapore reaches 3-day delays. Carriers report disruption across Asia-Pacific routes.",
    category: EventCategories.LOGISTICS,
    severity: EventSeverities.HIGH,
    location: { country: "Singapore", city: "Singapore", latitude: 1.29, longitude: 103.85 },
    keywords: ["port congestion", "shipping delay", "container backlog", "singapore"]
  },
  {
    title: "Rotterdam Port Workers Announce Strike",
    description:
      "Dock workers at Europe's largest port announce a 48-hour strike starting Monday. EU inbound flows expected to slow.",
    category: EventCategories.LABOR,
    severity: EventSeverities.HIGH,
    location: { country: "Netherlands", city: "Rotterdam", latitude: 51.92, longitude: 4.48 },
    keywords: ["port strike", "labor dispute", "rotterdam", "supply chain disruption"]
  },
  {
    title: "Suez Canal Traffic Resumes After Vessel Breakdown",
    description:
      "Engine failure on a container vessel caused a 12-hour blockage. Traffic is flowing again with delays expected for 48 hours.",
    category: EventCategories.LOGISTICS,
    severity: EventSeverities.MEDIUM,
    location: { country: "Egypt", region: "Suez", latitude: 30.45, longitude: 32.35 },
    keywords: ["suez canal", "shipping route", "vessel breakdown", "maritime"]
  },
  {
    title: "Los Angeles Port Reports Record Container Backlog",
    description:
      "Over 40 container ships are anchored outside the LA/Long Beach ports. Average wait time exceeds 7 days.",
    category: EventCategories.LOGISTICS,
    severity: EventSeverities.CRITICAL,
    location: {
      country: "USA",
      region: "California",
      city: "Los Angeles",
      latitude: 33.74,
      longitude: -118.27
    },
    keywords: ["port congestion", "container backlog", "los angeles", "shipping crisis"]
  },
  {
    title: "Rail Freight Disruption in Northern China",
    description:
      "Heavy snowfall halts rail freight operations across Heilongjiang province. Recovery expected in 3-4 days.",
    category: EventCategories.LOGISTICS,
    severity: EventSeverities.MEDIUM,
    location: { country: "China", region: "Heilongjiang", latitude: 45.75, longitude: 126.65 },
    keywords: ["rail disruption", "freight", "china", "weather impact"]
  },
  {
    title: "Panama Canal Implements Water Restrictions",
    description:
      "Drought conditions force the Panama Canal to cut daily transits by 25%. Carriers are rerouting vessels.",
    category: EventCategories.INFRASTRUCTURE,
    severity: EventSeverities.HIGH,
    location: { country: "Panama", region: "Panama Canal", latitude: 9.08, longitude: -79.68 },
    keywords: ["panama canal", "water restrictions", "shipping route", "transit limits"]
  },
  {
    title: "Truck Driver Shortage Worsens in UK",
    description:
      "Industry reports a 15% driver vacancy rate affecting retail distribution. Delivery delays are spreading nationwide.",
    category: EventCategories.LABOR,
    severity: EventSeverities.MEDIUM,
    location: { country: "United Kingdom", latitude: 51.51, longitude: -0.13 },
    keywords: ["truck driver shortage", "logistics", "uk", "delivery delays"]
  },
  {
    title: "Mumbai Port Operations Suspended Due to Cyclone Warning",
    description:
      "Jawaharlal Nehru Port suspends operations ahead of an approaching cyclone. Container handling halted for 48 hours.",
    category: EventCategories.NATURAL_DISASTER,
    severity: EventSeverities.HIGH,
    location: {
      country: "India",
      region: "Maharashtra",
      city: "Mumbai",
      latitude: 18.95,
      longitude: 72.95
    },
    keywords: ["port closure", "cyclone", "mumbai", "jnpt"]
  }
]);
