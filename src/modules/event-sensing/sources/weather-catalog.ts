import { EventSeverities, type EventSeverity } from "../constants.js";
import type { GeoLocation } from "../types.js";

export interface SimulatedWeatherEntry {
  title: string;
  description: string;
  severity: EventSeverity;
  weather_type: string;
  location: GeoLocation;
  keywords: readonly string[];
}

export const SIMULATED_WEATHER_EVENTS: readonly SimulatedWeatherEntry[] = Object.freeze([
  {
    title: "Typhoon Approaching Taiwan Strait",
    description:
      "Category 4 typhoon expected to reach shipping lanes in the Taiwan Strait within 48 hours. Wind speeds above 200 km/h.",
    severity: EventSeverities.CRITICAL,
    weather_type: "cyclone",
    location: { country: "Taiwan", region: "Taiwan Strait", latitude: 24.5, longitude: 121.0 },
    keywords: ["typhoon", "taiwan", "shipping lane", "severe weather"]
  },
  {
    title: "Severe Flooding in Bangkok Industrial Zone",
    description:
      "Monsoon rains flood eastern Bangkok. Several manufacturing facilities report suspended operations.",
    severity: EventSeverities.HIGH,
    weather_type: "flood",
    location: { country: "Thailand", city: "Bangkok", latitude: 13.75, longitude: 100.52 },
    keywords: ["flood", "manufacturing", "thailand", "monsoon"]
  },
  {
    title: "Earthquake Disrupts Japan Supply Routes",
    description:
      "Magnitude 6.2 earthquake in the Osaka region. Several highways and rail lines closed for inspection.",
    severity: EventSeverities.HIGH,
    weather_type: "earthquake",
    location: {
      country: "Japan",
      region: "Kansai",
      city: "Osaka",
      latitude: 34.69,
      longitude: 135.5
    },
    keywords: ["earthquake", "japan", "infrastructure", "transport disruption"]
  },
  {
    title: "Winter Storm Grounds Flights Across Northern Europe",
    description:
      "Heavy snowfall and blizzard conditions close multiple airports. Air freight operations severely reduced.",
    severity: EventSeverities.MEDIUM,
    weather_type: "storm",
    location: { country: "Germany", city: "Frankfurt", latitude: 50.11, longitude: 8.68 },
    keywords: ["winter storm", "airport closure", "air freight", "europe"]
  },
  {
    title: "Hurricane Warning for Gulf of Mexico",
    description:
      "Category 3 hurricane forecast to make landfall near Houston within 72 hours. Energy facilities are evacuating.",
    severity: EventSeverities.CRITICAL,
    weather_type: "hurricane",
    location: {
      country: "USA",
      region: "Texas",
      city: "Houston",
      latitude: 29.76,
      longitude: -95.37
    },
    keywords: ["hurricane", "gulf of mexico", "energy sector", "houston"]
  },
  {
    title: "Cyclone Impacts Kolkata Port Operations",
    description:
      "A severe cyclonic storm closes the port at Kolkata. Container terminal operations suspended for at least 24 hours.",
    severity: EventSeverities.HIGH,
    weather_type: "cyclone",
    location: {
      country: "India",
      region: "West Bengal",
      city: "Kolkata",
      latitude: 22.57,
      longitude: 88.36
    },
    keywords: ["cyclone", "port closure", "kolkata", "bay of bengal"]
  },
  {
    title: "Volcanic Ash Cloud Disrupts Pacific Air Routes",
    description:
      "An eruption at Sakurajima creates an ash hazard zone. Trans-Pacific flights reroute, adding 2-4 hours.",
    severity: EventSeverities.MEDIUM,
    weather_type: "volcanic",
    location: { country: "Japan", region: "Kagoshima", latitude: 31.58, longitude: 130.66 },
    keywords: ["volcano", "ash cloud", "air freight", "pacific routes"]
  },
  {
    title: "Flash Floods Close Major Highway in Vietnam",
    description:
      "Sudden heavy rainfall floods Highway 1 between Ho Chi Minh City and Dong Nai. Truck traffic diverted.",
    severity: EventSeverities.MEDIUM,
    weather_type: "flood",
    location: {
      country: "Vietnam",
      city: "Ho Chi Minh City",
      latitude: 10.82,
      longitude: 106.63
    },
    keywords: ["flash flood", "highway closure", "vietnam", "logistics"]
  },
  {
    title: "Dust Storm Reduces Visibility at Dubai Ports",
    description:
      "A severe dust storm slows Jebel Ali port operations. Container handling cut by half under safety protocols.",
    severity: EventSeverities.LOW,
    weather_type: "storm",
    location: { country: "UAE", city: "Dubai", latitude: 25.01, longitude: 55.07 },
    keywords: ["dust storm", "dubai", "jebel ali", "port operations"]
  },
  {
    title: "Monsoon Causes Landslides on India-Nepal Border",
    description:
      "Heavy monsoon rains trigger landslides blocking key trade routes between India and Nepal.",
    severity: EventSeverities.MEDIUM,
    weather_type: "flood",
    location: {
      country: "Nepal",
      region: "Kathmandu Valley",
      latitude: 27.7,
      longitude: 85.32
    },
    keywords: ["landslide", "monsoon", "trade route", "nepal"]
  }
]);
