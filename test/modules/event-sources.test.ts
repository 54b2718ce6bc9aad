import assert from "node:assert/strict";
import test from "node:test";

import {
  EventCategories,
  EventSeverities,
  NewsSimulationSource,
  WeatherSimulationSource
} from "../../src/modules/event-sensing/index.js";
import { pickOne, randomInt, sample } from "../../src/modules/event-sensing/sources/random.js";
import type { SimulatedNewsEntry } from "../../src/modules/event-sensing/sources/news-catalog.js";
import type { SimulatedWeatherEntry } from "../../src/modules/event-sensing/sources/weather-catalog.js";
import type { RandomSource } from "../../src/modules/event-sensing/types.js";

const fixedNow = () => new Date("2026-03-01T10:00:00.000Z");

function scriptedRandom(values: number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[index];
    index += 1;
    if (value === undefined) {
      throw new Error("scripted random source exhausted");
    }
    return value;
  };
}

function newsEntry(title: string): SimulatedNewsEntry {
  return {
    title,
    description: `${title} description`,
    category: EventCategories.LOGISTICS,
    severity: EventSeverities.HIGH,
    location: { country: "Singapore", city: "Singapore" },
    keywords: ["shipping"]
  };
}

function weatherEntry(
  title: string,
  weatherType: string,
  severity: SimulatedWeatherEntry["severity"]
): SimulatedWeatherEntry {
  return {
    title,
    description: `${title} description`,
    severity,
    weather_type: weatherType,
    location: { country: "Thailand", city: "Bangkok" },
    keywords: [weatherType]
  };
}

test("random helpers stay inside their bounds", () => {
  assert.equal(randomInt(scriptedRandom([0]), 3, 5), 3);
  assert.equal(randomInt(scriptedRandom([0.999]), 3, 5), 5);
  assert.equal(pickOne(scriptedRandom([0.5]), ["a", "b", "c"]), "b");
  assert.equal(pickOne(scriptedRandom([]), []), undefined);
  assert.deepEqual(sample(scriptedRandom([0.5, 0]), ["a", "b", "c"], 2), ["b", "a"]);
  assert.deepEqual(sample(scriptedRandom([0]), ["a"], 3), ["a"]);
});

test("news source emits sampled catalog events", () => {
  const source = new NewsSimulationSource({
    catalog: [newsEntry("A"), newsEntry("B"), newsEntry("C")],
    random: scriptedRandom([0.9, 0.5, 0, 0, 0.5, 0.5, 0, 0, 0]),
    now: fixedNow
  });

  const events = source.sense();

  assert.deepEqual(
    events.map((event) => event.title),
    ["B", "A"]
  );
  const [first, second] = events;
  assert.ok(first && second);
  assert.equal(first.source_type, "NEWS");
  assert.equal(first.confidence, 0.7);
  assert.equal(first.timestamp_utc, "2026-03-01T09:45:00.000Z");
  assert.equal(first.detected_at_utc, "2026-03-01T10:00:00.000Z");
  assert.equal(first.source_url, "https://news.example.com/article/5500");
  assert.deepEqual(first.raw_data, { simulated: true, source: "news-simulation" });
  assert.equal(second.timestamp_utc, "2026-03-01T10:00:00.000Z");
  assert.equal(second.source_url, "https://news.example.com/article/1000");
});

test("news source can produce an empty cycle", () => {
  const source = new NewsSimulationSource({ random: scriptedRandom([0]), now: fixedNow });
  assert.deepEqual(source.sense(), []);
});

test("weather source fires on a low draw and tags the weather type", () => {
  const source = new WeatherSimulationSource({
    catalog: [
      weatherEntry("Flood", "flood", EventSeverities.HIGH),
      weatherEntry("Storm", "storm", EventSeverities.LOW),
      weatherEntry("Cyclone", "cyclone", EventSeverities.CRITICAL)
    ],
    random: scriptedRandom([0.2, 0.1, 0, 0, 0]),
    now: fixedNow
  });

  const [event, ...rest] = source.sense();

  assert.equal(rest.length, 0);
  assert.ok(event);
  assert.equal(event.title, "Flood");
  assert.equal(event.source_type, "WEATHER");
  assert.equal(event.category, "NATURAL_DISASTER");
  assert.equal(event.confidence, 0.85);
  assert.equal(event.source_url, "https://weather.example.com/alert/1000");
  assert.equal(event.raw_data.weather_type, "flood");
});

test("weather source skips quiet cycles and mild events", () => {
  const catalog = [
    weatherEntry("Flood", "flood", EventSeverities.HIGH),
    weatherEntry("Storm", "storm", EventSeverities.LOW)
  ];

  const quiet = new WeatherSimulationSource({ catalog, random: scriptedRandom([0.5]), now: fixedNow });
  assert.deepEqual(quiet.sense(), []);

  const mild = new WeatherSimulationSource({
    catalog,
    random: scriptedRandom([0.1, 0.9]),
    now: fixedNow
  });
  assert.deepEqual(mild.sense(), []);
});

test("weather source only picks monitored types", () => {
  const source = new WeatherSimulationSource({
    catalog: [
      weatherEntry("Flood", "flood", EventSeverities.HIGH),
      weatherEntry("Cyclone", "cyclone", EventSeverities.CRITICAL)
    ],
    monitoredTypes: ["Cyclone"],
    random: scriptedRandom([0, 0, 0, 0, 0]),
    now: fixedNow
  });

  assert.deepEqual(
    source.sense().map((event) => event.title),
    ["Cyclone"]
  );
});
