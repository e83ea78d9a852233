import type { Rng } from "./rng";
import type { Season, SimMinute, Weather, WeatherCondition } from "./types";

type SeasonWeather = {
  weights: Partial<Record<WeatherCondition, number>>;
  // [min, max] °C
  temperature: readonly [number, number];
};

const SEASON_WEATHER: Record<Season, SeasonWeather> = {
  spring: { weights: { clear: 4, cloudy: 3, rain: 3, fog: 1, storm: 1 }, temperature: [6, 18] },
  summer: { weights: { clear: 6, cloudy: 2, rain: 1, storm: 1, heatwave: 1 }, temperature: [16, 32] },
  autumn: { weights: { clear: 3, cloudy: 3, rain: 3, fog: 2, storm: 1 }, temperature: [4, 16] },
  winter: { weights: { clear: 2, cloudy: 3, snow: 4, fog: 1, storm: 1 }, temperature: [-12, 4] }
};

const BIOME_OFFSET_C: Record<string, number> = {
  hills: -3,
  "river valley": 1,
  plains: 1
};

// Conditions that push the rolled temperature around.
const CONDITION_OFFSET_C: Partial<Record<WeatherCondition, number>> = {
  heatwave: 8,
  snow: -3,
  storm: -2
};

export function rollWeather(rng: Rng, season: Season, biome: string, at: SimMinute): Weather {
  const table = SEASON_WEATHER[season];
  const entries = Object.entries(table.weights).flatMap(([condition, weight]) =>
    isCondition(condition) && weight ? [{ value: condition, weight }] : []
  );
  const condition = rng.weighted(entries);
  const [lo, hi] = table.temperature;
  const temperatureC = rng.int(lo, hi) + (BIOME_OFFSET_C[biome] ?? 0) + (CONDITION_OFFSET_C[condition] ?? 0);
  return { condition, temperatureC, since: at };
}

const CONDITIONS: readonly WeatherCondition[] = ["clear", "cloudy", "rain", "storm", "fog", "snow", "heatwave"];

function isCondition(s: string): s is WeatherCondition {
  return CONDITIONS.some((c) => c === s);
}
