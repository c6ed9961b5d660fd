import type { Tool } from "../tool.js";
import {
  WEATHER_PARAMETERS,
  WEATHER_TOOL_DESCRIPTION,
  WEATHER_TOOL_NAME,
  WeatherQuerySchema,
  type WeatherQuery,
  type WeatherReport,
} from "./schema.js";

interface Conditions {
  readonly temp: number;
  readonly condition: string;
  readonly humidity: number;
}

const CITIES: Record<string, Conditions> = {
  beijing: { temp: 15, condition: "Clear", humidity: 45 },
  shanghai: { temp: 20, condition: "Partly cloudy", humidity: 60 },
  guangzhou: { temp: 25, condition: "Overcast", humidity: 75 },
  shenzhen: { temp: 24, condition: "Light rain", humidity: 80 },
  hangzhou: { temp: 18, condition: "Clear", humidity: 50 },
  paris: { temp: 17, condition: "Partly cloudy", humidity: 62 },
  london: { temp: 13, condition: "Drizzle", humidity: 78 },
};

const FALLBACK: Conditions = { temp: 22, condition: "Clear", humidity: 55 };

export interface MockWeatherToolOptions {
  /** Simulated provider latency. */
  readonly delayMs?: number;
}

/**
 * Deterministic stand-in for the live provider. Unknown places get mild,
 * clear weather.
 */
export class MockWeatherTool implements Tool<typeof WeatherQuerySchema> {
  readonly name = WEATHER_TOOL_NAME;
  readonly description = WEATHER_TOOL_DESCRIPTION;
  readonly schema = WeatherQuerySchema;
  readonly parameters = WEATHER_PARAMETERS;
  private readonly delayMs: number;

  constructor(options: MockWeatherToolOptions = {}) {
    this.delayMs = options.delayMs ?? 0;
  }

  async execute(params: WeatherQuery, context: { signal: AbortSignal }): Promise<WeatherReport> {
    if (this.delayMs > 0) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, this.delayMs);
        context.signal.addEventListener(
          "abort",
          () => {
            clearTimeout(timer);
            resolve();
          },
          { once: true }
        );
      });
    }

    const base = CITIES[params.location.toLowerCase()] ?? FALLBACK;
    const shift = params.when === "tomorrow" ? 1 : 0;
    return {
      location: params.location,
      country: null,
      when: params.when,
      condition: base.condition,
      temperatureC: base.temp + shift,
      highC: base.temp + 3,
      lowC: base.temp - 2,
      humidityPct: base.humidity,
      windKph: 5,
      precipitationChancePct: base.condition.includes("rain") || base.condition === "Drizzle" ? 70 : 10,
      source: "mock",
    };
  }
}
