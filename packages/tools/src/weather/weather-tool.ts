import { z } from "zod";
import type { Tool, ToolContext } from "../tool.js";
import { ToolExecutionError, UpstreamHttpError } from "../tool.js";
import {
  WEATHER_PARAMETERS,
  WEATHER_TOOL_DESCRIPTION,
  WEATHER_TOOL_NAME,
  WeatherQuerySchema,
  type WeatherQuery,
  type WeatherReport,
} from "./schema.js";

const GeocodingResponse = z.object({
  results: z
    .array(
      z.object({
        name: z.string(),
        latitude: z.number(),
        longitude: z.number(),
        country: z.string().optional(),
      })
    )
    .optional(),
});

const ForecastResponse = z.object({
  current: z.object({
    temperature_2m: z.number(),
    relative_humidity_2m: z.number().nullable().optional(),
    wind_speed_10m: z.number().nullable().optional(),
    weather_code: z.number(),
  }),
  daily: z.object({
    weather_code: z.array(z.number()),
    temperature_2m_max: z.array(z.number()),
    temperature_2m_min: z.array(z.number()),
    precipitation_probability_max: z.array(z.number().nullable()).optional(),
  }),
});

/** WMO weather interpretation codes. */
const WMO_CODES: Record<number, string> = {
  0: "Clear",
  1: "Mainly clear",
  2: "Partly cloudy",
  3: "Overcast",
  45: "Fog",
  48: "Depositing rime fog",
  51: "Light drizzle",
  53: "Drizzle",
  55: "Dense drizzle",
  61: "Light rain",
  63: "Rain",
  65: "Heavy rain",
  66: "Freezing rain",
  67: "Heavy freezing rain",
  71: "Light snow",
  73: "Snow",
  75: "Heavy snow",
  77: "Snow grains",
  80: "Rain showers",
  81: "Heavy rain showers",
  82: "Violent rain showers",
  85: "Snow showers",
  86: "Heavy snow showers",
  95: "Thunderstorm",
  96: "Thunderstorm with hail",
  99: "Thunderstorm with heavy hail",
};

export function describeWeatherCode(code: number): string {
  return WMO_CODES[code] ?? `Unknown conditions (code ${code})`;
}

export interface WeatherToolOptions {
  readonly geocodingUrl?: string;
  readonly forecastUrl?: string;
  readonly fetch?: typeof fetch;
}

/**
 * Open-Meteo backed weather lookup. Needs no API key.
 */
export class WeatherTool implements Tool<typeof WeatherQuerySchema> {
  readonly name = WEATHER_TOOL_NAME;
  readonly description = WEATHER_TOOL_DESCRIPTION;
  readonly schema = WeatherQuerySchema;
  readonly parameters = WEATHER_PARAMETERS;

  private readonly geocodingUrl: string;
  private readonly forecastUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: WeatherToolOptions = {}) {
    this.geocodingUrl = options.geocodingUrl ?? "https://geocoding-api.open-meteo.com/v1/search";
    this.forecastUrl = options.forecastUrl ?? "https://api.open-meteo.com/v1/forecast";
    this.fetchImpl = options.fetch ?? fetch;
  }

  async execute(params: WeatherQuery, context: ToolContext): Promise<WeatherReport> {
    const geoUrl = new URL(this.geocodingUrl);
    geoUrl.searchParams.set("name", params.location);
    geoUrl.searchParams.set("count", "1");
    geoUrl.searchParams.set("language", "en");
    geoUrl.searchParams.set("format", "json");

    const geo = GeocodingResponse.safeParse(await this.getJson(geoUrl, context.signal));
    if (!geo.success) {
      throw new ToolExecutionError("UPSTREAM_SERVER", "Malformed geocoding response", true);
    }
    const place = geo.data.results?.[0];
    if (!place) {
      throw new UpstreamHttpError(404, `No place matches "${params.location}"`);
    }

    const forecastUrl = new URL(this.forecastUrl);
    forecastUrl.searchParams.set("latitude", String(place.latitude));
    forecastUrl.searchParams.set("longitude", String(place.longitude));
    forecastUrl.searchParams.set(
      "current",
      "temperature_2m,relative_humidity_2m,wind_speed_10m,weather_code"
    );
    forecastUrl.searchParams.set(
      "daily",
      "weather_code,temperature_2m_max,temperature_2m_min,precipitation_probability_max"
    );
    forecastUrl.searchParams.set("timezone", "auto");
    forecastUrl.searchParams.set("forecast_days", "2");

    const forecast = ForecastResponse.safeParse(await this.getJson(forecastUrl, context.signal));
    if (!forecast.success) {
      throw new ToolExecutionError("UPSTREAM_SERVER", "Malformed forecast response", true);
    }

    const { current, daily } = forecast.data;
    const day = params.when === "tomorrow" ? 1 : 0;
    const high = daily.temperature_2m_max[day];
    const low = daily.temperature_2m_min[day];
    if (high === undefined || low === undefined) {
      throw new ToolExecutionError("UPSTREAM_SERVER", `Forecast has no data for ${params.when}`, true);
    }

    return {
      location: place.name,
      country: place.country ?? null,
      when: params.when,
      condition: describeWeatherCode(day === 0 ? current.weather_code : daily.weather_code[day] ?? current.weather_code),
      temperatureC: day === 0 ? current.temperature_2m : Math.round(((high + low) / 2) * 10) / 10,
      highC: high,
      lowC: low,
      humidityPct: day === 0 ? current.relative_humidity_2m ?? null : null,
      windKph: day === 0 ? current.wind_speed_10m ?? null : null,
      precipitationChancePct: daily.precipitation_probability_max?.[day] ?? null,
      source: "open-meteo",
    };
  }

  private async getJson(url: URL, signal: AbortSignal): Promise<unknown> {
    const response = await this.fetchImpl(url, { signal, headers: { accept: "application/json" } });
    if (!response.ok) {
      throw new UpstreamHttpError(
        response.status,
        `Weather provider answered ${response.status} for ${url.pathname}`
      );
    }
    return response.json();
  }
}
