import { z } from "zod";

export const WEATHER_TOOL_NAME = "weather_query";

export const WeatherQuerySchema = z.object({
  location: z.string().trim().min(1).max(120).describe("City or place name"),
  when: z.enum(["today", "tomorrow"]).default("today").describe("Which day to report"),
});

export type WeatherQuery = z.infer<typeof WeatherQuerySchema>;

export const WEATHER_TOOL_DESCRIPTION =
  "Current conditions and the daily forecast for a place, today or tomorrow.";

export const WEATHER_PARAMETERS: Record<string, string> = {
  location: "City or place name, e.g. \"Paris\"",
  when: "\"today\" (default) or \"tomorrow\"",
};

/** Shape both weather providers answer with. */
export interface WeatherReport {
  [key: string]: string | number | null;
  location: string;
  country: string | null;
  when: "today" | "tomorrow";
  condition: string;
  temperatureC: number;
  highC: number;
  lowC: number;
  humidityPct: number | null;
  windKph: number | null;
  precipitationChancePct: number | null;
  source: string;
}
