export { ToolGateway, classifyToolFailure } from "./tool-gateway.js";
export type { ToolGatewayOptions } from "./tool-gateway.js";
export { ToolRegistry } from "./registry.js";
export { UpstreamHttpError, ToolExecutionError, describeTool } from "./tool.js";
export type { Tool, ToolContext } from "./tool.js";
export {
  WEATHER_TOOL_NAME,
  WeatherQuerySchema,
} from "./weather/schema.js";
export type { WeatherQuery, WeatherReport } from "./weather/schema.js";
export { WeatherTool, describeWeatherCode } from "./weather/weather-tool.js";
export type { WeatherToolOptions } from "./weather/weather-tool.js";
export { MockWeatherTool } from "./weather/mock-weather-tool.js";
export type { MockWeatherToolOptions } from "./weather/mock-weather-tool.js";
