import fs from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const ParleyConfigSchema = z.object({
  server: z
    .object({
      /** HTTP bind address. Loopback only by default. */
      bind: z.string().default("127.0.0.1"),
      port: z.number().int().min(1).max(65535).default(8000),
    })
    .default({}),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  /** SQLite file, or ":memory:". */
  databasePath: z.string().min(1).default("data/parley.db"),
  contextWindow: z
    .object({
      size: z.number().int().positive().default(10),
      /** "rounds" counts a user+agent pair as one unit. */
      unit: z.enum(["turns", "rounds"]).default("turns"),
    })
    .default({}),
  run: z
    .object({
      timeoutMs: z.number().int().positive().default(90_000),
      maxToolIterations: z.number().int().positive().default(6),
      toolRetries: z.number().int().min(0).default(1),
      onToolError: z.enum(["fail", "degrade"]).default("fail"),
      maxMessageLength: z.number().int().positive().default(4000),
    })
    .default({}),
  tools: z
    .object({
      timeoutMs: z.number().int().positive().default(10_000),
      weather: z
        .object({
          provider: z.enum(["live", "mock"]).default("mock"),
          geocodingUrl: z.string().url().default("https://geocoding-api.open-meteo.com/v1/search"),
          forecastUrl: z.string().url().default("https://api.open-meteo.com/v1/forecast"),
        })
        .default({}),
    })
    .default({}),
  stream: z
    .object({
      maxEvents: z.number().int().positive().default(200),
      maxAgeMs: z.number().int().positive().default(120_000),
      /** Idle SSE connections get a `heartbeat` frame this often. */
      heartbeatMs: z.number().int().positive().default(30_000),
    })
    .default({}),
  model: z
    .object({
      provider: z.enum(["openai", "rule-based"]).default("rule-based"),
      name: z.string().default("gpt-4o-mini"),
      baseUrl: z.string().url().default("https://api.openai.com/v1"),
      apiKey: z.string().optional(),
      temperature: z.number().min(0).max(2).default(0.7),
      requestTimeoutMs: z.number().int().positive().default(30_000),
      /** Target size of streamed content chunks, in characters. */
      chunkSize: z.number().int().positive().default(48),
    })
    .default({}),
});

export type ParleyConfig = z.infer<typeof ParleyConfigSchema>;

type Env = Record<string, string | undefined>;

/** Environment variable → config path, and how to coerce it. */
const ENV_OVERRIDES: ReadonlyArray<{
  readonly name: string;
  readonly path: readonly string[];
  readonly numeric?: boolean;
}> = [
  { name: "PORT", path: ["server", "port"], numeric: true },
  { name: "PARLEY_BIND", path: ["server", "bind"] },
  { name: "PARLEY_LOG_LEVEL", path: ["logLevel"] },
  { name: "PARLEY_DB_PATH", path: ["databasePath"] },
  { name: "PARLEY_MODEL_PROVIDER", path: ["model", "provider"] },
  { name: "PARLEY_MODEL", path: ["model", "name"] },
  { name: "OPENAI_API_KEY", path: ["model", "apiKey"] },
  { name: "OPENAI_BASE_URL", path: ["model", "baseUrl"] },
  { name: "PARLEY_WEATHER_PROVIDER", path: ["tools", "weather", "provider"] },
  { name: "PARLEY_RUN_TIMEOUT_MS", path: ["run", "timeoutMs"], numeric: true },
  { name: "PARLEY_TOOL_TIMEOUT_MS", path: ["tools", "timeoutMs"], numeric: true },
  { name: "PARLEY_HEARTBEAT_MS", path: ["stream", "heartbeatMs"], numeric: true },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
  let node = target;
  for (const key of path.slice(0, -1)) {
    const next = node[key];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

function applyEnv(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  for (const override of ENV_OVERRIDES) {
    const value = env[override.name];
    if (value === undefined || value === "") continue;
    setPath(raw, override.path, override.numeric ? Number(value) : value);
  }
  // An API key with no explicit provider choice means the caller wants OpenAI.
  if (env.OPENAI_API_KEY && !env.PARLEY_MODEL_PROVIDER) {
    const model = raw.model;
    if (!isRecord(model) || model.provider === undefined) {
      setPath(raw, ["model", "provider"], "openai");
    }
  }
  return raw;
}

/**
 * Validates an already-parsed config object and fills in defaults.
 */
export function parseConfig(raw: unknown, env: Env = {}): ParleyConfig {
  if (raw !== undefined && raw !== null && !isRecord(raw)) {
    throw new ConfigError("Configuration root must be a mapping");
  }
  const merged = applyEnv(isRecord(raw) ? structuredClone(raw) : {}, env);
  const result = ParleyConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`, result.error);
  }
  return result.data;
}

/**
 * Loads the YAML config at `path` (missing file = all defaults) and applies
 * environment overrides.
 */
export function loadConfig(path: string, env: Env = process.env): ParleyConfig {
  let raw: unknown;
  if (fs.existsSync(path)) {
    try {
      raw = yaml.load(fs.readFileSync(path, "utf8"));
    } catch (err) {
      throw new ConfigError(`Could not parse ${path}: ${err instanceof Error ? err.message : String(err)}`, err);
    }
  }
  return parseConfig(raw, env);
}
