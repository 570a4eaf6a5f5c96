import { Type, type Static } from "@sinclair/typebox";
import { readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import { ConfigurationError, errorMessage } from "../utils/errors.js";
import { assertSchema } from "../utils/schema.js";

export const PlotforgeConfigSchema = Type.Object({
  duckdbPath: Type.String(),
  outDir: Type.String(),
  confDir: Type.Union([Type.String(), Type.Null()]),
  basis: Type.String(),
  concurrency: Type.Integer({ minimum: 1 }),
  compact: Type.Boolean(),
  force: Type.Boolean(),
  validate: Type.Boolean(),
  match: Type.Union([Type.String(), Type.Null()]),
  heartbeatMs: Type.Integer({ minimum: 1 }),
  logLevel: Type.String(),
  sources: Type.Array(Type.String()),
});

export type PlotforgeConfig = Static<typeof PlotforgeConfigSchema>;

const ConfigFileSchema = Type.Partial(PlotforgeConfigSchema);

const DEFAULT_CONFIG: PlotforgeConfig = {
  duckdbPath: "duckdb",
  outDir: "plots",
  confDir: null,
  basis: "now",
  concurrency: 6,
  compact: false,
  force: false,
  validate: false,
  match: null,
  heartbeatMs: 60_000,
  logLevel: "info",
  sources: [],
};

let cachedConfig: PlotforgeConfig | null = null;

function readConfigFile(): Partial<PlotforgeConfig> {
  const configPath = join(homedir(), ".plotforge", "config.json");
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`failed to decode ${configPath}: ${errorMessage(error)}`, { cause: error });
  }
  return assertSchema(ConfigFileSchema, parsed, configPath);
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  return value.toLowerCase() === "true";
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  return value.split(",").map((item) => item.trim()).filter(Boolean);
}

export function getConfig(): PlotforgeConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const fileConfig = readConfigFile();
  const config: PlotforgeConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
  };

  const env = process.env;
  cachedConfig = {
    ...config,
    duckdbPath: env.PLOTFORGE_DUCKDB_PATH ?? config.duckdbPath,
    outDir: env.PLOTFORGE_OUT ?? config.outDir,
    confDir: env.PLOTFORGE_CONF ?? config.confDir,
    basis: env.PLOTFORGE_BASIS ?? config.basis,
    concurrency: parseNumber(env.PLOTFORGE_CONCURRENCY, config.concurrency),
    compact: parseBoolean(env.PLOTFORGE_COMPACT, config.compact),
    force: parseBoolean(env.PLOTFORGE_FORCE, config.force),
    validate: parseBoolean(env.PLOTFORGE_VALIDATE, config.validate),
    match: env.PLOTFORGE_MATCH ?? config.match,
    heartbeatMs: parseNumber(env.PLOTFORGE_HEARTBEAT_MS, config.heartbeatMs),
    logLevel: env.PLOTFORGE_LOG_LEVEL ?? config.logLevel,
    sources: parseList(env.PLOTFORGE_SOURCES, config.sources),
  };

  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
