import fs from "node:fs";
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import {
  DEFAULT_CACHE_MAX,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_CORE_STABILITY,
  DEFAULT_EXCLUSION_PENALTY,
  DEFAULT_MAX_PREDICTIONS,
  DEFAULT_MAX_QUESTIONS,
  DEFAULT_MIN_PREVALENCE,
  DEFAULT_PERIPHERAL_STABILITY,
  DEFAULT_SESSION_MAX,
  DEFAULT_SESSION_TTL_MS,
  DEFAULT_STABILITY_BONUS,
  DEFAULT_STABILITY_PENALTY,
} from "./constants.js";
import { logLevels, type LogLevel } from "./telemetry.js";

const envCandidates = [
  path.resolve(process.cwd(), ".env.local"),
  path.resolve(process.cwd(), ".env"),
  path.resolve(process.cwd(), "..", "..", ".env"),
];

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    loadDotenv({ path: envPath, override: false, quiet: true });
  }
}

export const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) return fallback;
  return parsed;
};

export const parseOptionalInteger = (value: string | undefined): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) return undefined;
  return parsed;
};

export const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") return true;
  if (normalized === "0" || normalized === "false" || normalized === "no") return false;
  return fallback;
};

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return logLevels.find((level) => level === normalized) ?? "info";
};

export const appConfig = {
  logLevel: parseLogLevel(process.env.PHENO_LOG_LEVEL),
  scoring: {
    exclusionPenalty: parseNumber(
      process.env.PHENO_EXCLUSION_PENALTY,
      DEFAULT_EXCLUSION_PENALTY,
    ),
    stabilityBonus: parseNumber(process.env.PHENO_STABILITY_BONUS, DEFAULT_STABILITY_BONUS),
    stabilityPenalty: parseNumber(
      process.env.PHENO_STABILITY_PENALTY,
      DEFAULT_STABILITY_PENALTY,
    ),
  },
  prediction: {
    minPrevalence: parseNumber(process.env.PHENO_MIN_PREVALENCE, DEFAULT_MIN_PREVALENCE),
    maxPredictions: parseNumber(process.env.PHENO_MAX_PREDICTIONS, DEFAULT_MAX_PREDICTIONS),
    maxQuestions: parseNumber(process.env.PHENO_MAX_QUESTIONS, DEFAULT_MAX_QUESTIONS),
  },
  stability: {
    core: parseNumber(process.env.PHENO_CORE_STABILITY, DEFAULT_CORE_STABILITY),
    peripheral: parseNumber(
      process.env.PHENO_PERIPHERAL_STABILITY,
      DEFAULT_PERIPHERAL_STABILITY,
    ),
  },
  data: {
    snapshotPath: process.env.PHENO_SNAPSHOT_PATH,
    moduleCount: parseOptionalInteger(process.env.PHENO_MODULE_COUNT),
  },
  cache: {
    enabled: parseBoolean(process.env.PHENO_CACHE_ENABLED, true),
    ttlMs: parseNumber(process.env.PHENO_CACHE_TTL_MS, DEFAULT_CACHE_TTL_MS),
    max: parseNumber(process.env.PHENO_CACHE_MAX, DEFAULT_CACHE_MAX),
  },
  server: {
    host: process.env.HOST ?? "0.0.0.0",
    port: parseNumber(process.env.PORT, 3000),
    sessionTtlMs: parseNumber(process.env.PHENO_SESSION_TTL_MS, DEFAULT_SESSION_TTL_MS),
    sessionMax: DEFAULT_SESSION_MAX,
  },
};

export type AppConfig = typeof appConfig;
