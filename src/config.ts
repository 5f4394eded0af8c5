import os from "node:os";
import path from "node:path";
import type { EngineConfig } from "./types.js";
import { log } from "./logger.js";

const DEFAULT_DB_PATH = path.join(
  process.env.HOME ?? os.homedir(),
  ".context-engine",
  "conversations.db",
);

const DEFAULT_LOOKBACK_LIMIT = 25;
const DEFAULT_SESSION_GAP_MINUTES = 60;
const DEFAULT_MAX_HISTORY = 5;

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) {
      throw new Error(`Environment variable ${envVar} is not set`);
    }
    return envValue;
  });
}

function boundedInt(
  value: unknown,
  key: string,
  min: number,
  max: number,
  fallback: number,
): number {
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    log.warn(`ignoring ${key}: expected an integer`);
    return fallback;
  }
  if (value < min || value > max) {
    log.warn(`ignoring ${key}=${value}: must be between ${min} and ${max}`);
    return fallback;
  }
  return value;
}

export function parseConfig(raw: unknown): EngineConfig {
  const cfg =
    raw && typeof raw === "object" && !Array.isArray(raw)
      ? (raw as Record<string, unknown>)
      : {};

  let dbPath: string;
  if (typeof cfg.dbPath === "string" && cfg.dbPath.length > 0) {
    dbPath = resolveEnvVars(cfg.dbPath);
  } else {
    dbPath = process.env.CONTEXT_ENGINE_DB_PATH || DEFAULT_DB_PATH;
  }

  return {
    dbPath,
    // Session detection
    lookbackLimit: boundedInt(cfg.lookbackLimit, "lookbackLimit", 1, 100, DEFAULT_LOOKBACK_LIMIT),
    sessionGapMinutes: boundedInt(
      cfg.sessionGapMinutes,
      "sessionGapMinutes",
      1,
      1440,
      DEFAULT_SESSION_GAP_MINUTES,
    ),
    // Plain "last N" reads
    maxHistory: boundedInt(cfg.maxHistory, "maxHistory", 1, 50, DEFAULT_MAX_HISTORY),
    debug: cfg.debug === true,
  };
}
