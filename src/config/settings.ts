import type { LogLevel } from "../logger.js";
import { readEnum, readInt, readOptionalString } from "./env.js";

/** Library defaults resolved from the environment. */
export interface DigraphSettings {
  /** Exclusive weight bound used by `makeGraph` when none is given. */
  readonly maxWeight: number;
  /** Capacity of the eccentricity cache created by `GraphMetrics`. */
  readonly cacheCapacity: number;
  /** Seed token for the default random source; `null` keeps `Math.random`. */
  readonly randomSeed: string | null;
  /** Minimum level emitted by loggers created without an explicit level. */
  readonly logLevel: LogLevel;
}

export const DEFAULT_SETTINGS: DigraphSettings = Object.freeze({
  maxWeight: 100,
  cacheCapacity: 512,
  randomSeed: null,
  logLevel: "info",
});

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Reads `DIGRAPH_*` variables on every call so tests can override them
 * without reloading modules. Invalid values keep the defaults.
 */
export function loadSettings(): DigraphSettings {
  return {
    maxWeight: readInt("DIGRAPH_MAX_WEIGHT", DEFAULT_SETTINGS.maxWeight, { min: 1 }),
    cacheCapacity: readInt("DIGRAPH_ECCENTRICITY_CACHE_SIZE", DEFAULT_SETTINGS.cacheCapacity, { min: 1 }),
    randomSeed: readOptionalString("DIGRAPH_RANDOM_SEED") ?? DEFAULT_SETTINGS.randomSeed,
    logLevel: readEnum("DIGRAPH_LOG_LEVEL", LOG_LEVELS, DEFAULT_SETTINGS.logLevel),
  };
}
