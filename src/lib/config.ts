// ============================================
// RUNTIME CONFIGURATION
// ============================================
// Environment-driven settings with typed defaults. Read on demand so tests
// can override process.env before creating services.

import path from "path";

export interface ItineraryConfig {
  /** Absolute path to the catalog JSON file */
  catalogPath: string;
  defaultLanguage: string;
  /** Slot boundaries are floored to this many minutes (1 = exact minutes) */
  slotGranularityMinutes: number;
  keywordWeight: number;
  embeddingWeight: number;
  scoreCacheTtlMs: number;
  scoreCacheMaxEntries: number;
  embeddingModel: string;
}

export const DEFAULT_CONFIG: ItineraryConfig = {
  catalogPath: path.join(process.cwd(), "data", "catalog", "pois.json"),
  defaultLanguage: "en",
  slotGranularityMinutes: 1,
  keywordWeight: 0.7,
  embeddingWeight: 0.5,
  scoreCacheTtlMs: 30 * 60 * 1000, // 30 minutes
  scoreCacheMaxEntries: 5000,
  embeddingModel: "text-embedding-3-small",
};

function readNumber(name: string, fallback: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    console.warn(`[Config] Ignoring ${name}=${raw}, expected a number in [${min}, ${max}]`);
    return fallback;
  }
  return value;
}

function readString(name: string, fallback: string): string {
  const raw = process.env[name]?.trim();
  return raw ? raw : fallback;
}

export function getItineraryConfig(): ItineraryConfig {
  const catalogPath = readString("CATALOG_PATH", DEFAULT_CONFIG.catalogPath);

  return {
    catalogPath: path.resolve(process.cwd(), catalogPath),
    defaultLanguage: readString("DEFAULT_LANGUAGE", DEFAULT_CONFIG.defaultLanguage).toLowerCase(),
    slotGranularityMinutes: Math.floor(
      readNumber("SLOT_GRANULARITY_MINUTES", DEFAULT_CONFIG.slotGranularityMinutes, 1, 240)
    ),
    keywordWeight: readNumber("KEYWORD_WEIGHT", DEFAULT_CONFIG.keywordWeight, 0, 1),
    embeddingWeight: readNumber("EMBEDDING_WEIGHT", DEFAULT_CONFIG.embeddingWeight, 0, 1),
    scoreCacheTtlMs: readNumber("SCORE_CACHE_TTL_MS", DEFAULT_CONFIG.scoreCacheTtlMs, 0, 7 * 24 * 60 * 60 * 1000),
    scoreCacheMaxEntries: Math.floor(
      readNumber("SCORE_CACHE_MAX_ENTRIES", DEFAULT_CONFIG.scoreCacheMaxEntries, 1, 1_000_000)
    ),
    embeddingModel: readString("EMBEDDING_MODEL", DEFAULT_CONFIG.embeddingModel),
  };
}
