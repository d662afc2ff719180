// ============================================
// CATALOG STORE
// ============================================
// Read-only access to the POI catalog. The JSON file is loaded and validated
// once per process; lookups afterwards are synchronous and side-effect free.

import { promises as fs } from "fs";
import { catalogFileSchema, formatSchemaIssues } from "./catalog-schema";
import type { CatalogFile } from "./catalog-schema";
import { getItineraryConfig } from "./config";
import { normalizeCategory } from "./poi-category";
import type {
  CatalogPoi,
  CatalogStats,
  LocationSummary,
  Poi,
  PoiText,
  Theme,
} from "@/types";

// ============================================
// TYPES
// ============================================

export interface PoiQuery {
  city: string;
  country: string;
  language: string;
}

export interface CatalogData {
  version: string;
  defaultLanguage: string;
  pois: Poi[];
  themeVectors?: Partial<Record<Theme, readonly number[]>>;
}

export interface CatalogStore {
  readonly revision: string;
  readonly defaultLanguage: string;
  findPois(query: PoiQuery): CatalogPoi[];
  listLocations(): LocationSummary[];
  suggestLocations(partialCity?: string, partialCountry?: string, limit?: number): LocationSummary[];
  getThemeVector(theme: Theme): readonly number[] | undefined;
  getStats(): CatalogStats;
}

export class CatalogLoadError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CatalogLoadError";
  }
}

const DEFAULT_SUGGESTION_LIMIT = 20;

// ============================================
// HELPERS
// ============================================

function normalizeKey(value: string): string {
  return value.trim().toLowerCase();
}

function locationKey(city: string, country: string): string {
  return `${normalizeKey(city)}|${normalizeKey(country)}`;
}

/**
 * Requested language, then its base ("pt-br" -> "pt"), then the catalog
 * default, then whatever the POI has first.
 */
function resolveText(poi: Poi, language: string, defaultLanguage: string): { text: PoiText; language: string } {
  const requested = normalizeKey(language);
  const candidates = [requested, requested.split("-")[0], defaultLanguage];

  for (const candidate of candidates) {
    const text = poi.textEntries[candidate];
    if (text) return { text, language: candidate };
  }

  const [firstLanguage] = Object.keys(poi.textEntries);
  if (firstLanguage !== undefined) {
    const text = poi.textEntries[firstLanguage];
    if (text) return { text, language: firstLanguage };
  }

  return { text: { name: poi.name, description: "" }, language: defaultLanguage };
}

// ============================================
// IN-MEMORY STORE
// ============================================

export class InMemoryCatalogStore implements CatalogStore {
  readonly revision: string;
  readonly defaultLanguage: string;

  private readonly byLocation = new Map<string, Array<{ poi: Poi; catalogIndex: number }>>();
  private readonly locations: LocationSummary[] = [];
  private readonly themeVectors: Partial<Record<Theme, readonly number[]>>;
  private readonly poiCount: number;

  constructor(data: CatalogData) {
    this.revision = data.version;
    this.defaultLanguage = normalizeKey(data.defaultLanguage);
    this.themeVectors = data.themeVectors ?? {};
    this.poiCount = data.pois.length;

    const display = new Map<string, LocationSummary>();
    data.pois.forEach((poi, catalogIndex) => {
      const key = locationKey(poi.city, poi.country);
      const bucket = this.byLocation.get(key);
      if (bucket) {
        bucket.push({ poi, catalogIndex });
      } else {
        this.byLocation.set(key, [{ poi, catalogIndex }]);
      }

      const summary = display.get(key);
      if (summary) {
        summary.poiCount++;
      } else {
        display.set(key, { city: poi.city.trim(), country: poi.country.trim(), poiCount: 1 });
      }
    });

    this.locations = Array.from(display.values()).sort(
      (a, b) => b.poiCount - a.poiCount || a.city.localeCompare(b.city) || a.country.localeCompare(b.country)
    );
  }

  findPois(query: PoiQuery): CatalogPoi[] {
    const bucket = this.byLocation.get(locationKey(query.city, query.country));
    if (!bucket) return [];

    return bucket.map(({ poi, catalogIndex }) => {
      const resolved = resolveText(poi, query.language, this.defaultLanguage);
      return {
        poi,
        catalogIndex,
        displayName: resolved.text.name ?? poi.name,
        text: resolved.text,
        textLanguage: resolved.language,
      };
    });
  }

  listLocations(): LocationSummary[] {
    return this.locations.map((location) => ({ ...location }));
  }

  suggestLocations(
    partialCity = "",
    partialCountry = "",
    limit: number = DEFAULT_SUGGESTION_LIMIT
  ): LocationSummary[] {
    const city = normalizeKey(partialCity);
    const country = normalizeKey(partialCountry);

    return this.locations
      .filter(
        (location) =>
          (!city || location.city.toLowerCase().includes(city)) &&
          (!country || location.country.toLowerCase().includes(country))
      )
      .slice(0, limit)
      .map((location) => ({ ...location }));
  }

  getThemeVector(theme: Theme): readonly number[] | undefined {
    return this.themeVectors[theme];
  }

  getStats(): CatalogStats {
    return {
      revision: this.revision,
      poiCount: this.poiCount,
      locationCount: this.locations.length,
      defaultLanguage: this.defaultLanguage,
      hasThemeVectors: Object.keys(this.themeVectors).length > 0,
    };
  }
}

// ============================================
// LOADING
// ============================================

export function catalogFileToData(file: CatalogFile): CatalogData {
  return {
    version: file.version,
    defaultLanguage: file.defaultLanguage,
    themeVectors: file.themeVectors,
    pois: file.pois.map((record) => ({
      id: record.id,
      name: record.name,
      category: normalizeCategory(record.type),
      rawType: record.type,
      city: record.city,
      country: record.country,
      rating: record.rating,
      textEntries: record.texts,
      featureVector: record.featureVector,
    })),
  };
}

export async function readCatalogFile(filePath: string): Promise<CatalogFile> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new CatalogLoadError(`Catalog file not readable: ${filePath}`, filePath, [], { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new CatalogLoadError(`Catalog file is not valid JSON: ${filePath}`, filePath, [], { cause: error });
  }

  const parsed = catalogFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = formatSchemaIssues(parsed.error);
    throw new CatalogLoadError(`Catalog file failed validation (${issues.length} issues)`, filePath, issues);
  }
  return parsed.data;
}

export async function loadCatalogStore(filePath: string): Promise<InMemoryCatalogStore> {
  const startTime = Date.now();
  const file = await readCatalogFile(filePath);
  const store = new InMemoryCatalogStore(catalogFileToData(file));
  const stats = store.getStats();

  console.log(
    `[Catalog] Loaded ${stats.poiCount} POIs across ${stats.locationCount} locations ` +
      `(revision ${stats.revision}) in ${Date.now() - startTime}ms`
  );
  return store;
}

// ============================================
// SINGLETON INSTANCE
// ============================================

let catalogPromise: Promise<InMemoryCatalogStore> | null = null;

/**
 * Shared catalog for the process. A failed load is not memoized so the next
 * request retries.
 */
export function getCatalogStore(): Promise<InMemoryCatalogStore> {
  if (!catalogPromise) {
    const { catalogPath } = getItineraryConfig();
    catalogPromise = loadCatalogStore(catalogPath).catch((error: unknown) => {
      catalogPromise = null;
      console.error("[Catalog] Failed to load catalog:", error);
      throw error;
    });
  }
  return catalogPromise;
}

/**
 * Create a store from in-memory data (for testing)
 */
export function createCatalogStore(data: CatalogData): InMemoryCatalogStore {
  return new InMemoryCatalogStore(data);
}

export function resetCatalogStore(): void {
  catalogPromise = null;
}
