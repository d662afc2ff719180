// ============================================
// DAY ITINERARY - DOMAIN TYPES
// ============================================
// Shared shapes for the catalog, scoring, selection and scheduling stages.

// ============================================
// THEMES & CATEGORIES
// ============================================

export const THEMES = ["cultural", "adventure", "foodies", "family", "couples", "friends"] as const;

export type Theme = (typeof THEMES)[number];

export const POI_CATEGORIES = [
  "hotel",
  "tourist place",
  "restaurant",
  "market",
  "park",
  "shop",
  "entertainment",
  "other",
] as const;

export type PoiCategory = (typeof POI_CATEGORIES)[number];

// ============================================
// CATALOG
// ============================================

export interface PoiText {
  name?: string;
  shortDescription?: string;
  description: string;
}

/**
 * A point of interest as stored in the catalog. Never mutated after load.
 */
export interface Poi {
  id: string;
  name: string;
  category: PoiCategory;
  /** Type string as it appeared in the source data, before normalization */
  rawType: string;
  city: string;
  country: string;
  rating?: number;
  textEntries: Readonly<Record<string, PoiText>>;
  featureVector?: readonly number[];
}

/**
 * A POI resolved for one request language.
 */
export interface CatalogPoi {
  poi: Poi;
  /** Position in the catalog, used as the final tie-break */
  catalogIndex: number;
  displayName: string;
  text: PoiText;
  /** Language the text actually came from after fallback */
  textLanguage: string;
}

export interface LocationSummary {
  city: string;
  country: string;
  poiCount: number;
}

export interface CatalogStats {
  revision: string;
  poiCount: number;
  locationCount: number;
  defaultLanguage: string;
  hasThemeVectors: boolean;
}

// ============================================
// SCORING
// ============================================

export type ScoringMethod = "text" | "embedding+text";

export interface RelevanceBreakdown {
  keywordScore: number;
  categoryAffinity: number;
  embeddingScore: number | null;
  matchedKeywords: string[];
  method: ScoringMethod;
}

export interface RelevanceScore {
  poiId: string;
  theme: Theme;
  score: number;
  excluded: boolean;
  exclusionReason?: string;
  breakdown: RelevanceBreakdown;
  explanation: string;
}

export interface ScoredCandidate {
  candidate: CatalogPoi;
  relevance: RelevanceScore;
}

// ============================================
// REQUEST & RESULT
// ============================================

export interface ItineraryRequest {
  city: string;
  country: string;
  theme: Theme;
  planSize: number;
  /** HH:MM, 24-hour */
  startTime: string;
  /** HH:MM, 24-hour */
  endTime: string;
  language: string;
}

export interface SlotPoi {
  id: string;
  name: string;
  category: PoiCategory;
  score: number;
}

export interface ScheduledSlot {
  startTime: string;
  endTime: string;
  durationMinutes: number;
  poi: SlotPoi;
  relevanceScore: number;
}

export interface Itinerary {
  city: string;
  country: string;
  theme: Theme;
  language: string;
  startTime: string;
  endTime: string;
  requestedSize: number;
  slotCount: number;
  /** True when the catalog could not fill the requested plan size */
  isReduced: boolean;
  slots: ScheduledSlot[];
}

export type ItineraryErrorCode =
  | "NO_POIS_FOUND"
  | "NO_HOTEL_AVAILABLE"
  | "INSUFFICIENT_CANDIDATES"
  | "INVALID_WINDOW"
  | "SCHEDULING_INVARIANT_VIOLATION";

export interface ItineraryError {
  code: ItineraryErrorCode;
  message: string;
  details?: Record<string, string | number | boolean>;
}

export type GenerateItineraryResult =
  | { success: true; itinerary: Itinerary }
  | { success: false; error: ItineraryError };
