// ============================================
// RELEVANCE SCORER
// ============================================
// Scores how well a POI fits a theme. Text scoring (keyword overlap plus
// category affinity) always runs; when the catalog carries embeddings for
// both the POI and the theme, cosine similarity is blended in.
// Pure: the same candidate and context always give the same score.

import { cacheKey, CACHE_NS, MemoryCache } from "./cache";
import { getThemeDescriptor } from "./theme-descriptors";
import type { ThemeDescriptor } from "./theme-descriptors";
import type { CatalogPoi, RelevanceScore, Theme } from "@/types";

// ============================================
// TYPES & DEFAULTS
// ============================================

export interface RelevanceWeights {
  /** Share of the text score taken by keyword overlap; the rest is category affinity */
  keyword: number;
  /** Share of the final score taken by the embedding when one is available */
  embedding: number;
}

export const DEFAULT_RELEVANCE_WEIGHTS: RelevanceWeights = {
  keyword: 0.7,
  embedding: 0.5,
};

/** Keyword hits needed for a full keyword score */
export const KEYWORD_SATURATION = 3;

export interface ScoringContext {
  theme: Theme;
  defaultLanguage: string;
  /** Catalog revision; part of the cache key */
  revision: string;
  themeVector?: readonly number[];
}

export interface ThemeScorer {
  score(candidate: CatalogPoi, context: ScoringContext): RelevanceScore;
}

// ============================================
// TEXT HELPERS
// ============================================

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const patternCache = new Map<string, RegExp>();

/**
 * Whole-word, case-insensitive, tolerant of a plural "s"/"es" suffix.
 * Multi-word terms match across any whitespace.
 */
function termPattern(term: string): RegExp {
  const cached = patternCache.get(term);
  if (cached) return cached;

  const body = term.trim().split(/\s+/).map(escapeRegExp).join("\\s+");
  const pattern = new RegExp(`\\b${body}(?:s|es)?\\b`, "i");
  patternCache.set(term, pattern);
  return pattern;
}

export function matchTerms(text: string, terms: readonly string[]): string[] {
  return terms.filter((term) => termPattern(term).test(text));
}

/**
 * Text the keyword matcher sees: type, names and descriptions in the
 * resolved language, plus the default-language entry when it differs.
 */
export function buildScoringText(candidate: CatalogPoi, defaultLanguage: string): string {
  const { poi, text, textLanguage } = candidate;
  const parts = [poi.rawType, poi.category, candidate.displayName, poi.name, text.shortDescription, text.description];

  if (textLanguage !== defaultLanguage) {
    const fallback = poi.textEntries[defaultLanguage];
    if (fallback) {
      parts.push(fallback.name, fallback.shortDescription, fallback.description);
    }
  }

  return parts.filter((part): part is string => Boolean(part)).join(" \n ");
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number | null {
  if (a.length === 0 || a.length !== b.length) return null;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return null;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

// ============================================
// SCORER
// ============================================

export class RelevanceScorer implements ThemeScorer {
  private weights: RelevanceWeights;

  constructor(weights: Partial<RelevanceWeights> = {}) {
    this.weights = { ...DEFAULT_RELEVANCE_WEIGHTS, ...weights };
  }

  score(candidate: CatalogPoi, context: ScoringContext): RelevanceScore {
    const descriptor = getThemeDescriptor(context.theme);
    const text = buildScoringText(candidate, context.defaultLanguage);

    const exclusions = matchTerms(text, descriptor.exclusions);
    if (exclusions.length > 0) {
      return this.createExcludedScore(candidate, descriptor, exclusions[0]);
    }

    const matchedKeywords = matchTerms(text, descriptor.keywords);
    const keywordScore = clamp01(matchedKeywords.length / KEYWORD_SATURATION);
    const categoryAffinity = descriptor.preferredCategories.includes(candidate.poi.category) ? 1 : 0;
    const textScore = clamp01(this.weights.keyword * keywordScore + (1 - this.weights.keyword) * categoryAffinity);

    const similarity =
      context.themeVector && candidate.poi.featureVector
        ? cosineSimilarity(candidate.poi.featureVector, context.themeVector)
        : null;
    const embeddingScore = similarity === null ? null : Math.max(0, similarity);

    const score =
      embeddingScore === null
        ? textScore
        : clamp01(this.weights.embedding * embeddingScore + (1 - this.weights.embedding) * textScore);

    return {
      poiId: candidate.poi.id,
      theme: context.theme,
      score,
      excluded: false,
      breakdown: {
        keywordScore,
        categoryAffinity,
        embeddingScore,
        matchedKeywords,
        method: embeddingScore === null ? "text" : "embedding+text",
      },
      explanation: this.generateExplanation(candidate, descriptor, matchedKeywords, categoryAffinity, embeddingScore),
    };
  }

  private createExcludedScore(candidate: CatalogPoi, descriptor: ThemeDescriptor, term: string): RelevanceScore {
    return {
      poiId: candidate.poi.id,
      theme: descriptor.theme,
      score: 0,
      excluded: true,
      exclusionReason: `Excluded for ${descriptor.label} trips: ${term}`,
      breakdown: {
        keywordScore: 0,
        categoryAffinity: 0,
        embeddingScore: null,
        matchedKeywords: [],
        method: "text",
      },
      explanation: `Not suitable for ${descriptor.label} trips (${term})`,
    };
  }

  private generateExplanation(
    candidate: CatalogPoi,
    descriptor: ThemeDescriptor,
    matchedKeywords: string[],
    categoryAffinity: number,
    embeddingScore: number | null
  ): string {
    const reasons: string[] = [];

    if (matchedKeywords.length > 0) {
      reasons.push(`mentions ${matchedKeywords.join(", ")}`);
    }
    if (categoryAffinity > 0) {
      reasons.push(`${candidate.poi.category} suits ${descriptor.label} trips`);
    }
    if (embeddingScore !== null && embeddingScore >= 0.5) {
      reasons.push("closely matches the theme description");
    }

    return reasons.length > 0 ? `Chosen because: ${reasons.join("; ")}` : "General interest stop";
  }
}

// ============================================
// CACHED SCORER
// ============================================

/**
 * Read-through cache in front of another scorer. Keys include the catalog
 * revision, so a reloaded catalog never sees stale scores.
 */
export class CachedRelevanceScorer implements ThemeScorer {
  constructor(
    private readonly inner: ThemeScorer,
    private readonly cache: MemoryCache<RelevanceScore>
  ) {}

  score(candidate: CatalogPoi, context: ScoringContext): RelevanceScore {
    const key = cacheKey(
      CACHE_NS.RELEVANCE,
      context.revision,
      candidate.poi.id,
      context.theme,
      candidate.textLanguage
    );
    return this.cache.getOrCompute(key, () => this.inner.score(candidate, context));
  }

  getCache(): MemoryCache<RelevanceScore> {
    return this.cache;
  }
}

/**
 * Create a scorer, optionally behind a score cache
 */
export function createRelevanceScorer(
  weights: Partial<RelevanceWeights> = {},
  cacheOptions?: { ttlMs: number; maxSize: number }
): ThemeScorer {
  const scorer = new RelevanceScorer(weights);
  if (!cacheOptions) return scorer;
  return new CachedRelevanceScorer(scorer, new MemoryCache<RelevanceScore>(cacheOptions));
}
