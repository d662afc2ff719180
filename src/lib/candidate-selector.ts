// ============================================
// CANDIDATE SELECTOR
// ============================================
// Turns the POIs of one city into an ordered shortlist:
// [hotel, activity_1, ..., activity_k] with k <= planSize - 1.
//
// Ranking: relevance desc, then rating desc (unrated last), then catalog order.
// Diversity: no category may exceed ceil((planSize - 1) / distinctCategories)
// on the first pass. If that leaves the plan short while the city has enough
// qualifying activities, skipped candidates are backfilled in rank order.
// A city with too few activities keeps the cap and gets a shorter plan.

import { isHotelCategory } from "./poi-category";
import type { ScoringContext, ThemeScorer } from "./relevance-scorer";
import type { CatalogPoi, ItineraryError, PoiCategory, ScoredCandidate } from "@/types";

// ============================================
// TYPES
// ============================================

export interface SelectionInput {
  candidates: CatalogPoi[];
  planSize: number;
  context: ScoringContext;
}

export interface CandidateSelection {
  hotel: ScoredCandidate;
  activities: ScoredCandidate[];
  /** Per-category limit applied on the first pass (0 when no activities are needed) */
  diversityCap: number;
  /** Activities admitted past the diversity cap to fill the plan */
  backfilledCount: number;
  /** Activities dropped by theme exclusions */
  excludedCount: number;
}

export type SelectionResult =
  | { success: true; selection: CandidateSelection }
  | { success: false; error: ItineraryError };

// ============================================
// RANKING
// ============================================

export function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  const byScore = b.relevance.score - a.relevance.score;
  if (byScore !== 0) return byScore;

  const byRating = (b.candidate.poi.rating ?? -1) - (a.candidate.poi.rating ?? -1);
  if (byRating !== 0) return byRating;

  return a.candidate.catalogIndex - b.candidate.catalogIndex;
}

export function computeDiversityCap(needed: number, distinctCategories: number): number {
  if (needed <= 0 || distinctCategories <= 0) return 0;
  return Math.ceil(needed / distinctCategories);
}

// ============================================
// DIVERSITY
// ============================================

/**
 * First pass under the per-category cap, then rank-order backfill. The cap
 * is only broken when `ranked` can fill all `needed` places.
 */
export function applyDiversityCap(
  ranked: ScoredCandidate[],
  needed: number,
  cap: number
): { admitted: ScoredCandidate[]; backfilledCount: number } {
  const admitted = new Set<ScoredCandidate>();
  const perCategory = new Map<PoiCategory, number>();

  for (const item of ranked) {
    if (admitted.size >= needed) break;
    const category = item.candidate.poi.category;
    const count = perCategory.get(category) ?? 0;
    if (count < cap) {
      admitted.add(item);
      perCategory.set(category, count + 1);
    }
  }

  let backfilledCount = 0;
  if (ranked.length >= needed) {
    for (const item of ranked) {
      if (admitted.size >= needed) break;
      if (!admitted.has(item)) {
        admitted.add(item);
        backfilledCount++;
      }
    }
  }

  // Preserve rank order regardless of which pass admitted an item
  return { admitted: ranked.filter((item) => admitted.has(item)), backfilledCount };
}

function countCategories(items: ScoredCandidate[]): Map<PoiCategory, number> {
  const counts = new Map<PoiCategory, number>();
  for (const item of items) {
    const category = item.candidate.poi.category;
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }
  return counts;
}

/**
 * Can `rest` still be laid out with no two neighbours sharing a category,
 * given the item placed just before it?
 */
function canSeparate(rest: ScoredCandidate[], previous: PoiCategory): boolean {
  const n = rest.length;
  for (const [category, count] of countCategories(rest)) {
    const limit = category === previous ? Math.floor(n / 2) : Math.ceil(n / 2);
    if (count > limit) return false;
  }
  return true;
}

/**
 * Reorders a ranked list so neighbours differ in category whenever some
 * arrangement allows it. Picks the best-ranked item that keeps the rest
 * separable, so rank order survives where it can.
 */
export function spreadCategories(ranked: ScoredCandidate[]): ScoredCandidate[] {
  const remaining = [...ranked];
  const ordered: ScoredCandidate[] = [];
  let previous: PoiCategory | null = null;

  while (remaining.length > 0) {
    let pick = -1;
    let fallback = -1;

    for (let i = 0; i < remaining.length; i++) {
      const category = remaining[i].candidate.poi.category;
      if (category === previous) continue;
      if (fallback === -1) fallback = i;

      const rest = remaining.filter((_, index) => index !== i);
      if (canSeparate(rest, category)) {
        pick = i;
        break;
      }
    }

    const index = pick !== -1 ? pick : fallback !== -1 ? fallback : 0;
    const [chosen] = remaining.splice(index, 1);
    ordered.push(chosen);
    previous = chosen.candidate.poi.category;
  }

  return ordered;
}

// ============================================
// SELECTION
// ============================================

export class CandidateSelector {
  constructor(private readonly scorer: ThemeScorer) {}

  select(input: SelectionInput): SelectionResult {
    const { candidates, planSize, context } = input;

    const scored: ScoredCandidate[] = candidates.map((candidate) => ({
      candidate,
      relevance: this.scorer.score(candidate, context),
    }));

    const hotels = scored.filter((item) => isHotelCategory(item.candidate.poi.category)).sort(compareCandidates);
    const activities = scored.filter((item) => !isHotelCategory(item.candidate.poi.category));

    // Exclusions only govern activities; the single hotel is always kept
    const hotel = hotels[0];
    if (!hotel) {
      return {
        success: false,
        error: {
          code: "NO_HOTEL_AVAILABLE",
          message: "No hotel found for this location",
          details: { candidateCount: candidates.length },
        },
      };
    }

    const qualifying = activities.filter((item) => !item.relevance.excluded).sort(compareCandidates);
    const excludedCount = activities.length - qualifying.length;
    const needed = Math.max(0, planSize - 1);

    if (needed > 0 && qualifying.length === 0) {
      return {
        success: false,
        error: {
          code: "INSUFFICIENT_CANDIDATES",
          message: `No activities available for a ${context.theme} plan`,
          details: { activityCount: activities.length, excludedCount },
        },
      };
    }

    const distinctCategories = new Set(qualifying.map((item) => item.candidate.poi.category)).size;
    const diversityCap = computeDiversityCap(needed, distinctCategories);
    const { admitted, backfilledCount } = applyDiversityCap(qualifying, needed, diversityCap);

    return {
      success: true,
      selection: {
        hotel,
        activities: spreadCategories(admitted),
        diversityCap,
        backfilledCount,
        excludedCount,
      },
    };
  }
}

export function createCandidateSelector(scorer: ThemeScorer): CandidateSelector {
  return new CandidateSelector(scorer);
}
