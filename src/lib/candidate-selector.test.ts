/**
 * Unit Tests for the Candidate Selector
 *
 * Tests:
 * 1. Ranking and tie-breaks (score, rating, catalog order)
 * 2. Diversity cap with rank-order backfill
 * 3. Category spreading between neighbouring activities
 * 4. Hotel choice and failure cases
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  CandidateSelector,
  applyDiversityCap,
  compareCandidates,
  computeDiversityCap,
  spreadCategories,
} from "./candidate-selector";
import type { ThemeScorer } from "./relevance-scorer";
import {
  createMockContext,
  createMockHotel,
  createMockPoi,
  createMockRelevance,
  createMockScored,
  createMockStore,
  resetIdCounter,
} from "./__tests__/mock-factories";
import type { Poi } from "@/types";

// ============================================
// TEST FIXTURES
// ============================================

function createStubScorer(scores: Record<string, number>, excluded: string[] = []): ThemeScorer {
  return {
    score: (candidate, context) =>
      createMockRelevance(candidate.poi.id, scores[candidate.poi.id] ?? 0, {
        theme: context.theme,
        excluded: excluded.includes(candidate.poi.id),
      }),
  };
}

function candidatesFor(pois: Poi[]) {
  return createMockStore(pois).findPois({ city: "Cairo", country: "Egypt", language: "en" });
}

const museumA = createMockScored(createMockPoi({ id: "museum-a" }), 0.9, 0);
const museumB = createMockScored(createMockPoi({ id: "museum-b" }), 0.8, 1);
const museumC = createMockScored(createMockPoi({ id: "museum-c" }), 0.7, 2);
const diner = createMockScored(createMockPoi({ id: "diner", category: "restaurant" }), 0.1, 3);
const bazaar = createMockScored(createMockPoi({ id: "bazaar", category: "market" }), 0.6, 4);
const garden = createMockScored(createMockPoi({ id: "garden", category: "park" }), 0.5, 5);

const ids = (items: { candidate: { poi: { id: string } } }[]) => items.map((item) => item.candidate.poi.id);

// ============================================
// RANKING
// ============================================

describe("compareCandidates", () => {
  it("should rank by score first", () => {
    expect([museumB, museumA].sort(compareCandidates)).toEqual([museumA, museumB]);
  });

  it("should break score ties by rating, unrated last", () => {
    const rated = createMockScored(createMockPoi({ id: "rated", rating: 4.5 }), 0.5, 3);
    const lower = createMockScored(createMockPoi({ id: "lower", rating: 3.0 }), 0.5, 1);
    const unrated = createMockScored(createMockPoi({ id: "unrated" }), 0.5, 0);

    expect(ids([unrated, lower, rated].sort(compareCandidates))).toEqual(["rated", "lower", "unrated"]);
  });

  it("should fall back to catalog order", () => {
    const first = createMockScored(createMockPoi({ id: "first" }), 0.5, 0);
    const second = createMockScored(createMockPoi({ id: "second" }), 0.5, 1);

    expect(ids([second, first].sort(compareCandidates))).toEqual(["first", "second"]);
  });
});

// ============================================
// DIVERSITY
// ============================================

describe("Diversity", () => {
  it("should compute the per-category cap", () => {
    expect(computeDiversityCap(2, 5)).toBe(1);
    expect(computeDiversityCap(5, 2)).toBe(3);
    expect(computeDiversityCap(0, 3)).toBe(0);
  });

  it("should admit at most the cap per category when alternatives exist", () => {
    const { admitted, backfilledCount } = applyDiversityCap([museumA, museumB, diner], 2, 1);

    expect(ids(admitted)).toEqual(["museum-a", "diner"]);
    expect(backfilledCount).toBe(0);
  });

  it("should backfill skipped candidates in rank order to reach the target", () => {
    const { admitted, backfilledCount } = applyDiversityCap([museumA, museumB, museumC, diner], 4, 2);

    expect(ids(admitted)).toEqual(["museum-a", "museum-b", "museum-c", "diner"]);
    expect(backfilledCount).toBe(1);
  });

  it("should stop when the list is exhausted", () => {
    const { admitted } = applyDiversityCap([museumA, diner], 5, 3);
    expect(ids(admitted)).toEqual(["museum-a", "diner"]);
  });

  it("should keep the cap when the list cannot fill the target anyway", () => {
    const { admitted, backfilledCount } = applyDiversityCap([museumA, museumB, museumC, diner], 5, 2);

    expect(ids(admitted)).toEqual(["museum-a", "museum-b", "diner"]);
    expect(backfilledCount).toBe(0);
  });
});

describe("spreadCategories", () => {
  it("should separate same-category neighbours", () => {
    expect(ids(spreadCategories([museumA, museumB, diner]))).toEqual(["museum-a", "diner", "museum-b"]);
  });

  it("should keep rank order when neighbours already differ", () => {
    expect(ids(spreadCategories([museumA, bazaar, garden]))).toEqual(["museum-a", "bazaar", "garden"]);
  });

  it("should look ahead so later items stay separable", () => {
    expect(ids(spreadCategories([museumA, museumB, bazaar, garden]))).toEqual([
      "museum-a",
      "bazaar",
      "museum-b",
      "garden",
    ]);
  });

  it("should allow repeats only when unavoidable", () => {
    expect(ids(spreadCategories([museumA, museumB, museumC, diner]))).toEqual([
      "museum-a",
      "diner",
      "museum-b",
      "museum-c",
    ]);
  });
});

// ============================================
// SELECTION
// ============================================

describe("CandidateSelector", () => {
  beforeEach(() => {
    resetIdCounter();
  });

  const hotelLow = createMockHotel({ id: "hotel-low", rating: 4.0 });
  const hotelHigh = createMockHotel({ id: "hotel-high", rating: 4.5 });
  const a = createMockPoi({ id: "a" });
  const b = createMockPoi({ id: "b" });
  const c = createMockPoi({ id: "c", category: "market" });
  const d = createMockPoi({ id: "d", category: "restaurant" });
  const e = createMockPoi({ id: "e" });

  const scores = { "hotel-low": 0.2, "hotel-high": 0.2, a: 0.9, b: 0.8, c: 0.5, d: 0.1, e: 0.7 };

  it("should put the best hotel first and pick diverse activities", () => {
    const selector = new CandidateSelector(createStubScorer(scores));
    const result = selector.select({
      candidates: candidatesFor([hotelLow, hotelHigh, a, b, c, d]),
      planSize: 3,
      context: createMockContext(),
    });

    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.selection.hotel.candidate.poi.id).toBe("hotel-high");
    expect(ids(result.selection.activities)).toEqual(["a", "c"]);
    expect(result.selection.diversityCap).toBe(1);
    expect(result.selection.backfilledCount).toBe(0);
  });

  it("should prefer the higher-scoring hotel over rating", () => {
    const selector = new CandidateSelector(createStubScorer({ ...scores, "hotel-low": 0.4 }));
    const result = selector.select({
      candidates: candidatesFor([hotelLow, hotelHigh, a]),
      planSize: 2,
      context: createMockContext(),
    });

    if (!result.success) throw new Error("expected success");
    expect(result.selection.hotel.candidate.poi.id).toBe("hotel-low");
  });

  it("should keep the hotel even when the theme excludes it", () => {
    const selector = new CandidateSelector(createStubScorer(scores, ["hotel-low", "hotel-high"]));
    const result = selector.select({
      candidates: candidatesFor([hotelLow, hotelHigh, a]),
      planSize: 2,
      context: createMockContext(),
    });

    if (!result.success) throw new Error("expected success");
    expect(result.selection.hotel.candidate.poi.id).toBe("hotel-high");
  });

  it("should backfill and spread when one category dominates", () => {
    const selector = new CandidateSelector(createStubScorer(scores));
    const result = selector.select({
      candidates: candidatesFor([hotelHigh, a, b, e, d]),
      planSize: 5,
      context: createMockContext(),
    });

    if (!result.success) throw new Error("expected success");
    expect(result.selection.diversityCap).toBe(2);
    expect(result.selection.backfilledCount).toBe(1);
    expect(ids(result.selection.activities)).toEqual(["a", "d", "b", "e"]);
  });

  it("should return fewer activities when the catalog is small", () => {
    const selector = new CandidateSelector(createStubScorer(scores));
    const result = selector.select({
      candidates: candidatesFor([hotelHigh, a, c]),
      planSize: 6,
      context: createMockContext(),
    });

    if (!result.success) throw new Error("expected success");
    expect(ids(result.selection.activities)).toEqual(["a", "c"]);
  });

  it("should drop excluded activities", () => {
    const selector = new CandidateSelector(createStubScorer(scores, ["a"]));
    const result = selector.select({
      candidates: candidatesFor([hotelHigh, a, b, c]),
      planSize: 3,
      context: createMockContext(),
    });

    if (!result.success) throw new Error("expected success");
    expect(ids(result.selection.activities)).toEqual(["b", "c"]);
    expect(result.selection.excludedCount).toBe(1);
  });

  it("should return only the hotel for a plan size of one", () => {
    const selector = new CandidateSelector(createStubScorer(scores));
    const result = selector.select({
      candidates: candidatesFor([hotelHigh]),
      planSize: 1,
      context: createMockContext(),
    });

    if (!result.success) throw new Error("expected success");
    expect(result.selection.activities).toEqual([]);
    expect(result.selection.diversityCap).toBe(0);
  });

  it("should fail without a hotel", () => {
    const selector = new CandidateSelector(createStubScorer(scores));
    const result = selector.select({
      candidates: candidatesFor([a, b]),
      planSize: 3,
      context: createMockContext(),
    });

    expect(result).toEqual({
      success: false,
      error: {
        code: "NO_HOTEL_AVAILABLE",
        message: "No hotel found for this location",
        details: { candidateCount: 2 },
      },
    });
  });

  it("should fail when activities are needed but none qualify", () => {
    const selector = new CandidateSelector(createStubScorer(scores, ["a"]));
    const result = selector.select({
      candidates: candidatesFor([hotelHigh, a]),
      planSize: 3,
      context: createMockContext({ theme: "family" }),
    });

    expect(result).toEqual({
      success: false,
      error: {
        code: "INSUFFICIENT_CANDIDATES",
        message: "No activities available for a family plan",
        details: { activityCount: 1, excludedCount: 1 },
      },
    });
  });
});
