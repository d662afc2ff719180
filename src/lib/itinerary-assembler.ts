// ============================================
// ITINERARY ASSEMBLER
// ============================================
// Entry point for generating a single-day itinerary. Wires together:
// - Catalog Store (POIs for the city)
// - Relevance Scorer (theme fit)
// - Candidate Selector (hotel + diverse activities)
// - Slot Scheduler (contiguous whole-minute slots)
// and checks the global invariants before returning.
//
// Synchronous once the catalog is loaded. Classified failures come back as
// { success: false, error }; nothing here throws for them.

import { getCatalogStore } from "./catalog-store";
import type { CatalogStore } from "./catalog-store";
import { createCandidateSelector } from "./candidate-selector";
import type { CandidateSelector } from "./candidate-selector";
import { getItineraryConfig } from "./config";
import { validateItinerarySlots } from "./itinerary-validation";
import type { CacheStats } from "./cache";
import { CachedRelevanceScorer, createRelevanceScorer } from "./relevance-scorer";
import type { ScoringContext, ThemeScorer } from "./relevance-scorer";
import { parseTimeWindow, SlotScheduler } from "./slot-scheduler";
import type { GenerateItineraryResult, ItineraryError, ItineraryRequest } from "@/types";

// ============================================
// TYPES
// ============================================

export interface AssemblerOptions {
  scorer?: ThemeScorer;
  /** Slot boundaries are floored to this many minutes; 1 keeps exact minutes */
  slotGranularityMinutes?: number;
}

export interface ScoreCacheReport extends CacheStats {
  hitRate: number;
}

function failure(error: ItineraryError): GenerateItineraryResult {
  return { success: false, error };
}

// ============================================
// ASSEMBLER SERVICE
// ============================================

export class ItineraryAssembler {
  private scorer: ThemeScorer;
  private selector: CandidateSelector;
  private scheduler: SlotScheduler;

  constructor(
    private readonly store: CatalogStore,
    options: AssemblerOptions = {}
  ) {
    this.scorer = options.scorer ?? createRelevanceScorer();
    this.selector = createCandidateSelector(this.scorer);
    this.scheduler = new SlotScheduler(options.slotGranularityMinutes ?? 1);
  }

  getStore(): CatalogStore {
    return this.store;
  }

  /**
   * Hit/miss figures of the score cache, or null for an uncached scorer
   */
  getScoreCacheStats(): ScoreCacheReport | null {
    if (!(this.scorer instanceof CachedRelevanceScorer)) return null;
    const cache = this.scorer.getCache();
    return { ...cache.getStats(), hitRate: cache.getHitRate() };
  }

  /**
   * Release the score cache and its cleanup timer
   */
  dispose(): void {
    if (this.scorer instanceof CachedRelevanceScorer) {
      this.scorer.getCache().destroy();
    }
  }

  /**
   * Build the itinerary for one request
   */
  generateItinerary(request: ItineraryRequest): GenerateItineraryResult {
    const startTime = Date.now();
    const result = this.assemble(request);

    if (result.success) {
      const { itinerary } = result;
      console.log(
        `[Assembler] ${itinerary.slotCount}/${itinerary.requestedSize} slots for ` +
          `${request.city}, ${request.country} (${request.theme}) in ${Date.now() - startTime}ms`
      );
    } else if (result.error.code === "SCHEDULING_INVARIANT_VIOLATION") {
      console.error(`[Assembler] Invariant violation for ${request.city}, ${request.country}:`, result.error);
    } else {
      console.log(`[Assembler] ${result.error.code} for ${request.city}, ${request.country}: ${result.error.message}`);
    }

    return result;
  }

  private assemble(request: ItineraryRequest): GenerateItineraryResult {
    // Step 1: Time window
    const windowResult = parseTimeWindow(request.startTime, request.endTime);
    if (!windowResult.success) return failure(windowResult.error);
    const { window } = windowResult;

    // Step 2: Catalog read
    const candidates = this.store.findPois({
      city: request.city,
      country: request.country,
      language: request.language,
    });
    if (candidates.length === 0) {
      return failure({
        code: "NO_POIS_FOUND",
        message: `No points of interest found for ${request.city}, ${request.country}`,
      });
    }

    // Step 3: Selection
    const context: ScoringContext = {
      theme: request.theme,
      defaultLanguage: this.store.defaultLanguage,
      revision: this.store.revision,
      themeVector: this.store.getThemeVector(request.theme),
    };
    const selectionResult = this.selector.select({ candidates, planSize: request.planSize, context });
    if (!selectionResult.success) return failure(selectionResult.error);

    const { selection } = selectionResult;
    const ordered = [selection.hotel, ...selection.activities];

    if (selection.backfilledCount > 0) {
      console.log(
        `[Assembler] Backfilled ${selection.backfilledCount} activities past the per-category cap of ${selection.diversityCap}`
      );
    }

    // Step 4: Scheduling
    const scheduleResult = this.scheduler.schedule(ordered, window);
    if (!scheduleResult.success) return failure(scheduleResult.error);
    const { slots } = scheduleResult;

    // Step 5: Invariants
    const violations = validateItinerarySlots(slots, window, ordered.length);
    if (violations.length > 0) {
      return failure({
        code: "SCHEDULING_INVARIANT_VIOLATION",
        message: violations.map((violation) => violation.message).join("; "),
        details: { violationCount: violations.length, rules: violations.map((v) => v.rule).join(",") },
      });
    }

    return {
      success: true,
      itinerary: {
        city: candidates[0].poi.city,
        country: candidates[0].poi.country,
        theme: request.theme,
        language: request.language,
        startTime: slots[0].startTime,
        endTime: slots[slots.length - 1].endTime,
        requestedSize: request.planSize,
        slotCount: slots.length,
        isReduced: slots.length < request.planSize,
        slots,
      },
    };
  }
}

// ============================================
// FACTORY FUNCTIONS
// ============================================

let assemblerInstance: ItineraryAssembler | null = null;

/**
 * Shared assembler over the process catalog, with the cached scorer and
 * settings from the environment.
 */
export async function getItineraryAssembler(): Promise<ItineraryAssembler> {
  const store = await getCatalogStore();
  if (!assemblerInstance || assemblerInstance.getStore() !== store) {
    assemblerInstance?.dispose();
    const config = getItineraryConfig();
    assemblerInstance = new ItineraryAssembler(store, {
      scorer: createRelevanceScorer(
        { keyword: config.keywordWeight, embedding: config.embeddingWeight },
        { ttlMs: config.scoreCacheTtlMs, maxSize: config.scoreCacheMaxEntries }
      ),
      slotGranularityMinutes: config.slotGranularityMinutes,
    });
  }
  return assemblerInstance;
}

export function createItineraryAssembler(store: CatalogStore, options?: AssemblerOptions): ItineraryAssembler {
  return new ItineraryAssembler(store, options);
}

export function resetItineraryAssembler(): void {
  assemblerInstance?.dispose();
  assemblerInstance = null;
}

/**
 * One-shot generation against a given store
 */
export function generateItinerary(
  request: ItineraryRequest,
  store: CatalogStore,
  options?: AssemblerOptions
): GenerateItineraryResult {
  return new ItineraryAssembler(store, options).generateItinerary(request);
}
