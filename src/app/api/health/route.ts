// ============================================
// GET /api/health
// ============================================
// Reports whether the catalog loads, how much it holds and how the score
// cache is doing.

import { generateRequestId, jsonError, jsonSuccess } from "@/lib/api-response";
import { getItineraryAssembler } from "@/lib/itinerary-assembler";

export async function GET() {
  const requestId = generateRequestId();

  try {
    const assembler = await getItineraryAssembler();
    return jsonSuccess(
      {
        status: "healthy",
        catalog: assembler.getStore().getStats(),
        scoreCache: assembler.getScoreCacheStats(),
      },
      requestId
    );
  } catch (error) {
    return jsonError(
      "CATALOG_UNAVAILABLE",
      error instanceof Error ? error.message : "Catalog failed to load",
      503,
      requestId
    );
  }
}
