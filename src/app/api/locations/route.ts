import { NextRequest } from "next/server";
import {
  generateRequestId,
  jsonSuccess,
  jsonUnexpectedError,
  jsonValidationError,
} from "@/lib/api-response";
import { getCatalogStore } from "@/lib/catalog-store";
import { locationQuerySchema, searchParamsToObject } from "@/lib/itinerary-request";

/**
 * GET /api/locations
 * All catalog locations by POI count, or suggestions when ?city= / ?country=
 * fragments are given.
 */
export async function GET(request: NextRequest) {
  const requestId = generateRequestId();
  const parsed = locationQuerySchema.safeParse(searchParamsToObject(request.nextUrl.searchParams));
  if (!parsed.success) {
    return jsonValidationError(parsed.error, requestId);
  }

  try {
    const store = await getCatalogStore();
    const { city, country, limit } = parsed.data;
    const locations =
      city || country ? store.suggestLocations(city, country, limit) : store.listLocations().slice(0, limit);

    return jsonSuccess({ locations, total: locations.length }, requestId);
  } catch (error) {
    console.error("[Locations API] Error:", error);
    return jsonUnexpectedError(error, requestId, "Failed to list locations");
  }
}
