// ============================================
// GET /api/itinerary/quick
// ============================================
// Query-string shortcut: ?city=Cairo&country=Egypt&theme=cultural
// Everything but city and country falls back to the defaults.

import { NextRequest } from "next/server";
import { handleItineraryRequest } from "@/lib/itinerary-handler";
import { quickItineraryQuerySchema, searchParamsToObject } from "@/lib/itinerary-request";

export async function GET(request: NextRequest) {
  return handleItineraryRequest(searchParamsToObject(request.nextUrl.searchParams), quickItineraryQuerySchema);
}
