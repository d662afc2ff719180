// ============================================
// POST /api/itinerary
// ============================================
// Generates a single-day itinerary for a city and theme.
// Body: { city, country, theme, plan_size?, start_time?, end_time?, language? }

import { NextRequest } from "next/server";
import { generateRequestId, jsonError } from "@/lib/api-response";
import { handleItineraryRequest } from "@/lib/itinerary-handler";
import { itineraryRequestSchema } from "@/lib/itinerary-request";

export async function POST(request: NextRequest) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return jsonError("VALIDATION_ERROR", "Request body must be JSON", 400, generateRequestId());
  }

  return handleItineraryRequest(body, itineraryRequestSchema);
}
