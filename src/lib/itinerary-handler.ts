// ============================================
// ITINERARY HTTP HANDLER
// ============================================
// Shared by POST /api/itinerary and GET /api/itinerary/quick:
// validate -> generate -> render.

import type { z, ZodType, ZodTypeDef } from "zod";
import { getItineraryAssembler } from "./itinerary-assembler";
import type { itineraryRequestSchema } from "./itinerary-request";
import { toItineraryRequest } from "./itinerary-request";
import {
  ERROR_STATUS,
  generateRequestId,
  jsonError,
  jsonSuccess,
  jsonUnexpectedError,
  jsonValidationError,
} from "./api-response";

type ParsedItineraryRequest = z.output<typeof itineraryRequestSchema>;

export async function handleItineraryRequest(
  input: unknown,
  schema: ZodType<ParsedItineraryRequest, ZodTypeDef, unknown>
) {
  const requestId = generateRequestId();

  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return jsonValidationError(parsed.error, requestId);
  }

  try {
    const request = toItineraryRequest(parsed.data);
    const assembler = await getItineraryAssembler();
    const result = assembler.generateItinerary(request);

    if (!result.success) {
      return jsonError(
        result.error.code,
        result.error.message,
        ERROR_STATUS[result.error.code],
        requestId,
        result.error.details
      );
    }

    const { itinerary } = result;
    return jsonSuccess(
      itinerary,
      requestId,
      `Generated ${itinerary.slotCount} slots for ${itinerary.city}, ${itinerary.country}`
    );
  } catch (error) {
    console.error(`[Itinerary API] Request ${requestId} failed:`, error);
    return jsonUnexpectedError(error, requestId, "Failed to generate itinerary");
  }
}
