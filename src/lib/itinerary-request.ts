// ============================================
// REQUEST VALIDATION
// ============================================
// zod schemas for the HTTP surface. Bodies use snake_case field names;
// the core works with ItineraryRequest.

import { z } from "zod";
import { THEMES } from "@/types";
import type { ItineraryRequest } from "@/types";
import { isValidTime } from "./slot-scheduler";

export const REQUEST_LIMITS = {
  MIN_PLAN_SIZE: 1,
  MAX_PLAN_SIZE: 20,
  DEFAULT_PLAN_SIZE: 6,
  DEFAULT_START_TIME: "09:00",
  DEFAULT_END_TIME: "22:00",
  DEFAULT_LANGUAGE: "en",
  MIN_LANGUAGE_LENGTH: 2,
  MAX_LANGUAGE_LENGTH: 5,
} as const;

const timeField = z
  .string()
  .trim()
  .refine(isValidTime, { message: "Expected a 24-hour time as HH:MM" });

export const itineraryRequestSchema = z.object({
  city: z.string().trim().min(1, "city is required"),
  country: z.string().trim().min(1, "country is required"),
  theme: z.enum(THEMES),
  plan_size: z.coerce
    .number()
    .int()
    .min(REQUEST_LIMITS.MIN_PLAN_SIZE)
    .max(REQUEST_LIMITS.MAX_PLAN_SIZE)
    .default(REQUEST_LIMITS.DEFAULT_PLAN_SIZE),
  start_time: timeField.default(REQUEST_LIMITS.DEFAULT_START_TIME),
  end_time: timeField.default(REQUEST_LIMITS.DEFAULT_END_TIME),
  language: z
    .string()
    .trim()
    .min(REQUEST_LIMITS.MIN_LANGUAGE_LENGTH)
    .max(REQUEST_LIMITS.MAX_LANGUAGE_LENGTH)
    .default(REQUEST_LIMITS.DEFAULT_LANGUAGE)
    .transform((value) => value.toLowerCase()),
});

export type ItineraryRequestBody = z.input<typeof itineraryRequestSchema>;

/**
 * Query-string variant used by GET /api/itinerary/quick; theme is optional.
 */
export const quickItineraryQuerySchema = itineraryRequestSchema.extend({
  theme: z.enum(THEMES).default("cultural"),
});

export const locationQuerySchema = z.object({
  city: z.string().trim().max(100).optional(),
  country: z.string().trim().max(100).optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export function toItineraryRequest(parsed: z.output<typeof itineraryRequestSchema>): ItineraryRequest {
  return {
    city: parsed.city,
    country: parsed.country,
    theme: parsed.theme,
    planSize: parsed.plan_size,
    startTime: parsed.start_time,
    endTime: parsed.end_time,
    language: parsed.language,
  };
}

/**
 * URLSearchParams -> plain object, dropping empty values so defaults apply.
 */
export function searchParamsToObject(params: URLSearchParams): Record<string, string> {
  const result: Record<string, string> = {};
  params.forEach((value, key) => {
    if (value.trim() !== "") result[key] = value;
  });
  return result;
}
