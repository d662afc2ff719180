// ============================================
// API RESPONSE HELPERS
// ============================================
// Shared envelope for the route handlers: { success, data?, error?, meta }.

import { NextResponse } from "next/server";
import type { ZodError } from "zod";
import type { ApiResponse, ItineraryErrorCode } from "@/types";

export const ERROR_STATUS: Record<ItineraryErrorCode, number> = {
  INVALID_WINDOW: 400,
  NO_POIS_FOUND: 404,
  NO_HOTEL_AVAILABLE: 422,
  INSUFFICIENT_CANDIDATES: 422,
  SCHEDULING_INVARIANT_VIOLATION: 500,
};

export function generateRequestId(): string {
  return `req-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function buildMeta(requestId: string) {
  return { requestId, timestamp: new Date().toISOString() };
}

export function jsonSuccess<T>(data: T, requestId: string, message?: string, status = 200) {
  const response: ApiResponse<T> = {
    success: true,
    message,
    data,
    meta: buildMeta(requestId),
  };
  return NextResponse.json(response, { status });
}

export function jsonError(
  code: string,
  message: string,
  status: number,
  requestId: string,
  details?: unknown
) {
  const response: ApiResponse<null> = {
    success: false,
    error: { code, message, details },
    meta: buildMeta(requestId),
  };
  return NextResponse.json(response, { status });
}

export function jsonValidationError(error: ZodError, requestId: string) {
  return jsonError(
    "VALIDATION_ERROR",
    "Invalid request",
    400,
    requestId,
    error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
  );
}

export function jsonUnexpectedError(error: unknown, requestId: string, fallbackMessage: string) {
  return jsonError(
    "INTERNAL_ERROR",
    error instanceof Error ? error.message : fallbackMessage,
    500,
    requestId
  );
}
