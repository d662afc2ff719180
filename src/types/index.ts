// ============================================
// DAY ITINERARY - SHARED TYPES
// ============================================

export * from "./itinerary";

// ============================================
// API RESPONSE TYPES
// ============================================

export interface ApiErrorBody {
  code: string;
  message: string;
  details?: unknown;
}

export interface ApiResponse<T> {
  success: boolean;
  message?: string;
  data?: T;
  error?: ApiErrorBody;
  meta?: {
    requestId?: string;
    timestamp?: string;
    total?: number;
  };
}
