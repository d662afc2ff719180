// ============================================
// TIME-SLOT SCHEDULER
// ============================================
// Packs an ordered POI list into the requested window. All arithmetic is in
// whole minutes since midnight. Slots are contiguous and gap-free: every
// slot but the last gets the base duration, the last ends exactly at the
// window end and absorbs the remainder.

import type { ItineraryError, ScheduledSlot, ScoredCandidate } from "@/types";

// ============================================
// TYPES
// ============================================

export interface TimeWindow {
  startMinutes: number;
  endMinutes: number;
}

export interface SlotBoundary {
  startMinutes: number;
  endMinutes: number;
}

export type WindowResult = { success: true; window: TimeWindow } | { success: false; error: ItineraryError };

export type ScheduleResult = { success: true; slots: ScheduledSlot[] } | { success: false; error: ItineraryError };

const TIME_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;

// ============================================
// TIME HELPERS
// ============================================

/**
 * "HH:MM" -> minutes since midnight, or null when the string is not a valid
 * 24-hour time.
 */
export function parseTimeToMinutes(time: string): number | null {
  const match = TIME_PATTERN.exec(time.trim());
  if (!match) return null;
  return Number(match[1]) * 60 + Number(match[2]);
}

export function formatMinutesToTime(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours.toString().padStart(2, "0")}:${mins.toString().padStart(2, "0")}`;
}

export function isValidTime(time: string): boolean {
  return parseTimeToMinutes(time) !== null;
}

export function parseTimeWindow(startTime: string, endTime: string): WindowResult {
  const startMinutes = parseTimeToMinutes(startTime);
  const endMinutes = parseTimeToMinutes(endTime);

  if (startMinutes === null || endMinutes === null) {
    return {
      success: false,
      error: {
        code: "INVALID_WINDOW",
        message: `Times must be HH:MM (got "${startTime}" - "${endTime}")`,
      },
    };
  }

  if (startMinutes >= endMinutes) {
    return {
      success: false,
      error: {
        code: "INVALID_WINDOW",
        message: `Start time ${startTime} must be before end time ${endTime}`,
      },
    };
  }

  return { success: true, window: { startMinutes, endMinutes } };
}

// ============================================
// SLOT BOUNDARIES
// ============================================

/**
 * Base duration is floor(total / count), floored again to `granularity`
 * when that still leaves at least one granule per slot.
 */
export function computeBaseDuration(totalMinutes: number, count: number, granularity = 1): number {
  if (count <= 0) return 0;
  const base = Math.floor(totalMinutes / count);
  if (granularity > 1 && base >= granularity) {
    return Math.floor(base / granularity) * granularity;
  }
  return base;
}

export function computeSlotBoundaries(window: TimeWindow, count: number, granularity = 1): SlotBoundary[] {
  if (count <= 0) return [];

  const total = window.endMinutes - window.startMinutes;
  const base = computeBaseDuration(total, count, granularity);
  const boundaries: SlotBoundary[] = [];

  for (let i = 0; i < count; i++) {
    const startMinutes = window.startMinutes + i * base;
    const endMinutes = i === count - 1 ? window.endMinutes : startMinutes + base;
    boundaries.push({ startMinutes, endMinutes });
  }

  return boundaries;
}

// ============================================
// SCHEDULER
// ============================================

export class SlotScheduler {
  constructor(private readonly granularity = 1) {}

  schedule(ordered: ScoredCandidate[], window: TimeWindow): ScheduleResult {
    const total = window.endMinutes - window.startMinutes;

    if (total < ordered.length) {
      return {
        success: false,
        error: {
          code: "INVALID_WINDOW",
          message: `A ${total}-minute window cannot hold ${ordered.length} slots`,
          details: { windowMinutes: total, slotCount: ordered.length },
        },
      };
    }

    const boundaries = computeSlotBoundaries(window, ordered.length, this.granularity);

    const slots = ordered.map((item, index): ScheduledSlot => {
      const { startMinutes, endMinutes } = boundaries[index];
      return {
        startTime: formatMinutesToTime(startMinutes),
        endTime: formatMinutesToTime(endMinutes),
        durationMinutes: endMinutes - startMinutes,
        poi: {
          id: item.candidate.poi.id,
          name: item.candidate.displayName,
          category: item.candidate.poi.category,
          score: roundScore(item.relevance.score),
        },
        relevanceScore: roundScore(item.relevance.score),
      };
    });

    return { success: true, slots };
  }
}

function roundScore(score: number): number {
  return Math.round(score * 10000) / 10000;
}
