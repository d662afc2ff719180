// ============================================
// ITINERARY INVARIANT CHECKS
// ============================================
// Final gate before an itinerary leaves the assembler. Any violation here is
// a defect in selection or scheduling, never a user error.

import { parseTimeToMinutes } from "./slot-scheduler";
import type { TimeWindow } from "./slot-scheduler";
import type { ScheduledSlot } from "@/types";

export interface InvariantViolation {
  rule: string;
  message: string;
  slotIndex?: number;
}

export function validateItinerarySlots(
  slots: ScheduledSlot[],
  window: TimeWindow,
  expectedCount: number
): InvariantViolation[] {
  const violations: InvariantViolation[] = [];

  if (slots.length === 0) {
    violations.push({ rule: "non-empty", message: "Itinerary has no slots" });
    return violations;
  }

  if (slots.length !== expectedCount) {
    violations.push({
      rule: "slot-count",
      message: `Expected ${expectedCount} slots, got ${slots.length}`,
    });
  }

  const hotelIndexes = slots
    .map((slot, index) => (slot.poi.category === "hotel" ? index : -1))
    .filter((index) => index !== -1);
  if (hotelIndexes.length !== 1 || hotelIndexes[0] !== 0) {
    violations.push({
      rule: "single-hotel-first",
      message: `Expected exactly one hotel in slot 1, found hotels at [${hotelIndexes.map((i) => i + 1).join(", ")}]`,
    });
  }

  let previousEnd: number | null = null;
  slots.forEach((slot, index) => {
    const start = parseTimeToMinutes(slot.startTime);
    const end = parseTimeToMinutes(slot.endTime);

    if (start === null || end === null) {
      violations.push({ rule: "time-format", message: "Slot times must be HH:MM", slotIndex: index });
      return;
    }
    if (end <= start) {
      violations.push({ rule: "positive-duration", message: `Slot ${slot.startTime}-${slot.endTime} is empty`, slotIndex: index });
    }
    if (end - start !== slot.durationMinutes) {
      violations.push({ rule: "duration", message: "Slot duration does not match its times", slotIndex: index });
    }
    if (index === 0 && start !== window.startMinutes) {
      violations.push({ rule: "window-start", message: `First slot starts at ${slot.startTime}`, slotIndex: index });
    }
    if (previousEnd !== null && start !== previousEnd) {
      violations.push({ rule: "contiguous", message: `Gap or overlap before slot ${index + 1}`, slotIndex: index });
    }
    if (index === slots.length - 1 && end !== window.endMinutes) {
      violations.push({ rule: "window-end", message: `Last slot ends at ${slot.endTime}`, slotIndex: index });
    }
    previousEnd = end;
  });

  return violations;
}
