// This module computes free/busy slots for one time window from a set of calendar events.

import type { AvailabilityResult, CalendarEvent, TimeSlot } from '../types/domain.js';

export interface Interval {
  start: number;
  end: number;
}

const MINUTE_MS = 60_000;

function toSlot(interval: Interval): TimeSlot {
  return {
    startDate: new Date(interval.start).toISOString(),
    endDate: new Date(interval.end).toISOString(),
    durationMinutes: Math.floor((interval.end - interval.start) / MINUTE_MS)
  };
}

// This helper merges sorted intervals that overlap or touch into one busy block.
export function mergeIntervals(intervals: Interval[]): Interval[] {
  const merged: Interval[] = [];

  for (const interval of intervals) {
    const last = merged[merged.length - 1];
    if (last && interval.start <= last.end) {
      last.end = Math.max(last.end, interval.end);
      continue;
    }
    merged.push({ ...interval });
  }

  return merged;
}

// This helper returns the gaps in [windowStart, windowEnd] not covered by busy blocks and at least minimumMs long.
export function gapIntervals(windowStart: number, windowEnd: number, busy: Interval[], minimumMs: number): Interval[] {
  const gaps: Interval[] = [];
  let cursor = windowStart;

  for (const interval of busy) {
    if (interval.start > cursor && interval.start - cursor >= minimumMs) {
      gaps.push({ start: cursor, end: interval.start });
    }
    cursor = Math.max(cursor, interval.end);
  }

  if (windowEnd > cursor && windowEnd - cursor >= minimumMs) {
    gaps.push({ start: cursor, end: windowEnd });
  }

  return gaps;
}

/**
 * Builds busy and free slots for a window.
 *
 * Events marked `free` never block time. Busy intervals are clamped to the
 * window before merging; free slots shorter than `minimumSlotMinutes` are
 * dropped. Durations are whole minutes, rounded down.
 */
export function computeAvailability(
  events: CalendarEvent[],
  windowStartIso: string,
  windowEndIso: string,
  minimumSlotMinutes: number
): AvailabilityResult {
  const windowStart = Date.parse(windowStartIso);
  const windowEnd = Date.parse(windowEndIso);

  const clamped = events
    .filter((event) => event.availability !== 'free')
    .map((event) => ({
      start: Math.max(Date.parse(event.startDate), windowStart),
      end: Math.min(Date.parse(event.endDate), windowEnd)
    }))
    .filter((interval) => interval.end > interval.start)
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const busy = mergeIntervals(clamped);
  const free = gapIntervals(windowStart, windowEnd, busy, minimumSlotMinutes * MINUTE_MS);
  const busySlots = busy.map(toSlot);
  const freeSlots = free.map(toSlot);

  return {
    freeSlots,
    busySlots,
    totalFreeMinutes: freeSlots.reduce((sum, slot) => sum + slot.durationMinutes, 0),
    totalBusyMinutes: busySlots.reduce((sum, slot) => sum + slot.durationMinutes, 0)
  };
}
