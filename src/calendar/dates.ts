// This module parses ISO 8601 instants into canonical UTC strings for storage and comparison.

import { AppError } from '../utils/errors.js';

const ISO_WITH_OFFSET = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})$/;

// This helper returns the canonical UTC form (toISOString) of one ISO 8601 timestamp with an explicit offset.
export function requireIsoInstant(value: string, label: string): string {
  if (!ISO_WITH_OFFSET.test(value)) {
    throw new AppError(400, 'invalid_input', `Invalid ${label}: ${value}`);
  }

  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new AppError(400, 'invalid_input', `Invalid ${label}: ${value}`);
  }

  return parsed.toISOString();
}

// This helper validates one [start, end) range and returns both bounds in canonical form.
export function requireIsoRange(start: string, end: string): { start: string; end: string } {
  const startIso = requireIsoInstant(start, 'startDate');
  const endIso = requireIsoInstant(end, 'endDate');

  if (Date.parse(endIso) <= Date.parse(startIso)) {
    throw new AppError(400, 'invalid_input', 'endDate must be after startDate.', { startDate: start, endDate: end });
  }

  return { start: startIso, end: endIso };
}

// This helper returns the [start, end) bounds of one calendar day in server local time, offset from a reference day.
export function localDayBounds(reference: Date, dayOffset: number): { start: string; end: string } {
  const start = new Date(reference.getFullYear(), reference.getMonth(), reference.getDate() + dayOffset);
  const end = new Date(start.getFullYear(), start.getMonth(), start.getDate() + 1);

  return { start: start.toISOString(), end: end.toISOString() };
}
