// This module validates and stores relative alarm offsets for events and reminders.

import { z } from 'zod';
import { AppError } from '../utils/errors.js';
import { decodeJson } from '../utils/json.js';

// Offsets are minutes before the item starts (events) or falls due (reminders), up to four weeks.
export const alarmMinutesSchema = z.array(z.number().int().min(0).max(40_320)).max(10);

export function normalizeAlarms(minutes: number[] | undefined): number[] {
  return minutes === undefined ? [] : [...new Set(minutes)].sort((left, right) => left - right);
}

export function parseStoredAlarms(raw: string): number[] {
  const decoded = decodeJson(raw);
  const parsed = decoded.ok ? alarmMinutesSchema.safeParse(decoded.value) : null;
  if (!parsed || !parsed.success) {
    throw new AppError(500, 'invalid_stored_alarms', 'Stored alarm offsets could not be read.', { raw });
  }

  return parsed.data;
}
