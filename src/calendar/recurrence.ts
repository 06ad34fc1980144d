// This module validates recurrence rules and answers whether a stored series reaches into a time window.

import { z } from 'zod';
import type { RecurrenceFrequency, RecurrenceRule } from '../types/domain.js';
import { AppError } from '../utils/errors.js';
import { decodeJson } from '../utils/json.js';
import { requireIsoInstant } from './dates.js';

const nonZeroMonthDaySchema = z
  .number()
  .int()
  .min(-31)
  .max(31)
  .refine((day) => day !== 0, { message: 'Day of month cannot be 0.' });

export const recurrenceRuleSchema = z
  .object({
    frequency: z.enum(['daily', 'weekly', 'monthly', 'yearly']),
    interval: z.number().int().min(1).max(999).default(1),
    daysOfWeek: z.array(z.number().int().min(1).max(7)).min(1).max(7).optional(),
    daysOfMonth: z.array(nonZeroMonthDaySchema).min(1).max(31).optional(),
    monthsOfYear: z.array(z.number().int().min(1).max(12)).min(1).max(12).optional(),
    occurrenceCount: z.number().int().min(1).max(10_000).optional(),
    endDate: z.string().trim().datetime({ offset: true }).optional()
  })
  .superRefine((rule, ctx) => {
    if (rule.occurrenceCount !== undefined && rule.endDate !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['endDate'],
        message: 'Set either endDate or occurrenceCount, not both.'
      });
    }
  });

export type RecurrenceRuleInput = z.infer<typeof recurrenceRuleSchema>;

function sortedUnique(values: number[] | undefined): number[] | undefined {
  return values === undefined ? undefined : [...new Set(values)].sort((left, right) => left - right);
}

// This helper canonicalizes one validated rule: selector lists sorted and deduplicated, the end date in UTC.
export function normalizeRecurrence(input: RecurrenceRuleInput): RecurrenceRule {
  const rule: RecurrenceRule = { frequency: input.frequency, interval: input.interval };

  const daysOfWeek = sortedUnique(input.daysOfWeek);
  const daysOfMonth = sortedUnique(input.daysOfMonth);
  const monthsOfYear = sortedUnique(input.monthsOfYear);
  if (daysOfWeek) {
    rule.daysOfWeek = daysOfWeek;
  }
  if (daysOfMonth) {
    rule.daysOfMonth = daysOfMonth;
  }
  if (monthsOfYear) {
    rule.monthsOfYear = monthsOfYear;
  }
  if (input.occurrenceCount !== undefined) {
    rule.occurrenceCount = input.occurrenceCount;
  }
  if (input.endDate !== undefined) {
    rule.endDate = requireIsoInstant(input.endDate, 'recurrence.endDate');
  }

  return rule;
}

export function serializeRecurrence(rule: RecurrenceRule | null | undefined): string | null {
  return rule ? JSON.stringify(rule) : null;
}

// This helper reads one stored rule back; rows are only ever written through normalizeRecurrence.
export function parseStoredRecurrence(raw: string | null): RecurrenceRule | null {
  if (raw === null) {
    return null;
  }

  const decoded = decodeJson(raw);
  const parsed = decoded.ok ? recurrenceRuleSchema.safeParse(decoded.value) : null;
  if (!parsed || !parsed.success) {
    throw new AppError(500, 'invalid_stored_recurrence', 'Stored recurrence rule could not be read.', { raw });
  }

  return normalizeRecurrence(parsed.data);
}

function addPeriods(startMs: number, frequency: RecurrenceFrequency, periods: number): number {
  const date = new Date(startMs);
  switch (frequency) {
    case 'daily':
      date.setUTCDate(date.getUTCDate() + periods);
      break;
    case 'weekly':
      date.setUTCDate(date.getUTCDate() + periods * 7);
      break;
    case 'monthly':
      date.setUTCMonth(date.getUTCMonth() + periods);
      break;
    case 'yearly':
      date.setUTCFullYear(date.getUTCFullYear() + periods);
      break;
  }

  return date.getTime();
}

function hasSelectors(rule: RecurrenceRule): boolean {
  return rule.daysOfWeek !== undefined || rule.daysOfMonth !== undefined || rule.monthsOfYear !== undefined;
}

/**
 * Returns the latest instant at which the series can start an occurrence, or
 * null when it is unbounded.
 *
 * A count-bounded rule with day or month selectors has no closed form here,
 * so it is treated as unbounded.
 */
export function lastOccurrenceStart(rule: RecurrenceRule, seriesStart: string): number | null {
  if (rule.endDate !== undefined) {
    return Date.parse(rule.endDate);
  }

  if (rule.occurrenceCount !== undefined && !hasSelectors(rule)) {
    return addPeriods(Date.parse(seriesStart), rule.frequency, (rule.occurrenceCount - 1) * rule.interval);
  }

  return null;
}

// This helper reports whether a series starting at [startDate, endDate) can have an occurrence overlapping [from, to).
export function seriesOverlaps(
  rule: RecurrenceRule,
  startDate: string,
  endDate: string,
  from: string,
  to: string
): boolean {
  if (Date.parse(startDate) >= Date.parse(to)) {
    return false;
  }

  const lastStart = lastOccurrenceStart(rule, startDate);
  if (lastStart === null) {
    return true;
  }

  const durationMs = Date.parse(endDate) - Date.parse(startDate);
  return lastStart + durationMs > Date.parse(from);
}
