// This file defines calendar domain types shared by the SQLite store, tool handlers, and resources.

export type CalendarType = 'event' | 'reminder';

export type EventAvailability = 'busy' | 'free' | 'tentative' | 'unavailable';

export type ReminderFilter = 'all' | 'incomplete' | 'completed';

export type RecurrenceFrequency = 'daily' | 'weekly' | 'monthly' | 'yearly';

// Weekdays are numbered 1 (Sunday) through 7 (Saturday); negative month days count from the end of the month.
export interface RecurrenceRule {
  frequency: RecurrenceFrequency;
  interval: number;
  daysOfWeek?: number[];
  daysOfMonth?: number[];
  monthsOfYear?: number[];
  occurrenceCount?: number;
  endDate?: string;
}

export interface CalendarInfo {
  identifier: string;
  title: string;
  type: CalendarType;
  sourceName: string;
  color: string | null;
  createdAt: string;
}

export interface SourceInfo {
  title: string;
  calendarCount: number;
}

export interface CalendarEvent {
  identifier: string;
  title: string;
  startDate: string;
  endDate: string;
  isAllDay: boolean;
  location: string | null;
  notes: string | null;
  url: string | null;
  calendarName: string;
  availability: EventAvailability;
  hasRecurrenceRules: boolean;
  recurrence: RecurrenceRule | null;
  alarmMinutesBefore: number[];
  createdAt: string;
  updatedAt: string;
}

export interface CalendarReminder {
  identifier: string;
  title: string;
  notes: string | null;
  dueDate: string | null;
  priority: number;
  isCompleted: boolean;
  completionDate: string | null;
  calendarName: string;
  hasRecurrenceRules: boolean;
  recurrence: RecurrenceRule | null;
  alarmMinutesBefore: number[];
  createdAt: string;
  updatedAt: string;
}

export interface CreateCalendarInput {
  title: string;
  type: CalendarType;
  sourceName: string;
  color?: string;
}

export interface CreateEventInput {
  calendarId: string;
  title: string;
  startDate: string;
  endDate: string;
  isAllDay: boolean;
  location?: string;
  notes?: string;
  url?: string;
  availability: EventAvailability;
  recurrence?: RecurrenceRule;
  alarmMinutesBefore?: number[];
}

// A null recurrence removes the rule; an alarm list replaces the existing alarms.
export interface UpdateEventInput {
  calendarId?: string;
  title?: string;
  startDate?: string;
  endDate?: string;
  isAllDay?: boolean;
  location?: string;
  notes?: string;
  url?: string;
  availability?: EventAvailability;
  recurrence?: RecurrenceRule | null;
  alarmMinutesBefore?: number[];
}

export interface EventQuery {
  from: string;
  to: string;
  calendarIds?: string[];
}

export interface CreateReminderInput {
  calendarId: string;
  title: string;
  notes?: string;
  dueDate?: string;
  priority: number;
  recurrence?: RecurrenceRule;
  alarmMinutesBefore?: number[];
}

export interface UpdateReminderInput {
  calendarId?: string;
  title?: string;
  notes?: string;
  dueDate?: string;
  priority?: number;
  isCompleted?: boolean;
  recurrence?: RecurrenceRule | null;
  alarmMinutesBefore?: number[];
}

export interface TimeSlot {
  startDate: string;
  endDate: string;
  durationMinutes: number;
}

export interface AvailabilityResult {
  freeSlots: TimeSlot[];
  busySlots: TimeSlot[];
  totalFreeMinutes: number;
  totalBusyMinutes: number;
}
