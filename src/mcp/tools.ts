// This module implements all MCP tool handlers with validation and structured execution logging.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { computeAvailability } from '../calendar/availability.js';
import { localDayBounds, requireIsoInstant, requireIsoRange } from '../calendar/dates.js';
import { normalizeRecurrence, type RecurrenceRuleInput } from '../calendar/recurrence.js';
import type { CalendarStore } from '../db/database.js';
import type { CalendarEvent, CalendarInfo, CalendarReminder, CalendarType, RecurrenceRule } from '../types/domain.js';
import { AppError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import {
  batchCompleteRemindersSchema,
  calendarFilterSchema,
  calendarIdSchema,
  checkAvailabilitySchema,
  createCalendarSchema,
  createEventSchema,
  createReminderSchema,
  eventIdSchema,
  getCalendarSchema,
  isToolName,
  listCalendarsSchema,
  listEventsSchema,
  listRemindersSchema,
  listSourcesSchema,
  listUpcomingSchema,
  moveEventSchema,
  reminderIdSchema,
  renameCalendarSchema,
  searchEventsSchema,
  searchRemindersSchema,
  updateEventSchema,
  updateReminderSchema,
  type ToolName
} from './tool-schemas.js';

export interface ToolRuntimeContext {
  store: CalendarStore;
  logger: FastifyBaseLogger;
  now?: () => Date;
}

// This type captures the normalized MCP tool output format returned to the client.
export interface ToolCallResult {
  content: Array<{ type: 'text'; text: string }>;
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

type ToolHandler = (args: unknown, context: ToolRuntimeContext) => Promise<ToolCallResult> | ToolCallResult;

// This helper wraps structured objects in both text and structured fields for client compatibility.
function mcpResult(payload: Record<string, unknown>, prefix?: string): ToolCallResult {
  const json = JSON.stringify(payload, null, 2);
  return {
    content: [{ type: 'text', text: prefix ? `${prefix}\n${json}` : json }],
    structuredContent: payload
  };
}

// This helper renders one tool failure as an error result the model can read instead of a protocol error.
export function toolErrorResult(message: string): ToolCallResult {
  return {
    content: [{ type: 'text', text: `Error: ${message}` }],
    isError: true
  };
}

function currentTime(context: ToolRuntimeContext): Date {
  return context.now ? context.now() : new Date();
}

// This helper resolves one calendar by title or falls back to the default calendar of that type.
function resolveTargetCalendar(store: CalendarStore, name: string | undefined, type: CalendarType): CalendarInfo {
  if (name === undefined) {
    return store.getDefaultCalendar(type);
  }

  const calendar = store.findCalendarByTitle(name, type);
  if (!calendar) {
    throw new AppError(404, 'calendar_not_found', `Calendar '${name}' not found.`);
  }

  return calendar;
}

// This helper maps an optional single-calendar filter to ids, failing loudly on unknown names.
function resolveCalendarFilter(store: CalendarStore, name: string | undefined, type: CalendarType): string[] | undefined {
  return name === undefined ? undefined : [resolveTargetCalendar(store, name, type).identifier];
}

// This helper maps several calendar names to ids, ignoring unknown names unless none match.
function resolveCalendarSet(store: CalendarStore, names: string[] | undefined): string[] | undefined {
  if (!names) {
    return undefined;
  }

  const ids = names
    .map((name) => store.findCalendarByTitle(name, 'event'))
    .filter((calendar): calendar is CalendarInfo => calendar !== null)
    .map((calendar) => calendar.identifier);

  if (ids.length === 0) {
    throw new AppError(404, 'calendar_not_found', 'None of the specified calendars were found.', { calendarNames: names });
  }

  return ids;
}

function requireEvent(store: CalendarStore, eventId: string): CalendarEvent {
  const event = store.getEvent(eventId);
  if (!event) {
    throw new AppError(404, 'event_not_found', `Event ${eventId} not found.`);
  }

  return event;
}

function requireReminder(reminder: CalendarReminder | null, reminderId: string): CalendarReminder {
  if (!reminder) {
    throw new AppError(404, 'reminder_not_found', `Reminder ${reminderId} not found.`);
  }

  return reminder;
}

function recurrenceChange(input: RecurrenceRuleInput | null | undefined): RecurrenceRule | null | undefined {
  if (input === undefined || input === null) {
    return input;
  }

  return normalizeRecurrence(input);
}

// This helper computes the target range for a moved or copied event, keeping its duration when no end is given.
function shiftedRange(event: CalendarEvent, newStartDate: string, newEndDate: string | undefined): { start: string; end: string } {
  const start = requireIsoInstant(newStartDate, 'newStartDate');
  if (newEndDate === undefined) {
    const durationMs = Date.parse(event.endDate) - Date.parse(event.startDate);
    return { start, end: new Date(Date.parse(start) + durationMs).toISOString() };
  }

  const end = requireIsoInstant(newEndDate, 'newEndDate');
  if (Date.parse(end) <= Date.parse(start)) {
    throw new AppError(400, 'invalid_input', 'newEndDate must be after newStartDate.', { newStartDate, newEndDate });
  }

  return { start, end };
}

function matchesQuery(fields: Array<string | null>, query: string): boolean {
  const needle = query.toLocaleLowerCase();
  return fields.some((field) => field !== null && field.toLocaleLowerCase().includes(needle));
}

function listDayEvents(args: unknown, context: ToolRuntimeContext, dayOffset: number): ToolCallResult {
  const input = calendarFilterSchema.parse(args);
  const day = localDayBounds(currentTime(context), dayOffset);
  const events = context.store.listEvents({
    from: day.start,
    to: day.end,
    calendarIds: resolveCalendarFilter(context.store, input.calendarName, 'event')
  });

  return mcpResult({ startDate: day.start, endDate: day.end, count: events.length, events });
}

function setCompletion(args: unknown, store: CalendarStore, completed: boolean, prefix: string): ToolCallResult {
  const input = reminderIdSchema.parse(args);
  const reminder = requireReminder(store.setReminderCompleted(input.reminderId, completed), input.reminderId);

  return mcpResult({ reminder }, prefix);
}

const toolHandlers: Record<ToolName, ToolHandler> = {
  list_events: (args, { store }) => {
    const input = listEventsSchema.parse(args);
    const range = requireIsoRange(input.startDate, input.endDate);
    const events = store.listEvents({
      from: range.start,
      to: range.end,
      calendarIds: resolveCalendarFilter(store, input.calendarName, 'event')
    });

    return mcpResult({ count: events.length, events });
  },

  get_event: (args, { store }) => {
    const input = eventIdSchema.parse(args);
    return mcpResult({ event: requireEvent(store, input.eventId) });
  },

  create_event: (args, { store }) => {
    const input = createEventSchema.parse(args);
    const range = requireIsoRange(input.startDate, input.endDate);
    const calendar = resolveTargetCalendar(store, input.calendarName, 'event');
    const event = store.createEvent({
      calendarId: calendar.identifier,
      title: input.title,
      startDate: range.start,
      endDate: range.end,
      isAllDay: input.isAllDay,
      location: input.location,
      notes: input.notes,
      url: input.url,
      availability: input.availability,
      recurrence: input.recurrence ? normalizeRecurrence(input.recurrence) : undefined,
      alarmMinutesBefore: input.alarmMinutesBefore
    });

    return mcpResult({ event }, 'Event created successfully:');
  },

  update_event: (args, { store }) => {
    const input = updateEventSchema.parse(args);
    const existing = requireEvent(store, input.eventId);

    const startDate = input.startDate ? requireIsoInstant(input.startDate, 'startDate') : existing.startDate;
    const endDate = input.endDate ? requireIsoInstant(input.endDate, 'endDate') : existing.endDate;
    if (Date.parse(endDate) <= Date.parse(startDate)) {
      throw new AppError(400, 'invalid_input', 'endDate must be after startDate.', { startDate, endDate });
    }

    const event = store.updateEvent(input.eventId, {
      calendarId:
        input.calendarName === undefined ? undefined : resolveTargetCalendar(store, input.calendarName, 'event').identifier,
      title: input.title,
      startDate,
      endDate,
      isAllDay: input.isAllDay,
      location: input.location,
      notes: input.notes,
      url: input.url,
      availability: input.availability,
      recurrence: recurrenceChange(input.recurrence),
      alarmMinutesBefore: input.alarmMinutesBefore
    });
    if (!event) {
      throw new AppError(404, 'event_not_found', `Event ${input.eventId} not found.`);
    }

    return mcpResult({ event }, 'Event updated successfully:');
  },

  delete_event: (args, { store }) => {
    const input = eventIdSchema.parse(args);
    if (!store.deleteEvent(input.eventId)) {
      throw new AppError(404, 'event_not_found', `Event ${input.eventId} not found.`);
    }

    return mcpResult({ deleted: true, eventId: input.eventId }, 'Event deleted successfully.');
  },

  search_events: (args, { store }) => {
    const input = searchEventsSchema.parse(args);
    const range = requireIsoRange(input.startDate, input.endDate);
    const events = store
      .listEvents({
        from: range.start,
        to: range.end,
        calendarIds: resolveCalendarFilter(store, input.calendarName, 'event')
      })
      .filter((event) => matchesQuery([event.title, event.location, event.notes], input.query));

    return mcpResult({ query: input.query, count: events.length, events });
  },

  list_upcoming: (args, context) => {
    const input = listUpcomingSchema.parse(args);
    const from = currentTime(context).toISOString();
    const events = context.store.listEventsStartingFrom(
      from,
      input.count,
      resolveCalendarFilter(context.store, input.calendarName, 'event')
    );

    return mcpResult({ from, count: events.length, events });
  },

  move_event: (args, { store }) => {
    const input = moveEventSchema.parse(args);
    const existing = requireEvent(store, input.eventId);
    const range = shiftedRange(existing, input.newStartDate, input.newEndDate);
    store.updateEvent(input.eventId, { startDate: range.start, endDate: range.end });

    return mcpResult({ event: requireEvent(store, input.eventId) }, 'Event moved successfully:');
  },

  duplicate_event: (args, { store }) => {
    const input = moveEventSchema.parse(args);
    const source = requireEvent(store, input.eventId);
    const range = shiftedRange(source, input.newStartDate, input.newEndDate);
    const copy = store.duplicateEvent(input.eventId, range.start, range.end);
    if (!copy) {
      throw new AppError(404, 'event_not_found', `Event ${input.eventId} not found.`);
    }

    return mcpResult({ event: copy, sourceEventId: input.eventId }, 'Event duplicated successfully:');
  },

  list_recurring_events: (args, { store }) => {
    const input = listEventsSchema.parse(args);
    const range = requireIsoRange(input.startDate, input.endDate);
    const events = store.listRecurringEvents({
      from: range.start,
      to: range.end,
      calendarIds: resolveCalendarFilter(store, input.calendarName, 'event')
    });

    return mcpResult({ count: events.length, events });
  },

  today: (args, context) => listDayEvents(args, context, 0),

  tomorrow: (args, context) => listDayEvents(args, context, 1),

  list_reminders: (args, { store }) => {
    const input = listRemindersSchema.parse(args);
    const reminders = store.listReminders(input.filter, resolveCalendarFilter(store, input.calendarName, 'reminder'));

    return mcpResult({ filter: input.filter, count: reminders.length, reminders });
  },

  get_reminder: (args, { store }) => {
    const input = reminderIdSchema.parse(args);
    return mcpResult({ reminder: requireReminder(store.getReminder(input.reminderId), input.reminderId) });
  },

  create_reminder: (args, { store }) => {
    const input = createReminderSchema.parse(args);
    const calendar = resolveTargetCalendar(store, input.calendarName, 'reminder');
    const reminder = store.createReminder({
      calendarId: calendar.identifier,
      title: input.title,
      notes: input.notes,
      dueDate: input.dueDate ? requireIsoInstant(input.dueDate, 'dueDate') : undefined,
      priority: input.priority,
      recurrence: input.recurrence ? normalizeRecurrence(input.recurrence) : undefined,
      alarmMinutesBefore: input.alarmMinutesBefore
    });

    return mcpResult({ reminder }, 'Reminder created:');
  },

  update_reminder: (args, { store }) => {
    const input = updateReminderSchema.parse(args);
    const reminder = store.updateReminder(input.reminderId, {
      calendarId:
        input.calendarName === undefined
          ? undefined
          : resolveTargetCalendar(store, input.calendarName, 'reminder').identifier,
      title: input.title,
      notes: input.notes,
      dueDate: input.dueDate ? requireIsoInstant(input.dueDate, 'dueDate') : undefined,
      priority: input.priority,
      isCompleted: input.isCompleted,
      recurrence: recurrenceChange(input.recurrence),
      alarmMinutesBefore: input.alarmMinutesBefore
    });

    return mcpResult({ reminder: requireReminder(reminder, input.reminderId) }, 'Reminder updated:');
  },

  delete_reminder: (args, { store }) => {
    const input = reminderIdSchema.parse(args);
    if (!store.deleteReminder(input.reminderId)) {
      throw new AppError(404, 'reminder_not_found', `Reminder ${input.reminderId} not found.`);
    }

    return mcpResult({ deleted: true, reminderId: input.reminderId }, 'Reminder deleted successfully.');
  },

  search_reminders: (args, { store }) => {
    const input = searchRemindersSchema.parse(args);
    const reminders = store
      .listReminders('all', resolveCalendarFilter(store, input.calendarName, 'reminder'))
      .filter((reminder) => matchesQuery([reminder.title, reminder.notes], input.query));

    return mcpResult({ query: input.query, count: reminders.length, reminders });
  },

  complete_reminder: (args, { store }) => setCompletion(args, store, true, 'Reminder completed:'),

  uncomplete_reminder: (args, { store }) => setCompletion(args, store, false, 'Reminder uncompleted:'),

  list_overdue_reminders: (args, context) => {
    const input = calendarFilterSchema.parse(args);
    const asOf = currentTime(context).toISOString();
    const reminders = context.store.listOverdueReminders(
      asOf,
      resolveCalendarFilter(context.store, input.calendarName, 'reminder')
    );

    return mcpResult({ asOf, count: reminders.length, reminders });
  },

  batch_complete_reminders: (args, { store }) => {
    const input = batchCompleteRemindersSchema.parse(args);
    const reminders = store.completeReminders(input.reminderIds);

    return mcpResult({ count: reminders.length, reminders }, 'Reminders completed:');
  },

  list_calendars: (args, { store }) => {
    const input = listCalendarsSchema.parse(args);
    const calendars = store.listCalendars(input.type);

    return mcpResult({ count: calendars.length, calendars });
  },

  get_calendar: (args, { store }) => {
    const input = getCalendarSchema.parse(args);
    const calendar =
      input.calendarId !== undefined
        ? store.getCalendar(input.calendarId)
        : input.calendarName !== undefined
          ? (store.findCalendarByTitle(input.calendarName, 'event') ??
            store.findCalendarByTitle(input.calendarName, 'reminder'))
          : null;
    if (!calendar) {
      throw new AppError(404, 'calendar_not_found', `Calendar '${input.calendarId ?? input.calendarName}' not found.`);
    }

    return mcpResult({ calendar });
  },

  create_calendar: (args, { store }) => {
    const input = createCalendarSchema.parse(args);
    const calendar = store.createCalendar({
      title: input.title,
      type: input.type,
      sourceName: input.sourceName,
      color: input.color
    });

    return mcpResult({ calendar }, 'Calendar created:');
  },

  delete_calendar: (args, { store }) => {
    const input = calendarIdSchema.parse(args);
    if (!store.deleteCalendar(input.calendarId)) {
      throw new AppError(404, 'calendar_not_found', `Calendar ${input.calendarId} not found.`);
    }

    return mcpResult({ deleted: true, calendarId: input.calendarId }, 'Calendar deleted successfully.');
  },

  rename_calendar: (args, { store }) => {
    const input = renameCalendarSchema.parse(args);
    const calendar = store.renameCalendar(input.calendarId, input.newTitle);
    if (!calendar) {
      throw new AppError(404, 'calendar_not_found', `Calendar ${input.calendarId} not found.`);
    }

    return mcpResult({ calendar }, 'Calendar renamed:');
  },

  list_sources: (args, { store }) => {
    listSourcesSchema.parse(args);
    const sources = store.listSources();

    return mcpResult({ count: sources.length, sources });
  },

  check_availability: (args, { store }) => {
    const input = checkAvailabilitySchema.parse(args);
    const range = requireIsoRange(input.startDate, input.endDate);
    const events = store.listEvents({
      from: range.start,
      to: range.end,
      calendarIds: resolveCalendarSet(store, input.calendarNames)
    });
    const availability = computeAvailability(events, range.start, range.end, input.minimumSlotMinutes);

    return mcpResult({ ...availability });
  }
};

// This helper keeps execution logs compact for large result payloads.
function summarizeToolOutput(result: ToolCallResult): Record<string, unknown> {
  const structured = result.structuredContent ?? {};
  return {
    isError: result.isError === true,
    keys: Object.keys(structured),
    count: typeof structured.count === 'number' ? structured.count : undefined
  };
}

// This helper names every offending field so the model can correct its arguments.
function describeValidationIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'input'}: ${issue.message}`)
    .join('; ');
}

// This function validates and executes one tool; failures are thrown as AppError for the caller to render.
export async function executeTool(toolName: string, args: unknown, context: ToolRuntimeContext): Promise<ToolCallResult> {
  const startedAt = Date.now();
  context.logger.info(
    {
      event: 'mcp_tool_execution_started',
      toolName,
      args: sanitizeForLog(args)
    },
    'mcp_tool_execution_started'
  );

  if (!isToolName(toolName)) {
    context.logger.warn(
      {
        event: 'mcp_tool_not_found',
        toolName
      },
      'mcp_tool_not_found'
    );
    throw new AppError(404, 'tool_not_found', `Unknown tool: ${toolName}`);
  }

  try {
    const result = await toolHandlers[toolName](args ?? {}, context);

    context.logger.info(
      {
        event: 'mcp_tool_execution_completed',
        toolName,
        durationMs: Date.now() - startedAt,
        result: summarizeToolOutput(result)
      },
      'mcp_tool_execution_completed'
    );

    return result;
  } catch (error) {
    context.logger.error(
      {
        event: 'mcp_tool_execution_failed',
        toolName,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      },
      'mcp_tool_execution_failed'
    );

    if (error instanceof z.ZodError) {
      throw new AppError(
        400,
        'validation_error',
        `Tool input validation failed: ${describeValidationIssues(error)}`,
        error.flatten()
      );
    }

    throw error;
  }
}
