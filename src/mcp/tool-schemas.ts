// This module defines MCP tool input contracts and exports them as JSON schema for tools/list discovery.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { alarmMinutesSchema } from '../calendar/alarms.js';
import { recurrenceRuleSchema } from '../calendar/recurrence.js';
import type { McpTool } from '../types/mcp.js';

// This schema accepts ISO 8601 timestamps with an explicit offset so stored instants stay unambiguous.
const isoDateTimeSchema = z.string().trim().datetime({ offset: true });

const identifierSchema = z.string().trim().min(1).max(200);

const calendarNameSchema = z.string().trim().min(1).max(160);

const titleSchema = z.string().trim().min(1).max(500);

const notesSchema = z.string().max(10_000);

const availabilitySchema = z.enum(['busy', 'free', 'tentative', 'unavailable']);

const prioritySchema = z.number().int().min(0).max(9);

const searchQuerySchema = z.string().trim().min(1).max(200);

// This rule rejects no-op updates so callers notice a missing field.
function requireSomeChange(toolName: string, idKey: string) {
  return (payload: Record<string, unknown>, ctx: z.RefinementCtx): void => {
    const changed = Object.entries(payload).some(([key, value]) => key !== idKey && value !== undefined);
    if (!changed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [idKey],
        message: `${toolName} requires at least one field to change.`
      });
    }
  };
}

export const listEventsSchema = z.object({
  startDate: isoDateTimeSchema,
  endDate: isoDateTimeSchema,
  calendarName: calendarNameSchema.optional()
});

export const eventIdSchema = z.object({
  eventId: identifierSchema
});

export const createEventSchema = z.object({
  title: titleSchema,
  startDate: isoDateTimeSchema,
  endDate: isoDateTimeSchema,
  isAllDay: z.boolean().default(false),
  location: z.string().max(500).optional(),
  notes: notesSchema.optional(),
  url: z.string().url().max(2048).optional(),
  calendarName: calendarNameSchema.optional(),
  availability: availabilitySchema.default('busy'),
  alarmMinutesBefore: alarmMinutesSchema.optional(),
  recurrence: recurrenceRuleSchema.optional()
});

export const updateEventSchema = z
  .object({
    eventId: identifierSchema,
    title: titleSchema.optional(),
    startDate: isoDateTimeSchema.optional(),
    endDate: isoDateTimeSchema.optional(),
    isAllDay: z.boolean().optional(),
    location: z.string().max(500).optional(),
    notes: notesSchema.optional(),
    url: z.string().url().max(2048).optional(),
    calendarName: calendarNameSchema.optional(),
    availability: availabilitySchema.optional(),
    alarmMinutesBefore: alarmMinutesSchema.optional(),
    // null removes the rule from the event.
    recurrence: recurrenceRuleSchema.nullable().optional()
  })
  .superRefine(requireSomeChange('update_event', 'eventId'));

export const searchEventsSchema = z.object({
  query: searchQuerySchema,
  startDate: isoDateTimeSchema,
  endDate: isoDateTimeSchema,
  calendarName: calendarNameSchema.optional()
});

export const listUpcomingSchema = z.object({
  count: z.number().int().min(1).max(100).default(10),
  calendarName: calendarNameSchema.optional()
});

export const moveEventSchema = z.object({
  eventId: identifierSchema,
  newStartDate: isoDateTimeSchema,
  newEndDate: isoDateTimeSchema.optional()
});

export const calendarFilterSchema = z.object({
  calendarName: calendarNameSchema.optional()
});

export const listRemindersSchema = z.object({
  calendarName: calendarNameSchema.optional(),
  filter: z.enum(['all', 'incomplete', 'completed']).default('all')
});

export const createReminderSchema = z.object({
  title: titleSchema,
  notes: notesSchema.optional(),
  dueDate: isoDateTimeSchema.optional(),
  priority: prioritySchema.default(0),
  calendarName: calendarNameSchema.optional(),
  alarmMinutesBefore: alarmMinutesSchema.optional(),
  recurrence: recurrenceRuleSchema.optional()
});

export const updateReminderSchema = z
  .object({
    reminderId: identifierSchema,
    title: titleSchema.optional(),
    notes: notesSchema.optional(),
    dueDate: isoDateTimeSchema.optional(),
    priority: prioritySchema.optional(),
    isCompleted: z.boolean().optional(),
    calendarName: calendarNameSchema.optional(),
    alarmMinutesBefore: alarmMinutesSchema.optional(),
    recurrence: recurrenceRuleSchema.nullable().optional()
  })
  .superRefine(requireSomeChange('update_reminder', 'reminderId'));

export const reminderIdSchema = z.object({
  reminderId: identifierSchema
});

export const searchRemindersSchema = z.object({
  query: searchQuerySchema,
  calendarName: calendarNameSchema.optional()
});

export const batchCompleteRemindersSchema = z.object({
  reminderIds: z.array(identifierSchema).min(1).max(100)
});

export const listCalendarsSchema = z.object({
  type: z.enum(['event', 'reminder']).optional()
});

export const getCalendarSchema = z
  .object({
    calendarId: identifierSchema.optional(),
    calendarName: calendarNameSchema.optional()
  })
  .superRefine((payload, ctx) => {
    if (payload.calendarId === undefined && payload.calendarName === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['calendarId'],
        message: 'get_calendar requires calendarId or calendarName.'
      });
    }
  });

export const createCalendarSchema = z.object({
  title: calendarNameSchema,
  type: z.enum(['event', 'reminder']).default('event'),
  sourceName: z.string().trim().min(1).max(160).default('Local'),
  color: z
    .string()
    .regex(/^#[0-9A-Fa-f]{6}$/)
    .optional()
});

export const calendarIdSchema = z.object({
  calendarId: identifierSchema
});

export const renameCalendarSchema = z.object({
  calendarId: identifierSchema,
  newTitle: calendarNameSchema
});

export const listSourcesSchema = z.object({});

export const checkAvailabilitySchema = z.object({
  startDate: isoDateTimeSchema,
  endDate: isoDateTimeSchema,
  calendarNames: z.array(calendarNameSchema).min(1).max(50).optional(),
  minimumSlotMinutes: z.number().int().min(1).max(1440).default(30)
});

export const toolSchemas = {
  list_events: listEventsSchema,
  get_event: eventIdSchema,
  create_event: createEventSchema,
  update_event: updateEventSchema,
  delete_event: eventIdSchema,
  search_events: searchEventsSchema,
  list_upcoming: listUpcomingSchema,
  move_event: moveEventSchema,
  duplicate_event: moveEventSchema,
  list_recurring_events: listEventsSchema,
  today: calendarFilterSchema,
  tomorrow: calendarFilterSchema,
  list_reminders: listRemindersSchema,
  get_reminder: reminderIdSchema,
  create_reminder: createReminderSchema,
  update_reminder: updateReminderSchema,
  delete_reminder: reminderIdSchema,
  search_reminders: searchRemindersSchema,
  complete_reminder: reminderIdSchema,
  uncomplete_reminder: reminderIdSchema,
  list_overdue_reminders: calendarFilterSchema,
  batch_complete_reminders: batchCompleteRemindersSchema,
  list_calendars: listCalendarsSchema,
  get_calendar: getCalendarSchema,
  create_calendar: createCalendarSchema,
  delete_calendar: calendarIdSchema,
  rename_calendar: renameCalendarSchema,
  list_sources: listSourcesSchema,
  check_availability: checkAvailabilitySchema
} as const;

export type ToolName = keyof typeof toolSchemas;

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(toolSchemas, name);
}

const toolDescriptions: Record<ToolName, string> = {
  list_events: 'List calendar events overlapping a date range, sorted by start time.',
  get_event: 'Get one event by its identifier, including alarms and recurrence.',
  create_event:
    'Create a calendar event with title, time range, location, notes, URL, availability, alarms, recurrence, and target calendar.',
  update_event: 'Update an existing event. Only the provided fields change; recurrence null removes the rule.',
  delete_event: 'Delete one event by its identifier.',
  search_events: 'Case-insensitive search across event titles, locations, and notes within a date range.',
  list_upcoming: 'List the next events starting from now.',
  move_event: 'Move an event to a new start time. The duration is kept unless a new end is given.',
  duplicate_event: 'Copy an event to a new start time with its details, calendar, and alarms. The duration is kept unless a new end is given.',
  list_recurring_events: 'List recurring events whose series can have an occurrence within a date range.',
  today: 'List all events for today in server local time.',
  tomorrow: 'List all events for tomorrow in server local time.',
  list_reminders: 'List reminders, optionally filtered by list and completion state.',
  get_reminder: 'Get one reminder by its identifier.',
  create_reminder: 'Create a reminder with optional notes, due date, priority, alarms, and recurrence.',
  update_reminder: 'Update an existing reminder. Only the provided fields change; isCompleted toggles completion.',
  delete_reminder: 'Delete one reminder by its identifier.',
  search_reminders: 'Case-insensitive search across reminder titles and notes.',
  complete_reminder: 'Mark one reminder as completed.',
  uncomplete_reminder: 'Mark one completed reminder as incomplete again.',
  list_overdue_reminders: 'List incomplete reminders whose due date has passed.',
  batch_complete_reminders: 'Mark several reminders as completed at once. Nothing changes if any identifier is unknown.',
  list_calendars: 'List event calendars and reminder lists.',
  get_calendar: 'Get one calendar by identifier, or by name across event calendars and reminder lists.',
  create_calendar: 'Create an event calendar or reminder list.',
  delete_calendar: 'Delete one calendar together with all of its events or reminders.',
  rename_calendar: 'Rename an existing calendar or reminder list.',
  list_sources: 'List calendar sources with the number of calendars in each.',
  check_availability: 'Compute free and busy slots in a time window across all or selected calendars.'
};

// This helper exports MCP tool metadata so discovery always reflects the registered tool surface.
export function buildToolList(): McpTool[] {
  return Object.entries(toolDescriptions).flatMap(([name, description]) =>
    isToolName(name)
      ? [
          {
            name,
            description,
            inputSchema: zodToJsonSchema(toolSchemas[name], { target: 'jsonSchema7', $refStrategy: 'none' }) as Record<
              string,
              unknown
            >
          }
        ]
      : []
  );
}
