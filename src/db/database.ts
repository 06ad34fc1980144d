// This module owns SQLite initialization and persistence operations for calendars, events, and reminders.

import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { normalizeAlarms, parseStoredAlarms } from '../calendar/alarms.js';
import { parseStoredRecurrence, seriesOverlaps, serializeRecurrence } from '../calendar/recurrence.js';
import type {
  CalendarEvent,
  CalendarInfo,
  CalendarReminder,
  CalendarType,
  CreateCalendarInput,
  CreateEventInput,
  CreateReminderInput,
  EventAvailability,
  EventQuery,
  ReminderFilter,
  SourceInfo,
  UpdateEventInput,
  UpdateReminderInput
} from '../types/domain.js';
import { AppError } from '../utils/errors.js';

interface CalendarRow {
  id: string;
  title: string;
  type: string;
  source_name: string;
  color: string | null;
  created_at: string;
}

interface EventRow {
  id: string;
  calendar_id: string;
  calendar_title: string;
  title: string;
  start_at: string;
  end_at: string;
  is_all_day: number;
  location: string | null;
  notes: string | null;
  url: string | null;
  availability: string;
  recurrence: string | null;
  alarm_minutes: string;
  created_at: string;
  updated_at: string;
}

interface ReminderRow {
  id: string;
  calendar_id: string;
  calendar_title: string;
  title: string;
  notes: string | null;
  due_at: string | null;
  priority: number;
  is_completed: number;
  completed_at: string | null;
  recurrence: string | null;
  alarm_minutes: string;
  created_at: string;
  updated_at: string;
}

interface ColumnInfoRow {
  name: string;
}

export const DEFAULT_SOURCE_NAME = 'Local';

const DEFAULT_CALENDARS: ReadonlyArray<{ title: string; type: CalendarType }> = [
  { title: 'Calendar', type: 'event' },
  { title: 'Reminders', type: 'reminder' }
];

const EVENT_SELECT = `
  SELECT e.id, e.calendar_id, c.title AS calendar_title, e.title, e.start_at, e.end_at, e.is_all_day,
         e.location, e.notes, e.url, e.availability, e.recurrence, e.alarm_minutes, e.created_at, e.updated_at
  FROM events e
  JOIN calendars c ON c.id = e.calendar_id
`;

const REMINDER_SELECT = `
  SELECT r.id, r.calendar_id, c.title AS calendar_title, r.title, r.notes, r.due_at, r.priority, r.is_completed,
         r.completed_at, r.recurrence, r.alarm_minutes, r.created_at, r.updated_at
  FROM reminders r
  JOIN calendars c ON c.id = r.calendar_id
`;

function toCalendarType(value: string): CalendarType {
  return value === 'reminder' ? 'reminder' : 'event';
}

function toAvailability(value: string): EventAvailability {
  switch (value) {
    case 'free':
    case 'tentative':
    case 'unavailable':
      return value;
    default:
      return 'busy';
  }
}

function mapCalendarRow(row: CalendarRow): CalendarInfo {
  return {
    identifier: row.id,
    title: row.title,
    type: toCalendarType(row.type),
    sourceName: row.source_name,
    color: row.color,
    createdAt: row.created_at
  };
}

function mapEventRow(row: EventRow): CalendarEvent {
  const recurrence = parseStoredRecurrence(row.recurrence);
  return {
    identifier: row.id,
    title: row.title,
    startDate: row.start_at,
    endDate: row.end_at,
    isAllDay: row.is_all_day === 1,
    location: row.location,
    notes: row.notes,
    url: row.url,
    calendarName: row.calendar_title,
    availability: toAvailability(row.availability),
    hasRecurrenceRules: recurrence !== null,
    recurrence,
    alarmMinutesBefore: parseStoredAlarms(row.alarm_minutes),
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function mapReminderRow(row: ReminderRow): CalendarReminder {
  const recurrence = parseStoredRecurrence(row.recurrence);
  return {
    identifier: row.id,
    title: row.title,
    notes: row.notes,
    dueDate: row.due_at,
    priority: row.priority,
    isCompleted: row.is_completed === 1,
    completionDate: row.completed_at,
    calendarName: row.calendar_title,
    hasRecurrenceRules: recurrence !== null,
    recurrence,
    alarmMinutesBefore: parseStoredAlarms(row.alarm_minutes),
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

// This helper renders a positional IN-list for an optional calendar filter.
function calendarFilterClause(column: string, calendarIds: string[] | undefined): string {
  if (!calendarIds) {
    return '';
  }

  return ` AND ${column} IN (${calendarIds.map(() => '?').join(', ')})`;
}

// This store is intentionally synchronous because SQLite calls are local and bounded.
export class CalendarStore {
  private readonly db: Database.Database;

  public constructor(dbPath: string) {
    if (dbPath !== ':memory:' && !existsSync(dirname(dbPath))) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
    this.initializeSchema();
    this.seedDefaultCalendars();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS calendars (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        type TEXT NOT NULL CHECK (type IN ('event', 'reminder')),
        source_name TEXT NOT NULL,
        color TEXT,
        created_at TEXT NOT NULL,
        UNIQUE (title, type)
      );

      CREATE TABLE IF NOT EXISTS events (
        id TEXT PRIMARY KEY,
        calendar_id TEXT NOT NULL REFERENCES calendars(id) ON DELETE CASCADE,
        title TEXT NOT NULL,
        start_at TEXT NOT NULL,
        end_at TEXT NOT NULL,
        is_all_day INTEGER NOT NULL DEFAULT 0,
        location TEXT,
        notes TEXT,
        url TEXT,
        availability TEXT NOT NULL DEFAULT 'busy',
        recurrence TEXT,
        alarm_minutes TEXT NOT NULL DEFAULT '[]',
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_events_range ON events (start_at, end_at);

      CREATE TABLE IF NOT EXISTS reminders (
        id TEXT PRIMARY KEY,
        calendar_id TEXT NOT NULL REFERENCES calendars(id) ON DELETE CASCADE,
        title TEXT NOT NULL,
        notes TEXT,
        due_at TEXT,
        priority INTEGER NOT NULL DEFAULT 0,
        is_completed INTEGER NOT NULL DEFAULT 0,
        completed_at TEXT,
        recurrence TEXT,
        alarm_minutes TEXT NOT NULL DEFAULT '[]',
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);

    for (const table of ['events', 'reminders']) {
      this.addColumnIfMissing(table, 'recurrence', 'TEXT');
      this.addColumnIfMissing(table, 'alarm_minutes', "TEXT NOT NULL DEFAULT '[]'");
    }
  }

  // This migration upgrades stores created before recurrence and alarms were tracked.
  private addColumnIfMissing(table: string, column: string, definition: string): void {
    const columns = this.db.prepare<[], ColumnInfoRow>(`PRAGMA table_info(${table})`).all();
    if (columns.some((entry) => entry.name === column)) {
      return;
    }

    this.db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
  }

  // This method creates one default calendar per type on first start so tools work without setup.
  private seedDefaultCalendars(): void {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(1) AS count FROM calendars').get();
    if (row && row.count > 0) {
      return;
    }

    const tx = this.db.transaction(() => {
      for (const calendar of DEFAULT_CALENDARS) {
        this.createCalendar({ title: calendar.title, type: calendar.type, sourceName: DEFAULT_SOURCE_NAME });
      }
    });
    tx();
  }

  public close(): void {
    this.db.close();
  }

  public listCalendars(type?: CalendarType): CalendarInfo[] {
    const rows = type
      ? this.db
          .prepare<[string], CalendarRow>('SELECT * FROM calendars WHERE type = ? ORDER BY created_at ASC, title ASC')
          .all(type)
      : this.db.prepare<[], CalendarRow>('SELECT * FROM calendars ORDER BY type ASC, created_at ASC, title ASC').all();

    return rows.map(mapCalendarRow);
  }

  public getCalendar(calendarId: string): CalendarInfo | null {
    const row = this.db.prepare<[string], CalendarRow>('SELECT * FROM calendars WHERE id = ?').get(calendarId);
    return row ? mapCalendarRow(row) : null;
  }

  public findCalendarByTitle(title: string, type: CalendarType): CalendarInfo | null {
    const row = this.db
      .prepare<[string, string], CalendarRow>('SELECT * FROM calendars WHERE title = ? AND type = ?')
      .get(title, type);
    return row ? mapCalendarRow(row) : null;
  }

  // This method returns the oldest calendar of one type, which acts as the default target for new items.
  public getDefaultCalendar(type: CalendarType): CalendarInfo {
    const row = this.db
      .prepare<[string], CalendarRow>('SELECT * FROM calendars WHERE type = ? ORDER BY created_at ASC, rowid ASC LIMIT 1')
      .get(type);

    if (!row) {
      throw new AppError(404, 'calendar_not_found', `No ${type} calendar exists.`);
    }

    return mapCalendarRow(row);
  }

  public createCalendar(input: CreateCalendarInput): CalendarInfo {
    if (this.findCalendarByTitle(input.title, input.type)) {
      throw new AppError(409, 'calendar_exists', `A ${input.type} calendar named '${input.title}' already exists.`);
    }

    const id = randomUUID();
    const now = new Date().toISOString();
    this.db
      .prepare<[string, string, string, string, string | null, string]>(
        'INSERT INTO calendars (id, title, type, source_name, color, created_at) VALUES (?, ?, ?, ?, ?, ?)'
      )
      .run(id, input.title, input.type, input.sourceName, input.color ?? null, now);

    return {
      identifier: id,
      title: input.title,
      type: input.type,
      sourceName: input.sourceName,
      color: input.color ?? null,
      createdAt: now
    };
  }

  // This method removes one calendar and, through foreign-key cascades, every item it holds.
  public deleteCalendar(calendarId: string): boolean {
    const result = this.db.prepare<[string]>('DELETE FROM calendars WHERE id = ?').run(calendarId);
    return result.changes > 0;
  }

  // This method renames one calendar and returns null when it does not exist.
  public renameCalendar(calendarId: string, newTitle: string): CalendarInfo | null {
    const calendar = this.getCalendar(calendarId);
    if (!calendar) {
      return null;
    }

    const clash = this.findCalendarByTitle(newTitle, calendar.type);
    if (clash && clash.identifier !== calendarId) {
      throw new AppError(409, 'calendar_exists', `A ${calendar.type} calendar named '${newTitle}' already exists.`);
    }

    this.db.prepare<[string, string]>('UPDATE calendars SET title = ? WHERE id = ?').run(newTitle, calendarId);
    return { ...calendar, title: newTitle };
  }

  public listSources(): SourceInfo[] {
    return this.db
      .prepare<[], { source_name: string; calendar_count: number }>(
        'SELECT source_name, COUNT(1) AS calendar_count FROM calendars GROUP BY source_name ORDER BY source_name ASC'
      )
      .all()
      .map((row) => ({ title: row.source_name, calendarCount: row.calendar_count }));
  }

  // This method returns events overlapping [from, to), ordered by start time.
  public listEvents(query: EventQuery): CalendarEvent[] {
    const sql = `${EVENT_SELECT} WHERE e.start_at < ? AND e.end_at > ?${calendarFilterClause('e.calendar_id', query.calendarIds)}
      ORDER BY e.start_at ASC, e.end_at ASC, e.rowid ASC`;

    return this.db
      .prepare<string[], EventRow>(sql)
      .all(query.to, query.from, ...(query.calendarIds ?? []))
      .map(mapEventRow);
  }

  // This method returns recurring series with at least one possible occurrence overlapping [from, to).
  public listRecurringEvents(query: EventQuery): CalendarEvent[] {
    const sql = `${EVENT_SELECT} WHERE e.recurrence IS NOT NULL AND e.start_at < ?${calendarFilterClause('e.calendar_id', query.calendarIds)}
      ORDER BY e.start_at ASC, e.rowid ASC`;

    return this.db
      .prepare<string[], EventRow>(sql)
      .all(query.to, ...(query.calendarIds ?? []))
      .map(mapEventRow)
      .filter(
        (event) =>
          event.recurrence !== null &&
          seriesOverlaps(event.recurrence, event.startDate, event.endDate, query.from, query.to)
      );
  }

  // This method returns the next events starting at or after one instant.
  public listEventsStartingFrom(from: string, limit: number, calendarIds?: string[]): CalendarEvent[] {
    const sql = `${EVENT_SELECT} WHERE e.start_at >= ?${calendarFilterClause('e.calendar_id', calendarIds)}
      ORDER BY e.start_at ASC, e.rowid ASC LIMIT ?`;

    return this.db
      .prepare<Array<string | number>, EventRow>(sql)
      .all(from, ...(calendarIds ?? []), limit)
      .map(mapEventRow);
  }

  public getEvent(eventId: string): CalendarEvent | null {
    const row = this.db.prepare<[string], EventRow>(`${EVENT_SELECT} WHERE e.id = ?`).get(eventId);
    return row ? mapEventRow(row) : null;
  }

  public createEvent(input: CreateEventInput): CalendarEvent {
    const id = randomUUID();
    const now = new Date().toISOString();

    this.db
      .prepare(
        `
        INSERT INTO events (
          id, calendar_id, title, start_at, end_at, is_all_day, location, notes, url, availability,
          recurrence, alarm_minutes, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `
      )
      .run(
        id,
        input.calendarId,
        input.title,
        input.startDate,
        input.endDate,
        input.isAllDay ? 1 : 0,
        input.location ?? null,
        input.notes ?? null,
        input.url ?? null,
        input.availability,
        serializeRecurrence(input.recurrence),
        JSON.stringify(normalizeAlarms(input.alarmMinutesBefore)),
        now,
        now
      );

    const created = this.getEvent(id);
    if (!created) {
      throw new AppError(500, 'event_insert_failed', 'Event could not be read back after insert.');
    }

    return created;
  }

  // This method applies only the provided fields and returns null when the event does not exist.
  public updateEvent(eventId: string, input: UpdateEventInput): CalendarEvent | null {
    const row = this.db.prepare<[string], EventRow>(`${EVENT_SELECT} WHERE e.id = ?`).get(eventId);
    if (!row) {
      return null;
    }

    const existing = mapEventRow(row);

    this.db
      .prepare(
        `
        UPDATE events SET
          calendar_id = ?, title = ?, start_at = ?, end_at = ?, is_all_day = ?,
          location = ?, notes = ?, url = ?, availability = ?, recurrence = ?, alarm_minutes = ?, updated_at = ?
        WHERE id = ?
        `
      )
      .run(
        input.calendarId ?? row.calendar_id,
        input.title ?? existing.title,
        input.startDate ?? existing.startDate,
        input.endDate ?? existing.endDate,
        (input.isAllDay ?? existing.isAllDay) ? 1 : 0,
        input.location ?? existing.location,
        input.notes ?? existing.notes,
        input.url ?? existing.url,
        input.availability ?? existing.availability,
        input.recurrence === undefined ? row.recurrence : serializeRecurrence(input.recurrence),
        input.alarmMinutesBefore === undefined ? row.alarm_minutes : JSON.stringify(normalizeAlarms(input.alarmMinutesBefore)),
        new Date().toISOString(),
        eventId
      );

    return this.getEvent(eventId);
  }

  // This method copies one event to a new time range; the copy keeps calendar, details and alarms but not recurrence.
  public duplicateEvent(eventId: string, startDate: string, endDate: string): CalendarEvent | null {
    const id = randomUUID();
    const now = new Date().toISOString();
    const result = this.db
      .prepare<[string, string, string, string, string, string]>(
        `
        INSERT INTO events (
          id, calendar_id, title, start_at, end_at, is_all_day, location, notes, url, availability,
          recurrence, alarm_minutes, created_at, updated_at
        )
        SELECT ?, calendar_id, title, ?, ?, is_all_day, location, notes, url, availability, NULL, alarm_minutes, ?, ?
        FROM events WHERE id = ?
        `
      )
      .run(id, startDate, endDate, now, now, eventId);

    return result.changes > 0 ? this.getEvent(id) : null;
  }

  public deleteEvent(eventId: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM events WHERE id = ?').run(eventId).changes > 0;
  }

  public listReminders(filter: ReminderFilter, calendarIds?: string[]): CalendarReminder[] {
    const completionClause =
      filter === 'completed' ? ' AND r.is_completed = 1' : filter === 'incomplete' ? ' AND r.is_completed = 0' : '';
    const sql = `${REMINDER_SELECT} WHERE 1 = 1${completionClause}${calendarFilterClause('r.calendar_id', calendarIds)}
      ORDER BY r.due_at IS NULL ASC, r.due_at ASC, r.created_at ASC, r.rowid ASC`;

    return this.db
      .prepare<string[], ReminderRow>(sql)
      .all(...(calendarIds ?? []))
      .map(mapReminderRow);
  }

  // This method returns incomplete reminders whose due date lies before one instant.
  public listOverdueReminders(before: string, calendarIds?: string[]): CalendarReminder[] {
    const sql = `${REMINDER_SELECT} WHERE r.is_completed = 0 AND r.due_at IS NOT NULL AND r.due_at < ?${calendarFilterClause('r.calendar_id', calendarIds)}
      ORDER BY r.due_at ASC, r.rowid ASC`;

    return this.db
      .prepare<string[], ReminderRow>(sql)
      .all(before, ...(calendarIds ?? []))
      .map(mapReminderRow);
  }

  public getReminder(reminderId: string): CalendarReminder | null {
    const row = this.db.prepare<[string], ReminderRow>(`${REMINDER_SELECT} WHERE r.id = ?`).get(reminderId);
    return row ? mapReminderRow(row) : null;
  }

  public createReminder(input: CreateReminderInput): CalendarReminder {
    const id = randomUUID();
    const now = new Date().toISOString();

    this.db
      .prepare(
        `
        INSERT INTO reminders (
          id, calendar_id, title, notes, due_at, priority, is_completed, completed_at,
          recurrence, alarm_minutes, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, 0, NULL, ?, ?, ?, ?)
        `
      )
      .run(
        id,
        input.calendarId,
        input.title,
        input.notes ?? null,
        input.dueDate ?? null,
        input.priority,
        serializeRecurrence(input.recurrence),
        JSON.stringify(normalizeAlarms(input.alarmMinutesBefore)),
        now,
        now
      );

    const created = this.getReminder(id);
    if (!created) {
      throw new AppError(500, 'reminder_insert_failed', 'Reminder could not be read back after insert.');
    }

    return created;
  }

  // This method applies only the provided fields; a completion change stamps or clears the completion date.
  public updateReminder(reminderId: string, input: UpdateReminderInput): CalendarReminder | null {
    const row = this.db.prepare<[string], ReminderRow>(`${REMINDER_SELECT} WHERE r.id = ?`).get(reminderId);
    if (!row) {
      return null;
    }

    const now = new Date().toISOString();
    const wasCompleted = row.is_completed === 1;
    const isCompleted = input.isCompleted ?? wasCompleted;
    const completedAt = isCompleted === wasCompleted ? row.completed_at : isCompleted ? now : null;

    this.db
      .prepare(
        `
        UPDATE reminders SET
          calendar_id = ?, title = ?, notes = ?, due_at = ?, priority = ?, is_completed = ?, completed_at = ?,
          recurrence = ?, alarm_minutes = ?, updated_at = ?
        WHERE id = ?
        `
      )
      .run(
        input.calendarId ?? row.calendar_id,
        input.title ?? row.title,
        input.notes ?? row.notes,
        input.dueDate ?? row.due_at,
        input.priority ?? row.priority,
        isCompleted ? 1 : 0,
        completedAt,
        input.recurrence === undefined ? row.recurrence : serializeRecurrence(input.recurrence),
        input.alarmMinutesBefore === undefined ? row.alarm_minutes : JSON.stringify(normalizeAlarms(input.alarmMinutesBefore)),
        now,
        reminderId
      );

    return this.getReminder(reminderId);
  }

  // This method toggles completion and stamps or clears the completion date accordingly.
  public setReminderCompleted(reminderId: string, completed: boolean): CalendarReminder | null {
    const now = new Date().toISOString();
    const result = this.db
      .prepare<[number, string | null, string, string]>(
        'UPDATE reminders SET is_completed = ?, completed_at = ?, updated_at = ? WHERE id = ?'
      )
      .run(completed ? 1 : 0, completed ? now : null, now, reminderId);

    return result.changes > 0 ? this.getReminder(reminderId) : null;
  }

  // This method completes several reminders atomically; one unknown id rolls back the whole batch.
  public completeReminders(reminderIds: string[]): CalendarReminder[] {
    const tx = this.db.transaction((ids: string[]) =>
      ids.map((reminderId) => {
        const reminder = this.setReminderCompleted(reminderId, true);
        if (!reminder) {
          throw new AppError(404, 'reminder_not_found', `Reminder ${reminderId} not found.`);
        }
        return reminder;
      })
    );

    return tx(reminderIds);
  }

  public deleteReminder(reminderId: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM reminders WHERE id = ?').run(reminderId).changes > 0;
  }
}
