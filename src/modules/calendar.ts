import { CalendarEvent } from '../interfaces/calendar';
import { Attempt, FallbackReason, FetchResult } from '../interfaces/fetchResult';
import { CalendarConfig } from '../schemas/config.schema';
import { GoogleEvent, GoogleEventListSchema } from '../schemas/calendar.schema';
import { attempt, fallback, success } from './fallback';
import { sortEvents } from './calendarGrid';
import { mockCalendarEvents } from './mockData';
import { classifyError, SchemaMismatchError } from '../utils/errors';
import {
  addDays,
  dayOfWeek,
  formatClock,
  parseDateKey,
  WEEKDAY_NAMES,
  zonedDateKey,
} from '../utils/time';
import { logger } from '../logger';

const SOURCE = 'calendar';

/**
 * Where events come from. Items are validated by the fetcher, so the source
 * hands them over untyped.
 */
export interface CalendarEventsSource {
  listEvents(calendarId: string, timeMin: Date, timeMax: Date, maxResults: number): Promise<unknown[]>;
}

export interface CalendarServiceDeps {
  config: CalendarConfig;
  timeZone: string;
  /** authenticates and returns a ready source */
  connect: () => Promise<CalendarEventsSource>;
}

function weekdayOf(key: string): string {
  const { year, month, day } = parseDateKey(key);
  return WEEKDAY_NAMES[dayOfWeek(year, month, day)];
}

/**
 * Maps a validated Google event onto the dashboard model. All-day events
 * carry `end: null`; Google's exclusive end date becomes `lastDateKey`.
 */
export function normalizeEvent(
  event: GoogleEvent,
  calendarId: string,
  colorIndex: number,
  timeZone: string,
  position: number
): CalendarEvent {
  const id = event.id ?? `${calendarId}-${position}`;
  const title = event.summary?.trim() || '(No title)';
  const location = event.location ?? undefined;

  if (!event.start.dateTime && event.start.date) {
    const dateKey = event.start.date;
    const endExclusive = event.end?.date;
    const lastDateKey = endExclusive && endExclusive > dateKey ? addDays(endExclusive, -1) : dateKey;

    return {
      id,
      title,
      start: dateKey,
      end: null,
      location,
      calendarId,
      colorIndex,
      dateKey,
      lastDateKey,
      dayOfWeek: weekdayOf(dateKey),
    };
  }

  const start = new Date(event.start.dateTime ?? '');
  const end = event.end?.dateTime ? new Date(event.end.dateTime) : start;
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    throw new SchemaMismatchError('Calendar event', [
      { code: 'custom', path: ['start'], message: 'unparseable event time' },
    ]);
  }
  const dateKey = zonedDateKey(start, timeZone);

  return {
    id,
    title,
    start: start.toISOString(),
    end: end.toISOString(),
    location,
    calendarId,
    colorIndex,
    dateKey,
    lastDateKey: dateKey,
    dayOfWeek: weekdayOf(dateKey),
    startTime: formatClock(start, timeZone),
    endTime: formatClock(end, timeZone),
  };
}

export class CalendarService {
  constructor(private readonly deps: CalendarServiceDeps) {}

  private async listCalendar(
    source: CalendarEventsSource,
    calendarId: string,
    colorIndex: number,
    timeMin: Date,
    timeMax: Date
  ): Promise<CalendarEvent[]> {
    const { config, timeZone } = this.deps;
    const items = await source.listEvents(calendarId, timeMin, timeMax, config.maxEvents);

    const parsed = GoogleEventListSchema.safeParse(items);
    if (!parsed.success) {
      throw new SchemaMismatchError(`Calendar ${calendarId}`, parsed.error.issues);
    }

    return parsed.data
      .filter((event) => event.status !== 'cancelled')
      .map((event, i) => normalizeEvent(event, calendarId, colorIndex, timeZone, i));
  }

  /**
   * Queries every calendar independently and merges the results. Only a
   * failure of every calendar (or of authentication) yields mock events.
   */
  async fetchEvents(
    calendarIds: string[],
    timeRangeStart: Date,
    timeRangeEnd: Date,
    now: Date = new Date()
  ): Promise<FetchResult<CalendarEvent[]>> {
    const { config, timeZone } = this.deps;
    const mock = () => mockCalendarEvents(now, timeZone);

    if (config.useMockData) {
      return fallback(mock(), 'not_configured', 'mock calendar data enabled', now.getTime());
    }
    if (calendarIds.length === 0) {
      logger.warn({ source: SOURCE }, 'No calendars configured, using fallback data');
      return fallback(mock(), 'not_configured', 'no calendar ids configured', now.getTime());
    }

    let source: CalendarEventsSource;
    try {
      source = await this.deps.connect();
    } catch (err) {
      const { reason, detail } = classifyError(err);
      logger.warn({ source: SOURCE, reason, detail }, 'Calendar authentication failed, using fallback data');
      return fallback(mock(), reason, detail, now.getTime());
    }

    const results: Attempt<CalendarEvent[]>[] = [];
    for (const [colorIndex, calendarId] of calendarIds.entries()) {
      results.push(
        await attempt(SOURCE, calendarId, () =>
          this.listCalendar(source, calendarId, colorIndex, timeRangeStart, timeRangeEnd)
        )
      );
    }

    const merged: CalendarEvent[] = [];
    const failures: { reason: FallbackReason }[] = [];
    for (const result of results) {
      if (result.ok) merged.push(...result.value);
      else failures.push(result);
    }

    if (failures.length === results.length) {
      return fallback(mock(), failures[0].reason, 'all calendars failed', now.getTime());
    }

    const events = sortEvents(merged).slice(0, config.maxEvents);
    logger.info({ source: SOURCE, calendars: calendarIds.length, events: events.length }, 'Calendar events fetched');

    return success(events, now.getTime());
  }
}
