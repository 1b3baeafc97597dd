import { CalendarDay, CalendarEvent, CalendarGrid, MonthGrid } from '../interfaces/calendar';
import {
  addDays,
  dayOfWeek,
  isDateKey,
  MONTH_NAMES,
  parseDateKey,
  toDateKey,
  WEEKDAY_NAMES,
  zonedDateKey,
} from '../utils/time';

export type WeekStart = 0 | 1;

export interface GridOptions {
  /** the invocation's clock; isToday is computed against it once */
  now?: Date;
  timeZone?: string;
  weekStartsOn?: WeekStart;
}

const GRID_CELLS = 42;
// upper bound on the days one all-day event is spread over
const MAX_SPAN_DAYS = 366;

function startMs(event: CalendarEvent): number {
  return Date.parse(event.start);
}

/**
 * All-day events first, then timed events by start time. Ties keep their
 * incoming order.
 */
export function sortEvents(events: CalendarEvent[]): CalendarEvent[] {
  return [...events].sort((a, b) => {
    if (a.dateKey !== b.dateKey) return a.dateKey < b.dateKey ? -1 : 1;
    const aAllDay = a.end === null;
    const bAllDay = b.end === null;
    if (aAllDay !== bAllDay) return aAllDay ? -1 : 1;
    if (aAllDay) return 0;
    return startMs(a) - startMs(b);
  });
}

function indexByDate(events: CalendarEvent[]): Map<string, CalendarEvent[]> {
  const byDate = new Map<string, CalendarEvent[]>();

  const add = (key: string, event: CalendarEvent) => {
    const list = byDate.get(key) ?? [];
    list.push(event);
    byDate.set(key, list);
  };

  for (const event of events) {
    if (event.end === null) {
      // all-day events occupy every day of their span
      let key = event.dateKey;
      for (let day = 0; day <= MAX_SPAN_DAYS && key <= event.lastDateKey; day++) {
        add(key, event);
        const next = addDays(key, 1);
        if (!isDateKey(next)) break;
        key = next;
      }
    } else {
      add(event.dateKey, event);
    }
  }
  return byDate;
}

function buildDay(
  key: string,
  todayKey: string,
  otherMonth: boolean,
  events: CalendarEvent[]
): CalendarDay {
  const { year, month, day } = parseDateKey(key);
  const timed = events
    .filter((e) => e.end !== null)
    .sort((a, b) => startMs(a) - startMs(b));

  return {
    dateKey: key,
    dayName: WEEKDAY_NAMES[dayOfWeek(year, month, day)],
    dayNumber: day,
    isToday: key === todayKey,
    otherMonth,
    allDayEvents: events.filter((e) => e.end === null),
    timedEvents: timed,
  };
}

/**
 * First and last date keys shown by the month grid.
 */
export function monthGridRange(
  month: number,
  year: number,
  weekStartsOn: WeekStart = 0
): { firstKey: string; lastKey: string } {
  const leading = (dayOfWeek(year, month, 1) - weekStartsOn + 7) % 7;
  const firstKey = addDays(toDateKey(year, month, 1), -leading);
  return { firstKey, lastKey: addDays(firstKey, GRID_CELLS - 1) };
}

/**
 * Full 6x7 month view. Days of adjacent months are flagged `otherMonth` and
 * carry no events.
 */
export function buildMonthGrid(
  events: CalendarEvent[],
  month: number,
  year: number,
  options: GridOptions = {}
): MonthGrid {
  const { now = new Date(), timeZone = 'UTC', weekStartsOn = 0 } = options;
  const todayKey = zonedDateKey(now, timeZone);
  const byDate = indexByDate(events);
  const { firstKey } = monthGridRange(month, year, weekStartsOn);

  const days: CalendarGrid = {};
  const weeks: CalendarDay[][] = [];

  for (let i = 0; i < GRID_CELLS; i++) {
    const key = addDays(firstKey, i);
    const otherMonth = parseDateKey(key).month !== month;
    const cell = buildDay(key, todayKey, otherMonth, otherMonth ? [] : byDate.get(key) ?? []);

    days[key] = cell;
    if (i % 7 === 0) weeks.push([]);
    weeks[weeks.length - 1].push(cell);
  }

  return { year, month, monthName: MONTH_NAMES[month - 1], weeks, days };
}

/**
 * The seven days of the week containing `now`.
 */
export function buildWeekGrid(events: CalendarEvent[], options: GridOptions = {}): CalendarGrid {
  const { now = new Date(), timeZone = 'UTC', weekStartsOn = 0 } = options;
  const todayKey = zonedDateKey(now, timeZone);
  const { year, month, day } = parseDateKey(todayKey);
  const offset = (dayOfWeek(year, month, day) - weekStartsOn + 7) % 7;
  const firstKey = addDays(todayKey, -offset);
  const byDate = indexByDate(events);

  const grid: CalendarGrid = {};
  for (let i = 0; i < 7; i++) {
    const key = addDays(firstKey, i);
    grid[key] = buildDay(key, todayKey, false, byDate.get(key) ?? []);
  }
  return grid;
}
