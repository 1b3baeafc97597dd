export interface CalendarEvent {
  id: string;
  title: string;
  /** ISO datetime, or YYYY-MM-DD for all-day events */
  start: string;
  /** ISO datetime; null marks an all-day event */
  end: string | null;
  location?: string;
  calendarId: string;
  /** position of the source calendar in configuration, used for color coding */
  colorIndex: number;
  /** local date in the configured timezone */
  dateKey: string;
  /** inclusive last local date; differs from dateKey for multi-day all-day events */
  lastDateKey: string;
  dayOfWeek: string;
  /** local HH:mm, absent for all-day events */
  startTime?: string;
  endTime?: string;
}

export interface CalendarDay {
  dateKey: string;
  dayName: string;
  dayNumber: number;
  isToday: boolean;
  otherMonth: boolean;
  allDayEvents: CalendarEvent[];
  timedEvents: CalendarEvent[];
}

/** date key -> day; every date of the requested range is present */
export type CalendarGrid = Record<string, CalendarDay>;

export interface MonthGrid {
  year: number;
  month: number;
  monthName: string;
  /** 6 rows of 7 days */
  weeks: CalendarDay[][];
  days: CalendarGrid;
}

export interface OAuthToken {
  access_token: string;
  refresh_token: string;
  /** epoch ms */
  expiry_date: number;
  token_type?: string;
  scope?: string;
}
