import { CalendarEvent, CalendarGrid, MonthGrid } from './calendar';
import { FallbackReason } from './fetchResult';
import { LmsSummary } from './lms';
import { LocalInfo } from './localInfo';
import { NewsItem } from './news';
import { ForecastDay, HourlyPoint, WeatherSnapshot } from './weather';

export type DashboardSection = 'weather' | 'calendar' | 'news' | 'lms';

export interface DisplayContext {
  title: string;
  /** seconds, also used for the page's meta refresh */
  refresh_interval: number;
  timezone: string;
  /** e.g. "Monday, October 19" */
  today: string;
}

/**
 * Flat mapping handed to the template. Optional sections omit their key.
 */
export interface RenderContext {
  /** ISO timestamp of the invocation */
  generated_at: string;
  /** local HH:mm of the invocation */
  last_updated: string;
  weather: WeatherSnapshot;
  forecast: ForecastDay[];
  hourly: HourlyPoint[];
  today_events: CalendarEvent[];
  week_events: CalendarGrid;
  month_grid: MonthGrid;
  articles: NewsItem[];
  lms?: LmsSummary;
  local_info: LocalInfo;
  degraded_sections: DashboardSection[];
  fallback_reasons: Partial<Record<DashboardSection, FallbackReason>>;
  display: DisplayContext;
}
