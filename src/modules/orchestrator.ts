import { AxiosInstance } from 'axios';
import { CalendarEvent } from '../interfaces/calendar';
import { FetchResult } from '../interfaces/fetchResult';
import { LmsSummary } from '../interfaces/lms';
import { NewsItem } from '../interfaces/news';
import { DashboardSection, RenderContext } from '../interfaces/renderContext';
import { Units, WeatherSnapshot } from '../interfaces/weather';
import { DashboardConfig } from '../schemas/config.schema';
import { isLmsConfigured } from '../config';
import { CalendarEventsSource, CalendarService } from './calendar';
import { buildMonthGrid, buildWeekGrid, monthGridRange } from './calendarGrid';
import { fallback } from './fallback';
import { createGoogleConnector, GoogleOAuthClient } from './googleCalendar';
import { ConsentFlow } from './calendarAuth';
import { LmsService } from './lms';
import { computeLocalInfo } from './localInfo';
import { cannedNews, mockCalendarEvents, mockLmsSummary, mockWeather } from './mockData';
import { NewsAggregator } from './news';
import { WeatherService } from './weather';
import { classifyError } from '../utils/errors';
import { addDays, formatClock, zonedDateKey, zonedParts, zonedStartOfDay } from '../utils/time';
import { logger } from '../logger';

/**
 * The fetchers the orchestrator drives, in the shape it calls them.
 */
export interface DashboardSources {
  weather: { fetchCurrentAndForecast(location: string, units: Units, now?: Date): Promise<FetchResult<WeatherSnapshot>> };
  calendar: {
    fetchEvents(calendarIds: string[], start: Date, end: Date, now?: Date): Promise<FetchResult<CalendarEvent[]>>;
  };
  news: { fetchAll(feeds: Record<string, string>, itemsPerFeed: number): Promise<FetchResult<NewsItem[]>> };
  /** present only when the LMS is configured */
  lms?: { fetchSummary(now?: Date): Promise<FetchResult<LmsSummary>> };
}

export interface SourceOptions {
  axiosClient: AxiosInstance;
  /** interactive consent, available only when a terminal is attached */
  consent?: (oauth: GoogleOAuthClient) => ConsentFlow;
  connect?: () => Promise<CalendarEventsSource>;
}

export function createSources(config: DashboardConfig, options: SourceOptions): DashboardSources {
  const { axiosClient } = options;
  const timeZone = config.timezone;

  const sources: DashboardSources = {
    weather: new WeatherService({ axiosClient, config: config.weather, timeZone }),
    calendar: new CalendarService({
      config: config.calendar,
      timeZone,
      connect:
        options.connect ?? createGoogleConnector(config.calendar, config.httpTimeoutSeconds, options.consent),
    }),
    news: new NewsAggregator({ axiosClient, maxItems: config.rss.maxItems }),
  };

  if (isLmsConfigured(config)) {
    sources.lms = new LmsService({ axiosClient, config: config.lms });
  }
  return sources;
}

/**
 * Fetchers already absorb their own failures; this catches anything that
 * escapes one so a single section can never abort the run.
 */
async function guarded<T>(
  section: DashboardSection,
  run: () => Promise<FetchResult<T>>,
  mock: () => T
): Promise<FetchResult<T>> {
  try {
    return await run();
  } catch (err) {
    const { reason, detail } = classifyError(err);
    logger.error({ section, reason, detail }, 'Fetcher threw unexpectedly');
    return fallback(mock(), reason, detail);
  }
}

function todayLabel(now: Date, timeZone: string): string {
  return new Intl.DateTimeFormat('en-US', {
    timeZone,
    weekday: 'long',
    month: 'long',
    day: 'numeric',
  }).format(now);
}

export class Orchestrator {
  constructor(
    private readonly config: DashboardConfig,
    private readonly sources: DashboardSources
  ) {}

  /**
   * Runs every fetcher in a fixed order and assembles the render context.
   * Never rejects; an all-fallback context is still complete.
   */
  async aggregate(now: Date = new Date()): Promise<RenderContext> {
    const { config, sources } = this;
    const timeZone = config.timezone;
    const weekStartsOn = config.display.weekStartsOn;
    const { location, units } = config.weather;

    const degraded: DashboardSection[] = [];
    const reasons: RenderContext['fallback_reasons'] = {};
    const record = <T>(section: DashboardSection, result: FetchResult<T>): T => {
      if (result.status === 'fallback') {
        degraded.push(section);
        reasons[section] = result.reason;
      }
      return result.data;
    };

    // Weather
    const weather = record(
      'weather',
      await guarded(
        'weather',
        () => sources.weather.fetchCurrentAndForecast(location, units, now),
        () => mockWeather({ now, timeZone, location, units })
      )
    );

    // Calendar, covering every day the month grid shows
    const { year, month } = zonedParts(now, timeZone);
    const { firstKey, lastKey } = monthGridRange(month, year, weekStartsOn);
    const rangeStart = zonedStartOfDay(firstKey, timeZone);
    const rangeEnd = zonedStartOfDay(addDays(lastKey, 1), timeZone);

    const events = record(
      'calendar',
      await guarded(
        'calendar',
        () => sources.calendar.fetchEvents(config.calendar.calendarIds, rangeStart, rangeEnd, now),
        () => mockCalendarEvents(now, timeZone)
      )
    );

    // News
    const articles = record(
      'news',
      await guarded(
        'news',
        () => sources.news.fetchAll(config.rss.feeds, config.rss.itemsPerFeed),
        () => cannedNews()
      )
    );

    // LMS
    const lmsSource = sources.lms;
    const lms = lmsSource
      ? record(
          'lms',
          await guarded(
            'lms',
            () => lmsSource.fetchSummary(now),
            () => mockLmsSummary(now)
          )
        )
      : undefined;

    // Local info
    const localInfo = computeLocalInfo({
      now,
      timeZone,
      routes: config.localInfo.routes,
      sunrise: new Date(weather.sunrise),
      sunset: new Date(weather.sunset),
      airQuality:
        weather.airQuality.source === 'api'
          ? { aqi: weather.airQuality.aqi, status: weather.airQuality.status }
          : undefined,
    });

    const todayKey = zonedDateKey(now, timeZone);
    const gridOptions = { now, timeZone, weekStartsOn };

    const context: RenderContext = {
      generated_at: now.toISOString(),
      last_updated: formatClock(now, timeZone),
      weather,
      forecast: weather.forecast,
      hourly: weather.hourly,
      today_events: events.filter((e) => e.dateKey <= todayKey && todayKey <= e.lastDateKey),
      week_events: buildWeekGrid(events, gridOptions),
      month_grid: buildMonthGrid(events, month, year, gridOptions),
      articles,
      local_info: localInfo,
      degraded_sections: degraded,
      fallback_reasons: reasons,
      display: {
        title: config.display.title,
        refresh_interval: config.refreshInterval,
        timezone: timeZone,
        today: todayLabel(now, timeZone),
      },
    };
    if (lms) context.lms = lms;

    logger.info({ degraded }, degraded.length ? 'Dashboard aggregated with fallback data' : 'Dashboard aggregated');
    return context;
  }
}
