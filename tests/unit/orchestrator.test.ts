import { CalendarEvent } from '@/interfaces/calendar';
import { NewsItem } from '@/interfaces/news';
import { fallback, success } from '@/modules/fallback';
import { mockCalendarEvents, mockWeather } from '@/modules/mockData';
import { createSources, DashboardSources, Orchestrator } from '@/modules/orchestrator';
import { DashboardConfig, DashboardConfigSchema } from '@/schemas/config.schema';
import { AxiosInstance } from 'axios';

// Wednesday, 10:00 UTC
const NOW = new Date('2024-03-13T10:00:00Z');

const config: DashboardConfig = DashboardConfigSchema.parse({
  timezone: 'UTC',
  display: { title: 'Kitchen' },
  rss: { feeds: { World: 'https://news.test/rss' }, itemsPerFeed: 2 },
});

const standup: CalendarEvent = {
  id: 'standup-1',
  title: 'Standup',
  start: '2024-03-13T09:00:00.000Z',
  end: '2024-03-13T09:30:00.000Z',
  calendarId: 'primary',
  colorIndex: 0,
  dateKey: '2024-03-13',
  lastDateKey: '2024-03-13',
  dayOfWeek: 'Wed',
  startTime: '09:00',
  endTime: '09:30',
};

const planning: CalendarEvent = { ...standup, id: 'planning-1', title: 'Planning', dateKey: '2024-03-14', lastDateKey: '2024-03-14', start: '2024-03-14T13:00:00.000Z', end: '2024-03-14T14:00:00.000Z' };

const conference: CalendarEvent = {
  ...standup,
  id: 'conf',
  title: 'Conference',
  start: '2024-03-12',
  end: null,
  dateKey: '2024-03-12',
  lastDateKey: '2024-03-14',
  startTime: undefined,
  endTime: undefined,
};

const headline: NewsItem = { source: 'World', title: 'Headline' };

function liveSources(): DashboardSources {
  const weather = mockWeather({ now: NOW, timeZone: 'UTC', location: 'London,UK', units: 'metric' });
  return {
    weather: { fetchCurrentAndForecast: jest.fn().mockResolvedValue(success(weather)) },
    calendar: { fetchEvents: jest.fn().mockResolvedValue(success([conference, standup, planning])) },
    news: { fetchAll: jest.fn().mockResolvedValue(success([headline])) },
  };
}

describe('Orchestrator.aggregate (unit)', () => {
  /**
   * Purpose:
   * Verifies Core behavior:
   * - every fetcher is called with its configuration
   * - the calendar range covers the whole month grid
   * - the context is flat and omits the unconfigured LMS
   */
  it('assembles a complete context from live sources', async () => {
    const sources = liveSources();

    const context = await new Orchestrator(config, sources).aggregate(NOW);

    expect(sources.weather.fetchCurrentAndForecast).toHaveBeenCalledWith('London,UK', 'metric', NOW);
    expect(sources.calendar.fetchEvents).toHaveBeenCalledWith(
      ['primary'],
      new Date('2024-02-25T00:00:00.000Z'),
      new Date('2024-04-07T00:00:00.000Z'),
      NOW
    );
    expect(sources.news.fetchAll).toHaveBeenCalledWith({ World: 'https://news.test/rss' }, 2);

    expect(context.generated_at).toBe('2024-03-13T10:00:00.000Z');
    expect(context.last_updated).toBe('10:00');
    expect(context.display).toEqual({
      title: 'Kitchen',
      refresh_interval: 900,
      timezone: 'UTC',
      today: 'Wednesday, March 13',
    });
    expect(context.today_events.map((e) => e.id)).toEqual(['conf', 'standup-1']);
    expect(Object.keys(context.week_events)[0]).toBe('2024-03-10');
    expect(context.week_events['2024-03-14'].timedEvents.map((e) => e.id)).toEqual(['planning-1']);
    expect(context.month_grid.monthName).toBe('March');
    expect(context.articles).toEqual([headline]);
    expect(context.forecast).toBe(context.weather.forecast);
    expect(context.hourly).toBe(context.weather.hourly);
    expect(context.degraded_sections).toEqual([]);
    expect(context.fallback_reasons).toEqual({});
    expect('lms' in context).toBe(false);
  });

  it('derives local info from the weather sun times', async () => {
    const sources = liveSources();
    const weather = mockWeather({ now: NOW, timeZone: 'UTC', location: 'London,UK', units: 'metric' });
    sources.weather.fetchCurrentAndForecast = jest.fn().mockResolvedValue(
      success({
        ...weather,
        sunrise: Date.parse('2024-03-13T06:00:00Z'),
        sunset: Date.parse('2024-03-13T18:00:00Z'),
        airQuality: { aqi: 120, status: 'Unhealthy for Sensitive Groups', source: 'api' },
      })
    );

    const context = await new Orchestrator(config, sources).aggregate(NOW);

    expect(context.local_info.sunPosition).toBe(33.3);
    expect(context.local_info.airQuality).toEqual({ aqi: 120, status: 'Unhealthy for Sensitive Groups' });
    expect(context.local_info.trafficRoutes[0]).toEqual({ routeName: 'Downtown', duration: 15, status: 'Light' });
  });

  /**
   * Purpose:
   * Verifies Resilience:
   * - fallback results are recorded as degraded sections with their reason
   * - a fetcher that throws is contained and still yields mock data
   * - the configured LMS section is present even when degraded
   */
  it('stays well-formed when every source falls back or throws', async () => {
    const lmsConfig = DashboardConfigSchema.parse({
      timezone: 'UTC',
      lms: { baseUrl: 'https://canvas.test', apiKey: 'test-token' },
    });
    const sources: DashboardSources = {
      weather: {
        fetchCurrentAndForecast: jest
          .fn()
          .mockResolvedValue(
            fallback(mockWeather({ now: NOW, timeZone: 'UTC', location: 'London,UK', units: 'metric' }), 'timeout')
          ),
      },
      calendar: { fetchEvents: jest.fn().mockRejectedValue(new Error('boom')) },
      news: { fetchAll: jest.fn().mockResolvedValue(fallback([headline], 'not_configured')) },
      lms: { fetchSummary: jest.fn().mockRejectedValue({ code: 'ENOTFOUND' }) },
    };

    const context = await new Orchestrator(lmsConfig, sources).aggregate(NOW);

    expect(context.degraded_sections).toEqual(['weather', 'calendar', 'news', 'lms']);
    expect(context.fallback_reasons).toEqual({
      weather: 'timeout',
      calendar: 'unknown',
      news: 'not_configured',
      lms: 'network_error',
    });
    expect(context.today_events.map((e) => e.title)).toEqual(
      mockCalendarEvents(NOW, 'UTC')
        .filter((e) => e.dateKey === '2024-03-13')
        .map((e) => e.title)
    );
    expect(context.lms?.assignments).toHaveLength(2);
    expect(context.month_grid.weeks).toHaveLength(6);
  });
});

describe('createSources (unit)', () => {
  const axiosClient = { get: jest.fn() } as unknown as AxiosInstance;

  it('includes the LMS fetcher only when it is configured', () => {
    expect(createSources(config, { axiosClient }).lms).toBeUndefined();

    const lmsConfig = DashboardConfigSchema.parse({
      lms: { baseUrl: 'https://canvas.test', apiKey: 'test-token' },
    });
    expect(createSources(lmsConfig, { axiosClient }).lms).toBeDefined();
  });
});
