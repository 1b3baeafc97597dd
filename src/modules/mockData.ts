import { CalendarEvent } from '../interfaces/calendar';
import { LmsSummary } from '../interfaces/lms';
import { NewsItem } from '../interfaces/news';
import { ForecastDay, HourlyPoint, Units, WeatherSnapshot } from '../interfaces/weather';
import { computeAirQualityFallback } from './localInfo';
import { deriveUvIndex } from '../utils/sun';
import {
  addDays,
  dayOfYear,
  formatClock,
  parseDateKey,
  WEEKDAY_NAMES,
  zonedDateKey,
  zonedParts,
  zonedStartOfDay,
} from '../utils/time';
import {
  celsiusToUnits,
  displayWindSpeed,
  unitLabels,
  windCompass,
} from '../utils/weatherFormat';

const HOUR_MS = 3_600_000;

interface MockCondition {
  code: number;
  main: string;
  description: string;
  icon: string;
}

const MOCK_CONDITIONS: MockCondition[] = [
  { code: 800, main: 'Clear', description: 'Clear Sky', icon: '01' },
  { code: 802, main: 'Clouds', description: 'Scattered Clouds', icon: '03' },
  { code: 803, main: 'Clouds', description: 'Broken Clouds', icon: '04' },
  { code: 500, main: 'Rain', description: 'Light Rain', icon: '10' },
];

function mockCondition(doy: number, offset = 0): MockCondition {
  return MOCK_CONDITIONS[(doy + offset) % MOCK_CONDITIONS.length];
}

/**
 * Seasonal mean temperature in °C, warmest in late July north of the
 * equator and in late January south of it.
 */
function seasonalTemperature(doy: number, latitude: number): number {
  const hemisphere = latitude < 0 ? -1 : 1;
  return 12 + hemisphere * 10 * Math.cos((2 * Math.PI * (doy - 200)) / 365);
}

function diurnalOffset(hour: number): number {
  return 4 * Math.sin((Math.PI * (hour - 9)) / 12);
}

/** Daylight hours grow towards the local summer solstice */
function mockDaylight(doy: number, latitude: number): { sunrise: number; sunset: number } {
  const hemisphere = latitude < 0 ? -1 : 1;
  const length = 12 + hemisphere * 2.5 * Math.cos((2 * Math.PI * (doy - 172)) / 365);
  return { sunrise: 12.5 - length / 2, sunset: 12.5 + length / 2 };
}

function mockSunTimes(
  now: Date,
  timeZone: string,
  latitude: number
): { sunrise: Date; sunset: Date } {
  const key = zonedDateKey(now, timeZone);
  const { year, month, day } = parseDateKey(key);
  const midnight = zonedStartOfDay(key, timeZone).getTime();
  const daylight = mockDaylight(dayOfYear(year, month, day), latitude);

  return {
    sunrise: new Date(midnight + daylight.sunrise * HOUR_MS),
    sunset: new Date(midnight + daylight.sunset * HOUR_MS),
  };
}

function iconFor(condition: MockCondition, hour: number): string {
  return `${condition.icon}${hour >= 6 && hour < 18 ? 'd' : 'n'}`;
}

function mockForecast(
  now: Date,
  timeZone: string,
  latitude: number,
  units: Units
): ForecastDay[] {
  const todayKey = zonedDateKey(now, timeZone);

  return Array.from({ length: 5 }, (_, i) => {
    const key = addDays(todayKey, i);
    const { year, month, day } = parseDateKey(key);
    const doy = dayOfYear(year, month, day);
    const mean = seasonalTemperature(doy, latitude);
    const wobble = ((i * 7) % 5) - 2;
    const condition = mockCondition(doy, i);

    return {
      day: WEEKDAY_NAMES[new Date(Date.UTC(year, month - 1, day)).getUTCDay()],
      date: key,
      high: Math.round(celsiusToUnits(mean + 4 + wobble, units)),
      low: Math.round(celsiusToUnits(mean - 4 + wobble, units)),
      icon: iconFor(condition, 12),
      description: condition.description,
    };
  });
}

function mockHourly(
  now: Date,
  timeZone: string,
  latitude: number,
  units: Units
): HourlyPoint[] {
  const start = Math.ceil(now.getTime() / HOUR_MS) * HOUR_MS;

  return Array.from({ length: 8 }, (_, i) => {
    const at = new Date(start + i * 3 * HOUR_MS);
    const p = zonedParts(at, timeZone);
    const doy = dayOfYear(p.year, p.month, p.day);
    const celsius = seasonalTemperature(doy, latitude) + diurnalOffset(p.hour);

    return {
      time: formatClock(at, timeZone),
      temp: Math.round(celsiusToUnits(celsius, units)),
      windSpeed: displayWindSpeed(units === 'metric' ? 3.5 : 8, units),
      humidity: 60,
      rainProbability: mockCondition(doy).main === 'Rain' ? 60 : 10,
    };
  });
}

/**
 * Plausible weather for the season and time of day, used when every
 * weather sub-call failed or to fill the parts that did.
 */
export function mockWeather(params: {
  now: Date;
  timeZone: string;
  location: string;
  units: Units;
  latitude?: number;
  longitude?: number;
}): WeatherSnapshot {
  const { now, timeZone, location, units } = params;
  const latitude = params.latitude ?? 40;
  const p = zonedParts(now, timeZone);
  const doy = dayOfYear(p.year, p.month, p.day);
  const condition = mockCondition(doy);
  const celsius = seasonalTemperature(doy, latitude) + diurnalOffset(p.hour);
  const { sunrise, sunset } = mockSunTimes(now, timeZone, latitude);
  const daylight = mockDaylight(doy, latitude);
  const airQuality = computeAirQualityFallback(now, timeZone);
  const windRaw = units === 'metric' ? 3.5 : 8;

  return {
    location,
    latitude: params.latitude,
    longitude: params.longitude,
    units,
    ...unitLabels(units),
    temperature: Math.round(celsiusToUnits(celsius, units)),
    feelsLike: Math.round(celsiusToUnits(celsius - 1, units)),
    humidity: 60,
    conditionCode: condition.code,
    condition: condition.main,
    description: condition.description,
    icon: iconFor(condition, p.hour),
    windSpeed: displayWindSpeed(windRaw, units),
    windDirection: 225,
    windCompass: windCompass(225),
    sunrise: sunrise.getTime(),
    sunset: sunset.getTime(),
    uvIndex: deriveUvIndex(p.hour + p.minute / 60, doy, latitude, daylight),
    uvDerived: true,
    airQuality: { ...airQuality, source: 'estimated' },
    forecast: mockForecast(now, timeZone, latitude, units),
    hourly: mockHourly(now, timeZone, latitude, units),
    synthesized: ['current', 'forecast', 'airQuality'],
  };
}

const MOCK_EVENTS: { title: string; start: number; end: number; dayOffset: number; location?: string }[] = [
  { title: 'Team Standup', start: 9, end: 9.5, dayOffset: 0 },
  { title: 'Project Review', start: 14, end: 15, dayOffset: 0, location: 'Conference Room B' },
  { title: 'Client Call', start: 16, end: 17, dayOffset: 0 },
  { title: 'Team Standup', start: 9, end: 9.5, dayOffset: 1 },
  { title: 'Lunch with Sam', start: 12, end: 13, dayOffset: 2 },
];

/**
 * Events placed relative to today so the calendar never looks stale.
 */
export function mockCalendarEvents(now: Date, timeZone: string): CalendarEvent[] {
  const todayKey = zonedDateKey(now, timeZone);

  return MOCK_EVENTS.map((mock, index) => {
    const key = addDays(todayKey, mock.dayOffset);
    const midnight = zonedStartOfDay(key, timeZone).getTime();
    const start = new Date(midnight + mock.start * HOUR_MS);
    const end = new Date(midnight + mock.end * HOUR_MS);
    const { year, month, day } = parseDateKey(key);

    return {
      id: `mock-${index}`,
      title: mock.title,
      start: start.toISOString(),
      end: end.toISOString(),
      location: mock.location,
      calendarId: 'mock',
      colorIndex: 0,
      dateKey: key,
      lastDateKey: key,
      dayOfWeek: WEEKDAY_NAMES[new Date(Date.UTC(year, month - 1, day)).getUTCDay()],
      startTime: formatClock(start, timeZone),
      endTime: formatClock(end, timeZone),
    };
  });
}

const CANNED_NEWS: readonly NewsItem[] = [
  {
    source: 'Dashboard',
    title: 'Headlines refresh automatically throughout the day',
  },
  {
    source: 'Dashboard',
    title: 'Add RSS feeds to the configuration to customize this ticker',
  },
];

export function cannedNews(): NewsItem[] {
  return CANNED_NEWS.map((item) => ({ ...item }));
}

export function mockLmsSummary(now: Date): LmsSummary {
  const inDays = (days: number) => new Date(now.getTime() + days * 24 * HOUR_MS).toISOString();

  return {
    courses: [],
    assignments: [
      { id: 1, title: 'Reading Response', courseName: 'English', dueAt: inDays(2) },
      { id: 2, title: 'Problem Set', courseName: 'Mathematics', dueAt: inDays(4) },
    ],
    announcements: [],
    grades: [],
    failedSections: ['courses', 'assignments', 'announcements', 'grades'],
  };
}
