import { AxiosInstance } from 'axios';
import { Attempt, FetchResult } from '../interfaces/fetchResult';
import {
  AirQualityReading,
  ForecastDay,
  HourlyPoint,
  Units,
  WeatherSnapshot,
  WeatherSubCall,
} from '../interfaces/weather';
import { WeatherConfig } from '../schemas/config.schema';
import { AirPollution, CurrentWeather, Forecast, ForecastEntry } from '../schemas/weather.schema';
import { attempt, fallback, success } from './fallback';
import { Coordinates, getAirPollution, getCurrentWeather, getForecast } from './getWeather';
import { computeAirQualityFallback } from './localInfo';
import { mockWeather } from './mockData';
import { aqiFromOwmIndex, aqiFromPm25, aqiStatus } from '../utils/airQuality';
import { deriveUvIndex } from '../utils/sun';
import { dayOfYear, toDateKey, WEEKDAY_NAMES } from '../utils/time';
import { displayWindSpeed, titleCase, unitLabels, windCompass } from '../utils/weatherFormat';
import { logger } from '../logger';

const SOURCE = 'weather';

/**
 * Wall clock at a location given as a fixed UTC shift in seconds, the way
 * OpenWeatherMap reports it.
 */
function localClock(epochSeconds: number, offsetSeconds: number) {
  const d = new Date((epochSeconds + offsetSeconds) * 1000);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    weekday: d.getUTCDay(),
    hour: d.getUTCHours() + d.getUTCMinutes() / 60,
  };
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Collapses 3-hour buckets into one high/low per local calendar day.
 */
export function reduceForecast(list: ForecastEntry[], offsetSeconds: number, days = 5): ForecastDay[] {
  const groups = new Map<string, { weekday: number; entries: { entry: ForecastEntry; hour: number }[] }>();

  for (const entry of list) {
    const clock = localClock(entry.dt, offsetSeconds);
    const key = toDateKey(clock.year, clock.month, clock.day);
    const group = groups.get(key) ?? { weekday: clock.weekday, entries: [] };
    group.entries.push({ entry, hour: clock.hour });
    groups.set(key, group);
  }

  return [...groups.entries()].slice(0, days).map(([date, group]) => {
    const high = Math.max(...group.entries.map(({ entry }) => entry.main.temp_max));
    const low = Math.min(...group.entries.map(({ entry }) => entry.main.temp_min));
    const midday = group.entries.reduce((best, candidate) =>
      Math.abs(candidate.hour - 12) < Math.abs(best.hour - 12) ? candidate : best
    );
    const condition = midday.entry.weather[0];

    return {
      day: WEEKDAY_NAMES[group.weekday],
      date,
      high: Math.round(high),
      low: Math.round(low),
      icon: condition.icon,
      description: titleCase(condition.description),
    };
  });
}

export function buildHourly(
  list: ForecastEntry[],
  offsetSeconds: number,
  units: Units,
  points = 8
): HourlyPoint[] {
  return list.slice(0, points).map((entry) => {
    const clock = localClock(entry.dt, offsetSeconds);
    const hour = Math.floor(clock.hour);
    const minute = Math.round((clock.hour - hour) * 60);

    return {
      time: `${pad(hour)}:${pad(minute)}`,
      temp: Math.round(entry.main.temp),
      windSpeed: displayWindSpeed(entry.wind.speed, units),
      humidity: entry.main.humidity,
      rainProbability: Math.round(entry.pop * 100),
    };
  });
}

function airQualityFromApi(data: AirPollution): AirQualityReading {
  const reading = data.list[0];
  const pm25 = reading.components.pm2_5;
  const aqi = pm25 !== undefined ? aqiFromPm25(pm25) : aqiFromOwmIndex(reading.main.aqi);

  return pm25 !== undefined
    ? { aqi, status: aqiStatus(aqi), source: 'api', pm25 }
    : { aqi, status: aqiStatus(aqi), source: 'api' };
}

type CurrentFields = Pick<
  WeatherSnapshot,
  | 'location'
  | 'temperature'
  | 'feelsLike'
  | 'humidity'
  | 'conditionCode'
  | 'condition'
  | 'description'
  | 'icon'
  | 'windSpeed'
  | 'windDirection'
  | 'windCompass'
  | 'sunrise'
  | 'sunset'
>;

function currentFromApi(data: CurrentWeather, units: Units): CurrentFields {
  const condition = data.weather[0];
  return {
    location: data.name,
    temperature: Math.round(data.main.temp),
    feelsLike: Math.round(data.main.feels_like),
    humidity: data.main.humidity,
    conditionCode: condition.id,
    condition: condition.main,
    description: titleCase(condition.description),
    icon: condition.icon,
    windSpeed: displayWindSpeed(data.wind.speed, units),
    windDirection: data.wind.deg,
    windCompass: windCompass(data.wind.deg),
    sunrise: data.sys.sunrise * 1000,
    sunset: data.sys.sunset * 1000,
  };
}

/**
 * Current conditions synthesized from the nearest forecast bucket.
 */
function currentFromForecast(data: Forecast, units: Units, mock: WeatherSnapshot): CurrentFields {
  const first = data.list[0];
  const condition = first.weather[0];
  return {
    location: data.city.name,
    temperature: Math.round(first.main.temp),
    feelsLike: Math.round(first.main.feels_like ?? first.main.temp),
    humidity: first.main.humidity,
    conditionCode: condition.id,
    condition: condition.main,
    description: titleCase(condition.description),
    icon: condition.icon,
    windSpeed: displayWindSpeed(first.wind.speed, units),
    windDirection: first.wind.deg,
    windCompass: windCompass(first.wind.deg),
    sunrise: data.city.sunrise !== undefined ? data.city.sunrise * 1000 : mock.sunrise,
    sunset: data.city.sunset !== undefined ? data.city.sunset * 1000 : mock.sunset,
  };
}

function pickCurrent(mock: WeatherSnapshot): CurrentFields {
  return {
    location: mock.location,
    temperature: mock.temperature,
    feelsLike: mock.feelsLike,
    humidity: mock.humidity,
    conditionCode: mock.conditionCode,
    condition: mock.condition,
    description: mock.description,
    icon: mock.icon,
    windSpeed: mock.windSpeed,
    windDirection: mock.windDirection,
    windCompass: mock.windCompass,
    sunrise: mock.sunrise,
    sunset: mock.sunset,
  };
}

export interface WeatherServiceDeps {
  axiosClient: AxiosInstance;
  config: WeatherConfig;
  timeZone: string;
}

export class WeatherService {
  constructor(private readonly deps: WeatherServiceDeps) {}

  private configCoords(): Coordinates | undefined {
    const { latitude, longitude } = this.deps.config;
    return latitude !== undefined && longitude !== undefined
      ? { lat: latitude, lon: longitude }
      : undefined;
  }

  /**
   * Current conditions, 5-day forecast and air quality. Each sub-call is
   * fault-isolated; the result is a fallback only when none of them
   * succeeded.
   */
  async fetchCurrentAndForecast(
    location: string,
    units: Units,
    now: Date = new Date()
  ): Promise<FetchResult<WeatherSnapshot>> {
    const { axiosClient, config, timeZone } = this.deps;
    const request = { apiKey: config.apiKey, location, units, coords: this.configCoords(), axiosClient };

    const current = await attempt(SOURCE, 'current', () => getCurrentWeather(request));
    const forecast = await attempt(SOURCE, 'forecast', () => getForecast(request));

    const coords =
      (current.ok ? current.value.coord : undefined) ??
      (forecast.ok ? forecast.value.city.coord : undefined) ??
      request.coords;

    const airKey = config.airQualityApiKey ?? config.apiKey;
    let air: Attempt<AirPollution> | null = null;
    if (airKey && coords) {
      air = await attempt(SOURCE, 'airQuality', () => getAirPollution(airKey, coords, axiosClient));
    } else {
      logger.info({ source: SOURCE }, 'Air quality call skipped (no key or coordinates)');
    }

    const mock = mockWeather({
      now,
      timeZone,
      location,
      units,
      latitude: coords?.lat,
      longitude: coords?.lon,
    });

    if (!current.ok && !forecast.ok && !(air && air.ok)) {
      return fallback(mock, current.reason, 'all weather sub-calls failed', now.getTime());
    }

    return success(
      this.compose({ now, units, coords, current, forecast, air, mock }),
      now.getTime()
    );
  }

  private compose(parts: {
    now: Date;
    units: Units;
    coords: Coordinates | undefined;
    current: Attempt<CurrentWeather>;
    forecast: Attempt<Forecast>;
    air: Attempt<AirPollution> | null;
    mock: WeatherSnapshot;
  }): WeatherSnapshot {
    const { now, units, coords, current, forecast, air, mock } = parts;
    const synthesized: WeatherSubCall[] = [];

    let fields: CurrentFields;
    if (current.ok) {
      fields = currentFromApi(current.value, units);
    } else if (forecast.ok) {
      fields = currentFromForecast(forecast.value, units, mock);
      synthesized.push('current');
    } else {
      fields = pickCurrent(mock);
      synthesized.push('current');
    }

    const offsetSeconds = current.ok
      ? current.value.timezone
      : forecast.ok
        ? forecast.value.city.timezone
        : null;

    let forecastDays = mock.forecast;
    let hourly = mock.hourly;
    if (forecast.ok && offsetSeconds !== null) {
      forecastDays = reduceForecast(forecast.value.list, offsetSeconds);
      hourly = buildHourly(forecast.value.list, offsetSeconds, units);
    } else {
      synthesized.push('forecast');
    }

    let airQuality: AirQualityReading;
    if (air && air.ok) {
      airQuality = airQualityFromApi(air.value);
    } else {
      airQuality = { ...computeAirQualityFallback(now, this.deps.timeZone), source: 'estimated' };
      synthesized.push('airQuality');
    }

    const uvIndex =
      offsetSeconds !== null
        ? this.uvAt(now, fields.sunrise, fields.sunset, offsetSeconds, coords?.lat ?? 0)
        : mock.uvIndex;

    return {
      ...fields,
      latitude: coords?.lat,
      longitude: coords?.lon,
      units,
      ...unitLabels(units),
      uvIndex,
      uvDerived: true,
      airQuality,
      forecast: forecastDays,
      hourly,
      synthesized,
    };
  }

  private uvAt(
    now: Date,
    sunriseMs: number,
    sunsetMs: number,
    offsetSeconds: number,
    latitude: number
  ): number {
    const clock = localClock(Math.floor(now.getTime() / 1000), offsetSeconds);
    const sunrise = localClock(Math.floor(sunriseMs / 1000), offsetSeconds).hour;
    const sunset = localClock(Math.floor(sunsetMs / 1000), offsetSeconds).hour;
    return deriveUvIndex(
      clock.hour,
      dayOfYear(clock.year, clock.month, clock.day),
      latitude,
      { sunrise, sunset }
    );
  }
}
