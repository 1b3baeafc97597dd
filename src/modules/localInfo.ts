import { LocalInfo, TrafficRoute, TrafficStatus } from '../interfaces/localInfo';
import { Route } from '../schemas/config.schema';
import { aqiStatus, AqiStatus } from '../utils/airQuality';
import { computeSunPosition } from '../utils/sun';
import { zonedParts } from '../utils/time';

interface TrafficWindow {
  factor: number;
  status: TrafficStatus;
}

const LIGHT: TrafficWindow = { factor: 1, status: 'Light' };

function isWeekend(weekday: number): boolean {
  return weekday === 0 || weekday === 6;
}

function isRushHour(hour: number): boolean {
  return (hour >= 7 && hour < 9) || (hour >= 16 && hour < 18);
}

function isShoulderHour(hour: number): boolean {
  return hour === 6 || hour === 9 || hour === 15 || hour === 18;
}

function trafficWindow(hour: number, weekday: number): TrafficWindow {
  if (isWeekend(weekday)) {
    return hour >= 11 && hour < 14 ? { factor: 1.15, status: 'Moderate' } : LIGHT;
  }
  if (isRushHour(hour)) return { factor: 1.5, status: 'Heavy' };
  if (isShoulderHour(hour)) return { factor: 1.25, status: 'Moderate' };
  return LIGHT;
}

/**
 * Route durations adjusted for weekday rush hours (07-09, 16-18) and the
 * weekend midday peak. Pure function of `now`.
 */
export function computeTraffic(now: Date, routes: Route[], timeZone: string): TrafficRoute[] {
  const { hour, weekday } = zonedParts(now, timeZone);
  const window = trafficWindow(hour, weekday);

  return routes.map((route) => ({
    routeName: route.name,
    duration: Math.round(route.baseMinutes * window.factor),
    status: window.status,
  }));
}

/**
 * Plausible AQI when no measurement is available: a clean baseline with an
 * afternoon ozone bump and a weekday rush-hour bump.
 */
export function computeAirQualityFallback(
  now: Date,
  timeZone: string
): { aqi: number; status: AqiStatus } {
  const { hour, weekday, day } = zonedParts(now, timeZone);

  let aqi = 28 + (day % 7);
  if (hour >= 12 && hour < 18) aqi += 18;
  if (!isWeekend(weekday) && isRushHour(hour)) aqi += 10;

  return { aqi, status: aqiStatus(aqi) };
}

export function computeLocalInfo(params: {
  now: Date;
  timeZone: string;
  routes: Route[];
  sunrise: Date;
  sunset: Date;
  airQuality?: { aqi: number; status: AqiStatus };
}): LocalInfo {
  const { now, timeZone, routes, sunrise, sunset, airQuality } = params;

  return {
    trafficRoutes: computeTraffic(now, routes, timeZone),
    airQuality: airQuality ?? computeAirQualityFallback(now, timeZone),
    sunPosition: computeSunPosition(now, sunrise, sunset),
  };
}
