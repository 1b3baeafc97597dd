import { Units } from '../interfaces/weather';

const COMPASS_POINTS = [
  'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW',
];

export function windCompass(degrees: number): string {
  const normalized = ((degrees % 360) + 360) % 360;
  return COMPASS_POINTS[Math.round(normalized / 22.5) % 16];
}

export function titleCase(text: string): string {
  return text.replace(/\b\w/g, (c) => c.toUpperCase());
}

/**
 * OpenWeatherMap reports m/s for metric and mph for imperial.
 * Metric is shown in km/h.
 */
export function displayWindSpeed(speed: number, units: Units): number {
  return units === 'metric' ? Math.round(speed * 3.6 * 10) / 10 : Math.round(speed);
}

export function unitLabels(units: Units): { temperatureUnit: '°C' | '°F'; windUnit: 'km/h' | 'mph' } {
  return units === 'metric'
    ? { temperatureUnit: '°C', windUnit: 'km/h' }
    : { temperatureUnit: '°F', windUnit: 'mph' };
}

export function celsiusToUnits(celsius: number, units: Units): number {
  return units === 'metric' ? celsius : (celsius * 9) / 5 + 32;
}
