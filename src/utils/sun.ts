export interface DaylightHours {
  /** fractional local hour of sunrise */
  sunrise: number;
  /** fractional local hour of sunset */
  sunset: number;
}

const DEFAULT_DAYLIGHT: DaylightHours = { sunrise: 6, sunset: 18 };

const PEAK_UV = 12;

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

/**
 * Solar declination in degrees (Cooper's approximation).
 */
function solarDeclination(dayOfYear: number): number {
  return 23.44 * Math.sin((2 * Math.PI * (284 + dayOfYear)) / 365);
}

/**
 * Clear-sky UV ceiling at solar noon for the date and latitude.
 */
export function seasonalMaxUv(dayOfYear: number, latitude: number): number {
  const zenith = toRadians(latitude - solarDeclination(dayOfYear));
  const factor = Math.max(0, Math.cos(zenith));
  return round1(PEAK_UV * factor * factor);
}

/**
 * Synthetic UV index for APIs that do not report one. Sine curve over the
 * daylight window peaking at solar noon, zero outside [sunrise, sunset].
 */
export function deriveUvIndex(
  hour: number,
  dayOfYear: number,
  latitude: number,
  daylight: DaylightHours = DEFAULT_DAYLIGHT
): number {
  const { sunrise, sunset } = daylight;
  if (sunset <= sunrise || hour <= sunrise || hour >= sunset) return 0;

  const progress = (hour - sunrise) / (sunset - sunrise);
  const value = seasonalMaxUv(dayOfYear, latitude) * Math.sin(Math.PI * progress);
  return Math.max(0, round1(value));
}

/**
 * Position of the sun along the day arc, 0 at sunrise and 100 at sunset.
 * The arc does not wrap: before sunrise is 0, after sunset is 100.
 */
export function computeSunPosition(now: Date, sunrise: Date, sunset: Date): number {
  const t = now.getTime();
  const start = sunrise.getTime();
  const end = sunset.getTime();

  if (end <= start || t >= end) return 100;
  if (t <= start) return 0;

  const pct = ((t - start) / (end - start)) * 100;
  return Math.min(100, Math.max(0, round1(pct)));
}

export function uvLevel(uv: number): 'Low' | 'Moderate' | 'High' | 'Very High' | 'Extreme' {
  if (uv < 3) return 'Low';
  if (uv < 6) return 'Moderate';
  if (uv < 8) return 'High';
  if (uv < 11) return 'Very High';
  return 'Extreme';
}
