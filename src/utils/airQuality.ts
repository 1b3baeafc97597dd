export type AqiStatus =
  | 'Good'
  | 'Moderate'
  | 'Unhealthy for Sensitive Groups'
  | 'Unhealthy'
  | 'Very Unhealthy'
  | 'Hazardous';

interface Breakpoint {
  cLow: number;
  cHigh: number;
  iLow: number;
  iHigh: number;
}

// US EPA PM2.5 (24h) breakpoints, 2024 revision
const PM25_BREAKPOINTS: Breakpoint[] = [
  { cLow: 0.0, cHigh: 9.0, iLow: 0, iHigh: 50 },
  { cLow: 9.1, cHigh: 35.4, iLow: 51, iHigh: 100 },
  { cLow: 35.5, cHigh: 55.4, iLow: 101, iHigh: 150 },
  { cLow: 55.5, cHigh: 125.4, iLow: 151, iHigh: 200 },
  { cLow: 125.5, cHigh: 225.4, iLow: 201, iHigh: 300 },
  { cLow: 225.5, cHigh: 325.4, iLow: 301, iHigh: 500 },
];

// OpenWeatherMap qualitative index (1-5) to a representative US AQI
const OWM_INDEX_TO_AQI: Record<number, number> = {
  1: 25,
  2: 75,
  3: 125,
  4: 175,
  5: 250,
};

export function aqiFromPm25(concentration: number): number {
  const c = Math.floor(Math.max(0, concentration) * 10) / 10;
  const bp = PM25_BREAKPOINTS.find((b) => c >= b.cLow && c <= b.cHigh);
  if (!bp) {
    // gaps between bands (e.g. 9.05) resolve to the upper band
    const upper = PM25_BREAKPOINTS.find((b) => c < b.cLow);
    return upper ? upper.iLow : 500;
  }
  return Math.round(((bp.iHigh - bp.iLow) / (bp.cHigh - bp.cLow)) * (c - bp.cLow) + bp.iLow);
}

export function aqiFromOwmIndex(index: number): number {
  return OWM_INDEX_TO_AQI[index] ?? 50;
}

export function aqiStatus(aqi: number): AqiStatus {
  if (aqi <= 50) return 'Good';
  if (aqi <= 100) return 'Moderate';
  if (aqi <= 150) return 'Unhealthy for Sensitive Groups';
  if (aqi <= 200) return 'Unhealthy';
  if (aqi <= 300) return 'Very Unhealthy';
  return 'Hazardous';
}
