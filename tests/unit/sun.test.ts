import { computeSunPosition, deriveUvIndex, seasonalMaxUv, uvLevel } from '@/utils/sun';

describe('computeSunPosition (unit)', () => {
  const sunrise = new Date('2024-06-21T05:30:00Z');
  const sunset = new Date('2024-06-21T20:30:00Z');

  it('is 0 before sunrise and 100 after sunset', () => {
    expect(computeSunPosition(new Date('2024-06-21T03:00:00Z'), sunrise, sunset)).toBe(0);
    expect(computeSunPosition(sunrise, sunrise, sunset)).toBe(0);
    expect(computeSunPosition(sunset, sunrise, sunset)).toBe(100);
    expect(computeSunPosition(new Date('2024-06-21T23:00:00Z'), sunrise, sunset)).toBe(100);
  });

  it('is 50 halfway through the day', () => {
    expect(computeSunPosition(new Date('2024-06-21T13:00:00Z'), sunrise, sunset)).toBe(50);
  });

  /**
   * Purpose:
   * Verifies Invariant:
   * - position stays within [0, 100]
   * - position never decreases as the day advances
   */
  it('stays in range and is monotonic across the day', () => {
    let previous = -1;
    for (let minutes = 0; minutes <= 24 * 60; minutes += 7) {
      const now = new Date(Date.UTC(2024, 5, 21) + minutes * 60_000);
      const pos = computeSunPosition(now, sunrise, sunset);
      expect(pos).toBeGreaterThanOrEqual(0);
      expect(pos).toBeLessThanOrEqual(100);
      expect(pos).toBeGreaterThanOrEqual(previous);
      previous = pos;
    }
  });

  it('treats an inverted window as already set', () => {
    expect(computeSunPosition(new Date('2024-06-21T12:00:00Z'), sunset, sunrise)).toBe(100);
    expect(computeSunPosition(new Date('2024-06-21T03:00:00Z'), sunset, sunrise)).toBe(100);
    expect(computeSunPosition(sunrise, sunrise, sunrise)).toBe(100);
  });
});

describe('deriveUvIndex (unit)', () => {
  const daylight = { sunrise: 6, sunset: 20 };

  it('is 0 outside daylight', () => {
    expect(deriveUvIndex(5, 172, 40, daylight)).toBe(0);
    expect(deriveUvIndex(6, 172, 40, daylight)).toBe(0);
    expect(deriveUvIndex(20, 172, 40, daylight)).toBe(0);
    expect(deriveUvIndex(23.5, 172, 40, daylight)).toBe(0);
  });

  /**
   * Purpose:
   * Verifies Invariant:
   * - the value peaks at solar noon at the seasonal maximum
   * - no hour exceeds that maximum
   */
  it('peaks at the seasonal maximum at solar noon', () => {
    const max = seasonalMaxUv(172, 40);
    expect(deriveUvIndex(13, 172, 40, daylight)).toBe(max);

    for (let hour = 0; hour <= 24; hour += 0.5) {
      expect(deriveUvIndex(hour, 172, 40, daylight)).toBeLessThanOrEqual(max);
    }
  });

  it('is higher in summer than in winter at mid latitudes', () => {
    expect(seasonalMaxUv(172, 40)).toBeGreaterThan(seasonalMaxUv(355, 40));
  });

  it('is 0 when the sun never rises', () => {
    expect(deriveUvIndex(12, 355, 40, { sunrise: 12, sunset: 12 })).toBe(0);
  });

  it('labels UV levels', () => {
    expect(uvLevel(0)).toBe('Low');
    expect(uvLevel(5.9)).toBe('Moderate');
    expect(uvLevel(7)).toBe('High');
    expect(uvLevel(10)).toBe('Very High');
    expect(uvLevel(11)).toBe('Extreme');
  });
});
