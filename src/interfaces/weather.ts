import { AqiStatus } from '../utils/airQuality';

export type Units = 'metric' | 'imperial';

export interface AirQualityReading {
  aqi: number;
  status: AqiStatus;
  source: 'api' | 'estimated';
  pm25?: number;
}

export interface ForecastDay {
  /** short weekday name, e.g. "Mon" */
  day: string;
  date: string;
  high: number;
  low: number;
  icon: string;
  description: string;
}

export interface HourlyPoint {
  /** local HH:mm */
  time: string;
  temp: number;
  windSpeed: number;
  humidity: number;
  /** 0-100 */
  rainProbability: number;
}

export type WeatherSubCall = 'current' | 'forecast' | 'airQuality';

export interface WeatherSnapshot {
  location: string;
  latitude?: number;
  longitude?: number;
  units: Units;
  temperatureUnit: '°C' | '°F';
  windUnit: 'km/h' | 'mph';
  temperature: number;
  feelsLike: number;
  humidity: number;
  conditionCode: number;
  condition: string;
  description: string;
  icon: string;
  windSpeed: number;
  windDirection: number;
  windCompass: string;
  /** epoch ms */
  sunrise: number;
  /** epoch ms */
  sunset: number;
  uvIndex: number;
  uvDerived: boolean;
  airQuality: AirQualityReading;
  forecast: ForecastDay[];
  hourly: HourlyPoint[];
  /** sub-calls whose fields were synthesized instead of fetched */
  synthesized: WeatherSubCall[];
}
