import { AxiosInstance } from 'axios';
import { ZodType, ZodTypeDef } from 'zod';
import {
  AirPollution,
  AirPollutionSchema,
  CurrentWeather,
  CurrentWeatherSchema,
  Forecast,
  ForecastSchema,
} from '../schemas/weather.schema';
import { Units } from '../interfaces/weather';
import { MissingCredentialError, SchemaMismatchError } from '../utils/errors';

const BASE_URL = 'https://api.openweathermap.org/data/2.5';

export interface Coordinates {
  lat: number;
  lon: number;
}

export interface WeatherRequest {
  apiKey: string | undefined;
  location: string;
  units: Units;
  /** when set, queried by coordinates instead of by name */
  coords?: Coordinates;
  axiosClient: AxiosInstance;
}

function locationParams(location: string, coords?: Coordinates): Record<string, string | number> {
  return coords ? { lat: coords.lat, lon: coords.lon } : { q: location };
}

function requireKey(apiKey: string | undefined): string {
  if (!apiKey) throw new MissingCredentialError('OpenWeatherMap API key');
  return apiKey;
}

async function getValidated<T>(
  axiosClient: AxiosInstance,
  path: string,
  params: Record<string, string | number>,
  schema: ZodType<T, ZodTypeDef, unknown>,
  label: string
): Promise<T> {
  const response = await axiosClient.get(`${BASE_URL}${path}`, { params });
  const parsed = schema.safeParse(response.data);

  if (!parsed.success) {
    throw new SchemaMismatchError(label, parsed.error.issues);
  }

  return parsed.data;
}

export async function getCurrentWeather(req: WeatherRequest): Promise<CurrentWeather> {
  const appid = requireKey(req.apiKey);
  return getValidated(
    req.axiosClient,
    '/weather',
    { ...locationParams(req.location, req.coords), units: req.units, appid },
    CurrentWeatherSchema,
    'Weather API (current)'
  );
}

export async function getForecast(req: WeatherRequest): Promise<Forecast> {
  const appid = requireKey(req.apiKey);
  return getValidated(
    req.axiosClient,
    '/forecast',
    { ...locationParams(req.location, req.coords), units: req.units, appid },
    ForecastSchema,
    'Weather API (forecast)'
  );
}

export async function getAirPollution(
  apiKey: string | undefined,
  coords: Coordinates,
  axiosClient: AxiosInstance
): Promise<AirPollution> {
  const appid = requireKey(apiKey);
  return getValidated(
    axiosClient,
    '/air_pollution',
    { lat: coords.lat, lon: coords.lon, appid },
    AirPollutionSchema,
    'Weather API (air pollution)'
  );
}
