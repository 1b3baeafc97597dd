import { z } from 'zod';
import { isValidTimeZone } from '../utils/time';

// largest interval setInterval accepts, in seconds
const MAX_REFRESH_INTERVAL = 2147483;

export const RouteSchema = z.object({
  name: z.string().min(1),
  baseMinutes: z.number().positive(),
});

const DEFAULT_ROUTES: z.input<typeof RouteSchema>[] = [
  { name: 'Downtown', baseMinutes: 15 },
  { name: 'Airport', baseMinutes: 25 },
  { name: 'University', baseMinutes: 12 },
];

export const WeatherConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  airQualityApiKey: z.string().min(1).optional(),
  location: z.string().min(1).default('London,UK'),
  units: z.enum(['metric', 'imperial']).default('metric'),
  latitude: z.number().min(-90).max(90).optional(),
  longitude: z.number().min(-180).max(180).optional(),
});

export const CalendarConfigSchema = z.object({
  clientId: z.string().min(1).optional(),
  clientSecret: z.string().min(1).optional(),
  calendarIds: z.array(z.string().min(1)).default(['primary']),
  tokenPath: z.string().min(1).default('token.json'),
  redirectUri: z.string().url().default('http://127.0.0.1:8081'),
  maxEvents: z.number().int().positive().default(50),
  useMockData: z.boolean().default(false),
});

export const RssConfigSchema = z.object({
  // label -> feed URL, rendered in this order
  feeds: z.record(z.string().min(1), z.string().url()).default({}),
  itemsPerFeed: z.number().int().positive().default(3),
  maxItems: z.number().int().positive().default(30),
});

export const LmsConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  maxAssignments: z.number().int().positive().default(10),
  maxAnnouncements: z.number().int().positive().default(5),
});

export const DisplayConfigSchema = z.object({
  title: z.string().default('Dashboard'),
  weekStartsOn: z.union([z.literal(0), z.literal(1)]).default(0),
});

export const DashboardConfigSchema = z.object({
  timezone: z
    .string()
    .min(1)
    .refine(isValidTimeZone, { message: 'Unknown IANA timezone' })
    .default('UTC'),
  refreshInterval: z.number().int().positive().max(MAX_REFRESH_INTERVAL).default(900),
  httpTimeoutSeconds: z.number().positive().max(120).default(10),
  outputDir: z.string().min(1).default('output'),
  templateDir: z.string().min(1).default('templates'),
  display: DisplayConfigSchema.default({}),
  weather: WeatherConfigSchema.default({}),
  calendar: CalendarConfigSchema.default({}),
  rss: RssConfigSchema.default({}),
  lms: LmsConfigSchema.default({}),
  localInfo: z
    .object({
      routes: z.array(RouteSchema).default(DEFAULT_ROUTES),
    })
    .default({}),
});

/**
 * Environment overrides. Empty strings are stripped before parsing so that
 * compose-style `${VAR:-}` placeholders count as unset.
 */
export const EnvOverridesSchema = z.object({
  OPENWEATHER_API_KEY: z.string().min(1).optional(),
  OPENWEATHER_AIR_QUALITY_KEY: z.string().min(1).optional(),
  WEATHER_LOCATION: z.string().min(1).optional(),
  WEATHER_UNITS: z.enum(['metric', 'imperial']).optional(),
  GOOGLE_CALENDAR_CLIENT_ID: z.string().min(1).optional(),
  GOOGLE_CALENDAR_CLIENT_SECRET: z.string().min(1).optional(),
  GOOGLE_CALENDAR_IDS: z.string().min(1).optional(),
  CANVAS_BASE_URL: z.string().url().optional(),
  CANVAS_API_KEY: z.string().min(1).optional(),
  DASHBOARD_TIMEZONE: z
    .string()
    .min(1)
    .refine(isValidTimeZone, { message: 'Unknown IANA timezone' })
    .optional(),
  REFRESH_INTERVAL: z.coerce.number().int().positive().max(MAX_REFRESH_INTERVAL).optional(),
});

export type DashboardConfig = z.infer<typeof DashboardConfigSchema>;
export type WeatherConfig = z.infer<typeof WeatherConfigSchema>;
export type CalendarConfig = z.infer<typeof CalendarConfigSchema>;
export type LmsConfig = z.infer<typeof LmsConfigSchema>;
export type Route = z.infer<typeof RouteSchema>;
export type EnvOverrides = z.infer<typeof EnvOverridesSchema>;
