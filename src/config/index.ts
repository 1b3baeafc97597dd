import fs from 'fs';
import { ZodIssue } from 'zod';
import {
  DashboardConfig,
  DashboardConfigSchema,
  EnvOverrides,
  EnvOverridesSchema,
} from '../schemas/config.schema';
import { ConfigError } from '../utils/errors';
import { logger } from '../logger';

export const DEFAULT_CONFIG_PATH = 'config/config.json';

/**
 * Docker secrets: a value pointing into /run/secrets/ is read from that file.
 */
export function resolveSecret(value: string | undefined): string | undefined {
  if (!value) return undefined;
  if (!value.startsWith('/run/secrets/')) return value;
  try {
    return fs.readFileSync(value, 'utf8').trim();
  } catch {
    throw new ConfigError(`Cannot read secret file ${value}`);
  }
}

function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function readConfigFile(configPath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf8');
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
      logger.warn({ configPath }, 'Config file not found, using defaults and environment');
      return {};
    }
    throw new ConfigError(`Cannot read config file ${configPath}`);
  }

  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `Config file ${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

function parseEnv(env: NodeJS.ProcessEnv): EnvOverrides {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvOverridesSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment overrides', formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

function applyOverrides(config: DashboardConfig, env: EnvOverrides): DashboardConfig {
  const calendarIds = env.GOOGLE_CALENDAR_IDS
    ? env.GOOGLE_CALENDAR_IDS.split(',').map((id) => id.trim()).filter(Boolean)
    : config.calendar.calendarIds;

  return {
    ...config,
    timezone: env.DASHBOARD_TIMEZONE ?? config.timezone,
    refreshInterval: env.REFRESH_INTERVAL ?? config.refreshInterval,
    weather: {
      ...config.weather,
      apiKey: resolveSecret(env.OPENWEATHER_API_KEY ?? config.weather.apiKey),
      airQualityApiKey: resolveSecret(
        env.OPENWEATHER_AIR_QUALITY_KEY ?? config.weather.airQualityApiKey
      ),
      location: env.WEATHER_LOCATION ?? config.weather.location,
      units: env.WEATHER_UNITS ?? config.weather.units,
    },
    calendar: {
      ...config.calendar,
      clientId: env.GOOGLE_CALENDAR_CLIENT_ID ?? config.calendar.clientId,
      clientSecret: resolveSecret(
        env.GOOGLE_CALENDAR_CLIENT_SECRET ?? config.calendar.clientSecret
      ),
      calendarIds,
    },
    lms: {
      ...config.lms,
      baseUrl: env.CANVAS_BASE_URL ?? config.lms.baseUrl,
      apiKey: resolveSecret(env.CANVAS_API_KEY ?? config.lms.apiKey),
    },
  };
}

/**
 * Loads the configuration once per invocation. A missing file is tolerated;
 * unreadable, malformed or invalid configuration throws ConfigError.
 */
export function loadConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): DashboardConfig {
  const raw = readConfigFile(configPath);

  const parsed = DashboardConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${configPath}`, formatIssues(parsed.error.issues));
  }

  const config = applyOverrides(parsed.data, parseEnv(env));

  logger.info(
    {
      configPath,
      location: config.weather.location,
      timezone: config.timezone,
      feeds: Object.keys(config.rss.feeds).length,
      calendars: config.calendar.calendarIds.length,
      lms: isLmsConfigured(config),
    },
    'Configuration loaded'
  );

  return config;
}

export function isLmsConfigured(config: DashboardConfig): boolean {
  return Boolean(config.lms.baseUrl && config.lms.apiKey);
}
