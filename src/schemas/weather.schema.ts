import { z } from "zod";

/* ------------------ Reusable Schemas ------------------ */

export const ConditionSchema = z.object({
  id: z.number(),
  main: z.string(),
  description: z.string(),
  icon: z.string(),
});

export const CoordSchema = z.object({
  lat: z.number(),
  lon: z.number(),
});

export const WindSchema = z.object({
  speed: z.number(),
  deg: z.number().default(0),
});

/* ------------------ /data/2.5/weather ------------------ */

export const CurrentWeatherSchema = z.object({
  coord: CoordSchema,
  weather: z.array(ConditionSchema).min(1),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number(),
    pressure: z.number().optional(),
  }),
  wind: WindSchema,
  sys: z.object({
    sunrise: z.number(),
    sunset: z.number(),
    country: z.string().optional(),
  }),
  // shift from UTC in seconds
  timezone: z.number().default(0),
  dt: z.number(),
  name: z.string(),
});

/* ------------------ /data/2.5/forecast ------------------ */

export const ForecastEntrySchema = z.object({
  dt: z.number(),
  main: z.object({
    temp: z.number(),
    feels_like: z.number().optional(),
    temp_min: z.number(),
    temp_max: z.number(),
    humidity: z.number(),
  }),
  weather: z.array(ConditionSchema).min(1),
  wind: WindSchema,
  // probability of precipitation, 0..1
  pop: z.number().min(0).max(1).default(0),
});

export const ForecastSchema = z.object({
  list: z.array(ForecastEntrySchema).min(1),
  city: z.object({
    name: z.string(),
    coord: CoordSchema,
    timezone: z.number().default(0),
    sunrise: z.number().optional(),
    sunset: z.number().optional(),
  }),
});

/* ------------------ /data/2.5/air_pollution ------------------ */

export const AirPollutionSchema = z.object({
  list: z
    .array(
      z.object({
        dt: z.number(),
        main: z.object({ aqi: z.number().int().min(1).max(5) }),
        components: z
          .object({
            pm2_5: z.number().optional(),
            pm10: z.number().optional(),
            o3: z.number().optional(),
          })
          .default({}),
      })
    )
    .min(1),
});

/* ------------------ Types ------------------ */

export type CurrentWeather = z.infer<typeof CurrentWeatherSchema>;
export type ForecastEntry = z.infer<typeof ForecastEntrySchema>;
export type Forecast = z.infer<typeof ForecastSchema>;
export type AirPollution = z.infer<typeof AirPollutionSchema>;
