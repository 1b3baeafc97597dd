import { z } from 'zod';

export const OAuthTokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expiry_date: z.number().int().nonnegative(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
});

const EventTimeSchema = z.object({
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a YYYY-MM-DD date')
    .nullish(),
  dateTime: z.string().nullish(),
  timeZone: z.string().nullish(),
});

/**
 * Subset of a Google Calendar v3 event the dashboard relies on.
 */
export const GoogleEventSchema = z
  .object({
    id: z.string().nullish(),
    status: z.string().nullish(),
    summary: z.string().nullish(),
    location: z.string().nullish(),
    start: EventTimeSchema,
    end: EventTimeSchema.nullish(),
  })
  .refine((event) => Boolean(event.start.date || event.start.dateTime), {
    message: 'event start has neither date nor dateTime',
    path: ['start'],
  });

export const GoogleEventListSchema = z.array(GoogleEventSchema);

export type GoogleEvent = z.infer<typeof GoogleEventSchema>;
