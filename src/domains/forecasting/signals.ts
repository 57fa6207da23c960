import { z } from 'zod';

const nullableNumber = z.number().finite().nullable().default(null);

/** Payload stored on `weather` and `weather_forecast` signal rows. */
export const weatherSignalPayloadSchema = z.object({
  location: z.string(),
  latitude: z.number().optional(),
  longitude: z.number().optional(),
  temperature: nullableNumber,
  temperatureMax: nullableNumber,
  temperatureMin: nullableNumber,
  humidity: nullableNumber,
  precipitation: nullableNumber,
  weatherCode: z.number().int().nullable().default(null),
  description: z.string().nullable().default(null)
});

export type WeatherSignalPayload = z.infer<typeof weatherSignalPayloadSchema>;

/** Payload stored on `trends` signal rows, one per product category. */
export const trendSignalPayloadSchema = z.object({
  category: z.string(),
  keywords: z.array(z.string()).default([]),
  score: z.number().finite(),
  direction: z.enum(['increasing', 'decreasing', 'stable']),
  points: z.number().int().nonnegative().default(0)
});

export type TrendSignalPayload = z.infer<typeof trendSignalPayloadSchema>;

/** Payload stored on `festival` signal rows. */
export const festivalSignalPayloadSchema = z.object({
  name: z.string(),
  type: z.string(),
  region: z.string(),
  impactWindowDays: z.number().int().nonnegative(),
  impactCategories: z.array(z.string()).default([]),
  referenceVersion: z.string()
});

export type FestivalSignalPayload = z.infer<typeof festivalSignalPayloadSchema>;

/** Location code used for signals that are not tied to a place. */
export const ANY_LOCATION = 'all';
/** Product code used for signals that are not tied to a product category. */
export const ANY_PRODUCT = 'all';

export function locationCode(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, '-');
}
