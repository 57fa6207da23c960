import { z } from 'zod';
import { JOB_NAMES } from '../jobs/jobStatus';
import { isIsoDate } from '../lib/dates';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const skuParamSchema = z.object({
  sku: z.string().trim().min(1).max(64)
});

export const forecastQuerySchema = z.object({
  horizonDays: z.coerce.number().int().min(1).max(365).optional(),
  modelType: z.string().trim().min(1).max(64).optional()
});

export const featuresQuerySchema = z.object({
  date: z.string().refine(isIsoDate, 'date must be formatted YYYY-MM-DD').optional(),
  includeExternal: booleanFlag.optional(),
  includeWeather: booleanFlag.optional(),
  includeTrends: booleanFlag.optional()
});

export const accuracyQuerySchema = z.object({
  windowDays: z.coerce.number().int().min(1).max(365).default(30)
});

export const jobParamSchema = z.object({
  name: z.enum(JOB_NAMES)
});
