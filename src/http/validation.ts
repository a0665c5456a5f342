import { z } from 'zod';
import { UNIT_SYSTEMS } from '../core/units/unitConverter.js';
import { ValidationError } from '../utils/errors.js';

export const unitsSchema = z.enum(UNIT_SYSTEMS);

export const forecastQuerySchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lon: z.coerce.number().min(-180).max(180),
  units: unitsSchema.optional(),
  timezone: z.string().min(1).optional(),
  day: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .optional(),
});

export const newFavouriteSchema = z.object({
  name: z.string().trim().min(1),
  admin1: z.string().trim().min(1).optional(),
  country: z.string().trim().min(1).optional(),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  timezone: z.string().min(1).optional(),
});

export const compareQuerySchema = z.object({
  units: unitsSchema.optional(),
  ids: z
    .string()
    .regex(/^\d+(,\d+)*$/)
    .transform((value) => value.split(',').map(Number))
    .optional(),
});

export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError('Invalid request', issues);
  }
  return result.data;
}
