import { z } from 'zod'

const isCalendarDate = (value: string) => {
  const parsed = new Date(`${value}T00:00:00.000Z`)
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value
}

export const isoDate = z.string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date as YYYY-MM-DD')
  .refine(isCalendarDate, 'Not a calendar date')

export const idList = z.array(z.string().min(1))

const withoutNulls = (value: unknown) => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return value
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== null))
}

/** Create payloads: a null counts as "not sent", so optional fields accept it and defaults apply. */
export const createSchemaOf = <T extends z.ZodRawShape>(schema: z.ZodObject<T>) =>
  z.preprocess(withoutNulls, schema)

/**
 * Update payloads: every field optional, and a null counts as "not sent" so it never
 * clears a stored value. Defaults of the create schema do not apply here.
 */
export const updateSchemaOf = <T extends z.ZodRawShape>(schema: z.ZodObject<T>) =>
  z.preprocess(withoutNulls, schema.partial())
