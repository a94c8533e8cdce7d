/**
 * Common Zod schemas shared across tool definitions and configuration
 */

import { z } from 'zod';

/**
 * Day of week enum
 */
export const DayOfWeekSchema = z.enum([
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
]);

/**
 * Wall-clock time of day
 */
export const ClockTimeSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Must be in HH:mm format');

/**
 * ISO datetime string (basic validation)
 */
export const ISODateTimeSchema = z.string().refine(
  (val) => !isNaN(Date.parse(val)),
  { message: 'Must be a valid ISO 8601 datetime string' }
);

/**
 * Working hours schema
 */
export const WorkingHoursSchema = z.object({
  start: ClockTimeSchema,
  end: ClockTimeSchema,
  days: z.array(DayOfWeekSchema).min(1, 'At least one working day is required'),
});

/**
 * Attendee identifiers are passed through to the calendar as given
 */
export const AttendeeListSchema = z.array(z.string().min(1));
