import { z } from 'zod';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export const citySchema = z
  .string()
  .trim()
  .min(1, 'City name must not be empty')
  .describe("The city to look up, in English (translate the name first if the user wrote it in another language)");

export const isoDateSchema = z
  .string()
  .regex(ISO_DATE, 'Expected a date in YYYY-MM-DD format')
  // Only judged once the format matches, so a malformed value reports one issue.
  .refine((value) => !ISO_DATE.test(value) || isCalendarDate(value), 'Not a valid calendar date');
