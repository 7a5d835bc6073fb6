import { z } from 'zod';
import { isValidTimeZone } from '../../utils/time.js';

export const timeZoneSchema = (description: string) =>
  z
    .string()
    .trim()
    .min(1, 'Time zone must not be empty')
    .refine((value) => value === '' || isValidTimeZone(value), (value) => ({ message: `Unknown time zone: ${value}` }))
    .describe(description);

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
