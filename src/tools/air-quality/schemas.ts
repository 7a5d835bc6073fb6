import { z } from 'zod';
import { AIR_QUALITY_VARIABLES } from '../../services/open-meteo/types.js';
import { citySchema } from '../weather/schemas.js';

/** Scope a token must grant to read air-quality data. */
export const AIR_QUALITY_SCOPE = 'read_airquality';

export const AirQualitySchema = z.object({
  city: citySchema,
  variables: z
    .array(z.enum(AIR_QUALITY_VARIABLES))
    .min(1)
    .optional()
    .describe('Pollutants to report; defaults to pm10, pm2_5, carbon_monoxide, nitrogen_dioxide and ozone'),
});

export type AirQualityInput = z.infer<typeof AirQualitySchema>;
