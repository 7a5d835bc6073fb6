import { z } from 'zod';
import { offsetMinutes, parseLocalDateTime, toZonedIso, zonedToUtc } from '../../utils/time.js';
import { MCPTool } from '../BaseTool.js';
import { ToolContent } from '../outcome.js';
import { timeZoneSchema } from './schemas.js';

const ConvertTimeSchema = z.object({
  datetime_str: z
    .string()
    .transform((value, ctx) => {
      const clock = parseLocalDateTime(value);
      if (!clock) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a datetime in YYYY-MM-DD HH:MM[:SS] format' });
        return z.NEVER;
      }
      return clock;
    })
    .describe('Local date and time in the source zone, YYYY-MM-DD HH:MM[:SS]'),
  from_timezone: timeZoneSchema('IANA time zone the datetime is expressed in'),
  to_timezone: timeZoneSchema('IANA time zone to convert to'),
});

function formatHours(minutes: number): string {
  const hours = minutes / 60;
  return `${hours >= 0 ? '+' : ''}${hours}h`;
}

export class ConvertTimeTool extends MCPTool<typeof ConvertTimeSchema> {
  name = 'convert_time';
  description = 'Convert a local date and time from one time zone to another.';
  protected schema = ConvertTimeSchema;

  protected async execute(input: z.infer<typeof ConvertTimeSchema>): Promise<ToolContent> {
    const instant = zonedToUtc(input.datetime_str, input.from_timezone);
    const difference = offsetMinutes(instant, input.to_timezone) - offsetMinutes(instant, input.from_timezone);

    return this.structured({
      original_datetime: toZonedIso(instant, input.from_timezone),
      original_timezone: input.from_timezone,
      converted_datetime: toZonedIso(instant, input.to_timezone),
      target_timezone: input.to_timezone,
      time_difference: formatHours(difference),
    });
  }
}
