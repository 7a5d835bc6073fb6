import { z } from 'zod';
import { formatOffset, isDaylightSaving, offsetMinutes, timeZoneAbbreviation, toZonedIso } from '../../utils/time.js';
import { MCPTool } from '../BaseTool.js';
import { ToolContent } from '../outcome.js';
import { Clock, systemClock, timeZoneSchema } from './schemas.js';

const TimeZoneInfoSchema = z.object({
  timezone_name: timeZoneSchema("IANA time zone name, e.g. 'Europe/London'"),
});

export class GetTimeZoneInfoTool extends MCPTool<typeof TimeZoneInfoSchema> {
  name = 'get_timezone_info';
  description = 'Get the current UTC offset, abbreviation and daylight-saving state of a time zone.';
  protected schema = TimeZoneInfoSchema;

  constructor(private readonly now: Clock = systemClock) {
    super();
  }

  protected async execute(input: z.infer<typeof TimeZoneInfoSchema>): Promise<ToolContent> {
    const now = this.now();
    const timezone = input.timezone_name;
    const offset = offsetMinutes(now, timezone);
    return this.structured({
      timezone,
      current_local_time: toZonedIso(now, timezone),
      utc_offset: formatOffset(offset),
      utc_offset_hours: offset / 60,
      abbreviation: timeZoneAbbreviation(now, timezone),
      is_dst: isDaylightSaving(now, timezone),
    });
  }
}
