import { z } from 'zod';
import { isDaylightSaving, toZonedIso, weekdayIn } from '../../utils/time.js';
import { MCPTool } from '../BaseTool.js';
import { ToolContent } from '../outcome.js';
import { Clock, systemClock, timeZoneSchema } from './schemas.js';

const CurrentDateTimeSchema = z.object({
  timezone_name: timeZoneSchema("IANA time zone name, e.g. 'America/New_York' or 'Asia/Tokyo'"),
});

export class GetCurrentDateTimeTool extends MCPTool<typeof CurrentDateTimeSchema> {
  name = 'get_current_datetime';
  description = 'Get the current date and time in a time zone.';
  protected schema = CurrentDateTimeSchema;

  constructor(private readonly now: Clock = systemClock) {
    super();
  }

  protected async execute(input: z.infer<typeof CurrentDateTimeSchema>): Promise<ToolContent> {
    const now = this.now();
    const timezone = input.timezone_name;
    return this.structured({
      timezone,
      datetime: toZonedIso(now, timezone),
      day_of_week: weekdayIn(now, timezone),
      is_dst: isDaylightSaving(now, timezone),
    });
  }
}
