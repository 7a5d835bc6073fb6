import { z } from 'zod';
import { HourlyWeather, WeatherRange, WeatherService } from '../../services/open-meteo/types.js';
import { MCPTool } from '../BaseTool.js';
import { ToolContent } from '../outcome.js';
import { citySchema, isoDateSchema } from './schemas.js';

const DateRangeSchema = z
  .object({
    city: citySchema,
    start_date: isoDateSchema.describe('First day of the range (YYYY-MM-DD)'),
    end_date: isoDateSchema.describe('Last day of the range, inclusive (YYYY-MM-DD)'),
  })
  .refine((input) => input.start_date <= input.end_date, {
    message: 'start_date must not be after end_date',
    path: ['start_date'],
  });

function summarizeDay(date: string, hours: HourlyWeather[]): string {
  const temperatures = hours.flatMap((h) => (h.temperature === null ? [] : [h.temperature]));
  if (temperatures.length === 0) {
    return `${date}: no data`;
  }

  const humidities = hours.flatMap((h) => (h.humidity === null ? [] : [h.humidity]));
  const precipitation = hours.reduce((sum, h) => sum + (h.precipitation ?? 0), 0);

  const counts = new Map<string, number>();
  for (const hour of hours) {
    counts.set(hour.weather_description, (counts.get(hour.weather_description) ?? 0) + 1);
  }
  let dominant = '';
  let best = 0;
  for (const [description, count] of counts) {
    if (count > best) {
      dominant = description;
      best = count;
    }
  }

  const parts = [
    `${Math.min(...temperatures).toFixed(1)}°C to ${Math.max(...temperatures).toFixed(1)}°C`,
  ];
  if (humidities.length > 0) {
    const average = humidities.reduce((sum, h) => sum + h, 0) / humidities.length;
    parts.push(`average humidity ${Math.round(average)}%`);
  }
  parts.push(`precipitation ${precipitation.toFixed(1)} mm`);
  parts.push(`mostly ${dominant.toLowerCase()}`);
  return `${date}: ${parts.join(', ')}`;
}

export function formatWeatherRange(range: WeatherRange): string {
  const byDay = new Map<string, HourlyWeather[]>();
  for (const hour of range.hourly) {
    const day = hour.time.slice(0, 10);
    const bucket = byDay.get(day);
    if (bucket) {
      bucket.push(hour);
    } else {
      byDay.set(day, [hour]);
    }
  }

  const place = range.country ? `${range.city}, ${range.country}` : range.city;
  const lines = [`Weather for ${place} from ${range.start_date} to ${range.end_date} (${range.timezone}):`];
  for (const [day, hours] of byDay) {
    lines.push(summarizeDay(day, hours));
  }
  return lines.join('\n');
}

export class GetWeatherByDateRangeTool extends MCPTool<typeof DateRangeSchema> {
  name = 'get_weather_by_datetime_range';
  description = 'Get the weather for a city over a range of days, summarised per day.';
  protected schema = DateRangeSchema;

  constructor(private readonly weather: WeatherService) {
    super();
  }

  protected async execute(input: z.infer<typeof DateRangeSchema>): Promise<ToolContent> {
    const range = await this.weather.fetchRange(input.city, input.start_date, input.end_date);
    return this.text(formatWeatherRange(range));
  }
}
