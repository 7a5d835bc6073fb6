import { z } from 'zod';
import { WeatherReport, WeatherService } from '../../services/open-meteo/types.js';
import { MCPTool } from '../BaseTool.js';
import { ToolContent } from '../outcome.js';
import { citySchema } from './schemas.js';

const CurrentWeatherSchema = z.object({
  city: citySchema,
});

/** `n/a` stands in for a reading the upstream has no data for. */
function reading(value: number | null, unit = ''): string {
  return value === null ? 'n/a' : `${value}${unit}`;
}

export function formatCurrentWeather(report: WeatherReport): string {
  const place = report.country ? `${report.city}, ${report.country}` : report.city;
  const c = report.current;
  const visibility = c.visibility === null ? 'n/a' : `${(c.visibility / 1000).toFixed(1)} km`;
  return [
    `The weather in ${place} is ${c.weather_description.toLowerCase()} with a temperature of ${reading(c.temperature, '°C')} (feels like ${reading(c.feels_like, '°C')}).`,
    `Relative humidity is ${reading(c.humidity, '%')} and the dew point is ${reading(c.dew_point, '°C')}.`,
    `Wind ${reading(c.wind_speed, ' km/h')} from ${reading(c.wind_direction, '°')}, gusts up to ${reading(c.wind_gusts, ' km/h')}.`,
    `Precipitation ${reading(c.precipitation, ' mm')}, cloud cover ${reading(c.cloud_cover, '%')}, pressure ${reading(c.pressure, ' hPa')}, UV index ${reading(c.uv_index)}, visibility ${visibility}.`,
    `Observed at ${c.time} (${report.timezone}).`,
  ].join('\n');
}

export class GetCurrentWeatherTool extends MCPTool<typeof CurrentWeatherSchema> {
  name = 'get_current_weather';
  description = 'Get the current weather for a city as a short human-readable summary.';
  protected schema = CurrentWeatherSchema;

  constructor(private readonly weather: WeatherService) {
    super();
  }

  protected async execute(input: z.infer<typeof CurrentWeatherSchema>): Promise<ToolContent> {
    const report = await this.weather.fetchCurrentWeather(input.city);
    return this.text(formatCurrentWeather(report));
  }
}
