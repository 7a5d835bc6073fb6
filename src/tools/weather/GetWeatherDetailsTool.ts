import { z } from 'zod';
import { WeatherService } from '../../services/open-meteo/types.js';
import { MCPTool } from '../BaseTool.js';
import { ToolContent } from '../outcome.js';
import { citySchema } from './schemas.js';

const WeatherDetailsSchema = z.object({
  city: citySchema,
  include_forecast: z.boolean().optional().describe('Also return the hourly forecast for the next 24 hours'),
});

export class GetWeatherDetailsTool extends MCPTool<typeof WeatherDetailsSchema> {
  name = 'get_weather_details';
  description = 'Get detailed current weather for a city as structured JSON, optionally with a 24 hour forecast.';
  protected schema = WeatherDetailsSchema;

  constructor(private readonly weather: WeatherService) {
    super();
  }

  protected async execute(input: z.infer<typeof WeatherDetailsSchema>): Promise<ToolContent> {
    const report = await this.weather.fetchCurrentWeather(input.city, {
      includeForecast: input.include_forecast ?? false,
    });
    return this.structured(report);
  }
}
