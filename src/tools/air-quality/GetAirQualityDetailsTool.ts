import { DEFAULT_AIR_QUALITY_VARIABLES, WeatherService } from '../../services/open-meteo/types.js';
import { MCPTool } from '../BaseTool.js';
import { ToolContent } from '../outcome.js';
import { AIR_QUALITY_SCOPE, AirQualityInput, AirQualitySchema } from './schemas.js';

export class GetAirQualityDetailsTool extends MCPTool<typeof AirQualitySchema> {
  name = 'get_air_quality_details';
  description = 'Get current air-quality readings for a city as structured JSON. Requires the read_airquality scope.';
  readonly requiredScopes = [AIR_QUALITY_SCOPE];
  protected schema = AirQualitySchema;

  constructor(private readonly weather: WeatherService) {
    super();
  }

  protected async execute(input: AirQualityInput): Promise<ToolContent> {
    const report = await this.weather.fetchAirQuality(input.city, input.variables ?? DEFAULT_AIR_QUALITY_VARIABLES);
    return this.structured(report);
  }
}
