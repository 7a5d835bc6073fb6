import {
  AirQualityReport,
  AirQualityVariable,
  DEFAULT_AIR_QUALITY_VARIABLES,
  WeatherService,
} from '../../services/open-meteo/types.js';
import { MCPTool } from '../BaseTool.js';
import { ToolContent } from '../outcome.js';
import { AIR_QUALITY_SCOPE, AirQualityInput, AirQualitySchema } from './schemas.js';

const LABELS: Record<AirQualityVariable, string> = {
  pm10: 'PM10',
  pm2_5: 'PM2.5',
  carbon_monoxide: 'Carbon monoxide',
  nitrogen_dioxide: 'Nitrogen dioxide',
  ozone: 'Ozone',
  sulphur_dioxide: 'Sulphur dioxide',
  ammonia: 'Ammonia',
  dust: 'Dust',
  aerosol_optical_depth: 'Aerosol optical depth',
};

export function formatAirQuality(report: AirQualityReport, variables: readonly AirQualityVariable[]): string {
  const lines = [`Air quality in ${report.city} at ${report.current.time} (${report.timezone}):`];
  for (const variable of variables) {
    const value = report.current[variable];
    const unit = report.units[variable];
    const reading = value === undefined ? 'n/a' : unit ? `${value} ${unit}` : String(value);
    lines.push(`- ${LABELS[variable]}: ${reading}`);
  }
  return lines.join('\n');
}

export class GetAirQualityTool extends MCPTool<typeof AirQualitySchema> {
  name = 'get_air_quality';
  description = 'Get current air-quality readings for a city as a short summary. Requires the read_airquality scope.';
  readonly requiredScopes = [AIR_QUALITY_SCOPE];
  protected schema = AirQualitySchema;

  constructor(private readonly weather: WeatherService) {
    super();
  }

  protected async execute(input: AirQualityInput): Promise<ToolContent> {
    const variables = input.variables ?? DEFAULT_AIR_QUALITY_VARIABLES;
    const report = await this.weather.fetchAirQuality(input.city, variables);
    return this.text(formatAirQuality(report, variables));
  }
}
