import { WeatherService } from '../services/open-meteo/types.js';
import { ToolProtocol } from './BaseTool.js';
import { GetAirQualityDetailsTool } from './air-quality/GetAirQualityDetailsTool.js';
import { GetAirQualityTool } from './air-quality/GetAirQualityTool.js';
import { ConvertTimeTool } from './time/ConvertTimeTool.js';
import { GetCurrentDateTimeTool } from './time/GetCurrentDateTimeTool.js';
import { GetTimeZoneInfoTool } from './time/GetTimeZoneInfoTool.js';
import { Clock, systemClock } from './time/schemas.js';
import { GetCurrentWeatherTool } from './weather/GetCurrentWeatherTool.js';
import { GetWeatherByDateRangeTool } from './weather/GetWeatherByDateRangeTool.js';
import { GetWeatherDetailsTool } from './weather/GetWeatherDetailsTool.js';

export interface ToolDependencies {
  weather: WeatherService;
  clock?: Clock;
}

/**
 * The server's fixed tool set, in the order `tools/list` reports it.
 */
export function createDefaultTools({ weather, clock = systemClock }: ToolDependencies): ToolProtocol[] {
  return [
    new GetCurrentWeatherTool(weather),
    new GetWeatherByDateRangeTool(weather),
    new GetWeatherDetailsTool(weather),
    new GetCurrentDateTimeTool(clock),
    new GetTimeZoneInfoTool(clock),
    new ConvertTimeTool(),
    new GetAirQualityTool(weather),
    new GetAirQualityDetailsTool(weather),
  ];
}
