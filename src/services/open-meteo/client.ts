import { z } from 'zod';
import { logger } from '../../core/Logger.js';
import { CityNotFoundError, UpstreamUnavailableError } from '../../tools/errors.js';
import {
  AirQualityReport,
  AirQualityVariable,
  CurrentWeatherOptions,
  GeoLocation,
  HourlyWeather,
  WeatherRange,
  WeatherReport,
  WeatherService,
} from './types.js';
import { describeWeatherCode } from './weather-codes.js';

const log = logger.child('open-meteo');

export const DEFAULT_OPEN_METEO_URLS = {
  geocodingUrl: 'https://geocoding-api.open-meteo.com/v1/search',
  forecastUrl: 'https://api.open-meteo.com/v1/forecast',
  airQualityUrl: 'https://air-quality-api.open-meteo.com/v1/air-quality',
} as const;

export interface OpenMeteoConfig {
  geocodingUrl?: string;
  forecastUrl?: string;
  airQualityUrl?: string;
  fetch?: typeof fetch;
}

const CURRENT_WEATHER_FIELDS = [
  'temperature_2m',
  'apparent_temperature',
  'relative_humidity_2m',
  'dew_point_2m',
  'wind_speed_10m',
  'wind_direction_10m',
  'wind_gusts_10m',
  'precipitation',
  'pressure_msl',
  'cloud_cover',
  'uv_index',
  'visibility',
  'weather_code',
] as const;

const nullableReading = z.number().nullable();
const nullableSeries = z.array(nullableReading);

const geocodingSchema = z.object({
  results: z
    .array(
      z.object({
        name: z.string(),
        country: z.string().optional(),
        latitude: z.number(),
        longitude: z.number(),
        timezone: z.string().optional(),
      })
    )
    .optional(),
});

const currentWeatherSchema = z.object({
  timezone: z.string(),
  current: z.object({
    time: z.string(),
    temperature_2m: nullableReading,
    apparent_temperature: nullableReading,
    relative_humidity_2m: nullableReading,
    dew_point_2m: nullableReading,
    wind_speed_10m: nullableReading,
    wind_direction_10m: nullableReading,
    wind_gusts_10m: nullableReading,
    precipitation: nullableReading,
    pressure_msl: nullableReading,
    cloud_cover: nullableReading,
    uv_index: nullableReading,
    visibility: nullableReading,
    weather_code: nullableReading,
  }),
  hourly: z
    .object({
      time: z.array(z.string()),
      temperature_2m: nullableSeries,
      relative_humidity_2m: nullableSeries,
      precipitation_probability: nullableSeries,
      weather_code: nullableSeries,
    })
    .optional(),
});

const rangeSchema = z.object({
  timezone: z.string(),
  hourly: z.object({
    time: z.array(z.string()),
    temperature_2m: nullableSeries,
    relative_humidity_2m: nullableSeries,
    precipitation: nullableSeries,
    weather_code: nullableSeries,
  }),
});

const airQualitySchema = z.object({
  timezone: z.string(),
  current: z.record(z.union([z.string(), z.number(), z.null()])),
  current_units: z.record(z.string()).optional(),
});

/**
 * Open-Meteo geocoding, forecast and air-quality APIs. Every lookup is a
 * geocoding call followed by one data call; failures are reported at once.
 */
export class OpenMeteoClient implements WeatherService {
  private readonly geocodingUrl: string;
  private readonly forecastUrl: string;
  private readonly airQualityUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: OpenMeteoConfig = {}) {
    this.geocodingUrl = config.geocodingUrl ?? DEFAULT_OPEN_METEO_URLS.geocodingUrl;
    this.forecastUrl = config.forecastUrl ?? DEFAULT_OPEN_METEO_URLS.forecastUrl;
    this.airQualityUrl = config.airQualityUrl ?? DEFAULT_OPEN_METEO_URLS.airQualityUrl;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async geocode(city: string): Promise<GeoLocation> {
    const body = await this.getJson('Geocoding API', this.geocodingUrl, geocodingSchema, {
      name: city,
      count: '1',
      language: 'en',
      format: 'json',
    });

    const match = body.results?.[0];
    if (!match) {
      log.info(`Geocoding found no match for "${city}"`);
      throw new CityNotFoundError({ city });
    }

    return {
      name: match.name,
      country: match.country ?? '',
      latitude: match.latitude,
      longitude: match.longitude,
      timezone: match.timezone ?? 'auto',
    };
  }

  async fetchCurrentWeather(city: string, options: CurrentWeatherOptions = {}): Promise<WeatherReport> {
    const location = await this.geocode(city);
    const params: Record<string, string> = {
      ...coordinates(location),
      current: CURRENT_WEATHER_FIELDS.join(','),
      timezone: 'auto',
    };
    if (options.includeForecast) {
      params.hourly = 'temperature_2m,relative_humidity_2m,precipitation_probability,weather_code';
      params.forecast_hours = '24';
    }

    const body = await this.getJson('Forecast API', this.forecastUrl, currentWeatherSchema, params);
    const current = body.current;

    const report: WeatherReport = {
      city: location.name,
      country: location.country,
      latitude: location.latitude,
      longitude: location.longitude,
      timezone: body.timezone,
      current: {
        time: current.time,
        temperature: current.temperature_2m,
        feels_like: current.apparent_temperature,
        humidity: current.relative_humidity_2m,
        dew_point: current.dew_point_2m,
        wind_speed: current.wind_speed_10m,
        wind_direction: current.wind_direction_10m,
        wind_gusts: current.wind_gusts_10m,
        precipitation: current.precipitation,
        pressure: current.pressure_msl,
        cloud_cover: current.cloud_cover,
        uv_index: current.uv_index,
        visibility: current.visibility,
        weather_code: current.weather_code,
        weather_description: current.weather_code === null ? 'No data' : describeWeatherCode(current.weather_code),
      },
    };

    if (options.includeForecast && body.hourly) {
      const hourly = body.hourly;
      report.forecast = hourly.time.map((time, i) => ({
        time,
        temperature: hourly.temperature_2m[i] ?? null,
        humidity: hourly.relative_humidity_2m[i] ?? null,
        precipitation_probability: hourly.precipitation_probability[i] ?? null,
        weather_code: hourly.weather_code[i] ?? null,
      }));
    }

    return report;
  }

  async fetchRange(city: string, startDate: string, endDate: string): Promise<WeatherRange> {
    const location = await this.geocode(city);
    const body = await this.getJson('Forecast API', this.forecastUrl, rangeSchema, {
      ...coordinates(location),
      hourly: 'temperature_2m,relative_humidity_2m,precipitation,weather_code',
      start_date: startDate,
      end_date: endDate,
      timezone: 'auto',
    });

    const hourly = body.hourly;
    const entries: HourlyWeather[] = hourly.time.map((time, i) => {
      const code = hourly.weather_code[i] ?? null;
      return {
        time,
        temperature: hourly.temperature_2m[i] ?? null,
        humidity: hourly.relative_humidity_2m[i] ?? null,
        precipitation: hourly.precipitation[i] ?? null,
        weather_code: code,
        weather_description: code === null ? 'No data' : describeWeatherCode(code),
      };
    });

    return {
      city: location.name,
      country: location.country,
      timezone: body.timezone,
      start_date: startDate,
      end_date: endDate,
      hourly: entries,
    };
  }

  async fetchAirQuality(city: string, variables: readonly AirQualityVariable[]): Promise<AirQualityReport> {
    const location = await this.geocode(city);
    const body = await this.getJson('Air Quality API', this.airQualityUrl, airQualitySchema, {
      ...coordinates(location),
      current: variables.join(','),
      timezone: 'auto',
    });

    const current: AirQualityReport['current'] = {
      time: typeof body.current.time === 'string' ? body.current.time : '',
    };
    const units: AirQualityReport['units'] = {};
    for (const variable of variables) {
      const value = body.current[variable];
      if (typeof value === 'number') {
        current[variable] = value;
      }
      const unit = body.current_units?.[variable];
      if (unit) {
        units[variable] = unit;
      }
    }

    return {
      city: location.name,
      latitude: location.latitude,
      longitude: location.longitude,
      timezone: body.timezone,
      current,
      units,
    };
  }

  private async getJson<T>(
    service: string,
    endpoint: string,
    schema: z.ZodType<T>,
    params: Record<string, string>
  ): Promise<T> {
    const url = `${endpoint}?${new URLSearchParams(params).toString()}`;
    log.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers: { Accept: 'application/json' } });
    } catch (error) {
      log.error(`${service} request failed: ${error instanceof Error ? error.message : String(error)}`);
      throw new UpstreamUnavailableError({ service, cause: error });
    }

    if (!response.ok) {
      log.error(`${service} returned ${response.status}`);
      throw new UpstreamUnavailableError({ service, status: response.status });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new UpstreamUnavailableError({ service, cause: error });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      log.error(`${service} returned an unexpected payload: ${parsed.error.message}`);
      throw new UpstreamUnavailableError({ service, cause: new Error('unexpected response payload') });
    }
    return parsed.data;
  }
}

function coordinates(location: GeoLocation): Record<string, string> {
  return {
    latitude: String(location.latitude),
    longitude: String(location.longitude),
  };
}
