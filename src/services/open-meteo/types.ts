export interface GeoLocation {
  name: string;
  country: string;
  latitude: number;
  longitude: number;
  timezone: string;
}

/** Any reading except `time` is `null` where Open-Meteo has no data for the location. */
export interface CurrentWeather {
  time: string;
  temperature: number | null;
  feels_like: number | null;
  humidity: number | null;
  dew_point: number | null;
  wind_speed: number | null;
  wind_direction: number | null;
  wind_gusts: number | null;
  precipitation: number | null;
  pressure: number | null;
  cloud_cover: number | null;
  uv_index: number | null;
  visibility: number | null;
  weather_code: number | null;
  weather_description: string;
}

export interface HourlyForecast {
  time: string;
  temperature: number | null;
  humidity: number | null;
  precipitation_probability: number | null;
  weather_code: number | null;
}

export interface WeatherReport {
  city: string;
  country: string;
  latitude: number;
  longitude: number;
  timezone: string;
  current: CurrentWeather;
  forecast?: HourlyForecast[];
}

/** Open-Meteo reports `null` for hours it has no data for. */
export interface HourlyWeather {
  time: string;
  temperature: number | null;
  humidity: number | null;
  precipitation: number | null;
  weather_code: number | null;
  weather_description: string;
}

export interface WeatherRange {
  city: string;
  country: string;
  timezone: string;
  start_date: string;
  end_date: string;
  hourly: HourlyWeather[];
}

export const AIR_QUALITY_VARIABLES = [
  'pm10',
  'pm2_5',
  'carbon_monoxide',
  'nitrogen_dioxide',
  'ozone',
  'sulphur_dioxide',
  'ammonia',
  'dust',
  'aerosol_optical_depth',
] as const;

export type AirQualityVariable = (typeof AIR_QUALITY_VARIABLES)[number];

export const DEFAULT_AIR_QUALITY_VARIABLES: readonly AirQualityVariable[] = [
  'pm10',
  'pm2_5',
  'carbon_monoxide',
  'nitrogen_dioxide',
  'ozone',
];

export interface AirQualityReport {
  city: string;
  latitude: number;
  longitude: number;
  timezone: string;
  current: { time: string } & Partial<Record<AirQualityVariable, number>>;
  units: Partial<Record<AirQualityVariable, string>>;
}

export interface CurrentWeatherOptions {
  includeForecast?: boolean;
}

/**
 * Upstream weather data as the tools see it. Implementations geocode the city
 * first and reject with `CityNotFoundError` or `UpstreamUnavailableError`.
 */
export interface WeatherService {
  geocode(city: string): Promise<GeoLocation>;
  fetchCurrentWeather(city: string, options?: CurrentWeatherOptions): Promise<WeatherReport>;
  fetchRange(city: string, startDate: string, endDate: string): Promise<WeatherRange>;
  fetchAirQuality(city: string, variables: readonly AirQualityVariable[]): Promise<AirQualityReport>;
}
