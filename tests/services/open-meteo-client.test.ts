import { describe, it, expect, beforeAll, afterAll, beforeEach } from '@jest/globals';
import { OpenMeteoClient } from '../../src/services/open-meteo/client.js';
import { describeWeatherCode } from '../../src/services/open-meteo/weather-codes.js';
import { MockOpenMeteoServer } from '../fixtures/mock-open-meteo-server.js';

describe('OpenMeteoClient', () => {
  let upstream: MockOpenMeteoServer;
  let client: OpenMeteoClient;

  beforeAll(async () => {
    upstream = new MockOpenMeteoServer();
    await upstream.start();
    client = new OpenMeteoClient(upstream.urls);
  });

  afterAll(async () => {
    await upstream.stop();
  });

  beforeEach(() => {
    upstream.requests.length = 0;
  });

  describe('geocode', () => {
    it('should resolve a city to its first match', async () => {
      await expect(client.geocode('Lisbon')).resolves.toEqual({
        name: 'Lisbon',
        country: 'Portugal',
        latitude: 38.72,
        longitude: -9.14,
        timezone: 'Europe/Lisbon',
      });

      const [request] = upstream.requests;
      expect(request.pathname).toBe('/v1/search');
      expect(Object.fromEntries(request.searchParams)).toEqual({
        name: 'Lisbon',
        count: '1',
        language: 'en',
        format: 'json',
      });
    });

    it('should raise CityNotFoundError when nothing matches', async () => {
      await expect(client.geocode('Atlantis')).rejects.toMatchObject({
        _tag: 'CityNotFoundError',
        city: 'Atlantis',
      });
    });

    it('should raise UpstreamUnavailableError with the HTTP status', async () => {
      await expect(client.geocode('Outage City')).rejects.toMatchObject({
        _tag: 'UpstreamUnavailableError',
        service: 'Geocoding API',
        status: 503,
        message: 'Geocoding API is unavailable: HTTP 503',
      });
    });
  });

  describe('fetchCurrentWeather', () => {
    it('should map current conditions', async () => {
      const report = await client.fetchCurrentWeather('Lisbon');

      expect(report).toEqual({
        city: 'Lisbon',
        country: 'Portugal',
        latitude: 38.72,
        longitude: -9.14,
        timezone: 'Europe/Lisbon',
        current: {
          time: '2024-06-01T14:00',
          temperature: 24.5,
          feels_like: 25.1,
          humidity: 55,
          dew_point: 14.8,
          wind_speed: 12.3,
          wind_direction: 310,
          wind_gusts: 25.2,
          precipitation: 0,
          pressure: 1016.4,
          cloud_cover: 20,
          uv_index: 7.1,
          visibility: 24140,
          weather_code: 2,
          weather_description: 'Partly cloudy',
        },
      });

      const forecastRequest = upstream.requests[1];
      expect(forecastRequest.pathname).toBe('/v1/forecast');
      expect(forecastRequest.searchParams.get('latitude')).toBe('38.72');
      expect(forecastRequest.searchParams.get('longitude')).toBe('-9.14');
      expect(forecastRequest.searchParams.has('hourly')).toBe(false);
    });

    it('should add the next 24 hours when asked', async () => {
      const report = await client.fetchCurrentWeather('Lisbon', { includeForecast: true });

      expect(report.forecast).toEqual([
        { time: '2024-06-01T15:00', temperature: 24.9, humidity: 53, precipitation_probability: 5, weather_code: 1 },
        { time: '2024-06-01T16:00', temperature: null, humidity: 52, precipitation_probability: 10, weather_code: 3 },
      ]);
      expect(upstream.requests[1].searchParams.get('forecast_hours')).toBe('24');
    });

    it('should keep current readings the location has no data for as null', async () => {
      const sparse = new OpenMeteoClient({
        fetch: async (input: string | URL | Request) => {
          const url = new URL(String(input));
          const body = url.pathname.endsWith('/search')
            ? { results: [{ name: 'Reykjavik', country: 'Iceland', latitude: 64.15, longitude: -21.94 }] }
            : {
                timezone: 'Atlantic/Reykjavik',
                current: {
                  time: '2024-06-01T14:00',
                  temperature_2m: 9.5,
                  apparent_temperature: 6.8,
                  relative_humidity_2m: 71,
                  dew_point_2m: 4.4,
                  wind_speed_10m: 18,
                  wind_direction_10m: 250,
                  wind_gusts_10m: null,
                  precipitation: 0,
                  pressure_msl: 1009.2,
                  cloud_cover: 75,
                  uv_index: 2.3,
                  visibility: null,
                  weather_code: null,
                },
              };
          return new Response(JSON.stringify(body), { status: 200 });
        },
      });

      const report = await sparse.fetchCurrentWeather('Reykjavik');

      expect(report.current).toMatchObject({
        temperature: 9.5,
        wind_gusts: null,
        visibility: null,
        weather_code: null,
        weather_description: 'No data',
      });
    });

    it('should not call the forecast API for an unknown city', async () => {
      await expect(client.fetchCurrentWeather('Atlantis')).rejects.toMatchObject({ _tag: 'CityNotFoundError' });
      expect(upstream.requests).toHaveLength(1);
    });
  });

  describe('fetchRange', () => {
    it('should keep missing hours as null', async () => {
      const range = await client.fetchRange('Lisbon', '2024-06-01', '2024-06-02');

      expect(range).toEqual({
        city: 'Lisbon',
        country: 'Portugal',
        timezone: 'Europe/Lisbon',
        start_date: '2024-06-01',
        end_date: '2024-06-02',
        hourly: [
          {
            time: '2024-06-01T00:00',
            temperature: 16.2,
            humidity: 80,
            precipitation: 0.1,
            weather_code: 45,
            weather_description: 'Fog',
          },
          {
            time: '2024-06-01T01:00',
            temperature: null,
            humidity: null,
            precipitation: null,
            weather_code: null,
            weather_description: 'No data',
          },
        ],
      });
      expect(upstream.requests[1].searchParams.get('end_date')).toBe('2024-06-02');
    });
  });

  describe('fetchAirQuality', () => {
    it('should keep only the requested numeric readings', async () => {
      const report = await client.fetchAirQuality('Lisbon', ['pm10', 'dust']);

      expect(report).toEqual({
        city: 'Lisbon',
        latitude: 38.72,
        longitude: -9.14,
        timezone: 'Europe/Lisbon',
        current: { time: '2024-06-01T14:00', pm10: 12.5 },
        units: { pm10: 'μg/m³', dust: 'μg/m³' },
      });
      expect(upstream.requests[1].searchParams.get('current')).toBe('pm10,dust');
    });
  });

  describe('failures', () => {
    it('should wrap network errors', async () => {
      const offline = new OpenMeteoClient({
        fetch: async () => {
          throw new TypeError('fetch failed');
        },
      });

      await expect(offline.geocode('Lisbon')).rejects.toMatchObject({
        _tag: 'UpstreamUnavailableError',
        message: 'Geocoding API is unavailable: fetch failed',
      });
    });

    it('should reject payloads of the wrong shape', async () => {
      const garbled = new OpenMeteoClient({
        fetch: async () => new Response(JSON.stringify({ results: 'not a list' }), { status: 200 }),
      });

      await expect(garbled.geocode('Lisbon')).rejects.toMatchObject({
        message: 'Geocoding API is unavailable: unexpected response payload',
      });
    });
  });
});

describe('describeWeatherCode', () => {
  it('should name known codes and flag unknown ones', () => {
    expect(describeWeatherCode(95)).toBe('Thunderstorm');
    expect(describeWeatherCode(42)).toBe('Unknown (code 42)');
  });
});
