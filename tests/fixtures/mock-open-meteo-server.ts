import { createServer, IncomingMessage, Server as HttpServer, ServerResponse } from 'node:http';

/**
 * In-process stand-in for the Open-Meteo geocoding, forecast and air-quality
 * APIs. Knows `Lisbon`; `Atlantis` has no match; `Outage City` gets a 503.
 */
export class MockOpenMeteoServer {
  private server?: HttpServer;
  private port = 0;
  readonly requests: URL[] = [];

  async start(): Promise<void> {
    const server = createServer((req, res) => this.handleRequest(req, res));
    this.server = server;
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address && typeof address !== 'string') {
      this.port = address.port;
    }
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  }

  get urls(): { geocodingUrl: string; forecastUrl: string; airQualityUrl: string } {
    const base = `http://127.0.0.1:${this.port}`;
    return {
      geocodingUrl: `${base}/v1/search`,
      forecastUrl: `${base}/v1/forecast`,
      airQualityUrl: `${base}/v1/air-quality`,
    };
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const url = new URL(req.url ?? '/', `http://127.0.0.1:${this.port}`);
    this.requests.push(url);

    switch (url.pathname) {
      case '/v1/search':
        return this.geocode(url, res);
      case '/v1/forecast':
        return send(res, 200, url.searchParams.has('current') ? currentForecast(url) : rangeForecast(url));
      case '/v1/air-quality':
        return send(res, 200, airQuality(url));
      default:
        return send(res, 404, { error: true, reason: 'Not Found' });
    }
  }

  private geocode(url: URL, res: ServerResponse): void {
    const name = url.searchParams.get('name');
    if (name === 'Outage City') {
      send(res, 503, { error: true, reason: 'Service unavailable' });
      return;
    }
    if (name !== 'Lisbon') {
      send(res, 200, { generationtime_ms: 0.4 });
      return;
    }
    send(res, 200, {
      results: [
        {
          id: 2267057,
          name: 'Lisbon',
          latitude: 38.72,
          longitude: -9.14,
          country: 'Portugal',
          timezone: 'Europe/Lisbon',
        },
      ],
    });
  }
}

function send(res: ServerResponse, status: number, body: unknown): void {
  res.setHeader('Content-Type', 'application/json');
  res.writeHead(status);
  res.end(JSON.stringify(body));
}

function currentForecast(url: URL): unknown {
  const body: Record<string, unknown> = {
    timezone: 'Europe/Lisbon',
    current: {
      time: '2024-06-01T14:00',
      interval: 900,
      temperature_2m: 24.5,
      apparent_temperature: 25.1,
      relative_humidity_2m: 55,
      dew_point_2m: 14.8,
      wind_speed_10m: 12.3,
      wind_direction_10m: 310,
      wind_gusts_10m: 25.2,
      precipitation: 0,
      pressure_msl: 1016.4,
      cloud_cover: 20,
      uv_index: 7.1,
      visibility: 24140,
      weather_code: 2,
    },
  };
  if (url.searchParams.has('hourly')) {
    body.hourly = {
      time: ['2024-06-01T15:00', '2024-06-01T16:00'],
      temperature_2m: [24.9, null],
      relative_humidity_2m: [53, 52],
      precipitation_probability: [5, 10],
      weather_code: [1, 3],
    };
  }
  return body;
}

function rangeForecast(url: URL): unknown {
  const start = url.searchParams.get('start_date') ?? '';
  return {
    timezone: 'Europe/Lisbon',
    hourly: {
      time: [`${start}T00:00`, `${start}T01:00`],
      temperature_2m: [16.2, null],
      relative_humidity_2m: [80, null],
      precipitation: [0.1, null],
      weather_code: [45, null],
    },
  };
}

function airQuality(url: URL): unknown {
  const requested = (url.searchParams.get('current') ?? '').split(',');
  const current: Record<string, string | number | null> = { time: '2024-06-01T14:00', interval: 3600 };
  const units: Record<string, string> = { time: 'iso8601', interval: 'seconds' };
  for (const variable of requested) {
    current[variable] = variable === 'dust' ? null : 12.5;
    units[variable] = 'μg/m³';
  }
  return { timezone: 'Europe/Lisbon', current, current_units: units };
}
