import { Data } from 'effect';
import { z } from 'zod';
import { ProtectedResourceMetadata } from '../auth/metadata/protected-resource.js';
import { providerEndpoints } from '../auth/validators/jwt-validator.js';
import { DEFAULT_OPEN_METEO_URLS } from '../services/open-meteo/client.js';
import { ResponseMode } from '../transports/http/types.js';
import { LogLevel } from './Logger.js';

export class ConfigError extends Data.TaggedError('ConfigError')<{ message: string }> {}

export type TransportMode = 'stdio' | 'sse' | 'streamable-http';

export interface AuthSettings {
  issuerBaseUrl: string;
  issuer: string;
  jwksUri: string;
  audience?: string;
  verifySsl: boolean;
  /** Resource identifier served in protected-resource metadata. */
  resource?: string;
  resourceMetadataUrl?: string;
}

export interface ServerConfig {
  transport: TransportMode;
  host: string;
  port: number;
  stateless: boolean;
  responseMode: ResponseMode;
  /** Present when bearer authentication is enabled. */
  auth?: AuthSettings;
  openMeteo: {
    geocodingUrl: string;
    forecastUrl: string;
    airQualityUrl: string;
  };
  logLevel: LogLevel;
  /** Directory for a timestamped log file; stderr only when unset. */
  logsDir?: string;
}

/** Command-line values; each one wins over its environment variable. */
export interface ConfigOverrides {
  transport?: TransportMode;
  host?: string;
  port?: number;
  stateless?: boolean;
  debug?: boolean;
}

const booleanFlag = z
  .string()
  .transform((value, ctx) => {
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${value}"` });
    return z.NEVER;
  });

const envSchema = z.object({
  MCP_TRANSPORT: z.enum(['stdio', 'sse', 'streamable-http']).default('stdio'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  MCP_STATELESS: booleanFlag.default('false'),
  MCP_RESPONSE_MODE: z.enum(['stream', 'batch']).default('stream'),
  AUTH_ENABLED: booleanFlag.default('false'),
  AUTH_ISSUER_URL: z.string().url().optional(),
  AUTH_ISSUER: z.string().optional(),
  AUTH_JWKS_URI: z.string().url().optional(),
  AUTH_AUDIENCE: z.string().optional(),
  AUTH_VERIFY_SSL: booleanFlag.default('true'),
  AUTH_RESOURCE: z.string().url().optional(),
  AUTH_RESOURCE_METADATA_URL: z.string().url().optional(),
  OPEN_METEO_GEOCODING_URL: z.string().url().default(DEFAULT_OPEN_METEO_URLS.geocodingUrl),
  OPEN_METEO_FORECAST_URL: z.string().url().default(DEFAULT_OPEN_METEO_URLS.forecastUrl),
  OPEN_METEO_AIR_QUALITY_URL: z.string().url().default(DEFAULT_OPEN_METEO_URLS.airQualityUrl),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  MCP_LOGS_DIR: z.string().optional(),
});

type Env = z.infer<typeof envSchema>;

/**
 * Builds the server configuration from environment variables and CLI
 * overrides. Blank variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): ServerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError({ message: `Invalid configuration: ${details}` });
  }
  const vars = parsed.data;

  return {
    transport: overrides.transport ?? vars.MCP_TRANSPORT,
    host: overrides.host ?? vars.HOST,
    port: overrides.port ?? vars.PORT,
    stateless: overrides.stateless ?? vars.MCP_STATELESS,
    responseMode: vars.MCP_RESPONSE_MODE,
    auth: vars.AUTH_ENABLED ? authSettings(vars) : undefined,
    openMeteo: {
      geocodingUrl: vars.OPEN_METEO_GEOCODING_URL,
      forecastUrl: vars.OPEN_METEO_FORECAST_URL,
      airQualityUrl: vars.OPEN_METEO_AIR_QUALITY_URL,
    },
    logLevel: overrides.debug ? 'debug' : vars.LOG_LEVEL,
    logsDir: vars.MCP_LOGS_DIR,
  };
}

function authSettings(vars: Env): AuthSettings {
  const base = vars.AUTH_ISSUER_URL;
  if (!base) {
    throw new ConfigError({ message: 'AUTH_ISSUER_URL is required when AUTH_ENABLED is true' });
  }

  const derived = providerEndpoints(base);
  const resourceMetadataUrl =
    vars.AUTH_RESOURCE_METADATA_URL ??
    (vars.AUTH_RESOURCE ? ProtectedResourceMetadata.metadataUrlFor(vars.AUTH_RESOURCE) : undefined);

  return {
    issuerBaseUrl: base.replace(/\/+$/, ''),
    issuer: vars.AUTH_ISSUER ?? derived.issuer,
    jwksUri: vars.AUTH_JWKS_URI ?? derived.jwksUri,
    audience: vars.AUTH_AUDIENCE,
    verifySsl: vars.AUTH_VERIFY_SSL,
    resource: vars.AUTH_RESOURCE,
    resourceMetadataUrl,
  };
}
