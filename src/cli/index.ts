#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { config as loadDotenv } from 'dotenv';
import { ConfigError, ConfigOverrides, TransportMode, loadConfig } from '../core/config.js';
import { logger } from '../core/Logger.js';
import { MCPServer } from '../core/MCPServer.js';

const USAGE = `Usage: meteo-mcp-server [options]

Options:
  --mode <stdio|sse|streamable-http>  transport (env MCP_TRANSPORT, default stdio)
  --host <address>                    bind address for HTTP transports (env HOST)
  --port <number>                     port for HTTP transports (env PORT)
  --stateless                         stateless streamable HTTP (env MCP_STATELESS)
  --debug                             debug logging (env LOG_LEVEL)
  -h, --help                          show this help
`;

const TRANSPORT_MODES: readonly TransportMode[] = ['stdio', 'sse', 'streamable-http'];

function isTransportMode(value: string): value is TransportMode {
  return TRANSPORT_MODES.some((mode) => mode === value);
}

function parseCliArgs(argv: string[]): ConfigOverrides & { help: boolean } {
  const { values } = parseArgs({
    args: argv,
    options: {
      mode: { type: 'string' },
      host: { type: 'string' },
      port: { type: 'string' },
      stateless: { type: 'boolean' },
      debug: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  });

  const overrides: ConfigOverrides & { help: boolean } = { help: values.help ?? false };
  if (values.mode !== undefined) {
    if (!isTransportMode(values.mode)) {
      throw new ConfigError({ message: `Invalid --mode "${values.mode}". Expected one of: ${TRANSPORT_MODES.join(', ')}` });
    }
    overrides.transport = values.mode;
  }
  if (values.port !== undefined) {
    const port = Number(values.port);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ConfigError({ message: `Invalid --port "${values.port}"` });
    }
    overrides.port = port;
  }
  if (values.host !== undefined) overrides.host = values.host;
  if (values.stateless !== undefined) overrides.stateless = values.stateless;
  if (values.debug !== undefined) overrides.debug = values.debug;
  return overrides;
}

async function main(): Promise<void> {
  loadDotenv();

  const { help, ...overrides } = parseCliArgs(process.argv.slice(2));
  if (help) {
    process.stderr.write(USAGE);
    return;
  }

  const config = loadConfig(process.env, overrides);
  logger.configure({ level: config.logLevel, logsDir: config.logsDir });

  const server = new MCPServer({ config });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`Error during shutdown: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error(error.message);
  } else {
    logger.error(`Fatal error: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`);
  }
  process.exit(1);
});
