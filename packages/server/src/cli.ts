#!/usr/bin/env node
/**
 * pixsync - CLI Entry Point
 *
 * Usage:
 *   pixsync                          # Start with config.yml from the working directory
 *   pixsync --port 9000              # Custom port
 *   pixsync --config ./my.yml        # Custom config
 *   pixsync --init                   # Generate example config
 */

import * as fs from 'fs';
import { loadConfig, generateExampleConfig, type ServerConfig } from './config';
import { StandaloneServer, SERVER_VERSION } from './standalone-server';

interface CliArgs {
  configPath?: string;
  port?: number;
  host?: string;
  init?: boolean;
  help?: boolean;
  version?: boolean;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--config':
      case '-c':
        result.configPath = args[++i];
        break;
      case '--port':
      case '-p':
        result.port = parseInt(args[++i] || '8686', 10);
        break;
      case '--host':
      case '-h':
        if (args[i + 1] && !args[i + 1]?.startsWith('-')) {
          result.host = args[++i] || '0.0.0.0';
        } else {
          result.help = true;
        }
        break;
      case '--init':
        result.init = true;
        break;
      case '--help':
        result.help = true;
        break;
      case '--version':
      case '-v':
        result.version = true;
        break;
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
pixsync - album art, lyrics and light sync for a Pixoo64

Usage: pixsync [options]

Options:
  -c, --config <path>   Path to config file (YAML or JSON)
  -p, --port <port>     API port (default: 8686)
  -h, --host <host>     API host (default: 0.0.0.0)
      --init            Generate example config file
      --help            Show this help message
  -v, --version         Show version

Environment Variables:
  PIXSYNC_PORT          API port
  PIXSYNC_HOST          API host
  PIXSYNC_HA_URL        Home Assistant URL
  PIXSYNC_HA_TOKEN      Home Assistant long-lived access token
  PIXSYNC_DATABASE      Entity state database path
  PIXSYNC_LOG_LEVEL     Log level (debug, info, warn, error)

Examples:
  pixsync --init                          # Generate config.yml
  pixsync --config ./config.yml           # Use config file
  PIXSYNC_HA_TOKEN=... pixsync            # Token via env var
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    console.log(`pixsync v${SERVER_VERSION}`);
    process.exit(0);
  }

  if (args.init) {
    fs.writeFileSync('config.yml', generateExampleConfig());
    console.log('Generated config.yml');
    console.log('\nEdit the file and run: pixsync --config config.yml');
    process.exit(0);
  }

  let config: ServerConfig;
  try {
    config = loadConfig({ configPath: args.configPath });

    if (args.port) {
      config.server.port = args.port;
    }
    if (args.host) {
      config.server.host = args.host;
    }
  } catch (error) {
    console.error('Failed to load configuration:', error);
    process.exit(1);
  }

  if (!config.homeAssistant.token) {
    console.error('No Home Assistant token configured (homeAssistant.token or PIXSYNC_HA_TOKEN)');
    process.exit(1);
  }
  if (config.entries.length === 0) {
    console.warn('No entries configured; the API will start with nothing to drive');
  }

  const server = new StandaloneServer({
    config,
    onReady: (info) => {
      console.log(`\nAPI ready at ${info.localUrl} (${info.entries} entries)`);
    }
  });

  const shutdown = async (signal: string) => {
    console.log(`\n${signal} received, shutting down...`);
    await server.stop();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  process.on('uncaughtException', (error) => {
    console.error('Uncaught exception:', error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
    process.exit(1);
  });

  try {
    await server.start();
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
