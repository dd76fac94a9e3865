#!/usr/bin/env node
/**
 * Tonearm Server - CLI Entry Point
 *
 * Usage:
 *   tonearm-server                    # Start with defaults
 *   tonearm-server --port 9000        # Custom port
 *   tonearm-server --config ./my.yml  # Custom config
 *   tonearm-server --init             # Generate example config
 */

import * as fs from 'fs';
import { loadConfig, generateExampleConfig, type ServerConfig } from './config';
import { parseArgs } from './cli-args';
import { PipelineServer } from './pipeline-server';

function printHelp(): void {
  console.log(`
Tonearm Server

Usage: tonearm-server [options]

Options:
  -c, --config <path>   Path to config file (YAML or JSON)
  -p, --port <port>     Server port (default: 8585)
      --host <host>     Server host (default: 0.0.0.0)
      --init            Generate example config file
  -h, --help            Show this help message
  -v, --version         Show version

Environment Variables:
  TONEARM_PORT                     Server port
  TONEARM_HOST                     Server host
  TONEARM_DATABASE                 Library database path (or :memory:)
  TONEARM_MAX_CONCURRENT           Queries resolved at once
  TONEARM_TEMPORARY_QUERY_TIMEOUT  Quiet period before temporary queries are evicted (ms)
  TONEARM_LOG_LEVEL                Log level (debug, info, warn, error)
`);
}

function printVersion(): void {
  console.log('Tonearm Server v0.1.0');
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    printVersion();
    process.exit(0);
  }

  if (args.init) {
    fs.writeFileSync('config.yml', generateExampleConfig());
    console.log('Generated config.yml');
    console.log('\nEdit the file and run: tonearm-server --config config.yml');
    process.exit(0);
  }

  let config: ServerConfig;
  try {
    config = loadConfig({ configPath: args.configPath });

    if (args.port !== undefined) {
      config.server.port = args.port;
    }
    if (args.host) {
      config.server.host = args.host;
    }
  } catch (error) {
    console.error('Failed to load configuration:', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  const server = new PipelineServer({
    config,
    onReady: (info) => {
      console.log(`\nServer ready at ${info.localUrl} (${info.maxConcurrent} concurrent queries)`);
    }
  });

  const shutdown = async (signal: string) => {
    console.log(`\n${signal} received, shutting down...`);
    await server.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

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

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
