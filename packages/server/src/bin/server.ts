#!/usr/bin/env node

/* eslint-disable no-console */

import fs from 'fs';
import path from 'path';
import { loadConfig, logger } from '@pierre/core';
import { PierreServer } from '../server.js';

/**
 * Pierre gateway CLI
 *
 * Usage:
 *   pierre-server [options]
 *
 * Options:
 *   --config <path>        YAML config file
 *   --port <port>          Server port (default: 8081)
 *   --host <host>          Server host (default: 0.0.0.0)
 *   --data-dir <path>      Data directory (default: ./data)
 *   --log-level <level>    Log level (default: info)
 */

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

interface CliArgs {
  configPath?: string;
  port?: string;
  host?: string;
  dataDir?: string;
  logLevel?: (typeof LOG_LEVELS)[number];
}

function isLogLevel(value: string): value is (typeof LOG_LEVELS)[number] {
  return LOG_LEVELS.some((level) => level === value);
}

function printHelp(): void {
  console.log(`
Pierre gateway v0.1.0

Usage:
  pierre-server [options]

Options:
  --config <path>        YAML config file (default: $PIERRE_CONFIG or ./config/pierre.yaml if present)
  --port <port>          Server port (default: 8081)
  --host <host>          Server host (default: 0.0.0.0)
  --data-dir <path>      Data directory (default: ./data)
  --log-level <level>    Log level: trace|debug|info|warn|error|fatal (default: info)
  --help, -h             Show this help message

Environment variables override the config file; command-line options
override both.
  `);
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case '--config':
        if (next) {
          args.configPath = next;
          i++;
        }
        break;
      case '--port':
        if (next) {
          args.port = next;
          i++;
        }
        break;
      case '--host':
        if (next) {
          args.host = next;
          i++;
        }
        break;
      case '--data-dir':
        if (next) {
          args.dataDir = next;
          i++;
        }
        break;
      case '--log-level':
        if (next && isLogLevel(next)) {
          args.logLevel = next;
          i++;
        }
        break;
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
    }
  }

  return args;
}

function findConfigFile(args: CliArgs): string | undefined {
  if (args.configPath) {
    return args.configPath;
  }
  if (process.env.PIERRE_CONFIG) {
    return process.env.PIERRE_CONFIG;
  }
  const fallback = path.join(process.cwd(), 'config', 'pierre.yaml');
  return fs.existsSync(fallback) ? fallback : undefined;
}

/**
 * Command-line options win over the environment
 */
function cliEnvironment(args: CliArgs): NodeJS.ProcessEnv {
  return {
    ...process.env,
    ...(args.port !== undefined && { PORT: args.port }),
    ...(args.host !== undefined && { HOST: args.host }),
    ...(args.dataDir !== undefined && { DATA_DIR: args.dataDir }),
    ...(args.logLevel !== undefined && { LOG_LEVEL: args.logLevel }),
  };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const configPath = findConfigFile(args);
  const config = await loadConfig({
    ...(configPath !== undefined && { configPath }),
    env: cliEnvironment(args),
  });

  fs.mkdirSync(config.data_dir, { recursive: true });
  const server = new PierreServer({ config });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, '[server] Received signal, shutting down gracefully...');
    try {
      await server.stop();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, '[server] Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.initialize();
  await server.start();
}

main().catch((err: unknown) => {
  logger.fatal({ err }, '[server] Failed to start');
  process.exit(1);
});
